export { sitemapTreeForHomepage, KNOWN_SITEMAP_PATHS, MAX_SITEMAP_SIZE, type SitemapTreeOptions } from './core/tree';
export { discoverSitemapUrlsFromRobots } from './core/discovery';
export {
  SitemapFetcher,
  fetchSitemap,
  MAX_RECURSION_LEVEL,
  type SitemapFetcherOptions,
  type RecurseCallback,
  type RecurseListCallback,
} from './core/fetcher';
export {
  allSitemaps,
  allPages,
  uniquePages,
  subSitemaps,
  pagesOf,
  sitemapToJSON,
  pageToJSON,
  type PageJSON,
  type SitemapJSON,
  type SitemapToJSONOptions,
} from './core/traversal';
export { parseSitemapDocument } from './core/parsers';
export { parseRobotsTxtSitemaps } from './core/parsers/robots';
export type { ParsedDocument } from './core/parsers/types';
export * from './types/sitemap';
export * from './web-client';
export { ValidationError, GunzipError, ConfigError } from './errors/sitemap-errors';
export { ConfigLoader, type LoadConfigOptions } from './config/loader';
export type { Config } from './config/schema';
export { setLogLevel, getLogLevel, createLogger, type LogLevel, type Logger } from './utils/logger';
