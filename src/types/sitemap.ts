export const CHANGE_FREQUENCIES = [
  'always',
  'hourly',
  'daily',
  'weekly',
  'monthly',
  'yearly',
  'never',
] as const;

export type ChangeFrequency = (typeof CHANGE_FREQUENCIES)[number];

export function isChangeFrequency(value: string): value is ChangeFrequency {
  return (CHANGE_FREQUENCIES as readonly string[]).includes(value);
}

/** Extension elements (news, image) kept as the document spelled them. */
export type MetadataAttributes = Readonly<Record<string, string>>;

export interface PageAlternate {
  readonly hreflang: string;
  readonly href: string;
}

export interface Page {
  readonly url: string;
  readonly lastModified?: Date;
  readonly changeFrequency?: ChangeFrequency;
  readonly priority?: number;
  readonly news?: MetadataAttributes;
  readonly images?: readonly MetadataAttributes[];
  readonly alternates?: readonly PageAlternate[];
}

export type PagesFormat = 'xml' | 'text' | 'rss' | 'atom';

export type InvalidSitemapCode =
  | 'cycle'
  | 'max-depth'
  | 'filtered'
  | 'fetch-failed'
  | 'gunzip-failed'
  | 'unrecognized-format'
  | 'parse-failed';

export interface IndexSitemap {
  readonly variant: 'index';
  /** `website` for the synthetic root, `xml` for a fetched `<sitemapindex>`. */
  readonly source: 'website' | 'xml';
  readonly url: string;
  readonly subSitemaps: readonly Sitemap[];
}

export interface IndexRobotsTxtSitemap {
  readonly variant: 'index-robots-txt';
  readonly url: string;
  readonly subSitemaps: readonly Sitemap[];
}

export interface PagesSitemap {
  readonly variant: 'pages';
  readonly format: PagesFormat;
  readonly url: string;
  readonly pages: readonly Page[];
}

export interface InvalidSitemap {
  readonly variant: 'invalid';
  readonly code: InvalidSitemapCode;
  readonly url: string;
  readonly reason: string;
}

export type Sitemap = IndexSitemap | IndexRobotsTxtSitemap | PagesSitemap | InvalidSitemap;

export type SitemapVariant = Sitemap['variant'];

export function assertNever(value: never): never {
  throw new Error(`Unexpected sitemap variant: ${JSON.stringify(value)}`);
}

export function createIndexSitemap(
  url: string,
  subSitemaps: readonly Sitemap[],
  source: IndexSitemap['source'] = 'xml'
): IndexSitemap {
  const sitemap: IndexSitemap = {
    variant: 'index',
    source,
    url,
    subSitemaps: Object.freeze([...subSitemaps]),
  };
  return Object.freeze(sitemap);
}

export function createIndexRobotsTxtSitemap(
  url: string,
  subSitemaps: readonly Sitemap[]
): IndexRobotsTxtSitemap {
  const sitemap: IndexRobotsTxtSitemap = {
    variant: 'index-robots-txt',
    url,
    subSitemaps: Object.freeze([...subSitemaps]),
  };
  return Object.freeze(sitemap);
}

export function createPagesSitemap(
  url: string,
  format: PagesFormat,
  pages: readonly Page[]
): PagesSitemap {
  const sitemap: PagesSitemap = {
    variant: 'pages',
    format,
    url,
    pages: Object.freeze(pages.map((page) => Object.freeze({ ...page }))),
  };
  return Object.freeze(sitemap);
}

export function createInvalidSitemap(
  url: string,
  code: InvalidSitemapCode,
  reason: string
): InvalidSitemap {
  const sitemap: InvalidSitemap = { variant: 'invalid', code, url, reason };
  return Object.freeze(sitemap);
}
