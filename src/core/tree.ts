import pLimit from 'p-limit';
import { createIndexSitemap, type IndexSitemap, type Sitemap } from '@/types/sitemap';
import { assertConcurrency, processInBatches } from '@/utils/batch-processor';
import { MAX_SITEMAP_SIZE } from '@/utils/content';
import { createLogger } from '@/utils/logger';
import { assertHttpUrl, isHttpUrl, resolveKnownPath, stripUrlToHomepage, withTrailingSlash } from '@/utils/url';
import { AxiosWebClient } from '@/web-client/axios-client';
import type { WebClient } from '@/web-client/types';
import { discoverSitemapUrlsFromRobots } from './discovery';
import { SitemapFetcher, type RecurseCallback, type RecurseListCallback } from './fetcher';
import { allSitemaps } from './traversal';

const log = createLogger('tree');

/** Places where sitemaps commonly live without being declared in robots.txt. */
export const KNOWN_SITEMAP_PATHS: readonly string[] = [
  'sitemap.xml',
  'sitemap.xml.gz',
  'sitemap_index.xml',
  'sitemap-index.xml',
  'sitemap_index.xml.gz',
  'sitemap-index.xml.gz',
  '.sitemap.xml',
  'sitemap',
  'admin/config/search/xmlsitemap',
  'sitemap/sitemap-index.xml',
  'sitemap_news.xml',
  'sitemap-news.xml',
  'sitemap_news.xml.gz',
  'sitemap-news.xml.gz',
];

export { MAX_SITEMAP_SIZE };

export interface SitemapTreeOptions {
  /** Client to fetch with; it is left open. Without one, a client is created and closed per call. */
  webClient?: WebClient;
  /** Seed with the sitemaps declared in robots.txt (default true). */
  useRobots?: boolean;
  /** Seed with `KNOWN_SITEMAP_PATHS` (default true). */
  useKnownPaths?: boolean;
  /** More paths to try, resolved against the homepage. */
  extraKnownPaths?: Iterable<string>;
  recurseCallback?: RecurseCallback;
  recurseListCallback?: RecurseListCallback;
  /** Reduce the homepage URL to its origin before resolving paths (default true). */
  normalizeHomepageUrl?: boolean;
  /** Most requests in flight at once over the whole tree (default 1). */
  concurrency?: number;
  signal?: AbortSignal;
}

function unique(urls: Iterable<string>): string[] {
  return [...new Set(urls)];
}

/**
 * Builds the sitemap tree of a website.
 *
 * Seeds are the sitemaps declared in robots.txt, the known sitemap paths and
 * `extraKnownPaths`. Every seed is fetched as a tree of its own and becomes a child
 * of a synthetic root index sitemap, whether it could be fetched or not.
 *
 * @throws ValidationError when `homepageUrl` is not an absolute HTTP(S) URL, an
 * extra path cannot be resolved against it or `concurrency` is not a whole number
 * of at least 1; all before any request
 */
export async function sitemapTreeForHomepage(
  homepageUrl: string,
  options: SitemapTreeOptions = {}
): Promise<IndexSitemap> {
  assertHttpUrl(homepageUrl);

  const {
    useRobots = true,
    useKnownPaths = true,
    extraKnownPaths = [],
    recurseCallback,
    recurseListCallback,
    normalizeHomepageUrl = true,
    concurrency = 1,
    signal,
  } = options;

  assertConcurrency(concurrency);

  let baseUrl = homepageUrl;
  if (normalizeHomepageUrl) {
    baseUrl = stripUrlToHomepage(homepageUrl);
    if (withTrailingSlash(homepageUrl) !== baseUrl) {
      log.warn(`Assuming that the homepage of ${homepageUrl} is ${baseUrl}`);
    }
  }
  baseUrl = withTrailingSlash(baseUrl);

  const candidates = unique(
    [...(useKnownPaths ? KNOWN_SITEMAP_PATHS : []), ...extraKnownPaths].map((path) =>
      resolveKnownPath(baseUrl, path)
    )
  );

  const ownsClient = options.webClient === undefined;
  const webClient = options.webClient ?? new AxiosWebClient({ maxResponseDataLength: MAX_SITEMAP_SIZE });

  const limit = pLimit(concurrency);
  const fetchSeed = (url: string, quiet404: boolean): Promise<Sitemap> =>
    new SitemapFetcher({
      url,
      webClient,
      recursionLevel: 0,
      parentUrls: new Set<string>(),
      sitemapChain: [],
      quiet404,
      recurseCallback,
      recurseListCallback,
      concurrency,
      limit,
      signal,
    }).sitemap();

  try {
    signal?.throwIfAborted();

    const robotsSeeds = useRobots
      ? await discoverSitemapUrlsFromRobots(stripUrlToHomepage(baseUrl), webClient)
      : [];
    const robotsSitemaps = await processInBatches(robotsSeeds, concurrency, (url) => fetchSeed(url, false));

    const alreadyFetched = new Set<string>(robotsSeeds);
    for (const sitemap of robotsSitemaps) {
      for (const descendant of allSitemaps(sitemap)) {
        alreadyFetched.add(descendant.url);
      }
    }

    const speculativeSeeds = candidates.filter((url) => {
      if (!isHttpUrl(url)) {
        log.warn(`Known path resolves to ${url}, which is not a HTTP(s) URL; skipping`);
        return false;
      }
      if (alreadyFetched.has(url)) {
        log.debug(`Skipping ${url}: already part of the robots.txt sitemaps`);
        return false;
      }
      return true;
    });
    const speculativeSitemaps = await processInBatches(speculativeSeeds, concurrency, (url) =>
      fetchSeed(url, true)
    );

    return createIndexSitemap(baseUrl, [...robotsSitemaps, ...speculativeSitemaps], 'website');
  } finally {
    if (ownsClient) {
      await webClient.close();
    }
  }
}
