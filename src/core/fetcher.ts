import pLimit, { type LimitFunction } from 'p-limit';
import { GunzipError } from '@/errors/sitemap-errors';
import {
  assertNever,
  createIndexRobotsTxtSitemap,
  createIndexSitemap,
  createInvalidSitemap,
  createPagesSitemap,
  type Sitemap,
} from '@/types/sitemap';
import { assertConcurrency, processInBatches } from '@/utils/batch-processor';
import { ungzippedResponseContent } from '@/utils/content';
import { createLogger } from '@/utils/logger';
import { getUrlRetryOnClientErrors } from '@/web-client/retry';
import type { WebClient } from '@/web-client/types';
import { parseSitemapDocument } from './parsers';

const log = createLogger('fetcher');

/** Deepest recursion level that is still fetched; level 0 is a seed sitemap. */
export const MAX_RECURSION_LEVEL = 11;

/** Decides, per candidate sitemap, whether it is fetched at all. */
export type RecurseCallback = (
  url: string,
  recursionLevel: number,
  parentUrls: ReadonlySet<string>
) => boolean;

/**
 * Replaces the child URL list of an index sitemap before any child is fetched.
 * Receives the index sitemap's own recursion level and ancestor URLs.
 */
export type RecurseListCallback = (
  urls: string[],
  recursionLevel: number,
  parentUrls: ReadonlySet<string>
) => string[];

export interface SitemapFetcherOptions {
  url: string;
  webClient: WebClient;
  recursionLevel?: number;
  /** URLs of the index sitemaps above this one; used for cycle detection. */
  parentUrls?: ReadonlySet<string>;
  /** Path from the seed sitemap down to the parent, for diagnostics only. */
  sitemapChain?: readonly string[];
  /** Log a 404 at debug level, for locations that are only guessed. */
  quiet404?: boolean;
  recurseCallback?: RecurseCallback;
  recurseListCallback?: RecurseListCallback;
  /** Most requests in flight at once, across the whole subtree (default 1). */
  concurrency?: number;
  /**
   * Request limiter shared by every branch; one is created from `concurrency`
   * when absent. Pass the same limiter to several fetchers to bound them together.
   */
  limit?: LimitFunction;
  signal?: AbortSignal;
}

function describeChain(chain: readonly string[]): string {
  return chain.join(' -> ');
}

/**
 * Fetches one sitemap and, for index sitemaps, everything below it. The returned
 * node is always fully resolved; failures become `invalid` nodes.
 */
export class SitemapFetcher {
  private readonly url: string;
  private readonly webClient: WebClient;
  private readonly recursionLevel: number;
  private readonly parentUrls: ReadonlySet<string>;
  private readonly sitemapChain: readonly string[];
  private readonly quiet404: boolean;
  private readonly concurrency: number;
  private readonly limit: LimitFunction;

  /** @throws ValidationError when `concurrency` is not a whole number of at least 1 */
  constructor(private readonly options: SitemapFetcherOptions) {
    this.url = options.url;
    this.webClient = options.webClient;
    this.recursionLevel = options.recursionLevel ?? 0;
    this.parentUrls = options.parentUrls ?? new Set<string>();
    this.sitemapChain = options.sitemapChain ?? [];
    this.quiet404 = options.quiet404 ?? false;
    this.concurrency = options.concurrency ?? 1;
    assertConcurrency(this.concurrency);
    this.limit = options.limit ?? pLimit(this.concurrency);
  }

  async sitemap(): Promise<Sitemap> {
    const { url, recursionLevel, parentUrls } = this;

    if (parentUrls.has(url)) {
      const reason = `cycle detected: ${url} is its own ancestor (${describeChain([...this.sitemapChain, url])})`;
      log.warn(reason);
      return createInvalidSitemap(url, 'cycle', reason);
    }

    if (recursionLevel > MAX_RECURSION_LEVEL) {
      const reason =
        `max recursion depth exceeded: level ${recursionLevel} is above ${MAX_RECURSION_LEVEL} ` +
        `(${describeChain([...this.sitemapChain, url])})`;
      log.warn(reason);
      return createInvalidSitemap(url, 'max-depth', reason);
    }

    const { recurseCallback } = this.options;
    if (recurseCallback && !recurseCallback(url, recursionLevel, parentUrls)) {
      log.info(`Skipping sitemap ${url}: filtered by callback`);
      return createInvalidSitemap(url, 'filtered', 'filtered by callback');
    }

    this.options.signal?.throwIfAborted();

    const response = await this.limit(() => getUrlRetryOnClientErrors(url, this.webClient));

    if (response.kind === 'error') {
      const reason = `Unable to fetch sitemap from ${url}: ${response.message}`;
      if (response.statusCode === 404 && this.quiet404) {
        log.debug(reason);
      } else {
        log.warn(reason);
      }
      return createInvalidSitemap(url, 'fetch-failed', reason);
    }

    let content: string;
    try {
      content = ungzippedResponseContent(url, response);
    } catch (error) {
      if (error instanceof GunzipError) {
        log.warn(error.message);
        return createInvalidSitemap(url, 'gunzip-failed', error.message);
      }
      throw error;
    }

    const document = parseSitemapDocument(url, content);

    switch (document.kind) {
      case 'index': {
        const children = await this.fetchChildren(document.urls);
        log.info(`Parsed index sitemap ${url} with ${children.length} sub-sitemap(s)`);
        return document.variant === 'robots-txt'
          ? createIndexRobotsTxtSitemap(url, children)
          : createIndexSitemap(url, children, 'xml');
      }
      case 'pages':
        log.info(`Parsed ${document.format} sitemap ${url} with ${document.pages.length} page(s)`);
        return createPagesSitemap(url, document.format, document.pages);
      case 'unrecognized':
        log.warn(`Unable to parse sitemap ${url}: ${document.reason}`);
        return createInvalidSitemap(url, 'unrecognized-format', document.reason);
      case 'parse-error':
        log.warn(`Unable to parse sitemap ${url}: ${document.reason}`);
        return createInvalidSitemap(url, 'parse-failed', document.reason);
      default:
        return assertNever(document);
    }
  }

  private async fetchChildren(discoveredUrls: string[]): Promise<Sitemap[]> {
    const { recurseListCallback } = this.options;
    const childUrls = recurseListCallback
      ? recurseListCallback([...discoveredUrls], this.recursionLevel, this.parentUrls)
      : discoveredUrls;

    if (childUrls.length < discoveredUrls.length) {
      log.info(`Filtered ${discoveredUrls.length - childUrls.length} sub-sitemap(s) of ${this.url}`);
    }

    const childParentUrls = [...this.parentUrls, this.url];
    const childChain = [...this.sitemapChain, this.url];

    return processInBatches(childUrls, this.concurrency, (childUrl) =>
      new SitemapFetcher({
        ...this.options,
        url: childUrl,
        recursionLevel: this.recursionLevel + 1,
        parentUrls: new Set(childParentUrls),
        sitemapChain: [...childChain],
        quiet404: false,
        limit: this.limit,
      }).sitemap()
    );
  }
}

export async function fetchSitemap(options: SitemapFetcherOptions): Promise<Sitemap> {
  return new SitemapFetcher(options).sitemap();
}
