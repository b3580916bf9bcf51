import {
  assertNever,
  type ChangeFrequency,
  type InvalidSitemapCode,
  type MetadataAttributes,
  type Page,
  type PageAlternate,
  type PagesFormat,
  type Sitemap,
} from '@/types/sitemap';

/** Direct child sitemaps; empty for pages and invalid sitemaps. */
export function subSitemaps(sitemap: Sitemap): readonly Sitemap[] {
  switch (sitemap.variant) {
    case 'index':
    case 'index-robots-txt':
      return sitemap.subSitemaps;
    case 'pages':
    case 'invalid':
      return [];
    default:
      return assertNever(sitemap);
  }
}

/** Pages held directly by a sitemap; empty for everything but pages sitemaps. */
export function pagesOf(sitemap: Sitemap): readonly Page[] {
  switch (sitemap.variant) {
    case 'pages':
      return sitemap.pages;
    case 'index':
    case 'index-robots-txt':
    case 'invalid':
      return [];
    default:
      return assertNever(sitemap);
  }
}

function* walkSitemaps(sitemap: Sitemap): Generator<Sitemap> {
  for (const child of subSitemaps(sitemap)) {
    yield child;
    yield* walkSitemaps(child);
  }
}

function* walkPages(sitemap: Sitemap): Generator<Page> {
  yield* pagesOf(sitemap);
  for (const child of subSitemaps(sitemap)) {
    yield* walkPages(child);
  }
}

/**
 * Every sitemap below `sitemap`, depth-first pre-order. The sitemap itself is not
 * included. Each iteration starts a fresh walk.
 */
export function allSitemaps(sitemap: Sitemap): Iterable<Sitemap> {
  return { [Symbol.iterator]: () => walkSitemaps(sitemap) };
}

/** Every page reachable from `sitemap`, in the same order as `allSitemaps`. */
export function allPages(sitemap: Sitemap): Iterable<Page> {
  return { [Symbol.iterator]: () => walkPages(sitemap) };
}

/** `allPages` with repeated page URLs dropped; the first occurrence wins. */
export function uniquePages(sitemap: Sitemap): Iterable<Page> {
  return {
    *[Symbol.iterator]() {
      const seen = new Set<string>();
      for (const page of walkPages(sitemap)) {
        if (!seen.has(page.url)) {
          seen.add(page.url);
          yield page;
        }
      }
    },
  };
}

export interface PageJSON {
  url: string;
  lastModified?: string;
  changeFrequency?: ChangeFrequency;
  priority?: number;
  news?: MetadataAttributes;
  images?: readonly MetadataAttributes[];
  alternates?: readonly PageAlternate[];
}

export type SitemapJSON =
  | { variant: 'index'; source: 'website' | 'xml'; url: string; subSitemaps: SitemapJSON[] }
  | { variant: 'index-robots-txt'; url: string; subSitemaps: SitemapJSON[] }
  | { variant: 'pages'; format: PagesFormat; url: string; pages?: PageJSON[] }
  | { variant: 'invalid'; code: InvalidSitemapCode; url: string; reason: string };

export interface SitemapToJSONOptions {
  /** Include the pages of pages sitemaps (default true). */
  withPages?: boolean;
}

export function pageToJSON(page: Page): PageJSON {
  const { lastModified, ...rest } = page;
  return lastModified ? { ...rest, lastModified: lastModified.toISOString() } : { ...rest };
}

/** Plain-object rendering of a tree, suitable for `JSON.stringify`. */
export function sitemapToJSON(sitemap: Sitemap, options: SitemapToJSONOptions = {}): SitemapJSON {
  const { withPages = true } = options;

  switch (sitemap.variant) {
    case 'index':
      return {
        variant: 'index',
        source: sitemap.source,
        url: sitemap.url,
        subSitemaps: sitemap.subSitemaps.map((child) => sitemapToJSON(child, options)),
      };
    case 'index-robots-txt':
      return {
        variant: 'index-robots-txt',
        url: sitemap.url,
        subSitemaps: sitemap.subSitemaps.map((child) => sitemapToJSON(child, options)),
      };
    case 'pages':
      return withPages
        ? { variant: 'pages', format: sitemap.format, url: sitemap.url, pages: sitemap.pages.map(pageToJSON) }
        : { variant: 'pages', format: sitemap.format, url: sitemap.url };
    case 'invalid':
      return { variant: 'invalid', code: sitemap.code, url: sitemap.url, reason: sitemap.reason };
    default:
      return assertNever(sitemap);
  }
}
