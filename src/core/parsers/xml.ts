import { XMLParser } from 'fast-xml-parser';
import {
  isChangeFrequency,
  type ChangeFrequency,
  type MetadataAttributes,
  type Page,
  type PageAlternate,
} from '@/types/sitemap';
import { parseDate } from '@/utils/content';
import { createLogger } from '@/utils/logger';
import { isHttpUrl } from '@/utils/url';
import type { ParsedDocument } from './types';

const log = createLogger('xml-parser');

type XmlNode = { [key: string]: unknown };

type MutablePage = { -readonly [K in keyof Page]: Page[K] };

const ATTRIBUTE_PREFIX = '@_';

function isNode(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Child elements named `name`, whether the parser produced one or several. */
function children(node: unknown, name: string): unknown[] {
  if (!isNode(node)) {
    return [];
  }
  const value = node[name];
  if (value === undefined || value === null) {
    return [];
  }
  return Array.isArray(value) ? value : [value];
}

function text(value: unknown): string | undefined {
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed === '' ? undefined : trimmed;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  if (isNode(value)) {
    return text(value['#text']);
  }
  return undefined;
}

function childText(node: unknown, name: string): string | undefined {
  return text(children(node, name)[0]);
}

function attribute(node: unknown, name: string): string | undefined {
  return isNode(node) ? text(node[`${ATTRIBUTE_PREFIX}${name}`]) : undefined;
}

/**
 * Flattens an extension element into string attributes: nested element names are
 * joined with `_` (`<news:publication><news:name>` becomes `publication_name`) and
 * the first occurrence of a repeated element wins.
 */
export function flattenElement(
  node: unknown,
  prefix = '',
  into: Record<string, string> = {}
): Record<string, string> {
  if (!isNode(node)) {
    const value = text(node);
    if (value !== undefined && prefix !== '' && !(prefix in into)) {
      into[prefix] = value;
    }
    return into;
  }

  for (const [key, value] of Object.entries(node)) {
    if (key.startsWith(ATTRIBUTE_PREFIX)) {
      continue;
    }
    const name = key === '#text' ? prefix : prefix === '' ? key : `${prefix}_${key}`;
    for (const item of Array.isArray(value) ? value : [value]) {
      flattenElement(item, name, into);
    }
  }

  return into;
}

function createXmlParser(): XMLParser {
  return new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: ATTRIBUTE_PREFIX,
    removeNSPrefix: true,
    ignoreDeclaration: true,
    ignorePiTags: true,
    parseTagValue: false,
    parseAttributeValue: false,
    trimValues: true,
    processEntities: true,
    htmlEntities: true,
  });
}

/** Name of the document element, namespace prefix removed. */
function rootElement(document: XmlNode): string | undefined {
  return Object.keys(document).find(
    (key) => !key.startsWith('#') && !key.startsWith('?') && !key.startsWith(ATTRIBUTE_PREFIX)
  );
}

function parseIndexUrls(sitemapUrl: string, root: unknown): string[] {
  const urls = new Set<string>();

  for (const entry of children(root, 'sitemap')) {
    const loc = childText(entry, 'loc');
    if (isHttpUrl(loc)) {
      urls.add(loc);
    } else {
      log.warn(`Skipping sub-sitemap with invalid location ${loc ?? '(none)'} in ${sitemapUrl}`);
    }
  }

  return [...urls];
}

function parseChangeFrequency(sitemapUrl: string, value: string | undefined): ChangeFrequency | undefined {
  if (value === undefined) {
    return undefined;
  }
  const normalized = value.toLowerCase();
  if (isChangeFrequency(normalized)) {
    return normalized;
  }
  log.warn(`Invalid change frequency "${value}" in ${sitemapUrl}, ignoring`);
  return undefined;
}

function parsePriority(sitemapUrl: string, value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const priority = Number(value);
  if (Number.isNaN(priority)) {
    log.warn(`Invalid priority "${value}" in ${sitemapUrl}, ignoring`);
    return undefined;
  }
  return priority;
}

function parseLastModified(sitemapUrl: string, value: string | undefined): Date | undefined {
  const date = parseDate(value);
  if (value !== undefined && date === undefined) {
    log.warn(`Invalid date "${value}" in ${sitemapUrl}, ignoring`);
  }
  return date;
}

function parseAlternates(entry: unknown): PageAlternate[] {
  const alternates: PageAlternate[] = [];

  for (const link of children(entry, 'link')) {
    const hreflang = attribute(link, 'hreflang');
    const href = attribute(link, 'href');
    if (attribute(link, 'rel') === 'alternate' && hreflang !== undefined && isHttpUrl(href)) {
      alternates.push({ hreflang, href });
    }
  }

  return alternates;
}

function parseUrlSetPage(sitemapUrl: string, entry: unknown): Page | undefined {
  const loc = childText(entry, 'loc');
  if (!isHttpUrl(loc)) {
    log.warn(`Skipping page with invalid location ${loc ?? '(none)'} in ${sitemapUrl}`);
    return undefined;
  }

  const page: MutablePage = { url: loc };

  const lastModified = parseLastModified(sitemapUrl, childText(entry, 'lastmod'));
  if (lastModified) page.lastModified = lastModified;

  const changeFrequency = parseChangeFrequency(sitemapUrl, childText(entry, 'changefreq'));
  if (changeFrequency) page.changeFrequency = changeFrequency;

  const priority = parsePriority(sitemapUrl, childText(entry, 'priority'));
  if (priority !== undefined) page.priority = priority;

  const news = children(entry, 'news')[0];
  if (news !== undefined) {
    const attributes: MetadataAttributes = flattenElement(news);
    if (Object.keys(attributes).length > 0) page.news = attributes;
  }

  const images = children(entry, 'image')
    .map((image) => flattenElement(image))
    .filter((attributes) => Object.keys(attributes).length > 0);
  if (images.length > 0) page.images = images;

  const alternates = parseAlternates(entry);
  if (alternates.length > 0) page.alternates = alternates;

  return page;
}

function parseUrlSetPages(sitemapUrl: string, root: unknown): Page[] {
  return children(root, 'url')
    .map((entry) => parseUrlSetPage(sitemapUrl, entry))
    .filter((page): page is Page => page !== undefined);
}

function newsFor(title: string | undefined, publicationDate: string | undefined): MetadataAttributes | undefined {
  const news: Record<string, string> = {};
  if (title !== undefined) news.title = title;
  if (publicationDate !== undefined) news.publication_date = publicationDate;
  return Object.keys(news).length > 0 ? news : undefined;
}

function feedPage(
  url: string,
  lastModified: Date | undefined,
  news: MetadataAttributes | undefined
): Page {
  const page: MutablePage = { url };
  if (lastModified) page.lastModified = lastModified;
  if (news) page.news = news;
  return page;
}

function parseRssPages(sitemapUrl: string, root: unknown): Page[] {
  const pages: Page[] = [];

  for (const channel of children(root, 'channel')) {
    for (const item of children(channel, 'item')) {
      const link = children(item, 'link').map(text).find((candidate) => isHttpUrl(candidate));
      if (!isHttpUrl(link)) {
        log.warn(`Skipping RSS item without a valid link in ${sitemapUrl}`);
        continue;
      }

      const pubDate = childText(item, 'pubDate');
      const title = childText(item, 'title') ?? childText(item, 'description');
      pages.push(feedPage(link, parseLastModified(sitemapUrl, pubDate), newsFor(title, pubDate)));
    }
  }

  return pages;
}

/** Prefers `rel="alternate"` (or no rel) links, the entry's public page. */
function atomEntryLink(entry: unknown): string | undefined {
  const links = children(entry, 'link');
  const preferred = links.find((link) => {
    const rel = attribute(link, 'rel');
    return (rel === undefined || rel === 'alternate') && isHttpUrl(attribute(link, 'href'));
  });
  const chosen = preferred ?? links.find((link) => isHttpUrl(attribute(link, 'href')));
  return attribute(chosen, 'href');
}

function parseAtomPages(sitemapUrl: string, root: unknown): Page[] {
  const pages: Page[] = [];

  for (const entry of children(root, 'entry')) {
    const link = atomEntryLink(entry);
    if (!isHttpUrl(link)) {
      log.warn(`Skipping Atom entry without a valid link in ${sitemapUrl}`);
      continue;
    }

    const published = childText(entry, 'published');
    const updated = childText(entry, 'updated');
    pages.push(
      feedPage(
        link,
        parseLastModified(sitemapUrl, updated ?? published),
        newsFor(childText(entry, 'title'), published ?? updated)
      )
    );
  }

  return pages;
}

/**
 * Parses an XML sitemap document and dispatches on its document element:
 * `sitemapindex`, `urlset`, `rss` or `feed`.
 */
export function parseXmlDocument(sitemapUrl: string, content: string): ParsedDocument {
  let document: unknown;
  try {
    document = createXmlParser().parse(content, true);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return { kind: 'parse-error', reason: `XML parsing failed: ${message}` };
  }

  if (!isNode(document)) {
    return { kind: 'unrecognized', reason: 'unrecognized format: empty XML document' };
  }

  const rootName = rootElement(document);
  const root = rootName === undefined ? undefined : document[rootName];

  switch (rootName) {
    case 'sitemapindex':
      return { kind: 'index', variant: 'xml', urls: parseIndexUrls(sitemapUrl, root) };
    case 'urlset':
      return { kind: 'pages', format: 'xml', pages: parseUrlSetPages(sitemapUrl, root) };
    case 'rss':
      return { kind: 'pages', format: 'rss', pages: parseRssPages(sitemapUrl, root) };
    case 'feed':
      return { kind: 'pages', format: 'atom', pages: parseAtomPages(sitemapUrl, root) };
    default:
      return {
        kind: 'unrecognized',
        reason: `unrecognized format: unsupported XML root element <${rootName ?? ''}>`,
      };
  }
}
