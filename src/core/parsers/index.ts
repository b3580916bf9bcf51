import { urlPath } from '@/utils/url';
import { parseRobotsTxtSitemaps } from './robots';
import { parsePlainTextPages } from './text';
import type { ParsedDocument } from './types';
import { parseXmlDocument } from './xml';

export type { ParsedDocument } from './types';
export { parseRobotsTxtSitemaps } from './robots';
export { parsePlainTextPages } from './text';
export { parseXmlDocument } from './xml';

export function isRobotsTxtUrl(url: string): boolean {
  return urlPath(url).endsWith('/robots.txt');
}

/**
 * Classifies a fetched document and parses it with the matching parser:
 * robots.txt by URL, XML when the content opens with `<`, plain text otherwise.
 */
export function parseSitemapDocument(url: string, content: string): ParsedDocument {
  if (isRobotsTxtUrl(url)) {
    return { kind: 'index', variant: 'robots-txt', urls: parseRobotsTxtSitemaps(content) };
  }

  const trimmed = content.trim();
  if (trimmed === '') {
    return { kind: 'unrecognized', reason: 'unrecognized format: empty document' };
  }

  if (trimmed.startsWith('<')) {
    return parseXmlDocument(url, trimmed);
  }

  const pages = parsePlainTextPages(url, trimmed);
  if (pages.length === 0) {
    return { kind: 'unrecognized', reason: 'unrecognized format: no URLs in plain text document' };
  }

  return { kind: 'pages', format: 'text', pages };
}
