import { createLogger } from '@/utils/logger';
import { isHttpUrl } from '@/utils/url';

const log = createLogger('robots');

const SITEMAP_DIRECTIVE = /^site-?map:\s*(.+?)$/i;

/**
 * Sitemap URLs declared in a robots.txt body, in file order with duplicates
 * collapsed. Candidates that are not absolute HTTP(S) URLs are dropped.
 */
export function parseRobotsTxtSitemaps(content: string): string[] {
  const sitemapUrls = new Set<string>();

  for (const rawLine of content.split(/\r?\n|\r/)) {
    const match = SITEMAP_DIRECTIVE.exec(rawLine.trim());
    if (!match) {
      continue;
    }

    const candidate = match[1].trim();
    if (isHttpUrl(candidate)) {
      sitemapUrls.add(candidate);
    } else {
      log.warn(`Sitemap URL ${candidate} doesn't look like a URL, skipping`);
    }
  }

  return [...sitemapUrls];
}
