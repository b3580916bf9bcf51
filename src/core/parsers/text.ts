import type { Page } from '@/types/sitemap';
import { createLogger } from '@/utils/logger';
import { isHttpUrl } from '@/utils/url';

const log = createLogger('text-parser');

/** One page per line that holds an absolute HTTP(S) URL; other lines are skipped. */
export function parsePlainTextPages(sitemapUrl: string, content: string): Page[] {
  const seen = new Set<string>();
  const pages: Page[] = [];
  let skipped = 0;

  for (const rawLine of content.split(/\r?\n|\r/)) {
    const line = rawLine.trim();
    if (line === '') {
      continue;
    }

    if (!isHttpUrl(line)) {
      skipped++;
      continue;
    }

    if (!seen.has(line)) {
      seen.add(line);
      pages.push({ url: line });
    }
  }

  if (skipped > 0) {
    log.debug(`Skipped ${skipped} non-URL line(s) in ${sitemapUrl}`);
  }

  return pages;
}
