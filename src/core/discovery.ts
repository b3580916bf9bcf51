import { GunzipError } from '@/errors/sitemap-errors';
import { ungzippedResponseContent } from '@/utils/content';
import { createLogger } from '@/utils/logger';
import { assertHttpUrl, stripUrlToHomepage } from '@/utils/url';
import { AxiosWebClient } from '@/web-client/axios-client';
import { getUrlRetryOnClientErrors } from '@/web-client/retry';
import type { WebClient } from '@/web-client/types';
import { parseRobotsTxtSitemaps } from './parsers';

const log = createLogger('discovery');

/**
 * Sitemap URLs declared in a website's robots.txt, without fetching the sitemaps
 * themselves.
 *
 * The homepage is reduced to its origin before `robots.txt` is appended. A missing
 * or unreadable robots.txt yields an empty list. When no client is passed, one is
 * created for this call and closed before returning.
 *
 * @throws ValidationError when `homepageUrl` is not an absolute HTTP(S) URL
 */
export async function discoverSitemapUrlsFromRobots(
  homepageUrl: string,
  webClient?: WebClient
): Promise<string[]> {
  assertHttpUrl(homepageUrl);

  const strippedHomepageUrl = stripUrlToHomepage(homepageUrl);
  if (homepageUrl !== strippedHomepageUrl && `${homepageUrl}/` !== strippedHomepageUrl) {
    log.warn(`Assuming that the homepage of ${homepageUrl} is ${strippedHomepageUrl}`);
  }
  const robotsTxtUrl = `${strippedHomepageUrl}robots.txt`;

  const client = webClient ?? new AxiosWebClient();
  try {
    log.info(`Fetching robots.txt from ${robotsTxtUrl}...`);
    const response = await getUrlRetryOnClientErrors(robotsTxtUrl, client);

    if (response.kind === 'error') {
      log.warn(`Failed to fetch robots.txt: ${response.message}`);
      return [];
    }

    let content: string;
    try {
      content = ungzippedResponseContent(robotsTxtUrl, response);
    } catch (error) {
      if (error instanceof GunzipError) {
        log.warn(`Failed to read robots.txt: ${error.message}`);
        return [];
      }
      throw error;
    }

    const sitemapUrls = parseRobotsTxtSitemaps(content);
    log.info(`Found ${sitemapUrls.length} sitemap(s) in robots.txt`);
    return sitemapUrls;
  } finally {
    if (webClient === undefined) {
      await client.close();
    }
  }
}
