import { createLogger } from '@/utils/logger';
import type { WebClient, WebClientResponse } from './types';

const log = createLogger('retry');

export const DEFAULT_RETRY_COUNT = 5;

/**
 * Fetch a URL, retrying while the client reports a retryable error. Spacing between
 * attempts comes from the client's own inter-request wait.
 *
 * Returns the first success, the first non-retryable error, or the last error once
 * `retryCount` attempts have been made.
 */
export async function getUrlRetryOnClientErrors(
  url: string,
  webClient: WebClient,
  retryCount: number = DEFAULT_RETRY_COUNT
): Promise<WebClientResponse> {
  if (retryCount < 1) {
    throw new RangeError(`retryCount must be at least 1, got ${retryCount}`);
  }

  const fetchOnce = (): Promise<WebClientResponse> => {
    log.info(`Fetching URL ${url}...`);
    return webClient.get(url);
  };

  let attempt = 1;
  let response = await fetchOnce();

  while (response.kind === 'error' && response.retryable && attempt < retryCount) {
    attempt++;
    log.warn(`Retrying URL ${url} (attempt ${attempt} of ${retryCount}): ${response.message}`);
    response = await fetchOnce();
  }

  if (response.kind === 'error') {
    log.info(
      response.retryable
        ? `Giving up on URL ${url} after ${attempt} attempts`
        : `Not retrying for URL ${url}: ${response.message}`
    );
  }

  return response;
}
