import { describe, it, expect, vi } from 'vitest';
import { getUrlRetryOnClientErrors } from '@/web-client/retry';
import { MockWebClient, notFound, ok, status, timedOut } from '../../fixtures/mock-web-client';

const SITEMAP_URL = 'https://example.com/sitemap.xml';

describe('getUrlRetryOnClientErrors', () => {
  it('should return the first success without retrying', async () => {
    const webClient = new MockWebClient({ [SITEMAP_URL]: ok('body') });

    const response = await getUrlRetryOnClientErrors(SITEMAP_URL, webClient);

    expect(response.kind).toBe('success');
    expect(webClient.requestCount(SITEMAP_URL)).toBe(1);
  });

  it('should succeed after exactly two calls when the first error is retryable', async () => {
    const webClient = new MockWebClient({ [SITEMAP_URL]: [status(429, 'Too Many Requests'), ok('body')] });

    const response = await getUrlRetryOnClientErrors(SITEMAP_URL, webClient);

    expect(response.kind).toBe('success');
    expect(webClient.requestCount(SITEMAP_URL)).toBe(2);
    expect(vi.mocked(console.warn)).toHaveBeenCalledWith(
      expect.stringContaining(`Retrying SITEMAP_URL ${SITEMAP_URL} (attempt 2 of 5): 429 Too Many Requests`)
    );
  });

  it('should not retry non-retryable errors', async () => {
    const webClient = new MockWebClient({ [SITEMAP_URL]: notFound() });

    const response = await getUrlRetryOnClientErrors(SITEMAP_URL, webClient);

    expect(response).toEqual({ kind: 'error', message: '404 Not Found', retryable: false, statusCode: 404 });
    expect(webClient.requestCount(SITEMAP_URL)).toBe(1);
  });

  it('should return the last error after retryCount attempts', async () => {
    const webClient = new MockWebClient({
      [SITEMAP_URL]: [timedOut(), timedOut(), status(502, 'Bad Gateway')],
    });

    const response = await getUrlRetryOnClientErrors(SITEMAP_URL, webClient, 3);

    expect(response).toEqual({ kind: 'error', message: '502 Bad Gateway', retryable: true, statusCode: 502 });
    expect(webClient.requestCount(SITEMAP_URL)).toBe(3);
  });

  it('should make five attempts by default', async () => {
    const webClient = new MockWebClient({ [SITEMAP_URL]: timedOut() });

    await getUrlRetryOnClientErrors(SITEMAP_URL, webClient);

    expect(webClient.requestCount(SITEMAP_URL)).toBe(5);
  });

  it('should stop retrying at the first non-retryable error', async () => {
    const webClient = new MockWebClient({ [SITEMAP_URL]: [status(500, 'Internal Server Error'), status(403, 'Forbidden')] });

    const response = await getUrlRetryOnClientErrors(SITEMAP_URL, webClient);

    expect(response.kind === 'error' && response.statusCode).toBe(403);
    expect(webClient.requestCount(SITEMAP_URL)).toBe(2);
  });

  it('should reject a retry count below one', async () => {
    await expect(getUrlRetryOnClientErrors(SITEMAP_URL, new MockWebClient(), 0)).rejects.toThrow(RangeError);
  });
});
