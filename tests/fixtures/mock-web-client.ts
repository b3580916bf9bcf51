import { gzipSync } from 'node:zlib';
import { BufferedSuccessResponse } from '@/web-client/base-client';
import {
  createErrorResponse,
  createStatusErrorResponse,
  type WebClient,
  type WebClientResponse,
  type WebClientSuccessResponse,
} from '@/web-client/types';

export type MockResponse = WebClientResponse | (() => Promise<WebClientResponse>);

export function ok(body: string | Buffer, headers: Record<string, string> = {}): WebClientSuccessResponse {
  const headerMap = new Map(Object.entries(headers).map(([name, value]) => [name.toLowerCase(), value]));
  const data = typeof body === 'string' ? Buffer.from(body, 'utf8') : body;
  return new BufferedSuccessResponse(200, 'OK', 'https://example.com/', headerMap, data);
}

export function gzipped(body: string): WebClientResponse {
  return ok(gzipSync(Buffer.from(body, 'utf8')));
}

export function status(statusCode: number, statusMessage: string): WebClientResponse {
  return createStatusErrorResponse(statusCode, statusMessage);
}

export function notFound(): WebClientResponse {
  return status(404, 'Not Found');
}

export function timedOut(): WebClientResponse {
  return createErrorResponse('timeout of 60000ms exceeded', true);
}

/**
 * In-process WebClient answering from a URL table. A URL with several responses
 * returns them in turn and then keeps returning the last; unknown URLs are 404.
 */
export class MockWebClient implements WebClient {
  readonly requests: string[] = [];
  timeoutSeconds: number | undefined;
  proxyUrl: string | undefined;
  maxResponseDataLength: number | undefined;
  closed = false;

  private readonly routes = new Map<string, MockResponse[]>();

  constructor(routes: Record<string, MockResponse | MockResponse[]> = {}) {
    for (const [url, responses] of Object.entries(routes)) {
      this.routes.set(url, Array.isArray(responses) ? responses : [responses]);
    }
  }

  on(url: string, ...responses: MockResponse[]): this {
    this.routes.set(url, responses);
    return this;
  }

  requestCount(url: string): number {
    return this.requests.filter((requested) => requested === url).length;
  }

  async get(url: string): Promise<WebClientResponse> {
    this.requests.push(url);

    const [next, ...rest] = this.routes.get(url) ?? [];
    if (next === undefined) {
      return notFound();
    }
    if (rest.length > 0) {
      this.routes.set(url, rest);
    }
    return typeof next === 'function' ? next() : next;
  }

  setTimeout(timeoutSeconds: number | undefined): void {
    this.timeoutSeconds = timeoutSeconds;
  }

  setProxy(proxyUrl: string | undefined): void {
    this.proxyUrl = proxyUrl;
  }

  setMaxResponseDataLength(maxResponseDataLength: number | undefined): void {
    this.maxResponseDataLength = maxResponseDataLength;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

/** Serves responses after a delay and records how many were being served at once. */
export class InFlightCounter {
  current = 0;
  peak = 0;

  delayed(ms: number, response: WebClientResponse): MockResponse {
    return async () => {
      this.current++;
      this.peak = Math.max(this.peak, this.current);
      await new Promise((resolve) => setTimeout(resolve, ms));
      this.current--;
      return response;
    };
  }
}

export function urlset(...urls: string[]): string {
  const entries = urls.map((url) => `  <url><loc>${url}</loc></url>`).join('\n');
  return `<?xml version="1.0" encoding="UTF-8"?>
<urlset xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">
${entries}
</urlset>`;
}

export function sitemapIndex(...urls: string[]): string {
  const entries = urls.map((url) => `  <sitemap><loc>${url}</loc></sitemap>`).join('\n');
  return `<?xml version="1.0" encoding="UTF-8"?>
<sitemapindex xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">
${entries}
</sitemapindex>`;
}

export function robotsTxt(...sitemapUrls: string[]): string {
  return ['User-agent: *', 'Disallow: /private/', ...sitemapUrls.map((url) => `Sitemap: ${url}`)].join('\n');
}

/** Clients built by module mocks standing in for a transport class. */
export const createdClients: MockWebClient[] = [];
