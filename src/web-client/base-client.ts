import { STATUS_CODES } from 'node:http';
import { ValidationError } from '@/errors/sitemap-errors';
import { isHttpUrl } from '@/utils/url';
import type {
  WebClient,
  WebClientOptions,
  WebClientResponse,
  WebClientSuccessResponse,
} from './types';

/** Request timeout in seconds. */
export const DEFAULT_TIMEOUT_SECONDS = 60;

/**
 * Shared configuration and inter-request throttling for the concrete transports.
 * Subclasses implement `performGet`; `get` applies the configured wait first.
 * Concurrent `get` calls queue for their waits, so request starts stay at least
 * one wait apart.
 */
export abstract class BaseWebClient implements WebClient {
  protected timeoutSeconds: number | undefined;
  protected proxyUrl: string | undefined;
  protected maxResponseDataLength: number | undefined;

  private readonly wait: number;
  private readonly randomWait: boolean;
  private isFirstRequest = true;
  /** Settles when the last queued wait is over; each wait starts after the one before. */
  private waitQueue: Promise<void> = Promise.resolve();

  constructor(options: WebClientOptions = {}) {
    this.wait = options.wait ?? 0;
    this.randomWait = options.randomWait ?? false;
    this.timeoutSeconds = options.timeout ?? DEFAULT_TIMEOUT_SECONDS;
    this.proxyUrl = validateProxy(options.proxy);
    this.maxResponseDataLength = options.maxResponseDataLength;
  }

  setTimeout(timeoutSeconds: number | undefined): void {
    this.timeoutSeconds = timeoutSeconds;
  }

  setProxy(proxyUrl: string | undefined): void {
    this.proxyUrl = validateProxy(proxyUrl);
    this.onProxyChange();
  }

  setMaxResponseDataLength(maxResponseDataLength: number | undefined): void {
    this.maxResponseDataLength = maxResponseDataLength;
  }

  async get(url: string): Promise<WebClientResponse> {
    const turn = this.waitQueue.then(() => this.waitIfNeeded());
    this.waitQueue = turn;
    await turn;
    return this.performGet(url);
  }

  abstract close(): Promise<void>;

  protected abstract performGet(url: string): Promise<WebClientResponse>;

  /** Hook for transports that bind the proxy into a long-lived agent. */
  protected onProxyChange(): void {}

  /** Milliseconds to wait before the next request, or 0 when no wait applies. */
  protected nextWaitMs(): number {
    if (this.wait <= 0) {
      return 0;
    }

    if (this.isFirstRequest) {
      this.isFirstRequest = false;
      return 0;
    }

    const factor = this.randomWait ? 0.5 + Math.random() : 1;
    return this.wait * factor * 1000;
  }

  private async waitIfNeeded(): Promise<void> {
    const waitMs = this.nextWaitMs();
    if (waitMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, waitMs));
    }
  }
}

function validateProxy(proxyUrl: string | undefined): string | undefined {
  if (proxyUrl !== undefined && !isHttpUrl(proxyUrl)) {
    throw new ValidationError(proxyUrl, `Proxy ${proxyUrl} is not a HTTP(s) URL.`);
  }
  return proxyUrl;
}

export function statusMessageFor(statusCode: number, reported?: string): string {
  return reported || STATUS_CODES[statusCode] || '';
}

/** Success response over a fully read (and possibly truncated) body. */
export class BufferedSuccessResponse implements WebClientSuccessResponse {
  readonly kind = 'success';

  constructor(
    readonly statusCode: number,
    readonly statusMessage: string,
    readonly url: string,
    private readonly headers: ReadonlyMap<string, string>,
    private readonly data: Buffer
  ) {}

  header(caseInsensitiveName: string): string | undefined {
    return this.headers.get(caseInsensitiveName.toLowerCase());
  }

  rawData(): Buffer {
    return this.data;
  }
}
