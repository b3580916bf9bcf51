import type { ReadableStream } from 'node:stream/web';
import { Agent, ProxyAgent, fetch, type Dispatcher } from 'undici';
import { createLogger } from '@/utils/logger';
import { BaseWebClient, BufferedSuccessResponse, statusMessageFor } from './base-client';
import { classifyTransportError } from './errors';
import {
  USER_AGENT,
  createStatusErrorResponse,
  isSuccessStatus,
  type WebClientOptions,
  type WebClientResponse,
} from './types';

const log = createLogger('undici-client');

const ERROR_BODY_PREVIEW_LENGTH = 1024;

export interface UndiciWebClientOptions extends WebClientOptions {
  /** Verify TLS certificates (default true). */
  verify?: boolean;
}

/** Reads a fetch body, cancelling the stream once `limit` bytes have been collected. */
export async function readWebStream(
  body: ReadableStream<Uint8Array> | null,
  limit?: number
): Promise<Buffer> {
  if (body === null) {
    return Buffer.alloc(0);
  }

  const reader = body.getReader();
  const chunks: Buffer[] = [];
  let length = 0;

  for (;;) {
    const { done, value } = await reader.read();
    if (done) {
      break;
    }

    const buffer = Buffer.from(value);
    if (limit !== undefined && length + buffer.length >= limit) {
      chunks.push(buffer.subarray(0, limit - length));
      length = limit;
      await reader.cancel();
      break;
    }

    chunks.push(buffer);
    length += buffer.length;
  }

  return Buffer.concat(chunks, length);
}

/** Web client on undici's `fetch`, with a `ProxyAgent` dispatcher when a proxy is set. */
export class UndiciWebClient extends BaseWebClient {
  private readonly verify: boolean;
  private dispatcher: Dispatcher | undefined;
  private readonly staleDispatchers: Dispatcher[] = [];

  constructor(options: UndiciWebClientOptions = {}) {
    super(options);
    this.verify = options.verify ?? true;
  }

  private getDispatcher(): Dispatcher {
    if (this.dispatcher === undefined) {
      this.dispatcher = this.proxyUrl
        ? new ProxyAgent({ uri: this.proxyUrl, requestTls: { rejectUnauthorized: this.verify } })
        : new Agent({ connect: { rejectUnauthorized: this.verify } });
    }
    return this.dispatcher;
  }

  protected onProxyChange(): void {
    if (this.dispatcher !== undefined) {
      this.staleDispatchers.push(this.dispatcher);
      this.dispatcher = undefined;
    }
  }

  protected async performGet(url: string): Promise<WebClientResponse> {
    try {
      const response = await fetch(url, {
        dispatcher: this.getDispatcher(),
        redirect: 'follow',
        headers: {
          'User-Agent': USER_AGENT,
          Accept: 'application/xml,text/xml,application/rss+xml,application/atom+xml,text/plain,*/*',
        },
        signal:
          this.timeoutSeconds !== undefined ? AbortSignal.timeout(this.timeoutSeconds * 1000) : undefined,
      });

      const statusCode = response.status;
      const statusMessage = statusMessageFor(statusCode, response.statusText);

      if (!isSuccessStatus(statusCode)) {
        const preview = await readWebStream(response.body, ERROR_BODY_PREVIEW_LENGTH);
        log.debug(`Response content: ${preview.toString('utf8')}`);
        return createStatusErrorResponse(statusCode, statusMessage);
      }

      const data = await readWebStream(response.body, this.maxResponseDataLength);
      const headers = new Map<string, string>();
      response.headers.forEach((value, name) => headers.set(name.toLowerCase(), value));

      return new BufferedSuccessResponse(statusCode, statusMessage, response.url || url, headers, data);
    } catch (error) {
      return classifyTransportError(error);
    }
  }

  async close(): Promise<void> {
    const dispatchers = [...this.staleDispatchers];
    if (this.dispatcher !== undefined) {
      dispatchers.push(this.dispatcher);
    }
    this.dispatcher = undefined;
    this.staleDispatchers.length = 0;

    await Promise.all(dispatchers.map((dispatcher) => dispatcher.close()));
  }
}
