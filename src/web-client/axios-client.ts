import axios, { type AxiosInstance, type AxiosProxyConfig, type AxiosResponse } from 'axios';
import { Agent as HttpAgent } from 'http';
import { Agent as HttpsAgent } from 'https';
import type { Readable } from 'node:stream';
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

const log = createLogger('axios-client');

/** How much of an error page is read for the debug log. */
const ERROR_BODY_PREVIEW_LENGTH = 1024;

export interface AxiosWebClientOptions extends WebClientOptions {
  /** Verify TLS certificates (default true). */
  verify?: boolean;
  maxRedirects?: number;
}

/**
 * Reads a body stream into memory, stopping (and destroying the stream) once
 * `limit` bytes have been collected.
 */
export async function readStream(stream: Readable, limit?: number): Promise<Buffer> {
  const chunks: Buffer[] = [];
  let length = 0;

  for await (const chunk of stream) {
    const buffer: Buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);

    if (limit !== undefined && length + buffer.length >= limit) {
      chunks.push(buffer.subarray(0, limit - length));
      length = limit;
      break;
    }

    chunks.push(buffer);
    length += buffer.length;
  }

  stream.destroy();
  return Buffer.concat(chunks, length);
}

export function toAxiosProxy(proxyUrl: string | undefined): AxiosProxyConfig | undefined {
  if (!proxyUrl) {
    return undefined;
  }

  const parsed = new URL(proxyUrl);
  const protocol = parsed.protocol.replace(/:$/, '');

  return {
    protocol,
    host: parsed.hostname,
    port: parsed.port ? Number(parsed.port) : protocol === 'https' ? 443 : 80,
    auth: parsed.username
      ? { username: decodeURIComponent(parsed.username), password: decodeURIComponent(parsed.password) }
      : undefined,
  };
}

function headerMap(headers: AxiosResponse['headers']): Map<string, string> {
  const map = new Map<string, string>();

  for (const [name, value] of Object.entries(headers)) {
    if (typeof value === 'string') {
      map.set(name.toLowerCase(), value);
    } else if (Array.isArray(value)) {
      map.set(name.toLowerCase(), value.join(', '));
    } else if (typeof value === 'number' || typeof value === 'boolean') {
      map.set(name.toLowerCase(), String(value));
    }
  }

  return map;
}

function finalUrl(response: AxiosResponse, requestedUrl: string): string {
  const responseUrl: unknown = response.request?.res?.responseUrl;
  return typeof responseUrl === 'string' && responseUrl !== '' ? responseUrl : requestedUrl;
}

/**
 * Default web client: axios over keep-alive agents, following redirects and
 * streaming bodies so the response length cap is enforced while reading.
 */
export class AxiosWebClient extends BaseWebClient {
  private readonly verify: boolean;
  private readonly maxRedirects: number;
  private httpAgent: HttpAgent | undefined;
  private httpsAgent: HttpsAgent | undefined;
  private instance: AxiosInstance | undefined;

  constructor(options: AxiosWebClientOptions = {}) {
    super(options);
    this.verify = options.verify ?? true;
    this.maxRedirects = options.maxRedirects ?? 5;
  }

  private getInstance(): AxiosInstance {
    if (this.instance === undefined) {
      this.httpAgent = new HttpAgent({ keepAlive: true, maxSockets: 50 });
      this.httpsAgent = new HttpsAgent({
        keepAlive: true,
        maxSockets: 50,
        rejectUnauthorized: this.verify,
      });
      this.instance = axios.create({
        httpAgent: this.httpAgent,
        httpsAgent: this.httpsAgent,
        maxRedirects: this.maxRedirects,
        validateStatus: () => true, // Don't throw on any status code
        headers: {
          'User-Agent': USER_AGENT,
          Accept: 'application/xml,text/xml,application/rss+xml,application/atom+xml,text/plain,*/*',
        },
      });
    }
    return this.instance;
  }

  protected async performGet(url: string): Promise<WebClientResponse> {
    try {
      const response = await this.getInstance().get<Readable>(url, {
        responseType: 'stream',
        timeout: this.timeoutSeconds !== undefined ? this.timeoutSeconds * 1000 : 0,
        proxy: toAxiosProxy(this.proxyUrl),
      });

      const statusCode = response.status;
      const statusMessage = statusMessageFor(statusCode, response.statusText);

      if (!isSuccessStatus(statusCode)) {
        const preview = await readStream(response.data, ERROR_BODY_PREVIEW_LENGTH);
        log.debug(`Response content: ${preview.toString('utf8')}`);
        return createStatusErrorResponse(statusCode, statusMessage);
      }

      const data = await readStream(response.data, this.maxResponseDataLength);

      return new BufferedSuccessResponse(
        statusCode,
        statusMessage,
        finalUrl(response, url),
        headerMap(response.headers),
        data
      );
    } catch (error) {
      return classifyTransportError(error);
    }
  }

  async close(): Promise<void> {
    this.httpAgent?.destroy();
    this.httpsAgent?.destroy();
    this.httpAgent = undefined;
    this.httpsAgent = undefined;
    this.instance = undefined;
  }
}
