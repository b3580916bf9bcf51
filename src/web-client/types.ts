/** Status codes that designate transient server conditions worth retrying. */
export const RETRYABLE_HTTP_STATUS_CODES: ReadonlySet<number> = new Set([
  408, // Request Timeout
  429, // Too Many Requests
  500, // Internal Server Error
  502, // Bad Gateway
  503, // Service Unavailable
  504, // Gateway Timeout
]);

export const USER_AGENT = `sitemap-tree/${__PACKAGE_VERSION__}`;

export interface WebClientSuccessResponse {
  readonly kind: 'success';
  readonly statusCode: number;
  readonly statusMessage: string;
  /** Final URL after redirects. */
  readonly url: string;
  header(caseInsensitiveName: string): string | undefined;
  /** Response body, truncated to the client's maximum response length when one is set. */
  rawData(): Buffer;
}

export interface WebClientErrorResponse {
  readonly kind: 'error';
  readonly message: string;
  readonly retryable: boolean;
  /** Present when the server answered with a non-2xx status. */
  readonly statusCode?: number;
}

export type WebClientResponse = WebClientSuccessResponse | WebClientErrorResponse;

/**
 * The narrow capability the fetcher needs from an HTTP transport. Implementations
 * never throw from `get`; transport failures come back as error responses.
 */
export interface WebClient {
  get(url: string): Promise<WebClientResponse>;
  setTimeout(timeoutSeconds: number | undefined): void;
  setProxy(proxyUrl: string | undefined): void;
  setMaxResponseDataLength(maxResponseDataLength: number | undefined): void;
  close(): Promise<void>;
}

export interface WebClientOptions {
  /** Seconds to wait between requests; the first request is never delayed. */
  wait?: number;
  /** Multiply each wait by a random factor between 0.5 and 1.5. */
  randomWait?: boolean;
  /** Request timeout in seconds. */
  timeout?: number;
  proxy?: string;
  maxResponseDataLength?: number;
}

export function createErrorResponse(
  message: string,
  retryable: boolean,
  statusCode?: number
): WebClientErrorResponse {
  return statusCode === undefined
    ? { kind: 'error', message, retryable }
    : { kind: 'error', message, retryable, statusCode };
}

/** Error response for an HTTP status outside 2xx, classified by `RETRYABLE_HTTP_STATUS_CODES`. */
export function createStatusErrorResponse(
  statusCode: number,
  statusMessage: string
): WebClientErrorResponse {
  return createErrorResponse(
    `${statusCode} ${statusMessage}`.trim(),
    RETRYABLE_HTTP_STATUS_CODES.has(statusCode),
    statusCode
  );
}

export function isSuccessStatus(statusCode: number): boolean {
  return statusCode >= 200 && statusCode < 300;
}
