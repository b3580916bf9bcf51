import { gunzipSync } from 'node:zlib';
import { GunzipError, toError } from '@/errors/sitemap-errors';
import type { WebClientSuccessResponse } from '@/web-client/types';
import { createLogger } from './logger';
import { urlPath } from './url';

const log = createLogger('content');

const GZIP_MAGIC = [0x1f, 0x8b] as const;

/** Cap on a sitemap body, both as fetched and once inflated. */
export const MAX_SITEMAP_SIZE = 100 * 1024 * 1024;

export function hasGzipMagic(data: Uint8Array): boolean {
  return data.length >= 2 && data[0] === GZIP_MAGIC[0] && data[1] === GZIP_MAGIC[1];
}

/** Whether the URL suffix or the content type says the body is gzipped. */
export function isGzipIndicated(url: string, contentType: string | undefined): boolean {
  return urlPath(url).endsWith('.gz') || (contentType ?? '').toLowerCase().includes('gzip');
}

/** @throws GunzipError when the body is corrupt or inflates past `maxOutputLength` bytes */
export function gunzip(url: string, data: Buffer, maxOutputLength: number = MAX_SITEMAP_SIZE): Buffer {
  try {
    return gunzipSync(data, { maxOutputLength });
  } catch (error) {
    throw new GunzipError(url, toError(error));
  }
}

const decoder = new TextDecoder('utf-8');

/** UTF-8 text with a leading byte order mark removed; invalid sequences become U+FFFD. */
export function decodeText(data: Uint8Array): string {
  return decoder.decode(data);
}

/**
 * Body of a response as text, gunzipped when it starts with the gzip magic bytes.
 * A `.gz` URL or gzip content type alone is not enough: transports inflate
 * `Content-Encoding: gzip` themselves, which leaves such URLs with plain bodies.
 *
 * @throws GunzipError when a gzip body cannot be inflated within `maxOutputLength` bytes
 */
export function ungzippedResponseContent(
  url: string,
  response: WebClientSuccessResponse,
  maxOutputLength: number = MAX_SITEMAP_SIZE
): string {
  const data = response.rawData();

  if (hasGzipMagic(data)) {
    if (!isGzipIndicated(url, response.header('content-type'))) {
      log.debug(`Response from ${url} is gzipped without saying so`);
    }
    return decodeText(gunzip(url, data, maxOutputLength));
  }

  return decodeText(data);
}

/**
 * Parses W3C datetime (ISO 8601) and RFC 2822 dates, as found in sitemaps and
 * feeds. Returns undefined for anything the runtime cannot read.
 */
export function parseDate(value: string | undefined): Date | undefined {
  if (!value) {
    return undefined;
  }

  const date = new Date(value.trim());
  return Number.isNaN(date.getTime()) ? undefined : date;
}
