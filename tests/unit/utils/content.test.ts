import { describe, it, expect, vi } from 'vitest';
import { gzipSync } from 'node:zlib';
import { GunzipError } from '@/errors/sitemap-errors';
import {
  decodeText,
  hasGzipMagic,
  isGzipIndicated,
  parseDate,
  ungzippedResponseContent,
} from '@/utils/content';
import { ok } from '../../fixtures/mock-web-client';

describe('content helpers', () => {
  it('should detect the gzip magic bytes', () => {
    expect(hasGzipMagic(gzipSync(Buffer.from('x')))).toBe(true);
    expect(hasGzipMagic(Buffer.from('<urlset/>'))).toBe(false);
    expect(hasGzipMagic(Buffer.from([0x1f]))).toBe(false);
  });

  it('should read gzip hints from the URL and content type', () => {
    expect(isGzipIndicated('https://example.com/sitemap.xml.gz', undefined)).toBe(true);
    expect(isGzipIndicated('https://example.com/sitemap.xml', 'application/x-gzip')).toBe(true);
    expect(isGzipIndicated('https://example.com/sitemap.xml', 'text/xml')).toBe(false);
  });

  it('should strip a leading byte order mark', () => {
    expect(decodeText(Buffer.from('\uFEFF<urlset/>', 'utf8'))).toBe('<urlset/>');
  });

  it('should inflate gzip bodies and pass plain bodies through', () => {
    const url = 'https://example.com/sitemap.xml.gz';

    expect(ungzippedResponseContent(url, ok(gzipSync(Buffer.from('inflated'))))).toBe('inflated');
    expect(ungzippedResponseContent(url, ok('already plain'))).toBe('already plain');
  });

  it('should note gzip bodies that were not announced', () => {
    ungzippedResponseContent('https://example.com/sitemap.xml', ok(gzipSync(Buffer.from('x'))));

    expect(vi.mocked(console.error)).toHaveBeenCalledWith(
      expect.stringContaining('Response from https://example.com/sitemap.xml is gzipped without saying so')
    );
  });

  it('should throw a GunzipError for a corrupt gzip body', () => {
    expect(() => ungzippedResponseContent('https://example.com/s.xml.gz', ok(Buffer.from([0x1f, 0x8b, 0x08, 0x00])))).toThrow(
      GunzipError
    );
  });

  it('should refuse to inflate a body past the output limit', () => {
    const body = ok(gzipSync(Buffer.alloc(4096, 'a')));

    expect(() => ungzippedResponseContent('https://example.com/big.xml.gz', body, 1024)).toThrow(GunzipError);
    expect(ungzippedResponseContent('https://example.com/big.xml.gz', body, 8192)).toBe('a'.repeat(4096));
  });

  it('should parse W3C and RFC 2822 dates', () => {
    expect(parseDate('2024-01-15')?.toISOString()).toBe('2024-01-15T00:00:00.000Z');
    expect(parseDate('2024-01-15T10:30:00+02:00')?.toISOString()).toBe('2024-01-15T08:30:00.000Z');
    expect(parseDate('Mon, 15 Jan 2024 10:00:00 GMT')?.toISOString()).toBe('2024-01-15T10:00:00.000Z');
    expect(parseDate('not a date')).toBeUndefined();
    expect(parseDate(undefined)).toBeUndefined();
  });
});
