import { ValidationError, toError } from '@/errors/sitemap-errors';

/** True for absolute `http:` or `https:` URLs with a host. */
export function isHttpUrl(value: string | undefined | null): value is string {
  if (!value) {
    return false;
  }

  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    return false;
  }

  return (parsed.protocol === 'http:' || parsed.protocol === 'https:') && parsed.hostname !== '';
}

export function assertHttpUrl(value: string): void {
  if (!isHttpUrl(value)) {
    throw new ValidationError(value, `URL ${value} is not a HTTP(s) URL.`);
  }
}

/**
 * Strips a URL down to its homepage (scheme and host), e.g.
 * `https://www.example.com/page.html?q=1` becomes `https://www.example.com/`.
 */
export function stripUrlToHomepage(url: string): string {
  assertHttpUrl(url);
  return `${new URL(url).origin}/`;
}

export function withTrailingSlash(url: string): string {
  return url.endsWith('/') ? url : `${url}/`;
}

/**
 * Resolves a known sitemap path against a homepage base URL. A leading slash
 * makes the path relative to the origin.
 *
 * @throws ValidationError when the result is not a URL at all
 */
export function resolveKnownPath(baseUrl: string, path: string): string {
  try {
    return new URL(path, withTrailingSlash(baseUrl)).toString();
  } catch (error) {
    throw new ValidationError(
      path,
      `Sitemap path ${path} does not resolve against ${baseUrl}: ${toError(error).message}`
    );
  }
}

/** Lowercased, percent-decoded path of a URL, or '' when it does not parse. */
export function urlPath(url: string): string {
  try {
    const { pathname } = new URL(url);
    try {
      return decodeURIComponent(pathname).toLowerCase();
    } catch {
      return pathname.toLowerCase();
    }
  } catch {
    return '';
  }
}
