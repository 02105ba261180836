/**
 * URL scope rules for the documentation crawler
 */

import { posix } from 'path';

const HTML_EXTENSION = '.html';
const INDEX_FILE = 'index.html';

function parseUrl(url: string, base?: string): URL | null {
  try {
    return new URL(url, base);
  } catch {
    return null;
  }
}

/**
 * Decide whether a URL belongs to the mirrored documentation tree.
 *
 * A URL is in scope when it is on the same host as `baseUrl`, its path
 * starts with `pathPrefix`, and the path ends in `.html` or `/`. Paths
 * that climb out of the mirror once decoded are out of scope. Relative
 * URLs are taken as relative to `baseUrl`.
 */
export function shouldDownload(url: string, baseUrl: string, pathPrefix: string): boolean {
  const base = parseUrl(baseUrl);
  const parsed = parseUrl(url, baseUrl);
  if (!base || !parsed) {
    return false;
  }

  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    return false;
  }

  if (parsed.host !== base.host) {
    return false;
  }

  if (!parsed.pathname.startsWith(pathPrefix) || escapesMirror(parsed.pathname)) {
    return false;
  }

  return parsed.pathname.endsWith(HTML_EXTENSION) || parsed.pathname.endsWith('/');
}

/**
 * Drop the fragment of a URL
 */
export function stripFragment(url: string): string {
  const hashIndex = url.indexOf('#');
  return hashIndex === -1 ? url : url.slice(0, hashIndex);
}

/**
 * Visited-set key: fragment and trailing slashes removed, so that
 * `docs/`, `docs` and `docs/#top` are one resource
 */
export function normalizeUrlKey(url: string): string {
  return stripFragment(url).replace(/\/+$/, '');
}

/**
 * Resolve an href found on `pageUrl` to an absolute URL without fragment
 */
export function resolveLink(href: string, pageUrl: string): string | null {
  const resolved = parseUrl(href, pageUrl);
  if (!resolved) {
    return null;
  }
  resolved.hash = '';
  return resolved.toString();
}

function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

function climbsAboveRoot(relative: string): boolean {
  const normalized = posix.normalize(relative);
  return normalized === '..' || normalized.startsWith('../');
}

/**
 * True when a URL path, as written or once percent-decoded, climbs above
 * the host root (`/docs/..%2F..%2Fx.html`)
 */
export function escapesMirror(pathname: string): boolean {
  const relative = pathname.replace(/^\/+/, '');
  return climbsAboveRoot(relative) || climbsAboveRoot(safeDecode(relative));
}

/**
 * Path of a URL inside the mirror, relative to the host segment. The
 * path is kept as it appears in the URL, percent-encoding included, so
 * that hrefs in the saved pages name the saved files. Directory URLs map
 * to their `index.html`.
 */
export function urlToMirrorPath(url: string): string {
  const parsed = parseUrl(url);
  if (!parsed) {
    throw new Error(`Invalid URL: ${url}`);
  }
  if (escapesMirror(parsed.pathname)) {
    throw new Error(`URL path escapes the mirror: ${url}`);
  }

  let relative = parsed.pathname.replace(/^\/+/, '');
  if (relative === '' || relative.endsWith('/')) {
    relative += INDEX_FILE;
  }
  return posix.normalize(relative);
}
