/**
 * Canonical request construction for Signature V4
 */

import { SigningError } from '../errors/index.js';

const encoder = new TextEncoder();

function isUnreserved(code: number): boolean {
  return (
    (code >= 0x41 && code <= 0x5a) || // A-Z
    (code >= 0x61 && code <= 0x7a) || // a-z
    (code >= 0x30 && code <= 0x39) || // 0-9
    code === 0x2d || // -
    code === 0x5f || // _
    code === 0x2e || // .
    code === 0x7e // ~
  );
}

/**
 * URI encode following RFC 3986: everything except A-Z a-z 0-9 - _ . ~
 * is percent-encoded as UTF-8 with uppercase hex.
 */
export function uriEncode(str: string, encodeSlash = true): string {
  let encoded = '';
  for (const char of str) {
    const code = char.charCodeAt(0);
    if (char.length === 1 && isUnreserved(code)) {
      encoded += char;
    } else if (char === '/' && !encodeSlash) {
      encoded += '/';
    } else {
      for (const byte of encoder.encode(char)) {
        encoded += '%' + byte.toString(16).toUpperCase().padStart(2, '0');
      }
    }
  }
  return encoded;
}

/**
 * URI encode an object key, keeping its slashes
 */
export function uriEncodePath(path: string): string {
  return uriEncode(path, false);
}

function decodeComponent(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    throw SigningError.malformed(`invalid percent-encoding in "${value}"`);
  }
}

/**
 * Canonical URI from an already encoded request path.
 *
 * Each segment is decoded once and re-encoded so the result carries the
 * strict RFC 3986 form whatever encoding the URL parser left in place.
 * Empty segments are kept.
 */
export function getCanonicalUri(pathname: string): string {
  if (!pathname) {
    return '/';
  }

  const normalized = pathname.startsWith('/') ? pathname : '/' + pathname;
  return normalized
    .split('/')
    .map((segment) => uriEncode(decodeComponent(segment)))
    .join('/');
}

/**
 * Canonical query string from a raw query (without the leading `?`).
 * Keys and values are decoded once, RFC 3986 encoded, and sorted by key
 * then value.
 */
export function getCanonicalQueryString(query: string): string {
  if (!query) {
    return '';
  }

  const params: Array<[string, string]> = [];

  for (const pair of query.split('&')) {
    if (!pair) continue;

    const idx = pair.indexOf('=');
    const key = idx === -1 ? pair : pair.substring(0, idx);
    const value = idx === -1 ? '' : pair.substring(idx + 1);
    params.push([uriEncode(decodeComponent(key)), uriEncode(decodeComponent(value))]);
  }

  params.sort((a, b) => {
    if (a[0] < b[0]) return -1;
    if (a[0] > b[0]) return 1;
    if (a[1] < b[1]) return -1;
    if (a[1] > b[1]) return 1;
    return 0;
  });

  return params.map(([key, value]) => `${key}=${value}`).join('&');
}

/**
 * Lowercases header names, trims values and collapses inner whitespace.
 * Repeated names (differing only by case) are joined with commas.
 */
export function normalizeHeaders(headers: Record<string, string>): Map<string, string> {
  const normalized = new Map<string, string>();

  for (const [name, value] of Object.entries(headers)) {
    const lower = name.toLowerCase();
    const trimmed = value.trim().replace(/\s+/g, ' ');
    const existing = normalized.get(lower);
    normalized.set(lower, existing === undefined ? trimmed : `${existing},${trimmed}`);
  }

  return new Map([...normalized.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
}

/**
 * Canonical headers block, one `name:value` line per header, newline
 * terminated
 */
export function getCanonicalHeaders(headers: Record<string, string>): string {
  const lines: string[] = [];
  for (const [name, value] of normalizeHeaders(headers)) {
    lines.push(`${name}:${value}`);
  }
  return lines.join('\n') + '\n';
}

/**
 * Semicolon-separated list of lowercase header names
 */
export function getSignedHeaders(headers: Record<string, string>): string {
  return [...normalizeHeaders(headers).keys()].join(';');
}

/**
 * Create canonical request
 * Format:
 * HTTP_METHOD\n
 * CANONICAL_URI\n
 * CANONICAL_QUERY_STRING\n
 * CANONICAL_HEADERS\n
 * SIGNED_HEADERS\n
 * PAYLOAD_HASH
 */
export function createCanonicalRequest(
  method: string,
  canonicalUri: string,
  canonicalQuery: string,
  headers: Record<string, string>,
  payloadHash: string
): string {
  return [
    method.toUpperCase(),
    canonicalUri,
    canonicalQuery,
    getCanonicalHeaders(headers),
    getSignedHeaders(headers),
    payloadHash,
  ].join('\n');
}
