/**
 * Registry response headers.
 */

import { AuthChallenge, ByteRange, PageLink, ResponseHeaders } from '../types';
import { isValidDigest } from '../utils/validation';

const LINK_PATTERN = /<([^>]*)>(.*)/;
const RANGE_PATTERN = /^(?:bytes[= ])?(\d+)-(\d+)/;
const CHALLENGE_PARAM_PATTERN = /([A-Za-z0-9_.-]+)=(?:"((?:[^"\\]|\\.)*)"|([^,\s]*))/g;

// Only used to resolve relative Link targets, never requested
const LINK_BASE = 'http://registry.invalid';

/**
 * Media type of a Content-Type value, without parameters
 */
export function baseMediaType(contentType: string | undefined): string | undefined {
  const mediaType = contentType?.split(';')[0].trim().toLowerCase();
  return mediaType || undefined;
}

/**
 * Parse a `Link` header, preferring the `rel="next"` entry.
 *
 * `</v2/_catalog?n=2&last=b>; rel="next"` gives `{ url, n: 2, last: 'b' }`.
 */
export function parseLinkHeader(value: string | undefined): PageLink | undefined {
  if (!value) {
    return undefined;
  }

  const entries = value
    .split(/,(?=\s*<)/)
    .map((part) => LINK_PATTERN.exec(part.trim()))
    .filter((match): match is RegExpExecArray => match !== null);
  const next = entries.find((match) => /rel="?next"?/i.test(match[2])) ?? entries[0];
  if (!next) {
    return undefined;
  }

  const url = next[1];
  let query: URLSearchParams;
  try {
    query = new URL(url, LINK_BASE).searchParams;
  } catch {
    return { url };
  }

  const n = Number.parseInt(query.get('n') ?? '', 10);
  const last = query.get('last');
  return {
    url,
    ...(Number.isInteger(n) && n > 0 ? { n } : {}),
    ...(last !== null ? { last } : {}),
  };
}

/**
 * Parse `bytes=0-1023`, `0-1023` or `bytes 0-1023/4096`
 */
export function parseRange(value: string | undefined): ByteRange | undefined {
  const match = value ? RANGE_PATTERN.exec(value.trim()) : null;
  if (!match) {
    return undefined;
  }
  return { unit: 'bytes', start: Number(match[1]), end: Number(match[2]) };
}

/**
 * Parse a `WWW-Authenticate` challenge such as
 * `Bearer realm="https://auth.example.com/token",service="registry.example.com"`
 */
export function parseAuthChallenge(value: string | undefined): AuthChallenge | undefined {
  const trimmed = value?.trim();
  if (!trimmed) {
    return undefined;
  }

  const space = trimmed.indexOf(' ');
  const scheme = space === -1 ? trimmed : trimmed.slice(0, space);
  const params: Record<string, string> = {};
  if (space !== -1) {
    for (const match of trimmed.slice(space + 1).matchAll(CHALLENGE_PARAM_PATTERN)) {
      params[match[1].toLowerCase()] = match[2] !== undefined ? match[2].replace(/\\(.)/g, '$1') : match[3];
    }
  }
  return { scheme, params };
}

function headerMap(raw: object): Map<string, string> {
  const map = new Map<string, string>();
  for (const [name, value] of Object.entries(raw)) {
    if (value === undefined || value === null || typeof value === 'function') {
      continue;
    }
    map.set(name.toLowerCase(), Array.isArray(value) ? value.join(', ') : String(value));
  }
  return map;
}

/**
 * Pick the registry headers out of a raw header object. Header names are
 * matched case-insensitively; unparseable values are left out.
 */
export function parseResponseHeaders(raw: object): ResponseHeaders {
  const headers = headerMap(raw);
  const get = (name: string): string | undefined => headers.get(name) || undefined;

  const contentLength = Number.parseInt(get('content-length') ?? '', 10);
  const digest = get('docker-content-digest');
  const dateValue = get('date');
  const date = dateValue ? new Date(dateValue) : undefined;

  return {
    contentType: get('content-type'),
    contentLength: Number.isInteger(contentLength) && contentLength >= 0 ? contentLength : undefined,
    dockerContentDigest: digest && isValidDigest(digest) ? digest : undefined,
    dockerDistributionApiVersion: get('docker-distribution-api-version'),
    dockerUploadUuid: get('docker-upload-uuid'),
    etag: get('etag'),
    date: date && !Number.isNaN(date.getTime()) ? date : undefined,
    location: get('location'),
    range: parseRange(get('range')),
    contentRange: parseRange(get('content-range')),
    acceptRanges: get('accept-ranges'),
    link: parseLinkHeader(get('link')),
    wwwAuthenticate: parseAuthChallenge(get('www-authenticate')),
  };
}
