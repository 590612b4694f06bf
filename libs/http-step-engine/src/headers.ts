import type { HttpHeaders } from './types';

/**
 * Parses a blob of `Name: value` lines, as copied from browser dev tools, into
 * a header record.
 *
 * Each line is split at its first colon, so values may contain colons
 * (`Referer:https://example.com`). Empty lines, lines without a colon and lines
 * with an empty name are skipped. Name and value are trimmed; a later line
 * replaces an earlier one with the same name, compared case-insensitively.
 *
 * @example
 * const headers = parseHeaders(`
 *   Accept: application/json
 *   X-Requested-With: XMLHttpRequest
 * `);
 */
export function parseHeaders(text = ''): HttpHeaders {
  const headers: HttpHeaders = {};

  for (const line of text.split(/\r?\n/)) {
    const separator = line.indexOf(':');
    if (line.length === 0 || separator === -1) {
      continue;
    }

    const name = line.slice(0, separator).trim();
    const value = line.slice(separator + 1).trim();
    if (!name) {
      continue;
    }

    setHeader(headers, name, value);
  }

  return headers;
}

/** Sets a header, replacing any existing entry whose name matches case-insensitively. */
export function setHeader(headers: HttpHeaders, name: string, value: string): void {
  const existing = findHeaderName(headers, name);
  if (existing !== undefined && existing !== name) {
    delete headers[existing];
  }
  headers[name] = value;
}

export function findHeaderName(headers: HttpHeaders, name: string): string | undefined {
  const lower = name.toLowerCase();
  return Object.keys(headers).find((key) => key.toLowerCase() === lower);
}

export function hasHeader(headers: HttpHeaders, name: string): boolean {
  return findHeaderName(headers, name) !== undefined;
}

export function getHeader(headers: HttpHeaders, name: string): string | undefined {
  const key = findHeaderName(headers, name);
  return key === undefined ? undefined : headers[key];
}
