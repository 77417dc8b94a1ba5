/**
 * Header maps and authorization header values.
 * @module headers
 */

/**
 * Header name to value. Names are compared case-insensitively.
 */
export type HeaderMap = Record<string, string>;

/**
 * Field name to value for `application/x-www-form-urlencoded` bodies.
 */
export type FormFields = Record<string, string>;

/**
 * Canonical authorization header key.
 */
export const AUTHORIZATION = 'authorization';

/**
 * Generates a token authorization header value.
 */
export function bearerAuth(token: string): string {
  return `Bearer ${token}`;
}

/**
 * Generates a basic authorization header value.
 */
export function basicAuth(user: string, password: string): string {
  const encoded = Buffer.from(`${user}:${password}`, 'utf8').toString('base64');
  return `Basic ${encoded}`;
}

/**
 * Lower-cases every header name. When two names differ only in case the
 * later entry wins.
 */
export function normalizeHeaders(headers: HeaderMap): HeaderMap {
  const normalized: HeaderMap = {};
  for (const [name, value] of Object.entries(headers)) {
    normalized[name.toLowerCase()] = value;
  }
  return normalized;
}

/**
 * Applies `overrides` on top of `defaults`. Each override replaces the
 * default of the same name regardless of case; defaults without an override
 * are kept. The result has lower-case names.
 */
export function mergeHeaders(defaults: HeaderMap, overrides?: HeaderMap): HeaderMap {
  if (!overrides) {
    return normalizeHeaders(defaults);
  }
  return { ...normalizeHeaders(defaults), ...normalizeHeaders(overrides) };
}
