/**
 * Request preparation shared by both backends: URL validation, header
 * defaults and payload encoding.
 */

import { err, ok } from 'neverthrow';
import { Headers } from 'undici';
import type { TransportConfig } from '../config/index.js';
import { SerializationError, type ClientResult } from '../errors/index.js';
import { mergeHeaders, type HeaderMap } from '../headers/index.js';
import type { HttpMethod, JsonValue, PreparedRequest, RequestPayload } from './types.js';

const JSON_CONTENT_TYPE = 'application/json';
const FORM_CONTENT_TYPE = 'application/x-www-form-urlencoded';

/**
 * Parses an absolute `http:` or `https:` URL.
 */
export function parseTargetUrl(url: string): ClientResult<URL> {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch (error) {
    return err(new SerializationError(`Invalid URL '${url}'`, error));
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    return err(new SerializationError(`Unsupported URL scheme '${parsed.protocol}' in '${url}'`));
  }
  return ok(parsed);
}

function isJsonObject(value: JsonValue): value is { [key: string]: JsonValue } {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toQueryValue(key: string, value: JsonValue): ClientResult<string | undefined> {
  if (value === null) {
    return ok(undefined);
  }
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return ok(String(value));
  }
  if (Array.isArray(value)) {
    const items: string[] = [];
    for (const item of value) {
      if (typeof item === 'object' && item !== null) {
        return err(new SerializationError(`Query parameter '${key}' contains a nested value`));
      }
      if (item !== null) {
        items.push(String(item));
      }
    }
    return ok(items.join(','));
  }
  return err(new SerializationError(`Query parameter '${key}' must not be an object`));
}

/**
 * Appends GET parameters to the URL's query string. `null` values are
 * skipped, arrays are joined with commas.
 */
export function applyQueryParams(url: URL, params: JsonValue): ClientResult<string> {
  if (params === null) {
    return ok(url.toString());
  }
  if (!isJsonObject(params)) {
    return err(new SerializationError('Query parameters must be an object'));
  }

  for (const [key, value] of Object.entries(params)) {
    const encoded = toQueryValue(key, value);
    if (encoded.isErr()) {
      return err(encoded.error);
    }
    if (encoded.value !== undefined) {
      url.searchParams.append(key, encoded.value);
    }
  }
  return ok(url.toString());
}

/**
 * Encodes a JSON body.
 */
export function encodeJsonBody(value: JsonValue): ClientResult<string> {
  try {
    return ok(JSON.stringify(value));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return err(new SerializationError(`Payload is not serializable to JSON: ${reason}`, error));
  }
}

/**
 * Encodes `key1=value1&key2=value2`.
 */
export function encodeFormBody(fields: Record<string, string>): string {
  return new URLSearchParams(fields).toString();
}

/**
 * Headers applied to every request before per-call overrides.
 */
export function defaultHeaders(config: TransportConfig, contentType?: string): HeaderMap {
  const headers: HeaderMap = {
    accept: JSON_CONTENT_TYPE,
    'user-agent': config.userAgent,
    ...config.defaultHeaders,
  };
  if (contentType) {
    headers['content-type'] = contentType;
  }
  return headers;
}

/**
 * Merges defaults and call headers, rejecting any name or value that cannot
 * be sent on the wire.
 */
export function buildHeaders(
  config: TransportConfig,
  contentType: string | undefined,
  overrides: HeaderMap | undefined
): ClientResult<HeaderMap> {
  const headers = mergeHeaders(defaultHeaders(config, contentType), overrides);
  for (const [name, value] of Object.entries(headers)) {
    try {
      new Headers([[name, value]]);
    } catch (error) {
      return err(new SerializationError(`Invalid header '${name}'`, error));
    }
  }
  return ok(headers);
}

/**
 * Validates and encodes one operation into a {@link PreparedRequest}.
 * Nothing is sent when this fails.
 */
export function prepareRequest(
  config: TransportConfig,
  method: HttpMethod,
  url: string,
  headers: HeaderMap | undefined,
  payload: RequestPayload
): ClientResult<PreparedRequest> {
  const target = parseTargetUrl(url);
  if (target.isErr()) {
    return err(target.error);
  }

  switch (payload.kind) {
    case 'query': {
      const withQuery = applyQueryParams(target.value, payload.params);
      if (withQuery.isErr()) {
        return err(withQuery.error);
      }
      return buildHeaders(config, undefined, headers).map((merged) => ({
        method,
        url: withQuery.value,
        headers: merged,
      }));
    }

    case 'json': {
      const body = encodeJsonBody(payload.value);
      if (body.isErr()) {
        return err(body.error);
      }
      return buildHeaders(config, JSON_CONTENT_TYPE, headers).map((merged) => ({
        method,
        url: target.value.toString(),
        headers: merged,
        body: body.value,
      }));
    }

    case 'form':
      return buildHeaders(config, FORM_CONTENT_TYPE, headers).map((merged) => ({
        method,
        url: target.value.toString(),
        headers: merged,
        body: encodeFormBody(payload.fields),
      }));
  }
}
