/**
 * Transport contract shared by every network backend.
 *
 * The five operations are described once by {@link HttpTransport} and
 * instantiated for each I/O model: {@link AsyncHttpTransport} suspends the
 * caller on the event loop, {@link SyncHttpTransport} blocks the calling
 * thread. Caller code written against either reads the same.
 *
 * @module transport/types
 */

import type { ClientResult } from '../errors/index.js';
import type { FormFields, HeaderMap } from '../headers/index.js';

/**
 * JSON value accepted as a request payload.
 */
export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * HTTP methods used by the transport operations.
 */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

/**
 * The five transport operations, generic over what each returns.
 *
 * `headers` replaces the backend default of each header it names; omitted
 * headers keep their defaults. Every operation yields the raw response body.
 */
export interface HttpTransport<R> {
  /**
   * Sends `params` as the URL query string.
   */
  get(url: string, headers: HeaderMap | undefined, params: JsonValue): R;

  /**
   * Sends `payload` as a JSON body.
   */
  post(url: string, headers: HeaderMap | undefined, payload: JsonValue): R;

  /**
   * Sends `payload` as an `application/x-www-form-urlencoded` body.
   */
  postForm(url: string, headers: HeaderMap | undefined, payload: FormFields): R;

  /**
   * Sends `payload` as a JSON body.
   */
  put(url: string, headers: HeaderMap | undefined, payload: JsonValue): R;

  /**
   * Sends `payload` as a JSON body.
   */
  delete(url: string, headers: HeaderMap | undefined, payload: JsonValue): R;
}

/**
 * Non-blocking transport: each call suspends until the exchange completes.
 */
export type AsyncHttpTransport = HttpTransport<Promise<ClientResult<string>>>;

/**
 * Blocking transport: each call returns once the exchange has completed.
 */
export type SyncHttpTransport = HttpTransport<ClientResult<string>>;

/**
 * Payload of one operation together with its wire encoding.
 */
export type RequestPayload =
  | { kind: 'query'; params: JsonValue }
  | { kind: 'json'; value: JsonValue }
  | { kind: 'form'; fields: FormFields };

/**
 * A request ready to be put on the wire.
 */
export interface PreparedRequest {
  method: HttpMethod;
  url: string;
  /** Lower-case header names */
  headers: HeaderMap;
  body?: string;
}

/**
 * Result of one network exchange before classification. Both backends
 * produce this shape so that classification is shared.
 */
export type RawExchange =
  | {
      kind: 'response';
      status: number;
      statusText: string;
      headers: Record<string, string>;
      body: Uint8Array;
    }
  | { kind: 'failure'; failure: ExchangeFailure };

/**
 * Plain description of an error thrown while exchanging. It must survive
 * structured cloning across threads.
 */
export interface ExchangeFailure {
  /** Error name, e.g. `TypeError`, `TimeoutError`, `ResponseTooLarge` */
  name: string;
  message: string;
  /** `code` of the error's cause, e.g. `ECONNREFUSED` */
  causeCode?: string;
  causeMessage?: string;
}
