/**
 * In-memory transports for testing code that consumes the transport
 * contract. No network access.
 */

import { err } from 'neverthrow';
import { classifyResponse, NetworkError, type ClientResult } from '../errors/index.js';
import { normalizeHeaders, type FormFields, type HeaderMap } from '../headers/index.js';
import type { AsyncHttpTransport, HttpMethod, JsonValue, SyncHttpTransport } from './types.js';

/**
 * A call recorded by a mock transport.
 */
export interface RecordedRequest {
  method: HttpMethod;
  /** `postForm` calls are recorded with `form: true` */
  form: boolean;
  url: string;
  headers?: HeaderMap;
  payload: JsonValue | FormFields;
}

/**
 * A canned response, classified like a real one.
 */
export interface MockResponse {
  status: number;
  statusText?: string;
  headers?: HeaderMap;
  body: string;
}

/**
 * Queue of outcomes and call history shared by both mocks.
 */
class MockExchangeQueue {
  private readonly outcomes: ClientResult<string>[] = [];
  private readonly history: RecordedRequest[] = [];
  private defaultOutcome?: ClientResult<string>;

  queueResult(result: ClientResult<string>): void {
    this.outcomes.push(result);
  }

  queueResponse(response: MockResponse): void {
    this.outcomes.push(
      classifyResponse({
        status: response.status,
        statusText: response.statusText ?? '',
        headers: normalizeHeaders(response.headers ?? {}),
        body: response.body,
      })
    );
  }

  setDefault(result: ClientResult<string>): void {
    this.defaultOutcome = result;
  }

  next(request: RecordedRequest): ClientResult<string> {
    this.history.push(request);
    const outcome = this.outcomes.shift() ?? this.defaultOutcome;
    if (!outcome) {
      return err(new NetworkError('No mock response queued', 'ConnectionFailed'));
    }
    return outcome;
  }

  requests(): RecordedRequest[] {
    return [...this.history];
  }

  clear(): void {
    this.outcomes.length = 0;
    this.history.length = 0;
    this.defaultOutcome = undefined;
  }
}

/**
 * Queueing and inspection API of both mocks.
 */
abstract class MockTransportBase {
  protected readonly queue = new MockExchangeQueue();

  /**
   * Queues an outcome for the next call.
   */
  queueResult(result: ClientResult<string>): this {
    this.queue.queueResult(result);
    return this;
  }

  /**
   * Queues a response, classified as a real response would be.
   */
  queueResponse(response: MockResponse): this {
    this.queue.queueResponse(response);
    return this;
  }

  /**
   * Queues a JSON response.
   */
  queueJsonResponse(status: number, body: JsonValue): this {
    return this.queueResponse({
      status,
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify(body),
    });
  }

  /**
   * Outcome returned once the queue is empty.
   */
  setDefaultResult(result: ClientResult<string>): this {
    this.queue.setDefault(result);
    return this;
  }

  getRequests(): RecordedRequest[] {
    return this.queue.requests();
  }

  getLastRequest(): RecordedRequest | undefined {
    const requests = this.queue.requests();
    return requests[requests.length - 1];
  }

  assertCalledTimes(count: number): void {
    const actual = this.queue.requests().length;
    if (actual !== count) {
      throw new Error(`Expected ${count} requests, got ${actual}`);
    }
  }

  reset(): void {
    this.queue.clear();
  }

  protected record(
    method: HttpMethod,
    form: boolean,
    url: string,
    headers: HeaderMap | undefined,
    payload: JsonValue | FormFields
  ): ClientResult<string> {
    return this.queue.next({ method, form, url, headers, payload });
  }
}

/**
 * Mock of the non-blocking contract.
 */
export class MockTransport extends MockTransportBase implements AsyncHttpTransport {
  async get(url: string, headers: HeaderMap | undefined, params: JsonValue): Promise<ClientResult<string>> {
    return this.record('GET', false, url, headers, params);
  }

  async post(url: string, headers: HeaderMap | undefined, payload: JsonValue): Promise<ClientResult<string>> {
    return this.record('POST', false, url, headers, payload);
  }

  async postForm(url: string, headers: HeaderMap | undefined, payload: FormFields): Promise<ClientResult<string>> {
    return this.record('POST', true, url, headers, payload);
  }

  async put(url: string, headers: HeaderMap | undefined, payload: JsonValue): Promise<ClientResult<string>> {
    return this.record('PUT', false, url, headers, payload);
  }

  async delete(url: string, headers: HeaderMap | undefined, payload: JsonValue): Promise<ClientResult<string>> {
    return this.record('DELETE', false, url, headers, payload);
  }
}

/**
 * Mock of the blocking contract.
 */
export class MockBlockingTransport extends MockTransportBase implements SyncHttpTransport {
  get(url: string, headers: HeaderMap | undefined, params: JsonValue): ClientResult<string> {
    return this.record('GET', false, url, headers, params);
  }

  post(url: string, headers: HeaderMap | undefined, payload: JsonValue): ClientResult<string> {
    return this.record('POST', false, url, headers, payload);
  }

  postForm(url: string, headers: HeaderMap | undefined, payload: FormFields): ClientResult<string> {
    return this.record('POST', true, url, headers, payload);
  }

  put(url: string, headers: HeaderMap | undefined, payload: JsonValue): ClientResult<string> {
    return this.record('PUT', false, url, headers, payload);
  }

  delete(url: string, headers: HeaderMap | undefined, payload: JsonValue): ClientResult<string> {
    return this.record('DELETE', false, url, headers, payload);
  }
}
