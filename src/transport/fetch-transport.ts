/**
 * Non-blocking backend.
 *
 * Each operation suspends the calling task at the network exchange and
 * resumes on the event loop when the response has been read. Connection
 * reuse is left to undici's global dispatcher.
 *
 * @module transport/fetch-transport
 */

import { err } from 'neverthrow';
import { fetch, type Response } from 'undici';
import type { TransportConfig } from '../config/index.js';
import type { ClientResult } from '../errors/index.js';
import type { FormFields, HeaderMap } from '../headers/index.js';
import { NoopLogger, type Logger } from '../observability/index.js';
import { prepareRequest } from './request.js';
import { classifyExchange, describeFailure, logExchange, RESPONSE_TOO_LARGE } from './response.js';
import type {
  AsyncHttpTransport,
  HttpMethod,
  JsonValue,
  PreparedRequest,
  RawExchange,
  RequestPayload,
} from './types.js';

/**
 * Options for {@link FetchTransport}.
 */
export interface FetchTransportOptions {
  logger?: Logger;
}

/**
 * Raised while reading a body that exceeds the configured limit.
 */
class ResponseTooLargeError extends Error {
  constructor(size: number, limit: number) {
    super(`Response too large: ${size} bytes (limit ${limit})`);
    this.name = RESPONSE_TOO_LARGE;
  }
}

/**
 * Reads the whole body, stopping once it exceeds `maxBytes`.
 */
async function readBody(response: Response, maxBytes: number): Promise<Uint8Array> {
  const contentLength = response.headers.get('content-length');
  if (contentLength && parseInt(contentLength, 10) > maxBytes) {
    await response.body?.cancel();
    throw new ResponseTooLargeError(parseInt(contentLength, 10), maxBytes);
  }

  const reader = response.body?.getReader();
  if (!reader) {
    return new Uint8Array(0);
  }

  const chunks: Uint8Array[] = [];
  let totalSize = 0;

  while (true) {
    const { done, value } = await reader.read();
    if (done) break;

    totalSize += value.length;
    if (totalSize > maxBytes) {
      await reader.cancel();
      throw new ResponseTooLargeError(totalSize, maxBytes);
    }
    chunks.push(value);
  }

  const body = new Uint8Array(totalSize);
  let position = 0;
  for (const chunk of chunks) {
    body.set(chunk, position);
    position += chunk.length;
  }
  return body;
}

/**
 * Fetch-based transport for the cooperative I/O model.
 *
 * @example
 * ```typescript
 * const transport = new FetchTransport(
 *   new TransportConfigBuilder().withBackend('fetch').build()
 * );
 * const result = await transport.get(
 *   'https://api.example.com/v1/me',
 *   { [AUTHORIZATION]: bearerAuth(accessToken) },
 *   null
 * );
 * ```
 */
export class FetchTransport implements AsyncHttpTransport {
  readonly backend = 'fetch' as const;

  private readonly config: TransportConfig;
  private readonly logger: Logger;

  constructor(config: TransportConfig, options: FetchTransportOptions = {}) {
    this.config = config;
    this.logger = (options.logger ?? new NoopLogger()).child({ transport: this.backend });
  }

  async get(url: string, headers: HeaderMap | undefined, params: JsonValue): Promise<ClientResult<string>> {
    return this.request('GET', url, headers, { kind: 'query', params });
  }

  async post(url: string, headers: HeaderMap | undefined, payload: JsonValue): Promise<ClientResult<string>> {
    return this.request('POST', url, headers, { kind: 'json', value: payload });
  }

  async postForm(url: string, headers: HeaderMap | undefined, payload: FormFields): Promise<ClientResult<string>> {
    return this.request('POST', url, headers, { kind: 'form', fields: payload });
  }

  async put(url: string, headers: HeaderMap | undefined, payload: JsonValue): Promise<ClientResult<string>> {
    return this.request('PUT', url, headers, { kind: 'json', value: payload });
  }

  async delete(url: string, headers: HeaderMap | undefined, payload: JsonValue): Promise<ClientResult<string>> {
    return this.request('DELETE', url, headers, { kind: 'json', value: payload });
  }

  private async request(
    method: HttpMethod,
    url: string,
    headers: HeaderMap | undefined,
    payload: RequestPayload
  ): Promise<ClientResult<string>> {
    const prepared = prepareRequest(this.config, method, url, headers, payload);
    if (prepared.isErr()) {
      this.logger.warn('Request rejected before sending', { method, url, error: prepared.error.toJSON() });
      return err(prepared.error);
    }

    const startTime = Date.now();
    const exchange = await this.exchange(prepared.value);
    const result = classifyExchange(exchange, this.config.timeoutMs);
    logExchange(this.logger, prepared.value, result, Date.now() - startTime);
    return result;
  }

  private async exchange(request: PreparedRequest): Promise<RawExchange> {
    try {
      const response = await fetch(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        redirect: 'follow',
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });

      const headers: Record<string, string> = {};
      response.headers.forEach((value, key) => {
        headers[key.toLowerCase()] = value;
      });

      return {
        kind: 'response',
        status: response.status,
        statusText: response.statusText,
        headers,
        body: await readBody(response, this.config.maxResponseBytes),
      };
    } catch (error) {
      return { kind: 'failure', failure: describeFailure(error) };
    }
  }
}
