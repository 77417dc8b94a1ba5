/**
 * Blocking backend.
 *
 * Each operation blocks the calling thread until the exchange has completed
 * and returns its result directly. The exchange itself runs on a worker
 * thread with the same undici `fetch` as {@link FetchTransport}; the caller
 * waits on a shared cell with `Atomics.wait` and then takes the reply from
 * its own `MessageChannel` with `receiveMessageOnPort`.
 *
 * @module transport/blocking-transport
 */

import { createRequire } from 'node:module';
import { MessageChannel, receiveMessageOnPort, Worker } from 'node:worker_threads';
import { err } from 'neverthrow';
import { z } from 'zod';
import type { TransportConfig } from '../config/index.js';
import type { ClientResult } from '../errors/index.js';
import type { FormFields, HeaderMap } from '../headers/index.js';
import { NoopLogger, type Logger } from '../observability/index.js';
import {
  BLOCKING_WORKER_SOURCE,
  type BlockingWorkerData,
  type BlockingWorkerRequest,
} from './blocking-worker.js';
import { prepareRequest } from './request.js';
import { classifyExchange, logExchange } from './response.js';
import type {
  HttpMethod,
  JsonValue,
  PreparedRequest,
  RawExchange,
  RequestPayload,
  SyncHttpTransport,
} from './types.js';

/**
 * Extra time the caller waits beyond the configured timeout before giving
 * up on the worker. The worker aborts its own fetch at the timeout.
 */
const WAIT_GRACE_MS = 5000;

/**
 * Options for {@link BlockingTransport}.
 */
export interface BlockingTransportOptions {
  logger?: Logger;
}

const replySchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('response'),
    status: z.number().int(),
    statusText: z.string(),
    headers: z.record(z.string(), z.string()),
    body: z.instanceof(Uint8Array),
  }),
  z.object({
    kind: z.literal('failure'),
    failure: z.object({
      name: z.string(),
      message: z.string(),
      causeCode: z.string().optional(),
      causeMessage: z.string().optional(),
    }),
  }),
]);

/**
 * Checks a message received from the worker and turns it into a
 * {@link RawExchange}. Anything else becomes a failure.
 */
export function decodeWorkerReply(message: unknown): RawExchange {
  const reply = replySchema.safeParse(message);
  if (!reply.success) {
    return {
      kind: 'failure',
      failure: { name: 'Error', message: `Malformed reply from transport worker: ${reply.error.message}` },
    };
  }
  return reply.data;
}

function resolveUndici(): string {
  return createRequire(import.meta.url).resolve('undici');
}

/**
 * Blocking transport for the synchronous I/O model.
 *
 * Calls block the thread they are made on, so a server answering them must
 * not run on that same thread.
 *
 * @example
 * ```typescript
 * const transport = new BlockingTransport(
 *   new TransportConfigBuilder().withBackend('blocking').build()
 * );
 * const result = transport.postForm(
 *   'https://accounts.example.com/api/token',
 *   { [AUTHORIZATION]: basicAuth(clientId, clientSecret) },
 *   { grant_type: 'client_credentials' }
 * );
 * ```
 */
export class BlockingTransport implements SyncHttpTransport {
  readonly backend = 'blocking' as const;

  private readonly config: TransportConfig;
  private readonly logger: Logger;
  private worker?: Worker;

  constructor(config: TransportConfig, options: BlockingTransportOptions = {}) {
    this.config = config;
    this.logger = (options.logger ?? new NoopLogger()).child({ transport: this.backend });
  }

  get(url: string, headers: HeaderMap | undefined, params: JsonValue): ClientResult<string> {
    return this.request('GET', url, headers, { kind: 'query', params });
  }

  post(url: string, headers: HeaderMap | undefined, payload: JsonValue): ClientResult<string> {
    return this.request('POST', url, headers, { kind: 'json', value: payload });
  }

  postForm(url: string, headers: HeaderMap | undefined, payload: FormFields): ClientResult<string> {
    return this.request('POST', url, headers, { kind: 'form', fields: payload });
  }

  put(url: string, headers: HeaderMap | undefined, payload: JsonValue): ClientResult<string> {
    return this.request('PUT', url, headers, { kind: 'json', value: payload });
  }

  delete(url: string, headers: HeaderMap | undefined, payload: JsonValue): ClientResult<string> {
    return this.request('DELETE', url, headers, { kind: 'json', value: payload });
  }

  /**
   * Stops the worker thread. A later call starts a new one.
   */
  async close(): Promise<void> {
    const worker = this.worker;
    this.worker = undefined;
    if (worker) {
      await worker.terminate();
    }
  }

  private request(
    method: HttpMethod,
    url: string,
    headers: HeaderMap | undefined,
    payload: RequestPayload
  ): ClientResult<string> {
    const prepared = prepareRequest(this.config, method, url, headers, payload);
    if (prepared.isErr()) {
      this.logger.warn('Request rejected before sending', { method, url, error: prepared.error.toJSON() });
      return err(prepared.error);
    }

    const startTime = Date.now();
    const exchange = this.exchange(prepared.value);
    const result = classifyExchange(exchange, this.config.timeoutMs);
    logExchange(this.logger, prepared.value, result, Date.now() - startTime);
    return result;
  }

  private exchange(request: PreparedRequest): RawExchange {
    const worker = this.ensureWorker();
    const { port1, port2 } = new MessageChannel();
    const signal = new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT);
    const cell = new Int32Array(signal);

    try {
      const message: BlockingWorkerRequest = {
        request: {
          ...request,
          timeoutMs: this.config.timeoutMs,
          maxResponseBytes: this.config.maxResponseBytes,
        },
        port: port2,
        signal,
      };
      worker.postMessage(message, [port2]);

      const waited = Atomics.wait(cell, 0, 0, this.config.timeoutMs + WAIT_GRACE_MS);
      const received = receiveMessageOnPort(port1);
      if (!received) {
        return {
          kind: 'failure',
          failure: {
            name: waited === 'timed-out' ? 'TimeoutError' : 'Error',
            message: 'No reply from transport worker',
          },
        };
      }
      return decodeWorkerReply(received.message);
    } finally {
      port1.close();
    }
  }

  private ensureWorker(): Worker {
    if (this.worker) {
      return this.worker;
    }

    const workerData: BlockingWorkerData = { undiciPath: resolveUndici() };
    const worker = new Worker(BLOCKING_WORKER_SOURCE, { eval: true, workerData });
    worker.unref();
    // 'exit' always follows 'error' and clears the handle
    worker.on('error', (error) => {
      this.logger.error('Transport worker failed', { error: error.message });
    });
    worker.on('exit', (exitCode) => {
      this.logger.debug('Transport worker exited', { exitCode });
      if (this.worker === worker) {
        this.worker = undefined;
      }
    });

    this.worker = worker;
    return worker;
  }
}
