/**
 * Worker thread behind {@link BlockingTransport}.
 *
 * The source runs as a CommonJS script inside a `worker_threads` worker so
 * it needs no TypeScript loader. For each request it performs one undici
 * `fetch`, posts a {@link RawExchange} on the request's port, then wakes the
 * caller blocked on the shared cell.
 *
 * @module transport/blocking-worker
 */

import type { MessagePort } from 'node:worker_threads';
import type { PreparedRequest } from './types.js';

/**
 * Data handed to the worker at startup.
 */
export interface BlockingWorkerData {
  /** Resolved path of the undici entry point */
  undiciPath: string;
}

/**
 * One request sent to the worker.
 */
export interface BlockingWorkerRequest {
  request: PreparedRequest & {
    timeoutMs: number;
    maxResponseBytes: number;
  };
  /** Port the reply is posted on */
  port: MessagePort;
  /** Four-byte cell set to 1 once the reply has been posted */
  signal: SharedArrayBuffer;
}

/**
 * Worker script. Its `readBody`, `describeFailure` and `exchange` are plain
 * JavaScript copies of `readBody` and `FetchTransport#exchange` in
 * fetch-transport.ts and `describeFailure` in response.ts; change them
 * together. The equivalence tests compare both backends' outcomes.
 */
export const BLOCKING_WORKER_SOURCE = String.raw`
'use strict';
const { parentPort, workerData } = require('node:worker_threads');
const { fetch } = require(workerData.undiciPath);

class ResponseTooLargeError extends Error {
  constructor(size, limit) {
    super('Response too large: ' + size + ' bytes (limit ' + limit + ')');
    this.name = 'ResponseTooLarge';
  }
}

async function readBody(response, maxBytes) {
  const contentLength = response.headers.get('content-length');
  if (contentLength && parseInt(contentLength, 10) > maxBytes) {
    if (response.body) await response.body.cancel();
    throw new ResponseTooLargeError(parseInt(contentLength, 10), maxBytes);
  }
  if (!response.body) return new Uint8Array(0);

  const reader = response.body.getReader();
  const chunks = [];
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

function describeFailure(error) {
  if (typeof error !== 'object' || error === null) {
    return { name: 'Error', message: String(error) };
  }
  const failure = {
    name: typeof error.name === 'string' ? error.name : 'Error',
    message: typeof error.message === 'string' ? error.message : String(error),
  };
  const cause = error.cause;
  if (typeof cause === 'object' && cause !== null) {
    if (typeof cause.message === 'string') failure.causeMessage = cause.message;
    if (typeof cause.code === 'string') failure.causeCode = cause.code;
  }
  return failure;
}

async function exchange(request) {
  try {
    const response = await fetch(request.url, {
      method: request.method,
      headers: request.headers,
      body: request.body,
      redirect: 'follow',
      signal: AbortSignal.timeout(request.timeoutMs),
    });
    const headers = {};
    response.headers.forEach((value, key) => {
      headers[key.toLowerCase()] = value;
    });
    return {
      kind: 'response',
      status: response.status,
      statusText: response.statusText,
      headers,
      body: await readBody(response, request.maxResponseBytes),
    };
  } catch (error) {
    return { kind: 'failure', failure: describeFailure(error) };
  }
}

parentPort.on('message', (message) => {
  const cell = new Int32Array(message.signal);
  const settle = (outcome) => {
    message.port.postMessage(outcome);
    message.port.close();
    Atomics.store(cell, 0, 1);
    Atomics.notify(cell, 0);
  };
  exchange(message.request).then(settle, (error) => {
    settle({ kind: 'failure', failure: describeFailure(error) });
  });
});
`;
