/**
 * Outcome classification shared by both backends.
 */

import { TextDecoder } from 'node:util';
import { err } from 'neverthrow';
import {
  classifyResponse,
  NetworkError,
  SerializationError,
  type ClientResult,
  type NetworkFailureReason,
} from '../errors/index.js';
import type { Logger } from '../observability/index.js';
import type { ExchangeFailure, PreparedRequest, RawExchange } from './types.js';

/**
 * Name given to the error raised when a body exceeds the size limit.
 */
export const RESPONSE_TOO_LARGE = 'ResponseTooLarge';

const DNS_CODES = new Set(['ENOTFOUND', 'EAI_AGAIN']);
const INTERRUPTED_CODES = new Set(['UND_ERR_SOCKET', 'ECONNRESET', 'EPIPE', 'UND_ERR_ABORTED']);

/**
 * Reduces a thrown value to a cloneable {@link ExchangeFailure}.
 */
export function describeFailure(error: unknown): ExchangeFailure {
  if (!(error instanceof Error)) {
    return { name: 'Error', message: String(error) };
  }
  const failure: ExchangeFailure = { name: error.name, message: error.message };
  const cause: unknown = error.cause;
  if (cause instanceof Error) {
    failure.causeMessage = cause.message;
    if ('code' in cause && typeof cause.code === 'string') {
      failure.causeCode = cause.code;
    }
  }
  return failure;
}

function networkReason(failure: ExchangeFailure): NetworkFailureReason {
  if (failure.name === 'TimeoutError' || failure.name === 'AbortError') {
    return 'Timeout';
  }
  const code = failure.causeCode ?? '';
  if (code === 'UND_ERR_CONNECT_TIMEOUT' || code === 'ETIMEDOUT') {
    return 'Timeout';
  }
  if (DNS_CODES.has(code)) {
    return 'DnsResolutionFailed';
  }
  if (INTERRUPTED_CODES.has(code) || failure.message === 'terminated') {
    return 'Interrupted';
  }
  return 'ConnectionFailed';
}

/**
 * Maps an exchange failure to a client error.
 */
export function classifyFailure(failure: ExchangeFailure, timeoutMs: number): ClientResult<string> {
  if (failure.name === RESPONSE_TOO_LARGE) {
    return err(new SerializationError(failure.message));
  }

  const reason = networkReason(failure);
  const detail = failure.causeMessage ? `${failure.message} (${failure.causeMessage})` : failure.message;
  const message = reason === 'Timeout' ? `Request timeout after ${timeoutMs}ms` : detail;
  return err(new NetworkError(message, reason, failure));
}

/**
 * Decodes a body as strict UTF-8 and classifies the response.
 */
export function classifyExchange(exchange: RawExchange, timeoutMs: number): ClientResult<string> {
  if (exchange.kind === 'failure') {
    return classifyFailure(exchange.failure, timeoutMs);
  }

  let body: string;
  try {
    body = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true }).decode(exchange.body);
  } catch (error) {
    return err(new SerializationError('Response body is not valid UTF-8 text', error));
  }

  return classifyResponse({
    status: exchange.status,
    statusText: exchange.statusText,
    headers: exchange.headers,
    body,
  });
}

/**
 * Logs one completed call. Successes go to debug, failures to warn.
 */
export function logExchange(
  logger: Logger,
  request: PreparedRequest,
  result: ClientResult<string>,
  durationMs: number
): void {
  const context = {
    method: request.method,
    url: request.url,
    headers: request.headers,
    durationMs,
  };
  if (result.isOk()) {
    logger.debug('HTTP exchange completed', { ...context, bytes: Buffer.byteLength(result.value, 'utf8') });
    return;
  }
  logger.warn('HTTP exchange failed', { ...context, error: result.error.toJSON() });
}
