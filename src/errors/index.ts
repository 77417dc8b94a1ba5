/**
 * Client error taxonomy and result type.
 *
 * Every transport operation resolves to a `ClientResult<string>`: the raw
 * response body, or one of the four `ClientError` kinds below. Transports
 * never throw for exchange failures.
 */

import { err, ok, type Result } from 'neverthrow';

/**
 * Error codes for client errors.
 */
export enum ClientErrorCode {
  InvalidAuth = 'INVALID_AUTH',
  HttpStatus = 'HTTP_STATUS',
  Network = 'NETWORK',
  Serialization = 'SERIALIZATION',
}

/**
 * Outcome of a transport operation.
 */
export type ClientResult<T> = Result<T, ClientError>;

/**
 * Base client error class.
 */
export class ClientError extends Error {
  /** Error code */
  readonly code: ClientErrorCode;
  /** HTTP status code (if a response was received) */
  readonly statusCode?: number;
  /** Whether repeating the same call may succeed */
  readonly retryable: boolean;
  /** Additional error details */
  readonly details?: Record<string, unknown>;

  constructor(options: {
    code: ClientErrorCode;
    message: string;
    statusCode?: number;
    retryable?: boolean;
    details?: Record<string, unknown>;
    cause?: unknown;
  }) {
    super(options.message, { cause: options.cause });
    this.name = 'ClientError';
    this.code = options.code;
    this.statusCode = options.statusCode;
    this.retryable = options.retryable ?? false;
    this.details = options.details;
  }

  /**
   * Creates a JSON representation of the error.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
      retryable: this.retryable,
      details: this.details,
    };
  }
}

// ============================================================================
// Authentication
// ============================================================================

/**
 * The server rejected the credentials sent with the request.
 *
 * Kept apart from {@link HttpStatusError} so callers can start a
 * re-authentication flow without inspecting status codes.
 */
export class InvalidAuthError extends ClientError {
  /** OAuth error code or API error status from the payload */
  readonly authError?: string;

  constructor(message: string, statusCode: number, authError?: string) {
    super({
      code: ClientErrorCode.InvalidAuth,
      message,
      statusCode,
      retryable: false,
      details: authError ? { authError } : undefined,
    });
    this.name = 'InvalidAuthError';
    this.authError = authError;
  }
}

// ============================================================================
// HTTP status
// ============================================================================

/**
 * Non-2xx response that is not an authentication failure.
 */
export class HttpStatusError extends ClientError {
  readonly status: number;
  readonly statusText: string;
  /** Raw response body */
  readonly body: string;
  /** Delay requested by a `Retry-After` header */
  readonly retryAfterMs?: number;

  constructor(options: {
    status: number;
    statusText: string;
    body: string;
    retryAfterMs?: number;
  }) {
    const reason = options.statusText ? ` ${options.statusText}` : '';
    super({
      code: ClientErrorCode.HttpStatus,
      message: `HTTP ${options.status}${reason}`,
      statusCode: options.status,
      retryable: options.status === 429 || options.status >= 500,
      details: options.retryAfterMs !== undefined ? { retryAfterMs: options.retryAfterMs } : undefined,
    });
    this.name = 'HttpStatusError';
    this.status = options.status;
    this.statusText = options.statusText;
    this.body = options.body;
    this.retryAfterMs = options.retryAfterMs;
  }
}

// ============================================================================
// Network
// ============================================================================

/**
 * Why the exchange did not complete.
 */
export type NetworkFailureReason =
  | 'Timeout'
  | 'ConnectionFailed'
  | 'DnsResolutionFailed'
  | 'Interrupted';

/**
 * Connection could not be established, timed out or was interrupted.
 */
export class NetworkError extends ClientError {
  readonly reason: NetworkFailureReason;

  constructor(message: string, reason: NetworkFailureReason, cause?: unknown) {
    super({
      code: ClientErrorCode.Network,
      message: `Network error: ${message}`,
      retryable: true,
      details: { reason },
      cause,
    });
    this.name = 'NetworkError';
    this.reason = reason;
  }
}

// ============================================================================
// Serialization
// ============================================================================

/**
 * Request could not be encoded, or the response could not be read as text.
 */
export class SerializationError extends ClientError {
  constructor(message: string, cause?: unknown) {
    super({
      code: ClientErrorCode.Serialization,
      message: `Serialization error: ${message}`,
      retryable: false,
      cause,
    });
    this.name = 'SerializationError';
  }
}

// ============================================================================
// Response classification
// ============================================================================

/**
 * A complete HTTP response with its body already decoded to text.
 */
export interface TextResponse {
  status: number;
  statusText: string;
  /** Lower-case header names */
  headers: Record<string, string>;
  body: string;
}

/**
 * OAuth error codes in a 400 response that mean the credentials are unusable.
 */
const OAUTH_CREDENTIAL_ERRORS = new Set(['invalid_client', 'invalid_grant', 'invalid_token']);

interface AuthFailurePayload {
  error: string;
  message: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Extracts an auth-failure payload: either the OAuth form
 * `{"error": "invalid_token", "error_description": "..."}` or the API form
 * `{"error": {"status": 401, "message": "..."}}`.
 */
function parseAuthFailure(body: string): AuthFailurePayload | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return undefined;
  }
  if (!isRecord(parsed)) {
    return undefined;
  }

  const { error } = parsed;
  if (typeof error === 'string') {
    const description = parsed.error_description;
    return {
      error,
      message: typeof description === 'string' && description ? description : error,
    };
  }
  if (isRecord(error) && typeof error.message === 'string') {
    const status = error.status;
    return {
      error: typeof status === 'number' || typeof status === 'string' ? String(status) : 'unauthorized',
      message: error.message,
    };
  }
  return undefined;
}

/**
 * Parses a `Retry-After` header given in seconds.
 */
function parseRetryAfter(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const seconds = Number(value.trim());
  if (!Number.isFinite(seconds) || seconds < 0) {
    return undefined;
  }
  return seconds * 1000;
}

/**
 * Classifies a received response. 2xx returns the body unchanged.
 */
export function classifyResponse(response: TextResponse): ClientResult<string> {
  const { status, statusText, headers, body } = response;

  if (status >= 200 && status < 300) {
    return ok(body);
  }

  if (status === 401 || status === 400) {
    const auth = parseAuthFailure(body);
    if (auth && (status === 401 || OAUTH_CREDENTIAL_ERRORS.has(auth.error))) {
      return err(new InvalidAuthError(auth.message, status, auth.error));
    }
  }

  return err(
    new HttpStatusError({
      status,
      statusText,
      body,
      retryAfterMs: parseRetryAfter(headers['retry-after']),
    })
  );
}

// ============================================================================
// Guards
// ============================================================================

/**
 * Checks if a value is a client error.
 */
export function isClientError(error: unknown): error is ClientError {
  return error instanceof ClientError;
}

/**
 * Checks if a value is an authentication failure.
 */
export function isInvalidAuth(error: unknown): error is InvalidAuthError {
  return error instanceof InvalidAuthError;
}

/**
 * Checks if an error is retryable.
 */
export function isRetryableError(error: unknown): boolean {
  return isClientError(error) && error.retryable;
}
