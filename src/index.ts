/**
 * Web API Transport
 *
 * HTTP transport layer for a REST API client. The same five operations
 * (`get`, `post`, `postForm`, `put`, `delete`) are offered by a
 * non-blocking backend and a blocking backend; exactly one is selected at
 * startup and both classify outcomes identically.
 *
 * ## Quick Start
 *
 * ```typescript
 * import {
 *   AUTHORIZATION,
 *   bearerAuth,
 *   createTransport,
 *   isInvalidAuth,
 *   TransportConfigBuilder,
 * } from 'web-api-transport';
 *
 * // HTTP_TRANSPORT_BACKEND=fetch or HTTP_TRANSPORT_BACKEND=blocking
 * const transport = createTransport(TransportConfigBuilder.fromEnv().build());
 *
 * // `await` accepts the blocking backend's plain result as well
 * const result = await transport.get(
 *   'https://api.example.com/v1/me/playlists',
 *   { [AUTHORIZATION]: bearerAuth(accessToken) },
 *   { limit: 20, offset: 0 }
 * );
 *
 * if (result.isErr() && isInvalidAuth(result.error)) {
 *   // refresh the access token and try again
 * }
 * ```
 *
 * @module web-api-transport
 */

// Headers
export {
  AUTHORIZATION,
  basicAuth,
  bearerAuth,
  mergeHeaders,
  normalizeHeaders,
  type FormFields,
  type HeaderMap,
} from './headers/index.js';

// Errors
export {
  ClientError,
  ClientErrorCode,
  HttpStatusError,
  InvalidAuthError,
  NetworkError,
  SerializationError,
  classifyResponse,
  isClientError,
  isInvalidAuth,
  isRetryableError,
  type ClientResult,
  type NetworkFailureReason,
  type TextResponse,
} from './errors/index.js';

// Configuration
export {
  ConfigurationError,
  DEFAULT_MAX_RESPONSE_BYTES,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_USER_AGENT,
  TRANSPORT_BACKENDS,
  TransportConfigBuilder,
  parseBackendSelection,
  validateConfig,
  type TransportBackend,
  type TransportConfig,
} from './config/index.js';

// Transports
export * from './transport/index.js';

// Observability
export {
  ConsoleLogger,
  InMemoryLogger,
  LogLevel,
  NoopLogger,
  redactSensitive,
  toLogLevel,
  type LogContext,
  type LogEntry,
  type LogLevelName,
  type Logger,
} from './observability/index.js';
