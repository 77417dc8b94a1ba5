/**
 * Transport configuration and builder.
 * @module config
 */

import { z } from 'zod';
import { normalizeHeaders, type HeaderMap } from '../headers/index.js';
import type { LogLevelName } from '../observability/index.js';

/**
 * Network backends. Exactly one is selected per process.
 */
export const TRANSPORT_BACKENDS = ['fetch', 'blocking'] as const;

/**
 * A network backend.
 */
export type TransportBackend = (typeof TRANSPORT_BACKENDS)[number];

/**
 * Default request timeout in milliseconds.
 */
export const DEFAULT_TIMEOUT_MS = 30000;

/**
 * Default User-Agent header.
 */
export const DEFAULT_USER_AGENT = 'web-api-transport/0.1.0';

/**
 * Default response size limit (10 MiB).
 */
export const DEFAULT_MAX_RESPONSE_BYTES = 10 * 1024 * 1024;

/**
 * Transport configuration.
 */
export interface TransportConfig<B extends TransportBackend = TransportBackend> {
  /** Selected network backend */
  readonly backend: B;
  /** Per-exchange timeout in milliseconds */
  readonly timeoutMs: number;
  /** User-Agent header sent unless overridden per call */
  readonly userAgent: string;
  /** Headers sent with every request unless overridden per call (lower-case names) */
  readonly defaultHeaders: Readonly<HeaderMap>;
  /** Responses larger than this are rejected */
  readonly maxResponseBytes: number;
  /** Minimum level for the default console logger */
  readonly logLevel: LogLevelName;
}

/**
 * Configuration error. Raised while building or loading configuration,
 * never by a transport call.
 */
export class ConfigurationError extends Error {
  readonly code = 'CONFIGURATION';

  constructor(message: string) {
    super(`Configuration error: ${message}`);
    this.name = 'ConfigurationError';
  }
}

/**
 * Zod schema for configuration validation.
 */
const configSchema = z.object({
  backend: z.enum(TRANSPORT_BACKENDS),
  timeoutMs: z.number().int().positive(),
  userAgent: z.string().min(1),
  defaultHeaders: z.record(z.string(), z.string()),
  maxResponseBytes: z.number().int().positive(),
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error']),
});

/**
 * Validates a configuration object.
 * @throws ConfigurationError if any field is invalid
 */
export function validateConfig(config: unknown): TransportConfig {
  const parsed = configSchema.safeParse(config);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(issues);
  }
  return {
    ...parsed.data,
    defaultHeaders: normalizeHeaders(parsed.data.defaultHeaders),
  };
}

/**
 * Parses a backend selection such as `fetch` or `blocking`. Naming no
 * backend, an unknown one, or more than one is an error.
 */
export function parseBackendSelection(raw: string | undefined): TransportBackend {
  const selected = (raw ?? '')
    .split(',')
    .map((entry) => entry.trim().toLowerCase())
    .filter((entry) => entry.length > 0);

  if (selected.length === 0) {
    throw new ConfigurationError('No transport backend selected');
  }
  if (selected.length > 1) {
    throw new ConfigurationError(
      `Only one transport backend may be selected, got: ${selected.join(', ')}`
    );
  }

  const backend = TRANSPORT_BACKENDS.find((candidate) => candidate === selected[0]);
  if (!backend) {
    throw new ConfigurationError(
      `Unknown transport backend '${selected[0]}' (expected one of: ${TRANSPORT_BACKENDS.join(', ')})`
    );
  }
  return backend;
}

function parseIntegerEnv(name: string, raw: string): number {
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new ConfigurationError(`${name} must be an integer, got '${raw}'`);
  }
  return value;
}

/**
 * Builder for transport configuration.
 */
export class TransportConfigBuilder {
  private backend?: TransportBackend;
  private timeoutMs: number = DEFAULT_TIMEOUT_MS;
  private userAgent: string = DEFAULT_USER_AGENT;
  private defaultHeaders: HeaderMap = {};
  private maxResponseBytes: number = DEFAULT_MAX_RESPONSE_BYTES;
  private logLevel: LogLevelName = 'info';

  /**
   * Selects the network backend. Selecting a second, different backend
   * is an error.
   */
  withBackend(backend: TransportBackend): this {
    if (this.backend !== undefined && this.backend !== backend) {
      throw new ConfigurationError(
        `Transport backend already selected: ${this.backend} (cannot also select ${backend})`
      );
    }
    this.backend = backend;
    return this;
  }

  /**
   * Sets the per-exchange timeout.
   */
  withTimeout(timeoutMs: number): this {
    if (!Number.isInteger(timeoutMs) || timeoutMs <= 0) {
      throw new ConfigurationError('Timeout must be a positive integer');
    }
    this.timeoutMs = timeoutMs;
    return this;
  }

  withUserAgent(userAgent: string): this {
    if (userAgent.trim().length === 0) {
      throw new ConfigurationError('User agent cannot be empty');
    }
    this.userAgent = userAgent;
    return this;
  }

  /**
   * Adds a header sent with every request.
   */
  withDefaultHeader(name: string, value: string): this {
    if (name.trim().length === 0) {
      throw new ConfigurationError('Header name cannot be empty');
    }
    this.defaultHeaders[name.toLowerCase()] = value;
    return this;
  }

  withDefaultHeaders(headers: HeaderMap): this {
    for (const [name, value] of Object.entries(headers)) {
      this.withDefaultHeader(name, value);
    }
    return this;
  }

  withMaxResponseBytes(bytes: number): this {
    if (!Number.isInteger(bytes) || bytes <= 0) {
      throw new ConfigurationError('Maximum response size must be a positive integer');
    }
    this.maxResponseBytes = bytes;
    return this;
  }

  withLogLevel(level: LogLevelName): this {
    this.logLevel = level;
    return this;
  }

  /**
   * Creates a builder from environment variables.
   *
   * Environment variables:
   * - HTTP_TRANSPORT_BACKEND: `fetch` or `blocking` (required)
   * - HTTP_TRANSPORT_TIMEOUT_MS: request timeout
   * - HTTP_TRANSPORT_USER_AGENT: User-Agent header
   * - HTTP_TRANSPORT_MAX_RESPONSE_BYTES: response size limit
   * - HTTP_TRANSPORT_LOG_LEVEL: trace, debug, info, warn or error
   */
  static fromEnv(env: NodeJS.ProcessEnv = process.env): TransportConfigBuilder {
    const builder = new TransportConfigBuilder();

    builder.withBackend(parseBackendSelection(env.HTTP_TRANSPORT_BACKEND));

    const timeout = env.HTTP_TRANSPORT_TIMEOUT_MS;
    if (timeout) {
      builder.withTimeout(parseIntegerEnv('HTTP_TRANSPORT_TIMEOUT_MS', timeout));
    }

    const userAgent = env.HTTP_TRANSPORT_USER_AGENT;
    if (userAgent) {
      builder.withUserAgent(userAgent);
    }

    const maxBytes = env.HTTP_TRANSPORT_MAX_RESPONSE_BYTES;
    if (maxBytes) {
      builder.withMaxResponseBytes(parseIntegerEnv('HTTP_TRANSPORT_MAX_RESPONSE_BYTES', maxBytes));
    }

    const logLevel = env.HTTP_TRANSPORT_LOG_LEVEL;
    if (logLevel) {
      const parsed = configSchema.shape.logLevel.safeParse(logLevel.toLowerCase());
      if (!parsed.success) {
        throw new ConfigurationError(`Invalid HTTP_TRANSPORT_LOG_LEVEL '${logLevel}'`);
      }
      builder.withLogLevel(parsed.data);
    }

    return builder;
  }

  /**
   * Builds the transport configuration.
   * @throws ConfigurationError if no backend was selected
   */
  build(): TransportConfig {
    if (this.backend === undefined) {
      throw new ConfigurationError('No transport backend selected');
    }
    return validateConfig({
      backend: this.backend,
      timeoutMs: this.timeoutMs,
      userAgent: this.userAgent,
      defaultHeaders: { ...this.defaultHeaders },
      maxResponseBytes: this.maxResponseBytes,
      logLevel: this.logLevel,
    });
  }
}
