/**
 * Backend selection. The configured backend is resolved once, when the
 * transport is created; there is no switching afterwards.
 */

import {
  ConfigurationError,
  TransportConfigBuilder,
  type TransportBackend,
  type TransportConfig,
} from '../config/index.js';
import { ConsoleLogger, toLogLevel, type Logger } from '../observability/index.js';
import { BlockingTransport } from './blocking-transport.js';
import { FetchTransport } from './fetch-transport.js';

/**
 * Options shared by both backends.
 */
export interface CreateTransportOptions {
  /** Defaults to a console logger at the configured level */
  logger?: Logger;
}

/**
 * Transport returned for each backend.
 */
export interface TransportByBackend {
  fetch: FetchTransport;
  blocking: BlockingTransport;
}

/**
 * Either backend, discriminated by `backend`.
 */
export type AnyTransport = TransportByBackend[TransportBackend];

/**
 * Creates the transport for the configured backend.
 * @throws ConfigurationError if the backend is not recognised
 */
export function createTransport<B extends TransportBackend>(
  config: TransportConfig<B>,
  options?: CreateTransportOptions
): TransportByBackend[B];
export function createTransport(
  config: TransportConfig,
  options: CreateTransportOptions = {}
): AnyTransport {
  const logger = options.logger ?? new ConsoleLogger({ level: toLogLevel(config.logLevel) });

  switch (config.backend) {
    case 'fetch':
      return new FetchTransport(config, { logger });
    case 'blocking':
      return new BlockingTransport(config, { logger });
    default:
      throw new ConfigurationError(`Unknown transport backend '${String(config.backend)}'`);
  }
}

/**
 * Creates the transport selected by `HTTP_TRANSPORT_BACKEND`.
 */
export function createTransportFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  options?: CreateTransportOptions
): AnyTransport {
  return createTransport(TransportConfigBuilder.fromEnv(env).build(), options);
}
