/**
 * Tests for the blocking backend's worker lifecycle.
 */

import { Worker } from 'node:worker_threads';
import {
  BlockingTransport,
  InMemoryLogger,
  LogLevel,
  NetworkError,
  TransportConfigBuilder,
  decodeWorkerReply,
} from '../index.js';
import { startMockServer, TEXT_BODY, type MockServer } from './helpers/mock-server.js';

describe('BlockingTransport', () => {
  let server: MockServer;
  let transport: BlockingTransport;
  let logger: InMemoryLogger;

  beforeAll(async () => {
    server = await startMockServer();
  });

  beforeEach(() => {
    logger = new InMemoryLogger();
    transport = new BlockingTransport(new TransportConfigBuilder().withBackend('blocking').withTimeout(100).build(), {
      logger,
    });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await transport.close();
  });

  afterAll(async () => {
    await server.close();
  });

  it('should start a new worker after close', async () => {
    expect(transport.get(server.url('/text'), undefined, null)._unsafeUnwrap()).toBe(TEXT_BODY);

    await transport.close();

    expect(transport.get(server.url('/text'), undefined, null)._unsafeUnwrap()).toBe(TEXT_BODY);
  });

  it('should log when the worker exits', async () => {
    transport.get(server.url('/text'), undefined, null);

    await transport.close();

    const exits = logger.getLogsByLevel(LogLevel.Debug).filter((entry) => entry.message === 'Transport worker exited');
    expect(exits).toHaveLength(1);
    expect(exits[0].context).toEqual({ transport: 'blocking', exitCode: 1 });
  });

  it('should report a timeout when the worker never replies', () => {
    vi.spyOn(Worker.prototype, 'postMessage').mockImplementation(() => undefined);

    const error = transport.get(server.url('/text'), undefined, null)._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(NetworkError);
    expect(error).toMatchObject({ message: 'Network error: Request timeout after 100ms', reason: 'Timeout' });
    expect(error.cause).toEqual({ name: 'TimeoutError', message: 'No reply from transport worker' });
  }, 15000);

  it('should keep working once the worker replies again', () => {
    const postMessage = vi.spyOn(Worker.prototype, 'postMessage').mockImplementation(() => undefined);
    transport.get(server.url('/text'), undefined, null);
    postMessage.mockRestore();

    expect(transport.get(server.url('/text'), undefined, null)._unsafeUnwrap()).toBe(TEXT_BODY);
  }, 15000);
});

describe('decodeWorkerReply', () => {
  it('should accept a response reply', () => {
    const body = new Uint8Array([104, 105]);

    expect(decodeWorkerReply({ kind: 'response', status: 200, statusText: 'OK', headers: {}, body })).toEqual({
      kind: 'response',
      status: 200,
      statusText: 'OK',
      headers: {},
      body,
    });
  });

  it('should accept a failure reply', () => {
    const failure = { name: 'TypeError', message: 'fetch failed', causeCode: 'ECONNREFUSED' };

    expect(decodeWorkerReply({ kind: 'failure', failure })).toEqual({ kind: 'failure', failure });
  });

  it('should turn anything else into a failure', () => {
    const exchange = decodeWorkerReply({ kind: 'response', status: '200' });

    expect(exchange.kind).toBe('failure');
    if (exchange.kind === 'failure') {
      expect(exchange.failure.name).toBe('Error');
      expect(exchange.failure.message.startsWith('Malformed reply from transport worker: ')).toBe(true);
    }
  });
});
