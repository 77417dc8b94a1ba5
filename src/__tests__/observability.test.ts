/**
 * Tests for loggers and redaction.
 */

import { ConsoleLogger, InMemoryLogger, LogLevel, NoopLogger, redactSensitive, toLogLevel } from '../index.js';

describe('redactSensitive', () => {
  it('should redact sensitive keys regardless of case', () => {
    expect(
      redactSensitive({
        Authorization: 'Bearer test-token',
        client_secret: 'test-secret',
        url: 'https://api.example.com',
      })
    ).toEqual({
      Authorization: '[REDACTED]',
      client_secret: '[REDACTED]',
      url: 'https://api.example.com',
    });
  });

  it('should recurse into nested objects but not arrays', () => {
    expect(
      redactSensitive({
        headers: { authorization: 'Basic dXNlcjpwYXNz', accept: 'application/json' },
        scopes: ['a', 'b'],
      })
    ).toEqual({
      headers: { authorization: '[REDACTED]', accept: 'application/json' },
      scopes: ['a', 'b'],
    });
  });
});

describe('toLogLevel', () => {
  it('should map level names', () => {
    expect(toLogLevel('trace')).toBe(LogLevel.Trace);
    expect(toLogLevel('warn')).toBe(LogLevel.Warn);
  });
});

describe('InMemoryLogger', () => {
  it('should record entries with merged context', () => {
    const logger = new InMemoryLogger({ service: 'tests' });
    logger.child({ transport: 'fetch' }).info('sent', { status: 200 });

    const [entry] = logger.getLogs();
    expect(entry.level).toBe(LogLevel.Info);
    expect(entry.message).toBe('sent');
    expect(entry.context).toEqual({ service: 'tests', transport: 'fetch', status: 200 });
  });

  it('should filter by level and clear', () => {
    const logger = new InMemoryLogger();
    logger.debug('a');
    logger.warn('b');
    logger.warn('c');

    expect(logger.getLogsByLevel(LogLevel.Warn).map((entry) => entry.message)).toEqual(['b', 'c']);

    logger.clear();
    expect(logger.getLogs()).toHaveLength(0);
  });
});

describe('ConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should skip entries below its level', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const logger = new ConsoleLogger({ level: LogLevel.Warn });

    logger.info('hidden');
    logger.error('shown');

    expect(spy).toHaveBeenCalledTimes(1);
  });

  it('should write redacted JSON lines', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const logger = new ConsoleLogger({ format: 'json', context: { transport: 'blocking' } });

    logger.warn('HTTP exchange failed', { headers: { authorization: 'Bearer test-token' } });

    const line: unknown = spy.mock.calls[0][0];
    expect(typeof line).toBe('string');
    const parsed: unknown = JSON.parse(String(line));
    expect(parsed).toMatchObject({
      level: 'WARN',
      message: 'HTTP exchange failed',
      transport: 'blocking',
      headers: { authorization: '[REDACTED]' },
    });
  });
});

describe('NoopLogger', () => {
  it('should return itself as child', () => {
    const logger = new NoopLogger();
    expect(logger.child({ a: 1 })).toBe(logger);
  });
});
