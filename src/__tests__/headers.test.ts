/**
 * Tests for header maps and authorization values.
 */

import { AUTHORIZATION, basicAuth, bearerAuth, mergeHeaders, normalizeHeaders } from '../index.js';

describe('bearerAuth', () => {
  it('should prefix the token', () => {
    expect(bearerAuth('abc')).toBe('Bearer abc');
  });

  it('should accept an empty token', () => {
    expect(bearerAuth('')).toBe('Bearer ');
  });

  it('should not escape the token', () => {
    expect(bearerAuth('a b:c')).toBe('Bearer a b:c');
  });
});

describe('basicAuth', () => {
  it('should base64-encode user:password', () => {
    expect(basicAuth('user', 'pass')).toBe('Basic dXNlcjpwYXNz');
  });

  it('should keep padding', () => {
    // "ab:c" -> YWI6Yw==
    expect(basicAuth('ab', 'c')).toBe('Basic YWI6Yw==');
  });

  it('should accept empty credentials', () => {
    // ":" -> Og==
    expect(basicAuth('', '')).toBe('Basic Og==');
  });

  it('should use the standard alphabet', () => {
    // "a:~~~" encodes with '+', which URL-safe base64 would turn into '-'
    expect(basicAuth('a', '~~~')).toBe('Basic YTp+fn4=');
  });
});

describe('AUTHORIZATION', () => {
  it('should be lower-case', () => {
    expect(AUTHORIZATION).toBe('authorization');
  });
});

describe('mergeHeaders', () => {
  const defaults = { Accept: 'application/json', 'User-Agent': 'agent/1.0' };

  it('should keep defaults when no overrides are given', () => {
    expect(mergeHeaders(defaults)).toEqual({
      accept: 'application/json',
      'user-agent': 'agent/1.0',
    });
  });

  it('should override defaults case-insensitively', () => {
    expect(mergeHeaders(defaults, { ACCEPT: 'text/plain' })).toEqual({
      accept: 'text/plain',
      'user-agent': 'agent/1.0',
    });
  });

  it('should add headers that have no default', () => {
    expect(mergeHeaders(defaults, { Authorization: bearerAuth('t') })).toEqual({
      accept: 'application/json',
      'user-agent': 'agent/1.0',
      authorization: 'Bearer t',
    });
  });
});

describe('normalizeHeaders', () => {
  it('should lower-case names and let later duplicates win', () => {
    expect(normalizeHeaders({ 'X-Trace': '1', 'x-trace': '2' })).toEqual({ 'x-trace': '2' });
  });
});
