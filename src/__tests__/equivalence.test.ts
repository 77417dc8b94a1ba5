/**
 * Both backends must produce the same outcome for the same exchange.
 */

import {
  BlockingTransport,
  FetchTransport,
  TransportConfigBuilder,
  type ClientResult,
  type FormFields,
  type JsonValue,
} from '../index.js';
import { startMockServer, UNREACHABLE_URL, type MockServer } from './helpers/mock-server.js';

type Outcome = { ok: string } | { err: Record<string, unknown> };

function outcome(result: ClientResult<string>): Outcome {
  return result.match<Outcome>(
    (value) => ({ ok: value }),
    (error) => ({ err: { ...error.toJSON(), kind: error.constructor.name, cause: error.cause } })
  );
}

type Call =
  | { op: 'get' | 'post' | 'put' | 'delete'; path: string; payload: JsonValue }
  | { op: 'postForm'; path: string; payload: FormFields };

const calls: Call[] = [
  { op: 'get', path: '/text', payload: null },
  { op: 'get', path: '/status/418', payload: null },
  { op: 'post', path: '/status/502', payload: { retry: true } },
  { op: 'get', path: '/rate-limited', payload: null },
  { op: 'get', path: '/auth/expired', payload: null },
  { op: 'postForm', path: '/oauth/invalid-client', payload: { grant_type: 'client_credentials' } },
  { op: 'postForm', path: '/oauth/invalid-request', payload: {} },
  { op: 'put', path: '/binary', payload: [1, 2] },
  { op: 'delete', path: '/large', payload: null },
  { op: 'get', path: '/echo', payload: { nested: { a: 1 } } },
  { op: 'get', path: '::not-a-url', payload: null },
  { op: 'get', path: UNREACHABLE_URL, payload: null },
];

describe('backend equivalence', () => {
  let server: MockServer;
  const builder = () => new TransportConfigBuilder().withMaxResponseBytes(1024).withTimeout(2000);
  const fetchTransport = new FetchTransport(builder().withBackend('fetch').build());
  const blockingTransport = new BlockingTransport(builder().withBackend('blocking').build());

  function target(path: string): string {
    return path.startsWith('/') ? server.url(path) : path;
  }

  async function viaFetch(call: Call): Promise<ClientResult<string>> {
    const url = target(call.path);
    switch (call.op) {
      case 'get':
        return fetchTransport.get(url, undefined, call.payload);
      case 'post':
        return fetchTransport.post(url, undefined, call.payload);
      case 'postForm':
        return fetchTransport.postForm(url, undefined, call.payload);
      case 'put':
        return fetchTransport.put(url, undefined, call.payload);
      case 'delete':
        return fetchTransport.delete(url, undefined, call.payload);
    }
  }

  function viaBlocking(call: Call): ClientResult<string> {
    const url = target(call.path);
    switch (call.op) {
      case 'get':
        return blockingTransport.get(url, undefined, call.payload);
      case 'post':
        return blockingTransport.post(url, undefined, call.payload);
      case 'postForm':
        return blockingTransport.postForm(url, undefined, call.payload);
      case 'put':
        return blockingTransport.put(url, undefined, call.payload);
      case 'delete':
        return blockingTransport.delete(url, undefined, call.payload);
    }
  }

  beforeAll(async () => {
    server = await startMockServer();
  });

  afterAll(async () => {
    await blockingTransport.close();
    await server.close();
  });

  it.each(calls)('should agree on $op $path', async (call) => {
    const fromFetch = outcome(await viaFetch(call));
    const fromBlocking = outcome(viaBlocking(call));

    expect(fromBlocking).toEqual(fromFetch);
  });

  it('should agree on the echoed request', async () => {
    const headers = { 'X-Trace': 'equivalence' };
    const payload: FormFields = { a: '1', b: 'two words' };

    const fromFetch = (await fetchTransport.postForm(server.url('/echo'), headers, payload))._unsafeUnwrap();
    const fromBlocking = blockingTransport.postForm(server.url('/echo'), headers, payload)._unsafeUnwrap();

    expect(JSON.parse(fromBlocking)).toEqual(JSON.parse(fromFetch));
  });
});
