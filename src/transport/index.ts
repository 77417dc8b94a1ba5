/**
 * HTTP transports.
 * @module transport
 */

export type {
  AsyncHttpTransport,
  ExchangeFailure,
  HttpMethod,
  HttpTransport,
  JsonValue,
  PreparedRequest,
  RawExchange,
  RequestPayload,
  SyncHttpTransport,
} from './types.js';
export {
  applyQueryParams,
  buildHeaders,
  defaultHeaders,
  encodeFormBody,
  encodeJsonBody,
  parseTargetUrl,
  prepareRequest,
} from './request.js';
export { classifyExchange, classifyFailure, describeFailure } from './response.js';
export { FetchTransport, type FetchTransportOptions } from './fetch-transport.js';
export { BlockingTransport, decodeWorkerReply, type BlockingTransportOptions } from './blocking-transport.js';
export {
  createTransport,
  createTransportFromEnv,
  type AnyTransport,
  type CreateTransportOptions,
  type TransportByBackend,
} from './factory.js';
export {
  MockBlockingTransport,
  MockTransport,
  type MockResponse,
  type RecordedRequest,
} from './mock.js';
export { parseJsonBody } from './decode.js';
