/**
 * HTTP transport layer for the Swift client
 */

export type {
  RequestBody,
  HttpRequest,
  StreamingHttpResponse,
  HttpTransport,
} from './types.js';

export {
  isReplayableBody,
  getHeader,
  readBody,
  readBodyText,
  drainBody,
  bodyFromBytes,
  emptyBody,
} from './types.js';

export {
  FetchTransport,
  type FetchTransportOptions,
  createFetchTransport,
} from './fetch-transport.js';
