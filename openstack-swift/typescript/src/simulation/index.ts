/**
 * Simulation Module
 *
 * Test doubles for the Swift client: a scripted transport, an in-process
 * Swift server and a request-counting backend.
 *
 * @module simulation
 */

export {
  MockTransport,
  type MockHandler,
  type MockResponse,
  type RecordedRequest,
  collectRequestBody,
  toStreamingResponse,
} from './mock-transport.js';
export {
  InMemorySwiftTransport,
  type InMemorySwiftOptions,
  MAX_OBJECT_NAME_LENGTH,
} from './swift-server.js';
export { CountingBackend } from './counting-backend.js';
export { buildTarArchive, readTarArchive, TarError, type TarEntry } from './tar.js';
export { simulatedAccount, simulatedBackend } from './fixtures.js';
