/**
 * OpenStack Swift client.
 *
 * @example
 * ```typescript
 * import { createAccountFromEnv } from 'openstack-swift';
 *
 * const account = await createAccountFromEnv();
 * const object = account.container('docs').object('readme.txt');
 * await object.upload('hello');
 * console.log(await (await object.download()).asString());
 * ```
 *
 * @packageDocumentation
 */

// Client
export { createAccount, createAccountFromEnv, type CreateAccountOptions } from './client/index.js';

// Configuration
export {
  SwiftConfig,
  SwiftConfigBuilder,
  DEFAULT_TIMEOUT,
  DEFAULT_LOG_LEVEL,
  createDefaultConfig,
  validateConfig,
  configFromEnv,
} from './config/index.js';

// Resources
export { Account, type Capabilities } from './account/index.js';
export { Container } from './container/index.js';
export {
  SwiftObject,
  UPLOAD_PIPE_CAPACITY,
  type ContentProducer,
  type UploadContent,
  BoundedPipe,
  type PipeWriter,
  DownloadedObject,
} from './object/index.js';
export {
  ContainerIterator,
  ObjectIterator,
  type ContainerInfo,
  type ObjectInfo,
} from './iterators/index.js';
export {
  BULK_DELETE_BATCH_SIZE,
  type ArchiveFormat,
  type BulkDeleteResult,
} from './bulk/index.js';

// Headers
export * from './headers/index.js';
export {
  type RequestOptions,
  encodePath,
  encodePathSegment,
  validateResourceNames,
} from './request/index.js';

// Errors
export * from './errors/index.js';

// Authentication and backend
export {
  SecretString,
  StaticTokenProvider,
  V1AuthTokenProvider,
  type AuthToken,
  type TokenProvider,
} from './auth/index.js';
export {
  AuthenticatedBackend,
  DEFAULT_USER_AGENT,
  type Backend,
  type AuthenticatedBackendOptions,
} from './backend/index.js';

// Transport
export {
  FetchTransport,
  createFetchTransport,
  type FetchTransportOptions,
  type HttpTransport,
  type HttpRequest,
  type StreamingHttpResponse,
  type RequestBody,
} from './transport/index.js';

// Observability
export {
  type Logger,
  type LogLevel,
  type LogEntry,
  LOG_LEVELS,
  ConsoleLogger,
  NoopLogger,
  InMemoryLogger,
} from './observability/index.js';
