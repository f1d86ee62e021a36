/**
 * Swift client factory.
 *
 * Wires configuration, transport, authentication and logging into an
 * {@link Account} handle.
 *
 * @module client
 */

import type { SwiftConfig } from '../config/index.js';
import { configFromEnv, validateConfig } from '../config/index.js';
import type { HttpTransport } from '../transport/index.js';
import { createFetchTransport } from '../transport/index.js';
import type { TokenProvider } from '../auth/index.js';
import { StaticTokenProvider, V1AuthTokenProvider } from '../auth/index.js';
import { AuthenticatedBackend } from '../backend/index.js';
import type { Logger } from '../observability/index.js';
import { ConsoleLogger } from '../observability/index.js';
import { Account } from '../account/index.js';
import { ConfigurationError } from '../errors/index.js';

/**
 * Overrides for the pieces {@link createAccount} would otherwise build from
 * the configuration.
 */
export interface CreateAccountOptions {
  /** HTTP transport. Defaults to a fetch transport using the configured timeout. */
  transport?: HttpTransport;
  /** Logger. Defaults to a console logger at the configured level. */
  logger?: Logger;
}

function createTokenProvider(config: SwiftConfig, transport: HttpTransport): TokenProvider {
  if (config.authUrl !== undefined && config.user !== undefined && config.key !== undefined) {
    return new V1AuthTokenProvider(config.authUrl, config.user, config.key, transport);
  }
  if (config.storageUrl !== undefined && config.token !== undefined) {
    return new StaticTokenProvider(config.storageUrl, config.token);
  }
  throw new ConfigurationError('no credentials configured', 'storageUrl');
}

/**
 * Authenticates and returns a handle for the account the credentials belong to.
 *
 * @example
 * ```typescript
 * const account = await createAccount(
 *   SwiftConfig.builder()
 *     .v1Auth('https://swift.example.com/auth/v1.0', 'test:tester', 'test-secret')
 *     .build()
 * );
 * const container = await account.container('photos').ensureExists();
 * ```
 */
export async function createAccount(
  config: SwiftConfig,
  options: CreateAccountOptions = {}
): Promise<Account> {
  validateConfig(config);

  const transport = options.transport ?? createFetchTransport(config.timeout);
  const logger = options.logger ?? new ConsoleLogger(config.logLevel, { component: 'swift' });
  const provider = createTokenProvider(config, transport);

  const backend = await AuthenticatedBackend.create(provider, transport, {
    userAgent: config.userAgent,
    logger,
  });
  logger.info('connected to swift account', { storageUrl: backend.endpointUrl() });

  return Account.fromBackend(backend);
}

/**
 * Creates an account handle from environment variables.
 * @see configFromEnv
 */
export async function createAccountFromEnv(options: CreateAccountOptions = {}): Promise<Account> {
  return createAccount(configFromEnv().build(), options);
}
