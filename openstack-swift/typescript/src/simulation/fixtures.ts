/**
 * Wiring helpers for tests against the in-process server.
 */

import { StaticTokenProvider } from '../auth/index.js';
import { AuthenticatedBackend, type Backend } from '../backend/index.js';
import { Account } from '../account/index.js';
import type { Logger } from '../observability/index.js';
import { InMemorySwiftTransport } from './swift-server.js';

/**
 * Creates a backend for the server's default account using its initial token.
 */
export async function simulatedBackend(
  server: InMemorySwiftTransport,
  logger?: Logger
): Promise<Backend> {
  return AuthenticatedBackend.create(
    new StaticTokenProvider(server.storageUrl(), server.token),
    server,
    { logger }
  );
}

/**
 * Creates an account handle for the server's default account.
 */
export async function simulatedAccount(
  server: InMemorySwiftTransport = new InMemorySwiftTransport()
): Promise<Account> {
  return Account.fromBackend(await simulatedBackend(server));
}
