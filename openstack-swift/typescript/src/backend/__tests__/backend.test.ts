/**
 * Tests for token providers and the authenticated backend.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { AuthenticatedBackend, DEFAULT_USER_AGENT } from '../index.js';
import { SecretString, StaticTokenProvider, V1AuthTokenProvider } from '../../auth/index.js';
import { Account } from '../../account/index.js';
import { AuthenticationError } from '../../errors/index.js';
import { InMemoryLogger } from '../../observability/index.js';
import { InMemorySwiftTransport } from '../../simulation/index.js';

describe('SecretString', () => {
  it('should hide the value', () => {
    const secret = new SecretString('test-secret');
    expect(String(secret)).toBe('***');
    expect(JSON.stringify({ key: secret })).toBe('{"key":"***"}');
    expect(secret.expose()).toBe('test-secret');
  });
});

describe('V1AuthTokenProvider', () => {
  let server: InMemorySwiftTransport;

  beforeEach(() => {
    server = new InMemorySwiftTransport();
  });

  it('should authenticate once and cache the token', async () => {
    const provider = new V1AuthTokenProvider(server.authUrl, 'test:tester', 'test-secret', server);

    const first = await provider.getToken();
    const second = await provider.getToken();

    expect(first).toEqual({
      token: 'test-token-1',
      storageUrl: 'https://swift.example.com/v1/AUTH_test',
    });
    expect(second).toEqual(first);
    expect(server.authRequestCount).toBe(1);
  });

  it('should share a concurrent authentication', async () => {
    const provider = new V1AuthTokenProvider(server.authUrl, 'test:tester', 'test-secret', server);

    const [a, b] = await Promise.all([provider.getToken(), provider.getToken()]);

    expect(a.token).toBe('test-token-1');
    expect(b.token).toBe('test-token-1');
    expect(server.authRequestCount).toBe(1);
  });

  it('should send the credentials as headers', async () => {
    const provider = new V1AuthTokenProvider(server.authUrl, 'test:tester', 'test-secret', server);
    await provider.getToken();

    expect(server.requests[0]?.headers).toEqual({
      'X-Auth-User': 'test:tester',
      'X-Auth-Key': 'test-secret',
    });
  });

  it('should fail on rejected credentials', async () => {
    const provider = new V1AuthTokenProvider(server.authUrl, 'test:tester', 'wrong-secret', server);

    const error = await provider.getToken().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AuthenticationError);
    expect(error).toHaveProperty(
      'message',
      'authentication at https://swift.example.com/auth/v1.0 failed with status 401'
    );
  });

  it('should only reauthenticate for the current token', async () => {
    const provider = new V1AuthTokenProvider(server.authUrl, 'test:tester', 'test-secret', server);
    await provider.getToken();

    const unchanged = await provider.reauthenticate('some-older-token');
    expect(unchanged.token).toBe('test-token-1');
    expect(server.authRequestCount).toBe(1);

    const refreshed = await provider.reauthenticate('test-token-1');
    expect(refreshed.token).toBe('test-token-2');
    expect(server.authRequestCount).toBe(2);
  });
});

describe('AuthenticatedBackend', () => {
  let server: InMemorySwiftTransport;
  let logger: InMemoryLogger;
  let account: Account;

  beforeEach(async () => {
    server = new InMemorySwiftTransport();
    logger = new InMemoryLogger();
    const provider = new V1AuthTokenProvider(server.authUrl, 'test:tester', 'test-secret', server);
    const backend = await AuthenticatedBackend.create(provider, server, { logger });
    account = Account.fromBackend(backend);
  });

  function storageRequests(): number {
    return server.requests.filter((r) => r.url.startsWith(server.storageUrl())).length;
  }

  it('should bind to the storage URL from authentication', () => {
    expect(account.backend.endpointUrl()).toBe('https://swift.example.com/v1/AUTH_test');
    expect(account.name).toBe('AUTH_test');
  });

  it('should attach token and user agent', async () => {
    await account.headers();

    const last = server.requests[server.requests.length - 1];
    expect(last?.headers['X-Auth-Token']).toBe('test-token-1');
    expect(last?.headers['User-Agent']).toBe(DEFAULT_USER_AGENT);
  });

  it('should reauthenticate and retry once after 401', async () => {
    server.expireTokens();

    const headers = await account.headers();

    expect(headers.containerCount.get()).toBe(0n);
    expect(server.authRequestCount).toBe(2);
    expect(storageRequests()).toBe(2);
    expect(logger.getLogsByLevel('warn').map((e) => e.message)).toEqual([
      'auth token rejected, reauthenticating',
    ]);
  });

  it('should return a second 401 to the caller', async () => {
    server.rejectNextRequests(2);

    await expect(account.headers()).rejects.toThrow(
      'expected 200/204 response, got 401 instead: Unauthorized'
    );
    expect(server.authRequestCount).toBe(2);
    expect(storageRequests()).toBe(2);
  });

  it('should retry requests with a byte array body', async () => {
    const container = account.container('docs');
    await container.create();
    server.rejectNextRequests(1);

    await container.object('note.txt').upload('hello');

    const download = await container.object('note.txt').download();
    expect(await download.asString()).toBe('hello');
  });

  it('should not resend a streamed body', async () => {
    const container = account.container('docs');
    await container.create();
    server.rejectNextRequests(1);

    async function* content(): AsyncGenerator<Uint8Array> {
      yield Buffer.from('streamed');
    }

    await expect(container.object('note.txt').upload(content())).rejects.toThrow(
      'expected 201 response, got 401 instead'
    );
    expect(server.authRequestCount).toBe(2);
    expect(await container.object('note.txt').exists()).toBe(false);
    expect(logger.getLogsByLevel('warn').map((e) => e.message)).toEqual([
      'auth token rejected, reauthenticating',
      'request body is not replayable, returning 401',
    ]);
  });

  it('should keep the credentials when cloned', async () => {
    const other = account.switchAccount('AUTH_other');
    await other.container('shared').create();

    expect(await other.container('shared').exists()).toBe(true);
    expect(server.authRequestCount).toBe(1);
  });
});

describe('StaticTokenProvider', () => {
  it('should hand out the same token after rejection', async () => {
    const provider = new StaticTokenProvider('https://swift.example.com/v1/AUTH_test', 'test-token');

    const token = await provider.reauthenticate('test-token');

    expect(token).toEqual({ token: 'test-token', storageUrl: 'https://swift.example.com/v1/AUTH_test' });
  });
});
