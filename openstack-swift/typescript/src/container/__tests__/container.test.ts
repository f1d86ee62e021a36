/**
 * Tests for container operations.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ContainerHeaders } from '../../headers/index.js';
import { Account } from '../../account/index.js';
import { AuthenticatedBackend } from '../../backend/index.js';
import { StaticTokenProvider } from '../../auth/index.js';
import { MalformedHeaderError, isStatusCode } from '../../errors/index.js';
import { InMemorySwiftTransport, MockTransport, simulatedAccount } from '../../simulation/index.js';

describe('Container', () => {
  let server: InMemorySwiftTransport;
  let account: Account;

  beforeEach(async () => {
    server = new InMemorySwiftTransport();
    account = await simulatedAccount(server);
  });

  function putRequests(): number {
    return server.requests.filter((r) => r.method === 'PUT').length;
  }

  it('should accept creating an existing container', async () => {
    const container = account.container('photos');

    await container.create();
    await container.create();

    expect(await container.exists()).toBe(true);
    expect(putRequests()).toBe(2);
  });

  it('should create only missing containers in ensureExists', async () => {
    const container = account.container('photos');

    expect(await container.ensureExists()).toBe(container);
    await account.container('photos').ensureExists();

    expect(putRequests()).toBe(1);
  });

  it('should report missing containers', async () => {
    expect(await account.container('missing').exists()).toBe(false);
  });

  it('should count objects and bytes', async () => {
    const container = await account.container('photos').ensureExists();
    await container.object('a.jpg').upload('1234');
    await container.object('b.jpg').upload('56');

    const headers = await container.headers();

    expect(headers.objectCount.get()).toBe(2n);
    expect(headers.bytesUsed.get()).toBe(6n);
  });

  it('should pass headers on create', async () => {
    const container = account.container('public');
    await container.create({ headers: { 'X-Container-Read': '.r:*', 'X-Container-Meta-Team': 'web' } });

    const headers = await container.headers();
    expect(headers.readAcl.get()).toBe('.r:*');
    expect(headers.metadata.get('team')).toBe('web');
  });

  it('should update ACLs and metadata', async () => {
    const container = await account.container('photos').ensureExists();

    const update = new ContainerHeaders();
    update.readAcl.set('.r:*');
    update.metadata.set('Owner', 'alice');
    update.objectCountQuota.set(100);
    await container.update(update);

    const headers = await container.headers();
    expect(headers.readAcl.get()).toBe('.r:*');
    expect(headers.metadata.get('owner')).toBe('alice');
    expect(headers.objectCountQuota.get()).toBe(100n);
  });

  it('should remove cleared metadata', async () => {
    const container = account.container('photos');
    await container.create({ headers: { 'X-Container-Meta-Owner': 'alice' } });

    const update = new ContainerHeaders();
    update.metadata.clear('owner');
    await container.update(update);

    expect((await container.headers()).metadata.exists('owner')).toBe(false);
  });

  it('should refuse to delete a container with objects', async () => {
    const container = await account.container('photos').ensureExists();
    await container.object('a.jpg').upload('1');

    const error = await container.delete().catch((e: unknown) => e);

    expect(isStatusCode(error, 409)).toBe(true);
    expect(await container.exists()).toBe(true);
  });

  it('should delete empty containers', async () => {
    const container = await account.container('photos').ensureExists();
    await container.headers();

    await container.delete();

    expect(await container.exists()).toBe(false);
  });

  it('should fail to delete missing containers', async () => {
    await expect(account.container('missing').delete()).rejects.toThrow(
      'expected 204 response, got 404 instead: Not Found'
    );
  });

  it('should validate response headers', async () => {
    const transport = new MockTransport().respond('HEAD', '/photos', {
      status: 204,
      headers: { 'X-Container-Object-Count': 'many' },
    });
    const storageUrl = 'https://swift.example.com/v1/AUTH_test';
    const mocked = Account.fromBackend(
      new AuthenticatedBackend(storageUrl, new StaticTokenProvider(storageUrl, 'test-token'), transport)
    );

    const error = await mocked.container('photos').headers().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(MalformedHeaderError);
    expect(error).toHaveProperty(
      'message',
      'Bad header X-Container-Object-Count: expected unsigned integer, got "many"'
    );
  });
});
