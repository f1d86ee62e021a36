/**
 * Tests for object operations.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ObjectHeaders } from '../../headers/index.js';
import { Account } from '../../account/index.js';
import type { Container } from '../../container/index.js';
import { AuthenticatedBackend, DEFAULT_USER_AGENT } from '../../backend/index.js';
import { StaticTokenProvider } from '../../auth/index.js';
import type { HttpTransport } from '../../transport/index.js';
import {
  ChecksumMismatchError,
  DownloadConsumedError,
  InvalidNameError,
  MalformedHeaderError,
  UnexpectedStatusCodeError,
  isStatusCode,
} from '../../errors/index.js';
import {
  CountingBackend,
  InMemorySwiftTransport,
  MockTransport,
  simulatedBackend,
  toStreamingResponse,
} from '../../simulation/index.js';
import { md5Hex } from '../index.js';

const STORAGE_URL = 'https://swift.example.com/v1/AUTH_test';
const NOW = new Date('2024-01-02T03:04:05.678Z');

function accountOn(transport: HttpTransport): Account {
  const provider = new StaticTokenProvider(STORAGE_URL, 'test-token');
  return Account.fromBackend(new AuthenticatedBackend(STORAGE_URL, provider, transport));
}

async function* chunks(...parts: string[]): AsyncGenerator<Uint8Array> {
  for (const part of parts) {
    yield Buffer.from(part, 'utf8');
  }
}

describe('SwiftObject upload request', () => {
  let transport: MockTransport;
  let account: Account;

  beforeEach(() => {
    transport = new MockTransport();
    account = accountOn(transport);
  });

  it('should send length and checksum for byte arrays', async () => {
    transport.respond('PUT', '/c/o', { status: 201, headers: { Etag: 'e8dc4081b13434b45189a720b77b6818' } });

    await account.container('c').object('o').upload(Buffer.from('abcdefgh'));

    const calls = transport.getCalls();
    expect(calls).toHaveLength(1);
    expect(calls[0]?.url).toBe('https://swift.example.com/v1/AUTH_test/c/o');
    expect(calls[0]?.headers).toEqual({
      'Content-Length': '8',
      Etag: 'e8dc4081b13434b45189a720b77b6818',
      'User-Agent': DEFAULT_USER_AGENT,
      'X-Auth-Token': 'test-token',
    });
    expect(calls[0]?.body.toString()).toBe('abcdefgh');
  });

  it('should keep caller headers', async () => {
    transport.respond('PUT', '/c/o', { status: 201 });

    await account.container('c').object('o').upload('x', {
      headers: { 'Content-Type': 'text/plain', Etag: 'custom' },
    });

    expect(transport.getCalls()[0]?.headers).toMatchObject({
      'Content-Type': 'text/plain',
      Etag: 'custom',
      'Content-Length': '1',
    });
  });

  it('should stream without length and verify the returned Etag', async () => {
    transport.respond('PUT', '/c/o', {
      status: 201,
      headers: { Etag: '"e80b5017098950fc58aad83c8c14978e"' },
    });

    await account.container('c').object('o').upload(chunks('abc', 'def'));

    const call = transport.getCalls()[0];
    expect(call?.headers).toEqual({ 'User-Agent': DEFAULT_USER_AGENT, 'X-Auth-Token': 'test-token' });
    expect(call?.body.toString()).toBe('abcdef');
  });

  it('should fail when the server checksum differs from the streamed data', async () => {
    transport.respond('PUT', '/c/o', { status: 201, headers: { Etag: 'deadbeef' } });

    const error = await account
      .container('c')
      .object('o')
      .upload(chunks('abc', 'def'))
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ChecksumMismatchError);
    expect(error).toHaveProperty('expectedEtag', 'e80b5017098950fc58aad83c8c14978e');
    expect(error).toHaveProperty('actualEtag', 'deadbeef');
  });

  it('should trust a caller Etag on streamed uploads', async () => {
    transport.respond('PUT', '/c/o', { status: 201, headers: { Etag: 'server-etag' } });

    await expect(
      account.container('c').object('o').upload(chunks('abc'), { headers: { Etag: 'caller-etag' } })
    ).resolves.toBeUndefined();
  });

  it('should reject downloads with malformed headers', async () => {
    transport.respond('GET', '/c/o', { status: 200, headers: { 'Content-Length': 'abc' }, body: 'data' });

    await expect(account.container('c').object('o').download()).rejects.toThrow(MalformedHeaderError);
  });
});

describe('SwiftObject', () => {
  let server: InMemorySwiftTransport;
  let backend: CountingBackend;
  let account: Account;
  let container: Container;

  beforeEach(async () => {
    server = new InMemorySwiftTransport({ now: () => NOW });
    backend = new CountingBackend(await simulatedBackend(server));
    account = Account.fromBackend(backend);
    container = account.container('docs');
    await container.create();
  });

  describe('headers', () => {
    it('should describe the uploaded content', async () => {
      const object = container.object('note.txt');
      await object.upload('hello');

      const headers = await object.headers();

      expect(headers.sizeBytes.get()).toBe(5n);
      expect(headers.etag.get()).toBe('5d41402abc4b2a76b9719d911017c592');
      expect(headers.contentType.get()).toBe('application/octet-stream');
      expect(headers.updatedAt.get()?.toISOString()).toBe('2024-01-02T03:04:05.000Z');
      expect(headers.createdAt.exists()).toBe(true);
    });

    it('should fetch once and refetch after invalidate', async () => {
      const object = container.object('note.txt');
      await object.upload('hello');
      backend.reset();

      await object.headers();
      await object.headers();
      expect(backend.count).toBe(1);

      object.invalidate();
      await object.headers();
      expect(backend.count).toBe(2);
    });

    it('should return copies of the cache', async () => {
      const object = container.object('note.txt');
      await object.upload('hello');

      const first = await object.headers();
      first.metadata.set('scratch', 'yes');

      const second = await object.headers();
      expect(second.metadata.exists('scratch')).toBe(false);
    });

    it('should refetch after an upload through the same handle', async () => {
      const object = container.object('note.txt');
      await object.upload('hello');
      expect((await object.headers()).sizeBytes.get()).toBe(5n);

      await object.upload('bye');
      expect((await object.headers()).sizeBytes.get()).toBe(3n);
    });
  });

  describe('exists', () => {
    it('should map 404 to false', async () => {
      expect(await container.object('missing').exists()).toBe(false);

      await container.object('present').upload('x');
      expect(await container.object('present').exists()).toBe(true);
    });

    it('should propagate other errors', async () => {
      server.rejectNextRequests(2);

      const error = await container.object('any').exists().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(UnexpectedStatusCodeError);
      expect(isStatusCode(error, 401)).toBe(true);
    });
  });

  describe('upload', () => {
    it('should store metadata and expiry from options', async () => {
      const object = container.object('report.csv');
      await object.upload('a,b\n', {
        headers: { 'Content-Type': 'text/csv', 'X-Object-Meta-Owner': 'alice', 'X-Delete-After': '60' },
      });

      const headers = await object.headers();
      expect(headers.contentType.get()).toBe('text/csv');
      expect(headers.metadata.get('owner')).toBe('alice');
      expect(headers.expiresAt.get()?.toISOString()).toBe('2024-01-02T03:05:05.000Z');
    });

    it('should let the server reject a wrong caller Etag', async () => {
      await expect(
        container.object('note.txt').upload('hello', { headers: { Etag: '00000000000000000000000000000000' } })
      ).rejects.toThrow('expected 201 response, got 422 instead: Unprocessable Entity');
    });

    it('should store empty content for null', async () => {
      const object = container.object('empty');
      await object.upload(null);

      const headers = await object.headers();
      expect(headers.sizeBytes.get()).toBe(0n);
      expect(headers.etag.get()).toBe('d41d8cd98f00b204e9800998ecf8427e');
    });

    it('should report names the server rejects', async () => {
      const error = await container
        .object('x'.repeat(1025))
        .upload('a')
        .catch((e: unknown) => e);
      expect(isStatusCode(error, 400)).toBe(true);
    });
  });

  describe('uploadWithWriter', () => {
    it('should upload everything the producer writes', async () => {
      const object = container.object('generated.txt');

      await object.uploadWithWriter(undefined, async (writer) => {
        await writer.write('part1-');
        await writer.write(Buffer.from('part2'));
      });

      const download = await object.download();
      expect(await download.asString()).toBe('part1-part2');
      expect(download.headers.etag.get()).toBe(md5Hex(Buffer.from('part1-part2')));
    });

    it('should report the producer error and store nothing', async () => {
      const object = container.object('generated.txt');

      await expect(
        object.uploadWithWriter(undefined, async (writer) => {
          await writer.write('partial');
          throw new Error('generator failed');
        })
      ).rejects.toThrow('generator failed');
      expect(await object.exists()).toBe(false);
    });

    it('should report a missing container', async () => {
      await expect(
        account.container('nowhere').object('o').uploadWithWriter(undefined, async (writer) => {
          await writer.write('data');
        })
      ).rejects.toThrow('expected 201 response, got 404 instead: Not Found');
    });

    it('should fail pending writes when the request fails', async () => {
      const failing: HttpTransport = {
        send: async () => toStreamingResponse({ status: 500, body: 'boom' }),
      };
      const object = accountOn(failing).container('c').object('o');
      let writeError: unknown;

      await expect(
        object.uploadWithWriter(undefined, async (writer) => {
          try {
            for (let i = 0; i < 100; i++) {
              await writer.write('chunk');
            }
          } catch (error) {
            writeError = error;
            throw error;
          }
        })
      ).rejects.toThrow('expected 201 response, got 500 instead: boom');
      expect(writeError).toBeInstanceOf(UnexpectedStatusCodeError);
    });
  });

  describe('update', () => {
    it('should replace metadata', async () => {
      const object = container.object('note.txt');
      await object.upload('hello', { headers: { 'X-Object-Meta-Old': '1' } });

      const headers = new ObjectHeaders();
      headers.metadata.set('color', 'blue');
      headers.expiresAt.set(new Date('2030-01-01T00:00:00Z'));
      await object.update(headers);

      const updated = await object.headers();
      expect(updated.metadata.get('color')).toBe('blue');
      expect(updated.metadata.exists('old')).toBe(false);
      expect(updated.expiresAt.get()?.toISOString()).toBe('2030-01-01T00:00:00.000Z');
    });
  });

  describe('download', () => {
    it('should return content once', async () => {
      const object = container.object('note.txt');
      await object.upload('hello');

      const download = await object.download();
      expect(download.objectName).toBe('docs/note.txt');
      expect(await download.asString()).toBe('hello');
      await expect(download.asBuffer()).rejects.toBeInstanceOf(DownloadConsumedError);
    });

    it('should fill the header cache', async () => {
      const object = container.object('note.txt');
      await object.upload('hello');
      const download = await object.download();
      await download.discard();
      backend.reset();

      const headers = await object.headers();
      expect(headers.sizeBytes.get()).toBe(5n);
      expect(backend.count).toBe(0);
    });

    it('should fail for missing objects', async () => {
      const error = await container.object('missing').download().catch((e: unknown) => e);
      expect(isStatusCode(error, 404)).toBe(true);
    });
  });

  describe('delete', () => {
    it('should remove the object and invalidate the cache', async () => {
      const object = container.object('note.txt');
      await object.upload('hello');
      await object.headers();

      await object.delete();

      expect(await object.exists()).toBe(false);
    });

    it('should fail for missing objects', async () => {
      await expect(container.object('missing').delete()).rejects.toThrow(
        'expected 204 response, got 404 instead: Not Found'
      );
    });

    it('should refuse names that resolve to another resource', async () => {
      const victim = await account.container('victim').ensureExists();
      const sent = server.requests.length;

      await expect(container.object('../victim').delete()).rejects.toBeInstanceOf(InvalidNameError);

      expect(server.requests.length).toBe(sent);
      expect(await victim.exists()).toBe(true);
    });
  });

  describe('copyTo', () => {
    it('should produce an identical object', async () => {
      const source = container.object('note.txt');
      await source.upload('copy me', { headers: { 'X-Object-Meta-Origin': 'upload' } });
      const archive = account.container('archive');
      await archive.create();
      const target = archive.object('note copy.txt');

      await source.copyTo(target);

      const copyRequest = server.requests.find((r) => r.method === 'COPY');
      expect(copyRequest?.headers['Destination']).toBe('archive/note%20copy.txt');
      expect(copyRequest?.headers['Destination-Account']).toBeUndefined();

      const download = await target.download();
      expect(await download.asString()).toBe('copy me');
      expect(download.headers.etag.get()).toBe('56fe0b1409a5662d70cfedc4555d4771');
      expect(download.headers.etag.get()).toBe((await source.headers()).etag.get());
      expect(download.headers.metadata.get('origin')).toBe('upload');
    });

    it('should drop metadata with X-Fresh-Metadata', async () => {
      const source = container.object('note.txt');
      await source.upload('copy me', { headers: { 'X-Object-Meta-Origin': 'upload' } });
      const target = container.object('fresh.txt');

      await source.copyTo(target, { headers: { 'X-Fresh-Metadata': 'true' } });

      expect((await target.headers()).metadata.keys()).toEqual([]);
    });

    it('should copy to another account', async () => {
      const source = container.object('note.txt');
      await source.upload('shared');
      const other = account.switchAccount('AUTH_other');
      await other.container('inbox').create();
      const target = other.container('inbox').object('note.txt');

      await source.copyTo(target);

      const copyRequest = server.requests.find((r) => r.method === 'COPY');
      expect(copyRequest?.headers['Destination-Account']).toBe('AUTH_other');
      expect(await (await target.download()).asString()).toBe('shared');
    });

    it('should refuse targets with dot segments', async () => {
      const source = container.object('a.txt');
      await source.upload('x');

      await expect(source.copyTo(container.object('sub/../b.txt'))).rejects.toBeInstanceOf(InvalidNameError);
      expect(server.requests.some((r) => r.method === 'COPY')).toBe(false);
    });

    it('should invalidate the target cache', async () => {
      const source = container.object('a.txt');
      const target = container.object('b.txt');
      await source.upload('new content');
      await target.upload('old');
      await target.headers();

      await source.copyTo(target);

      expect((await target.headers()).sizeBytes.get()).toBe(11n);
    });
  });

  describe('moveTo', () => {
    it('should copy and delete the source', async () => {
      const source = container.object('draft.txt');
      await source.upload('final text');
      const target = container.object('final.txt');

      await source.moveTo(target);

      expect(await source.exists()).toBe(false);
      expect(await (await target.download()).asString()).toBe('final text');
    });

    it('should keep the source when the copy fails', async () => {
      const source = container.object('draft.txt');
      await source.upload('text');

      await expect(source.moveTo(account.container('missing').object('x'))).rejects.toThrow(
        'expected 201 response, got 404 instead'
      );
      expect(await source.exists()).toBe(true);
    });

    it('should leave both objects when the delete fails', async () => {
      const source = container.object('draft.txt');
      await source.upload('text');
      const failingDeletes: HttpTransport = {
        send: (request) =>
          request.method === 'DELETE'
            ? Promise.resolve(toStreamingResponse({ status: 503, body: 'Service Unavailable' }))
            : server.send(request),
      };
      const flaky = Account.fromBackend(
        new AuthenticatedBackend(
          server.storageUrl(),
          new StaticTokenProvider(server.storageUrl(), server.token),
          failingDeletes
        )
      );

      const error = await flaky
        .container('docs')
        .object('draft.txt')
        .moveTo(flaky.container('docs').object('final.txt'))
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(UnexpectedStatusCodeError);
      expect(error).toHaveProperty('message', 'expected 204 response, got 503 instead: Service Unavailable');
      expect(await source.exists()).toBe(true);
      expect(await (await container.object('final.txt').download()).asString()).toBe('text');
    });
  });
});
