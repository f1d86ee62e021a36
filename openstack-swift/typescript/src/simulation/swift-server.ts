/**
 * In-process Swift server for tests.
 */

import { gunzipSync } from 'node:zlib';
import type { HttpRequest, HttpTransport, StreamingHttpResponse } from '../transport/index.js';
import { Headers } from '../headers/index.js';
import { encodePath } from '../request/index.js';
import { md5Hex } from '../object/index.js';
import { collectRequestBody, toStreamingResponse, type MockResponse } from './mock-transport.js';
import { readTarArchive, TarError, type TarEntry } from './tar.js';

/**
 * Longest object name the server accepts, as in Swift's default config.
 */
export const MAX_OBJECT_NAME_LENGTH = 1024;

const DEFAULT_LISTING_LIMIT = 10000;

/**
 * Options for {@link InMemorySwiftTransport}.
 */
export interface InMemorySwiftOptions {
  /** Scheme and host of the simulated cluster. */
  origin?: string;
  /** Account served at the storage URL returned by v1 auth. */
  accountName?: string;
  /** User accepted by v1 auth. */
  user?: string;
  /** Key accepted by v1 auth. */
  key?: string;
  /** Token valid from the start, for pre-authorized access. */
  token?: string;
  /** Clock used for timestamps. */
  now?: () => Date;
}

interface StoredObject {
  content: Buffer;
  etag: string;
  headers: Headers;
  lastModified: Date;
  createdAt: Date;
}

interface StoredContainer {
  headers: Headers;
  objects: Map<string, StoredObject>;
  createdAt: Date;
}

interface StoredAccount {
  headers: Headers;
  containers: Map<string, StoredContainer>;
  createdAt: Date;
}

interface ParsedRequest {
  method: string;
  url: URL;
  headers: Headers;
  body: Buffer;
  accountName: string;
  containerName: string;
  objectName: string;
}

const CONTAINER_HEADERS = [
  'X-Container-Read',
  'X-Container-Write',
  'X-Container-Sync-Key',
  'X-Container-Sync-To',
  'X-Versions-Location',
  'X-History-Location',
  'X-Storage-Policy',
];

const OBJECT_HEADERS = ['Content-Type', 'Content-Disposition', 'Content-Encoding', 'X-Delete-At'];

function swiftTimestamp(date: Date): string {
  return (date.getTime() / 1000).toFixed(5);
}

function decodeSegments(path: string): string {
  return path.split('/').map((segment) => decodeURIComponent(segment)).join('/');
}

function listingTime(date: Date): string {
  return date.toISOString().replace('Z', '000');
}

function status(code: number, body = '', headers: Record<string, string> = {}): MockResponse {
  return { status: code, body, headers };
}

const REASONS: Record<number, string> = {
  200: 'OK',
  201: 'Created',
  400: 'Bad Request',
  404: 'Not Found',
  409: 'Conflict',
};

function statusLine(code: number): string {
  return `${code} ${REASONS[code] ?? ''}`.trim();
}

/**
 * Transport answering requests from an in-memory Swift cluster.
 *
 * Supports v1 auth at `<origin>/auth/v1.0`, `GET <origin>/info`, and below
 * `<origin>/v1/<account>/` account, container and object requests including
 * listings (prefix, marker, limit, JSON format), COPY, bulk delete and
 * archive extraction. Accounts come into existence on first use.
 */
export class InMemorySwiftTransport implements HttpTransport {
  readonly origin: string;
  readonly accountName: string;
  private readonly user: string;
  private readonly key: string;
  private readonly initialToken: string;
  private readonly now: () => Date;

  private readonly accounts = new Map<string, StoredAccount>();
  private validTokens = new Set<string>();
  private tokenCounter = 0;
  private forcedUnauthorized = 0;

  /** Requests received, including authentication requests. */
  readonly requests: Array<Pick<HttpRequest, 'method' | 'url' | 'headers'>> = [];

  constructor(options: InMemorySwiftOptions = {}) {
    this.origin = options.origin ?? 'https://swift.example.com';
    this.accountName = options.accountName ?? 'AUTH_test';
    this.user = options.user ?? 'test:tester';
    this.key = options.key ?? 'test-secret';
    this.initialToken = options.token ?? 'test-token';
    this.now = options.now ?? (() => new Date());
    this.validTokens.add(this.initialToken);
  }

  /** URL for v1 authentication. */
  get authUrl(): string {
    return `${this.origin}/auth/v1.0`;
  }

  /** Storage URL of the given account. */
  storageUrl(accountName = this.accountName): string {
    return `${this.origin}/v1/${encodeURIComponent(accountName)}`;
  }

  /** The token valid from the start. */
  get token(): string {
    return this.initialToken;
  }

  /** Invalidates every token issued so far. */
  expireTokens(): void {
    this.validTokens.clear();
  }

  /** Answers the next `count` storage requests with 401 regardless of token. */
  rejectNextRequests(count: number): void {
    this.forcedUnauthorized = count;
  }

  /** Number of v1 authentication requests received. */
  get authRequestCount(): number {
    return this.requests.filter((r) => r.url === this.authUrl).length;
  }

  async send(request: HttpRequest): Promise<StreamingHttpResponse> {
    this.requests.push({ method: request.method, url: request.url, headers: { ...request.headers } });
    const body = await collectRequestBody(request.body);
    const url = new URL(request.url);
    const headers = new Headers(request.headers);
    const response = this.route(request.method, url, headers, body);
    if (request.method === 'HEAD') {
      return toStreamingResponse({ ...response, body: '' });
    }
    return toStreamingResponse(response);
  }

  private route(method: string, url: URL, headers: Headers, body: Buffer): MockResponse {
    if (url.pathname === '/auth/v1.0') {
      return this.authenticate(headers);
    }
    if (url.pathname === '/info' && method === 'GET') {
      return this.info();
    }

    const match = /^\/v1\/([^/]+)\/?(.*)$/.exec(url.pathname);
    if (!match?.[1]) {
      return status(404, 'Not Found');
    }

    if (this.forcedUnauthorized > 0) {
      this.forcedUnauthorized--;
      return status(401, 'Unauthorized');
    }
    if (!this.validTokens.has(headers.get('X-Auth-Token') ?? '')) {
      return status(401, 'Unauthorized');
    }

    const rest = match[2] ?? '';
    const slash = rest.indexOf('/');
    const request: ParsedRequest = {
      method,
      url,
      headers,
      body,
      accountName: decodeURIComponent(match[1]),
      containerName: decodeURIComponent(slash < 0 ? rest : rest.slice(0, slash)),
      objectName: slash < 0 ? '' : decodeSegments(rest.slice(slash + 1)),
    };

    if (request.containerName === '') {
      return this.handleAccount(request);
    }
    if (request.objectName === '') {
      return this.handleContainer(request);
    }
    return this.handleObject(request);
  }

  private authenticate(headers: Headers): MockResponse {
    if (headers.get('X-Auth-User') !== this.user || headers.get('X-Auth-Key') !== this.key) {
      return status(401, 'Unauthorized');
    }
    this.tokenCounter++;
    const token = `${this.initialToken}-${this.tokenCounter}`;
    this.validTokens.add(token);
    return status(200, '', {
      'X-Auth-Token': token,
      'X-Storage-Url': this.storageUrl(),
    });
  }

  private info(): MockResponse {
    const capabilities = {
      swift: {
        version: '2.30.0',
        max_file_size: 5368709122,
        max_object_name_length: MAX_OBJECT_NAME_LENGTH,
        container_listing_limit: DEFAULT_LISTING_LIMIT,
      },
      bulk_delete: { max_deletes_per_request: 10000, max_failed_deletes: 1000 },
      bulk_upload: { max_containers_per_extraction: 10000, max_failed_extractions: 1000 },
      tempurl: { methods: ['GET', 'HEAD', 'PUT', 'POST', 'DELETE'] },
    };
    return status(200, JSON.stringify(capabilities), { 'Content-Type': 'application/json' });
  }

  private account(name: string): StoredAccount {
    let account = this.accounts.get(name);
    if (!account) {
      account = { headers: new Headers(), containers: new Map(), createdAt: this.now() };
      this.accounts.set(name, account);
    }
    return account;
  }

  // ---------------------------------------------------------------------------
  // Accounts
  // ---------------------------------------------------------------------------

  private handleAccount(request: ParsedRequest): MockResponse {
    const account = this.account(request.accountName);
    switch (request.method) {
      case 'GET':
      case 'HEAD': {
        const headers = this.accountHeaders(account);
        if (request.method === 'HEAD') {
          return status(204, '', headers);
        }
        const entries = [...account.containers.entries()].map(([name, container]) => ({
          name,
          record: {
            name,
            count: container.objects.size,
            bytes: bytesUsed(container),
            last_modified: listingTime(container.createdAt),
          },
        }));
        return listing(request.url, entries, headers);
      }
      case 'POST':
        if (request.url.searchParams.has('bulk-delete')) {
          return this.bulkDelete(account, request.body);
        }
        applyMetadata(account.headers, request.headers, 'X-Account-Meta-', []);
        return status(204);
      case 'PUT':
        if (request.url.searchParams.has('extract-archive')) {
          return this.extractArchive(account, '', request);
        }
        return status(405, 'Method Not Allowed');
      default:
        return status(405, 'Method Not Allowed');
    }
  }

  private accountHeaders(account: StoredAccount): Record<string, string> {
    let objects = 0;
    let bytes = 0;
    for (const container of account.containers.values()) {
      objects += container.objects.size;
      bytes += bytesUsed(container);
    }
    return {
      ...account.headers.toRecord(),
      'X-Account-Container-Count': String(account.containers.size),
      'X-Account-Object-Count': String(objects),
      'X-Account-Bytes-Used': String(bytes),
      'X-Timestamp': swiftTimestamp(account.createdAt),
    };
  }

  // ---------------------------------------------------------------------------
  // Containers
  // ---------------------------------------------------------------------------

  private handleContainer(request: ParsedRequest): MockResponse {
    const account = this.account(request.accountName);
    const container = account.containers.get(request.containerName);

    if (request.method === 'PUT') {
      if (request.url.searchParams.has('extract-archive')) {
        return this.extractArchive(account, request.containerName, request);
      }
      if (container) {
        applyMetadata(container.headers, request.headers, 'X-Container-Meta-', CONTAINER_HEADERS);
        return status(202, 'Accepted');
      }
      const created: StoredContainer = {
        headers: new Headers(),
        objects: new Map(),
        createdAt: this.now(),
      };
      applyMetadata(created.headers, request.headers, 'X-Container-Meta-', CONTAINER_HEADERS);
      account.containers.set(request.containerName, created);
      return status(201, 'Created');
    }

    if (!container) {
      return status(404, 'Not Found');
    }

    switch (request.method) {
      case 'HEAD':
        return status(204, '', containerHeaders(container));
      case 'GET': {
        const entries = [...container.objects.entries()].map(([name, object]) => ({
          name,
          record: {
            name,
            bytes: object.content.length,
            content_type: object.headers.get('Content-Type') ?? 'application/octet-stream',
            hash: object.etag,
            last_modified: listingTime(object.lastModified),
          },
        }));
        return listing(request.url, entries, containerHeaders(container));
      }
      case 'POST':
        applyMetadata(container.headers, request.headers, 'X-Container-Meta-', CONTAINER_HEADERS);
        return status(204);
      case 'DELETE':
        if (container.objects.size > 0) {
          return status(409, 'There was a conflict when trying to complete your request.');
        }
        account.containers.delete(request.containerName);
        return status(204);
      default:
        return status(405, 'Method Not Allowed');
    }
  }

  // ---------------------------------------------------------------------------
  // Objects
  // ---------------------------------------------------------------------------

  private handleObject(request: ParsedRequest): MockResponse {
    const account = this.account(request.accountName);
    if (request.method === 'PUT' && request.url.searchParams.has('extract-archive')) {
      return this.extractArchive(account, `${request.containerName}/${request.objectName}`, request);
    }
    const container = account.containers.get(request.containerName);
    if (!container) {
      return status(404, 'Not Found');
    }

    if (request.method === 'PUT') {
      return this.putObject(container, request.objectName, request.headers, request.body);
    }

    const object = container.objects.get(request.objectName);
    if (!object) {
      return status(404, 'Not Found');
    }

    switch (request.method) {
      case 'HEAD':
        return status(200, '', objectHeaders(object));
      case 'GET':
        return { status: 200, headers: objectHeaders(object), body: object.content };
      case 'POST': {
        const headers = new Headers();
        for (const [key, value] of object.headers.entries()) {
          if (!key.startsWith('X-Object-Meta-')) {
            headers.set(key, value);
          }
        }
        applyMetadata(headers, request.headers, 'X-Object-Meta-', OBJECT_HEADERS);
        object.headers = headers;
        return status(202, 'Accepted');
      }
      case 'DELETE':
        container.objects.delete(request.objectName);
        return status(204);
      case 'COPY':
        return this.copyObject(account, object, request);
      default:
        return status(405, 'Method Not Allowed');
    }
  }

  private putObject(
    container: StoredContainer,
    objectName: string,
    requestHeaders: Headers,
    content: Buffer
  ): MockResponse {
    if (objectName.length > MAX_OBJECT_NAME_LENGTH) {
      return status(400, `Object name length of ${objectName.length} longer than ${MAX_OBJECT_NAME_LENGTH}`);
    }
    const etag = md5Hex(content);
    const expected = requestHeaders.get('Etag');
    if (expected !== undefined && expected !== '' && expected.replace(/"/g, '') !== etag) {
      return status(422, 'Unprocessable Entity');
    }

    const headers = new Headers();
    applyMetadata(headers, requestHeaders, 'X-Object-Meta-', OBJECT_HEADERS);
    const deleteAfter = requestHeaders.get('X-Delete-After');
    if (deleteAfter !== undefined && /^\d+$/.test(deleteAfter)) {
      const deleteAt = Math.floor(this.now().getTime() / 1000) + Number(deleteAfter);
      headers.set('X-Delete-At', String(deleteAt));
    }

    const now = this.now();
    const object: StoredObject = { content, etag, headers, lastModified: now, createdAt: now };
    container.objects.set(objectName, object);
    return status(201, '', { Etag: etag, 'Last-Modified': object.lastModified.toUTCString() });
  }

  private copyObject(account: StoredAccount, source: StoredObject, request: ParsedRequest): MockResponse {
    const destination = request.headers.get('Destination');
    if (!destination) {
      return status(412, 'Destination header required');
    }
    const path = destination.startsWith('/') ? destination.slice(1) : destination;
    const slash = path.indexOf('/');
    if (slash <= 0) {
      return status(412, 'Destination header must be of the form <container>/<object>');
    }

    const accountName = request.headers.get('Destination-Account');
    const targetAccount = accountName ? this.account(decodeURIComponent(accountName)) : account;
    const target = targetAccount.containers.get(decodeURIComponent(path.slice(0, slash)));
    if (!target) {
      return status(404, 'Not Found');
    }

    const headers = new Headers();
    const fresh = request.headers.get('X-Fresh-Metadata')?.toLowerCase() === 'true';
    for (const [key, value] of source.headers.entries()) {
      if (!fresh || !key.startsWith('X-Object-Meta-')) {
        headers.set(key, value);
      }
    }
    applyMetadata(headers, request.headers, 'X-Object-Meta-', OBJECT_HEADERS);

    const now = this.now();
    target.objects.set(decodeSegments(path.slice(slash + 1)), {
      content: source.content,
      etag: source.etag,
      headers,
      lastModified: now,
      createdAt: now,
    });
    return status(201, '', { Etag: source.etag });
  }

  // ---------------------------------------------------------------------------
  // Bulk operations
  // ---------------------------------------------------------------------------

  private bulkDelete(account: StoredAccount, body: Buffer): MockResponse {
    let deleted = 0;
    let notFound = 0;
    const errors: Array<[string, string]> = [];

    for (const line of body.toString('utf8').split('\n')) {
      const raw = line.trim();
      if (raw === '') continue;
      const path = decodeSegments(raw.startsWith('/') ? raw.slice(1) : raw);
      const slash = path.indexOf('/');

      if (slash < 0) {
        const container = account.containers.get(path);
        if (!container) {
          notFound++;
        } else if (container.objects.size > 0) {
          errors.push([raw, statusLine(409)]);
        } else {
          account.containers.delete(path);
          deleted++;
        }
        continue;
      }

      const container = account.containers.get(path.slice(0, slash));
      if (container?.objects.delete(path.slice(slash + 1))) {
        deleted++;
      } else {
        notFound++;
      }
    }

    return bulkReport({
      'Number Deleted': deleted,
      'Number Not Found': notFound,
      'Response Status': errors.length > 0 ? statusLine(400) : statusLine(200),
      'Response Body': '',
      Errors: errors,
    });
  }

  private extractArchive(account: StoredAccount, uploadPath: string, request: ParsedRequest): MockResponse {
    const format = request.url.searchParams.get('extract-archive') ?? '';
    let entries: TarEntry[];
    try {
      entries = readTarArchive(decompress(format, request.body));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return bulkReport({
        'Number Files Created': 0,
        'Response Status': statusLine(400),
        'Response Body': `Invalid Tar File: ${message}`,
        Errors: [],
      });
    }

    let created = 0;
    const errors: Array<[string, string]> = [];
    for (const entry of entries) {
      const relative = entry.path.replace(/^(\.\/)+/, '').replace(/^\/+/, '');
      const fullPath = uploadPath === '' ? relative : `${uploadPath}/${relative}`;
      const slash = fullPath.indexOf('/');
      const containerName = slash < 0 ? fullPath : fullPath.slice(0, slash);
      const objectName = slash < 0 ? '' : fullPath.slice(slash + 1).replace(/\/+$/, '');

      if (entry.type === 'directory') {
        if (objectName === '' && containerName !== '') {
          this.ensureContainer(account, containerName);
        }
        continue;
      }
      if (containerName === '' || objectName === '') {
        errors.push([`/${encodePath(fullPath)}`, statusLine(400)]);
        continue;
      }

      const container = this.ensureContainer(account, containerName);
      const response = this.putObject(container, objectName, new Headers(), entry.data);
      if (response.status === 201) {
        created++;
      } else {
        errors.push([`/${encodePath(fullPath)}`, statusLine(response.status)]);
      }
    }

    return bulkReport({
      'Number Files Created': created,
      'Response Status': errors.length > 0 ? statusLine(400) : statusLine(201),
      'Response Body': '',
      Errors: errors,
    });
  }

  private ensureContainer(account: StoredAccount, name: string): StoredContainer {
    let container = account.containers.get(name);
    if (!container) {
      container = { headers: new Headers(), objects: new Map(), createdAt: this.now() };
      account.containers.set(name, container);
    }
    return container;
  }
}

function decompress(format: string, body: Buffer): Buffer {
  switch (format) {
    case 'tar':
      return body;
    case 'tar.gz':
      try {
        return gunzipSync(body);
      } catch (error) {
        throw new TarError(`gzip: ${error instanceof Error ? error.message : String(error)}`);
      }
    default:
      throw new TarError(`unsupported archive format "${format}"`);
  }
}

function bulkReport(document: Record<string, unknown>): MockResponse {
  return status(200, JSON.stringify(document), { 'Content-Type': 'application/json' });
}

function bytesUsed(container: StoredContainer): number {
  let bytes = 0;
  for (const object of container.objects.values()) {
    bytes += object.content.length;
  }
  return bytes;
}

function containerHeaders(container: StoredContainer): Record<string, string> {
  return {
    ...container.headers.toRecord(),
    'X-Container-Object-Count': String(container.objects.size),
    'X-Container-Bytes-Used': String(bytesUsed(container)),
    'X-Timestamp': swiftTimestamp(container.createdAt),
  };
}

function objectHeaders(object: StoredObject): Record<string, string> {
  return {
    'Content-Type': 'application/octet-stream',
    ...object.headers.toRecord(),
    'Content-Length': String(object.content.length),
    Etag: object.etag,
    'Last-Modified': object.lastModified.toUTCString(),
    'X-Timestamp': swiftTimestamp(object.createdAt),
  };
}

/**
 * Copies metadata headers with the given prefix and the listed system
 * headers. Empty values and `X-Remove-` headers delete the entry.
 */
function applyMetadata(target: Headers, source: Headers, prefix: string, system: string[]): void {
  const removePrefix = `X-Remove-${prefix.slice(2)}`;
  const systemKeys = new Set(system.map((name) => Headers.canonicalKey(name)));
  for (const [key, value] of source.entries()) {
    if (key.startsWith(removePrefix)) {
      target.delete(prefix + key.slice(removePrefix.length));
    } else if (key.startsWith(prefix) || systemKeys.has(key)) {
      if (value === '') {
        target.delete(key);
      } else {
        target.set(key, value);
      }
    }
  }
}

function listing(
  url: URL,
  entries: Array<{ name: string; record: Record<string, unknown> }>,
  headers: Record<string, string>
): MockResponse {
  const prefix = url.searchParams.get('prefix') ?? '';
  const marker = url.searchParams.get('marker') ?? '';
  const limitParam = url.searchParams.get('limit');
  const limit = limitParam === null ? DEFAULT_LISTING_LIMIT : Math.min(Number(limitParam), DEFAULT_LISTING_LIMIT);
  const json = url.searchParams.get('format') === 'json';

  const page = entries
    .filter((entry) => entry.name.startsWith(prefix) && entry.name > marker)
    .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
    .slice(0, limit);

  if (json) {
    return status(200, JSON.stringify(page.map((entry) => entry.record)), {
      ...headers,
      'Content-Type': 'application/json; charset=utf-8',
    });
  }
  if (page.length === 0) {
    return status(204, '', headers);
  }
  return status(200, page.map((entry) => `${entry.name}\n`).join(''), {
    ...headers,
    'Content-Type': 'text/plain; charset=utf-8',
  });
}
