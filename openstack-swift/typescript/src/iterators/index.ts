/**
 * Paginated listings of containers and objects
 *
 * Both iterators keep a marker (the last name seen) and become exhausted
 * once a page comes back empty. An exhausted iterator returns empty pages
 * without making requests.
 *
 * @module iterators
 */

import { z } from 'zod';
import type { Account } from '../account/index.js';
import type { Container } from '../container/index.js';
import type { SwiftObject } from '../object/index.js';
import type { Backend } from '../backend/index.js';
import { AccountHeaders, ContainerHeaders, UINT64_MAX } from '../headers/index.js';
import { cloneRequestOptions, executeRequest, type RequestOptions } from '../request/index.js';
import { readBodyText } from '../transport/index.js';
import { SwiftError } from '../errors/index.js';

/**
 * An entry of a detailed object listing.
 */
export interface ObjectInfo {
  object: SwiftObject;
  sizeBytes: bigint;
  contentType: string;
  etag: string;
  lastModified: Date;
}

/**
 * An entry of a detailed container listing.
 */
export interface ContainerInfo {
  container: Container;
  objectCount: bigint;
  bytesUsed: bigint;
  /** Not reported by older Swift versions. */
  lastModified?: Date;
}

const counterSchema = z
  .union([z.string().regex(/^\d+$/, 'expected unsigned integer'), z.number().int().nonnegative()])
  .transform((value) => BigInt(value))
  .refine((value) => value <= UINT64_MAX, 'out of range');

const objectRecordSchema = z.object({
  name: z.string(),
  bytes: counterSchema,
  content_type: z.string(),
  hash: z.string(),
  last_modified: z.string(),
});

const containerRecordSchema = z.object({
  name: z.string(),
  count: counterSchema,
  bytes: counterSchema,
  last_modified: z.string().optional(),
});

const LISTING_TIME = /^(\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2})(\.\d+)?$/;

/**
 * Parses a `last_modified` value from a detailed listing. Swift omits the
 * zone suffix; the time is UTC.
 */
export function parseListingTime(value: string): Date | undefined {
  const match = LISTING_TIME.exec(value);
  if (!match?.[1]) {
    return undefined;
  }
  const fraction = match[2] ? match[2].slice(0, 4) : '';
  return new Date(`${match[1]}${fraction}Z`);
}

function malformed(message: string): SwiftError {
  return new SwiftError(`malformed listing: ${message}`, 'Listing.Malformed');
}

const COUNTER_FIELD = /((?<!\\)"(?:bytes|count)"\s*:\s*)(\d+)(?=\s*[,}])/g;

/**
 * Quotes the integer values of `bytes` and `count` so that `JSON.parse`
 * keeps every digit of counters beyond 2^53.
 */
export function quoteCounters(text: string): string {
  return text.replace(COUNTER_FIELD, '$1"$2"');
}

function parseRecords<T>(text: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T[] {
  let document: unknown;
  try {
    document = JSON.parse(text === '' ? '[]' : quoteCounters(text));
  } catch (error) {
    throw new SwiftError('malformed listing: response is not valid JSON', 'Listing.Malformed', {
      cause: error,
    });
  }
  if (!Array.isArray(document)) {
    throw malformed('expected a JSON array');
  }
  return document.map((record, index) => {
    const result = schema.safeParse(record);
    if (!result.success) {
      const issue = result.error.issues[0];
      const field = issue ? issue.path.join('.') : '';
      throw malformed(`bad field [${index}].${field}: ${issue?.message ?? 'invalid record'}`);
    }
    return result.data;
  });
}

/**
 * Common pagination logic of {@link ContainerIterator} and
 * {@link ObjectIterator}.
 */
abstract class ListingIterator<TItem, TInfo> implements AsyncIterable<TItem> {
  private marker = '';
  private exhausted = false;

  constructor(
    /** Only names starting with this string are listed. */
    readonly prefix: string = '',
    /** Extra headers and query parameters for the listing requests. */
    readonly options?: RequestOptions
  ) {}

  protected abstract backend(): Backend;

  /** Container to list, or undefined for the account's container listing. */
  protected abstract containerName(): string | undefined;

  protected abstract item(name: string): TItem;

  protected abstract parseDetailed(text: string): TInfo[];

  protected abstract nameOf(info: TInfo): string;

  /** Offers the listing's response headers to the listed entity. */
  protected abstract primeCache(headers: Record<string, string>): void;

  /**
   * Current marker, empty before the first page.
   */
  currentMarker(): string {
    return this.marker;
  }

  /**
   * Fetches the next page of names. A negative `limit` leaves the page size
   * to the server. An empty page means the listing is complete.
   */
  async nextPage(limit = -1): Promise<TItem[]> {
    const text = await this.fetchPage(limit, false);
    if (text === null) {
      return [];
    }
    const names = text.split('\n').filter((name) => name !== '');
    return this.advance(names, names).map((name) => this.item(name));
  }

  /**
   * Like {@link nextPage}, but returns records with basic metadata.
   */
  async nextPageDetailed(limit = -1): Promise<TInfo[]> {
    const text = await this.fetchPage(limit, true);
    if (text === null) {
      return [];
    }
    const infos = this.parseDetailed(text);
    return this.advance(infos, infos.map((info) => this.nameOf(info)));
  }

  /**
   * Calls `callback` for every listed item. Stops at the first failed
   * request or callback.
   */
  async foreach(callback: (item: TItem) => void | Promise<void>): Promise<void> {
    for (;;) {
      const page = await this.nextPage();
      if (page.length === 0) {
        return;
      }
      for (const item of page) {
        await callback(item);
      }
    }
  }

  /**
   * Like {@link foreach}, with detailed records.
   */
  async foreachDetailed(callback: (info: TInfo) => void | Promise<void>): Promise<void> {
    for (;;) {
      const page = await this.nextPageDetailed();
      if (page.length === 0) {
        return;
      }
      for (const info of page) {
        await callback(info);
      }
    }
  }

  /**
   * Collects all remaining items, fetching as many pages as needed.
   */
  async collect(): Promise<TItem[]> {
    const result: TItem[] = [];
    await this.foreach((item) => {
      result.push(item);
    });
    return result;
  }

  /**
   * Like {@link collect}, with detailed records.
   */
  async collectDetailed(): Promise<TInfo[]> {
    const result: TInfo[] = [];
    await this.foreachDetailed((info) => {
      result.push(info);
    });
    return result;
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<TItem> {
    for (;;) {
      const page = await this.nextPage();
      if (page.length === 0) {
        return;
      }
      yield* page;
    }
  }

  private advance<T>(entries: T[], names: string[]): T[] {
    const last = names[names.length - 1];
    if (last === undefined) {
      this.exhausted = true;
      return [];
    }
    this.marker = last;
    return entries;
  }

  private async fetchPage(limit: number, detailed: boolean): Promise<string | null> {
    if (this.exhausted) {
      return null;
    }

    const opts = cloneRequestOptions(this.options);
    if (this.prefix !== '') {
      opts.values.prefix = this.prefix;
    }
    if (this.marker !== '') {
      opts.values.marker = this.marker;
    }
    if (limit >= 0) {
      opts.values.limit = String(limit);
    }
    if (detailed) {
      opts.values.format = 'json';
      opts.headers.set('Accept', 'application/json');
    }

    const response = await executeRequest(this.backend(), {
      method: 'GET',
      containerName: this.containerName(),
      options: opts,
      expectStatusCodes: [200, 204],
    });
    this.primeCache(response.headers);
    return readBodyText(response.body);
  }
}

/**
 * Iterates over the containers of an account.
 */
export class ContainerIterator extends ListingIterator<Container, ContainerInfo> {
  constructor(
    readonly account: Account,
    prefix = '',
    options?: RequestOptions
  ) {
    super(prefix, options);
  }

  protected backend(): Backend {
    return this.account.backend;
  }

  protected containerName(): string | undefined {
    return undefined;
  }

  protected item(name: string): Container {
    return this.account.container(name);
  }

  protected parseDetailed(text: string): ContainerInfo[] {
    return parseRecords(text, containerRecordSchema).map((record, index) => {
      let lastModified: Date | undefined;
      if (record.last_modified !== undefined) {
        lastModified = parseListingTime(record.last_modified);
        if (lastModified === undefined) {
          throw malformed(`bad field [${index}].last_modified: "${record.last_modified}"`);
        }
      }
      return {
        container: this.account.container(record.name),
        objectCount: record.count,
        bytesUsed: record.bytes,
        lastModified,
      };
    });
  }

  protected nameOf(info: ContainerInfo): string {
    return info.container.name;
  }

  protected primeCache(headers: Record<string, string>): void {
    this.account.primeHeaderCache(new AccountHeaders(headers));
  }
}

/**
 * Iterates over the objects of a container.
 */
export class ObjectIterator extends ListingIterator<SwiftObject, ObjectInfo> {
  constructor(
    readonly container: Container,
    prefix = '',
    options?: RequestOptions
  ) {
    super(prefix, options);
  }

  protected backend(): Backend {
    return this.container.account.backend;
  }

  protected containerName(): string | undefined {
    return this.container.name;
  }

  protected item(name: string): SwiftObject {
    return this.container.object(name);
  }

  protected parseDetailed(text: string): ObjectInfo[] {
    return parseRecords(text, objectRecordSchema).map((record, index) => {
      const lastModified = parseListingTime(record.last_modified);
      if (lastModified === undefined) {
        throw malformed(`bad field [${index}].last_modified: "${record.last_modified}"`);
      }
      return {
        object: this.container.object(record.name),
        sizeBytes: record.bytes,
        contentType: record.content_type,
        etag: record.hash,
        lastModified,
      };
    });
  }

  protected nameOf(info: ObjectInfo): string {
    return info.object.name;
  }

  protected primeCache(headers: Record<string, string>): void {
    this.container.primeHeaderCache(new ContainerHeaders(headers));
  }
}
