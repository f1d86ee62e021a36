/**
 * Header sets for accounts, containers and objects.
 */

import type { MalformedHeaderError } from '../errors/index.js';
import { Headers } from './headers.js';
import {
  HttpTimestampField,
  MetadataField,
  ReadonlyStringField,
  ReadonlyUint64Field,
  StringField,
  Uint64Field,
  UnixTimeField,
  UnixTimestampField,
  type ValidatableField,
} from './fields.js';

/**
 * Common base of the typed header sets. The underlying {@link Headers} map
 * stays reachable for headers without a typed accessor.
 */
export abstract class HeaderSet {
  readonly headers: Headers;

  constructor(init?: Headers | Record<string, string>) {
    this.headers = init instanceof Headers ? init : new Headers(init);
  }

  /**
   * Fields checked by {@link validate}.
   */
  protected abstract validatedFields(): ValidatableField[];

  /**
   * Checks every numeric and timestamp field and returns the error for the
   * first malformed one.
   */
  validationError(): MalformedHeaderError | undefined {
    for (const field of this.validatedFields()) {
      const error = field.validationError();
      if (error) {
        return error;
      }
    }
    return undefined;
  }

  /**
   * @throws {MalformedHeaderError} naming the first malformed header
   */
  validate(): void {
    const error = this.validationError();
    if (error) {
      throw error;
    }
  }

  get(key: string): string | undefined {
    return this.headers.get(key);
  }

  set(key: string, value: string): void {
    this.headers.set(key, value);
  }

  toRecord(): Record<string, string> {
    return this.headers.toRecord();
  }
}

/**
 * Headers of an account.
 */
export class AccountHeaders extends HeaderSet {
  get bytesUsed(): ReadonlyUint64Field {
    return new ReadonlyUint64Field(this.headers, 'X-Account-Bytes-Used');
  }

  get containerCount(): ReadonlyUint64Field {
    return new ReadonlyUint64Field(this.headers, 'X-Account-Container-Count');
  }

  get objectCount(): ReadonlyUint64Field {
    return new ReadonlyUint64Field(this.headers, 'X-Account-Object-Count');
  }

  get bytesUsedQuota(): Uint64Field {
    return new Uint64Field(this.headers, 'X-Account-Meta-Quota-Bytes');
  }

  get tempUrlKey(): StringField {
    return new StringField(this.headers, 'X-Account-Meta-Temp-Url-Key');
  }

  get tempUrlKey2(): StringField {
    return new StringField(this.headers, 'X-Account-Meta-Temp-Url-Key-2');
  }

  get createdAt(): UnixTimestampField {
    return new UnixTimestampField(this.headers, 'X-Timestamp');
  }

  get metadata(): MetadataField {
    return new MetadataField(this.headers, 'X-Account-Meta-');
  }

  protected validatedFields(): ValidatableField[] {
    return [
      this.bytesUsed,
      this.containerCount,
      this.objectCount,
      this.bytesUsedQuota,
      this.createdAt,
    ];
  }

  clone(): AccountHeaders {
    return new AccountHeaders(this.headers.clone());
  }
}

/**
 * Headers of a container.
 */
export class ContainerHeaders extends HeaderSet {
  get bytesUsed(): ReadonlyUint64Field {
    return new ReadonlyUint64Field(this.headers, 'X-Container-Bytes-Used');
  }

  get objectCount(): ReadonlyUint64Field {
    return new ReadonlyUint64Field(this.headers, 'X-Container-Object-Count');
  }

  get bytesUsedQuota(): Uint64Field {
    return new Uint64Field(this.headers, 'X-Container-Meta-Quota-Bytes');
  }

  get objectCountQuota(): Uint64Field {
    return new Uint64Field(this.headers, 'X-Container-Meta-Quota-Count');
  }

  get readAcl(): StringField {
    return new StringField(this.headers, 'X-Container-Read');
  }

  get writeAcl(): StringField {
    return new StringField(this.headers, 'X-Container-Write');
  }

  get syncKey(): StringField {
    return new StringField(this.headers, 'X-Container-Sync-Key');
  }

  get syncTo(): StringField {
    return new StringField(this.headers, 'X-Container-Sync-To');
  }

  get versionsLocation(): StringField {
    return new StringField(this.headers, 'X-Versions-Location');
  }

  get historyLocation(): StringField {
    return new StringField(this.headers, 'X-History-Location');
  }

  get storagePolicy(): StringField {
    return new StringField(this.headers, 'X-Storage-Policy');
  }

  get tempUrlKey(): StringField {
    return new StringField(this.headers, 'X-Container-Meta-Temp-Url-Key');
  }

  get tempUrlKey2(): StringField {
    return new StringField(this.headers, 'X-Container-Meta-Temp-Url-Key-2');
  }

  get createdAt(): UnixTimestampField {
    return new UnixTimestampField(this.headers, 'X-Timestamp');
  }

  get metadata(): MetadataField {
    return new MetadataField(this.headers, 'X-Container-Meta-');
  }

  protected validatedFields(): ValidatableField[] {
    return [
      this.bytesUsed,
      this.objectCount,
      this.bytesUsedQuota,
      this.objectCountQuota,
      this.createdAt,
    ];
  }

  clone(): ContainerHeaders {
    return new ContainerHeaders(this.headers.clone());
  }
}

/**
 * Headers of an object.
 */
export class ObjectHeaders extends HeaderSet {
  get contentType(): StringField {
    return new StringField(this.headers, 'Content-Type');
  }

  get contentDisposition(): StringField {
    return new StringField(this.headers, 'Content-Disposition');
  }

  get contentEncoding(): StringField {
    return new StringField(this.headers, 'Content-Encoding');
  }

  /** Object size, from `Content-Length`. */
  get sizeBytes(): Uint64Field {
    return new Uint64Field(this.headers, 'Content-Length');
  }

  get etag(): StringField {
    return new StringField(this.headers, 'Etag');
  }

  get updatedAt(): HttpTimestampField {
    return new HttpTimestampField(this.headers, 'Last-Modified');
  }

  get createdAt(): UnixTimestampField {
    return new UnixTimestampField(this.headers, 'X-Timestamp');
  }

  get expiresAt(): UnixTimeField {
    return new UnixTimeField(this.headers, 'X-Delete-At');
  }

  get deleteAfter(): Uint64Field {
    return new Uint64Field(this.headers, 'X-Delete-After');
  }

  /** Large object manifest, for DLO segments. */
  get manifest(): ReadonlyStringField {
    return new ReadonlyStringField(this.headers, 'X-Object-Manifest');
  }

  get metadata(): MetadataField {
    return new MetadataField(this.headers, 'X-Object-Meta-');
  }

  protected validatedFields(): ValidatableField[] {
    return [
      this.sizeBytes,
      this.updatedAt,
      this.createdAt,
      this.expiresAt,
      this.deleteAfter,
    ];
  }

  clone(): ObjectHeaders {
    return new ObjectHeaders(this.headers.clone());
  }
}
