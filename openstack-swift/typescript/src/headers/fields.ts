/**
 * Typed accessors for single header values.
 *
 * A field never copies data: it reads and writes through to the
 * {@link Headers} instance it was created from.
 */

import { MalformedHeaderError } from '../errors/index.js';
import { Headers } from './headers.js';

/**
 * Tri-state reading of a header value.
 */
export type FieldState<T> =
  | { kind: 'absent' }
  | { kind: 'empty' }
  | { kind: 'present'; value: T };

type ParseResult<T> = { ok: true; value: T } | { ok: false; reason: string };

/**
 * Anything that can check its header value for well-formedness.
 */
export interface ValidatableField {
  readonly name: string;
  /** Returns the error for a present but unparsable value. */
  validationError(): MalformedHeaderError | undefined;
}

abstract class BaseField<T> implements ValidatableField {
  constructor(
    protected readonly headers: Headers,
    readonly name: string
  ) {}

  protected abstract parse(raw: string): ParseResult<T>;

  /**
   * Returns the raw header value without parsing it.
   */
  raw(): FieldState<string> {
    const value = this.headers.get(this.name);
    if (value === undefined) {
      return { kind: 'absent' };
    }
    if (value === '') {
      return { kind: 'empty' };
    }
    return { kind: 'present', value };
  }

  /**
   * Returns the parsed header value.
   * @throws {MalformedHeaderError} if a non-empty value cannot be parsed
   */
  read(): FieldState<T> {
    const raw = this.raw();
    if (raw.kind !== 'present') {
      return raw;
    }
    const parsed = this.parse(raw.value);
    if (!parsed.ok) {
      throw new MalformedHeaderError(this.name, parsed.reason);
    }
    return { kind: 'present', value: parsed.value };
  }

  /**
   * Reports whether the header is set to a non-empty value.
   */
  exists(): boolean {
    return this.raw().kind === 'present';
  }

  validationError(): MalformedHeaderError | undefined {
    const raw = this.raw();
    if (raw.kind !== 'present') {
      return undefined;
    }
    const parsed = this.parse(raw.value);
    return parsed.ok ? undefined : new MalformedHeaderError(this.name, parsed.reason);
  }

  /**
   * @throws {MalformedHeaderError} if the value is present but unparsable
   */
  validate(): void {
    const error = this.validationError();
    if (error) {
      throw error;
    }
  }

  /**
   * Parsed value, or undefined when absent, empty or malformed.
   */
  protected value(): T | undefined {
    const raw = this.raw();
    if (raw.kind !== 'present') {
      return undefined;
    }
    const parsed = this.parse(raw.value);
    return parsed.ok ? parsed.value : undefined;
  }
}

/**
 * A header with a string value.
 */
export class StringField extends BaseField<string> {
  protected parse(raw: string): ParseResult<string> {
    return { ok: true, value: raw };
  }

  /** Returns the value, or an empty string if absent. */
  get(): string {
    return this.headers.get(this.name) ?? '';
  }

  set(value: string): void {
    this.headers.set(this.name, value);
  }

  /** Sets the header to an empty string, which removes it on the server. */
  clear(): void {
    this.headers.clear(this.name);
  }

  /** Removes the header from the local map only. */
  del(): void {
    this.headers.delete(this.name);
  }
}

/**
 * A read-only header with a string value.
 */
export class ReadonlyStringField extends BaseField<string> {
  protected parse(raw: string): ParseResult<string> {
    return { ok: true, value: raw };
  }

  get(): string {
    return this.headers.get(this.name) ?? '';
  }
}

/** Largest value of an unsigned 64-bit counter. */
export const UINT64_MAX = 2n ** 64n - 1n;

function parseUnsigned(raw: string): ParseResult<bigint> {
  if (!/^\d+$/.test(raw)) {
    return { ok: false, reason: `expected unsigned integer, got "${raw}"` };
  }
  const value = BigInt(raw);
  if (value > UINT64_MAX) {
    return { ok: false, reason: `value "${raw}" out of range` };
  }
  return { ok: true, value };
}

/**
 * A read-only header with an unsigned 64-bit integer value. Values are
 * `bigint` since counters such as bytes used may exceed 2^53.
 */
export class ReadonlyUint64Field extends BaseField<bigint> {
  protected parse(raw: string): ParseResult<bigint> {
    return parseUnsigned(raw);
  }

  /** Returns the value, or 0 if absent or malformed. */
  get(): bigint {
    return this.value() ?? 0n;
  }
}

/**
 * A header with an unsigned 64-bit integer value.
 */
export class Uint64Field extends ReadonlyUint64Field {
  set(value: bigint | number): void {
    if (typeof value === 'number' && !Number.isSafeInteger(value)) {
      throw new RangeError(`${this.name} must be an integer, got ${value}`);
    }
    const exact = BigInt(value);
    if (exact < 0n || exact > UINT64_MAX) {
      throw new RangeError(`${this.name} must be an unsigned 64-bit integer, got ${exact}`);
    }
    this.headers.set(this.name, exact.toString());
  }

  clear(): void {
    this.headers.clear(this.name);
  }

  del(): void {
    this.headers.delete(this.name);
  }
}

/**
 * A read-only header holding a Unix timestamp with optional fractional
 * seconds, such as `X-Timestamp: 1495014423.54321`.
 */
export class UnixTimestampField extends BaseField<Date> {
  protected parse(raw: string): ParseResult<Date> {
    if (!/^\d+(\.\d+)?$/.test(raw)) {
      return { ok: false, reason: `expected Unix timestamp, got "${raw}"` };
    }
    return { ok: true, value: new Date(parseFloat(raw) * 1000) };
  }

  get(): Date | undefined {
    return this.value();
  }
}

/**
 * A header holding a whole-second Unix time, such as `X-Delete-At`.
 */
export class UnixTimeField extends BaseField<Date> {
  protected parse(raw: string): ParseResult<Date> {
    const parsed = parseUnsigned(raw);
    if (!parsed.ok) {
      return { ok: false, reason: `expected Unix time, got "${raw}"` };
    }
    const date = new Date(Number(parsed.value) * 1000);
    if (Number.isNaN(date.getTime())) {
      return { ok: false, reason: `Unix time "${raw}" out of range` };
    }
    return { ok: true, value: date };
  }

  get(): Date | undefined {
    return this.value();
  }

  set(value: Date): void {
    this.headers.set(this.name, String(Math.floor(value.getTime() / 1000)));
  }

  clear(): void {
    this.headers.clear(this.name);
  }

  del(): void {
    this.headers.delete(this.name);
  }
}

const HTTP_DATE = /^(Mon|Tue|Wed|Thu|Fri|Sat|Sun), \d{2} (Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sep|Oct|Nov|Dec) \d{4} \d{2}:\d{2}:\d{2} GMT$/;

/**
 * A read-only header holding an HTTP date, such as `Last-Modified`.
 */
export class HttpTimestampField extends BaseField<Date> {
  protected parse(raw: string): ParseResult<Date> {
    if (!HTTP_DATE.test(raw)) {
      return { ok: false, reason: `expected HTTP date, got "${raw}"` };
    }
    const time = Date.parse(raw);
    if (Number.isNaN(time)) {
      return { ok: false, reason: `invalid HTTP date "${raw}"` };
    }
    return { ok: true, value: new Date(time) };
  }

  get(): Date | undefined {
    return this.value();
  }
}

/**
 * Access to all headers with a common prefix, e.g. `X-Container-Meta-`.
 * Keys passed to this field are the part after the prefix.
 */
export class MetadataField {
  constructor(
    private readonly headers: Headers,
    readonly prefix: string
  ) {}

  private key(key: string): string {
    return this.prefix + key;
  }

  /** Returns the value, or an empty string if absent. */
  get(key: string): string {
    return this.headers.get(this.key(key)) ?? '';
  }

  /** Reports whether the entry is set to a non-empty value. */
  exists(key: string): boolean {
    return this.get(key) !== '';
  }

  set(key: string, value: string): void {
    this.headers.set(this.key(key), value);
  }

  clear(key: string): void {
    this.headers.clear(this.key(key));
  }

  del(key: string): void {
    this.headers.delete(this.key(key));
  }

  /**
   * Returns all metadata keys present, without the prefix.
   */
  keys(): string[] {
    const prefix = Headers.canonicalKey(this.prefix);
    return this.headers
      .keys()
      .filter((name) => name.startsWith(prefix) && name.length > prefix.length)
      .map((name) => name.slice(prefix.length));
  }
}
