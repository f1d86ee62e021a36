/**
 * Case-insensitive header map.
 *
 * Keys are stored in canonical form (`x-account-meta-foo` becomes
 * `X-Account-Meta-Foo`), so lookups ignore case and serialization always
 * emits canonical names.
 */
export class Headers {
  private readonly values = new Map<string, string>();

  constructor(init?: Headers | Record<string, string> | Iterable<readonly [string, string]>) {
    if (init === undefined) {
      return;
    }
    const entries = init instanceof Headers
      ? init.entries()
      : isIterable(init) ? init : Object.entries(init);
    for (const [key, value] of entries) {
      this.set(key, value);
    }
  }

  /**
   * Canonicalizes a header name: first letter and every letter following a
   * hyphen upper-cased, all others lower-cased.
   */
  static canonicalKey(key: string): string {
    return key
      .trim()
      .split('-')
      .map((part) => part.charAt(0).toUpperCase() + part.slice(1).toLowerCase())
      .join('-');
  }

  get(key: string): string | undefined {
    return this.values.get(Headers.canonicalKey(key));
  }

  has(key: string): boolean {
    return this.values.has(Headers.canonicalKey(key));
  }

  set(key: string, value: string): void {
    this.values.set(Headers.canonicalKey(key), value);
  }

  /**
   * Sets the header to the empty string, which asks Swift to remove the
   * corresponding value on the server.
   */
  clear(key: string): void {
    this.set(key, '');
  }

  /**
   * Removes the header from this map only.
   */
  delete(key: string): void {
    this.values.delete(Headers.canonicalKey(key));
  }

  keys(): string[] {
    return [...this.values.keys()];
  }

  entries(): Array<[string, string]> {
    return [...this.values.entries()];
  }

  get size(): number {
    return this.values.size;
  }

  clone(): Headers {
    return new Headers(this);
  }

  toRecord(): Record<string, string> {
    return Object.fromEntries(this.values);
  }
}

function isIterable(
  value: Record<string, string> | Iterable<readonly [string, string]>
): value is Iterable<readonly [string, string]> {
  return Symbol.iterator in value;
}
