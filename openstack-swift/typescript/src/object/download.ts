/**
 * Downloaded object content
 */

import type { ReadableStream } from 'node:stream/web';
import { DownloadConsumedError } from '../errors/index.js';
import type { ObjectHeaders } from '../headers/index.js';
import { readBody } from '../transport/index.js';

/**
 * Content of a GET request on an object.
 *
 * The content can be consumed exactly once, through one of
 * {@link asStream}, {@link asBuffer}, {@link asString} or {@link discard}.
 * A caller that takes the stream is responsible for reading or cancelling it.
 */
export class DownloadedObject {
  private consumed = false;

  constructor(
    readonly objectName: string,
    readonly headers: ObjectHeaders,
    private readonly body: ReadableStream<Uint8Array>
  ) {}

  asStream(): ReadableStream<Uint8Array> {
    this.consume();
    return this.body;
  }

  async asBuffer(): Promise<Buffer> {
    this.consume();
    return readBody(this.body);
  }

  async asString(): Promise<string> {
    const bytes = await this.asBuffer();
    return bytes.toString('utf8');
  }

  /**
   * Throws the content away without reading it.
   */
  async discard(): Promise<void> {
    this.consume();
    await this.body.cancel();
  }

  private consume(): void {
    if (this.consumed) {
      throw new DownloadConsumedError(this.objectName);
    }
    this.consumed = true;
  }
}
