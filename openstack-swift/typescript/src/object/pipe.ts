/**
 * Bounded producer/consumer pipe
 */

/**
 * Writing end of a {@link BoundedPipe}, handed to upload producers.
 */
export interface PipeWriter {
  /**
   * Queues a chunk. Waits while the pipe is full, and rejects with the
   * reader's error once the reading side has been closed.
   */
  write(chunk: Uint8Array | string): Promise<void>;
}

interface Closed {
  error?: unknown;
  failed: boolean;
}

/**
 * In-memory pipe holding at most `capacity` chunks.
 *
 * The writer closes its side with {@link close}, or with {@link fail} to
 * pass an error on to the reader. The reader closes its side with
 * {@link closeReader}, which makes pending and future writes reject.
 */
export class BoundedPipe implements PipeWriter, AsyncIterable<Uint8Array> {
  private readonly chunks: Uint8Array[] = [];
  private writerClosed: Closed | null = null;
  private readerClosed: Closed | null = null;
  private readerWaiting: (() => void) | null = null;
  private writersWaiting: Array<() => void> = [];

  constructor(private readonly capacity = 16) {
    if (capacity < 1) {
      throw new RangeError(`pipe capacity must be positive, got ${capacity}`);
    }
  }

  async write(chunk: Uint8Array | string): Promise<void> {
    if (this.writerClosed) {
      throw new Error('write to closed pipe');
    }
    const bytes = typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk;
    while (this.readerClosed === null && this.chunks.length >= this.capacity) {
      await new Promise<void>((resolve) => this.writersWaiting.push(resolve));
    }
    if (this.readerClosed) {
      throw this.readerError();
    }
    if (bytes.length > 0) {
      this.chunks.push(bytes);
      this.wakeReader();
    }
  }

  /**
   * Closes the writing side. Buffered chunks are still delivered, then the
   * reader ends.
   */
  close(): void {
    this.closeWriter({ failed: false });
  }

  /**
   * Closes the writing side with an error, which the reader throws after the
   * buffered chunks.
   */
  fail(error: unknown): void {
    this.closeWriter({ error, failed: true });
  }

  /**
   * Closes the reading side. Buffered chunks are dropped.
   */
  closeReader(error?: unknown): void {
    if (this.readerClosed) {
      return;
    }
    this.readerClosed = { error, failed: error !== undefined };
    this.chunks.length = 0;
    const waiting = this.writersWaiting;
    this.writersWaiting = [];
    for (const resolve of waiting) {
      resolve();
    }
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<Uint8Array> {
    for (;;) {
      const chunk = this.chunks.shift();
      if (chunk !== undefined) {
        this.writersWaiting.shift()?.();
        yield chunk;
        continue;
      }
      if (this.readerClosed) {
        return;
      }
      if (this.writerClosed) {
        if (this.writerClosed.failed) {
          throw this.writerClosed.error;
        }
        return;
      }
      await new Promise<void>((resolve) => {
        this.readerWaiting = resolve;
      });
    }
  }

  private closeWriter(state: Closed): void {
    if (this.writerClosed) {
      return;
    }
    this.writerClosed = state;
    this.wakeReader();
  }

  private wakeReader(): void {
    const resolve = this.readerWaiting;
    this.readerWaiting = null;
    resolve?.();
  }

  private readerError(): unknown {
    if (this.readerClosed?.failed) {
      return this.readerClosed.error;
    }
    return new Error('read side of pipe closed');
  }
}
