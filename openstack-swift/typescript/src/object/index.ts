/**
 * Swift objects
 *
 * @module object
 */

import { createHash, type Hash } from 'node:crypto';
import type { Container } from '../container/index.js';
import type { Backend } from '../backend/index.js';
import { ObjectHeaders } from '../headers/index.js';
import {
  cloneRequestOptions,
  encodePath,
  executeRequest,
  validateResourceNames,
  type RequestOptions,
} from '../request/index.js';
import { getHeader, type RequestBody } from '../transport/index.js';
import { ChecksumMismatchError, isStatusCode } from '../errors/index.js';
import {
  hashingStream,
  md5Hex,
  prepareContent,
  unquoteEtag,
  type UploadContent,
} from './content.js';
import { BoundedPipe, type PipeWriter } from './pipe.js';
import { DownloadedObject } from './download.js';

export {
  type UploadContent,
  type PreparedContent,
  type BufferedContent,
  type StreamedContent,
  prepareContent,
  toRequestBody,
  md5Hex,
  unquoteEtag,
} from './content.js';
export { BoundedPipe, type PipeWriter } from './pipe.js';
export { DownloadedObject } from './download.js';

/**
 * Number of chunks buffered between the producer and the request body in
 * {@link SwiftObject.uploadWithWriter}.
 */
export const UPLOAD_PIPE_CAPACITY = 16;

/**
 * Callback that generates object content for
 * {@link SwiftObject.uploadWithWriter}.
 */
export type ContentProducer = (writer: PipeWriter) => Promise<void>;

/**
 * An object in a Swift container.
 *
 * Creating an instance does not touch the server. Headers are fetched
 * lazily and cached on this instance until {@link invalidate} is called or
 * this instance performs a successful write.
 */
export class SwiftObject {
  private cachedHeaders: ObjectHeaders | null = null;

  constructor(
    readonly container: Container,
    readonly name: string
  ) {}

  private get backend(): Backend {
    return this.container.account.backend;
  }

  /**
   * Container name and object name joined with a slash.
   */
  fullName(): string {
    return `${this.container.name}/${this.name}`;
  }

  /**
   * Returns the object's headers, from cache if possible (HEAD, expects 200).
   * The returned instance is a copy and may be modified freely.
   */
  async headers(): Promise<ObjectHeaders> {
    if (this.cachedHeaders) {
      return this.cachedHeaders.clone();
    }

    const response = await executeRequest(this.backend, {
      method: 'HEAD',
      containerName: this.container.name,
      objectName: this.name,
      expectStatusCodes: [200],
      drainResponseBody: true,
    });

    const headers = new ObjectHeaders(response.headers);
    headers.validate();
    this.cachedHeaders = headers;
    return headers.clone();
  }

  /**
   * Checks whether the object exists. A 404 maps to false; other errors
   * propagate.
   */
  async exists(): Promise<boolean> {
    try {
      await this.headers();
      return true;
    } catch (error) {
      if (isStatusCode(error, 404)) {
        return false;
      }
      throw error;
    }
  }

  /**
   * Updates the object's headers with a POST request (expects 202).
   */
  async update(headers: ObjectHeaders, options?: RequestOptions): Promise<void> {
    await executeRequest(this.backend, {
      method: 'POST',
      containerName: this.container.name,
      objectName: this.name,
      options: cloneRequestOptions(options, headers),
      expectStatusCodes: [202],
      drainResponseBody: true,
    });
    this.invalidate();
  }

  /**
   * Creates or replaces the object with a PUT request (expects 201).
   *
   * For byte arrays and strings, `Content-Length` and `Etag` are computed
   * before sending, so the server rejects corrupted uploads. For streams, an
   * MD5 checksum is computed while sending and compared with the Etag the
   * server reports; a mismatch raises {@link ChecksumMismatchError} after the
   * object has been stored. Headers given in `options` are never overwritten.
   */
  async upload(content: UploadContent, options?: RequestOptions): Promise<void> {
    const opts = cloneRequestOptions(options);
    const hdr = new ObjectHeaders(opts.headers);
    const prepared = prepareContent(content);

    let body: RequestBody;
    let hash: Hash | null = null;
    if (prepared.kind === 'buffered') {
      if (!hdr.sizeBytes.exists()) {
        hdr.sizeBytes.set(prepared.bytes.length);
      }
      if (!hdr.etag.exists()) {
        hdr.etag.set(md5Hex(prepared.bytes));
      }
      body = prepared.bytes;
    } else if (hdr.etag.exists()) {
      body = prepared.stream;
    } else {
      hash = createHash('md5');
      body = hashingStream(prepared.stream, hash);
    }

    const response = await executeRequest(this.backend, {
      method: 'PUT',
      containerName: this.container.name,
      objectName: this.name,
      options: opts,
      body,
      expectStatusCodes: [201],
      drainResponseBody: true,
    });
    this.invalidate();

    if (hash) {
      const expected = hash.digest('hex');
      const actual = unquoteEtag(getHeader(response.headers, 'Etag') ?? '');
      if (expected !== actual) {
        throw new ChecksumMismatchError(expected, actual);
      }
    }
  }

  /**
   * Uploads content generated by `producer`.
   *
   * The producer and the request run concurrently, joined by a
   * {@link BoundedPipe}. If the request fails, pending and later writes
   * reject with the request's error. If the producer fails, the request body
   * ends with the producer's error. The producer's error is reported unless
   * it is the request's error passed back through a write.
   */
  async uploadWithWriter(
    options: RequestOptions | undefined,
    producer: ContentProducer
  ): Promise<void> {
    const pipe = new BoundedPipe(UPLOAD_PIPE_CAPACITY);

    const producing = (async () => {
      try {
        await producer(pipe);
        pipe.close();
      } catch (error) {
        pipe.fail(error);
        throw error;
      }
    })();

    const consuming = (async () => {
      try {
        await this.upload(pipe, options);
      } catch (error) {
        pipe.closeReader(error);
        throw error;
      }
      pipe.closeReader();
    })();

    const [produced, consumed] = await Promise.allSettled([producing, consuming]);
    if (produced.status === 'rejected') {
      if (consumed.status === 'rejected' && produced.reason === consumed.reason) {
        throw consumed.reason;
      }
      throw produced.reason;
    }
    if (consumed.status === 'rejected') {
      throw consumed.reason;
    }
  }

  /**
   * Deletes the object (expects 204). A missing object is an error.
   */
  async delete(options?: RequestOptions): Promise<void> {
    await executeRequest(this.backend, {
      method: 'DELETE',
      containerName: this.container.name,
      objectName: this.name,
      options,
      expectStatusCodes: [204],
      drainResponseBody: true,
    });
    this.invalidate();
  }

  /**
   * Drops the cached headers.
   */
  invalidate(): void {
    this.cachedHeaders = null;
  }

  /**
   * Fetches the object's content (GET, expects 200). The response headers
   * replace this instance's header cache.
   */
  async download(options?: RequestOptions): Promise<DownloadedObject> {
    const response = await executeRequest(this.backend, {
      method: 'GET',
      containerName: this.container.name,
      objectName: this.name,
      options,
      expectStatusCodes: [200],
    });

    const headers = new ObjectHeaders(response.headers);
    try {
      headers.validate();
    } catch (error) {
      await response.body.cancel();
      throw error;
    }
    this.cachedHeaders = headers;
    return new DownloadedObject(this.fullName(), headers.clone(), response.body);
  }

  /**
   * Copies the object on the server side (COPY, expects 201). Only the
   * target's cache is invalidated.
   */
  async copyTo(target: SwiftObject, options?: RequestOptions): Promise<void> {
    validateResourceNames(target.container.name, target.name);
    const opts = cloneRequestOptions(options);
    opts.headers.set(
      'Destination',
      `${encodePath(target.container.name)}/${encodePath(target.name)}`
    );
    const targetAccount = target.container.account.name;
    if (this.container.account.name !== targetAccount) {
      opts.headers.set('Destination-Account', targetAccount);
    }

    await executeRequest(this.backend, {
      method: 'COPY',
      containerName: this.container.name,
      objectName: this.name,
      options: opts,
      expectStatusCodes: [201],
      drainResponseBody: true,
    });
    target.invalidate();
  }

  /**
   * Copies the object to `target`, then deletes it. The delete is skipped if
   * the copy fails. If the delete fails, both objects exist.
   */
  async moveTo(
    target: SwiftObject,
    copyOptions?: RequestOptions,
    deleteOptions?: RequestOptions
  ): Promise<void> {
    await this.copyTo(target, copyOptions);
    await this.delete(deleteOptions);
  }
}
