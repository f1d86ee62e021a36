/**
 * Swift containers
 *
 * @module container
 */

import type { Account } from '../account/index.js';
import type { Backend } from '../backend/index.js';
import { ContainerHeaders } from '../headers/index.js';
import { cloneRequestOptions, executeRequest, type RequestOptions } from '../request/index.js';
import { isStatusCode } from '../errors/index.js';
import { SwiftObject } from '../object/index.js';
import { ObjectIterator } from '../iterators/index.js';

/**
 * A container in a Swift account.
 *
 * Creating an instance does not touch the server. Headers are cached on
 * this instance in the same way as for {@link SwiftObject}.
 */
export class Container {
  private cachedHeaders: ContainerHeaders | null = null;

  constructor(
    readonly account: Account,
    readonly name: string
  ) {}

  private get backend(): Backend {
    return this.account.backend;
  }

  /**
   * Returns a handle for the object with the given name. No request is made.
   */
  object(name: string): SwiftObject {
    return new SwiftObject(this, name);
  }

  /**
   * Returns an iterator over the objects in this container.
   */
  objects(prefix = '', options?: RequestOptions): ObjectIterator {
    return new ObjectIterator(this, prefix, options);
  }

  /**
   * Returns the container's headers, from cache if possible (HEAD, expects
   * 204). The returned instance is a copy.
   */
  async headers(): Promise<ContainerHeaders> {
    if (this.cachedHeaders) {
      return this.cachedHeaders.clone();
    }

    const response = await executeRequest(this.backend, {
      method: 'HEAD',
      containerName: this.name,
      expectStatusCodes: [204],
      drainResponseBody: true,
    });

    const headers = new ContainerHeaders(response.headers);
    headers.validate();
    this.cachedHeaders = headers;
    return headers.clone();
  }

  /**
   * Stores headers received from a container listing if nothing is cached
   * yet. Malformed headers are ignored here; {@link headers} reports them.
   */
  primeHeaderCache(headers: ContainerHeaders): void {
    if (this.cachedHeaders === null && headers.validationError() === undefined) {
      this.cachedHeaders = headers.clone();
    }
  }

  /**
   * Checks whether the container exists. A 404 maps to false; other errors
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
   * Updates the container's headers with a POST request (expects 204).
   */
  async update(headers: ContainerHeaders, options?: RequestOptions): Promise<void> {
    await executeRequest(this.backend, {
      method: 'POST',
      containerName: this.name,
      options: cloneRequestOptions(options, headers),
      expectStatusCodes: [204],
      drainResponseBody: true,
    });
    this.invalidate();
  }

  /**
   * Creates the container with a PUT request. Swift answers 202 when the
   * container exists already, which counts as success.
   */
  async create(options?: RequestOptions): Promise<void> {
    await executeRequest(this.backend, {
      method: 'PUT',
      containerName: this.name,
      options,
      expectStatusCodes: [201, 202],
      drainResponseBody: true,
    });
    this.invalidate();
  }

  /**
   * Creates the container unless it exists. Returns this container.
   */
  async ensureExists(options?: RequestOptions): Promise<Container> {
    if (!(await this.exists())) {
      await this.create(options);
    }
    return this;
  }

  /**
   * Deletes the container (expects 204). A missing container is an error,
   * and Swift refuses to delete a container that still holds objects.
   */
  async delete(options?: RequestOptions): Promise<void> {
    await executeRequest(this.backend, {
      method: 'DELETE',
      containerName: this.name,
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
}
