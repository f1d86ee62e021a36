/**
 * Swift accounts
 *
 * @module account
 */

import { z } from 'zod';
import type { Backend } from '../backend/index.js';
import { AccountHeaders } from '../headers/index.js';
import { cloneRequestOptions, executeRequest, type RequestOptions } from '../request/index.js';
import { readBodyText } from '../transport/index.js';
import { ConfigurationError, SwiftError } from '../errors/index.js';
import { Container } from '../container/index.js';
import { ContainerIterator } from '../iterators/index.js';
import type { SwiftObject, UploadContent } from '../object/index.js';
import {
  bulkDelete,
  bulkUpload,
  type ArchiveFormat,
  type BulkDeleteResult,
} from '../bulk/index.js';

const capabilitiesSchema = z
  .object({
    swift: z
      .object({
        version: z.string().optional(),
        max_file_size: z.number().optional(),
        max_object_name_length: z.number().optional(),
        container_listing_limit: z.number().optional(),
      })
      .passthrough(),
    bulk_delete: z
      .object({
        max_deletes_per_request: z.number().optional(),
        max_failed_deletes: z.number().optional(),
      })
      .passthrough()
      .optional(),
    bulk_upload: z
      .object({
        max_containers_per_extraction: z.number().optional(),
        max_failed_extractions: z.number().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

/**
 * Cluster capabilities reported by `GET /info`. Middlewares not listed here
 * are kept as unparsed JSON.
 */
export type Capabilities = z.infer<typeof capabilitiesSchema>;

/**
 * A Swift account.
 *
 * Creating an instance does not touch the server. Headers are fetched
 * lazily (GET, which also returns the first page of the container listing)
 * and cached on this instance.
 */
export class Account {
  private cachedHeaders: AccountHeaders | null = null;
  private cachedCapabilities: Capabilities | null = null;

  private constructor(
    readonly backend: Backend,
    readonly name: string
  ) {}

  /**
   * Creates an account for the backend's endpoint URL. The account name is
   * the last path segment of that URL, e.g. `AUTH_test`.
   */
  static fromBackend(backend: Backend): Account {
    const name = lastPathSegment(backend.endpointUrl());
    if (name === '') {
      throw new ConfigurationError(
        `storage URL ${backend.endpointUrl()} does not name an account`,
        'storageUrl'
      );
    }
    return new Account(backend, name);
  }

  /**
   * Returns an account with the same credentials, for the account with the
   * given name on the same cluster. This only works if the credentials are
   * authorized for that account.
   */
  switchAccount(accountName: string): Account {
    const url = new URL(this.backend.endpointUrl());
    const segments = url.pathname.replace(/\/+$/, '').split('/');
    segments[segments.length - 1] = encodeURIComponent(accountName);
    url.pathname = `${segments.join('/')}/`;
    return new Account(this.backend.clone(url.toString()), accountName);
  }

  /**
   * Returns a handle for the container with the given name. No request is
   * made.
   */
  container(name: string): Container {
    return new Container(this, name);
  }

  /**
   * Returns an iterator over the containers in this account.
   */
  containers(prefix = '', options?: RequestOptions): ContainerIterator {
    return new ContainerIterator(this, prefix, options);
  }

  /**
   * Returns the account's headers, from cache if possible (GET, expects 200
   * or 204). The returned instance is a copy.
   */
  async headers(): Promise<AccountHeaders> {
    if (this.cachedHeaders) {
      return this.cachedHeaders.clone();
    }

    const response = await executeRequest(this.backend, {
      method: 'GET',
      expectStatusCodes: [200, 204],
      drainResponseBody: true,
    });

    const headers = new AccountHeaders(response.headers);
    headers.validate();
    this.cachedHeaders = headers;
    return headers.clone();
  }

  /**
   * Stores headers received from a container listing if nothing is cached
   * yet. Malformed headers are left for {@link headers} to report.
   */
  primeHeaderCache(headers: AccountHeaders): void {
    if (this.cachedHeaders === null && headers.validationError() === undefined) {
      this.cachedHeaders = headers.clone();
    }
  }

  /**
   * Updates the account's headers with a POST request (expects 204).
   */
  async update(headers: AccountHeaders, options?: RequestOptions): Promise<void> {
    await executeRequest(this.backend, {
      method: 'POST',
      options: cloneRequestOptions(options, headers),
      expectStatusCodes: [204],
      drainResponseBody: true,
    });
    this.invalidate();
  }

  /**
   * Drops the cached headers and capabilities.
   */
  invalidate(): void {
    this.cachedHeaders = null;
    this.cachedCapabilities = null;
  }

  /**
   * Queries the cluster's capabilities (`GET /info` on the storage host).
   */
  async capabilities(): Promise<Capabilities> {
    if (this.cachedCapabilities) {
      return this.cachedCapabilities;
    }

    const origin = new URL(this.backend.endpointUrl()).origin;
    const response = await executeRequest(this.backend.clone(`${origin}/`), {
      method: 'GET',
      containerName: 'info',
      expectStatusCodes: [200],
    });
    const text = await readBodyText(response.body);

    let document: unknown;
    try {
      document = JSON.parse(text);
    } catch (error) {
      throw new SwiftError('capabilities response is not valid JSON', 'Capabilities.Malformed', {
        cause: error,
      });
    }
    const result = capabilitiesSchema.safeParse(document);
    if (!result.success) {
      throw new SwiftError(
        `malformed capabilities: ${result.error.issues.map((i) => `${i.path.join('.')} ${i.message}`).join(', ')}`,
        'Capabilities.Malformed'
      );
    }
    this.cachedCapabilities = result.data;
    return result.data;
  }

  /**
   * Deletes the given objects and containers in bulk. See {@link bulkDelete}.
   */
  async bulkDelete(
    objects: readonly SwiftObject[],
    containers: readonly Container[] = [],
    options?: RequestOptions
  ): Promise<BulkDeleteResult> {
    return bulkDelete(this, objects, containers, options);
  }

  /**
   * Uploads an archive for server-side extraction. See {@link bulkUpload}.
   */
  async bulkUpload(
    uploadPath: string,
    format: ArchiveFormat,
    content: UploadContent,
    options?: RequestOptions
  ): Promise<number> {
    return bulkUpload(this, uploadPath, format, content, options);
  }
}

function lastPathSegment(url: string): string {
  const segments = new URL(url).pathname.split('/').filter((segment) => segment !== '');
  const last = segments[segments.length - 1];
  return last === undefined ? '' : decodeURIComponent(last);
}
