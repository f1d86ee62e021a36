/**
 * Request executor
 *
 * Turns a logical Swift operation (method, container, object, options) into
 * an HTTP request, sends it through a {@link Backend} and checks the response
 * status against the codes the operation accepts.
 *
 * @module request
 */

import type { Backend } from '../backend/index.js';
import type { RequestBody, StreamingHttpResponse } from '../transport/index.js';
import { drainBody, readBodyText } from '../transport/index.js';
import { Headers, HeaderSet } from '../headers/index.js';
import { InvalidNameError, UnexpectedStatusCodeError } from '../errors/index.js';

/**
 * Additional headers and query parameters for a single request.
 */
export interface RequestOptions {
  headers?: Headers | Record<string, string>;
  values?: Record<string, string>;
}

/**
 * Request options after cloning, with every part present.
 */
export interface ResolvedRequestOptions {
  headers: Headers;
  values: Record<string, string>;
}

/**
 * Deep-copies request options so that the caller's instance is never
 * mutated. Headers from `extra` are applied on top of the option headers.
 */
export function cloneRequestOptions(
  options?: RequestOptions,
  extra?: HeaderSet | Headers
): ResolvedRequestOptions {
  const headers = new Headers(options?.headers);
  const values = { ...options?.values };
  if (extra !== undefined) {
    const source = extra instanceof HeaderSet ? extra.headers : extra;
    for (const [key, value] of source.entries()) {
      headers.set(key, value);
    }
  }
  return { headers, values };
}

/**
 * Percent-encodes one path segment. Unlike `encodeURIComponent`, this also
 * escapes `!'()*`.
 */
export function encodePathSegment(segment: string): string {
  return encodeURIComponent(segment).replace(
    /[!'()*]/g,
    (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`
  );
}

/**
 * Percent-encodes a container or object name, keeping `/` separators.
 */
export function encodePath(name: string): string {
  return name.split('/').map(encodePathSegment).join('/');
}

function isDotSegment(segment: string): boolean {
  return segment === '.' || segment === '..';
}

/**
 * Rejects names that would not survive URL normalization. Parsers collapse
 * `.` and `..` path segments (percent-encoded or not), which would send the
 * request to a different resource.
 *
 * @throws {InvalidNameError}
 */
export function validateResourceNames(containerName?: string, objectName?: string): void {
  if (containerName !== undefined && containerName !== '') {
    if (containerName.includes('/')) {
      throw new InvalidNameError('container', containerName, 'must not contain "/"');
    }
    if (isDotSegment(containerName)) {
      throw new InvalidNameError('container', containerName, 'must not be "." or ".."');
    }
  }
  if (objectName !== undefined && objectName.split('/').some(isDotSegment)) {
    throw new InvalidNameError('object', objectName, 'must not contain "." or ".." path segments');
  }
}

/**
 * Builds the URL for a request below the given endpoint URL.
 */
export function buildUrl(
  endpointUrl: string,
  containerName?: string,
  objectName?: string,
  values?: Record<string, string>
): string {
  let url = endpointUrl.endsWith('/') ? endpointUrl : `${endpointUrl}/`;
  if (containerName !== undefined && containerName !== '') {
    url += encodePath(containerName);
    if (objectName !== undefined && objectName !== '') {
      url += `/${encodePath(objectName)}`;
    }
  }
  const query = new URLSearchParams(values).toString();
  return query === '' ? url : `${url}?${query}`;
}

/**
 * A logical Swift request.
 */
export interface SwiftRequest {
  method: string;
  containerName?: string;
  objectName?: string;
  options?: RequestOptions;
  body?: RequestBody;
  /** Status codes that count as success. */
  expectStatusCodes: readonly number[];
  /** Consume the response body before returning. */
  drainResponseBody?: boolean;
}

/**
 * Executes a Swift request.
 *
 * @throws {InvalidNameError} if a name cannot be addressed; nothing is sent
 * @throws {UnexpectedStatusCodeError} if the response status is not one of
 * `expectStatusCodes`; the message carries the start of the response body
 */
export async function executeRequest(
  backend: Backend,
  request: SwiftRequest
): Promise<StreamingHttpResponse> {
  validateResourceNames(request.containerName, request.objectName);
  const options = cloneRequestOptions(request.options);
  const url = buildUrl(
    backend.endpointUrl(),
    request.containerName,
    request.objectName,
    options.values
  );

  const response = await backend.do({
    method: request.method,
    url,
    headers: options.headers.toRecord(),
    body: request.body,
  });

  if (!request.expectStatusCodes.includes(response.status)) {
    let body = '';
    if (request.method === 'HEAD') {
      await drainBody(response.body);
    } else {
      body = await readBodyText(response.body);
    }
    throw new UnexpectedStatusCodeError(response.status, request.expectStatusCodes, body);
  }

  if (request.drainResponseBody) {
    await drainBody(response.body);
  }
  return response;
}
