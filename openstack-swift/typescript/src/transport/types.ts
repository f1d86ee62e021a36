/**
 * HTTP transport type definitions for the Swift client
 */

import { ReadableStream } from 'node:stream/web';

/**
 * Request body. Byte arrays can be sent any number of times; async iterables
 * are one-shot.
 */
export type RequestBody = Uint8Array | AsyncIterable<Uint8Array>;

/**
 * HTTP request
 */
export interface HttpRequest {
  /** HTTP method (GET, HEAD, PUT, POST, DELETE, COPY) */
  method: string;
  /** Full URL including protocol, host, path, and query string */
  url: string;
  /** HTTP headers */
  headers: Record<string, string>;
  /** Request body (optional) */
  body?: RequestBody;
}

/**
 * HTTP response with streaming body
 */
export interface StreamingHttpResponse {
  /** HTTP status code */
  status: number;
  /** HTTP headers, keys lower-cased */
  headers: Record<string, string>;
  /** Response body as stream; empty for HEAD and bodiless responses */
  body: ReadableStream<Uint8Array>;
}

/**
 * HTTP transport interface
 */
export interface HttpTransport {
  /**
   * Sends an HTTP request and returns as soon as the response headers have
   * arrived. The caller owns the response body and must consume or cancel it.
   */
  send(request: HttpRequest): Promise<StreamingHttpResponse>;
}

/**
 * Reports whether a request body can be sent again.
 */
export function isReplayableBody(body: RequestBody | undefined): boolean {
  return body === undefined || body instanceof Uint8Array;
}

/**
 * Helper to get header value (case-insensitive)
 */
export function getHeader(
  headers: Record<string, string>,
  name: string
): string | undefined {
  const lowerName = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === lowerName) {
      return value;
    }
  }
  return undefined;
}

/**
 * Reads a response body completely.
 */
export async function readBody(body: ReadableStream<Uint8Array>): Promise<Buffer> {
  const reader = body.getReader();
  const chunks: Uint8Array[] = [];
  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) {
        break;
      }
      chunks.push(value);
    }
  } finally {
    reader.releaseLock();
  }
  return Buffer.concat(chunks);
}

/**
 * Reads a response body completely and decodes it as UTF-8.
 */
export async function readBodyText(body: ReadableStream<Uint8Array>): Promise<string> {
  const bytes = await readBody(body);
  return bytes.toString('utf8');
}

/**
 * Consumes and discards a response body so that the connection can be reused.
 */
export async function drainBody(body: ReadableStream<Uint8Array>): Promise<void> {
  const reader = body.getReader();
  try {
    for (;;) {
      const { done } = await reader.read();
      if (done) {
        return;
      }
    }
  } finally {
    reader.releaseLock();
  }
}

/**
 * Creates a response body stream from the given bytes.
 */
export function bodyFromBytes(content: Uint8Array | string): ReadableStream<Uint8Array> {
  const bytes = typeof content === 'string' ? Buffer.from(content, 'utf8') : content;
  return new ReadableStream<Uint8Array>({
    start(controller) {
      if (bytes.length > 0) {
        controller.enqueue(bytes);
      }
      controller.close();
    },
  });
}

/**
 * Creates an empty response body stream.
 */
export function emptyBody(): ReadableStream<Uint8Array> {
  return bodyFromBytes(new Uint8Array(0));
}
