/**
 * Scripted transport for unit tests.
 */

import type { HttpRequest, HttpTransport, RequestBody, StreamingHttpResponse } from '../transport/index.js';
import { bodyFromBytes } from '../transport/index.js';

/**
 * A request as seen by {@link MockTransport}, with its body read completely.
 */
export interface RecordedRequest {
  method: string;
  url: string;
  headers: Record<string, string>;
  body: Buffer;
}

/**
 * A canned response. Header keys may use any case.
 */
export interface MockResponse {
  status: number;
  headers?: Record<string, string>;
  body?: string | Uint8Array;
}

export type MockHandler = (request: RecordedRequest) => MockResponse | Promise<MockResponse>;

/**
 * Reads a request body completely.
 */
export async function collectRequestBody(body: RequestBody | undefined): Promise<Buffer> {
  if (body === undefined) {
    return Buffer.alloc(0);
  }
  if (body instanceof Uint8Array) {
    return Buffer.from(body);
  }
  const chunks: Uint8Array[] = [];
  for await (const chunk of body) {
    chunks.push(chunk);
  }
  return Buffer.concat(chunks);
}

/**
 * Converts a canned response into a transport response.
 */
export function toStreamingResponse(response: MockResponse): StreamingHttpResponse {
  const headers: Record<string, string> = {};
  for (const [key, value] of Object.entries(response.headers ?? {})) {
    headers[key.toLowerCase()] = value;
  }
  return {
    status: response.status,
    headers,
    body: bodyFromBytes(response.body ?? ''),
  };
}

/**
 * Mock transport that returns configurable responses.
 *
 * Handlers are matched in registration order by method and URL: a string
 * pattern matches any URL containing it, a RegExp is tested against the URL.
 * Request bodies are always read in full before the handler runs.
 */
export class MockTransport implements HttpTransport {
  private handlers: Array<{ method: string; pattern: string | RegExp; handler: MockHandler }> = [];
  private defaultHandler?: MockHandler;
  private calls: RecordedRequest[] = [];

  /**
   * Register a handler for a specific method and URL pattern.
   */
  on(method: string, urlPattern: string | RegExp, handler: MockHandler): this {
    this.handlers.push({ method, pattern: urlPattern, handler });
    return this;
  }

  /**
   * Register a handler that answers every matching request with `response`.
   */
  respond(method: string, urlPattern: string | RegExp, response: MockResponse): this {
    return this.on(method, urlPattern, () => response);
  }

  /**
   * Set default handler for unmatched requests.
   */
  onDefault(handler: MockHandler): this {
    this.defaultHandler = handler;
    return this;
  }

  async send(request: HttpRequest): Promise<StreamingHttpResponse> {
    const recorded: RecordedRequest = {
      method: request.method,
      url: request.url,
      headers: { ...request.headers },
      body: await collectRequestBody(request.body),
    };
    this.calls.push(recorded);

    for (const { method, pattern, handler } of this.handlers) {
      if (method !== request.method) continue;
      const matches = typeof pattern === 'string'
        ? request.url.includes(pattern)
        : pattern.test(request.url);
      if (matches) {
        return toStreamingResponse(await handler(recorded));
      }
    }

    if (this.defaultHandler) {
      return toStreamingResponse(await this.defaultHandler(recorded));
    }

    return toStreamingResponse({ status: 404, body: 'Not Found' });
  }

  /**
   * Get all requests that were sent.
   */
  getCalls(): RecordedRequest[] {
    return [...this.calls];
  }

  /**
   * Clear all handlers and calls.
   */
  clear(): void {
    this.handlers = [];
    this.defaultHandler = undefined;
    this.calls = [];
  }
}
