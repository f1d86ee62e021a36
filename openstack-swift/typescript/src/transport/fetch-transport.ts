/**
 * Fetch-based HTTP transport implementation for the Swift client
 */

import { Agent, errors, fetch, type RequestInit } from 'undici';
import type { HttpRequest, HttpTransport, StreamingHttpResponse } from './types.js';
import { emptyBody } from './types.js';
import { NetworkError } from '../errors/index.js';

/**
 * Fetch transport options
 */
export interface FetchTransportOptions {
  /**
   * Longest idle wait, in milliseconds: for a connection, for the response
   * headers (restarted by every request body chunk sent), and between two
   * chunks of the response body.
   */
  timeout: number;
}

function isTimeoutError(error: unknown): boolean {
  return (
    error instanceof errors.HeadersTimeoutError ||
    error instanceof errors.BodyTimeoutError ||
    error instanceof errors.ConnectTimeoutError
  );
}

/**
 * Fetch-based HTTP transport implementation
 *
 * Uses undici's fetch on a dedicated agent, which also pools connections.
 * Timeouts are enforced by the agent as idle limits, so long uploads and
 * downloads are not cut off while data is flowing.
 */
export class FetchTransport implements HttpTransport {
  private readonly options: FetchTransportOptions;
  private readonly dispatcher: Agent;

  constructor(options: FetchTransportOptions) {
    this.options = options;
    this.dispatcher = new Agent({
      connect: { timeout: options.timeout },
      headersTimeout: options.timeout,
      bodyTimeout: options.timeout,
    });
  }

  async send(request: HttpRequest): Promise<StreamingHttpResponse> {
    const init: RequestInit = {
      method: request.method,
      headers: request.headers,
      dispatcher: this.dispatcher,
    };
    if (request.body !== undefined) {
      init.body = request.body;
      if (!(request.body instanceof Uint8Array)) {
        init.duplex = 'half';
      }
    }

    try {
      const response = await fetch(request.url, init);

      const headers: Record<string, string> = {};
      response.headers.forEach((value, key) => {
        headers[key.toLowerCase()] = value;
      });

      return {
        status: response.status,
        headers,
        body: response.body ?? emptyBody(),
      };
    } catch (error) {
      throw this.handleError(error, request);
    }
  }

  /**
   * Closes pooled connections. Requests in flight are allowed to finish.
   */
  async close(): Promise<void> {
    await this.dispatcher.close();
  }

  /**
   * Handles errors from fetch operations
   */
  private handleError(error: unknown, request: HttpRequest): Error {
    if (error instanceof NetworkError) {
      return error;
    }

    if (error instanceof Error) {
      if (isTimeoutError(error) || isTimeoutError(error.cause)) {
        return NetworkError.timeout(this.options.timeout);
      }
      return new NetworkError(
        `${request.method} ${request.url} failed: ${error.message}`,
        'ConnectionFailed',
        { cause: error }
      );
    }

    return new NetworkError(`${request.method} ${request.url} failed: ${String(error)}`);
  }
}

/**
 * Creates a fetch-based HTTP transport
 */
export function createFetchTransport(timeout: number = 30000): HttpTransport {
  return new FetchTransport({ timeout });
}
