/**
 * Backend wrapper that counts requests.
 */

import type { Backend } from '../backend/index.js';
import type { HttpRequest, StreamingHttpResponse } from '../transport/index.js';

/**
 * Passes requests through to another backend and records them, so tests
 * can assert how many requests an operation made.
 */
export class CountingBackend implements Backend {
  readonly requests: HttpRequest[] = [];

  constructor(private readonly inner: Backend) {}

  get count(): number {
    return this.requests.length;
  }

  endpointUrl(): string {
    return this.inner.endpointUrl();
  }

  clone(newEndpointUrl: string): Backend {
    return new CountingBackend(this.inner.clone(newEndpointUrl));
  }

  async do(request: HttpRequest): Promise<StreamingHttpResponse> {
    this.requests.push(request);
    return this.inner.do(request);
  }

  reset(): void {
    this.requests.length = 0;
  }
}
