/**
 * Backend contract between the Swift client and the code providing
 * authentication for it, plus the token-based implementation.
 *
 * @module backend
 */

import type { HttpRequest, HttpTransport, StreamingHttpResponse } from '../transport/index.js';
import { drainBody, emptyBody, isReplayableBody } from '../transport/index.js';
import type { TokenProvider } from '../auth/index.js';
import type { Logger } from '../observability/index.js';
import { NoopLogger } from '../observability/index.js';

/**
 * Default User-Agent header.
 */
export const DEFAULT_USER_AGENT = 'openstack-swift-client/0.1.0';

/**
 * Executes HTTP requests against one Swift account.
 */
export interface Backend {
  /**
   * Storage URL of the account, e.g. `https://swift.example.com/v1/AUTH_test/`.
   */
  endpointUrl(): string;

  /**
   * Returns a backend with the same credentials bound to another endpoint URL.
   */
  clone(newEndpointUrl: string): Backend;

  /**
   * Executes the request with the current auth token attached. If the server
   * answers 401, the token is refreshed and the request is sent once more.
   */
  do(request: HttpRequest): Promise<StreamingHttpResponse>;
}

/**
 * Options for {@link AuthenticatedBackend}.
 */
export interface AuthenticatedBackendOptions {
  /** User-Agent header sent with every request. */
  userAgent?: string;
  /** Logger for request and reauthentication events. */
  logger?: Logger;
}

/**
 * Backend that attaches `X-Auth-Token` from a {@link TokenProvider}.
 *
 * Concurrent requests that all receive 401 each trigger their own
 * reauthentication and retry; a request is never sent more than twice.
 */
export class AuthenticatedBackend implements Backend {
  private readonly url: string;
  private readonly userAgent: string;
  private readonly logger: Logger;

  constructor(
    endpointUrl: string,
    private readonly provider: TokenProvider,
    private readonly transport: HttpTransport,
    private readonly options: AuthenticatedBackendOptions = {}
  ) {
    this.url = endpointUrl;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.logger = options.logger ?? new NoopLogger();
  }

  /**
   * Creates a backend bound to the storage URL reported by the provider.
   */
  static async create(
    provider: TokenProvider,
    transport: HttpTransport,
    options: AuthenticatedBackendOptions = {}
  ): Promise<AuthenticatedBackend> {
    const auth = await provider.getToken();
    return new AuthenticatedBackend(auth.storageUrl, provider, transport, options);
  }

  endpointUrl(): string {
    return this.url;
  }

  clone(newEndpointUrl: string): Backend {
    return new AuthenticatedBackend(newEndpointUrl, this.provider, this.transport, this.options);
  }

  async do(request: HttpRequest): Promise<StreamingHttpResponse> {
    const auth = await this.provider.getToken();
    const response = await this.send(request, auth.token);

    if (response.status !== 401) {
      return response;
    }

    await drainBody(response.body);
    this.logger.warn('auth token rejected, reauthenticating', {
      method: request.method,
      url: request.url,
    });
    const refreshed = await this.provider.reauthenticate(auth.token);

    if (!isReplayableBody(request.body)) {
      // the request body has been consumed and cannot be sent again
      this.logger.warn('request body is not replayable, returning 401', {
        method: request.method,
        url: request.url,
      });
      return { status: response.status, headers: response.headers, body: emptyBody() };
    }

    return this.send(request, refreshed.token);
  }

  private async send(request: HttpRequest, token: string): Promise<StreamingHttpResponse> {
    const response = await this.transport.send({
      ...request,
      headers: {
        ...request.headers,
        'User-Agent': this.userAgent,
        'X-Auth-Token': token,
      },
    });
    this.logger.debug('request completed', {
      method: request.method,
      url: request.url,
      status: response.status,
    });
    return response;
  }
}
