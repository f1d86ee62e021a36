/**
 * Authentication providers for the Swift client.
 *
 * A provider hands out the current auth token together with the storage URL
 * of the account it is valid for, and refreshes the token when the server
 * has rejected it.
 *
 * @module auth
 */

import type { HttpTransport } from '../transport/index.js';
import { drainBody, getHeader } from '../transport/index.js';
import { AuthenticationError } from '../errors/index.js';

/**
 * Secret string wrapper to prevent accidental exposure.
 */
export class SecretString {
  private readonly value: string;

  constructor(value: string) {
    this.value = value;
  }

  /**
   * Exposes the secret value.
   */
  expose(): string {
    return this.value;
  }

  toString(): string {
    return '***';
  }

  toJSON(): string {
    return '***';
  }
}

/**
 * An auth token plus the storage URL of the account it belongs to.
 */
export interface AuthToken {
  token: string;
  storageUrl: string;
}

/**
 * Token provider interface for dynamic credential resolution.
 */
export interface TokenProvider {
  /**
   * Returns the current token, authenticating first if there is none.
   */
  getToken(): Promise<AuthToken>;

  /**
   * Called after the server answered 401 to a request carrying
   * `rejectedToken`. Returns the token to retry with.
   */
  reauthenticate(rejectedToken: string): Promise<AuthToken>;
}

/**
 * Provider for a pre-authorized storage URL and token. The token cannot be
 * refreshed, so a rejected token is handed out again.
 */
export class StaticTokenProvider implements TokenProvider {
  private readonly storageUrl: string;
  private readonly token: SecretString;

  constructor(storageUrl: string, token: string) {
    this.storageUrl = storageUrl;
    this.token = new SecretString(token);
  }

  async getToken(): Promise<AuthToken> {
    return { token: this.token.expose(), storageUrl: this.storageUrl };
  }

  async reauthenticate(_rejectedToken: string): Promise<AuthToken> {
    return this.getToken();
  }
}

/**
 * Swift v1 authentication (`GET <authUrl>` with `X-Auth-User` and
 * `X-Auth-Key`), as offered by TempAuth and SwAuth.
 *
 * Concurrent callers share one in-flight authentication request.
 */
export class V1AuthTokenProvider implements TokenProvider {
  private current: AuthToken | null = null;
  private inFlight: Promise<AuthToken> | null = null;
  private readonly key: SecretString;

  constructor(
    private readonly authUrl: string,
    private readonly user: string,
    key: string,
    private readonly transport: HttpTransport
  ) {
    this.key = new SecretString(key);
  }

  async getToken(): Promise<AuthToken> {
    if (this.current) {
      return this.current;
    }
    return this.authenticate();
  }

  async reauthenticate(rejectedToken: string): Promise<AuthToken> {
    // another request may have refreshed the token already
    if (this.current && this.current.token !== rejectedToken) {
      return this.current;
    }
    this.current = null;
    return this.authenticate();
  }

  private authenticate(): Promise<AuthToken> {
    if (this.inFlight) {
      return this.inFlight;
    }
    this.inFlight = this.fetchToken().finally(() => {
      this.inFlight = null;
    });
    return this.inFlight;
  }

  private async fetchToken(): Promise<AuthToken> {
    const response = await this.transport.send({
      method: 'GET',
      url: this.authUrl,
      headers: {
        'X-Auth-User': this.user,
        'X-Auth-Key': this.key.expose(),
      },
    });
    await drainBody(response.body);

    if (response.status !== 200 && response.status !== 204) {
      throw new AuthenticationError(
        `authentication at ${this.authUrl} failed with status ${response.status}`,
        { statusCode: response.status }
      );
    }

    const token = getHeader(response.headers, 'X-Auth-Token');
    const storageUrl = getHeader(response.headers, 'X-Storage-Url');
    if (!token || !storageUrl) {
      throw new AuthenticationError(
        `authentication at ${this.authUrl} did not return X-Auth-Token and X-Storage-Url`
      );
    }

    this.current = { token, storageUrl };
    return this.current;
  }
}
