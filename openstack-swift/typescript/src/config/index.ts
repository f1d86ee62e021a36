/**
 * Configuration types for the Swift client.
 * @module config
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';
import { DEFAULT_USER_AGENT } from '../backend/index.js';
import { LOG_LEVELS, type LogLevel } from '../observability/index.js';

/** Default request timeout in milliseconds (30 seconds). */
export const DEFAULT_TIMEOUT = 30000;

/** Default log level. */
export const DEFAULT_LOG_LEVEL: LogLevel = 'info';

/**
 * Swift client configuration.
 *
 * Either `authUrl`, `user` and `key` (Swift v1 authentication) or
 * `storageUrl` and `token` (pre-authorized access) must be set.
 */
export interface SwiftConfig {
  /** v1 auth endpoint, e.g. "https://swift.example.com/auth/v1.0". */
  authUrl?: string;
  /** v1 auth user, e.g. "account:user". */
  user?: string;
  /** v1 auth key. */
  key?: string;
  /** Storage URL of the account, for pre-authorized access. */
  storageUrl?: string;
  /** Auth token, for pre-authorized access. */
  token?: string;
  /** User-Agent header. */
  userAgent: string;
  /** Idle timeout in milliseconds for connecting, awaiting response headers and reading the body. */
  timeout: number;
  /** Minimum level of log messages. */
  logLevel: LogLevel;
}

const httpUrlSchema = z
  .string()
  .url()
  .refine((value) => /^https?:\/\//i.test(value), { message: 'must use http or https' });

const configSchema = z
  .object({
    authUrl: httpUrlSchema.optional(),
    user: z.string().min(1).optional(),
    key: z.string().min(1).optional(),
    storageUrl: httpUrlSchema.optional(),
    token: z.string().min(1).optional(),
    userAgent: z.string().trim().min(1, { message: 'cannot be empty' }),
    timeout: z.number().int().positive({ message: 'must be greater than 0' }),
    logLevel: z.enum(LOG_LEVELS),
  })
  .superRefine((config, ctx) => {
    const v1 = config.authUrl !== undefined && config.user !== undefined && config.key !== undefined;
    const preauth = config.storageUrl !== undefined && config.token !== undefined;
    if (!v1 && !preauth) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [config.authUrl !== undefined ? (config.user === undefined ? 'user' : 'key') : 'storageUrl'],
        message: 'either authUrl, user and key or storageUrl and token must be set',
      });
    }
  });

/**
 * Creates a default configuration. It has no credentials yet, so it does
 * not pass validation.
 */
export function createDefaultConfig(): SwiftConfig {
  return {
    userAgent: DEFAULT_USER_AGENT,
    timeout: DEFAULT_TIMEOUT,
    logLevel: DEFAULT_LOG_LEVEL,
  };
}

/**
 * Validates a Swift configuration.
 * @throws {ConfigurationError} naming the first invalid field
 */
export function validateConfig(config: SwiftConfig): void {
  const result = configSchema.safeParse(config);
  if (result.success) {
    return;
  }
  const issue = result.error.issues[0];
  const field = issue?.path.join('.') ?? '';
  throw new ConfigurationError(
    `Invalid configuration${field ? ` for ${field}` : ''}: ${issue?.message ?? 'unknown error'}`,
    field || undefined
  );
}

/**
 * Builder for SwiftConfig.
 */
export class SwiftConfigBuilder {
  private config: SwiftConfig;

  constructor() {
    this.config = createDefaultConfig();
  }

  /**
   * Uses Swift v1 authentication.
   * @returns The builder instance for chaining.
   */
  v1Auth(authUrl: string, user: string, key: string): this {
    this.config.authUrl = authUrl;
    this.config.user = user;
    this.config.key = key;
    return this;
  }

  /**
   * Uses a pre-authorized storage URL and token.
   * @returns The builder instance for chaining.
   */
  preauthorized(storageUrl: string, token: string): this {
    this.config.storageUrl = storageUrl;
    this.config.token = token;
    return this;
  }

  /**
   * Sets the request timeout in milliseconds.
   * @returns The builder instance for chaining.
   */
  timeout(timeout: number): this {
    this.config.timeout = timeout;
    return this;
  }

  /**
   * Sets the User-Agent header.
   * @returns The builder instance for chaining.
   */
  userAgent(userAgent: string): this {
    this.config.userAgent = userAgent;
    return this;
  }

  /**
   * Sets the log level.
   * @returns The builder instance for chaining.
   */
  logLevel(level: LogLevel): this {
    this.config.logLevel = level;
    return this;
  }

  /**
   * Builds and validates the configuration.
   * @throws {ConfigurationError} If the configuration is invalid.
   */
  build(): SwiftConfig {
    validateConfig(this.config);
    return { ...this.config };
  }
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Creates a configuration builder from environment variables.
 *
 * Environment variables:
 * - ST_AUTH, ST_USER, ST_KEY: v1 authentication
 * - OS_STORAGE_URL, OS_AUTH_TOKEN: pre-authorized access
 * - SWIFT_TIMEOUT: Request timeout in milliseconds
 * - SWIFT_USER_AGENT: Custom User-Agent string
 * - SWIFT_LOG_LEVEL: error, warn, info, debug or trace
 *
 * @returns A configuration builder pre-configured from environment variables.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): SwiftConfigBuilder {
  const builder = new SwiftConfigBuilder();

  const authUrl = env.ST_AUTH;
  const user = env.ST_USER;
  const key = env.ST_KEY;
  if (authUrl && user && key) {
    builder.v1Auth(authUrl, user, key);
  }

  const storageUrl = env.OS_STORAGE_URL;
  const token = env.OS_AUTH_TOKEN;
  if (storageUrl && token) {
    builder.preauthorized(storageUrl, token);
  }

  const timeout = env.SWIFT_TIMEOUT;
  if (timeout) {
    const parsed = parseInt(timeout, 10);
    if (isNaN(parsed)) {
      throw new ConfigurationError(`SWIFT_TIMEOUT is not a number: ${timeout}`, 'timeout');
    }
    builder.timeout(parsed);
  }

  const userAgent = env.SWIFT_USER_AGENT;
  if (userAgent) {
    builder.userAgent(userAgent);
  }

  const logLevel = env.SWIFT_LOG_LEVEL;
  if (logLevel) {
    const level = logLevel.toLowerCase();
    if (!isLogLevel(level)) {
      throw new ConfigurationError(`SWIFT_LOG_LEVEL is not a log level: ${logLevel}`, 'logLevel');
    }
    builder.logLevel(level);
  }

  return builder;
}

/**
 * Namespace for SwiftConfig-related utilities.
 */
export namespace SwiftConfig {
  /**
   * Creates a new configuration builder.
   */
  export function builder(): SwiftConfigBuilder {
    return new SwiftConfigBuilder();
  }

  /**
   * Validates a configuration.
   * @throws {ConfigurationError} If the configuration is invalid.
   */
  export function validate(config: SwiftConfig): void {
    validateConfig(config);
  }

  /**
   * Creates a configuration builder from environment variables.
   */
  export function fromEnv(env?: NodeJS.ProcessEnv): SwiftConfigBuilder {
    return configFromEnv(env);
  }
}
