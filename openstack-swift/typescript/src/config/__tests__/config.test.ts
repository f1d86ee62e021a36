/**
 * Tests for Swift client configuration.
 */

import { describe, it, expect } from 'vitest';
import {
  SwiftConfig,
  SwiftConfigBuilder,
  DEFAULT_TIMEOUT,
  configFromEnv,
  createDefaultConfig,
  validateConfig,
} from '../index.js';
import { DEFAULT_USER_AGENT } from '../../backend/index.js';
import { ConfigurationError } from '../../errors/index.js';

function configError(fn: () => unknown): ConfigurationError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected a ConfigurationError');
}

describe('SwiftConfigBuilder', () => {
  it('should build a v1 auth config with defaults', () => {
    const config = new SwiftConfigBuilder()
      .v1Auth('https://swift.example.com/auth/v1.0', 'test:tester', 'test-secret')
      .build();

    expect(config).toEqual({
      authUrl: 'https://swift.example.com/auth/v1.0',
      user: 'test:tester',
      key: 'test-secret',
      userAgent: DEFAULT_USER_AGENT,
      timeout: DEFAULT_TIMEOUT,
      logLevel: 'info',
    });
  });

  it('should build a pre-authorized config', () => {
    const config = SwiftConfig.builder()
      .preauthorized('https://swift.example.com/v1/AUTH_test', 'test-token')
      .timeout(5000)
      .userAgent('backup-job/1.0')
      .logLevel('debug')
      .build();

    expect(config.storageUrl).toBe('https://swift.example.com/v1/AUTH_test');
    expect(config.token).toBe('test-token');
    expect(config.timeout).toBe(5000);
    expect(config.userAgent).toBe('backup-job/1.0');
    expect(config.logLevel).toBe('debug');
  });

  it('should require credentials', () => {
    const error = configError(() => new SwiftConfigBuilder().build());

    expect(error.field).toBe('storageUrl');
    expect(error.message).toBe(
      'Invalid configuration for storageUrl: either authUrl, user and key or storageUrl and token must be set'
    );
  });

  it('should reject a non-positive timeout', () => {
    const error = configError(() =>
      SwiftConfig.builder()
        .preauthorized('https://swift.example.com/v1/AUTH_test', 'test-token')
        .timeout(0)
        .build()
    );

    expect(error.field).toBe('timeout');
    expect(error.message).toBe('Invalid configuration for timeout: must be greater than 0');
  });

  it('should reject non-http URLs', () => {
    const error = configError(() =>
      SwiftConfig.builder().preauthorized('ftp://swift.example.com/v1/AUTH_test', 'test-token').build()
    );

    expect(error.field).toBe('storageUrl');
    expect(error.message).toBe('Invalid configuration for storageUrl: must use http or https');
  });

  it('should reject an empty user agent', () => {
    const error = configError(() =>
      SwiftConfig.builder()
        .preauthorized('https://swift.example.com/v1/AUTH_test', 'test-token')
        .userAgent('   ')
        .build()
    );

    expect(error.field).toBe('userAgent');
  });
});

describe('validateConfig', () => {
  it('should reject the default config', () => {
    expect(() => validateConfig(createDefaultConfig())).toThrow(ConfigurationError);
  });

  it('should accept a complete config', () => {
    expect(() =>
      SwiftConfig.validate({
        ...createDefaultConfig(),
        storageUrl: 'http://localhost:8080/v1/AUTH_test',
        token: 'test-token',
      })
    ).not.toThrow();
  });
});

describe('configFromEnv', () => {
  it('should read v1 credentials and options', () => {
    const config = configFromEnv({
      ST_AUTH: 'https://swift.example.com/auth/v1.0',
      ST_USER: 'test:tester',
      ST_KEY: 'test-secret',
      SWIFT_TIMEOUT: '5000',
      SWIFT_USER_AGENT: 'nightly-sync',
      SWIFT_LOG_LEVEL: 'DEBUG',
    }).build();

    expect(config.authUrl).toBe('https://swift.example.com/auth/v1.0');
    expect(config.user).toBe('test:tester');
    expect(config.key).toBe('test-secret');
    expect(config.timeout).toBe(5000);
    expect(config.userAgent).toBe('nightly-sync');
    expect(config.logLevel).toBe('debug');
  });

  it('should read pre-authorized credentials', () => {
    const config = SwiftConfig.fromEnv({
      OS_STORAGE_URL: 'https://swift.example.com/v1/AUTH_test',
      OS_AUTH_TOKEN: 'test-token',
    }).build();

    expect(config.storageUrl).toBe('https://swift.example.com/v1/AUTH_test');
    expect(config.token).toBe('test-token');
    expect(config.authUrl).toBeUndefined();
  });

  it('should reject a non-numeric timeout', () => {
    const error = configError(() => configFromEnv({ SWIFT_TIMEOUT: 'soon' }));
    expect(error.field).toBe('timeout');
    expect(error.message).toBe('SWIFT_TIMEOUT is not a number: soon');
  });

  it('should reject an unknown log level', () => {
    const error = configError(() => configFromEnv({ SWIFT_LOG_LEVEL: 'verbose' }));
    expect(error.field).toBe('logLevel');
  });

  it('should leave the config incomplete without credentials', () => {
    expect(() => configFromEnv({}).build()).toThrow(ConfigurationError);
  });
});
