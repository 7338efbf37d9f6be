/**
 * Tests for configuration.
 */

import { describe, it, expect } from 'vitest';
import {
  APPMETRICA_EXPORT_BASE_URL,
  AppMetricaConfigBuilder,
  ConfigurationError,
  DEFAULT_POLLING_CONFIG,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_USER_AGENT,
  SecretString,
  validateConfig,
} from '../index.js';

describe('AppMetricaConfigBuilder', () => {
  it('should build with defaults', () => {
    const config = new AppMetricaConfigBuilder().withToken('test-token').build();

    expect(config.token.expose()).toBe('test-token');
    expect(config.baseUrl).toBe(APPMETRICA_EXPORT_BASE_URL);
    expect(config.requestTimeoutMs).toBe(DEFAULT_REQUEST_TIMEOUT_MS);
    expect(config.userAgent).toBe(DEFAULT_USER_AGENT);
    expect(config.polling).toEqual(DEFAULT_POLLING_CONFIG);
    expect(config.fetch).toBeUndefined();
  });

  it('should require a token', () => {
    expect(() => new AppMetricaConfigBuilder().build()).toThrow(
      'Configuration error: OAuth token is required'
    );
  });

  it('should reject a blank token', () => {
    expect(() => new AppMetricaConfigBuilder().withToken('   ')).toThrow(ConfigurationError);
  });

  it('should trim the token', () => {
    const config = new AppMetricaConfigBuilder().withToken('  test-token\n').build();
    expect(config.token.expose()).toBe('test-token');
  });

  it('should strip trailing slashes from the base URL', () => {
    const config = new AppMetricaConfigBuilder()
      .withToken('test-token')
      .withBaseUrl('https://proxy.example.com/export//')
      .build();

    expect(config.baseUrl).toBe('https://proxy.example.com/export');
  });

  it('should reject a plain HTTP base URL', () => {
    const builder = new AppMetricaConfigBuilder()
      .withToken('test-token')
      .withBaseUrl('http://proxy.example.com/export');

    expect(() => builder.build()).toThrow('Configuration error: baseUrl: must be HTTPS');
  });

  it('should merge partial polling overrides', () => {
    const config = new AppMetricaConfigBuilder()
      .withToken('test-token')
      .withPolling({ maxRetries: 3 })
      .withPolling({ maxWaitMs: 60000 })
      .build();

    expect(config.polling).toEqual({ ...DEFAULT_POLLING_CONFIG, maxRetries: 3, maxWaitMs: 60000 });
  });

  it('should reject a max delay below the initial delay', () => {
    const builder = new AppMetricaConfigBuilder()
      .withToken('test-token')
      .withPolling({ initialDelayMs: 5000, maxDelayMs: 1000 });

    expect(() => builder.build()).toThrow(
      'Configuration error: polling.maxDelayMs: maxDelayMs must not be lower than initialDelayMs'
    );
  });

  it('should reject a multiplier that keeps delays flat', () => {
    const builder = new AppMetricaConfigBuilder()
      .withToken('test-token')
      .withPolling({ multiplier: 1, jitterFactor: 0 });

    expect(() => builder.build()).toThrow(
      'Configuration error: polling.multiplier: multiplier must be greater than 1 + jitterFactor'
    );
  });

  it('should reject a multiplier that jitter can overtake', () => {
    const builder = new AppMetricaConfigBuilder()
      .withToken('test-token')
      .withPolling({ multiplier: 1.05, jitterFactor: 0.1 });

    expect(() => builder.build()).toThrow(/polling\.multiplier/);
  });

  it('should accept a multiplier above 1 + jitterFactor', () => {
    const config = new AppMetricaConfigBuilder()
      .withToken('test-token')
      .withPolling({ multiplier: 1.5, jitterFactor: 0.1 })
      .build();

    expect(config.polling.multiplier).toBe(1.5);
  });

  it('should reject a zero initial delay', () => {
    const builder = new AppMetricaConfigBuilder()
      .withToken('test-token')
      .withPolling({ initialDelayMs: 0 });

    expect(() => builder.build()).toThrow(/polling\.initialDelayMs/);
  });

  it('should reject a jitter factor of one or more', () => {
    const builder = new AppMetricaConfigBuilder()
      .withToken('test-token')
      .withPolling({ jitterFactor: 1 });

    expect(() => builder.build()).toThrow(/polling\.jitterFactor/);
  });

  it('should reject a negative retry budget', () => {
    const builder = new AppMetricaConfigBuilder()
      .withToken('test-token')
      .withPolling({ maxRetries: -1 });

    expect(() => builder.build()).toThrow(/polling\.maxRetries/);
  });

  it('should keep a custom fetch and user agent', () => {
    const fetchImpl: typeof fetch = async () => new Response('ok');
    const config = new AppMetricaConfigBuilder()
      .withToken('test-token')
      .withFetch(fetchImpl)
      .withUserAgent('nightly-sync/2.0')
      .withRequestTimeout(1000)
      .build();

    expect(config.fetch).toBe(fetchImpl);
    expect(config.userAgent).toBe('nightly-sync/2.0');
    expect(config.requestTimeoutMs).toBe(1000);
  });
});

describe('AppMetricaConfigBuilder.fromEnv', () => {
  it('should read every supported variable', () => {
    const config = AppMetricaConfigBuilder.fromEnv({
      APPMETRICA_TOKEN: 'test-token',
      APPMETRICA_BASE_URL: 'https://proxy.example.com/export/',
      APPMETRICA_REQUEST_TIMEOUT_MS: '120000',
      APPMETRICA_MAX_RETRIES: '5',
      APPMETRICA_INITIAL_DELAY_MS: '2000',
      APPMETRICA_MAX_DELAY_MS: '20000',
      APPMETRICA_MAX_WAIT_MS: '600000',
    }).build();

    expect(config.token.expose()).toBe('test-token');
    expect(config.baseUrl).toBe('https://proxy.example.com/export');
    expect(config.requestTimeoutMs).toBe(120000);
    expect(config.polling).toEqual({
      maxRetries: 5,
      initialDelayMs: 2000,
      maxDelayMs: 20000,
      multiplier: 2,
      jitterFactor: 0.1,
      maxWaitMs: 600000,
    });
  });

  it('should fall back to defaults for unset variables', () => {
    const config = AppMetricaConfigBuilder.fromEnv({ APPMETRICA_TOKEN: 'test-token' }).build();

    expect(config.baseUrl).toBe(APPMETRICA_EXPORT_BASE_URL);
    expect(config.polling).toEqual(DEFAULT_POLLING_CONFIG);
  });

  it('should fail to build without APPMETRICA_TOKEN', () => {
    expect(() => AppMetricaConfigBuilder.fromEnv({}).build()).toThrow(
      'Configuration error: OAuth token is required'
    );
  });

  it('should reject non-numeric values', () => {
    expect(() =>
      AppMetricaConfigBuilder.fromEnv({ APPMETRICA_TOKEN: 'test-token', APPMETRICA_MAX_RETRIES: 'many' })
    ).toThrow('Configuration error: APPMETRICA_MAX_RETRIES must be a number, got "many"');
  });
});

describe('validateConfig', () => {
  it('should reject an empty token', () => {
    const config = new AppMetricaConfigBuilder().withToken('test-token').build();

    expect(() => validateConfig({ ...config, token: new SecretString('') })).toThrow(
      'Configuration error: token cannot be empty'
    );
  });

  it('should list every failed constraint', () => {
    const config = new AppMetricaConfigBuilder().withToken('test-token').build();

    expect(() => validateConfig({ ...config, requestTimeoutMs: 0, userAgent: '' })).toThrow(
      /requestTimeoutMs: .*, userAgent: /
    );
  });
});

describe('SecretString', () => {
  it('should only reveal the value through expose()', () => {
    const secret = new SecretString('test-token');

    expect(secret.expose()).toBe('test-token');
    expect(String(secret)).toBe('[REDACTED]');
    expect(`${secret}`).toBe('[REDACTED]');
    expect(JSON.stringify({ token: secret })).toBe('{"token":"[REDACTED]"}');
  });
});
