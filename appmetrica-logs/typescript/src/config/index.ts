/**
 * AppMetrica client configuration and builder.
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';

/**
 * Logs API export endpoint.
 */
export const APPMETRICA_EXPORT_BASE_URL = 'https://api.appmetrica.yandex.ru/logs/v1/export';

/**
 * Default user agent for requests.
 */
export const DEFAULT_USER_AGENT = 'appmetrica-logs-export/0.1.0';

/**
 * Default per-request timeout. Large exports take a while to download.
 */
export const DEFAULT_REQUEST_TIMEOUT_MS = 300000;

/**
 * Settings for the "still preparing" polling loop.
 */
export interface PollingConfig {
  /** Maximum number of re-polls after a 201/202. Default: 30 */
  maxRetries: number;
  /** Delay before the first re-poll (ms). Default: 10000 */
  initialDelayMs: number;
  /** Upper bound for a single delay (ms). Default: 300000 */
  maxDelayMs: number;
  /** Backoff multiplier, greater than 1 + jitterFactor. Default: 2 */
  multiplier: number;
  /** Jitter factor in [0, 1). Default: 0.1 */
  jitterFactor: number;
  /** Total time budget for one export (ms). Unbounded when unset. */
  maxWaitMs?: number;
}

/**
 * Default polling configuration.
 */
export const DEFAULT_POLLING_CONFIG: PollingConfig = {
  maxRetries: 30,
  initialDelayMs: 10000,
  maxDelayMs: 300000,
  multiplier: 2,
  jitterFactor: 0.1,
};

/**
 * AppMetrica client configuration.
 */
export interface AppMetricaConfig {
  /** OAuth token */
  token: SecretString;
  /** Export endpoint base URL */
  baseUrl: string;
  /** Per-request timeout in milliseconds */
  requestTimeoutMs: number;
  /** User agent string */
  userAgent: string;
  /** Polling configuration */
  polling: PollingConfig;
  /** Optional custom fetch implementation */
  fetch?: typeof fetch;
}

/**
 * SecretString wrapper to prevent accidental logging of sensitive values.
 * The value is only accessible via the expose() method.
 */
export class SecretString {
  private readonly value: string;

  constructor(value: string) {
    this.value = value;
  }

  /**
   * Exposes the secret value. Use with caution.
   */
  expose(): string {
    return this.value;
  }

  toString(): string {
    return '[REDACTED]';
  }

  toJSON(): string {
    return '[REDACTED]';
  }
}

const pollingSchema = z
  .object({
    maxRetries: z.number().int().nonnegative(),
    initialDelayMs: z.number().positive(),
    maxDelayMs: z.number().nonnegative(),
    multiplier: z.number().min(1),
    jitterFactor: z.number().min(0).lt(1),
    maxWaitMs: z.number().positive().optional(),
  })
  .refine((p) => p.maxDelayMs >= p.initialDelayMs, {
    message: 'maxDelayMs must not be lower than initialDelayMs',
    path: ['maxDelayMs'],
  })
  // Largest jittered delay, d * (1 + jitterFactor), stays below the next base delay.
  .refine((p) => p.multiplier > 1 + p.jitterFactor, {
    message: 'multiplier must be greater than 1 + jitterFactor',
    path: ['multiplier'],
  });

const configSchema = z.object({
  baseUrl: z.string().url().startsWith('https://', 'must be HTTPS'),
  requestTimeoutMs: z.number().positive(),
  userAgent: z.string().min(1),
  polling: pollingSchema,
});

/**
 * Validates a configuration.
 * @throws ConfigurationError listing every failed constraint
 */
export function validateConfig(config: AppMetricaConfig): void {
  if (config.token.expose().length === 0) {
    throw new ConfigurationError('token cannot be empty');
  }

  const result = configSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigurationError(issues.join(', '));
  }
}

/**
 * Builder for AppMetrica client configuration.
 */
export class AppMetricaConfigBuilder {
  private token?: SecretString;
  private baseUrl: string = APPMETRICA_EXPORT_BASE_URL;
  private requestTimeoutMs: number = DEFAULT_REQUEST_TIMEOUT_MS;
  private userAgent: string = DEFAULT_USER_AGENT;
  private polling: PollingConfig = { ...DEFAULT_POLLING_CONFIG };
  private fetchImpl?: typeof fetch;

  /**
   * Sets the OAuth token.
   * @param token - The token (without "OAuth " prefix)
   */
  withToken(token: string): this {
    if (!token || token.trim().length === 0) {
      throw new ConfigurationError('token cannot be empty');
    }
    this.token = new SecretString(token.trim());
    return this;
  }

  /**
   * Sets the export endpoint base URL.
   */
  withBaseUrl(url: string): this {
    this.baseUrl = url.replace(/\/+$/, '');
    return this;
  }

  withRequestTimeout(timeoutMs: number): this {
    this.requestTimeoutMs = timeoutMs;
    return this;
  }

  withUserAgent(userAgent: string): this {
    this.userAgent = userAgent;
    return this;
  }

  /**
   * Overrides part of the polling configuration.
   */
  withPolling(config: Partial<PollingConfig>): this {
    this.polling = { ...this.polling, ...config };
    return this;
  }

  /**
   * Sets the fetch implementation used for every request.
   */
  withFetch(fetchImpl: typeof fetch): this {
    this.fetchImpl = fetchImpl;
    return this;
  }

  /**
   * Creates a builder from environment variables.
   *
   * Environment variables:
   * - APPMETRICA_TOKEN: OAuth token
   * - APPMETRICA_BASE_URL: export endpoint (optional)
   * - APPMETRICA_REQUEST_TIMEOUT_MS: per-request timeout (optional)
   * - APPMETRICA_MAX_RETRIES, APPMETRICA_INITIAL_DELAY_MS,
   *   APPMETRICA_MAX_DELAY_MS, APPMETRICA_MAX_WAIT_MS: polling (optional)
   */
  static fromEnv(env: NodeJS.ProcessEnv = process.env): AppMetricaConfigBuilder {
    const builder = new AppMetricaConfigBuilder();

    const token = env.APPMETRICA_TOKEN;
    if (token) {
      builder.withToken(token);
    }

    const baseUrl = env.APPMETRICA_BASE_URL;
    if (baseUrl) {
      builder.withBaseUrl(baseUrl);
    }

    const timeout = env.APPMETRICA_REQUEST_TIMEOUT_MS;
    if (timeout) {
      builder.withRequestTimeout(parseEnvNumber('APPMETRICA_REQUEST_TIMEOUT_MS', timeout));
    }

    const polling: Partial<PollingConfig> = {};
    if (env.APPMETRICA_MAX_RETRIES) {
      polling.maxRetries = parseEnvNumber('APPMETRICA_MAX_RETRIES', env.APPMETRICA_MAX_RETRIES);
    }
    if (env.APPMETRICA_INITIAL_DELAY_MS) {
      polling.initialDelayMs = parseEnvNumber(
        'APPMETRICA_INITIAL_DELAY_MS',
        env.APPMETRICA_INITIAL_DELAY_MS
      );
    }
    if (env.APPMETRICA_MAX_DELAY_MS) {
      polling.maxDelayMs = parseEnvNumber('APPMETRICA_MAX_DELAY_MS', env.APPMETRICA_MAX_DELAY_MS);
    }
    if (env.APPMETRICA_MAX_WAIT_MS) {
      polling.maxWaitMs = parseEnvNumber('APPMETRICA_MAX_WAIT_MS', env.APPMETRICA_MAX_WAIT_MS);
    }

    return builder.withPolling(polling);
  }

  /**
   * Builds the AppMetrica configuration.
   * @throws ConfigurationError if no token is set or a value is out of range
   */
  build(): AppMetricaConfig {
    if (!this.token) {
      throw new ConfigurationError('OAuth token is required');
    }

    const config: AppMetricaConfig = {
      token: this.token,
      baseUrl: this.baseUrl,
      requestTimeoutMs: this.requestTimeoutMs,
      userAgent: this.userAgent,
      polling: { ...this.polling },
      fetch: this.fetchImpl,
    };

    validateConfig(config);
    return config;
  }
}

function parseEnvNumber(name: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new ConfigurationError(`${name} must be a number, got "${value}"`);
  }
  return parsed;
}
