/**
 * Configuration for the brokerage client.
 * @module config
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';
import type { LogLevel } from '../observability/logging.js';
import { createDefaultResponseCacheConfig, type ResponseCacheConfig } from '../cache/response-cache.js';
import { createDefaultCircuitBreakerConfig } from '../resilience/circuit-breaker.js';
import { createDefaultRateLimiterConfig } from '../resilience/rate-limiter.js';
import { createDefaultRetryConfig } from '../resilience/retry.js';
import type {
  CircuitBreakerConfig,
  RateLimiterConfig,
  RetryConfig,
  WindowLimit,
} from '../resilience/types.js';

/**
 * Default API base URL.
 */
export const DEFAULT_BASE_URL = 'https://api.brokerage.example';

/**
 * Default per-attempt transport timeout in milliseconds.
 */
export const DEFAULT_TIMEOUT_MS = 16000;

/**
 * Default User-Agent header.
 */
export const DEFAULT_USER_AGENT = 'brokerage-gateway/0.1.0';

export const DEFAULT_RATE_LIMIT_CONFIG: RateLimiterConfig = createDefaultRateLimiterConfig();

export const DEFAULT_CACHE_CONFIG: ResponseCacheConfig = createDefaultResponseCacheConfig();

export const DEFAULT_CIRCUIT_BREAKER_CONFIG: CircuitBreakerConfig = createDefaultCircuitBreakerConfig();

export const DEFAULT_RETRY_CONFIG: RetryConfig = createDefaultRetryConfig();

export interface BulkConfig {
  /** Executions in flight per `executeAll` */
  concurrency: number;
}

export const DEFAULT_BULK_CONFIG: BulkConfig = {
  concurrency: 4,
};

/**
 * Brokerage client configuration.
 */
export interface BrokerageClientConfig {
  baseUrl: string;
  /** Per-attempt transport timeout in milliseconds */
  timeoutMs: number;
  userAgent: string;
  /** Extra default session headers */
  headers: Record<string, string>;
  rateLimit: RateLimiterConfig;
  cache: ResponseCacheConfig;
  circuitBreaker: CircuitBreakerConfig;
  retry: RetryConfig;
  bulk: BulkConfig;
  logLevel: LogLevel;
}

const windowLimitSchema = z.object({
  limit: z.number().int().positive(),
  windowMs: z.number().int().positive(),
});

/**
 * Zod schema for configuration validation.
 */
const configSchema = z.object({
  baseUrl: z.string().url().refine(
    url => url.startsWith('http://') || url.startsWith('https://'),
    'Base URL must start with http:// or https://'
  ),
  timeoutMs: z.number().positive(),
  userAgent: z.string().min(1),
  headers: z.record(z.string()),
  rateLimit: windowLimitSchema.extend({
    groups: z.record(windowLimitSchema).optional(),
  }),
  cache: z.object({
    enabled: z.boolean(),
    capacity: z.number().int().nonnegative(),
    defaultTtlMs: z.number().nonnegative(),
    sweepIntervalMs: z.number().positive(),
  }),
  circuitBreaker: z.object({
    enabled: z.boolean(),
    failureThreshold: z.number().int().positive(),
    windowMs: z.number().positive(),
    recoveryTimeoutMs: z.number().positive(),
  }),
  retry: z.object({
    maxAttempts: z.number().int().positive(),
    baseDelayMs: z.number().nonnegative(),
    multiplier: z.number().min(1),
    maxDelayMs: z.number().nonnegative(),
    jitterFactor: z.number().min(0).max(1),
  }).refine(retry => retry.maxDelayMs >= retry.baseDelayMs, {
    message: 'maxDelayMs must be at least baseDelayMs',
    path: ['maxDelayMs'],
  }),
  bulk: z.object({
    concurrency: z.number().int().positive(),
  }),
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error']),
});

/**
 * Creates the default configuration.
 */
export function createDefaultConfig(): BrokerageClientConfig {
  return {
    baseUrl: DEFAULT_BASE_URL,
    timeoutMs: DEFAULT_TIMEOUT_MS,
    userAgent: DEFAULT_USER_AGENT,
    headers: {},
    rateLimit: { ...DEFAULT_RATE_LIMIT_CONFIG },
    cache: { ...DEFAULT_CACHE_CONFIG },
    circuitBreaker: { ...DEFAULT_CIRCUIT_BREAKER_CONFIG },
    retry: { ...DEFAULT_RETRY_CONFIG },
    bulk: { ...DEFAULT_BULK_CONFIG },
    logLevel: 'info',
  };
}

/**
 * Validates a configuration.
 * @throws {ConfigurationError} listing every offending path
 */
export function validateConfig(config: BrokerageClientConfig): void {
  const result = configSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join(', ')}`, {
      paths: result.error.issues.map(i => i.path.join('.')),
    });
  }
}

/**
 * Partial configuration, merged over the defaults.
 */
export type PartialBrokerageClientConfig = Partial<{
  baseUrl: string;
  timeoutMs: number;
  userAgent: string;
  headers: Record<string, string>;
  rateLimit: Partial<RateLimiterConfig>;
  cache: Partial<ResponseCacheConfig>;
  circuitBreaker: Partial<CircuitBreakerConfig>;
  retry: Partial<RetryConfig>;
  bulk: Partial<BulkConfig>;
  logLevel: LogLevel;
}>;

/**
 * Merges a partial configuration over the defaults and validates the result.
 */
export function resolveConfig(partial: PartialBrokerageClientConfig = {}): BrokerageClientConfig {
  const defaults = createDefaultConfig();
  const config: BrokerageClientConfig = {
    baseUrl: partial.baseUrl ?? defaults.baseUrl,
    timeoutMs: partial.timeoutMs ?? defaults.timeoutMs,
    userAgent: partial.userAgent ?? defaults.userAgent,
    headers: { ...defaults.headers, ...partial.headers },
    rateLimit: { ...defaults.rateLimit, ...partial.rateLimit },
    cache: { ...defaults.cache, ...partial.cache },
    circuitBreaker: { ...defaults.circuitBreaker, ...partial.circuitBreaker },
    retry: { ...defaults.retry, ...partial.retry },
    bulk: { ...defaults.bulk, ...partial.bulk },
    logLevel: partial.logLevel ?? defaults.logLevel,
  };
  validateConfig(config);
  return config;
}

/**
 * Configuration builder.
 */
export class BrokerageConfigBuilder {
  private config: BrokerageClientConfig;

  constructor() {
    this.config = createDefaultConfig();
  }

  /**
   * Sets the API base URL.
   */
  withBaseUrl(value: string): this {
    this.config = { ...this.config, baseUrl: value };
    return this;
  }

  /**
   * Sets the per-attempt transport timeout.
   */
  withTimeout(timeoutMs: number): this {
    this.config = { ...this.config, timeoutMs };
    return this;
  }

  withUserAgent(value: string): this {
    this.config = { ...this.config, userAgent: value };
    return this;
  }

  /**
   * Adds a default session header.
   */
  withHeader(name: string, value: string): this {
    this.config = { ...this.config, headers: { ...this.config.headers, [name]: value } };
    return this;
  }

  /**
   * Sets the default rate limit.
   */
  withRateLimit(limit: number, windowMs: number): this {
    this.config = { ...this.config, rateLimit: { ...this.config.rateLimit, limit, windowMs } };
    return this;
  }

  /**
   * Overrides the rate limit of one endpoint group.
   */
  withGroupRateLimit(group: string, value: WindowLimit): this {
    this.config = {
      ...this.config,
      rateLimit: {
        ...this.config.rateLimit,
        groups: { ...this.config.rateLimit.groups, [group]: value },
      },
    };
    return this;
  }

  withCache(value: Partial<ResponseCacheConfig>): this {
    this.config = { ...this.config, cache: { ...this.config.cache, ...value } };
    return this;
  }

  /**
   * Disables response caching.
   */
  noCache(): this {
    return this.withCache({ enabled: false });
  }

  withCircuitBreaker(value: Partial<CircuitBreakerConfig>): this {
    this.config = { ...this.config, circuitBreaker: { ...this.config.circuitBreaker, ...value } };
    return this;
  }

  /**
   * Disables the circuit breaker; every request is admitted.
   */
  noCircuitBreaker(): this {
    return this.withCircuitBreaker({ enabled: false });
  }

  withRetry(value: Partial<RetryConfig>): this {
    this.config = { ...this.config, retry: { ...this.config.retry, ...value } };
    return this;
  }

  /**
   * Disables retries (a single attempt per request).
   */
  noRetry(): this {
    return this.withRetry({ maxAttempts: 1 });
  }

  withBulkConcurrency(concurrency: number): this {
    this.config = { ...this.config, bulk: { concurrency } };
    return this;
  }

  withLogLevel(level: LogLevel): this {
    this.config = { ...this.config, logLevel: level };
    return this;
  }

  /**
   * Builds and validates the configuration.
   */
  build(): BrokerageClientConfig {
    validateConfig(this.config);
    return { ...this.config };
  }
}

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error'];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

function parseNumber(name: string, value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new ConfigurationError(`${name} must be a number, got '${value}'`, { paths: [name] });
  }
  return parsed;
}

/**
 * Creates configuration from environment variables.
 * Unset variables keep their defaults.
 */
export function createConfigFromEnv(env: NodeJS.ProcessEnv = process.env): BrokerageClientConfig {
  const builder = new BrokerageConfigBuilder();

  if (env['BROKERAGE_BASE_URL']) {
    builder.withBaseUrl(env['BROKERAGE_BASE_URL']);
  }

  if (env['BROKERAGE_TIMEOUT_MS']) {
    builder.withTimeout(parseNumber('BROKERAGE_TIMEOUT_MS', env['BROKERAGE_TIMEOUT_MS']));
  }

  const limit = env['BROKERAGE_RATE_LIMIT'];
  const windowMs = env['BROKERAGE_RATE_WINDOW_MS'];
  if (limit || windowMs) {
    builder.withRateLimit(
      limit ? parseNumber('BROKERAGE_RATE_LIMIT', limit) : DEFAULT_RATE_LIMIT_CONFIG.limit,
      windowMs ? parseNumber('BROKERAGE_RATE_WINDOW_MS', windowMs) : DEFAULT_RATE_LIMIT_CONFIG.windowMs
    );
  }

  if (env['BROKERAGE_MAX_ATTEMPTS']) {
    builder.withRetry({ maxAttempts: parseNumber('BROKERAGE_MAX_ATTEMPTS', env['BROKERAGE_MAX_ATTEMPTS']) });
  }

  if (env['BROKERAGE_BULK_CONCURRENCY']) {
    builder.withBulkConcurrency(parseNumber('BROKERAGE_BULK_CONCURRENCY', env['BROKERAGE_BULK_CONCURRENCY']));
  }

  const cacheEnabled = env['BROKERAGE_CACHE_ENABLED'];
  if (cacheEnabled) {
    builder.withCache({ enabled: !['false', '0', 'no', 'off'].includes(cacheEnabled.toLowerCase()) });
  }

  const logLevel = env['BROKERAGE_LOG_LEVEL'];
  if (logLevel) {
    const normalized = logLevel.toLowerCase();
    if (!isLogLevel(normalized)) {
      throw new ConfigurationError(`BROKERAGE_LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}`, {
        paths: ['BROKERAGE_LOG_LEVEL'],
      });
    }
    builder.withLogLevel(normalized);
  }

  return builder.build();
}
