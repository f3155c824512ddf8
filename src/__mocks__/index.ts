import type { PartialBrokerageClientConfig } from '../config/config.js';

export * from './transport.mock.js';
export * from './credential-provider.mock.js';

/**
 * Mock factory for creating test configurations: short delays, no jitter, quiet logs
 */
export function mockConfig(overrides?: PartialBrokerageClientConfig): PartialBrokerageClientConfig {
  return {
    baseUrl: 'https://api.test.example',
    timeoutMs: 1000,
    rateLimit: { limit: 100, windowMs: 1000 },
    retry: { maxAttempts: 3, baseDelayMs: 100, multiplier: 2, maxDelayMs: 1000, jitterFactor: 0 },
    circuitBreaker: { enabled: true, failureThreshold: 5, windowMs: 60000, recoveryTimeoutMs: 30000 },
    logLevel: 'error',
    ...overrides,
  };
}
