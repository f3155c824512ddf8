/**
 * Resilience layer: rate limiting, circuit breaking and retry decisions
 */

// Type exports
export type {
  RetryConfig,
  WindowLimit,
  RateLimiterConfig,
  CircuitBreakerConfig,
  CircuitState,
  RetryDecision,
  RetryHookDecision,
  RetryHook,
  CircuitBreakerHook,
  RateLimitHook,
} from './types.js';

// Retry exports
export {
  RetryPolicy,
  createDefaultRetryConfig,
} from './retry.js';

// Circuit breaker exports
export type { CircuitBreakerStats, CircuitPermit } from './circuit-breaker.js';
export {
  CircuitBreaker,
  CircuitBreakerRegistry,
  createDefaultCircuitBreakerConfig,
} from './circuit-breaker.js';

// Rate limiter exports
export {
  RateLimiter,
  createDefaultRateLimiterConfig,
} from './rate-limiter.js';

export { sleep } from './sleep.js';
