/**
 * Configuration interfaces and types for the resilience layer
 */

import type { BrokerageError } from '../errors/index.js';
import type { Attempt } from '../types/common.js';

/**
 * Configuration for retry behavior
 */
export interface RetryConfig {
  /** Total attempts per request, including the first */
  maxAttempts: number;
  /** Delay in milliseconds before the first retry */
  baseDelayMs: number;
  /** Growth factor applied per failed attempt */
  multiplier: number;
  /** Cap on the nominal delay */
  maxDelayMs: number;
  /** Jitter factor (0-1) to add randomness to delays */
  jitterFactor: number;
}

/**
 * Limit applied to one endpoint group
 */
export interface WindowLimit {
  /** Requests admitted per window */
  limit: number;
  /** Window length in milliseconds */
  windowMs: number;
}

/**
 * Configuration for rate limiter behavior
 */
export interface RateLimiterConfig extends WindowLimit {
  /** Per-group overrides of the default limit */
  groups?: Record<string, WindowLimit>;
}

/**
 * Configuration for circuit breaker behavior
 */
export interface CircuitBreakerConfig {
  enabled: boolean;
  /** Failures within the window that open the circuit */
  failureThreshold: number;
  /** Trailing window in which failures are counted */
  windowMs: number;
  /** Time spent open before a probe is admitted */
  recoveryTimeoutMs: number;
}

/**
 * Circuit breaker states
 */
export type CircuitState = 'closed' | 'open' | 'half_open';

/**
 * Decision returned by the retry policy for a failed attempt
 */
export type RetryDecision =
  | { type: 'retry'; delayMs: number }
  | { type: 'give_up'; error: BrokerageError };

/**
 * What a retry hook wants done with an upcoming retry
 */
export type RetryHookDecision =
  | { type: 'retry'; delayMs: number }
  | { type: 'abort' }
  | { type: 'default' };

/**
 * Hook for custom retry behavior
 */
export interface RetryHook {
  /**
   * Called before each retry is scheduled
   * @param attempt - The failed attempt
   * @param error - The error that triggered the retry
   * @param delayMs - The calculated delay before retry
   */
  onRetry(attempt: Attempt, error: BrokerageError, delayMs: number): RetryHookDecision | void;
}

/**
 * Hook for circuit breaker state changes
 */
export interface CircuitBreakerHook {
  onStateChange(group: string, from: CircuitState, to: CircuitState): void;
}

/**
 * Hook for rate limiting events
 */
export interface RateLimitHook {
  /**
   * Called when a request has to wait for a slot
   * @param waitMs - Time until the oldest admitted request leaves the window
   */
  onRateLimited(group: string, waitMs: number): void;
}
