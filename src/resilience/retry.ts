/**
 * Retry policy with exponential backoff and jitter
 */

import { ErrorKind, ExhaustedRetriesError } from '../errors/index.js';
import type { Attempt } from '../types/common.js';
import type { RetryConfig, RetryDecision, RetryHook } from './types.js';

/**
 * Decides, per failed attempt, whether to retry and after how long.
 *
 * The policy holds no per-request state; the executor passes the attempt
 * number with each outcome.
 */
export class RetryPolicy {
  private config: RetryConfig;
  private hooks: RetryHook[];
  private random: () => number;

  /**
   * @param random - Source of uniform values in [0, 1), replaceable for deterministic tests
   */
  constructor(config: RetryConfig, random: () => number = Math.random) {
    this.config = config;
    this.hooks = [];
    this.random = random;
  }

  /**
   * Add a hook to be called before each retry
   */
  addHook(hook: RetryHook): void {
    this.hooks.push(hook);
  }

  decide(attempt: Attempt): RetryDecision {
    const { outcome } = attempt;

    if (outcome.type === 'success') {
      throw new TypeError('RetryPolicy.decide called for a successful attempt');
    }

    if (outcome.type !== 'retryable_failure') {
      return { type: 'give_up', error: outcome.error };
    }

    const error = outcome.error;
    if (attempt.attemptNumber >= this.config.maxAttempts) {
      return { type: 'give_up', error: new ExhaustedRetriesError(error, attempt.attemptNumber) };
    }

    let delayMs = this.calculateDelay(attempt.attemptNumber);

    // A server hint only lengthens the wait
    if (error.kind === ErrorKind.RateLimited && error.retryAfterMs !== undefined) {
      delayMs = Math.max(delayMs, error.retryAfterMs);
    }

    for (const hook of this.hooks) {
      const decision = hook.onRetry(attempt, error, delayMs);
      if (!decision) continue;
      if (decision.type === 'abort') {
        return { type: 'give_up', error };
      }
      if (decision.type === 'retry') {
        delayMs = Math.max(0, decision.delayMs);
      }
    }

    return { type: 'retry', delayMs };
  }

  /**
   * Delay before retrying after the n-th failed attempt, before jitter
   * @param attemptNumber - 1-indexed
   */
  nominalDelay(attemptNumber: number): number {
    const exponentialDelay = this.config.baseDelayMs * Math.pow(this.config.multiplier, attemptNumber - 1);
    return Math.min(exponentialDelay, this.config.maxDelayMs);
  }

  /**
   * Nominal delay scaled by a random factor in [1 - jitter, 1 + jitter)
   */
  calculateDelay(attemptNumber: number): number {
    const nominal = this.nominalDelay(attemptNumber);
    const u = this.random() * 2 - 1;
    return Math.max(0, Math.floor(nominal * (1 + u * this.config.jitterFactor)));
  }

  getConfig(): Readonly<RetryConfig> {
    return this.config;
  }
}

/**
 * Create a default retry configuration
 */
export function createDefaultRetryConfig(): RetryConfig {
  return {
    maxAttempts: 3,
    baseDelayMs: 500,
    multiplier: 2,
    maxDelayMs: 30000,
    jitterFactor: 0.1,
  };
}
