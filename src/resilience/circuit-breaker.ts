/**
 * Circuit breaker implementation following the three-state pattern
 */

import type { AttemptOutcome } from '../types/common.js';
import type { CircuitBreakerConfig, CircuitBreakerHook, CircuitState } from './types.js';

/**
 * Admission ticket handed out by `tryAcquire` and returned with the outcome
 */
export interface CircuitPermit {
  readonly group: string;
  /** True for the single request admitted while half-open */
  readonly probe: boolean;
  /** State generation the permit was issued under */
  readonly generation: number;
}

export interface CircuitBreakerStats {
  state: CircuitState;
  failuresInWindow: number;
  consecutiveFailures: number;
  openedAt: number | undefined;
  probeInFlight: boolean;
}

/**
 * Circuit breaker for one endpoint group
 *
 * States:
 * - Closed: requests flow, retryable failures are counted in a trailing window
 * - Open: fails fast until the recovery timeout has elapsed
 * - Half-Open: admits exactly one probe; its outcome closes or reopens the circuit
 *
 * Client errors (4xx) count as successes.
 */
export class CircuitBreaker {
  readonly group: string;
  private state: CircuitState = 'closed';
  private failures: number[] = [];
  private consecutiveFailures = 0;
  private openedAt: number | undefined = undefined;
  private probeInFlight = false;
  private generation = 0;
  private config: CircuitBreakerConfig;
  private hooks: CircuitBreakerHook[] = [];

  constructor(group: string, config: CircuitBreakerConfig) {
    this.group = group;
    this.config = config;
  }

  /**
   * Add a hook to be called on state changes
   */
  addHook(hook: CircuitBreakerHook): void {
    this.hooks.push(hook);
  }

  /**
   * Ask for permission to send a request
   * @returns A permit, or undefined when the request must be short-circuited
   */
  tryAcquire(): CircuitPermit | undefined {
    if (!this.config.enabled) {
      return { group: this.group, probe: false, generation: this.generation };
    }

    this.checkStateTransition();

    switch (this.state) {
      case 'closed':
        return { group: this.group, probe: false, generation: this.generation };
      case 'open':
        return undefined;
      case 'half_open':
        if (this.probeInFlight) {
          return undefined;
        }
        this.probeInFlight = true;
        return { group: this.group, probe: true, generation: this.generation };
    }
  }

  /**
   * Report the outcome of a request admitted with `permit`.
   * Outcomes from an earlier state generation are ignored.
   */
  record(permit: CircuitPermit, outcome: AttemptOutcome): void {
    if (!this.config.enabled || permit.generation !== this.generation) {
      return;
    }

    switch (outcome.type) {
      case 'cancelled':
        this.release(permit);
        return;
      case 'success':
      case 'fatal_failure':
        this.recordSuccess(permit);
        return;
      case 'retryable_failure':
        this.recordFailure(permit);
        return;
    }
  }

  /**
   * Give back an unused permit. A released probe frees the half-open slot without a transition.
   */
  release(permit: CircuitPermit): void {
    if (permit.probe && permit.generation === this.generation && this.state === 'half_open') {
      this.probeInFlight = false;
    }
  }

  private checkStateTransition(): void {
    if (
      this.state === 'open' &&
      this.openedAt !== undefined &&
      Date.now() - this.openedAt >= this.config.recoveryTimeoutMs
    ) {
      this.transitionTo('half_open');
    }
  }

  private recordSuccess(permit: CircuitPermit): void {
    if (this.state === 'half_open') {
      if (permit.probe) {
        this.transitionTo('closed');
      }
    } else if (this.state === 'closed') {
      this.consecutiveFailures = 0;
    }
  }

  private recordFailure(permit: CircuitPermit): void {
    const now = Date.now();

    if (this.state === 'half_open') {
      // A failed probe reopens the circuit and restarts the recovery timer
      if (permit.probe) {
        this.transitionTo('open');
      }
      return;
    }

    if (this.state !== 'closed') {
      return;
    }

    this.consecutiveFailures++;
    this.failures.push(now);
    this.pruneFailures(now);

    if (this.failures.length >= this.config.failureThreshold) {
      this.transitionTo('open');
    }
  }

  private pruneFailures(now: number): void {
    this.failures = this.failures.filter(t => now - t < this.config.windowMs);
  }

  private transitionTo(newState: CircuitState): void {
    const oldState = this.state;
    this.state = newState;
    this.generation++;
    this.probeInFlight = false;

    if (newState === 'closed') {
      this.failures = [];
      this.consecutiveFailures = 0;
      this.openedAt = undefined;
    } else if (newState === 'open') {
      this.openedAt = Date.now();
    }

    if (oldState !== newState) {
      this.hooks.forEach(hook => hook.onStateChange(this.group, oldState, newState));
    }
  }

  /**
   * Get the current state, applying a pending open → half-open transition
   */
  getState(): CircuitState {
    if (this.config.enabled) {
      this.checkStateTransition();
    }
    return this.state;
  }

  getStats(): CircuitBreakerStats {
    const now = Date.now();
    return {
      state: this.getState(),
      failuresInWindow: this.failures.filter(t => now - t < this.config.windowMs).length,
      consecutiveFailures: this.consecutiveFailures,
      openedAt: this.openedAt,
      probeInFlight: this.probeInFlight,
    };
  }

  /**
   * Force the circuit open
   */
  trip(): void {
    this.transitionTo('open');
  }

  /**
   * Reset the circuit breaker to closed state
   */
  reset(): void {
    this.transitionTo('closed');
  }
}

/**
 * Lazily creates one circuit breaker per endpoint group
 */
export class CircuitBreakerRegistry {
  private readonly breakers = new Map<string, CircuitBreaker>();
  private readonly config: CircuitBreakerConfig;
  private hooks: CircuitBreakerHook[] = [];

  constructor(config: CircuitBreakerConfig) {
    this.config = config;
  }

  /**
   * Add a hook to every current and future breaker
   */
  addHook(hook: CircuitBreakerHook): void {
    this.hooks.push(hook);
    this.breakers.forEach(breaker => breaker.addHook(hook));
  }

  get(group: string): CircuitBreaker {
    const existing = this.breakers.get(group);
    if (existing) {
      return existing;
    }

    const breaker = new CircuitBreaker(group, this.config);
    this.hooks.forEach(hook => breaker.addHook(hook));
    this.breakers.set(group, breaker);
    return breaker;
  }

  groups(): string[] {
    return [...this.breakers.keys()];
  }

  resetAll(): void {
    this.breakers.forEach(breaker => breaker.reset());
  }
}

/**
 * Create a default circuit breaker configuration
 */
export function createDefaultCircuitBreakerConfig(): CircuitBreakerConfig {
  return {
    enabled: true,
    failureThreshold: 5,
    windowMs: 60000,
    recoveryTimeoutMs: 30000,
  };
}
