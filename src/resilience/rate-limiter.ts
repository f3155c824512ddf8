/**
 * Sliding-window rate limiter, keyed by endpoint group
 */

import { CancelledError } from '../errors/index.js';
import type { RateLimiterConfig, RateLimitHook, WindowLimit } from './types.js';

interface Waiter {
  resolve: () => void;
  reject: (error: Error) => void;
  signal?: AbortSignal;
  onAbort?: () => void;
}

interface GroupState {
  /** Admission times, oldest first */
  admitted: number[];
  waiters: Waiter[];
  timer?: ReturnType<typeof setTimeout>;
}

/**
 * Admits at most `limit` requests per trailing `windowMs` for each group.
 *
 * A request admitted at `t` occupies a slot while `now - t < windowMs`.
 * Callers that find their group saturated are queued FIFO; a single timer per
 * group fires when the oldest admission leaves the window and admits as many
 * queued callers as there are free slots.
 */
export class RateLimiter {
  private readonly config: RateLimiterConfig;
  private readonly groups = new Map<string, GroupState>();
  private hooks: RateLimitHook[] = [];

  constructor(config: RateLimiterConfig) {
    this.config = config;
  }

  /**
   * Add a hook to be called when a caller has to wait
   */
  addHook(hook: RateLimitHook): void {
    this.hooks.push(hook);
  }

  /**
   * Wait for a slot in the group's window.
   * Rejects with CancelledError only if the signal aborts while queued; the
   * caller is then dequeued and nothing is recorded.
   */
  acquire(group: string, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return Promise.reject(new CancelledError('Request was cancelled', { group }));
    }

    if (this.tryAcquire(group)) {
      return Promise.resolve();
    }

    const state = this.getGroup(group);
    const waitMs = this.getWaitTime(group);

    const promise = new Promise<void>((resolve, reject) => {
      const waiter: Waiter = { resolve, reject, signal };

      if (signal) {
        waiter.onAbort = () => this.cancel(group, waiter);
        signal.addEventListener('abort', waiter.onAbort, { once: true });
      }

      state.waiters.push(waiter);
    });

    this.hooks.forEach(hook => hook.onRateLimited(group, waitMs));
    this.schedule(group, state);

    return promise;
  }

  /**
   * Admit immediately if a slot is free and nobody is queued
   */
  tryAcquire(group: string): boolean {
    const state = this.getGroup(group);
    const now = Date.now();
    this.prune(group, state, now);

    if (state.waiters.length > 0 || state.admitted.length >= this.limitFor(group).limit) {
      return false;
    }

    state.admitted.push(now);
    return true;
  }

  /**
   * Milliseconds until the next slot frees up, 0 if one is free now
   */
  getWaitTime(group: string): number {
    const state = this.getGroup(group);
    const now = Date.now();
    this.prune(group, state, now);

    const { limit, windowMs } = this.limitFor(group);
    if (state.admitted.length < limit && state.waiters.length === 0) {
      return 0;
    }

    const oldest = state.admitted[0];
    return oldest === undefined ? 0 : Math.max(0, oldest + windowMs - now);
  }

  /**
   * Free slots in the current window
   */
  getRemaining(group: string): number {
    const state = this.getGroup(group);
    this.prune(group, state, Date.now());
    return Math.max(0, this.limitFor(group).limit - state.admitted.length);
  }

  getQueueLength(group: string): number {
    return this.groups.get(group)?.waiters.length ?? 0;
  }

  /**
   * Forget admissions for one group, or all groups. Queued callers are admitted
   * up to the fresh limit.
   */
  reset(group?: string): void {
    const names = group === undefined ? [...this.groups.keys()] : [group];
    for (const name of names) {
      const state = this.groups.get(name);
      if (!state) continue;
      state.admitted = [];
      if (state.timer !== undefined) {
        clearTimeout(state.timer);
        state.timer = undefined;
      }
      this.drain(name, state);
    }
  }

  limitFor(group: string): WindowLimit {
    return this.config.groups?.[group] ?? { limit: this.config.limit, windowMs: this.config.windowMs };
  }

  private getGroup(group: string): GroupState {
    let state = this.groups.get(group);
    if (!state) {
      state = { admitted: [], waiters: [] };
      this.groups.set(group, state);
    }
    return state;
  }

  private prune(group: string, state: GroupState, now: number): void {
    const { windowMs } = this.limitFor(group);
    let expired = 0;
    while (expired < state.admitted.length && now - state.admitted[expired] >= windowMs) {
      expired++;
    }
    if (expired > 0) {
      state.admitted.splice(0, expired);
    }
  }

  /**
   * Arm the group's timer for the moment the oldest admission expires
   */
  private schedule(group: string, state: GroupState): void {
    if (state.timer !== undefined || state.waiters.length === 0) {
      return;
    }

    const oldest = state.admitted[0];
    const delay = oldest === undefined ? 0 : Math.max(0, oldest + this.limitFor(group).windowMs - Date.now());

    state.timer = setTimeout(() => {
      state.timer = undefined;
      this.drain(group, state);
    }, delay);
  }

  private drain(group: string, state: GroupState): void {
    const now = Date.now();
    this.prune(group, state, now);

    const { limit } = this.limitFor(group);
    while (state.waiters.length > 0 && state.admitted.length < limit) {
      const waiter = state.waiters.shift();
      if (!waiter) break;
      state.admitted.push(now);
      if (waiter.signal && waiter.onAbort) {
        waiter.signal.removeEventListener('abort', waiter.onAbort);
      }
      waiter.resolve();
    }

    this.schedule(group, state);
  }

  private cancel(group: string, waiter: Waiter): void {
    const state = this.groups.get(group);
    if (!state) return;

    const index = state.waiters.indexOf(waiter);
    if (index === -1) return;

    state.waiters.splice(index, 1);
    if (state.waiters.length === 0 && state.timer !== undefined) {
      clearTimeout(state.timer);
      state.timer = undefined;
    }
    waiter.reject(new CancelledError('Request was cancelled while waiting for a rate limit slot', { group }));
  }
}

/**
 * Create a default rate limiter configuration
 */
export function createDefaultRateLimiterConfig(): RateLimiterConfig {
  return {
    limit: 10,
    windowMs: 1000,
  };
}
