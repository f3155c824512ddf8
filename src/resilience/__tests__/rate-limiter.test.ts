/**
 * Tests for RateLimiter
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { CancelledError, ErrorKind } from '../../errors/index.js';
import { RateLimiter, createDefaultRateLimiterConfig } from '../rate-limiter.js';
import type { RateLimitHook } from '../types.js';

describe('RateLimiter', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-03-01T14:30:00Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('acquire', () => {
    it('should admit 2 req/s at 0, 0, 1s, 1s, 2s for 5 simultaneous requests', async () => {
      const limiter = new RateLimiter({ limit: 2, windowMs: 1000 });
      const start = Date.now();
      const admitted: number[] = [];

      const all = Array.from({ length: 5 }, () =>
        limiter.acquire('quotes').then(() => {
          admitted.push(Date.now() - start);
        })
      );

      await vi.advanceTimersByTimeAsync(0);
      expect(admitted).toEqual([0, 0]);

      await vi.advanceTimersByTimeAsync(999);
      expect(admitted).toEqual([0, 0]);

      await vi.advanceTimersByTimeAsync(1);
      expect(admitted).toEqual([0, 0, 1000, 1000]);

      await vi.advanceTimersByTimeAsync(1000);
      expect(admitted).toEqual([0, 0, 1000, 1000, 2000]);

      await Promise.all(all);
    });

    it('should admit queued callers in arrival order', async () => {
      const limiter = new RateLimiter({ limit: 1, windowMs: 1000 });
      const order: string[] = [];

      await limiter.acquire('orders');
      const b = limiter.acquire('orders').then(() => order.push('b'));
      const c = limiter.acquire('orders').then(() => order.push('c'));

      await vi.advanceTimersByTimeAsync(1000);
      expect(order).toEqual(['b']);

      await vi.advanceTimersByTimeAsync(1000);
      expect(order).toEqual(['b', 'c']);

      await Promise.all([b, c]);
    });

    it('should not let a new caller overtake a queued one', async () => {
      const limiter = new RateLimiter({ limit: 1, windowMs: 1000 });

      await limiter.acquire('orders');
      const queued = limiter.acquire('orders');

      expect(limiter.tryAcquire('orders')).toBe(false);
      expect(limiter.getQueueLength('orders')).toBe(1);

      await vi.advanceTimersByTimeAsync(1000);
      await queued;
      expect(limiter.getQueueLength('orders')).toBe(0);
    });

    it('should keep groups independent', async () => {
      const limiter = new RateLimiter({ limit: 1, windowMs: 1000 });

      await limiter.acquire('quotes');

      expect(limiter.tryAcquire('quotes')).toBe(false);
      expect(limiter.tryAcquire('orders')).toBe(true);
    });

    it('should apply per-group overrides', () => {
      const limiter = new RateLimiter({
        limit: 3,
        windowMs: 1000,
        groups: { orders: { limit: 1, windowMs: 5000 } },
      });

      expect(limiter.tryAcquire('orders')).toBe(true);
      expect(limiter.tryAcquire('orders')).toBe(false);

      expect(limiter.tryAcquire('quotes')).toBe(true);
      expect(limiter.tryAcquire('quotes')).toBe(true);
      expect(limiter.tryAcquire('quotes')).toBe(true);
      expect(limiter.tryAcquire('quotes')).toBe(false);

      expect(limiter.limitFor('orders')).toEqual({ limit: 1, windowMs: 5000 });
      expect(limiter.limitFor('quotes')).toEqual({ limit: 3, windowMs: 1000 });
    });
  });

  describe('cancellation', () => {
    it('should reject a queued caller with Cancelled and leave the count unchanged', async () => {
      const limiter = new RateLimiter({ limit: 1, windowMs: 1000 });
      const controller = new AbortController();

      await limiter.acquire('quotes');
      const queued = limiter.acquire('quotes', controller.signal);
      expect(limiter.getQueueLength('quotes')).toBe(1);

      const assertion = expect(queued).rejects.toBeInstanceOf(CancelledError);
      controller.abort();
      await assertion;

      expect(limiter.getQueueLength('quotes')).toBe(0);
      expect(limiter.getRemaining('quotes')).toBe(0);

      await vi.advanceTimersByTimeAsync(1000);
      expect(limiter.getRemaining('quotes')).toBe(1);
    });

    it('should reject immediately when the signal is already aborted', async () => {
      const limiter = new RateLimiter({ limit: 1, windowMs: 1000 });
      const controller = new AbortController();
      controller.abort();

      await expect(limiter.acquire('quotes', controller.signal)).rejects.toMatchObject({
        kind: ErrorKind.Cancelled,
      });
      expect(limiter.getRemaining('quotes')).toBe(1);
    });

    it('should admit the next waiter when an earlier one cancels', async () => {
      const limiter = new RateLimiter({ limit: 1, windowMs: 1000 });
      const controller = new AbortController();
      let admitted = false;

      await limiter.acquire('quotes');
      const cancelled = limiter.acquire('quotes', controller.signal);
      const next = limiter.acquire('quotes').then(() => {
        admitted = true;
      });

      const assertion = expect(cancelled).rejects.toBeInstanceOf(CancelledError);
      controller.abort();
      await assertion;

      await vi.advanceTimersByTimeAsync(1000);
      await next;
      expect(admitted).toBe(true);
    });
  });

  describe('introspection', () => {
    it('should report the wait time until the oldest admission expires', async () => {
      const limiter = new RateLimiter({ limit: 1, windowMs: 1000 });

      expect(limiter.getWaitTime('quotes')).toBe(0);
      await limiter.acquire('quotes');

      await vi.advanceTimersByTimeAsync(300);
      expect(limiter.getWaitTime('quotes')).toBe(700);
    });

    it('should report remaining slots', async () => {
      const limiter = new RateLimiter({ limit: 3, windowMs: 1000 });

      await limiter.acquire('quotes');
      expect(limiter.getRemaining('quotes')).toBe(2);
    });

    it('should call hooks when a caller has to wait', async () => {
      const limiter = new RateLimiter({ limit: 1, windowMs: 1000 });
      const hook: RateLimitHook = { onRateLimited: vi.fn() };
      limiter.addHook(hook);

      await limiter.acquire('quotes');
      expect(hook.onRateLimited).not.toHaveBeenCalled();

      const queued = limiter.acquire('quotes');
      expect(hook.onRateLimited).toHaveBeenCalledWith('quotes', 1000);

      await vi.advanceTimersByTimeAsync(1000);
      await queued;
    });
  });

  describe('reset', () => {
    it('should forget admissions and admit queued callers', async () => {
      const limiter = new RateLimiter({ limit: 1, windowMs: 1000 });
      let admitted = false;

      await limiter.acquire('quotes');
      const queued = limiter.acquire('quotes').then(() => {
        admitted = true;
      });

      limiter.reset('quotes');
      await queued;

      expect(admitted).toBe(true);
      expect(limiter.getRemaining('quotes')).toBe(0);
    });

    it('should reset every group when called without a name', async () => {
      const limiter = new RateLimiter({ limit: 1, windowMs: 1000 });

      await limiter.acquire('quotes');
      await limiter.acquire('orders');
      limiter.reset();

      expect(limiter.getRemaining('quotes')).toBe(1);
      expect(limiter.getRemaining('orders')).toBe(1);
    });
  });

  describe('createDefaultRateLimiterConfig', () => {
    it('should allow 10 requests per second', () => {
      expect(createDefaultRateLimiterConfig()).toEqual({ limit: 10, windowMs: 1000 });
    });
  });
});
