/**
 * Response caching for idempotent reads.
 *
 * Bounded LRU with a per-entry TTL. Map insertion order doubles as recency
 * order: a hit re-inserts the entry at the back, eviction takes the front.
 *
 * @module cache/response-cache
 */

import { isRecord, type RequestDescriptor } from '../types/common.js';

/**
 * Response cache configuration.
 */
export interface ResponseCacheConfig {
  /** When false nothing is read or written. */
  enabled: boolean;
  /** Maximum number of entries (0 disables caching). */
  capacity: number;
  /** TTL used when a descriptor does not set one (default: 5 seconds). */
  defaultTtlMs: number;
  /** Minimum time between opportunistic sweeps on insert (default: 1 minute). */
  sweepIntervalMs: number;
}

/**
 * Cached entry with TTL and insertion timestamp.
 */
export interface CacheEntry<V = unknown> {
  readonly key: string;
  readonly value: V;
  readonly insertedAt: number;
  readonly ttlMs: number;
}

export interface CacheStats {
  size: number;
  hits: number;
  misses: number;
  evictions: number;
  hitRate: number;
}

/**
 * Builds the cache key for a descriptor:
 * `METHOD group path?sorted-params`, followed by ` encoding:body` when there is a body.
 */
export function cacheKey(descriptor: RequestDescriptor): string {
  let key = `${descriptor.method} ${descriptor.group} ${descriptor.path}`;

  const params = descriptor.params;
  if (params) {
    const query = Object.keys(params)
      .sort()
      .map(name => `${encodeURIComponent(name)}=${encodeURIComponent(String(params[name]))}`)
      .join('&');
    if (query.length > 0) {
      key += `?${query}`;
    }
  }

  if (descriptor.body !== undefined && descriptor.body !== null) {
    key += ` ${descriptor.bodyEncoding}:${canonicalJson(descriptor.body)}`;
  }

  return key;
}

/**
 * JSON with object keys sorted, so equal bodies give equal keys
 */
function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(',')}]`;
  }
  if (isRecord(value)) {
    return `{${Object.keys(value)
      .filter(name => value[name] !== undefined)
      .sort()
      .map(name => `${JSON.stringify(name)}:${canonicalJson(value[name])}`)
      .join(',')}}`;
  }
  return JSON.stringify(value) ?? 'null';
}

export class ResponseCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly config: ResponseCacheConfig;
  private lastSweep: number;
  private hits = 0;
  private misses = 0;
  private evictions = 0;

  constructor(config: ResponseCacheConfig) {
    this.config = config;
    this.lastSweep = Date.now();
  }

  get enabled(): boolean {
    return this.config.enabled && this.config.capacity > 0;
  }

  get defaultTtlMs(): number {
    return this.config.defaultTtlMs;
  }

  get(key: string): unknown {
    if (!this.enabled) {
      return undefined;
    }

    const entry = this.entries.get(key);
    if (!entry) {
      this.misses++;
      return undefined;
    }

    if (this.isExpired(entry, Date.now())) {
      this.entries.delete(key);
      this.misses++;
      return undefined;
    }

    // Move to end (LRU)
    this.entries.delete(key);
    this.entries.set(key, entry);
    this.hits++;

    return entry.value;
  }

  put(key: string, value: unknown, ttlMs: number = this.config.defaultTtlMs): void {
    if (!this.enabled || value === undefined || !Number.isFinite(ttlMs) || ttlMs <= 0) {
      return;
    }

    const now = Date.now();
    if (now - this.lastSweep >= this.config.sweepIntervalMs) {
      this.sweep();
    }

    if (this.entries.has(key)) {
      this.entries.delete(key);
    } else if (this.entries.size >= this.config.capacity) {
      this.sweep();
      if (this.entries.size >= this.config.capacity) {
        // Remove least recently used entry (first in map)
        const firstKey = this.entries.keys().next().value;
        if (firstKey !== undefined) {
          this.entries.delete(firstKey);
          this.evictions++;
        }
      }
    }

    this.entries.set(key, { key, value, insertedAt: now, ttlMs });
  }

  invalidate(key: string): boolean {
    return this.entries.delete(key);
  }

  /**
   * Drops every entry whose key starts with `prefix`, e.g. `GET quotes`.
   */
  invalidateGroup(prefix: string): number {
    let removed = 0;
    for (const key of [...this.entries.keys()]) {
      if (key.startsWith(prefix)) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  /**
   * Removes expired entries.
   */
  sweep(): number {
    const now = Date.now();
    this.lastSweep = now;

    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (this.isExpired(entry, now)) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }

  getStats(): CacheStats {
    const lookups = this.hits + this.misses;
    return {
      size: this.entries.size,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      hitRate: lookups === 0 ? 0 : this.hits / lookups,
    };
  }

  private isExpired(entry: CacheEntry, now: number): boolean {
    return now - entry.insertedAt >= entry.ttlMs;
  }
}

/**
 * Create a default response cache configuration
 */
export function createDefaultResponseCacheConfig(): ResponseCacheConfig {
  return {
    enabled: true,
    capacity: 500,
    defaultTtlMs: 5000,
    sweepIntervalMs: 60000,
  };
}
