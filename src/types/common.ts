/**
 * Common types shared across the brokerage client
 */

import { ConfigurationError, type BrokerageError } from '../errors/index.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

/**
 * How a request body is written on the wire
 */
export type BodyEncoding = 'json' | 'form';

export type QueryValue = string | number | boolean;

/**
 * Immutable description of one logical API call
 */
export interface RequestDescriptor {
  readonly method: HttpMethod;
  /** Endpoint group used to key rate limits and circuit breakers (e.g. "quotes") */
  readonly group: string;
  /** Relative path, or an absolute URL (pagination links) */
  readonly path: string;
  readonly params?: Readonly<Record<string, QueryValue>>;
  readonly body?: unknown;
  readonly bodyEncoding: BodyEncoding;
  readonly headers?: Readonly<Record<string, string>>;
  /** Only idempotent descriptors are cached */
  readonly idempotent: boolean;
  /** `undefined` uses the configured default TTL, `0` disables caching for this request */
  readonly cacheTtlMs?: number;
  readonly authenticated: boolean;
}

export interface RequestDescriptorInit {
  method: HttpMethod;
  group: string;
  path: string;
  params?: Record<string, QueryValue>;
  body?: unknown;
  bodyEncoding?: BodyEncoding;
  headers?: Record<string, string>;
  idempotent?: boolean;
  cacheTtlMs?: number;
  authenticated?: boolean;
}

/**
 * Builds a frozen request descriptor.
 * GET requests default to idempotent, everything else does not.
 *
 * @throws {ConfigurationError} when `cacheTtlMs` is negative or not finite
 */
export function createDescriptor(init: RequestDescriptorInit): RequestDescriptor {
  if (init.cacheTtlMs !== undefined && !(Number.isFinite(init.cacheTtlMs) && init.cacheTtlMs >= 0)) {
    throw new ConfigurationError(`cacheTtlMs must be a finite number >= 0, got ${init.cacheTtlMs}`, {
      paths: ['cacheTtlMs'],
    });
  }

  return Object.freeze({
    method: init.method,
    group: init.group,
    path: init.path,
    params: init.params ? Object.freeze({ ...init.params }) : undefined,
    body: init.body,
    bodyEncoding: init.bodyEncoding ?? 'json',
    headers: init.headers ? Object.freeze({ ...init.headers }) : undefined,
    idempotent: init.idempotent ?? init.method === 'GET',
    cacheTtlMs: init.cacheTtlMs,
    authenticated: init.authenticated ?? true,
  });
}

/**
 * Outcome of a single attempt, consumed by the retry policy and the circuit breaker
 */
export type AttemptOutcome =
  | { type: 'success'; response: unknown }
  | { type: 'retryable_failure'; error: BrokerageError }
  | { type: 'fatal_failure'; error: BrokerageError }
  | { type: 'cancelled'; error: BrokerageError };

export interface Attempt {
  readonly descriptor: RequestDescriptor;
  /** 1-based */
  readonly attemptNumber: number;
  readonly startedAt: number;
  readonly outcome: AttemptOutcome;
}

export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: BrokerageError };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function err<T = never>(error: BrokerageError): Result<T> {
  return { ok: false, error };
}

export function isOk<T>(result: Result<T>): result is { ok: true; value: T } {
  return result.ok;
}

export function isErr<T>(result: Result<T>): result is { ok: false; error: BrokerageError } {
  return !result.ok;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export interface RequestOptions {
  signal?: AbortSignal;
  /** Deadline for the whole call including retries; expiry yields `Cancelled` */
  timeoutMs?: number;
}
