/**
 * Request executor: the single path every API call takes
 */

import { v4 as uuidv4 } from 'uuid';
import { authorizationHeader } from '../auth/credential-provider.js';
import type { ClientSession } from '../auth/session.js';
import { cacheKey, type ResponseCache } from '../cache/response-cache.js';
import {
  CancelledError,
  CircuitOpenError,
  ClientError,
  toBrokerageError,
  type BrokerageError,
} from '../errors/index.js';
import { logError, logRequest, logResponse, NoopLogger, type Logger } from '../observability/logging.js';
import {
  circuitStateValue,
  MetricNames,
  NoopMetricsCollector,
  type MetricsCollector,
} from '../observability/metrics.js';
import type { CircuitBreakerRegistry } from '../resilience/circuit-breaker.js';
import type { RateLimiter } from '../resilience/rate-limiter.js';
import type { RetryPolicy } from '../resilience/retry.js';
import { sleep } from '../resilience/sleep.js';
import type { Transport } from '../transport/http-transport.js';
import {
  err,
  ok,
  type AttemptOutcome,
  type RequestDescriptor,
  type RequestOptions,
  type Result,
} from '../types/common.js';
import { classifyError, classifyResponse, isAuthRejection } from './classify.js';

export interface ExecuteOptions<T = unknown> extends RequestOptions {
  /** Validates and shapes the response body, e.g. a zod schema's `parse` */
  parse?: (body: unknown) => T;
}

export interface RequestExecutorOptions {
  transport: Transport;
  session: ClientSession;
  rateLimiter: RateLimiter;
  circuitBreakers: CircuitBreakerRegistry;
  cache: ResponseCache;
  retryPolicy: RetryPolicy;
  logger?: Logger;
  metrics?: MetricsCollector;
  /** Correlation id source (default: uuid v4) */
  generateId?: () => string;
}

const passthrough = (body: unknown): unknown => body;

interface RunState {
  readonly correlationId: string;
  /** Transport attempts made so far */
  attempts: number;
}

/**
 * Applies cache, circuit breaker, rate limiter, transport and retry policy to
 * a request descriptor. Never rejects for request failures: every outcome is
 * returned as a Result.
 */
export class RequestExecutor {
  private readonly transport: Transport;
  private readonly session: ClientSession;
  private readonly rateLimiter: RateLimiter;
  private readonly circuitBreakers: CircuitBreakerRegistry;
  private readonly cache: ResponseCache;
  private readonly retryPolicy: RetryPolicy;
  private readonly logger: Logger;
  private readonly metrics: MetricsCollector;
  private readonly generateId: () => string;

  constructor(options: RequestExecutorOptions) {
    this.transport = options.transport;
    this.session = options.session;
    this.rateLimiter = options.rateLimiter;
    this.circuitBreakers = options.circuitBreakers;
    this.cache = options.cache;
    this.retryPolicy = options.retryPolicy;
    this.logger = options.logger ?? new NoopLogger();
    this.metrics = options.metrics ?? new NoopMetricsCollector();
    this.generateId = options.generateId ?? (() => uuidv4());

    this.rateLimiter.addHook({
      onRateLimited: (group, waitMs) => {
        this.metrics.incrementCounter(MetricNames.RATE_LIMIT_WAITS, 1, { group });
        this.logger.debug('Waiting for rate limit slot', { group, waitMs });
      },
    });

    this.circuitBreakers.addHook({
      onStateChange: (group, from, to) => {
        this.metrics.setGauge(MetricNames.CIRCUIT_BREAKER_STATE, circuitStateValue(to), { group });
        this.logger.warn('Circuit breaker state changed', { group, from, to });
      },
    });
  }

  execute<T>(
    descriptor: RequestDescriptor,
    options: RequestOptions & { parse: (body: unknown) => T }
  ): Promise<Result<T>>;
  execute(descriptor: RequestDescriptor, options?: RequestOptions): Promise<Result<unknown>>;
  execute<T>(descriptor: RequestDescriptor, options: ExecuteOptions<T> = {}): Promise<Result<unknown>> {
    return this.executeParsed<unknown>(descriptor, options.parse ?? passthrough, options);
  }

  /**
   * Execute a descriptor and shape the response body with `parse`
   */
  async executeParsed<T>(
    descriptor: RequestDescriptor,
    parse: (body: unknown) => T,
    options: RequestOptions = {}
  ): Promise<Result<T>> {
    const correlationId = this.generateId();
    const startedAt = Date.now();
    const { signal, dispose } = linkSignal(options.signal, options.timeoutMs);
    const labels = { group: descriptor.group, method: descriptor.method };

    this.metrics.incrementCounter(MetricNames.REQUEST_COUNT, 1, labels);

    const run: RunState = { correlationId, attempts: 0 };
    let result: Result<T>;
    try {
      result = await this.run(descriptor, parse, run, signal);
    } catch (error) {
      result = err(toBrokerageError(error, descriptor.group));
    } finally {
      dispose();
    }

    this.metrics.recordHistogram(MetricNames.REQUEST_DURATION_MS, Date.now() - startedAt, labels);
    if (!result.ok) {
      this.metrics.incrementCounter(MetricNames.REQUEST_ERRORS, 1, {
        group: descriptor.group,
        kind: result.error.kind,
      });
      logError(this.logger, result.error, {
        correlationId,
        group: descriptor.group,
        method: descriptor.method,
        path: descriptor.path,
        attempts: run.attempts,
      });
    }

    return result;
  }

  private async run<T>(
    descriptor: RequestDescriptor,
    parse: (body: unknown) => T,
    state: RunState,
    signal: AbortSignal | undefined
  ): Promise<Result<T>> {
    const { group } = descriptor;
    const { correlationId } = state;

    if (signal?.aborted) {
      return err(new CancelledError('Request was cancelled', { group }));
    }

    // Refused locally: no breaker permit, limiter slot or cache lookup
    const provider = descriptor.authenticated ? this.session.getCredentialProvider() : undefined;
    if (descriptor.authenticated && !provider) {
      return err(new ClientError(`${descriptor.method} ${descriptor.path} can only be called when logged in`, {
        reason: 'not_logged_in',
        group,
      }));
    }

    const key = this.isCacheable(descriptor) ? cacheKey(descriptor) : undefined;
    if (key !== undefined) {
      const cached = this.cache.get(key);
      if (cached !== undefined) {
        this.metrics.incrementCounter(MetricNames.CACHE_HITS, 1, { group });
        this.logger.debug('Cache hit', { correlationId, key });
        return this.shape(cached, parse, group);
      }
      this.metrics.incrementCounter(MetricNames.CACHE_MISSES, 1, { group });
    }

    const breaker = this.circuitBreakers.get(group);
    let attemptNumber = 1;
    let forceRefresh = false;
    let reauthenticated = false;
    let lastError: BrokerageError | undefined;

    for (;;) {
      const permit = breaker.tryAcquire();
      if (!permit) {
        this.metrics.incrementCounter(MetricNames.CIRCUIT_BREAKER_REJECTIONS, 1, { group });
        this.logger.warn('Circuit breaker open, request rejected', { correlationId, group, attempt: attemptNumber });
        return err(new CircuitOpenError(group, lastError));
      }

      try {
        await this.rateLimiter.acquire(group, signal);
      } catch (error) {
        breaker.release(permit);
        return err(toBrokerageError(error, group));
      }

      const headers: Record<string, string> = { ...this.session.getHeaders(), ...descriptor.headers };

      if (provider) {
        try {
          const credential = await provider.getCredential({ forceRefresh });
          headers['Authorization'] = authorizationHeader(credential);
        } catch (error) {
          breaker.release(permit);
          return err(new ClientError('Could not obtain a credential', {
            reason: 'credential_unavailable',
            group,
            cause: toBrokerageError(error, group),
          }));
        }
        forceRefresh = false;

        if (signal?.aborted) {
          breaker.release(permit);
          return err(new CancelledError('Request was cancelled', { group }));
        }
      }

      const attemptStartedAt = Date.now();
      state.attempts = attemptNumber;
      logRequest(this.logger, correlationId, descriptor.method, descriptor.path, attemptNumber);

      let outcome: AttemptOutcome;
      try {
        const response = await this.transport.send(
          {
            method: descriptor.method,
            path: descriptor.path,
            params: descriptor.params,
            headers,
            body: descriptor.body,
            bodyEncoding: descriptor.bodyEncoding,
          },
          signal
        );
        logResponse(this.logger, correlationId, response.status, Date.now() - attemptStartedAt);
        outcome = classifyResponse(response, group);
      } catch (error) {
        outcome = classifyError(error, group);
      }

      breaker.record(permit, outcome);

      if (outcome.type === 'cancelled') {
        return err(outcome.error);
      }

      if (signal?.aborted) {
        return err(new CancelledError('Request was cancelled', {
          group,
          cause: outcome.type === 'success' ? undefined : outcome.error,
        }));
      }

      if (outcome.type === 'success') {
        if (key !== undefined) {
          this.cache.put(key, outcome.response, descriptor.cacheTtlMs ?? this.cache.defaultTtlMs);
        }
        return this.shape(outcome.response, parse, group);
      }

      lastError = outcome.error;

      // One forced refresh per request; it does not use up a retry attempt
      if (isAuthRejection(outcome) && descriptor.authenticated && !reauthenticated) {
        reauthenticated = true;
        forceRefresh = true;
        this.logger.info('Credential rejected, refreshing', { correlationId, group });
        continue;
      }

      const decision = this.retryPolicy.decide({
        descriptor,
        attemptNumber,
        startedAt: attemptStartedAt,
        outcome,
      });

      if (decision.type === 'give_up') {
        return err(decision.error);
      }

      this.metrics.incrementCounter(MetricNames.RETRY_ATTEMPTS, 1, { group });
      this.logger.warn('Retrying request', {
        correlationId,
        group,
        attempt: attemptNumber,
        delayMs: decision.delayMs,
        kind: outcome.error.kind,
      });

      try {
        await sleep(decision.delayMs, signal);
      } catch (error) {
        return err(new CancelledError('Request was cancelled during backoff', {
          group,
          cause: toBrokerageError(error, group),
        }));
      }
      attemptNumber++;
    }
  }

  private isCacheable(descriptor: RequestDescriptor): boolean {
    return descriptor.idempotent && this.cache.enabled && descriptor.cacheTtlMs !== 0;
  }

  private shape<T>(body: unknown, parse: (body: unknown) => T, group: string): Result<T> {
    try {
      return ok(parse(body));
    } catch (error) {
      return err(new ClientError('Response did not have the expected shape', {
        reason: 'invalid_response',
        group,
        cause: error instanceof Error ? error : undefined,
      }));
    }
  }
}

/**
 * Combines the caller's signal and whole-call timeout into one signal
 */
function linkSignal(
  signal: AbortSignal | undefined,
  timeoutMs: number | undefined
): { signal: AbortSignal | undefined; dispose: () => void } {
  if (!signal && timeoutMs === undefined) {
    return { signal: undefined, dispose: () => undefined };
  }

  const controller = new AbortController();
  const onAbort = (): void => controller.abort();

  if (signal?.aborted) {
    controller.abort();
  } else {
    signal?.addEventListener('abort', onAbort, { once: true });
  }

  const timer = timeoutMs === undefined ? undefined : setTimeout(onAbort, timeoutMs);

  return {
    signal: controller.signal,
    dispose: () => {
      if (timer !== undefined) clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    },
  };
}
