/**
 * Bounded-concurrency fan-out over the request executor
 */

import { ConfigurationError, type ErrorKind } from '../errors/index.js';
import type { Logger } from '../observability/logging.js';
import { NoopLogger } from '../observability/logging.js';
import type { RequestDescriptor, RequestOptions, Result } from '../types/common.js';
import type { RequestExecutor } from './request-executor.js';
import { Semaphore } from './semaphore.js';

export interface BulkOptions<T = unknown> {
  signal?: AbortSignal;
  /** Upper bound on executions in flight, a positive integer (default: the dispatcher's concurrency) */
  concurrency?: number;
  /** Per-request whole-call timeout */
  timeoutMs?: number;
  parse?: (body: unknown) => T;
}

export interface BulkSummary {
  total: number;
  succeeded: number;
  failed: number;
  errorsByKind: Partial<Record<ErrorKind, number>>;
}

const passthrough = (body: unknown): unknown => body;

/**
 * Runs many descriptors through one executor, at most `concurrency` at a time.
 * Results line up with the input; a failed slot never cancels its siblings.
 */
export class BulkDispatcher {
  private readonly executor: RequestExecutor;
  private readonly concurrency: number;
  private readonly logger: Logger;

  constructor(executor: RequestExecutor, concurrency: number, logger?: Logger) {
    this.executor = executor;
    this.concurrency = concurrency;
    this.logger = logger ?? new NoopLogger();
  }

  executeAll<T>(
    descriptors: readonly RequestDescriptor[],
    options: BulkOptions<T> & { parse: (body: unknown) => T }
  ): Promise<Result<T>[]>;
  executeAll(descriptors: readonly RequestDescriptor[], options?: BulkOptions): Promise<Result<unknown>[]>;
  executeAll<T>(descriptors: readonly RequestDescriptor[], options: BulkOptions<T> = {}): Promise<Result<unknown>[]> {
    return this.executeAllParsed<unknown>(descriptors, options.parse ?? passthrough, options);
  }

  /**
   * Execute every descriptor and shape each response body with `parse`
   *
   * @throws {ConfigurationError} (as a rejection) when `concurrency` is not a positive integer;
   * nothing is sent
   */
  async executeAllParsed<T>(
    descriptors: readonly RequestDescriptor[],
    parse: (body: unknown) => T,
    options: Omit<BulkOptions, 'parse'> = {}
  ): Promise<Result<T>[]> {
    const concurrency = options.concurrency ?? this.concurrency;
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new ConfigurationError(`Bulk concurrency must be a positive integer, got ${concurrency}`, {
        paths: ['bulk.concurrency'],
      });
    }

    if (descriptors.length === 0) {
      return [];
    }
    const semaphore = new Semaphore(concurrency);
    const requestOptions: RequestOptions = { signal: options.signal, timeoutMs: options.timeoutMs };

    this.logger.debug('Dispatching bulk requests', { total: descriptors.length, concurrency });

    const results = new Array<Result<T>>(descriptors.length);
    await Promise.all(
      descriptors.map((descriptor, index) =>
        semaphore.run(async () => {
          results[index] = await this.executor.executeParsed(descriptor, parse, requestOptions);
        })
      )
    );

    return results;
  }
}

/**
 * Counts successes and failures of a bulk run
 */
export function summarize(results: readonly Result<unknown>[]): BulkSummary {
  const summary: BulkSummary = { total: results.length, succeeded: 0, failed: 0, errorsByKind: {} };

  for (const result of results) {
    if (result.ok) {
      summary.succeeded++;
    } else {
      summary.failed++;
      const kind = result.error.kind;
      summary.errorsByKind[kind] = (summary.errorsByKind[kind] ?? 0) + 1;
    }
  }

  return summary;
}
