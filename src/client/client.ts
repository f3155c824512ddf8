import {
  createConfigFromEnv,
  resolveConfig,
  type BrokerageClientConfig,
  type PartialBrokerageClientConfig,
} from '../config/config.js';
import { StaticCredentialProvider, type CredentialProvider } from '../auth/credential-provider.js';
import { ClientSession } from '../auth/session.js';
import { ResponseCache } from '../cache/response-cache.js';
import { BulkDispatcher, type BulkOptions } from '../executor/bulk-dispatcher.js';
import { RequestExecutor, type ExecuteOptions } from '../executor/request-executor.js';
import { ConsoleLogger, type Logger } from '../observability/logging.js';
import type { MetricsCollector } from '../observability/metrics.js';
import { CircuitBreakerRegistry } from '../resilience/circuit-breaker.js';
import { RateLimiter } from '../resilience/rate-limiter.js';
import { RetryPolicy } from '../resilience/retry.js';
import { createTransport, type Transport } from '../transport/http-transport.js';
import {
  createDescriptor,
  ok,
  type BodyEncoding,
  type QueryValue,
  type RequestDescriptor,
  type RequestOptions,
  type Result,
} from '../types/common.js';
import { collectPages, resultsOf, type PageWalkOptions } from './pagination.js';

/**
 * Options shared by the request helpers
 */
export interface CallOptions extends RequestOptions {
  headers?: Record<string, string>;
  /** `0` skips the cache for this call */
  cacheTtlMs?: number;
  /** Defaults to true */
  authenticated?: boolean;
}

export interface PostOptions extends CallOptions {
  params?: Record<string, QueryValue>;
  /** `json` (default) or URL-encoded `form` */
  encoding?: BodyEncoding;
  idempotent?: boolean;
}

/**
 * Main brokerage client interface
 */
export interface BrokerageClient {
  readonly session: ClientSession;

  /**
   * Runs one descriptor through cache, circuit breaker, rate limiter, transport and retries
   */
  execute<T>(descriptor: RequestDescriptor, options: RequestOptions & { parse: (body: unknown) => T }): Promise<Result<T>>;
  execute(descriptor: RequestDescriptor, options?: RequestOptions): Promise<Result<unknown>>;

  /**
   * Runs many descriptors with bounded concurrency; results follow input order
   */
  executeAll<T>(
    descriptors: readonly RequestDescriptor[],
    options: BulkOptions<T> & { parse: (body: unknown) => T }
  ): Promise<Result<T>[]>;
  executeAll(descriptors: readonly RequestDescriptor[], options?: BulkOptions): Promise<Result<unknown>[]>;

  get(group: string, path: string, params?: Record<string, QueryValue>, options?: CallOptions): Promise<Result<unknown>>;
  post(group: string, path: string, body?: unknown, options?: PostOptions): Promise<Result<unknown>>;
  delete(group: string, path: string, options?: CallOptions): Promise<Result<unknown>>;

  /**
   * The `results` list of a GET
   */
  getResults(group: string, path: string, params?: Record<string, QueryValue>, options?: CallOptions): Promise<Result<unknown[]>>;

  /**
   * The first entry of the `results` list of a GET, `undefined` if the list is empty
   */
  getFirst(group: string, path: string, params?: Record<string, QueryValue>, options?: CallOptions): Promise<Result<unknown>>;

  /**
   * Every `results` entry across all pages, following `next` links
   */
  getAllPages(
    group: string,
    path: string,
    params?: Record<string, QueryValue>,
    options?: CallOptions & PageWalkOptions
  ): Promise<Result<unknown[]>>;

  /** Switches the account; the response cache is cleared */
  login(provider: CredentialProvider): void;
  /** Clears the response cache as well */
  logout(): void;
  isLoggedIn(): boolean;

  getConfig(): Readonly<BrokerageClientConfig>;
  getRateLimiter(): RateLimiter;
  getCircuitBreakers(): CircuitBreakerRegistry;
  getCache(): ResponseCache;
}

export interface BrokerageClientOptions {
  config?: BrokerageClientConfig | PartialBrokerageClientConfig;
  credentialProvider?: CredentialProvider;
  /** Defaults to a fetch-based transport on the configured base URL */
  transport?: Transport;
  logger?: Logger;
  metrics?: MetricsCollector;
  /** Uniform [0, 1) source for retry jitter */
  random?: () => number;
  /** Correlation id source */
  generateId?: () => string;
}

const passthrough = (body: unknown): unknown => body;

/**
 * Implementation of the brokerage client
 */
export class BrokerageClientImpl implements BrokerageClient {
  readonly session: ClientSession;
  private readonly config: BrokerageClientConfig;
  private readonly rateLimiter: RateLimiter;
  private readonly circuitBreakers: CircuitBreakerRegistry;
  private readonly cache: ResponseCache;
  private readonly executor: RequestExecutor;
  private readonly bulk: BulkDispatcher;

  constructor(options: BrokerageClientOptions = {}) {
    this.config = resolveConfig(options.config);

    const logger = options.logger ?? new ConsoleLogger({ level: this.config.logLevel });
    const transport = options.transport ?? createTransport({
      baseUrl: this.config.baseUrl,
      timeoutMs: this.config.timeoutMs,
    });

    this.session = new ClientSession(
      { userAgent: this.config.userAgent, headers: this.config.headers },
      options.credentialProvider
    );
    this.rateLimiter = new RateLimiter(this.config.rateLimit);
    this.circuitBreakers = new CircuitBreakerRegistry(this.config.circuitBreaker);
    this.cache = new ResponseCache(this.config.cache);

    this.executor = new RequestExecutor({
      transport,
      session: this.session,
      rateLimiter: this.rateLimiter,
      circuitBreakers: this.circuitBreakers,
      cache: this.cache,
      retryPolicy: new RetryPolicy(this.config.retry, options.random),
      logger,
      metrics: options.metrics,
      generateId: options.generateId,
    });
    this.bulk = new BulkDispatcher(this.executor, this.config.bulk.concurrency, logger);
  }

  execute<T>(descriptor: RequestDescriptor, options: RequestOptions & { parse: (body: unknown) => T }): Promise<Result<T>>;
  execute(descriptor: RequestDescriptor, options?: RequestOptions): Promise<Result<unknown>>;
  execute<T>(descriptor: RequestDescriptor, options: ExecuteOptions<T> = {}): Promise<Result<unknown>> {
    return this.executor.executeParsed<unknown>(descriptor, options.parse ?? passthrough, options);
  }

  executeAll<T>(
    descriptors: readonly RequestDescriptor[],
    options: BulkOptions<T> & { parse: (body: unknown) => T }
  ): Promise<Result<T>[]>;
  executeAll(descriptors: readonly RequestDescriptor[], options?: BulkOptions): Promise<Result<unknown>[]>;
  executeAll<T>(descriptors: readonly RequestDescriptor[], options: BulkOptions<T> = {}): Promise<Result<unknown>[]> {
    return this.bulk.executeAllParsed<unknown>(descriptors, options.parse ?? passthrough, options);
  }

  get(group: string, path: string, params?: Record<string, QueryValue>, options: CallOptions = {}): Promise<Result<unknown>> {
    return this.executor.execute(
      createDescriptor({
        method: 'GET',
        group,
        path,
        params,
        headers: options.headers,
        cacheTtlMs: options.cacheTtlMs,
        authenticated: options.authenticated,
      }),
      options
    );
  }

  post(group: string, path: string, body?: unknown, options: PostOptions = {}): Promise<Result<unknown>> {
    return this.executor.execute(
      createDescriptor({
        method: 'POST',
        group,
        path,
        params: options.params,
        body,
        bodyEncoding: options.encoding,
        headers: options.headers,
        idempotent: options.idempotent,
        cacheTtlMs: options.cacheTtlMs,
        authenticated: options.authenticated,
      }),
      options
    );
  }

  delete(group: string, path: string, options: CallOptions = {}): Promise<Result<unknown>> {
    return this.executor.execute(
      createDescriptor({
        method: 'DELETE',
        group,
        path,
        headers: options.headers,
        authenticated: options.authenticated,
      }),
      options
    );
  }

  async getResults(
    group: string,
    path: string,
    params?: Record<string, QueryValue>,
    options?: CallOptions
  ): Promise<Result<unknown[]>> {
    const response = await this.get(group, path, params, options);
    return response.ok ? resultsOf(response.value, path) : response;
  }

  async getFirst(
    group: string,
    path: string,
    params?: Record<string, QueryValue>,
    options?: CallOptions
  ): Promise<Result<unknown>> {
    const results = await this.getResults(group, path, params, options);
    return results.ok ? ok(results.value[0]) : results;
  }

  getAllPages(
    group: string,
    path: string,
    params?: Record<string, QueryValue>,
    options: CallOptions & PageWalkOptions = {}
  ): Promise<Result<unknown[]>> {
    // `next` links already carry the query string
    return collectPages(
      (pagePath, first) => this.get(group, pagePath, first ? params : undefined, options),
      path,
      options
    );
  }

  login(provider: CredentialProvider): void {
    this.session.login(provider);
    this.cache.clear();
  }

  logout(): void {
    this.session.logout();
    this.cache.clear();
  }

  isLoggedIn(): boolean {
    return this.session.isLoggedIn();
  }

  getConfig(): Readonly<BrokerageClientConfig> {
    return Object.freeze({ ...this.config });
  }

  getRateLimiter(): RateLimiter {
    return this.rateLimiter;
  }

  getCircuitBreakers(): CircuitBreakerRegistry {
    return this.circuitBreakers;
  }

  getCache(): ResponseCache {
    return this.cache;
  }
}

/**
 * Creates a new brokerage client
 */
export function createClient(options?: BrokerageClientOptions): BrokerageClient {
  return new BrokerageClientImpl(options);
}

/**
 * Creates a new brokerage client using environment variables
 *
 * Recognized environment variables:
 * - BROKERAGE_ACCESS_TOKEN (optional, logs the client in with a fixed token)
 * - BROKERAGE_BASE_URL, BROKERAGE_TIMEOUT_MS, BROKERAGE_RATE_LIMIT,
 *   BROKERAGE_RATE_WINDOW_MS, BROKERAGE_MAX_ATTEMPTS, BROKERAGE_BULK_CONCURRENCY,
 *   BROKERAGE_CACHE_ENABLED, BROKERAGE_LOG_LEVEL
 */
export function createClientFromEnv(
  overrides?: Omit<BrokerageClientOptions, 'config'>,
  env: NodeJS.ProcessEnv = process.env
): BrokerageClient {
  const config = createConfigFromEnv(env);

  const token = env['BROKERAGE_ACCESS_TOKEN'];
  const credentialProvider = overrides?.credentialProvider
    ?? (token ? new StaticCredentialProvider(token) : undefined);

  return createClient({ ...overrides, config, credentialProvider });
}
