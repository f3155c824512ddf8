/**
 * Error kinds for categorizing brokerage client failures.
 *
 * Every `execute` / `executeAll` slot that does not produce a value resolves to
 * exactly one of these kinds. `InvalidConfiguration` is thrown, never returned:
 * by config validation, `createDescriptor` and a bad bulk concurrency.
 */
export enum ErrorKind {
  /** The server signaled throttling (HTTP 429). */
  RateLimited = 'rate_limited',
  /** Fast-failed by the circuit breaker, no transport call made. */
  CircuitOpen = 'circuit_open',
  /** A single attempt exceeded the transport timeout. */
  Timeout = 'timeout',
  /** Connection-level failure. */
  TransportError = 'transport_error',
  /** 4xx other than rate limiting; never retried. */
  ClientError = 'client_error',
  /** 5xx; retried. */
  ServerError = 'server_error',
  /** The caller aborted the request. */
  Cancelled = 'cancelled',
  /** The retry budget was spent; wraps the last underlying error. */
  ExhaustedRetries = 'exhausted_retries',
  /** The client configuration failed validation. */
  InvalidConfiguration = 'invalid_configuration',
}

/**
 * Base error class for all brokerage client errors.
 * Carries the error kind, HTTP status, retry information and the endpoint
 * group the failing request belonged to.
 */
export class BrokerageError extends Error {
  /**
   * The kind of error
   */
  readonly kind: ErrorKind;

  /**
   * HTTP status code associated with the error, if applicable
   */
  readonly status?: number;

  /**
   * Milliseconds the server asked us to wait before retrying, if provided
   */
  readonly retryAfterMs?: number;

  /**
   * Endpoint group of the request that failed
   */
  readonly group?: string;

  /**
   * Indicates whether this error kind can be retried
   */
  readonly isRetryable: boolean;

  /**
   * Additional error details from the API response
   */
  readonly details?: Record<string, unknown>;

  /**
   * Underlying cause
   */
  override readonly cause?: Error;

  constructor(options: {
    kind: ErrorKind;
    message: string;
    status?: number;
    retryAfterMs?: number;
    group?: string;
    isRetryable?: boolean;
    details?: Record<string, unknown>;
    cause?: Error;
  }) {
    super(options.message);
    this.name = 'BrokerageError';
    this.kind = options.kind;
    this.status = options.status;
    this.retryAfterMs = options.retryAfterMs;
    this.group = options.group;
    this.isRetryable = options.isRetryable ?? false;
    this.details = options.details;
    this.cause = options.cause;

    // Maintains proper stack trace for where error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Returns a JSON representation of the error
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      kind: this.kind,
      message: this.message,
      status: this.status,
      retryAfterMs: this.retryAfterMs,
      group: this.group,
      isRetryable: this.isRetryable,
      details: this.details,
      cause: this.cause?.message,
    };
  }

  /**
   * Formats the error for display.
   */
  override toString(): string {
    let result = `[${this.kind}] ${this.message}`;
    if (this.status !== undefined) {
      result += ` (HTTP ${this.status})`;
    }
    if (this.group) {
      result += ` [group: ${this.group}]`;
    }
    return result;
  }
}

/**
 * Type guard for BrokerageError.
 */
export function isBrokerageError(error: unknown): error is BrokerageError {
  return error instanceof BrokerageError;
}
