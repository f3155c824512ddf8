import { BrokerageError, ErrorKind } from './error.js';

/**
 * Error thrown when the client is misconfigured (e.g., invalid base URL, non-positive limits)
 */
export class ConfigurationError extends BrokerageError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({
      kind: ErrorKind.InvalidConfiguration,
      message,
      isRetryable: false,
      details,
    });
    this.name = 'ConfigurationError';
  }
}

/**
 * Error returned when the server signals throttling (429)
 */
export class RateLimitedError extends BrokerageError {
  constructor(message: string, options?: { retryAfterMs?: number; group?: string; details?: Record<string, unknown> }) {
    super({
      kind: ErrorKind.RateLimited,
      message,
      status: 429,
      retryAfterMs: options?.retryAfterMs,
      group: options?.group,
      isRetryable: true,
      details: options?.details,
    });
    this.name = 'RateLimitedError';
  }
}

/**
 * Error returned when the circuit breaker for a group rejects a request
 */
export class CircuitOpenError extends BrokerageError {
  constructor(group: string, cause?: Error) {
    super({
      kind: ErrorKind.CircuitOpen,
      message: `Circuit breaker is open for group '${group}'`,
      group,
      isRetryable: false,
      cause,
    });
    this.name = 'CircuitOpenError';
  }
}

/**
 * Error returned when a single attempt exceeds the transport timeout
 */
export class TimeoutError extends BrokerageError {
  constructor(message: string, options?: { group?: string; cause?: Error }) {
    super({
      kind: ErrorKind.Timeout,
      message,
      group: options?.group,
      isRetryable: true,
      cause: options?.cause,
    });
    this.name = 'TimeoutError';
  }
}

/**
 * Error returned when network-level failures occur (e.g., connection refused, DNS resolution failure)
 */
export class TransportError extends BrokerageError {
  constructor(message: string, options?: { group?: string; cause?: Error }) {
    super({
      kind: ErrorKind.TransportError,
      message,
      group: options?.group,
      isRetryable: true,
      cause: options?.cause,
    });
    this.name = 'TransportError';
  }
}

/**
 * Why a client error was raised
 */
export type ClientErrorReason =
  | 'bad_request'
  | 'auth_rejected'
  | 'forbidden'
  | 'not_found'
  | 'not_logged_in'
  | 'credential_unavailable'
  | 'invalid_response'
  | 'rejected';

/**
 * Error returned for 4xx responses other than 429, and for requests the client refuses to send
 */
export class ClientError extends BrokerageError {
  readonly reason: ClientErrorReason;

  constructor(
    message: string,
    options?: {
      status?: number;
      reason?: ClientErrorReason;
      group?: string;
      details?: Record<string, unknown>;
      cause?: Error;
    }
  ) {
    super({
      kind: ErrorKind.ClientError,
      message,
      status: options?.status,
      group: options?.group,
      isRetryable: false,
      details: options?.details,
      cause: options?.cause,
    });
    this.name = 'ClientError';
    this.reason = options?.reason ?? reasonFromStatus(options?.status);
  }

  /**
   * True when the server refused the credential
   */
  get authRejected(): boolean {
    return this.reason === 'auth_rejected';
  }

  static notLoggedIn(operation: string): ClientError {
    return new ClientError(`${operation} can only be called when logged in`, {
      reason: 'not_logged_in',
    });
  }
}

/**
 * Error returned when the API server answers with a 5xx status
 */
export class ServerError extends BrokerageError {
  constructor(message: string, status: number, options?: { group?: string; details?: Record<string, unknown> }) {
    super({
      kind: ErrorKind.ServerError,
      message,
      status,
      group: options?.group,
      isRetryable: true,
      details: options?.details,
    });
    this.name = 'ServerError';
  }
}

/**
 * Error returned when the caller aborts a request
 */
export class CancelledError extends BrokerageError {
  constructor(message = 'Request was cancelled', options?: { group?: string; cause?: Error }) {
    super({
      kind: ErrorKind.Cancelled,
      message,
      group: options?.group,
      isRetryable: false,
      cause: options?.cause,
    });
    this.name = 'CancelledError';
  }
}

/**
 * Error returned when the retry budget is spent
 */
export class ExhaustedRetriesError extends BrokerageError {
  readonly lastError: BrokerageError;
  readonly attempts: number;

  constructor(lastError: BrokerageError, attempts: number) {
    super({
      kind: ErrorKind.ExhaustedRetries,
      message: `Gave up after ${attempts} attempts: ${lastError.message}`,
      status: lastError.status,
      group: lastError.group,
      isRetryable: false,
      cause: lastError,
    });
    this.name = 'ExhaustedRetriesError';
    this.lastError = lastError;
    this.attempts = attempts;
  }
}

function reasonFromStatus(status: number | undefined): ClientErrorReason {
  switch (status) {
    case 400:
      return 'bad_request';
    case 401:
      return 'auth_rejected';
    case 403:
      return 'forbidden';
    case 404:
      return 'not_found';
    default:
      return 'rejected';
  }
}

/**
 * Parses a Retry-After header value (delta seconds or HTTP date) into milliseconds
 */
export function parseRetryAfter(value: string | undefined, now: number = Date.now()): number | undefined {
  if (!value) {
    return undefined;
  }

  const trimmed = value.trim();
  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    return Math.round(parseFloat(trimmed) * 1000);
  }

  const date = Date.parse(trimmed);
  if (isNaN(date)) {
    return undefined;
  }
  return Math.max(0, date - now);
}

/**
 * Extracts a human readable message from an error response body
 */
function messageFromBody(body: unknown, status: number): string {
  if (typeof body === 'string' && body.trim().length > 0) {
    return body.trim();
  }
  if (body && typeof body === 'object') {
    for (const key of ['detail', 'message', 'error']) {
      const value: unknown = Reflect.get(body, key);
      if (typeof value === 'string' && value.length > 0) {
        return value;
      }
    }
  }
  return `HTTP ${status} error`;
}

/**
 * Maps a non-2xx HTTP response to an error
 */
export function fromStatus(
  status: number,
  body: unknown,
  headers: Record<string, string> = {},
  group?: string
): BrokerageError {
  const message = messageFromBody(body, status);
  const details = body && typeof body === 'object' && !Array.isArray(body)
    ? { body }
    : undefined;

  if (status === 429) {
    return new RateLimitedError(message, {
      retryAfterMs: parseRetryAfter(headers['retry-after']),
      group,
      details,
    });
  }

  if (status >= 500) {
    return new ServerError(message, status, { group, details });
  }

  return new ClientError(message, { status, group, details });
}

/**
 * Converts any thrown value into a BrokerageError
 */
export function toBrokerageError(error: unknown, group?: string): BrokerageError {
  if (error instanceof BrokerageError) {
    return error;
  }
  if (error instanceof Error) {
    if (error.name === 'AbortError') {
      return new CancelledError('Request was cancelled', { group, cause: error });
    }
    return new TransportError(error.message, { group, cause: error });
  }
  return new TransportError(String(error), { group });
}
