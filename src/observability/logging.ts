/**
 * Structured logging for the request pipeline.
 *
 * Every line a request produces carries its correlation id, endpoint group and
 * attempt number. The pretty and compact formats lift those three into a
 * `[correlationId group #attempt]` scope ahead of the message; JSON keeps them
 * as top-level fields.
 */

import { ErrorKind, type BrokerageError } from '../errors/index.js';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'pretty' | 'json' | 'compact';

/** Minimum level a logger writes; `silent` writes nothing */
export type LogThreshold = LogLevel | 'silent';

export type LogContext = Record<string, unknown>;

export interface LoggingConfig {
  level: LogThreshold;
  format: LogFormat;
  includeTimestamps: boolean;
  /** Line writer, console.log unless replaced */
  sink: (line: string) => void;
}

export interface Logger {
  trace(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

/**
 * Creates a default logging configuration
 */
export function createDefaultLoggingConfig(): LoggingConfig {
  return {
    level: 'info',
    format: 'pretty',
    includeTimestamps: true,
    sink: line => console.log(line),
  };
}

const SEVERITY: Record<LogThreshold, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  silent: 5,
};

interface RequestScope {
  correlationId?: string;
  group?: string;
  attempt?: number;
}

/**
 * Separates the request scope fields from the rest of the context
 */
function splitScope(context: LogContext): { scope: RequestScope; fields: LogContext } {
  const { correlationId, group, attempt, ...fields } = context;
  const scope: RequestScope = {};

  if (typeof correlationId === 'string') scope.correlationId = correlationId;
  else if (correlationId !== undefined) fields['correlationId'] = correlationId;

  if (typeof group === 'string') scope.group = group;
  else if (group !== undefined) fields['group'] = group;

  if (typeof attempt === 'number') scope.attempt = attempt;
  else if (attempt !== undefined) fields['attempt'] = attempt;

  return { scope, fields };
}

function formatScope(scope: RequestScope): string | undefined {
  const parts: string[] = [];
  if (scope.correlationId !== undefined) parts.push(scope.correlationId);
  if (scope.group !== undefined) parts.push(scope.group);
  if (scope.attempt !== undefined) parts.push(`#${scope.attempt}`);
  return parts.length > 0 ? `[${parts.join(' ')}]` : undefined;
}

/**
 * Logger writing one line (pretty: one entry) per message to a sink
 */
export class ConsoleLogger implements Logger {
  private readonly config: LoggingConfig;

  constructor(config?: Partial<LoggingConfig>) {
    this.config = { ...createDefaultLoggingConfig(), ...config };
  }

  trace(message: string, context?: LogContext): void {
    this.write('trace', message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.write('error', message, context);
  }

  isEnabled(level: LogLevel): boolean {
    return SEVERITY[level] >= SEVERITY[this.config.level];
  }

  private write(level: LogLevel, message: string, context: LogContext = {}): void {
    if (!this.isEnabled(level)) {
      return;
    }

    const timestamp = this.config.includeTimestamps ? new Date().toISOString() : undefined;

    if (this.config.format === 'json') {
      this.config.sink(JSON.stringify({ timestamp, level, message, ...context }));
      return;
    }

    const { scope, fields } = splitScope(context);
    const head: string[] = [];
    if (timestamp && this.config.format === 'pretty') head.push(`[${timestamp}]`);
    head.push(`[${level.toUpperCase()}]`);
    const scopeLabel = formatScope(scope);
    if (scopeLabel) head.push(scopeLabel);
    head.push(message);

    const entries = Object.entries(fields).filter(([, value]) => value !== undefined);
    if (entries.length === 0) {
      this.config.sink(head.join(' '));
    } else if (this.config.format === 'compact') {
      this.config.sink(`${head.join(' ')} ${JSON.stringify(Object.fromEntries(entries))}`);
    } else {
      this.config.sink([head.join(' '), ...entries.map(([k, v]) => `  ${k}: ${JSON.stringify(v)}`)].join('\n'));
    }
  }
}

/**
 * Logger that drops everything
 */
export class NoopLogger extends ConsoleLogger {
  constructor() {
    super({ level: 'silent' });
  }
}

/**
 * Logs an outgoing request attempt
 */
export function logRequest(
  logger: Logger,
  correlationId: string,
  method: string,
  path: string,
  attempt: number
): void {
  logger.debug('Outgoing request', { correlationId, method, path, attempt });
}

/**
 * Logs an incoming HTTP response
 */
export function logResponse(
  logger: Logger,
  correlationId: string,
  status: number,
  durationMs: number
): void {
  logger.debug('Incoming response', { correlationId, status, durationMs });
}

// Local refusals and cancellations are the caller's doing, not the API's
const FAILURE_LEVEL: Record<ErrorKind, LogLevel> = {
  [ErrorKind.Cancelled]: 'debug',
  [ErrorKind.ClientError]: 'info',
  [ErrorKind.RateLimited]: 'warn',
  [ErrorKind.CircuitOpen]: 'warn',
  [ErrorKind.Timeout]: 'error',
  [ErrorKind.TransportError]: 'error',
  [ErrorKind.ServerError]: 'error',
  [ErrorKind.ExhaustedRetries]: 'error',
  [ErrorKind.InvalidConfiguration]: 'error',
};

export interface FailedRequest {
  correlationId: string;
  group: string;
  method: string;
  path: string;
  attempts: number;
}

/**
 * Logs the final failure of a request at a level that depends on its kind
 */
export function logError(logger: Logger, error: BrokerageError, request: FailedRequest): void {
  const level = FAILURE_LEVEL[error.kind];
  logger[level]('Request failed', {
    correlationId: request.correlationId,
    group: request.group,
    attempt: request.attempts,
    method: request.method,
    path: request.path,
    kind: error.kind,
    status: error.status,
    error: error.message,
  });
}
