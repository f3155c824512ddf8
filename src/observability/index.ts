/**
 * Observability layer exports for metrics and logging
 */

// Metrics exports
export {
  type MetricsCollector,
  type MetricLabels,
  type MetricSample,
  type MetricsSnapshot,
  type HistogramSummary,
  InMemoryMetricsCollector,
  NoopMetricsCollector,
  MetricNames,
  circuitStateValue,
} from './metrics.js';

// Logging exports
export {
  type LogLevel,
  type LogThreshold,
  type LogContext,
  type FailedRequest,
  type LogFormat,
  type LoggingConfig,
  type Logger,
  createDefaultLoggingConfig,
  ConsoleLogger,
  NoopLogger,
  logRequest,
  logResponse,
  logError,
} from './logging.js';
