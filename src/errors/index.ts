export { BrokerageError, ErrorKind, isBrokerageError } from './error.js';
export {
  ConfigurationError,
  RateLimitedError,
  CircuitOpenError,
  TimeoutError,
  TransportError,
  ClientError,
  ServerError,
  CancelledError,
  ExhaustedRetriesError,
  fromStatus,
  parseRetryAfter,
  toBrokerageError,
  type ClientErrorReason,
} from './categories.js';
