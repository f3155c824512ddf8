export {
  DEFAULT_BASE_URL,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_USER_AGENT,
  DEFAULT_RATE_LIMIT_CONFIG,
  DEFAULT_CACHE_CONFIG,
  DEFAULT_CIRCUIT_BREAKER_CONFIG,
  DEFAULT_RETRY_CONFIG,
  DEFAULT_BULK_CONFIG,
  BrokerageConfigBuilder,
  createDefaultConfig,
  createConfigFromEnv,
  resolveConfig,
  validateConfig,
  type BrokerageClientConfig,
  type BulkConfig,
  type PartialBrokerageClientConfig,
} from './config.js';
