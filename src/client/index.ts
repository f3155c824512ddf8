export {
  BrokerageClientImpl,
  createClient,
  createClientFromEnv,
  type BrokerageClient,
  type BrokerageClientOptions,
  type CallOptions,
  type PostOptions,
} from './client.js';
export {
  collectPages,
  extractResults,
  nextLink,
  resultsOf,
  type PageWalkOptions,
} from './pagination.js';
