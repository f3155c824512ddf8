/**
 * Resilient client core for rate-limited brokerage and market-data HTTP APIs
 *
 * @example
 * ```typescript
 * import { createClient, StaticCredentialProvider } from 'brokerage-gateway';
 *
 * const client = createClient({
 *   config: { baseUrl: 'https://api.brokerage.example', rateLimit: { limit: 5, windowMs: 1000 } },
 *   credentialProvider: new StaticCredentialProvider('token'),
 * });
 *
 * const quotes = await client.getResults('quotes', '/quotes/', { symbols: 'ABC,XYZ' });
 * if (quotes.ok) {
 *   console.log(quotes.value);
 * } else {
 *   console.error(quotes.error.toString());
 * }
 * ```
 */

// Client
export * from './client/index.js';

// Configuration
export * from './config/index.js';

// Errors
export * from './errors/index.js';

// Types
export {
  createDescriptor,
  ok,
  err,
  isOk,
  isErr,
  isRecord,
  type HttpMethod,
  type BodyEncoding,
  type QueryValue,
  type RequestDescriptor,
  type RequestDescriptorInit,
  type AttemptOutcome,
  type Attempt,
  type Result,
  type RequestOptions,
} from './types/common.js';

// Execution
export * from './executor/index.js';

// Resilience
export * from './resilience/index.js';

// Cache
export * from './cache/index.js';

// Transport
export * from './transport/index.js';

// Auth
export * from './auth/index.js';

// Observability
export * from './observability/index.js';
