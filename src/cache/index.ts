export {
  ResponseCache,
  cacheKey,
  createDefaultResponseCacheConfig,
  type ResponseCacheConfig,
  type CacheEntry,
  type CacheStats,
} from './response-cache.js';
