/**
 * @apigw/cache-response
 *
 * Stampede-safe cache-aside for proxied GET responses: cache store, cache key
 * and the lock-protected recompute protocol.
 */

// Types
export type {
  CacheControlDirectives,
  CacheEntry,
  CacheStore,
  RecomputeResult,
  CacheSource,
  CacheResult,
  TtlSource,
  ResponseCacheConfig,
  HandleOptions,
  CacheEventType,
  CacheEvent,
  CacheEventListener,
} from './types.mjs';

// Parser utilities
export {
  DEFAULT_CACHEABLE_CONTENT_TYPES,
  parseCacheControl,
  getHeaderValue,
  normalizeHeaders,
  mediaType,
  isCacheableContentType,
  isSuccessStatus,
  resolveTtlSeconds,
} from './parser.mjs';

// Keys
export { buildCacheKey, buildLockKey, escapeKeyPart, type CacheKeyParts } from './key.mjs';

// Engine
export {
  ResponseCacheEngine,
  DEFAULT_RESPONSE_CACHE_CONFIG,
  mergeResponseCacheConfig,
  createResponseCacheEngine,
  type ResponseCacheDependencies,
} from './engine.mjs';

// Stores
export {
  MemoryCacheStore,
  createMemoryCacheStore,
  RedisCacheStore,
  createRedisCacheStore,
  isCacheEntry,
  type MemoryCacheStoreOptions,
  type MemoryCacheStats,
  type RedisCacheClient,
} from './stores/index.mjs';
