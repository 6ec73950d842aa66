/**
 * Cache store implementations
 */

export {
  MemoryCacheStore,
  createMemoryCacheStore,
  type MemoryCacheStoreOptions,
  type MemoryCacheStats,
} from './memory.mjs';

export { RedisCacheStore, createRedisCacheStore, isCacheEntry, type RedisCacheClient } from './redis.mjs';
