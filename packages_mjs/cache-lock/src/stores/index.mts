export { MemoryLockStore, createMemoryLockStore } from './memory.mjs';
export { RedisLockStore, createRedisLockStore, RELEASE_SCRIPT, type RedisLockClient } from './redis.mjs';
