/**
 * ioredis adapters for the lock and cache stores
 */
import { Redis } from 'ioredis';
import type { RedisLockClient } from '@apigw/cache-lock';
import type { RedisCacheClient } from '@apigw/cache-response';
import type { Logger } from '@apigw/logger';

export interface RedisClients {
  lockClient: RedisLockClient;
  cacheClient: RedisCacheClient;
}

/**
 * Share one connection between both stores; it is closed once
 */
export function adaptRedis(redis: Redis): RedisClients {
  let quitting: Promise<string> | undefined;
  const quit = (): Promise<string> => {
    quitting ??= redis.quit();
    return quitting;
  };

  return {
    lockClient: {
      set: (key, value, mode, milliseconds, condition) => redis.set(key, value, mode, milliseconds, condition),
      eval: (script, numKeys, ...args) => redis.call('EVAL', [script, numKeys, ...args]),
      quit,
    },
    cacheClient: {
      get: (key) => redis.get(key),
      set: (key, value, mode, milliseconds) => redis.set(key, value, mode, milliseconds),
      del: (...keys) => redis.del(...keys),
      keys: (pattern) => redis.keys(pattern),
      quit,
    },
  };
}

/**
 * Connect to `url`
 */
export function connectRedis(url: string, logger: Logger): Redis {
  const redis = new Redis(url, { maxRetriesPerRequest: 2, lazyConnect: false });
  redis.on('error', (error: Error) => {
    logger.warn({ err: error.message }, 'Redis connection error');
  });
  return redis;
}
