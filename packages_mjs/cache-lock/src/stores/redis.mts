/**
 * Redis lock store
 * Suitable for several gateway processes sharing one cache
 */

import type { LockStore } from '../types.mjs';

/**
 * Redis client interface (compatible with ioredis)
 */
export interface RedisLockClient {
  set(key: string, value: string, mode: 'PX', milliseconds: number, condition: 'NX'): Promise<string | null>;
  eval(script: string, numKeys: number, ...args: string[]): Promise<unknown>;
  quit(): Promise<string>;
}

/**
 * Deletes the key only while it still holds the caller's token
 */
export const RELEASE_SCRIPT = `if redis.call("get", KEYS[1]) == ARGV[1] then
  return redis.call("del", KEYS[1])
else
  return 0
end`;

export class RedisLockStore implements LockStore {
  private readonly client: RedisLockClient;
  private readonly keyPrefix: string;

  /**
   * @param client - Redis client (ioredis instance or adapter)
   * @param keyPrefix - Prefix for all keys. Default: ''
   */
  constructor(client: RedisLockClient, keyPrefix: string = '') {
    this.client = client;
    this.keyPrefix = keyPrefix;
  }

  private getKey(key: string): string {
    return `${this.keyPrefix}${key}`;
  }

  /**
   * SET key token PX lease NX
   */
  async tryAcquire(key: string, token: string, leaseMs: number): Promise<boolean> {
    const result = await this.client.set(this.getKey(key), token, 'PX', Math.max(1, Math.ceil(leaseMs)), 'NX');
    return result === 'OK';
  }

  async release(key: string, token: string): Promise<boolean> {
    const deleted = await this.client.eval(RELEASE_SCRIPT, 1, this.getKey(key), token);
    return deleted === 1;
  }

  async close(): Promise<void> {
    await this.client.quit();
  }
}

export function createRedisLockStore(client: RedisLockClient, keyPrefix?: string): RedisLockStore {
  return new RedisLockStore(client, keyPrefix);
}
