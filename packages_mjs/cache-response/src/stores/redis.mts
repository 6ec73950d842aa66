/**
 * Redis cache store
 * Entries are JSON documents expiring with PX
 */

import type { CacheEntry, CacheStore } from '../types.mjs';

/**
 * Redis client interface (compatible with ioredis)
 */
export interface RedisCacheClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, mode: 'PX', milliseconds: number): Promise<string | null>;
  del(...keys: string[]): Promise<number>;
  keys(pattern: string): Promise<string[]>;
  quit(): Promise<string>;
}

function isStringRecord(value: unknown): value is Record<string, string> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.values(value).every((item) => typeof item === 'string')
  );
}

/**
 * Validate a decoded entry
 */
export function isCacheEntry(value: unknown): value is CacheEntry {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return (
    'body' in value &&
    typeof value.body === 'string' &&
    'headers' in value &&
    isStringRecord(value.headers) &&
    'statusCode' in value &&
    typeof value.statusCode === 'number' &&
    'cachedAt' in value &&
    typeof value.cachedAt === 'number' &&
    'expiresAt' in value &&
    typeof value.expiresAt === 'number'
  );
}

export class RedisCacheStore implements CacheStore {
  private readonly client: RedisCacheClient;
  private readonly keyPrefix: string;

  /**
   * @param client - Redis client (ioredis instance or adapter)
   * @param keyPrefix - Prefix for all keys. Default: ''
   */
  constructor(client: RedisCacheClient, keyPrefix: string = '') {
    this.client = client;
    this.keyPrefix = keyPrefix;
  }

  private getKey(key: string): string {
    return `${this.keyPrefix}${key}`;
  }

  /**
   * Undecodable values count as a miss
   */
  async get(key: string): Promise<CacheEntry | null> {
    const raw = await this.client.get(this.getKey(key));
    if (raw === null) {
      return null;
    }
    let decoded: unknown;
    try {
      decoded = JSON.parse(raw);
    } catch {
      return null;
    }
    return isCacheEntry(decoded) ? decoded : null;
  }

  async set(key: string, entry: CacheEntry, ttlMs: number): Promise<void> {
    if (ttlMs <= 0) {
      return;
    }
    const stored: CacheEntry = { ...entry, expiresAt: Date.now() + ttlMs };
    await this.client.set(this.getKey(key), JSON.stringify(stored), 'PX', Math.ceil(ttlMs));
  }

  async delete(key: string): Promise<boolean> {
    return (await this.client.del(this.getKey(key))) > 0;
  }

  /**
   * Removes only this store's entries (`proxy:*` under the prefix)
   */
  async clear(): Promise<void> {
    const keys = await this.client.keys(`${this.keyPrefix}proxy:*`);
    if (keys.length > 0) {
      await this.client.del(...keys);
    }
  }

  async size(): Promise<number> {
    return (await this.client.keys(`${this.keyPrefix}proxy:*`)).length;
  }

  async close(): Promise<void> {
    await this.client.quit();
  }
}

/**
 * Create a redis cache store
 */
export function createRedisCacheStore(client: RedisCacheClient, keyPrefix?: string): RedisCacheStore {
  return new RedisCacheStore(client, keyPrefix);
}
