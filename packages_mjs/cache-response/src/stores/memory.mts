/**
 * In-memory cache store with LRU eviction
 */

import type { CacheEntry, CacheStore } from '../types.mjs';

/**
 * LRU cache entry
 */
interface LruEntry {
  entry: CacheEntry;
  size: number;
}

/**
 * Options for memory cache store
 */
export interface MemoryCacheStoreOptions {
  /** Maximum total cache size in bytes. Default: 100MB */
  maxSize?: number;
  /** Maximum number of entries. Default: 1000 */
  maxEntries?: number;
  /** Maximum size per entry in bytes. Default: 5MB */
  maxEntrySize?: number;
  /** Cleanup interval in milliseconds. Default: 60000 */
  cleanupIntervalMs?: number;
}

/**
 * Memory cache statistics
 */
export interface MemoryCacheStats {
  entries: number;
  sizeBytes: number;
  maxSizeBytes: number;
  maxEntries: number;
}

export class MemoryCacheStore implements CacheStore {
  private cache: Map<string, LruEntry> = new Map();
  private currentSize: number = 0;
  private cleanupInterval: ReturnType<typeof setInterval> | null = null;

  private readonly maxSize: number;
  private readonly maxEntries: number;
  private readonly maxEntrySize: number;
  private readonly cleanupIntervalMs: number;

  constructor(options: MemoryCacheStoreOptions = {}) {
    this.maxSize = options.maxSize ?? 100 * 1024 * 1024;
    this.maxEntries = options.maxEntries ?? 1000;
    this.maxEntrySize = options.maxEntrySize ?? 5 * 1024 * 1024;
    this.cleanupIntervalMs = options.cleanupIntervalMs ?? 60000;

    this.startCleanup();
  }

  private startCleanup(): void {
    this.cleanupInterval = setInterval(() => {
      this.cleanup();
    }, this.cleanupIntervalMs);

    // Unref to not prevent process exit
    this.cleanupInterval.unref();
  }

  private cleanup(): void {
    const now = Date.now();
    for (const [key, { entry }] of this.cache.entries()) {
      if (entry.expiresAt <= now) {
        this.deleteEntry(key);
      }
    }
  }

  private deleteEntry(key: string): boolean {
    const lru = this.cache.get(key);
    if (lru) {
      this.currentSize -= lru.size;
      this.cache.delete(key);
      return true;
    }
    return false;
  }

  private calculateEntrySize(entry: CacheEntry): number {
    return Buffer.byteLength(entry.body, 'utf8') + JSON.stringify(entry.headers).length;
  }

  private evictIfNeeded(requiredSize: number): void {
    while (this.currentSize + requiredSize > this.maxSize && this.cache.size > 0) {
      this.evictOldest();
    }
    while (this.cache.size >= this.maxEntries && this.cache.size > 0) {
      this.evictOldest();
    }
  }

  private evictOldest(): void {
    const oldest = this.cache.keys().next();
    if (!oldest.done) {
      this.deleteEntry(oldest.value);
    }
  }

  async get(key: string): Promise<CacheEntry | null> {
    const lru = this.cache.get(key);
    if (!lru) {
      return null;
    }

    if (lru.entry.expiresAt <= Date.now()) {
      this.deleteEntry(key);
      return null;
    }

    // Move to end for LRU
    this.cache.delete(key);
    this.cache.set(key, lru);

    return lru.entry;
  }

  async set(key: string, entry: CacheEntry, ttlMs: number): Promise<void> {
    const size = this.calculateEntrySize(entry);

    if (size > this.maxEntrySize || ttlMs <= 0) {
      return;
    }

    this.deleteEntry(key);
    this.evictIfNeeded(size);

    this.cache.set(key, { entry: { ...entry, expiresAt: Date.now() + ttlMs }, size });
    this.currentSize += size;
  }

  async delete(key: string): Promise<boolean> {
    return this.deleteEntry(key);
  }

  async clear(): Promise<void> {
    this.cache.clear();
    this.currentSize = 0;
  }

  async size(): Promise<number> {
    this.cleanup();
    return this.cache.size;
  }

  async close(): Promise<void> {
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = null;
    }
    await this.clear();
  }

  getStats(): MemoryCacheStats {
    return {
      entries: this.cache.size,
      sizeBytes: this.currentSize,
      maxSizeBytes: this.maxSize,
      maxEntries: this.maxEntries,
    };
  }
}

/**
 * Create a memory cache store
 */
export function createMemoryCacheStore(options?: MemoryCacheStoreOptions): MemoryCacheStore {
  return new MemoryCacheStore(options);
}
