/**
 * Stampede-safe cache-aside for proxied GET responses
 *
 * Lookup -> miss -> lock -> re-check -> recompute -> store -> release.
 * Callers that cannot get the lock within the wait bound recompute without
 * storing, so a slow origin never queues requests indefinitely. Store and lock
 * failures degrade the same way: caching is best-effort.
 */

import { DistributedLock, type LockStore } from '@apigw/cache-lock';
import type { Logger } from '@apigw/logger';
import { componentLogger } from '@apigw/logger';
import type {
  CacheEntry,
  CacheEvent,
  CacheEventListener,
  CacheResult,
  CacheStore,
  HandleOptions,
  RecomputeResult,
  ResponseCacheConfig,
} from './types.mjs';
import {
  DEFAULT_CACHEABLE_CONTENT_TYPES,
  getHeaderValue,
  isCacheableContentType,
  isSuccessStatus,
  normalizeHeaders,
  parseCacheControl,
  resolveTtlSeconds,
} from './parser.mjs';
import { MemoryCacheStore } from './stores/memory.mjs';

type ResolvedConfig = Required<Omit<ResponseCacheConfig, 'lock'>>;

/**
 * Default engine configuration
 */
export const DEFAULT_RESPONSE_CACHE_CONFIG: ResolvedConfig = {
  defaultTtlSeconds: 300,
  maxTtlSeconds: 86400,
  cacheableContentTypes: [...DEFAULT_CACHEABLE_CONTENT_TYPES],
  respectNoStore: true,
};

/**
 * Merge user config with defaults
 */
export function mergeResponseCacheConfig(config?: ResponseCacheConfig): ResolvedConfig {
  return {
    defaultTtlSeconds: config?.defaultTtlSeconds ?? DEFAULT_RESPONSE_CACHE_CONFIG.defaultTtlSeconds,
    maxTtlSeconds: config?.maxTtlSeconds ?? DEFAULT_RESPONSE_CACHE_CONFIG.maxTtlSeconds,
    cacheableContentTypes: config?.cacheableContentTypes ?? DEFAULT_RESPONSE_CACHE_CONFIG.cacheableContentTypes,
    respectNoStore: config?.respectNoStore ?? DEFAULT_RESPONSE_CACHE_CONFIG.respectNoStore,
  };
}

/**
 * Collaborators of the engine
 */
export interface ResponseCacheDependencies {
  store?: CacheStore;
  /** Backing store for the distributed lock. Default: in-memory */
  lockStore?: LockStore;
  logger?: Logger;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * @example
 * const engine = new ResponseCacheEngine({ defaultTtlSeconds: 300 });
 * const key = buildCacheKey({ environment: 'prod', endpoint: 'Account', subPath: '', query: '' });
 * const result = await engine.handleCacheableGet(key, buildLockKey(key), async () => {
 *   const response = await invoker.invoke({ url, method: 'GET' });
 *   return { body: rewrite(response.body), headers: response.headers, statusCode: response.status };
 * });
 */
export class ResponseCacheEngine {
  private readonly config: ResolvedConfig;
  private readonly store: CacheStore;
  private readonly lock: DistributedLock;
  private readonly logger: Logger;
  private readonly listeners: Set<CacheEventListener> = new Set();

  constructor(config?: ResponseCacheConfig, dependencies: ResponseCacheDependencies = {}) {
    this.config = mergeResponseCacheConfig(config);
    this.logger = componentLogger('response-cache', dependencies.logger);
    this.store = dependencies.store ?? new MemoryCacheStore();
    this.lock = new DistributedLock(config?.lock, dependencies.lockStore, dependencies.logger);
  }

  /**
   * Serve `cacheKey` from the cache, or compute it at most once per key at a time
   */
  async handleCacheableGet(
    cacheKey: string,
    lockKey: string,
    recompute: () => Promise<RecomputeResult>,
    options: HandleOptions = {}
  ): Promise<CacheResult> {
    const cached = await this.read(cacheKey);
    if (cached) {
      this.emit({ type: 'cache:hit', key: cacheKey, timestamp: Date.now() });
      this.logger.debug({ key: cacheKey }, 'Cache hit');
      return { body: cached.body, headers: cached.headers, statusCode: cached.statusCode, source: 'hit' };
    }

    this.emit({ type: 'cache:miss', key: cacheKey, timestamp: Date.now() });
    this.logger.debug({ key: cacheKey }, 'Cache miss');

    return this.lock.withLock<CacheResult>(
      lockKey,
      async () => {
        const filled = await this.read(cacheKey);
        if (filled) {
          this.emit({ type: 'cache:hit', key: cacheKey, timestamp: Date.now(), metadata: { afterLock: true } });
          this.logger.debug({ key: cacheKey }, 'Cache filled while waiting for lock');
          return { body: filled.body, headers: filled.headers, statusCode: filled.statusCode, source: 'hit-after-lock' };
        }

        const result = await recompute();
        await this.write(cacheKey, result, options.endpointTtlSeconds);
        return { body: result.body, headers: result.headers, statusCode: result.statusCode, source: 'miss' };
      },
      async () => {
        this.emit({ type: 'cache:lock-timeout', key: cacheKey, timestamp: Date.now() });
        this.logger.warn({ key: cacheKey, lockKey }, 'Cache lock not acquired; serving without cache');
        const result = await recompute();
        return { body: result.body, headers: result.headers, statusCode: result.statusCode, source: 'bypass-lock-timeout' };
      },
      { signal: options.signal }
    );
  }

  /**
   * Drop a cached response
   */
  async invalidate(cacheKey: string): Promise<boolean> {
    return this.store.delete(cacheKey);
  }

  /**
   * Subscribe to cache events
   */
  on(listener: CacheEventListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  async close(): Promise<void> {
    this.listeners.clear();
    await this.store.close();
    await this.lock.close();
  }

  private async read(cacheKey: string): Promise<CacheEntry | null> {
    try {
      return await this.store.get(cacheKey);
    } catch (error) {
      this.emit({ type: 'cache:error', key: cacheKey, timestamp: Date.now(), metadata: { operation: 'get' } });
      this.logger.warn({ key: cacheKey, err: describeError(error) }, 'Cache read failed; treating as miss');
      return null;
    }
  }

  private async write(cacheKey: string, result: RecomputeResult, endpointTtlSeconds?: number): Promise<void> {
    const headers = normalizeHeaders(result.headers);
    const contentType = result.contentType ?? getHeaderValue(headers, 'content-type');
    const directives = parseCacheControl(getHeaderValue(headers, 'cache-control'));

    const skip = (reason: string): void => {
      this.emit({ type: 'cache:skip-store', key: cacheKey, timestamp: Date.now(), metadata: { reason } });
      this.logger.debug({ key: cacheKey, reason, statusCode: result.statusCode, contentType }, 'Response not cached');
    };

    if (!isSuccessStatus(result.statusCode)) {
      return skip('status');
    }
    if (!isCacheableContentType(contentType, this.config.cacheableContentTypes)) {
      return skip('content-type');
    }
    if (this.config.respectNoStore && directives.noStore) {
      return skip('no-store');
    }

    const { ttlSeconds, source } = resolveTtlSeconds(
      directives,
      endpointTtlSeconds,
      this.config.defaultTtlSeconds,
      this.config.maxTtlSeconds
    );
    if (ttlSeconds <= 0) {
      return skip('ttl');
    }

    const now = Date.now();
    const entry: CacheEntry = {
      body: result.body,
      headers,
      statusCode: result.statusCode,
      cachedAt: now,
      expiresAt: now + ttlSeconds * 1000,
    };

    try {
      await this.store.set(cacheKey, entry, ttlSeconds * 1000);
      this.emit({ type: 'cache:store', key: cacheKey, timestamp: now, metadata: { ttlSeconds, ttlSource: source } });
      this.logger.debug({ key: cacheKey, ttlSeconds, ttlSource: source }, 'Response cached');
    } catch (error) {
      this.emit({ type: 'cache:error', key: cacheKey, timestamp: Date.now(), metadata: { operation: 'set' } });
      this.logger.warn({ key: cacheKey, err: describeError(error) }, 'Cache write failed; response served uncached');
    }
  }

  private emit(event: CacheEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        this.logger.error({ event: event.type, err: describeError(error) }, 'Cache event listener failed');
      }
    }
  }
}

/**
 * Create a response cache engine
 */
export function createResponseCacheEngine(
  config?: ResponseCacheConfig,
  dependencies?: ResponseCacheDependencies
): ResponseCacheEngine {
  return new ResponseCacheEngine(config, dependencies);
}
