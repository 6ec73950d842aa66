/**
 * Tests for engine.mts
 */
import { describe, it, expect, vi, afterEach } from 'vitest';
import { MemoryLockStore } from '@apigw/cache-lock';
import { createLogger } from '@apigw/logger';
import { ResponseCacheEngine, mergeResponseCacheConfig } from '../src/engine.mjs';
import { MemoryCacheStore } from '../src/stores/memory.mjs';
import type { CacheEntry, CacheEventType, CacheStore, RecomputeResult } from '../src/types.mjs';

const logger = createLogger({ level: 'silent' });
const KEY = 'proxy:prod:Account::';
const LOCK_KEY = `lock:${KEY}`;

function json(body: unknown, headers: Record<string, string> = {}, statusCode = 200): RecomputeResult {
  return {
    body: JSON.stringify(body),
    headers: { 'Content-Type': 'application/json', ...headers },
    statusCode,
  };
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('mergeResponseCacheConfig', () => {
  it('should apply defaults', () => {
    const config = mergeResponseCacheConfig({ defaultTtlSeconds: 60 });
    expect(config.defaultTtlSeconds).toBe(60);
    expect(config.maxTtlSeconds).toBe(86400);
    expect(config.respectNoStore).toBe(true);
    expect(config.cacheableContentTypes).toContain('application/json');
  });
});

describe('ResponseCacheEngine', () => {
  const engines: ResponseCacheEngine[] = [];

  function setup(store: CacheStore = new MemoryCacheStore(), lockStore = new MemoryLockStore()) {
    const engine = new ResponseCacheEngine(
      { defaultTtlSeconds: 300, lock: { leaseMs: 5000, maxWaitMs: 2000, pollIntervalMs: 10 } },
      { store, lockStore, logger }
    );
    engines.push(engine);
    const events: CacheEventType[] = [];
    engine.on((event) => events.push(event.type));
    return { engine, store, lockStore, events };
  }

  afterEach(async () => {
    await Promise.all(engines.splice(0).map((engine) => engine.close()));
  });

  // Happy Path: miss then hit
  it('should compute once and serve the second call from cache', async () => {
    const { engine, events } = setup();
    const recompute = vi.fn(async () => json({ value: 1 }));

    const first = await engine.handleCacheableGet(KEY, LOCK_KEY, recompute);
    const second = await engine.handleCacheableGet(KEY, LOCK_KEY, recompute);

    expect(first.source).toBe('miss');
    expect(second.source).toBe('hit');
    expect(second.body).toBe('{"value":1}');
    expect(second.headers['content-type']).toBe('application/json');
    expect(recompute).toHaveBeenCalledTimes(1);
    expect(events).toEqual(['cache:miss', 'cache:store', 'cache:hit']);
  });

  // Happy Path: concurrent misses collapse into one backend call
  it('should call the backend once for concurrent misses', async () => {
    const { engine } = setup();
    const recompute = vi.fn(async () => {
      await delay(50);
      return json({ value: 'shared' });
    });

    const results = await Promise.all(
      Array.from({ length: 8 }, () => engine.handleCacheableGet(KEY, LOCK_KEY, recompute))
    );

    expect(recompute).toHaveBeenCalledTimes(1);
    expect(results.filter((result) => result.source === 'miss')).toHaveLength(1);
    expect(results.filter((result) => result.source === 'hit-after-lock')).toHaveLength(7);
    expect(new Set(results.map((result) => result.body))).toEqual(new Set(['{"value":"shared"}']));
  });

  describe('TTL', () => {
    async function storedTtl(
      result: RecomputeResult,
      endpointTtlSeconds?: number
    ): Promise<number | undefined> {
      const set = vi.fn(async (_key: string, _entry: CacheEntry, _ttlMs: number) => undefined);
      const store: CacheStore = {
        get: async () => null,
        set,
        delete: async () => false,
        clear: async () => undefined,
        size: async () => 0,
        close: async () => undefined,
      };
      const { engine } = setup(store);
      await engine.handleCacheableGet(KEY, LOCK_KEY, async () => result, { endpointTtlSeconds });
      return set.mock.calls[0]?.[2];
    }

    // Decision: backend max-age > endpoint duration > default
    it('should use backend max-age first', async () => {
      expect(await storedTtl(json({}, { 'Cache-Control': 'max-age=60' }), 120)).toBe(60000);
    });

    it('should use the endpoint duration without max-age', async () => {
      expect(await storedTtl(json({}), 120)).toBe(120000);
    });

    it('should use the default otherwise', async () => {
      expect(await storedTtl(json({}))).toBe(300000);
    });

    it('should not store with max-age=0', async () => {
      expect(await storedTtl(json({}, { 'Cache-Control': 'max-age=0' }), 120)).toBeUndefined();
    });
  });

  describe('store eligibility', () => {
    it('should not store no-store responses', async () => {
      const { engine, events } = setup();
      const recompute = vi.fn(async () => json({}, { 'Cache-Control': 'no-store' }));

      await engine.handleCacheableGet(KEY, LOCK_KEY, recompute);
      const second = await engine.handleCacheableGet(KEY, LOCK_KEY, recompute);

      expect(second.source).toBe('miss');
      expect(recompute).toHaveBeenCalledTimes(2);
      expect(events).toContain('cache:skip-store');
    });

    it('should not store error responses', async () => {
      const { engine } = setup();
      const result = await engine.handleCacheableGet(KEY, LOCK_KEY, async () => json({ error: 'x' }, {}, 500));

      expect(result.statusCode).toBe(500);
      expect(await engine.handleCacheableGet(KEY, LOCK_KEY, async () => json({}))).toMatchObject({
        source: 'miss',
      });
    });

    it('should not store content types outside the list', async () => {
      const { engine, store } = setup();
      await engine.handleCacheableGet(KEY, LOCK_KEY, async () => ({
        body: '<html></html>',
        headers: { 'content-type': 'text/html' },
        statusCode: 200,
      }));

      expect(await store.size()).toBe(0);
    });

    it('should honour an explicit content type', async () => {
      const { engine, store } = setup();
      await engine.handleCacheableGet(KEY, LOCK_KEY, async () => ({
        body: 'a,b',
        headers: {},
        statusCode: 200,
        contentType: 'text/csv',
      }));

      expect(await store.size()).toBe(1);
    });
  });

  // Error Path: lock never acquired
  it('should serve without caching when the lock wait times out', async () => {
    const lockStore = new MemoryLockStore();
    await lockStore.tryAcquire(LOCK_KEY, 'other-holder', 10000);
    const store = new MemoryCacheStore();
    const engine = new ResponseCacheEngine(
      { lock: { leaseMs: 5000, maxWaitMs: 30, pollIntervalMs: 10 } },
      { store, lockStore, logger }
    );
    engines.push(engine);
    const events: CacheEventType[] = [];
    engine.on((event) => events.push(event.type));

    const result = await engine.handleCacheableGet(KEY, LOCK_KEY, async () => json({ value: 2 }));

    expect(result).toEqual({
      body: '{"value":2}',
      headers: { 'Content-Type': 'application/json' },
      statusCode: 200,
      source: 'bypass-lock-timeout',
    });
    expect(await store.size()).toBe(0);
    expect(events).toEqual(['cache:miss', 'cache:lock-timeout']);
  });

  // Error Path: recompute throws
  it('should release the lock when recompute throws', async () => {
    const { engine, lockStore } = setup();

    await expect(
      engine.handleCacheableGet(KEY, LOCK_KEY, async () => {
        throw new Error('backend unreachable');
      })
    ).rejects.toThrow('backend unreachable');
    expect(lockStore.size()).toBe(0);
  });

  // Error Path: cache store failures degrade to no caching
  it('should keep serving when the store fails', async () => {
    const failing: CacheStore = {
      get: async () => {
        throw new Error('store down');
      },
      set: async () => {
        throw new Error('store down');
      },
      delete: async () => false,
      clear: async () => undefined,
      size: async () => 0,
      close: async () => undefined,
    };
    const { engine, events } = setup(failing);
    const recompute = vi.fn(async () => json({ value: 3 }));

    const result = await engine.handleCacheableGet(KEY, LOCK_KEY, recompute);

    expect(result.source).toBe('miss');
    expect(result.body).toBe('{"value":3}');
    expect(recompute).toHaveBeenCalledTimes(1);
    expect(events).toEqual(['cache:error', 'cache:miss', 'cache:error', 'cache:error']);
  });

  it('should invalidate entries', async () => {
    const { engine } = setup();
    await engine.handleCacheableGet(KEY, LOCK_KEY, async () => json({}));

    expect(await engine.invalidate(KEY)).toBe(true);
    expect((await engine.handleCacheableGet(KEY, LOCK_KEY, async () => json({}))).source).toBe('miss');
  });
});
