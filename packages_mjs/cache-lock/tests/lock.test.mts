/**
 * Tests for lock.mts
 */
import { describe, it, expect, vi, afterEach } from 'vitest';
import { createLogger } from '@apigw/logger';
import { DistributedLock, mergeLockConfig, DEFAULT_LOCK_CONFIG } from '../src/lock.mjs';
import { MemoryLockStore } from '../src/stores/memory.mjs';
import type { LockEvent, LockStore } from '../src/types.mjs';

const logger = createLogger({ level: 'silent' });

describe('mergeLockConfig', () => {
  it('should apply defaults', () => {
    expect(mergeLockConfig()).toEqual({ leaseMs: 30000, maxWaitMs: 10000, pollIntervalMs: 200 });
    expect(DEFAULT_LOCK_CONFIG.maxWaitMs).toBe(10000);
  });

  it('should reject non-positive timings', () => {
    expect(() => mergeLockConfig({ pollIntervalMs: 0 })).toThrow('Invalid lock configuration');
  });
});

describe('DistributedLock', () => {
  const locks: DistributedLock[] = [];

  function createLock(store: LockStore = new MemoryLockStore()) {
    const lock = new DistributedLock({ leaseMs: 1000, maxWaitMs: 100, pollIntervalMs: 10 }, store, logger);
    locks.push(lock);
    return lock;
  }

  afterEach(async () => {
    await Promise.all(locks.splice(0).map((lock) => lock.close()));
  });

  // Happy Path
  it('should acquire a free key immediately', async () => {
    const lock = createLock();
    const handle = await lock.tryAcquire('k');

    expect(handle?.key).toBe('k');
    expect(handle?.released).toBe(false);
  });

  // State Transition: waiter gets the lock after release
  it('should hand the lock to a waiter after release', async () => {
    const lock = createLock();
    const first = await lock.tryAcquire('k');

    const waiting = lock.tryAcquire('k');
    setTimeout(() => {
      void first?.release();
    }, 30);

    const second = await waiting;
    expect(second).not.toBeNull();
    expect(second?.token).not.toBe(first?.token);
  });

  // Error Path: bounded wait
  it('should give up after maxWait', async () => {
    const lock = createLock();
    await lock.tryAcquire('k');

    const startedAt = Date.now();
    const handle = await lock.tryAcquire('k', { maxWaitMs: 50 });

    expect(handle).toBeNull();
    expect(Date.now() - startedAt).toBeLessThan(1000);
  });

  it('should stop waiting when the signal aborts', async () => {
    const lock = createLock();
    await lock.tryAcquire('k');

    const controller = new AbortController();
    setTimeout(() => controller.abort(), 15);
    expect(await lock.tryAcquire('k', { maxWaitMs: 5000, signal: controller.signal })).toBeNull();
  });

  // Decision: release is idempotent
  it('should release exactly once', async () => {
    const lock = createLock();
    const handle = await lock.tryAcquire('k');

    expect(await handle?.release()).toBe(true);
    expect(await handle?.release()).toBe(false);
    expect(handle?.released).toBe(true);
  });

  describe('withLock', () => {
    it('should run under the lock and release afterwards', async () => {
      const store = new MemoryLockStore();
      const lock = createLock(store);

      const value = await lock.withLock(
        'k',
        async () => store.size(),
        async () => -1
      );

      expect(value).toBe(1);
      expect(store.size()).toBe(0);
    });

    it('should release when the callback throws', async () => {
      const store = new MemoryLockStore();
      const lock = createLock(store);

      await expect(
        lock.withLock(
          'k',
          async () => {
            throw new Error('backend exploded');
          },
          async () => 'timeout'
        )
      ).rejects.toThrow('backend exploded');
      expect(store.size()).toBe(0);
    });

    it('should run the timeout path when the lock stays busy', async () => {
      const lock = createLock();
      await lock.tryAcquire('k');

      const onAcquired = vi.fn(async () => 'locked');
      const value = await lock.withLock('k', onAcquired, async () => 'degraded', { maxWaitMs: 30 });

      expect(value).toBe('degraded');
      expect(onAcquired).not.toHaveBeenCalled();
    });
  });

  // Error Path: store failures degrade to not acquired
  it('should treat store failures as not acquired', async () => {
    const failing: LockStore = {
      tryAcquire: vi.fn(async () => {
        throw new Error('connection lost');
      }),
      release: vi.fn(async () => false),
      close: vi.fn(async () => undefined),
    };
    const lock = createLock(failing);
    const events: LockEvent[] = [];
    lock.on((event) => events.push(event));

    expect(await lock.tryAcquire('k')).toBeNull();
    expect(events.map((event) => event.type)).toEqual(['lock:error']);
  });

  it('should not throw when release fails', async () => {
    const store: LockStore = {
      tryAcquire: vi.fn(async () => true),
      release: vi.fn(async () => {
        throw new Error('connection lost');
      }),
      close: vi.fn(async () => undefined),
    };
    const lock = createLock(store);
    const handle = await lock.tryAcquire('k');

    expect(await handle?.release()).toBe(false);
  });

  it('should emit events and support unsubscribe', async () => {
    const lock = createLock();
    const events: string[] = [];
    const unsubscribe = lock.on((event) => events.push(event.type));

    const handle = await lock.tryAcquire('k');
    await lock.tryAcquire('k', { maxWaitMs: 0 });
    await handle?.release();
    unsubscribe();
    await lock.tryAcquire('k');

    expect(events).toEqual(['lock:acquired', 'lock:contended', 'lock:timeout', 'lock:released']);
  });

  it('should keep emitting when a listener throws', async () => {
    const lock = createLock();
    const seen: string[] = [];
    lock.on(() => {
      throw new Error('listener bug');
    });
    lock.on((event) => seen.push(event.type));

    await lock.tryAcquire('k');
    expect(seen).toEqual(['lock:acquired']);
  });
});
