/**
 * Distributed lock with a bounded wait
 *
 * Acquisition polls the store until it succeeds or `maxWaitMs` passes; a caller
 * that cannot get the lock receives `null` and decides how to proceed. Leases
 * expire on their own so a crashed holder never blocks a key for longer than
 * `leaseMs`.
 */

import { randomUUID } from 'node:crypto';
import { setTimeout as sleep } from 'node:timers/promises';
import type { Logger } from '@apigw/logger';
import { componentLogger } from '@apigw/logger';
import type {
  AcquireOptions,
  LockConfig,
  LockEvent,
  LockEventListener,
  LockHandle,
  LockStore,
} from './types.mjs';
import { MemoryLockStore } from './stores/memory.mjs';

/**
 * Default lock configuration
 */
export const DEFAULT_LOCK_CONFIG: Required<LockConfig> = {
  leaseMs: 30000,
  maxWaitMs: 10000,
  pollIntervalMs: 200,
};

/**
 * Merge user config with defaults
 */
export function mergeLockConfig(config?: LockConfig): Required<LockConfig> {
  const merged = {
    leaseMs: config?.leaseMs ?? DEFAULT_LOCK_CONFIG.leaseMs,
    maxWaitMs: config?.maxWaitMs ?? DEFAULT_LOCK_CONFIG.maxWaitMs,
    pollIntervalMs: config?.pollIntervalMs ?? DEFAULT_LOCK_CONFIG.pollIntervalMs,
  };
  if (merged.leaseMs <= 0 || merged.pollIntervalMs <= 0 || merged.maxWaitMs < 0) {
    throw new Error(
      `Invalid lock configuration: leaseMs=${merged.leaseMs}, maxWaitMs=${merged.maxWaitMs}, pollIntervalMs=${merged.pollIntervalMs}`
    );
  }
  return merged;
}

/**
 * @example
 * const lock = new DistributedLock({ leaseMs: 30000, maxWaitMs: 10000 }, new MemoryLockStore());
 * const value = await lock.withLock(
 *   'lock:proxy:prod:Account::',
 *   async () => computeAndStore(),
 *   async () => computeWithoutStoring()
 * );
 */
export class DistributedLock {
  private readonly config: Required<LockConfig>;
  private readonly store: LockStore;
  private readonly logger: Logger;
  private readonly listeners: Set<LockEventListener> = new Set();

  constructor(config?: LockConfig, store?: LockStore, logger?: Logger) {
    this.config = mergeLockConfig(config);
    this.store = store ?? new MemoryLockStore();
    this.logger = componentLogger('cache-lock', logger);
  }

  /**
   * Try to acquire `key`, waiting at most `maxWaitMs`
   *
   * Store failures count as not acquired.
   */
  async tryAcquire(key: string, options: AcquireOptions = {}): Promise<LockHandle | null> {
    const { leaseMs, maxWaitMs, pollIntervalMs } = mergeLockConfig({ ...this.config, ...definedTiming(options) });
    const token = randomUUID();
    const startedAt = Date.now();
    let attempts = 0;

    for (;;) {
      attempts++;
      let acquired: boolean;
      try {
        acquired = await this.store.tryAcquire(key, token, leaseMs);
      } catch (error) {
        this.logger.warn({ key, err: describeError(error) }, 'Lock store unavailable');
        this.emit({ type: 'lock:error', key, timestamp: Date.now(), error });
        return null;
      }

      const waitedMs = Date.now() - startedAt;
      if (acquired) {
        this.logger.debug({ key, waitedMs, attempts }, 'Lock acquired');
        this.emit({ type: 'lock:acquired', key, timestamp: Date.now(), waitedMs });
        return this.createHandle(key, token);
      }

      if (attempts === 1) {
        this.emit({ type: 'lock:contended', key, timestamp: Date.now() });
      }

      if (waitedMs + pollIntervalMs > maxWaitMs || options.signal?.aborted) {
        this.logger.debug({ key, waitedMs, attempts }, 'Lock wait timed out');
        this.emit({ type: 'lock:timeout', key, timestamp: Date.now(), waitedMs });
        return null;
      }

      try {
        await sleep(pollIntervalMs, undefined, { signal: options.signal });
      } catch (error) {
        if (options.signal?.aborted) {
          this.emit({ type: 'lock:timeout', key, timestamp: Date.now(), waitedMs: Date.now() - startedAt });
          return null;
        }
        throw error;
      }
    }
  }

  /**
   * Run `onAcquired` under the lock, or `onTimeout` when it cannot be acquired
   *
   * The lock is released on every exit path of `onAcquired`.
   */
  async withLock<T>(
    key: string,
    onAcquired: (handle: LockHandle) => Promise<T>,
    onTimeout: () => Promise<T>,
    options?: AcquireOptions
  ): Promise<T> {
    const handle = await this.tryAcquire(key, options);
    if (!handle) {
      return onTimeout();
    }

    try {
      return await onAcquired(handle);
    } finally {
      await handle.release();
    }
  }

  /**
   * Subscribe to lock events
   */
  on(listener: LockEventListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  async close(): Promise<void> {
    this.listeners.clear();
    await this.store.close();
  }

  private createHandle(key: string, token: string): LockHandle {
    const store = this.store;
    const logger = this.logger;
    const emit = (event: LockEvent): void => this.emit(event);
    const acquiredAt = Date.now();
    let released = false;

    return {
      key,
      token,
      acquiredAt,
      get released() {
        return released;
      },
      async release(): Promise<boolean> {
        if (released) {
          return false;
        }
        released = true;
        try {
          const dropped = await store.release(key, token);
          if (!dropped) {
            logger.warn({ key }, 'Lock lease expired before release');
          }
          emit({ type: 'lock:released', key, timestamp: Date.now() });
          return dropped;
        } catch (error) {
          logger.warn({ key, err: describeError(error) }, 'Lock release failed; lease will expire');
          emit({ type: 'lock:error', key, timestamp: Date.now(), error });
          return false;
        }
      },
    };
  }

  private emit(event: LockEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        this.logger.error({ event: event.type, err: describeError(error) }, 'Lock event listener failed');
      }
    }
  }
}

function definedTiming(options: AcquireOptions): LockConfig {
  const timing: LockConfig = {};
  if (options.leaseMs !== undefined) timing.leaseMs = options.leaseMs;
  if (options.maxWaitMs !== undefined) timing.maxWaitMs = options.maxWaitMs;
  if (options.pollIntervalMs !== undefined) timing.pollIntervalMs = options.pollIntervalMs;
  return timing;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Create a distributed lock
 */
export function createDistributedLock(config?: LockConfig, store?: LockStore, logger?: Logger): DistributedLock {
  return new DistributedLock(config, store, logger);
}
