/**
 * @apigw/cache-lock
 *
 * Lease-based lock with bounded wait, used to collapse concurrent cache misses
 * into a single backend call.
 */

export type {
  LockConfig,
  AcquireOptions,
  LockStore,
  LockHandle,
  LockEvent,
  LockEventType,
  LockEventListener,
} from './types.mjs';

export { DistributedLock, DEFAULT_LOCK_CONFIG, mergeLockConfig, createDistributedLock } from './lock.mjs';

export {
  MemoryLockStore,
  createMemoryLockStore,
  RedisLockStore,
  createRedisLockStore,
  RELEASE_SCRIPT,
  type RedisLockClient,
} from './stores/index.mjs';
