/**
 * Types for cache-lock package
 */

/**
 * Lock timing configuration
 */
export interface LockConfig {
  /** Lease length in milliseconds; the lock expires on its own after this. Default: 30000 */
  leaseMs?: number;
  /** Longest time to wait for the lock in milliseconds. Default: 10000 */
  maxWaitMs?: number;
  /** Delay between acquisition attempts in milliseconds. Default: 200 */
  pollIntervalMs?: number;
}

/**
 * Per-acquisition options
 */
export interface AcquireOptions extends LockConfig {
  /** Stops waiting when aborted */
  signal?: AbortSignal;
}

/**
 * Backend holding the leases
 */
export interface LockStore {
  /**
   * Take the lease when nobody holds it
   * @returns true when acquired
   */
  tryAcquire(key: string, token: string, leaseMs: number): Promise<boolean>;

  /**
   * Drop the lease when still held with `token`
   * @returns true when this call released it
   */
  release(key: string, token: string): Promise<boolean>;

  close(): Promise<void>;
}

/**
 * An exclusively held lease
 */
export interface LockHandle {
  readonly key: string;
  readonly token: string;
  readonly acquiredAt: number;
  /** True after the first release call */
  readonly released: boolean;
  /**
   * Release the lease; later calls return false
   */
  release(): Promise<boolean>;
}

/**
 * Lock events
 */
export type LockEventType =
  | 'lock:acquired'
  | 'lock:contended'
  | 'lock:timeout'
  | 'lock:released'
  | 'lock:error';

export interface LockEvent {
  type: LockEventType;
  key: string;
  timestamp: number;
  /** Time spent waiting before acquire or timeout */
  waitedMs?: number;
  error?: unknown;
}

export type LockEventListener = (event: LockEvent) => void;
