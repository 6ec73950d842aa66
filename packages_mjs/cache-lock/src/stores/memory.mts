/**
 * In-memory lock store, single process only
 */

import type { LockStore } from '../types.mjs';

interface Lease {
  token: string;
  expiresAt: number;
}

export class MemoryLockStore implements LockStore {
  private leases: Map<string, Lease> = new Map();
  private cleanupInterval: ReturnType<typeof setInterval> | null = null;
  private readonly cleanupIntervalMs: number;

  constructor(options: { cleanupIntervalMs?: number } = {}) {
    this.cleanupIntervalMs = options.cleanupIntervalMs ?? 60000;
    this.startCleanup();
  }

  private startCleanup(): void {
    this.cleanupInterval = setInterval(() => {
      this.cleanup();
    }, this.cleanupIntervalMs);
    this.cleanupInterval.unref();
  }

  private cleanup(): void {
    const now = Date.now();
    for (const [key, lease] of this.leases.entries()) {
      if (lease.expiresAt <= now) {
        this.leases.delete(key);
      }
    }
  }

  async tryAcquire(key: string, token: string, leaseMs: number): Promise<boolean> {
    const current = this.leases.get(key);
    if (current && current.expiresAt > Date.now()) {
      return false;
    }
    this.leases.set(key, { token, expiresAt: Date.now() + leaseMs });
    return true;
  }

  async release(key: string, token: string): Promise<boolean> {
    const current = this.leases.get(key);
    if (!current || current.token !== token) {
      return false;
    }
    this.leases.delete(key);
    return true;
  }

  /**
   * Number of live leases
   */
  size(): number {
    this.cleanup();
    return this.leases.size;
  }

  async close(): Promise<void> {
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = null;
    }
    this.leases.clear();
  }
}

export function createMemoryLockStore(options?: { cleanupIntervalMs?: number }): MemoryLockStore {
  return new MemoryLockStore(options);
}
