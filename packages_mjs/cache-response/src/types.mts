/**
 * Types for the response cache engine
 */
import type { LockConfig } from '@apigw/cache-lock';

/**
 * Parsed Cache-Control directives
 */
export interface CacheControlDirectives {
  /** Response must not be cached */
  noStore?: boolean;
  /** Response must be revalidated before use */
  noCache?: boolean;
  /** Maximum age in seconds */
  maxAge?: number;
  /** Shared cache maximum age in seconds */
  sMaxAge?: number;
  /** Response is private (user-specific) */
  private?: boolean;
  /** Response is public (can be cached by shared caches) */
  public?: boolean;
}

/**
 * Stored response; immutable once written
 */
export interface CacheEntry {
  body: string;
  /** Lower-cased response headers */
  headers: Record<string, string>;
  statusCode: number;
  /** When the entry was written (Unix timestamp ms) */
  cachedAt: number;
  /** When the entry expires (Unix timestamp ms) */
  expiresAt: number;
}

/**
 * Cache store interface
 */
export interface CacheStore {
  /**
   * Get a live entry; null on miss or expiry
   */
  get(key: string): Promise<CacheEntry | null>;

  /**
   * Store an entry for `ttlMs`, replacing any entry under the same key
   */
  set(key: string, entry: CacheEntry, ttlMs: number): Promise<void>;

  delete(key: string): Promise<boolean>;

  clear(): Promise<void>;

  size(): Promise<number>;

  close(): Promise<void>;
}

/**
 * What a backend call produced, after URL rewriting
 */
export interface RecomputeResult {
  body: string;
  headers: Record<string, string>;
  statusCode: number;
  contentType?: string;
}

/**
 * Where a response came from
 *
 * - `hit`: cache, no lock involved
 * - `hit-after-lock`: cache, filled by another holder while waiting
 * - `miss`: computed under the lock
 * - `bypass-lock-timeout`: computed without the lock and not stored
 */
export type CacheSource = 'hit' | 'hit-after-lock' | 'miss' | 'bypass-lock-timeout';

export interface CacheResult {
  body: string;
  headers: Record<string, string>;
  statusCode: number;
  source: CacheSource;
}

/**
 * Where a TTL came from
 */
export type TtlSource = 'max-age' | 'endpoint' | 'default';

/**
 * Configuration for the response cache engine
 */
export interface ResponseCacheConfig {
  /** TTL when neither the backend nor the endpoint sets one. Default: 300 */
  defaultTtlSeconds?: number;
  /** Upper bound for any TTL. Default: 86400 */
  maxTtlSeconds?: number;
  /** Content types eligible for storage. Default: DEFAULT_CACHEABLE_CONTENT_TYPES */
  cacheableContentTypes?: string[];
  /** Whether to respect the backend's no-store directive. Default: true */
  respectNoStore?: boolean;
  /** Lock timing. Default: 30s lease, 10s wait, 200ms poll */
  lock?: LockConfig;
}

/**
 * Per-call options
 */
export interface HandleOptions {
  /** Endpoint-specific TTL, used when the backend sends no max-age */
  endpointTtlSeconds?: number;
  signal?: AbortSignal;
}

/**
 * Event types for cache operations
 */
export type CacheEventType =
  | 'cache:hit'
  | 'cache:miss'
  | 'cache:store'
  | 'cache:skip-store'
  | 'cache:lock-timeout'
  | 'cache:error';

/**
 * Cache event
 */
export interface CacheEvent {
  type: CacheEventType;
  key: string;
  timestamp: number;
  metadata?: Record<string, unknown>;
}

/**
 * Event listener type
 */
export type CacheEventListener = (event: CacheEvent) => void;
