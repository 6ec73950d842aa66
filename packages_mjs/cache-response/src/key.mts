/**
 * Cache and lock keys for proxied GET requests
 */

import { createHash } from 'node:crypto';

/**
 * Request facets that select a cached response
 */
export interface CacheKeyParts {
  environment: string;
  endpoint: string;
  /** Path after the endpoint segment, without leading slash */
  subPath: string;
  /** Raw query string without `?` */
  query: string;
  authorization?: string;
  acceptLanguage?: string;
}

/**
 * Percent-encode `%` and `:` so a facet can never contain the separator
 */
export function escapeKeyPart(value: string): string {
  return value.replace(/%/g, '%25').replace(/:/g, '%3A');
}

/**
 * `proxy:{env}:{endpoint}:{subPath}:{query}[:auth:{sha256}][:lang:{lang}]`
 *
 * Facets are escaped with `escapeKeyPart`. The Authorization value is hashed so tokens
 * never appear in keys.
 */
export function buildCacheKey(parts: CacheKeyParts): string {
  let key = ['proxy', parts.environment, parts.endpoint, parts.subPath, parts.query].map(escapeKeyPart).join(':');

  if (parts.authorization) {
    const hash = createHash('sha256').update(parts.authorization).digest('base64');
    key += `:auth:${hash}`;
  }

  if (parts.acceptLanguage) {
    key += `:lang:${escapeKeyPart(parts.acceptLanguage)}`;
  }

  return key;
}

/**
 * Lock key guarding the computation of `cacheKey`
 */
export function buildLockKey(cacheKey: string): string {
  return `lock:${cacheKey}`;
}
