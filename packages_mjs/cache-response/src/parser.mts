/**
 * Cache-Control parsing, content-type and TTL rules
 */

import type { CacheControlDirectives, TtlSource } from './types.mjs';

/**
 * Content types stored by default
 */
export const DEFAULT_CACHEABLE_CONTENT_TYPES: readonly string[] = [
  'application/json',
  'application/xml',
  'text/xml',
  'text/plain',
  'text/csv',
  'application/atom+xml',
];

function parseSeconds(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const seconds = parseInt(value.replace(/"/g, ''), 10);
  return Number.isNaN(seconds) || seconds < 0 ? undefined : seconds;
}

/**
 * Parse Cache-Control header into directives
 */
export function parseCacheControl(header: string | undefined | null): CacheControlDirectives {
  const directives: CacheControlDirectives = {};

  if (!header) {
    return directives;
  }

  const parts = header.toLowerCase().split(',').map((p) => p.trim());

  for (const part of parts) {
    const [key, value] = part.split('=').map((s) => s.trim());

    switch (key) {
      case 'no-store':
        directives.noStore = true;
        break;
      case 'no-cache':
        directives.noCache = true;
        break;
      case 'max-age':
        directives.maxAge = parseSeconds(value);
        break;
      case 's-maxage':
        directives.sMaxAge = parseSeconds(value);
        break;
      case 'private':
        directives.private = true;
        break;
      case 'public':
        directives.public = true;
        break;
    }
  }

  return directives;
}

/**
 * Get header value case-insensitively
 */
export function getHeaderValue(headers: Record<string, string>, key: string): string | undefined {
  const lowerKey = key.toLowerCase();
  for (const [k, v] of Object.entries(headers)) {
    if (k.toLowerCase() === lowerKey) {
      return v;
    }
  }
  return undefined;
}

/**
 * Normalize headers to lowercase keys
 */
export function normalizeHeaders(headers: Record<string, string>): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    result[key.toLowerCase()] = value;
  }
  return result;
}

/**
 * Media type without parameters, lower-cased
 */
export function mediaType(contentType: string | undefined): string {
  return (contentType ?? '').split(';')[0]?.trim().toLowerCase() ?? '';
}

/**
 * Check a content type against the cacheable list; `type/*` entries match any subtype
 */
export function isCacheableContentType(
  contentType: string | undefined,
  cacheable: readonly string[] = DEFAULT_CACHEABLE_CONTENT_TYPES
): boolean {
  const type = mediaType(contentType);
  if (!type) {
    return false;
  }
  return cacheable.some((candidate) => {
    const allowed = mediaType(candidate);
    return allowed.endsWith('/*') ? type.startsWith(allowed.slice(0, -1)) : type === allowed;
  });
}

/**
 * Only 2xx responses are stored
 */
export function isSuccessStatus(statusCode: number): boolean {
  return statusCode >= 200 && statusCode < 300;
}

/**
 * Pick the TTL: backend s-maxage/max-age, then endpoint duration, then default
 */
export function resolveTtlSeconds(
  directives: CacheControlDirectives,
  endpointTtlSeconds: number | undefined,
  defaultTtlSeconds: number,
  maxTtlSeconds: number = 86400
): { ttlSeconds: number; source: TtlSource } {
  const backendTtl = directives.sMaxAge ?? directives.maxAge;
  if (backendTtl !== undefined) {
    return { ttlSeconds: Math.min(backendTtl, maxTtlSeconds), source: 'max-age' };
  }
  if (endpointTtlSeconds !== undefined && endpointTtlSeconds > 0) {
    return { ttlSeconds: Math.min(endpointTtlSeconds, maxTtlSeconds), source: 'endpoint' };
  }
  return { ttlSeconds: Math.min(defaultTtlSeconds, maxTtlSeconds), source: 'default' };
}
