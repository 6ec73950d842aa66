/**
 * Proxy request shaping: endpoint segments, target URLs, header filtering
 */
import type { IncomingHttpHeaders } from 'node:http';
import { HTTP_METHODS, type HttpMethod } from '@apigw/endpoint-directory';

/**
 * Request headers never forwarded to a backend; bodies are read as text, so no compression is negotiated
 */
export const DROPPED_REQUEST_HEADERS: readonly string[] = [
  'host',
  'connection',
  'content-length',
  'transfer-encoding',
  'accept-encoding',
];

/**
 * Backend response headers never sent back; the body is decoded and re-encoded
 */
export const DROPPED_RESPONSE_HEADERS: readonly string[] = [
  'content-length',
  'content-encoding',
  'transfer-encoding',
  'connection',
];

/**
 * Methods whose request body is forwarded
 */
export const BODY_METHODS: ReadonlySet<HttpMethod> = new Set<HttpMethod>(['POST', 'PUT', 'PATCH', 'DELETE']);

const KEY_PATTERNS = [/^(\w+)(\(guid'[\w-]+'\))$/, /^(\w+)(\('[^']+'\))$/, /^(\w+)(\(\d+\))$/];

export interface EndpointSegment {
  name: string;
  /** OData key including parentheses, e.g. `(42)` */
  key?: string;
}

/**
 * Split `Name(key)` into the endpoint name and its key
 */
export function parseEndpointSegment(segment: string): EndpointSegment {
  for (const pattern of KEY_PATTERNS) {
    const match = pattern.exec(segment);
    if (match?.[1] && match[2]) {
      return { name: match[1], key: match[2] };
    }
  }
  return { name: segment };
}

export interface ProxyPath {
  segment: EndpointSegment;
  /** Path after the endpoint segment, without leading slash */
  subPath: string;
}

function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

/**
 * Parse a raw request URL below `/api/{env}/`
 *
 * The sub path stays percent-encoded as received.
 */
export function parseProxyPath(url: string): ProxyPath | undefined {
  const pathname = url.split('?')[0] ?? '';
  const [first, ...rest] = pathname
    .split('/')
    .slice(3)
    .filter((part) => part.length > 0);
  if (!first) {
    return undefined;
  }
  return { segment: parseEndpointSegment(safeDecode(first)), subPath: rest.join('/') };
}

const DOT_SEGMENTS: ReadonlySet<string> = new Set(['.', '..']);

/**
 * True when a raw sub path holds a `.` or `..` segment, plain or percent-encoded
 */
export function hasDotSegment(subPath: string): boolean {
  return subPath
    .split('/')
    .some((part) => safeDecode(part).split(/[\\/]/).some((piece) => DOT_SEGMENTS.has(piece)));
}

/**
 * True when `targetUrl`, once resolved, stays below the path of `baseUrl`
 */
export function isWithinBasePath(baseUrl: string, targetUrl: string): boolean {
  if (!URL.canParse(baseUrl) || !URL.canParse(targetUrl)) {
    return false;
  }
  const base = new URL(baseUrl);
  const target = new URL(targetUrl);
  const basePath = base.pathname.replace(/\/+$/, '');
  return (
    target.origin === base.origin &&
    (target.pathname === basePath ||
      target.pathname.startsWith(`${basePath}/`) ||
      target.pathname.startsWith(`${basePath}(`))
  );
}

/**
 * Raw query string of a request URL, without `?`
 */
export function rawQuery(url: string): string {
  const index = url.indexOf('?');
  return index === -1 ? '' : url.slice(index + 1);
}

/**
 * Backend URL: base, then the key or the sub path, then the query
 */
export function buildTargetUrl(baseUrl: string, path: ProxyPath, query: string): string {
  let url = baseUrl;
  if (path.segment.key) {
    url += encodeURI(path.segment.key);
  } else if (path.subPath) {
    url += `/${path.subPath}`;
  }
  return query ? `${url}?${query}` : url;
}

/**
 * Cache key facet identifying the resource below the endpoint
 */
export function resourcePath(path: ProxyPath): string {
  return path.segment.key ?? path.subPath;
}

export function toHttpMethod(method: string): HttpMethod | undefined {
  const upper = method.toUpperCase();
  return HTTP_METHODS.find((candidate) => candidate === upper);
}

/**
 * Flatten request headers, dropping connection-level ones
 */
export function forwardableHeaders(
  headers: IncomingHttpHeaders,
  dropped: readonly string[] = DROPPED_REQUEST_HEADERS
): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined || dropped.includes(name.toLowerCase())) {
      continue;
    }
    result[name] = Array.isArray(value) ? value.join(', ') : value;
  }
  return result;
}

export function headerValue(headers: IncomingHttpHeaders, name: string): string | undefined {
  const value = headers[name.toLowerCase()];
  return Array.isArray(value) ? value.join(', ') : value;
}

/**
 * SOAP traffic skips caching and URL rewriting
 */
export function isSoapRequest(headers: IncomingHttpHeaders, targetUrl: string): boolean {
  const contentType = headerValue(headers, 'content-type')?.toLowerCase() ?? '';
  return (
    contentType.includes('text/xml') ||
    contentType.includes('application/soap+xml') ||
    headerValue(headers, 'soapaction') !== undefined ||
    targetUrl.includes('.svc')
  );
}

/**
 * SOAP 1.1 expects a quoted SOAPAction
 */
export function quoteSoapAction(value: string): string {
  return value.startsWith('"') || value.endsWith('"') ? value : `"${value}"`;
}

export function responseHeaders(headers: Record<string, string>): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (!DROPPED_RESPONSE_HEADERS.includes(name.toLowerCase())) {
      result[name] = value;
    }
  }
  return result;
}
