/**
 * Request builder utilities for @apigw/fetch-client
 */
import type { Dispatcher } from 'undici';
import type { IncomingHttpHeaders } from 'node:http';
import { brotliDecompressSync, gunzipSync, inflateSync } from 'node:zlib';
import type { BackendRequest } from '../types.mjs';
import type { ResolvedInvokerConfig } from '../config.mjs';

/**
 * Headers never forwarded between hops
 */
export const HOP_BY_HOP_HEADERS: readonly string[] = [
  'host',
  'connection',
  'keep-alive',
  'content-length',
  'transfer-encoding',
  'upgrade',
  'proxy-connection',
];

/**
 * Build outbound headers: configured defaults, then request headers, minus hop-by-hop
 */
export function buildHeaders(
  config: ResolvedInvokerConfig,
  request: BackendRequest
): Record<string, string> {
  const headers: Record<string, string> = {};

  for (const source of [config.headers, request.headers ?? {}]) {
    for (const [key, value] of Object.entries(source)) {
      const lowerKey = key.toLowerCase();
      if (!HOP_BY_HOP_HEADERS.includes(lowerKey)) {
        headers[lowerKey] = value;
      }
    }
  }

  return headers;
}

/**
 * Flatten undici response headers to single string values with lower-cased names
 */
export function normalizeResponseHeaders(
  headers: IncomingHttpHeaders | Record<string, string | string[] | undefined>
): Record<string, string> {
  const responseHeaders: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (typeof value === 'string') {
      responseHeaders[key.toLowerCase()] = value;
    } else if (Array.isArray(value)) {
      responseHeaders[key.toLowerCase()] = value.join(', ');
    }
  }
  return responseHeaders;
}

/**
 * Headers describing the encoded body; removed once the body is decoded
 */
export const ENCODING_HEADERS: readonly string[] = ['content-encoding', 'content-length'];

/**
 * Undo a `Content-Encoding` (codings applied left to right, removed right to left)
 *
 * @throws Error for codings other than gzip, deflate, br and identity
 */
export function decodeBody(body: Buffer, contentEncoding: string | undefined): Buffer {
  if (body.length === 0) {
    return body;
  }
  const codings = (contentEncoding ?? '')
    .split(',')
    .map((coding) => coding.trim().toLowerCase())
    .filter((coding) => coding.length > 0 && coding !== 'identity')
    .reverse();

  let decoded = body;
  for (const coding of codings) {
    switch (coding) {
      case 'gzip':
      case 'x-gzip':
        decoded = gunzipSync(decoded);
        break;
      case 'deflate':
        decoded = inflateSync(decoded);
        break;
      case 'br':
        decoded = brotliDecompressSync(decoded);
        break;
      default:
        throw new Error(`Unsupported content-encoding: ${coding}`);
    }
  }
  return decoded;
}

/**
 * Undici request options
 */
export interface UndiciRequestOptions {
  method: Dispatcher.HttpMethod;
  headers: Record<string, string>;
  body?: string | Buffer;
  signal?: AbortSignal;
  bodyTimeout: number;
  headersTimeout: number;
  dispatcher?: Dispatcher;
}

/**
 * Build undici request options
 */
export function buildUndiciOptions(
  config: ResolvedInvokerConfig,
  request: BackendRequest,
  signal?: AbortSignal
): UndiciRequestOptions {
  const readTimeout = request.timeoutMs ?? config.timeout.read;

  return {
    method: request.method,
    headers: buildHeaders(config, request),
    body: request.method === 'GET' || request.method === 'HEAD' ? undefined : request.body,
    signal,
    bodyTimeout: readTimeout,
    headersTimeout: Math.max(config.timeout.connect, readTimeout),
    dispatcher: config.dispatcher,
  };
}

/**
 * Link a caller signal and a deadline into one signal
 *
 * `dispose` must be called once the request settles to clear the timer.
 */
export function createDeadlineSignal(
  timeoutMs: number,
  parent?: AbortSignal
): { signal: AbortSignal; timedOut: () => boolean; dispose: () => void } {
  const controller = new AbortController();
  let expired = false;

  const timer = setTimeout(() => {
    expired = true;
    controller.abort(new Error(`Backend call exceeded ${timeoutMs}ms`));
  }, timeoutMs);

  const onParentAbort = (): void => {
    controller.abort(parent?.reason);
  };

  if (parent) {
    if (parent.aborted) {
      controller.abort(parent.reason);
    } else {
      parent.addEventListener('abort', onParentAbort, { once: true });
    }
  }

  return {
    signal: controller.signal,
    timedOut: () => expired,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}
