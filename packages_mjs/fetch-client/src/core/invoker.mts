/**
 * Backend invoker using undici
 */
import { request } from 'undici';
import { maskSensitiveHeaders } from '@apigw/logger';
import type { BackendInvoker, BackendRequest, BackendResponse, InvokerConfig } from '../types.mjs';
import { resolveInvokerConfig, type ResolvedInvokerConfig } from '../config.mjs';
import { TransportError } from '../errors.mjs';
import {
  ENCODING_HEADERS,
  buildUndiciOptions,
  createDeadlineSignal,
  decodeBody,
  normalizeResponseHeaders,
} from './request-builder.mjs';

/**
 * Read a string `code` property off an unknown error
 */
function errorCodeOf(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

const TIMEOUT_CODES = ['UND_ERR_HEADERS_TIMEOUT', 'UND_ERR_BODY_TIMEOUT', 'UND_ERR_CONNECT_TIMEOUT'];

/**
 * Issues exactly one HTTP request per `invoke` call; no retries
 *
 * @example
 * const invoker = new UndiciBackendInvoker({ timeout: 10000 });
 * const response = await invoker.invoke({
 *   url: 'http://erp.internal:8020/services/Account',
 *   method: 'GET',
 * });
 */
export class UndiciBackendInvoker implements BackendInvoker {
  protected readonly config: ResolvedInvokerConfig;
  private closed = false;

  constructor(config: InvokerConfig = {}) {
    this.config = resolveInvokerConfig(config);
  }

  async invoke(backendRequest: BackendRequest): Promise<BackendResponse> {
    if (this.closed) {
      throw new Error('Invoker has been closed');
    }

    const { url, method } = backendRequest;
    const deadline = createDeadlineSignal(
      backendRequest.timeoutMs ?? this.config.timeout.read,
      backendRequest.signal
    );
    const undiciOptions = buildUndiciOptions(this.config, backendRequest, deadline.signal);
    const logger = this.config.logger;
    const startedAt = Date.now();

    logger.debug(
      { type: 'request', method, url, headers: maskSensitiveHeaders(undiciOptions.headers) },
      `Request: ${method} ${url}`
    );

    try {
      const response = await request(url, undiciOptions);
      const headers = normalizeResponseHeaders(response.headers);
      const raw = Buffer.from(await response.body.arrayBuffer());
      const body = decodeBody(raw, headers['content-encoding']).toString('utf8');
      if (headers['content-encoding'] !== undefined) {
        for (const name of ENCODING_HEADERS) {
          delete headers[name];
        }
      }
      const ok = response.statusCode >= 200 && response.statusCode < 300;

      const logLevel = ok ? 'debug' : 'warn';
      logger[logLevel](
        {
          type: 'response',
          method,
          url,
          status: response.statusCode,
          durationMs: Date.now() - startedAt,
        },
        `Response: ${response.statusCode}`
      );

      return {
        status: response.statusCode,
        headers,
        body,
        contentType: headers['content-type'],
        ok,
      };
    } catch (error) {
      const errorCode = errorCodeOf(error);
      const aborted = backendRequest.signal?.aborted ?? false;
      const timedOut = deadline.timedOut() || (errorCode !== undefined && TIMEOUT_CODES.includes(errorCode));
      const reason = error instanceof Error ? error.message : String(error);

      logger.warn(
        { type: 'transport-error', method, url, errorCode, timedOut, aborted },
        `Transport error: ${method} ${url}`
      );

      throw new TransportError(
        timedOut
          ? `${method} ${url} timed out`
          : aborted
            ? `${method} ${url} was cancelled`
            : `${method} ${url} failed: ${reason}`,
        { url, method, errorCode, timedOut, aborted, cause: error }
      );
    } finally {
      deadline.dispose();
    }
  }

  async close(): Promise<void> {
    this.closed = true;
    // Dispatcher lifecycle belongs to whoever created it
  }
}

/**
 * Create a backend invoker
 */
export function createBackendInvoker(config?: InvokerConfig): BackendInvoker {
  return new UndiciBackendInvoker(config);
}
