/**
 * @apigw/fetch-client
 *
 * Backend invoker: issues one HTTP request to a resolved backend URL and
 * returns status, headers, body text and content type.
 *
 * @example
 * ```typescript
 * import { createBackendInvoker } from '@apigw/fetch-client';
 *
 * const invoker = createBackendInvoker({ timeout: 30000 });
 * const response = await invoker.invoke({
 *   url: 'http://erp.internal:8020/services/SalesOrderLines',
 *   method: 'POST',
 *   headers: { 'content-type': 'application/json' },
 *   body: JSON.stringify({ Item: 'A-100', Quantity: 2 }),
 * });
 * ```
 */

// Types
export type {
  HttpMethod,
  TimeoutConfig,
  InvokerConfig,
  BackendRequest,
  BackendResponse,
  BackendInvoker,
} from './types.mjs';

// Config
export {
  DEFAULT_TIMEOUTS,
  normalizeTimeout,
  resolveInvokerConfig,
  type ResolvedInvokerConfig,
} from './config.mjs';

// Errors
export { TransportError, isTransportError, type TransportErrorOptions } from './errors.mjs';

// Request building
export {
  HOP_BY_HOP_HEADERS,
  ENCODING_HEADERS,
  buildHeaders,
  decodeBody,
  normalizeResponseHeaders,
  createDeadlineSignal,
} from './core/request-builder.mjs';

// Invoker
export { UndiciBackendInvoker, createBackendInvoker } from './core/invoker.mjs';
