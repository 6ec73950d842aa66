/**
 * Type definitions for @apigw/fetch-client
 */
import type { Dispatcher } from 'undici';
import type { Logger } from '@apigw/logger';

/**
 * HTTP methods a backend can be invoked with
 */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'HEAD' | 'OPTIONS';

/**
 * Timeout configuration in milliseconds
 */
export interface TimeoutConfig {
  /** Time to receive response headers */
  connect?: number;
  /** Time allowed between body chunks */
  read?: number;
}

/**
 * Invoker configuration
 */
export interface InvokerConfig {
  /** undici dispatcher (Agent, ProxyAgent, MockAgent). Default: global dispatcher */
  dispatcher?: Dispatcher;
  /** Transport timeouts, or a single value for both */
  timeout?: TimeoutConfig | number;
  /** Headers added to every backend request (request headers win) */
  headers?: Record<string, string>;
  /** Logger; a child bound to `component: backend-invoker` is derived */
  logger?: Logger;
}

/**
 * One backend call
 */
export interface BackendRequest {
  /** Absolute backend URL including query string */
  url: string;
  method: HttpMethod;
  headers?: Record<string, string>;
  body?: string | Buffer;
  /** Overall deadline for this call; supersedes the configured read timeout */
  timeoutMs?: number;
  /** Cancels the call cooperatively */
  signal?: AbortSignal;
}

/**
 * Backend response, body fully read and decoded as text
 */
export interface BackendResponse {
  status: number;
  /** Lower-cased header names, multi-valued headers joined with ', ' */
  headers: Record<string, string>;
  body: string;
  contentType?: string;
  /** True for 2xx statuses */
  ok: boolean;
}

/**
 * Backend Invoker interface, stateless per call
 */
export interface BackendInvoker {
  invoke(request: BackendRequest): Promise<BackendResponse>;
  close(): Promise<void>;
}
