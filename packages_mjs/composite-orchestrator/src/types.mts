/**
 * Type definitions for @apigw/composite-orchestrator
 */
import type { BackendInvoker } from '@apigw/fetch-client';
import type { EndpointLookup } from '@apigw/endpoint-directory';
import type { Logger } from '@apigw/logger';
import type { SharedValueScope } from './context.mjs';
import type { CompositeErrorKind } from './errors.mjs';

/**
 * Orchestrator configuration
 */
export interface OrchestratorConfig {
  directory: EndpointLookup;
  invoker: BackendInvoker;
  logger?: Logger;
  /** Keying of `$guid` values. Default: 'request' */
  sharedValueScope?: SharedValueScope;
  /** Identifier generator for `$guid`. Default: uuid v4 */
  generateId?: () => string;
  /** Maximum length of raw error bodies in `errorDetail`. Default: 1000 */
  maxErrorDetailLength?: number;
}

/**
 * Per-request inputs besides the body
 */
export interface ExecutionMetadata {
  /** Headers sent with every step call */
  headers?: Record<string, string>;
  /** Values readable through `$context.<name>` */
  variables?: Record<string, unknown>;
  /** Scheme and authority used when rewriting backend URLs in results */
  publicBaseUrl?: string;
  signal?: AbortSignal;
  /** Deadline for each backend call */
  timeoutMs?: number;
}

export interface CompositeSuccess {
  success: true;
  /** Step name to response body, in execution order */
  stepResults: Record<string, unknown>;
}

export interface CompositeFailure {
  success: false;
  stepResults: Record<string, unknown>;
  failedStep: string;
  errorKind: CompositeErrorKind;
  errorMessage: string;
  errorDetail: string;
  /** Backend status; absent when no response was received */
  httpStatusCode?: number;
  /** Raw backend body of the failed call */
  responseBody?: string;
  structuredError?: unknown;
  /** Element that failed within an array step */
  failedElementIndex?: number;
}

export type CompositeResult = CompositeSuccess | CompositeFailure;
