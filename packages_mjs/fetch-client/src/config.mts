/**
 * Configuration utilities for @apigw/fetch-client
 */
import type { Dispatcher } from 'undici';
import type { Logger } from '@apigw/logger';
import { componentLogger } from '@apigw/logger';
import type { InvokerConfig, TimeoutConfig } from './types.mjs';

/**
 * Default timeout values in milliseconds
 */
export const DEFAULT_TIMEOUTS: Required<TimeoutConfig> = {
  connect: 5000,
  read: 30000,
};

/**
 * Resolved invoker configuration
 */
export interface ResolvedInvokerConfig {
  dispatcher?: Dispatcher;
  timeout: Required<TimeoutConfig>;
  headers: Record<string, string>;
  logger: Logger;
}

/**
 * Normalize timeout config to milliseconds
 */
export function normalizeTimeout(timeout?: TimeoutConfig | number): Required<TimeoutConfig> {
  if (typeof timeout === 'number') {
    return {
      connect: timeout,
      read: timeout,
    };
  }

  return {
    connect: timeout?.connect ?? DEFAULT_TIMEOUTS.connect,
    read: timeout?.read ?? DEFAULT_TIMEOUTS.read,
  };
}

/**
 * Validate and resolve invoker configuration
 */
export function resolveInvokerConfig(config: InvokerConfig = {}): ResolvedInvokerConfig {
  const timeout = normalizeTimeout(config.timeout);

  for (const [name, value] of Object.entries(timeout)) {
    if (!Number.isFinite(value) || value <= 0) {
      throw new Error(`Invalid ${name} timeout: ${value}`);
    }
  }

  return {
    dispatcher: config.dispatcher,
    timeout,
    headers: { ...config.headers },
    logger: componentLogger('backend-invoker', config.logger),
  };
}
