/**
 * pino logger factory shared by the gateway packages
 */
import pino from 'pino';
import type { Logger, LevelWithSilent } from 'pino';

export type { Logger, LevelWithSilent };

/**
 * Logger options
 */
export interface LoggerOptions {
  /** Logger name, emitted as the `name` field */
  name?: string;
  /** Minimum level. Default: 'info' */
  level?: LevelWithSilent;
  /** Route output through pino-pretty. Default: false */
  pretty?: boolean;
}

/**
 * Header names whose values are masked before logging
 */
export const SENSITIVE_HEADERS: readonly string[] = ['authorization', 'x-api-key', 'proxy-authorization'];

/**
 * Create a pino logger
 *
 * @example
 * const logger = createLogger({ name: 'api-gateway', level: 'debug', pretty: true });
 * logger.info({ port: 8080 }, 'listening');
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const { name, level = 'info', pretty = false } = options;

  if (pretty) {
    return pino({
      name,
      level,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
        },
      },
    });
  }

  return pino({ name, level });
}

/**
 * Derive a child logger bound to a component name
 */
export function componentLogger(component: string, parent?: Logger): Logger {
  return (parent ?? createLogger()).child({ component });
}

/**
 * Mask auth header values for safe logging
 */
export function maskSensitiveHeaders(headers: Record<string, string>): Record<string, string> {
  const masked = { ...headers };
  for (const key of Object.keys(masked)) {
    if (SENSITIVE_HEADERS.includes(key.toLowerCase())) {
      const value = masked[key];
      if (value.length > 10) {
        masked[key] = value.slice(0, 10) + '*'.repeat(value.length - 10);
      } else {
        masked[key] = '*'.repeat(value.length);
      }
    }
  }
  return masked;
}
