/**
 * @apigw/logger
 */

export {
  createLogger,
  componentLogger,
  maskSensitiveHeaders,
  SENSITIVE_HEADERS,
  type LoggerOptions,
  type Logger,
  type LevelWithSilent,
} from './logger.mjs';
