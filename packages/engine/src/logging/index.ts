/**
 * @fileoverview Logging exports
 */

export {
  UciLogger,
  createLogger,
  createSilentLogger,
  isLogLevel,
  LOG_LEVELS,
  type LogLevel,
  type LoggerOptions,
  type LogContext,
} from './logger.js';

export { withLoggingContext, getLoggingContext, type LoggingContext } from './log-context.js';
