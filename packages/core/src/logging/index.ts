/**
 * @fileoverview Logging exports
 */

export {
  PaperkitLogger,
  getLogger,
  createLogger,
  resetLogger,
  isLogLevel,
  LOG_LEVELS,
  type LogLevel,
  type LoggerOptions,
  type LogContext,
} from './logger.js';

export {
  withLoggingContext,
  getLoggingContext,
  updateLoggingContext,
  type LoggingContext,
} from './log-context.js';
