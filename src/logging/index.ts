/**
 * Logging Module
 * @module logging
 */

export {
  StructuredLogger,
  createLogger,
  getLogger,
  initLogger,
  resetLogger,
  createModuleLogger,
  withLogging,
} from './logger';

export type { LogContext, LoggerConfig, CreateLoggerOptions } from './logger';
