/**
 * Logging Module Exports
 *
 * @module logging
 */

export {
  createLogger,
  formatLogLine,
  isLogLevel,
  silentLogger,
  LOG_LEVELS,
} from './logger.js';
export type { Logger, LoggerOptions, LogLevel } from './logger.js';
