/**
 * Logger
 *
 * Leveled console logger with optional file output. Collaborators receive a
 * Logger instance instead of reaching for a global, so the matching core and
 * its tests stay free of hidden output.
 *
 * Console lines are coloured with chalk; the log file gets every message,
 * including debug, in plain text.
 *
 * @module logging/logger
 */

import chalk from 'chalk';
import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

// ============================================================================
// Types
// ============================================================================

/**
 * Log levels in increasing severity.
 */
export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Logger passed to every collaborator that reports progress or failures.
 */
export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/**
 * Options for createLogger.
 */
export interface LoggerOptions {
  /** Minimum level printed to the console (default: 'info') */
  level?: LogLevel;
  /** Append all messages to this file when set */
  logFile?: string;
  /** Logger name shown in each line (default: 'pmu') */
  name?: string;
  /** Disable to print without ANSI colours */
  color?: boolean;
  /** Clock used for timestamps (for testing) */
  now?: () => Date;
  /** Console sink (for testing) */
  write?: (level: LogLevel, line: string) => void;
}

// ============================================================================
// Helpers
// ============================================================================

const LEVEL_COLORS: Record<LogLevel, (text: string) => string> = {
  debug: chalk.dim,
  info: (text) => text,
  warn: chalk.yellow,
  error: chalk.red,
};

/**
 * Check whether a string is a known log level.
 */
export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Format a log line as `timestamp - name - LEVEL - message`.
 */
export function formatLogLine(date: Date, name: string, level: LogLevel, message: string): string {
  return `${date.toISOString()} - ${name} - ${level.toUpperCase()} - ${message}`;
}

function writeToConsole(level: LogLevel, line: string): void {
  if (level === 'error' || level === 'warn') {
    console.error(line);
  } else {
    console.log(line);
  }
}

// ============================================================================
// Factory
// ============================================================================

/**
 * Create a logger.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info', logFile: 'logs/pipeline.log' });
 * logger.info('Collected 120 markets from polymarket');
 * ```
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = LOG_LEVELS.indexOf(options.level ?? 'info');
  const name = options.name ?? 'pmu';
  const now = options.now ?? (() => new Date());
  const write = options.write ?? writeToConsole;
  const useColor = options.color !== false;
  const logFile = options.logFile;

  if (logFile) {
    mkdirSync(dirname(logFile), { recursive: true });
  }

  const log = (level: LogLevel, message: string): void => {
    const line = formatLogLine(now(), name, level, message);

    if (LOG_LEVELS.indexOf(level) >= threshold) {
      write(level, useColor ? LEVEL_COLORS[level](line) : line);
    }

    if (logFile) {
      appendFileSync(logFile, `${line}\n`, 'utf-8');
    }
  };

  return {
    debug: (message) => log('debug', message),
    info: (message) => log('info', message),
    warn: (message) => log('warn', message),
    error: (message) => log('error', message),
  };
}

/**
 * Logger that discards everything. Default for library callers and tests.
 */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
