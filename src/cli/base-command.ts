/**
 * Base Command
 *
 * Provides common functionality for all CLI commands including:
 * - Global option handling (verbose, quiet, no-color, data dir)
 * - Consistent error handling and exit codes
 * - Output utilities (info, warn, error, sections)
 * - Logger construction for the chosen verbosity
 *
 * @module cli/base-command
 */

import chalk from 'chalk';
import type { Command, OptionValues } from 'commander';
import type { AppConfig } from '../config/index.js';
import { createLogger, type Logger, type LogLevel } from '../logging/logger.js';
import { resolveDataDir } from '../storage/paths.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Global CLI options available to all commands.
 */
export interface GlobalOptions {
  /** Enable verbose output for debugging */
  verbose?: boolean;
  /** Suppress all non-essential output */
  quiet?: boolean;
  /** Disable colored output */
  color?: boolean; // commander inverts --no-color to color: false
  /** Override the data directory */
  dataDir?: string;
}

// ============================================================================
// Exit Codes
// ============================================================================

/**
 * Standard exit codes for the CLI.
 */
export const EXIT_CODES = {
  /** Successful execution */
  SUCCESS: 0,
  /** General error */
  ERROR: 1,
  /** Invalid usage or arguments */
  USAGE_ERROR: 2,
  /** Resource not found (empty index, etc.) */
  NOT_FOUND: 3,
  /** API or network error */
  API_ERROR: 4,
  /** User cancelled operation */
  CANCELLED: 130,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Pick the global options out of commander's parsed values.
 */
export function toGlobalOptions(opts: OptionValues): GlobalOptions {
  return {
    verbose: opts.verbose === true,
    quiet: opts.quiet === true,
    color: opts.color !== false,
    dataDir: typeof opts.dataDir === 'string' ? opts.dataDir : undefined,
  };
}

// ============================================================================
// BaseCommand Class
// ============================================================================

/**
 * Base command class providing common CLI functionality.
 *
 * @example
 * ```typescript
 * .action(async (options: StatsCommandOptions, cmd: Command) => {
 *   const base = getBaseCommand(cmd);
 *   base.section('Search Index');
 *   base.info(formatIndexStats(stats));
 * });
 * ```
 */
export class BaseCommand {
  /** Global options from CLI */
  readonly options: GlobalOptions;

  /** Whether colored output is enabled */
  private readonly useColor: boolean;

  constructor(options: GlobalOptions) {
    this.options = options;
    this.useColor = options.color !== false && process.stdout.isTTY === true;

    // Configure chalk based on color preference
    if (!this.useColor) {
      chalk.level = 0;
    }
  }

  // ==========================================================================
  // Environment
  // ==========================================================================

  /**
   * Data directory: --data-dir, else the configured PM_DATA_DIR.
   */
  getDataDir(config: AppConfig): string {
    return resolveDataDir(this.options.dataDir ?? config.dataDir);
  }

  /**
   * Console level implied by the global flags.
   *
   * --verbose wins over an explicit level; --quiet keeps warnings and errors.
   */
  getLogLevel(fallback: LogLevel): LogLevel {
    if (this.options.verbose) {
      return 'debug';
    }
    if (this.options.quiet) {
      return 'warn';
    }
    return fallback;
  }

  /**
   * Create a logger honouring --verbose, --quiet and --no-color.
   */
  createLogger(level: LogLevel, logFile?: string): Logger {
    return createLogger({
      level: this.getLogLevel(level),
      logFile,
      color: this.useColor,
    });
  }

  // ==========================================================================
  // Output Methods
  // ==========================================================================

  /**
   * Log a debug message (only visible in verbose mode).
   */
  debug(message: string, ...args: unknown[]): void {
    if (this.options.verbose) {
      console.log(chalk.dim(`[DEBUG] ${message}`), ...args);
    }
  }

  /**
   * Log an informational message (hidden in quiet mode).
   */
  info(message: string, ...args: unknown[]): void {
    if (!this.options.quiet) {
      console.log(message, ...args);
    }
  }

  /**
   * Log a warning message (always visible).
   */
  warn(message: string, ...args: unknown[]): void {
    console.warn(chalk.yellow(`Warning: ${message}`), ...args);
  }

  /**
   * Print an error and exit.
   *
   * @param errorOrCode - Error object (stack shown in verbose mode) or exit code
   */
  error(message: string, errorOrCode?: unknown): never {
    console.error(chalk.red(`Error: ${message}`));

    if (errorOrCode instanceof Error) {
      if (this.options.verbose) {
        console.error(chalk.dim(errorOrCode.stack ?? errorOrCode.message));
      }
      process.exit(EXIT_CODES.ERROR);
    } else if (typeof errorOrCode === 'number') {
      process.exit(errorOrCode);
    } else {
      process.exit(EXIT_CODES.ERROR);
    }
  }

  /**
   * Print a blank line (hidden in quiet mode).
   */
  blank(): void {
    if (!this.options.quiet) {
      console.log();
    }
  }

  /**
   * Print a horizontal divider line.
   */
  divider(char = '-', width = 40): void {
    if (!this.options.quiet) {
      console.log(chalk.dim(char.repeat(width)));
    }
  }

  /**
   * Print a section header.
   */
  section(title: string): void {
    if (!this.options.quiet) {
      console.log();
      console.log(chalk.bold(title));
      this.divider('=', title.length);
    }
  }

  /**
   * Print data as formatted JSON.
   */
  json(data: unknown): void {
    console.log(JSON.stringify(data, null, 2));
  }

  // ==========================================================================
  // Utility Methods
  // ==========================================================================

  isVerbose(): boolean {
    return this.options.verbose === true;
  }

  isQuiet(): boolean {
    return this.options.quiet === true;
  }

  /**
   * Exit with specific code.
   */
  exitWith(code: ExitCode): never {
    process.exit(code);
  }
}

// ============================================================================
// Factory Functions
// ============================================================================

/**
 * Get the base command stored by the program's preAction hook.
 *
 * Falls back to a default instance when the command runs outside the
 * program (for testing).
 */
export function getBaseCommand(cmd: Command): BaseCommand {
  const base: unknown = cmd.optsWithGlobals()['_baseCommand'];
  if (!(base instanceof BaseCommand)) {
    return new BaseCommand(toGlobalOptions(cmd.optsWithGlobals()));
  }
  return base;
}
