/**
 * Progress Formatters
 *
 * Spinner for long-running CLI operations, built on ora. The spinner only
 * animates on a TTY; elsewhere ora prints nothing until it stops.
 *
 * @module cli/formatters/progress
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';

// ============================================================================
// Types
// ============================================================================

/**
 * Progress spinner options.
 */
export interface SpinnerOptions {
  /** Spinner color */
  color?: 'cyan' | 'green' | 'yellow' | 'red' | 'blue' | 'magenta' | 'white';
  /** Set false to suppress the spinner entirely (e.g. --quiet) */
  enabled?: boolean;
  /** Clock for the elapsed-time suffix (for testing) */
  now?: () => number;
}

// ============================================================================
// Spinner Class
// ============================================================================

/**
 * Progress spinner wrapper with consistent styling.
 *
 * @example
 * ```typescript
 * const spinner = new ProgressSpinner('Unifying markets...');
 * spinner.start();
 *
 * try {
 *   const result = await runPipeline(options, deps);
 *   spinner.succeed(`Unified ${result.products.length} products`);
 * } catch (err) {
 *   spinner.fail('Run failed');
 * }
 * ```
 */
export class ProgressSpinner {
  private spinner: Ora;
  private readonly now: () => number;
  private startTime: number = 0;

  constructor(text: string, options: SpinnerOptions = {}) {
    const isTTY = process.stdout.isTTY === true;
    this.now = options.now ?? Date.now;

    this.spinner = ora({
      text,
      color: options.color ?? 'cyan',
      isEnabled: isTTY && options.enabled !== false,
      isSilent: options.enabled === false,
      stream: process.stdout,
    });
  }

  start(text?: string): this {
    this.startTime = this.now();
    if (text) {
      this.spinner.text = text;
    }
    this.spinner.start();
    return this;
  }

  update(text: string): this {
    this.spinner.text = text;
    return this;
  }

  /**
   * Stop spinner with success state and the elapsed time.
   */
  succeed(text?: string): this {
    const duration = this.now() - this.startTime;
    const durationStr = duration > 0 ? chalk.dim(` (${formatDuration(duration)})`) : '';
    this.spinner.succeed((text ?? this.spinner.text) + durationStr);
    return this;
  }

  fail(text?: string): this {
    this.spinner.fail(text);
    return this;
  }

  warn(text?: string): this {
    this.spinner.warn(text);
    return this;
  }

  stop(): this {
    this.spinner.stop();
    return this;
  }

  isSpinning(): boolean {
    return this.spinner.isSpinning;
  }
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Format a duration in milliseconds to human-readable string.
 *
 * @example
 * ```typescript
 * formatDuration(450);    // '450ms'
 * formatDuration(12_300); // '12.3s'
 * formatDuration(95_000); // '1m 35s'
 * ```
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }

  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`;
  }

  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = Math.round(seconds % 60);
  return `${minutes}m ${remainingSeconds}s`;
}

/**
 * Create a spinner for a single operation.
 */
export function createSpinner(text: string, options?: SpinnerOptions): ProgressSpinner {
  return new ProgressSpinner(text, options);
}
