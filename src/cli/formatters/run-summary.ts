/**
 * Run Summary Formatters
 *
 * CLI output formatters for pipeline runs:
 * - Standard run summary display
 * - Per-source outcome lines
 * - Error summary formatting
 *
 * @module cli/formatters/run-summary
 */

import chalk from 'chalk';
import type { RecordedError } from '../../metrics/tracker.js';
import type { PipelineResult } from '../../pipeline/types.js';
import type { SourceOutcome } from '../../sources/types.js';
import { formatDuration } from './progress.js';

// ============================================================================
// Main Formatters
// ============================================================================

/**
 * Format a complete run summary.
 *
 * @example
 * ```
 * === Run Complete ===
 * Mode:     agent (requested auto)
 * Strategy: llm
 * Duration: 12.4s
 *
 * Sources:
 *   ✔ polymarket   150 markets (1.2s)
 *   ✘ manifold     HTTP 503 from https://api.manifold.markets/v0/markets
 *
 * Results:
 *   Markets collected:   150
 *   Unified products:    121
 *   Rows written:        150
 *   Indexed products:    121
 *
 * Output:   data/output/unified_products.csv
 * ```
 */
export function formatRunSummary(result: PipelineResult): string {
  const lines: string[] = [];
  const { metrics } = result;

  lines.push(chalk.bold('=== Run Complete ==='));
  const modeLabel =
    result.requestedMode === result.mode
      ? result.mode
      : `${result.mode} ${chalk.dim(`(requested ${result.requestedMode})`)}`;
  lines.push(`Mode:     ${chalk.cyan(modeLabel)}`);
  lines.push(`Strategy: ${result.strategy ?? chalk.dim('none')}`);
  lines.push(`Duration: ${formatDuration(Math.round(metrics.processingTimeSeconds * 1000))}`);
  lines.push('');

  if (result.outcomes.length > 0) {
    lines.push('Sources:');
    lines.push(...formatSourceOutcomes(result.outcomes).map((line) => `  ${line}`));
    lines.push('');
  }

  lines.push('Results:');
  lines.push(`  Markets collected:   ${metrics.totalMarkets}`);
  lines.push(`  Unified products:    ${result.products.length}`);
  lines.push(`  Rows written:        ${result.rowsWritten}`);
  lines.push(`  Indexed products:    ${result.indexed}`);

  if (metrics.llmTokens.input > 0 || metrics.llmTokens.output > 0) {
    lines.push(
      `  LLM tokens:          ${metrics.llmTokens.input.toLocaleString('en-US')} in / ${metrics.llmTokens.output.toLocaleString('en-US')} out`
    );
  }
  lines.push('');

  lines.push(`Output:   ${result.outputPath ?? chalk.dim('nothing written')}`);

  if (metrics.errorCount > 0) {
    lines.push(chalk.yellow(`Warning:  ${metrics.errorCount} error(s) recorded during the run`));
  }

  return lines.join('\n');
}

/**
 * One line per source: status icon, id, count and duration or the error.
 */
export function formatSourceOutcomes(outcomes: readonly SourceOutcome[]): string[] {
  const width = Math.max(...outcomes.map((o) => o.sourceId.length), 0) + 3;

  return outcomes.map((outcome) => {
    const id = outcome.sourceId.padEnd(width);
    if (outcome.status === 'ok') {
      return `${chalk.green('✔')} ${id}${outcome.count} markets ${chalk.dim(`(${formatDuration(outcome.durationMs)})`)}`;
    }
    return `${chalk.red('✘')} ${id}${chalk.dim(outcome.error ?? 'failed')}`;
  });
}

/**
 * Format recorded errors for display.
 */
export function formatErrorSummary(errors: readonly RecordedError[]): string {
  const lines: string[] = [];

  lines.push(chalk.bold.red('=== Errors ==='));
  lines.push('');

  for (const err of errors) {
    lines.push(`${chalk.yellow('⚠')} ${err.context} ${chalk.dim(`(${err.errorType})`)}`);
    lines.push(`  ${chalk.dim(err.message)}`);
    lines.push('');
  }

  return lines.join('\n');
}

/**
 * Format a quick one-line summary for the end of a run.
 */
export function formatQuickSummary(result: PipelineResult): string {
  const duration = chalk.dim(
    `(${formatDuration(Math.round(result.metrics.processingTimeSeconds * 1000))})`
  );

  if (result.rowsWritten === 0) {
    return `${chalk.yellow('⚠ No markets collected')} ${duration}`;
  }

  const degraded = result.outcomes.some((o) => o.status === 'error');
  const status = degraded
    ? chalk.yellow('⚠ Run complete (degraded)')
    : chalk.green('✔ Run complete');

  return `${status} ${result.metrics.totalMarkets} markets -> ${result.products.length} products ${duration}`;
}
