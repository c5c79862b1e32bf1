/**
 * CLI Formatters
 *
 * Re-exports all CLI formatting utilities.
 *
 * @module cli/formatters
 */

// Progress display utilities
export {
  ProgressSpinner,
  createSpinner,
  formatDuration,
  type SpinnerOptions,
} from './progress.js';

// Run summary formatters
export {
  formatRunSummary,
  formatSourceOutcomes,
  formatErrorSummary,
  formatQuickSummary,
} from './run-summary.js';

// Search and index formatters
export { formatSearchResults, formatIndexStats } from './products.js';
