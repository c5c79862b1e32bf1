/**
 * Metrics Module Exports
 *
 * @module metrics
 */

export { RunMetrics } from './tracker.js';
export type { RecordedError, MetricsSummary, ErrorRecorder } from './tracker.js';
