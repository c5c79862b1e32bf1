/**
 * Pipeline Module Exports
 *
 * @module pipeline
 */

export { runPipeline, resolveMode } from './run.js';
export { getSampleMarkets } from './sample.js';
export { RUN_MODES, isRunMode } from './types.js';
export type {
  EffectiveMode,
  PipelineDeps,
  PipelineOptions,
  PipelineResult,
  RunMode,
} from './types.js';
