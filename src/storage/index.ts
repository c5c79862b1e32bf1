/**
 * Storage Layer
 *
 * File-based persistence for exports and the search index cache.
 * All JSON writes use the atomic temp file + rename pattern.
 *
 * @module storage
 */

export {
  DEFAULT_DATA_DIR,
  DEFAULT_LOG_FILE,
  resolveDataDir,
  getOutputDir,
  getDefaultOutputPath,
  getEmbeddingsCachePath,
} from './paths.js';

export { atomicWriteJson, readJson, readValidatedJson, fileExists } from './atomic.js';
