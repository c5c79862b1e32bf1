/**
 * Path Resolution Utilities
 *
 * Provides consistent path generation for the storage layer.
 *
 * Directory Structure:
 * ```
 * ./data/                          # Default data directory (PM_DATA_DIR)
 * ├── embeddings_cache.json        # Search index cache
 * └── output/
 *     └── unified_products.csv     # Default export
 * ./logs/
 * └── pipeline.log                 # Default log file
 * ```
 *
 * @module storage/paths
 */

import * as path from 'node:path';
import * as os from 'node:os';

/** Default data directory, relative to the working directory */
export const DEFAULT_DATA_DIR = './data';

/** Default log file, relative to the working directory */
export const DEFAULT_LOG_FILE = path.join('logs', 'pipeline.log');

/**
 * Resolve a data directory, expanding a leading `~`.
 *
 * @example
 * ```typescript
 * resolveDataDir('~/pm'); // '/home/user/pm'
 * resolveDataDir('data'); // '/current/dir/data'
 * ```
 */
export function resolveDataDir(dataDir: string = DEFAULT_DATA_DIR): string {
  if (dataDir === '~' || dataDir.startsWith('~/')) {
    return path.join(os.homedir(), dataDir.slice(1));
  }
  return path.resolve(dataDir);
}

/**
 * Directory for exported CSV files.
 */
export function getOutputDir(dataDir: string): string {
  return path.join(resolveDataDir(dataDir), 'output');
}

/**
 * Default CSV export path.
 */
export function getDefaultOutputPath(dataDir: string): string {
  return path.join(getOutputDir(dataDir), 'unified_products.csv');
}

/**
 * Search index cache path.
 */
export function getEmbeddingsCachePath(dataDir: string): string {
  return path.join(resolveDataDir(dataDir), 'embeddings_cache.json');
}
