/**
 * Atomic File Operations for Storage Layer
 *
 * Provides atomic write operations using temp file + rename pattern,
 * plus complementary read operations.
 *
 * @module storage/atomic
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { z } from 'zod';

/**
 * Narrow an unknown error to a Node.js system error.
 */
function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === 'object' && error !== null && 'code' in error;
}

/**
 * Write JSON to a file atomically (temp file + rename).
 *
 * Creates parent directories as needed. Output uses 2-space indentation.
 *
 * @throws Error with file context if the write fails
 *
 * @example
 * ```typescript
 * await atomicWriteJson('data/embeddings_cache.json', { entries, savedAt });
 * ```
 */
export async function atomicWriteJson(filePath: string, data: unknown): Promise<void> {
  const tempPath = `${filePath}.tmp.${Date.now()}`;
  const json = JSON.stringify(data, null, 2);

  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(tempPath, json, 'utf-8');
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.unlink(tempPath).catch(() => undefined);
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Atomic write failed for ${filePath}: ${message}`, { cause: error });
  }
}

/**
 * Read and parse a JSON file.
 *
 * @returns Parsed JSON data (unvalidated)
 * @throws Error if file doesn't exist or JSON is invalid
 */
export async function readJson(filePath: string): Promise<unknown> {
  try {
    const content = await fs.readFile(filePath, 'utf-8');
    return JSON.parse(content);
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      throw new Error(`File not found: ${filePath}`);
    }
    if (error instanceof SyntaxError) {
      throw new Error(`Invalid JSON in file: ${filePath}`);
    }
    throw error;
  }
}

/**
 * Read a JSON file and validate it against a Zod schema.
 *
 * @throws Error if the file is missing, not JSON, or fails validation
 */
export async function readValidatedJson<T extends z.ZodTypeAny>(
  filePath: string,
  schema: T
): Promise<z.output<T>> {
  const data = await readJson(filePath);
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new Error(`Invalid data in file: ${filePath}: ${result.error.message}`);
  }
  return result.data;
}

/**
 * Check if a file exists (not a directory)
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(filePath);
    return stat.isFile();
  } catch {
    return false;
  }
}
