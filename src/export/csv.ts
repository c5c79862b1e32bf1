/**
 * CSV Export
 *
 * Writes unified products to CSV with csv-writer. The file is written to a
 * temp path and renamed into place so readers never see a partial file.
 *
 * @module export/csv
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { createObjectCsvWriter } from 'csv-writer';
import type { UnifiedProduct } from '../schemas/market.js';
import { EXPORT_HEADER, toExportRows } from './rows.js';

/**
 * Write products to a CSV file with a header row.
 *
 * Creates the parent directory if needed and overwrites any existing file.
 *
 * @returns Number of data rows written
 *
 * @example
 * ```typescript
 * const rows = await writeProductsCsv(products, 'data/output/unified_products.csv');
 * ```
 */
export async function writeProductsCsv(
  products: readonly UnifiedProduct[],
  outputPath: string
): Promise<number> {
  await fs.mkdir(path.dirname(outputPath), { recursive: true });

  const rows = toExportRows(products);
  const tempPath = `${outputPath}.tmp.${Date.now()}`;

  try {
    if (rows.length === 0) {
      // csv-writer emits a record delimiter even for an empty batch
      await fs.writeFile(tempPath, `${EXPORT_HEADER.join(',')}\n`, 'utf-8');
    } else {
      const writer = createObjectCsvWriter({
        path: tempPath,
        header: EXPORT_HEADER.map((column) => ({ id: column, title: column })),
      });
      await writer.writeRecords(rows);
    }
    await fs.rename(tempPath, outputPath);
  } catch (error) {
    await fs.unlink(tempPath).catch(() => undefined);
    throw error;
  }

  return rows.length;
}
