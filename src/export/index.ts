/**
 * Export Module Exports
 *
 * @module export
 */

export { EXPORT_HEADER, toExportRows } from './rows.js';
export type { ExportColumn, ExportRow } from './rows.js';
export { writeProductsCsv } from './csv.js';
