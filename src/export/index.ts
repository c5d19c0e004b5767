/**
 * Export module barrel exports
 */
export { exportBundle, exportFileName, formatTimestamp } from './exporter.js';
export { BundleBuilder, bundleRecords } from './bundle.js';
export { toRows, TABLE_HEADERS, LIST_SEPARATOR } from './rows.js';
export type { ExportRow, ExportRowError } from './rows.js';
export { serializeCsv, escapeCsvField } from './csv-writer.js';
export { serializeJson } from './json-writer.js';
export { SHEET_NAME } from './excel-writer.js';
export type {
  BundleEntry,
  ExportBundle,
  ExportFailure,
  ExportOptions,
  ExportReport,
  RunMode,
} from './types.js';
