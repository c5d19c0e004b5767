/**
 * Export aggregator: writes a bundle in each requested format.
 *
 * Formats are independent. A failing writer is recorded in the report and
 * logged, and the remaining formats still run. The bundle is only read.
 */
import { mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import type { ExportFormat } from '../config.js';
import { ExportError } from '../errors.js';
import { logger } from '../logger.js';
import { writeCsv } from './csv-writer.js';
import { writeExcel } from './excel-writer.js';
import { writeJson } from './json-writer.js';
import { toRows, type ExportRow } from './rows.js';
import type { ExportBundle, ExportOptions, ExportReport } from './types.js';

const EXTENSIONS: Record<ExportFormat, string> = {
  json: 'json',
  csv: 'csv',
  excel: 'xlsx',
};

const WRITERS: Record<ExportFormat, (rows: ExportRow[], path: string) => Promise<void>> = {
  json: writeJson,
  csv: writeCsv,
  excel: writeExcel,
};

const pad = (n: number): string => String(n).padStart(2, '0');

/** Local time as YYYYMMDD_HHMMSS. */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export function exportFileName(
  nameBase: string,
  format: ExportFormat,
  timestamp: Date | false
): string {
  const stem = timestamp === false ? nameBase : `${nameBase}_${formatTimestamp(timestamp)}`;
  return `${stem}.${EXTENSIONS[format]}`;
}

function toExportError(format: ExportFormat, error: unknown): ExportError {
  if (error instanceof ExportError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new ExportError(format, message, { cause: error });
}

/**
 * Write `bundle` once per format as `<nameBase>_<YYYYMMDD_HHMMSS>.<ext>`.
 * Never throws for a writer failure; see `ExportReport.failures`.
 */
export async function exportBundle(
  bundle: ExportBundle,
  formats: readonly ExportFormat[],
  nameBase: string,
  options: ExportOptions = {}
): Promise<ExportReport> {
  const directory = options.directory ?? '.';
  const timestamp = options.timestamp ?? new Date();
  const rows = toRows(bundle);
  const report: ExportReport = { paths: [], failures: [] };

  for (const format of new Set(formats)) {
    const path = join(directory, exportFileName(nameBase, format, timestamp));
    try {
      await mkdir(directory, { recursive: true });
      await WRITERS[format](rows, path);
      report.paths.push(path);
      logger.info({ format, path, rows: rows.length }, 'Export written');
    } catch (e) {
      const error = toExportError(format, e);
      report.failures.push({ format, message: error.message });
      logger.error({ format, path, error: error.message }, 'Export failed');
    }
  }

  return report;
}
