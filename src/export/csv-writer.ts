/**
 * RFC 4180 CSV: comma separated, CRLF line breaks, fields containing a comma,
 * quote or line break are quoted with inner quotes doubled.
 */
import { writeFile } from 'node:fs/promises';
import { TABLE_HEADERS, toCells, type ExportRow } from './rows.js';

const NEEDS_QUOTING = /[",\r\n]/;

export function escapeCsvField(value: string | number): string {
  const text = String(value);
  return NEEDS_QUOTING.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

function csvLine(fields: readonly (string | number)[]): string {
  return fields.map(escapeCsvField).join(',');
}

export function serializeCsv(rows: ExportRow[]): string {
  const lines = [csvLine(TABLE_HEADERS), ...rows.map((row) => csvLine(toCells(row)))];
  return lines.join('\r\n') + '\r\n';
}

export async function writeCsv(rows: ExportRow[], path: string): Promise<void> {
  await writeFile(path, serializeCsv(rows), 'utf-8');
}
