import { writeFile } from 'node:fs/promises';
import type { ExportRow } from './rows.js';

export function serializeJson(rows: ExportRow[]): string {
  return JSON.stringify(rows, null, 2) + '\n';
}

export async function writeJson(rows: ExportRow[], path: string): Promise<void> {
  await writeFile(path, serializeJson(rows), 'utf-8');
}
