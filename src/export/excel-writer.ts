/**
 * Excel workbook with a single "Pages" sheet laid out like the CSV.
 */
import ExcelJS from 'exceljs';
import type { Workbook } from 'exceljs';
import { TABLE_HEADERS, toCells, type ExportRow } from './rows.js';

export const SHEET_NAME = 'Pages';

/** Excel rejects cells longer than this. */
const MAX_CELL_LENGTH = 32767;

function fitCell(value: string | number): string | number {
  return typeof value === 'string' && value.length > MAX_CELL_LENGTH
    ? value.slice(0, MAX_CELL_LENGTH)
    : value;
}

export function buildWorkbook(rows: ExportRow[]): Workbook {
  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet(SHEET_NAME);

  sheet.addRow([...TABLE_HEADERS]);
  sheet.getRow(1).font = { bold: true };
  for (const row of rows) {
    sheet.addRow(toCells(row).map(fitCell));
  }
  return workbook;
}

export async function writeExcel(rows: ExportRow[], path: string): Promise<void> {
  await buildWorkbook(rows).xlsx.writeFile(path);
}
