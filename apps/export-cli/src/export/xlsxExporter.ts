import { mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import ExcelJS from 'exceljs';
import type { ExportTable } from './table';

const MAX_SHEET_NAME = 31;

/** Write one worksheet per table, with a bold header row. */
export async function writeXlsx(path: string, tables: ExportTable[]): Promise<void> {
  const workbook = new ExcelJS.Workbook();
  const used = new Set<string>();

  for (const table of tables) {
    const sheet = workbook.addWorksheet(uniqueSheetName(table.name, used));
    sheet.columns = table.columns.map((column) => ({
      header: column,
      key: column,
      width: Math.max(12, column.length + 2),
    }));
    for (const row of table.rows) {
      sheet.addRow(row);
    }
    sheet.getRow(1).font = { bold: true };
  }

  await mkdir(dirname(path), { recursive: true });
  await workbook.xlsx.writeFile(path);
}

/** Excel rejects []:*?/\ in sheet names, names over 31 chars, and duplicates. */
export function uniqueSheetName(name: string, used: Set<string>): string {
  const base = (name.replace(/[[\]:*?\/\\]/g, '_').trim() || 'Sheet').slice(0, MAX_SHEET_NAME);
  let candidate = base;
  for (let n = 2; used.has(candidate.toLowerCase()); n += 1) {
    const suffix = ` (${n})`;
    candidate = `${base.slice(0, MAX_SHEET_NAME - suffix.length)}${suffix}`;
  }
  used.add(candidate.toLowerCase());
  return candidate;
}
