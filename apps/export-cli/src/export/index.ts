import type { ExportFormat } from '../args';
import { writeJson } from './jsonExporter';
import { writeXlsx } from './xlsxExporter';
import type { ExportTable } from './table';

export {
  timeSeriesToTable,
  staticDataToTable,
  errorsToTable,
  uniqueDataColumns,
  ColumnClashError,
  FIXED_COLUMNS,
} from './table';
export type { ExportTable, CellValue } from './table';
export { writeJson } from './jsonExporter';
export { writeXlsx, uniqueSheetName } from './xlsxExporter';

export async function exportTables(
  format: ExportFormat,
  path: string,
  tables: ExportTable[],
): Promise<void> {
  if (format === 'xlsx') {
    await writeXlsx(path, tables);
    return;
  }
  await writeJson(path, tables);
}
