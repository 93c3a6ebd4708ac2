import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { ExportTable } from './table';

/** Write `{ [table.name]: rows }` as pretty-printed JSON. */
export async function writeJson(path: string, tables: ExportTable[]): Promise<void> {
  const document: Record<string, ExportTable['rows']> = {};
  for (const table of tables) {
    document[table.name] = table.rows;
  }
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, `${JSON.stringify(document, null, 2)}\n`, 'utf8');
}
