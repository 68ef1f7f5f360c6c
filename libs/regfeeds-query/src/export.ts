import { writeFile } from 'fs/promises';
import type { Row, Table } from '@libs/regfeeds-data';

function formatCell(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }
  const text =
    value instanceof Date
      ? value.toISOString()
      : typeof value === 'object'
        ? JSON.stringify(value)
        : String(value);
  return `"${text.replace(/"/g, '""')}"`;
}

/** Header line of column names, then one quoted line per row. */
export function tableToCsv(table: Table): string {
  return [
    table.columns.join(','),
    ...table.rows.map((row) => table.columns.map((column) => formatCell(row[column])).join(',')),
  ].join('\n');
}

/** Rows as a JSON array; dates become ISO strings. */
export function tableToJson(table: Table, indent = 2): string {
  return JSON.stringify(table.rows, null, indent);
}

export async function writeCsv(table: Table, filePath: string): Promise<string> {
  await writeFile(filePath, `${tableToCsv(table)}\n`, 'utf8');
  return filePath;
}

/** Deep copy; dates and nested metadata are not shared with the source. */
export function copyTable<R extends Row>(table: Table<R>): Table<R> {
  return { columns: [...table.columns], rows: table.rows.map((row) => structuredClone(row)) };
}
