import type { Logger } from '@libs/http-client-core';
import { ValidationError } from '@libs/regfeeds-client';
import type { Row, Table } from './types';
import { isRecord } from './values';

export function emptyTable(columns: readonly string[] = []): Table {
  return { columns: [...columns], rows: [] };
}

/**
 * Converts a list of heterogeneous records into a fixed-column table.
 *
 * - Empty input gives an empty table with exactly `expectedColumns`.
 * - Expected columns missing from the data are added as `null`.
 * - Columns not in `expectedColumns` are kept after the expected ones, in the
 *   order they were first seen.
 *
 * @throws ValidationError when `data` is not a list of records.
 */
export function normalizeRecords(
  data: unknown,
  expectedColumns: readonly string[],
  logger?: Logger,
): Table {
  if (!Array.isArray(data)) {
    throw new ValidationError(
      `Expected a list of records, got ${data === null ? 'null' : typeof data}`,
    );
  }

  if (data.length === 0) {
    logger?.debug?.('[normalizeRecords] Received empty data list');
    return emptyTable(expectedColumns);
  }

  const discovered: string[] = [];
  const seen = new Set<string>();
  const records: Row[] = [];

  for (const item of data) {
    if (!isRecord(item)) {
      throw new ValidationError('Expected a list of records, found a non-object element');
    }
    records.push(item);
    for (const key of Object.keys(item)) {
      if (!seen.has(key)) {
        seen.add(key);
        discovered.push(key);
      }
    }
  }

  const expected = new Set(expectedColumns);
  const missing = expectedColumns.filter((column) => !seen.has(column));
  const extra = discovered.filter((column) => !expected.has(column));

  if (missing.length > 0) {
    logger?.debug?.('[normalizeRecords] Adding missing columns', { columns: missing });
  }
  if (extra.length > 0) {
    logger?.info?.('[normalizeRecords] Found extra columns (keeping them)', { columns: extra });
  }

  const columns = [...expectedColumns, ...extra];
  const rows = records.map((record) => {
    const row: Row = {};
    for (const column of columns) {
      const value = record[column];
      row[column] = value === undefined ? null : value;
    }
    return row;
  });

  return { columns, rows };
}

/** Renames columns per `mapping`; unmapped columns keep their names. */
export function renameColumns(table: Table, mapping: Record<string, string>): Table {
  const rename = (column: string): string => mapping[column] ?? column;
  return {
    columns: table.columns.map(rename),
    rows: table.rows.map((row) => {
      const renamed: Row = {};
      for (const [key, value] of Object.entries(row)) {
        renamed[rename(key)] = value;
      }
      return renamed;
    }),
  };
}

/** Applies `transform` to one column of every row, adding the column if absent. */
export function mapColumn(
  table: Table,
  column: string,
  transform: (value: unknown, row: Row) => unknown,
): Table {
  return {
    columns: table.columns.includes(column) ? [...table.columns] : [...table.columns, column],
    rows: table.rows.map((row) => ({ ...row, [column]: transform(row[column] ?? null, row) })),
  };
}

/**
 * Stacks tables; the column list is the union in order of first appearance and
 * rows lacking a column get null for it.
 */
export function concatTables<R extends Row>(tables: Table<R>[]): Table<R> {
  const columns: string[] = [];
  for (const table of tables) {
    for (const column of table.columns) {
      if (!columns.includes(column)) {
        columns.push(column);
      }
    }
  }
  return {
    columns,
    rows: tables.flatMap((table) =>
      table.rows.map((row) => Object.assign({ ...row }, missingColumns(row, columns))),
    ),
  };
}

function missingColumns(row: Row, columns: readonly string[]): Record<string, null> {
  const missing: Record<string, null> = {};
  for (const column of columns) {
    if (!(column in row)) {
      missing[column] = null;
    }
  }
  return missing;
}
