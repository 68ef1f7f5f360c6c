import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { copyTable, tableToCsv, tableToJson, writeCsv } from '../export';

const table = {
  columns: ['id', 'title', 'published'],
  rows: [
    { id: 'e1', title: 'Say "hi", world', published: new Date('2024-03-01T10:00:00Z') },
    { id: 'e2', title: null, published: null },
  ],
};

describe('tableToCsv', () => {
  it('quotes cells, doubles embedded quotes and leaves nulls empty', () => {
    expect(tableToCsv(table)).toBe(
      'id,title,published\n"e1","Say ""hi"", world","2024-03-01T10:00:00.000Z"\n"e2",,',
    );
  });

  it('serializes nested objects as JSON', () => {
    expect(tableToCsv({ columns: ['meta'], rows: [{ meta: { a: 1 } }] })).toBe('meta\n"{""a"":1}"');
  });
});

describe('tableToJson', () => {
  it('writes rows with ISO dates', () => {
    expect(JSON.parse(tableToJson(table))).toEqual([
      { id: 'e1', title: 'Say "hi", world', published: '2024-03-01T10:00:00.000Z' },
      { id: 'e2', title: null, published: null },
    ]);
    expect(tableToJson({ columns: ['id'], rows: [{ id: 'a' }] }, 0)).toBe('[{"id":"a"}]');
  });
});

describe('writeCsv', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'regfeeds-export-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes the CSV and returns the path', async () => {
    const filePath = join(dir, 'entries.csv');

    await expect(writeCsv(table, filePath)).resolves.toBe(filePath);
    expect(await readFile(filePath, 'utf8')).toBe(`${tableToCsv(table)}\n`);
  });
});

describe('copyTable', () => {
  it('copies rows so edits do not leak back', () => {
    const copy = copyTable(table);
    copy.rows[0].id = 'changed';
    copy.columns.push('extra');

    expect(table.rows[0].id).toBe('e1');
    expect(table.columns).toEqual(['id', 'title', 'published']);
  });

  it('does not share dates with the source', () => {
    const copy = copyTable(table);
    copy.rows[0].published?.setUTCFullYear(1999);

    expect(copy.rows[0].published).toBeInstanceOf(Date);
    expect(table.rows[0].published?.toISOString()).toBe('2024-03-01T10:00:00.000Z');
  });
});
