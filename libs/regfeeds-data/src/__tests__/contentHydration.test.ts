import { describe, expect, it, vi } from 'vitest';
import {
  StorageCredentialsError,
  StorageFetchError,
  fetchContents,
  hydrateContent,
} from '../contentHydration';
import type { ContentBatchFetcher } from '../contentHydration';

const table = {
  columns: ['id', 's3_content_md_path', 'content_markdown'],
  rows: [
    { id: 'e1', s3_content_md_path: 's3://regfeeds-content/a.md', content_markdown: 'inline' },
    { id: 'e2', s3_content_md_path: 's3://regfeeds-content/b.md', content_markdown: null },
    { id: 'e3', s3_content_md_path: 's3://regfeeds-content/a.md', content_markdown: null },
    { id: 'e4', s3_content_md_path: null, content_markdown: null },
  ],
};

const createFetcher = (contents: Record<string, string | null>) => {
  const fetchContentBatch = vi.fn(
    async (_paths: string[]): Promise<Record<string, string | null>> => contents,
  );
  return { fetchContentBatch } satisfies ContentBatchFetcher;
};

describe('hydrateContent', () => {
  it('creates an empty body column when content is not requested', async () => {
    const result = await hydrateContent(
      { columns: ['id'], rows: [{ id: 'e1' }] },
      { fetchContent: false },
    );

    expect(result.columns).toEqual(['id', 'content_markdown']);
    expect(result.rows).toEqual([{ id: 'e1', content_markdown: null }]);
  });

  it('warns and leaves bodies empty when no client can be built', async () => {
    const warn = vi.fn();
    const result = await hydrateContent(table, {
      fetchContent: true,
      clientFactory: () => null,
      logger: { warn },
    });

    expect(result.rows.map((row) => row.content_markdown)).toEqual([null, null, null, null]);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('treats rejected credentials as no client', async () => {
    const result = await hydrateContent(table, {
      fetchContent: true,
      clientFactory: () => {
        throw new StorageCredentialsError('no credentials');
      },
    });

    expect(result.rows.every((row) => row.content_markdown === null)).toBe(true);
  });

  it('fills one body and leaves the unresolved one null', async () => {
    const fetcher = createFetcher({
      's3://regfeeds-content/b.md': null,
      's3://regfeeds-content/a.md': '# A',
    });
    const twoPaths = { columns: table.columns, rows: table.rows.slice(0, 2) };

    const result = await hydrateContent(twoPaths, { fetchContent: true, client: fetcher });

    const bodies = result.rows.map((row) => row.content_markdown);
    expect(bodies.filter((body) => body !== null)).toEqual(['# A']);
    expect(bodies.filter((body) => body === null)).toHaveLength(1);
    expect(result.rows.find((row) => row.id === 'e2')?.content_markdown).toBeNull();
  });
});

describe('fetchContents', () => {
  it('fetches distinct paths once and broadcasts by path', async () => {
    const fetcher = createFetcher({ 's3://regfeeds-content/a.md': '# A' });

    const result = await fetchContents(table, fetcher, { bodyColumn: 'content_markdown' });

    expect(fetcher.fetchContentBatch).toHaveBeenCalledTimes(1);
    expect([...fetcher.fetchContentBatch.mock.calls[0][0]].sort()).toEqual([
      's3://regfeeds-content/a.md',
      's3://regfeeds-content/b.md',
    ]);
    expect(result.rows.map((row) => row.content_markdown)).toEqual(['# A', null, '# A', null]);
  });

  it('does not call the client when no row has a path', async () => {
    const fetcher = createFetcher({});

    const result = await fetchContents(
      { columns: ['id'], rows: [{ id: 'e1', s3_content_md_path: null }] },
      fetcher,
    );

    expect(fetcher.fetchContentBatch).not.toHaveBeenCalled();
    expect(result.rows[0].content_markdown).toBeNull();
  });

  it('skips malformed paths', async () => {
    const fetcher = createFetcher({});
    const warn = vi.fn();

    await fetchContents(
      {
        columns: ['s3_content_md_path'],
        rows: [{ s3_content_md_path: 'not-a-path' }, { s3_content_md_path: 's3://regfeeds-content/a.md' }],
      },
      fetcher,
      { logger: { warn } },
    );

    expect(fetcher.fetchContentBatch).toHaveBeenCalledWith(['s3://regfeeds-content/a.md']);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('degrades a failed batch to null bodies', async () => {
    const fetcher = createFetcher({});
    fetcher.fetchContentBatch.mockRejectedValueOnce(
      new StorageFetchError('denied', 's3://regfeeds-content/a.md'),
    );

    const result = await fetchContents(table, fetcher);

    expect(result.rows.every((row) => row.content_markdown === null)).toBe(true);
  });

  it('discards bodies over the byte ceiling', async () => {
    const warn = vi.fn();
    const client = createFetcher({
      's3://regfeeds-content/a.md': 'tiny',
      's3://regfeeds-content/b.md': 'too large',
    });

    const result = await fetchContents(table, client, { maxContentBytes: 4, logger: { warn } });

    expect(result.rows.map((row) => row.content_markdown)).toEqual(['tiny', null, 'tiny', null]);
    expect(warn).toHaveBeenCalledWith(
      '[fetchContents] Discarding s3://regfeeds-content/b.md: 9 bytes exceeds 4',
    );
  });
});
