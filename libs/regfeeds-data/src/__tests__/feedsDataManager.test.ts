import { describe, expect, it, vi } from 'vitest';
import { ApiError } from '@libs/regfeeds-client';
import { FeedsDataManager } from '../feedsDataManager';
import type { ContentBatchFetcher } from '../contentHydration';
import { F1_ENTRIES, F2_ENTRIES, FEEDS, TOPICS, createFakeFeedsApi } from './fakeFeedsApi';

const createApi = () =>
  createFakeFeedsApi({
    topics: TOPICS,
    feeds: FEEDS,
    entriesByFeed: { f1: F1_ENTRIES, f2: F2_ENTRIES },
    entriesByTopic: { t1: F1_ENTRIES.map((entry) => ({ ...entry, feed_id: 'f1' })) },
    allEntries: [...F1_ENTRIES, ...F2_ENTRIES],
  });

describe('FeedsDataManager.getTopics / getFeeds', () => {
  it('types topic fields', async () => {
    const manager = new FeedsDataManager(createApi());

    const topics = await manager.getTopics();

    expect(topics.columns).toEqual(['id', 'name', 'description', 'created_at', 'updated_at', 'is_active']);
    expect(topics.rows[0].created_at).toEqual(new Date('2024-01-01T00:00:00Z'));
    expect(topics.rows[1].created_at).toBeNull();
  });

  it('flattens the nested topic and filters feeds client-side', async () => {
    const manager = new FeedsDataManager(createApi());

    const feeds = await manager.getFeeds('t2');

    expect(feeds.rows).toHaveLength(1);
    expect(feeds.rows[0]).toMatchObject({
      id: 'f2',
      topic_id: 't2',
      topic_name: 'Securities',
      is_active: false,
    });
  });
});

describe('FeedsDataManager.getEntries', () => {
  it('normalizes feed-scoped entries', async () => {
    const manager = new FeedsDataManager(createApi());

    const entries = await manager.getEntries({ feedId: 'f1' });

    expect(entries.rows).toHaveLength(2);
    expect(entries.rows[0]).toMatchObject({
      id: 'e1',
      feed_id: 'f1',
      content_status: 'extracted',
      s3_content_md_path: 's3://regfeeds-content/e1.md',
      content_markdown: null,
      is_active: true,
    });
    expect(entries.rows[0].published_at).toEqual(new Date('2024-03-01T10:00:00Z'));
  });

  it('uses the topic endpoint when only a topic id is given', async () => {
    const api = createApi();
    const manager = new FeedsDataManager(api);

    const entries = await manager.getEntries({ topicId: 't1' });

    expect(api.getTopicEntries).toHaveBeenCalledTimes(1);
    expect(api.getFeedEntries).not.toHaveBeenCalled();
    expect(entries.rows.map((row) => row.feed_id)).toEqual(['f1', 'f1']);
  });

  it('returns the entry columns for an empty result', async () => {
    const manager = new FeedsDataManager(createFakeFeedsApi());

    const entries = await manager.getEntries();

    expect(entries.rows).toEqual([]);
    expect(entries.columns).toContain('s3_aggregated_content_md_path');
    expect(entries.columns).toContain('published_at');
  });
});

describe('FeedsDataManager.getHierarchicalView', () => {
  it('assembles one row per entry with topic and feed names', async () => {
    const api = createApi();
    const manager = new FeedsDataManager(api);

    const view = await manager.getHierarchicalView({ topicId: 't1' });

    expect(view.rows).toHaveLength(2);
    for (const row of view.rows) {
      expect(row.topic_name).toBe('Banking');
      expect(row.feed_name).toBe('Central Bank Notices');
      expect(row.feed_id).toBe('f1');
    }
    expect(view.rows.map((row) => row.entry_id)).toEqual(['e1', 'e2']);
    expect(view.rows[1].entry_is_active).toBe(false);
    expect(view.rows[0].entry_published_at).toEqual(new Date('2024-03-01T10:00:00Z'));
    expect(api.getFeedEntries).toHaveBeenCalledTimes(1);
    expect(api.getFeedEntries).toHaveBeenCalledWith('f1', 1000);
  });

  it('drops feeds whose topic is unknown and logs them', async () => {
    const info = vi.fn();
    const api = createApi();
    const manager = new FeedsDataManager(api, { logger: { info } });

    const view = await manager.getHierarchicalView();

    expect(view.rows.map((row) => row.entry_id)).toEqual(['e1', 'e2', 'e3']);
    expect(api.getFeedEntries).not.toHaveBeenCalledWith('f9', expect.anything());
    expect(info).toHaveBeenCalledWith('[FeedsDataManager] Dropped 1 feeds with no matching topic', {
      unmatched: 1,
    });
  });

  it('applies the feed filter before fetching entries', async () => {
    const api = createApi();
    const manager = new FeedsDataManager(api);

    const view = await manager.getHierarchicalView({ feedId: 'f2', topicId: 't1' });

    expect(view.rows.map((row) => row.entry_id)).toEqual(['e3']);
    expect(api.getFeedEntries).toHaveBeenCalledTimes(1);
  });

  it('returns the topic and feed join without entries', async () => {
    const api = createApi();
    const manager = new FeedsDataManager(api);

    const view = await manager.getHierarchicalView({ includeEntries: false });

    expect(view.rows.map((row) => [row.topic_name, row.feed_name])).toEqual([
      ['Banking', 'Central Bank Notices'],
      ['Securities', 'Market Bulletins'],
    ]);
    expect(api.getFeedEntries).not.toHaveBeenCalled();
  });

  it('returns an empty table when no feed survives the filter', async () => {
    const manager = new FeedsDataManager(createApi());

    const view = await manager.getHierarchicalView({ topicId: 'unknown' });

    expect(view.rows).toEqual([]);
    expect(view.columns).toContain('entry_title');
    expect(view.columns).toContain('topic_name');
  });

  it('hydrates entry bodies through the content client', async () => {
    const fetchContentBatch = vi.fn(
      async (_paths: string[]): Promise<Record<string, string | null>> => ({
        's3://regfeeds-content/e1.md': '# Capital',
        's3://regfeeds-content/e2.md': null,
      }),
    );
    const client: ContentBatchFetcher = { fetchContentBatch };
    const manager = new FeedsDataManager(createApi());

    const view = await manager.getHierarchicalView({
      topicId: 't1',
      fetchContent: true,
      contentClient: client,
    });

    expect(view.rows.map((row) => row.entry_content_markdown)).toEqual(['# Capital', null]);
  });

  it('passes API errors through unchanged', async () => {
    const api = createApi();
    const upstream = new ApiError('upstream failure', 500);
    api.listTopics.mockRejectedValueOnce(upstream);
    const manager = new FeedsDataManager(api);

    await expect(manager.getHierarchicalView()).rejects.toBe(upstream);
  });

  it('wraps unexpected failures with context', async () => {
    const api = createApi();
    api.listFeeds.mockRejectedValueOnce(new TypeError('bad shape'));
    const manager = new FeedsDataManager(api);

    const error = await manager.getHierarchicalView().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ApiError);
    expect(error).toMatchObject({
      message: 'Hierarchical view construction failed: bad shape',
    });
  });
});

describe('FeedsDataManager.fetchContents', () => {
  it('returns the table unchanged when no client is available', async () => {
    const warn = vi.fn();
    const manager = new FeedsDataManager(createApi(), { logger: { warn } });
    const view = await manager.getHierarchicalView({ topicId: 't1' });

    const result = await manager.fetchContents(view);

    expect(result).toBe(view);
    expect(warn).toHaveBeenCalledTimes(1);
  });
});
