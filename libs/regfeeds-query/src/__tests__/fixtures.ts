import { vi } from 'vitest';
import type { ApiRecord, ListEntriesParams } from '@libs/regfeeds-client';
import { FeedsDataManager } from '@libs/regfeeds-data';
import type { FeedsApi } from '@libs/regfeeds-data';

const TOPICS: ApiRecord[] = [
  { id: 't1', name: 'Banking', description: 'Bank supervision' },
  { id: 't2', name: 'Securities', description: 'Market conduct' },
  { id: 't3', name: 'Insurance', description: 'Insurer solvency' },
];

const FEEDS: ApiRecord[] = [
  { id: 'f1', name: 'Central Bank Notices', topic: { id: 't1', name: 'Banking' } },
  { id: 'f2', name: 'Market Bulletins', topic: { id: 't2', name: 'Securities' } },
  { id: 'f3', name: 'Insurance Circulars', topic: { id: 't3', name: 'Insurance' } },
];

const ENTRIES_BY_FEED: Record<string, ApiRecord[]> = {
  f1: [
    {
      id: 'e1',
      title: 'Capital adequacy update',
      published_at: '2024-03-01T10:00:00',
      is_active: true,
      extracted_metadata: { s3_content_md_path: 's3://regfeeds-content/e1.md' },
    },
    {
      id: 'e2',
      title: 'Liquidity guidance',
      published_at: '2024-03-05T09:30:00',
      is_active: false,
      extracted_metadata: { s3_content_md_path: 's3://regfeeds-content/e2.md' },
    },
    { id: 'e4', title: 'Capital and liquidity note', published_at: null, is_active: true },
  ],
  f2: [{ id: 'e3', title: 'Disclosure rule', published_at: '2024-04-01T00:00:00Z', is_active: true }],
  f3: [{ id: 'e5', title: 'Solvency capital', published_at: '2024-02-01', is_active: true }],
};

export function createFakeFeedsApi() {
  return {
    listTopics: vi.fn(async (): Promise<ApiRecord[]> => TOPICS),
    listFeeds: vi.fn(async (): Promise<ApiRecord[]> => FEEDS),
    listEntries: vi.fn(async (_params?: ListEntriesParams): Promise<ApiRecord[]> => []),
    getFeedEntries: vi.fn(
      async (feedId: string, _limit?: number): Promise<ApiRecord[]> => ENTRIES_BY_FEED[feedId] ?? [],
    ),
    getTopicEntries: vi.fn(async (_topicId: string, _limit?: number): Promise<ApiRecord[]> => []),
  } satisfies FeedsApi;
}

export function createManager() {
  const api = createFakeFeedsApi();
  return { api, manager: new FeedsDataManager(api) };
}
