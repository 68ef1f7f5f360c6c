import { vi } from 'vitest';
import type { ApiRecord, ListEntriesParams } from '@libs/regfeeds-client';
import type { FeedsApi } from '../entrySources';

export interface FakeFeedsData {
  topics?: ApiRecord[];
  feeds?: ApiRecord[];
  entriesByFeed?: Record<string, ApiRecord[]>;
  entriesByTopic?: Record<string, ApiRecord[]>;
  allEntries?: ApiRecord[];
}

/** In-memory stand-in for the API client, with every endpoint spied. */
export function createFakeFeedsApi(data: FakeFeedsData = {}) {
  return {
    listTopics: vi.fn(async (): Promise<ApiRecord[]> => data.topics ?? []),
    listFeeds: vi.fn(async (): Promise<ApiRecord[]> => data.feeds ?? []),
    listEntries: vi.fn(
      async (_params?: ListEntriesParams): Promise<ApiRecord[]> => data.allEntries ?? [],
    ),
    getFeedEntries: vi.fn(
      async (feedId: string, _limit?: number): Promise<ApiRecord[]> =>
        data.entriesByFeed?.[feedId] ?? [],
    ),
    getTopicEntries: vi.fn(
      async (topicId: string, _limit?: number): Promise<ApiRecord[]> =>
        data.entriesByTopic?.[topicId] ?? [],
    ),
  } satisfies FeedsApi;
}

export const TOPICS: ApiRecord[] = [
  {
    id: 't1',
    name: 'Banking',
    description: 'Bank supervision',
    is_active: true,
    created_at: '2024-01-01T00:00:00Z',
  },
  { id: 't2', name: 'Securities', description: 'Market conduct', is_active: true },
];

export const FEEDS: ApiRecord[] = [
  {
    id: 'f1',
    name: 'Central Bank Notices',
    url: 'https://feeds.example.test/f1',
    topic: { id: 't1', name: 'Banking' },
    is_active: true,
  },
  {
    id: 'f2',
    name: 'Market Bulletins',
    url: 'https://feeds.example.test/f2',
    topic: { id: 't2', name: 'Securities' },
    is_active: false,
  },
  { id: 'f9', name: 'Orphan Feed', url: 'https://feeds.example.test/f9', topic_id: 'missing' },
];

export const F1_ENTRIES: ApiRecord[] = [
  {
    id: 'e1',
    title: 'Capital adequacy update',
    link: 'https://example.test/e1',
    published_date: '2024-03-01T10:00:00',
    is_active: true,
    extracted_metadata: { status: 'extracted', s3_content_md_path: 's3://regfeeds-content/e1.md' },
  },
  {
    id: 'e2',
    title: 'Liquidity guidance',
    link: 'https://example.test/e2',
    published_date: '2024-03-05T09:30:00',
    is_active: false,
    extracted_metadata: { status: 'extracted', s3_content_md_path: 's3://regfeeds-content/e2.md' },
  },
];

export const F2_ENTRIES: ApiRecord[] = [
  {
    id: 'e3',
    title: 'Disclosure rule',
    link: 'https://example.test/e3',
    published_date: '2024-04-01T00:00:00',
    is_active: true,
  },
];
