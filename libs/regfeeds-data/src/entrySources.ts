import type { ApiRecord, RegFeedsClient } from '@libs/regfeeds-client';
import { extractMetadataFields } from './entryMetadata';
import type { Row } from './types';

/** The slice of the API client the data layer depends on. */
export type FeedsApi = Pick<
  RegFeedsClient,
  'listTopics' | 'listFeeds' | 'listEntries' | 'getFeedEntries' | 'getTopicEntries'
>;

/**
 * One way of addressing entries. Each source fetches raw records and says
 * which feed id, if any, must be stamped on records the endpoint leaves bare.
 */
export interface EntrySource {
  readonly label: string;
  readonly injectedFeedId?: string;
  fetch(api: FeedsApi): Promise<ApiRecord[]>;
}

/** Entries of one feed; the endpoint does not echo the feed id. */
export class FeedEntrySource implements EntrySource {
  readonly label: string;
  readonly injectedFeedId: string;

  constructor(feedId: string, private readonly limit: number) {
    this.label = `feed ${feedId}`;
    this.injectedFeedId = feedId;
  }

  fetch(api: FeedsApi): Promise<ApiRecord[]> {
    return api.getFeedEntries(this.injectedFeedId, this.limit);
  }
}

/** Entries across one topic's feeds; records already carry their feed id. */
export class TopicEntrySource implements EntrySource {
  readonly label: string;

  constructor(private readonly topicId: string, private readonly limit: number) {
    this.label = `topic ${topicId}`;
  }

  fetch(api: FeedsApi): Promise<ApiRecord[]> {
    return api.getTopicEntries(this.topicId, this.limit);
  }
}

/** Every entry, paginated. Records carry no feed or topic id at all. */
export class AllEntriesSource implements EntrySource {
  readonly label = 'all entries';

  constructor(
    private readonly options: { isActive?: boolean; fetchAll: boolean; pageSize?: number },
  ) {}

  fetch(api: FeedsApi): Promise<ApiRecord[]> {
    return api.listEntries({
      isActive: this.options.isActive,
      fetchAll: this.options.fetchAll,
      pageSize: this.options.pageSize,
    });
  }
}

export interface EntrySelection {
  feedId?: string;
  topicId?: string;
  isActive?: boolean;
  fetchAll?: boolean;
}

/** Feed id wins over topic id; neither means the unfiltered listing. */
export function selectEntrySource(selection: EntrySelection, limit: number): EntrySource {
  if (selection.feedId) {
    return new FeedEntrySource(selection.feedId, limit);
  }
  if (selection.topicId) {
    return new TopicEntrySource(selection.topicId, limit);
  }
  return new AllEntriesSource({
    isActive: selection.isActive,
    fetchAll: selection.fetchAll ?? true,
    pageSize: limit,
  });
}

/**
 * Fetches through `source` and runs the shared post-processing: feed id
 * injection where the source requires it, then metadata lifting.
 */
export async function fetchEntryRecords(api: FeedsApi, source: EntrySource): Promise<Row[]> {
  const records = await source.fetch(api);
  const feedId = source.injectedFeedId;

  return records.map((record) =>
    extractMetadataFields(feedId === undefined ? record : { ...record, feed_id: feedId }, {
      fallbackFeedId: feedId,
    }),
  );
}
