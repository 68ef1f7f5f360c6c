/**
 * @libs/regfeeds-data
 *
 * Tabular views over the regulatory-feed API: normalized topic, feed and entry
 * tables, the joined topic → feed → entry hierarchy, and optional hydration of
 * entry bodies from object storage.
 *
 * ## Usage
 *
 * ```typescript
 * import { createFeedsDataManager } from '@libs/regfeeds-data';
 *
 * const manager = createFeedsDataManager();
 * const topics = await manager.getTopics();
 * const view = await manager.getHierarchicalView({ topicId: 'topic-1' });
 * ```
 */

export {
  FeedsDataManager,
  createFeedsDataManager,
  emptyHierarchicalTable,
  toTopic,
  toFeed,
  toNormalizedEntry,
  toHierarchicalRow,
  toTopicFeedRow,
} from './feedsDataManager';
export type {
  FeedsDataManagerOptions,
  CreateFeedsDataManagerOptions,
  ContentOptions,
  GetEntriesOptions,
  HierarchicalViewOptions,
} from './feedsDataManager';

export {
  normalizeRecords,
  emptyTable,
  renameColumns,
  mapColumn,
  concatTables,
} from './normalize';

export { extractMetadataFields, reconcilePublishedDate } from './entryMetadata';
export type { MetadataExtractionOptions } from './entryMetadata';

export {
  FeedEntrySource,
  TopicEntrySource,
  AllEntriesSource,
  selectEntrySource,
  fetchEntryRecords,
} from './entrySources';
export type { EntrySource, EntrySelection, FeedsApi } from './entrySources';

export {
  StorageError,
  StorageCredentialsError,
  StorageFetchError,
  DEFAULT_PATH_COLUMN,
  hydrateContent,
  fetchContents,
  resolveContentClient,
  noContentClient,
} from './contentHydration';
export type {
  ContentBatchFetcher,
  ContentClientFactory,
  FetchContentsOptions,
  HydrationOptions,
} from './contentHydration';

export {
  parseStoragePath,
  MAX_STORAGE_PATH_LENGTH,
  DEFAULT_MAX_CONTENT_BYTES,
} from './storagePath';
export type { StorageLocation } from './storagePath';

export { toDate, asString, asBoolean, isRecord } from './values';

export {
  TOPIC_COLUMNS,
  FEED_COLUMNS,
  ENTRY_COLUMNS,
  HIERARCHY_ENTRY_COLUMNS,
  TOPIC_PREFIX_RENAMES,
  FEED_PREFIX_RENAMES,
  ENTRY_PREFIX_RENAMES,
} from './types';
export type {
  Row,
  Table,
  Topic,
  Feed,
  NormalizedEntry,
  HierarchicalRow,
  TopicFeedRow,
} from './types';
