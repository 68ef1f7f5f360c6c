import type { Logger } from '@libs/http-client-core';
import { ConsoleLogger } from '@libs/http-client-core';
import {
  ApiError,
  DEFAULT_PAGE_SIZE,
  createRegFeedsClientFromEnv,
} from '@libs/regfeeds-client';
import type { RegFeedsClientConfig } from '@libs/regfeeds-client';
import {
  DEFAULT_PATH_COLUMN,
  fetchContents,
  hydrateContent,
  noContentClient,
  resolveContentClient,
} from './contentHydration';
import type { ContentBatchFetcher, ContentClientFactory } from './contentHydration';
import { reconcilePublishedDate } from './entryMetadata';
import { FeedEntrySource, fetchEntryRecords, selectEntrySource } from './entrySources';
import type { EntrySelection, FeedsApi } from './entrySources';
import { emptyTable, normalizeRecords, renameColumns } from './normalize';
import {
  ENTRY_COLUMNS,
  ENTRY_PREFIX_RENAMES,
  FEED_COLUMNS,
  FEED_PREFIX_RENAMES,
  HIERARCHY_ENTRY_COLUMNS,
  TOPIC_COLUMNS,
  TOPIC_PREFIX_RENAMES,
} from './types';
import type {
  Feed,
  HierarchicalRow,
  NormalizedEntry,
  Row,
  Table,
  Topic,
  TopicFeedRow,
} from './types';
import { asBoolean, asString, isRecord, toDate } from './values';

export interface FeedsDataManagerOptions {
  logger?: Logger;
  /** Used when content is requested without an explicit client. */
  contentClientFactory?: ContentClientFactory;
  /** Entry limit for feed- and topic-scoped fetches, and page size otherwise. */
  fetchLimit?: number;
}

export interface ContentOptions {
  fetchContent?: boolean;
  contentClient?: ContentBatchFetcher | null;
}

export interface GetEntriesOptions extends EntrySelection, ContentOptions {}

export interface HierarchicalViewOptions extends ContentOptions {
  includeEntries?: boolean;
  feedId?: string;
  topicId?: string;
}

const HIERARCHY_BODY_COLUMN = 'entry_content_markdown';

/**
 * Turns API records into typed tables and assembles the topic → feed → entry
 * hierarchy.
 */
export class FeedsDataManager {
  private readonly logger?: Logger;
  private readonly contentClientFactory: ContentClientFactory;
  private readonly fetchLimit: number;

  constructor(
    private readonly api: FeedsApi,
    options: FeedsDataManagerOptions = {},
  ) {
    this.logger = options.logger;
    this.contentClientFactory = options.contentClientFactory ?? noContentClient;
    this.fetchLimit = options.fetchLimit ?? DEFAULT_PAGE_SIZE;
  }

  async getTopics(): Promise<Table<Topic>> {
    return this.convert('Data conversion failed:', async () =>
      typed(await this.topicTable(), toTopic),
    );
  }

  /** All feeds, or those of one topic. The API cannot filter feeds itself. */
  async getFeeds(topicId?: string): Promise<Table<Feed>> {
    return this.convert('Data conversion failed:', async () =>
      typed(await this.feedTable(topicId), toFeed),
    );
  }

  /**
   * Entries by feed, by topic, or unfiltered (feed id wins over topic id).
   * Bodies are filled from storage only when `fetchContent` is set.
   */
  async getEntries(options: GetEntriesOptions = {}): Promise<Table<NormalizedEntry>> {
    return this.convert('Data conversion failed:', async () => {
      const source = selectEntrySource(options, this.fetchLimit);
      this.logger?.info?.(`[FeedsDataManager] Fetching entries for ${source.label}`);

      const records = await fetchEntryRecords(this.api, source);
      const table = reconcilePublishedDate(
        normalizeRecords(records, ENTRY_COLUMNS, this.logger),
      );
      const hydrated = await hydrateContent(table, {
        fetchContent: options.fetchContent ?? false,
        client: options.contentClient,
        clientFactory: this.contentClientFactory,
        pathColumn: DEFAULT_PATH_COLUMN,
        bodyColumn: 'content_markdown',
        logger: this.logger,
      });
      return typed(hydrated, toNormalizedEntry);
    });
  }

  /**
   * Topic + Feed (+ Entry) rows with `topic_`, `feed_` and `entry_` column
   * prefixes. Feeds whose topic is unknown are dropped. The feed or topic
   * filter is applied before any entry is fetched, and entries are fetched
   * per surviving feed so each row carries its parents' fields.
   */
  getHierarchicalView(
    options: HierarchicalViewOptions & { includeEntries: false },
  ): Promise<Table<TopicFeedRow>>;
  getHierarchicalView(
    options?: HierarchicalViewOptions & { includeEntries?: true },
  ): Promise<Table<HierarchicalRow>>;
  getHierarchicalView(
    options?: HierarchicalViewOptions,
  ): Promise<Table<HierarchicalRow> | Table<TopicFeedRow>>;
  async getHierarchicalView(
    options: HierarchicalViewOptions = {},
  ): Promise<Table<HierarchicalRow> | Table<TopicFeedRow>> {
    return this.convert('Hierarchical view construction failed:', async () => {
      const joined = filterTopicFeeds(await this.joinTopicsAndFeeds(), options);

      if (options.includeEntries === false) {
        return typed(joined, toTopicFeedRow);
      }
      return this.assembleEntries(joined, options);
    });
  }

  /**
   * Fills `entry_content_markdown` of an assembled hierarchy. Without a client,
   * explicit or from the factory, the table comes back unchanged.
   */
  async fetchContents(
    table: Table<HierarchicalRow>,
    client?: ContentBatchFetcher | null,
  ): Promise<Table<HierarchicalRow>> {
    const resolved = this.contentClient(client);
    if (!resolved) {
      this.logger?.warn?.(
        '[FeedsDataManager] No storage client available; content was not fetched. Check storage credentials.',
      );
      return table;
    }
    const hydrated = await fetchContents(table, resolved, {
      pathColumn: DEFAULT_PATH_COLUMN,
      bodyColumn: HIERARCHY_BODY_COLUMN,
      logger: this.logger,
    });
    return typed(hydrated, toHierarchicalRow);
  }

  /** The explicit client if given, otherwise whatever the factory supplies. */
  contentClient(client?: ContentBatchFetcher | null): ContentBatchFetcher | null {
    return resolveContentClient(client, this.contentClientFactory, this.logger);
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private async topicTable(): Promise<Table> {
    const records = await this.api.listTopics();
    this.logger?.info?.(`[FeedsDataManager] Retrieved ${records.length} topics`);
    return normalizeRecords(records, TOPIC_COLUMNS, this.logger);
  }

  private async feedTable(topicId?: string): Promise<Table> {
    const records = (await this.api.listFeeds()).map(flattenFeedTopic);
    const selected =
      topicId === undefined
        ? records
        : records.filter((record) => asString(record.topic_id) === topicId);
    this.logger?.info?.(`[FeedsDataManager] Retrieved ${selected.length} feeds`, { topicId });
    return normalizeRecords(selected, FEED_COLUMNS, this.logger);
  }

  /** Inner join of feeds onto topics by topic id; topic fields win. */
  private async joinTopicsAndFeeds(): Promise<Table> {
    const topics = renameColumns(await this.topicTable(), TOPIC_PREFIX_RENAMES);
    const feeds = renameColumns(await this.feedTable(), FEED_PREFIX_RENAMES);

    const topicsById = new Map<string, Row>();
    for (const topic of topics.rows) {
      const id = asString(topic.topic_id);
      if (id !== null) {
        topicsById.set(id, topic);
      }
    }

    const rows: Row[] = [];
    let unmatched = 0;
    for (const feed of feeds.rows) {
      const topicId = asString(feed.topic_id);
      const topic = topicId === null ? undefined : topicsById.get(topicId);
      if (!topic) {
        unmatched += 1;
        continue;
      }
      rows.push({ ...feed, ...topic });
    }

    if (unmatched > 0) {
      this.logger?.info?.(
        `[FeedsDataManager] Dropped ${unmatched} feeds with no matching topic`,
        { unmatched },
      );
    }

    const columns = [
      ...topics.columns,
      ...feeds.columns.filter((column) => !topics.columns.includes(column)),
    ];
    return { columns, rows };
  }

  private async assembleEntries(
    joined: Table,
    options: HierarchicalViewOptions,
  ): Promise<Table<HierarchicalRow>> {
    if (joined.rows.length === 0) {
      this.logger?.info?.('[FeedsDataManager] No feeds left after filtering');
      return emptyHierarchicalTable();
    }

    const entries: Row[] = [];
    for (const parent of joined.rows) {
      const feedId = asString(parent.feed_id);
      if (feedId === null) {
        continue;
      }
      const records = await fetchEntryRecords(this.api, new FeedEntrySource(feedId, this.fetchLimit));
      for (const record of records) {
        entries.push({ ...record, ...parentFields(parent) });
      }
    }

    if (entries.length === 0) {
      this.logger?.info?.('[FeedsDataManager] No entries found for the selected feeds');
      return emptyHierarchicalTable();
    }

    this.logger?.info?.(
      `[FeedsDataManager] Assembled ${entries.length} entries across ${joined.rows.length} feeds`,
    );

    const table = renameColumns(
      reconcilePublishedDate(normalizeRecords(entries, HIERARCHY_ENTRY_COLUMNS, this.logger)),
      ENTRY_PREFIX_RENAMES,
    );
    const hydrated = await hydrateContent(table, {
      fetchContent: options.fetchContent ?? false,
      client: options.contentClient,
      clientFactory: this.contentClientFactory,
      pathColumn: DEFAULT_PATH_COLUMN,
      bodyColumn: HIERARCHY_BODY_COLUMN,
      logger: this.logger,
    });
    return typed(hydrated, toHierarchicalRow);
  }

  private async convert<T>(prefix: string, work: () => Promise<T>): Promise<T> {
    try {
      return await work();
    } catch (error) {
      if (error instanceof ApiError) {
        throw error;
      }
      const reason = error instanceof Error ? error.message : String(error);
      this.logger?.error?.(`[FeedsDataManager] ${prefix} ${reason}`);
      throw new ApiError(`${prefix} ${reason}`, 0, undefined, { cause: error });
    }
  }
}

// ============================================================================
// Joins and filters
// ============================================================================

function filterTopicFeeds(table: Table, options: HierarchicalViewOptions): Table {
  if (options.feedId) {
    const feedId = options.feedId;
    return { ...table, rows: table.rows.filter((row) => asString(row.feed_id) === feedId) };
  }
  if (options.topicId) {
    const topicId = options.topicId;
    return { ...table, rows: table.rows.filter((row) => asString(row.topic_id) === topicId) };
  }
  return table;
}

/** The feed and topic fields stamped onto each of a feed's entries. */
function parentFields(parent: Row): Row {
  return {
    feed_id: parent.feed_id ?? null,
    feed_name: parent.feed_name ?? null,
    feed_url: parent.feed_url ?? null,
    feed_is_active: parent.feed_is_active ?? null,
    topic_id: parent.topic_id ?? null,
    topic_name: parent.topic_name ?? null,
    topic_description: parent.topic_description ?? null,
    topic_is_active: parent.topic_is_active ?? null,
  };
}

/** Lifts a nested `topic: { id, name }` object to `topic_id` / `topic_name`. */
function flattenFeedTopic(record: Row): Row {
  const { topic, ...rest } = record;
  if (!isRecord(topic)) {
    return record;
  }
  return {
    ...rest,
    topic_id: asString(topic.id) ?? asString(record.topic_id),
    topic_name: asString(topic.name) ?? asString(record.topic_name),
  };
}

/** The hierarchy columns with no rows. */
export function emptyHierarchicalTable(): Table<HierarchicalRow> {
  const table = renameColumns(emptyTable(HIERARCHY_ENTRY_COLUMNS), ENTRY_PREFIX_RENAMES);
  return { columns: table.columns, rows: [] };
}

// ============================================================================
// Row converters
// ============================================================================

function typed<R extends Row>(table: Table, convert: (row: Row) => R): Table<R> {
  return { columns: [...table.columns], rows: table.rows.map(convert) };
}

export function toTopic(row: Row): Topic {
  return {
    ...row,
    id: asString(row.id),
    name: asString(row.name),
    description: asString(row.description),
    is_active: asBoolean(row.is_active),
    created_at: toDate(row.created_at),
    updated_at: toDate(row.updated_at),
  };
}

export function toFeed(row: Row): Feed {
  return {
    ...row,
    id: asString(row.id),
    name: asString(row.name),
    url: asString(row.url),
    topic_id: asString(row.topic_id),
    topic_name: asString(row.topic_name),
    description: asString(row.description),
    created_at: toDate(row.created_at),
    is_active: asBoolean(row.is_active),
  };
}

export function toNormalizedEntry(row: Row): NormalizedEntry {
  return {
    ...row,
    id: asString(row.id),
    title: asString(row.title),
    link: asString(row.link),
    content_markdown: asString(row.content_markdown),
    feed_id: asString(row.feed_id),
    topic_id: asString(row.topic_id),
    published_at: toDate(row.published_at),
    created_at: toDate(row.created_at),
    is_active: asBoolean(row.is_active),
    content_status: asString(row.content_status),
    content_timestamp: asString(row.content_timestamp),
    s3_content_md_path: asString(row.s3_content_md_path),
    s3_content_html_path: asString(row.s3_content_html_path),
    s3_aggregated_content_md_path: asString(row.s3_aggregated_content_md_path),
  };
}

export function toHierarchicalRow(row: Row): HierarchicalRow {
  return {
    ...row,
    topic_id: asString(row.topic_id),
    topic_name: asString(row.topic_name),
    topic_description: asString(row.topic_description),
    topic_is_active: asBoolean(row.topic_is_active),
    feed_id: asString(row.feed_id),
    feed_name: asString(row.feed_name),
    feed_url: asString(row.feed_url),
    feed_is_active: asBoolean(row.feed_is_active),
    entry_id: asString(row.entry_id),
    entry_title: asString(row.entry_title),
    entry_link: asString(row.entry_link),
    entry_content_markdown: asString(row.entry_content_markdown),
    entry_published_at: toDate(row.entry_published_at),
    entry_created_at: toDate(row.entry_created_at),
    entry_is_active: asBoolean(row.entry_is_active),
    entry_content_status: asString(row.entry_content_status),
    entry_content_timestamp: asString(row.entry_content_timestamp),
    s3_content_md_path: asString(row.s3_content_md_path),
    s3_content_html_path: asString(row.s3_content_html_path),
    s3_aggregated_content_md_path: asString(row.s3_aggregated_content_md_path),
  };
}

export function toTopicFeedRow(row: Row): TopicFeedRow {
  return {
    ...row,
    topic_id: asString(row.topic_id),
    topic_name: asString(row.topic_name),
    topic_description: asString(row.topic_description),
    topic_created_at: toDate(row.topic_created_at),
    topic_updated_at: toDate(row.topic_updated_at),
    topic_is_active: asBoolean(row.topic_is_active),
    feed_id: asString(row.feed_id),
    feed_name: asString(row.feed_name),
    feed_url: asString(row.feed_url),
    feed_description: asString(row.feed_description),
    feed_created_at: toDate(row.feed_created_at),
    feed_is_active: asBoolean(row.feed_is_active),
  };
}

// ============================================================================
// Factory
// ============================================================================

export interface CreateFeedsDataManagerOptions extends FeedsDataManagerOptions {
  /** Client settings that override the `REGFEEDS_*` environment. */
  client?: Partial<RegFeedsClientConfig>;
}

/**
 * Builds a client from the environment and a data manager on top of it,
 * sharing one logger (console by default).
 */
export function createFeedsDataManager(
  options: CreateFeedsDataManagerOptions = {},
): FeedsDataManager {
  const logger = options.logger ?? new ConsoleLogger();
  const client = createRegFeedsClientFromEnv({ ...options.client, logger });
  return new FeedsDataManager(client, {
    logger,
    contentClientFactory: options.contentClientFactory,
    fetchLimit: options.fetchLimit,
  });
}
