import type { Logger } from '@libs/http-client-core';
import { ConsoleLogger } from '@libs/http-client-core';
import { ValidationError } from '@libs/regfeeds-client';
import type { RegFeedsClientConfig } from '@libs/regfeeds-client';
import {
  asString,
  concatTables,
  createFeedsDataManager,
  emptyHierarchicalTable,
  toDate,
} from '@libs/regfeeds-data';
import type {
  ContentBatchFetcher,
  ContentClientFactory,
  ContentOptions,
  FeedsDataManager,
  HierarchicalRow,
  Table,
} from '@libs/regfeeds-data';
import { copyTable, tableToJson, writeCsv } from './export';

export type HierarchyTable = Table<HierarchicalRow>;

export type DateBound = Date | string | number;

export interface TopicSelector {
  topicId?: string;
  /** Case-insensitive substring of the topic name. */
  topicName?: string;
}

export interface FeedSelector {
  feedId?: string;
  /** Case-insensitive substring of the feed name. */
  feedName?: string;
}

export interface SearchOptions {
  searchFields?: string[];
  caseSensitive?: boolean;
  /** Every keyword must match (in any field) instead of any keyword. */
  matchAll?: boolean;
}

export interface DateRange {
  start?: DateBound | null;
  end?: DateBound | null;
}

export interface EntryQueryEngineOptions {
  logger?: Logger;
  /** Fill entry bodies from storage when the hierarchy is loaded. */
  fetchContent?: boolean;
  contentClient?: ContentBatchFetcher | null;
}

export const DEFAULT_SEARCH_FIELD = 'entry_content_markdown';

/** Accepted search field names and the hierarchy column each one reads. */
export const SEARCH_FIELD_COLUMNS: Readonly<Record<string, string>> = {
  title: 'entry_title',
  content_markdown: 'entry_content_markdown',
  link: 'entry_link',
  description: 'entry_description',
  entry_title: 'entry_title',
  entry_content_markdown: 'entry_content_markdown',
  entry_link: 'entry_link',
  entry_description: 'entry_description',
};

type QueryState = { kind: 'unloaded' } | { kind: 'loaded'; table: HierarchyTable };

/** How a chain's first operation acquires rows. */
type Acquisition =
  | { kind: 'all' }
  | { kind: 'topicId'; topicId: string }
  | { kind: 'topicName'; topicName: string }
  | { kind: 'feedId'; feedId: string }
  | { kind: 'feedName'; feedName: string };

interface QueryStep {
  description: string;
  apply(table: HierarchyTable): HierarchyTable | Promise<HierarchyTable>;
}

/**
 * Fluent filter and search over the topic → feed → entry hierarchy.
 *
 * Calls are recorded and run when an export is requested. A chain that starts
 * with a topic or feed filter loads only that topic's or feed's hierarchy;
 * any other start loads everything. Once loaded, operations only narrow the
 * rows until `chain()` starts over.
 *
 * ```typescript
 * const rows = await createEntryQueryEngine()
 *   .filterByTopic({ topicName: 'Banking' })
 *   .searchEntries(['capital', 'liquidity'], { matchAll: true })
 *   .filterByDate({ start: '2024-01-01' })
 *   .toRecords();
 * ```
 */
export class EntryQueryEngine {
  private state: QueryState = { kind: 'unloaded' };
  private acquisition: Acquisition | null = null;
  private steps: QueryStep[] = [];
  private readonly logger?: Logger;

  constructor(
    private readonly manager: FeedsDataManager,
    private readonly options: EntryQueryEngineOptions = {},
  ) {
    this.logger = options.logger;
  }

  /** Discards the current rows; the next operation starts a fresh load. */
  chain(): this {
    this.logger?.info?.('[EntryQueryEngine] Resetting query chain');
    this.state = { kind: 'unloaded' };
    this.acquisition = null;
    this.steps = [];
    return this;
  }

  /** The topic id wins when both are given. */
  filterByTopic(selector: TopicSelector): this {
    const { topicId, topicName } = selector;
    if (!topicId && !topicName) {
      this.logger?.warn?.('[EntryQueryEngine] Neither topicId nor topicName provided, no filtering applied');
      return this;
    }

    if (this.isPristine()) {
      this.acquisition = topicId
        ? { kind: 'topicId', topicId }
        : { kind: 'topicName', topicName: topicName ?? '' };
      return this;
    }

    if (topicId) {
      return this.narrow(`topic ${topicId}`, (row) => row.topic_id === topicId);
    }
    const needle = (topicName ?? '').toLowerCase();
    return this.narrow(`topic name ${topicName}`, (row) => containsIgnoringCase(row.topic_name, needle));
  }

  /** The feed id wins when both are given. */
  filterByFeed(selector: FeedSelector): this {
    const { feedId, feedName } = selector;
    if (!feedId && !feedName) {
      this.logger?.warn?.('[EntryQueryEngine] Neither feedId nor feedName provided, no filtering applied');
      return this;
    }

    if (this.isPristine()) {
      this.acquisition = feedId
        ? { kind: 'feedId', feedId }
        : { kind: 'feedName', feedName: feedName ?? '' };
      return this;
    }

    if (feedId) {
      return this.narrow(`feed ${feedId}`, (row) => row.feed_id === feedId);
    }
    const needle = (feedName ?? '').toLowerCase();
    return this.narrow(`feed name ${feedName}`, (row) => containsIgnoringCase(row.feed_name, needle));
  }

  /**
   * Keeps rows where the keywords (regular expressions) match the given
   * fields. Unknown fields are skipped; null values never match.
   *
   * @throws ValidationError when a keyword is not a valid regular expression.
   */
  searchEntries(keywords: string | string[], options: SearchOptions = {}): this {
    const list = typeof keywords === 'string' ? [keywords] : [...keywords];
    if (list.length === 0) {
      this.logger?.warn?.('[EntryQueryEngine] No keywords provided for search');
      return this;
    }

    const columns: string[] = [];
    for (const field of options.searchFields ?? [DEFAULT_SEARCH_FIELD]) {
      const column = SEARCH_FIELD_COLUMNS[field];
      if (column === undefined) {
        this.logger?.warn?.(`[EntryQueryEngine] Unknown search field: ${field}, skipping`);
      } else if (!columns.includes(column)) {
        columns.push(column);
      }
    }
    if (columns.length === 0) {
      this.logger?.error?.('[EntryQueryEngine] No valid search fields specified');
      return this;
    }

    const caseSensitive = options.caseSensitive ?? false;
    const patterns = list.map((keyword) => compilePattern(keyword, caseSensitive));
    const matchAll = options.matchAll ?? false;

    return this.narrow(`search ${list.join(', ')} (matchAll=${matchAll})`, (row) => {
      const matches = (pattern: RegExp) =>
        columns.some((column) => {
          const value = asString(row[column]);
          return value !== null && pattern.test(value);
        });
      return matchAll ? patterns.every(matches) : patterns.some(matches);
    });
  }

  /**
   * Inclusive bounds on `entry_published_at`. Bound strings without an offset
   * are read as UTC. Rows without a publication date are dropped.
   */
  filterByDate(range: DateRange): this {
    const start = parseBound('start', range.start ?? null);
    const end = parseBound('end', range.end ?? null);
    if (start === null && end === null) {
      this.logger?.warn?.('[EntryQueryEngine] Neither start nor end provided, no filtering applied');
      return this;
    }

    const description = `published ${start?.toISOString() ?? 'open'} to ${end?.toISOString() ?? 'open'}`;
    return this.narrow(description, (row) => {
      const published = toDate(row.entry_published_at);
      if (published === null) {
        return false;
      }
      const time = published.getTime();
      return (start === null || time >= start.getTime()) && (end === null || time <= end.getTime());
    });
  }

  filterByActive(isActive = true): this {
    return this.narrow(`active=${isActive}`, (row) => row.entry_is_active === isActive);
  }

  /**
   * Fills entry bodies of the current rows. Without a client, given here, in
   * the engine options or from the data manager's factory, rows are unchanged.
   */
  fetchContent(client?: ContentBatchFetcher | null): this {
    this.steps.push({
      description: 'fetch content',
      apply: async (table) => {
        const resolved = this.manager.contentClient(client ?? this.options.contentClient);
        if (!resolved) {
          this.logger?.warn?.(
            '[EntryQueryEngine] No storage client available; content was not fetched. Check storage credentials.',
          );
          return table;
        }
        return this.manager.fetchContents(table, resolved);
      },
    });
    return this;
  }

  // ---------------------------------------------------------------------------
  // Exports
  // ---------------------------------------------------------------------------

  async toTable(): Promise<HierarchyTable> {
    return copyTable(await this.resolve());
  }

  async toRecords(): Promise<HierarchicalRow[]> {
    return (await this.toTable()).rows;
  }

  async toJson(indent = 2): Promise<string> {
    return tableToJson(await this.resolve(), indent);
  }

  /** Writes the current rows as CSV and returns `filePath`. */
  async toCsv(filePath: string): Promise<string> {
    const table = await this.resolve();
    this.logger?.info?.(`[EntryQueryEngine] Exporting ${table.rows.length} entries to ${filePath}`);
    return writeCsv(table, filePath);
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private isPristine(): boolean {
    return this.state.kind === 'unloaded' && this.acquisition === null && this.steps.length === 0;
  }

  private narrow(description: string, predicate: (row: HierarchicalRow) => boolean): this {
    this.steps.push({
      description,
      apply: (table) => ({ ...table, rows: table.rows.filter(predicate) }),
    });
    return this;
  }

  private async resolve(): Promise<HierarchyTable> {
    let table =
      this.state.kind === 'loaded' ? this.state.table : await this.acquire(this.acquisition ?? { kind: 'all' });

    for (const step of this.steps) {
      const before = table.rows.length;
      table = await step.apply(table);
      this.logger?.debug?.(`[EntryQueryEngine] ${step.description}: ${before} -> ${table.rows.length} entries`);
    }

    this.state = { kind: 'loaded', table };
    this.acquisition = null;
    this.steps = [];
    return table;
  }

  private async acquire(acquisition: Acquisition): Promise<HierarchyTable> {
    const table = await this.load(acquisition);
    this.logger?.info?.(`[EntryQueryEngine] Loaded ${table.rows.length} entries`, { acquisition });
    return table;
  }

  private async load(acquisition: Acquisition): Promise<HierarchyTable> {
    if (acquisition.kind === 'topicId') {
      return this.loadTopics([acquisition.topicId]);
    }
    if (acquisition.kind === 'feedId') {
      return this.loadFeeds([acquisition.feedId]);
    }
    if (acquisition.kind === 'topicName') {
      const topics = await this.manager.getTopics();
      const ids = matchingIds(topics.rows, acquisition.topicName);
      this.reportMatches('topics', acquisition.topicName, ids);
      return this.loadTopics(ids);
    }
    if (acquisition.kind === 'feedName') {
      const feeds = await this.manager.getFeeds();
      const ids = matchingIds(feeds.rows, acquisition.feedName);
      this.reportMatches('feeds', acquisition.feedName, ids);
      return this.loadFeeds(ids);
    }
    return this.manager.getHierarchicalView({ ...this.contentOptions() });
  }

  private async loadTopics(topicIds: string[]): Promise<HierarchyTable> {
    const tables: HierarchyTable[] = [];
    for (const topicId of topicIds) {
      tables.push(await this.manager.getHierarchicalView({ ...this.contentOptions(), topicId }));
    }
    return combine(tables);
  }

  private async loadFeeds(feedIds: string[]): Promise<HierarchyTable> {
    const tables: HierarchyTable[] = [];
    for (const feedId of feedIds) {
      tables.push(await this.manager.getHierarchicalView({ ...this.contentOptions(), feedId }));
    }
    return combine(tables);
  }

  private reportMatches(kind: 'topics' | 'feeds', name: string, ids: string[]): void {
    if (ids.length === 0) {
      this.logger?.warn?.(`[EntryQueryEngine] No ${kind} found matching '${name}'`);
    } else if (ids.length > 1) {
      this.logger?.warn?.(
        `[EntryQueryEngine] ${ids.length} ${kind} match '${name}'; combining the entries of all of them`,
        { ids },
      );
    }
  }

  private contentOptions(): ContentOptions {
    return {
      fetchContent: this.options.fetchContent ?? false,
      contentClient: this.options.contentClient,
    };
  }
}

function combine(tables: HierarchyTable[]): HierarchyTable {
  if (tables.length === 0) {
    return emptyHierarchicalTable();
  }
  return tables.length === 1 ? tables[0] : concatTables(tables);
}

function matchingIds(rows: Array<{ id: string | null; name: string | null }>, name: string): string[] {
  const needle = name.toLowerCase();
  return rows
    .filter((row) => containsIgnoringCase(row.name, needle))
    .map((row) => row.id)
    .filter((id): id is string => id !== null);
}

function containsIgnoringCase(value: string | null, lowerNeedle: string): boolean {
  return value !== null && value.toLowerCase().includes(lowerNeedle);
}

function compilePattern(keyword: string, caseSensitive: boolean): RegExp {
  try {
    return new RegExp(keyword, caseSensitive ? '' : 'i');
  } catch (error) {
    throw new ValidationError(
      `Invalid search pattern '${keyword}': ${error instanceof Error ? error.message : error}`,
      { cause: error },
    );
  }
}

function parseBound(label: 'start' | 'end', value: DateBound | null): Date | null {
  if (value === null) {
    return null;
  }
  const date = toDate(value);
  if (date === null) {
    throw new ValidationError(`Invalid ${label} date: ${String(value)}`);
  }
  return date;
}

// ============================================================================
// Factory
// ============================================================================

export interface CreateEntryQueryEngineOptions extends EntryQueryEngineOptions {
  /** Client settings that override the `REGFEEDS_*` environment. */
  client?: Partial<RegFeedsClientConfig>;
  contentClientFactory?: ContentClientFactory;
  fetchLimit?: number;
}

/** Client, data manager and engine from the environment, sharing one logger. */
export function createEntryQueryEngine(options: CreateEntryQueryEngineOptions = {}): EntryQueryEngine {
  const logger = options.logger ?? new ConsoleLogger();
  const manager = createFeedsDataManager({
    logger,
    client: options.client,
    contentClientFactory: options.contentClientFactory,
    fetchLimit: options.fetchLimit,
  });
  return new EntryQueryEngine(manager, {
    logger,
    fetchContent: options.fetchContent,
    contentClient: options.contentClient,
  });
}
