/**
 * @libs/regfeeds-query
 *
 * Chainable filters, keyword search and exports over the regulatory-feed
 * hierarchy.
 *
 * ## Usage
 *
 * ```typescript
 * import { createEntryQueryEngine } from '@libs/regfeeds-query';
 *
 * const engine = createEntryQueryEngine();
 * const json = await engine
 *   .filterByFeed({ feedName: 'Central Bank' })
 *   .filterByActive()
 *   .toJson();
 *
 * await engine.chain().searchEntries('stress test', { searchFields: ['title'] }).toCsv('out.csv');
 * ```
 */

export {
  EntryQueryEngine,
  createEntryQueryEngine,
  DEFAULT_SEARCH_FIELD,
  SEARCH_FIELD_COLUMNS,
} from './entryQueryEngine';
export type {
  CreateEntryQueryEngineOptions,
  DateBound,
  DateRange,
  EntryQueryEngineOptions,
  FeedSelector,
  HierarchyTable,
  SearchOptions,
  TopicSelector,
} from './entryQueryEngine';

export { tableToCsv, tableToJson, writeCsv, copyTable } from './export';
