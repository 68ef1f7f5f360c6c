/**
 * Record and table types for the topic → feed → entry hierarchy.
 *
 * Known columns are typed; columns the API adds beyond them are carried
 * through the index signature rather than dropped.
 */

export type Row = Record<string, unknown>;

export interface Table<R extends Row = Row> {
  columns: string[];
  rows: R[];
}

export interface Topic {
  id: string | null;
  name: string | null;
  description: string | null;
  is_active: boolean;
  created_at: Date | null;
  updated_at: Date | null;
  [column: string]: unknown;
}

export interface Feed {
  id: string | null;
  name: string | null;
  url: string | null;
  topic_id: string | null;
  topic_name: string | null;
  description: string | null;
  created_at: Date | null;
  is_active: boolean;
  [column: string]: unknown;
}

export interface NormalizedEntry {
  id: string | null;
  title: string | null;
  link: string | null;
  content_markdown: string | null;
  feed_id: string | null;
  topic_id: string | null;
  published_at: Date | null;
  created_at: Date | null;
  is_active: boolean;
  content_status: string | null;
  content_timestamp: string | null;
  s3_content_md_path: string | null;
  s3_content_html_path: string | null;
  s3_aggregated_content_md_path: string | null;
  [column: string]: unknown;
}

/** One denormalized Topic + Feed + Entry join result. */
export interface HierarchicalRow {
  topic_id: string | null;
  topic_name: string | null;
  topic_description: string | null;
  topic_is_active: boolean;
  feed_id: string | null;
  feed_name: string | null;
  feed_url: string | null;
  feed_is_active: boolean;
  entry_id: string | null;
  entry_title: string | null;
  entry_link: string | null;
  entry_content_markdown: string | null;
  entry_published_at: Date | null;
  entry_created_at: Date | null;
  entry_is_active: boolean;
  entry_content_status: string | null;
  entry_content_timestamp: string | null;
  s3_content_md_path: string | null;
  s3_content_html_path: string | null;
  s3_aggregated_content_md_path: string | null;
  [column: string]: unknown;
}

/** Topic + Feed join, the hierarchy without entries. */
export interface TopicFeedRow {
  topic_id: string | null;
  topic_name: string | null;
  topic_description: string | null;
  topic_created_at: Date | null;
  topic_updated_at: Date | null;
  topic_is_active: boolean;
  feed_id: string | null;
  feed_name: string | null;
  feed_url: string | null;
  feed_description: string | null;
  feed_created_at: Date | null;
  feed_is_active: boolean;
  [column: string]: unknown;
}

// ============================================================================
// Column layouts
// ============================================================================

export const TOPIC_COLUMNS = [
  'id',
  'name',
  'description',
  'created_at',
  'updated_at',
  'is_active',
] as const;

export const FEED_COLUMNS = [
  'id',
  'name',
  'url',
  'topic_id',
  'topic_name',
  'description',
  'created_at',
  'is_active',
] as const;

export const ENTRY_COLUMNS = [
  'id',
  'title',
  'link',
  'content_markdown',
  'feed_id',
  'topic_id',
  'published_at',
  'created_at',
  'is_active',
  'content_status',
  'content_timestamp',
  's3_content_md_path',
  's3_content_html_path',
  's3_aggregated_content_md_path',
] as const;

/** Entry columns plus the parent fields stamped on during hierarchy assembly. */
export const HIERARCHY_ENTRY_COLUMNS = [
  'id',
  'title',
  'link',
  'content_markdown',
  'published_at',
  'created_at',
  'is_active',
  'content_status',
  'content_timestamp',
  's3_content_md_path',
  's3_content_html_path',
  's3_aggregated_content_md_path',
  'feed_id',
  'feed_name',
  'feed_url',
  'feed_is_active',
  'topic_id',
  'topic_name',
  'topic_description',
  'topic_is_active',
] as const;

export const TOPIC_PREFIX_RENAMES: Record<string, string> = {
  id: 'topic_id',
  name: 'topic_name',
  description: 'topic_description',
  created_at: 'topic_created_at',
  updated_at: 'topic_updated_at',
  is_active: 'topic_is_active',
};

export const FEED_PREFIX_RENAMES: Record<string, string> = {
  id: 'feed_id',
  name: 'feed_name',
  url: 'feed_url',
  description: 'feed_description',
  created_at: 'feed_created_at',
  is_active: 'feed_is_active',
};

export const ENTRY_PREFIX_RENAMES: Record<string, string> = {
  id: 'entry_id',
  title: 'entry_title',
  link: 'entry_link',
  content_markdown: 'entry_content_markdown',
  published_at: 'entry_published_at',
  created_at: 'entry_created_at',
  is_active: 'entry_is_active',
  content_status: 'entry_content_status',
  content_timestamp: 'entry_content_timestamp',
};
