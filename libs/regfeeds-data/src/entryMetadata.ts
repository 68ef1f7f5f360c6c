import type { Row, Table } from './types';
import { asString, isRecord } from './values';

export interface MetadataExtractionOptions {
  /** Feed id to fall back on when the nested metadata carries none. */
  fallbackFeedId?: string;
}

/**
 * Lifts the nested `extracted_metadata` object of a raw entry to top-level
 * fields: feed and topic ids, content status and timestamp, and the three
 * storage paths. The nested object itself is kept as `extracted_metadata_full`.
 * Entries without a metadata object come back unchanged.
 */
export function extractMetadataFields(entry: Row, options: MetadataExtractionOptions = {}): Row {
  const metadata = entry.extracted_metadata;
  if (!isRecord(metadata)) {
    return { ...entry };
  }

  const { extracted_metadata: _nested, ...rest } = entry;
  return {
    ...rest,
    feed_id: asString(metadata.feed_id) ?? options.fallbackFeedId ?? asString(entry.feed_id),
    topic_id: asString(metadata.topic_id) ?? asString(entry.topic_id),
    content_status: asString(metadata.status),
    content_timestamp: asString(metadata.timestamp),
    s3_content_md_path: asString(metadata.s3_content_md_path),
    s3_content_html_path: asString(metadata.s3_content_html_path),
    s3_aggregated_content_md_path: asString(metadata.s3_aggregated_content_md_path),
    extracted_metadata_full: metadata,
  };
}

/**
 * Makes `published_at` the canonical publication column: a `published_date`
 * column fills it when `published_at` is missing or entirely null, and the
 * column always exists afterwards.
 */
export function reconcilePublishedDate(table: Table): Table {
  const hasPublishedAt = table.columns.includes('published_at');
  const publishedAtEmpty =
    !hasPublishedAt || table.rows.every((row) => row.published_at === null || row.published_at === undefined);

  if (table.columns.includes('published_date') && publishedAtEmpty) {
    return {
      columns: hasPublishedAt ? [...table.columns] : [...table.columns, 'published_at'],
      rows: table.rows.map((row) => ({ ...row, published_at: row.published_date ?? null })),
    };
  }

  if (!hasPublishedAt) {
    return {
      columns: [...table.columns, 'published_at'],
      rows: table.rows.map((row) => ({ ...row, published_at: null })),
    };
  }

  return table;
}
