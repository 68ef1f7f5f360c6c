import type { Logger } from '@libs/http-client-core';
import { RegFeedsError } from '@libs/regfeeds-client';
import { mapColumn } from './normalize';
import { DEFAULT_MAX_CONTENT_BYTES, parseStoragePath } from './storagePath';
import type { Table } from './types';
import { asString } from './values';

// ============================================================================
// Storage boundary
// ============================================================================

export class StorageError extends RegFeedsError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StorageError';
  }
}

/** No usable storage credentials. Surfaces as "no client available". */
export class StorageCredentialsError extends StorageError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StorageCredentialsError';
  }
}

/** One object could not be fetched. Surfaces as a null body for its path. */
export class StorageFetchError extends StorageError {
  constructor(
    message: string,
    public readonly path: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'StorageFetchError';
  }
}

/**
 * Batch fetcher for entry bodies held in object storage. Resolves once every
 * path has been attempted; failed paths map to null. Order is not guaranteed
 * and fetching may be concurrent inside the implementation.
 */
export interface ContentBatchFetcher {
  fetchContentBatch(paths: string[]): Promise<Record<string, string | null>>;
}

/** Builds a fetcher from the environment, or returns null without credentials. */
export type ContentClientFactory = () => ContentBatchFetcher | null;

export const noContentClient: ContentClientFactory = () => null;

// ============================================================================
// Hydration
// ============================================================================

export interface HydrationOptions {
  fetchContent: boolean;
  client?: ContentBatchFetcher | null;
  clientFactory?: ContentClientFactory;
  pathColumn?: string;
  bodyColumn?: string;
  logger?: Logger;
}

export const DEFAULT_PATH_COLUMN = 's3_content_md_path';

/**
 * Fills `bodyColumn` from object storage by each row's `pathColumn`.
 *
 * Without `fetchContent`, or without a client, the body column is created and
 * left null. Rows sharing a path share the fetched body.
 */
export async function hydrateContent(table: Table, options: HydrationOptions): Promise<Table> {
  const pathColumn = options.pathColumn ?? DEFAULT_PATH_COLUMN;
  const bodyColumn = options.bodyColumn ?? 'content_markdown';
  const cleared = mapColumn(table, bodyColumn, () => null);

  if (!options.fetchContent) {
    return cleared;
  }

  const client = resolveContentClient(options.client, options.clientFactory, options.logger);
  if (!client) {
    options.logger?.warn?.(
      '[hydrateContent] Content fetching requested but no storage client is available; ' +
        'check storage credentials. Bodies are left empty.',
    );
    return cleared;
  }

  return fetchContents(table, client, { pathColumn, bodyColumn, logger: options.logger });
}

export interface FetchContentsOptions {
  pathColumn?: string;
  bodyColumn?: string;
  /** Bodies larger than this many UTF-8 bytes are discarded. */
  maxContentBytes?: number;
  logger?: Logger;
}

/**
 * Fetches the distinct non-null paths of `table` in one batch and broadcasts
 * the results onto every row. Unresolved or oversized paths leave a null body.
 */
export async function fetchContents(
  table: Table,
  client: ContentBatchFetcher,
  options: FetchContentsOptions = {},
): Promise<Table> {
  const pathColumn = options.pathColumn ?? DEFAULT_PATH_COLUMN;
  const bodyColumn = options.bodyColumn ?? 'content_markdown';

  const distinct = new Set(
    table.rows
      .map((row) => asString(row[pathColumn]))
      .filter((path): path is string => path !== null && path !== ''),
  );
  const paths = [...distinct].filter((path) => isFetchablePath(path, options.logger));

  if (paths.length === 0) {
    options.logger?.info?.(`[fetchContents] No ${pathColumn} values to fetch`);
    return mapColumn(table, bodyColumn, () => null);
  }

  options.logger?.info?.(`[fetchContents] Fetching ${paths.length} content objects`);
  const contents = withinLimit(
    await fetchBatch(client, paths, options.logger),
    options.maxContentBytes ?? DEFAULT_MAX_CONTENT_BYTES,
    options.logger,
  );

  const hydrated = mapColumn(table, bodyColumn, (_value, row) => {
    const path = asString(row[pathColumn]);
    return path === null ? null : (contents[path] ?? null);
  });

  const resolved = paths.filter((path) => contents[path] != null).length;
  options.logger?.info?.(`[fetchContents] Fetched ${resolved}/${paths.length} content objects`);
  return hydrated;
}

function withinLimit(
  contents: Record<string, string | null>,
  maxBytes: number,
  logger: Logger | undefined,
): Record<string, string | null> {
  const kept: Record<string, string | null> = {};
  for (const [path, body] of Object.entries(contents)) {
    const size = body === null ? 0 : Buffer.byteLength(body, 'utf8');
    if (size > maxBytes) {
      logger?.warn?.(`[fetchContents] Discarding ${path}: ${size} bytes exceeds ${maxBytes}`);
      kept[path] = null;
    } else {
      kept[path] = body;
    }
  }
  return kept;
}

function isFetchablePath(path: string, logger: Logger | undefined): boolean {
  try {
    parseStoragePath(path);
    return true;
  } catch (error) {
    logger?.warn?.(`[fetchContents] Skipping ${path}: ${error instanceof Error ? error.message : error}`);
    return false;
  }
}

/**
 * An explicit client wins; otherwise the factory is asked for one. Rejected
 * credentials count as no client.
 */
export function resolveContentClient(
  client: ContentBatchFetcher | null | undefined,
  factory: ContentClientFactory | undefined,
  logger?: Logger,
): ContentBatchFetcher | null {
  if (client) {
    return client;
  }
  if (!factory) {
    return null;
  }
  try {
    return factory();
  } catch (error) {
    if (error instanceof StorageCredentialsError) {
      logger?.warn?.(`[hydrateContent] Storage credentials rejected: ${error.message}`);
      return null;
    }
    throw error;
  }
}

async function fetchBatch(
  client: ContentBatchFetcher,
  paths: string[],
  logger: Logger | undefined,
): Promise<Record<string, string | null>> {
  try {
    return await client.fetchContentBatch(paths);
  } catch (error) {
    if (error instanceof StorageFetchError) {
      logger?.warn?.(`[fetchContents] Batch fetch failed at ${error.path}: ${error.message}`);
      return {};
    }
    throw error;
  }
}
