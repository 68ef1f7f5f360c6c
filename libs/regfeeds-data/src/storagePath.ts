import { ValidationError } from '@libs/regfeeds-client';

export const MAX_STORAGE_PATH_LENGTH = 1024;
/** Fetched bodies larger than this are discarded during hydration. */
export const DEFAULT_MAX_CONTENT_BYTES = 10 * 1024 * 1024;

const STORAGE_PATH = /^s3:\/\/([a-z0-9][a-z0-9.-]{1,61}[a-z0-9])\/(.+)$/;

export interface StorageLocation {
  bucket: string;
  key: string;
}

/**
 * Splits `s3://bucket/key` into its parts. Buckets follow object-storage
 * naming (lowercase letters, digits, dots and hyphens, no leading or trailing
 * hyphen); keys may not contain `..` segments.
 *
 * @throws ValidationError for anything else.
 */
export function parseStoragePath(path: string): StorageLocation {
  if (!path) {
    throw new ValidationError('Invalid storage path: path must be a non-empty string');
  }
  if (path.length > MAX_STORAGE_PATH_LENGTH) {
    throw new ValidationError(
      `Storage path too long: ${path.length} characters (max ${MAX_STORAGE_PATH_LENGTH})`,
    );
  }

  const match = STORAGE_PATH.exec(path);
  if (!match) {
    throw new ValidationError(`Invalid storage path format: ${path} (expected s3://bucket/key)`);
  }

  const [, bucket, key] = match;
  if (key.split('/').includes('..') || key.startsWith('/')) {
    throw new ValidationError(`Invalid storage key: ${key}`);
  }

  return { bucket, key };
}
