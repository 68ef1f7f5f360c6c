/**
 * Coercions from loosely-typed API values to the typed record fields.
 */

const OFFSET_SUFFIX = /(?:Z|[+-]\d{2}:?\d{2})$/i;
const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Parses a timestamp into a Date. Strings without an offset are read as UTC,
 * the API's timezone, never as host-local time. Unparseable values give null.
 */
export function toDate(value: unknown): Date | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value;
  }
  if (typeof value === 'number') {
    const date = new Date(value);
    return Number.isNaN(date.getTime()) ? null : date;
  }
  if (typeof value !== 'string' || value.trim() === '') {
    return null;
  }

  const text = value.trim();
  const normalized = DATE_ONLY.test(text)
    ? `${text}T00:00:00Z`
    : OFFSET_SUFFIX.test(text)
      ? text
      : `${text.replace(' ', 'T')}Z`;
  const date = new Date(normalized);
  return Number.isNaN(date.getTime()) ? null : date;
}

export function asString(value: unknown): string | null {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return null;
}

/** Missing flags default to `fallback`; everything else follows truthiness. */
export function asBoolean(value: unknown, fallback = true): boolean {
  if (value === null || value === undefined) {
    return fallback;
  }
  if (typeof value === 'string') {
    return value.toLowerCase() === 'true' || value === '1';
  }
  return Boolean(value);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
