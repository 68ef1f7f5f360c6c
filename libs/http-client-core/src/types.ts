/**
 * Seams shared by the SDK libraries. Every component takes these by injection;
 * none of them holds module-level logging or metrics state.
 */

/** Structured logger. Each level is optional so partial loggers and spies fit. */
export interface Logger {
  debug?(message: string, meta?: unknown): void;
  info?(message: string, meta?: unknown): void;
  warn?(message: string, meta?: unknown): void;
  error?(message: string, meta?: unknown): void;
}

/** One HTTP attempt, reported once per try including retries. */
export interface RequestMetric {
  client: string;
  /** `METHOD /path`, without the query string. */
  operation: string;
  durationMs: number;
  status: number;
  /** Zero-based attempt number within one logical request. */
  attempt?: number;
}

export interface MetricsSink {
  recordRequest?(metric: RequestMetric): void | Promise<void>;
}

/** Replaces global `fetch`; tests inject one that returns canned responses. */
export type HttpTransport = (url: string, init: RequestInit) => Promise<Response>;
