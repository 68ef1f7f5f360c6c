import { setTimeout as sleep } from 'timers/promises';
import type { HttpTransport, Logger, MetricsSink } from '@libs/http-client-core';
import { ConsoleLogger } from '@libs/http-client-core';
import {
  ApiError,
  AuthenticationError,
  RateLimitError,
  ValidationError,
  annotationListSchema,
  apiRecordListSchema,
  apiRecordSchema,
  userTopicSubscriptionsSchema,
} from './types';
import type {
  Annotation,
  AnnotationFilters,
  ApiRecord,
  HttpMethod,
  ListEntriesParams,
  QueryParams,
  RegFeedsClientConfig,
  UserTopicSubscriptions,
} from './types';

export const DEFAULT_BASE_URL = 'https://app.carveragents.ai';
export const DEFAULT_PAGE_SIZE = 1000;
export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_INITIAL_RETRY_DELAY_MS = 1000;
export const DEFAULT_BACKOFF_FACTOR = 2;
export const DEFAULT_TIMEOUT_MS = 30_000;

/** Keys a paged object response may carry its records under, in lookup order. */
const PAGE_RESULT_KEYS = ['results', 'data', 'items'] as const;

const ANNOTATION_FILTERS = [
  { option: 'feedEntryIds', param: 'feed_entry_ids_in', label: 'feed_entry_ids' },
  { option: 'topicIds', param: 'topic_ids_in', label: 'topic_ids' },
  { option: 'userIds', param: 'user_ids_in', label: 'user_ids' },
] as const;

/**
 * Regulatory Feeds API Client
 *
 * Authenticates with a static API key, retries 429/5xx responses with jittered
 * exponential backoff, and walks limit/offset pagination for list endpoints.
 */
export class RegFeedsClient {
  private readonly baseUrl: string;
  private readonly maxRetries: number;
  private readonly initialRetryDelayMs: number;
  private readonly backoffFactor: number;
  private readonly timeoutMs: number;
  private readonly pageSize: number;
  private readonly logger?: Logger;
  private readonly metrics?: MetricsSink;
  private readonly transport: HttpTransport;

  constructor(private readonly config: RegFeedsClientConfig) {
    if (!config.apiKey) {
      throw new AuthenticationError(
        'API key is required. Set REGFEEDS_API_KEY or pass apiKey to the client.',
        0,
      );
    }
    this.baseUrl = (config.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
    this.maxRetries = Math.max(1, config.maxRetries ?? DEFAULT_MAX_RETRIES);
    this.initialRetryDelayMs = config.initialRetryDelayMs ?? DEFAULT_INITIAL_RETRY_DELAY_MS;
    this.backoffFactor = config.backoffFactor ?? DEFAULT_BACKOFF_FACTOR;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.pageSize = requirePageSize(config.pageSize ?? DEFAULT_PAGE_SIZE);
    this.logger = config.logger;
    this.metrics = config.metrics;
    this.transport = config.transport ?? ((url, init) => fetch(url, init));
  }

  // ---------------------------------------------------------------------------
  // Core HTTP
  // ---------------------------------------------------------------------------

  /**
   * Issues one logical call and returns the parsed JSON body of an HTTP 200.
   *
   * 401 fails at once with AuthenticationError. 429 and 5xx are retried until
   * `maxRetries` attempts have been made, then surface as RateLimitError or
   * ApiError. Any other status, and any transport failure, is an ApiError
   * without retry.
   */
  async request(method: HttpMethod, path: string, params?: QueryParams): Promise<unknown> {
    const url = this.buildUrl(path, params);
    const init: RequestInit = {
      method,
      headers: {
        'X-API-Key': this.config.apiKey,
        Accept: 'application/json',
        'Content-Type': 'application/json',
      },
    };

    for (let attempt = 0; attempt < this.maxRetries; attempt += 1) {
      const start = Date.now();
      const response = await this.executeHttp(url, init);
      await this.metrics?.recordRequest?.({
        client: 'regfeeds',
        operation: `${method} ${path}`,
        durationMs: Date.now() - start,
        status: response.status,
        attempt,
      });

      if (response.status === 200) {
        return parseJson(response, url);
      }

      const bodyText = await safeReadBody(response);

      if (response.status === 401) {
        throw new AuthenticationError(
          'Authentication failed. Check that the API key is valid.',
          401,
          bodyText,
        );
      }

      if (!isRetryable(response.status)) {
        throw new ApiError(
          `API request failed with status ${response.status}. Response: ${bodyText}`,
          response.status,
          bodyText,
        );
      }

      if (attempt + 1 >= this.maxRetries) {
        if (response.status === 429) {
          throw new RateLimitError(
            `Rate limit exceeded after ${this.maxRetries} attempts. Response: ${bodyText}`,
            bodyText,
          );
        }
        throw new ApiError(
          `Server error (${response.status}) after ${this.maxRetries} attempts. Response: ${bodyText}`,
          response.status,
          bodyText,
        );
      }

      await this.waitForRetry(response.status, attempt, method, path);
    }

    throw new ApiError(`API request to ${path} exceeded retries`, 0);
  }

  /**
   * Collects records across limit/offset pages. A page may be a bare array or
   * an object holding its records under `results`, `data` or `items`.
   * Stops on the first short page, or after one page unless `fetchAll` is set.
   */
  async paginate(
    path: string,
    params: QueryParams = {},
    pageSize: number = this.pageSize,
    fetchAll = true,
  ): Promise<ApiRecord[]> {
    requirePageSize(pageSize);
    const results: ApiRecord[] = [];
    let offset = 0;

    while (true) {
      const page = await this.request('GET', path, { ...params, limit: pageSize, offset });
      const records = extractPageRecords(page, path);
      results.push(...records);

      if (!fetchAll || records.length < pageSize) {
        break;
      }

      offset += pageSize;
      this.logger?.info?.(`[RegFeedsClient] Fetched ${results.length} records so far from ${path}`);
    }

    this.logger?.info?.(`[RegFeedsClient] Total records fetched from ${path}: ${results.length}`);
    return results;
  }

  // ---------------------------------------------------------------------------
  // Topics & feeds
  // ---------------------------------------------------------------------------

  async listTopics(): Promise<ApiRecord[]> {
    this.logger?.info?.('[RegFeedsClient] Fetching topics');
    const body = await this.request('GET', '/api/v1/feeds/topics');
    return extractPageRecords(body, '/api/v1/feeds/topics');
  }

  /** The feeds endpoint has no server-side topic filter; filter client-side. */
  async listFeeds(): Promise<ApiRecord[]> {
    this.logger?.info?.('[RegFeedsClient] Fetching feeds');
    const body = await this.request('GET', '/api/v1/feeds/');
    return extractPageRecords(body, '/api/v1/feeds/');
  }

  // ---------------------------------------------------------------------------
  // Entries
  // ---------------------------------------------------------------------------

  async listEntries(params: ListEntriesParams = {}): Promise<ApiRecord[]> {
    const query: QueryParams = {
      ...(params.feedId ? { feed_id: params.feedId } : undefined),
      ...(params.isActive !== undefined ? { is_active: params.isActive } : undefined),
    };
    this.logger?.info?.('[RegFeedsClient] Fetching entries', {
      feedId: params.feedId,
      isActive: params.isActive,
      fetchAll: params.fetchAll ?? false,
    });
    return this.paginate(
      '/api/v1/feeds/entries/list',
      query,
      params.pageSize ?? this.pageSize,
      params.fetchAll ?? false,
    );
  }

  /** Entries of one feed. The response does not echo the feed id. */
  async getFeedEntries(feedId: string, limit: number = this.pageSize): Promise<ApiRecord[]> {
    if (!feedId) {
      throw new ValidationError('feedId is required');
    }
    const path = `/api/v1/feeds/${encodeURIComponent(feedId)}/entries`;
    this.logger?.debug?.(`[RegFeedsClient] Fetching entries for feed ${feedId}`);
    return extractItems(await this.request('GET', path, { limit }), path);
  }

  /** Entries across every feed of one topic; each record carries its feed id. */
  async getTopicEntries(topicId: string, limit: number = this.pageSize): Promise<ApiRecord[]> {
    if (!topicId) {
      throw new ValidationError('topicId is required');
    }
    const path = `/api/v1/feeds/topics/${encodeURIComponent(topicId)}/entries`;
    this.logger?.debug?.(`[RegFeedsClient] Fetching entries for topic ${topicId}`);
    return extractItems(await this.request('GET', path, { limit }), path);
  }

  // ---------------------------------------------------------------------------
  // Users & annotations
  // ---------------------------------------------------------------------------

  async getUserTopicSubscriptions(userId: string): Promise<UserTopicSubscriptions> {
    if (!userId) {
      throw new ValidationError('userId is required');
    }
    const path = `/api/v1/core/users/${encodeURIComponent(userId)}/topics/subscriptions`;
    const body = await this.request('GET', path);

    if (!apiRecordSchema.safeParse(body).success) {
      throw new ApiError(`Unexpected response format from ${path}: expected an object`, 200);
    }
    const parsed = userTopicSubscriptionsSchema.safeParse(body);
    if (!parsed.success) {
      throw new ApiError(
        `Response missing 'subscriptions' field or it is malformed: ${parsed.error.message}`,
        200,
      );
    }

    this.logger?.info?.(
      `[RegFeedsClient] Found ${parsed.data.subscriptions.length} topic subscriptions for user ${userId}`,
    );
    return parsed.data;
  }

  /**
   * Annotations filtered by exactly one of feed entry ids, topic ids or user
   * ids. The chosen list is sent comma-joined.
   */
  async getAnnotations(filters: AnnotationFilters = {}): Promise<Annotation[]> {
    const supplied = ANNOTATION_FILTERS.filter(({ option }) => filters[option] !== undefined);

    if (supplied.length === 0) {
      throw new ValidationError(
        'At least one filter must be provided: feed_entry_ids, topic_ids, or user_ids',
      );
    }
    if (supplied.length > 1) {
      throw new ValidationError(
        `Only one filter can be used per request, got: ${supplied.map((f) => f.label).join(', ')}`,
      );
    }

    const [{ option, param, label }] = supplied;
    const ids = filters[option] ?? [];
    if (ids.length === 0) {
      throw new ValidationError(`${label} cannot be an empty list`);
    }

    const path = '/api/v1/core/annotations';
    const body = await this.request('GET', path, { [param]: ids.join(',') });
    const parsed = annotationListSchema.safeParse(body);
    if (!parsed.success) {
      throw new ApiError(`Unexpected response format from ${path}: expected a list of annotations`, 200);
    }

    this.logger?.info?.(`[RegFeedsClient] Fetched ${parsed.data.length} annotations by ${label}`);
    return parsed.data;
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private async waitForRetry(
    status: number,
    attempt: number,
    method: string,
    path: string,
  ): Promise<void> {
    const delayMs = computeBackoffDelay(this.initialRetryDelayMs, this.backoffFactor, attempt);

    this.logger?.warn?.(
      `[RegFeedsClient] Retrying ${method} ${path} after ${Math.round(delayMs)}ms due to status ${status}`,
      { status, delayMs, attempt: attempt + 1, maxRetries: this.maxRetries },
    );

    await sleep(delayMs);
  }

  private async executeHttp(url: string, init: RequestInit): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      return await this.transport(url, { ...init, signal: controller.signal });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      const message = controller.signal.aborted
        ? `Request timeout: no response from ${url} within ${this.timeoutMs}ms`
        : `Connection error: could not reach ${url} (${reason})`;
      throw new ApiError(message, 0, undefined, { cause: error });
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private buildUrl(path: string, params?: QueryParams): string {
    const url = new URL(`${this.baseUrl}${path}`);
    if (params) {
      for (const [key, value] of Object.entries(params)) {
        if (value === undefined) {
          continue;
        }
        url.searchParams.append(key, String(value));
      }
    }
    return url.toString();
  }
}

/**
 * `initialDelayMs * factor^attempt`, plus uniform jitter of up to 25% of that
 * delay.
 */
export function computeBackoffDelay(
  initialDelayMs: number,
  factor: number,
  attempt: number,
  random: () => number = Math.random,
): number {
  const delay = initialDelayMs * factor ** attempt;
  return delay + random() * delay * 0.25;
}

function isRetryable(status: number): boolean {
  return status === 429 || status >= 500;
}

function extractPageRecords(body: unknown, path: string): ApiRecord[] {
  if (Array.isArray(body)) {
    return parseRecordList(body, path);
  }

  const record = apiRecordSchema.safeParse(body);
  if (!record.success) {
    throw new ApiError(`Unexpected response format from ${path}: expected a list or an object`, 200);
  }

  for (const key of PAGE_RESULT_KEYS) {
    if (key in record.data) {
      return parseRecordList(record.data[key], path);
    }
  }
  return [];
}

function extractItems(body: unknown, path: string): ApiRecord[] {
  if (Array.isArray(body)) {
    return parseRecordList(body, path);
  }
  const record = apiRecordSchema.safeParse(body);
  if (!record.success) {
    throw new ApiError(`Unexpected response format from ${path}: expected a list or an object`, 200);
  }
  return record.data.items === undefined ? [] : parseRecordList(record.data.items, path);
}

function parseRecordList(value: unknown, path: string): ApiRecord[] {
  const parsed = apiRecordListSchema.safeParse(value);
  if (!parsed.success) {
    throw new ApiError(`Unexpected response format from ${path}: expected a list of records`, 200);
  }
  return parsed.data;
}

async function parseJson(response: Response, url: string): Promise<unknown> {
  let text: string;
  try {
    text = await response.text();
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ApiError(
      `Connection error: failed reading response from ${url} (${reason})`,
      0,
      undefined,
      { cause: error },
    );
  }
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new ApiError(`Failed to parse JSON response from ${url}`, response.status, text, {
      cause: error,
    });
  }
}

async function safeReadBody(response: Response): Promise<string> {
  try {
    return await response.text();
  } catch (error) {
    return `Failed to read response body: ${error}`;
  }
}

function parseOptionalNumber(value: string | undefined): number | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : undefined;
}

function requirePageSize(pageSize: number): number {
  if (!Number.isInteger(pageSize) || pageSize < 1) {
    throw new ValidationError(`pageSize must be a positive integer, got ${pageSize}`);
  }
  return pageSize;
}

/**
 * Builds a client from `REGFEEDS_*` environment variables. Overrides win over
 * the environment; a console logger is used unless one is supplied.
 */
export function createRegFeedsClientFromEnv(
  overrides: Partial<RegFeedsClientConfig> = {},
): RegFeedsClient {
  const apiKey = overrides.apiKey ?? process.env.REGFEEDS_API_KEY;
  if (!apiKey) {
    throw new AuthenticationError('REGFEEDS_API_KEY environment variable is required', 0);
  }

  const config: RegFeedsClientConfig = {
    apiKey,
    baseUrl: overrides.baseUrl ?? process.env.REGFEEDS_BASE_URL ?? DEFAULT_BASE_URL,
    maxRetries:
      overrides.maxRetries ??
      parseOptionalNumber(process.env.REGFEEDS_MAX_RETRIES) ??
      DEFAULT_MAX_RETRIES,
    initialRetryDelayMs:
      overrides.initialRetryDelayMs ??
      parseOptionalNumber(process.env.REGFEEDS_RETRY_DELAY_MS) ??
      DEFAULT_INITIAL_RETRY_DELAY_MS,
    backoffFactor: overrides.backoffFactor ?? DEFAULT_BACKOFF_FACTOR,
    timeoutMs:
      overrides.timeoutMs ??
      parseOptionalNumber(process.env.REGFEEDS_TIMEOUT_MS) ??
      DEFAULT_TIMEOUT_MS,
    pageSize:
      overrides.pageSize ??
      parseOptionalNumber(process.env.REGFEEDS_PAGE_SIZE) ??
      DEFAULT_PAGE_SIZE,
    logger: overrides.logger ?? new ConsoleLogger(),
    metrics: overrides.metrics,
    transport: overrides.transport,
  };

  return new RegFeedsClient(config);
}
