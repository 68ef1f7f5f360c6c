/**
 * @libs/regfeeds-client
 *
 * Regulatory Feeds API Client Library
 *
 * Typed access to the regulatory-feed REST API:
 * - Topics, feeds, and entries (feed-scoped, topic-scoped, or paginated)
 * - User topic subscriptions
 * - Annotations by feed entry, topic, or user
 *
 * ## Usage
 *
 * ```typescript
 * import { createRegFeedsClientFromEnv } from '@libs/regfeeds-client';
 *
 * const client = createRegFeedsClientFromEnv();
 * const topics = await client.listTopics();
 * const entries = await client.getFeedEntries('feed-123', 100);
 * const annotations = await client.getAnnotations({ topicIds: ['topic-1'] });
 * ```
 *
 * ## Environment Variables
 *
 * Required:
 * - `REGFEEDS_API_KEY` - API key sent as the `X-API-Key` header
 *
 * Optional:
 * - `REGFEEDS_BASE_URL` - Base URL (default: https://app.carveragents.ai)
 * - `REGFEEDS_MAX_RETRIES` - Max attempts for 429/5xx responses (default: 3)
 * - `REGFEEDS_RETRY_DELAY_MS` - Initial backoff delay in ms (default: 1000)
 * - `REGFEEDS_TIMEOUT_MS` - Per-request timeout in ms (default: 30000)
 * - `REGFEEDS_PAGE_SIZE` - Page size for paginated endpoints (default: 1000)
 */

// ============================================================================
// Primary API - Client and Factory
// ============================================================================

export {
  RegFeedsClient,
  createRegFeedsClientFromEnv,
  computeBackoffDelay,
  DEFAULT_BASE_URL,
  DEFAULT_PAGE_SIZE,
  DEFAULT_MAX_RETRIES,
  DEFAULT_INITIAL_RETRY_DELAY_MS,
  DEFAULT_TIMEOUT_MS,
} from './regFeedsClient';

// ============================================================================
// Type Exports
// ============================================================================

export type {
  RegFeedsClientConfig,
  QueryParams,
  QueryParamValue,
  HttpMethod,
  ListEntriesParams,
  AnnotationFilters,
  ApiRecord,
  Annotation,
  TopicSubscription,
  UserTopicSubscriptions,
} from './types';

// ============================================================================
// Error Exports
// ============================================================================

export {
  RegFeedsError,
  ValidationError,
  ApiError,
  AuthenticationError,
  RateLimitError,
} from './types';
