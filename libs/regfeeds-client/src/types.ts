import { z } from 'zod';
import type { HttpTransport, Logger, MetricsSink } from '@libs/http-client-core';

/**
 * Regulatory Feeds API Client Types
 *
 * Configuration, request parameters, response schemas, and the error taxonomy
 * shared by every layer of the SDK.
 */

// ============================================================================
// Errors
// ============================================================================

export class RegFeedsError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RegFeedsError';
  }
}

/** Caller-supplied arguments violate a precondition. Raised before any I/O. */
export class ValidationError extends RegFeedsError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ValidationError';
  }
}

export class ApiError extends RegFeedsError {
  constructor(
    message: string,
    public readonly status: number,
    public readonly responseBody?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ApiError';
  }
}

export class AuthenticationError extends ApiError {
  constructor(message: string, status = 401, responseBody?: string) {
    super(message, status, responseBody);
    this.name = 'AuthenticationError';
  }
}

export class RateLimitError extends ApiError {
  constructor(message: string, responseBody?: string) {
    super(message, 429, responseBody);
    this.name = 'RateLimitError';
  }
}

// ============================================================================
// Client configuration
// ============================================================================

export interface RegFeedsClientConfig {
  apiKey: string;
  baseUrl?: string;
  /** Upper bound on attempts for 429/5xx responses. */
  maxRetries?: number;
  initialRetryDelayMs?: number;
  backoffFactor?: number;
  timeoutMs?: number;
  pageSize?: number;
  logger?: Logger;
  metrics?: MetricsSink;
  transport?: HttpTransport;
}

export type QueryParamValue = string | number | boolean | undefined;
export type QueryParams = Record<string, QueryParamValue>;

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

// ============================================================================
// Request parameters
// ============================================================================

export interface ListEntriesParams {
  feedId?: string;
  isActive?: boolean;
  pageSize?: number;
  /** Fetch every page instead of the first one only. */
  fetchAll?: boolean;
}

/** Exactly one filter may be supplied per request. */
export interface AnnotationFilters {
  feedEntryIds?: string[];
  topicIds?: string[];
  userIds?: string[];
}

// ============================================================================
// Response schemas
// ============================================================================

export const apiRecordSchema = z.record(z.unknown());
export const apiRecordListSchema = z.array(apiRecordSchema);

export type ApiRecord = z.infer<typeof apiRecordSchema>;

export const topicSubscriptionSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    description: z.string().nullable().optional(),
    base_domain: z.string().nullable().optional(),
  })
  .passthrough();

export const userTopicSubscriptionsSchema = z
  .object({
    subscriptions: z.array(topicSubscriptionSchema),
    total_count: z.number().optional(),
  })
  .passthrough();

export type TopicSubscription = z.infer<typeof topicSubscriptionSchema>;
export type UserTopicSubscriptions = z.infer<typeof userTopicSubscriptionsSchema>;

const scoreSchema = z
  .object({
    label: z.string().optional(),
    score: z.number().optional(),
    confidence: z.number().optional(),
  })
  .passthrough();

export const annotationSchema = z
  .object({
    feed_entry_id: z.string().optional(),
    topic_id: z.string().optional(),
    user_id: z.string().optional(),
    annotation: z
      .object({
        scores: z.record(scoreSchema).optional(),
        classification: apiRecordSchema.optional(),
        metadata: apiRecordSchema.optional(),
        entry_id: z.string().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export const annotationListSchema = z.array(annotationSchema);

export type Annotation = z.infer<typeof annotationSchema>;
