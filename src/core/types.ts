/**
 * Core type definitions for the Redis Cloud SDK
 */

import type { CloudError } from "./errors.js";

// ============================================================================
// JSON
// ============================================================================

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue =
  | JsonPrimitive
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

// ============================================================================
// Request Types
// ============================================================================

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE";

export type QueryValue = string | number | boolean | undefined;

export interface RequestOptions {
  method?: HttpMethod;
  headers?: Record<string, string>;
  body?: unknown;
  query?: Record<string, QueryValue>;
  timeout?: number;
}

export interface RawResponse<T = unknown> {
  status: number;
  headers: Headers;
  body: T;
}

export interface RequestContext {
  endpoint: string;
  method: HttpMethod;
  requestId: string;
  timestamp: Date;
  options: RequestOptions;
}

export interface ResponseContext {
  endpoint: string;
  method: HttpMethod;
  requestId: string;
  statusCode: number;
  duration: number;
  timestamp: Date;
}

export interface ErrorContext {
  endpoint: string;
  method: HttpMethod;
  requestId: string;
  error: CloudError;
  duration: number;
  timestamp: Date;
}

// ============================================================================
// Idempotency
// ============================================================================

export enum IdempotencyLevel {
  SAFE = "SAFE", // Always safe to retry (GET /subscriptions)
  IDEMPOTENT = "IDEMPOTENT", // Safe if repeated (PUT /subscriptions/123)
  CONDITIONAL = "CONDITIONAL", // Safe with idempotency key
  UNSAFE = "UNSAFE", // Never retry (POST /subscriptions)
}

export interface IdempotencyConfig {
  defaultSafeOperations: Set<string>; // e.g., ["GET", "HEAD", "OPTIONS"]
  defaultIdempotentOperations: Set<string>; // e.g., ["PUT", "DELETE"]
  operationOverrides: Map<string, IdempotencyLevel>; // e.g., "POST /subscriptions/:id/databases/:db/backup" -> IDEMPOTENT
}

// ============================================================================
// Pagination
// ============================================================================

export interface PageRequest {
  offset: number;
  limit: number;
}

export interface PaginationStrategy {
  firstPage(): PageRequest;
  nextPage(current: PageRequest, itemsReturned: number): PageRequest | null;
  toQuery(page: PageRequest): Record<string, QueryValue>;
}

// ============================================================================
// Circuit Breaker
// ============================================================================

export enum CircuitState {
  CLOSED = "CLOSED", // Normal operation
  OPEN = "OPEN", // Failing, reject immediately
  HALF_OPEN = "HALF_OPEN", // Testing recovery
}

export interface CircuitBreakerConfig {
  failureThreshold: number; // Open after N failures (default: 5)
  successThreshold: number; // Close after N successes in HALF_OPEN (default: 2)
  timeout: number; // Time in OPEN before HALF_OPEN (default: 60000ms)
  volumeThreshold: number; // Min requests before circuit can open (default: 10)
  rollingWindowMs: number; // Error rate calculation window (default: 60000ms)
  errorThresholdPercentage: number; // Open if error rate exceeds this (default: 50)
}

export interface CircuitBreakerStatus {
  state: CircuitState;
  failures: number;
  successes: number;
  lastFailure: Date | null;
  nextAttempt: Date | null;
}

// ============================================================================
// Rate Limiting
// ============================================================================

export interface RateLimitConfig {
  tokensPerSecond: number;
  maxTokens: number;
  adaptiveBackoff: boolean;
  queueSize: number; // Max queued requests when at limit
}

// ============================================================================
// Retry
// ============================================================================

export interface RetryConfig {
  maxRetries: number;
  baseDelay: number; // Base delay in ms
  maxDelay: number; // Max delay in ms
  jitter: boolean;
}

// ============================================================================
// Observability
// ============================================================================

export interface Metric {
  name: string;
  value: number;
  tags: Record<string, string>;
  timestamp: Date;
}

export interface ObservabilityAdapter {
  logRequest(context: RequestContext): void;
  logResponse(context: ResponseContext): void;
  logError(context: ErrorContext): void;
  logWarning(message: string, metadata?: Record<string, unknown>): void;
  recordMetric(metric: Metric): void;
}

// ============================================================================
// Configuration
// ============================================================================

export type FetchFunction = (
  input: string | URL | Request,
  init?: RequestInit
) => Promise<Response>;

export interface CloudClientConfig {
  apiKey: string;
  apiSecret: string;
  baseUrl: string;
  timeout: number;
  userAgent: string;
  observability: ObservabilityAdapter[];
  fetch: FetchFunction;
}

// ============================================================================
// Versioning
// ============================================================================

export const SDK_VERSION = "0.1.0";

export const DEFAULT_BASE_URL = "https://api.redislabs.com/v1";

export const DEFAULT_TIMEOUT_MS = 30000;
