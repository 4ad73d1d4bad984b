/**
 * Public API surface of the Redis Cloud client.
 *
 * This is the ONLY file consumers should import from (plus
 * `redis-cloud-sdk/testing` in tests). Other modules are internal.
 */

// Client
export { CloudClient, CloudClientBuilder } from "./client.js";
export { loadEnvConfig } from "./config.js";
export type { EnvConfig, Environment } from "./config.js";

// Core types - consumer contracts
export type {
  CloudClientConfig,
  FetchFunction,
  HttpMethod,
  JsonObject,
  JsonPrimitive,
  JsonValue,
  QueryValue,
  RawResponse,
  RequestOptions,
  CircuitBreakerConfig,
  CircuitBreakerStatus,
  RateLimitConfig,
  RetryConfig,
  PageRequest,
  PaginationStrategy,
} from "./core/types.js";
export { DEFAULT_BASE_URL, DEFAULT_TIMEOUT_MS, SDK_VERSION } from "./core/types.js";

// Errors
export { CloudError, isCloudError } from "./core/errors.js";
export type { CloudErrorCategory, CloudErrorOptions } from "./core/errors.js";
export { CircuitOpenError } from "./strategies/circuit-breaker.js";

// Observability extension point
export type {
  ObservabilityAdapter,
  RequestContext,
  ResponseContext,
  ErrorContext,
  Metric,
} from "./core/types.js";
export { ConsoleObservability } from "./observability/console.js";
export type { ConsoleObservabilityConfig } from "./observability/console.js";
export { NoOpObservability, RecordingObservability } from "./observability/noop.js";

// Resource handlers and models
export * from "./handlers/common.js";
export * from "./handlers/account.js";
export * from "./handlers/acl.js";
export * from "./handlers/users.js";
export * from "./handlers/tasks.js";
export * from "./handlers/cloud-accounts.js";
export * from "./handlers/cost-report.js";
export * from "./handlers/subscriptions.js";
export * from "./handlers/databases.js";
export * from "./handlers/fixed/subscriptions.js";
export * from "./handlers/fixed/databases.js";
export * from "./handlers/connectivity/index.js";

// Middleware
export { ApiRequest } from "./service/api-request.js";
export type { ApiResponse } from "./service/api-request.js";
export {
  ClientService,
  ServiceBuilder,
  retryLayer,
  circuitBreakerLayer,
  rateLimitLayer,
} from "./service/client-service.js";
export type {
  Service,
  Layer,
  RetryLayerOptions,
  CircuitBreakerLayer,
  RateLimitLayer,
} from "./service/client-service.js";

// Strategies
export { IdempotencyLevel, CircuitState } from "./core/types.js";
export type { IdempotencyConfig } from "./core/types.js";
export { RetryStrategy } from "./strategies/retry.js";
export type { Sleeper } from "./strategies/retry.js";
export { CircuitBreaker, isOutage } from "./strategies/circuit-breaker.js";
export { RateLimiter } from "./strategies/rate-limit.js";
export { IdempotencyResolver } from "./strategies/idempotency.js";
export {
  OffsetPaginationStrategy,
  paginate,
  collect,
  DEFAULT_PAGE_SIZE,
  DEFAULT_MAX_PAGES,
} from "./strategies/pagination.js";
export type { PaginateOptions } from "./strategies/pagination.js";
