/**
 * Request/response service over the client, so cross-cutting behavior can be
 * stacked as layers instead of living inside each handler.
 */

import type { CloudClient } from "../client.js";
import type {
  CircuitBreakerConfig,
  CircuitBreakerStatus,
  IdempotencyConfig,
  RateLimitConfig,
  RetryConfig,
} from "../core/types.js";
import { CloudError } from "../core/errors.js";
import { CircuitBreaker } from "../strategies/circuit-breaker.js";
import { IdempotencyResolver } from "../strategies/idempotency.js";
import { RateLimiter } from "../strategies/rate-limit.js";
import { RetryStrategy, type Sleeper } from "../strategies/retry.js";
import type { ApiRequest, ApiResponse } from "./api-request.js";

export interface Service<Req = ApiRequest, Res = ApiResponse> {
  call(request: Req): Promise<Res>;
}

export type Layer<Req = ApiRequest, Res = ApiResponse> = (
  inner: Service<Req, Res>
) => Service<Req, Res>;

/** Innermost service: one HTTP exchange through the client. */
export class ClientService implements Service {
  constructor(private readonly client: CloudClient) {}

  async call(request: ApiRequest): Promise<ApiResponse> {
    if (
      request.body === undefined &&
      (request.method === "POST" || request.method === "PUT" || request.method === "PATCH")
    ) {
      const text = `${request.method} request requires a body`;
      throw new CloudError(`Bad Request (400): ${text}`, "bad_request", {
        status: 400,
        detail: text,
      });
    }

    const headers =
      request.idempotencyKey === undefined
        ? undefined
        : { "Idempotency-Key": request.idempotencyKey };
    const response = await this.client.send(request.method, request.path, request.body, headers);
    return { status: response.status, body: response.body };
  }
}

// ============================================================================
// Layers
// ============================================================================

export interface RetryLayerOptions {
  idempotency?: Partial<IdempotencyConfig>;
  sleep?: Sleeper;
}

/**
 * Retries retryable failures of requests whose method and path resolve to
 * a safe or idempotent operation, or to a CONDITIONAL one sent with an
 * idempotency key.
 */
export function retryLayer(
  config: Partial<RetryConfig>,
  options: RetryLayerOptions = {}
): Layer {
  const strategy = new RetryStrategy(config, options.sleep);
  const resolver = new IdempotencyResolver(options.idempotency);
  return (inner) => ({
    call: (request) =>
      strategy.execute(
        () => inner.call(request),
        resolver.getIdempotencyLevel(request.method, request.path),
        request.idempotencyKey !== undefined
      ),
  });
}

export interface CircuitBreakerLayer extends Layer {
  readonly breaker: CircuitBreaker;
}

export function circuitBreakerLayer(
  config: Partial<CircuitBreakerConfig> = {},
  name = "redis-cloud"
): CircuitBreakerLayer {
  const breaker = new CircuitBreaker(name, config);
  const layer: Layer = (inner) => ({
    call: (request) => breaker.execute(() => inner.call(request)),
  });
  return Object.assign(layer, { breaker });
}

/**
 * Waits for a token before each call. A 429 carrying Retry-After pauses the
 * bucket for that long.
 */
export interface RateLimitLayer extends Layer {
  readonly limiter: RateLimiter;
}

export function rateLimitLayer(config: Partial<RateLimitConfig> = {}): RateLimitLayer {
  const limiter = new RateLimiter(config);
  const layer: Layer = (inner) => ({
    call: async (request) => {
      await limiter.acquire();
      try {
        return await inner.call(request);
      } catch (error) {
        if (error instanceof CloudError && error.category === "rate_limited" && error.retryAfter) {
          const seconds = Math.ceil((error.retryAfter.getTime() - Date.now()) / 1000);
          limiter.handle429(Math.max(0, seconds));
        }
        throw error;
      }
    },
  });
  return Object.assign(layer, { limiter });
}

// ============================================================================
// Builder
// ============================================================================

/**
 * Composes layers around a service. The first layer added is the outermost.
 *
 * @example
 * const service = new ServiceBuilder()
 *   .rateLimit({ tokensPerSecond: 5 })
 *   .retry({ maxRetries: 2 })
 *   .service(client.intoService());
 */
export class ServiceBuilder {
  private readonly layers: Layer[] = [];
  private breaker: CircuitBreaker | undefined;

  layer(layer: Layer): this {
    this.layers.push(layer);
    return this;
  }

  retry(config: Partial<RetryConfig>, options: RetryLayerOptions = {}): this {
    return this.layer(retryLayer(config, options));
  }

  circuitBreaker(config: Partial<CircuitBreakerConfig> = {}, name?: string): this {
    const layer = circuitBreakerLayer(config, name);
    this.breaker = layer.breaker;
    return this.layer(layer);
  }

  rateLimit(config: Partial<RateLimitConfig> = {}): this {
    return this.layer(rateLimitLayer(config));
  }

  /** Status of the most recently added circuit breaker, if any. */
  circuitStatus(): CircuitBreakerStatus | null {
    return this.breaker?.getStatus() ?? null;
  }

  service(inner: Service): Service {
    return this.layers.reduceRight<Service>((wrapped, layer) => layer(wrapped), inner);
  }
}
