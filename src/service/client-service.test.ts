import { describe, it, expect } from "vitest";
import { ApiRequest } from "./api-request.js";
import {
  ServiceBuilder,
  circuitBreakerLayer,
  rateLimitLayer,
  type Service,
} from "./client-service.js";
import { MockCloudApi } from "../testing/mock-api.js";
import {
  accepted,
  noContent,
  notFound,
  rateLimited,
  serviceUnavailable,
  success,
} from "../testing/responses.js";
import { CircuitState, IdempotencyLevel } from "../core/types.js";
import { CloudError } from "../core/errors.js";

const noSleep = async (_ms: number): Promise<void> => {};

describe("ApiRequest", () => {
  it("carries a body only when given one", () => {
    expect(ApiRequest.get("/subscriptions")).toEqual({ method: "GET", path: "/subscriptions" });
    expect(ApiRequest.post("/subscriptions", { name: "prod" })).toEqual({
      method: "POST",
      path: "/subscriptions",
      body: { name: "prod" },
    });
  });

  it("copies a request with an idempotency key", () => {
    const request = ApiRequest.post("/subscriptions", { name: "prod" });

    expect(request.withIdempotencyKey("create-prod-1")).toEqual({
      method: "POST",
      path: "/subscriptions",
      body: { name: "prod" },
      idempotencyKey: "create-prod-1",
    });
    expect(request.idempotencyKey).toBeUndefined();
  });
});

describe("ClientService", () => {
  it("returns the status and JSON body", async () => {
    const api = new MockCloudApi().on("POST", "/acl/users", accepted("t-1", "aclUserCreateRequest"));

    const response = await api.client().intoService().call(ApiRequest.post("/acl/users", { name: "app" }));

    expect(response).toEqual({
      status: 202,
      body: { taskId: "t-1", commandType: "aclUserCreateRequest", status: "received" },
    });
  });

  it("reports a bodiless delete as deleted", async () => {
    const api = new MockCloudApi().on("DELETE", "/acl/users/:id", noContent());

    const response = await api.client().intoService().call(ApiRequest.delete("/acl/users/7"));

    expect(response).toEqual({ status: 204, body: { status: "deleted" } });
  });

  it("refuses a write without a body before sending it", async () => {
    const api = new MockCloudApi();

    await expect(
      api.client().intoService().call(new ApiRequest("PUT", "/subscriptions/1"))
    ).rejects.toMatchObject({
      category: "bad_request",
      status: 400,
      message: "Bad Request (400): PUT request requires a body",
    });
    expect(api.calls).toHaveLength(0);
  });
});

describe("ServiceBuilder", () => {
  it("retries a safe request through transient failures", async () => {
    const api = new MockCloudApi().on(
      "GET",
      "/subscriptions",
      serviceUnavailable(),
      serviceUnavailable(),
      success({ subscriptions: [] })
    );
    const service = new ServiceBuilder()
      .retry({ maxRetries: 2 }, { sleep: noSleep })
      .service(api.client().intoService());

    const response = await service.call(ApiRequest.get("/subscriptions"));

    expect(response).toEqual({ status: 200, body: { subscriptions: [] } });
    expect(api.calls).toHaveLength(3);
  });

  it("does not retry a POST", async () => {
    const api = new MockCloudApi().on("POST", "/subscriptions", serviceUnavailable(), success({}));
    const service = new ServiceBuilder()
      .retry({ maxRetries: 2 }, { sleep: noSleep })
      .service(api.client().intoService());

    await expect(service.call(ApiRequest.post("/subscriptions", {}))).rejects.toMatchObject({
      category: "service_unavailable",
    });
    expect(api.calls).toHaveLength(1);
  });

  it("retries a POST declared idempotent", async () => {
    const api = new MockCloudApi().on(
      "POST",
      "/subscriptions/:sub/databases/:db/backup",
      serviceUnavailable(),
      accepted("t-2", "databaseBackupRequest")
    );
    const service = new ServiceBuilder()
      .retry(
        { maxRetries: 1 },
        {
          sleep: noSleep,
          idempotency: {
            operationOverrides: new Map([
              ["POST /subscriptions/:id/databases/:db/backup", IdempotencyLevel.IDEMPOTENT],
            ]),
          },
        }
      )
      .service(api.client().intoService());

    const response = await service.call(ApiRequest.post("/subscriptions/1/databases/2/backup", {}));

    expect(response.status).toBe(202);
    expect(api.calls).toHaveLength(2);
  });

  it("opens the circuit after repeated failures", async () => {
    const api = new MockCloudApi().on("GET", "/tasks", serviceUnavailable());
    const builder = new ServiceBuilder().circuitBreaker({ failureThreshold: 2, volumeThreshold: 2 });
    const service = builder.service(api.client().intoService());

    await expect(service.call(ApiRequest.get("/tasks"))).rejects.toBeInstanceOf(CloudError);
    await expect(service.call(ApiRequest.get("/tasks"))).rejects.toBeInstanceOf(CloudError);
    await expect(service.call(ApiRequest.get("/tasks"))).rejects.toMatchObject({
      category: "circuit_open",
      message: "Circuit breaker is OPEN for redis-cloud",
    });

    expect(api.calls).toHaveLength(2);
    expect(builder.circuitStatus()?.state).toBe(CircuitState.OPEN);
  });

  it("keeps the circuit closed when one resource keeps answering 404", async () => {
    const api = new MockCloudApi()
      .on("GET", "/subscriptions/:id", notFound("Subscription 9 not found"))
      .on("GET", "/subscriptions", success({ subscriptions: [] }));
    const builder = new ServiceBuilder().circuitBreaker({ failureThreshold: 2, volumeThreshold: 2 });
    const service = builder.service(api.client().intoService());

    await expect(service.call(ApiRequest.get("/subscriptions/9"))).rejects.toMatchObject({
      category: "not_found",
    });
    await expect(service.call(ApiRequest.get("/subscriptions/9"))).rejects.toMatchObject({
      category: "not_found",
    });
    const response = await service.call(ApiRequest.get("/subscriptions"));

    expect(response).toEqual({ status: 200, body: { subscriptions: [] } });
    expect(api.calls).toHaveLength(3);
    expect(builder.circuitStatus()?.state).toBe(CircuitState.CLOSED);
  });

  it("retries a conditional operation only when it carries a key", async () => {
    const conditional = {
      sleep: noSleep,
      idempotency: {
        operationOverrides: new Map([["POST /subscriptions", IdempotencyLevel.CONDITIONAL]]),
      },
    };
    const api = new MockCloudApi().on(
      "POST",
      "/subscriptions",
      serviceUnavailable(),
      accepted("t-3", "subscriptionCreateRequest")
    );
    const service = new ServiceBuilder()
      .retry({ maxRetries: 2 }, conditional)
      .service(api.client().intoService());
    const request = ApiRequest.post("/subscriptions", { name: "prod" });

    const response = await service.call(request.withIdempotencyKey("create-prod-1"));

    expect(response.status).toBe(202);
    expect(api.calls).toHaveLength(2);
    expect(api.calls.map((call) => call.headers.get("idempotency-key"))).toEqual([
      "create-prod-1",
      "create-prod-1",
    ]);

    const keyless = new MockCloudApi().on("POST", "/subscriptions", serviceUnavailable(), success({}));
    const keylessService = new ServiceBuilder()
      .retry({ maxRetries: 2 }, conditional)
      .service(keyless.client().intoService());

    await expect(keylessService.call(request)).rejects.toMatchObject({
      category: "service_unavailable",
    });
    expect(keyless.calls).toHaveLength(1);
    expect(keyless.calls[0]?.headers.get("idempotency-key")).toBeNull();
  });

  it("reports no circuit status without a breaker", () => {
    expect(new ServiceBuilder().circuitStatus()).toBeNull();
  });

  it("applies the first layer outermost", async () => {
    const order: string[] = [];
    const tag =
      (name: string) =>
      (inner: Service): Service => ({
        call: async (request) => {
          order.push(`${name}:in`);
          const response = await inner.call(request);
          order.push(`${name}:out`);
          return response;
        },
      });
    const inner: Service = {
      call: async () => {
        order.push("inner");
        return { status: 200, body: null };
      },
    };

    await new ServiceBuilder().layer(tag("a")).layer(tag("b")).service(inner).call(ApiRequest.get("/"));

    expect(order).toEqual(["a:in", "b:in", "inner", "b:out", "a:out"]);
  });

  it("passes rate-limited errors through the rate limit layer", async () => {
    const api = new MockCloudApi().on("GET", "/", rateLimited(1));
    const service = new ServiceBuilder()
      .rateLimit({ tokensPerSecond: 100, maxTokens: 5 })
      .service(api.client().intoService());

    await expect(service.call(ApiRequest.get("/"))).rejects.toMatchObject({
      category: "rate_limited",
      status: 429,
    });
  });

  it("exposes the breaker of a standalone layer", () => {
    const layer = circuitBreakerLayer({}, "billing");

    expect(layer.breaker.getStatus().state).toBe(CircuitState.CLOSED);
  });

  it("pauses the token bucket after a 429 with Retry-After", async () => {
    const api = new MockCloudApi().on("GET", "/", rateLimited(2));
    const layer = rateLimitLayer({ tokensPerSecond: 1000, maxTokens: 5 });
    const service = layer(api.client().intoService());

    await expect(service.call(ApiRequest.get("/"))).rejects.toMatchObject({ category: "rate_limited" });
    await new Promise((resolve) => setTimeout(resolve, 30));

    expect(layer.limiter.available()).toBe(4);
  });
});
