import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { CircuitBreaker, CircuitOpenError, isOutage } from "./circuit-breaker.js";
import { CircuitState } from "../core/types.js";
import { CloudError } from "../core/errors.js";

const fail = async (): Promise<never> => {
  throw new Error("boom");
};
const succeed = async (): Promise<string> => "ok";
const notFound = async (): Promise<never> => {
  throw new CloudError("Not Found (404): gone", "not_found", { status: 404 });
};

async function failTimes(breaker: CircuitBreaker, times: number): Promise<void> {
  for (let i = 0; i < times; i++) {
    await expect(breaker.execute(fail)).rejects.toThrow();
  }
}

describe("CircuitBreaker", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2024-01-01T00:00:00Z"));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("stays closed below the volume threshold", async () => {
    const breaker = new CircuitBreaker("test", { failureThreshold: 2, volumeThreshold: 5 });

    await failTimes(breaker, 4);

    expect(breaker.getStatus().state).toBe(CircuitState.CLOSED);
    expect(breaker.getStatus().failures).toBe(4);
  });

  it("opens once failures reach the threshold", async () => {
    const breaker = new CircuitBreaker("test", {
      failureThreshold: 3,
      volumeThreshold: 3,
      timeout: 1000,
    });

    await failTimes(breaker, 3);

    const status = breaker.getStatus();
    expect(status.state).toBe(CircuitState.OPEN);
    expect(status.nextAttempt?.toISOString()).toBe("2024-01-01T00:00:01.000Z");
    expect(status.lastFailure?.toISOString()).toBe("2024-01-01T00:00:00.000Z");
  });

  it("rejects immediately while open", async () => {
    const breaker = new CircuitBreaker("subscriptions", {
      failureThreshold: 1,
      volumeThreshold: 1,
      timeout: 1000,
    });
    await failTimes(breaker, 1);
    const fn = vi.fn(succeed);

    const rejected = breaker.execute(fn);

    await expect(rejected).rejects.toBeInstanceOf(CircuitOpenError);
    await expect(rejected).rejects.toThrow("Circuit breaker is OPEN for subscriptions");
    expect(fn).not.toHaveBeenCalled();
  });

  it("marks the open error as not retryable", async () => {
    const error = new CircuitOpenError("test", new Date("2024-01-01T00:00:01Z"));

    expect(error.category).toBe("circuit_open");
    expect(error.retryable).toBe(false);
    expect(error.detail).toBe("next attempt 2024-01-01T00:00:01.000Z");
  });

  it("closes again after enough half-open successes", async () => {
    const breaker = new CircuitBreaker("test", {
      failureThreshold: 1,
      volumeThreshold: 1,
      successThreshold: 2,
      timeout: 1000,
    });
    await failTimes(breaker, 1);
    vi.advanceTimersByTime(1000);

    await breaker.execute(succeed);
    expect(breaker.getStatus().state).toBe(CircuitState.HALF_OPEN);

    await breaker.execute(succeed);
    expect(breaker.getStatus().state).toBe(CircuitState.CLOSED);
  });

  it("reopens on a half-open failure", async () => {
    const breaker = new CircuitBreaker("test", {
      failureThreshold: 1,
      volumeThreshold: 1,
      timeout: 1000,
    });
    await failTimes(breaker, 1);
    vi.advanceTimersByTime(1000);

    await failTimes(breaker, 1);

    expect(breaker.getStatus().state).toBe(CircuitState.OPEN);
    expect(breaker.getStatus().nextAttempt?.toISOString()).toBe("2024-01-01T00:00:02.000Z");
  });

  it("reset returns to a clean closed state", async () => {
    const breaker = new CircuitBreaker("test", { failureThreshold: 1, volumeThreshold: 1 });
    await failTimes(breaker, 1);

    breaker.reset();

    expect(breaker.getStatus()).toEqual({
      state: CircuitState.CLOSED,
      failures: 0,
      successes: 0,
      lastFailure: null,
      nextAttempt: null,
    });
  });

  it("keeps the circuit closed through repeated 404s", async () => {
    const breaker = new CircuitBreaker("test", { failureThreshold: 2, volumeThreshold: 2 });

    for (let i = 0; i < 5; i++) {
      await expect(breaker.execute(notFound)).rejects.toMatchObject({ category: "not_found" });
    }

    expect(breaker.getStatus()).toMatchObject({
      state: CircuitState.CLOSED,
      failures: 0,
      lastFailure: null,
    });
  });

  it("counts a 404 in half-open as a successful probe", async () => {
    const breaker = new CircuitBreaker("test", {
      failureThreshold: 1,
      volumeThreshold: 1,
      successThreshold: 1,
      timeout: 1000,
    });
    await failTimes(breaker, 1);
    vi.advanceTimersByTime(1000);

    await expect(breaker.execute(notFound)).rejects.toBeInstanceOf(CloudError);

    expect(breaker.getStatus().state).toBe(CircuitState.CLOSED);
  });
});

describe("isOutage", () => {
  it.each([
    ["request", undefined, true],
    ["connection", undefined, true],
    ["rate_limited", 429, true],
    ["internal_server_error", 500, true],
    ["service_unavailable", 503, true],
    ["api_error", 502, true],
    ["bad_request", 400, false],
    ["not_found", 404, false],
    ["api_error", 409, false],
    ["json", undefined, false],
  ] as const)("%s (%s) -> %s", (category, status, expected) => {
    const error = new CloudError("failed", category, status === undefined ? {} : { status });

    expect(isOutage(error)).toBe(expected);
  });

  it("treats errors from outside the client as outages", () => {
    expect(isOutage(new Error("socket hang up"))).toBe(true);
  });
});
