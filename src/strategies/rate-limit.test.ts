import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { RateLimiter } from "./rate-limit.js";
import { CloudError } from "../core/errors.js";

describe("RateLimiter", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2024-01-01T00:00:00Z"));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("hands out the burst and then reports an empty bucket", async () => {
    const limiter = new RateLimiter({ tokensPerSecond: 1, maxTokens: 3 });

    await limiter.acquire();
    await limiter.acquire();
    await limiter.acquire();

    expect(limiter.available()).toBe(0);
  });

  it("refills at tokensPerSecond up to maxTokens", async () => {
    const limiter = new RateLimiter({ tokensPerSecond: 1, maxTokens: 3 });
    await limiter.acquire();
    await limiter.acquire();
    await limiter.acquire();

    vi.advanceTimersByTime(1500);
    expect(limiter.available()).toBe(1.5);

    vi.advanceTimersByTime(10000);
    expect(limiter.available()).toBe(3);
  });

  describe("queue", () => {
    it("rejects with rate_limited once the queue is full", async () => {
      const limiter = new RateLimiter({ tokensPerSecond: 1, maxTokens: 1, queueSize: 1 });
      await limiter.acquire();
      const queued = limiter.acquire();

      const overflow = limiter.acquire();

      await expect(overflow).rejects.toBeInstanceOf(CloudError);
      await expect(overflow).rejects.toMatchObject({
        category: "rate_limited",
        message: "Rate limit queue is full (1 waiting)",
        retryable: true,
      });

      await vi.advanceTimersByTimeAsync(1000);
      await expect(queued).resolves.toBeUndefined();
    });

    it("releases waiters in order as tokens arrive", async () => {
      const limiter = new RateLimiter({ tokensPerSecond: 1, maxTokens: 1, queueSize: 5 });
      const released: number[] = [];
      await limiter.acquire();

      const first = limiter.acquire().then(() => released.push(1));
      const second = limiter.acquire().then(() => released.push(2));

      await vi.advanceTimersByTimeAsync(1000);
      expect(released).toEqual([1]);

      await vi.advanceTimersByTimeAsync(1000);
      await Promise.all([first, second]);
      expect(released).toEqual([1, 2]);
    });

    it("rejects waiters when reset and refills the bucket", async () => {
      const limiter = new RateLimiter({ tokensPerSecond: 1, maxTokens: 2, queueSize: 5 });
      await limiter.acquire();
      await limiter.acquire();
      const waiting = limiter.acquire();

      limiter.reset();

      await expect(waiting).rejects.toMatchObject({
        category: "rate_limited",
        message: "Rate limiter was reset while waiting for a token",
      });
      expect(limiter.available()).toBe(2);
    });
  });

  describe("429 handling", () => {
    it("pauses refill until Retry-After has passed", async () => {
      const limiter = new RateLimiter({ tokensPerSecond: 2, maxTokens: 10 });
      for (let i = 0; i < 4; i++) {
        await limiter.acquire();
      }

      limiter.handle429(2);

      vi.advanceTimersByTime(1999);
      expect(limiter.available()).toBe(6);

      vi.advanceTimersByTime(501);
      expect(limiter.available()).toBe(7);
    });

    it("keeps refilling when adaptiveBackoff is off", async () => {
      const limiter = new RateLimiter({
        tokensPerSecond: 2,
        maxTokens: 10,
        adaptiveBackoff: false,
      });
      await limiter.acquire();

      limiter.handle429(60);
      vi.advanceTimersByTime(500);

      expect(limiter.available()).toBe(10);
    });
  });
});
