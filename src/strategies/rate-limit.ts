/**
 * Token bucket rate limiter with a bounded wait queue
 */

import type { RateLimitConfig } from "../core/types.js";
import { CloudError } from "../core/errors.js";

export class RateLimiter {
  private tokens: number;
  private lastRefill: number;
  private config: RateLimitConfig;
  private queue: Array<{
    resolve: () => void;
    reject: (error: CloudError) => void;
  }> = [];
  private processingQueue = false;

  constructor(config: Partial<RateLimitConfig> = {}) {
    this.config = {
      tokensPerSecond: config.tokensPerSecond ?? 10,
      maxTokens: config.maxTokens ?? 100,
      adaptiveBackoff: config.adaptiveBackoff ?? true,
      queueSize: config.queueSize ?? 50,
    };
    this.tokens = this.config.maxTokens;
    this.lastRefill = Date.now();
  }

  async acquire(): Promise<void> {
    this.refill();

    if (this.tokens >= 1) {
      this.tokens--;
      return;
    }

    if (this.queue.length >= this.config.queueSize) {
      throw new CloudError(
        `Rate limit queue is full (${this.config.queueSize} waiting)`,
        "rate_limited",
        { detail: "local queue is full" }
      );
    }

    return new Promise<void>((resolve, reject) => {
      this.queue.push({ resolve, reject });
      void this.processQueue();
    });
  }

  /** Tokens currently available, after refill. */
  available(): number {
    this.refill();
    return this.tokens;
  }

  private refill(): void {
    const now = Date.now();

    // lastRefill can sit in the future after handle429
    const elapsed = Math.max(0, (now - this.lastRefill) / 1000);
    const tokensToAdd = elapsed * this.config.tokensPerSecond;

    if (tokensToAdd > 0) {
      this.tokens = Math.min(this.config.maxTokens, this.tokens + tokensToAdd);
      this.lastRefill = now;
    }
  }

  /** Never rejects: waiters are settled individually. */
  private async processQueue(): Promise<void> {
    if (this.processingQueue || this.queue.length === 0) {
      return;
    }

    this.processingQueue = true;

    try {
      while (this.queue.length > 0) {
        this.refill();

        if (this.tokens >= 1) {
          this.tokens--;
          this.queue.shift()?.resolve();
        } else {
          const waitTime = Math.max(
            (1 / this.config.tokensPerSecond) * 1000,
            this.lastRefill - Date.now()
          );
          await new Promise((resolve) => setTimeout(resolve, waitTime));
        }
      }
    } finally {
      this.processingQueue = false;
    }
  }

  /**
   * Pauses refill for `retryAfter` seconds after the server answered 429.
   */
  handle429(retryAfter: number): void {
    if (this.config.adaptiveBackoff) {
      this.lastRefill = Date.now() + retryAfter * 1000;
    }
  }

  reset(): void {
    this.tokens = this.config.maxTokens;
    this.lastRefill = Date.now();
    const pending = this.queue;
    this.queue = [];
    pending.forEach((item) =>
      item.reject(
        new CloudError("Rate limiter was reset while waiting for a token", "rate_limited", {
          detail: "limiter reset",
        })
      )
    );
  }
}
