/**
 * Retry logic with exponential backoff and idempotency awareness
 *
 * POLICY (safety-first):
 * - Default: NO retry (maxRetries = 0)
 * - Retry ONLY if BOTH conditions are met:
 *   1. Error is EXPLICITLY marked as retryable
 *   2. Idempotency is PROVEN (SAFE, IDEMPOTENT, or CONDITIONAL with key)
 */

import type { RetryConfig } from "../core/types.js";
import { IdempotencyLevel } from "../core/types.js";
import { millisUntil } from "../core/header-parser.js";

export type Sleeper = (ms: number) => Promise<void>;

const defaultSleep: Sleeper = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export class RetryStrategy {
  private config: RetryConfig;
  private sleep: Sleeper;

  constructor(config: Partial<RetryConfig> = {}, sleep: Sleeper = defaultSleep) {
    this.config = {
      maxRetries: config.maxRetries ?? 0,
      baseDelay: config.baseDelay ?? 1000,
      maxDelay: config.maxDelay ?? 30000,
      jitter: config.jitter ?? true,
    };
    this.sleep = sleep;
  }

  async execute<T>(
    fn: () => Promise<T>,
    idempotencyLevel: IdempotencyLevel,
    hasIdempotencyKey: boolean = false
  ): Promise<T> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await fn();
      } catch (error) {
        if (attempt >= this.config.maxRetries) {
          throw error;
        }

        if (!this.isExplicitlyRetryable(error)) {
          throw error;
        }

        if (!this.isIdempotencyProven(idempotencyLevel, hasIdempotencyKey)) {
          throw error;
        }

        await this.sleep(this.calculateDelay(attempt, retryAfterOf(error)));
      }
    }
  }

  /**
   * POLICY: Do not infer retryability - require explicit marking.
   */
  private isExplicitlyRetryable(error: unknown): boolean {
    return (
      typeof error === "object" &&
      error !== null &&
      "retryable" in error &&
      error.retryable === true
    );
  }

  private isIdempotencyProven(
    idempotencyLevel: IdempotencyLevel,
    hasIdempotencyKey: boolean
  ): boolean {
    switch (idempotencyLevel) {
      case IdempotencyLevel.SAFE:
      case IdempotencyLevel.IDEMPOTENT:
        return true;
      case IdempotencyLevel.CONDITIONAL:
        return hasIdempotencyKey;
      case IdempotencyLevel.UNSAFE:
        return false;
      default:
        return false;
    }
  }

  calculateDelay(attempt: number, retryAfter?: Date): number {
    // Exponential backoff: baseDelay * 2^attempt
    let delay = this.config.baseDelay * Math.pow(2, attempt);

    if (this.config.jitter) {
      delay += Math.random() * 1000; // 0-1000ms jitter
    }

    delay = Math.min(delay, this.config.maxDelay);

    // Server-provided Retry-After wins when it asks for longer
    if (retryAfter) {
      delay = Math.max(delay, millisUntil(retryAfter));
    }

    return delay;
  }
}

function retryAfterOf(error: unknown): Date | undefined {
  if (
    typeof error === "object" &&
    error !== null &&
    "retryAfter" in error &&
    error.retryAfter instanceof Date
  ) {
    return error.retryAfter;
  }
  return undefined;
}
