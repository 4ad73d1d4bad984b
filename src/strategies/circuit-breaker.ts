/**
 * Circuit breaker guarding the API as a whole.
 *
 * Only outages trip it: transport failures, timeouts, 429 and 5xx answers.
 * A 4xx answer means the API is up and the request was at fault, so it is
 * recorded as a healthy outcome and passed through.
 */

import {
  CircuitState,
  type CircuitBreakerConfig,
  type CircuitBreakerStatus,
} from "../core/types.js";
import { CloudError } from "../core/errors.js";

/**
 * Thrown while the circuit is OPEN. Never retryable: the breaker decides
 * when the next attempt is allowed.
 */
export class CircuitOpenError extends CloudError {
  constructor(name: string, retryAfter?: Date) {
    super(`Circuit breaker is OPEN for ${name}`, "circuit_open", {
      detail: `next attempt ${retryAfter?.toISOString() ?? "unknown"}`,
      ...(retryAfter ? { retryAfter } : {}),
    });
    this.name = "CircuitOpenError";
  }
}

/** Whether a rejection says the API itself is unhealthy. */
export function isOutage(error: unknown): boolean {
  if (!(error instanceof CloudError)) {
    return true;
  }
  switch (error.category) {
    case "request":
    case "connection":
    case "rate_limited":
      return true;
    default:
      return error.isServerError();
  }
}

interface Outcome {
  healthy: boolean;
  at: number;
}

export class CircuitBreaker {
  private state: CircuitState = CircuitState.CLOSED;
  private consecutiveOutages = 0;
  private probeSuccesses = 0;
  private openUntil: Date | null = null;
  private window: Outcome[] = [];
  private readonly config: CircuitBreakerConfig;

  constructor(
    private readonly name: string,
    config: Partial<CircuitBreakerConfig> = {}
  ) {
    this.config = {
      failureThreshold: config.failureThreshold ?? 5,
      successThreshold: config.successThreshold ?? 2,
      timeout: config.timeout ?? 60000,
      volumeThreshold: config.volumeThreshold ?? 10,
      rollingWindowMs: config.rollingWindowMs ?? 60000,
      errorThresholdPercentage: config.errorThresholdPercentage ?? 50,
    };
  }

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    this.admit();

    let result: T;
    try {
      result = await fn();
    } catch (error) {
      this.record(!isOutage(error));
      throw error;
    }
    this.record(true);
    return result;
  }

  /** Rejects while OPEN; moves to HALF_OPEN once the wait is over. */
  private admit(): void {
    if (this.state !== CircuitState.OPEN) {
      return;
    }
    if (this.openUntil !== null && Date.now() < this.openUntil.getTime()) {
      throw new CircuitOpenError(this.name, this.openUntil);
    }
    this.state = CircuitState.HALF_OPEN;
    this.probeSuccesses = 0;
  }

  private record(healthy: boolean): void {
    const now = Date.now();
    const windowStart = now - this.config.rollingWindowMs;
    this.window = this.window.filter((outcome) => outcome.at >= windowStart);
    this.window.push({ healthy, at: now });

    if (healthy) {
      this.consecutiveOutages = 0;
      if (this.state === CircuitState.HALF_OPEN) {
        this.probeSuccesses++;
        if (this.probeSuccesses >= this.config.successThreshold) {
          this.state = CircuitState.CLOSED;
          this.openUntil = null;
        }
      }
      return;
    }

    if (this.state === CircuitState.HALF_OPEN) {
      this.trip(now);
      return;
    }
    this.consecutiveOutages++;
    if (this.shouldTrip()) {
      this.trip(now);
    }
  }

  private shouldTrip(): boolean {
    const { volumeThreshold, failureThreshold, errorThresholdPercentage } = this.config;
    if (this.window.length < volumeThreshold) {
      return false;
    }
    if (this.consecutiveOutages >= failureThreshold) {
      return true;
    }
    const outages = this.window.filter((outcome) => !outcome.healthy).length;
    return (outages / this.window.length) * 100 >= errorThresholdPercentage;
  }

  private trip(now: number): void {
    this.state = CircuitState.OPEN;
    this.openUntil = new Date(now + this.config.timeout);
  }

  getStatus(): CircuitBreakerStatus {
    let lastFailure: number | null = null;
    for (const outcome of this.window) {
      if (!outcome.healthy && (lastFailure === null || outcome.at > lastFailure)) {
        lastFailure = outcome.at;
      }
    }

    return {
      state: this.state,
      failures: this.consecutiveOutages,
      successes: this.probeSuccesses,
      lastFailure: lastFailure === null ? null : new Date(lastFailure),
      nextAttempt: this.openUntil,
    };
  }

  reset(): void {
    this.state = CircuitState.CLOSED;
    this.consecutiveOutages = 0;
    this.probeSuccesses = 0;
    this.openUntil = null;
    this.window = [];
  }
}
