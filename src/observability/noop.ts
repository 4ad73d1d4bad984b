/**
 * Silent observability adapter
 */

import type {
  ObservabilityAdapter,
  RequestContext,
  ResponseContext,
  ErrorContext,
  Metric,
} from "../core/types.js";

export class NoOpObservability implements ObservabilityAdapter {
  logRequest(_context: RequestContext): void {}
  logResponse(_context: ResponseContext): void {}
  logError(_context: ErrorContext): void {}
  logWarning(_message: string, _metadata?: Record<string, unknown>): void {}
  recordMetric(_metric: Metric): void {}
}

/**
 * Keeps every event in memory. Handy for asserting on what a client logged.
 */
export class RecordingObservability implements ObservabilityAdapter {
  readonly requests: RequestContext[] = [];
  readonly responses: ResponseContext[] = [];
  readonly errors: ErrorContext[] = [];
  readonly warnings: Array<{ message: string; metadata?: Record<string, unknown> }> = [];
  readonly metrics: Metric[] = [];

  logRequest(context: RequestContext): void {
    this.requests.push(context);
  }

  logResponse(context: ResponseContext): void {
    this.responses.push(context);
  }

  logError(context: ErrorContext): void {
    this.errors.push(context);
  }

  logWarning(message: string, metadata?: Record<string, unknown>): void {
    this.warnings.push(metadata === undefined ? { message } : { message, metadata });
  }

  recordMetric(metric: Metric): void {
    this.metrics.push(metric);
  }
}
