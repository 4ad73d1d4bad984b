/**
 * Console observability adapter - one JSON line per event
 */

import type {
  ObservabilityAdapter,
  RequestContext,
  ResponseContext,
  ErrorContext,
  Metric,
} from "../core/types.js";
import { sanitizeObject } from "../core/observability-sanitizer.js";

export interface ConsoleObservabilityConfig {
  pretty?: boolean;
  /** Minimum level written; defaults to "info". */
  level?: LogLevel;
  /** Output sink; defaults to console.log. */
  write?: (line: string) => void;
}

export type LogLevel = "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = { info: 0, warn: 1, error: 2 };

export class ConsoleObservability implements ObservabilityAdapter {
  private config: ConsoleObservabilityConfig;

  constructor(config: ConsoleObservabilityConfig = {}) {
    this.config = config;
  }

  logRequest(context: RequestContext): void {
    const log = {
      level: "info" as const,
      type: "request",
      endpoint: context.endpoint,
      method: context.method,
      requestId: context.requestId,
      query: context.options.query,
      timestamp: context.timestamp.toISOString(),
    };

    this.output(log);
  }

  logResponse(context: ResponseContext): void {
    const log = {
      level: "info" as const,
      type: "response",
      endpoint: context.endpoint,
      method: context.method,
      requestId: context.requestId,
      statusCode: context.statusCode,
      duration: context.duration,
      timestamp: context.timestamp.toISOString(),
    };

    this.output(log);
  }

  logError(context: ErrorContext): void {
    const log = {
      level: "error" as const,
      type: "error",
      endpoint: context.endpoint,
      method: context.method,
      requestId: context.requestId,
      error: {
        category: context.error.category,
        status: context.error.status,
        message: context.error.message,
        retryable: context.error.retryable,
        retryAfter: context.error.retryAfter?.toISOString(),
      },
      duration: context.duration,
      timestamp: context.timestamp.toISOString(),
    };

    this.output(log);
  }

  logWarning(message: string, metadata?: Record<string, unknown>): void {
    const log = {
      level: "warn" as const,
      type: "warning",
      message,
      metadata: metadata === undefined ? undefined : sanitizeObject(metadata),
      timestamp: new Date().toISOString(),
    };

    this.output(log);
  }

  recordMetric(metric: Metric): void {
    const log = {
      level: "info" as const,
      type: "metric",
      name: metric.name,
      value: metric.value,
      tags: metric.tags,
      timestamp: metric.timestamp.toISOString(),
    };

    this.output(log);
  }

  private output(data: { level: LogLevel }): void {
    const threshold = LEVEL_ORDER[this.config.level ?? "info"];
    if (LEVEL_ORDER[data.level] < threshold) {
      return;
    }

    const line = this.config.pretty
      ? JSON.stringify(data, null, 2)
      : JSON.stringify(data);
    (this.config.write ?? console.log)(line);
  }
}
