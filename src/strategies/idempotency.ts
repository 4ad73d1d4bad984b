/**
 * Idempotency level resolver
 */

import { IdempotencyLevel, type IdempotencyConfig } from "../core/types.js";

export class IdempotencyResolver {
  private config: IdempotencyConfig;
  private defaultLevel: IdempotencyLevel;

  constructor(
    config: Partial<IdempotencyConfig> = {},
    defaultLevel: IdempotencyLevel = IdempotencyLevel.UNSAFE
  ) {
    this.config = {
      defaultSafeOperations:
        config.defaultSafeOperations ?? new Set(["GET", "HEAD", "OPTIONS"]),
      defaultIdempotentOperations:
        config.defaultIdempotentOperations ?? new Set(["PUT", "DELETE"]),
      operationOverrides: config.operationOverrides ?? new Map(),
    };
    this.defaultLevel = defaultLevel;
  }

  getIdempotencyLevel(method: string, endpoint: string): IdempotencyLevel {
    const upper = method.toUpperCase();
    const path = endpoint.split("?")[0] ?? endpoint;

    const override = this.findOverride(`${upper} ${path}`);
    if (override !== null) {
      return override;
    }

    if (this.config.defaultSafeOperations.has(upper)) {
      return IdempotencyLevel.SAFE;
    }

    if (this.config.defaultIdempotentOperations.has(upper)) {
      return IdempotencyLevel.IDEMPOTENT;
    }

    return this.defaultLevel;
  }

  private findOverride(operationKey: string): IdempotencyLevel | null {
    const exact = this.config.operationOverrides.get(operationKey);
    if (exact !== undefined) {
      return exact;
    }

    // Pattern matching (e.g., "POST /subscriptions/:id/databases/:db/backup")
    for (const [pattern, level] of this.config.operationOverrides.entries()) {
      if (this.matchesPattern(pattern, operationKey)) {
        return level;
      }
    }

    return null;
  }

  private matchesPattern(pattern: string, operationKey: string): boolean {
    const regexPattern = pattern
      .split(/(:[\w-]+)/)
      .map((part) => (part.startsWith(":") ? "[^/]+" : escapeRegExp(part)))
      .join("");
    return new RegExp(`^${regexPattern}$`).test(operationKey);
  }
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
