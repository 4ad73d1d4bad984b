import type { Metric } from "./types.js";

export interface ObservabilitySanitizerOptions {
  redactedKeys?: string[];
}

const DEFAULT = [
  "authorization",
  "cookie",
  "token",
  "apikey",
  "api_key",
  "api-key",
  "secret",
  "password",
  "body",
];

export const REDACTED = "[REDACTED]";

function shouldRedact(key: string, redacted: string[]): boolean {
  const lower = key.toLowerCase();
  return redacted.some((r) => lower.includes(r));
}

function redactedKeys(opts?: ObservabilitySanitizerOptions): string[] {
  return (opts?.redactedKeys ?? DEFAULT).map((s) => s.toLowerCase());
}

export function sanitizeObject(obj: unknown, opts?: ObservabilitySanitizerOptions): unknown {
  const redacted = redactedKeys(opts);

  if (obj === null || typeof obj !== "object") return obj;

  if (Array.isArray(obj)) {
    return obj.map((v: unknown) => sanitizeObject(v, opts));
  }

  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(obj)) {
    if (shouldRedact(k, redacted)) {
      out[k] = REDACTED;
    } else if (v && typeof v === "object") {
      out[k] = sanitizeObject(v, opts);
    } else {
      out[k] = v;
    }
  }
  return out;
}

export function sanitizeHeaders(
  headers: Record<string, string>,
  opts?: ObservabilitySanitizerOptions
): Record<string, string> {
  const redacted = redactedKeys(opts);
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(headers)) {
    out[k] = shouldRedact(k, redacted) ? REDACTED : v;
  }
  return out;
}

export function sanitizeMetric(metric: Metric, opts?: ObservabilitySanitizerOptions): Metric {
  const redacted = redactedKeys(opts);
  const tags: Record<string, string> = {};
  for (const [k, v] of Object.entries(metric.tags)) {
    if (shouldRedact(k, redacted) || shouldRedact(v, redacted)) {
      tags[k] = REDACTED;
    } else {
      tags[k] = v;
    }
  }
  return { ...metric, tags };
}
