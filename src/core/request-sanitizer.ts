import type { QueryValue, RequestOptions } from "./types.js";
import {
  REDACTED,
  sanitizeHeaders,
  type ObservabilitySanitizerOptions,
} from "./observability-sanitizer.js";

/**
 * Produces a copy of the request options safe to hand to observability adapters.
 * Credential headers are masked and request bodies are never logged.
 */
export function sanitizeRequestOptions(
  options: RequestOptions | undefined,
  opts?: ObservabilitySanitizerOptions
): RequestOptions {
  const sanitized: RequestOptions = { ...(options ?? {}) };

  if (sanitized.headers) {
    sanitized.headers = sanitizeHeaders(sanitized.headers, opts);
  }

  if (sanitized.query) {
    const masked = sanitizeHeaders(stringifyQuery(sanitized.query), opts);
    sanitized.query = masked;
  }

  if (sanitized.body !== undefined) {
    sanitized.body = REDACTED;
  }

  return sanitized;
}

function stringifyQuery(query: Record<string, QueryValue>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(query)) {
    if (v !== undefined) {
      out[k] = String(v);
    }
  }
  return out;
}
