/**
 * Canonical error type for every failure the SDK surfaces.
 *
 * INVARIANTS:
 * - Every rejected promise from the client carries a CloudError
 * - category is derived from the HTTP status or the transport failure
 * - retryable is derived from category, never set by callers
 */

import { parseRetryAfter } from "./header-parser.js";

export type CloudErrorCategory =
  | "request" // Transport-level failure before a response arrived
  | "connection" // Timeout or unreadable response body
  | "json" // Success body that is not valid JSON
  | "bad_request" // 400
  | "authentication_failed" // 401
  | "forbidden" // 403
  | "not_found" // 404
  | "precondition_failed" // 412
  | "rate_limited" // 429
  | "internal_server_error" // 500
  | "service_unavailable" // 503
  | "api_error" // Any other non-2xx status
  | "circuit_open" // Circuit breaker rejected the call
  | "task_timeout" // Task did not finish while polling
  | "configuration"; // Invalid client settings

const RETRYABLE: ReadonlySet<CloudErrorCategory> = new Set<CloudErrorCategory>([
  "rate_limited",
  "service_unavailable",
  "request",
  "connection",
]);

const PRECONDITION_FAILED_DETAIL = "Feature flag for this flow is off";

export interface CloudErrorOptions {
  status?: number;
  detail?: string;
  body?: unknown;
  retryAfter?: Date;
  cause?: unknown;
}

export class CloudError extends Error {
  readonly category: CloudErrorCategory;
  readonly retryable: boolean;
  /** HTTP status, present for errors built from a response. */
  readonly status?: number;
  /** Raw text the server or transport produced. */
  readonly detail: string;
  /** Decoded error body, when the server sent JSON. */
  readonly body?: unknown;
  readonly retryAfter?: Date;

  constructor(
    message: string,
    category: CloudErrorCategory,
    options: CloudErrorOptions = {}
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "CloudError";
    this.category = category;
    this.retryable = RETRYABLE.has(category);
    this.detail = options.detail ?? message;
    if (options.status !== undefined) {
      this.status = options.status;
    }
    if (options.body !== undefined) {
      this.body = options.body;
    }
    if (options.retryAfter !== undefined) {
      this.retryAfter = options.retryAfter;
    }

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, CloudError);
    }
  }

  isNotFound(): boolean {
    return this.category === "not_found";
  }

  isUnauthorized(): boolean {
    return this.category === "authentication_failed" || this.category === "forbidden";
  }

  isServerError(): boolean {
    return this.status !== undefined && this.status >= 500;
  }

  static request(cause: unknown): CloudError {
    const text = describe(cause);
    return new CloudError(`HTTP request failed: ${text}`, "request", {
      detail: text,
      cause,
    });
  }

  static connection(text: string, cause?: unknown): CloudError {
    return new CloudError(`Connection error: ${text}`, "connection", {
      detail: text,
      cause,
    });
  }

  static json(text: string, cause?: unknown): CloudError {
    return new CloudError(`JSON error: ${text}`, "json", { detail: text, cause });
  }

  static configuration(message: string): CloudError {
    return new CloudError(message, "configuration");
  }
}

export function isCloudError(value: unknown): value is CloudError {
  return value instanceof CloudError;
}

/**
 * Maps a non-2xx response to a CloudError.
 * The response text is kept verbatim; a JSON body is decoded into `body`.
 */
export function errorFromResponse(
  status: number,
  headers: Headers,
  text: string
): CloudError {
  const options: CloudErrorOptions = { status, detail: text };
  const body = tryParseJson(text);
  if (body !== undefined) {
    options.body = body;
  }

  switch (status) {
    case 400:
      return new CloudError(`Bad Request (400): ${text}`, "bad_request", options);
    case 401:
      return new CloudError(
        `Authentication failed (401): ${text}`,
        "authentication_failed",
        options
      );
    case 403:
      return new CloudError(`Forbidden (403): ${text}`, "forbidden", options);
    case 404:
      return new CloudError(`Not Found (404): ${text}`, "not_found", options);
    case 412:
      return new CloudError(
        `Precondition Failed (412): ${PRECONDITION_FAILED_DETAIL}`,
        "precondition_failed",
        options
      );
    case 429: {
      const retryAfter = parseRetryAfter(headers.get("retry-after"));
      if (retryAfter) {
        options.retryAfter = retryAfter;
      }
      return new CloudError(`Rate Limited (429): ${text}`, "rate_limited", options);
    }
    case 500:
      return new CloudError(
        `Internal Server Error (500): ${text}`,
        "internal_server_error",
        options
      );
    case 503:
      return new CloudError(
        `Service Unavailable (503): ${text}`,
        "service_unavailable",
        options
      );
    default:
      return new CloudError(`API error (${status}): ${text}`, "api_error", options);
  }
}

function tryParseJson(text: string): unknown {
  if (text.trim() === "") {
    return undefined;
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    // plain-text error bodies stay in `detail` only
    return undefined;
  }
}

function describe(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  return String(cause);
}
