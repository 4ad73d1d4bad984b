/**
 * Main request pipeline
 * Flow: url → auth headers → fetch (with timeout) → read body → error-map → decode
 *
 * The pipeline never retries. Resilience is opt-in through the service layers.
 */

import { randomUUID } from "crypto";
import type {
  CloudClientConfig,
  ErrorContext,
  HttpMethod,
  ObservabilityAdapter,
  QueryValue,
  RawResponse,
  RequestContext,
  RequestOptions,
  ResponseContext,
} from "./types.js";
import { CloudError, errorFromResponse, isCloudError } from "./errors.js";
import { sanitizeMetric } from "./observability-sanitizer.js";
import { sanitizeRequestOptions } from "./request-sanitizer.js";

/**
 * Turns the bytes of a successful response into the caller's value.
 * Throwing from a decoder is reported like any other request failure.
 */
export type BodyDecoder<T> = (raw: RawResponse<Uint8Array>) => T;

const textDecoder = new TextDecoder();

export const jsonBody = <T>(raw: RawResponse<Uint8Array>): T => {
  const text = textDecoder.decode(raw.body);
  try {
    const value: T = JSON.parse(text);
    return value;
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw CloudError.json(`Failed to deserialize response body: ${reason}`, error);
  }
};

export const bytesBody = (raw: RawResponse<Uint8Array>): Uint8Array => raw.body;

export const ignoreBody = (_raw: RawResponse<Uint8Array>): void => undefined;

/**
 * Joins base URL and path with exactly one slash between them.
 */
export function normalizeUrl(
  baseUrl: string,
  path: string,
  query?: Record<string, QueryValue>
): string {
  const base = baseUrl.replace(/\/+$/, "");
  const trimmedPath = path.replace(/^\/+/, "");
  const url = `${base}/${trimmedPath}`;

  if (!query) {
    return url;
  }

  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(query)) {
    if (value !== undefined) {
      params.append(key, String(value));
    }
  }
  const search = params.toString();
  return search ? `${url}?${search}` : url;
}

export class RequestPipeline {
  private config: CloudClientConfig;

  constructor(config: CloudClientConfig) {
    this.config = config;
  }

  /**
   * Safely broadcasts an observability event to all configured adapters.
   *
   * Adapters are invoked independently. A throwing adapter never aborts the
   * request; failures are aggregated and written to console.error.
   */
  private safelyBroadcastObservability(
    action: (adapter: ObservabilityAdapter) => void,
    actionName: string
  ): void {
    const errors: Array<{ adapter: string; error: unknown }> = [];

    for (const obs of this.config.observability) {
      try {
        action(obs);
      } catch (error) {
        errors.push({
          adapter: obs.constructor?.name || "UnknownObservabilityAdapter",
          error,
        });
      }
    }

    // Not routed to adapters, to avoid loops
    if (errors.length > 0) {
      const errorSummary = errors
        .map(
          ({ adapter, error }) =>
            `  - ${adapter}: ${error instanceof Error ? error.message : String(error)}`
        )
        .join("\n");

      console.error(
        `[redis-cloud] Observability failure in ${actionName} (${errors.length}/${this.config.observability.length} adapters failed):\n${errorSummary}`
      );
    }
  }

  async execute<T>(
    endpoint: string,
    options: RequestOptions,
    decode: BodyDecoder<T>
  ): Promise<RawResponse<T>> {
    const requestId = randomUUID();
    const method: HttpMethod = options.method ?? "GET";
    const startTime = Date.now();
    const headers = this.buildHeaders(options);

    const requestContext: RequestContext = {
      endpoint,
      method,
      requestId,
      timestamp: new Date(),
      options: sanitizeRequestOptions({ ...options, method, headers }),
    };

    this.safelyBroadcastObservability(
      (obs) => obs.logRequest(requestContext),
      "logRequest"
    );

    try {
      const raw = await this.executeHttpRequest(endpoint, method, headers, options);
      const decoded: RawResponse<T> = {
        status: raw.status,
        headers: raw.headers,
        body: decode(raw),
      };

      const duration = Date.now() - startTime;

      const responseContext: ResponseContext = {
        endpoint,
        method,
        requestId,
        statusCode: raw.status,
        duration,
        timestamp: new Date(),
      };

      this.safelyBroadcastObservability(
        (obs) => obs.logResponse(responseContext),
        "logResponse"
      );

      this.safelyBroadcastObservability(
        (obs) => obs.recordMetric(sanitizeMetric({
          name: "cloud.request.count",
          value: 1,
          tags: {
            endpoint,
            method,
            status: String(raw.status),
          },
          timestamp: new Date(),
        })),
        "recordMetric:request.count"
      );

      this.safelyBroadcastObservability(
        (obs) => obs.recordMetric(sanitizeMetric({
          name: "cloud.request.duration",
          value: duration,
          tags: {
            endpoint,
            method,
          },
          timestamp: new Date(),
        })),
        "recordMetric:request.duration"
      );

      return decoded;
    } catch (error) {
      const cloudError = isCloudError(error) ? error : CloudError.request(error);

      const errorContext: ErrorContext = {
        endpoint,
        method,
        requestId,
        error: cloudError,
        duration: Date.now() - startTime,
        timestamp: new Date(),
      };

      this.safelyBroadcastObservability(
        (obs) => obs.logError(errorContext),
        "logError"
      );

      this.safelyBroadcastObservability(
        (obs) => obs.recordMetric(sanitizeMetric({
          name: "cloud.request.error",
          value: 1,
          tags: {
            endpoint,
            method,
            errorCategory: cloudError.category,
          },
          timestamp: new Date(),
        })),
        "recordMetric:request.error"
      );

      throw cloudError;
    }
  }

  private buildHeaders(options: RequestOptions): Record<string, string> {
    const headers: Record<string, string> = {
      "x-api-key": this.config.apiKey,
      "x-api-secret-key": this.config.apiSecret,
      "User-Agent": this.config.userAgent,
      Accept: "application/json",
      ...options.headers,
    };
    if (options.body !== undefined) {
      headers["Content-Type"] = "application/json";
    }
    return headers;
  }

  /**
   * The only place HTTP execution happens.
   * Resolves with the raw body bytes of a 2xx response; every other outcome
   * rejects with a CloudError.
   */
  private async executeHttpRequest(
    endpoint: string,
    method: HttpMethod,
    headers: Record<string, string>,
    options: RequestOptions
  ): Promise<RawResponse<Uint8Array>> {
    const timeout = options.timeout ?? this.config.timeout;
    const url = normalizeUrl(this.config.baseUrl, endpoint, options.query);

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout);

    const init: RequestInit = {
      method,
      headers,
      signal: controller.signal,
    };
    if (options.body !== undefined) {
      init.body = JSON.stringify(options.body);
    }

    try {
      let response: Response;
      try {
        response = await this.config.fetch(url, init);
      } catch (error) {
        if (isAbortError(error)) {
          throw CloudError.connection(`Request timeout after ${timeout}ms`, error);
        }
        throw CloudError.request(error);
      }

      if (!response.ok) {
        const text = await readText(response);
        throw errorFromResponse(response.status, response.headers, text);
      }

      let body: Uint8Array;
      try {
        body = new Uint8Array(await response.arrayBuffer());
      } catch (error) {
        if (isAbortError(error)) {
          throw CloudError.connection(`Request timeout after ${timeout}ms`, error);
        }
        const reason = error instanceof Error ? error.message : String(error);
        throw CloudError.connection(`Failed to read response: ${reason}`, error);
      }

      return {
        status: response.status,
        headers: response.headers,
        body,
      };
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

function isAbortError(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "name" in error &&
    error.name === "AbortError"
  );
}

async function readText(response: Response): Promise<string> {
  try {
    return await response.text();
  } catch {
    // error status wins over an unreadable error body
    return "";
  }
}
