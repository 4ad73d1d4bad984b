import type { HttpMethod, JsonValue } from "../core/types.js";

export class ApiRequest {
  readonly method: HttpMethod;
  readonly path: string;
  readonly body?: JsonValue;
  /** Sent as the Idempotency-Key header; lets CONDITIONAL operations retry. */
  readonly idempotencyKey?: string;

  constructor(method: HttpMethod, path: string, body?: JsonValue, idempotencyKey?: string) {
    this.method = method;
    this.path = path;
    if (body !== undefined) {
      this.body = body;
    }
    if (idempotencyKey !== undefined) {
      this.idempotencyKey = idempotencyKey;
    }
  }

  withIdempotencyKey(key: string): ApiRequest {
    return new ApiRequest(this.method, this.path, this.body, key);
  }

  static get(path: string): ApiRequest {
    return new ApiRequest("GET", path);
  }

  static post(path: string, body: JsonValue): ApiRequest {
    return new ApiRequest("POST", path, body);
  }

  static put(path: string, body: JsonValue): ApiRequest {
    return new ApiRequest("PUT", path, body);
  }

  static patch(path: string, body: JsonValue): ApiRequest {
    return new ApiRequest("PATCH", path, body);
  }

  static delete(path: string): ApiRequest {
    return new ApiRequest("DELETE", path);
  }
}

export interface ApiResponse {
  status: number;
  body: JsonValue;
}
