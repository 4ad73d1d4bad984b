/**
 * Redis Cloud client - main entry point
 */

import type {
  CloudClientConfig,
  FetchFunction,
  HttpMethod,
  JsonValue,
  ObservabilityAdapter,
  QueryValue,
  RawResponse,
  RequestOptions,
} from "./core/types.js";
import { DEFAULT_BASE_URL, DEFAULT_TIMEOUT_MS } from "./core/types.js";
import { CloudError } from "./core/errors.js";
import {
  RequestPipeline,
  bytesBody,
  ignoreBody,
  jsonBody,
  type BodyDecoder,
} from "./core/pipeline.js";
import { defaultUserAgent } from "./core/versioning.js";
import { loadEnvConfig, type Environment } from "./config.js";
import type { TaskStateUpdate } from "./handlers/common.js";
import { AccountHandler } from "./handlers/account.js";
import { AclHandler } from "./handlers/acl.js";
import { UsersHandler } from "./handlers/users.js";
import { TasksHandler } from "./handlers/tasks.js";
import { CloudAccountsHandler } from "./handlers/cloud-accounts.js";
import { CostReportHandler } from "./handlers/cost-report.js";
import { SubscriptionHandler } from "./handlers/subscriptions.js";
import { DatabaseHandler } from "./handlers/databases.js";
import { FixedSubscriptionHandler } from "./handlers/fixed/subscriptions.js";
import { FixedDatabaseHandler } from "./handlers/fixed/databases.js";
import { VpcPeeringHandler } from "./handlers/connectivity/vpc-peering.js";
import { TransitGatewayHandler } from "./handlers/connectivity/transit-gateway.js";
import { PscHandler } from "./handlers/connectivity/psc.js";
import { PrivateLinkHandler } from "./handlers/connectivity/private-link.js";
import { ConnectivityHandler } from "./handlers/connectivity/index.js";
import { ClientService } from "./service/client-service.js";

/**
 * Decodes a DELETE response: an empty body means the resource is gone.
 */
const deletedOrJson = <T>(deleted: () => T): BodyDecoder<T> => (raw) =>
  raw.body.byteLength === 0 ? deleted() : jsonBody<T>(raw);

const deletedJson = deletedOrJson<JsonValue>(() => ({ status: "deleted" }));
const deletedTask = deletedOrJson<TaskStateUpdate>(() => ({ status: "deleted" }));

export class CloudClient {
  private readonly config: CloudClientConfig;
  private readonly pipeline: RequestPipeline;

  /** Prefer {@link CloudClient.builder} or {@link CloudClient.fromEnv}. */
  constructor(config: CloudClientConfig) {
    this.config = config;
    this.pipeline = new RequestPipeline(config);
  }

  static builder(): CloudClientBuilder {
    return new CloudClientBuilder();
  }

  /**
   * Builds a client from REDIS_CLOUD_* environment variables.
   */
  static fromEnv(env: Environment = process.env): CloudClient {
    const loaded = loadEnvConfig(env);
    const builder = CloudClient.builder()
      .apiKey(loaded.apiKey)
      .apiSecret(loaded.apiSecret);
    if (loaded.baseUrl !== undefined) {
      builder.baseUrl(loaded.baseUrl);
    }
    return builder.build();
  }

  get baseUrl(): string {
    return this.config.baseUrl;
  }

  get timeout(): number {
    return this.config.timeout;
  }

  get userAgent(): string {
    return this.config.userAgent;
  }

  // ==========================================================================
  // Typed JSON requests
  // ==========================================================================

  async get<T>(path: string, query?: Record<string, QueryValue>): Promise<T> {
    const options: RequestOptions = { method: "GET" };
    if (query) {
      options.query = query;
    }
    return (await this.request(path, options, jsonBody<T>)).body;
  }

  async post<T>(path: string, body: unknown): Promise<T> {
    return (await this.request(path, { method: "POST", body }, jsonBody<T>)).body;
  }

  async put<T>(path: string, body: unknown): Promise<T> {
    return (await this.request(path, { method: "PUT", body }, jsonBody<T>)).body;
  }

  async patch<T>(path: string, body: unknown): Promise<T> {
    return (await this.request(path, { method: "PATCH", body }, jsonBody<T>)).body;
  }

  /** Resolves once the server acknowledges; any response body is discarded. */
  async delete(path: string): Promise<void> {
    await this.request(path, { method: "DELETE" }, ignoreBody);
  }

  /**
   * DELETE that reports the resulting task. An empty body resolves to
   * `{ status: "deleted" }`.
   */
  async deleteTask(path: string): Promise<TaskStateUpdate> {
    return (await this.request(path, { method: "DELETE" }, deletedTask)).body;
  }

  /** DELETE carrying a JSON body, used by a few connectivity endpoints. */
  async deleteWithBody<T>(path: string, body: unknown): Promise<T> {
    return (await this.request(path, { method: "DELETE", body }, jsonBody<T>)).body;
  }

  // ==========================================================================
  // Raw passthrough
  // ==========================================================================

  async getRaw(path: string): Promise<JsonValue> {
    return this.get<JsonValue>(path);
  }

  async postRaw(path: string, body: JsonValue): Promise<JsonValue> {
    return this.post<JsonValue>(path, body);
  }

  async putRaw(path: string, body: JsonValue): Promise<JsonValue> {
    return this.put<JsonValue>(path, body);
  }

  async patchRaw(path: string, body: JsonValue): Promise<JsonValue> {
    return this.patch<JsonValue>(path, body);
  }

  /** An empty success body resolves to `{ status: "deleted" }`. */
  async deleteRaw(path: string): Promise<JsonValue> {
    return (await this.request(path, { method: "DELETE" }, deletedJson)).body;
  }

  /** GET returning the body untouched, for binary downloads. */
  async getBytes(path: string): Promise<Uint8Array> {
    return (await this.request(path, { method: "GET" }, bytesBody)).body;
  }

  /**
   * Lowest-level call: the response status and headers plus the decoded body.
   */
  async request<T>(
    path: string,
    options: RequestOptions,
    decode: BodyDecoder<T>
  ): Promise<RawResponse<T>> {
    return this.pipeline.execute(path, options, decode);
  }

  /**
   * Raw JSON call that keeps the status, used by the service adapter.
   */
  async send(
    method: HttpMethod,
    path: string,
    body?: JsonValue,
    headers?: Record<string, string>
  ): Promise<RawResponse<JsonValue>> {
    const options: RequestOptions = { method };
    if (body !== undefined) {
      options.body = body;
    }
    if (headers !== undefined) {
      options.headers = headers;
    }
    return this.request(path, options, method === "DELETE" ? deletedJson : jsonBody<JsonValue>);
  }

  // ==========================================================================
  // Resource handlers
  // ==========================================================================

  account(): AccountHandler {
    return new AccountHandler(this);
  }

  acl(): AclHandler {
    return new AclHandler(this);
  }

  users(): UsersHandler {
    return new UsersHandler(this);
  }

  tasks(): TasksHandler {
    return new TasksHandler(this);
  }

  cloudAccounts(): CloudAccountsHandler {
    return new CloudAccountsHandler(this);
  }

  costReports(): CostReportHandler {
    return new CostReportHandler(this);
  }

  subscriptions(): SubscriptionHandler {
    return new SubscriptionHandler(this);
  }

  databases(): DatabaseHandler {
    return new DatabaseHandler(this);
  }

  fixedSubscriptions(): FixedSubscriptionHandler {
    return new FixedSubscriptionHandler(this);
  }

  fixedDatabases(): FixedDatabaseHandler {
    return new FixedDatabaseHandler(this);
  }

  vpcPeering(): VpcPeeringHandler {
    return new VpcPeeringHandler(this);
  }

  transitGateway(): TransitGatewayHandler {
    return new TransitGatewayHandler(this);
  }

  psc(): PscHandler {
    return new PscHandler(this);
  }

  privateLink(): PrivateLinkHandler {
    return new PrivateLinkHandler(this);
  }

  connectivity(): ConnectivityHandler {
    return new ConnectivityHandler(this);
  }

  /**
   * Wraps the client as a {@link ClientService} so middleware layers can be
   * composed around it.
   */
  intoService(): ClientService {
    return new ClientService(this);
  }
}

export class CloudClientBuilder {
  private key: string | undefined;
  private secret: string | undefined;
  private url: string = DEFAULT_BASE_URL;
  private timeoutMs: number = DEFAULT_TIMEOUT_MS;
  private agent: string = defaultUserAgent();
  private adapters: ObservabilityAdapter[] = [];
  private fetchImpl: FetchFunction | undefined;

  apiKey(key: string): this {
    this.key = key;
    return this;
  }

  apiSecret(secret: string): this {
    this.secret = secret;
    return this;
  }

  baseUrl(url: string): this {
    this.url = url;
    return this;
  }

  /** Request timeout in milliseconds. */
  timeout(ms: number): this {
    this.timeoutMs = ms;
    return this;
  }

  userAgent(agent: string): this {
    this.agent = agent;
    return this;
  }

  observability(adapter: ObservabilityAdapter | ObservabilityAdapter[]): this {
    this.adapters = Array.isArray(adapter) ? [...adapter] : [adapter];
    return this;
  }

  fetch(fetchImpl: FetchFunction): this {
    this.fetchImpl = fetchImpl;
    return this;
  }

  build(): CloudClient {
    return new CloudClient(this.validateConfig());
  }

  private validateConfig(): CloudClientConfig {
    if (this.key === undefined || this.key === "") {
      throw CloudError.configuration("API key is required");
    }
    if (this.secret === undefined || this.secret === "") {
      throw CloudError.configuration("API secret is required");
    }

    let parsed: URL;
    try {
      parsed = new URL(this.url);
    } catch {
      throw CloudError.configuration(`Invalid base URL: ${this.url}`);
    }
    if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
      throw CloudError.configuration(`Invalid base URL: ${this.url}`);
    }

    if (!Number.isFinite(this.timeoutMs) || this.timeoutMs <= 0) {
      throw CloudError.configuration(
        `Timeout must be a positive number of milliseconds, got ${this.timeoutMs}`
      );
    }

    return {
      apiKey: this.key,
      apiSecret: this.secret,
      baseUrl: this.url,
      timeout: this.timeoutMs,
      userAgent: this.agent,
      observability: this.adapters,
      fetch: this.fetchImpl ?? ((input, init) => globalThis.fetch(input, init)),
    };
  }
}
