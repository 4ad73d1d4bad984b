/**
 * Chainable builders for API response bodies.
 *
 * @example
 * const db = new DatabaseFixture(456, "cache").protocol("redis").build();
 */

import type { JsonObject } from "../core/types.js";

export class SubscriptionFixture {
  private statusValue = "active";
  private paymentMethodTypeValue: string | undefined;
  private memoryStorageValue: string | undefined;
  private providerValue: string | undefined;
  private regionValue: string | undefined;

  constructor(
    private readonly id: number,
    private readonly name: string
  ) {}

  status(status: string): this {
    this.statusValue = status;
    return this;
  }

  paymentMethodType(type: string): this {
    this.paymentMethodTypeValue = type;
    return this;
  }

  memoryStorage(storage: string): this {
    this.memoryStorageValue = storage;
    return this;
  }

  cloudProvider(provider: string): this {
    this.providerValue = provider;
    return this;
  }

  region(region: string): this {
    this.regionValue = region;
    return this;
  }

  build(): JsonObject {
    const subscription: JsonObject = { id: this.id, name: this.name, status: this.statusValue };
    if (this.paymentMethodTypeValue !== undefined) {
      subscription.paymentMethodType = this.paymentMethodTypeValue;
    }
    if (this.memoryStorageValue !== undefined) {
      subscription.memoryStorage = this.memoryStorageValue;
    }
    if (this.providerValue !== undefined) {
      subscription.cloudProviders = [
        {
          provider: this.providerValue,
          regions: this.regionValue === undefined ? [] : [{ region: this.regionValue }],
        },
      ];
    }
    return subscription;
  }
}

export class DatabaseFixture {
  private statusValue = "active";
  private memoryLimit = 1.0;
  private fields: JsonObject = {};

  constructor(
    private readonly databaseId: number,
    private readonly name: string
  ) {}

  status(status: string): this {
    this.statusValue = status;
    return this;
  }

  memoryLimitInGb(limit: number): this {
    this.memoryLimit = limit;
    return this;
  }

  protocol(protocol: string): this {
    this.fields.protocol = protocol;
    return this;
  }

  dataPersistence(persistence: string): this {
    this.fields.dataPersistence = persistence;
    return this;
  }

  replication(enabled: boolean): this {
    this.fields.replication = enabled;
    return this;
  }

  throughput(by: "operations-per-second" | "number-of-shards", value: number): this {
    this.fields.throughputMeasurement = { by, value };
    return this;
  }

  publicEndpoint(endpoint: string): this {
    this.fields.publicEndpoint = endpoint;
    return this;
  }

  privateEndpoint(endpoint: string): this {
    this.fields.privateEndpoint = endpoint;
    return this;
  }

  build(): JsonObject {
    return {
      databaseId: this.databaseId,
      name: this.name,
      status: this.statusValue,
      memoryLimitInGb: this.memoryLimit,
      ...this.fields,
    };
  }
}

export class TaskFixture {
  private statusValue = "processing-completed";
  private commandTypeValue: string | undefined;
  private descriptionValue: string | undefined;
  private resourceIdValue: number | undefined;
  private errorValue: string | undefined;

  constructor(private readonly taskId: string) {}

  static completed(taskId: string, resourceId: number): TaskFixture {
    return new TaskFixture(taskId)
      .description("Task completed successfully")
      .resourceId(resourceId);
  }

  static failed(taskId: string, error: string): TaskFixture {
    return new TaskFixture(taskId)
      .status("processing-error")
      .description("Task failed")
      .error(error);
  }

  commandType(commandType: string): this {
    this.commandTypeValue = commandType;
    return this;
  }

  status(status: string): this {
    this.statusValue = status;
    return this;
  }

  description(description: string): this {
    this.descriptionValue = description;
    return this;
  }

  resourceId(resourceId: number): this {
    this.resourceIdValue = resourceId;
    return this;
  }

  error(error: string): this {
    this.errorValue = error;
    return this;
  }

  build(): JsonObject {
    const task: JsonObject = { taskId: this.taskId, status: this.statusValue };
    if (this.commandTypeValue !== undefined) {
      task.commandType = this.commandTypeValue;
    }
    if (this.descriptionValue !== undefined) {
      task.description = this.descriptionValue;
    }

    const response: JsonObject = {};
    if (this.resourceIdValue !== undefined) {
      response.resourceId = this.resourceIdValue;
    }
    if (this.errorValue !== undefined) {
      response.error = this.errorValue;
    }
    if (Object.keys(response).length > 0) {
      task.response = response;
    }
    return task;
  }
}

export class AccountFixture {
  private fields: JsonObject = {};

  constructor(
    private readonly id: number,
    private readonly name: string
  ) {}

  marketplaceStatus(status: string): this {
    this.fields.marketplaceStatus = status;
    return this;
  }

  createdTimestamp(timestamp: string): this {
    this.fields.createdTimestamp = timestamp;
    return this;
  }

  updatedTimestamp(timestamp: string): this {
    this.fields.updatedTimestamp = timestamp;
    return this;
  }

  /** The body of GET /, with the account wrapped. */
  build(): JsonObject {
    return { account: this.buildAccountOnly(), links: [] };
  }

  buildAccountOnly(): JsonObject {
    return { id: this.id, name: this.name, ...this.fields };
  }
}

export class UserFixture {
  private nameValue: string | undefined;
  private roleValue = "member";
  private statusValue = "active";

  constructor(
    private readonly id: number,
    private readonly email: string
  ) {}

  name(name: string): this {
    this.nameValue = name;
    return this;
  }

  role(role: string): this {
    this.roleValue = role;
    return this;
  }

  status(status: string): this {
    this.statusValue = status;
    return this;
  }

  build(): JsonObject {
    const user: JsonObject = {
      id: this.id,
      email: this.email,
      role: this.roleValue,
      status: this.statusValue,
    };
    if (this.nameValue !== undefined) {
      user.name = this.nameValue;
    }
    return user;
  }
}
