/**
 * Essentials (fixed plan) databases.
 */

import type { CloudClient } from "../../client.js";
import type { JsonValue } from "../../core/types.js";
import { OffsetPaginationStrategy, paginate } from "../../strategies/pagination.js";
import {
  databasesOf,
  segment,
  type CloudTags,
  type DatabaseAlert,
  type DatabaseModule,
  type DatabaseSlowLogEntries,
  type DatabaseTagCreateRequest,
  type DatabaseTagUpdateRequest,
  type DatabaseTagsUpdateRequest,
  type DatabaseUpgradeRedisVersionRequest,
  type Link,
  type SubscriptionDatabasesMember,
  type Tag,
  type TaskStateUpdate,
} from "../common.js";
import type { DatabaseCertificateSpec, ReplicaOfSpec } from "../databases.js";

export interface DynamicEndpoints {
  public?: string;
  private?: string;
  [key: string]: unknown;
}

export interface FixedDatabase {
  databaseId?: number;
  name?: string;
  protocol?: string;
  provider?: string;
  region?: string;
  redisVersion?: string;
  redisVersionCompliance?: string;
  respVersion?: string;
  status?: string;
  planMemoryLimit?: number;
  planDatasetSize?: number;
  memoryLimitMeasurementUnit?: string;
  memoryLimitInGb?: number;
  datasetSizeInGb?: number;
  memoryUsedInMb?: number;
  networkMonthlyUsageInByte?: number;
  memoryStorage?: string;
  redisFlex?: boolean;
  supportOSSClusterApi?: boolean;
  useExternalEndpointForOSSClusterApi?: boolean;
  dataPersistence?: string;
  replication?: boolean;
  dataEvictionPolicy?: string;
  activatedOn?: string;
  lastModified?: string;
  publicEndpoint?: string;
  privateEndpoint?: string;
  dynamicEndpoints?: DynamicEndpoints;
  links?: Link[];
  [key: string]: unknown;
}

export interface AccountFixedSubscriptionDatabases {
  accountId?: number;
  subscription?: SubscriptionDatabasesMember<FixedDatabase>;
  links?: Link[];
  [key: string]: unknown;
}

export interface FixedDatabaseCreateRequest {
  name: string;
  protocol?: "redis" | "memcached" | "stack";
  memoryLimitInGb?: number;
  datasetSizeInGb?: number;
  supportOSSClusterApi?: boolean;
  redisVersion?: string;
  respVersion?: string;
  useExternalEndpointForOSSClusterApi?: boolean;
  enableDatabaseClustering?: boolean;
  numberOfShards?: number;
  dataPersistence?: string;
  dataEvictionPolicy?: string;
  replication?: boolean;
  periodicBackupPath?: string;
  sourceIps?: string[];
  regexRules?: string[];
  replicaOf?: string[];
  replica?: ReplicaOfSpec;
  clientSslCertificate?: string;
  clientTlsCertificates?: DatabaseCertificateSpec[];
  enableTls?: boolean;
  password?: string;
  alerts?: DatabaseAlert[];
  modules?: DatabaseModule[];
  commandType?: string;
}

export interface FixedDatabaseUpdateRequest {
  name?: string;
  memoryLimitInGb?: number;
  datasetSizeInGb?: number;
  supportOSSClusterApi?: boolean;
  respVersion?: string;
  useExternalEndpointForOSSClusterApi?: boolean;
  enableDatabaseClustering?: boolean;
  numberOfShards?: number;
  dataPersistence?: string;
  dataEvictionPolicy?: string;
  replication?: boolean;
  periodicBackupPath?: string;
  sourceIps?: string[];
  replicaOf?: string[];
  replica?: ReplicaOfSpec;
  regexRules?: string[];
  clientSslCertificate?: string;
  clientTlsCertificates?: DatabaseCertificateSpec[];
  enableTls?: boolean;
  password?: string;
  enableDefaultUser?: boolean;
  alerts?: DatabaseAlert[];
  commandType?: string;
}

export interface FixedDatabaseBackupRequest {
  adhocBackupPath?: string;
  commandType?: string;
}

export interface FixedDatabaseImportRequest {
  sourceType: string;
  importFromUri: string[];
  commandType?: string;
}

export class FixedDatabaseHandler {
  constructor(private readonly client: CloudClient) {}

  private path(subscriptionId: number, databaseId?: number, suffix = ""): string {
    const base = `/fixed/subscriptions/${segment(subscriptionId)}/databases`;
    return databaseId === undefined ? base : `${base}/${segment(databaseId)}${suffix}`;
  }

  list(
    subscriptionId: number,
    offset?: number,
    limit?: number
  ): Promise<AccountFixedSubscriptionDatabases> {
    return this.client.get<AccountFixedSubscriptionDatabases>(this.path(subscriptionId), {
      offset,
      limit,
    });
  }

  create(subscriptionId: number, request: FixedDatabaseCreateRequest): Promise<TaskStateUpdate> {
    return this.client.post<TaskStateUpdate>(this.path(subscriptionId), request);
  }

  getById(subscriptionId: number, databaseId: number): Promise<FixedDatabase> {
    return this.client.get<FixedDatabase>(this.path(subscriptionId, databaseId));
  }

  update(
    subscriptionId: number,
    databaseId: number,
    request: FixedDatabaseUpdateRequest
  ): Promise<TaskStateUpdate> {
    return this.client.put<TaskStateUpdate>(this.path(subscriptionId, databaseId), request);
  }

  deleteById(subscriptionId: number, databaseId: number): Promise<TaskStateUpdate> {
    return this.client.deleteTask(this.path(subscriptionId, databaseId));
  }

  getBackupStatus(subscriptionId: number, databaseId: number): Promise<TaskStateUpdate> {
    return this.client.get<TaskStateUpdate>(this.path(subscriptionId, databaseId, "/backup"));
  }

  backup(
    subscriptionId: number,
    databaseId: number,
    request: FixedDatabaseBackupRequest = {}
  ): Promise<TaskStateUpdate> {
    return this.client.post<TaskStateUpdate>(
      this.path(subscriptionId, databaseId, "/backup"),
      request
    );
  }

  getImportStatus(subscriptionId: number, databaseId: number): Promise<TaskStateUpdate> {
    return this.client.get<TaskStateUpdate>(this.path(subscriptionId, databaseId, "/import"));
  }

  importData(
    subscriptionId: number,
    databaseId: number,
    request: FixedDatabaseImportRequest
  ): Promise<TaskStateUpdate> {
    return this.client.post<TaskStateUpdate>(
      this.path(subscriptionId, databaseId, "/import"),
      request
    );
  }

  getSlowLog(subscriptionId: number, databaseId: number): Promise<DatabaseSlowLogEntries> {
    return this.client.get<DatabaseSlowLogEntries>(
      this.path(subscriptionId, databaseId, "/slow-log")
    );
  }

  getTags(subscriptionId: number, databaseId: number): Promise<CloudTags> {
    return this.client.get<CloudTags>(this.path(subscriptionId, databaseId, "/tags"));
  }

  createTag(
    subscriptionId: number,
    databaseId: number,
    request: DatabaseTagCreateRequest
  ): Promise<Tag> {
    return this.client.post<Tag>(this.path(subscriptionId, databaseId, "/tags"), request);
  }

  updateTags(
    subscriptionId: number,
    databaseId: number,
    request: DatabaseTagsUpdateRequest
  ): Promise<CloudTags> {
    return this.client.put<CloudTags>(this.path(subscriptionId, databaseId, "/tags"), request);
  }

  updateTag(
    subscriptionId: number,
    databaseId: number,
    tagKey: string,
    request: DatabaseTagUpdateRequest
  ): Promise<Tag> {
    return this.client.put<Tag>(
      this.path(subscriptionId, databaseId, `/tags/${segment(tagKey)}`),
      request
    );
  }

  deleteTag(subscriptionId: number, databaseId: number, tagKey: string): Promise<JsonValue> {
    return this.client.deleteRaw(this.path(subscriptionId, databaseId, `/tags/${segment(tagKey)}`));
  }

  getAvailableTargetVersions(subscriptionId: number, databaseId: number): Promise<JsonValue> {
    return this.client.getRaw(this.path(subscriptionId, databaseId, "/available-target-versions"));
  }

  getUpgradeStatus(subscriptionId: number, databaseId: number): Promise<JsonValue> {
    return this.client.getRaw(this.path(subscriptionId, databaseId, "/upgrade"));
  }

  upgradeRedisVersion(
    subscriptionId: number,
    databaseId: number,
    request: DatabaseUpgradeRedisVersionRequest
  ): Promise<JsonValue> {
    return this.client.post<JsonValue>(this.path(subscriptionId, databaseId, "/upgrade"), request);
  }

  streamDatabases(
    subscriptionId: number,
    pageSize?: number
  ): AsyncGenerator<FixedDatabase, void, undefined> {
    return paginate(
      async (query) => {
        const page = await this.client.get<AccountFixedSubscriptionDatabases>(
          this.path(subscriptionId),
          query
        );
        return databasesOf(page.subscription);
      },
      new OffsetPaginationStrategy(pageSize)
    );
  }
}
