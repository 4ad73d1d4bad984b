/**
 * Pro (flexible) databases, scoped to a subscription.
 */

import type { CloudClient } from "../client.js";
import type { JsonValue } from "../core/types.js";
import { OffsetPaginationStrategy, collect, paginate } from "../strategies/pagination.js";
import {
  databasesOf,
  segment,
  type CloudTags,
  type DatabaseAlert,
  type DatabaseBackupConfig,
  type DatabaseBackupRequest,
  type DatabaseCertificate,
  type DatabaseImportRequest,
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
  type ThroughputMeasurement,
} from "./common.js";
import type { LocalThroughput } from "./subscriptions.js";

// ============================================================================
// Models
// ============================================================================

export interface Database {
  databaseId: number;
  name?: string;
  status?: string;
  provider?: string;
  region?: string;
  redisVersion?: string;
  respVersion?: string;
  memoryLimitInGb?: number;
  datasetSizeInGb?: number;
  memoryUsedInMb?: number;
  privateEndpoint?: string;
  publicEndpoint?: string;
  port?: number;
  dataEvictionPolicy?: string;
  dataPersistence?: string;
  replication?: boolean;
  protocol?: string;
  supportOSSClusterApi?: boolean;
  useExternalEndpointForOSSClusterApi?: boolean;
  enableTls?: boolean;
  throughputMeasurement?: ThroughputMeasurement;
  localThroughputMeasurement?: LocalThroughput[];
  averageItemSizeInBytes?: number;
  periodicBackupPath?: string;
  remoteBackup?: DatabaseBackupConfig;
  sourceIp?: string[];
  clientSslCertificate?: string;
  password?: string;
  saslUsername?: string;
  saslPassword?: string;
  alerts?: DatabaseAlert[];
  modules?: DatabaseModule[];
  shardingType?: string;
  queryPerformanceFactor?: string;
  replicaOf?: string[];
  enableDefaultUser?: boolean;
  activated?: string;
  lastModified?: string;
  links?: Link[];
  [key: string]: unknown;
}

export interface AccountSubscriptionDatabases {
  accountId?: number;
  subscription?: SubscriptionDatabasesMember<Database>;
  links?: Link[];
  [key: string]: unknown;
}

export interface DatabaseCertificateSpec {
  publicCertificatePEMString: string;
}

export interface ReplicaOfSpec {
  syncSources: Array<{ endpoint: string; encryption?: boolean; serverCert?: string }>;
}

export interface DatabaseCreateRequest {
  dryRun?: boolean;
  name: string;
  protocol?: "redis" | "memcached";
  port?: number;
  memoryLimitInGb?: number;
  datasetSizeInGb?: number;
  redisVersion?: string;
  respVersion?: string;
  supportOSSClusterApi?: boolean;
  useExternalEndpointForOSSClusterApi?: boolean;
  dataPersistence?: string;
  dataEvictionPolicy?: string;
  replication?: boolean;
  replica?: ReplicaOfSpec;
  throughputMeasurement?: ThroughputMeasurement;
  localThroughputMeasurement?: LocalThroughput[];
  averageItemSizeInBytes?: number;
  periodicBackupPath?: string;
  remoteBackup?: DatabaseBackupConfig;
  sourceIp?: string[];
  clientTlsCertificates?: DatabaseCertificateSpec[];
  enableTls?: boolean;
  password?: string;
  saslUsername?: string;
  saslPassword?: string;
  alerts?: DatabaseAlert[];
  modules?: DatabaseModule[];
  shardingType?: string;
  queryPerformanceFactor?: string;
  commandType?: string;
}

export interface DatabaseUpdateRequest {
  dryRun?: boolean;
  name?: string;
  memoryLimitInGb?: number;
  datasetSizeInGb?: number;
  respVersion?: string;
  throughputMeasurement?: ThroughputMeasurement;
  dataPersistence?: string;
  dataEvictionPolicy?: string;
  replication?: boolean;
  regexRules?: string[];
  replica?: ReplicaOfSpec;
  supportOSSClusterApi?: boolean;
  useExternalEndpointForOSSClusterApi?: boolean;
  password?: string;
  saslUsername?: string;
  saslPassword?: string;
  sourceIp?: string[];
  clientTlsCertificates?: DatabaseCertificateSpec[];
  enableTls?: boolean;
  enableDefaultUser?: boolean;
  periodicBackupPath?: string;
  remoteBackup?: DatabaseBackupConfig;
  alerts?: DatabaseAlert[];
  queryPerformanceFactor?: string;
  commandType?: string;
}

export interface CrdbFlushRequest {
  subscriptionId?: number;
  databaseId?: number;
  commandType?: string;
}

export interface LocalRegionProperties {
  region?: string;
  remoteBackup?: DatabaseBackupConfig;
  localThroughputMeasurement?: LocalThroughput;
  dataPersistence?: string;
  password?: string;
  sourceIp?: string[];
  alerts?: DatabaseAlert[];
  respVersion?: string;
}

export interface CrdbUpdatePropertiesRequest {
  name?: string;
  dryRun?: boolean;
  memoryLimitInGb?: number;
  datasetSizeInGb?: number;
  supportOSSClusterApi?: boolean;
  useExternalEndpointForOSSClusterApi?: boolean;
  clientTlsCertificates?: DatabaseCertificateSpec[];
  enableTls?: boolean;
  globalDataPersistence?: string;
  globalPassword?: string;
  globalSourceIp?: string[];
  globalAlerts?: DatabaseAlert[];
  regions?: LocalRegionProperties[];
  dataEvictionPolicy?: string;
  commandType?: string;
}

export interface BdbVersionUpgradeStatus {
  databaseId?: number;
  targetRedisVersion?: string;
  progress?: number;
  upgradeStatus?: string;
  [key: string]: unknown;
}

// ============================================================================
// Handler
// ============================================================================

export class DatabaseHandler {
  constructor(private readonly client: CloudClient) {}

  private path(subscriptionId: number, databaseId?: number, suffix = ""): string {
    const base = `/subscriptions/${segment(subscriptionId)}/databases`;
    return databaseId === undefined ? base : `${base}/${segment(databaseId)}${suffix}`;
  }

  getSubscriptionDatabases(
    subscriptionId: number,
    offset?: number,
    limit?: number
  ): Promise<AccountSubscriptionDatabases> {
    return this.client.get<AccountSubscriptionDatabases>(this.path(subscriptionId), {
      offset,
      limit,
    });
  }

  createDatabase(subscriptionId: number, request: DatabaseCreateRequest): Promise<TaskStateUpdate> {
    return this.client.post<TaskStateUpdate>(this.path(subscriptionId), request);
  }

  getSubscriptionDatabaseById(subscriptionId: number, databaseId: number): Promise<Database> {
    return this.client.get<Database>(this.path(subscriptionId, databaseId));
  }

  updateDatabase(
    subscriptionId: number,
    databaseId: number,
    request: DatabaseUpdateRequest
  ): Promise<TaskStateUpdate> {
    return this.client.put<TaskStateUpdate>(this.path(subscriptionId, databaseId), request);
  }

  deleteDatabaseById(subscriptionId: number, databaseId: number): Promise<TaskStateUpdate> {
    return this.client.deleteTask(this.path(subscriptionId, databaseId));
  }

  // Backup and import

  getDatabaseBackupStatus(
    subscriptionId: number,
    databaseId: number,
    regionName?: string
  ): Promise<TaskStateUpdate> {
    return this.client.get<TaskStateUpdate>(this.path(subscriptionId, databaseId, "/backup"), {
      regionName,
    });
  }

  backupDatabase(
    subscriptionId: number,
    databaseId: number,
    request: DatabaseBackupRequest = {}
  ): Promise<TaskStateUpdate> {
    return this.client.post<TaskStateUpdate>(
      this.path(subscriptionId, databaseId, "/backup"),
      request
    );
  }

  getDatabaseImportStatus(subscriptionId: number, databaseId: number): Promise<TaskStateUpdate> {
    return this.client.get<TaskStateUpdate>(this.path(subscriptionId, databaseId, "/import"));
  }

  importDatabase(
    subscriptionId: number,
    databaseId: number,
    request: DatabaseImportRequest
  ): Promise<TaskStateUpdate> {
    return this.client.post<TaskStateUpdate>(
      this.path(subscriptionId, databaseId, "/import"),
      request
    );
  }

  getSubscriptionDatabaseCertificate(
    subscriptionId: number,
    databaseId: number
  ): Promise<DatabaseCertificate> {
    return this.client.get<DatabaseCertificate>(
      this.path(subscriptionId, databaseId, "/certificate")
    );
  }

  // Flush

  /** Active-Active flush. */
  flushCrdb(
    subscriptionId: number,
    databaseId: number,
    request: CrdbFlushRequest
  ): Promise<TaskStateUpdate> {
    return this.client.put<TaskStateUpdate>(
      this.path(subscriptionId, databaseId, "/flush"),
      request
    );
  }

  flushDatabase(subscriptionId: number, databaseId: number): Promise<TaskStateUpdate> {
    return this.client.put<TaskStateUpdate>(this.path(subscriptionId, databaseId, "/flush"), {});
  }

  updateCrdbLocalProperties(
    subscriptionId: number,
    databaseId: number,
    request: CrdbUpdatePropertiesRequest
  ): Promise<TaskStateUpdate> {
    return this.client.put<TaskStateUpdate>(
      this.path(subscriptionId, databaseId, "/regions"),
      request
    );
  }

  getSlowLog(
    subscriptionId: number,
    databaseId: number,
    regionName?: string
  ): Promise<DatabaseSlowLogEntries> {
    return this.client.get<DatabaseSlowLogEntries>(
      this.path(subscriptionId, databaseId, "/slow-log"),
      { regionName }
    );
  }

  // Tags

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

  // Version upgrade

  getAvailableTargetVersions(subscriptionId: number, databaseId: number): Promise<JsonValue> {
    return this.client.getRaw(this.path(subscriptionId, databaseId, "/available-target-versions"));
  }

  getDatabaseRedisVersionUpgradeStatus(
    subscriptionId: number,
    databaseId: number
  ): Promise<BdbVersionUpgradeStatus> {
    return this.client.get<BdbVersionUpgradeStatus>(
      this.path(subscriptionId, databaseId, "/upgrade")
    );
  }

  upgradeDatabaseRedisVersion(
    subscriptionId: number,
    databaseId: number,
    request: DatabaseUpgradeRedisVersionRequest
  ): Promise<TaskStateUpdate> {
    return this.client.post<TaskStateUpdate>(
      this.path(subscriptionId, databaseId, "/upgrade"),
      request
    );
  }

  // Pagination

  /**
   * Yields every database in the subscription, fetching pages as the
   * consumer advances.
   */
  streamDatabases(
    subscriptionId: number,
    pageSize?: number
  ): AsyncGenerator<Database, void, undefined> {
    return paginate(
      async (query) => {
        const page = await this.client.get<AccountSubscriptionDatabases>(
          this.path(subscriptionId),
          query
        );
        return databasesOf(page.subscription);
      },
      new OffsetPaginationStrategy(pageSize)
    );
  }

  listAllDatabases(subscriptionId: number): Promise<Database[]> {
    return collect(this.streamDatabases(subscriptionId));
  }
}
