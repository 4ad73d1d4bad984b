/**
 * Pro (flexible) subscriptions.
 */

import type { CloudClient } from "../client.js";
import {
  segment,
  type DatabaseModule,
  type Link,
  type RedisVersions,
  type TaskStateUpdate,
  type ThroughputMeasurement,
} from "./common.js";

// ============================================================================
// Models
// ============================================================================

export interface CustomerManagedKeyAccessDetails {
  redisServiceAccount?: string;
  googlePredefinedRoles?: string[];
  googleCustomPermissions?: string[];
  redisIamRole?: string;
  requiredKeyPolicyStatements?: Record<string, unknown>;
  deletionGracePeriodOptions?: string[];
  [key: string]: unknown;
}

export interface Subscription {
  id?: number;
  name?: string;
  status?: string;
  paymentMethodId?: number;
  paymentMethodType?: string;
  paymentMethod?: string;
  memoryStorage?: string;
  persistentStorageEncryptionType?: string;
  deploymentType?: string;
  numberOfDatabases?: number;
  cloudDetails?: unknown[];
  pricing?: unknown[];
  redisVersion?: string;
  deletionGracePeriod?: string;
  customerManagedKeyAccessDetails?: CustomerManagedKeyAccessDetails;
  createdTimestamp?: string;
  links?: Link[];
  [key: string]: unknown;
}

export interface AccountSubscriptions {
  accountId?: number;
  subscriptions?: Subscription[];
  links?: Link[];
  [key: string]: unknown;
}

export interface SubscriptionRegionNetworkingSpec {
  deploymentCIDR?: string;
  vpcId?: string;
  subnetIds?: string[];
  securityGroupId?: string;
}

export interface SubscriptionRegionSpec {
  region: string;
  multipleAvailabilityZones?: boolean;
  preferredAvailabilityZones?: string[];
  networking?: SubscriptionRegionNetworkingSpec;
}

export interface SubscriptionSpec {
  provider?: string;
  cloudAccountId?: number;
  regions: SubscriptionRegionSpec[];
}

export interface LocalThroughput {
  region?: string;
  writeOperationsPerSecond?: number;
  readOperationsPerSecond?: number;
}

export interface SubscriptionDatabaseSpec {
  name: string;
  protocol: string;
  memoryLimitInGb?: number;
  datasetSizeInGb?: number;
  supportOSSClusterApi?: boolean;
  dataPersistence?: string;
  replication?: boolean;
  throughputMeasurement?: ThroughputMeasurement;
  localThroughputMeasurement?: LocalThroughput[];
  modules?: DatabaseModule[];
  quantity?: number;
  averageItemSizeInBytes?: number;
  respVersion?: string;
  redisVersion?: string;
  shardingType?: string;
  queryPerformanceFactor?: string;
}

export interface SubscriptionCreateRequest {
  name?: string;
  dryRun?: boolean;
  deploymentType?: "single-region" | "active-active";
  paymentMethod?: string;
  paymentMethodId?: number;
  memoryStorage?: string;
  persistentStorageEncryptionType?: string;
  cloudProviders: SubscriptionSpec[];
  databases: SubscriptionDatabaseSpec[];
  redisVersion?: string;
  commandType?: string;
}

export interface SubscriptionUpdateRequest {
  subscriptionId?: number;
  name?: string;
  paymentMethodId?: number;
  paymentMethod?: string;
  commandType?: string;
}

export interface CidrAllowlistUpdateRequest {
  subscriptionId?: number;
  cidrIps?: string[];
  securityGroupIds?: string[];
  commandType?: string;
}

export interface MaintenanceWindow {
  days?: string[];
  startHour?: number;
  durationInHours?: number;
  [key: string]: unknown;
}

export interface MaintenanceWindowSkipStatus {
  remainingSkips?: number;
  currentSkipEnd?: string;
  [key: string]: unknown;
}

export interface SubscriptionMaintenanceWindows {
  mode?: string;
  timeZone?: string;
  windows?: MaintenanceWindow[];
  skipStatus?: MaintenanceWindowSkipStatus;
  [key: string]: unknown;
}

export interface MaintenanceWindowSpec {
  startHour: number;
  durationInHours: number;
  days: string[];
}

export interface SubscriptionMaintenanceWindowsSpec {
  mode: "automatic" | "manual";
  windows?: MaintenanceWindowSpec[];
}

export interface SubscriptionPricing {
  type?: string;
  typeDetails?: string;
  quantity?: number;
  quantityMeasurement?: string;
  pricePerUnit?: number;
  priceCurrency?: string;
  pricePeriod?: string;
  region?: string;
  [key: string]: unknown;
}

export interface SubscriptionPricings {
  pricing?: SubscriptionPricing[];
  [key: string]: unknown;
}

export interface ActiveActiveSubscriptionRegions {
  subscriptionId?: number;
  regions?: unknown[];
  links?: Link[];
  [key: string]: unknown;
}

export interface CrdbRegionSpec {
  name?: string;
  localThroughputMeasurement?: LocalThroughput;
}

export interface ActiveActiveRegionCreateRequest {
  subscriptionId?: number;
  region?: string;
  vpcId?: string;
  deploymentCIDR: string;
  dryRun?: boolean;
  databases?: CrdbRegionSpec[];
  respVersion?: string;
  customerManagedKeyResourceName?: string;
  commandType?: string;
}

export interface ActiveActiveRegionDeleteRequest {
  subscriptionId?: number;
  regions?: Array<{ region?: string }>;
  dryRun?: boolean;
  commandType?: string;
}

// ============================================================================
// Handler
// ============================================================================

export class SubscriptionHandler {
  constructor(private readonly client: CloudClient) {}

  getAllSubscriptions(): Promise<AccountSubscriptions> {
    return this.client.get<AccountSubscriptions>("/subscriptions");
  }

  createSubscription(request: SubscriptionCreateRequest): Promise<TaskStateUpdate> {
    return this.client.post<TaskStateUpdate>("/subscriptions", request);
  }

  getRedisVersions(subscriptionId?: number): Promise<RedisVersions> {
    return this.client.get<RedisVersions>("/subscriptions/redis-versions", { subscriptionId });
  }

  getSubscriptionById(subscriptionId: number): Promise<Subscription> {
    return this.client.get<Subscription>(`/subscriptions/${segment(subscriptionId)}`);
  }

  updateSubscription(
    subscriptionId: number,
    request: SubscriptionUpdateRequest
  ): Promise<TaskStateUpdate> {
    return this.client.put<TaskStateUpdate>(`/subscriptions/${segment(subscriptionId)}`, request);
  }

  /** Every database in the subscription must be deleted first. */
  deleteSubscriptionById(subscriptionId: number): Promise<TaskStateUpdate> {
    return this.client.deleteTask(`/subscriptions/${segment(subscriptionId)}`);
  }

  getCidrAllowlist(subscriptionId: number): Promise<TaskStateUpdate> {
    return this.client.get<TaskStateUpdate>(`/subscriptions/${segment(subscriptionId)}/cidr`);
  }

  updateSubscriptionCidrAllowlist(
    subscriptionId: number,
    request: CidrAllowlistUpdateRequest
  ): Promise<TaskStateUpdate> {
    return this.client.put<TaskStateUpdate>(
      `/subscriptions/${segment(subscriptionId)}/cidr`,
      request
    );
  }

  getSubscriptionMaintenanceWindows(
    subscriptionId: number
  ): Promise<SubscriptionMaintenanceWindows> {
    return this.client.get<SubscriptionMaintenanceWindows>(
      `/subscriptions/${segment(subscriptionId)}/maintenance-windows`
    );
  }

  updateSubscriptionMaintenanceWindows(
    subscriptionId: number,
    request: SubscriptionMaintenanceWindowsSpec
  ): Promise<TaskStateUpdate> {
    return this.client.put<TaskStateUpdate>(
      `/subscriptions/${segment(subscriptionId)}/maintenance-windows`,
      request
    );
  }

  getSubscriptionPricing(subscriptionId: number): Promise<SubscriptionPricings> {
    return this.client.get<SubscriptionPricings>(
      `/subscriptions/${segment(subscriptionId)}/pricing`
    );
  }

  // Active-Active regions

  getRegionsFromActiveActiveSubscription(
    subscriptionId: number
  ): Promise<ActiveActiveSubscriptionRegions> {
    return this.client.get<ActiveActiveSubscriptionRegions>(
      `/subscriptions/${segment(subscriptionId)}/regions`
    );
  }

  addNewRegionToActiveActiveSubscription(
    subscriptionId: number,
    request: ActiveActiveRegionCreateRequest
  ): Promise<TaskStateUpdate> {
    return this.client.post<TaskStateUpdate>(
      `/subscriptions/${segment(subscriptionId)}/regions`,
      request
    );
  }

  deleteRegionsFromActiveActiveSubscription(
    subscriptionId: number,
    request: ActiveActiveRegionDeleteRequest
  ): Promise<TaskStateUpdate> {
    return this.client.deleteWithBody<TaskStateUpdate>(
      `/subscriptions/${segment(subscriptionId)}/regions`,
      request
    );
  }
}
