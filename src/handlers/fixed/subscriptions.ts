/**
 * Essentials (fixed plan) subscriptions and their plans.
 */

import type { CloudClient } from "../../client.js";
import { segment, type Link, type RedisVersions, type TaskStateUpdate } from "../common.js";

export interface FixedSubscriptionsPlan {
  id?: number;
  name?: string;
  size?: number;
  datasetSize?: number;
  sizeMeasurementUnit?: string;
  provider?: string;
  region?: string;
  regionId?: number;
  price?: number;
  priceCurrency?: string;
  pricePeriod?: string;
  maximumDatabases?: number;
  maximumThroughput?: number;
  maximumBandwidthGB?: number;
  availability?: string;
  connections?: string;
  cidrAllowRules?: number;
  supportDataPersistence?: boolean;
  redisFlex?: boolean;
  supportInstantAndDailyBackups?: boolean;
  supportReplication?: boolean;
  supportClustering?: boolean;
  supportSsl?: boolean;
  customerSupport?: string;
  links?: Link[];
  [key: string]: unknown;
}

export interface FixedSubscriptionsPlans {
  plans?: FixedSubscriptionsPlan[];
  links?: Link[];
  [key: string]: unknown;
}

export interface FixedSubscription {
  id?: number;
  name?: string;
  status?: string;
  paymentMethodId?: number;
  paymentMethodType?: string;
  planId?: number;
  planName?: string;
  planType?: string;
  size?: number;
  sizeMeasurementUnit?: string;
  provider?: string;
  region?: string;
  price?: number;
  pricePeriod?: string;
  priceCurrency?: string;
  maximumDatabases?: number;
  availability?: string;
  connections?: string;
  cidrAllowRules?: number;
  supportDataPersistence?: boolean;
  supportInstantAndDailyBackups?: boolean;
  supportReplication?: boolean;
  supportClustering?: boolean;
  customerSupport?: string;
  creationDate?: string;
  databaseStatus?: string;
  links?: Link[];
  [key: string]: unknown;
}

export interface FixedSubscriptions {
  accountId?: number;
  subscriptions?: FixedSubscription[];
  links?: Link[];
  [key: string]: unknown;
}

export interface FixedSubscriptionCreateRequest {
  name: string;
  planId: number;
  paymentMethod?: string;
  paymentMethodId?: number;
  commandType?: string;
}

export interface FixedSubscriptionUpdateRequest {
  subscriptionId?: number;
  name?: string;
  planId?: number;
  paymentMethod?: string;
  paymentMethodId?: number;
  commandType?: string;
}

export class FixedSubscriptionHandler {
  constructor(private readonly client: CloudClient) {}

  /** Plans, optionally filtered by provider and Redis Flex support. */
  listPlans(provider?: string, redisFlex?: boolean): Promise<FixedSubscriptionsPlans> {
    return this.client.get<FixedSubscriptionsPlans>("/fixed/plans", { provider, redisFlex });
  }

  getPlansBySubscriptionId(subscriptionId: number): Promise<FixedSubscriptionsPlans> {
    return this.client.get<FixedSubscriptionsPlans>(
      `/fixed/plans/subscriptions/${segment(subscriptionId)}`
    );
  }

  getPlanById(planId: number): Promise<FixedSubscriptionsPlan> {
    return this.client.get<FixedSubscriptionsPlan>(`/fixed/plans/${segment(planId)}`);
  }

  getRedisVersions(subscriptionId: number): Promise<RedisVersions> {
    return this.client.get<RedisVersions>("/fixed/redis-versions", { subscriptionId });
  }

  list(): Promise<FixedSubscriptions> {
    return this.client.get<FixedSubscriptions>("/fixed/subscriptions");
  }

  create(request: FixedSubscriptionCreateRequest): Promise<TaskStateUpdate> {
    return this.client.post<TaskStateUpdate>("/fixed/subscriptions", request);
  }

  getById(subscriptionId: number): Promise<FixedSubscription> {
    return this.client.get<FixedSubscription>(`/fixed/subscriptions/${segment(subscriptionId)}`);
  }

  update(
    subscriptionId: number,
    request: FixedSubscriptionUpdateRequest
  ): Promise<TaskStateUpdate> {
    return this.client.put<TaskStateUpdate>(
      `/fixed/subscriptions/${segment(subscriptionId)}`,
      request
    );
  }

  deleteById(subscriptionId: number): Promise<TaskStateUpdate> {
    return this.client.deleteTask(`/fixed/subscriptions/${segment(subscriptionId)}`);
  }
}
