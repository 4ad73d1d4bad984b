/**
 * VPC peering between a subscription and a customer network.
 *
 * Active-Active subscriptions use the same endpoints; the region is carried
 * in the request body.
 */

import type { CloudClient } from "../../client.js";
import { segment, type TaskStateUpdate } from "../common.js";

export interface VpcPeeringCreateRequest {
  provider?: "AWS" | "GCP";
  /** AWS: destination VPC. */
  vpcId?: string;
  awsRegion?: string;
  awsAccountId?: string;
  vpcCidr?: string;
  vpcCidrs?: string[];
  /** GCP: project and network to peer with. */
  gcpProjectId?: string;
  networkName?: string;
  /** Active-Active: source region of the peering. */
  sourceRegion?: string;
  destinationRegion?: string;
  commandType?: string;
}

export interface VpcPeeringUpdateRequest {
  vpcCidr?: string;
  vpcCidrs?: string[];
  commandType?: string;
}

export interface VpcCidr {
  vpcCidr?: string;
  status?: string;
  [key: string]: unknown;
}

export interface VpcPeering {
  id?: number;
  status?: string;
  awsAccountId?: string;
  awsPeeringId?: string;
  vpcId?: string;
  vpcCidr?: string;
  vpcCidrs?: VpcCidr[];
  gcpProjectUid?: string;
  networkName?: string;
  redisProjectUid?: string;
  redisNetworkName?: string;
  cloudPeeringId?: string;
  region?: string;
  provider?: string;
  [key: string]: unknown;
}

export interface ActiveActiveVpcPeering extends VpcPeering {
  regionId?: number;
  regionName?: string;
  sourceRegion?: string;
  destinationRegion?: string;
}

export interface ActiveActiveVpcRegion {
  id?: number;
  sourceRegion?: string;
  vpcPeerings?: ActiveActiveVpcPeering[];
  [key: string]: unknown;
}

export interface ActiveActiveVpcPeeringList {
  subscriptionId?: number;
  regions?: ActiveActiveVpcRegion[];
  [key: string]: unknown;
}

export class VpcPeeringHandler {
  constructor(private readonly client: CloudClient) {}

  /** Peerings are reported through the task's response resource. */
  get(subscriptionId: number): Promise<TaskStateUpdate> {
    return this.client.get<TaskStateUpdate>(`/subscriptions/${segment(subscriptionId)}/peerings`);
  }

  create(subscriptionId: number, request: VpcPeeringCreateRequest): Promise<TaskStateUpdate> {
    return this.client.post<TaskStateUpdate>(
      `/subscriptions/${segment(subscriptionId)}/peerings`,
      request
    );
  }

  update(
    subscriptionId: number,
    peeringId: number,
    request: VpcPeeringUpdateRequest
  ): Promise<TaskStateUpdate> {
    return this.client.put<TaskStateUpdate>(
      `/subscriptions/${segment(subscriptionId)}/peerings/${segment(peeringId)}`,
      request
    );
  }

  delete(subscriptionId: number, peeringId: number): Promise<void> {
    return this.client.delete(
      `/subscriptions/${segment(subscriptionId)}/peerings/${segment(peeringId)}`
    );
  }

  getActiveActive(subscriptionId: number): Promise<TaskStateUpdate> {
    return this.get(subscriptionId);
  }

  createActiveActive(
    subscriptionId: number,
    request: VpcPeeringCreateRequest
  ): Promise<TaskStateUpdate> {
    return this.create(subscriptionId, request);
  }

  updateActiveActive(
    subscriptionId: number,
    peeringId: number,
    request: VpcPeeringUpdateRequest
  ): Promise<TaskStateUpdate> {
    return this.update(subscriptionId, peeringId, request);
  }

  deleteActiveActive(subscriptionId: number, peeringId: number): Promise<void> {
    return this.delete(subscriptionId, peeringId);
  }
}
