/**
 * GCP Private Service Connect.
 */

import type { CloudClient } from "../../client.js";
import type { JsonValue } from "../../core/types.js";
import { segment, type TaskStateUpdate } from "../common.js";

export interface PscEndpointUpdateRequest {
  subscriptionId: number;
  pscServiceId: number;
  endpointId: number;
  gcpProjectId?: string;
  gcpVpcName?: string;
  gcpVpcSubnetName?: string;
  endpointConnectionName?: string;
}

export interface PscEndpoint {
  id?: number;
  gcpProjectId?: string;
  gcpVpcName?: string;
  gcpVpcSubnetName?: string;
  endpointConnectionName?: string;
  status?: string;
  [key: string]: unknown;
}

const PSC = "private-service-connect";

export class PscHandler {
  constructor(private readonly client: CloudClient) {}

  private base(subscriptionId: number): string {
    return `/subscriptions/${segment(subscriptionId)}`;
  }

  private regionBase(subscriptionId: number, regionId: number): string {
    return `${this.base(subscriptionId)}/regions/${segment(regionId)}`;
  }

  getService(subscriptionId: number): Promise<TaskStateUpdate> {
    return this.client.get<TaskStateUpdate>(`${this.base(subscriptionId)}/${PSC}`);
  }

  createService(subscriptionId: number): Promise<TaskStateUpdate> {
    return this.client.post<TaskStateUpdate>(`${this.base(subscriptionId)}/${PSC}`, {});
  }

  deleteService(subscriptionId: number): Promise<void> {
    return this.client.delete(`${this.base(subscriptionId)}/${PSC}`);
  }

  getEndpoints(subscriptionId: number): Promise<TaskStateUpdate> {
    return this.client.get<TaskStateUpdate>(`${this.base(subscriptionId)}/${PSC}/endpoints`);
  }

  createEndpoint(
    subscriptionId: number,
    request: PscEndpointUpdateRequest
  ): Promise<TaskStateUpdate> {
    return this.client.post<TaskStateUpdate>(
      `${this.base(subscriptionId)}/${PSC}/endpoints`,
      request
    );
  }

  deleteEndpoint(subscriptionId: number, endpointId: number): Promise<void> {
    return this.client.delete(
      `${this.base(subscriptionId)}/${PSC}/endpoints/${segment(endpointId)}`
    );
  }

  /** The service id in the path comes from `request.pscServiceId`. */
  updateEndpoint(
    subscriptionId: number,
    endpointId: number,
    request: PscEndpointUpdateRequest
  ): Promise<TaskStateUpdate> {
    return this.client.put<TaskStateUpdate>(
      `${this.base(subscriptionId)}/${PSC}/${segment(request.pscServiceId)}/endpoints/${segment(endpointId)}`,
      request
    );
  }

  getEndpointCreationScript(subscriptionId: number, endpointId: number): Promise<JsonValue> {
    return this.client.getRaw(
      `${this.base(subscriptionId)}/${PSC}/endpoints/${segment(endpointId)}/creationScripts`
    );
  }

  getEndpointDeletionScript(subscriptionId: number, endpointId: number): Promise<JsonValue> {
    return this.client.getRaw(
      `${this.base(subscriptionId)}/${PSC}/endpoints/${segment(endpointId)}/deletionScripts`
    );
  }

  // Active-Active

  deleteServiceActiveActive(subscriptionId: number): Promise<void> {
    return this.client.delete(`${this.base(subscriptionId)}/regions/${PSC}`);
  }

  getServiceActiveActive(subscriptionId: number): Promise<TaskStateUpdate> {
    return this.client.get<TaskStateUpdate>(`${this.base(subscriptionId)}/regions/${PSC}`);
  }

  createServiceActiveActive(subscriptionId: number): Promise<TaskStateUpdate> {
    return this.client.post<TaskStateUpdate>(`${this.base(subscriptionId)}/regions/${PSC}`, {});
  }

  getEndpointsActiveActive(subscriptionId: number): Promise<TaskStateUpdate> {
    return this.client.get<TaskStateUpdate>(
      `${this.base(subscriptionId)}/regions/${PSC}/endpoints`
    );
  }

  createEndpointActiveActive(
    subscriptionId: number,
    request: PscEndpointUpdateRequest
  ): Promise<TaskStateUpdate> {
    return this.client.post<TaskStateUpdate>(
      `${this.base(subscriptionId)}/regions/${PSC}/endpoints`,
      request
    );
  }

  deleteEndpointActiveActive(
    subscriptionId: number,
    regionId: number,
    endpointId: number
  ): Promise<void> {
    return this.client.delete(
      `${this.regionBase(subscriptionId, regionId)}/${PSC}/endpoints/${segment(endpointId)}`
    );
  }

  updateEndpointActiveActive(
    subscriptionId: number,
    regionId: number,
    endpointId: number,
    request: PscEndpointUpdateRequest
  ): Promise<TaskStateUpdate> {
    return this.client.put<TaskStateUpdate>(
      `${this.regionBase(subscriptionId, regionId)}/${PSC}/${segment(request.pscServiceId)}/endpoints/${segment(endpointId)}`,
      request
    );
  }

  getEndpointCreationScriptActiveActive(
    subscriptionId: number,
    regionId: number,
    pscServiceId: number,
    endpointId: number
  ): Promise<JsonValue> {
    return this.client.getRaw(
      `${this.regionBase(subscriptionId, regionId)}/${PSC}/${segment(pscServiceId)}/endpoints/${segment(endpointId)}/creationScripts`
    );
  }

  getEndpointDeletionScriptActiveActive(
    subscriptionId: number,
    regionId: number,
    pscServiceId: number,
    endpointId: number
  ): Promise<JsonValue> {
    return this.client.getRaw(
      `${this.regionBase(subscriptionId, regionId)}/${PSC}/${segment(pscServiceId)}/endpoints/${segment(endpointId)}/deletionScripts`
    );
  }
}
