/**
 * Networking facade: VPC peering, Private Service Connect and Transit Gateway
 * behind one handler, with shortcuts for the common calls.
 */

import type { CloudClient } from "../../client.js";
import type { TaskStateUpdate } from "../common.js";
import { PscHandler, type PscEndpointUpdateRequest } from "./psc.js";
import {
  TransitGatewayHandler,
  type TgwAttachmentRequest,
  type TgwUpdateCidrsRequest,
} from "./transit-gateway.js";
import {
  VpcPeeringHandler,
  type VpcPeeringCreateRequest,
  type VpcPeeringUpdateRequest,
} from "./vpc-peering.js";

export * from "./private-link.js";
export * from "./psc.js";
export * from "./transit-gateway.js";
export * from "./vpc-peering.js";

export class ConnectivityHandler {
  readonly vpcPeering: VpcPeeringHandler;
  readonly psc: PscHandler;
  readonly transitGateway: TransitGatewayHandler;

  constructor(client: CloudClient) {
    this.vpcPeering = new VpcPeeringHandler(client);
    this.psc = new PscHandler(client);
    this.transitGateway = new TransitGatewayHandler(client);
  }

  getVpcPeering(subscriptionId: number): Promise<TaskStateUpdate> {
    return this.vpcPeering.get(subscriptionId);
  }

  createVpcPeering(
    subscriptionId: number,
    request: VpcPeeringCreateRequest
  ): Promise<TaskStateUpdate> {
    return this.vpcPeering.create(subscriptionId, request);
  }

  updateVpcPeering(
    subscriptionId: number,
    peeringId: number,
    request: VpcPeeringUpdateRequest
  ): Promise<TaskStateUpdate> {
    return this.vpcPeering.update(subscriptionId, peeringId, request);
  }

  deleteVpcPeering(subscriptionId: number, peeringId: number): Promise<void> {
    return this.vpcPeering.delete(subscriptionId, peeringId);
  }

  getPscService(subscriptionId: number): Promise<TaskStateUpdate> {
    return this.psc.getService(subscriptionId);
  }

  createPscService(subscriptionId: number): Promise<TaskStateUpdate> {
    return this.psc.createService(subscriptionId);
  }

  deletePscService(subscriptionId: number): Promise<void> {
    return this.psc.deleteService(subscriptionId);
  }

  createPscEndpoint(
    subscriptionId: number,
    request: PscEndpointUpdateRequest
  ): Promise<TaskStateUpdate> {
    return this.psc.createEndpoint(subscriptionId, request);
  }

  getTgws(subscriptionId: number): Promise<TaskStateUpdate> {
    return this.transitGateway.getAttachments(subscriptionId);
  }

  createTgwAttachment(subscriptionId: number, tgwId: string): Promise<TaskStateUpdate> {
    return this.transitGateway.createAttachmentWithId(subscriptionId, tgwId);
  }

  deleteTgwAttachment(subscriptionId: number, attachmentId: number | string): Promise<void> {
    return this.transitGateway.deleteAttachment(subscriptionId, String(attachmentId));
  }

  /** Sends only the addresses of the given CIDRs. */
  updateTgwCidrs(
    subscriptionId: number,
    attachmentId: string,
    request: TgwUpdateCidrsRequest
  ): Promise<TaskStateUpdate> {
    const attachment: TgwAttachmentRequest = {};
    if (request.cidrs) {
      attachment.cidrs = request.cidrs.flatMap((cidr) =>
        cidr.cidrAddress === undefined ? [] : [cidr.cidrAddress]
      );
    }
    return this.transitGateway.updateAttachmentCidrs(subscriptionId, attachmentId, attachment);
  }
}
