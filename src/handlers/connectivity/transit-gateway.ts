/**
 * AWS Transit Gateway attachments and resource-share invitations.
 */

import type { CloudClient } from "../../client.js";
import { segment, type TaskStateUpdate } from "../common.js";

export interface Cidr {
  cidrAddress?: string;
}

export interface TgwUpdateCidrsRequest {
  cidrs?: Cidr[];
  commandType?: string;
}

export interface TgwAttachmentRequest {
  awsAccountId?: string;
  tgwId?: string;
  cidrs?: string[];
}

export interface CidrStatus {
  cidrAddress?: string;
  status?: string;
  [key: string]: unknown;
}

export interface TgwAttachment {
  id?: number;
  awsTgwUid?: string;
  attachmentUid?: string;
  status?: string;
  attachmentStatus?: string;
  awsAccountId?: string;
  cidrs?: CidrStatus[];
  [key: string]: unknown;
}

export interface TransitGatewayInvitation {
  id?: number;
  name?: string;
  resourceShareUid?: string;
  awsAccountId?: string;
  status?: string;
  sharedDate?: string;
  [key: string]: unknown;
}

export class TransitGatewayHandler {
  constructor(private readonly client: CloudClient) {}

  private base(subscriptionId: number): string {
    return `/subscriptions/${segment(subscriptionId)}`;
  }

  private regionBase(subscriptionId: number, regionId: number): string {
    return `${this.base(subscriptionId)}/regions/${segment(regionId)}`;
  }

  getAttachments(subscriptionId: number): Promise<TaskStateUpdate> {
    return this.client.get<TaskStateUpdate>(`${this.base(subscriptionId)}/transitGateways`);
  }

  getSharedInvitations(subscriptionId: number): Promise<TaskStateUpdate> {
    return this.client.get<TaskStateUpdate>(`${this.base(subscriptionId)}/tgw/shared-invitations`);
  }

  acceptResourceShare(subscriptionId: number, invitationId: string): Promise<TaskStateUpdate> {
    return this.client.post<TaskStateUpdate>(
      `${this.base(subscriptionId)}/tgw/shared-invitations/${segment(invitationId)}/accept`,
      {}
    );
  }

  rejectResourceShare(subscriptionId: number, invitationId: string): Promise<TaskStateUpdate> {
    return this.client.post<TaskStateUpdate>(
      `${this.base(subscriptionId)}/tgw/shared-invitations/${segment(invitationId)}/reject`,
      {}
    );
  }

  deleteAttachment(subscriptionId: number, attachmentId: string): Promise<void> {
    return this.client.delete(
      `${this.base(subscriptionId)}/transitGateways/${segment(attachmentId)}/attachment`
    );
  }

  /** Attaches the transit gateway named in the path. */
  createAttachmentWithId(subscriptionId: number, tgwId: string): Promise<TaskStateUpdate> {
    const request: TgwAttachmentRequest = { tgwId };
    return this.client.post<TaskStateUpdate>(
      `${this.base(subscriptionId)}/transitGateways/${segment(tgwId)}/attachment`,
      request
    );
  }

  createAttachment(subscriptionId: number, request: TgwAttachmentRequest): Promise<TaskStateUpdate> {
    return this.client.post<TaskStateUpdate>(
      `${this.base(subscriptionId)}/transitGateways/attachments`,
      request
    );
  }

  updateAttachmentCidrs(
    subscriptionId: number,
    attachmentId: string,
    request: TgwAttachmentRequest
  ): Promise<TaskStateUpdate> {
    return this.client.put<TaskStateUpdate>(
      `${this.base(subscriptionId)}/transitGateways/${segment(attachmentId)}/attachment`,
      request
    );
  }

  // Active-Active

  getAttachmentsActiveActive(subscriptionId: number): Promise<TaskStateUpdate> {
    return this.client.get<TaskStateUpdate>(
      `${this.base(subscriptionId)}/regions/transitGateways`
    );
  }

  getSharedInvitationsActiveActive(subscriptionId: number): Promise<TaskStateUpdate> {
    return this.client.get<TaskStateUpdate>(
      `${this.base(subscriptionId)}/regions/tgw/shared-invitations`
    );
  }

  acceptResourceShareActiveActive(
    subscriptionId: number,
    regionId: number,
    invitationId: string
  ): Promise<TaskStateUpdate> {
    return this.client.post<TaskStateUpdate>(
      `${this.regionBase(subscriptionId, regionId)}/tgw/shared-invitations/${segment(invitationId)}/accept`,
      {}
    );
  }

  rejectResourceShareActiveActive(
    subscriptionId: number,
    regionId: number,
    invitationId: string
  ): Promise<TaskStateUpdate> {
    return this.client.post<TaskStateUpdate>(
      `${this.regionBase(subscriptionId, regionId)}/tgw/shared-invitations/${segment(invitationId)}/reject`,
      {}
    );
  }

  deleteAttachmentActiveActive(
    subscriptionId: number,
    regionId: number,
    attachmentId: string
  ): Promise<void> {
    return this.client.delete(
      `${this.regionBase(subscriptionId, regionId)}/tgw/attachments/${segment(attachmentId)}`
    );
  }

  createAttachmentActiveActive(
    subscriptionId: number,
    regionId: number,
    request: TgwAttachmentRequest
  ): Promise<TaskStateUpdate> {
    return this.client.post<TaskStateUpdate>(
      `${this.regionBase(subscriptionId, regionId)}/tgw/attachments`,
      request
    );
  }

  updateAttachmentCidrsActiveActive(
    subscriptionId: number,
    regionId: number,
    attachmentId: string,
    request: TgwAttachmentRequest
  ): Promise<TaskStateUpdate> {
    return this.client.put<TaskStateUpdate>(
      `${this.regionBase(subscriptionId, regionId)}/tgw/attachments/${segment(attachmentId)}/cidrs`,
      request
    );
  }
}
