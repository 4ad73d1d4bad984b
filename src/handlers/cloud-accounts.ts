/**
 * Cloud provider accounts (bring-your-own AWS account).
 */

import type { CloudClient } from "../client.js";
import { segment, type Link, type TaskStateUpdate } from "./common.js";

export interface CloudAccount {
  id?: number;
  name?: string;
  status?: string;
  provider?: string;
  accessKeyId?: string;
  accessSecretKey?: string;
  awsConsoleRoleArn?: string;
  awsUserArn?: string;
  consoleUsername?: string;
  consolePassword?: string;
  signInLoginUrl?: string;
  links?: Link[];
  [key: string]: unknown;
}

export interface CloudAccounts {
  accountId?: number;
  cloudAccounts?: CloudAccount[];
  links?: Link[];
  [key: string]: unknown;
}

export interface CloudAccountCreateRequest {
  name: string;
  provider?: string;
  accessKeyId: string;
  accessSecretKey: string;
  consoleUsername: string;
  consolePassword: string;
  signInLoginUrl: string;
  commandType?: string;
}

export interface CloudAccountUpdateRequest {
  name?: string;
  cloudAccountId?: number;
  accessKeyId: string;
  accessSecretKey: string;
  consoleUsername: string;
  consolePassword: string;
  signInLoginUrl?: string;
  commandType?: string;
}

export class CloudAccountsHandler {
  constructor(private readonly client: CloudClient) {}

  getCloudAccounts(): Promise<CloudAccounts> {
    return this.client.get<CloudAccounts>("/cloud-accounts");
  }

  createCloudAccount(request: CloudAccountCreateRequest): Promise<TaskStateUpdate> {
    return this.client.post<TaskStateUpdate>("/cloud-accounts", request);
  }

  getCloudAccountById(cloudAccountId: number): Promise<CloudAccount> {
    return this.client.get<CloudAccount>(`/cloud-accounts/${segment(cloudAccountId)}`);
  }

  updateCloudAccount(
    cloudAccountId: number,
    request: CloudAccountUpdateRequest
  ): Promise<TaskStateUpdate> {
    return this.client.put<TaskStateUpdate>(`/cloud-accounts/${segment(cloudAccountId)}`, request);
  }

  deleteCloudAccount(cloudAccountId: number): Promise<TaskStateUpdate> {
    return this.client.deleteTask(`/cloud-accounts/${segment(cloudAccountId)}`);
  }
}
