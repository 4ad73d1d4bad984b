/**
 * Account (console) users - distinct from database ACL users.
 */

import type { CloudClient } from "../client.js";
import { segment, type TaskStateUpdate } from "./common.js";

export interface AccountUserOptions {
  billing?: boolean;
  emailAlerts?: boolean;
  operationalEmails?: boolean;
  mfaEnabled?: boolean;
  [key: string]: unknown;
}

export interface AccountUser {
  id?: number;
  name?: string;
  email?: string;
  role?: string;
  signUp?: string;
  userType?: string;
  hasApiKey?: boolean;
  options?: AccountUserOptions;
  [key: string]: unknown;
}

export interface AccountUsers {
  account?: number;
  users?: AccountUser[];
  [key: string]: unknown;
}

export interface AccountUserUpdateRequest {
  userId?: number;
  name: string;
  role?: string;
  commandType?: string;
}

export class UsersHandler {
  constructor(private readonly client: CloudClient) {}

  getAllUsers(): Promise<AccountUsers> {
    return this.client.get<AccountUsers>("/users");
  }

  getUserById(userId: number): Promise<AccountUser> {
    return this.client.get<AccountUser>(`/users/${segment(userId)}`);
  }

  updateUser(userId: number, request: AccountUserUpdateRequest): Promise<TaskStateUpdate> {
    return this.client.put<TaskStateUpdate>(`/users/${segment(userId)}`, request);
  }

  deleteUserById(userId: number): Promise<TaskStateUpdate> {
    return this.client.deleteTask(`/users/${segment(userId)}`);
  }
}
