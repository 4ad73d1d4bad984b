/**
 * Access control: Redis ACL rules, roles and database users.
 */

import type { CloudClient } from "../client.js";
import { segment, type Link, type TaskStateUpdate } from "./common.js";

export interface AclRedisRule {
  id?: number;
  name?: string;
  acl?: string;
  isDefault?: boolean;
  status?: string;
  [key: string]: unknown;
}

export interface AccountAclRedisRules {
  accountId?: number;
  redisRules?: AclRedisRule[];
  links?: Link[];
  [key: string]: unknown;
}

export interface AclRoleDatabase {
  subscriptionId?: number;
  databaseId?: number;
  databaseName?: string;
  regions?: string[];
  [key: string]: unknown;
}

export interface AclRoleRedisRule {
  ruleId?: number;
  ruleName?: string;
  databases?: AclRoleDatabase[];
  [key: string]: unknown;
}

export interface AclRoleUser {
  id?: number;
  name?: string;
  [key: string]: unknown;
}

export interface AclRole {
  id?: number;
  name?: string;
  redisRules?: AclRoleRedisRule[];
  users?: AclRoleUser[];
  status?: string;
  [key: string]: unknown;
}

export interface AccountAclRoles {
  accountId?: number;
  roles?: AclRole[];
  links?: Link[];
  [key: string]: unknown;
}

export interface AclUser {
  id?: number;
  name?: string;
  role?: string;
  status?: string;
  links?: Link[];
  [key: string]: unknown;
}

export interface AccountAclUsers {
  accountId?: number;
  users?: AclUser[];
  links?: Link[];
  [key: string]: unknown;
}

export interface AclRedisRuleCreateRequest {
  name: string;
  /** ACL rule in Redis syntax, e.g. "+@read ~*". */
  redisRule: string;
  commandType?: string;
}

export interface AclRedisRuleUpdateRequest {
  redisRuleId?: number;
  name: string;
  redisRule: string;
  commandType?: string;
}

export interface AclRoleDatabaseSpec {
  subscriptionId: number;
  databaseId: number;
  regions?: string[];
}

export interface AclRoleRedisRuleSpec {
  ruleName: string;
  databases: AclRoleDatabaseSpec[];
}

export interface AclRoleCreateRequest {
  name: string;
  redisRules: AclRoleRedisRuleSpec[];
  commandType?: string;
}

export interface AclRoleUpdateRequest {
  name?: string;
  redisRules?: AclRoleRedisRuleSpec[];
  roleId?: number;
  commandType?: string;
}

export interface AclUserCreateRequest {
  name: string;
  role: string;
  password: string;
  commandType?: string;
}

export interface AclUserUpdateRequest {
  userId?: number;
  role?: string;
  password?: string;
  commandType?: string;
}

export class AclHandler {
  constructor(private readonly client: CloudClient) {}

  // Redis rules

  getAllRedisRules(): Promise<AccountAclRedisRules> {
    return this.client.get<AccountAclRedisRules>("/acl/redisRules");
  }

  createRedisRule(request: AclRedisRuleCreateRequest): Promise<TaskStateUpdate> {
    return this.client.post<TaskStateUpdate>("/acl/redisRules", request);
  }

  updateRedisRule(ruleId: number, request: AclRedisRuleUpdateRequest): Promise<TaskStateUpdate> {
    return this.client.put<TaskStateUpdate>(`/acl/redisRules/${segment(ruleId)}`, request);
  }

  deleteRedisRule(ruleId: number): Promise<TaskStateUpdate> {
    return this.client.deleteTask(`/acl/redisRules/${segment(ruleId)}`);
  }

  // Roles

  getRoles(): Promise<AccountAclRoles> {
    return this.client.get<AccountAclRoles>("/acl/roles");
  }

  createRole(request: AclRoleCreateRequest): Promise<TaskStateUpdate> {
    return this.client.post<TaskStateUpdate>("/acl/roles", request);
  }

  updateRole(roleId: number, request: AclRoleUpdateRequest): Promise<TaskStateUpdate> {
    return this.client.put<TaskStateUpdate>(`/acl/roles/${segment(roleId)}`, request);
  }

  deleteAclRole(roleId: number): Promise<TaskStateUpdate> {
    return this.client.deleteTask(`/acl/roles/${segment(roleId)}`);
  }

  // Users

  getAllAclUsers(): Promise<AccountAclUsers> {
    return this.client.get<AccountAclUsers>("/acl/users");
  }

  createUser(request: AclUserCreateRequest): Promise<TaskStateUpdate> {
    return this.client.post<TaskStateUpdate>("/acl/users", request);
  }

  getUserById(userId: number): Promise<AclUser> {
    return this.client.get<AclUser>(`/acl/users/${segment(userId)}`);
  }

  updateAclUser(userId: number, request: AclUserUpdateRequest): Promise<TaskStateUpdate> {
    return this.client.put<TaskStateUpdate>(`/acl/users/${segment(userId)}`, request);
  }

  deleteUser(userId: number): Promise<TaskStateUpdate> {
    return this.client.deleteTask(`/acl/users/${segment(userId)}`);
  }
}
