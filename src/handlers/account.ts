/**
 * Account-level information: the current account, payment methods, regions,
 * supported modules and audit logs.
 */

import type { CloudClient } from "../client.js";
import type { Link } from "./common.js";
import { OffsetPaginationStrategy, paginate } from "../strategies/pagination.js";

export interface AccountApiKeyOwner {
  name?: string;
  email?: string;
  [key: string]: unknown;
}

export interface AccountApiKeyInfo {
  name?: string;
  accountId?: number;
  accountName?: string;
  allowedSourceIps?: string[];
  owner?: AccountApiKeyOwner;
  userAccountId?: number;
  httpSourceIp?: string;
  accountMarketplaceId?: string;
  [key: string]: unknown;
}

export interface Account {
  id?: number;
  name?: string;
  createdTimestamp?: string;
  updatedTimestamp?: string;
  marketplaceStatus?: string;
  key?: AccountApiKeyInfo;
  [key: string]: unknown;
}

export interface RootAccount {
  account?: Account;
  links?: Link[];
  [key: string]: unknown;
}

export interface DataPersistenceEntry {
  name?: string;
  description?: string;
  [key: string]: unknown;
}

export interface DataPersistenceOptions {
  dataPersistence?: DataPersistenceEntry[];
  links?: Link[];
  [key: string]: unknown;
}

export interface ModuleParameter {
  name?: string;
  description?: string;
  defaultValue?: number;
  required?: boolean;
  [key: string]: unknown;
}

export interface Module {
  name?: string;
  capabilityName?: string;
  description?: string;
  parameters?: ModuleParameter[];
  [key: string]: unknown;
}

export interface ModulesData {
  modules?: Module[];
  links?: Link[];
  [key: string]: unknown;
}

export interface AccountSystemLogEntry {
  id?: number;
  time?: string;
  originator?: string;
  apiKeyName?: string;
  resource?: string;
  resourceId?: number;
  type?: string;
  description?: string;
  [key: string]: unknown;
}

export interface AccountSystemLogEntries {
  entries?: AccountSystemLogEntry[];
  links?: Link[];
  [key: string]: unknown;
}

export interface AccountSessionLogEntry {
  id?: string;
  time?: string;
  user?: string;
  userAgent?: string;
  ipAddress?: string;
  userRole?: string;
  type?: string;
  action?: string;
  [key: string]: unknown;
}

export interface AccountSessionLogEntries {
  entries?: AccountSessionLogEntry[];
  links?: Link[];
  [key: string]: unknown;
}

export interface PaymentMethod {
  id?: number;
  type?: string;
  creditCardEndsWith?: number;
  nameOnCard?: string;
  expirationMonth?: number;
  expirationYear?: number;
  links?: Link[];
  [key: string]: unknown;
}

export interface PaymentMethods {
  accountId?: number;
  paymentMethods?: PaymentMethod[];
  links?: Link[];
  [key: string]: unknown;
}

export interface SearchScalingFactorsData {
  queryPerformanceFactors?: string[];
  links?: Link[];
  [key: string]: unknown;
}

export interface Region {
  id?: number;
  name?: string;
  provider?: string;
  [key: string]: unknown;
}

export interface Regions {
  regions?: Region[];
  links?: Link[];
  [key: string]: unknown;
}

export class AccountHandler {
  constructor(private readonly client: CloudClient) {}

  /** GET / */
  getCurrentAccount(): Promise<RootAccount> {
    return this.client.get<RootAccount>("/");
  }

  getDataPersistenceOptions(): Promise<DataPersistenceOptions> {
    return this.client.get<DataPersistenceOptions>("/data-persistence");
  }

  getSupportedDatabaseModules(): Promise<ModulesData> {
    return this.client.get<ModulesData>("/database-modules");
  }

  getAccountSystemLogs(offset?: number, limit?: number): Promise<AccountSystemLogEntries> {
    return this.client.get<AccountSystemLogEntries>("/logs", { offset, limit });
  }

  getAccountPaymentMethods(): Promise<PaymentMethods> {
    return this.client.get<PaymentMethods>("/payment-methods");
  }

  getSupportedSearchScalingFactors(): Promise<SearchScalingFactorsData> {
    return this.client.get<SearchScalingFactorsData>("/query-performance-factors");
  }

  /** Regions, optionally narrowed to one cloud provider ("AWS", "GCP"). */
  getSupportedRegions(provider?: string): Promise<Regions> {
    return this.client.get<Regions>("/regions", { provider });
  }

  getAccountSessionLogs(offset?: number, limit?: number): Promise<AccountSessionLogEntries> {
    return this.client.get<AccountSessionLogEntries>("/session-logs", { offset, limit });
  }

  /**
   * Walks the system log page by page.
   */
  streamSystemLogs(pageSize?: number): AsyncGenerator<AccountSystemLogEntry, void, undefined> {
    return paginate(
      async (query) => {
        const page = await this.client.get<AccountSystemLogEntries>("/logs", query);
        return page.entries ?? [];
      },
      new OffsetPaginationStrategy(pageSize)
    );
  }
}
