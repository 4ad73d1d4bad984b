/**
 * Shapes shared by every resource group.
 *
 * Models keep an index signature so fields the API adds later survive a
 * round trip untouched.
 */

export type TaskStatus =
  | "initialized"
  | "received"
  | "processing-in-progress"
  | "processing-completed"
  | "processing-error";

/** Reported for a delete whose response carried no body. */
export type DeletedStatus = "deleted";

export const TERMINAL_TASK_STATUSES: ReadonlySet<string> = new Set<TaskStatus>([
  "processing-completed",
  "processing-error",
]);

export type ProcessorErrorCode =
  | "UNAUTHORIZED"
  | "NOT_FOUND"
  | "BAD_REQUEST"
  | "GENERAL_ERROR";

export interface Link {
  rel?: string;
  href?: string;
  type?: string;
  method?: string;
  [key: string]: unknown;
}

export interface ProcessorResponse {
  resourceId?: number;
  additionalResourceId?: number;
  resource?: unknown;
  error?: ProcessorErrorCode | string;
  additionalInfo?: string;
  [key: string]: unknown;
}

/**
 * Acknowledgement of an asynchronous operation. Poll it through the tasks
 * handler until its status is terminal.
 */
export interface TaskStateUpdate {
  taskId?: string;
  commandType?: string;
  status?: TaskStatus | DeletedStatus;
  description?: string;
  timestamp?: string;
  progress?: number;
  response?: ProcessorResponse;
  links?: Link[];
  [key: string]: unknown;
}

export interface Tag {
  key: string;
  value: string;
  [key: string]: unknown;
}

export interface CloudTags {
  accountId?: number;
  tags?: Tag[];
  links?: Link[];
  [key: string]: unknown;
}

export interface DatabaseTagCreateRequest {
  key: string;
  value: string;
  commandType?: string;
}

export interface DatabaseTagUpdateRequest {
  value: string;
  commandType?: string;
}

export interface DatabaseTagsUpdateRequest {
  tags: Tag[];
  commandType?: string;
}

export interface DatabaseSlowLogEntry {
  id?: number;
  startTime?: string;
  duration?: number;
  arguments?: string;
  [key: string]: unknown;
}

export interface DatabaseSlowLogEntries {
  entries?: DatabaseSlowLogEntry[];
  links?: Link[];
  [key: string]: unknown;
}

export interface RedisVersion {
  version?: string;
  eolDate?: string;
  isPreview?: boolean;
  isDefault?: boolean;
  [key: string]: unknown;
}

export interface RedisVersions {
  redisVersions?: RedisVersion[];
  [key: string]: unknown;
}

export interface DatabaseImportRequest {
  sourceType: string;
  importFromUri: string[];
  commandType?: string;
  [key: string]: unknown;
}

export interface DatabaseBackupRequest {
  regionName?: string;
  adhocBackupPath?: string;
  commandType?: string;
}

export interface DatabaseUpgradeRedisVersionRequest {
  targetRedisVersion: string;
  commandType?: string;
}

export interface DatabaseCertificate {
  publicCertificatePEMString?: string;
  [key: string]: unknown;
}

export interface DatabaseModule {
  name: string;
  parameters?: Record<string, unknown>;
  [key: string]: unknown;
}

export interface ThroughputMeasurement {
  by: "operations-per-second" | "number-of-shards";
  value: number;
}

export interface DatabaseAlert {
  name: string;
  value: number;
  [key: string]: unknown;
}

export interface DatabaseBackupConfig {
  active?: boolean;
  interval?: string;
  timeUTC?: string;
  storageType?: string;
  storagePath?: string;
  [key: string]: unknown;
}

/** Path segment for an id, string or numeric. */
export function segment(value: string | number): string {
  return encodeURIComponent(String(value));
}

/**
 * The `subscription` member of a database listing. The API returns either
 * a single entry or an array of them.
 */
export interface SubscriptionDatabasesEntry<TDatabase> {
  subscriptionId?: number;
  numberOfDatabases?: number;
  databases?: TDatabase[];
  links?: Link[];
  [key: string]: unknown;
}

export type SubscriptionDatabasesMember<TDatabase> =
  | SubscriptionDatabasesEntry<TDatabase>
  | Array<SubscriptionDatabasesEntry<TDatabase>>;

export function databasesOf<TDatabase>(
  member: SubscriptionDatabasesMember<TDatabase> | undefined
): TDatabase[] {
  if (member === undefined) {
    return [];
  }
  const entries = Array.isArray(member) ? member : [member];
  return entries.flatMap((entry) => entry.databases ?? []);
}
