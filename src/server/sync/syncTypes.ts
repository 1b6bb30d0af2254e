// src/server/sync/syncTypes.ts

export type SyncOwnerId = string;
export type SyncClientId = string | null;
export type SyncSessionId = string;

export const SYNC_ENTITY_TYPES = ['user', 'request', 'summary', 'crawl_result', 'llm_call'] as const;
export type SyncEntityType = typeof SYNC_ENTITY_TYPES[number];

export type SyncEntityKey = number | string;

export type SyncPayload = Record<string, unknown>;

/**
 * Client <-> server contract notes:
 * - server_version is drawn from one global sequence, bumped on every write (soft delete included).
 * - payload is present iff deleted_at is absent; tombstones expose only the shell.
 */
export interface SyncEntityEnvelope {
  entity_type: SyncEntityType;
  id: SyncEntityKey;
  server_version: number;
  updated_at: string; // ISO string
  deleted_at?: string; // ISO string
  payload?: SyncPayload;
}

/**
 * Persisted session record (JSON in the session store).
 */
export interface SyncSessionRecord {
  session_id: SyncSessionId;
  owner_id: SyncOwnerId;
  client_id: SyncClientId;
  page_limit: number;
  created_at: string;
  expires_at: string;
  next_since: number;
}

export interface SyncSessionInfo {
  session_id: SyncSessionId;
  expires_at: string;
  created_at: string;
  default_limit: number;
  max_limit: number;
  last_issued_since: number;
}

export interface SyncPaginationInfo {
  total: number;
  limit: number;
  offset: number;
  has_more: boolean;
}

export interface SyncFullResponse {
  session_id: SyncSessionId;
  has_more: boolean;
  next_since: number;
  items: SyncEntityEnvelope[];
  pagination: SyncPaginationInfo;
}

/**
 * No separate "updated" tracking: any record newer than the watermark lands in
 * created (live) or deleted (tombstone). Clients upsert by id either way.
 */
export interface SyncDeltaResponse {
  session_id: SyncSessionId;
  since: number;
  has_more: boolean;
  next_since: number;
  created: SyncEntityEnvelope[];
  updated: SyncEntityEnvelope[];
  deleted: SyncEntityEnvelope[];
}

export type SyncApplyAction = 'update' | 'delete';

export interface SyncApplyItem {
  entity_type: string;
  id: SyncEntityKey;
  action: SyncApplyAction;
  last_seen_version: number;
  payload?: SyncPayload | null;
}

export type SyncApplyStatus = 'applied' | 'conflict' | 'invalid';

export type SyncApplyErrorCode =
  | 'UNSUPPORTED_ENTITY'
  | 'INVALID_ID'
  | 'NOT_FOUND'
  | 'CONFLICT_VERSION'
  | 'INVALID_FIELDS'
  | 'EMPTY_PAYLOAD';

export interface SyncApplyItemResult {
  entity_type: string;
  id: SyncEntityKey;
  status: SyncApplyStatus;
  server_version?: number;
  server_snapshot?: SyncEntityEnvelope;
  error_code?: SyncApplyErrorCode;
}

export interface SyncApplyResponse {
  session_id: SyncSessionId;
  results: SyncApplyItemResult[];
  conflicts: SyncApplyItemResult[] | null;
  applied: number;
  conflict_count: number;
  invalid: number;
  sync_timestamp: string;
}
