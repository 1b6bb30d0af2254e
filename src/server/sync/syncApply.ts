// src/server/sync/syncApply.ts

import type { SyncMutableSource } from './syncEnvelope';
import {
  SYNC_ENTITY_TYPES,
  type SyncApplyErrorCode,
  type SyncApplyItem,
  type SyncApplyItemResult,
  type SyncEntityEnvelope,
  type SyncEntityType,
  type SyncOwnerId,
  type SyncPayload,
} from './syncTypes';

export type SyncMutableSources = Partial<Record<SyncEntityType, SyncMutableSource>>;

type FieldType = 'boolean';

/**
 * Client-mutable fields per kind. Anything else belongs to the server-side pipelines.
 */
export const SYNC_MUTABLE_FIELDS: Partial<Record<SyncEntityType, Readonly<Record<string, FieldType>>>> = {
  summary: { is_read: 'boolean' },
};

export function isSyncEntityType(value: string): value is SyncEntityType {
  return SYNC_ENTITY_TYPES.some(t => t === value);
}

const DIGITS_RE = /^\d+$/;

/**
 * Mutable kinds use positive integer ids; numeric strings are accepted.
 */
export function parseEntityId(id: number | string): number | null {
  const n = typeof id === 'number' ? id : DIGITS_RE.test(id) ? Number(id) : NaN;
  return Number.isSafeInteger(n) && n > 0 ? n : null;
}

function hasOnlyWhitelistedFields(payload: SyncPayload, whitelist: Readonly<Record<string, FieldType>>): boolean {
  for (const [key, value] of Object.entries(payload)) {
    if (!Object.prototype.hasOwnProperty.call(whitelist, key)) return false;
    if (typeof value !== whitelist[key]) return false;
  }
  return true;
}

/**
 * Applies client changes one by one with optimistic concurrency.
 * Items never affect each other: a conflict or invalid item leaves the rest untouched.
 */
export class SyncApplyResolver {
  constructor(private readonly mutable: SyncMutableSources) {}

  async applyBatch(ownerId: SyncOwnerId, items: readonly SyncApplyItem[]): Promise<SyncApplyItemResult[]> {
    const results: SyncApplyItemResult[] = [];
    // sequential: two items for the same id must see each other's writes
    for (const item of items)
      results.push(await this.applyItem(ownerId, item));
    return results;
  }

  async applyItem(ownerId: SyncOwnerId, item: SyncApplyItem): Promise<SyncApplyItemResult> {
    const entityType = item.entity_type;
    const source = isSyncEntityType(entityType) ? this.mutable[entityType] : undefined;
    const whitelist = isSyncEntityType(entityType) ? SYNC_MUTABLE_FIELDS[entityType] : undefined;
    if (!source || !whitelist) return invalid(item, 'UNSUPPORTED_ENTITY');

    const id = parseEntityId(item.id);
    if (id === null) return invalid(item, 'INVALID_ID');

    const current = await source.getEnvelope(ownerId, id);
    if (!current) return invalid(item, 'NOT_FOUND');

    if (item.last_seen_version < current.server_version) return conflict(item, current);

    const payload = item.payload ?? {};
    if (item.action === 'update') {
      if (!hasOnlyWhitelistedFields(payload, whitelist))
        return invalid(item, 'INVALID_FIELDS', current.server_version);
      if (!Object.keys(payload).length)
        return invalid(item, 'EMPTY_PAYLOAD', current.server_version);
    }

    const written = await source.applyChange(ownerId, id, current.server_version, {
      action: item.action,
      fields: item.action === 'update' ? payload : {},
    });

    if (written.ok) {
      return {
        entity_type: item.entity_type,
        id: item.id,
        status: 'applied',
        server_version: written.envelope.server_version,
      };
    }

    // lost the race between read and write
    if (written.kind === 'notfound') return invalid(item, 'NOT_FOUND');
    return conflict(item, written.current);
  }
}

function invalid(item: SyncApplyItem, errorCode: SyncApplyErrorCode, serverVersion?: number): SyncApplyItemResult {
  const result: SyncApplyItemResult = {
    entity_type: item.entity_type,
    id: item.id,
    status: 'invalid',
    error_code: errorCode,
  };
  if (serverVersion !== undefined) result.server_version = serverVersion;
  return result;
}

function conflict(item: SyncApplyItem, current: SyncEntityEnvelope): SyncApplyItemResult {
  return {
    entity_type: item.entity_type,
    id: item.id,
    status: 'conflict',
    server_version: current.server_version,
    server_snapshot: current,
    error_code: 'CONFLICT_VERSION',
  };
}
