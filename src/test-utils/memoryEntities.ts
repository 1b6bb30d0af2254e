// src/test-utils/memoryEntities.ts

import {
  makeEnvelope,
  type SyncCasResult,
  type SyncEntityChange,
  type SyncEnvelopeSource,
  type SyncMutableSource,
} from '~/server/sync/syncEnvelope';
import {
  SYNC_ENTITY_TYPES,
  type SyncEntityEnvelope,
  type SyncEntityKey,
  type SyncEntityType,
  type SyncOwnerId,
  type SyncPayload,
} from '~/server/sync/syncTypes';

interface MemoryRecord {
  entityType: SyncEntityType;
  id: SyncEntityKey;
  ownerId: SyncOwnerId;
  version: number;
  updatedAt: string;
  deletedAt: string | null;
  payload: SyncPayload;
}

export interface InsertOptions {
  /** Force this version (the counter jumps forward to it). */
  version?: number;
  deleted?: boolean;
}

/**
 * In-process stand-in for the collaborator tables.
 * One global counter, bumped on every write, like the Postgres sequence trigger.
 */
export class MemoryEntityStore {
  private counter = 0;
  private readonly records = new Map<string, MemoryRecord>();
  private readonly failing = new Set<SyncEntityType>();

  constructor(private readonly now: () => Date = () => new Date('2026-01-01T00:00:00.000Z')) {}

  get lastVersion(): number {
    return this.counter;
  }

  insert(ownerId: SyncOwnerId, entityType: SyncEntityType, id: SyncEntityKey, payload: SyncPayload, opts: InsertOptions = {}): SyncEntityEnvelope {
    const version = opts.version ?? this.counter + 1;
    this.counter = Math.max(this.counter, version);

    const stamp = this.now().toISOString();
    const record: MemoryRecord = {
      entityType,
      id,
      ownerId,
      version,
      updatedAt: stamp,
      deletedAt: opts.deleted ? stamp : null,
      payload: { ...payload },
    };
    this.records.set(key(entityType, id), record);
    return toEnvelope(record);
  }

  /** Server-side edit (a pipeline, not a client). */
  update(entityType: SyncEntityType, id: SyncEntityKey, fields: SyncPayload): SyncEntityEnvelope {
    const record = this.require(entityType, id);
    record.payload = { ...record.payload, ...fields };
    this.touch(record);
    return toEnvelope(record);
  }

  softDelete(entityType: SyncEntityType, id: SyncEntityKey): SyncEntityEnvelope {
    const record = this.require(entityType, id);
    record.deletedAt = this.now().toISOString();
    this.touch(record);
    return toEnvelope(record);
  }

  /** Make listEnvelopes for this kind reject, to simulate an unavailable collaborator. */
  failKind(entityType: SyncEntityType): void {
    this.failing.add(entityType);
  }

  source(entityType: SyncEntityType): SyncEnvelopeSource {
    return {
      entityType,
      listEnvelopes: async ownerId => this.list(entityType, ownerId),
    };
  }

  mutableSource(entityType: SyncEntityType): SyncMutableSource {
    return {
      entityType,
      listEnvelopes: async ownerId => this.list(entityType, ownerId),
      getEnvelope: async (ownerId, id) => this.find(entityType, ownerId, id),
      applyChange: async (ownerId, id, expectedVersion, change) => this.compareAndSwap(entityType, ownerId, id, expectedVersion, change),
    };
  }

  sources(): SyncEnvelopeSource[] {
    return SYNC_ENTITY_TYPES.map(t => this.source(t));
  }

  snapshot(ownerId: SyncOwnerId): SyncEntityEnvelope[] {
    return [...this.records.values()].filter(r => r.ownerId === ownerId).map(toEnvelope);
  }

  private list(entityType: SyncEntityType, ownerId: SyncOwnerId): SyncEntityEnvelope[] {
    if (this.failing.has(entityType)) throw new Error(`${entityType} store unavailable`);
    return [...this.records.values()]
      .filter(r => r.entityType === entityType && r.ownerId === ownerId)
      .map(toEnvelope);
  }

  private find(entityType: SyncEntityType, ownerId: SyncOwnerId, id: number): SyncEntityEnvelope | null {
    const record = this.records.get(key(entityType, id));
    return record && record.ownerId === ownerId ? toEnvelope(record) : null;
  }

  private compareAndSwap(entityType: SyncEntityType, ownerId: SyncOwnerId, id: number, expectedVersion: number, change: SyncEntityChange): SyncCasResult {
    const record = this.records.get(key(entityType, id));
    if (!record || record.ownerId !== ownerId) return { ok: false, kind: 'notfound' };
    if (record.version !== expectedVersion) return { ok: false, kind: 'conflict', current: toEnvelope(record) };

    if (change.action === 'delete') {
      record.deletedAt = this.now().toISOString();
    } else {
      record.payload = { ...record.payload, ...change.fields };
    }
    this.touch(record);
    return { ok: true, envelope: toEnvelope(record) };
  }

  private require(entityType: SyncEntityType, id: SyncEntityKey): MemoryRecord {
    const record = this.records.get(key(entityType, id));
    if (!record) throw new Error(`no ${entityType} ${String(id)}`);
    return record;
  }

  private touch(record: MemoryRecord): void {
    this.counter += 1;
    record.version = this.counter;
    record.updatedAt = this.now().toISOString();
  }
}

function key(entityType: SyncEntityType, id: SyncEntityKey): string {
  return `${entityType}:${String(id)}`;
}

function toEnvelope(record: MemoryRecord): SyncEntityEnvelope {
  return makeEnvelope({
    entityType: record.entityType,
    id: record.id,
    serverVersion: record.version,
    updatedAt: record.updatedAt,
    deletedAt: record.deletedAt,
    payload: () => ({ ...record.payload }),
  });
}
