// src/server/sync/syncEnvelope.ts

import type {
  SyncApplyAction,
  SyncEntityEnvelope,
  SyncEntityKey,
  SyncEntityType,
  SyncOwnerId,
  SyncPayload,
} from './syncTypes';

export type TimestampLike = Date | string | null | undefined;

/**
 * Anything that can enumerate one entity kind for an owner as envelopes.
 * The collector is generic over these and never branches on the concrete kind.
 */
export interface SyncEnvelopeSource {
  readonly entityType: SyncEntityType;
  listEnvelopes(ownerId: SyncOwnerId): Promise<SyncEntityEnvelope[]>;
}

/**
 * A client change that already passed the field whitelist.
 * `fields` is empty for deletes.
 */
export interface SyncEntityChange {
  action: SyncApplyAction;
  fields: SyncPayload;
}

export type SyncCasResult =
  | { ok: true; envelope: SyncEntityEnvelope }
  | { ok: false; kind: 'conflict'; current: SyncEntityEnvelope }
  | { ok: false; kind: 'notfound' };

/**
 * A source the client may write through. The write must be an atomic
 * compare-and-swap on server_version within the collaborator.
 */
export interface SyncMutableSource extends SyncEnvelopeSource {
  getEnvelope(ownerId: SyncOwnerId, id: number): Promise<SyncEntityEnvelope | null>;
  applyChange(ownerId: SyncOwnerId, id: number, expectedVersion: number, change: SyncEntityChange): Promise<SyncCasResult>;
}

/**
 * Normalize a timestamp to ISO-8601 UTC. Missing or unparsable values become "now",
 * so updated_at is always present on the wire.
 */
export function coerceIso(value: TimestampLike, now: () => Date = () => new Date()): string {
  if (value instanceof Date)
    return Number.isNaN(value.getTime()) ? now().toISOString() : value.toISOString();

  if (typeof value === 'string' && value) {
    const parsed = new Date(value);
    if (!Number.isNaN(parsed.getTime())) return parsed.toISOString();
  }

  return now().toISOString();
}

export interface EnvelopeFields {
  entityType: SyncEntityType;
  id: SyncEntityKey;
  serverVersion: number | string | null | undefined;
  updatedAt: TimestampLike;
  deletedAt?: TimestampLike;
  payload: () => SyncPayload;
}

/**
 * Build an envelope; tombstones drop their payload (the builder is not even called).
 */
export function makeEnvelope(fields: EnvelopeFields): SyncEntityEnvelope {
  const version = Number(fields.serverVersion ?? 0);
  const envelope: SyncEntityEnvelope = {
    entity_type: fields.entityType,
    id: fields.id,
    server_version: Number.isFinite(version) && version > 0 ? Math.floor(version) : 0,
    updated_at: coerceIso(fields.updatedAt),
  };

  if (fields.deletedAt) {
    envelope.deleted_at = coerceIso(fields.deletedAt);
  } else {
    envelope.payload = fields.payload();
  }

  return envelope;
}

export function isTombstone(envelope: SyncEntityEnvelope): boolean {
  return envelope.deleted_at !== undefined;
}

export function envelopeKey(envelope: Pick<SyncEntityEnvelope, 'entity_type' | 'id'>): string {
  return `${envelope.entity_type}:${String(envelope.id)}`;
}
