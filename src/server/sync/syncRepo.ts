// src/server/sync/syncRepo.ts

import {
  makeEnvelope,
  type SyncCasResult,
  type SyncEntityChange,
  type SyncEnvelopeSource,
  type SyncMutableSource,
  type TimestampLike,
} from './syncEnvelope';
import type { SyncEntityEnvelope, SyncEntityKey, SyncEntityType, SyncOwnerId, SyncPayload } from './syncTypes';

export type SyncRow = Record<string, unknown>;

/**
 * The part of pg's Pool used by the sources (a PoolClient fits as well).
 */
export interface SyncQueryable {
  query(text: string, values?: unknown[]): Promise<{ rows: SyncRow[] }>;
}

// ---- column coercion (pg returns bigint and numeric as strings) ----

function toInt(value: unknown): number | null {
  const n = typeof value === 'string' && value.trim() ? Number(value) : value;
  return typeof n === 'number' && Number.isFinite(n) ? Math.trunc(n) : null;
}

function toNumber(value: unknown): number | null {
  const n = typeof value === 'string' && value.trim() ? Number(value) : value;
  return typeof n === 'number' && Number.isFinite(n) ? n : null;
}

function toText(value: unknown): string | null {
  return typeof value === 'string' ? value : null;
}

function toTimestamp(value: unknown): TimestampLike {
  return value instanceof Date || typeof value === 'string' ? value : null;
}

function toIsoOrNull(value: unknown): string | null {
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? null : value.toISOString();
  return toText(value);
}

function toJson(value: unknown): unknown {
  return value === undefined ? null : value;
}

// ---- per-kind definitions ----

interface PgKindDefinition {
  entityType: SyncEntityType;
  listSql: string;
  rowId(row: SyncRow): SyncEntityKey;
  payload(row: SyncRow): SyncPayload;
  softDeletable: boolean;
}

const userKind: PgKindDefinition = {
  entityType: 'user',
  listSql: `
    SELECT owner_id, username, is_owner, preferences, created_at, updated_at, server_version
    FROM users
    WHERE owner_id = $1
  `,
  rowId: row => toText(row.owner_id) ?? '',
  payload: row => ({
    username: toText(row.username),
    is_owner: row.is_owner === true,
    preferences: toJson(row.preferences),
    created_at: toIsoOrNull(row.created_at),
  }),
  softDeletable: false,
};

const requestKind: PgKindDefinition = {
  entityType: 'request',
  listSql: `
    SELECT id, type, status, input_url, normalized_url, correlation_id,
           created_at, updated_at, deleted_at, server_version
    FROM requests
    WHERE owner_id = $1
    ORDER BY server_version
  `,
  rowId: row => toInt(row.id) ?? 0,
  payload: row => ({
    type: toText(row.type),
    status: toText(row.status),
    input_url: toText(row.input_url),
    normalized_url: toText(row.normalized_url),
    correlation_id: toText(row.correlation_id),
    created_at: toIsoOrNull(row.created_at),
  }),
  softDeletable: true,
};

const SUMMARY_COLUMNS = `s.id, s.request_id, s.lang, s.is_read, s.json_payload,
           s.created_at, s.updated_at, s.deleted_at, s.server_version`;

const summaryKind: PgKindDefinition = {
  entityType: 'summary',
  listSql: `
    SELECT ${SUMMARY_COLUMNS}
    FROM summaries s
    JOIN requests r ON r.id = s.request_id
    WHERE r.owner_id = $1
    ORDER BY s.server_version
  `,
  rowId: row => toInt(row.id) ?? 0,
  payload: row => ({
    id: toInt(row.id),
    request_id: toInt(row.request_id),
    lang: toText(row.lang),
    is_read: row.is_read === true,
    json_payload: toJson(row.json_payload),
    created_at: toIsoOrNull(row.created_at),
  }),
  softDeletable: true,
};

const crawlResultKind: PgKindDefinition = {
  entityType: 'crawl_result',
  listSql: `
    SELECT c.id, c.request_id, c.source_url, c.endpoint, c.http_status, c.metadata, c.latency_ms,
           c.updated_at, c.deleted_at, c.server_version
    FROM crawl_results c
    JOIN requests r ON r.id = c.request_id
    WHERE r.owner_id = $1
    ORDER BY c.server_version
  `,
  rowId: row => toInt(row.id) ?? 0,
  payload: row => ({
    request_id: toInt(row.request_id),
    source_url: toText(row.source_url),
    endpoint: toText(row.endpoint),
    http_status: toInt(row.http_status),
    metadata: toJson(row.metadata),
    latency_ms: toInt(row.latency_ms),
  }),
  softDeletable: true,
};

const llmCallKind: PgKindDefinition = {
  entityType: 'llm_call',
  listSql: `
    SELECT l.id, l.request_id, l.provider, l.model, l.status, l.tokens_prompt, l.tokens_completion, l.cost_usd,
           l.created_at, l.updated_at, l.deleted_at, l.server_version
    FROM llm_calls l
    JOIN requests r ON r.id = l.request_id
    WHERE r.owner_id = $1
    ORDER BY l.server_version
  `,
  rowId: row => toInt(row.id) ?? 0,
  payload: row => ({
    request_id: toInt(row.request_id),
    provider: toText(row.provider),
    model: toText(row.model),
    status: toText(row.status),
    tokens_prompt: toInt(row.tokens_prompt),
    tokens_completion: toInt(row.tokens_completion),
    cost_usd: toNumber(row.cost_usd),
    created_at: toIsoOrNull(row.created_at),
  }),
  softDeletable: true,
};

export function rowToEnvelope(kind: PgKindDefinition, row: SyncRow): SyncEntityEnvelope {
  return makeEnvelope({
    entityType: kind.entityType,
    id: kind.rowId(row),
    serverVersion: toInt(row.server_version),
    updatedAt: toTimestamp(row.updated_at),
    deletedAt: kind.softDeletable ? toTimestamp(row.deleted_at) : null,
    payload: () => kind.payload(row),
  });
}

// ---- sources ----

export class PgEnvelopeSource implements SyncEnvelopeSource {
  constructor(
    protected readonly db: SyncQueryable,
    protected readonly kind: PgKindDefinition,
  ) {}

  get entityType(): SyncEntityType {
    return this.kind.entityType;
  }

  async listEnvelopes(ownerId: SyncOwnerId): Promise<SyncEntityEnvelope[]> {
    const res = await this.db.query(this.kind.listSql, [ownerId]);
    return res.rows.map(row => rowToEnvelope(this.kind, row));
  }
}

/**
 * Summaries accept `is_read` edits and soft deletes from clients.
 * The write is a single UPDATE guarded by server_version; the version trigger bumps it.
 */
export class PgSummarySource extends PgEnvelopeSource implements SyncMutableSource {
  constructor(db: SyncQueryable) {
    super(db, summaryKind);
  }

  async getEnvelope(ownerId: SyncOwnerId, id: number): Promise<SyncEntityEnvelope | null> {
    const res = await this.db.query(
      `
        SELECT ${SUMMARY_COLUMNS}
        FROM summaries s
        JOIN requests r ON r.id = s.request_id
        WHERE r.owner_id = $1 AND s.id = $2
        LIMIT 1
      `,
      [ownerId, id],
    );

    const row = res.rows[0];
    return row ? rowToEnvelope(this.kind, row) : null;
  }

  async applyChange(ownerId: SyncOwnerId, id: number, expectedVersion: number, change: SyncEntityChange): Promise<SyncCasResult> {
    const isRead = typeof change.fields.is_read === 'boolean' ? change.fields.is_read : null;
    const markDeleted = change.action === 'delete';

    const updated = await this.db.query(
      `
        UPDATE summaries s
        SET
          is_read = COALESCE($4, s.is_read),
          deleted_at = CASE WHEN $5 THEN now() ELSE s.deleted_at END
        FROM requests r
        WHERE r.id = s.request_id AND r.owner_id = $1 AND s.id = $2 AND s.server_version = $3
        RETURNING ${SUMMARY_COLUMNS}
      `,
      [ownerId, id, expectedVersion, isRead, markDeleted],
    );

    const row = updated.rows[0];
    if (row) return { ok: true, envelope: rowToEnvelope(this.kind, row) };

    // version mismatch or missing row
    const current = await this.getEnvelope(ownerId, id);
    if (!current) return { ok: false, kind: 'notfound' };
    return { ok: false, kind: 'conflict', current };
  }
}

export interface PgSyncSources {
  sources: SyncEnvelopeSource[];
  summaries: PgSummarySource;
}

export function createPgSyncSources(db: SyncQueryable): PgSyncSources {
  const summaries = new PgSummarySource(db);
  return {
    sources: [
      new PgEnvelopeSource(db, userKind),
      new PgEnvelopeSource(db, requestKind),
      summaries,
      new PgEnvelopeSource(db, crawlResultKind),
      new PgEnvelopeSource(db, llmCallKind),
    ],
    summaries,
  };
}
