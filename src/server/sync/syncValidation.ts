// src/server/sync/syncValidation.ts

import { z } from 'zod';

import { SyncError } from './syncErrors';

// ---- persisted session record ----

const IsoTimestamp = z.string().refine(value => !Number.isNaN(Date.parse(value)), 'invalid timestamp');

export const SyncSessionRecordSchema = z.object({
  session_id: z.string().min(1),
  owner_id: z.string().min(1),
  client_id: z.string().nullable(),
  page_limit: z.number().int().positive(),
  created_at: IsoTimestamp,
  expires_at: IsoTimestamp,
  next_since: z.number().int().nonnegative(),
});

// ---- request bodies ----

const SessionIdSchema = z.string().min(1).max(128);

export const SyncStartSessionBodySchema = z.object({
  limit: z.number().int().min(1).nullish(),
});

export const SyncApplyItemSchema = z.object({
  entity_type: z.string().min(1).max(64),
  id: z.union([z.number().int(), z.string().min(1).max(128)]),
  action: z.enum(['update', 'delete']),
  last_seen_version: z.number().int().nonnegative(),
  payload: z.record(z.unknown()).nullish(),
});

export const SyncApplyBodySchema = z.object({
  session_id: SessionIdSchema,
  changes: z.array(SyncApplyItemSchema),
});

export type SyncStartSessionBody = z.infer<typeof SyncStartSessionBodySchema>;
export type SyncApplyBody = z.infer<typeof SyncApplyBodySchema>;

export function parseBodyOrThrow<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, json: unknown): T {
  const result = schema.safeParse(json);
  if (!result.success) throw new SyncError(400, 'invalid_request');
  return result.data;
}

// ---- query params ----

const NON_NEGATIVE_INT_RE = /^\d+$/;

export function requireSessionIdParamOrThrow(params: URLSearchParams): string {
  const sessionId = params.get('session_id');
  if (!sessionId) throw new SyncError(400, 'missing_session_id');
  if (!SessionIdSchema.safeParse(sessionId).success) throw new SyncError(400, 'invalid_session_id');
  return sessionId;
}

export function requireSinceParamOrThrow(params: URLSearchParams): number {
  const raw = params.get('since');
  if (raw === null || !NON_NEGATIVE_INT_RE.test(raw)) throw new SyncError(400, 'invalid_since');

  const since = Number(raw);
  if (!Number.isSafeInteger(since)) throw new SyncError(400, 'invalid_since');
  return since;
}

/**
 * Optional per-call page size override; clamping happens later against config.
 */
export function readLimitParamOrThrow(params: URLSearchParams): number | null {
  const raw = params.get('limit');
  if (raw === null || raw === '') return null;
  if (!NON_NEGATIVE_INT_RE.test(raw)) throw new SyncError(400, 'invalid_limit');

  const limit = Number(raw);
  if (!Number.isSafeInteger(limit) || limit < 1) throw new SyncError(400, 'invalid_limit');
  return limit;
}

// ---- client id ----

const SAFE_CLIENT_ID_RE = /^[A-Za-z0-9_.:-]+$/;

/**
 * Device identifiers end up in session records and logs; reject pathological ones.
 * Absent header => null (a session without a device binding).
 */
export function requireValidClientIdOrThrow(clientId: string | null, maxLen: number): string | null {
  if (clientId === null) return null;

  if (!clientId || clientId.length > maxLen) throw new SyncError(400, 'invalid_client_id');
  if (!SAFE_CLIENT_ID_RE.test(clientId)) throw new SyncError(400, 'invalid_client_id');
  return clientId;
}
