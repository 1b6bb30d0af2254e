// src/common/sync/syncAgent.ts

import type { StoreApi } from 'zustand/vanilla';

import type {
  SyncApplyItem,
  SyncApplyItemResult,
  SyncEntityEnvelope,
  SyncEntityKey,
  SyncPayload,
} from '~/server/sync/syncTypes';
import type { SyncResult, SyncTransport } from '~/common/sync/syncTransport';
import {
  createSyncReplicaStore,
  syncRecordKey,
  type SyncPendingChange,
  type SyncReplicaStore,
} from '~/common/sync/store-sync-replica';

export interface SyncAgentOptions {
  transport: SyncTransport;
  store?: StoreApi<SyncReplicaStore>;
  debug?: boolean;

  /**
   * Most changes sent per apply call; keep it at or below the server's
   * SYNC_MAX_APPLY_ITEMS. Default 500.
   */
  applyBatchSize?: number;
}

export type SyncRunResult =
  | { ok: true; pulled: number; pushed: number }
  | { ok: false; error: string };

export interface SyncAgent {
  readonly store: StoreApi<SyncReplicaStore>;

  syncOnce(): Promise<SyncRunResult>;

  queueUpdate(entityType: string, id: SyncEntityKey, fields: SyncPayload): void;
  queueDelete(entityType: string, id: SyncEntityKey): void;

  start(intervalMs: number): void;
  stop(): void;
}

// Codes after which a fresh session fixes the problem.
const RESTARTABLE_SESSION_ERRORS = new Set(['session_not_found', 'session_expired']);

class SyncRunError extends Error {}

/**
 * Poll-based replica agent:
 * pull (full once, then delta pages from the watermark), then push pending changes.
 */
export function createSyncAgent(options: SyncAgentOptions): SyncAgent {
  const { transport, debug = false } = options;
  const applyBatchSize = Math.max(1, Math.floor(options.applyBatchSize ?? 500));
  const store = options.store ?? createSyncReplicaStore();

  let inFlight: Promise<SyncRunResult> | null = null;
  let timer: ReturnType<typeof setInterval> | null = null;

  function log(...args: unknown[]) {
    // eslint-disable-next-line no-console
    if (debug) console.log('[sync:agent]', ...args);
  }

  function unwrap<T>(res: SyncResult<T>): T {
    if (res.ok) return res.value;
    throw new SyncRunError(res.error);
  }

  // ---- session ----

  async function ensureSession(): Promise<string> {
    const existing = store.getState().sessionId;
    if (existing) return existing;

    const info = unwrap(await transport.startSession());
    store.getState().setSessionId(info.session_id);
    log(`session started ${info.session_id} (limit ${info.default_limit})`);
    return info.session_id;
  }

  /**
   * Run a session-scoped call; on not_found/expired drop the session and retry once per run.
   */
  function createSessionRunner() {
    let restarted = false;

    return async function withSession<T>(call: (sessionId: string) => Promise<SyncResult<T>>): Promise<T> {
      const res = await call(await ensureSession());
      if (res.ok) return res.value;

      if (!restarted && RESTARTABLE_SESSION_ERRORS.has(res.error)) {
        restarted = true;
        log(`session lost (${res.error}); restarting`);
        store.getState().setSessionId(null);
        return unwrap(await call(await ensureSession()));
      }

      throw new SyncRunError(res.error);
    };
  }

  // ---- pull ----

  function absorb(envelopes: SyncEntityEnvelope[]) {
    const { upsertRecord } = store.getState();
    for (const envelope of envelopes) upsertRecord(envelope);
  }

  async function pull(withSession: ReturnType<typeof createSessionRunner>): Promise<number> {
    let pulled = 0;
    let more = true;

    if (store.getState().watermark === 0) {
      const full = await withSession(sessionId => transport.getFull(sessionId));
      absorb(full.items);
      store.getState().advanceWatermark(full.next_since);
      pulled += full.items.length;
      more = full.has_more;
    }

    while (more) {
      const since = store.getState().watermark;
      const delta = await withSession(sessionId => transport.getDelta(sessionId, since));
      absorb(delta.created);
      absorb(delta.updated);
      absorb(delta.deleted);
      store.getState().advanceWatermark(delta.next_since);
      pulled += delta.created.length + delta.updated.length + delta.deleted.length;

      // a cursor that does not move would loop forever
      more = delta.has_more && delta.next_since > since;
    }

    return pulled;
  }

  // ---- push ----

  function snapshotSatisfies(change: SyncPendingChange, snapshot: SyncEntityEnvelope): boolean {
    if (change.action === 'delete') return snapshot.deleted_at !== undefined;
    const payload = snapshot.payload;
    if (!payload) return false;
    return Object.entries(change.fields).every(([field, value]) => payload[field] === value);
  }

  function settle(change: SyncPendingChange, result: SyncApplyItemResult, syncTimestamp: string) {
    const key = syncRecordKey(change.entity_type, change.id);
    const state = store.getState();

    // queued again while the request was in flight: keep the newer intent
    const stillPending = state.pending[key] === change;

    if (result.status === 'applied') {
      const known = state.records[key];
      const version = result.server_version ?? change.last_seen_version;
      if (known) {
        state.upsertRecord(change.action === 'delete'
          ? { entity_type: known.entity_type, id: known.id, server_version: version, updated_at: syncTimestamp, deleted_at: syncTimestamp }
          : { ...known, server_version: version, updated_at: syncTimestamp, payload: { ...known.payload, ...change.fields } });
      }
      if (stillPending) state.clearPending(key);
      return;
    }

    if (result.status === 'invalid') {
      log(`dropping invalid change ${key}: ${result.error_code ?? 'unknown'}`);
      state.setError(`${key}: ${result.error_code ?? 'invalid'}`);
      if (stillPending) state.clearPending(key);
      return;
    }

    // conflict
    const snapshot = result.server_snapshot;
    if (!snapshot) {
      if (stillPending) state.clearPending(key);
      return;
    }

    state.upsertRecord(snapshot);
    if (!stillPending) return;

    if (snapshotSatisfies(change, snapshot)) {
      log(`conflict on ${key} already resolved by server state`);
      state.clearPending(key);
    } else {
      log(`conflict on ${key}; requeued at ${snapshot.server_version}`);
      state.queueChange({ ...change, last_seen_version: snapshot.server_version });
    }
  }

  async function push(withSession: ReturnType<typeof createSessionRunner>): Promise<number> {
    const changes = Object.values(store.getState().pending);
    let applied = 0;

    for (let start = 0; start < changes.length; start += applyBatchSize) {
      const batch = changes.slice(start, start + applyBatchSize);
      const items: SyncApplyItem[] = batch.map(c => ({
        entity_type: c.entity_type,
        id: c.id,
        action: c.action,
        last_seen_version: c.last_seen_version,
        ...(c.action === 'update' ? { payload: c.fields } : {}),
      }));

      const response = await withSession(sessionId => transport.apply(sessionId, items));

      response.results.forEach((result, i) => {
        const change = batch[i];
        if (change) settle(change, result, response.sync_timestamp);
      });

      log(`applied ${response.applied}, conflicts ${response.conflict_count}, invalid ${response.invalid}`);
      applied += response.applied;
    }

    return applied;
  }

  // ---- run ----

  async function run(): Promise<SyncRunResult> {
    if (transport.mode === 'disabled')
      return { ok: false, error: 'sync disabled' };

    const withSession = createSessionRunner();
    store.getState().setError(null);
    try {
      const pulled = await pull(withSession);
      const pushed = await push(withSession);
      return { ok: true, pulled, pushed };
    } catch (err) {
      if (!(err instanceof SyncRunError)) throw err;
      log(`run failed: ${err.message}`);
      store.getState().setError(err.message);
      return { ok: false, error: err.message };
    }
  }

  function syncOnce(): Promise<SyncRunResult> {
    if (!inFlight) {
      inFlight = run().finally(() => {
        inFlight = null;
      });
    }
    return inFlight;
  }

  function queueUpdate(entityType: string, id: SyncEntityKey, fields: SyncPayload) {
    const state = store.getState();
    const key = syncRecordKey(entityType, id);
    const existing = state.pending[key];

    // a pending delete wins over later edits
    if (existing?.action === 'delete') return;

    state.queueChange({
      entity_type: entityType,
      id,
      action: 'update',
      last_seen_version: existing?.last_seen_version ?? state.records[key]?.server_version ?? 0,
      fields: { ...existing?.fields, ...fields },
    });
  }

  function queueDelete(entityType: string, id: SyncEntityKey) {
    const state = store.getState();
    const key = syncRecordKey(entityType, id);

    state.queueChange({
      entity_type: entityType,
      id,
      action: 'delete',
      last_seen_version: state.pending[key]?.last_seen_version ?? state.records[key]?.server_version ?? 0,
      fields: {},
    });
  }

  function start(intervalMs: number) {
    if (timer) return;
    timer = setInterval(() => {
      void syncOnce().catch(err => {
        // eslint-disable-next-line no-console
        console.error('[sync:agent] unexpected failure', err);
      });
    }, intervalMs);
  }

  function stop() {
    if (timer) clearInterval(timer);
    timer = null;
  }

  return { store, syncOnce, queueUpdate, queueDelete, start, stop };
}
