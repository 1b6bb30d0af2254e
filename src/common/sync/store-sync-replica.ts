import { createStore, type StoreApi } from 'zustand/vanilla';

import type {
  SyncApplyAction,
  SyncEntityEnvelope,
  SyncEntityKey,
  SyncPayload,
} from '~/server/sync/syncTypes';

export type SyncRecordKey = string; // `${entity_type}:${id}`

export function syncRecordKey(entityType: string, id: SyncEntityKey): SyncRecordKey {
  return `${entityType}:${String(id)}`;
}

/**
 * A local change waiting for apply. `fields` is empty for deletes.
 */
export interface SyncPendingChange {
  entity_type: string;
  id: SyncEntityKey;
  action: SyncApplyAction;
  last_seen_version: number;
  fields: SyncPayload;
}

interface SyncReplicaState {
  /**
   * Last server state seen per record; tombstones keep their version but no payload.
   */
  records: Record<SyncRecordKey, SyncEntityEnvelope>;

  /**
   * Highest server_version consumed through full/delta. 0 = never bootstrapped.
   */
  watermark: number;

  sessionId: string | null;
  pending: Record<SyncRecordKey, SyncPendingChange>;
  lastError: string | null;
}

interface SyncReplicaActions {
  upsertRecord: (envelope: SyncEntityEnvelope) => void;
  advanceWatermark: (since: number) => void;
  setSessionId: (sessionId: string | null) => void;

  queueChange: (change: SyncPendingChange) => void;
  clearPending: (key: SyncRecordKey) => void;

  setError: (error: string | null) => void;
}

export type SyncReplicaStore = SyncReplicaState & SyncReplicaActions;

export function createSyncReplicaStore(): StoreApi<SyncReplicaStore> {
  return createStore<SyncReplicaStore>()(set => ({
    records: {},
    watermark: 0,
    sessionId: null,
    pending: {},
    lastError: null,

    upsertRecord: (envelope) =>
      set(state => {
        const key = syncRecordKey(envelope.entity_type, envelope.id);
        const known = state.records[key];
        // never go back in time
        if (known && known.server_version > envelope.server_version) return {};
        return { records: { ...state.records, [key]: envelope } };
      }),

    advanceWatermark: (since) =>
      set(state => (since > state.watermark ? { watermark: since } : {})),

    setSessionId: (sessionId) =>
      set({ sessionId }),

    queueChange: (change) =>
      set(state => ({
        pending: {
          ...state.pending,
          [syncRecordKey(change.entity_type, change.id)]: change,
        },
      })),

    clearPending: (key) =>
      set(state => {
        const { [key]: _removed, ...rest } = state.pending;
        return { pending: rest };
      }),

    setError: (error) =>
      set({ lastError: error }),
  }));
}
