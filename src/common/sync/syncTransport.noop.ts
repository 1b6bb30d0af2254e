// src/common/sync/syncTransport.noop.ts

import type {
  SyncApplyResponse,
  SyncDeltaResponse,
  SyncFullResponse,
  SyncSessionInfo,
} from '~/server/sync/syncTypes';
import type { SyncResult, SyncTransport } from '~/common/sync/syncTransport';

export function createSyncTransportNoop(): SyncTransport {
  const disabled = <T,>(what: string): SyncResult<T> => ({
    ok: false,
    error: `sync disabled (${what})`,
    retryable: false,
  });

  return {
    mode: 'disabled',

    startSession: async () => disabled<SyncSessionInfo>('startSession'),
    getFull: async () => disabled<SyncFullResponse>('getFull'),
    getDelta: async () => disabled<SyncDeltaResponse>('getDelta'),
    apply: async () => disabled<SyncApplyResponse>('apply'),
  };
}
