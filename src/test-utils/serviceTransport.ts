// src/test-utils/serviceTransport.ts

import { SyncError } from '~/server/sync/syncErrors';
import type { SyncService } from '~/server/sync/syncService';
import type { SyncClientId, SyncOwnerId } from '~/server/sync/syncTypes';
import type { SyncResult, SyncTransport } from '~/common/sync/syncTransport';

export interface ServiceTransportCalls {
  startSession: number;
  getFull: number;
  getDelta: number[];
  apply: number;
}

/**
 * SyncTransport that calls a SyncService in process, mapping SyncError to the
 * error codes the HTTP transport would surface.
 */
export function createServiceTransport(service: SyncService, ownerId: SyncOwnerId, clientId: SyncClientId = null) {
  const calls: ServiceTransportCalls = { startSession: 0, getFull: 0, getDelta: [], apply: 0 };

  async function wrap<T>(call: () => Promise<T>): Promise<SyncResult<T>> {
    try {
      return { ok: true, value: await call() };
    } catch (err) {
      if (err instanceof SyncError) return { ok: false, error: err.code, status: err.status };
      throw err;
    }
  }

  const transport: SyncTransport = {
    mode: 'http',

    startSession: limit => {
      calls.startSession += 1;
      return wrap(() => service.startSession({ ownerId, clientId, limit }));
    },

    getFull: (sessionId, limit) => {
      calls.getFull += 1;
      return wrap(() => service.getFull({ sessionId, ownerId, clientId, limit }));
    },

    getDelta: (sessionId, since, limit) => {
      calls.getDelta.push(since);
      return wrap(() => service.getDelta({ sessionId, ownerId, clientId, since, limit }));
    },

    apply: (sessionId, changes) => {
      calls.apply += 1;
      return wrap(() => service.applyChanges({ sessionId, ownerId, clientId, changes }));
    },
  };

  return { transport, calls };
}
