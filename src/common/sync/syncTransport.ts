// src/common/sync/syncTransport.ts

import type {
  SyncApplyItem,
  SyncApplyResponse,
  SyncDeltaResponse,
  SyncFullResponse,
  SyncSessionInfo,
} from '~/server/sync/syncTypes';

/**
 * Transport result wrapper.
 *
 * `error` is the server's public code when there is one (e.g. 'session_expired'),
 * otherwise a human-readable message for logs.
 */
export type SyncResult<T> =
  | { ok: true; value: T }
  | {
    ok: false;
    error: string;
    status?: number;
    retryable?: boolean;

    /**
     * Parsed response body (if any).
     */
    body?: unknown;
  };

/**
 * Transport abstraction over the four sync endpoints.
 * mode='disabled' means: never touch the network; pending changes stay queued.
 */
export interface SyncTransport {
  mode: 'disabled' | 'http';

  startSession(limit?: number): Promise<SyncResult<SyncSessionInfo>>;
  getFull(sessionId: string, limit?: number): Promise<SyncResult<SyncFullResponse>>;
  getDelta(sessionId: string, since: number, limit?: number): Promise<SyncResult<SyncDeltaResponse>>;
  apply(sessionId: string, changes: SyncApplyItem[]): Promise<SyncResult<SyncApplyResponse>>;
}
