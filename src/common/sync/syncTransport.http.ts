// src/common/sync/syncTransport.http.ts

import type {
  SyncApplyItem,
  SyncApplyResponse,
  SyncDeltaResponse,
  SyncFullResponse,
  SyncSessionInfo,
} from '~/server/sync/syncTypes';
import type { SyncResult, SyncTransport } from '~/common/sync/syncTransport';

export interface SyncHttpTransportOptions {
  /**
   * Optional base URL. Defaults to same-origin.
   * Native clients point this at the deployment.
   */
  baseUrl?: string;

  /**
   * Logical device id, sent as X-Sync-Client-Id. Sessions are bound to it.
   */
  clientId?: string;

  /**
   * Bearer JWT for clients without the session cookie.
   */
  token?: string;
}

function isRetryableHttpStatus(status: number): boolean {
  // conservative retry policy
  return status === 429 || (status >= 500 && status <= 599);
}

async function readJsonSafely(res: Response): Promise<unknown> {
  // Some errors (proxies, crashes) return non-JSON. Try JSON first, then text.
  const ct = res.headers.get('content-type') || '';
  if (ct.includes('application/json')) {
    try {
      const json: unknown = await res.json();
      return json;
    } catch {
      return null;
    }
  }

  try {
    const text = await res.text();
    return text ? { error: text } : null;
  } catch {
    return null;
  }
}

function errorCodeOf(body: unknown): string | null {
  if (!body || typeof body !== 'object' || !('error' in body)) return null;
  return typeof body.error === 'string' && body.error ? body.error : null;
}

export function createSyncTransportHttp(options: SyncHttpTransportOptions = {}): SyncTransport {
  const baseUrl = options.baseUrl ?? '';

  async function doFetchJson<T>(path: string, init: RequestInit): Promise<SyncResult<T>> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (options.clientId) headers['X-Sync-Client-Id'] = options.clientId;
    if (options.token) headers['Authorization'] = `Bearer ${options.token}`;

    try {
      const res = await fetch(`${baseUrl}${path}`, { ...init, headers });

      if (!res.ok) {
        const body = await readJsonSafely(res);
        return {
          ok: false,
          error: errorCodeOf(body) || `http ${res.status} ${res.statusText}`,
          status: res.status,
          retryable: isRetryableHttpStatus(res.status),
          body,
        };
      }

      const value: T = await res.json();
      return { ok: true, value };
    } catch (err) {
      // network / CORS / DNS / offline
      return {
        ok: false,
        error: err instanceof Error && err.message ? err.message : 'network error',
        retryable: true,
      };
    }
  }

  function query(params: Record<string, string | number | undefined>): string {
    const search = new URLSearchParams();
    for (const [key, value] of Object.entries(params))
      if (value !== undefined) search.set(key, String(value));
    return search.toString();
  }

  return {
    mode: 'http',

    startSession: async (limit?: number) =>
      doFetchJson<SyncSessionInfo>('/api/sync/sessions', {
        method: 'POST',
        body: JSON.stringify(limit !== undefined ? { limit } : {}),
      }),

    getFull: async (sessionId: string, limit?: number) =>
      doFetchJson<SyncFullResponse>(`/api/sync/full?${query({ session_id: sessionId, limit })}`, { method: 'GET' }),

    getDelta: async (sessionId: string, since: number, limit?: number) =>
      doFetchJson<SyncDeltaResponse>(`/api/sync/delta?${query({ session_id: sessionId, since, limit })}`, { method: 'GET' }),

    apply: async (sessionId: string, changes: SyncApplyItem[]) =>
      doFetchJson<SyncApplyResponse>('/api/sync/apply', {
        method: 'POST',
        body: JSON.stringify({ session_id: sessionId, changes }),
      }),
  };
}
