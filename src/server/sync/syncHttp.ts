// src/server/sync/syncHttp.ts

import { NextResponse } from 'next/server';

import { SyncError } from './syncErrors';

export interface SyncErrorBody {
  error: string;
  [detail: string]: string;
}

// Sync payloads are per-user and change on every write: never cache.
const NO_STORE = { 'Cache-Control': 'no-store' } as const;

export function syncJson<T>(body: T, status = 200): NextResponse {
  return NextResponse.json(body, { status, headers: { ...NO_STORE } });
}

/**
 * Shared catch-path for sync routes.
 * SyncError => `{ error: code, ...details }` with its status and headers.
 * Anything else => 500 `server_error`, logged once under the route label.
 */
export function syncErrorResponse(err: unknown, logLabel: string): NextResponse {
  if (err instanceof SyncError) {
    const body: SyncErrorBody = { ...err.details, error: err.code };
    return NextResponse.json(body, {
      status: err.status,
      headers: { ...err.headers, ...NO_STORE },
    });
  }

  // eslint-disable-next-line no-console
  console.error(`[${logLabel}] unexpected error`, err);

  const body: SyncErrorBody = { error: 'server_error' };
  return NextResponse.json(body, { status: 500, headers: { ...NO_STORE } });
}
