// app/api/sync/sessions/route.ts

import type { NextRequest } from 'next/server';

import { readJsonBody } from '~/server/security/bodyLimit';
import { requireSyncCallerOrThrow } from '~/server/sync/syncAuth';
import { syncErrorResponse, syncJson } from '~/server/sync/syncHttp';
import { getSyncRuntime } from '~/server/sync/syncRuntime';
import type { SyncSessionInfo } from '~/server/sync/syncTypes';
import { parseBodyOrThrow, SyncStartSessionBodySchema } from '~/server/sync/syncValidation';

export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

/**
 * POST /api/sync/sessions
 * Start a device-bound sync session. Body is optional: `{ limit? }`.
 */
export async function POST(req: NextRequest) {
  try {
    const { config, service } = getSyncRuntime();
    const { ownerId, clientId } = await requireSyncCallerOrThrow(req, config.http.clientIdMaxLen);

    const json = await readJsonBody(req, { maxBytes: config.http.maxBodyBytes, optional: true });
    const body = parseBodyOrThrow(SyncStartSessionBodySchema, json ?? {});

    const info: SyncSessionInfo = await service.startSession({ ownerId, clientId, limit: body.limit });
    return syncJson(info);
  } catch (err) {
    return syncErrorResponse(err, 'sync:sessions');
  }
}
