// app/api/sync/delta/route.ts

import type { NextRequest } from 'next/server';

import { requireSyncCallerOrThrow } from '~/server/sync/syncAuth';
import { syncErrorResponse, syncJson } from '~/server/sync/syncHttp';
import { getSyncRuntime } from '~/server/sync/syncRuntime';
import type { SyncDeltaResponse } from '~/server/sync/syncTypes';
import {
  readLimitParamOrThrow,
  requireSessionIdParamOrThrow,
  requireSinceParamOrThrow,
} from '~/server/sync/syncValidation';

export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

/**
 * GET /api/sync/delta?session_id=...&since=...&limit=...
 * Records strictly newer than `since`, split into live and tombstoned.
 */
export async function GET(req: NextRequest) {
  try {
    const { config, service } = getSyncRuntime();
    const { ownerId, clientId } = await requireSyncCallerOrThrow(req, config.http.clientIdMaxLen);

    const params = req.nextUrl.searchParams;
    const sessionId = requireSessionIdParamOrThrow(params);
    const since = requireSinceParamOrThrow(params);
    const limit = readLimitParamOrThrow(params);

    const body: SyncDeltaResponse = await service.getDelta({ sessionId, ownerId, clientId, since, limit });
    return syncJson(body);
  } catch (err) {
    return syncErrorResponse(err, 'sync:delta');
  }
}
