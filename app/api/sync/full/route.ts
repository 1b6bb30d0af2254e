// app/api/sync/full/route.ts

import type { NextRequest } from 'next/server';

import { requireSyncCallerOrThrow } from '~/server/sync/syncAuth';
import { syncErrorResponse, syncJson } from '~/server/sync/syncHttp';
import { getSyncRuntime } from '~/server/sync/syncRuntime';
import type { SyncFullResponse } from '~/server/sync/syncTypes';
import { readLimitParamOrThrow, requireSessionIdParamOrThrow } from '~/server/sync/syncValidation';

export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

/**
 * GET /api/sync/full?session_id=...&limit=...
 * First page of the full snapshot; clients continue with delta from next_since.
 */
export async function GET(req: NextRequest) {
  try {
    const { config, service } = getSyncRuntime();
    const { ownerId, clientId } = await requireSyncCallerOrThrow(req, config.http.clientIdMaxLen);

    const params = req.nextUrl.searchParams;
    const sessionId = requireSessionIdParamOrThrow(params);
    const limit = readLimitParamOrThrow(params);

    const body: SyncFullResponse = await service.getFull({ sessionId, ownerId, clientId, limit });
    return syncJson(body);
  } catch (err) {
    return syncErrorResponse(err, 'sync:full');
  }
}
