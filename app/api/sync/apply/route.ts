// app/api/sync/apply/route.ts

import type { NextRequest } from 'next/server';

import { readJsonBody } from '~/server/security/bodyLimit';
import { requireSyncCallerOrThrow } from '~/server/sync/syncAuth';
import { syncErrorResponse, syncJson } from '~/server/sync/syncHttp';
import { getSyncRuntime } from '~/server/sync/syncRuntime';
import type { SyncApplyResponse } from '~/server/sync/syncTypes';
import { parseBodyOrThrow, SyncApplyBodySchema } from '~/server/sync/syncValidation';

export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

/**
 * POST /api/sync/apply
 * Batch of client changes; each item is applied or rejected on its own.
 * Conflicts are reported per item (200), never as a 409 for the batch.
 */
export async function POST(req: NextRequest) {
  try {
    const { config, service, applyLimiter } = getSyncRuntime();
    const { ownerId, clientId } = await requireSyncCallerOrThrow(req, config.http.clientIdMaxLen);

    // checked before the body is read
    applyLimiter.requireOrThrow(`owner:${ownerId}`);

    const json = await readJsonBody(req, { maxBytes: config.http.maxBodyBytes });
    const body = parseBodyOrThrow(SyncApplyBodySchema, json);

    const result: SyncApplyResponse = await service.applyChanges({
      sessionId: body.session_id,
      ownerId,
      clientId,
      changes: body.changes,
    });
    return syncJson(result);
  } catch (err) {
    return syncErrorResponse(err, 'sync:apply');
  }
}
