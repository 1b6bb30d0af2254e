// src/server/sync/syncAuth.ts

import type { NextRequest } from 'next/server';
import { getToken } from 'next-auth/jwt';

import { SyncError } from './syncErrors';
import type { SyncClientId, SyncOwnerId } from './syncTypes';
import { requireValidClientIdOrThrow } from './syncValidation';

export const SYNC_CLIENT_ID_HEADER = 'x-sync-client-id';

export interface SyncCaller {
  ownerId: SyncOwnerId;
  clientId: SyncClientId;
}

/**
 * Owner = JWT `sub` (session cookie or Bearer token, both read by getToken).
 * Client = optional device header; sessions are bound to both.
 */
export async function requireSyncCallerOrThrow(req: NextRequest, clientIdMaxLen: number): Promise<SyncCaller> {
  const secret = process.env.NEXTAUTH_SECRET;

  // 503: server misconfigured (cannot validate tokens)
  if (!secret) throw new SyncError(503, 'server_misconfigured');

  const token = await getToken({ req, secret });
  const ownerId = typeof token?.sub === 'string' && token.sub ? token.sub : null;
  if (!ownerId) throw new SyncError(401, 'unauthorized');

  const clientId = requireValidClientIdOrThrow(req.headers.get(SYNC_CLIENT_ID_HEADER), clientIdMaxLen);
  return { ownerId, clientId };
}
