// src/server/sync/syncSessions.ts

import { v4 as uuidv4 } from 'uuid';

import { resolveLimit, sessionTtlSeconds, type SyncConfig } from './syncConfig';
import { SyncSessionExpiredError, SyncSessionForbiddenError, SyncSessionNotFoundError } from './syncErrors';
import type { SessionKeyValueStore } from './syncSessionStore';
import type { SyncClientId, SyncOwnerId, SyncSessionId, SyncSessionInfo, SyncSessionRecord } from './syncTypes';
import { SyncSessionRecordSchema } from './syncValidation';

export interface SyncSessionManagerOptions {
  keyPrefix: string;
  now?: () => Date;
  newSessionId?: () => SyncSessionId;
}

export interface StartSessionInput {
  ownerId: SyncOwnerId;
  clientId: SyncClientId;
  limit?: number | null;
}

export function generateSessionId(): SyncSessionId {
  return `sync-${uuidv4().replace(/-/g, '')}`;
}

/**
 * Owns session lifecycle. Sessions are keyed by token (never by owner), so
 * concurrent sessions for one owner do not contend. Records are read-only after
 * creation and rely on store TTL (or the expires_at check) to die.
 */
export class SyncSessionManager {
  private readonly now: () => Date;
  private readonly newSessionId: () => SyncSessionId;

  constructor(
    private readonly store: SessionKeyValueStore,
    private readonly config: SyncConfig,
    private readonly options: SyncSessionManagerOptions,
  ) {
    this.now = options.now ?? (() => new Date());
    this.newSessionId = options.newSessionId ?? generateSessionId;
  }

  sessionKey(sessionId: SyncSessionId): string {
    return `${this.options.keyPrefix}:sync:session:${sessionId}`;
  }

  async startSession(input: StartSessionInput): Promise<SyncSessionInfo> {
    const pageLimit = resolveLimit(this.config, input.limit);
    const ttlSeconds = sessionTtlSeconds(this.config);

    const createdAt = this.now();
    const expiresAt = new Date(createdAt.getTime() + ttlSeconds * 1000);

    const record: SyncSessionRecord = {
      session_id: this.newSessionId(),
      owner_id: input.ownerId,
      client_id: input.clientId,
      page_limit: pageLimit,
      created_at: createdAt.toISOString(),
      expires_at: expiresAt.toISOString(),
      next_since: 0,
    };

    await this.store.set(this.sessionKey(record.session_id), JSON.stringify(record), ttlSeconds);

    return {
      session_id: record.session_id,
      expires_at: record.expires_at,
      created_at: record.created_at,
      default_limit: pageLimit,
      max_limit: this.config.session.maxLimit,
      last_issued_since: 0,
    };
  }

  /**
   * The single choke point for every full/delta/apply call.
   * Order: existence (incl. store TTL), then ownership, then stored expiry.
   */
  async loadAndValidate(sessionId: SyncSessionId, ownerId: SyncOwnerId, clientId: SyncClientId): Promise<SyncSessionRecord> {
    const key = this.sessionKey(sessionId);

    const raw = await this.store.get(key);
    if (raw === null) throw new SyncSessionNotFoundError(sessionId);

    const ttl = await this.store.ttl(key);
    if (ttl === -2) throw new SyncSessionNotFoundError(sessionId);

    const record = parseSessionRecord(raw);
    if (!record || record.session_id !== sessionId) {
      // eslint-disable-next-line no-console
      console.warn(`[sync:sessions] discarding unreadable session record ${sessionId}`);
      throw new SyncSessionNotFoundError(sessionId);
    }

    if (record.owner_id !== ownerId || record.client_id !== clientId)
      throw new SyncSessionForbiddenError(sessionId);

    if (this.now().getTime() >= Date.parse(record.expires_at))
      throw new SyncSessionExpiredError(sessionId);

    return record;
  }
}

function parseSessionRecord(raw: string): SyncSessionRecord | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }

  const parsed = SyncSessionRecordSchema.safeParse(json);
  return parsed.success ? parsed.data : null;
}
