// src/server/sync/syncService.ts

import { SyncApplyResolver, type SyncMutableSources } from './syncApply';
import { collectEnvelopes } from './syncCollector';
import { resolveLimit, type SyncConfig } from './syncConfig';
import { isTombstone, type SyncEnvelopeSource } from './syncEnvelope';
import { SyncError } from './syncErrors';
import { paginateEnvelopes } from './syncPagination';
import type { StartSessionInput, SyncSessionManager } from './syncSessions';
import type {
  SyncApplyItem,
  SyncApplyResponse,
  SyncClientId,
  SyncDeltaResponse,
  SyncFullResponse,
  SyncOwnerId,
  SyncSessionId,
  SyncSessionInfo,
  SyncSessionRecord,
} from './syncTypes';

export interface SyncServiceDeps {
  config: SyncConfig;
  sessions: SyncSessionManager;
  sources: readonly SyncEnvelopeSource[];
  mutable: SyncMutableSources;
  now?: () => Date;
}

export interface SyncCallContext {
  sessionId: SyncSessionId;
  ownerId: SyncOwnerId;
  clientId: SyncClientId;
}

export interface SyncPageRequest extends SyncCallContext {
  limit?: number | null;
}

export interface SyncDeltaRequest extends SyncPageRequest {
  since: number;
}

export interface SyncApplyRequest extends SyncCallContext {
  changes: readonly SyncApplyItem[];
}

/**
 * Protocol entry points. Every call except startSession goes through
 * SyncSessionManager.loadAndValidate first.
 */
export class SyncService {
  private readonly resolver: SyncApplyResolver;
  private readonly now: () => Date;

  constructor(private readonly deps: SyncServiceDeps) {
    this.resolver = new SyncApplyResolver(deps.mutable);
    this.now = deps.now ?? (() => new Date());
  }

  startSession(input: StartSessionInput): Promise<SyncSessionInfo> {
    return this.deps.sessions.startSession(input);
  }

  async getFull(req: SyncPageRequest): Promise<SyncFullResponse> {
    const session = await this.validate(req);
    const limit = this.pageLimit(session, req.limit);

    const records = await collectEnvelopes(this.deps.sources, req.ownerId);
    const { page, hasMore, nextSince } = paginateEnvelopes(records, 0, limit);

    return {
      session_id: session.session_id,
      has_more: hasMore,
      next_since: nextSince,
      items: page,
      pagination: {
        total: records.length,
        limit,
        offset: 0,
        has_more: hasMore,
      },
    };
  }

  async getDelta(req: SyncDeltaRequest): Promise<SyncDeltaResponse> {
    const session = await this.validate(req);
    const limit = this.pageLimit(session, req.limit);

    const records = await collectEnvelopes(this.deps.sources, req.ownerId);
    const { page, hasMore, nextSince } = paginateEnvelopes(records, req.since, limit);

    return {
      session_id: session.session_id,
      since: req.since,
      has_more: hasMore,
      next_since: nextSince,
      created: page.filter(r => !isTombstone(r)),
      updated: [],
      deleted: page.filter(isTombstone),
    };
  }

  async applyChanges(req: SyncApplyRequest): Promise<SyncApplyResponse> {
    const session = await this.validate(req);

    const maxItems = this.deps.config.apply.maxItems;
    if (req.changes.length > maxItems)
      throw new SyncError(400, 'too_many_changes', { max_items: String(maxItems) });

    const results = await this.resolver.applyBatch(req.ownerId, req.changes);
    const conflicts = results.filter(r => r.status === 'conflict');

    return {
      session_id: session.session_id,
      results,
      conflicts: conflicts.length ? conflicts : null,
      applied: results.filter(r => r.status === 'applied').length,
      conflict_count: conflicts.length,
      invalid: results.filter(r => r.status === 'invalid').length,
      sync_timestamp: this.now().toISOString(),
    };
  }

  private validate(ctx: SyncCallContext): Promise<SyncSessionRecord> {
    return this.deps.sessions.loadAndValidate(ctx.sessionId, ctx.ownerId, ctx.clientId);
  }

  // per-call override, else the negotiated session value; clamped either way
  private pageLimit(session: SyncSessionRecord, requested: number | null | undefined): number {
    return resolveLimit(this.deps.config, requested ?? session.page_limit);
  }
}
