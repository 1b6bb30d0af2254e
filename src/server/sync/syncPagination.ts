// src/server/sync/syncPagination.ts

import type { SyncEntityEnvelope } from './syncTypes';

export interface SyncPage {
  page: SyncEntityEnvelope[];
  hasMore: boolean;
  nextSince: number;
}

/**
 * Slice an already-sorted stream by an exclusive watermark.
 *
 * - since is exclusive: re-requesting the same since never re-delivers a seen record.
 * - nextSince is the last delivered version, or since unchanged for an empty page.
 */
export function paginateEnvelopes(records: readonly SyncEntityEnvelope[], since: number, limit: number): SyncPage {
  const filtered = records.filter(r => r.server_version > since);
  const page = filtered.slice(0, limit);

  return {
    page,
    hasMore: filtered.length > limit,
    nextSince: page.length ? page[page.length - 1].server_version : since,
  };
}
