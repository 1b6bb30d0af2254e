import { describe, expect, it } from 'vitest';

import { paginateEnvelopes } from './syncPagination';
import type { SyncEntityEnvelope } from './syncTypes';

const records: SyncEntityEnvelope[] = [1, 2, 3, 4, 5].map(v => ({
  entity_type: 'request',
  id: v,
  server_version: v * 10,
  updated_at: '2026-01-01T00:00:00.000Z',
  payload: {},
}));

describe('paginateEnvelopes', () => {
  it('returns the first page and a cursor at its last version', () => {
    const { page, hasMore, nextSince } = paginateEnvelopes(records, 0, 2);
    expect(page.map(r => r.server_version)).toEqual([10, 20]);
    expect(hasMore).toBe(true);
    expect(nextSince).toBe(20);
  });

  it('treats since as exclusive', () => {
    const { page } = paginateEnvelopes(records, 20, 2);
    expect(page.map(r => r.server_version)).toEqual([30, 40]);
  });

  it('reports no more when the remainder fits exactly', () => {
    const { page, hasMore, nextSince } = paginateEnvelopes(records, 30, 2);
    expect(page.map(r => r.server_version)).toEqual([40, 50]);
    expect(hasMore).toBe(false);
    expect(nextSince).toBe(50);
  });

  it('keeps the cursor on an empty page', () => {
    expect(paginateEnvelopes(records, 50, 2)).toEqual({ page: [], hasMore: false, nextSince: 50 });
    expect(paginateEnvelopes([], 0, 10)).toEqual({ page: [], hasMore: false, nextSince: 0 });
  });

  it('walks the stream without gaps or repeats', () => {
    const seen: number[] = [];
    let since = 0;
    for (;;) {
      const { page, hasMore, nextSince } = paginateEnvelopes(records, since, 2);
      seen.push(...page.map(r => r.server_version));
      since = nextSince;
      if (!hasMore) break;
    }
    expect(seen).toEqual([10, 20, 30, 40, 50]);
  });
});
