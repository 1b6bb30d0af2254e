// src/server/sync/syncCollector.ts

import type { SyncEnvelopeSource } from './syncEnvelope';
import type { SyncEntityEnvelope, SyncOwnerId } from './syncTypes';

/**
 * Deterministic total order: (server_version, id as string), then entity_type.
 * Replays of the same snapshot must paginate identically.
 */
export function compareEnvelopes(a: SyncEntityEnvelope, b: SyncEntityEnvelope): number {
  if (a.server_version !== b.server_version) return a.server_version - b.server_version;

  const aId = String(a.id);
  const bId = String(b.id);
  if (aId !== bId) return aId < bId ? -1 : 1;

  if (a.entity_type === b.entity_type) return 0;
  return a.entity_type < b.entity_type ? -1 : 1;
}

/**
 * Collect every kind for the owner and merge into one version-ordered stream.
 *
 * All-or-nothing: if any source fails, the whole collection fails. A partial
 * snapshot would look like "no more changes" to the client.
 */
export async function collectEnvelopes(sources: readonly SyncEnvelopeSource[], ownerId: SyncOwnerId): Promise<SyncEntityEnvelope[]> {
  const perKind = await Promise.all(sources.map(source => source.listEnvelopes(ownerId)));

  const records = perKind.flat();
  records.sort(compareEnvelopes);
  return records;
}
