// src/server/sync/syncRuntime.ts

import { getPgPool } from '~/server/db/pgPool';
import { FixedWindowRateLimiter } from '~/server/security/rateLimit';
import { loadSyncConfig, type SyncConfig } from './syncConfig';
import { getSyncRedis } from './syncRedis';
import { createPgSyncSources } from './syncRepo';
import { SyncService } from './syncService';
import {
  FailoverKeyValueStore,
  MemoryKeyValueStore,
  RedisKeyValueStore,
  type SessionKeyValueStore,
} from './syncSessionStore';
import { SyncSessionManager } from './syncSessions';

/**
 * Everything a sync route needs, built once per process.
 */
export interface SyncRuntime {
  config: SyncConfig;
  service: SyncService;
  applyLimiter: FixedWindowRateLimiter;
}

declare global {
  // eslint-disable-next-line no-var
  var __wmsyncRuntime: SyncRuntime | undefined;
}

/**
 * The store is chosen once here; call sites only ever see SessionKeyValueStore.
 */
export function createSessionStore(config: SyncConfig): SessionKeyValueStore {
  const { redis } = config;
  if (!redis.enabled || !redis.url)
    return new MemoryKeyValueStore();

  return new FailoverKeyValueStore(
    new RedisKeyValueStore(getSyncRedis(redis)),
    new MemoryKeyValueStore(),
    { required: redis.required },
  );
}

export function getSyncRuntime(): SyncRuntime {
  if (globalThis.__wmsyncRuntime)
    return globalThis.__wmsyncRuntime;

  const config = loadSyncConfig();
  const store = createSessionStore(config);
  const { sources, summaries } = createPgSyncSources(getPgPool(config.pg));

  // eslint-disable-next-line no-console
  console.info(`[sync:runtime] session store: ${store.kind}`);

  const runtime: SyncRuntime = {
    config,
    service: new SyncService({
      config,
      sessions: new SyncSessionManager(store, config, { keyPrefix: config.redis.prefix }),
      sources,
      mutable: { summary: summaries },
    }),
    applyLimiter: new FixedWindowRateLimiter(config.http.applyRateLimit),
  };

  globalThis.__wmsyncRuntime = runtime;
  return runtime;
}
