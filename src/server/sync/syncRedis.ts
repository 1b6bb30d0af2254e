// src/server/sync/syncRedis.ts

import Redis from 'ioredis';

import type { SyncConfig } from './syncConfig';

declare global {
  // eslint-disable-next-line no-var
  var __wmsyncRedis: Redis | undefined;
}

/**
 * Shared ioredis client for the session store (singleton: Next.js dev reloads modules).
 * Commands are bounded by commandTimeout and a single retry, so an outage surfaces
 * quickly and the failover store can take over.
 */
export function getSyncRedis(config: SyncConfig['redis']): Redis {
  if (globalThis.__wmsyncRedis)
    return globalThis.__wmsyncRedis;

  if (!config.url)
    throw new Error('REDIS_URL not configured');

  const client = new Redis(config.url, {
    lazyConnect: true,
    maxRetriesPerRequest: 1,
    commandTimeout: config.commandTimeoutMs,
    connectTimeout: Math.max(1000, config.commandTimeoutMs * 4),
  });

  let reported = false;
  client.on('error', (err: Error) => {
    if (reported) return;
    reported = true;
    // eslint-disable-next-line no-console
    console.warn('[sync:redis] connection error', err.message);
  });
  client.on('ready', () => {
    reported = false;
  });

  globalThis.__wmsyncRedis = client;
  return client;
}
