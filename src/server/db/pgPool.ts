// src/server/db/pgPool.ts

import { Pool } from 'pg';

import type { SyncConfig } from '~/server/sync/syncConfig';

declare global {
  // eslint-disable-next-line no-var
  var __wmsyncPgPool: Pool | undefined;
}

/**
 * Pool over the collaborator tables, kept on globalThis so Next.js dev reloads
 * do not open a new pool per module instance.
 */
export function getPgPool(config: SyncConfig['pg']): Pool {
  if (globalThis.__wmsyncPgPool)
    return globalThis.__wmsyncPgPool;

  if (!config.url)
    throw new Error('PG_DATABASE_URL not configured');

  const pool = new Pool({
    connectionString: config.url,
    max: config.poolMax,
    connectionTimeoutMillis: config.connectionTimeoutMs,
    idleTimeoutMillis: config.idleTimeoutMs,
    // full collection scans are the longest queries here; bound them
    options: config.statementTimeoutMs > 0 ? `-c statement_timeout=${config.statementTimeoutMs}` : undefined,
  });

  pool.on('error', err => {
    // idle client errors would otherwise crash the process
    // eslint-disable-next-line no-console
    console.error('[sync:pg] idle client error', err.message);
  });

  globalThis.__wmsyncPgPool = pool;
  return pool;
}
