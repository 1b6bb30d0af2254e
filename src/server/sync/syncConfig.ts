// src/server/sync/syncConfig.ts

import { envBool, envInt, envStr, type EnvSource } from '~/server/env';
import { SyncConfigError } from './syncErrors';

export interface SyncConfig {
  session: {
    expiryHours: number;
    defaultLimit: number;
    minLimit: number;
    maxLimit: number;
  };
  apply: {
    maxItems: number;
  };
  http: {
    maxBodyBytes: number;
    clientIdMaxLen: number;
    applyRateLimit: {
      maxPerWindow: number;
      windowMs: number;
      blockMs: number;
    };
  };
  pg: {
    url: string | null;
    poolMax: number;
    connectionTimeoutMs: number;
    idleTimeoutMs: number;
    statementTimeoutMs: number; // 0 disables
  };
  redis: {
    enabled: boolean;
    required: boolean;
    url: string | null;
    prefix: string;
    commandTimeoutMs: number;
  };
}

const LIMIT_CEILING = 1000;
const EXPIRY_HOURS_MAX = 168;

/**
 * Reads sync settings from the environment and rejects inconsistent limit ranges.
 */
export function loadSyncConfig(env: EnvSource = process.env): SyncConfig {
  const config: SyncConfig = {
    session: {
      expiryHours: envInt('SYNC_EXPIRY_HOURS', 1, env),
      defaultLimit: envInt('SYNC_DEFAULT_LIMIT', 200, env),
      minLimit: envInt('SYNC_MIN_LIMIT', 1, env),
      maxLimit: envInt('SYNC_MAX_LIMIT', 500, env),
    },
    apply: {
      maxItems: envInt('SYNC_MAX_APPLY_ITEMS', 500, env),
    },
    http: {
      maxBodyBytes: envInt('SYNC_MAX_BODY_BYTES', 1024 * 1024, env),
      clientIdMaxLen: envInt('SYNC_CLIENT_ID_MAX_LEN', 128, env),
      // per owner
      applyRateLimit: {
        maxPerWindow: envInt('SYNC_APPLY_MAX_PER_WINDOW', 60, env),
        windowMs: envInt('SYNC_APPLY_WINDOW_MS', 60_000, env),
        blockMs: envInt('SYNC_APPLY_BLOCK_MS', 60_000, env),
      },
    },
    pg: {
      url: envStr('PG_DATABASE_URL', env),
      poolMax: envInt('PG_POOL_MAX', 10, env),
      connectionTimeoutMs: envInt('PG_POOL_CONNECTION_TIMEOUT_MS', 3000, env),
      idleTimeoutMs: envInt('PG_POOL_IDLE_TIMEOUT_MS', 30_000, env),
      statementTimeoutMs: envInt('PG_STATEMENT_TIMEOUT_MS', 8000, env),
    },
    redis: {
      enabled: envBool('REDIS_ENABLED', true, env),
      required: envBool('REDIS_REQUIRED', false, env),
      url: envStr('REDIS_URL', env),
      prefix: envStr('REDIS_PREFIX', env) ?? 'wmsync',
      commandTimeoutMs: envInt('REDIS_COMMAND_TIMEOUT_MS', 500, env),
    },
  };

  validateSyncConfig(config);
  return config;
}

export function validateSyncConfig(config: SyncConfig): void {
  const { expiryHours, defaultLimit, minLimit, maxLimit } = config.session;

  if (expiryHours < 1 || expiryHours > EXPIRY_HOURS_MAX)
    throw new SyncConfigError(`sync expiry hours must be between 1 and ${EXPIRY_HOURS_MAX}`);

  for (const [name, value] of [['default_limit', defaultLimit], ['min_limit', minLimit], ['max_limit', maxLimit]] as const) {
    if (value < 1 || value > LIMIT_CEILING)
      throw new SyncConfigError(`sync ${name} must be between 1 and ${LIMIT_CEILING}`);
  }

  if (minLimit > maxLimit)
    throw new SyncConfigError('sync min_limit cannot exceed max_limit');
  if (defaultLimit < minLimit || defaultLimit > maxLimit)
    throw new SyncConfigError('sync default_limit must be within min_limit and max_limit');

  if (config.apply.maxItems < 1)
    throw new SyncConfigError('sync max apply items must be at least 1');

  if (config.redis.required && (!config.redis.enabled || !config.redis.url))
    throw new SyncConfigError('REDIS_REQUIRED is set but no REDIS_URL is configured');
}

export function sessionTtlSeconds(config: SyncConfig): number {
  return config.session.expiryHours * 3600;
}

/**
 * Clamp a requested page size into [minLimit, maxLimit]; absent or zero means the default.
 */
export function resolveLimit(config: SyncConfig, requested: number | null | undefined): number {
  const { defaultLimit, minLimit, maxLimit } = config.session;
  const wanted = requested || defaultLimit;
  return Math.max(minLimit, Math.min(maxLimit, wanted));
}
