import { describe, expect, it } from 'vitest';

import { loadSyncConfig, resolveLimit, sessionTtlSeconds } from './syncConfig';
import { SyncConfigError } from './syncErrors';

describe('loadSyncConfig', () => {
  it('uses defaults for an empty environment', () => {
    const config = loadSyncConfig({});

    expect(config).toEqual({
      session: { expiryHours: 1, defaultLimit: 200, minLimit: 1, maxLimit: 500 },
      apply: { maxItems: 500 },
      http: {
        maxBodyBytes: 1048576,
        clientIdMaxLen: 128,
        applyRateLimit: { maxPerWindow: 60, windowMs: 60000, blockMs: 60000 },
      },
      pg: { url: null, poolMax: 10, connectionTimeoutMs: 3000, idleTimeoutMs: 30000, statementTimeoutMs: 8000 },
      redis: { enabled: true, required: false, url: null, prefix: 'wmsync', commandTimeoutMs: 500 },
    });
  });

  it('reads overrides and falls back on unparsable numbers', () => {
    const config = loadSyncConfig({
      SYNC_EXPIRY_HOURS: '24',
      SYNC_DEFAULT_LIMIT: 'lots',
      SYNC_MAX_LIMIT: '300',
      REDIS_URL: 'redis://localhost:6379',
      REDIS_ENABLED: '0',
      REDIS_PREFIX: 'custom',
    });

    expect(config.session.expiryHours).toBe(24);
    expect(config.session.defaultLimit).toBe(200);
    expect(config.session.maxLimit).toBe(300);
    expect(config.redis.enabled).toBe(false);
    expect(config.redis.url).toBe('redis://localhost:6379');
    expect(config.redis.prefix).toBe('custom');
  });

  it('rejects min_limit above max_limit', () => {
    expect(() => loadSyncConfig({ SYNC_MIN_LIMIT: '600' })).toThrow('sync min_limit cannot exceed max_limit');
  });

  it('rejects a default outside the clamp range', () => {
    expect(() => loadSyncConfig({ SYNC_MIN_LIMIT: '250' }))
      .toThrow('sync default_limit must be within min_limit and max_limit');
  });

  it('rejects limits above the ceiling and a zero default', () => {
    expect(() => loadSyncConfig({ SYNC_DEFAULT_LIMIT: '1500' })).toThrow('sync default_limit must be between 1 and 1000');
    expect(() => loadSyncConfig({ SYNC_DEFAULT_LIMIT: '0' })).toThrow(SyncConfigError);
  });

  it('rejects an expiry outside 1..168 hours', () => {
    expect(() => loadSyncConfig({ SYNC_EXPIRY_HOURS: '200' })).toThrow('sync expiry hours must be between 1 and 168');
  });

  it('rejects REDIS_REQUIRED without a url', () => {
    expect(() => loadSyncConfig({ REDIS_REQUIRED: 'true' })).toThrow(SyncConfigError);
  });
});

describe('resolveLimit', () => {
  const config = loadSyncConfig({ SYNC_MIN_LIMIT: '10' });

  it('defaults when absent or zero', () => {
    expect(resolveLimit(config, null)).toBe(200);
    expect(resolveLimit(config, undefined)).toBe(200);
    expect(resolveLimit(config, 0)).toBe(200);
  });

  it('clamps into [min, max]', () => {
    expect(resolveLimit(config, 5)).toBe(10);
    expect(resolveLimit(config, 42)).toBe(42);
    expect(resolveLimit(config, 10_000)).toBe(500);
  });
});

describe('sessionTtlSeconds', () => {
  it('converts hours to seconds', () => {
    expect(sessionTtlSeconds(loadSyncConfig({ SYNC_EXPIRY_HOURS: '2' }))).toBe(7200);
  });
});
