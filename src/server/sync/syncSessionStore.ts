// src/server/sync/syncSessionStore.ts

import { SyncStoreUnavailableError } from './syncErrors';

/**
 * TTL-capable key/value contract for session records.
 * ttl() follows Redis: -2 = missing key, -1 = no expiry, otherwise seconds left.
 */
export interface SessionKeyValueStore {
  readonly kind: 'redis' | 'memory' | 'failover';
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
  ttl(key: string): Promise<number>;
  delete(key: string): Promise<void>;
}

// ---- process-local ----

type MemoryEntry = {
  value: string;
  expiresAt: number; // unix ms; Infinity = no expiry
};

const PRUNE_THRESHOLD = 10_000;
const PRUNE_GRACE_MS = 60 * 60 * 1000;

/**
 * Process-local fallback. Not shared across instances.
 *
 * Entries past their expiry are still returned: the session manager compares
 * expires_at itself and reports "expired" rather than "not found".
 */
export class MemoryKeyValueStore implements SessionKeyValueStore {
  readonly kind = 'memory' as const;
  private readonly entries = new Map<string, MemoryEntry>();

  constructor(private readonly now: () => number = Date.now) {}

  async get(key: string): Promise<string | null> {
    return this.entries.get(key)?.value ?? null;
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    const now = this.now();
    this.prune(now);
    this.entries.set(key, {
      value,
      expiresAt: ttlSeconds > 0 ? now + ttlSeconds * 1000 : Number.POSITIVE_INFINITY,
    });
  }

  async ttl(key: string): Promise<number> {
    const entry = this.entries.get(key);
    if (!entry) return -2;
    if (entry.expiresAt === Number.POSITIVE_INFINITY) return -1;
    return Math.max(0, Math.ceil((entry.expiresAt - this.now()) / 1000));
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }

  get size(): number {
    return this.entries.size;
  }

  // Opportunistic cleanup: keep memory bounded.
  private prune(now: number): void {
    if (this.entries.size < PRUNE_THRESHOLD) return;
    for (const [k, e] of this.entries) {
      if (now - e.expiresAt > PRUNE_GRACE_MS) this.entries.delete(k);
    }
  }
}

// ---- shared (Redis) ----

/**
 * The subset of the ioredis client used here.
 */
export interface RedisCommandClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, mode: 'EX', seconds: number): Promise<unknown>;
  ttl(key: string): Promise<number>;
  del(key: string): Promise<number>;
}

export class RedisKeyValueStore implements SessionKeyValueStore {
  readonly kind = 'redis' as const;

  constructor(private readonly client: RedisCommandClient) {}

  async get(key: string): Promise<string | null> {
    return this.client.get(key);
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    await this.client.set(key, value, 'EX', Math.max(1, Math.floor(ttlSeconds)));
  }

  async ttl(key: string): Promise<number> {
    return this.client.ttl(key);
  }

  async delete(key: string): Promise<void> {
    await this.client.del(key);
  }
}

// ---- failover ----

export interface FailoverOptions {
  /**
   * Fail the call instead of degrading. Multi-instance deployments should set this:
   * a process-local session is invisible to every other instance.
   */
  required?: boolean;
}

/**
 * Primary store with a process-local fallback.
 * - writes land in the fallback when the primary throws
 * - reads consult the fallback on primary error or primary miss
 */
export class FailoverKeyValueStore implements SessionKeyValueStore {
  readonly kind = 'failover' as const;
  private degraded = false;

  constructor(
    private readonly primary: SessionKeyValueStore,
    private readonly fallback: SessionKeyValueStore,
    private readonly options: FailoverOptions = {},
  ) {}

  get isDegraded(): boolean {
    return this.degraded;
  }

  async get(key: string): Promise<string | null> {
    try {
      const value = await this.primary.get(key);
      this.markHealthy();
      if (value !== null) return value;
    } catch (err) {
      this.onPrimaryError('get', err);
    }
    return this.fallback.get(key);
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    try {
      await this.primary.set(key, value, ttlSeconds);
      this.markHealthy();
      return;
    } catch (err) {
      this.onPrimaryError('set', err);
    }
    await this.fallback.set(key, value, ttlSeconds);
  }

  /**
   * An unreachable primary with no local entry answers -1 (expiry unknown):
   * the key may well live in the primary, so expires_at decides.
   */
  async ttl(key: string): Promise<number> {
    let primaryFailed = false;
    try {
      const ttl = await this.primary.ttl(key);
      this.markHealthy();
      if (ttl !== -2) return ttl;
    } catch (err) {
      this.onPrimaryError('ttl', err);
      primaryFailed = true;
    }

    const local = await this.fallback.ttl(key);
    return primaryFailed && local === -2 ? -1 : local;
  }

  async delete(key: string): Promise<void> {
    await this.fallback.delete(key);
    try {
      await this.primary.delete(key);
      this.markHealthy();
    } catch (err) {
      this.onPrimaryError('delete', err);
    }
  }

  private onPrimaryError(op: string, err: unknown): void {
    if (this.options.required) throw new SyncStoreUnavailableError(err);

    if (!this.degraded) {
      this.degraded = true;
      // eslint-disable-next-line no-console
      console.warn(`[sync:session-store] shared store ${op} failed; falling back to process-local sessions`, err);
    }
  }

  private markHealthy(): void {
    if (!this.degraded) return;
    this.degraded = false;
    // eslint-disable-next-line no-console
    console.info('[sync:session-store] shared store reachable again');
  }
}
