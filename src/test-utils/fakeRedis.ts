// src/test-utils/fakeRedis.ts

import type { RedisCommandClient } from '~/server/sync/syncSessionStore';

/**
 * In-process stand-in for the few ioredis commands the session store uses.
 * Expired keys disappear, as in Redis.
 */
export class FakeRedisClient implements RedisCommandClient {
  /** When set, every command rejects with this error. */
  failWith: Error | null = null;
  readonly calls: string[] = [];

  private readonly data = new Map<string, { value: string; expiresAt: number }>();

  constructor(private readonly now: () => number = Date.now) {}

  async get(key: string): Promise<string | null> {
    this.check('get');
    return this.live(key)?.value ?? null;
  }

  async set(key: string, value: string, _mode: 'EX', seconds: number): Promise<'OK'> {
    this.check('set');
    this.data.set(key, { value, expiresAt: this.now() + seconds * 1000 });
    return 'OK';
  }

  async ttl(key: string): Promise<number> {
    this.check('ttl');
    const entry = this.live(key);
    if (!entry) return -2;
    return Math.ceil((entry.expiresAt - this.now()) / 1000);
  }

  async del(key: string): Promise<number> {
    this.check('del');
    return this.data.delete(key) ? 1 : 0;
  }

  private live(key: string): { value: string; expiresAt: number } | undefined {
    const entry = this.data.get(key);
    if (entry && entry.expiresAt <= this.now()) {
      this.data.delete(key);
      return undefined;
    }
    return entry;
  }

  private check(command: string): void {
    this.calls.push(command);
    if (this.failWith) throw this.failWith;
  }
}
