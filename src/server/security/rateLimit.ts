// src/server/security/rateLimit.ts

import { SyncError } from '~/server/sync/syncErrors';

export interface RateLimitOptions {
  windowMs: number;
  maxPerWindow: number;
  blockMs: number;
}

export type RateLimitDecision =
  | { ok: true }
  | { ok: false; retryAfterMs: number };

interface KeyWindow {
  startedAt: number;
  count: number;
  blockedUntil: number;
  lastSeen: number;
}

const EVICT_ABOVE_KEYS = 10_000;
const EVICT_IDLE_MS = 60 * 60 * 1000;

/**
 * Fixed window per key; going over the budget blocks the key for blockMs.
 * Process-local, so each instance enforces its own budget.
 */
export class FixedWindowRateLimiter {
  private readonly windows = new Map<string, KeyWindow>();

  constructor(
    private readonly options: RateLimitOptions,
    private readonly now: () => number = Date.now,
  ) {}

  consume(key: string): RateLimitDecision {
    const now = this.now();
    this.evictIdle(now);

    const w = this.windows.get(key) ?? { startedAt: now, count: 0, blockedUntil: 0, lastSeen: now };
    this.windows.set(key, w);
    w.lastSeen = now;

    if (w.blockedUntil > now)
      return { ok: false, retryAfterMs: w.blockedUntil - now };

    if (now - w.startedAt >= this.options.windowMs) {
      w.startedAt = now;
      w.count = 0;
    }

    w.count += 1;
    if (w.count <= this.options.maxPerWindow)
      return { ok: true };

    w.blockedUntil = now + this.options.blockMs;
    return { ok: false, retryAfterMs: this.options.blockMs };
  }

  /**
   * 429 `rate_limited` with Retry-After in whole seconds (at least 1).
   */
  requireOrThrow(key: string): void {
    const decision = this.consume(key);
    if (decision.ok) return;

    const retryAfterSec = Math.max(1, Math.ceil(decision.retryAfterMs / 1000));
    throw new SyncError(429, 'rate_limited', {}, { 'Retry-After': String(retryAfterSec) });
  }

  reset(key: string): void {
    this.windows.delete(key);
  }

  private evictIdle(now: number): void {
    if (this.windows.size <= EVICT_ABOVE_KEYS) return;
    for (const [key, w] of this.windows)
      if (now - w.lastSeen > EVICT_IDLE_MS) this.windows.delete(key);
  }
}
