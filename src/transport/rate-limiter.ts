/**
 * Rate limiting: token buckets per tenant and rate class.
 */

import type { RateClass } from '../mcop/intent-handler.js';

// ── Types ──

export interface RateLimiterConfig {
  /** Maximum tokens in the bucket */
  maxTokens: number;
  /** Number of tokens to refill per interval */
  refillRate: number;
  /** Refill interval in milliseconds */
  refillIntervalMs: number;
}

export interface RateLimitResult {
  allowed: boolean;
  remainingTokens: number;
  retryAfterMs?: number;
}

interface Bucket {
  tokens: number;
  lastRefill: number;
  lastAccess: number;
}

// ── Rate Limiter ──

export class RateLimiter {
  private buckets = new Map<string, Bucket>();
  private cleanupTimer: ReturnType<typeof setInterval> | null = null;

  constructor(
    private config: RateLimiterConfig,
    private now: () => number = Date.now,
  ) {}

  /** Check and consume one token. */
  check(key: string): RateLimitResult {
    const now = this.now();
    let bucket = this.buckets.get(key);

    if (!bucket) {
      bucket = { tokens: this.config.maxTokens, lastRefill: now, lastAccess: now };
      this.buckets.set(key, bucket);
    }

    this.refill(bucket, now);
    bucket.lastAccess = now;

    if (bucket.tokens >= 1) {
      bucket.tokens -= 1;
      return { allowed: true, remainingTokens: bucket.tokens };
    }

    const retryAfterMs = Math.max(0, this.config.refillIntervalMs - (now - bucket.lastRefill));
    return { allowed: false, remainingTokens: 0, retryAfterMs };
  }

  getRemainingTokens(key: string): number {
    const bucket = this.buckets.get(key);
    if (!bucket) return this.config.maxTokens;
    this.refill(bucket, this.now());
    return bucket.tokens;
  }

  /** Start periodic cleanup of stale buckets. */
  startCleanup(staleAfterMs = 300_000, intervalMs = 60_000): void {
    if (this.cleanupTimer) return;
    this.cleanupTimer = setInterval(() => {
      const cutoff = this.now() - staleAfterMs;
      for (const [key, bucket] of this.buckets) {
        if (bucket.lastAccess < cutoff) {
          this.buckets.delete(key);
        }
      }
    }, intervalMs);
    this.cleanupTimer.unref();
  }

  stopCleanup(): void {
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = null;
    }
  }

  reset(): void {
    this.buckets.clear();
  }

  get bucketCount(): number {
    return this.buckets.size;
  }

  private refill(bucket: Bucket, now: number): void {
    const intervals = Math.floor((now - bucket.lastRefill) / this.config.refillIntervalMs);
    if (intervals > 0) {
      bucket.tokens = Math.min(this.config.maxTokens, bucket.tokens + intervals * this.config.refillRate);
      bucket.lastRefill += intervals * this.config.refillIntervalMs;
    }
  }
}

// ── Tenant Limits ──

/** Requests per tenant per minute, by rate class */
export type RateLimits = Record<RateClass, number>;

export const DEFAULT_RATE_LIMITS: RateLimits = { read: 1000, write: 100, compute: 50 };

const MINUTE_MS = 60_000;

export class TenantRateLimiter {
  private limiters: Record<RateClass, RateLimiter>;

  constructor(
    readonly limits: RateLimits = DEFAULT_RATE_LIMITS,
    now: () => number = Date.now,
  ) {
    const perMinute = (limit: number) => new RateLimiter({ maxTokens: limit, refillRate: limit, refillIntervalMs: MINUTE_MS }, now);
    this.limiters = {
      read: perMinute(limits.read),
      write: perMinute(limits.write),
      compute: perMinute(limits.compute),
    };
  }

  check(tenantKey: string, rateClass: RateClass): RateLimitResult {
    return this.limiters[rateClass].check(tenantKey);
  }

  remaining(tenantKey: string, rateClass: RateClass): number {
    return this.limiters[rateClass].getRemainingTokens(tenantKey);
  }

  startCleanup(): void {
    for (const limiter of Object.values(this.limiters)) limiter.startCleanup();
  }

  stopCleanup(): void {
    for (const limiter of Object.values(this.limiters)) limiter.stopCleanup();
  }
}
