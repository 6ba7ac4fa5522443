import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { DEFAULT_RATE_LIMITS, RateLimiter, TenantRateLimiter } from '../src/transport/rate-limiter.js';

describe('RateLimiter', () => {
  let clock: number;
  const now = () => clock;

  beforeEach(() => {
    clock = 1_000_000;
  });

  it('allows requests within the token budget', () => {
    const rl = new RateLimiter({ maxTokens: 3, refillRate: 1, refillIntervalMs: 1000 }, now);
    expect([rl.check('k'), rl.check('k'), rl.check('k')].map((r) => r.remainingTokens)).toEqual([2, 1, 0]);
  });

  it('rejects once the bucket is empty and says when to retry', () => {
    const rl = new RateLimiter({ maxTokens: 1, refillRate: 1, refillIntervalMs: 5000 }, now);
    rl.check('k');
    clock += 1200;
    expect(rl.check('k')).toEqual({ allowed: false, remainingTokens: 0, retryAfterMs: 3800 });
  });

  it('keeps a bucket per key', () => {
    const rl = new RateLimiter({ maxTokens: 1, refillRate: 1, refillIntervalMs: 60_000 }, now);
    expect(rl.check('a').allowed).toBe(true);
    expect(rl.check('a').allowed).toBe(false);
    expect(rl.check('b').allowed).toBe(true);
    expect(rl.bucketCount).toBe(2);
  });

  it('refills whole intervals up to the maximum', () => {
    const rl = new RateLimiter({ maxTokens: 4, refillRate: 1, refillIntervalMs: 100 }, now);
    for (let i = 0; i < 4; i++) rl.check('k');
    expect(rl.getRemainingTokens('k')).toBe(0);

    clock += 250;
    expect(rl.getRemainingTokens('k')).toBe(2);

    clock += 10_000;
    expect(rl.getRemainingTokens('k')).toBe(4);
  });

  it('reports a full bucket for an unseen key', () => {
    const rl = new RateLimiter({ maxTokens: 7, refillRate: 1, refillIntervalMs: 100 }, now);
    expect(rl.getRemainingTokens('nobody')).toBe(7);
    rl.check('k');
    rl.reset();
    expect(rl.bucketCount).toBe(0);
  });
});

describe('TenantRateLimiter', () => {
  let limiter: TenantRateLimiter;
  let clock: number;

  beforeEach(() => {
    clock = 0;
    limiter = new TenantRateLimiter({ read: 3, write: 1, compute: 2 }, () => clock);
  });

  afterEach(() => {
    limiter.stopCleanup();
  });

  it('limits each rate class separately', () => {
    expect(limiter.check('acme/analytics', 'write').allowed).toBe(true);
    expect(limiter.check('acme/analytics', 'write').allowed).toBe(false);
    expect(limiter.check('acme/analytics', 'read').allowed).toBe(true);
    expect(limiter.remaining('acme/analytics', 'read')).toBe(2);
    expect(limiter.remaining('acme/analytics', 'compute')).toBe(2);
  });

  it('limits each tenant separately', () => {
    limiter.check('acme/analytics', 'write');
    expect(limiter.check('globex/analytics', 'write').allowed).toBe(true);
  });

  it('refills a full minute budget after a minute', () => {
    limiter.check('acme/analytics', 'compute');
    limiter.check('acme/analytics', 'compute');
    expect(limiter.check('acme/analytics', 'compute')).toEqual({ allowed: false, remainingTokens: 0, retryAfterMs: 60_000 });

    clock += 60_000;
    expect(limiter.remaining('acme/analytics', 'compute')).toBe(2);
  });

  it('defaults to the standard per-minute limits', () => {
    expect(new TenantRateLimiter().limits).toEqual(DEFAULT_RATE_LIMITS);
    expect(DEFAULT_RATE_LIMITS).toEqual({ read: 1000, write: 100, compute: 50 });
  });

  it('starts and stops cleanup timers', () => {
    limiter.startCleanup();
    limiter.startCleanup();
    limiter.stopCleanup();
    expect(limiter.check('acme/analytics', 'read').allowed).toBe(true);
  });
});
