import { describe, it, expect } from 'vitest';
import { RateLimiter } from '../rateLimiter.js';

describe('RateLimiter', () => {
  it('grants up to perMinute within one minute window', () => {
    const limiter = new RateLimiter({ perMinute: 3, perHour: 100 });
    expect(limiter.tryAcquire(0).allowed).toBe(true);
    expect(limiter.tryAcquire(1000).allowed).toBe(true);
    expect(limiter.tryAcquire(2000).allowed).toBe(true);
    expect(limiter.tryAcquire(3000)).toEqual({ allowed: false, retryAfterMs: 57_000, reason: 'minute_budget' });
  });

  it('restores the minute budget at the next window', () => {
    const limiter = new RateLimiter({ perMinute: 1, perHour: 100 });
    expect(limiter.tryAcquire(59_999).allowed).toBe(true);
    expect(limiter.tryAcquire(59_999).allowed).toBe(false);
    expect(limiter.tryAcquire(60_000).allowed).toBe(true);
  });

  it('enforces the hourly cap across minute windows', () => {
    const limiter = new RateLimiter({ perMinute: 10, perHour: 2 });
    expect(limiter.tryAcquire(0).allowed).toBe(true);
    expect(limiter.tryAcquire(60_000).allowed).toBe(true);
    expect(limiter.tryAcquire(120_000)).toEqual({
      allowed: false,
      retryAfterMs: 3_600_000 - 120_000,
      reason: 'hour_budget',
    });
    expect(limiter.tryAcquire(3_600_000).allowed).toBe(true);
  });

  it('doubles the backoff multiplier up to the cap', () => {
    const limiter = new RateLimiter({ perMinute: 10, perHour: 100, maxBackoffMultiplier: 10 });
    const seen: number[] = [];
    for (let i = 0; i < 5; i++) {
      limiter.recordRateLimited(0);
      seen.push(limiter.backoffMultiplier);
    }
    expect(seen).toEqual([2, 4, 8, 10, 10]);
  });

  it('decays the multiplier on success, never below 1', () => {
    const limiter = new RateLimiter({ perMinute: 10, perHour: 100, decayStep: 0.5 });
    limiter.recordRateLimited(0);
    limiter.recordSuccess();
    expect(limiter.backoffMultiplier).toBe(1.5);
    limiter.recordSuccess();
    limiter.recordSuccess();
    expect(limiter.backoffMultiplier).toBe(1);
  });

  it('spaces requests by (60s / perMinute) * multiplier while backing off', () => {
    const limiter = new RateLimiter({ perMinute: 10, perHour: 100 });
    limiter.recordRateLimited(0);
    expect(limiter.effectiveDelayMs).toBe(12_000);
    expect(limiter.tryAcquire(1000).allowed).toBe(true);
    expect(limiter.tryAcquire(5000)).toEqual({ allowed: false, retryAfterMs: 8000, reason: 'backoff' });
    expect(limiter.tryAcquire(13_000).allowed).toBe(true);
  });

  it('honours Retry-After before anything else', () => {
    const limiter = new RateLimiter({ perMinute: 10, perHour: 100 });
    limiter.recordRateLimited(1000, 30_000);
    expect(limiter.tryAcquire(20_000)).toEqual({ allowed: false, retryAfterMs: 11_000, reason: 'retry_after' });
    expect(limiter.tryAcquire(31_000).allowed).toBe(true);
  });

  it('reports remaining budget and reset times', () => {
    const limiter = new RateLimiter({ perMinute: 5, perHour: 50 });
    limiter.tryAcquire(61_000);
    limiter.tryAcquire(62_000);
    expect(limiter.snapshot(63_000)).toEqual({
      remaining_minute: 3,
      remaining_hour: 48,
      minute_resets_at: 120_000,
      hour_resets_at: 3_600_000,
      backoff_multiplier: 1,
      blocked_until: null,
    });
  });
});
