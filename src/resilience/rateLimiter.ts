const MINUTE_MS = 60_000;
const HOUR_MS = 3_600_000;

export interface RateLimiterOptions {
  perMinute: number;
  perHour: number;
  maxBackoffMultiplier: number;
  decayStep: number;
}

export interface AcquireResult {
  allowed: boolean;
  retryAfterMs?: number;
  reason?: 'minute_budget' | 'hour_budget' | 'backoff' | 'retry_after';
}

export interface RateBudgetSnapshot {
  remaining_minute: number;
  remaining_hour: number;
  minute_resets_at: number;
  hour_resets_at: number;
  backoff_multiplier: number;
  blocked_until: number | null;
}

interface Window {
  start: number;
  used: number;
}

/**
 * Fixed-window budget with a per-minute and a per-hour cap. A server-signalled
 * rate limit doubles the backoff multiplier; while it is above 1 the limiter
 * also enforces a minimum spacing of `(60s / perMinute) * multiplier` between
 * grants. Each success walks the multiplier back down by `decayStep`.
 */
export class RateLimiter {
  private minute: Window = { start: 0, used: 0 };
  private hour: Window = { start: 0, used: 0 };
  private multiplier = 1;
  private lastGrantAt: number | null = null;
  private blockedUntil: number | null = null;
  private readonly options: RateLimiterOptions;

  constructor(options: Partial<RateLimiterOptions> & Pick<RateLimiterOptions, 'perMinute' | 'perHour'>) {
    this.options = { maxBackoffMultiplier: 10, decayStep: 0.25, ...options };
  }

  get backoffMultiplier(): number {
    return this.multiplier;
  }

  /** Minimum gap between requests while backing off, in ms. */
  get effectiveDelayMs(): number {
    return this.multiplier > 1 ? (MINUTE_MS / this.options.perMinute) * this.multiplier : 0;
  }

  tryAcquire(now: number): AcquireResult {
    this.roll(now);

    if (this.blockedUntil !== null) {
      if (now < this.blockedUntil) {
        return { allowed: false, retryAfterMs: this.blockedUntil - now, reason: 'retry_after' };
      }
      this.blockedUntil = null;
    }

    const spacing = this.effectiveDelayMs;
    if (spacing > 0 && this.lastGrantAt !== null && now - this.lastGrantAt < spacing) {
      return { allowed: false, retryAfterMs: this.lastGrantAt + spacing - now, reason: 'backoff' };
    }

    if (this.minute.used >= this.options.perMinute) {
      return { allowed: false, retryAfterMs: this.minute.start + MINUTE_MS - now, reason: 'minute_budget' };
    }
    if (this.hour.used >= this.options.perHour) {
      return { allowed: false, retryAfterMs: this.hour.start + HOUR_MS - now, reason: 'hour_budget' };
    }

    this.minute.used++;
    this.hour.used++;
    this.lastGrantAt = now;
    return { allowed: true };
  }

  recordRateLimited(now: number, retryAfterMs?: number): void {
    this.multiplier = Math.min(this.options.maxBackoffMultiplier, this.multiplier * 2);
    if (retryAfterMs !== undefined && retryAfterMs > 0) {
      this.blockedUntil = Math.max(this.blockedUntil ?? 0, now + retryAfterMs);
    }
  }

  recordSuccess(): void {
    this.multiplier = Math.max(1, this.multiplier - this.options.decayStep);
  }

  snapshot(now: number): RateBudgetSnapshot {
    this.roll(now);
    return {
      remaining_minute: Math.max(0, this.options.perMinute - this.minute.used),
      remaining_hour: Math.max(0, this.options.perHour - this.hour.used),
      minute_resets_at: this.minute.start + MINUTE_MS,
      hour_resets_at: this.hour.start + HOUR_MS,
      backoff_multiplier: this.multiplier,
      blocked_until: this.blockedUntil !== null && this.blockedUntil > now ? this.blockedUntil : null,
    };
  }

  private roll(now: number): void {
    const minuteStart = Math.floor(now / MINUTE_MS) * MINUTE_MS;
    if (minuteStart !== this.minute.start) this.minute = { start: minuteStart, used: 0 };
    const hourStart = Math.floor(now / HOUR_MS) * HOUR_MS;
    if (hourStart !== this.hour.start) this.hour = { start: hourStart, used: 0 };
  }
}
