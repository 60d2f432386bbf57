import type { Config, SourceDefinition } from '../shared/config.js';
import type { Clock } from '../shared/clock.js';
import { logger } from '../shared/logger.js';
import { ConfigError } from '../shared/errors.js';
import { CircuitBreaker, type CircuitSnapshot } from './circuitBreaker.js';
import { RateLimiter, type RateBudgetSnapshot } from './rateLimiter.js';

export type AdmitResult =
  | { allowed: true }
  | { allowed: false; reason: 'circuit_open' | 'rate_limited'; retryAfterMs?: number };

/**
 * The handle an adapter holds on its own source's breaker and limiter.
 * Every method is synchronous, so transitions never interleave.
 */
export class SourceGuard {
  constructor(
    readonly source: string,
    private readonly breaker: CircuitBreaker,
    private readonly limiter: RateLimiter,
    private readonly clock: Clock,
  ) {}

  /** Gate for the first network contact of a fetch: breaker first, then budget. */
  admit(): AdmitResult {
    const now = this.clock.now();
    if (!this.breaker.canProceed(now)) {
      return { allowed: false, reason: 'circuit_open' };
    }
    const grant = this.limiter.tryAcquire(now);
    if (!grant.allowed) {
      return { allowed: false, reason: 'rate_limited', retryAfterMs: grant.retryAfterMs };
    }
    return { allowed: true };
  }

  /** Budget check for follow-up requests within an already admitted fetch. */
  acquire(): boolean {
    return this.limiter.tryAcquire(this.clock.now()).allowed;
  }

  success(): void {
    this.breaker.recordSuccess();
    this.limiter.recordSuccess();
  }

  failure(): void {
    this.breaker.recordFailure(this.clock.now());
  }

  rateLimited(retryAfterMs?: number): void {
    this.limiter.recordRateLimited(this.clock.now(), retryAfterMs);
  }
}

interface SourceState {
  breaker: CircuitBreaker;
  limiter: RateLimiter;
  guard: SourceGuard;
}

export interface SourceStateSnapshot {
  circuit: CircuitSnapshot;
  rate: RateBudgetSnapshot;
}

/**
 * Owns exactly one circuit breaker and one rate limiter per configured source.
 */
export class SourceStateRegistry {
  private readonly states = new Map<string, SourceState>();

  constructor(
    sources: SourceDefinition[],
    rateConfig: Config['rate_limit'],
    private readonly clock: Clock,
  ) {
    for (const source of sources) {
      const breaker = new CircuitBreaker(
        {
          failureThreshold: source.circuit_breaker.failure_threshold,
          successThreshold: source.circuit_breaker.success_threshold,
          timeoutMs: source.circuit_breaker.timeout_ms,
        },
        (from, to) => {
          if (to === 'open') {
            logger.warn({ source: source.name, from, to }, 'Circuit breaker opened');
          } else {
            logger.info({ source: source.name, from, to }, 'Circuit breaker state change');
          }
        },
      );
      const limiter = new RateLimiter({
        perMinute: source.rate_limit.per_minute,
        perHour: source.rate_limit.per_hour,
        maxBackoffMultiplier: rateConfig.max_backoff_multiplier,
        decayStep: rateConfig.decay_step,
      });
      this.states.set(source.name, {
        breaker,
        limiter,
        guard: new SourceGuard(source.name, breaker, limiter, clock),
      });
    }
  }

  guardFor(source: string): SourceGuard {
    return this.get(source).guard;
  }

  breakerFor(source: string): CircuitBreaker {
    return this.get(source).breaker;
  }

  limiterFor(source: string): RateLimiter {
    return this.get(source).limiter;
  }

  names(): string[] {
    return [...this.states.keys()];
  }

  snapshot(): Record<string, SourceStateSnapshot> {
    const now = this.clock.now();
    const out: Record<string, SourceStateSnapshot> = {};
    for (const [name, state] of this.states) {
      out[name] = { circuit: state.breaker.snapshot(), rate: state.limiter.snapshot(now) };
    }
    return out;
  }

  private get(source: string): SourceState {
    const state = this.states.get(source);
    if (!state) {
      throw new ConfigError(`Unknown source: ${source}`, { source });
    }
    return state;
  }
}
