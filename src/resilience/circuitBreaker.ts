/**
 * Per-source failure isolation.
 *
 *   closed    normal operation; consecutive failures counted
 *   open      source not contacted until `timeoutMs` has elapsed since opening
 *   half_open probing; `successThreshold` successes close, any failure reopens
 */

export type CircuitStateName = 'closed' | 'open' | 'half_open';

export interface CircuitBreakerOptions {
  failureThreshold: number;
  successThreshold: number;
  timeoutMs: number;
}

export interface CircuitSnapshot {
  state: CircuitStateName;
  consecutive_failures: number;
  consecutive_successes: number;
  opened_at: number | null;
}

export type StateChangeListener = (from: CircuitStateName, to: CircuitStateName) => void;

export const DEFAULT_BREAKER_OPTIONS: CircuitBreakerOptions = {
  failureThreshold: 5,
  successThreshold: 2,
  timeoutMs: 300_000,
};

export class CircuitBreaker {
  private state: CircuitStateName = 'closed';
  private failures = 0;
  private successes = 0;
  private openedAt: number | null = null;
  private readonly options: CircuitBreakerOptions;

  constructor(
    options: Partial<CircuitBreakerOptions> = {},
    private readonly onStateChange?: StateChangeListener,
  ) {
    this.options = { ...DEFAULT_BREAKER_OPTIONS, ...options };
  }

  get currentState(): CircuitStateName {
    return this.state;
  }

  canProceed(now: number): boolean {
    if (this.state !== 'open') return true;

    if (this.openedAt !== null && now - this.openedAt >= this.options.timeoutMs) {
      this.transition('half_open');
      this.successes = 0;
      return true;
    }
    return false;
  }

  recordSuccess(): void {
    if (this.state === 'closed') {
      this.failures = 0;
      return;
    }
    if (this.state === 'half_open') {
      this.successes++;
      if (this.successes >= this.options.successThreshold) {
        this.transition('closed');
        this.failures = 0;
        this.successes = 0;
        this.openedAt = null;
      }
    }
    // A success reported while open (a late response) does not close the circuit.
  }

  recordFailure(now: number): void {
    this.failures++;

    if (this.state === 'half_open') {
      this.successes = 0;
      this.openedAt = now;
      this.transition('open');
      return;
    }

    if (this.state === 'closed' && this.failures >= this.options.failureThreshold) {
      this.openedAt = now;
      this.transition('open');
    }
  }

  reset(): void {
    this.transition('closed');
    this.failures = 0;
    this.successes = 0;
    this.openedAt = null;
  }

  snapshot(): CircuitSnapshot {
    return {
      state: this.state,
      consecutive_failures: this.failures,
      consecutive_successes: this.successes,
      opened_at: this.openedAt,
    };
  }

  private transition(to: CircuitStateName): void {
    const from = this.state;
    this.state = to;
    if (from !== to) this.onStateChange?.(from, to);
  }
}
