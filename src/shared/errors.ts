export class RingfeedError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'RingfeedError';
  }
}

export class ConfigError extends RingfeedError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
    this.name = 'ConfigError';
  }
}

export class DbError extends RingfeedError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'DB_ERROR', details);
    this.name = 'DbError';
  }
}

/** Transport failure talking to a source. Counts against its circuit breaker. */
export class SourceUnavailableError extends RingfeedError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'SOURCE_UNAVAILABLE', details);
    this.name = 'SourceUnavailableError';
  }
}

/** The remote side asked us to slow down. Backs off the rate limiter only. */
export class RateLimitedError extends RingfeedError {
  constructor(
    message: string,
    public readonly retryAfterMs?: number,
    details?: Record<string, unknown>,
  ) {
    super(message, 'RATE_LIMITED', details);
    this.name = 'RateLimitedError';
  }
}

export class ValidationRejectedError extends RingfeedError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'VALIDATION_REJECTED', details);
    this.name = 'ValidationRejectedError';
  }
}

export class PublishTransientError extends RingfeedError {
  constructor(
    message: string,
    public readonly status?: number,
    details?: Record<string, unknown>,
  ) {
    super(message, 'PUBLISH_TRANSIENT', details);
    this.name = 'PublishTransientError';
  }
}

export class PublishTerminalError extends RingfeedError {
  constructor(
    message: string,
    public readonly status?: number,
    details?: Record<string, unknown>,
  ) {
    super(message, 'PUBLISH_TERMINAL', details);
    this.name = 'PublishTerminalError';
  }
}

export class RetryExhaustedError extends RingfeedError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'RETRY_EXHAUSTED', details);
    this.name = 'RetryExhaustedError';
  }
}

export type PublishError = PublishTransientError | PublishTerminalError | ValidationRejectedError;

export function isRetryablePublishError(err: unknown): boolean {
  return err instanceof PublishTransientError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
