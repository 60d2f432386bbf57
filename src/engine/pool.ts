import type { Clock } from '../shared/clock.js';
import { errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

/**
 * Run `fn` over `items` with at most `concurrency` in flight.
 */
export async function withConcurrency<T>(
  items: T[],
  concurrency: number,
  fn: (item: T) => Promise<void>,
): Promise<void> {
  const queue = [...items];
  const workers: Promise<void>[] = [];

  for (let i = 0; i < Math.min(concurrency, queue.length); i++) {
    workers.push(
      (async () => {
        while (queue.length > 0) {
          const item = queue.shift();
          if (item !== undefined) {
            await fn(item);
          }
        }
      })(),
    );
  }

  await Promise.all(workers);
}

type Job = () => Promise<void>;

/**
 * Bounded pool that accepts jobs while it is running. `drain()` resolves
 * once every job pushed so far (and any they push) has finished.
 */
export class WorkPool {
  private readonly backlog: Job[] = [];
  private active = 0;
  private idleWaiters: Array<() => void> = [];

  constructor(private readonly concurrency: number) {}

  get pending(): number {
    return this.backlog.length + this.active;
  }

  push(job: Job): void {
    this.backlog.push(job);
    this.pump();
  }

  drain(): Promise<void> {
    if (this.pending === 0) return Promise.resolve();
    return new Promise<void>((resolve) => this.idleWaiters.push(resolve));
  }

  private pump(): void {
    while (this.active < this.concurrency && this.backlog.length > 0) {
      const job = this.backlog.shift();
      if (!job) break;
      this.active++;
      void this.run(job);
    }
  }

  private async run(job: Job): Promise<void> {
    try {
      await job();
    } catch (err) {
      logger.error({ error: errorMessage(err) }, 'Pool job failed');
    } finally {
      this.active--;
      this.pump();
      if (this.pending === 0) {
        const waiters = this.idleWaiters;
        this.idleWaiters = [];
        for (const resolve of waiters) resolve();
      }
    }
  }
}

export type DeadlineResult<T> =
  | { status: 'done'; value: T }
  | { status: 'failed'; error: unknown }
  | { status: 'timed_out' };

/**
 * Race `work` against a clock-driven deadline. The work is not cancelled
 * here; callers abort it through their own signal on `timed_out`.
 */
export async function raceDeadline<T>(work: Promise<T>, ms: number, clock: Clock): Promise<DeadlineResult<T>> {
  const stopTimer = new AbortController();
  const settled = work.then(
    (value): DeadlineResult<T> => ({ status: 'done', value }),
    (error: unknown): DeadlineResult<T> => ({ status: 'failed', error }),
  );
  const deadline = clock
    .sleep(ms, stopTimer.signal)
    .then((): DeadlineResult<T> => ({ status: 'timed_out' }));

  try {
    return await Promise.race([settled, deadline]);
  } finally {
    stopTimer.abort();
  }
}
