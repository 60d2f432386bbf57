import type Database from 'better-sqlite3';
import type { Config } from '../shared/config.js';
import type { Clock } from '../shared/clock.js';
import { RateLimitedError, SourceUnavailableError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { SourceStateRegistry, SourceStateSnapshot } from '../resilience/registry.js';
import type { SourceAdapter, SkipReason } from '../source/adapter.js';
import { getCursor, saveCursor } from '../source/cursorDb.js';
import type { Processor } from '../processor/processor.js';
import type { EntityDraft } from '../processor/draft.js';
import type { Publisher, SubmitOutcome } from '../publish/publisher.js';
import type { ContentApi } from '../publish/apiClient.js';
import type { QueueCount, RetryQueue } from '../queue/retryQueue.js';
import { WorkPool, raceDeadline, withConcurrency } from './pool.js';

export type SourceRunStatus = 'completed' | 'skipped' | 'timed_out' | 'failed';

export interface SourceCycleReport {
  source: string;
  status: SourceRunStatus;
  records: number;
  drafts: number;
  filtered: number;
  truncated: boolean;
  skip_reason?: SkipReason;
  error?: string;
  duration_ms: number;
}

export interface ReplaySummary {
  due: number;
  succeeded: number;
  requeued: number;
  dead_lettered: number;
  /** Replays that threw instead of reporting an outcome. */
  errored: number;
}

export interface PublishSummary {
  published: number;
  queued: number;
  rejected: number;
}

export interface CycleReport {
  cycle: number;
  started_at: number;
  duration_ms: number;
  api_healthy: boolean;
  replay: ReplaySummary;
  sources: SourceCycleReport[];
  publish: PublishSummary;
}

export interface Heartbeat {
  cycle: number;
  at: number;
  uptime_ms: number;
  api_healthy: boolean;
}

export interface OrchestratorStatus {
  running: boolean;
  started_at: number | null;
  uptime_ms: number;
  cycles: number;
  last_heartbeat: Heartbeat | null;
  last_cycle: CycleReport | null;
  sources: Record<string, SourceStateSnapshot & { enabled: boolean }>;
  retry_queue: QueueCount[];
}

export interface OrchestratorDeps {
  config: Config;
  db: Database.Database;
  adapters: SourceAdapter[];
  registry: SourceStateRegistry;
  processor: Processor;
  publisher: Publisher;
  queue: RetryQueue;
  api: ContentApi;
  clock: Clock;
}

export interface RunOptions {
  maxCycles?: number;
}

interface SourceWork {
  report: SourceCycleReport;
  cursor: string | null;
}

/**
 * Drives collection cycles: a heartbeat, then due retries and every enabled
 * source side by side. Sources run under their own deadline; retries and
 * fresh drafts share one bounded publish pool, so a slow content API never
 * holds up fetching. Failure of one source or task never stops the cycle.
 */
export class Orchestrator {
  private cycles = 0;
  private startedAt: number | null = null;
  private running = false;
  private lastHeartbeat: Heartbeat | null = null;
  private lastCycle: CycleReport | null = null;

  constructor(private readonly deps: OrchestratorDeps) {}

  async runCycle(signal?: AbortSignal): Promise<CycleReport> {
    const { clock, config } = this.deps;
    const startedAt = clock.now();
    this.startedAt ??= startedAt;
    const cycle = ++this.cycles;

    const apiHealthy = await this.heartbeat(cycle);

    const publish: PublishSummary = { published: 0, queued: 0, rejected: 0 };
    const pool = new WorkPool(config.workers.publish_concurrency);
    const replay = this.replayDue(pool);
    const completed: SourceWork[] = [];
    const reports: SourceCycleReport[] = [];

    await withConcurrency(this.deps.adapters, config.workers.max_concurrent_sources, async (adapter) => {
      if (signal?.aborted) return;
      const work = await this.runSource(adapter, pool, publish, signal);
      reports.push(work.report);
      if (work.report.status === 'completed') completed.push(work);
    });

    await pool.drain();

    // Cursors advance only once everything handed to the publisher is settled.
    for (const work of completed) {
      saveCursor(this.deps.db, work.report.source, work.cursor);
    }

    const order = new Map(this.deps.adapters.map((a, i) => [a.source, i]));
    reports.sort((a, b) => (order.get(a.source) ?? 0) - (order.get(b.source) ?? 0));

    const report: CycleReport = {
      cycle,
      started_at: startedAt,
      duration_ms: clock.now() - startedAt,
      api_healthy: apiHealthy,
      replay,
      sources: reports,
      publish,
    };
    this.lastCycle = report;

    logger.info(
      {
        cycle,
        duration_ms: report.duration_ms,
        ...publish,
        replayed: replay.due,
        sources: reports.map((r) => `${r.source}:${r.status}`).join(' '),
      },
      'Cycle complete',
    );
    return report;
  }

  /**
   * Loop until `signal` aborts (or `maxCycles` have run). Unexpected cycle
   * failures are logged and followed by the error backoff.
   */
  async run(signal: AbortSignal, options: RunOptions = {}): Promise<void> {
    const { clock, config } = this.deps;
    this.running = true;
    let count = 0;
    logger.info({ sources: this.deps.adapters.map((a) => a.source) }, 'Collector started');

    try {
      while (!signal.aborted) {
        let delay = config.cycle.delay_ms;
        try {
          const report = await this.runCycle(signal);
          if (isIdle(report)) delay = Math.max(delay, config.cycle.idle_delay_ms);
        } catch (err) {
          logger.error({ error: errorMessage(err), stack: err instanceof Error ? err.stack : undefined }, 'Cycle failed');
          delay = config.cycle.error_backoff_ms;
        }

        count++;
        if (options.maxCycles !== undefined && count >= options.maxCycles) break;
        if (delay > 0 && !signal.aborted) await clock.sleep(delay, signal);
      }
    } finally {
      this.running = false;
      logger.info({ cycles: count }, 'Collector stopped');
    }
  }

  status(): OrchestratorStatus {
    const now = this.deps.clock.now();
    const enabled = new Set(this.deps.adapters.map((a) => a.source));
    const sources: OrchestratorStatus['sources'] = {};
    for (const [name, snapshot] of Object.entries(this.deps.registry.snapshot())) {
      sources[name] = { ...snapshot, enabled: enabled.has(name) };
    }
    return {
      running: this.running,
      started_at: this.startedAt,
      uptime_ms: this.startedAt === null ? 0 : now - this.startedAt,
      cycles: this.cycles,
      last_heartbeat: this.lastHeartbeat,
      last_cycle: this.lastCycle,
      sources,
      retry_queue: this.deps.queue.counts(),
    };
  }

  private async heartbeat(cycle: number): Promise<boolean> {
    const at = this.deps.clock.now();
    const apiHealthy = await this.deps.api.health();
    this.lastHeartbeat = { cycle, at, uptime_ms: at - (this.startedAt ?? at), api_healthy: apiHealthy };
    if (apiHealthy) {
      logger.info(this.lastHeartbeat, 'Heartbeat');
    } else {
      logger.warn(this.lastHeartbeat, 'Heartbeat: content API unhealthy');
    }
    return apiHealthy;
  }

  /**
   * Take the due retry tasks once and hand each to the publish pool, so no
   * task is replayed twice in a cycle. The summary fills in as replays settle.
   */
  private replayDue(pool: WorkPool): ReplaySummary {
    const { clock, publisher, queue } = this.deps;
    const due = queue.dequeueDue(clock.now());
    const summary: ReplaySummary = { due: due.length, succeeded: 0, requeued: 0, dead_lettered: 0, errored: 0 };

    for (const task of due) {
      pool.push(async () => {
        try {
          const outcome = await publisher.replay(task, clock.now());
          summary[outcome.status]++;
        } catch (err) {
          summary.errored++;
          logger.error({ id: task.id, natural_key: task.natural_key, error: errorMessage(err) }, 'Retry replay failed');
        }
      });
    }
    return summary;
  }

  private async runSource(
    adapter: SourceAdapter,
    pool: WorkPool,
    publish: PublishSummary,
    outer?: AbortSignal,
  ): Promise<SourceWork> {
    const { clock, config, registry } = this.deps;
    const started = clock.now();
    const controller = new AbortController();
    const onOuterAbort = () => controller.abort();
    outer?.addEventListener('abort', onOuterAbort, { once: true });

    const report: SourceCycleReport = {
      source: adapter.source,
      status: 'completed',
      records: 0,
      drafts: 0,
      filtered: 0,
      truncated: false,
      duration_ms: 0,
    };

    const result = await raceDeadline(
      this.collect(adapter, report, pool, publish, controller.signal),
      config.cycle.source_timeout_ms,
      clock,
    );
    outer?.removeEventListener('abort', onOuterAbort);
    report.duration_ms = clock.now() - started;

    switch (result.status) {
      case 'done':
        return { report, cursor: result.value };
      case 'timed_out':
        controller.abort();
        registry.breakerFor(adapter.source).recordFailure(clock.now());
        report.status = 'timed_out';
        report.error = `no result within ${config.cycle.source_timeout_ms}ms`;
        logger.warn({ source: adapter.source, timeout_ms: config.cycle.source_timeout_ms }, 'Source timed out');
        return { report, cursor: null };
      case 'failed': {
        const err = result.error;
        report.status = 'failed';
        report.error = errorMessage(err);
        if (err instanceof RateLimitedError) {
          logger.info({ source: adapter.source, retry_after_ms: err.retryAfterMs }, 'Source rate limited');
        } else if (err instanceof SourceUnavailableError) {
          logger.warn({ source: adapter.source, error: err.message }, 'Source unavailable');
        } else {
          logger.error(
            { source: adapter.source, error: report.error, stack: err instanceof Error ? err.stack : undefined },
            'Source failed unexpectedly',
          );
        }
        return { report, cursor: null };
      }
    }
  }

  /** Fetch, then process records in order, handing drafts to the pool. Resolves to the next cursor. */
  private async collect(
    adapter: SourceAdapter,
    report: SourceCycleReport,
    pool: WorkPool,
    publish: PublishSummary,
    signal: AbortSignal,
  ): Promise<string | null> {
    const cursor = getCursor(this.deps.db, adapter.source);
    const fetched = await adapter.fetch(cursor, signal);

    if (fetched.status === 'skipped') {
      report.status = 'skipped';
      report.skip_reason = fetched.reason;
      logger.debug({ source: adapter.source, reason: fetched.reason }, 'Source skipped');
      return cursor;
    }

    report.records = fetched.records.length;
    report.truncated = fetched.truncated;
    const batchSize = this.deps.config.publish.batch_size;
    let batch: EntityDraft[] = [];

    for (const record of fetched.records) {
      if (signal.aborted) return cursor;
      const outcome = await this.deps.processor.process(record);
      if (signal.aborted) return cursor;
      if (outcome.status === 'filtered') {
        report.filtered++;
        continue;
      }
      report.drafts++;
      if (batchSize <= 1) {
        this.enqueuePublish(pool, publish, [outcome.draft]);
      } else {
        batch.push(outcome.draft);
        if (batch.length >= batchSize) {
          this.enqueuePublish(pool, publish, batch);
          batch = [];
        }
      }
    }
    if (batch.length > 0) this.enqueuePublish(pool, publish, batch);

    return fetched.cursor;
  }

  private enqueuePublish(pool: WorkPool, publish: PublishSummary, drafts: EntityDraft[]): void {
    const { publisher, clock } = this.deps;
    pool.push(async () => {
      const outcomes: SubmitOutcome[] =
        drafts.length === 1 && drafts[0]
          ? [await publisher.submit(drafts[0], clock.now())]
          : await publisher.submitBatch(drafts, clock.now());
      for (const outcome of outcomes) publish[outcome.status]++;
    });
  }
}

function isIdle(report: CycleReport): boolean {
  return report.replay.due === 0 && report.sources.every((s) => s.records === 0);
}
