import type Database from 'better-sqlite3';
import { DbError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { generateId } from '../shared/utils.js';
import { EntityDraftSchema, type EntityDraft } from '../processor/draft.js';

export const DEFAULT_RETRY_DELAYS_MS = [60_000, 300_000, 900_000, 3_600_000];

export type TaskKind = 'publish';
export type TaskStatus = 'pending' | 'dead_letter';

export interface FailedTask {
  id: string;
  kind: TaskKind;
  source: string;
  natural_key: string;
  payload: EntityDraft;
  last_error: string;
  attempts: number;
  /** Value of `attempts` when the current backoff schedule began. */
  schedule_base: number;
  next_retry_at: number;
  status: TaskStatus;
  created_at: number;
  updated_at: number;
}

export interface NewTask {
  kind: TaskKind;
  source: string;
  payload: EntityDraft;
}

export interface QueueCount {
  source: string;
  status: TaskStatus;
  count: number;
}

interface TaskRow {
  id: string;
  kind: string;
  source: string;
  natural_key: string;
  payload: string;
  last_error: string;
  attempts: number;
  schedule_base: number;
  next_retry_at: number;
  status: string;
  created_at: number;
  updated_at: number;
}

type ReadResult = { ok: true; task: FailedTask } | { ok: false; error: string };

function readRow(row: TaskRow): ReadResult {
  let raw: unknown;
  try {
    raw = JSON.parse(row.payload);
  } catch (err) {
    return { ok: false, error: errorMessage(err) };
  }
  const parsed = EntityDraftSchema.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, error: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ') };
  }
  return {
    ok: true,
    task: {
      id: row.id,
      kind: 'publish',
      source: row.source,
      natural_key: row.natural_key,
      payload: parsed.data,
      last_error: row.last_error,
      attempts: row.attempts,
      schedule_base: row.schedule_base,
      next_retry_at: row.next_retry_at,
      status: row.status === 'dead_letter' ? 'dead_letter' : 'pending',
      created_at: row.created_at,
      updated_at: row.updated_at,
    },
  };
}

/**
 * Durable queue of failed publish attempts with a fixed backoff schedule.
 *
 * `delaysMs[n]` is the wait after the (n+1)-th failed attempt of the current
 * schedule. Once every delay has been used, the next failure moves the task to
 * the dead letters. At most one pending task exists per natural key. Attempt
 * counts never go down and each reschedule lands strictly later.
 */
export class RetryQueue {
  constructor(
    private readonly db: Database.Database,
    private readonly delaysMs: number[] = DEFAULT_RETRY_DELAYS_MS,
  ) {
    if (delaysMs.length === 0) {
      throw new DbError('Retry schedule needs at least one delay');
    }
  }

  get maxAttempts(): number {
    return this.delaysMs.length;
  }

  enqueue(task: NewTask, error: string, now: number): FailedTask {
    const naturalKey = task.payload.natural_key;
    const existing = this.db
      .prepare<[string], TaskRow>(`SELECT * FROM failed_tasks WHERE natural_key = ? AND status = 'pending'`)
      .get(naturalKey);

    if (existing) {
      // Keep the schedule, take the newer draft.
      this.db
        .prepare<[string, string, number, string]>(
          'UPDATE failed_tasks SET payload = ?, last_error = ?, updated_at = ? WHERE id = ?',
        )
        .run(JSON.stringify(task.payload), error, now, existing.id);
      return this.require(existing.id);
    }

    const id = generateId();
    this.db
      .prepare<[string, string, string, string, string, string, number, number, number]>(
        `INSERT INTO failed_tasks
           (id, kind, source, natural_key, payload, last_error, attempts, next_retry_at, status, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, 1, ?, 'pending', ?, ?)`,
      )
      .run(id, task.kind, task.source, naturalKey, JSON.stringify(task.payload), error, now + this.delayFor(1), now, now);

    logger.debug({ id, natural_key: naturalKey, source: task.source }, 'Task enqueued for retry');
    return this.require(id);
  }

  /**
   * Pending tasks whose retry time has come, earliest first. Does not remove
   * them. A row whose payload no longer parses is moved to the dead letters.
   */
  dequeueDue(now: number, limit = 100): FailedTask[] {
    const rows = this.db
      .prepare<[number, number], TaskRow>(
        `SELECT * FROM failed_tasks
         WHERE status = 'pending' AND next_retry_at <= ?
         ORDER BY next_retry_at ASC, created_at ASC
         LIMIT ?`,
      )
      .all(now, limit);

    const due: FailedTask[] = [];
    for (const row of rows) {
      const read = readRow(row);
      if (read.ok) {
        due.push(read.task);
        continue;
      }
      this.db
        .prepare<[string, number, string]>(
          `UPDATE failed_tasks SET last_error = ?, status = 'dead_letter', updated_at = ? WHERE id = ?`,
        )
        .run(`Corrupt payload: ${read.error}`, now, row.id);
      logger.error({ id: row.id, natural_key: row.natural_key, error: read.error }, 'Corrupt retry task dead-lettered');
    }
    return due;
  }

  acknowledge(id: string): boolean {
    return this.db.prepare<[string]>('DELETE FROM failed_tasks WHERE id = ?').run(id).changes > 0;
  }

  /** Drop the pending task for an entity that has since been published fresh. */
  acknowledgeKey(naturalKey: string): boolean {
    return (
      this.db
        .prepare<[string]>(`DELETE FROM failed_tasks WHERE natural_key = ? AND status = 'pending'`)
        .run(naturalKey).changes > 0
    );
  }

  /**
   * Count one more failed attempt. Returns the updated task, which is in the
   * dead letters once the schedule is exhausted.
   */
  recordFailure(id: string, error: string, now: number): FailedTask {
    const task = this.require(id);
    const attempts = task.attempts + 1;
    const step = attempts - task.schedule_base;

    if (step > this.delaysMs.length) {
      this.db
        .prepare<[number, string, number, string]>(
          `UPDATE failed_tasks SET attempts = ?, last_error = ?, status = 'dead_letter', updated_at = ? WHERE id = ?`,
        )
        .run(attempts, error, now, id);
      return this.require(id);
    }

    const next = Math.max(now + this.delayFor(step), task.next_retry_at + 1);
    this.db
      .prepare<[number, string, number, number, string]>(
        'UPDATE failed_tasks SET attempts = ?, last_error = ?, next_retry_at = ?, updated_at = ? WHERE id = ?',
      )
      .run(attempts, error, next, now, id);
    return this.require(id);
  }

  /** Move straight to the dead letters (terminal failure on replay). */
  giveUp(id: string, error: string, now: number): FailedTask {
    this.require(id);
    this.db
      .prepare<[string, number, string]>(
        `UPDATE failed_tasks SET last_error = ?, status = 'dead_letter', updated_at = ? WHERE id = ?`,
      )
      .run(error, now, id);
    return this.require(id);
  }

  /**
   * Put a dead letter back on the schedule from the start. It becomes due now
   * (or just after its last retry time) and keeps its attempt count. Returns
   * null when the task does not exist or another pending task already covers
   * its key.
   */
  requeue(id: string, now: number): FailedTask | null {
    const task = this.get(id);
    if (!task || task.status !== 'dead_letter') return null;

    const clash = this.db
      .prepare<[string], { id: string }>(`SELECT id FROM failed_tasks WHERE natural_key = ? AND status = 'pending'`)
      .get(task.natural_key);
    if (clash) return null;

    this.db
      .prepare<[number, number, string]>(
        `UPDATE failed_tasks
         SET schedule_base = attempts, next_retry_at = ?, status = 'pending', updated_at = ?
         WHERE id = ?`,
      )
      .run(Math.max(now, task.next_retry_at + 1), now, id);
    return this.require(id);
  }

  get(id: string): FailedTask | null {
    const row = this.db.prepare<[string], TaskRow>('SELECT * FROM failed_tasks WHERE id = ?').get(id);
    if (!row) return null;
    const read = readRow(row);
    if (!read.ok) throw new DbError(`Corrupt retry payload for task ${id}`, { id, error: read.error });
    return read.task;
  }

  listPending(limit = 100): FailedTask[] {
    return this.list('pending', limit);
  }

  listDeadLetters(limit = 100): FailedTask[] {
    return this.list('dead_letter', limit);
  }

  counts(): QueueCount[] {
    return this.db
      .prepare<[], { source: string; status: string; count: number }>(
        'SELECT source, status, COUNT(*) AS count FROM failed_tasks GROUP BY source, status ORDER BY source, status',
      )
      .all()
      .map((row) => ({
        source: row.source,
        status: row.status === 'dead_letter' ? 'dead_letter' : 'pending',
        count: row.count,
      }));
  }

  private list(status: TaskStatus, limit: number): FailedTask[] {
    return this.db
      .prepare<[string, number], TaskRow>(
        'SELECT * FROM failed_tasks WHERE status = ? ORDER BY updated_at DESC LIMIT ?',
      )
      .all(status, limit)
      .flatMap((row) => {
        const read = readRow(row);
        if (read.ok) return [read.task];
        logger.warn({ id: row.id, error: read.error }, 'Skipping corrupt retry task');
        return [];
      });
  }

  private delayFor(step: number): number {
    const delays = this.delaysMs;
    return delays[Math.min(step, delays.length) - 1] ?? delays[delays.length - 1] ?? 0;
  }

  private require(id: string): FailedTask {
    const task = this.get(id);
    if (!task) throw new DbError(`Retry task not found: ${id}`, { id });
    return task;
  }
}
