import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import Database from 'better-sqlite3';
import { runMigrations } from '../../db/migrate.js';
import { DbError } from '../../shared/errors.js';
import type { EntityDraft } from '../../processor/draft.js';
import { RetryQueue } from '../retryQueue.js';

let db: Database.Database;
let queue: RetryQueue;

function draft(key: string, name = 'Test Wrestler'): EntityDraft {
  return {
    kind: 'wrestler',
    natural_key: key,
    fields: { name, slug: 'test-wrestler' },
    provenance: { source: 'wikipedia', url: 'https://example.org/wiki/Test' },
  };
}

function enqueue(key: string, now: number, name?: string) {
  return queue.enqueue({ kind: 'publish', source: 'wikipedia', payload: draft(key, name) }, 'HTTP 503', now);
}

beforeEach(() => {
  db = new Database(':memory:');
  runMigrations(db);
  queue = new RetryQueue(db, [60_000, 300_000, 900_000, 3_600_000]);
});

afterEach(() => {
  db.close();
});

describe('RetryQueue.enqueue', () => {
  it('schedules the first retry after the first delay', () => {
    const task = enqueue('wrestler:a', 1000);
    expect(task).toMatchObject({
      kind: 'publish',
      source: 'wikipedia',
      natural_key: 'wrestler:a',
      attempts: 1,
      next_retry_at: 61_000,
      status: 'pending',
      last_error: 'HTTP 503',
    });
    expect(task.payload).toEqual(draft('wrestler:a'));
  });

  it('keeps one pending task per natural key and takes the newer draft', () => {
    const first = enqueue('wrestler:a', 1000, 'Old Name');
    const second = enqueue('wrestler:a', 5000, 'New Name');
    expect(second.id).toBe(first.id);
    expect(second.next_retry_at).toBe(61_000);
    expect(second.payload.fields['name']).toBe('New Name');
    expect(queue.listPending()).toHaveLength(1);
  });
});

describe('RetryQueue.dequeueDue', () => {
  it('returns only due tasks, earliest first, without removing them', () => {
    enqueue('wrestler:late', 10_000);
    enqueue('wrestler:early', 0);
    enqueue('wrestler:future', 500_000);

    const due = queue.dequeueDue(70_000);
    expect(due.map((t) => t.natural_key)).toEqual(['wrestler:early', 'wrestler:late']);
    expect(queue.dequeueDue(70_000)).toHaveLength(2);
  });

  it('dead-letters a row whose payload no longer parses and returns the rest', () => {
    db.prepare(
      `INSERT INTO failed_tasks
         (id, kind, source, natural_key, payload, last_error, attempts, next_retry_at, status, created_at, updated_at)
       VALUES ('bad', 'publish', 'wikipedia', 'wrestler:bad', '{"oops":1}', 'HTTP 503', 1, 0, 'pending', 0, 0)`,
    ).run();
    enqueue('wrestler:good', 0);

    const due = queue.dequeueDue(70_000);
    expect(due.map((t) => t.natural_key)).toEqual(['wrestler:good']);

    const row = db
      .prepare<[], { status: string; last_error: string; updated_at: number }>(
        `SELECT status, last_error, updated_at FROM failed_tasks WHERE id = 'bad'`,
      )
      .get();
    expect(row?.status).toBe('dead_letter');
    expect(row?.last_error).toMatch(/^Corrupt payload: /);
    expect(row?.updated_at).toBe(70_000);
    expect(queue.dequeueDue(70_000)).toHaveLength(1);
    expect(queue.listDeadLetters()).toEqual([]);
  });

  it('dead-letters a row whose payload is not JSON', () => {
    db.prepare(
      `INSERT INTO failed_tasks
         (id, kind, source, natural_key, payload, last_error, attempts, next_retry_at, status, created_at, updated_at)
       VALUES ('bad', 'publish', 'wikipedia', 'wrestler:bad', '{not json', 'HTTP 503', 1, 0, 'pending', 0, 0)`,
    ).run();
    expect(queue.dequeueDue(10)).toEqual([]);
    expect(queue.counts()).toEqual([{ source: 'wikipedia', status: 'dead_letter', count: 1 }]);
    expect(() => queue.get('bad')).toThrow(DbError);
  });

  it('skips dead letters', () => {
    const task = enqueue('wrestler:a', 0);
    queue.giveUp(task.id, 'HTTP 404', 10);
    expect(queue.dequeueDue(Number.MAX_SAFE_INTEGER)).toEqual([]);
  });
});

describe('RetryQueue.acknowledge', () => {
  it('removes the task', () => {
    const task = enqueue('wrestler:a', 0);
    expect(queue.acknowledge(task.id)).toBe(true);
    expect(queue.get(task.id)).toBeNull();
    expect(queue.acknowledge(task.id)).toBe(false);
  });

  it('removes a pending task by natural key', () => {
    enqueue('wrestler:a', 0);
    expect(queue.acknowledgeKey('wrestler:a')).toBe(true);
    expect(queue.listPending()).toEqual([]);
  });
});

describe('RetryQueue.recordFailure', () => {
  it('walks the delay schedule then dead-letters', () => {
    const task = enqueue('wrestler:a', 0);
    expect(task.next_retry_at).toBe(60_000);

    const t2 = queue.recordFailure(task.id, 'HTTP 502', 60_000);
    expect([t2.attempts, t2.next_retry_at, t2.status]).toEqual([2, 360_000, 'pending']);

    const t3 = queue.recordFailure(task.id, 'HTTP 502', 360_000);
    expect([t3.attempts, t3.next_retry_at, t3.status]).toEqual([3, 1_260_000, 'pending']);

    const t4 = queue.recordFailure(task.id, 'HTTP 502', 1_260_000);
    expect([t4.attempts, t4.next_retry_at, t4.status]).toEqual([4, 4_860_000, 'pending']);

    const dead = queue.recordFailure(task.id, 'timeout', 4_860_000);
    expect(dead.status).toBe('dead_letter');
    expect(dead.attempts).toBe(5);
    expect(dead.last_error).toBe('timeout');
    expect(queue.listDeadLetters().map((t) => t.id)).toEqual([task.id]);
  });

  it('never schedules a retry earlier than the previous one', () => {
    const task = enqueue('wrestler:a', 1_000_000);
    const next = queue.recordFailure(task.id, 'HTTP 500', 0);
    expect(next.next_retry_at).toBe(1_060_001);
  });

  it('throws DbError for an unknown id', () => {
    expect(() => queue.recordFailure('missing', 'x', 0)).toThrow(DbError);
  });
});

describe('RetryQueue.requeue', () => {
  it('puts a dead letter back on the schedule without lowering its attempts', () => {
    const task = enqueue('wrestler:a', 0);
    queue.giveUp(task.id, 'HTTP 404', 100);
    const again = queue.requeue(task.id, 200);
    // Due again, but never earlier than the retry time it already had.
    expect(again).toMatchObject({ status: 'pending', attempts: 1, schedule_base: 1, next_retry_at: 60_001 });
  });

  it('restarts the delay schedule for an exhausted task', () => {
    const task = enqueue('wrestler:a', 0);
    for (const at of [60_000, 360_000, 1_260_000, 4_860_000]) queue.recordFailure(task.id, 'HTTP 502', at);
    expect(queue.get(task.id)).toMatchObject({ status: 'dead_letter', attempts: 5 });

    const again = queue.requeue(task.id, 5_000_000);
    expect(again).toMatchObject({ status: 'pending', attempts: 5, schedule_base: 5, next_retry_at: 5_000_000 });

    const next = queue.recordFailure(task.id, 'HTTP 502', 5_000_000);
    expect([next.attempts, next.next_retry_at, next.status]).toEqual([6, 5_060_000, 'pending']);

    for (const at of [5_060_000, 5_360_000, 6_260_000]) queue.recordFailure(task.id, 'HTTP 502', at);
    const dead = queue.recordFailure(task.id, 'HTTP 502', 9_860_000);
    expect([dead.attempts, dead.status]).toEqual([10, 'dead_letter']);
  });

  it('refuses when the entity already has a pending task', () => {
    const task = enqueue('wrestler:a', 0);
    queue.giveUp(task.id, 'HTTP 404', 100);
    enqueue('wrestler:a', 150);
    expect(queue.requeue(task.id, 200)).toBeNull();
  });
});

describe('RetryQueue.counts', () => {
  it('groups by source and status', () => {
    enqueue('wrestler:a', 0);
    const b = enqueue('wrestler:b', 0);
    queue.giveUp(b.id, 'HTTP 404', 0);
    enqueue('wrestler:c', 0);
    expect(queue.counts()).toEqual([
      { source: 'wikipedia', status: 'dead_letter', count: 1 },
      { source: 'wikipedia', status: 'pending', count: 2 },
    ]);
  });
});

describe('RetryQueue durability', () => {
  it('survives reopening the database file', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'ringfeed-queue-'));
    const file = path.join(dir, 'queue.db');

    const first = new Database(file);
    runMigrations(first);
    const task = new RetryQueue(first).enqueue(
      { kind: 'publish', source: 'wikipedia', payload: draft('wrestler:a') },
      'HTTP 503',
      0,
    );
    first.close();

    const second = new Database(file);
    expect(new RetryQueue(second).get(task.id)?.payload).toEqual(draft('wrestler:a'));
    second.close();
    fs.rmSync(dir, { recursive: true, force: true });
  });
});
