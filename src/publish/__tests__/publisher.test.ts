import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { runMigrations } from '../../db/migrate.js';
import type { EntityDraft } from '../../processor/draft.js';
import { RetryQueue } from '../../queue/retryQueue.js';
import {
  PublishTerminalError,
  PublishTransientError,
  RetryExhaustedError,
  ValidationRejectedError,
} from '../../shared/errors.js';
import { getPublished } from '../ledgerDb.js';
import { Publisher } from '../publisher.js';
import { CreateOnlyContentApi } from './createOnlyContentApi.js';
import { FakeContentApi } from './fakeContentApi.js';

const NOW = 1_700_000_000_000;

let db: Database.Database;
let api: FakeContentApi;
let queue: RetryQueue;
let publisher: Publisher;

function wrestler(slug: string, about: string | null = null): EntityDraft {
  return {
    kind: 'wrestler',
    natural_key: `wrestler:${slug}`,
    fields: { name: slug, slug, about },
    provenance: { source: 'wiki', url: `https://en.example.org/wiki/${slug}` },
  };
}

beforeEach(() => {
  db = new Database(':memory:');
  runMigrations(db);
  api = new FakeContentApi();
  queue = new RetryQueue(db, [60_000, 300_000, 900_000, 3_600_000]);
  publisher = new Publisher(api, queue, db);
});

afterEach(() => {
  db.close();
});

describe('Publisher.submit', () => {
  it('publishes and records the entity in the ledger', async () => {
    const outcome = await publisher.submit(wrestler('john-doe'), NOW);
    expect(outcome).toMatchObject({ status: 'published', ack: { id: '1', created: true } });
    expect(getPublished(db, 'wrestler:john-doe')).toMatchObject({ remote_id: '1', kind: 'wrestler', source: 'wiki' });
  });

  it('does not resend an unchanged draft', async () => {
    await publisher.submit(wrestler('john-doe'), NOW);
    const again = await publisher.submit(wrestler('john-doe'), NOW);
    expect(again).toMatchObject({ status: 'published', ack: { id: '1', created: false } });
    expect(api.upserts).toEqual(['wrestler:john-doe']);
  });

  it('updates the same entity when the draft changes', async () => {
    await publisher.submit(wrestler('john-doe'), NOW);
    const changed = await publisher.submit(wrestler('john-doe', 'Now with a biography.'), NOW);
    expect(changed).toMatchObject({ status: 'published', ack: { id: '1', created: false } });
    expect(api.entities.size).toBe(1);
    expect(api.entities.get('wrestler:john-doe')?.fields['about']).toBe('Now with a biography.');
  });

  it('queues transient failures', async () => {
    api.failNext(new PublishTransientError('Content API error: 503', 503));
    const outcome = await publisher.submit(wrestler('john-doe'), NOW);
    expect(outcome.status).toBe('queued');
    expect(queue.listPending()).toMatchObject([
      { natural_key: 'wrestler:john-doe', attempts: 1, next_retry_at: NOW + 60_000, last_error: 'Content API error: 503' },
    ]);
    expect(getPublished(db, 'wrestler:john-doe')).toBeNull();
  });

  it('treats unclassified errors as transient', async () => {
    api.upsert = async () => {
      throw new Error('socket hang up');
    };
    expect((await publisher.submit(wrestler('john-doe'), NOW)).status).toBe('queued');
  });

  it('rejects validation failures without queueing', async () => {
    api.failNext(new ValidationRejectedError('name is required', { status: 422 }));
    const outcome = await publisher.submit(wrestler('john-doe'), NOW);
    expect(outcome.status).toBe('rejected');
    expect(queue.listPending()).toEqual([]);
  });

  it('clears a pending retry once the entity is published fresh', async () => {
    api.failNext(new PublishTransientError('timeout'));
    await publisher.submit(wrestler('john-doe'), NOW);
    await publisher.submit(wrestler('john-doe'), NOW + 1000);
    expect(queue.listPending()).toEqual([]);
  });
});

describe('Publisher.submitBatch', () => {
  it('skips known drafts and maps per-item results', async () => {
    await publisher.submit(wrestler('a'), NOW);
    api.itemErrors.set('wrestler:b', new PublishTransientError('busy', 503));

    const outcomes = await publisher.submitBatch([wrestler('a'), wrestler('b'), wrestler('c')], NOW);

    expect(api.bulkCalls).toEqual([['wrestler:b', 'wrestler:c']]);
    expect(outcomes.map((o) => o.status)).toEqual(['published', 'queued', 'published']);
    expect(outcomes[2]).toMatchObject({ ack: { id: '2', created: true } });
    expect(queue.listPending().map((t) => t.natural_key)).toEqual(['wrestler:b']);
  });

  it('queues every draft when the whole request fails', async () => {
    api.failNext(new PublishTransientError('Content API unreachable: connection refused'));
    const outcomes = await publisher.submitBatch([wrestler('a'), wrestler('b')], NOW);
    expect(outcomes.map((o) => o.status)).toEqual(['queued', 'queued']);
    expect(queue.listPending()).toHaveLength(2);
  });
});

describe('Publisher.replay', () => {
  async function queuedTask() {
    api.failNext(new PublishTransientError('busy', 503));
    const outcome = await publisher.submit(wrestler('john-doe'), NOW);
    if (outcome.status !== 'queued') throw new Error('expected the draft to be queued');
    return outcome.task;
  }

  it('acknowledges the task on success', async () => {
    const task = await queuedTask();
    const result = await publisher.replay(task, NOW + 60_000);
    expect(result).toMatchObject({ status: 'succeeded', ack: { id: '1', created: true } });
    expect(queue.get(task.id)).toBeNull();
  });

  it('reschedules on transient failure', async () => {
    const task = await queuedTask();
    api.failNext(new PublishTransientError('still busy', 503));
    const result = await publisher.replay(task, NOW + 60_000);
    expect(result.status).toBe('requeued');
    expect(result.task).toMatchObject({ attempts: 2, next_retry_at: NOW + 60_000 + 300_000, last_error: 'still busy' });
  });

  it('dead-letters after the schedule is exhausted', async () => {
    let task = await queuedTask();
    let now = NOW;
    for (const delay of [60_000, 300_000, 900_000]) {
      now += delay;
      api.failNext(new PublishTransientError('still busy', 503));
      const result = await publisher.replay(task, now);
      expect(result.status).toBe('requeued');
      task = result.task;
    }

    api.failNext(new PublishTransientError('still busy', 503));
    const last = await publisher.replay(task, now + 3_600_000);

    expect(last.status).toBe('dead_lettered');
    if (last.status !== 'dead_lettered') throw new Error('expected the task to be dead-lettered');
    expect(last.error).toBeInstanceOf(RetryExhaustedError);
    expect(last.task).toMatchObject({ status: 'dead_letter', attempts: 5 });
    expect(queue.listDeadLetters()).toHaveLength(1);
  });

  it('dead-letters terminal failures immediately', async () => {
    const task = await queuedTask();
    api.failNext(new PublishTerminalError('Content API error: 403 Forbidden', 403));
    const result = await publisher.replay(task, NOW + 60_000);
    expect(result.status).toBe('dead_lettered');
    if (result.status !== 'dead_lettered') throw new Error('expected the task to be dead-lettered');
    expect(result.error).toBeInstanceOf(PublishTerminalError);
    expect(result.task).toMatchObject({ status: 'dead_letter', attempts: 1 });
  });
});

describe('Publisher against a store that refuses duplicates', () => {
  let strict: CreateOnlyContentApi;

  beforeEach(() => {
    strict = new CreateOnlyContentApi();
    publisher = new Publisher(strict, queue, db);
  });

  it('has a store that refuses a second write for a key', async () => {
    await strict.upsert(wrestler('john-doe'));
    await expect(strict.upsert(wrestler('john-doe'))).rejects.toBeInstanceOf(PublishTerminalError);
  });

  it('replays an already published draft without writing it again', async () => {
    await publisher.submit(wrestler('john-doe'), NOW);
    const task = queue.enqueue({ kind: 'publish', source: 'wiki', payload: wrestler('john-doe') }, 'timeout', NOW);

    const result = await publisher.replay(task, NOW + 60_000);

    expect(result).toMatchObject({ status: 'succeeded', ack: { id: '1', created: false } });
    expect(strict.duplicates).toEqual([]);
    expect(strict.upserts).toEqual(['wrestler:john-doe']);
    expect(strict.entities.size).toBe(1);
    expect(queue.get(task.id)).toBeNull();
  });

  it('sends only unseen drafts in a batch', async () => {
    await publisher.submit(wrestler('john-doe'), NOW);

    const outcomes = await publisher.submitBatch([wrestler('john-doe'), wrestler('jane-roe')], NOW);

    expect(outcomes.map((o) => o.status)).toEqual(['published', 'published']);
    expect(strict.bulkCalls).toEqual([['wrestler:jane-roe']]);
    expect(strict.duplicates).toEqual([]);
  });
});
