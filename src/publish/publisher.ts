import type Database from 'better-sqlite3';
import {
  PublishTransientError,
  RetryExhaustedError,
  errorMessage,
  isRetryablePublishError,
  type PublishError,
  PublishTerminalError,
  ValidationRejectedError,
} from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { draftContentHash, type EntityDraft } from '../processor/draft.js';
import type { FailedTask, RetryQueue } from '../queue/retryQueue.js';
import type { Ack, ContentApi } from './apiClient.js';
import { getPublished, recordPublished } from './ledgerDb.js';

export type SubmitOutcome =
  | { status: 'published'; draft: EntityDraft; ack: Ack }
  | { status: 'queued'; draft: EntityDraft; task: FailedTask; error: PublishError }
  | { status: 'rejected'; draft: EntityDraft; error: PublishError };

export type ReplayOutcome =
  | { status: 'succeeded'; task: FailedTask; ack: Ack }
  | { status: 'requeued'; task: FailedTask; error: PublishError }
  | { status: 'dead_lettered'; task: FailedTask; error: PublishError | RetryExhaustedError };

function toPublishError(err: unknown): PublishError {
  if (
    err instanceof PublishTransientError ||
    err instanceof PublishTerminalError ||
    err instanceof ValidationRejectedError
  ) {
    return err;
  }
  // Unclassified failures are retried rather than lost.
  return new PublishTransientError(errorMessage(err));
}

/**
 * Delivers drafts to the content API. Transient failures land in the retry
 * queue; terminal ones are reported and dropped.
 */
export class Publisher {
  constructor(
    private readonly api: ContentApi,
    private readonly queue: RetryQueue,
    private readonly db: Database.Database,
  ) {}

  /** One upsert. Drafts identical to what the API already acknowledged are not resent. */
  async publish(draft: EntityDraft): Promise<Ack> {
    const hash = draftContentHash(draft);
    const known = getPublished(this.db, draft.natural_key);
    if (known && known.content_hash === hash) {
      return { id: known.remote_id, created: false };
    }

    const ack = await this.api.upsert(draft);
    this.remember(draft, ack, hash);
    return ack;
  }

  async submit(draft: EntityDraft, now: number): Promise<SubmitOutcome> {
    try {
      const ack = await this.publish(draft);
      this.queue.acknowledgeKey(draft.natural_key);
      return { status: 'published', draft, ack };
    } catch (err) {
      return this.handleFailure(draft, toPublishError(err), now);
    }
  }

  /** Batch variant over the bulk endpoint; outcomes are 1:1 with `drafts`. */
  async submitBatch(drafts: EntityDraft[], now: number): Promise<SubmitOutcome[]> {
    const outcomes = new Map<number, SubmitOutcome>();
    const toSend: Array<{ index: number; draft: EntityDraft; hash: string }> = [];

    for (const [index, draft] of drafts.entries()) {
      const hash = draftContentHash(draft);
      const known = getPublished(this.db, draft.natural_key);
      if (known && known.content_hash === hash) {
        outcomes.set(index, { status: 'published', draft, ack: { id: known.remote_id, created: false } });
      } else {
        toSend.push({ index, draft, hash });
      }
    }

    if (toSend.length > 0) {
      try {
        const results = await this.api.bulkUpsert(toSend.map((s) => s.draft));
        for (const [i, item] of toSend.entries()) {
          const result = results[i];
          if (result?.ok) {
            this.remember(item.draft, result.ack, item.hash);
            this.queue.acknowledgeKey(item.draft.natural_key);
            outcomes.set(item.index, { status: 'published', draft: item.draft, ack: result.ack });
          } else {
            const error = result ? result.error : new PublishTransientError('Missing bulk result');
            outcomes.set(item.index, this.handleFailure(item.draft, error, now));
          }
        }
      } catch (err) {
        const error = toPublishError(err);
        for (const item of toSend) {
          outcomes.set(item.index, this.handleFailure(item.draft, error, now));
        }
      }
    }

    return drafts.map(
      (draft, i): SubmitOutcome =>
        outcomes.get(i) ?? { status: 'rejected', draft, error: new PublishTerminalError('No outcome recorded') },
    );
  }

  /** Replay one due task from the retry queue. */
  async replay(task: FailedTask, now: number): Promise<ReplayOutcome> {
    try {
      const ack = await this.publish(task.payload);
      this.queue.acknowledge(task.id);
      logger.info({ id: task.id, natural_key: task.natural_key, attempts: task.attempts }, 'Retry succeeded');
      return { status: 'succeeded', task, ack };
    } catch (err) {
      const error = toPublishError(err);

      if (!isRetryablePublishError(error)) {
        const dead = this.queue.giveUp(task.id, error.message, now);
        logger.error({ id: task.id, natural_key: task.natural_key, error: error.message }, 'Retry failed terminally');
        return { status: 'dead_lettered', task: dead, error };
      }

      const updated = this.queue.recordFailure(task.id, error.message, now);
      if (updated.status === 'dead_letter') {
        const exhausted = new RetryExhaustedError(`Retries exhausted for ${task.natural_key}`, {
          id: task.id,
          attempts: updated.attempts,
          last_error: error.message,
        });
        logger.error({ id: task.id, natural_key: task.natural_key, attempts: updated.attempts }, exhausted.message);
        return { status: 'dead_lettered', task: updated, error: exhausted };
      }

      logger.warn(
        { id: task.id, natural_key: task.natural_key, attempts: updated.attempts, next_retry_at: updated.next_retry_at },
        'Retry failed, rescheduled',
      );
      return { status: 'requeued', task: updated, error };
    }
  }

  private handleFailure(draft: EntityDraft, error: PublishError, now: number): SubmitOutcome {
    if (isRetryablePublishError(error)) {
      const task = this.queue.enqueue({ kind: 'publish', source: draft.provenance.source, payload: draft }, error.message, now);
      logger.warn({ natural_key: draft.natural_key, error: error.message, retry_at: task.next_retry_at }, 'Publish failed, queued for retry');
      return { status: 'queued', draft, task, error };
    }
    logger.error({ natural_key: draft.natural_key, code: error.code, error: error.message }, 'Publish rejected');
    return { status: 'rejected', draft, error };
  }

  private remember(draft: EntityDraft, ack: Ack, hash: string): void {
    recordPublished(this.db, {
      natural_key: draft.natural_key,
      kind: draft.kind,
      remote_id: ack.id,
      content_hash: hash,
      source: draft.provenance.source,
    });
  }
}
