import type { EntityDraft } from '../../processor/draft.js';
import { PublishTerminalError } from '../../shared/errors.js';
import type { Ack, BulkItemResult } from '../apiClient.js';
import { FakeContentApi } from './fakeContentApi.js';

/**
 * Content store without upsert: a second write for a natural key it already
 * holds is refused with 409, the way a create-only endpoint would.
 */
export class CreateOnlyContentApi extends FakeContentApi {
  readonly duplicates: string[] = [];

  override async upsert(draft: EntityDraft): Promise<Ack> {
    if (this.entities.has(draft.natural_key)) {
      this.upserts.push(draft.natural_key);
      throw this.duplicate(draft);
    }
    return super.upsert(draft);
  }

  override async bulkUpsert(drafts: EntityDraft[]): Promise<BulkItemResult[]> {
    for (const draft of drafts) {
      if (this.entities.has(draft.natural_key)) {
        this.itemErrors.set(draft.natural_key, this.duplicate(draft));
      }
    }
    return super.bulkUpsert(drafts);
  }

  private duplicate(draft: EntityDraft): PublishTerminalError {
    this.duplicates.push(draft.natural_key);
    return new PublishTerminalError(`Duplicate natural key: ${draft.natural_key}`, 409);
  }
}
