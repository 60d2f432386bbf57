import { z } from 'zod';
import type { Config } from '../shared/config.js';
import {
  PublishTerminalError,
  PublishTransientError,
  ValidationRejectedError,
  errorMessage,
  type PublishError,
} from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { EntityDraft } from '../processor/draft.js';

export interface Ack {
  id: string;
  created: boolean;
}

export type BulkItemResult = { ok: true; ack: Ack } | { ok: false; error: PublishError };

/**
 * The remote content store. Upserts are keyed by natural key, so repeating
 * a request is harmless.
 */
export interface ContentApi {
  upsert(draft: EntityDraft): Promise<Ack>;
  bulkUpsert(drafts: EntityDraft[]): Promise<BulkItemResult[]>;
  health(): Promise<boolean>;
  status(): Promise<Record<string, unknown>>;
}

const RemoteId = z.union([z.string(), z.number()]).transform(String);

const AckResponse = z.object({
  id: RemoteId,
  created: z.boolean().default(false),
});

const BulkResponse = z.object({
  results: z.array(
    z.union([
      AckResponse.extend({ status: z.number().int().optional() }),
      z.object({ error: z.string(), status: z.number().int() }),
    ]),
  ),
});

/**
 * 429 and 5xx are worth retrying; 400 and 422 mean the payload itself is
 * wrong; any other 4xx will not get better by itself.
 */
export function classifyStatus(status: number, message: string, details?: Record<string, unknown>): PublishError {
  if (status === 429 || status >= 500) return new PublishTransientError(message, status, details);
  if (status === 400 || status === 422) return new ValidationRejectedError(message, { status, ...details });
  return new PublishTerminalError(message, status, details);
}

export function requestBody(draft: EntityDraft): Record<string, unknown> {
  return {
    ...draft.fields,
    natural_key: draft.natural_key,
    source: draft.provenance.source,
    source_url: draft.provenance.url,
  };
}

export class HttpContentApi implements ContentApi {
  private readonly baseUrl: string;
  private readonly token: string;
  private readonly timeoutMs: number;
  private readonly userAgent: string;

  constructor(
    config: Config['api'],
    private readonly fetchImpl: typeof fetch = fetch,
  ) {
    this.baseUrl = config.base_url.replace(/\/+$/, '');
    this.token = config.token;
    this.timeoutMs = config.timeout_ms;
    this.userAgent = config.user_agent;
  }

  async upsert(draft: EntityDraft): Promise<Ack> {
    const data = await this.request('POST', `/entities/${draft.kind}`, requestBody(draft));
    const parsed = AckResponse.safeParse(data);
    if (!parsed.success) {
      throw new PublishTransientError('Content API returned an unreadable acknowledgement', undefined, {
        natural_key: draft.natural_key,
      });
    }
    return parsed.data;
  }

  async bulkUpsert(drafts: EntityDraft[]): Promise<BulkItemResult[]> {
    if (drafts.length === 0) return [];
    const data = await this.request('POST', '/entities/bulk', {
      items: drafts.map((draft) => ({ kind: draft.kind, fields: requestBody(draft) })),
    });

    const parsed = BulkResponse.safeParse(data);
    if (!parsed.success || parsed.data.results.length !== drafts.length) {
      throw new PublishTransientError('Content API returned an unreadable bulk response', undefined, {
        count: drafts.length,
      });
    }

    return parsed.data.results.map((item, i): BulkItemResult => {
      if ('error' in item) {
        const key = drafts[i]?.natural_key;
        return { ok: false, error: classifyStatus(item.status, item.error, { natural_key: key }) };
      }
      return { ok: true, ack: { id: item.id, created: item.created } };
    });
  }

  async health(): Promise<boolean> {
    try {
      await this.request('GET', '/health');
      return true;
    } catch (err) {
      logger.debug({ error: errorMessage(err) }, 'Content API health check failed');
      return false;
    }
  }

  async status(): Promise<Record<string, unknown>> {
    const data = await this.request('GET', '/status');
    return z.record(z.unknown()).parse(data ?? {});
  }

  private async request(method: 'GET' | 'POST', path: string, body?: unknown): Promise<unknown> {
    const url = `${this.baseUrl}${path}`;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    const headers: Record<string, string> = {
      Accept: 'application/json',
      'User-Agent': this.userAgent,
    };
    if (this.token) headers['Authorization'] = `Bearer ${this.token}`;
    if (body !== undefined) headers['Content-Type'] = 'application/json';

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method,
        headers,
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: controller.signal,
      });
    } catch (err) {
      if (controller.signal.aborted) {
        throw new PublishTransientError(`Content API timed out after ${this.timeoutMs}ms`, undefined, { url });
      }
      throw new PublishTransientError(`Content API unreachable: ${errorMessage(err)}`, undefined, { url });
    } finally {
      clearTimeout(timer);
    }

    if (!response.ok) {
      const text = await response.text().catch(() => '');
      throw classifyStatus(response.status, `Content API error: ${response.status} ${response.statusText}`, {
        url,
        body: text.slice(0, 500),
      });
    }

    if (response.status === 204) return null;
    try {
      return await response.json();
    } catch {
      throw new PublishTransientError('Content API response is not valid JSON', response.status, { url });
    }
  }
}
