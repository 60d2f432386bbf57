import type { SourceDefinition, SourceKind } from '../shared/config.js';
import type { Clock } from '../shared/clock.js';
import type { SourceGuard } from '../resilience/registry.js';
import { RateLimitedError, SourceUnavailableError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

/**
 * A page summary from the encyclopedia API.
 */
export interface WikiPagePayload {
  type: 'wiki_page';
  title: string;
  extract: string;
  url: string;
  category: string;
  thumbnail?: string;
}

/**
 * One entry of a news feed.
 */
export interface FeedItemPayload {
  type: 'feed_item';
  guid?: string;
  title: string;
  link: string;
  author?: string;
  published_at?: string;
  excerpt?: string;
  categories: string[];
}

/**
 * One row of the match database's event listing.
 */
export interface EventListingPayload {
  type: 'event_listing';
  event_number: number;
  name: string;
  date_text: string;
  promotion?: string;
  location?: string;
  url: string;
}

export type RawPayload = WikiPagePayload | FeedItemPayload | EventListingPayload;

/**
 * Unvalidated source-specific payload plus provenance.
 */
export interface RawRecord {
  source: string;
  fetched_at: number;
  payload: RawPayload;
}

export type SkipReason = 'circuit_open' | 'rate_limited';

export type FetchResult =
  | { status: 'fetched'; records: RawRecord[]; cursor: string | null; truncated: boolean }
  | { status: 'skipped'; reason: SkipReason; records: []; cursor: string | null; retryAfterMs?: number };

/**
 * Source adapter interface. One implementation per source kind.
 *
 * `fetch` consults the source's breaker and limiter before any network
 * contact and records the outcome afterwards. A skipped fetch did not touch
 * the network.
 */
export interface SourceAdapter {
  readonly kind: SourceKind;
  readonly source: string;
  fetch(cursor: string | null, signal?: AbortSignal): Promise<FetchResult>;
}

export interface AdapterContext {
  guard: SourceGuard;
  clock: Clock;
  fetchTimeoutMs: number;
  userAgent: string;
  fetchImpl?: typeof fetch;
}

/**
 * Issues one HTTP request under the source's rate budget. Resolves `null`
 * when the budget is spent; the adapter then stops and returns what it has.
 */
export type Requester = (url: string, init?: { headers?: Record<string, string> }) => Promise<Response | null>;

export interface CollectResult {
  payloads: RawPayload[];
  cursor: string | null;
  truncated?: boolean;
}

/** Parse a Retry-After header (delta seconds or HTTP date) into ms. */
export function parseRetryAfter(value: string | null, now: number): number | undefined {
  if (!value) return undefined;
  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) return Number(trimmed) * 1000;
  const at = Date.parse(trimmed);
  if (Number.isNaN(at)) return undefined;
  return Math.max(0, at - now);
}

export abstract class BaseSourceAdapter<D extends SourceDefinition> implements SourceAdapter {
  constructor(
    protected readonly definition: D,
    protected readonly ctx: AdapterContext,
  ) {}

  get kind(): D['kind'] {
    return this.definition.kind;
  }

  get source(): string {
    return this.definition.name;
  }

  protected abstract collect(cursor: string | null, request: Requester): Promise<CollectResult>;

  async fetch(cursor: string | null, signal?: AbortSignal): Promise<FetchResult> {
    const gate = this.ctx.guard.admit();
    if (!gate.allowed) {
      logger.debug({ source: this.source, reason: gate.reason }, 'Fetch skipped');
      return {
        status: 'skipped',
        reason: gate.reason,
        records: [],
        cursor,
        retryAfterMs: gate.retryAfterMs,
      };
    }

    let truncated = false;
    let admitted = true;
    const request: Requester = async (url, init) => {
      if (!admitted && !this.ctx.guard.acquire()) {
        truncated = true;
        return null;
      }
      admitted = false;
      return this.send(url, init?.headers ?? {}, signal);
    };

    let result: CollectResult;
    try {
      result = await this.collect(cursor, request);
    } catch (err) {
      // The orchestrator owns the failure of a fetch it cancelled.
      if (signal?.aborted) throw this.cancelled();
      if (err instanceof RateLimitedError) {
        this.ctx.guard.rateLimited(err.retryAfterMs);
        throw err;
      }
      this.ctx.guard.failure();
      if (err instanceof SourceUnavailableError) throw err;
      throw new SourceUnavailableError(`${this.source}: ${errorMessage(err)}`, { source: this.source });
    }

    // A late answer to a cancelled fetch must not undo the timeout's failure.
    if (signal?.aborted) throw this.cancelled();
    this.ctx.guard.success();

    const fetchedAt = this.ctx.clock.now();
    const records = result.payloads.map((payload) => ({ source: this.source, fetched_at: fetchedAt, payload }));
    logger.debug({ source: this.source, count: records.length, truncated }, 'Source fetched');
    return {
      status: 'fetched',
      records,
      cursor: result.cursor,
      truncated: truncated || result.truncated === true,
    };
  }

  private cancelled(): SourceUnavailableError {
    return new SourceUnavailableError(`Fetch cancelled: ${this.source}`, { source: this.source, cancelled: true });
  }

  private async send(url: string, headers: Record<string, string>, outer?: AbortSignal): Promise<Response> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.ctx.fetchTimeoutMs);
    const onAbort = () => controller.abort();
    outer?.addEventListener('abort', onAbort, { once: true });

    const doFetch = this.ctx.fetchImpl ?? fetch;
    let response: Response;
    try {
      response = await doFetch(url, {
        headers: { 'User-Agent': this.ctx.userAgent, ...headers },
        signal: controller.signal,
        redirect: 'follow',
      });
    } catch (err) {
      if (controller.signal.aborted && !outer?.aborted) {
        throw new SourceUnavailableError(`Request timed out after ${this.ctx.fetchTimeoutMs}ms: ${url}`, {
          source: this.source,
          url,
        });
      }
      throw new SourceUnavailableError(`Request failed: ${errorMessage(err)}`, { source: this.source, url });
    } finally {
      clearTimeout(timer);
      outer?.removeEventListener('abort', onAbort);
    }

    if (response.status === 429) {
      const retryAfterMs = parseRetryAfter(response.headers.get('retry-after'), this.ctx.clock.now());
      throw new RateLimitedError(`Rate limited by ${this.source}`, retryAfterMs, { source: this.source, url });
    }
    if (!response.ok && response.status !== 304) {
      throw new SourceUnavailableError(`${this.source} responded ${response.status}`, {
        source: this.source,
        url,
        status: response.status,
      });
    }
    return response;
  }
}
