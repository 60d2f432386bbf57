import Parser from 'rss-parser';
import { z } from 'zod';
import type { SourceDefinition } from '../shared/config.js';
import { logger } from '../shared/logger.js';
import { BaseSourceAdapter, type CollectResult, type FeedItemPayload, type Requester } from './adapter.js';

type RssSource = Extract<SourceDefinition, { kind: 'rss' }>;

const parser = new Parser<Record<string, never>, { contentEncoded?: string; id?: string }>({
  customFields: {
    item: [['content:encoded', 'contentEncoded'], 'id'],
  },
});

const FeedCursor = z.object({
  etag: z.string().nullable().default(null),
  last_modified: z.string().nullable().default(null),
  newest: z.string().nullable().default(null),
});
export type FeedCursorState = z.infer<typeof FeedCursor>;

export function parseFeedCursor(cursor: string | null): FeedCursorState {
  const empty: FeedCursorState = { etag: null, last_modified: null, newest: null };
  if (!cursor) return empty;
  try {
    const parsed = FeedCursor.safeParse(JSON.parse(cursor));
    if (parsed.success) return parsed.data;
  } catch {
    // unreadable cursor: refetch everything
  }
  return empty;
}

/**
 * RSS/Atom feed adapter. Conditional GET on etag / last-modified; items not
 * newer than the last seen publication time are dropped.
 */
export class RssAdapter extends BaseSourceAdapter<RssSource> {
  protected async collect(cursor: string | null, request: Requester): Promise<CollectResult> {
    const state = parseFeedCursor(cursor);

    const headers: Record<string, string> = {
      Accept: 'application/rss+xml, application/atom+xml, application/xml, text/xml, */*',
    };
    if (state.etag) headers['If-None-Match'] = state.etag;
    if (state.last_modified) headers['If-Modified-Since'] = state.last_modified;

    const response = await request(this.definition.url, { headers });
    if (!response) return { payloads: [], cursor, truncated: true };

    if (response.status === 304) {
      logger.debug({ source: this.source }, 'Feed not modified');
      return { payloads: [], cursor };
    }

    const feed = await parser.parseString(await response.text());
    const since = state.newest ? Date.parse(state.newest) : Number.NaN;

    const fresh: Array<{ payload: FeedItemPayload; publishedAt: number; order: number }> = [];
    for (const entry of feed.items) {
      const title = entry.title?.trim();
      const link = entry.link?.trim();
      if (!title || !link) continue;

      const published = entry.isoDate ?? entry.pubDate;
      const publishedAt = published ? Date.parse(published) : Number.NaN;
      if (!Number.isNaN(since) && !Number.isNaN(publishedAt) && publishedAt <= since) continue;

      fresh.push({
        order: fresh.length,
        publishedAt,
        payload: {
          type: 'feed_item',
          guid: entry.guid ?? entry.id,
          title,
          link,
          author: entry.creator,
          published_at: published,
          excerpt: entry.contentSnippet?.slice(0, 500),
          categories: entry.categories ?? [],
        },
      });
    }

    // Over the cap, take the oldest unseen items so the cursor never moves past one still waiting.
    const cap = this.definition.options.max_items;
    const truncated = fresh.length > cap;
    const kept = truncated
      ? [...fresh]
          .sort((a, b) => age(a.publishedAt) - age(b.publishedAt))
          .slice(0, cap)
          .sort((a, b) => a.order - b.order)
      : fresh;

    let newest = state.newest;
    for (const item of kept) {
      if (!Number.isNaN(item.publishedAt) && (newest === null || item.publishedAt > Date.parse(newest))) {
        newest = new Date(item.publishedAt).toISOString();
      }
    }

    // A partial read keeps the old validators, or the next request would answer 304.
    const next: FeedCursorState = truncated
      ? { etag: state.etag, last_modified: state.last_modified, newest }
      : {
          etag: response.headers.get('etag') ?? state.etag,
          last_modified: response.headers.get('last-modified') ?? state.last_modified,
          newest,
        };
    if (truncated) {
      logger.debug({ source: this.source, available: fresh.length, max_items: cap }, 'Feed truncated');
    }
    return { payloads: kept.map((item) => item.payload), cursor: JSON.stringify(next), truncated };
  }
}

function age(publishedAt: number): number {
  return Number.isNaN(publishedAt) ? Number.POSITIVE_INFINITY : publishedAt;
}
