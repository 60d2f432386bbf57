import type { Clock } from '../shared/clock.js';
import { logger } from '../shared/logger.js';
import type { EventListingPayload, FeedItemPayload, RawRecord, WikiPagePayload } from '../source/adapter.js';
import { articleKey, eventKey, slugify, wrestlerKey, type EntityDraft } from './draft.js';
import { cleanText, extractDebutYear, matchesKeywords, parseDate, truncate } from './text.js';
import { validateDraft } from './validate.js';
import type { DraftVerifier } from './verifier.js';

export type FilterReason = 'not_an_entity' | 'irrelevant' | 'malformed' | 'rejected_by_verifier' | 'invalid';

export type ProcessOutcome =
  | { status: 'draft'; draft: EntityDraft; checked: 'verifier' | 'local' }
  | { status: 'filtered'; reason: FilterReason; detail?: string };

export interface ProcessorOptions {
  keywords: string[];
  clock: Clock;
  verifier?: DraftVerifier;
}

export type Normalized = { draft: EntityDraft } | { filtered: FilterReason; detail?: string };

const NAME_SUFFIXES = [' (professional wrestler)', ' (wrestler)'];

function stripNameSuffix(title: string): string {
  for (const suffix of NAME_SUFFIXES) {
    if (title.endsWith(suffix)) return title.slice(0, -suffix.length);
  }
  return title;
}

function normalizeWikiPage(record: RawRecord, page: WikiPagePayload, now: number): Normalized {
  if (page.title.includes('(disambiguation)') || page.title.startsWith('List of')) {
    return { filtered: 'not_an_entity', detail: page.title };
  }
  const name = truncate(stripNameSuffix(page.title).trim(), 255);
  const about = cleanText(page.extract);

  return {
    draft: {
      kind: 'wrestler',
      natural_key: wrestlerKey(name),
      fields: {
        name,
        slug: slugify(name),
        about: about ? truncate(about, 500) : null,
        debut_year: extractDebutYear(about, now),
        wikipedia_url: page.url,
        image_url: page.thumbnail ?? null,
      },
      provenance: { source: record.source, url: page.url },
    },
  };
}

function normalizeFeedItem(record: RawRecord, item: FeedItemPayload, keywords: string[]): Normalized {
  const haystack = [item.title, item.excerpt ?? '', ...item.categories].join(' ');
  if (!matchesKeywords(haystack, keywords)) {
    return { filtered: 'irrelevant', detail: item.title };
  }

  const title = truncate(cleanText(item.title), 500);
  const summary = item.excerpt ? truncate(cleanText(item.excerpt), 500) : null;
  // Undated items are stamped with the day they were collected.
  const published = parseDate(item.published_at, record.fetched_at) ?? new Date(record.fetched_at).toISOString().slice(0, 10);

  return {
    draft: {
      kind: 'article',
      natural_key: articleKey(item.link),
      fields: {
        title,
        slug: slugify(title),
        url: item.link,
        published_date: published,
        summary: summary || null,
        author: item.author ? truncate(cleanText(item.author), 255) : null,
        source_name: record.source,
      },
      provenance: { source: record.source, url: item.link },
    },
  };
}

function normalizeEventListing(record: RawRecord, event: EventListingPayload): Normalized {
  const date = parseDate(event.date_text, record.fetched_at);
  if (!date) {
    return { filtered: 'malformed', detail: `unparseable date: ${event.date_text}` };
  }
  const name = truncate(cleanText(event.name), 255);

  return {
    draft: {
      kind: 'event',
      natural_key: eventKey(name, date),
      fields: {
        name,
        slug: slugify(name),
        date,
        promotion_name: event.promotion ? truncate(event.promotion, 255) : null,
        venue_location: event.location ? truncate(event.location, 255) : null,
        match_db_id: event.event_number,
        source_url: event.url,
      },
      provenance: { source: record.source, url: event.url },
    },
  };
}

/**
 * Turns raw source records into entity drafts. Each record yields at most
 * one draft; everything else is a typed filter outcome.
 */
export class Processor {
  constructor(private readonly options: ProcessorOptions) {}

  normalize(record: RawRecord): Normalized {
    const { payload } = record;
    switch (payload.type) {
      case 'wiki_page':
        return normalizeWikiPage(record, payload, this.options.clock.now());
      case 'feed_item':
        return normalizeFeedItem(record, payload, this.options.keywords);
      case 'event_listing':
        return normalizeEventListing(record, payload);
    }
  }

  async process(record: RawRecord): Promise<ProcessOutcome> {
    const normalized = this.normalize(record);
    if ('filtered' in normalized) {
      logger.debug({ source: record.source, reason: normalized.filtered, detail: normalized.detail }, 'Record filtered');
      return { status: 'filtered', reason: normalized.filtered, detail: normalized.detail };
    }
    const { draft } = normalized;

    if (this.options.verifier) {
      const verdict = await this.options.verifier.verify(draft);
      if (verdict.verdict === 'accepted') {
        return { status: 'draft', draft, checked: 'verifier' };
      }
      if (verdict.verdict === 'rejected') {
        logger.info({ natural_key: draft.natural_key, reason: verdict.reason }, 'Draft rejected by verifier');
        return { status: 'filtered', reason: 'rejected_by_verifier', detail: verdict.reason };
      }
      logger.debug({ natural_key: draft.natural_key, reason: verdict.reason }, 'Verifier unavailable, validating locally');
    }

    const local = validateDraft(draft, this.options.clock.now());
    if (!local.ok) {
      logger.info({ natural_key: draft.natural_key, issues: local.issues }, 'Draft failed validation');
      return { status: 'filtered', reason: 'invalid', detail: local.issues.join('; ') };
    }
    return { status: 'draft', draft, checked: 'local' };
  }
}
