import { JSDOM } from 'jsdom';
import type { SourceDefinition } from '../shared/config.js';
import { BaseSourceAdapter, type CollectResult, type EventListingPayload, type Requester } from './adapter.js';

type MatchDbSource = Extract<SourceDefinition, { kind: 'match_db' }>;

const DATE_PATTERN = /\b\d{2}\.\d{2}\.\d{4}\b/;
const EVENT_LINK = 'a[href*="id=1&nr="]';
const PROMOTION_LINK = 'a[href*="id=8&"]';

function clean(text: string | null | undefined): string {
  return (text ?? '').replace(/\s+/g, ' ').trim();
}

/**
 * Extract event rows from a listing page. Event links (`?id=1&nr=<n>`) carry
 * the event number; promotion links are `?id=8&nr=<n>`.
 */
export function parseEventListing(html: string, baseUrl: string): EventListingPayload[] {
  const { document } = new JSDOM(html).window;
  const events: EventListingPayload[] = [];

  for (const row of document.querySelectorAll('table.TBase tr')) {
    const cells = [...row.querySelectorAll('td')];
    if (cells.length === 0) continue;

    const eventIndex = cells.findIndex((td) => td.querySelector(EVENT_LINK) !== null);
    if (eventIndex === -1) continue;
    const link = cells[eventIndex]?.querySelector(EVENT_LINK);
    const href = link?.getAttribute('href');
    if (!link || !href) continue;

    const url = new URL(href, baseUrl);
    const eventNumber = Number(url.searchParams.get('nr'));
    if (!Number.isInteger(eventNumber) || eventNumber <= 0) continue;

    const name = clean(link.textContent);
    const dateText = cells.map((td) => clean(td.textContent).match(DATE_PATTERN)?.[0]).find(Boolean);
    if (!name || !dateText) continue;

    const promotionLink = row.querySelector(PROMOTION_LINK);
    const promotion =
      clean(promotionLink?.textContent) || clean(promotionLink?.querySelector('img')?.getAttribute('title'));

    const location = clean(cells[eventIndex + 1]?.textContent);

    events.push({
      type: 'event_listing',
      event_number: eventNumber,
      name,
      date_text: dateText,
      promotion: promotion || undefined,
      location: location || undefined,
      url: url.toString(),
    });
  }

  return events;
}

/**
 * Scrapes the match database's recent-events listing. The cursor is the
 * highest event number already emitted; rows are emitted oldest first.
 */
export class MatchDbAdapter extends BaseSourceAdapter<MatchDbSource> {
  protected async collect(cursor: string | null, request: Requester): Promise<CollectResult> {
    const seen = cursor !== null && /^\d+$/.test(cursor) ? Number(cursor) : 0;
    const listingUrl = new URL(this.definition.options.listing_path, this.definition.url).toString();

    const response = await request(listingUrl, { headers: { Accept: 'text/html' } });
    if (!response) return { payloads: [], cursor, truncated: true };

    const fresh = parseEventListing(await response.text(), listingUrl)
      .filter((e) => e.event_number > seen)
      .sort((a, b) => a.event_number - b.event_number);

    const unique = fresh.filter((e, i) => i === 0 || fresh[i - 1]?.event_number !== e.event_number);
    const payloads = unique.slice(0, this.definition.options.max_events);
    const last = payloads.at(-1);

    return {
      payloads,
      cursor: last ? String(last.event_number) : cursor,
      truncated: unique.length > payloads.length,
    };
  }
}
