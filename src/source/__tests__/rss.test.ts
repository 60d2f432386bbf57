import { describe, it, expect, vi } from 'vitest';
import { RssAdapter, parseFeedCursor } from '../rss.js';
import { ConfigSchema } from '../../shared/config.js';
import { ManualClock } from '../../shared/clock.js';
import { SourceStateRegistry } from '../../resilience/registry.js';

const SAMPLE_RSS = `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0" xmlns:dc="http://purl.org/dc/elements/1.1/">
  <channel>
    <title>Test Feed</title>
    <link>https://news.example.com</link>
    <item>
      <title>Champion retains title in main event</title>
      <link>https://news.example.com/champion-retains</link>
      <guid>guid-1</guid>
      <dc:creator>Test Writer</dc:creator>
      <category>WWE</category>
      <pubDate>Tue, 02 Jan 2024 10:00:00 GMT</pubDate>
      <description>The champion walked out still champion.</description>
    </item>
    <item>
      <title>Card announced</title>
      <link>https://news.example.com/card-announced</link>
      <guid>guid-2</guid>
      <pubDate>Mon, 01 Jan 2024 00:00:00 GMT</pubDate>
      <description>Five matches are set.</description>
    </item>
    <item>
      <title></title>
      <link>https://news.example.com/no-title</link>
    </item>
    <item>
      <title>No Link</title>
    </item>
  </channel>
</rss>`;

function setup(options: { max_items?: number } = {}) {
  const config = ConfigSchema.parse({
    sources: [{ name: 'news', kind: 'rss', url: 'https://news.example.com/feed', options }],
  });
  const clock = new ManualClock(1_700_000_000_000);
  const registry = new SourceStateRegistry(config.sources, config.rate_limit, clock);
  const fetchImpl = vi.fn<typeof fetch>();
  const source = config.sources[0];
  if (source?.kind !== 'rss') throw new Error('fixture is not an rss source');
  const adapter = new RssAdapter(source, {
    guard: registry.guardFor('news'),
    clock,
    fetchTimeoutMs: 1000,
    userAgent: 'ringfeed-test',
    fetchImpl,
  });
  return { adapter, fetchImpl, clock };
}

describe('RssAdapter', () => {
  it('parses feed items and skips entries without title or link', async () => {
    const { adapter, fetchImpl, clock } = setup();
    fetchImpl.mockResolvedValueOnce(new Response(SAMPLE_RSS, { status: 200, headers: { ETag: '"v1"' } }));

    const result = await adapter.fetch(null);

    expect(result.status).toBe('fetched');
    expect(result.records.map((r) => r.payload)).toEqual([
      {
        type: 'feed_item',
        guid: 'guid-1',
        title: 'Champion retains title in main event',
        link: 'https://news.example.com/champion-retains',
        author: 'Test Writer',
        published_at: '2024-01-02T10:00:00.000Z',
        excerpt: 'The champion walked out still champion.',
        categories: ['WWE'],
      },
      {
        type: 'feed_item',
        guid: 'guid-2',
        title: 'Card announced',
        link: 'https://news.example.com/card-announced',
        author: undefined,
        published_at: '2024-01-01T00:00:00.000Z',
        excerpt: 'Five matches are set.',
        categories: [],
      },
    ]);
    expect(result.records[0]?.source).toBe('news');
    expect(result.records[0]?.fetched_at).toBe(clock.now());
    expect(parseFeedCursor(result.cursor)).toEqual({
      etag: '"v1"',
      last_modified: null,
      newest: '2024-01-02T10:00:00.000Z',
    });
  });

  it('sends conditional headers and keeps the cursor on 304', async () => {
    const { adapter, fetchImpl } = setup();
    const cursor = JSON.stringify({ etag: '"v1"', last_modified: 'Tue, 02 Jan 2024 10:00:00 GMT', newest: null });
    fetchImpl.mockResolvedValueOnce(new Response(null, { status: 304 }));

    const result = await adapter.fetch(cursor);

    expect(result).toEqual({ status: 'fetched', records: [], cursor, truncated: false });
    expect(fetchImpl.mock.calls[0]?.[1]?.headers).toMatchObject({
      'If-None-Match': '"v1"',
      'If-Modified-Since': 'Tue, 02 Jan 2024 10:00:00 GMT',
      'User-Agent': 'ringfeed-test',
    });
  });

  it('drops items not newer than the cursor', async () => {
    const { adapter, fetchImpl } = setup();
    fetchImpl.mockResolvedValueOnce(new Response(SAMPLE_RSS, { status: 200 }));

    const result = await adapter.fetch(JSON.stringify({ newest: '2024-01-01T00:00:00.000Z' }));

    expect(result.records.map((r) => r.payload.type === 'feed_item' && r.payload.guid)).toEqual(['guid-1']);
  });

  it('caps the number of items per fetch, oldest first, and flags the truncation', async () => {
    const { adapter, fetchImpl } = setup({ max_items: 1 });
    fetchImpl.mockResolvedValueOnce(new Response(SAMPLE_RSS, { status: 200 }));

    const result = await adapter.fetch(null);

    expect(result.records.map((r) => r.payload.type === 'feed_item' && r.payload.guid)).toEqual(['guid-2']);
    if (result.status !== 'fetched') throw new Error('expected a fetch');
    expect(result.truncated).toBe(true);
  });

  it('delivers every item across capped fetches', async () => {
    const { adapter, fetchImpl } = setup({ max_items: 1 });
    const feed = `<?xml version="1.0"?><rss version="2.0"><channel><title>t</title>
      <item><title>Wrestling C</title><link>https://news.example.com/c</link><pubDate>Wed, 03 Jan 2024 00:00:00 GMT</pubDate></item>
      <item><title>Wrestling B</title><link>https://news.example.com/b</link><pubDate>Tue, 02 Jan 2024 00:00:00 GMT</pubDate></item>
      <item><title>Wrestling A</title><link>https://news.example.com/a</link><pubDate>Mon, 01 Jan 2024 00:00:00 GMT</pubDate></item>
    </channel></rss>`;
    fetchImpl.mockImplementation(async () => new Response(feed, { status: 200, headers: { ETag: '"v2"' } }));

    const delivered: string[] = [];
    const flags: boolean[] = [];
    let cursor: string | null = null;
    for (let i = 0; i < 3; i++) {
      const result = await adapter.fetch(cursor);
      if (result.status !== 'fetched') throw new Error('expected a fetch');
      for (const record of result.records) {
        if (record.payload.type === 'feed_item') delivered.push(record.payload.title);
      }
      flags.push(result.truncated);
      cursor = result.cursor;
    }

    expect(delivered).toEqual(['Wrestling A', 'Wrestling B', 'Wrestling C']);
    expect(flags).toEqual([true, true, false]);
    // Validators are only kept once the feed has been read in full.
    expect(fetchImpl.mock.calls[1]?.[1]?.headers).not.toHaveProperty('If-None-Match');
    expect(parseFeedCursor(cursor)).toEqual({ etag: '"v2"', last_modified: null, newest: '2024-01-03T00:00:00.000Z' });
  });

  it('restarts from scratch on an unreadable cursor', () => {
    expect(parseFeedCursor('not json')).toEqual({ etag: null, last_modified: null, newest: null });
  });
});
