import { z } from 'zod';
import type { SourceDefinition } from '../shared/config.js';
import { BaseSourceAdapter, type CollectResult, type Requester, type WikiPagePayload } from './adapter.js';

type WikipediaSource = Extract<SourceDefinition, { kind: 'wikipedia' }>;

const MembersResponse = z.object({
  continue: z.object({ cmcontinue: z.string() }).partial().optional(),
  query: z
    .object({
      categorymembers: z.array(z.object({ title: z.string(), ns: z.number().optional() })),
    })
    .optional(),
});

const PagesResponse = z.object({
  query: z
    .object({
      pages: z.record(
        z.object({
          title: z.string(),
          missing: z.unknown().optional(),
          extract: z.string().optional(),
          fullurl: z.string().optional(),
          thumbnail: z.object({ source: z.string() }).optional(),
        }),
      ),
    })
    .optional(),
});

const CursorShape = z.object({
  category: z.number().int().nonnegative(),
  cmcontinue: z.string().nullable(),
});
type CategoryCursor = z.infer<typeof CursorShape>;

/** Cursors are opaque to everything but this adapter; anything unreadable restarts. */
export function parseWikiCursor(cursor: string | null): CategoryCursor {
  if (!cursor) return { category: 0, cmcontinue: null };
  try {
    const parsed = CursorShape.safeParse(JSON.parse(cursor));
    if (parsed.success) return parsed.data;
  } catch {
    // fall through to a fresh start
  }
  return { category: 0, cmcontinue: null };
}

function pageUrl(apiUrl: string, title: string): string {
  const origin = new URL(apiUrl).origin;
  return `${origin}/wiki/${encodeURIComponent(title.replace(/ /g, '_'))}`;
}

/**
 * Walks the configured categories one page of members per fetch, then pulls
 * intro extracts for those members in a second request.
 */
export class WikipediaAdapter extends BaseSourceAdapter<WikipediaSource> {
  protected async collect(cursor: string | null, request: Requester): Promise<CollectResult> {
    const { categories, per_request } = this.definition.options;
    const position = parseWikiCursor(cursor);
    const index = position.category % categories.length;
    const category = categories[index] ?? categories[0] ?? '';

    const listParams = new URLSearchParams({
      action: 'query',
      format: 'json',
      list: 'categorymembers',
      cmtitle: `Category:${category}`,
      cmlimit: String(per_request),
      cmtype: 'page',
    });
    if (position.cmcontinue) listParams.set('cmcontinue', position.cmcontinue);

    const listResponse = await request(`${this.definition.url}?${listParams}`);
    if (!listResponse) return { payloads: [], cursor, truncated: true };
    const members = MembersResponse.parse(await listResponse.json());

    const nextContinue = members.continue?.cmcontinue;
    const next: CategoryCursor = nextContinue
      ? { category: index, cmcontinue: nextContinue }
      : { category: (index + 1) % categories.length, cmcontinue: null };
    const nextCursor = JSON.stringify(next);

    const titles = (members.query?.categorymembers ?? [])
      .map((m) => m.title)
      .filter((t) => !t.startsWith('Category:'));
    if (titles.length === 0) return { payloads: [], cursor: nextCursor };

    const pageParams = new URLSearchParams({
      action: 'query',
      format: 'json',
      prop: 'extracts|pageimages|info',
      inprop: 'url',
      exintro: '1',
      explaintext: '1',
      exlimit: 'max',
      pithumbsize: '300',
      titles: titles.join('|'),
    });
    const pageResponse = await request(`${this.definition.url}?${pageParams}`);
    // Out of budget between the two calls: keep the cursor so this page is retried.
    if (!pageResponse) return { payloads: [], cursor, truncated: true };
    const pages = PagesResponse.parse(await pageResponse.json());

    const byTitle = new Map(Object.values(pages.query?.pages ?? {}).map((p) => [p.title, p]));
    const payloads: WikiPagePayload[] = [];
    for (const title of titles) {
      const page = byTitle.get(title);
      if (!page || page.missing !== undefined || !page.extract) continue;
      payloads.push({
        type: 'wiki_page',
        title: page.title,
        extract: page.extract,
        url: page.fullurl ?? pageUrl(this.definition.url, page.title),
        category,
        thumbnail: page.thumbnail?.source,
      });
    }

    return { payloads, cursor: nextCursor };
  }
}
