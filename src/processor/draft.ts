import { z } from 'zod';
import { sha1 } from '../shared/utils.js';

export const ENTITY_KINDS = ['wrestler', 'article', 'event'] as const;
export type EntityKind = (typeof ENTITY_KINDS)[number];

const FieldValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);
export type FieldValue = z.infer<typeof FieldValueSchema>;

export const EntityDraftSchema = z.object({
  kind: z.enum(ENTITY_KINDS),
  natural_key: z.string().min(1),
  fields: z.record(FieldValueSchema),
  provenance: z.object({
    source: z.string(),
    url: z.string(),
  }),
});

/**
 * A normalized candidate record, ready to be upserted by natural key.
 */
export type EntityDraft = z.infer<typeof EntityDraftSchema>;

const TRACKING_PARAMS = new Set(['ref', 'fbclid', 'gclid']);
const TRACKING_PREFIXES = ['utm_', 'mc_'];

/**
 * Normalize a URL for identity comparison:
 * lowercase scheme and host, drop `www.`, tracking params, fragment and
 * trailing slashes, sort the remaining query params.
 */
export function normalizeUrl(raw: string): string {
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    return raw.trim();
  }

  const host = url.hostname.toLowerCase().replace(/^www\./, '');

  for (const key of [...url.searchParams.keys()]) {
    const lower = key.toLowerCase();
    if (TRACKING_PARAMS.has(lower) || TRACKING_PREFIXES.some((p) => lower.startsWith(p))) {
      url.searchParams.delete(key);
    }
  }
  url.searchParams.sort();

  let pathname = url.pathname;
  while (pathname.length > 1 && pathname.endsWith('/')) {
    pathname = pathname.slice(0, -1);
  }
  if (pathname === '/') pathname = '';

  const search = url.searchParams.toString();
  return `${url.protocol}//${host}${url.port ? ':' + url.port : ''}${pathname}${search ? '?' + search : ''}`;
}

/** ASCII slug. Text with no Latin letters or digits gets a short hash of itself instead. */
export function slugify(text: string): string {
  const slug = text
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/['’]/g, '')
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '')
    .slice(0, 255);
  if (slug) return slug;
  const trimmed = text.trim().normalize('NFC');
  return trimmed ? sha1(trimmed).slice(0, 12) : '';
}

export function wrestlerKey(name: string): string {
  return `wrestler:${slugify(name)}`;
}

export function eventKey(name: string, date: string): string {
  return `event:${slugify(name)}:${date}`;
}

export function articleKey(url: string): string {
  return `article:${normalizeUrl(url)}`;
}

/**
 * Hash of what would be sent to the content API; unchanged drafts need no
 * second round trip.
 */
export function draftContentHash(draft: EntityDraft): string {
  const keys = Object.keys(draft.fields).sort();
  const ordered = keys.map((k) => [k, draft.fields[k]]);
  return sha1(JSON.stringify([draft.kind, draft.natural_key, ordered]));
}
