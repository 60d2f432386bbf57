import { z } from 'zod';
import type { EntityDraft, EntityKind } from './draft.js';

const IsoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD');
const Name = z.string().trim().min(1).max(255);

function yearSchema(now: number) {
  const latest = new Date(now).getUTCFullYear() + 1;
  return z.number().int().min(1900).max(latest);
}

function fieldSchemas(now: number): Record<EntityKind, z.ZodTypeAny> {
  return {
    wrestler: z.object({
      name: Name,
      slug: z.string().min(1),
      about: z.string().max(500).nullable(),
      debut_year: yearSchema(now).nullable(),
      wikipedia_url: z.string().url().nullable(),
      image_url: z.string().url().nullable(),
    }),
    article: z.object({
      title: z.string().trim().min(1).max(500),
      slug: z.string().min(1),
      url: z.string().url(),
      published_date: IsoDate,
      summary: z.string().max(500).nullable(),
      author: z.string().max(255).nullable(),
      source_name: z.string(),
    }),
    event: z.object({
      name: Name,
      slug: z.string().min(1),
      date: IsoDate,
      promotion_name: z.string().max(255).nullable(),
      venue_location: z.string().max(255).nullable(),
      match_db_id: z.number().int().positive().nullable(),
      source_url: z.string().url(),
    }),
  };
}

export type LocalValidation = { ok: true } | { ok: false; issues: string[] };

/**
 * Schema check used when no verifier is configured or it is unreachable.
 */
export function validateDraft(draft: EntityDraft, now: number): LocalValidation {
  const result = fieldSchemas(now)[draft.kind].safeParse(draft.fields);
  if (result.success) return { ok: true };
  return {
    ok: false,
    issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
  };
}
