import type Database from 'better-sqlite3';
import type { EntityKind } from '../processor/draft.js';

export interface PublishedEntity {
  natural_key: string;
  kind: EntityKind;
  remote_id: string;
  content_hash: string;
  source: string;
  published_at: string;
}

interface LedgerRow extends Omit<PublishedEntity, 'kind'> {
  kind: string;
}

function toEntity(row: LedgerRow): PublishedEntity {
  const kind: EntityKind = row.kind === 'article' || row.kind === 'event' ? row.kind : 'wrestler';
  return { ...row, kind };
}

export function getPublished(db: Database.Database, naturalKey: string): PublishedEntity | null {
  const row = db
    .prepare<[string], LedgerRow>('SELECT * FROM published_entities WHERE natural_key = ?')
    .get(naturalKey);
  return row ? toEntity(row) : null;
}

export function recordPublished(
  db: Database.Database,
  entry: Omit<PublishedEntity, 'published_at'>,
): void {
  db.prepare<[string, string, string, string, string]>(
    `INSERT INTO published_entities (natural_key, kind, remote_id, content_hash, source, published_at)
     VALUES (?, ?, ?, ?, ?, datetime('now'))
     ON CONFLICT(natural_key) DO UPDATE SET
       remote_id = excluded.remote_id,
       content_hash = excluded.content_hash,
       source = excluded.source,
       published_at = excluded.published_at`,
  ).run(entry.natural_key, entry.kind, entry.remote_id, entry.content_hash, entry.source);
}

export function countPublished(db: Database.Database): Record<EntityKind, number> {
  const counts: Record<EntityKind, number> = { wrestler: 0, article: 0, event: 0 };
  const rows = db
    .prepare<[], { kind: string; count: number }>('SELECT kind, COUNT(*) AS count FROM published_entities GROUP BY kind')
    .all();
  for (const row of rows) {
    if (row.kind === 'wrestler' || row.kind === 'article' || row.kind === 'event') counts[row.kind] = row.count;
  }
  return counts;
}
