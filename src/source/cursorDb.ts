import type Database from 'better-sqlite3';

export interface CursorRow {
  source: string;
  cursor: string | null;
  updated_at: string;
}

export function getCursor(db: Database.Database, source: string): string | null {
  const row = db
    .prepare<[string], Pick<CursorRow, 'cursor'>>('SELECT cursor FROM source_cursors WHERE source = ?')
    .get(source);
  return row?.cursor ?? null;
}

export function saveCursor(db: Database.Database, source: string, cursor: string | null): void {
  db.prepare<[string, string | null]>(
    `INSERT INTO source_cursors (source, cursor, updated_at) VALUES (?, ?, datetime('now'))
     ON CONFLICT(source) DO UPDATE SET cursor = excluded.cursor, updated_at = excluded.updated_at`,
  ).run(source, cursor);
}

export function listCursors(db: Database.Database): CursorRow[] {
  return db
    .prepare<[], CursorRow>('SELECT source, cursor, updated_at FROM source_cursors ORDER BY source')
    .all();
}

export function clearCursor(db: Database.Database, source: string): boolean {
  return db.prepare<[string]>('DELETE FROM source_cursors WHERE source = ?').run(source).changes > 0;
}
