import fs from 'node:fs';
import path from 'node:path';
import type Database from 'better-sqlite3';
import { DbError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { getPackageRoot, sha1 } from '../shared/utils.js';

export interface MigrationResult {
  applied: string[];
  skipped: string[];
}

interface AppliedRow {
  name: string;
  checksum: string;
}

export function defaultMigrationsDir(): string {
  return path.join(getPackageRoot(), 'src', 'db', 'migrations');
}

function listMigrationFiles(dir: string): string[] {
  if (!fs.existsSync(dir)) {
    throw new DbError(`Migrations directory not found: ${dir}`);
  }
  return fs
    .readdirSync(dir)
    .filter((f) => f.endsWith('.sql'))
    .sort();
}

/**
 * Apply every `NNN_name.sql` file not yet recorded in `_migrations`, each in
 * its own transaction. Applied files are checksummed; editing one after it ran
 * is logged but never re-applied.
 */
export function runMigrations(db: Database.Database, dir = defaultMigrationsDir()): MigrationResult {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      name       TEXT PRIMARY KEY,
      checksum   TEXT NOT NULL,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);

  const known = new Map(
    db
      .prepare<[], AppliedRow>('SELECT name, checksum FROM _migrations')
      .all()
      .map((row) => [row.name, row.checksum]),
  );
  const record = db.prepare<[string, string]>('INSERT INTO _migrations (name, checksum) VALUES (?, ?)');

  const result: MigrationResult = { applied: [], skipped: [] };

  for (const file of listMigrationFiles(dir)) {
    const sql = fs.readFileSync(path.join(dir, file), 'utf-8');
    const checksum = sha1(sql);
    const previous = known.get(file);

    if (previous !== undefined) {
      if (previous !== checksum) {
        logger.warn({ migration: file }, 'Applied migration has changed on disk; not re-running');
      }
      result.skipped.push(file);
      continue;
    }

    try {
      db.transaction(() => {
        db.exec(sql);
        record.run(file, checksum);
      })();
    } catch (err) {
      throw new DbError(`Migration failed: ${file}`, {
        migration: file,
        cause: err instanceof Error ? err.message : String(err),
      });
    }
    result.applied.push(file);
    logger.info({ migration: file }, 'Migration applied');
  }

  return result;
}
