import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import type Database from 'better-sqlite3';
import { DbError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { getPackageRoot } from '../shared/utils.js';
import { COLLECTIONS } from './store.js';

export interface MigrationResult {
  applied: string[];
  skipped: string[];
}

const MIGRATION_FILE = /^\d{3}_[\w-]+\.sql$/;

/**
 * SQL files sit beside this module under src/. tsc does not copy them into
 * dist/, so a built CLI falls back to the package's src/db/migrations.
 */
export function migrationsDir(): string {
  const beside = path.join(path.dirname(fileURLToPath(import.meta.url)), 'migrations');
  if (fs.existsSync(beside)) return beside;
  return path.join(getPackageRoot(), 'src', 'db', 'migrations');
}

function listMigrations(dir: string): string[] {
  if (!fs.existsSync(dir)) {
    throw new DbError(`Migrations directory not found: ${dir}`, { dir });
  }
  return fs
    .readdirSync(dir)
    .filter((file) => MIGRATION_FILE.test(file))
    .sort();
}

function missingCollections(db: Database.Database): string[] {
  const tables = new Set(
    db
      .prepare<[], { name: string }>("SELECT name FROM sqlite_master WHERE type = 'table'")
      .all()
      .map((row) => row.name),
  );
  return COLLECTIONS.filter((collection) => !tables.has(collection));
}

/**
 * Apply every `NNN_name.sql` in `dir` not yet recorded in `_migrations`, each
 * in its own transaction. Afterwards every document collection must have
 * its table.
 */
export function runMigrations(db: Database.Database, dir: string = migrationsDir()): MigrationResult {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      name       TEXT PRIMARY KEY,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);

  const recorded = new Set(
    db
      .prepare<[], { name: string }>('SELECT name FROM _migrations')
      .all()
      .map((row) => row.name),
  );
  const record = db.prepare<[string]>('INSERT INTO _migrations (name) VALUES (?)');
  const result: MigrationResult = { applied: [], skipped: [] };

  for (const file of listMigrations(dir)) {
    if (recorded.has(file)) {
      result.skipped.push(file);
      continue;
    }

    const sql = fs.readFileSync(path.join(dir, file), 'utf-8');
    try {
      db.transaction(() => {
        db.exec(sql);
        record.run(file);
      })();
    } catch (err) {
      throw new DbError(`Migration failed: ${file}`, { migration: file, cause: errorMessage(err) });
    }
    result.applied.push(file);
    logger.debug({ migration: file }, 'Migration applied');
  }

  const missing = missingCollections(db);
  if (missing.length > 0) {
    throw new DbError(`Database is missing collection tables: ${missing.join(', ')}`, { missing });
  }
  return result;
}
