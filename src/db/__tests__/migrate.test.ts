import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { migrationsDir, runMigrations } from '../migrate.js';
import { DbError } from '../../shared/errors.js';

let db: Database.Database;

beforeEach(() => {
  db = new Database(':memory:');
  db.pragma('foreign_keys = ON');
});

afterEach(() => {
  db.close();
});

function names(sql: string): string[] {
  return db
    .prepare<[], { name: string }>(sql)
    .all()
    .map((r) => r.name);
}

describe('runMigrations', () => {
  it('creates one document table per collection', () => {
    const { applied } = runMigrations(db);
    expect(applied).toContain('001_init.sql');

    const tableNames = names("SELECT name FROM sqlite_master WHERE type='table' ORDER BY name");
    expect(tableNames).toEqual(['_migrations', 'articles', 'keywords', 'transcripts', 'videos']);
  });

  it('is idempotent (second run applies nothing)', () => {
    const first = runMigrations(db);
    expect(first.applied.length).toBeGreaterThan(0);

    const second = runMigrations(db);
    expect(second.applied).toEqual([]);
    expect(second.skipped).toContain('001_init.sql');
  });

  it('records applied migrations in _migrations table', () => {
    runMigrations(db);
    expect(names('SELECT name FROM _migrations')).toContain('001_init.sql');
  });

  it('creates the finder indexes', () => {
    runMigrations(db);

    const indexNames = names("SELECT name FROM sqlite_master WHERE type='index' AND name LIKE 'idx_%'");
    expect(indexNames).toEqual(
      expect.arrayContaining([
        'idx_keywords_platform_region',
        'idx_videos_keyword',
        'idx_videos_youtube_id',
        'idx_transcripts_video',
        'idx_transcripts_language',
        'idx_articles_language',
        'idx_articles_published',
        'idx_articles_transcript',
      ]),
    );
  });

  it('rejects documents that are not JSON', () => {
    runMigrations(db);
    expect(() =>
      db
        .prepare('INSERT INTO keywords (id, data, created_at, updated_at) VALUES (?, ?, ?, ?)')
        .run('k1', 'not json', 'now', 'now'),
    ).toThrow();
  });

  it('reads the SQL files beside the module', () => {
    expect(migrationsDir()).toBe(fileURLToPath(new URL('../migrations', import.meta.url)));
  });
});

describe('runMigrations with a custom directory', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'trendscribe-migrations-'));
    fs.copyFileSync(path.join(migrationsDir(), '001_init.sql'), path.join(dir, '001_init.sql'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('applies later migrations in order and ignores other files', () => {
    fs.writeFileSync(path.join(dir, '002_notes.sql'), 'CREATE TABLE notes (id TEXT PRIMARY KEY);');
    fs.writeFileSync(path.join(dir, 'scratch.sql'), 'CREATE TABLE scratch (id TEXT);');

    expect(runMigrations(db, dir).applied).toEqual(['001_init.sql', '002_notes.sql']);
    expect(names("SELECT name FROM sqlite_master WHERE type='table' AND name IN ('notes', 'scratch')")).toEqual([
      'notes',
    ]);
  });

  it('rolls back a failing migration and reports it', () => {
    fs.writeFileSync(path.join(dir, '002_broken.sql'), 'CREATE TABLE half (id TEXT); CREATE TABLE;');

    expect(() => runMigrations(db, dir)).toThrow('Migration failed: 002_broken.sql');
    expect(names('SELECT name FROM _migrations')).toEqual(['001_init.sql']);
    expect(names("SELECT name FROM sqlite_master WHERE type='table' AND name = 'half'")).toEqual([]);
  });

  it('fails when a collection table is missing afterwards', () => {
    fs.writeFileSync(path.join(dir, '002_drop_articles.sql'), 'DROP TABLE articles;');

    expect(() => runMigrations(db, dir)).toThrow(DbError);
    expect(() => runMigrations(db, dir)).toThrow('Database is missing collection tables: articles');
  });

  it('fails on a missing directory', () => {
    expect(() => runMigrations(db, path.join(dir, 'nope'))).toThrow('Migrations directory not found');
  });
});

