import Database from 'better-sqlite3';
import { runMigrations } from '../db/migrate.js';
import { SqliteDocumentStore } from '../db/store.js';
import { createRepositories, type Repositories } from '../entity/repositories.js';
import { parseConfig, type Config } from '../shared/config.js';
import { createRunContext, type Clock, type RunContext } from '../shared/context.js';
import { createLogger, type Logger } from '../shared/logger.js';
import { isPlainObject } from '../shared/utils.js';

export interface LogLine {
  level: number;
  msg: string;
  [key: string]: unknown;
}

/** Logger writing JSON lines into an array. */
export function captureLogger(): { logger: Logger; lines: LogLine[] } {
  const lines: LogLine[] = [];
  const logger = createLogger(
    { level: 'debug' },
    {
      write(chunk: string) {
        lines.push(JSON.parse(chunk));
      },
    },
  );
  return { logger, lines };
}

export function messages(lines: LogLine[], msg: string): LogLine[] {
  return lines.filter((line) => line.msg === msg);
}

/** Clock that advances one second per call, starting at `start`. */
export function steppingClock(start = '2024-05-01T00:00:00.000Z', stepMs = 1000): Clock {
  let t = new Date(start).getTime();
  return () => {
    const now = new Date(t);
    t += stepMs;
    return now;
  };
}

export function fixedClock(iso = '2024-05-01T00:00:00.000Z'): Clock {
  return () => new Date(iso);
}

export function memoryDb(): Database.Database {
  const db = new Database(':memory:');
  runMigrations(db);
  return db;
}

export function memoryRepositories(clock: Clock = steppingClock()): {
  db: Database.Database;
  store: SqliteDocumentStore;
  repos: Repositories;
} {
  const db = memoryDb();
  const store = new SqliteDocumentStore(db);
  return { db, store, repos: createRepositories(store, clock) };
}

export function testConfig(raw: Record<string, unknown> = {}): Config {
  return parseConfig({
    ...raw,
    credentials: { youtube_api_key: 'test-key', ...sectionOf(raw, 'credentials') },
  });
}

function sectionOf(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = raw[key];
  return isPlainObject(value) ? value : {};
}

export function testContext(
  config: Config = testConfig(),
  opts: { clock?: Clock } = {},
): RunContext & { lines: LogLine[] } {
  const { logger, lines } = captureLogger();
  const ctx = createRunContext(config, { logger, clock: opts.clock ?? steppingClock(), runId: 'run-test' });
  return { ...ctx, lines };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}
