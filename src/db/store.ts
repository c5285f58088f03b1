import type Database from 'better-sqlite3';
import { DbError, errorMessage } from '../shared/errors.js';
import { generateId, isGeneratedId, isPlainObject } from '../shared/utils.js';

export const COLLECTIONS = ['keywords', 'videos', 'transcripts', 'articles'] as const;

export type Collection = (typeof COLLECTIONS)[number];

export type DocumentFields = Record<string, unknown>;

export interface StoredDocument extends DocumentFields {
  id: string;
  created_at: string;
  updated_at: string;
}

export type FilterValue = string | number | boolean | null;

export type Filter = Record<string, FilterValue>;

export interface SortKey {
  field: string;
  direction?: 'asc' | 'desc';
}

export interface FindOptions {
  sort?: SortKey[];
  limit?: number;
}

/**
 * Minimal document-store contract the repositories are written against.
 * Every call is a single independent request; nothing spans collections.
 */
export interface DocumentStore {
  insert(collection: Collection, doc: DocumentFields & { created_at: string; updated_at: string }): string;
  findById(collection: Collection, id: string): StoredDocument | undefined;
  find(collection: Collection, filter?: Filter, opts?: FindOptions): StoredDocument[];
  /** Returns true only when a stored value actually changed. */
  update(collection: Collection, id: string, fields: DocumentFields, updatedAt: string): boolean;
  count(collection: Collection, filter?: Filter): number;
  deleteAll(collection: Collection): number;
}

interface DocumentRow {
  id: string;
  data: string;
  created_at: string;
  updated_at: string;
}

const FIELD_PATTERN = /^[a-z_][a-z0-9_]*$/;
const COLUMN_FIELDS = new Set(['id', 'created_at', 'updated_at']);

function assertCollection(collection: string): asserts collection is Collection {
  if (!COLLECTIONS.some((known) => known === collection)) {
    throw new DbError(`Unknown collection: ${collection}`, { collection });
  }
}

function fieldExpr(field: string): string {
  if (!FIELD_PATTERN.test(field)) {
    throw new DbError(`Invalid field name: ${field}`, { field });
  }
  return COLUMN_FIELDS.has(field) ? field : `json_extract(data, '$.${field}')`;
}

function bindValue(value: FilterValue): string | number | null {
  if (typeof value === 'boolean') return value ? 1 : 0;
  return value;
}

function buildWhere(filter: Filter): { clause: string; params: Array<string | number> } {
  const conditions: string[] = [];
  const params: Array<string | number> = [];

  for (const [field, value] of Object.entries(filter)) {
    const bound = bindValue(value);
    if (bound === null) {
      conditions.push(`${fieldExpr(field)} IS NULL`);
    } else {
      conditions.push(`${fieldExpr(field)} = ?`);
      params.push(bound);
    }
  }

  return {
    clause: conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '',
    params,
  };
}

function toDocument(row: DocumentRow): StoredDocument {
  const data: unknown = JSON.parse(row.data);
  if (!isPlainObject(data)) {
    throw new DbError('Stored document is not an object', { id: row.id });
  }
  return { ...data, id: row.id, created_at: row.created_at, updated_at: row.updated_at };
}

function sameValue(a: unknown, b: unknown): boolean {
  return JSON.stringify(a) === JSON.stringify(b);
}

export class SqliteDocumentStore implements DocumentStore {
  constructor(private readonly db: Database.Database) {}

  insert(
    collection: Collection,
    doc: DocumentFields & { created_at: string; updated_at: string },
  ): string {
    assertCollection(collection);
    const { created_at, updated_at, ...fields } = doc;
    delete fields['id'];

    const id = generateId();
    try {
      this.db
        .prepare(`INSERT INTO ${collection} (id, data, created_at, updated_at) VALUES (?, ?, ?, ?)`)
        .run(id, JSON.stringify(fields), created_at, updated_at);
      return id;
    } catch (err) {
      throw new DbError(`Failed to insert into ${collection}: ${errorMessage(err)}`, { collection });
    }
  }

  findById(collection: Collection, id: string): StoredDocument | undefined {
    assertCollection(collection);
    if (!isGeneratedId(id)) return undefined;

    const row = this.db
      .prepare<[string], DocumentRow>(`SELECT id, data, created_at, updated_at FROM ${collection} WHERE id = ?`)
      .get(id);
    return row ? toDocument(row) : undefined;
  }

  find(collection: Collection, filter: Filter = {}, opts: FindOptions = {}): StoredDocument[] {
    assertCollection(collection);
    const { clause, params } = buildWhere(filter);

    const order = (opts.sort ?? [])
      .map((key) => `${fieldExpr(key.field)} ${key.direction === 'desc' ? 'DESC' : 'ASC'}`)
      .concat('rowid ASC')
      .join(', ');

    let sql = `SELECT id, data, created_at, updated_at FROM ${collection} ${clause} ORDER BY ${order}`;
    if (opts.limit !== undefined) {
      sql += ' LIMIT ?';
      params.push(opts.limit);
    }

    const rows = this.db.prepare<Array<string | number>, DocumentRow>(sql).all(...params);
    return rows.map(toDocument);
  }

  update(collection: Collection, id: string, fields: DocumentFields, updatedAt: string): boolean {
    assertCollection(collection);
    if (!isGeneratedId(id)) return false;

    const apply = this.db.transaction((): boolean => {
      const row = this.db
        .prepare<[string], DocumentRow>(`SELECT id, data, created_at, updated_at FROM ${collection} WHERE id = ?`)
        .get(id);
      if (!row) return false;

      const current = toDocument(row);
      const changed = Object.entries(fields).filter(([key, value]) => !sameValue(current[key], value));
      if (changed.length === 0) return false;

      const { id: _id, created_at: _created, updated_at: _updated, ...data } = current;
      for (const [key, value] of changed) {
        data[key] = value;
      }

      this.db
        .prepare(`UPDATE ${collection} SET data = ?, updated_at = ? WHERE id = ?`)
        .run(JSON.stringify(data), updatedAt, id);
      return true;
    });

    try {
      return apply();
    } catch (err) {
      throw new DbError(`Failed to update ${collection}/${id}: ${errorMessage(err)}`, { collection, id });
    }
  }

  count(collection: Collection, filter: Filter = {}): number {
    assertCollection(collection);
    const { clause, params } = buildWhere(filter);
    const row = this.db
      .prepare<Array<string | number>, { count: number }>(`SELECT COUNT(*) AS count FROM ${collection} ${clause}`)
      .get(...params);
    return row?.count ?? 0;
  }

  deleteAll(collection: Collection): number {
    assertCollection(collection);
    return this.db.prepare(`DELETE FROM ${collection}`).run().changes;
  }
}
