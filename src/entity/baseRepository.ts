import type { Collection, DocumentStore, Filter, FindOptions, StoredDocument } from '../db/store.js';
import type { Clock } from '../shared/context.js';
import { toISO } from '../shared/utils.js';
import type { Persisted } from './schemas.js';

export type EntityConstructor<TNew> = (fields: unknown) => TNew;

/**
 * Shared insert/find plumbing. Subclasses add the narrow finders for their
 * collection. Documents read back are validated against the same schema the
 * insert used.
 */
export abstract class BaseRepository<TNew extends Record<string, unknown>> {
  constructor(
    protected readonly store: DocumentStore,
    protected readonly clock: Clock,
    protected readonly collection: Collection,
    private readonly construct: EntityConstructor<TNew>,
  ) {}

  /** Validates `fields`, stamps both timestamps with the same instant and returns the new id. */
  insert(fields: unknown): string {
    const entity = this.construct(fields);
    const now = toISO(this.clock());
    return this.store.insert(this.collection, { ...entity, created_at: now, updated_at: now });
  }

  findById(id: string): (TNew & Persisted) | undefined {
    const doc = this.store.findById(this.collection, id);
    return doc ? this.hydrate(doc) : undefined;
  }

  findAll(opts: FindOptions = {}): Array<TNew & Persisted> {
    return this.findWhere({}, { sort: [{ field: 'created_at' }], ...opts });
  }

  count(filter: Filter = {}): number {
    return this.store.count(this.collection, filter);
  }

  protected findWhere(filter: Filter, opts: FindOptions = {}): Array<TNew & Persisted> {
    return this.store.find(this.collection, filter, opts).map((doc) => this.hydrate(doc));
  }

  protected hydrate(doc: StoredDocument): TNew & Persisted {
    return {
      ...this.construct(doc),
      id: doc.id,
      created_at: doc.created_at,
      updated_at: doc.updated_at,
    };
  }
}
