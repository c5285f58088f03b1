import type { DocumentStore } from '../db/store.js';
import type { Clock } from '../shared/context.js';
import { SchemaViolation } from '../shared/errors.js';
import { toISO } from '../shared/utils.js';
import { BaseRepository } from './baseRepository.js';
import {
  PublishedSchema,
  constructArticle,
  describeType,
  type Article,
  type NewArticle,
} from './schemas.js';

export class ArticleRepository extends BaseRepository<NewArticle> {
  constructor(store: DocumentStore, clock: Clock) {
    super(store, clock, 'articles', constructArticle);
  }

  findByLanguage(language: string): Article[] {
    return this.findWhere({ article_language: language }, { sort: [{ field: 'created_at' }] });
  }

  findPublished(): Article[] {
    return this.findWhere({ published: true }, { sort: [{ field: 'created_at' }] });
  }

  findByTranscriptId(transcriptId: string): Article[] {
    return this.findWhere({ transcript_id: transcriptId });
  }

  /**
   * Set the publish flag. Returns false when the article does not exist or
   * already has that value; `updated_at` only moves on a real change.
   */
  updatePublishStatus(id: string, published: unknown): boolean {
    const parsed = PublishedSchema.safeParse(published);
    if (!parsed.success) {
      throw new SchemaViolation('Article', 'published', 'boolean', describeType(published));
    }
    return this.store.update(this.collection, id, { published: parsed.data }, toISO(this.clock()));
  }
}
