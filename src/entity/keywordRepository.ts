import type { DocumentStore } from '../db/store.js';
import type { Clock } from '../shared/context.js';
import { BaseRepository } from './baseRepository.js';
import { constructKeyword, type Keyword, type NewKeyword } from './schemas.js';

export class KeywordRepository extends BaseRepository<NewKeyword> {
  constructor(store: DocumentStore, clock: Clock) {
    super(store, clock, 'keywords', constructKeyword);
  }

  /** Keywords for one platform and region, best rank first. Duplicates from earlier runs are kept. */
  findByPlatformRegion(platform: string, region: string): Keyword[] {
    return this.findWhere(
      { platform, region: region.trim().toUpperCase() },
      { sort: [{ field: 'rank' }, { field: 'created_at' }] },
    );
  }
}
