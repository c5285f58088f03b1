import type { DocumentStore } from '../db/store.js';
import type { Clock } from '../shared/context.js';
import { BaseRepository } from './baseRepository.js';
import { constructVideo, type NewVideo, type Video } from './schemas.js';

export class VideoRepository extends BaseRepository<NewVideo> {
  constructor(store: DocumentStore, clock: Clock) {
    super(store, clock, 'videos', constructVideo);
  }

  findByKeywordId(keywordId: string): Video[] {
    return this.findWhere({ keyword_id: keywordId });
  }

  findByYoutubeId(youtubeId: string): Video[] {
    return this.findWhere({ youtube_id: youtubeId });
  }
}
