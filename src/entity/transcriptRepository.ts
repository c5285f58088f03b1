import type { DocumentStore } from '../db/store.js';
import type { Clock } from '../shared/context.js';
import { BaseRepository } from './baseRepository.js';
import { constructTranscript, type NewTranscript, type Transcript } from './schemas.js';

/**
 * Transcripts are additive: re-transcribing a video stores a new record
 * rather than replacing the old one.
 */
export class TranscriptRepository extends BaseRepository<NewTranscript> {
  constructor(store: DocumentStore, clock: Clock) {
    super(store, clock, 'transcripts', constructTranscript);
  }

  /** Oldest first. */
  findByVideoId(videoId: string): Transcript[] {
    return this.findWhere({ video_id: videoId }, { sort: [{ field: 'created_at' }] });
  }

  findLatestByVideoId(videoId: string): Transcript | undefined {
    const history = this.findByVideoId(videoId);
    return history[history.length - 1];
  }

  findByLanguage(language: string): Transcript[] {
    return this.findWhere({ language }, { sort: [{ field: 'created_at' }] });
  }
}
