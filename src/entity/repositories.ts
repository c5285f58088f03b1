import type { DocumentStore } from '../db/store.js';
import type { Clock } from '../shared/context.js';
import { ArticleRepository } from './articleRepository.js';
import { KeywordRepository } from './keywordRepository.js';
import { TranscriptRepository } from './transcriptRepository.js';
import { VideoRepository } from './videoRepository.js';

export interface Repositories {
  keywords: KeywordRepository;
  videos: VideoRepository;
  transcripts: TranscriptRepository;
  articles: ArticleRepository;
}

export function createRepositories(store: DocumentStore, clock: Clock): Repositories {
  return {
    keywords: new KeywordRepository(store, clock),
    videos: new VideoRepository(store, clock),
    transcripts: new TranscriptRepository(store, clock),
    articles: new ArticleRepository(store, clock),
  };
}

export { ArticleRepository, KeywordRepository, TranscriptRepository, VideoRepository };
