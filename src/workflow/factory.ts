import type Database from 'better-sqlite3';
import { SqliteDocumentStore } from '../db/store.js';
import { createRepositories, type Repositories } from '../entity/repositories.js';
import { fetcherFactory } from '../keywords/fetchers.js';
import type { RunContext } from '../shared/context.js';
import { ApiTranscriber } from '../transcript/transcriber.js';
import { YtDlpDownloader } from '../video/downloader.js';
import { YouTubeSearch } from '../video/youtubeSearch.js';
import { DailyWorkflow } from './daily.js';

export function repositoriesFor(db: Database.Database, ctx: Pick<RunContext, 'clock'>): Repositories {
  return createRepositories(new SqliteDocumentStore(db), ctx.clock);
}

/** Wire the production adapters from config. */
export function createDailyWorkflow(ctx: RunContext, db: Database.Database): DailyWorkflow {
  const { config, logger } = ctx;
  return new DailyWorkflow(ctx, {
    fetchers: fetcherFactory(ctx),
    search: new YouTubeSearch({
      apiKey: config.credentials.youtube_api_key,
      timeoutMs: config.search.timeout_ms,
      logger,
    }),
    downloader: new YtDlpDownloader({
      binary: config.download.ytdlp_path,
      outputDir: config.download.output_dir,
      format: config.download.format,
      audioFormat: config.download.audio_format,
      timeoutMs: config.download.timeout_ms,
      logger,
    }),
    transcriber: new ApiTranscriber(config.transcribe, logger),
    repositories: repositoriesFor(db, ctx),
  });
}
