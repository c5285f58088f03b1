import type { Repositories } from '../entity/repositories.js';
import { describeType, type Keyword, type Video } from '../entity/schemas.js';
import type { FetcherFactory } from '../keywords/fetchers.js';
import { normalizeKeywordBatch } from '../keywords/normalizer.js';
import type { Platform } from '../keywords/platforms.js';
import type { KeywordFetcher } from '../keywords/types.js';
import { resolveRegion, type RegionDescriptor } from '../region/catalog.js';
import type { RunContext } from '../shared/context.js';
import { SchemaViolation, StructuralError, errorMessage } from '../shared/errors.js';
import { daysBefore } from '../shared/utils.js';
import type { Transcriber } from '../transcript/types.js';
import { parseDuration } from '../video/duration.js';
import type { MediaDownloader, VideoSearch, VideoSearchResult } from '../video/types.js';

export type WorkflowState =
  | 'idle'
  | 'fetching_keywords'
  | 'searching_videos'
  | 'downloading_media'
  | 'transcribing'
  | 'done'
  | 'failed';

export type WorkflowStage = 'fetch_keywords' | 'search_videos' | 'download_media' | 'transcribe';

const TRANSITIONS: Record<WorkflowState, readonly WorkflowState[]> = {
  idle: ['fetching_keywords', 'failed'],
  fetching_keywords: ['searching_videos'],
  searching_videos: ['downloading_media'],
  downloading_media: ['transcribing'],
  transcribing: ['done'],
  done: [],
  failed: [],
};

export interface StageFailure {
  stage: WorkflowStage;
  /** `anomaly` marks a dangling reference; everything else is a failed call or insert. */
  kind: 'collaborator' | 'schema' | 'anomaly';
  reason: string;
  context: Record<string, unknown>;
}

export interface WorkflowSummary {
  runId: string;
  state: WorkflowState;
  keywordsFetched: number;
  keywordsDropped: number;
  videosFound: number;
  videosDownloaded: number;
  transcriptsCreated: number;
  failures: StageFailure[];
  durationMs: number;
}

/** Map keys are `fetcherKey(platform, region)`. */
export type FetcherSource = FetcherFactory | ReadonlyMap<string, KeywordFetcher>;

export interface WorkflowDeps {
  fetchers: FetcherSource;
  search: VideoSearch;
  downloader: MediaDownloader;
  transcriber: Transcriber;
  repositories: Repositories;
}

export type TransitionListener = (from: WorkflowState, to: WorkflowState) => void;

export function fetcherKey(platform: Platform, region: RegionDescriptor | string): string {
  const code = typeof region === 'string' ? region.trim().toUpperCase() : region.code;
  return `${platform}:${code}`;
}

/** A stored record that no longer validates is a schema failure; anything else is the store failing. */
function lookupFailureKind(err: unknown): StageFailure['kind'] {
  return err instanceof SchemaViolation ? 'schema' : 'collaborator';
}

interface FetchPlan {
  platform: Platform;
  region: RegionDescriptor;
  fetcher: KeywordFetcher;
}

/**
 * One daily batch: trending keywords → video search → media download →
 * transcription. Items move through each stage one at a time, in order;
 * a failing item is logged and skipped. Only a StructuralError detected
 * before the first stage aborts the run.
 */
export class DailyWorkflow {
  private current: WorkflowState = 'idle';
  private readonly listeners: TransitionListener[] = [];
  private failures: StageFailure[] = [];
  private keywordsDropped = 0;
  private plan: FetchPlan[] | null = null;

  constructor(
    private readonly ctx: RunContext,
    private readonly deps: WorkflowDeps,
  ) {}

  get state(): WorkflowState {
    return this.current;
  }

  onTransition(listener: TransitionListener): () => void {
    this.listeners.push(listener);
    return () => {
      const index = this.listeners.indexOf(listener);
      if (index >= 0) this.listeners.splice(index, 1);
    };
  }

  async run(): Promise<WorkflowSummary> {
    if (this.current !== 'idle') {
      throw new StructuralError(`Workflow ${this.ctx.runId} has already run (state: ${this.current})`);
    }

    const startedAt = this.ctx.clock().getTime();
    this.failures = [];
    this.keywordsDropped = 0;

    try {
      this.checkPreconditions();
    } catch (err) {
      this.transition('failed');
      this.ctx.logger.error({ err: errorMessage(err) }, 'Workflow aborted');
      throw err;
    }

    this.transition('fetching_keywords');
    const keywordIds = await this.fetchKeywords();

    this.transition('searching_videos');
    const videoIds = await this.searchVideos(keywordIds);

    this.transition('downloading_media');
    const paths = await this.downloadMedia(videoIds);

    this.transition('transcribing');
    const transcriptIds = await this.transcribe(videoIds, paths);

    this.transition('done');

    const summary: WorkflowSummary = {
      runId: this.ctx.runId,
      state: this.current,
      keywordsFetched: keywordIds.length,
      keywordsDropped: this.keywordsDropped,
      videosFound: videoIds.length,
      videosDownloaded: paths.size,
      transcriptsCreated: transcriptIds.length,
      failures: [...this.failures],
      durationMs: this.ctx.clock().getTime() - startedAt,
    };

    this.ctx.logger.info(
      {
        keywords: summary.keywordsFetched,
        dropped: summary.keywordsDropped,
        videos: summary.videosFound,
        downloaded: summary.videosDownloaded,
        transcripts: summary.transcriptsCreated,
        failures: summary.failures.length,
        duration_ms: summary.durationMs,
      },
      'Workflow complete',
    );
    return summary;
  }

  /** Throws StructuralError when the run cannot start at all. */
  checkPreconditions(): void {
    const { workflow, credentials } = this.ctx.config;

    if (workflow.platforms.length === 0) {
      throw new StructuralError('workflow.platforms is empty');
    }
    if (!credentials.youtube_api_key) {
      throw new StructuralError('credentials.youtube_api_key is required for video search');
    }
    if (workflow.platforms.includes('twitter') && !credentials.twitter_bearer_token) {
      throw new StructuralError('credentials.twitter_bearer_token is required for the twitter platform');
    }

    this.plan = this.buildPlan();
  }

  async fetchKeywords(): Promise<string[]> {
    const { keywords: repo } = this.deps.repositories;
    const ids: string[] = [];

    for (const { platform, region, fetcher } of this.plan ?? this.buildPlan()) {
      const context = { platform, region: region.code };

      let records: unknown;
      try {
        records = await fetcher.fetch();
      } catch (err) {
        this.ctx.logger.error({ ...context, err: errorMessage(err) }, 'Keyword fetch failed');
        this.fail('fetch_keywords', 'collaborator', err, context);
        continue;
      }
      if (!Array.isArray(records)) {
        const reason = `expected a list of records, got ${describeType(records)}`;
        this.ctx.logger.error({ ...context, err: reason }, 'Keyword fetch failed');
        this.fail('fetch_keywords', 'collaborator', reason, context);
        continue;
      }

      const batch = normalizeKeywordBatch(records, { platform, region }, this.ctx.logger);
      this.keywordsDropped += batch.dropped;

      for (const keyword of batch.keywords) {
        try {
          ids.push(repo.insert(keyword));
        } catch (err) {
          this.keywordsDropped++;
          this.ctx.logger.warn(
            { ...context, keyword: keyword.keyword, reason: errorMessage(err) },
            'Dropped keyword record',
          );
          this.fail('fetch_keywords', 'schema', err, { ...context, keyword: keyword.keyword });
        }
      }
    }

    this.stageComplete('fetch_keywords', ids.length);
    return ids;
  }

  async searchVideos(keywordIds: readonly string[]): Promise<string[]> {
    const { keywords, videos } = this.deps.repositories;
    const { search } = this.ctx.config;
    const publishedAfter = daysBefore(this.ctx.clock(), search.recency_days);
    const ids: string[] = [];

    for (const keywordId of keywordIds) {
      let keyword: Keyword | undefined;
      try {
        keyword = keywords.findById(keywordId);
      } catch (err) {
        this.ctx.logger.error({ keyword_id: keywordId, err: errorMessage(err) }, 'Keyword lookup failed');
        this.fail('search_videos', lookupFailureKind(err), err, { keyword_id: keywordId });
        continue;
      }
      if (!keyword) {
        this.ctx.logger.warn({ keyword_id: keywordId }, 'Keyword not found for search');
        this.anomaly('search_videos', 'keyword not found', { keyword_id: keywordId });
        continue;
      }

      let regionCode: string | null;
      try {
        regionCode = resolveRegion(keyword.region).video_region_code;
      } catch (err) {
        this.ctx.logger.warn(
          { keyword_id: keywordId, region: keyword.region, err: errorMessage(err) },
          'Keyword region not in catalog',
        );
        this.anomaly('search_videos', errorMessage(err), { keyword_id: keywordId, region: keyword.region });
        continue;
      }

      let results: VideoSearchResult[];
      try {
        results = await this.deps.search.search({
          query: keyword.keyword,
          maxResults: search.max_results,
          publishedAfter,
          regionCode,
        });
      } catch (err) {
        this.ctx.logger.error({ keyword_id: keywordId, err: errorMessage(err) }, 'Video search failed');
        this.fail('search_videos', 'collaborator', err, { keyword_id: keywordId });
        continue;
      }

      for (const result of results) {
        try {
          ids.push(
            videos.insert({
              keyword_id: keywordId,
              category: search.category,
              thumbnail_url: result.thumbnailUrl,
              url: result.url,
              youtube_id: result.youtubeId,
              title: result.title,
              duration: parseDuration(result.duration),
              views: result.views,
              likes: result.likes,
              comments: result.comments,
              language: result.language || search.default_language,
            }),
          );
        } catch (err) {
          this.ctx.logger.warn(
            { keyword_id: keywordId, youtube_id: result.youtubeId, err: errorMessage(err) },
            'Video insert failed',
          );
          this.fail('search_videos', 'schema', err, { keyword_id: keywordId, youtube_id: result.youtubeId });
        }
      }
    }

    this.stageComplete('search_videos', ids.length);
    return ids;
  }

  async downloadMedia(videoIds: readonly string[]): Promise<Map<string, string>> {
    const { videos } = this.deps.repositories;
    const paths = new Map<string, string>();

    for (const videoId of videoIds) {
      let video: Video | undefined;
      try {
        video = videos.findById(videoId);
      } catch (err) {
        this.ctx.logger.error({ video_id: videoId, err: errorMessage(err) }, 'Video lookup failed');
        this.fail('download_media', lookupFailureKind(err), err, { video_id: videoId });
        continue;
      }
      if (!video) {
        this.ctx.logger.warn({ video_id: videoId }, 'Video not found for download');
        this.anomaly('download_media', 'video not found', { video_id: videoId });
        continue;
      }

      try {
        paths.set(videoId, await this.deps.downloader.download(video.url));
      } catch (err) {
        this.ctx.logger.error({ video_id: videoId, url: video.url, err: errorMessage(err) }, 'Media download failed');
        this.fail('download_media', 'collaborator', err, { video_id: videoId });
      }
    }

    this.stageComplete('download_media', paths.size);
    return paths;
  }

  /** Videos without an entry in `paths` were not downloaded and are skipped silently. */
  async transcribe(videoIds: readonly string[], paths: ReadonlyMap<string, string>): Promise<string[]> {
    const { transcripts } = this.deps.repositories;
    const ids: string[] = [];

    for (const videoId of videoIds) {
      const filePath = paths.get(videoId);
      if (!filePath) continue;

      try {
        const result = await this.deps.transcriber.transcribe(filePath);
        ids.push(
          transcripts.insert({
            video_id: videoId,
            transcript: result.text,
            language: result.language,
          }),
        );
      } catch (err) {
        this.ctx.logger.error({ video_id: videoId, path: filePath, err: errorMessage(err) }, 'Transcription failed');
        this.fail('transcribe', 'collaborator', err, { video_id: videoId });
      }
    }

    this.stageComplete('transcribe', ids.length);
    return ids;
  }

  private buildPlan(): FetchPlan[] {
    const { regions, platforms } = this.ctx.config.workflow;
    if (regions.length === 0) {
      throw new StructuralError('workflow.regions is empty');
    }

    const resolved = regions.map((code) => {
      try {
        return resolveRegion(code);
      } catch (err) {
        throw new StructuralError(`workflow.regions: ${errorMessage(err)}`, { region: code });
      }
    });

    const plan: FetchPlan[] = [];
    for (const region of resolved) {
      for (const platform of platforms) {
        plan.push({ platform, region, fetcher: this.fetcherFor(platform, region) });
      }
    }
    return plan;
  }

  private fetcherFor(platform: Platform, region: RegionDescriptor): KeywordFetcher {
    const source = this.deps.fetchers;
    if (typeof source === 'function') {
      return source(platform, region);
    }
    const fetcher = source.get(fetcherKey(platform, region));
    if (!fetcher) {
      throw new StructuralError(`No keyword fetcher for ${platform} in ${region.code}`);
    }
    return fetcher;
  }

  private transition(to: WorkflowState): void {
    const from = this.current;
    if (!TRANSITIONS[from].includes(to)) {
      throw new StructuralError(`Illegal workflow transition ${from} → ${to}`);
    }
    this.current = to;
    this.ctx.logger.debug({ from, to }, 'Workflow state changed');
    for (const listener of [...this.listeners]) {
      listener(from, to);
    }
  }

  private stageComplete(stage: WorkflowStage, count: number): void {
    this.ctx.logger.info({ stage, count }, 'Stage complete');
  }

  private fail(
    stage: WorkflowStage,
    kind: StageFailure['kind'],
    err: unknown,
    context: Record<string, unknown>,
  ): void {
    this.failures.push({ stage, kind, reason: errorMessage(err), context });
  }

  private anomaly(stage: WorkflowStage, reason: string, context: Record<string, unknown>): void {
    this.failures.push({ stage, kind: 'anomaly', reason, context });
  }
}
