import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import type Database from 'better-sqlite3';
import { DailyWorkflow, fetcherKey, type WorkflowDeps, type WorkflowState } from '../daily.js';
import type { Repositories } from '../../entity/repositories.js';
import type { RawKeywordRecord, KeywordFetcher } from '../../keywords/types.js';
import type { FetcherFactory } from '../../keywords/fetchers.js';
import type { VideoSearch, VideoSearchResult, MediaDownloader } from '../../video/types.js';
import type { Transcriber } from '../../transcript/types.js';
import { StructuralError } from '../../shared/errors.js';
import { memoryRepositories, messages, testConfig, testContext } from '../../__tests__/helpers.js';

function fetcherOf(records: RawKeywordRecord[]): KeywordFetcher {
  return { platform: 'google_trends', fetch: vi.fn().mockResolvedValue(records) };
}

function resultFor(query: string, overrides: Partial<VideoSearchResult> = {}): VideoSearchResult {
  const youtubeId = query.replace(/\s+/g, '-');
  return {
    youtubeId,
    title: `${query} explained`,
    url: `https://www.youtube.com/watch?v=${youtubeId}`,
    thumbnailUrl: `https://i.ytimg.com/vi/${youtubeId}/hqdefault.jpg`,
    duration: 'PT7M32S',
    views: 100,
    likes: 10,
    comments: 1,
    language: 'zh-Hant',
    ...overrides,
  };
}

const RECORDS: RawKeywordRecord[] = [
  { keyword: 'solar eclipse', rank: 1, score: '2000' },
  { keyword: 'typhoon', rank: 2 },
  { keyword: '   ', rank: 3 },
];

let db: Database.Database;
let repos: Repositories;
let search: { search: Mock<VideoSearch['search']> };
let downloader: { download: Mock<MediaDownloader['download']> };
let transcriber: { transcribe: Mock<Transcriber['transcribe']> };

beforeEach(() => {
  ({ db, repos } = memoryRepositories());
  search = { search: vi.fn<VideoSearch['search']>(async (q) => [resultFor(q.query)]) };
  downloader = {
    download: vi.fn<MediaDownloader['download']>(async (url) => `/media/${new URL(url).searchParams.get('v')}.mp3`),
  };
  transcriber = {
    transcribe: vi.fn<Transcriber['transcribe']>(async (file) => ({ text: `words from ${file}`, language: 'zh' })),
  };
});

afterEach(() => {
  db.close();
});

function deps(fetchers: WorkflowDeps['fetchers']): WorkflowDeps {
  return { fetchers, search, downloader, transcriber, repositories: repos };
}

function mapOf(fetcher: KeywordFetcher, region = 'TW'): ReadonlyMap<string, KeywordFetcher> {
  return new Map([[fetcherKey('google_trends', region), fetcher]]);
}

describe('DailyWorkflow', () => {
  it('carries keywords through to transcripts', async () => {
    const ctx = testContext();
    const workflow = new DailyWorkflow(ctx, deps(mapOf(fetcherOf(RECORDS))));

    const summary = await workflow.run();

    expect(summary).toMatchObject({
      runId: 'run-test',
      state: 'done',
      keywordsFetched: 2,
      keywordsDropped: 1,
      videosFound: 2,
      videosDownloaded: 2,
      transcriptsCreated: 2,
      failures: [],
    });
    expect(workflow.state).toBe('done');

    expect(messages(ctx.lines, 'Dropped keyword record')).toEqual([
      expect.objectContaining({
        platform: 'google_trends',
        region: 'TW',
        index: 2,
        reason: 'keyword: empty after trimming',
        run_id: 'run-test',
      }),
    ]);

    const [eclipse] = repos.keywords.findByPlatformRegion('google_trends', 'TW');
    expect(eclipse).toMatchObject({ keyword: 'solar eclipse', rank: 1, score: 2000 });

    const [video] = repos.videos.findByKeywordId(eclipse.id);
    expect(video).toMatchObject({
      youtube_id: 'solar-eclipse',
      duration: 452,
      category: 'education',
      language: 'zh-Hant',
    });

    const [transcript] = repos.transcripts.findByVideoId(video.id);
    expect(transcript).toMatchObject({ transcript: 'words from /media/solar-eclipse.mp3', language: 'zh' });
  });

  it('searches with the configured limits and the region video code', async () => {
    const ctx = testContext(testConfig({ search: { max_results: 5 } }));
    await new DailyWorkflow(ctx, deps(mapOf(fetcherOf([{ keyword: 'typhoon', rank: 1 }])))).run();

    expect(search.search).toHaveBeenCalledTimes(1);
    expect(search.search.mock.calls[0][0]).toMatchObject({ query: 'typhoon', maxResults: 5, regionCode: 'TW' });
  });

  it('falls back to the default language when the result has none', async () => {
    search.search.mockImplementation(async (q) => [resultFor(q.query, { language: undefined })]);
    const ctx = testContext(testConfig({ search: { default_language: 'zh-TW' } }));

    await new DailyWorkflow(ctx, deps(mapOf(fetcherOf([{ keyword: 'typhoon', rank: 1 }])))).run();

    const [video] = repos.videos.findByYoutubeId('typhoon');
    expect(video?.language).toBe('zh-TW');
  });

  it('reaches done when no videos are found', async () => {
    search.search.mockResolvedValue([]);
    const summary = await new DailyWorkflow(testContext(), deps(mapOf(fetcherOf(RECORDS)))).run();

    expect(summary).toMatchObject({ state: 'done', keywordsFetched: 2, videosFound: 0, transcriptsCreated: 0 });
    expect(downloader.download).not.toHaveBeenCalled();
    expect(transcriber.transcribe).not.toHaveBeenCalled();
  });

  it('skips a failed download and transcribes the rest', async () => {
    downloader.download.mockRejectedValueOnce(new Error('yt-dlp failed: HTTP Error 403'));
    const ctx = testContext();

    const summary = await new DailyWorkflow(ctx, deps(mapOf(fetcherOf(RECORDS)))).run();

    expect(summary).toMatchObject({ state: 'done', videosFound: 2, videosDownloaded: 1, transcriptsCreated: 1 });
    expect(summary.failures).toEqual([
      {
        stage: 'download_media',
        kind: 'collaborator',
        reason: 'yt-dlp failed: HTTP Error 403',
        context: { video_id: expect.any(String) },
      },
    ]);
    expect(messages(ctx.lines, 'Media download failed')).toHaveLength(1);
    expect(transcriber.transcribe).toHaveBeenCalledWith('/media/typhoon.mp3');
  });

  it('records a video with a malformed duration as a schema failure', async () => {
    search.search.mockImplementation(async (q) => [resultFor(q.query, { duration: 'seven minutes' })]);
    const ctx = testContext();

    const summary = await new DailyWorkflow(ctx, deps(mapOf(fetcherOf([{ keyword: 'typhoon', rank: 1 }])))).run();

    expect(summary.videosFound).toBe(0);
    expect(summary.failures).toEqual([
      {
        stage: 'search_videos',
        kind: 'schema',
        reason: 'Invalid ISO-8601 duration: "seven minutes"',
        context: { keyword_id: expect.any(String), youtube_id: 'typhoon' },
      },
    ]);
    expect(messages(ctx.lines, 'Video insert failed')).toHaveLength(1);
  });

  it('keeps going when a keyword fetcher fails', async () => {
    const fetcher: KeywordFetcher = {
      platform: 'google_trends',
      fetch: vi.fn().mockRejectedValue(new Error('google-trends request failed: 503 Service Unavailable')),
    };
    const ctx = testContext();

    const summary = await new DailyWorkflow(ctx, deps(mapOf(fetcher))).run();

    expect(summary).toMatchObject({ state: 'done', keywordsFetched: 0, videosFound: 0 });
    expect(summary.failures[0]).toMatchObject({ stage: 'fetch_keywords', kind: 'collaborator' });
    expect(messages(ctx.lines, 'Keyword fetch failed')).toHaveLength(1);
    expect(search.search).not.toHaveBeenCalled();
  });

  it('skips a failed transcription and keeps the rest', async () => {
    transcriber.transcribe.mockRejectedValueOnce(new Error('stt request failed: 500'));
    const ctx = testContext();

    const summary = await new DailyWorkflow(ctx, deps(mapOf(fetcherOf(RECORDS)))).run();

    expect(summary).toMatchObject({ state: 'done', videosDownloaded: 2, transcriptsCreated: 1 });
    expect(summary.failures).toEqual([
      {
        stage: 'transcribe',
        kind: 'collaborator',
        reason: 'stt request failed: 500',
        context: { video_id: expect.any(String) },
      },
    ]);
    expect(messages(ctx.lines, 'Transcription failed')).toEqual([
      expect.objectContaining({ path: '/media/solar-eclipse.mp3' }),
    ]);
    const [video] = repos.videos.findByYoutubeId('typhoon');
    expect(repos.transcripts.findByVideoId(video.id)).toHaveLength(1);
  });

  it('searches the next keyword after a failed search', async () => {
    search.search.mockRejectedValueOnce(new Error('youtube-search request failed: 403'));
    const ctx = testContext();

    const summary = await new DailyWorkflow(ctx, deps(mapOf(fetcherOf(RECORDS)))).run();

    expect(search.search).toHaveBeenCalledTimes(2);
    expect(summary).toMatchObject({ state: 'done', videosFound: 1, transcriptsCreated: 1 });
    expect(summary.failures).toEqual([
      {
        stage: 'search_videos',
        kind: 'collaborator',
        reason: 'youtube-search request failed: 403',
        context: { keyword_id: expect.any(String) },
      },
    ]);
    expect(messages(ctx.lines, 'Video search failed')).toHaveLength(1);
    expect(repos.videos.findByYoutubeId('typhoon')).toHaveLength(1);
  });

  it('treats an unknown keyword id as an anomaly', async () => {
    const ctx = testContext();
    const workflow = new DailyWorkflow(ctx, deps(mapOf(fetcherOf(RECORDS))));
    const missing = 'AAAAAAAAAAAAAAAAAAAAA';

    expect(await workflow.searchVideos([missing])).toEqual([]);

    expect(search.search).not.toHaveBeenCalled();
    expect(messages(ctx.lines, 'Keyword not found for search')).toEqual([
      expect.objectContaining({ keyword_id: missing }),
    ]);
  });

  it('treats an unknown video id as an anomaly', async () => {
    const ctx = testContext();
    const workflow = new DailyWorkflow(ctx, deps(mapOf(fetcherOf(RECORDS))));

    const paths = await workflow.downloadMedia(['AAAAAAAAAAAAAAAAAAAAA']);

    expect(paths.size).toBe(0);
    expect(downloader.download).not.toHaveBeenCalled();
    expect(messages(ctx.lines, 'Video not found for download')).toEqual([
      expect.objectContaining({ video_id: 'AAAAAAAAAAAAAAAAAAAAA' }),
    ]);
  });

  it('records anomalies in the run summary', async () => {
    const ctx = testContext();
    const workflow = new DailyWorkflow(ctx, deps(mapOf(fetcherOf(RECORDS))));
    vi.spyOn(workflow, 'fetchKeywords').mockResolvedValue(['AAAAAAAAAAAAAAAAAAAAA']);

    const summary = await workflow.run();

    expect(summary.state).toBe('done');
    expect(summary.failures).toEqual([
      {
        stage: 'search_videos',
        kind: 'anomaly',
        reason: 'keyword not found',
        context: { keyword_id: 'AAAAAAAAAAAAAAAAAAAAA' },
      },
    ]);
  });

  it('keeps searching when a keyword lookup fails', async () => {
    vi.spyOn(repos.keywords, 'findById').mockImplementationOnce(() => {
      throw new Error('SQLITE_BUSY: database is locked');
    });
    const ctx = testContext();

    const summary = await new DailyWorkflow(ctx, deps(mapOf(fetcherOf(RECORDS)))).run();

    expect(summary).toMatchObject({ state: 'done', keywordsFetched: 2, videosFound: 1 });
    expect(search.search).toHaveBeenCalledTimes(1);
    expect(search.search.mock.calls[0][0].query).toBe('typhoon');
    expect(summary.failures).toEqual([
      {
        stage: 'search_videos',
        kind: 'collaborator',
        reason: 'SQLITE_BUSY: database is locked',
        context: { keyword_id: expect.any(String) },
      },
    ]);
    expect(messages(ctx.lines, 'Keyword lookup failed')).toHaveLength(1);
  });

  it('records a stored keyword that no longer validates as a schema failure', async () => {
    const ctx = testContext();
    const workflow = new DailyWorkflow(ctx, deps(mapOf(fetcherOf(RECORDS))));
    workflow.onTransition((_from, to) => {
      if (to === 'searching_videos') {
        db.prepare("UPDATE keywords SET data = json_set(data, '$.rank', 0) WHERE json_extract(data, '$.keyword') = ?").run(
          'solar eclipse',
        );
      }
    });

    const summary = await workflow.run();

    expect(summary).toMatchObject({ state: 'done', videosFound: 1 });
    expect(summary.failures).toEqual([
      {
        stage: 'search_videos',
        kind: 'schema',
        reason: 'Keyword.rank: expected integer >= 1, got 0',
        context: { keyword_id: expect.any(String) },
      },
    ]);
  });

  it('treats a keyword region outside the catalog as an anomaly', async () => {
    const ctx = testContext();
    const workflow = new DailyWorkflow(ctx, deps(mapOf(fetcherOf(RECORDS))));
    const [keywordId] = await workflow.fetchKeywords();
    const stored = repos.keywords.findById(keywordId);
    if (!stored) throw new Error('keyword not stored');
    vi.spyOn(repos.keywords, 'findById').mockReturnValue(Object.assign({}, stored, { region: 'ZZ' }));

    expect(await workflow.searchVideos([keywordId])).toEqual([]);

    expect(search.search).not.toHaveBeenCalled();
    expect(messages(ctx.lines, 'Keyword region not in catalog')).toEqual([
      expect.objectContaining({ keyword_id: keywordId, region: 'ZZ', err: 'Invalid region code: ZZ' }),
    ]);
  });

  it('keeps downloading when a video lookup fails', async () => {
    vi.spyOn(repos.videos, 'findById').mockImplementationOnce(() => {
      throw new Error('SQLITE_BUSY: database is locked');
    });
    const ctx = testContext();

    const summary = await new DailyWorkflow(ctx, deps(mapOf(fetcherOf(RECORDS)))).run();

    expect(summary).toMatchObject({ state: 'done', videosFound: 2, videosDownloaded: 1, transcriptsCreated: 1 });
    expect(summary.failures).toEqual([
      {
        stage: 'download_media',
        kind: 'collaborator',
        reason: 'SQLITE_BUSY: database is locked',
        context: { video_id: expect.any(String) },
      },
    ]);
    expect(messages(ctx.lines, 'Video lookup failed')).toHaveLength(1);
  });

  it('skips a pair whose fetcher returns something other than a list', async () => {
    const broken: KeywordFetcher = { platform: 'google_trends', fetch: vi.fn().mockResolvedValue(null) };
    const fetchers = new Map([
      [fetcherKey('google_trends', 'TW'), broken],
      [fetcherKey('google_trends', 'JP'), fetcherOf([{ keyword: 'typhoon', rank: 1 }])],
    ]);
    const ctx = testContext(testConfig({ workflow: { regions: ['TW', 'JP'] } }));

    const summary = await new DailyWorkflow(ctx, deps(fetchers)).run();

    expect(summary).toMatchObject({ state: 'done', keywordsFetched: 1, videosFound: 1 });
    expect(summary.failures).toEqual([
      {
        stage: 'fetch_keywords',
        kind: 'collaborator',
        reason: 'expected a list of records, got null',
        context: { platform: 'google_trends', region: 'TW' },
      },
    ]);
    expect(messages(ctx.lines, 'Keyword fetch failed')).toEqual([
      expect.objectContaining({ platform: 'google_trends', region: 'TW' }),
    ]);
  });

  it('moves through the states in order', async () => {
    const workflow = new DailyWorkflow(testContext(), deps(mapOf(fetcherOf(RECORDS))));
    const seen: Array<[WorkflowState, WorkflowState]> = [];
    workflow.onTransition((from, to) => seen.push([from, to]));

    await workflow.run();

    expect(seen).toEqual([
      ['idle', 'fetching_keywords'],
      ['fetching_keywords', 'searching_videos'],
      ['searching_videos', 'downloading_media'],
      ['downloading_media', 'transcribing'],
      ['transcribing', 'done'],
    ]);
  });

  it('stops notifying an unsubscribed listener', async () => {
    const workflow = new DailyWorkflow(testContext(), deps(mapOf(fetcherOf(RECORDS))));
    const listener = vi.fn();
    const unsubscribe = workflow.onTransition(listener);
    unsubscribe();

    await workflow.run();

    expect(listener).not.toHaveBeenCalled();
  });

  it('refuses to run twice', async () => {
    const workflow = new DailyWorkflow(testContext(), deps(mapOf(fetcherOf(RECORDS))));
    await workflow.run();

    await expect(workflow.run()).rejects.toThrow('Workflow run-test has already run (state: done)');
  });

  it('builds fetchers through a factory for every region and platform', async () => {
    const factory = vi.fn<FetcherFactory>(() => fetcherOf([{ keyword: 'typhoon', rank: 1 }]));
    const ctx = testContext(testConfig({ workflow: { regions: ['tw', 'JP'], platforms: ['google_trends'] } }));

    const summary = await new DailyWorkflow(ctx, deps(factory)).run();

    expect(factory.mock.calls.map(([platform, region]) => `${platform}:${region.code}`)).toEqual([
      'google_trends:TW',
      'google_trends:JP',
    ]);
    expect(summary.keywordsFetched).toBe(2);
    expect(repos.keywords.findByPlatformRegion('google_trends', 'JP')).toHaveLength(1);
  });

  describe('structural failures', () => {
    async function expectAborted(workflow: DailyWorkflow): Promise<void> {
      await expect(workflow.run()).rejects.toThrow(StructuralError);
      expect(workflow.state).toBe('failed');
      await expect(workflow.run()).rejects.toThrow('already run (state: failed)');
    }

    it('aborts without a video search key', async () => {
      const fetcher = fetcherOf(RECORDS);
      const ctx = testContext(testConfig({ credentials: { youtube_api_key: '' } }));
      const workflow = new DailyWorkflow(ctx, deps(mapOf(fetcher)));

      await expectAborted(workflow);

      expect(fetcher.fetch).not.toHaveBeenCalled();
      expect(messages(ctx.lines, 'Workflow aborted')).toEqual([
        expect.objectContaining({ err: 'credentials.youtube_api_key is required for video search' }),
      ]);
    });

    it('aborts on an empty region list', async () => {
      const ctx = testContext(testConfig({ workflow: { regions: [] } }));
      await expect(new DailyWorkflow(ctx, deps(mapOf(fetcherOf(RECORDS)))).run()).rejects.toThrow(
        'workflow.regions is empty',
      );
    });

    it('aborts on an unknown region', async () => {
      const ctx = testContext(testConfig({ workflow: { regions: ['XX'] } }));
      await expect(new DailyWorkflow(ctx, deps(mapOf(fetcherOf(RECORDS)))).run()).rejects.toThrow(
        'workflow.regions: Invalid region code: XX',
      );
    });

    it('aborts when twitter has no bearer token', async () => {
      const ctx = testContext(testConfig({ workflow: { platforms: ['twitter'] } }));
      const workflow = new DailyWorkflow(ctx, deps(mapOf(fetcherOf(RECORDS))));
      await expectAborted(workflow);
    });

    it('aborts when the fetcher map has no entry for a pair', async () => {
      const ctx = testContext();
      await expect(new DailyWorkflow(ctx, deps(mapOf(fetcherOf(RECORDS), 'JP'))).run()).rejects.toThrow(
        'No keyword fetcher for google_trends in TW',
      );
      expect(repos.keywords.count()).toBe(0);
    });
  });
});
