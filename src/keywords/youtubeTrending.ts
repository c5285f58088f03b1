import { z } from 'zod';
import type { RegionDescriptor } from '../region/catalog.js';
import { CollaboratorError } from '../shared/errors.js';
import { fetchJson } from '../shared/http.js';
import type { Logger } from '../shared/logger.js';
import type { KeywordFetcher, RawKeywordRecord } from './types.js';

export const YOUTUBE_API_URL = 'https://www.googleapis.com/youtube/v3';

const TrendingResponseSchema = z.object({
  items: z
    .array(
      z.object({
        id: z.string(),
        snippet: z
          .object({
            title: z.string().optional(),
            tags: z.array(z.string()).optional(),
            channelTitle: z.string().optional(),
          })
          .default({}),
        statistics: z
          .object({
            viewCount: z.string().optional(),
            likeCount: z.string().optional(),
          })
          .default({}),
      }),
    )
    .default([]),
});

export interface YouTubeTrendingOptions {
  region: RegionDescriptor;
  apiKey: string;
  limit: number;
  timeoutMs: number;
  logger: Logger;
}

/** Most-popular chart; each trending video title becomes a keyword scored by views. */
export class YouTubeTrendingFetcher implements KeywordFetcher {
  readonly platform = 'youtube_trending' as const;

  constructor(private readonly opts: YouTubeTrendingOptions) {}

  async fetch(): Promise<RawKeywordRecord[]> {
    const params = new URLSearchParams({
      part: 'snippet,statistics',
      chart: 'mostPopular',
      maxResults: String(Math.min(this.opts.limit, 50)),
      key: this.opts.apiKey,
    });
    if (this.opts.region.video_region_code) {
      params.set('regionCode', this.opts.region.video_region_code);
    }

    const url = `${YOUTUBE_API_URL}/videos?${params.toString()}`;
    const data = await fetchJson(url, {}, { collaborator: 'youtube-trending', timeoutMs: this.opts.timeoutMs });
    const parsed = TrendingResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new CollaboratorError('youtube-trending', 'Unexpected trending response shape', {
        issues: parsed.error.issues.slice(0, 3).map((i) => i.message),
      });
    }

    const records = parsed.data.items.map((item, index): RawKeywordRecord => ({
      keyword: item.snippet.title,
      rank: index + 1,
      score: item.statistics.viewCount,
      metadata: {
        video_id: item.id,
        channel: item.snippet.channelTitle ?? null,
        tags: item.snippet.tags ?? [],
        like_count: Number(item.statistics.likeCount ?? 0),
      },
    }));

    this.opts.logger.debug({ platform: this.platform, region: this.opts.region.code, count: records.length }, 'Trends fetched');
    return records;
  }
}
