import { z } from 'zod';
import type { RegionDescriptor } from '../region/catalog.js';
import { CollaboratorError } from '../shared/errors.js';
import { fetchJson } from '../shared/http.js';
import type { Logger } from '../shared/logger.js';
import type { KeywordFetcher, RawKeywordRecord } from './types.js';

export const TWITTER_API_URL = 'https://api.twitter.com/1.1';

const TrendsResponseSchema = z
  .array(
    z.object({
      trends: z.array(
        z.object({
          name: z.string(),
          query: z.string().optional(),
          url: z.string().optional(),
          tweet_volume: z.number().nullable().optional(),
        }),
      ),
    }),
  )
  .min(1);

export interface TwitterTrendingOptions {
  region: RegionDescriptor;
  bearerToken: string;
  limit: number;
  timeoutMs: number;
  logger: Logger;
}

export class TwitterTrendingFetcher implements KeywordFetcher {
  readonly platform = 'twitter' as const;

  constructor(private readonly opts: TwitterTrendingOptions) {}

  async fetch(): Promise<RawKeywordRecord[]> {
    const url = `${TWITTER_API_URL}/trends/place.json?id=${this.opts.region.microblog_woeid}`;
    const data = await fetchJson(
      url,
      { headers: { Authorization: `Bearer ${this.opts.bearerToken}` } },
      { collaborator: 'twitter-trends', timeoutMs: this.opts.timeoutMs },
    );

    const parsed = TrendsResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new CollaboratorError('twitter-trends', 'Unexpected trends response shape', { url });
    }

    const [place] = parsed.data;
    const records = (place?.trends ?? []).slice(0, this.opts.limit).map((trend, index): RawKeywordRecord => ({
      keyword: trend.name,
      rank: index + 1,
      score: trend.tweet_volume ?? null,
      metadata: {
        woeid: this.opts.region.microblog_woeid,
        query: trend.query ?? null,
        tweet_volume: trend.tweet_volume ?? null,
      },
    }));

    this.opts.logger.debug({ platform: this.platform, region: this.opts.region.code, count: records.length }, 'Trends fetched');
    return records;
  }
}
