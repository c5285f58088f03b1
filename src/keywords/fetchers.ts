import type { RegionDescriptor } from '../region/catalog.js';
import type { RunContext } from '../shared/context.js';
import { StructuralError } from '../shared/errors.js';
import { GoogleTrendsFetcher } from './googleTrends.js';
import type { Platform } from './platforms.js';
import { TwitterTrendingFetcher } from './twitterTrending.js';
import type { KeywordFetcher } from './types.js';
import { YouTubeTrendingFetcher } from './youtubeTrending.js';

export type FetcherFactory = (platform: Platform, region: RegionDescriptor) => KeywordFetcher;

/** Build the concrete fetcher for one platform/region pair. */
export function createFetcher(platform: Platform, region: RegionDescriptor, ctx: RunContext): KeywordFetcher {
  const { keywords, credentials } = ctx.config;
  const common = {
    region,
    limit: keywords.limit,
    timeoutMs: keywords.fetch_timeout_ms,
    logger: ctx.logger,
  };

  switch (platform) {
    case 'google_trends':
      return new GoogleTrendsFetcher({ ...common, userAgent: keywords.user_agent });
    case 'youtube_trending':
      if (!credentials.youtube_api_key) {
        throw new StructuralError('youtube_trending requires credentials.youtube_api_key');
      }
      return new YouTubeTrendingFetcher({ ...common, apiKey: credentials.youtube_api_key });
    case 'twitter':
      if (!credentials.twitter_bearer_token) {
        throw new StructuralError('twitter requires credentials.twitter_bearer_token');
      }
      return new TwitterTrendingFetcher({ ...common, bearerToken: credentials.twitter_bearer_token });
  }
}

export function fetcherFactory(ctx: RunContext): FetcherFactory {
  return (platform, region) => createFetcher(platform, region, ctx);
}
