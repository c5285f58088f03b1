import Parser from 'rss-parser';
import type { RegionDescriptor } from '../region/catalog.js';
import { CollaboratorError, errorMessage } from '../shared/errors.js';
import { fetchWithTimeout } from '../shared/http.js';
import type { Logger } from '../shared/logger.js';
import type { KeywordFetcher, RawKeywordRecord } from './types.js';

export const GOOGLE_TRENDS_RSS_URL = 'https://trends.google.com/trending/rss';

// The feed has no worldwide edition; GLOBAL falls back to the US feed.
const WORLDWIDE_FALLBACK_GEO = 'US';

interface TrendItem {
  approxTraffic?: string;
}

const parser = new Parser<Record<string, unknown>, TrendItem>({
  customFields: {
    item: [['ht:approx_traffic', 'approxTraffic']],
  },
});

/** `"2,000+"` → 2000. Undefined when the feed carries no usable number. */
export function parseApproxTraffic(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const digits = value.replace(/[^0-9]/g, '');
  return digits ? Number.parseInt(digits, 10) : undefined;
}

export interface GoogleTrendsOptions {
  region: RegionDescriptor;
  limit: number;
  timeoutMs: number;
  userAgent: string;
  logger: Logger;
}

export class GoogleTrendsFetcher implements KeywordFetcher {
  readonly platform = 'google_trends' as const;

  constructor(private readonly opts: GoogleTrendsOptions) {}

  get feedUrl(): string {
    const geo = this.opts.region.trends_geo === 'WORLDWIDE' ? WORLDWIDE_FALLBACK_GEO : this.opts.region.trends_geo;
    return `${GOOGLE_TRENDS_RSS_URL}?geo=${encodeURIComponent(geo)}`;
  }

  async fetch(): Promise<RawKeywordRecord[]> {
    const url = this.feedUrl;
    const response = await fetchWithTimeout(
      url,
      {
        headers: {
          'User-Agent': this.opts.userAgent,
          Accept: 'application/rss+xml, application/xml, text/xml, */*',
        },
      },
      { collaborator: 'google-trends', timeoutMs: this.opts.timeoutMs },
    );

    const xml = await response.text();
    let feed: Awaited<ReturnType<typeof parser.parseString>>;
    try {
      feed = await parser.parseString(xml);
    } catch (err) {
      throw new CollaboratorError('google-trends', `Trends feed is not valid RSS: ${errorMessage(err)}`, { url });
    }

    const records = feed.items.slice(0, this.opts.limit).map((item, index): RawKeywordRecord => ({
      keyword: item.title,
      rank: index + 1,
      score: parseApproxTraffic(item.approxTraffic),
      metadata: {
        type: 'trending',
        geo: this.opts.region.trends_geo,
        approx_traffic: item.approxTraffic ?? null,
        published_at: item.isoDate ?? item.pubDate ?? null,
        link: item.link ?? null,
      },
    }));

    this.opts.logger.debug({ platform: this.platform, region: this.opts.region.code, count: records.length }, 'Trends fetched');
    return records;
  }
}
