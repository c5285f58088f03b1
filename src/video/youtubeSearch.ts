import { z } from 'zod';
import { YOUTUBE_API_URL } from '../keywords/youtubeTrending.js';
import { CollaboratorError } from '../shared/errors.js';
import { fetchJson } from '../shared/http.js';
import type { Logger } from '../shared/logger.js';
import type { SearchQuery, VideoSearch, VideoSearchResult } from './types.js';

const THUMBNAIL_QUALITIES = ['maxres', 'standard', 'high', 'medium', 'default'] as const;

const Thumbnail = z.object({ url: z.string() });

const SearchListSchema = z.object({
  items: z
    .array(z.object({ id: z.object({ videoId: z.string().optional() }) }))
    .default([]),
});

const VideosListSchema = z.object({
  items: z
    .array(
      z.object({
        id: z.string(),
        snippet: z.object({
          title: z.string().default(''),
          channelTitle: z.string().optional(),
          publishedAt: z.string().optional(),
          defaultAudioLanguage: z.string().optional(),
          defaultLanguage: z.string().optional(),
          thumbnails: z
            .object({
              maxres: Thumbnail.optional(),
              standard: Thumbnail.optional(),
              high: Thumbnail.optional(),
              medium: Thumbnail.optional(),
              default: Thumbnail.optional(),
            })
            .default({}),
        }),
        statistics: z
          .object({
            viewCount: z.string().optional(),
            likeCount: z.string().optional(),
            commentCount: z.string().optional(),
          })
          .default({}),
        contentDetails: z.object({ duration: z.string().default('') }).default({}),
      }),
    )
    .default([]),
});

type VideoItem = z.infer<typeof VideosListSchema>['items'][number];

function bestThumbnail(thumbnails: VideoItem['snippet']['thumbnails']): string {
  for (const quality of THUMBNAIL_QUALITIES) {
    const thumb = thumbnails[quality];
    if (thumb) return thumb.url;
  }
  return '';
}

function count(value: string | undefined): number {
  const n = Number(value ?? 0);
  return Number.isFinite(n) && n >= 0 ? Math.trunc(n) : 0;
}

/** Search API timestamps reject fractional seconds. */
function rfc3339(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

export interface YouTubeSearchOptions {
  apiKey: string;
  timeoutMs: number;
  logger: Logger;
}

export class YouTubeSearch implements VideoSearch {
  constructor(private readonly opts: YouTubeSearchOptions) {}

  async search(q: SearchQuery): Promise<VideoSearchResult[]> {
    const ids = await this.searchIds(q);
    if (ids.length === 0) {
      this.opts.logger.debug({ query: q.query }, 'No videos found');
      return [];
    }
    const items = await this.videoDetails(ids);
    return items.map((item) => ({
      youtubeId: item.id,
      title: item.snippet.title,
      url: `https://www.youtube.com/watch?v=${item.id}`,
      thumbnailUrl: bestThumbnail(item.snippet.thumbnails),
      duration: item.contentDetails.duration,
      views: count(item.statistics.viewCount),
      likes: count(item.statistics.likeCount),
      comments: count(item.statistics.commentCount),
      language: item.snippet.defaultAudioLanguage ?? item.snippet.defaultLanguage,
      channelTitle: item.snippet.channelTitle,
      publishedAt: item.snippet.publishedAt,
    }));
  }

  private async searchIds(q: SearchQuery): Promise<string[]> {
    const params = new URLSearchParams({
      part: 'id,snippet',
      type: 'video',
      q: q.query,
      maxResults: String(Math.min(q.maxResults, 50)),
      publishedAfter: rfc3339(q.publishedAfter),
      key: this.opts.apiKey,
    });
    if (q.regionCode) params.set('regionCode', q.regionCode);

    const data = await this.get(`${YOUTUBE_API_URL}/search?${params.toString()}`);
    const parsed = SearchListSchema.safeParse(data);
    if (!parsed.success) {
      throw new CollaboratorError('youtube-search', 'Unexpected search.list response shape');
    }
    return parsed.data.items.flatMap((item) => (item.id.videoId ? [item.id.videoId] : []));
  }

  private async videoDetails(ids: string[]): Promise<VideoItem[]> {
    const params = new URLSearchParams({
      part: 'snippet,statistics,contentDetails',
      id: ids.join(','),
      key: this.opts.apiKey,
    });
    const data = await this.get(`${YOUTUBE_API_URL}/videos?${params.toString()}`);
    const parsed = VideosListSchema.safeParse(data);
    if (!parsed.success) {
      throw new CollaboratorError('youtube-search', 'Unexpected videos.list response shape');
    }
    return parsed.data.items;
  }

  private get(url: string): Promise<unknown> {
    return fetchJson(url, {}, { collaborator: 'youtube-search', timeoutMs: this.opts.timeoutMs });
  }
}
