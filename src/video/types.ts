export interface SearchQuery {
  query: string;
  maxResults: number;
  publishedAfter: Date;
  /** Null searches without a region filter. */
  regionCode: string | null;
}

export interface VideoSearchResult {
  youtubeId: string;
  title: string;
  url: string;
  thumbnailUrl: string;
  /** ISO-8601 duration as the API reports it. */
  duration: string;
  views: number;
  likes: number;
  comments: number;
  language?: string;
  channelTitle?: string;
  publishedAt?: string;
}

export interface VideoSearch {
  search(query: SearchQuery): Promise<VideoSearchResult[]>;
}

export interface MediaDownloader {
  /** Resolves to the local path of the downloaded media. */
  download(url: string): Promise<string>;
}
