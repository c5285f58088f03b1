import type { RegionDescriptor } from '../region/catalog.js';
import type { Platform } from './platforms.js';

/**
 * A trend record as a fetcher returns it, before normalization.
 * Field types are whatever the upstream API produced.
 */
export interface RawKeywordRecord {
  keyword: unknown;
  rank: unknown;
  score?: unknown;
  metadata?: unknown;
}

export interface KeywordSource {
  platform: string;
  region: string | RegionDescriptor;
}

export interface KeywordFetcher {
  readonly platform: Platform;
  fetch(): Promise<RawKeywordRecord[]>;
}
