export const PLATFORMS = ['google_trends', 'twitter', 'youtube_trending'] as const;

export type Platform = (typeof PLATFORMS)[number];

export function isPlatform(value: string): value is Platform {
  return PLATFORMS.some((known) => known === value);
}
