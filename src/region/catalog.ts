import { InvalidRegionError } from '../shared/errors.js';

export const REGION_CODES = ['TW', 'HK', 'JP', 'KR', 'US', 'SG', 'GLOBAL'] as const;

export type RegionCode = (typeof REGION_CODES)[number];

/**
 * Platform-specific codes for one region.
 * `video_region_code` is null for GLOBAL: the search API takes no region filter there.
 */
export interface RegionDescriptor {
  readonly code: RegionCode;
  readonly name: string;
  readonly trends_geo: string;
  readonly video_region_code: string | null;
  readonly microblog_woeid: number;
}

const CATALOG: Readonly<Record<RegionCode, RegionDescriptor>> = {
  TW: region('TW', 'Taiwan', 'TW', 'TW', 23424971),
  HK: region('HK', 'Hong Kong', 'HK', 'HK', 24865698),
  JP: region('JP', 'Japan', 'JP', 'JP', 23424856),
  KR: region('KR', 'Korea', 'KR', 'KR', 23424868),
  US: region('US', 'USA', 'US', 'US', 23424977),
  SG: region('SG', 'Singapore', 'SG', 'SG', 23424948),
  GLOBAL: region('GLOBAL', 'Global', 'WORLDWIDE', null, 1),
};

function region(
  code: RegionCode,
  name: string,
  trendsGeo: string,
  videoRegionCode: string | null,
  woeid: number,
): RegionDescriptor {
  return Object.freeze({
    code,
    name,
    trends_geo: trendsGeo,
    video_region_code: videoRegionCode,
    microblog_woeid: woeid,
  });
}

export function isRegionCode(code: string): code is RegionCode {
  return REGION_CODES.some((known) => known === code);
}

export function isRegionDescriptor(value: unknown): value is RegionDescriptor {
  if (value === null || typeof value !== 'object' || !('code' in value)) return false;
  const { code } = value;
  return typeof code === 'string' && isRegionCode(code) && CATALOG[code] === value;
}

function canonical(code: string): RegionCode {
  const upper = code.trim().toUpperCase();
  if (!isRegionCode(upper)) {
    throw new InvalidRegionError(code);
  }
  return upper;
}

export function resolveRegion(code: string | RegionDescriptor): RegionDescriptor {
  if (typeof code !== 'string') {
    return CATALOG[canonical(code.code)];
  }
  return CATALOG[canonical(code)];
}

export function listRegions(): RegionDescriptor[] {
  return REGION_CODES.map((code) => CATALOG[code]);
}
