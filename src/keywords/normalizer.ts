import { isRegionDescriptor } from '../region/catalog.js';
import { constructKeyword, describeType, type NewKeyword } from '../entity/schemas.js';
import { SchemaViolation } from '../shared/errors.js';
import type { Logger } from '../shared/logger.js';
import { isPlainObject } from '../shared/utils.js';
import { isPlatform } from './platforms.js';
import type { KeywordSource } from './types.js';

export type NormalizeResult = { ok: true; keyword: NewKeyword } | { ok: false; reason: string };

export interface NormalizedBatch {
  keywords: NewKeyword[];
  dropped: number;
}

type Coerced = { ok: true; value: number } | { ok: false; reason: string };

// Strings must spell a whole number; "1.5" and "1e3" are rejected.
const INTEGER_TEXT = /^[+-]?\d+$/;

function coerceInteger(field: string, value: unknown): Coerced {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return { ok: true, value: Math.trunc(value) };
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (INTEGER_TEXT.test(trimmed)) {
      return { ok: true, value: Number.parseInt(trimmed, 10) };
    }
    return { ok: false, reason: `${field}: expected a number, got ${JSON.stringify(value)}` };
  }
  return { ok: false, reason: `${field}: expected a number, got ${describeType(value)}` };
}

function normalizeText(value: unknown): { ok: true; value: string } | { ok: false; reason: string } {
  if (typeof value === 'string' || (typeof value === 'number' && Number.isFinite(value))) {
    const text = String(value).trim();
    return text ? { ok: true, value: text } : { ok: false, reason: 'keyword: empty after trimming' };
  }
  return { ok: false, reason: `keyword: expected text, got ${describeType(value)}` };
}

function regionCode(region: KeywordSource['region']): string {
  return isRegionDescriptor(region) ? region.code : region.trim().toUpperCase();
}

function normalizeMetadata(value: unknown): Record<string, unknown> {
  if (!isPlainObject(value)) return {};
  const out: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    out[key] = isRegionDescriptor(entry) ? entry.code : entry;
  }
  return out;
}

/**
 * Coerce one raw fetcher record into a Keyword payload. Never throws; a
 * record that cannot be salvaged comes back with the reason it was dropped.
 */
export function normalizeKeywordRecord(raw: unknown, source: KeywordSource): NormalizeResult {
  if (!isPlainObject(raw)) {
    return { ok: false, reason: `record: expected an object, got ${describeType(raw)}` };
  }

  const keyword = normalizeText(raw['keyword']);
  if (!keyword.ok) return keyword;

  const rank = coerceInteger('rank', raw['rank']);
  if (!rank.ok) return rank;

  const rawScore = raw['score'];
  const score: Coerced =
    rawScore === undefined || rawScore === null ? { ok: true, value: 0 } : coerceInteger('score', rawScore);
  if (!score.ok) return score;

  const platform = source.platform.trim().toLowerCase();
  if (!isPlatform(platform)) {
    return { ok: false, reason: `platform: unknown platform ${JSON.stringify(source.platform)}` };
  }

  try {
    const payload = constructKeyword({
      keyword: keyword.value,
      rank: rank.value,
      score: score.value,
      platform,
      region: regionCode(source.region),
      metadata: normalizeMetadata(raw['metadata']),
    });
    return { ok: true, keyword: payload };
  } catch (err) {
    if (err instanceof SchemaViolation) return { ok: false, reason: err.message };
    throw err;
  }
}

export function normalizeKeywordBatch(
  records: readonly unknown[],
  source: KeywordSource,
  log: Logger,
): NormalizedBatch {
  const keywords: NewKeyword[] = [];
  let dropped = 0;

  records.forEach((record, index) => {
    const result = normalizeKeywordRecord(record, source);
    if (result.ok) {
      keywords.push(result.keyword);
      return;
    }
    dropped++;
    log.warn(
      { platform: source.platform, region: regionCode(source.region), index, reason: result.reason },
      'Dropped keyword record',
    );
  });

  return { keywords, dropped };
}
