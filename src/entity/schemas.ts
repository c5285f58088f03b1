import { z } from 'zod';
import { PLATFORMS } from '../keywords/platforms.js';
import { REGION_CODES } from '../region/catalog.js';
import { SchemaViolation } from '../shared/errors.js';
import { isPlainObject } from '../shared/utils.js';

// Every message below doubles as the "expected" description of a SchemaViolation.

function text(opts: { nonEmpty?: boolean } = {}) {
  const base = z.string({ invalid_type_error: 'text', required_error: 'text' });
  return opts.nonEmpty ? base.min(1, { message: 'non-empty text' }) : base;
}

function integer(min: number) {
  return z
    .number({ invalid_type_error: 'integer', required_error: 'integer' })
    .int({ message: 'integer' })
    .min(min, { message: `integer >= ${min}` });
}

function boolean() {
  return z.boolean({ invalid_type_error: 'boolean', required_error: 'boolean' });
}

function openMap() {
  return z.record(z.string(), z.unknown(), { invalid_type_error: 'map', required_error: 'map' });
}

function oneOf<T extends readonly [string, ...string[]]>(values: T) {
  return z.enum(values, { errorMap: () => ({ message: `one of ${values.join(' | ')}` }) });
}

export const KeywordSchema = z.object({
  keyword: text({ nonEmpty: true }),
  rank: integer(1),
  score: integer(0),
  platform: oneOf(PLATFORMS),
  region: oneOf(REGION_CODES),
  metadata: openMap(),
});

export const VideoSchema = z.object({
  keyword_id: text({ nonEmpty: true }),
  category: text(),
  thumbnail_url: text(),
  url: text({ nonEmpty: true }),
  youtube_id: text({ nonEmpty: true }),
  title: text(),
  duration: integer(0),
  views: integer(0),
  likes: integer(0),
  comments: integer(0),
  language: text({ nonEmpty: true }),
});

export const TranscriptSchema = z.object({
  video_id: text({ nonEmpty: true }),
  transcript: text(),
  language: text({ nonEmpty: true }),
});

export const ArticleSchema = z.object({
  keyword_id: text({ nonEmpty: true }),
  transcript_id: text({ nonEmpty: true }),
  video_id: text({ nonEmpty: true }),
  article_language: text({ nonEmpty: true }),
  title: text({ nonEmpty: true }),
  content: text(),
  tags: text(),
  seo_metadata: openMap(),
  published: boolean(),
});

export type NewKeyword = z.infer<typeof KeywordSchema>;
export type NewVideo = z.infer<typeof VideoSchema>;
export type NewTranscript = z.infer<typeof TranscriptSchema>;
export type NewArticle = z.infer<typeof ArticleSchema>;

export interface Persisted {
  id: string;
  created_at: string;
  updated_at: string;
}

export type Keyword = NewKeyword & Persisted;
export type Video = NewVideo & Persisted;
export type Transcript = NewTranscript & Persisted;
export type Article = NewArticle & Persisted;

export const PublishedSchema = boolean();

/**
 * Type description of a rejected value, e.g. `float` for 1.5 or `missing`
 * for an absent field.
 */
export function describeType(value: unknown): string {
  if (value === undefined) return 'missing';
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (typeof value === 'number') {
    if (Number.isInteger(value)) return 'integer';
    return Number.isFinite(value) ? 'float' : String(value);
  }
  if (typeof value === 'string') return 'text';
  return typeof value;
}

function describeValue(value: unknown): string {
  if (typeof value === 'string') return JSON.stringify(value.length > 40 ? `${value.slice(0, 40)}…` : value);
  return String(value);
}

function valueAt(input: unknown, path: ReadonlyArray<string | number>): unknown {
  let current = input;
  for (const key of path) {
    if (Array.isArray(current) && typeof key === 'number') {
      current = current[key];
    } else if (isPlainObject(current)) {
      current = current[String(key)];
    } else {
      return undefined;
    }
  }
  return current;
}

function toViolation(entity: string, input: unknown, error: z.ZodError): SchemaViolation {
  const issue = error.issues[0];
  if (!issue) {
    return new SchemaViolation(entity, '(root)', 'object', describeType(input));
  }

  const field = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  const value = valueAt(input, issue.path);
  const actual = issue.code === 'invalid_type' ? describeType(value) : describeValue(value);
  const expected = issue.path.length === 0 && issue.code === 'invalid_type' ? 'object' : issue.message;
  return new SchemaViolation(entity, field, expected, actual);
}

function entityConstructor<S extends z.ZodTypeAny>(entity: string, schema: S) {
  return (fields: unknown): z.infer<S> => {
    const parsed = schema.safeParse(fields);
    if (!parsed.success) {
      throw toViolation(entity, fields, parsed.error);
    }
    return parsed.data;
  };
}

export const constructKeyword = entityConstructor('Keyword', KeywordSchema);
export const constructVideo = entityConstructor('Video', VideoSchema);
export const constructTranscript = entityConstructor('Transcript', TranscriptSchema);
export const constructArticle = entityConstructor('Article', ArticleSchema);
