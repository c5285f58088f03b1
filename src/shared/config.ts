import { z } from 'zod';
import { cosmiconfig } from 'cosmiconfig';
import fs from 'node:fs';
import path from 'node:path';
import { stringify as yamlStringify } from 'yaml';
import { PLATFORMS } from '../keywords/platforms.js';
import { resolvePath, getTrendscribeDir, isPlainObject } from './utils.js';
import { ConfigError } from './errors.js';
import { logger } from './logger.js';

export const ConfigSchema = z.object({
  workflow: z
    .object({
      regions: z.array(z.string().min(1)).default(['TW']),
      platforms: z.array(z.enum(PLATFORMS)).default(['google_trends']),
    })
    .default({}),

  credentials: z
    .object({
      youtube_api_key: z.string().default(''),
      twitter_bearer_token: z.string().default(''),
    })
    .default({}),

  keywords: z
    .object({
      limit: z.number().int().min(1).default(10),
      fetch_timeout_ms: z.number().default(15000),
      user_agent: z.string().default('trendscribe/0.1'),
    })
    .default({}),

  search: z
    .object({
      max_results: z.number().int().min(1).max(50).default(3),
      recency_days: z.number().int().min(1).default(7),
      category: z.string().default('education'),
      default_language: z.string().default('en'),
      timeout_ms: z.number().default(15000),
    })
    .default({}),

  download: z
    .object({
      output_dir: z.string().default('~/.trendscribe/media'),
      ytdlp_path: z.string().default('yt-dlp'),
      format: z.string().default('bestaudio/best'),
      audio_format: z.string().default('mp3'),
      timeout_ms: z.number().default(600000),
    })
    .default({}),

  transcribe: z
    .object({
      base_url: z.string().default(''),
      api_key: z.string().default(''),
      model: z.string().default('whisper-1'),
      language: z.string().default('auto'),
      timeout_ms: z.number().default(300000),
    })
    .default({}),

  llm: z
    .object({
      base_url: z.string().default(''),
      api_key: z.string().default(''),
      model: z.string().default('gpt-4.1-mini'),
      max_tokens: z.number().default(2500),
      temperature: z.number().default(0.4),
      timeout_ms: z.number().default(60000),
    })
    .default({}),

  article: z
    .object({
      language: z.string().default('en'),
      transcript_chars: z.number().int().min(500).default(12000),
    })
    .default({}),

  schedule: z
    .object({
      daily_cron: z.string().default('0 6 * * *'),
    })
    .default({}),

  db: z
    .object({
      path: z.string().default('~/.trendscribe/trendscribe.db'),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

let cachedConfig: Config | null = null;

export function generateDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

export function generateDefaultConfigYaml(): string {
  return yamlStringify(generateDefaultConfig());
}

export function writeDefaultConfig(configPath: string): void {
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, generateDefaultConfigYaml(), 'utf-8');
}

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = raw[key];
  return isPlainObject(value) ? value : {};
}

/**
 * Apply secrets from the environment on top of the file config.
 * Env wins over the file.
 */
export function applyEnvOverrides(
  rawConfig: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env,
): Record<string, unknown> {
  const out = { ...rawConfig };

  const youtubeKey = env['TRENDSCRIBE_YOUTUBE_API_KEY'] ?? env['YOUTUBE_API_KEY'];
  const twitterToken = env['TWITTER_BEARER_TOKEN'];
  if (youtubeKey || twitterToken) {
    const credentials = { ...section(out, 'credentials') };
    if (youtubeKey) credentials['youtube_api_key'] = youtubeKey;
    if (twitterToken) credentials['twitter_bearer_token'] = twitterToken;
    out['credentials'] = credentials;
  }

  const llmKey = env['TRENDSCRIBE_LLM_API_KEY'];
  const llmBaseUrl = env['TRENDSCRIBE_LLM_BASE_URL'];
  const llmModel = env['TRENDSCRIBE_LLM_MODEL'];
  if (llmKey || llmBaseUrl || llmModel) {
    const llm = { ...section(out, 'llm') };
    if (llmKey) llm['api_key'] = llmKey;
    if (llmBaseUrl) llm['base_url'] = llmBaseUrl;
    if (llmModel) llm['model'] = llmModel;
    out['llm'] = llm;
  }

  const transcribeKey = env['TRENDSCRIBE_TRANSCRIBE_API_KEY'];
  if (transcribeKey) {
    out['transcribe'] = { ...section(out, 'transcribe'), api_key: transcribeKey };
  }

  return out;
}

export function parseConfig(rawConfig: Record<string, unknown>): Config {
  const parsed = ConfigSchema.safeParse(rawConfig);
  if (!parsed.success) {
    throw new ConfigError('Invalid configuration', {
      errors: parsed.error.flatten().fieldErrors,
    });
  }
  return parsed.data;
}

function asConfigObject(value: unknown): Record<string, unknown> {
  if (value === undefined || value === null) return {};
  if (!isPlainObject(value)) {
    throw new ConfigError('Config file must contain a mapping at the top level');
  }
  return value;
}

export async function loadConfig(force = false): Promise<Config> {
  if (cachedConfig && !force) return cachedConfig;

  const explorer = cosmiconfig('trendscribe', {
    searchPlaces: [
      'trendscribe.config.yaml',
      'trendscribe.config.yml',
      '.trendscriberc.yaml',
      '.trendscriberc.yml',
    ],
  });

  const envConfigPath = process.env['TRENDSCRIBE_CONFIG'];
  const defaultConfigPath = path.join(getTrendscribeDir(), 'config.yaml');

  let rawConfig: Record<string, unknown> = {};

  if (envConfigPath) {
    const resolved = resolvePath(envConfigPath);
    if (!fs.existsSync(resolved)) {
      throw new ConfigError(`Config file not found: ${resolved}`);
    }
    const result = await explorer.load(resolved);
    rawConfig = asConfigObject(result?.config);
  } else if (fs.existsSync(defaultConfigPath)) {
    const result = await explorer.load(defaultConfigPath);
    rawConfig = asConfigObject(result?.config);
  } else {
    const result = await explorer.search();
    if (result) {
      rawConfig = asConfigObject(result.config);
    } else {
      logger.debug('No config file found, using defaults');
    }
  }

  cachedConfig = parseConfig(applyEnvOverrides(rawConfig));
  return cachedConfig;
}

export function resetConfigCache(): void {
  cachedConfig = null;
}
