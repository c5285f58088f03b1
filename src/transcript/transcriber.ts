import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import type { Config } from '../shared/config.js';
import { CollaboratorError, errorMessage } from '../shared/errors.js';
import { fetchJson } from '../shared/http.js';
import type { Logger } from '../shared/logger.js';
import type { Transcriber, TranscriptionResult } from './types.js';

const DEFAULT_BASE_URL = 'https://api.openai.com/v1';

// Whisper reports languages by name in verbose_json.
const LANGUAGE_NAMES: Record<string, string> = {
  english: 'en',
  chinese: 'zh',
  japanese: 'ja',
  korean: 'ko',
  cantonese: 'yue',
};

const TranscriptionSchema = z.object({
  text: z.string(),
  language: z.string().optional(),
});

export function normalizeLanguage(language: string): string {
  const lower = language.trim().toLowerCase();
  return LANGUAGE_NAMES[lower] ?? lower;
}

/** Speech-to-text over an OpenAI-compatible `/audio/transcriptions` endpoint. */
export class ApiTranscriber implements Transcriber {
  private readonly url: string;

  constructor(
    private readonly config: Config['transcribe'],
    private readonly logger: Logger,
  ) {
    this.url = `${(config.base_url || DEFAULT_BASE_URL).replace(/\/+$/, '')}/audio/transcriptions`;
  }

  isConfigured(): boolean {
    return this.config.api_key.length > 0;
  }

  async transcribe(filePath: string): Promise<TranscriptionResult> {
    let audio: Buffer;
    try {
      audio = await fs.readFile(filePath);
    } catch (err) {
      throw new CollaboratorError('transcriber', `Cannot read media file: ${errorMessage(err)}`, { path: filePath });
    }

    const form = new FormData();
    form.append('file', new Blob([audio]), path.basename(filePath));
    form.append('model', this.config.model);
    form.append('response_format', 'verbose_json');
    if (this.config.language !== 'auto') {
      form.append('language', this.config.language);
    }

    const data = await fetchJson(
      this.url,
      {
        method: 'POST',
        headers: { Authorization: `Bearer ${this.config.api_key}` },
        body: form,
      },
      { collaborator: 'transcriber', timeoutMs: this.config.timeout_ms },
    );

    const parsed = TranscriptionSchema.safeParse(data);
    if (!parsed.success) {
      throw new CollaboratorError('transcriber', 'Unexpected transcription response shape', { path: filePath });
    }

    const language = parsed.data.language ?? (this.config.language === 'auto' ? 'und' : this.config.language);
    this.logger.debug({ path: filePath, chars: parsed.data.text.length }, 'Transcription received');
    return { text: parsed.data.text.trim(), language: normalizeLanguage(language) };
  }
}
