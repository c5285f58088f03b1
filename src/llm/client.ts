import { z } from 'zod';
import type { Config } from '../shared/config.js';
import { LlmError, errorMessage } from '../shared/errors.js';
import type { Logger } from '../shared/logger.js';

export interface LlmMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface LlmResponse {
  content: string;
  model: string;
  token_count: number;
}

/** Anything that can answer a chat prompt; the generator only needs this. */
export interface ChatModel {
  chat(messages: LlmMessage[]): Promise<LlmResponse>;
}

// OpenAI-compatible chat completions response (partial)
const CompletionSchema = z.object({
  choices: z.array(z.object({ message: z.object({ content: z.string().nullable() }) })).default([]),
  model: z.string().default(''),
  usage: z.object({ total_tokens: z.number().optional() }).optional(),
});

const DEFAULT_BASE_URL = 'https://api.openai.com/v1';

export class LlmClient implements ChatModel {
  private readonly url: string;

  constructor(
    private readonly config: Config['llm'],
    private readonly logger: Logger,
  ) {
    this.url = `${(config.base_url || DEFAULT_BASE_URL).replace(/\/+$/, '')}/chat/completions`;
  }

  isConfigured(): boolean {
    return this.config.api_key.length > 0;
  }

  async chat(messages: LlmMessage[]): Promise<LlmResponse> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.config.timeout_ms);

    let response: Response;
    try {
      response = await fetch(this.url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.config.api_key}`,
        },
        body: JSON.stringify({
          model: this.config.model,
          messages,
          max_tokens: this.config.max_tokens,
          temperature: this.config.temperature,
        }),
        signal: controller.signal,
      });
    } catch (err) {
      if (err instanceof Error && err.name === 'AbortError') {
        throw new LlmError(`LLM request timed out after ${this.config.timeout_ms}ms`, { url: this.url });
      }
      throw new LlmError(`LLM request failed: ${errorMessage(err)}`, { url: this.url, model: this.config.model });
    } finally {
      clearTimeout(timer);
    }

    if (!response.ok) {
      const text = await response.text().catch(() => '');
      throw new LlmError(`LLM API error: ${response.status} ${response.statusText}`.trim(), {
        status: response.status,
        body: text.slice(0, 500),
        url: this.url,
      });
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch {
      throw new LlmError('LLM response is not valid JSON', { url: this.url });
    }

    const parsed = CompletionSchema.safeParse(body);
    const content = parsed.success ? parsed.data.choices[0]?.message.content : undefined;
    if (!parsed.success || !content) {
      throw new LlmError('LLM returned empty content', { response: JSON.stringify(body).slice(0, 200) });
    }

    const tokenCount = parsed.data.usage?.total_tokens ?? 0;
    this.logger.debug({ model: parsed.data.model, tokens: tokenCount }, 'LLM call completed');

    return { content, model: parsed.data.model || this.config.model, token_count: tokenCount };
  }
}
