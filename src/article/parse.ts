import { z } from 'zod';
import type { ChatModel, LlmMessage } from '../llm/client.js';
import { LlmError, errorMessage } from '../shared/errors.js';
import type { Logger } from '../shared/logger.js';
import { buildRepairPrompt } from './prompts.js';

export const ArticleOutputSchema = z.object({
  title: z.string().trim().min(1),
  content: z.string().min(10),
  tags: z.array(z.string().trim().min(1)).default([]),
  seo: z
    .object({
      description: z.string().default(''),
      keywords: z.array(z.string()).default([]),
    })
    .default({}),
});

export type ArticleOutput = z.infer<typeof ArticleOutputSchema>;

function stripCodeFences(raw: string): string {
  return raw
    .trim()
    .replace(/^```(?:json)?\s*/i, '')
    .replace(/\s*```\s*$/, '')
    .trim();
}

/** First balanced `{...}` in `text`, ignoring braces inside JSON strings. */
export function extractJsonObject(text: string): string | undefined {
  const start = text.indexOf('{');
  if (start < 0) return undefined;

  let depth = 0;
  let inString = false;
  let escaped = false;
  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === '{') depth++;
    else if (ch === '}') {
      depth--;
      if (depth === 0) return text.slice(start, i + 1);
    }
  }
  return undefined;
}

/** Validate model output. Throws LlmError with the parse or schema problem. */
export function parseArticleOutput(raw: string): ArticleOutput {
  const json = extractJsonObject(stripCodeFences(raw));
  if (!json) {
    throw new LlmError('LLM output contains no JSON object', { raw: raw.slice(0, 200) });
  }

  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (err) {
    throw new LlmError(`LLM output is not valid JSON: ${errorMessage(err)}`, { raw: json.slice(0, 200) });
  }

  const result = ArticleOutputSchema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new LlmError(`LLM output failed validation: ${where}${issue?.message ?? 'invalid'}`, {
      raw: json.slice(0, 200),
    });
  }
  return result.data;
}

/**
 * Parse model output, asking the model once to repair it when it does not
 * validate.
 */
export async function parseWithRetry(
  rawOutput: string,
  model: ChatModel,
  systemMessage: LlmMessage,
  logger: Logger,
): Promise<ArticleOutput> {
  try {
    return parseArticleOutput(rawOutput);
  } catch (err) {
    if (!(err instanceof LlmError)) throw err;
    logger.warn({ err: err.message }, 'LLM output invalid, attempting repair');

    const repaired = await model.chat([
      systemMessage,
      { role: 'user', content: buildRepairPrompt(err.message, rawOutput) },
    ]);
    try {
      return parseArticleOutput(repaired.content);
    } catch (repairErr) {
      throw new LlmError('LLM output invalid after repair attempt', {
        original_error: err.message,
        repair_error: errorMessage(repairErr),
      });
    }
  }
}
