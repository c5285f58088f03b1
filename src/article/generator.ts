import type { Repositories } from '../entity/repositories.js';
import type { ChatModel } from '../llm/client.js';
import type { RunContext } from '../shared/context.js';
import { errorMessage } from '../shared/errors.js';
import { parseWithRetry } from './parse.js';
import { ARTICLE_PROMPT_VERSION, buildArticleMessages } from './prompts.js';

export interface GenerateArticlesOptions {
  repositories: Repositories;
  llm: ChatModel;
  /** Maximum number of articles to write in this call. */
  limit?: number;
  /** Defaults to `article.language` from config. */
  language?: string;
}

export interface GenerateArticlesResult {
  generated: number;
  skipped: number;
  failed: number;
  articleIds: string[];
}

/**
 * Write one article per transcript that has none yet. Transcripts are
 * visited oldest first; a transcript whose video or keyword is gone is
 * skipped with a warning.
 */
export async function generateArticles(
  ctx: RunContext,
  opts: GenerateArticlesOptions,
): Promise<GenerateArticlesResult> {
  const { transcripts, videos, keywords, articles } = opts.repositories;
  const language = opts.language ?? ctx.config.article.language;
  const result: GenerateArticlesResult = { generated: 0, skipped: 0, failed: 0, articleIds: [] };

  const pending = transcripts.findAll().filter((t) => articles.findByTranscriptId(t.id).length === 0);

  for (const transcript of pending) {
    if (opts.limit !== undefined && result.generated >= opts.limit) break;

    try {
      const video = videos.findById(transcript.video_id);
      const keyword = video ? keywords.findById(video.keyword_id) : undefined;
      if (!video || !keyword) {
        ctx.logger.warn(
          { transcript_id: transcript.id, video_id: transcript.video_id, video_id_found: Boolean(video) },
          'Article source chain incomplete, skipping',
        );
        result.skipped++;
        continue;
      }

      const messages = buildArticleMessages({
        keyword,
        video,
        transcript,
        language,
        maxTranscriptChars: ctx.config.article.transcript_chars,
      });
      const response = await opts.llm.chat(messages);
      const output = await parseWithRetry(response.content, opts.llm, messages[0], ctx.logger);

      const id = articles.insert({
        keyword_id: keyword.id,
        transcript_id: transcript.id,
        video_id: video.id,
        article_language: language,
        title: output.title,
        content: output.content,
        tags: output.tags.join(', '),
        seo_metadata: {
          description: output.seo.description,
          keywords: output.seo.keywords,
          prompt_version: ARTICLE_PROMPT_VERSION,
          model: response.model,
        },
        published: false,
      });
      result.articleIds.push(id);
      result.generated++;
      ctx.logger.info({ article_id: id, transcript_id: transcript.id, title: output.title }, 'Article generated');
    } catch (err) {
      result.failed++;
      ctx.logger.error({ transcript_id: transcript.id, err: errorMessage(err) }, 'Article generation failed');
    }
  }

  return result;
}
