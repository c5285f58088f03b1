#!/usr/bin/env node

import { Command } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import { generateArticles } from '../article/generator.js';
import { closeDb, initDb, resetDbInstance } from '../db/db.js';
import { runMigrations } from '../db/migrate.js';
import { COLLECTIONS, SqliteDocumentStore } from '../db/store.js';
import type { Repositories } from '../entity/repositories.js';
import type { Article } from '../entity/schemas.js';
import { isPlatform } from '../keywords/platforms.js';
import { LlmClient } from '../llm/client.js';
import { listRegions, resolveRegion } from '../region/catalog.js';
import { loadConfig, writeDefaultConfig, type Config } from '../shared/config.js';
import { createRunContext, type RunContext } from '../shared/context.js';
import { errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { getTrendscribeDir, resolvePath } from '../shared/utils.js';
import { ApiTranscriber } from '../transcript/transcriber.js';
import { createDailyWorkflow, repositoriesFor } from '../workflow/factory.js';
import { startDailySchedule } from '../workflow/scheduler.js';

const program = new Command();

program
  .name('trendscribe')
  .description('Turn trending keywords into video transcripts and articles')
  .version('0.1.0');

// === init ===
program
  .command('init')
  .description('Create config and database')
  .action(async () => {
    const configPath = path.join(getTrendscribeDir(), 'config.yaml');

    if (!fs.existsSync(configPath)) {
      writeDefaultConfig(configPath);
      log(`✓ ${configPath} created`);
    } else {
      log(`✓ ${configPath} already exists`);
    }

    const config = await loadConfig();
    const dbPath = resolvePath(config.db.path);
    const db = initDb(dbPath);
    const { applied } = runMigrations(db);
    if (applied.length > 0) {
      log(`✓ ${dbPath} created (${applied.length} migrations applied)`);
    } else {
      log(`✓ ${dbPath} already up to date`);
    }

    closeDb();
    resetDbInstance();
  });

// === doctor ===
program
  .command('doctor')
  .description('Check config, database and credentials')
  .action(async () => {
    const results: string[] = [];

    try {
      const config = await loadConfig();
      results.push('Config: ok');

      const dbPath = resolvePath(config.db.path);
      if (!fs.existsSync(dbPath)) {
        results.push('DB: missing (run trendscribe init)');
      } else {
        try {
          const db = initDb(dbPath);
          runMigrations(db);
          results.push('DB: ok');
        } catch (err) {
          results.push(`DB: error (${errorMessage(err)})`);
        } finally {
          closeDb();
          resetDbInstance();
        }
      }

      const badRegions = config.workflow.regions.filter((code) => {
        try {
          resolveRegion(code);
          return false;
        } catch {
          return true;
        }
      });
      results.push(badRegions.length > 0 ? `Regions: unknown ${badRegions.join(', ')}` : 'Regions: ok');
      results.push(config.credentials.youtube_api_key ? 'YouTube: configured' : 'YouTube: missing api key');
      if (config.workflow.platforms.includes('twitter')) {
        results.push(config.credentials.twitter_bearer_token ? 'Twitter: configured' : 'Twitter: missing bearer token');
      }
      const transcriber = new ApiTranscriber(config.transcribe, logger);
      results.push(transcriber.isConfigured() ? 'Transcriber: configured' : 'Transcriber: (unconfigured)');
      const llm = new LlmClient(config.llm, logger);
      results.push(llm.isConfigured() ? 'LLM: configured' : 'LLM: (unconfigured)');
    } catch (err) {
      results.push(`Config: error (${errorMessage(err)})`);
      process.exitCode = 1;
    }

    log(results.join(' | '));
  });

// === run ===
program
  .command('run')
  .description('Run the daily workflow once')
  .action(async () => {
    const { config, db, cleanup } = await openStore();
    try {
      const ctx = createRunContext(config);
      const summary = await createDailyWorkflow(ctx, db).run();

      log(`\nRun ${summary.runId} ${summary.state}:`);
      log(`  Keywords fetched:   ${summary.keywordsFetched}`);
      log(`  Keywords dropped:   ${summary.keywordsDropped}`);
      log(`  Videos found:       ${summary.videosFound}`);
      log(`  Videos downloaded:  ${summary.videosDownloaded}`);
      log(`  Transcripts:        ${summary.transcriptsCreated}`);
      log(`  Duration:           ${summary.durationMs}ms`);

      if (summary.failures.length > 0) {
        log('\nFailures:');
        for (const f of summary.failures) {
          log(`  [${f.stage}] ${f.reason} ${JSON.stringify(f.context)}`);
        }
      }
    } catch (err) {
      log(`Error: ${errorMessage(err)}`);
      process.exitCode = 1;
    } finally {
      cleanup();
    }
  });

// === schedule ===
program
  .command('schedule')
  .description('Run the daily workflow on schedule.daily_cron until interrupted')
  .option('--cron <expr>', 'Override schedule.daily_cron')
  .action(async (opts: { cron?: string }) => {
    const { config, db, cleanup } = await openStore();
    const cronExpr = opts.cron ?? config.schedule.daily_cron;

    const handle = startDailySchedule(
      cronExpr,
      () => createDailyWorkflow(createRunContext(config), db).run(),
      logger,
    );
    if (!handle) {
      log(`Invalid cron expression: ${cronExpr}`);
      cleanup();
      process.exitCode = 1;
      return;
    }

    log(`Scheduled daily run: ${cronExpr} (Ctrl+C to stop)`);
    const shutdown = () => {
      handle.stop();
      cleanup();
      process.exit(0);
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
  });

// === regions ===
program
  .command('regions')
  .description('List supported regions')
  .action(() => {
    for (const r of listRegions()) {
      const videoRegion = r.video_region_code ?? '-';
      log(`${r.code.padEnd(7)} ${r.name.padEnd(12)} trends:${r.trends_geo.padEnd(10)} video:${videoRegion.padEnd(4)} woeid:${r.microblog_woeid}`);
    }
  });

// === keywords ===
const keywordsCmd = program.command('keywords').description('Inspect stored keywords');

keywordsCmd
  .command('list')
  .description('List keywords for a platform and region, best rank first')
  .option('-p, --platform <platform>', 'Platform', 'google_trends')
  .option('-r, --region <code>', 'Region code', 'TW')
  .action(async (opts: { platform: string; region: string }) => {
    const platform = opts.platform;
    if (!isPlatform(platform)) {
      log(`Unknown platform: ${platform}`);
      process.exitCode = 1;
      return;
    }
    await withRepositories((repos) => {
      const rows = repos.keywords.findByPlatformRegion(platform, opts.region);
      if (rows.length === 0) {
        log('No keywords stored for that platform and region.');
        return;
      }
      for (const k of rows) {
        log(`#${String(k.rank).padStart(3)}  ${String(k.score).padStart(9)}  ${k.keyword}  (${k.id}, ${k.created_at})`);
      }
    });
  });

// === videos ===
program
  .command('videos')
  .description('Inspect stored videos')
  .command('list')
  .description('List videos found for a keyword')
  .requiredOption('-k, --keyword <id>', 'Keyword id')
  .action(async (opts: { keyword: string }) => {
    await withRepositories((repos) => {
      const rows = repos.videos.findByKeywordId(opts.keyword);
      if (rows.length === 0) {
        log('No videos for that keyword.');
        return;
      }
      for (const v of rows) {
        log(`${v.id}  ${v.youtube_id}  ${formatSeconds(v.duration).padStart(8)}  ${String(v.views).padStart(10)} views  ${v.title}`);
      }
    });
  });

// === transcripts ===
const transcriptsCmd = program.command('transcripts').description('Inspect stored transcripts');

transcriptsCmd
  .command('show <videoId>')
  .description('Print the latest transcript of a video')
  .option('-a, --all', 'Print every stored transcript, oldest first')
  .action(async (videoId: string, opts: { all?: boolean }) => {
    await withRepositories((repos) => {
      const rows = opts.all
        ? repos.transcripts.findByVideoId(videoId)
        : [repos.transcripts.findLatestByVideoId(videoId)].flatMap((t) => (t ? [t] : []));
      if (rows.length === 0) {
        log('No transcript for that video.');
        process.exitCode = 1;
        return;
      }
      for (const t of rows) {
        log(`--- ${t.id} (${t.language}, ${t.created_at}) ---`);
        log(t.transcript);
      }
    });
  });

transcriptsCmd
  .command('list')
  .description('List transcripts')
  .option('-l, --language <code>', 'Only transcripts in this language')
  .action(async (opts: { language?: string }) => {
    await withRepositories((repos) => {
      const rows = opts.language ? repos.transcripts.findByLanguage(opts.language) : repos.transcripts.findAll();
      for (const t of rows) {
        log(`${t.id}  video:${t.video_id}  ${t.language.padEnd(4)} ${String(t.transcript.length).padStart(7)} chars`);
      }
      log(`\n${rows.length} transcripts`);
    });
  });

// === articles ===
const articlesCmd = program.command('articles').description('Generate and publish articles');

articlesCmd
  .command('generate')
  .description('Write articles for transcripts that have none yet')
  .option('-n, --limit <n>', 'Maximum articles to generate')
  .option('-l, --language <code>', 'Article language (default: article.language)')
  .action(async (opts: { limit?: string; language?: string }) => {
    const { config, db, cleanup } = await openStore();
    try {
      const ctx = createRunContext(config);
      const llm = new LlmClient(config.llm, ctx.logger);
      if (!llm.isConfigured()) {
        log('LLM is not configured. Set llm.api_key or TRENDSCRIBE_LLM_API_KEY.');
        process.exitCode = 1;
        return;
      }
      const result = await generateArticles(ctx, {
        repositories: repositoriesFor(db, ctx),
        llm,
        limit: opts.limit ? parseInt(opts.limit, 10) : undefined,
        language: opts.language,
      });
      log(`Generated: ${result.generated}  Skipped: ${result.skipped}  Failed: ${result.failed}`);
    } finally {
      cleanup();
    }
  });

articlesCmd
  .command('list')
  .description('List articles')
  .option('-l, --language <code>', 'Only articles in this language')
  .option('--published', 'Only published articles')
  .action(async (opts: { language?: string; published?: boolean }) => {
    await withRepositories((repos) => {
      let rows: Article[];
      if (opts.language) {
        rows = repos.articles.findByLanguage(opts.language);
        if (opts.published) rows = rows.filter((a) => a.published);
      } else {
        rows = opts.published ? repos.articles.findPublished() : repos.articles.findAll();
      }
      for (const a of rows) {
        log(`${a.published ? '●' : '○'} ${a.id}  ${a.article_language.padEnd(4)} ${a.title}`);
      }
      log(`\n${rows.length} articles`);
    });
  });

for (const [name, published] of [
  ['publish', true],
  ['unpublish', false],
] as const) {
  articlesCmd
    .command(`${name} <id>`)
    .description(published ? 'Mark an article as published' : 'Mark an article as unpublished')
    .action(async (id: string) => {
      await withRepositories((repos) => {
        if (!repos.articles.findById(id)) {
          log(`Article not found: ${id}`);
          process.exitCode = 1;
          return;
        }
        const changed = repos.articles.updatePublishStatus(id, published);
        log(changed ? `✓ ${id} ${name}ed` : `${id} already ${name}ed`);
      });
    });
}

// === db ===
const dbCmd = program.command('db').description('Database maintenance');

dbCmd
  .command('describe')
  .description('Show collections and document counts')
  .action(async () => {
    const { db, cleanup } = await openStore();
    try {
      const store = new SqliteDocumentStore(db);
      for (const collection of COLLECTIONS) {
        log(`${collection.padEnd(12)} ${String(store.count(collection)).padStart(8)} documents`);
      }
    } finally {
      cleanup();
    }
  });

dbCmd
  .command('empty')
  .description('Delete every document from every collection')
  .option('--yes', 'Confirm deletion')
  .action(async (opts: { yes?: boolean }) => {
    if (!opts.yes) {
      log('Refusing to delete without --yes.');
      process.exitCode = 1;
      return;
    }
    const { db, cleanup } = await openStore();
    try {
      const store = new SqliteDocumentStore(db);
      for (const collection of COLLECTIONS) {
        log(`✓ ${collection}: ${store.deleteAll(collection)} deleted`);
      }
    } finally {
      cleanup();
    }
  });

async function openStore(): Promise<{
  config: Config;
  db: ReturnType<typeof initDb>;
  cleanup: () => void;
}> {
  const config = await loadConfig();
  const dbPath = resolvePath(config.db.path);

  if (!fs.existsSync(dbPath)) {
    log('Database not found. Run trendscribe init first.');
    process.exit(1);
  }

  const db = initDb(dbPath);
  runMigrations(db);

  return {
    config,
    db,
    cleanup: () => {
      closeDb();
      resetDbInstance();
    },
  };
}

async function withRepositories(fn: (repos: Repositories, ctx: RunContext) => void): Promise<void> {
  const { config, db, cleanup } = await openStore();
  try {
    const ctx = createRunContext(config);
    fn(repositoriesFor(db, ctx), ctx);
  } finally {
    cleanup();
  }
}

function formatSeconds(total: number): string {
  const h = Math.floor(total / 3600);
  const m = Math.floor((total % 3600) / 60);
  const s = total % 60;
  const mm = String(m).padStart(2, '0');
  const ss = String(s).padStart(2, '0');
  return h > 0 ? `${h}:${mm}:${ss}` : `${m}:${ss}`;
}

function log(msg: string): void {
  // eslint-disable-next-line no-console
  console.log(msg);
}

program.parseAsync().catch((err: unknown) => {
  log(`Error: ${errorMessage(err)}`);
  process.exitCode = 1;
});
