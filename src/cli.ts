#!/usr/bin/env node

import { CliUsageError, COMMANDS, parseArgs } from './cli/args.js';
import type { CliCommand } from './cli/args.js';
import { createEmbeddingClient } from './clients/embeddings/index.js';
import { SupabaseVectorStore } from './clients/SupabaseVectorStore.js';
import { classifyPracticeAreas } from './commands/classifyPracticeAreas.js';
import { initDb } from './commands/initDb.js';
import { searchJudgments } from './commands/search.js';
import { testConnections } from './commands/testConnections.js';
import { updateFeaturedJudgment } from './commands/updateFeaturedJudgment.js';
import { DatabaseConfig } from './config/database.js';
import { OpenAIConfig } from './config/openai.js';
import { BASE_OPTIONS, resolveStageOptions } from './pipeline/options.js';
import { PipelineOrchestrator } from './pipeline/PipelineOrchestrator.js';
import { createStageServices } from './pipeline/services.js';
import { STAGES } from './stages/index.js';
import { PgJudgmentRepository } from './storage/PgJudgmentRepository.js';
import { logger } from './utils/logger.js';

/**
 * CLI for the judgment processing pipeline
 *
 * Usage:
 *   npm run dev list                                  - List stages and defaults
 *   npm run dev run --stage 3 --year 2023             - Run one stage
 *   npm run dev run-all --year 2023 --court ZACC      - Run stages 1-8
 *   npm run dev classify-practice-areas [--force]     - (Re)classify judgments
 *   npm run dev update-featured-judgment              - Pick this week's featured judgment
 *   npm run dev search "unfair dismissal"             - Hybrid vector search
 *   npm run dev test-connections                      - Check configured services
 *   npm run dev init-db                               - Create tables and functions
 */

/**
 * List stages with their default options
 */
function listStages(): void {
  console.log('\n📋 Pipeline stages:\n');

  for (const stage of STAGES) {
    const options = resolveStageOptions(stage.defaults);
    const from = stage.kind === 'transform' ? stage.requiredStatus : '(new)';

    console.log(`${stage.number}. ${stage.id} - ${stage.description}`);
    console.log(`   Status: ${from} → ${stage.resultStatus}`);

    const shown = Object.entries(stage.defaults).map(([key, value]) => `${key}=${String(value)}`);
    console.log(`   Defaults: ${shown.join(', ')}`);
    if (stage.retriesItems) {
      console.log(`   Retries: up to ${options.maxRetries} attempts per item`);
    }
    console.log('');
  }
}

async function runStages(command: Extract<CliCommand, { command: 'run' }>): Promise<void> {
  DatabaseConfig.getConfig();

  const repository = new PgJudgmentRepository();
  const orchestrator = new PipelineOrchestrator(createStageServices(repository));
  // Item failures are reported in the summary; only an aborted stage fails the command
  await orchestrator.run({
    stages: command.stages,
    scope: { year: command.year, court: command.court },
    overrides: command.overrides,
    resetCheckpoint: command.resetCheckpoint,
  });
}

async function runClassification(command: Extract<CliCommand, { command: 'classify-practice-areas' }>): Promise<void> {
  DatabaseConfig.getConfig();

  const repository = new PgJudgmentRepository();
  const services = createStageServices(repository);
  const classifier = await services.classifier(command.model ?? OpenAIConfig.getModel());
  const result = await classifyPracticeAreas(repository, classifier, {
    batchSize: command.batchSize,
    force: command.force,
  });

  console.log(`\n${'='.repeat(80)}`);
  console.log(`✅ Classified ${result.processed} judgments`);
  console.log(`   Classified: ${result.classified}  Not Classified: ${result.notClassified}  Failed: ${result.failed}`);
  for (const [area, count] of Object.entries(result.byArea).sort((a, b) => b[1] - a[1])) {
    console.log(`   ${area}: ${count}`);
  }
  console.log(`${'='.repeat(80)}\n`);
}

async function runFeaturedUpdate(): Promise<void> {
  DatabaseConfig.getConfig();

  const featured = await updateFeaturedJudgment(new PgJudgmentRepository());
  if (featured) {
    console.log(`\n⭐ Featured: ${featured.title} (score ${featured.reportability?.score ?? 0})`);
  } else {
    console.log('\n⚠️  No scored judgment dated this week; featured flag cleared');
  }
}

async function runSearch(command: Extract<CliCommand, { command: 'search' }>): Promise<void> {
  const matches = await searchJudgments(
    command.query,
    { limit: command.limit, court: command.court },
    { embeddings: createEmbeddingClient(), store: new SupabaseVectorStore() }
  );

  if (matches.length === 0) {
    console.log('\nNo matching judgments.');
    return;
  }

  console.log(`\n🔎 ${matches.length} result(s) for "${command.query}":\n`);
  matches.forEach((match, i) => {
    const score = match.score === null ? '' : ` [${match.score.toFixed(4)}]`;
    console.log(`${i + 1}. ${match.title}${score}`);
    console.log(`   ${match.court ?? 'Unknown court'}, ${match.judgmentDate ?? 'undated'}`);
    if (match.shortSummary) {
      console.log(`   ${match.shortSummary}`);
    }
    console.log('');
  });
}

async function runConnectionTests(): Promise<boolean> {
  console.log('\n🧪 Testing connections...\n');

  const checks = await testConnections();
  for (const check of checks) {
    const icon = check.reachable === false ? '❌' : check.configured ? '✅' : '⚠️ ';
    const detail = check.reachable === false ? 'unreachable' : check.configured ? 'configured' : 'not configured';
    console.log(`${icon} ${check.service}: ${detail}`);
  }

  const database = checks.find((check) => check.service === 'PostgreSQL');
  return database?.reachable === true;
}

/**
 * Print help message
 */
function printHelp(): void {
  console.log(`
South African Judgment Processing Pipeline

USAGE:
  npm run dev <command> [options]

COMMANDS:
  list                                 List stages and their default options
  run --stage N --year Y               Run one stage
  run --stages 1,2,3 --year Y          Run several stages in order
  run-all --year Y                     Run stages 1-8
  classify-practice-areas              Classify judgments without a practice area
  update-featured-judgment             Feature this week's highest-scoring judgment
  search "<query>"                     Hybrid full-text and vector search
  test-connections                     Check database and provider configuration
  init-db                              Create tables, indexes and search function
  help                                 Show this help message

RUN OPTIONS:
  --year Y                 Judgment year (required)
  --court C                Court code, e.g. ZACC (default: all)
  --batch-size N           Items per stage run
  --timeout S              Scraping timeout in seconds (default ${BASE_OPTIONS.timeoutSeconds})
  --max-retries N          Attempts per item for stages 1 and 4 (default ${BASE_OPTIONS.maxRetries})
  --chunk-size N           Chunk size in characters (default ${BASE_OPTIONS.chunkSize})
  --overlap N              Chunk overlap in characters (default ${BASE_OPTIONS.overlap})
  --model M                LLM model; claude-* models use Anthropic (default ${BASE_OPTIONS.model})
  --max-tokens N           Long summary token limit (default ${BASE_OPTIONS.maxTokens})
  --min-reportability N    Minimum score for a long summary (default ${BASE_OPTIONS.minReportability})
  --reset-checkpoint       Clear the stage checkpoint before running

OTHER OPTIONS:
  classify-practice-areas  --batch-size N (default 20), --force, --model M
  search                   --limit N (default 10), --court C

EXAMPLES:
  npm run dev run --stage 1 --year 2023 --court ZACC
  npm run dev run --stages 5,6,7 --year 2023 --model claude-3-5-sonnet-20240620
  npm run dev run-all --year 2024 --batch-size 20
  npm run dev search "eviction of unlawful occupiers" --court ZASCA

ENVIRONMENT:
  Configuration is loaded from .env file
  Required variables:
    - PGHOST, PGUSER, PGPASSWORD, PGDATABASE, PGPORT
    - OPENAI_API_KEY (or ANTHROPIC_API_KEY for claude-* models)
    - VOYAGE_API_KEY and/or OPENAI_API_KEY for embeddings
    - SUPABASE_URL, SUPABASE_SERVICE_ROLE_KEY for search
`);
}

/**
 * Main CLI entry point
 */
async function main(): Promise<void> {
  const startTime = Date.now();
  let exitCode = 0;

  try {
    const command = parseArgs(process.argv.slice(2));

    switch (command.command) {
      case 'help':
        printHelp();
        return;

      case 'list':
        listStages();
        return;

      case 'run':
        await runStages(command);
        break;

      case 'classify-practice-areas':
        await runClassification(command);
        break;

      case 'update-featured-judgment':
        await runFeaturedUpdate();
        break;

      case 'search':
        await runSearch(command);
        break;

      case 'test-connections':
        if (!(await runConnectionTests())) {
          exitCode = 1;
        }
        break;

      case 'init-db':
        await initDb();
        console.log('\n✅ Database schema applied');
        break;
    }

    console.log(`⏱️  Total runtime: ${((Date.now() - startTime) / 1000).toFixed(1)}s`);
  } catch (error) {
    exitCode = 1;
    if (error instanceof CliUsageError) {
      console.error(`Error: ${error.message}`);
      console.error(`Valid commands: ${COMMANDS.join(', ')} (see: npm run dev help)`);
    } else {
      logger.error('Command failed', { error: error instanceof Error ? error.message : String(error) });
      console.error('\n❌ Command failed:', error instanceof Error ? error.message : String(error));
    }
  } finally {
    await DatabaseConfig.close();
  }

  process.exitCode = exitCode;
}

// Run CLI
main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
