import { CheckpointTracker } from '../checkpoint/CheckpointTracker.js';
import type { Judgment } from '../models/judgment.js';
import type { ScrapeTarget } from '../scraping/SafliiScraper.js';
import type {
  ItemFailure,
  PipelineStage,
  SourceStage,
  StageScope,
  StageServices,
  TransformStage,
} from '../stages/types.js';
import { PreconditionError, errorMessage, isTransientError } from '../utils/errors.js';
import { StageLogger } from '../utils/logger.js';
import type { StageOptions } from './options.js';

const RETRY_DELAY_MS = 2000;

// ============================================================================
// Types
// ============================================================================

export interface StageRunSummary {
  stage: number;
  id: string;
  selected: number;
  succeeded: number;
  skipped: number;
  failed: number;
  failures: ItemFailure[];
  durationMs: number;
}

export interface StageRunnerOptions {
  /** Pause between attempts of a retried item */
  retryDelayMs?: number;
}

type ItemOutcome = { status: 'succeeded' } | { status: 'skipped'; reason: string };

class ItemFailedError extends Error {
  constructor(
    public readonly failure: unknown,
    public readonly attempts: number
  ) {
    super(errorMessage(failure));
    this.name = 'ItemFailedError';
  }
}

// ============================================================================
// Stage Runner
// ============================================================================

/**
 * Runs one stage over one batch.
 *
 * Items are processed one after another. A failing item is recorded and the
 * batch continues; anything thrown outside an item (selection, listing)
 * aborts the stage.
 */
export class StageRunner {
  private retryDelayMs: number;

  constructor(
    private services: StageServices,
    options: StageRunnerOptions = {}
  ) {
    this.retryDelayMs = options.retryDelayMs ?? RETRY_DELAY_MS;
  }

  async run(stage: PipelineStage, scope: StageScope, options: StageOptions): Promise<StageRunSummary> {
    const startTime = Date.now();
    const logger = new StageLogger(stage.id);
    const checkpoint = new CheckpointTracker(this.services.repository, stage.number, scope.year, scope.court);
    const completed = await checkpoint.load();

    const summary: StageRunSummary = {
      stage: stage.number,
      id: stage.id,
      selected: 0,
      succeeded: 0,
      skipped: 0,
      failed: 0,
      failures: [],
      durationMs: 0,
    };

    logger.started({ year: scope.year, court: scope.court ?? 'all', batchSize: options.batchSize });

    const items = stage.kind === 'source'
      ? await this.sourceItems(stage, scope, options, completed, summary)
      : await this.transformItems(stage, scope, options, checkpoint.key);
    summary.selected = items.length;

    for (const item of items) {
      try {
        const outcome = await this.withRetries(stage, options, logger, item.id, item.process);
        if (outcome.status === 'skipped') {
          summary.skipped++;
          logger.itemSkipped(item.id, outcome.reason);
          continue;
        }
        summary.succeeded++;
        logger.itemSucceeded(item.id);
        await checkpoint.markCompleted(item.id);
      } catch (error) {
        if (error instanceof PreconditionError) {
          summary.skipped++;
          logger.itemSkipped(item.id, error.message);
          continue;
        }
        const attempts = error instanceof ItemFailedError ? error.attempts : 1;
        const cause = error instanceof ItemFailedError ? error.failure : error;
        summary.failed++;
        summary.failures.push({ itemId: item.id, error: errorMessage(cause) });
        logger.itemFailed(item.id, cause, attempts);
      }
    }

    summary.durationMs = Date.now() - startTime;
    logger.completed({
      selected: summary.selected,
      succeeded: summary.succeeded,
      skipped: summary.skipped,
      failed: summary.failed,
      durationMs: summary.durationMs,
    });
    return summary;
  }

  /**
   * Listed targets not yet stored and not in the checkpoint, up to batchSize
   */
  private async sourceItems(
    stage: SourceStage,
    scope: StageScope,
    options: StageOptions,
    completed: ReadonlySet<string>,
    summary: StageRunSummary
  ): Promise<Array<{ id: string; process: () => Promise<ItemOutcome> }>> {
    const { targets, failures } = await stage.discover(scope, options, this.services);
    summary.failed += failures.length;
    summary.failures.push(...failures);

    const pending: ScrapeTarget[] = [];
    for (const target of targets) {
      if (pending.length >= options.batchSize) {
        break;
      }
      if (completed.has(target.url) || (await this.services.repository.sourceUrlExists(target.url))) {
        continue;
      }
      pending.push(target);
    }

    return pending.map((target) => ({
      id: target.url,
      process: async (): Promise<ItemOutcome> => {
        const judgment = await stage.ingest(target, options, this.services);
        const inserted = await this.services.repository.insertScraped(judgment);
        return inserted ? { status: 'succeeded' } : { status: 'skipped', reason: 'Source URL already stored' };
      },
    }));
  }

  /**
   * Judgments at exactly the stage's required status, minus those in the
   * checkpoint (excluded by the store)
   */
  private async transformItems(
    stage: TransformStage,
    scope: StageScope,
    options: StageOptions,
    checkpointKey: string
  ): Promise<Array<{ id: string; process: () => Promise<ItemOutcome> }>> {
    const judgments = await this.services.repository.selectByStatus({
      status: stage.requiredStatus,
      year: scope.year,
      court: scope.court,
      limit: options.batchSize,
      excludeCheckpoint: checkpointKey,
    });

    return judgments.map((judgment) => ({
      id: judgment.id,
      process: () => this.advance(stage, judgment, options),
    }));
  }

  private async advance(stage: TransformStage, judgment: Judgment, options: StageOptions): Promise<ItemOutcome> {
    if (judgment.status !== stage.requiredStatus) {
      throw new PreconditionError(
        `Judgment is at ${judgment.status}, stage requires ${stage.requiredStatus}`,
        judgment.id
      );
    }

    const write = await stage.transform(judgment, options, this.services);
    const advanced = await this.services.repository.advance(
      judgment.id,
      stage.requiredStatus,
      stage.resultStatus,
      write
    );
    if (!advanced) {
      throw new PreconditionError(`Judgment left ${stage.requiredStatus} while processing`, judgment.id);
    }
    return { status: 'succeeded' };
  }

  /**
   * Run an item, retrying transient failures for stages that allow it
   */
  private async withRetries(
    stage: PipelineStage,
    options: StageOptions,
    logger: StageLogger,
    itemId: string,
    work: () => Promise<ItemOutcome>
  ): Promise<ItemOutcome> {
    const maxAttempts = stage.retriesItems ? options.maxRetries : 1;

    for (let attempt = 1; ; attempt++) {
      try {
        return await work();
      } catch (error) {
        if (error instanceof PreconditionError) {
          throw error;
        }
        if (attempt >= maxAttempts || !isTransientError(error)) {
          throw new ItemFailedError(error, attempt);
        }
        logger.warn('Item attempt failed, retrying', {
          itemId,
          attempt,
          maxAttempts,
          error: errorMessage(error),
        });
        await new Promise((resolve) => setTimeout(resolve, this.retryDelayMs));
      }
    }
  }
}
