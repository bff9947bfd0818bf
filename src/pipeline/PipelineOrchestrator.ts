/**
 * Pipeline Orchestrator
 *
 * Runs the requested stages in order for one year (and optionally one
 * court). All stages are planned and checked before the first one starts.
 * Item failures are counted and the run continues; an error that aborts a
 * stage stops the run.
 */

import { CheckpointTracker } from '../checkpoint/CheckpointTracker.js';
import { getStage } from '../stages/index.js';
import type { StageScope, StageServices } from '../stages/types.js';
import { ConfigurationError, errorMessage } from '../utils/errors.js';
import { StageLogger, createLogger } from '../utils/logger.js';
import { resolveStageOptions } from './options.js';
import type { StageOptionOverrides } from './options.js';
import { preflight } from './preflight.js';
import type { PlannedStage } from './preflight.js';
import { StageRunner } from './StageRunner.js';
import type { StageRunSummary } from './StageRunner.js';

const logger = createLogger('PipelineOrchestrator');

// ============================================================================
// Types
// ============================================================================

export interface PipelineRunRequest {
  stages: number[];
  scope: StageScope;
  overrides?: StageOptionOverrides;
  /** Clear each stage's checkpoint before running it */
  resetCheckpoint?: boolean;
}

export interface PipelineRunResult {
  summaries: StageRunSummary[];
  succeeded: number;
  failed: number;
  skipped: number;
  durationMs: number;
}

// ============================================================================
// Pipeline Orchestrator
// ============================================================================

export class PipelineOrchestrator {
  private runner: StageRunner;

  constructor(
    private services: StageServices,
    runner?: StageRunner
  ) {
    this.runner = runner ?? new StageRunner(services);
  }

  /**
   * Resolve stage numbers and options; unknown stages are a configuration
   * error
   */
  plan(request: PipelineRunRequest): PlannedStage[] {
    if (request.stages.length === 0) {
      throw new ConfigurationError('No stages requested');
    }

    const numbers = [...new Set(request.stages)].sort((a, b) => a - b);
    return numbers.map((stageNumber) => {
      const stage = getStage(stageNumber);
      if (!stage) {
        throw new ConfigurationError(`Unknown stage: ${stageNumber} (stages are 1-8)`);
      }
      return { stage, options: resolveStageOptions(stage.defaults, request.overrides) };
    });
  }

  async run(request: PipelineRunRequest): Promise<PipelineRunResult> {
    const startTime = Date.now();
    const plan = this.plan(request);
    await preflight(plan, this.services);

    const { scope } = request;
    const summaries: StageRunSummary[] = [];

    console.log(`\n${'='.repeat(80)}`);
    console.log(`🚀 Pipeline starting: stages ${plan.map((p) => p.stage.number).join(', ')}`);
    console.log(`   Year: ${scope.year}  Court: ${scope.court ?? 'all'}`);
    console.log(`${'='.repeat(80)}\n`);

    for (const { stage, options } of plan) {
      if (request.resetCheckpoint) {
        await new CheckpointTracker(this.services.repository, stage.number, scope.year, scope.court).reset();
      }

      console.log(`\n▶️  Stage ${stage.number}: ${stage.description}`);

      let summary: StageRunSummary;
      try {
        summary = await this.runner.run(stage, scope, options);
      } catch (error) {
        new StageLogger(stage.id).aborted(error);
        console.log(`   💥 Stage ${stage.number} aborted: ${errorMessage(error)}`);
        throw error;
      }

      summaries.push(summary);
      console.log(
        `   ✅ ${summary.succeeded} succeeded, ${summary.failed} failed, ${summary.skipped} skipped ` +
          `(${summary.selected} selected) in ${(summary.durationMs / 1000).toFixed(1)}s`
      );
      for (const failure of summary.failures) {
        console.log(`      ❌ ${failure.itemId}: ${failure.error}`);
      }
    }

    const result: PipelineRunResult = {
      summaries,
      succeeded: summaries.reduce((sum, s) => sum + s.succeeded, 0),
      failed: summaries.reduce((sum, s) => sum + s.failed, 0),
      skipped: summaries.reduce((sum, s) => sum + s.skipped, 0),
      durationMs: Date.now() - startTime,
    };

    console.log(`\n${'='.repeat(80)}`);
    console.log(`✅ Pipeline completed in ${(result.durationMs / 1000).toFixed(1)}s`);
    console.log(`   Succeeded: ${result.succeeded}  Failed: ${result.failed}  Skipped: ${result.skipped}`);
    console.log(`${'='.repeat(80)}\n`);

    logger.info('Pipeline completed', {
      stages: plan.map((p) => p.stage.number),
      succeeded: result.succeeded,
      failed: result.failed,
      skipped: result.skipped,
      durationMs: result.durationMs,
    });

    return result;
  }
}
