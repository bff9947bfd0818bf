import type { PipelineStage, StageServices } from '../stages/types.js';
import { validateStageOptions } from './options.js';
import type { StageOptions } from './options.js';

export interface PlannedStage {
  stage: PipelineStage;
  options: StageOptions;
}

/**
 * Check every planned stage before any of them runs: shared option checks,
 * then the stage's own preparation (option checks, credentials, config
 * files). The first ConfigurationError aborts the whole run.
 */
export async function preflight(plan: PlannedStage[], services: StageServices): Promise<void> {
  for (const { options } of plan) {
    validateStageOptions(options);
  }
  for (const { stage, options } of plan) {
    if (stage.prepare) {
      await stage.prepare(options, services);
    }
  }
}
