import { chunkJudgmentsStage } from './chunk-judgments/stage.js';
import { classifyPracticeAreasStage } from './classify-practice-areas/stage.js';
import { fixMetadataStage } from './fix-metadata/stage.js';
import { generateEmbeddingsStage } from './generate-embeddings/stage.js';
import { longSummaryStage } from './long-summary/stage.js';
import { reportabilityStage } from './reportability/stage.js';
import { scrapeJudgmentsStage } from './scrape-judgments/stage.js';
import { shortSummaryStage } from './short-summary/stage.js';
import type { PipelineStage } from './types.js';

export type { PipelineStage, SourceStage, StageScope, StageServices, TransformStage } from './types.js';

/**
 * All stages, in execution order
 */
export const STAGES: readonly PipelineStage[] = [
  scrapeJudgmentsStage,
  fixMetadataStage,
  chunkJudgmentsStage,
  generateEmbeddingsStage,
  shortSummaryStage,
  reportabilityStage,
  longSummaryStage,
  classifyPracticeAreasStage,
];

export function getStage(stageNumber: number): PipelineStage | undefined {
  return STAGES.find((stage) => stage.number === stageNumber);
}
