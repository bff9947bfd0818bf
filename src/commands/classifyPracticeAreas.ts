import type { PracticeAreaClassifier } from '../classification/index.js';
import { NOT_CLASSIFIED } from '../models/practiceArea.js';
import type { JudgmentRepository } from '../storage/JudgmentRepository.js';
import { errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('ClassifyPracticeAreas');

export const DEFAULT_CLASSIFY_BATCH_SIZE = 20;

export interface ClassifyCommandOptions {
  batchSize: number;
  /** Reclassify judgments that already have an area */
  force: boolean;
}

export interface ClassifyCommandResult {
  processed: number;
  classified: number;
  notClassified: number;
  failed: number;
  /** Judgments per label written in this run */
  byArea: Record<string, number>;
}

/**
 * (Re)classify judgments outside the staged pipeline. Only the practice area
 * is written; lifecycle status is left alone.
 */
export async function classifyPracticeAreas(
  repository: JudgmentRepository,
  classifier: PracticeAreaClassifier,
  options: ClassifyCommandOptions
): Promise<ClassifyCommandResult> {
  const judgments = await repository.selectForClassification({
    limit: options.batchSize,
    force: options.force,
  });

  const result: ClassifyCommandResult = { processed: 0, classified: 0, notClassified: 0, failed: 0, byArea: {} };
  logger.info('Classifying judgments', { selected: judgments.length, force: options.force });

  for (const judgment of judgments) {
    result.processed++;
    try {
      const classification = await classifier.classify(judgment.shortSummary ?? '');
      await repository.setPracticeArea(judgment.id, classification.label);

      if (classification.label === NOT_CLASSIFIED) {
        result.notClassified++;
      } else {
        result.classified++;
      }
      result.byArea[classification.label] = (result.byArea[classification.label] ?? 0) + 1;

      logger.info('Judgment classified', {
        judgmentId: judgment.id,
        label: classification.label,
        tier: classification.tier,
      });
    } catch (error) {
      result.failed++;
      logger.error('Classification failed', { judgmentId: judgment.id, error: errorMessage(error) });
    }
  }

  return result;
}
