import { NOT_CLASSIFIED } from '../models/practiceArea.js';
import { errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import type { ClassificationResult, ClassifierStrategy, PracticeAreaClassifier, TierAttempt } from './types.js';

const logger = createLogger('FallbackChain');

/**
 * Ordered classifier strategies, tried until one yields a label
 *
 * A strategy that is inconclusive or throws hands over to the next one.
 * Strategies marked `onlyAfterError` run only if an earlier strategy threw.
 * Errors are logged and never reach the caller; when nothing yields a label
 * the result is Not Classified.
 */
export class FallbackChain implements PracticeAreaClassifier {
  constructor(private strategies: ClassifierStrategy[]) {}

  async classify(summary: string): Promise<ClassificationResult> {
    const attempts: TierAttempt[] = [];

    if (summary.trim().length === 0) {
      logger.warn('Empty summary provided for classification');
      return { label: NOT_CLASSIFIED, tier: null, confidence: null, attempts };
    }

    let sawError = false;

    for (const strategy of this.strategies) {
      if (strategy.onlyAfterError && !sawError) {
        attempts.push({ tier: strategy.tier, result: 'not-run', detail: 'no earlier tier failed' });
        continue;
      }

      try {
        const outcome = await strategy.classify(summary);
        if (outcome.kind === 'label') {
          attempts.push({ tier: strategy.tier, result: 'label', detail: outcome.label });
          logger.debug('Classified', { tier: strategy.tier, label: outcome.label, confidence: outcome.confidence });
          return { label: outcome.label, tier: strategy.tier, confidence: outcome.confidence, attempts };
        }
        attempts.push({ tier: strategy.tier, result: 'inconclusive', detail: outcome.reason });
        logger.info(`${strategy.tier} inconclusive, falling back`, { reason: outcome.reason });
      } catch (error) {
        sawError = true;
        attempts.push({ tier: strategy.tier, result: 'error', detail: errorMessage(error) });
        logger.error(`${strategy.tier} failed, falling back`, { error: errorMessage(error) });
      }
    }

    return { label: NOT_CLASSIFIED, tier: null, confidence: null, attempts };
  }
}
