import type { PracticeArea } from '../models/practiceArea.js';
import type { ClassifierStrategy, StrategyOutcome } from './types.js';

/**
 * Tier 4: an area whose full name appears in the text, otherwise one where
 * at least half of the name's words longer than three letters appear.
 * Runs only after tier 2 or 3 failed with an error.
 */
export class KeywordFallbackStrategy implements ClassifierStrategy {
  readonly tier = 'keyword-fallback';
  readonly onlyAfterError = true;

  constructor(private labels: readonly PracticeArea[]) {}

  async classify(summary: string): Promise<StrategyOutcome> {
    const lower = summary.toLowerCase();

    for (const label of this.labels) {
      if (lower.includes(label.toLowerCase())) {
        return { kind: 'label', label, confidence: 1 };
      }
    }

    for (const label of this.labels) {
      const words = label
        .toLowerCase()
        .split(/\W+/)
        .filter((word) => word.length > 3);
      const matches = words.filter((word) => lower.includes(word)).length;
      if (matches > 0 && matches >= words.length / 2) {
        return { kind: 'label', label, confidence: matches / words.length };
      }
    }

    return { kind: 'inconclusive', reason: 'no practice-area name in text' };
  }
}
