import type { ZeroShotClassifierClient } from '../clients/ZeroShotClient.js';
import { isPracticeArea } from '../models/practiceArea.js';
import type { PracticeAreaTaxonomy } from './taxonomy.js';
import type { ClassifierStrategy, StrategyOutcome } from './types.js';

/**
 * Tier 2: NLI zero-shot against the taxonomy labels
 */
export class ZeroShotStrategy implements ClassifierStrategy {
  readonly tier = 'zero-shot';

  constructor(
    private client: ZeroShotClassifierClient,
    private taxonomy: PracticeAreaTaxonomy
  ) {}

  async classify(summary: string): Promise<StrategyOutcome> {
    const labels = this.taxonomy.areas.map((area) => area.name);
    const result = await this.client.classify(summary, labels, this.taxonomy.zeroShotHypothesis);

    const best = result.labels[0];
    const confidence = result.scores[0] ?? 0;

    if (!isPracticeArea(best)) {
      throw new Error(`Zero-shot returned a label outside the taxonomy: ${String(best)}`);
    }
    if (confidence <= this.taxonomy.thresholds.zeroShotMinConfidence) {
      return { kind: 'inconclusive', reason: `${best} at ${confidence.toFixed(3)}` };
    }
    return { kind: 'label', label: best, confidence };
  }
}
