import type { PracticeArea } from '../models/practiceArea.js';
import type { ClassifierThresholds, PracticeAreaDefinition } from './taxonomy.js';
import type { ClassifierStrategy, StrategyOutcome } from './types.js';

export interface AreaScore {
  area: PracticeArea;
  hits: number;
}

function countOccurrences(haystack: string, needle: string): number {
  let count = 0;
  let position = haystack.indexOf(needle);
  while (position !== -1) {
    count++;
    position = haystack.indexOf(needle, position + needle.length);
  }
  return count;
}

/**
 * Keyword hits per area (non-overlapping occurrences, case-insensitive),
 * highest first. Areas with no hits are left out; ties keep taxonomy order.
 */
export function scoreAreas(text: string, areas: PracticeAreaDefinition[]): AreaScore[] {
  const lower = text.toLowerCase();
  return areas
    .map((area) => ({
      area: area.name,
      hits: area.keywords.reduce((total, keyword) => total + countOccurrences(lower, keyword), 0),
    }))
    .filter((score) => score.hits > 0)
    .sort((a, b) => b.hits - a.hits);
}

/**
 * Tier 1: accept the top area when it is the unique maximum, reaches
 * `ruleMinHits` and leads the runner-up by more than `ruleMargin`
 */
export class RuleBasedStrategy implements ClassifierStrategy {
  readonly tier = 'rule-based';

  constructor(
    private areas: PracticeAreaDefinition[],
    private thresholds: ClassifierThresholds
  ) {}

  async classify(summary: string): Promise<StrategyOutcome> {
    const [top, second] = scoreAreas(summary, this.areas);

    if (!top) {
      return { kind: 'inconclusive', reason: 'no keyword hits' };
    }
    if (top.hits < this.thresholds.ruleMinHits) {
      return { kind: 'inconclusive', reason: `top area ${top.area} has ${top.hits} hits` };
    }
    const runnerUp = second?.hits ?? 0;
    if (top.hits - runnerUp <= this.thresholds.ruleMargin) {
      return { kind: 'inconclusive', reason: `${top.area} (${top.hits}) ties with ${second?.area} (${runnerUp})` };
    }

    return { kind: 'label', label: top.area, confidence: top.hits };
  }
}
