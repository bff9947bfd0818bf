import type { PracticeArea, PracticeAreaLabel } from '../models/practiceArea.js';

export type ClassifierTier = 'rule-based' | 'zero-shot' | 'llm' | 'keyword-fallback';

/**
 * What one strategy concluded about a summary
 */
export type StrategyOutcome =
  | { kind: 'label'; label: PracticeArea; confidence: number }
  | { kind: 'inconclusive'; reason: string };

/**
 * One tier of the fallback chain. Throwing is how a strategy reports an
 * error; the chain catches it.
 */
export interface ClassifierStrategy {
  readonly tier: ClassifierTier;
  /** Only consulted when an earlier tier threw */
  readonly onlyAfterError?: boolean;
  classify(summary: string): Promise<StrategyOutcome>;
}

export interface TierAttempt {
  tier: ClassifierTier;
  result: 'label' | 'inconclusive' | 'error' | 'not-run';
  detail?: string;
}

export interface ClassificationResult {
  label: PracticeAreaLabel;
  /** Tier that produced the label; null for the default */
  tier: ClassifierTier | null;
  confidence: number | null;
  attempts: TierAttempt[];
}

/**
 * Summary → exactly one practice-area label
 */
export interface PracticeAreaClassifier {
  classify(summary: string): Promise<ClassificationResult>;
}
