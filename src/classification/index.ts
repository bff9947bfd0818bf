import type { LLMClient } from '../clients/llm/index.js';
import type { ZeroShotClassifierClient } from '../clients/ZeroShotClient.js';
import { FallbackChain } from './FallbackChain.js';
import { KeywordFallbackStrategy } from './KeywordFallbackStrategy.js';
import { LlmStrategy } from './LlmStrategy.js';
import { RuleBasedStrategy } from './RuleBasedStrategy.js';
import type { PracticeAreaTaxonomy } from './taxonomy.js';
import { ZeroShotStrategy } from './ZeroShotStrategy.js';

export { FallbackChain } from './FallbackChain.js';
export type { ClassificationResult, PracticeAreaClassifier } from './types.js';

/**
 * rule-based → zero-shot → LLM → keyword fallback → Not Classified
 */
export function createPracticeAreaChain(
  taxonomy: PracticeAreaTaxonomy,
  clients: { zeroShot: ZeroShotClassifierClient; llm: LLMClient }
): FallbackChain {
  const labels = taxonomy.areas.map((area) => area.name);
  return new FallbackChain([
    new RuleBasedStrategy(taxonomy.areas, taxonomy.thresholds),
    new ZeroShotStrategy(clients.zeroShot, taxonomy),
    new LlmStrategy(clients.llm, labels),
    new KeywordFallbackStrategy(labels),
  ]);
}
