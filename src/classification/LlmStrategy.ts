import type { LLMClient } from '../clients/llm/index.js';
import type { PracticeArea } from '../models/practiceArea.js';
import { CLASSIFICATION_SYSTEM_PROMPT, buildClassificationPrompt } from './prompt.js';
import type { ClassifierStrategy, StrategyOutcome } from './types.js';

/**
 * The label an answer names: an exact (case-insensitive) match first, then
 * the longest label the answer contains
 */
export function matchLabel(answer: string, labels: readonly PracticeArea[]): PracticeArea | null {
  const normalized = answer.trim().replace(/^["'`]+|["'`.]+$/g, '').toLowerCase();

  const exact = labels.find((label) => label.toLowerCase() === normalized);
  if (exact) {
    return exact;
  }

  const contained = labels
    .filter((label) => normalized.includes(label.toLowerCase()))
    .sort((a, b) => b.length - a.length);
  return contained[0] ?? null;
}

/**
 * Tier 3: closed-choice LLM classification
 */
export class LlmStrategy implements ClassifierStrategy {
  readonly tier = 'llm';

  constructor(
    private client: LLMClient,
    private labels: readonly PracticeArea[]
  ) {}

  async classify(summary: string): Promise<StrategyOutcome> {
    const response = await this.client.complete(
      [
        { role: 'system', content: CLASSIFICATION_SYSTEM_PROMPT },
        { role: 'user', content: buildClassificationPrompt(summary, [...this.labels]) },
      ],
      { temperature: 0, maxOutputTokens: 128 }
    );

    const label = matchLabel(response.content, this.labels);
    if (!label) {
      return { kind: 'inconclusive', reason: `answer "${response.content.trim()}" is not a valid label` };
    }
    return { kind: 'label', label, confidence: 1 };
  }
}
