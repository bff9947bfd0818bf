import { sampleText } from '../../utils/text.js';
import { MAX_PROMPT_CHARS } from '../types.js';
import type { TransformStage } from '../types.js';
import { buildLongSummaryPrompt } from './prompt.js';

/**
 * Stage 7: structured long summary for reportable judgments
 *
 * Judgments scoring below min_reportability advance with no long summary.
 */
export const longSummaryStage: TransformStage = {
  kind: 'transform',
  number: 7,
  id: 'long-summary',
  description: 'Generate detailed summaries',
  defaults: { batchSize: 10, model: 'gpt-4o-mini', maxTokens: 500, minReportability: 75 },
  requiredStatus: 'scored',
  resultStatus: 'long_summarized',
  retriesItems: false,

  async prepare(options, services) {
    services.llm(options.model);
  },

  async transform(judgment, options, services) {
    const score = judgment.reportability?.score ?? 0;
    if (score < options.minReportability) {
      return { longSummary: null };
    }

    const response = await services.llm(options.model).complete(
      [{ role: 'user', content: buildLongSummaryPrompt(sampleText(judgment.text, MAX_PROMPT_CHARS)) }],
      { maxOutputTokens: options.maxTokens }
    );

    const summary = response.content.trim();
    if (summary.length === 0) {
      throw new Error('Model returned an empty long summary');
    }
    return { longSummary: summary };
  },
};
