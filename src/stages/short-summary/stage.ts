import { sampleText, stripMarkdown } from '../../utils/text.js';
import { MAX_PROMPT_CHARS } from '../types.js';
import type { TransformStage } from '../types.js';
import { SHORT_SUMMARY_SYSTEM_PROMPT, buildShortSummaryPrompt } from './prompt.js';

/**
 * Stage 5: headnote-style short summary
 */
export const shortSummaryStage: TransformStage = {
  kind: 'transform',
  number: 5,
  id: 'short-summary',
  description: 'Generate short summaries for judgments',
  defaults: { batchSize: 10, model: 'gpt-4o-mini' },
  requiredStatus: 'embedded',
  resultStatus: 'short_summarized',
  retriesItems: false,

  async prepare(options, services) {
    services.llm(options.model);
  },

  async transform(judgment, options, services) {
    const response = await services.llm(options.model).complete([
      { role: 'system', content: SHORT_SUMMARY_SYSTEM_PROMPT },
      { role: 'user', content: buildShortSummaryPrompt(sampleText(judgment.text, MAX_PROMPT_CHARS)) },
    ]);

    const summary = stripMarkdown(response.content);
    if (summary.length === 0) {
      throw new Error('Model returned an empty summary');
    }
    return { shortSummary: summary };
  },
};
