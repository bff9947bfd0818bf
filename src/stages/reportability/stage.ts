import { sampleText } from '../../utils/text.js';
import { MAX_PROMPT_CHARS } from '../types.js';
import type { TransformStage } from '../types.js';
import { REPORTABILITY_SYSTEM_PROMPT, buildReportabilityPrompt } from './prompt.js';
import { validateAndCalculateScore } from './scoring.js';

/**
 * Stage 6: weighted reportability score (0-100)
 */
export const reportabilityStage: TransformStage = {
  kind: 'transform',
  number: 6,
  id: 'reportability',
  description: 'Calculate reportability scores',
  defaults: { batchSize: 10, model: 'gpt-4o-mini' },
  requiredStatus: 'short_summarized',
  resultStatus: 'scored',
  retriesItems: false,

  async prepare(options, services) {
    services.llm(options.model);
  },

  async transform(judgment, options, services) {
    const response = await services.llm(options.model).complete([
      { role: 'system', content: REPORTABILITY_SYSTEM_PROMPT },
      { role: 'user', content: buildReportabilityPrompt(sampleText(judgment.text, MAX_PROMPT_CHARS)) },
    ]);

    const validated = validateAndCalculateScore(response.content);
    if (validated.categories.length === 0) {
      throw new Error('No category scores found in the analysis');
    }

    return {
      reportability: {
        score: validated.score,
        categories: validated.categories,
        reportedScore: validated.reportedScore,
        model: response.model,
        analysis: validated.analysis,
      },
    };
  },
};
