import type { TransformStage } from '../types.js';

/**
 * Stage 8: practice area from the short summary
 */
export const classifyPracticeAreasStage: TransformStage = {
  kind: 'transform',
  number: 8,
  id: 'classify-practice-areas',
  description: 'Classify practice areas',
  defaults: { batchSize: 10, model: 'gpt-4o-mini' },
  requiredStatus: 'long_summarized',
  resultStatus: 'classified',
  retriesItems: false,

  async prepare(options, services) {
    await services.classifier(options.model);
  },

  async transform(judgment, options, services) {
    const classifier = await services.classifier(options.model);
    const result = await classifier.classify(judgment.shortSummary ?? '');
    return { practiceArea: result.label };
  },
};
