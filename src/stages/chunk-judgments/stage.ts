import type { TransformStage } from '../types.js';
import { chunkJudgmentText, validateChunkingOptions } from './chunkJudgmentText.js';

/**
 * Stage 3: split the text into overlapping chunks
 */
export const chunkJudgmentsStage: TransformStage = {
  kind: 'transform',
  number: 3,
  id: 'chunk-judgments',
  description: 'Split judgments into chunks',
  defaults: { batchSize: 50, chunkSize: 1000, overlap: 100 },
  requiredStatus: 'metadata_fixed',
  resultStatus: 'chunked',
  retriesItems: false,

  async prepare(options) {
    validateChunkingOptions({ chunkSize: options.chunkSize, overlap: options.overlap });
  },

  async transform(judgment, options) {
    const chunks = chunkJudgmentText(judgment.text, { chunkSize: options.chunkSize, overlap: options.overlap });
    if (chunks.length === 0) {
      throw new Error('Judgment has no text to chunk');
    }
    return { chunks };
  },
};
