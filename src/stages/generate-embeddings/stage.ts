import { averageVectors } from '../../clients/embeddings/index.js';
import type { TransformStage } from '../types.js';

/**
 * Stage 4: one vector per chunk, plus their mean as the judgment vector
 */
export const generateEmbeddingsStage: TransformStage = {
  kind: 'transform',
  number: 4,
  id: 'generate-embeddings',
  description: 'Generate embeddings for judgment chunks',
  defaults: { batchSize: 10, maxRetries: 3 },
  requiredStatus: 'chunked',
  resultStatus: 'embedded',
  retriesItems: true,

  async prepare(_options, services) {
    services.embeddings();
  },

  async transform(judgment, _options, services) {
    const chunks = await services.repository.getChunks(judgment.id);
    if (chunks.length === 0) {
      throw new Error('Judgment has no chunks to embed');
    }

    const batch = await services.embeddings().embed(
      chunks.map((chunk) => chunk.text),
      'document'
    );
    if (batch.vectors.length !== chunks.length) {
      throw new Error(`Expected ${chunks.length} vectors, got ${batch.vectors.length}`);
    }

    return {
      embeddings: {
        model: batch.model,
        vectors: chunks.map((chunk, i) => ({ chunkId: chunk.id, vector: batch.vectors[i] })),
        judgmentVector: averageVectors(batch.vectors),
      },
    };
  },
};
