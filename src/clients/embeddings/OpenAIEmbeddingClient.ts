import type OpenAI from 'openai';
import { OpenAIConfig } from '../../config/openai.js';
import { toUpstreamError } from '../../utils/errors.js';
import { assertDimensions, toBatches } from './types.js';
import type { EmbeddingBatch, EmbeddingClient } from './types.js';

const MAX_BATCH_SIZE = 128;

/**
 * OpenAI embeddings, requested at the same dimensionality as the primary
 * provider so both can share one vector column
 */
export class OpenAIEmbeddingClient implements EmbeddingClient {
  readonly model: string;
  readonly dimensions: number;
  private client: OpenAI;

  constructor(options: { client?: OpenAI; model?: string; dimensions: number }) {
    this.client = options.client ?? OpenAIConfig.getClient();
    this.model = options.model ?? OpenAIConfig.getConfig().embeddingModel;
    this.dimensions = options.dimensions;
  }

  async embed(texts: string[]): Promise<EmbeddingBatch> {
    const vectors: number[][] = [];

    for (const batch of toBatches(texts, MAX_BATCH_SIZE)) {
      try {
        const response = await this.client.embeddings.create({
          model: this.model,
          input: batch,
          dimensions: this.dimensions,
        });
        const ordered = [...response.data].sort((a, b) => a.index - b.index);
        vectors.push(...ordered.map((item) => item.embedding));
      } catch (error) {
        throw toUpstreamError('openai-embeddings', error);
      }
    }

    assertDimensions(vectors, this.dimensions, this.model);
    return { model: this.model, vectors };
  }
}
