import { createLogger } from '../../utils/logger.js';
import type { EmbeddingBatch, EmbeddingClient, EmbeddingInputType } from './types.js';

const logger = createLogger('FallbackEmbeddingClient');

/**
 * Primary provider first; the whole request is repeated on the fallback if
 * the primary fails, so one call never mixes models.
 */
export class FallbackEmbeddingClient implements EmbeddingClient {
  readonly model: string;
  readonly dimensions: number;

  constructor(
    private primary: EmbeddingClient,
    private fallback: EmbeddingClient
  ) {
    if (primary.dimensions !== fallback.dimensions) {
      throw new Error(
        `Embedding providers disagree on dimensions: ${primary.model}=${primary.dimensions}, ${fallback.model}=${fallback.dimensions}`
      );
    }
    this.model = primary.model;
    this.dimensions = primary.dimensions;
  }

  async embed(texts: string[], inputType?: EmbeddingInputType): Promise<EmbeddingBatch> {
    try {
      return await this.primary.embed(texts, inputType);
    } catch (error) {
      logger.warn(`${this.primary.model} failed, falling back to ${this.fallback.model}`, {
        error: error instanceof Error ? error.message : String(error),
      });
      return this.fallback.embed(texts, inputType);
    }
  }
}
