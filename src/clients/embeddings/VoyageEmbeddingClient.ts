import type { AxiosInstance } from 'axios';
import { VoyageConfig } from '../../config/voyage.js';
import { toUpstreamError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';
import { assertDimensions, toBatches } from './types.js';
import type { EmbeddingBatch, EmbeddingClient, EmbeddingInputType } from './types.js';

const logger = createLogger('VoyageEmbeddingClient');

// Voyage accepts at most 128 inputs per request
const MAX_BATCH_SIZE = 128;

interface VoyageEmbeddingResponse {
  data: Array<{ embedding: number[]; index: number }>;
  model: string;
  usage?: { total_tokens: number };
}

export class VoyageEmbeddingClient implements EmbeddingClient {
  readonly model: string;
  readonly dimensions: number;
  private http: AxiosInstance;

  constructor(options: { http?: AxiosInstance; model?: string; dimensions?: number } = {}) {
    this.http = options.http ?? VoyageConfig.getClient();
    this.model = options.model ?? VoyageConfig.getConfig().model;
    this.dimensions = options.dimensions ?? VoyageConfig.getConfig().dimensions;
  }

  async embed(texts: string[], inputType: EmbeddingInputType = 'document'): Promise<EmbeddingBatch> {
    const vectors: number[][] = [];

    for (const batch of toBatches(texts, MAX_BATCH_SIZE)) {
      try {
        const response = await this.http.post<VoyageEmbeddingResponse>('/embeddings', {
          input: batch,
          model: this.model,
          input_type: inputType,
        });

        const ordered = [...response.data.data].sort((a, b) => a.index - b.index);
        vectors.push(...ordered.map((item) => item.embedding));

        logger.debug('Embedded batch', {
          size: batch.length,
          tokens: response.data.usage?.total_tokens,
        });
      } catch (error) {
        throw toUpstreamError('voyage', error);
      }
    }

    assertDimensions(vectors, this.dimensions, this.model);
    return { model: this.model, vectors };
  }
}
