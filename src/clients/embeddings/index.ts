import { OpenAIConfig } from '../../config/openai.js';
import { VoyageConfig } from '../../config/voyage.js';
import { ConfigurationError } from '../../utils/errors.js';
import { FallbackEmbeddingClient } from './FallbackEmbeddingClient.js';
import { OpenAIEmbeddingClient } from './OpenAIEmbeddingClient.js';
import { VoyageEmbeddingClient } from './VoyageEmbeddingClient.js';
import type { EmbeddingClient } from './types.js';

export type { EmbeddingBatch, EmbeddingClient, EmbeddingInputType } from './types.js';
export { averageVectors } from './average.js';

/**
 * Voyage with OpenAI fallback when both keys are set, otherwise whichever
 * provider is configured
 */
export function createEmbeddingClient(): EmbeddingClient {
  const dimensions = parseInt(process.env.EMBEDDING_DIMENSIONS || '1024', 10);
  const hasVoyage = VoyageConfig.validate();
  const hasOpenAI = OpenAIConfig.validate();

  if (hasVoyage && hasOpenAI) {
    return new FallbackEmbeddingClient(
      new VoyageEmbeddingClient(),
      new OpenAIEmbeddingClient({ dimensions })
    );
  }
  if (hasVoyage) {
    return new VoyageEmbeddingClient();
  }
  if (hasOpenAI) {
    return new OpenAIEmbeddingClient({ dimensions });
  }
  throw new ConfigurationError('No embedding provider configured: set VOYAGE_API_KEY or OPENAI_API_KEY');
}
