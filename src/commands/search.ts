import type { EmbeddingClient } from '../clients/embeddings/index.js';
import type { VectorMatch, VectorStore } from '../clients/SupabaseVectorStore.js';

export interface SearchOptions {
  limit: number;
  court?: string;
}

/**
 * Hybrid search: embed the query, then rank stored judgments by full text
 * and vector similarity
 */
export async function searchJudgments(
  query: string,
  options: SearchOptions,
  clients: { embeddings: EmbeddingClient; store: VectorStore }
): Promise<VectorMatch[]> {
  const text = query.trim();
  if (text.length === 0) {
    return [];
  }

  const { vectors } = await clients.embeddings.embed([text], 'query');
  const vector = vectors[0];
  if (!vector) {
    throw new Error('Embedding provider returned no vector for the query');
  }

  return clients.store.search({ text, vector, limit: options.limit, court: options.court });
}
