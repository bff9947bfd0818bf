import type { SupabaseClient } from '@supabase/supabase-js';
import { SupabaseConfig } from '../config/supabase.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('SupabaseVectorStore');

export interface VectorSearchQuery {
  text: string;
  vector: number[];
  limit: number;
  court?: string;
}

export interface VectorMatch {
  id: string;
  title: string;
  court: string | null;
  judgmentDate: string | null;
  shortSummary: string | null;
  score: number | null;
}

/**
 * Nearest-neighbour lookup over stored judgment vectors
 */
export interface VectorStore {
  search(query: VectorSearchQuery): Promise<VectorMatch[]>;
}

function field(row: unknown, key: string): unknown {
  return typeof row === 'object' && row !== null && key in row ? Reflect.get(row, key) : undefined;
}

function stringField(row: unknown, ...keys: string[]): string | null {
  for (const key of keys) {
    const value = field(row, key);
    if (typeof value === 'string' || typeof value === 'number') {
      return String(value);
    }
  }
  return null;
}

function toMatch(row: unknown): VectorMatch {
  const score = field(row, 'score') ?? field(row, 'similarity');
  return {
    id: stringField(row, 'id') ?? '',
    title: stringField(row, 'case_name', 'title') ?? 'Untitled document',
    court: stringField(row, 'court'),
    judgmentDate: stringField(row, 'judgment_date', 'date'),
    shortSummary: stringField(row, 'short_summary'),
    score: typeof score === 'number' ? score : null,
  };
}

export interface HybridSearchArgs {
  query_text: string;
  query_embedding: number[];
  match_count: number;
  full_text_weight: number;
  semantic_weight: number;
  /** null searches every court */
  filter_court: string | null;
}

export interface HybridSearchResult {
  data: unknown;
  error: { message: string; code?: string } | null;
}

export type HybridSearchCall = (args: HybridSearchArgs) => Promise<HybridSearchResult>;

function supabaseHybridSearch(client: SupabaseClient): HybridSearchCall {
  return async (args) => {
    const { data, error } = await client.rpc('hybrid_search', args);
    return { data, error };
  };
}

/**
 * Supabase/pgvector adapter over the `hybrid_search` RPC, which fuses
 * full-text rank and cosine similarity. The court filter is applied inside
 * the RPC, before ranking.
 */
export class SupabaseVectorStore implements VectorStore {
  private hybridSearch: HybridSearchCall;

  constructor(
    hybridSearch?: HybridSearchCall,
    private weights: { fullText: number; semantic: number } = { fullText: 1.0, semantic: 1.0 }
  ) {
    this.hybridSearch = hybridSearch ?? supabaseHybridSearch(SupabaseConfig.getClient());
  }

  async search(query: VectorSearchQuery): Promise<VectorMatch[]> {
    const { data, error } = await this.hybridSearch({
      query_text: query.text,
      query_embedding: query.vector,
      match_count: query.limit,
      full_text_weight: this.weights.fullText,
      semantic_weight: this.weights.semantic,
      filter_court: query.court ?? null,
    });

    if (error) {
      logger.error('hybrid_search failed', { error: error.message, code: error.code });
      throw new Error(`Vector search failed: ${error.message}`);
    }

    const rows: unknown[] = Array.isArray(data) ? data : [];
    return rows.map(toMatch);
  }
}
