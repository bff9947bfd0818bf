export type EmbeddingInputType = 'document' | 'query';

export interface EmbeddingBatch {
  /** Model that produced every vector in `vectors` */
  model: string;
  vectors: number[][];
}

/**
 * Text → fixed-length vector. Vectors come back in input order.
 */
export interface EmbeddingClient {
  readonly model: string;
  readonly dimensions: number;
  embed(texts: string[], inputType?: EmbeddingInputType): Promise<EmbeddingBatch>;
}

export function assertDimensions(vectors: number[][], dimensions: number, model: string): void {
  for (const vector of vectors) {
    if (vector.length !== dimensions) {
      throw new Error(`${model} returned a ${vector.length}-dimension vector, expected ${dimensions}`);
    }
  }
}

/**
 * Split `items` into consecutive batches of at most `size`
 */
export function toBatches<T>(items: T[], size: number): T[][] {
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}
