/**
 * Element-wise mean of equal-length vectors
 */
export function averageVectors(vectors: number[][]): number[] {
  const first = vectors[0];
  if (!first) {
    throw new Error('Cannot average an empty set of vectors');
  }

  const sum = new Array<number>(first.length).fill(0);
  for (const vector of vectors) {
    if (vector.length !== first.length) {
      throw new Error(`Vector length mismatch: ${vector.length} vs ${first.length}`);
    }
    vector.forEach((value, i) => {
      sum[i] += value;
    });
  }
  return sum.map((value) => value / vectors.length);
}
