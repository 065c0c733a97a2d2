/**
 * Vector helpers for the in-memory backend.
 */

/**
 * Calculates cosine similarity between two vectors.
 * Returns a value between -1 and 1 (1 = identical direction).
 *
 * @example
 * ```ts
 * cosineSimilarity([1, 0, 0], [1, 0, 0]); // 1.0
 * cosineSimilarity([1, 0, 0], [0, 1, 0]); // 0.0 (orthogonal)
 * ```
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new Error(`Vector length mismatch: ${a.length} vs ${b.length}`);
  }

  if (a.length === 0) {
    return 0;
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  const magnitude = Math.sqrt(normA) * Math.sqrt(normB);
  return magnitude === 0 ? 0 : dot / magnitude;
}

export function isFiniteVector(vector: readonly number[]): boolean {
  return vector.length > 0 && vector.every((value) => Number.isFinite(value));
}
