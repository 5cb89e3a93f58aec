export function vectorNorm(vector: readonly number[]): number {
  let sum = 0;
  for (const v of vector) sum += v * v;
  return Math.sqrt(sum);
}

export function dotProduct(a: readonly number[], b: readonly number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) sum += a[i] * b[i];
  return sum;
}

/**
 * Cosine similarity of two equal-length vectors. A zero vector has no
 * direction and scores 0 against everything.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[], normA = vectorNorm(a), normB = vectorNorm(b)): number {
  if (normA === 0 || normB === 0) return 0;
  return dotProduct(a, b) / (normA * normB);
}

// Negative similarity carries no relevance signal here
export function toRelevanceScore(cosine: number): number {
  return Math.min(1, Math.max(0, cosine));
}
