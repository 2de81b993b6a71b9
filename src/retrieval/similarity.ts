/**
 * Vector math shared by the in-memory index and the evaluation metrics
 */

export function l2Normalize(vec: number[]): number[] {
  let s = 0;
  for (const v of vec) s += v * v;
  const inv = s > 0 ? 1 / Math.sqrt(s) : 0;
  return vec.map((v) => v * inv);
}

/**
 * Cosine similarity; 0 when either vector is all zeros or the lengths differ
 */
export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length || a.length === 0) return 0;

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * Map a cosine in [-1, 1] onto the [0, 1] score range hits are reported in
 */
export function toUnitScore(cosine: number): number {
  return Math.min(1, Math.max(0, cosine));
}
