/**
 * Cosine similarity over dense and sparse vectors.
 *
 * Both variants return 0 for a zero vector instead of dividing by zero, and
 * clamp the result to [0, 1] so scores from either backend share one range.
 */

export type SparseVector = ReadonlyMap<string, number>;

function clampUnit(value: number): number {
  if (!Number.isFinite(value) || value <= 0) return 0;
  return value >= 1 ? 1 : value;
}

/** Dense cosine similarity. Empty or length-mismatched vectors score 0. */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length === 0 || a.length !== b.length) return 0;

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  const denom = Math.sqrt(normA) * Math.sqrt(normB);
  return denom === 0 ? 0 : clampUnit(dot / denom);
}

export function sparseNorm(v: SparseVector): number {
  let sum = 0;
  for (const weight of v.values()) sum += weight * weight;
  return Math.sqrt(sum);
}

export function sparseCosineSimilarity(a: SparseVector, b: SparseVector): number {
  // Iterate the smaller map
  const [small, large] = a.size <= b.size ? [a, b] : [b, a];

  let dot = 0;
  for (const [term, weight] of small) {
    const other = large.get(term);
    if (other !== undefined) dot += weight * other;
  }
  const denom = sparseNorm(a) * sparseNorm(b);
  return denom === 0 ? 0 : clampUnit(dot / denom);
}
