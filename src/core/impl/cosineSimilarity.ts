import type { SparseVector } from "../types.js";

export function vectorNorm(v: SparseVector): number {
  let sum = 0;
  for (const w of v.values()) sum += w * w;
  return Math.sqrt(sum);
}

/**
 * Dot product over the shared keys only; walks the smaller vector and probes the larger.
 */
export function dotProduct(a: SparseVector, b: SparseVector): number {
  const [small, large] = a.size <= b.size ? [a, b] : [b, a];
  let dot = 0;
  for (const [term, w] of small) {
    const other = large.get(term);
    if (other !== undefined) dot += w * other;
  }
  return dot;
}

/**
 * Cosine similarity clamped to [0, 1]. Empty or zero-norm vectors score exactly 0.
 *
 * `normA` / `normB` may be passed when already known (an index precomputes them).
 */
export function cosineSimilarity(a: SparseVector, b: SparseVector, normA?: number, normB?: number): number {
  if (a.size === 0 || b.size === 0) return 0;

  const na = normA ?? vectorNorm(a);
  const nb = normB ?? vectorNorm(b);
  if (na === 0 || nb === 0) return 0;

  const sim = dotProduct(a, b) / (na * nb);
  if (sim <= 0) return 0;
  return sim > 1 ? 1 : sim;
}
