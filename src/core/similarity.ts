import type { SparseVector } from "./types.js";

/**
 * Bounded similarity between two sparse vectors.
 * Must return a value in [0, 1], exactly 0 when either side is empty.
 */
export type SimilarityScorer = (a: SparseVector, b: SparseVector) => number;
