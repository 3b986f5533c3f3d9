/** Shared core types used by module contracts. */

export type Term = string;
export type SubjectName = string;

/**
 * Sparse weighted vector: term -> weight.
 * Only strictly positive weights are stored; an absent term weighs 0.
 */
export type SparseVector = ReadonlyMap<Term, number>;

export interface SearchHit {
  name: SubjectName;
  score: number;
}

/** Observed outcomes for one subject (a skill, a mode, a keyword...). */
export interface OutcomeStats {
  successes: number;
  total: number;
}

export type Interval = readonly [lower: number, upper: number];

export type TrendLabel = "increasing" | "decreasing" | "stable";

export interface TrendResult {
  /** Normalized concordance statistic in [-1, 1]. */
  tau: number;
  label: TrendLabel;
}

/** Serializable form of a sparse vector. */
export function vectorToRecord(vector: SparseVector): Record<Term, number> {
  return Object.fromEntries(vector);
}
