import type { SparseVector, Term } from "./types.js";

/**
 * - plain:  ln(N / (1 + df))
 * - smooth: ln((N + 1) / (1 + df)) + 1, positive even on tiny corpora
 */
export type IdfMode = "plain" | "smooth";

export interface CorpusStats {
  docCount: number;
  vocabularySize: number;
}

/**
 * Fit-once, transform-many lexical vectorizer.
 *
 * Contract notes:
 * - `fit` replaces all prior statistics
 * - unseen terms never error; their idf is 0
 * - `fitTransform(c)[i]` equals `transform(c[i])` after `fit(c)`
 */
export interface Vectorizer {
  tokenize(text: string): Term[];
  fit(corpus: readonly string[]): this;
  idf(term: Term): number;
  transform(text: string): SparseVector;
  fitTransform(corpus: readonly string[]): SparseVector[];
  getStats(): CorpusStats;
}
