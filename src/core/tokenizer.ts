import type { Term } from "./types.js";

export interface TokenizeOptions {
  /** Drop common English stop-words; pairs are then formed across the gap. Default false. */
  removeStopWords?: boolean;
  /** Emit adjacent-word pairs after the single words. Default true. */
  bigrams?: boolean;
}

/**
 * Text -> terms for the vectorizer. Output depends on the text and options only:
 * single words first in text order, then one pair per adjacent word.
 */
export interface Tokenizer {
  tokenize(text: string, options?: TokenizeOptions): Iterable<Term>;
}
