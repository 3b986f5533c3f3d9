import type { Term } from "../types.js";
import type { TokenizeOptions, Tokenizer } from "../tokenizer.js";

const DEFAULT_STOP_WORDS = new Set([
  "a", "an", "and", "are", "as", "at", "be", "but", "by", "for", "if", "in",
  "into", "is", "it", "no", "not", "of", "on", "or", "such", "that", "the",
  "their", "then", "there", "these", "they", "this", "to", "was", "will", "with",
]);

/** Joins the two words of a bigram; never produced inside a unigram. */
export const BIGRAM_SEPARATOR = "_";

const COMBINING_MARKS = /[\u0300-\u036f]/g;

function isAlphaNum(code: number): boolean {
  return (code >= 48 && code <= 57) || (code >= 97 && code <= 122);
}

/** Lowercases and strips diacritics ("Canción" -> "cancion"). */
export function normalizeText(text: string): string {
  return text.normalize("NFD").replace(COMBINING_MARKS, "").toLowerCase();
}

/**
 * ASCII word tokenizer:
 * - folds diacritics and case
 * - splits on anything that is not [a-z0-9]
 * - emits unigrams in order, then one bigram per adjacent pair
 */
export class SimpleTokenizer implements Tokenizer {
  private readonly stopWords: ReadonlySet<string>;

  constructor(stopWords: ReadonlySet<string> = DEFAULT_STOP_WORDS) {
    this.stopWords = stopWords;
  }

  *tokenize(text: string, options?: TokenizeOptions): Iterable<Term> {
    const removeStopWords = options?.removeStopWords ?? false;
    const withBigrams = options?.bigrams ?? true;

    const words: Term[] = [];
    for (const word of this.words(normalizeText(text))) {
      if (removeStopWords && this.stopWords.has(word)) continue;
      words.push(word);
    }

    yield* words;
    if (!withBigrams) return;

    let prev: Term | undefined;
    for (const word of words) {
      if (prev !== undefined) yield `${prev}${BIGRAM_SEPARATOR}${word}`;
      prev = word;
    }
  }

  private *words(normalized: string): Iterable<Term> {
    const n = normalized.length;
    let i = 0;

    while (i < n) {
      // skip separators
      while (i < n && !isAlphaNum(normalized.charCodeAt(i))) i++;
      if (i >= n) break;

      const start = i;
      while (i < n && isAlphaNum(normalized.charCodeAt(i))) i++;
      yield normalized.slice(start, i);
    }
  }
}
