import type { SparseVector, Term } from "../types.js";
import type { Tokenizer } from "../tokenizer.js";
import type { CorpusStats, IdfMode, Vectorizer } from "../vectorizer.js";
import { SimpleTokenizer } from "./simpleTokenizer.js";

export interface TfIdfVectorizerOptions {
  tokenizer?: Tokenizer;
  idfMode?: IdfMode;
  removeStopWords?: boolean;
}

function idfFor(mode: IdfMode, docCount: number, df: number): number {
  if (mode === "smooth") return Math.log((docCount + 1) / (1 + df)) + 1;
  return Math.log(docCount / (1 + df));
}

/**
 * TF-IDF vectorizer over unigrams + bigrams.
 *
 * - term frequency is `count / tokens in text`
 * - idf is computed once per `fit`; unseen terms weigh 0
 * - non-positive weights are dropped, so vectors only carry positive entries
 */
export class TfIdfVectorizer implements Vectorizer {
  private readonly tokenizer: Tokenizer;
  private readonly idfMode: IdfMode;
  private readonly removeStopWords: boolean;

  private idfByTerm = new Map<Term, number>();
  private docCount = 0;

  constructor(options: TfIdfVectorizerOptions = {}) {
    this.tokenizer = options.tokenizer ?? new SimpleTokenizer();
    this.idfMode = options.idfMode ?? "plain";
    this.removeStopWords = options.removeStopWords ?? false;
  }

  tokenize(text: string): Term[] {
    return Array.from(this.tokenizer.tokenize(text, { removeStopWords: this.removeStopWords }));
  }

  fit(corpus: readonly string[]): this {
    const df = new Map<Term, number>();
    for (const doc of corpus) {
      // each term counts once per document
      for (const term of new Set(this.tokenize(doc))) {
        df.set(term, (df.get(term) ?? 0) + 1);
      }
    }

    const docCount = corpus.length;
    const idfByTerm = new Map<Term, number>();
    for (const [term, freq] of df) {
      idfByTerm.set(term, idfFor(this.idfMode, docCount, freq));
    }

    this.docCount = docCount;
    this.idfByTerm = idfByTerm;
    return this;
  }

  idf(term: Term): number {
    return this.idfByTerm.get(term) ?? 0;
  }

  transform(text: string): SparseVector {
    const terms = this.tokenize(text);
    const vector = new Map<Term, number>();
    if (terms.length === 0) return vector;

    const counts = new Map<Term, number>();
    for (const t of terms) counts.set(t, (counts.get(t) ?? 0) + 1);

    const total = terms.length;
    for (const [term, count] of counts) {
      const weight = (count / total) * this.idf(term);
      if (weight > 0) vector.set(term, weight);
    }
    return vector;
  }

  fitTransform(corpus: readonly string[]): SparseVector[] {
    this.fit(corpus);
    return corpus.map((doc) => this.transform(doc));
  }

  getStats(): CorpusStats {
    return { docCount: this.docCount, vocabularySize: this.idfByTerm.size };
  }
}
