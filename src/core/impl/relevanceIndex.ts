import type { ConfidenceEstimator } from "../estimator.js";
import type { SimilarityScorer } from "../similarity.js";
import type { OutcomeStats, SearchHit, SparseVector, SubjectName } from "../types.js";
import type { TopKSelector } from "../heap.js";
import type { IdfMode } from "../vectorizer.js";
import { InvalidInputError } from "../errors.js";
import { BetaEstimator } from "./betaEstimator.js";
import { cosineSimilarity, vectorNorm } from "./cosineSimilarity.js";
import { MinHeapTopKSelector } from "./minHeapTopK.js";
import { TfIdfVectorizer } from "./tfidfVectorizer.js";
import { requireCount, requirePositive, requireUnit } from "./validation.js";

/**
 * Documents keyed by subject name. Ties rank in iteration order: a Map or an array of
 * pairs keeps the order given, while a plain object follows JS property order
 * (integer-like keys such as "2" or "10" come first, ascending).
 */
export type NamedDocuments =
  | Readonly<Record<SubjectName, string>>
  | ReadonlyMap<SubjectName, string>
  | Iterable<readonly [SubjectName, string]>;

/** Per-subject evidence for boosting: raw counts, or an estimator the caller already keeps. */
export type BoostSource = OutcomeStats | ConfidenceEstimator;

export interface RelevanceIndexOptions {
  idfMode?: IdfMode;
  removeStopWords?: boolean;
  /** Replaces cosine similarity; must stay within [0, 1]. */
  scorer?: SimilarityScorer;
  /** Boost applied to subjects with no observations. */
  neutralBoost?: number;
  /** Boosted search looks at `candidateFactor * topK` plain hits. */
  candidateFactor?: number;
  topK?: TopKSelector<RankedHit>;
}

interface IndexEntry {
  name: SubjectName;
  vector: SparseVector;
  norm: number;
  order: number;
}

interface RankedHit extends SearchHit {
  order: number;
}

export const DEFAULT_TOP_K = 5;
export const DEFAULT_NEUTRAL_BOOST = 0.5;
export const DEFAULT_CANDIDATE_FACTOR = 2;

function byScoreThenOrder(a: RankedHit, b: RankedHit): number {
  return b.score - a.score || a.order - b.order;
}

function isEstimator(source: BoostSource): source is ConfidenceEstimator {
  return "mean" in source;
}

function isIterable(documents: NamedDocuments): documents is Iterable<readonly [SubjectName, string]> {
  return Symbol.iterator in documents;
}

function entriesOf(documents: NamedDocuments): Iterable<readonly [SubjectName, string]> {
  return isIterable(documents) ? documents : Object.entries(documents);
}

/**
 * Immutable snapshot answering "rank these named documents against a query".
 *
 * Built once with `RelevanceIndex.build`; to change the documents, build a new
 * index and swap the reference readers hold.
 */
export class RelevanceIndex {
  private readonly byName: ReadonlyMap<SubjectName, IndexEntry>;
  private readonly neutralBoost: number;
  private readonly candidateFactor: number;
  private readonly selector: TopKSelector<RankedHit>;

  private constructor(
    private readonly vectorizer: TfIdfVectorizer,
    private readonly entries: readonly IndexEntry[],
    private readonly scorer: SimilarityScorer | undefined,
    options: RelevanceIndexOptions,
  ) {
    this.byName = new Map(entries.map((e) => [e.name, e]));
    this.neutralBoost = requireUnit("neutralBoost", options.neutralBoost ?? DEFAULT_NEUTRAL_BOOST);
    this.candidateFactor = requirePositive("candidateFactor", options.candidateFactor ?? DEFAULT_CANDIDATE_FACTOR);
    this.selector = options.topK ?? new MinHeapTopKSelector<RankedHit>();
  }

  static build(documents: NamedDocuments, options: RelevanceIndexOptions = {}): RelevanceIndex {
    const names: SubjectName[] = [];
    const texts: string[] = [];
    const seen = new Set<SubjectName>();

    for (const [name, text] of entriesOf(documents)) {
      if (seen.has(name)) throw InvalidInputError.field(`documents.${name}`, "duplicate document name");
      seen.add(name);
      names.push(name);
      texts.push(text);
    }

    const vectorizer = new TfIdfVectorizer({
      idfMode: options.idfMode ?? "smooth",
      removeStopWords: options.removeStopWords,
    });
    const vectors = vectorizer.fitTransform(texts);

    const entries: IndexEntry[] = [];
    names.forEach((name, order) => {
      const vector = vectors[order] ?? new Map();
      entries.push({ name, vector, norm: vectorNorm(vector), order });
    });

    return new RelevanceIndex(vectorizer, entries, options.scorer, options);
  }

  get size(): number {
    return this.entries.length;
  }

  names(): SubjectName[] {
    return this.entries.map((e) => e.name);
  }

  has(name: SubjectName): boolean {
    return this.byName.has(name);
  }

  /** Cosine-ranked hits, best first; zero scores never appear. */
  search(query: string, topK: number = DEFAULT_TOP_K): SearchHit[] {
    return this.rank(query, topK).map(({ name, score }) => ({ name, score }));
  }

  /**
   * Similarity re-weighted by each subject's posterior success rate.
   *
   * Subjects without observations take the neutral boost, which halves their raw
   * similarity by default, so a proven match can overtake a slightly closer unproven one.
   */
  searchWithBoost(
    query: string,
    topK: number = DEFAULT_TOP_K,
    statsByName: ReadonlyMap<SubjectName, BoostSource> = new Map(),
  ): SearchHit[] {
    requireCount("topK", topK);
    const candidates = this.rank(query, Math.ceil(topK * this.candidateFactor));
    if (candidates.length === 0) return [];

    const boosted = candidates.map((hit) => ({ ...hit, score: hit.score * this.boostFor(statsByName.get(hit.name)) }));
    return this.selector
      .topK(boosted, topK, byScoreThenOrder)
      .map(({ name, score }) => ({ name, score }));
  }

  private boostFor(source: BoostSource | undefined): number {
    if (source === undefined) return this.neutralBoost;
    if (isEstimator(source)) return source.mean();
    if (source.total <= 0) return this.neutralBoost;
    return BetaEstimator.fromStats(source.successes, source.total).mean();
  }

  private rank(query: string, topK: number): RankedHit[] {
    requireCount("topK", topK);
    if (topK === 0 || this.entries.length === 0 || !query.trim()) return [];

    const q = this.vectorizer.transform(query);
    if (q.size === 0) return [];
    const qNorm = vectorNorm(q);

    const hits: RankedHit[] = [];
    for (const e of this.entries) {
      const score = this.scorer ? this.scorer(q, e.vector) : cosineSimilarity(q, e.vector, qNorm, e.norm);
      if (score > 0) hits.push({ name: e.name, score, order: e.order });
    }

    return this.selector.topK(hits, topK, byScoreThenOrder);
  }
}
