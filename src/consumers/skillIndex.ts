import type { OutcomeStats, SearchHit, SubjectName } from "../core/types.js";
import { normalizeText } from "../core/impl/simpleTokenizer.js";
import { DEFAULT_TOP_K, RelevanceIndex, type RelevanceIndexOptions } from "../core/impl/relevanceIndex.js";
import { requireCount } from "../core/impl/validation.js";
import { silentLogger, type Logger } from "../logger.js";

/** skill name -> activating keywords/phrases */
export type KeywordMap = Readonly<Record<SubjectName, readonly string[]>>;

/** Usage counters kept per skill by the caller. */
export interface SkillStats {
  injected: number;
  withSuccess: number;
}

export type RecommendationStrategy = "boosted" | "semantic" | "keyword" | "none";

export interface Recommendation {
  strategy: RecommendationStrategy;
  hits: SearchHit[];
}

export interface RecommendOptions {
  topK?: number;
  stats?: ReadonlyMap<SubjectName, SkillStats>;
}

export interface SkillIndexOptions extends RelevanceIndexOptions {
  logger?: Logger;
}

/** "canvas-2d-reference" -> "canvas 2d reference" */
export function expandSkillName(name: SubjectName): string {
  return name.replace(/[-_]+/g, " ");
}

export function toOutcomeStats(stats: SkillStats): OutcomeStats {
  return { successes: stats.withSuccess, total: stats.injected };
}

/** Returns an updated copy; the caller owns and persists the map. */
export function recordSkillOutcome(stats: SkillStats | undefined, success: boolean): SkillStats {
  const current = stats ?? { injected: 0, withSuccess: 0 };
  return {
    injected: current.injected + 1,
    withSuccess: current.withSuccess + (success ? 1 : 0),
  };
}

/**
 * Skill catalog search: TF-IDF over "expanded name + keywords", optionally boosted by
 * each skill's success history, with plain keyword matching as the last resort.
 */
export class SkillIndex {
  private constructor(
    private readonly index: RelevanceIndex,
    private readonly keywords: KeywordMap,
    private readonly logger: Logger,
  ) {}

  static fromKeywords(keywords: KeywordMap, options: SkillIndexOptions = {}): SkillIndex {
    const { logger = silentLogger, ...indexOptions } = options;
    const documents = Object.entries(keywords).map(
      ([name, words]): [SubjectName, string] => [name, `${expandSkillName(name)} ${words.join(" ")}`],
    );
    const index = RelevanceIndex.build(documents, indexOptions);
    logger.debug("skill index built", { skills: index.size });
    return new SkillIndex(index, keywords, logger);
  }

  get size(): number {
    return this.index.size;
  }

  recommend(task: string, options: RecommendOptions = {}): Recommendation {
    const topK = requireCount("topK", options.topK ?? DEFAULT_TOP_K);

    if (options.stats && options.stats.size > 0) {
      const boostSources = new Map<SubjectName, OutcomeStats>();
      for (const [name, s] of options.stats) boostSources.set(name, toOutcomeStats(s));
      const hits = this.index.searchWithBoost(task, topK, boostSources);
      if (hits.length) return { strategy: "boosted", hits };
    } else {
      const hits = this.index.search(task, topK);
      if (hits.length) return { strategy: "semantic", hits };
    }

    const hits = this.matchKeywords(task, topK);
    if (hits.length) {
      this.logger.info("semantic search empty, using keyword matches", { matches: hits.length });
      return { strategy: "keyword", hits };
    }
    return { strategy: "none", hits: [] };
  }

  /**
   * Keyword fallback: a skill scores the fraction of its keywords found in the task
   * (substring match after normalization). Ties keep catalog order.
   */
  matchKeywords(task: string, topK: number = DEFAULT_TOP_K): SearchHit[] {
    const text = ` ${normalizeText(task).replace(/[^a-z0-9]+/g, " ").trim()} `;
    if (!text.trim()) return [];

    const hits: Array<SearchHit & { order: number }> = [];
    Object.entries(this.keywords).forEach(([name, words], order) => {
      if (words.length === 0) return;
      let matched = 0;
      for (const w of words) {
        const needle = normalizeText(w).replace(/[^a-z0-9]+/g, " ").trim();
        if (needle && text.includes(` ${needle} `)) matched++;
      }
      if (matched > 0) hits.push({ name, score: matched / words.length, order });
    });

    hits.sort((a, b) => b.score - a.score || a.order - b.order);
    return hits.slice(0, topK).map(({ name, score }) => ({ name, score }));
  }
}
