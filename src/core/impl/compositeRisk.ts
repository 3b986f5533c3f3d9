import type { Interval, OutcomeStats, TrendLabel } from "../types.js";
import { InvalidInputError } from "../errors.js";
import { BetaEstimator, DEFAULT_CONFIDENCE_LEVEL } from "./betaEstimator.js";
import { DEFAULT_TREND_THRESHOLD, mannKendall } from "./mannKendall.js";
import { requireCount, requireUnit } from "./validation.js";

export interface RiskWeights {
  failure: number;
  trend: number;
  external: number;
}

export const DEFAULT_RISK_WEIGHTS: Readonly<RiskWeights> = {
  failure: 0.4,
  trend: 0.3,
  external: 0.3,
};

/**
 * How a series' tau turns into severity:
 * - "rising-is-bad": only upward movement counts (failure or error counts)
 * - "any-change": movement in either direction counts (diversity of error types)
 */
export type TrendPolarity = "rising-is-bad" | "any-change";

export interface RiskSeries {
  values: readonly number[];
  polarity?: TrendPolarity;
}

export interface CompositeRiskInput {
  /** Success/failure history; its failure probability is the first indicator. */
  outcomes: OutcomeStats;
  /** Time-ordered indicator series keyed by indicator name (e.g. failure_rate). */
  series?: Readonly<Record<string, RiskSeries>>;
  /** Externally computed risk in [0, 1] (debt, file hotspots...). */
  externalRisk?: number;
}

export interface CompositeRiskOptions {
  weights?: RiskWeights;
  confidenceLevel?: number;
  trendThreshold?: number;
}

export interface CompositeRisk {
  /** Bounded [0, 100], one decimal. */
  score: number;
  components: {
    failure?: number;
    trend?: number;
    external?: number;
  };
  intervals: Record<string, Interval>;
  slopes: Record<string, number>;
  labels: Record<string, TrendLabel>;
}

const WEIGHT_TOLERANCE = 1e-9;

export function validateWeights(weights: RiskWeights): RiskWeights {
  for (const key of ["failure", "trend", "external"] as const) {
    requireUnit(`weights.${key}`, weights[key]);
  }
  const sum = weights.failure + weights.trend + weights.external;
  if (Math.abs(sum - 1) > WEIGHT_TOLERANCE) {
    throw InvalidInputError.field("weights", `must sum to 1 (got ${sum})`);
  }
  return weights;
}

/** Sliding windows of `size`, each reduced by `reduce`. */
export function rollingWindows<T>(items: readonly T[], size: number, reduce: (window: readonly T[]) => number): number[] {
  requireCount("size", size);
  if (size === 0 || items.length < size) return [];
  const out: number[] = [];
  for (let i = 0; i + size <= items.length; i++) {
    out.push(reduce(items.slice(i, i + size)));
  }
  return out;
}

function round(x: number, digits: number): number {
  const f = 10 ** digits;
  return Math.round(x * f) / f;
}

/**
 * Folds a failure probability, trend severity and an optional external indicator into
 * one [0, 100] score with a fixed convex combination. An absent indicator contributes 0;
 * the other weights stay as given.
 */
export function scoreCompositeRisk(input: CompositeRiskInput, options: CompositeRiskOptions = {}): CompositeRisk {
  const weights = validateWeights(options.weights ?? DEFAULT_RISK_WEIGHTS);
  const level = options.confidenceLevel ?? DEFAULT_CONFIDENCE_LEVEL;
  const threshold = options.trendThreshold ?? DEFAULT_TREND_THRESHOLD;

  const components: CompositeRisk["components"] = {};
  const intervals: Record<string, Interval> = {};
  const slopes: Record<string, number> = {};
  const labels: Record<string, TrendLabel> = {};

  const { successes, total } = input.outcomes;
  requireCount("outcomes.total", total);
  requireCount("outcomes.successes", successes);
  if (successes > total) {
    throw InvalidInputError.field("outcomes.total", "must be greater than or equal to successes");
  }
  if (total > 0) {
    const failures = BetaEstimator.fromStats(total - successes, total);
    components.failure = failures.mean();
    intervals.failure_rate = failures.confidenceInterval(level);
  }

  const severities: number[] = [];
  for (const [name, s] of Object.entries(input.series ?? {})) {
    if (s.values.length < 3) continue;
    const { tau, label } = mannKendall(s.values, threshold);
    slopes[name] = tau;
    labels[name] = label;
    severities.push((s.polarity ?? "rising-is-bad") === "rising-is-bad" ? Math.max(0, tau) : Math.abs(tau));
  }
  if (severities.length) {
    components.trend = Math.min(1, severities.reduce((a, b) => a + b, 0) / severities.length);
  }

  if (input.externalRisk !== undefined) {
    components.external = requireUnit("externalRisk", input.externalRisk);
  }

  const composite =
    weights.failure * (components.failure ?? 0) +
    weights.trend * (components.trend ?? 0) +
    weights.external * (components.external ?? 0);
  return {
    score: Math.min(100, Math.max(0, round(composite * 100, 1))),
    components,
    intervals,
    slopes,
    labels,
  };
}
