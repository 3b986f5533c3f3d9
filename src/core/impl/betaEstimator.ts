import type { ConfidenceEstimator, EstimatorState } from "../estimator.js";
import type { Interval } from "../types.js";
import { InvalidInputError } from "../errors.js";
import { normalCdf, zScoreForLevel } from "./normal.js";
import { requireFinite, requireNonNegative, requireOpenUnit, requirePositive } from "./validation.js";

export const DEFAULT_CONFIDENCE_LEVEL = 0.95;
export const DEFAULT_RISK_THRESHOLD = 0.5;

function clamp01(x: number): number {
  return x < 0 ? 0 : x > 1 ? 1 : x;
}

/**
 * Beta-Bernoulli posterior over a success rate.
 *
 * Starts from the uniform prior Beta(1, 1); `update` only ever adds to the
 * counters, so the pair (alpha, beta) is the whole state.
 */
export class BetaEstimator implements ConfidenceEstimator {
  private alpha: number;
  private beta: number;

  constructor(state: EstimatorState = { alpha: 1, beta: 1 }) {
    this.alpha = requirePositive("alpha", state.alpha);
    this.beta = requirePositive("beta", state.beta);
  }

  /** Prior + observations: Beta(successes + 1, total - successes + 1). */
  static fromStats(successes: number, total: number): BetaEstimator {
    requireNonNegative("successes", successes);
    requireNonNegative("total", total);
    if (total < successes) {
      throw InvalidInputError.field("total", "must be greater than or equal to successes");
    }
    const estimator = new BetaEstimator();
    estimator.update(successes, total - successes);
    return estimator;
  }

  static fromState(state: EstimatorState): BetaEstimator {
    return new BetaEstimator(state);
  }

  update(successes: number, failures: number): void {
    this.alpha += requireNonNegative("successes", successes);
    this.beta += requireNonNegative("failures", failures);
  }

  /** Back to the uniform prior. */
  reset(): void {
    this.alpha = 1;
    this.beta = 1;
  }

  /** Observations seen beyond the prior. */
  observations(): number {
    return this.alpha + this.beta - 2;
  }

  mean(): number {
    return this.alpha / (this.alpha + this.beta);
  }

  variance(): number {
    const a = this.alpha;
    const b = this.beta;
    const s = a + b;
    return (a * b) / (s * s * (s + 1));
  }

  confidenceInterval(level: number = DEFAULT_CONFIDENCE_LEVEL): Interval {
    const z = zScoreForLevel(requireOpenUnit("level", level));
    const mu = this.mean();
    const half = z * Math.sqrt(this.variance());
    return [clamp01(mu - half), clamp01(mu + half)];
  }

  riskScore(threshold: number = DEFAULT_RISK_THRESHOLD): number {
    requireFinite("threshold", threshold);
    const mu = this.mean();
    const std = Math.sqrt(this.variance());
    if (std === 0) return mu >= threshold ? 0 : 1;
    return clamp01(normalCdf((threshold - mu) / std));
  }

  toState(): EstimatorState {
    return { alpha: this.alpha, beta: this.beta };
  }
}
