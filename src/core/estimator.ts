import type { Interval } from "./types.js";

export interface EstimatorState {
  alpha: number;
  beta: number;
}

/**
 * Posterior belief over a latent success probability.
 *
 * Instances are owned by the caller, one per subject; nothing is shared.
 */
export interface ConfidenceEstimator {
  update(successes: number, failures: number): void;
  mean(): number;
  variance(): number;
  confidenceInterval(level?: number): Interval;
  /** Probability that the true rate is below `threshold`. */
  riskScore(threshold?: number): number;
  toState(): EstimatorState;
}
