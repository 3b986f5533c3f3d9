import type { TrendResult } from "../types.js";

export const DEFAULT_TREND_THRESHOLD = 0.5;
const MIN_OBSERVATIONS = 3;

/**
 * Mann-Kendall style trend over a time-ordered series.
 *
 * Every pair i < j is concordant (values[j] > values[i]), discordant (<) or tied;
 * tau = (concordant - discordant) / (n(n-1)/2). Fewer than 3 values never claim a trend.
 */
export function mannKendall(values: readonly number[], threshold: number = DEFAULT_TREND_THRESHOLD): TrendResult {
  const n = values.length;
  if (n < MIN_OBSERVATIONS) return { tau: 0, label: "stable" };

  let s = 0;
  for (let i = 0; i < n - 1; i++) {
    const vi = values[i] ?? 0;
    for (let j = i + 1; j < n; j++) {
      const vj = values[j] ?? 0;
      if (vj > vi) s++;
      else if (vj < vi) s--;
    }
  }

  const tau = s / ((n * (n - 1)) / 2);
  if (tau > threshold) return { tau, label: "increasing" };
  if (tau < -threshold) return { tau, label: "decreasing" };
  return { tau, label: "stable" };
}
