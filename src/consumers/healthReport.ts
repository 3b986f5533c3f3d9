import type { Interval, TrendLabel } from "../core/types.js";
import {
  rollingWindows,
  scoreCompositeRisk,
  type CompositeRiskOptions,
  type RiskSeries,
} from "../core/impl/compositeRisk.js";

export const TREND_WINDOW = 5;

export interface DelegationRecord {
  success: boolean;
}

export interface ErrorRecord {
  type?: string;
}

export type FileRiskLevel = "critical" | "warning" | "ok";

export interface FileRisk {
  path: string;
  riskLevel: FileRiskLevel;
}

export interface DebtTrend {
  severity: "high" | "medium" | "low";
}

export interface HealthInput {
  delegations: readonly DelegationRecord[];
  errors?: readonly ErrorRecord[];
  fileRisks?: readonly FileRisk[];
  debtTrends?: readonly DebtTrend[];
}

export interface HealthReport {
  /** Bounded [0, 100]. */
  riskScore: number;
  /** indicator -> [lower, upper] */
  intervals: Record<string, Interval>;
  /** indicator -> tau */
  slopes: Record<string, number>;
  labels: Record<string, TrendLabel>;
}

const CRITICAL_FILE_WEIGHT = 0.3;
const WARNING_FILE_WEIGHT = 0.1;
const HIGH_DEBT_WEIGHT = 0.2;

/**
 * File hotspots and debt folded into one indicator in [0, 1]:
 * critical files 0.3 each, warnings 0.1 each, high-severity debt trends 0.2 each, capped at 1.
 * No hotspots and no debt means 0.
 */
export function externalRiskOf(fileRisks: readonly FileRisk[], debtTrends: readonly DebtTrend[]): number {

  const critical = fileRisks.filter((f) => f.riskLevel === "critical").length;
  const warning = fileRisks.filter((f) => f.riskLevel === "warning").length;
  const highDebt = debtTrends.filter((t) => t.severity === "high").length;

  return Math.min(1, critical * CRITICAL_FILE_WEIGHT + warning * WARNING_FILE_WEIGHT + highDebt * HIGH_DEBT_WEIGHT);
}

/** Share of failures in each rolling window of delegations. */
export function failureRateSeries(delegations: readonly DelegationRecord[], window = TREND_WINDOW): number[] {
  return rollingWindows(delegations, window, (w) => w.filter((d) => !d.success).length / w.length);
}

/** Distinct error types in each rolling window. */
export function errorDiversitySeries(errors: readonly ErrorRecord[], window = TREND_WINDOW): number[] {
  return rollingWindows(errors, window, (w) => new Set(w.map((e) => e.type ?? "unknown")).size);
}

export function buildHealthReport(input: HealthInput, options: CompositeRiskOptions = {}): HealthReport {
  const successes = input.delegations.filter((d) => d.success).length;

  const series: Record<string, RiskSeries> = {
    failure_rate: { values: failureRateSeries(input.delegations), polarity: "rising-is-bad" },
    error_diversity: { values: errorDiversitySeries(input.errors ?? []), polarity: "any-change" },
  };

  const risk = scoreCompositeRisk(
    {
      outcomes: { successes, total: input.delegations.length },
      series,
      externalRisk: externalRiskOf(input.fileRisks ?? [], input.debtTrends ?? []),
    },
    options,
  );

  return {
    riskScore: risk.score,
    intervals: risk.intervals,
    slopes: risk.slopes,
    labels: risk.labels,
  };
}
