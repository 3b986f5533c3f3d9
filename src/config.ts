import { z } from "zod";

import { InvalidInputError } from "./core/errors.js";
import { DEFAULT_RISK_WEIGHTS, type RiskWeights } from "./core/impl/compositeRisk.js";
import { createLogger, type Logger, type LogLevel } from "./logger.js";

const weightsFromCsv = z.string().transform((raw, ctx): RiskWeights => {
  const [failure, trend, external, ...rest] = raw.split(",").map((p) => Number(p.trim()));
  if (failure === undefined || trend === undefined || external === undefined || rest.length) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "expected three numbers: failure,trend,external" });
    return z.NEVER;
  }
  const weights = { failure, trend, external };
  if (![failure, trend, external].every((w) => Number.isFinite(w) && w >= 0)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "weights must be non-negative numbers" });
    return z.NEVER;
  }
  if (Math.abs(failure + trend + external - 1) > 1e-9) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "weights must sum to 1" });
    return z.NEVER;
  }
  return weights;
});

const booleanFlag = z.enum(["true", "false", "1", "0"]).transform((v) => v === "true" || v === "1");

/**
 * Environment variables read by `loadConfig`. Every one is optional.
 */
export const envSchema = z.object({
  NODE_ENV: z.string().default("development"),

  // Bounded logs
  RELEVANCE_HALF_LIFE_DAYS: z.coerce.number().positive().default(30),

  // Relevance index
  RELEVANCE_IDF_MODE: z.enum(["plain", "smooth"]).default("smooth"),
  RELEVANCE_NEUTRAL_BOOST: z.coerce.number().min(0).max(1).default(0.5),
  RELEVANCE_CANDIDATE_FACTOR: z.coerce.number().positive().default(2),

  // Estimator / trend / composite risk
  RELEVANCE_CONFIDENCE_LEVEL: z.coerce.number().gt(0).lt(1).default(0.95),
  RELEVANCE_TREND_THRESHOLD: z.coerce.number().min(0).max(1).default(0.5),
  RELEVANCE_RISK_WEIGHTS: weightsFromCsv.optional(),

  // Logging
  RELEVANCE_LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  RELEVANCE_LOG_ENABLED: booleanFlag.optional(),
});

export interface RelevanceConfig {
  halfLifeDays: number;
  index: {
    idfMode: "plain" | "smooth";
    neutralBoost: number;
    candidateFactor: number;
  };
  confidenceLevel: number;
  trendThreshold: number;
  riskWeights: RiskWeights;
  log: {
    enabled: boolean;
    level: LogLevel;
  };
}

export const DEFAULT_CONFIG: Readonly<RelevanceConfig> = {
  halfLifeDays: 30,
  index: { idfMode: "smooth", neutralBoost: 0.5, candidateFactor: 2 },
  confidenceLevel: 0.95,
  trendThreshold: 0.5,
  riskWeights: DEFAULT_RISK_WEIGHTS,
  log: { enabled: true, level: "info" },
};

/**
 * Reads configuration from an environment map (defaults to `process.env`).
 * Throws InvalidInputError listing every variable that failed to parse.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): RelevanceConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new InvalidInputError(
      parsed.error.issues.map((issue) => ({ path: issue.path.join(".") || "env", message: issue.message })),
    );
  }

  const e = parsed.data;
  return {
    halfLifeDays: e.RELEVANCE_HALF_LIFE_DAYS,
    index: {
      idfMode: e.RELEVANCE_IDF_MODE,
      neutralBoost: e.RELEVANCE_NEUTRAL_BOOST,
      candidateFactor: e.RELEVANCE_CANDIDATE_FACTOR,
    },
    confidenceLevel: e.RELEVANCE_CONFIDENCE_LEVEL,
    trendThreshold: e.RELEVANCE_TREND_THRESHOLD,
    riskWeights: e.RELEVANCE_RISK_WEIGHTS ?? { ...DEFAULT_RISK_WEIGHTS },
    log: {
      enabled: e.RELEVANCE_LOG_ENABLED ?? e.NODE_ENV !== "production",
      level: e.RELEVANCE_LOG_LEVEL,
    },
  };
}

export function loggerFromConfig(config: RelevanceConfig): Logger {
  return createLogger({ enabled: config.log.enabled, level: config.log.level });
}
