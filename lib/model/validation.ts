/**
 * Validation and guardrails for strategy parameters.
 * Hard errors block the projection; soft warnings allow it.
 */

import {
  StrategyParametersSchema,
  type StrategyParameters,
} from "@/lib/types/zod";
import {
  MIN_WIN_PROBABILITY_PCT,
  MAX_WIN_PROBABILITY_PCT,
  MIN_REWARD_TO_RISK_RATIO_UI,
  MAX_REWARD_TO_RISK_RATIO_UI,
  MAX_PERIODS_PER_CYCLE,
  MAX_NUMBER_OF_CYCLES,
  MAX_RISK_PCT,
  MAX_TAX_RATE_PCT,
} from "@/lib/model/constants";
import { ConfigurationError, type ValidationError } from "@/lib/model/errors";
import { calculateExpectancy, calculateKellyFraction, kellyToDisplayPct } from "@/lib/model/stats";

export type { ValidationError } from "@/lib/model/errors";

export interface ValidationWarning {
  code: string;
  message: string;
}

export interface ValidationResult {
  errors: ValidationError[];
  warnings: ValidationWarning[];
}

const NUMERIC_FIELDS = [
  "winProbabilityPct",
  "rewardToRiskRatio",
  "opportunitiesPerPeriod",
  "periodsPerCycle",
  "numberOfCycles",
  "startingBalance",
  "targetBalance",
  "contributionAmount",
  "withdrawalAmount",
  "taxRatePct",
  "riskPct",
] as const satisfies readonly (keyof StrategyParameters)[];

function isWholeInRange(value: number, min: number, max: number): boolean {
  return Number.isInteger(value) && value >= min && value <= max;
}

/**
 * Validate parameters for an engine run.
 * Range checks are skipped for fields already reported as non-finite.
 */
export function validateParameters(params: StrategyParameters): ValidationResult {
  const errors: ValidationError[] = [];
  const warnings: ValidationWarning[] = [];

  const nonFinite = new Set<string>();
  for (const field of NUMERIC_FIELDS) {
    if (!Number.isFinite(params[field])) {
      nonFinite.add(field);
      errors.push({
        code: "NON_FINITE_VALUE",
        message: `${field} must be a finite number (got ${params[field]})`,
      });
    }
  }
  const ok = (field: (typeof NUMERIC_FIELDS)[number]) => !nonFinite.has(field);

  if (
    ok("winProbabilityPct") &&
    (params.winProbabilityPct < MIN_WIN_PROBABILITY_PCT ||
      params.winProbabilityPct > MAX_WIN_PROBABILITY_PCT)
  ) {
    errors.push({
      code: "INVALID_WIN_PROBABILITY",
      message: `Win probability must be between ${MIN_WIN_PROBABILITY_PCT} and ${MAX_WIN_PROBABILITY_PCT}% (got ${params.winProbabilityPct}%)`,
    });
  }

  if (ok("rewardToRiskRatio") && params.rewardToRiskRatio <= 0) {
    errors.push({
      code: "INVALID_REWARD_RATIO",
      message: `Reward to risk ratio must be greater than 0 (got ${params.rewardToRiskRatio})`,
    });
  }

  if (
    ok("opportunitiesPerPeriod") &&
    !isWholeInRange(params.opportunitiesPerPeriod, 1, Infinity)
  ) {
    errors.push({
      code: "INVALID_OPPORTUNITIES",
      message: `Opportunities per period must be a whole number of at least 1 (got ${params.opportunitiesPerPeriod})`,
    });
  }

  if (
    ok("periodsPerCycle") &&
    !isWholeInRange(params.periodsPerCycle, 1, MAX_PERIODS_PER_CYCLE)
  ) {
    errors.push({
      code: "INVALID_PERIODS_PER_CYCLE",
      message: `Periods per cycle must be a whole number between 1 and ${MAX_PERIODS_PER_CYCLE} (got ${params.periodsPerCycle})`,
    });
  }

  if (
    ok("numberOfCycles") &&
    !isWholeInRange(params.numberOfCycles, 1, MAX_NUMBER_OF_CYCLES)
  ) {
    errors.push({
      code: "INVALID_NUMBER_OF_CYCLES",
      message: `Number of cycles must be a whole number between 1 and ${MAX_NUMBER_OF_CYCLES} (got ${params.numberOfCycles})`,
    });
  }

  if (ok("startingBalance") && params.startingBalance <= 0) {
    errors.push({
      code: "INVALID_STARTING_BALANCE",
      message: `Starting balance must be greater than 0 (got ${params.startingBalance})`,
    });
  }

  if (
    ok("targetBalance") &&
    ok("startingBalance") &&
    params.targetBalance < params.startingBalance
  ) {
    errors.push({
      code: "TARGET_BELOW_START",
      message: `Target balance (${params.targetBalance}) cannot be below starting balance (${params.startingBalance})`,
    });
  }

  if (ok("contributionAmount") && params.contributionAmount < 0) {
    errors.push({
      code: "NEGATIVE_CONTRIBUTION",
      message: `Contribution amount cannot be negative (got ${params.contributionAmount})`,
    });
  }

  if (ok("withdrawalAmount") && params.withdrawalAmount < 0) {
    errors.push({
      code: "NEGATIVE_WITHDRAWAL",
      message: `Withdrawal amount cannot be negative (got ${params.withdrawalAmount})`,
    });
  }

  if (
    ok("taxRatePct") &&
    (params.taxRatePct < 0 || params.taxRatePct > MAX_TAX_RATE_PCT)
  ) {
    errors.push({
      code: "INVALID_TAX_RATE",
      message: `Tax rate must be between 0 and ${MAX_TAX_RATE_PCT}% (got ${params.taxRatePct}%)`,
    });
  }

  if (ok("riskPct") && (params.riskPct <= 0 || params.riskPct > MAX_RISK_PCT)) {
    errors.push({
      code: "INVALID_RISK_PCT",
      message: `Risk per trade must be greater than 0 and at most ${MAX_RISK_PCT}% (got ${params.riskPct}%)`,
    });
  }

  // Warnings

  const statsUsable = !errors.some(
    (e) =>
      e.code === "INVALID_WIN_PROBABILITY" ||
      e.code === "INVALID_REWARD_RATIO" ||
      e.code === "NON_FINITE_VALUE"
  );

  if (
    statsUsable &&
    (params.rewardToRiskRatio < MIN_REWARD_TO_RISK_RATIO_UI ||
      params.rewardToRiskRatio > MAX_REWARD_TO_RISK_RATIO_UI)
  ) {
    warnings.push({
      code: "REWARD_RATIO_OUTSIDE_UI_RANGE",
      message: `Reward to risk ratio ${params.rewardToRiskRatio} is outside the usual ${MIN_REWARD_TO_RISK_RATIO_UI}–${MAX_REWARD_TO_RISK_RATIO_UI} range`,
    });
  }

  if (statsUsable) {
    const expectancy = calculateExpectancy(
      params.winProbabilityPct,
      params.rewardToRiskRatio
    );
    if (expectancy < 0) {
      warnings.push({
        code: "NEGATIVE_EXPECTANCY",
        message: `Expectancy is ${expectancy}R per trade—this strategy loses money on average`,
      });
    }
    const kellyPct = kellyToDisplayPct(
      calculateKellyFraction(params.winProbabilityPct, params.rewardToRiskRatio)
    );
    if (params.riskPct >= kellyPct) {
      warnings.push({
        code: "RISK_ABOVE_KELLY",
        message: `Risk per trade (${params.riskPct}%) is at or above the Kelly criterion (${kellyPct.toFixed(2)}%)`,
      });
    }
  }

  if (
    ok("targetBalance") &&
    ok("startingBalance") &&
    params.targetBalance === params.startingBalance
  ) {
    warnings.push({
      code: "TARGET_EQUALS_START",
      message: "Target balance equals starting balance—the projection will produce no periods",
    });
  }

  if (params.contributionAmount > 0 && params.contributionCadence === "None") {
    warnings.push({
      code: "CONTRIBUTION_WITHOUT_CADENCE",
      message: "Contribution amount is set but no frequency is chosen—it will not be applied",
    });
  }
  if (params.withdrawalAmount > 0 && params.withdrawalCadence === "None") {
    warnings.push({
      code: "WITHDRAWAL_WITHOUT_CADENCE",
      message: "Withdrawal amount is set but no frequency is chosen—it will not be applied",
    });
  }
  if (params.taxRatePct > 0 && params.taxCadence === "None") {
    warnings.push({
      code: "TAX_WITHOUT_CADENCE",
      message: "Tax rate is set but no payment frequency is chosen—no tax will be withheld",
    });
  }

  return { errors, warnings };
}

/**
 * Parse untyped input (form state, JSON) into parameters with defaults applied.
 * Throws ConfigurationError listing every shape problem.
 */
export function parseStrategyParameters(input: unknown): StrategyParameters {
  const parsed = StrategyParametersSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map((issue) => ({
        code: "INVALID_PARAMETER_SHAPE",
        message: `${issue.path.join(".") || "parameters"}: ${issue.message}`,
      }))
    );
  }
  return parsed.data;
}

/** Throw ConfigurationError when validation reports hard errors; return warnings otherwise. */
export function assertValidParameters(params: StrategyParameters): ValidationWarning[] {
  const { errors, warnings } = validateParameters(params);
  if (errors.length > 0) throw new ConfigurationError(errors);
  return warnings;
}
