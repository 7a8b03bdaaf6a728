/**
 * Strategy statistics: expectancy per trade and Kelly position sizing.
 * Both take the win probability as a percentage (0–100) and the reward-to-risk ratio.
 */

import type { DerivedStats } from "@/lib/types/zod";
import {
  EXPECTANCY_DECIMALS,
  KELLY_DECIMALS,
  PERIOD_RETURN_DECIMALS,
} from "@/lib/model/constants";
import { ConfigurationError, type ValidationError } from "@/lib/model/errors";
import { roundHalfEven } from "@/lib/model/rounding";

function checkStatInputs(
  winProbabilityPct: number,
  rewardToRiskRatio: number
): ValidationError[] {
  const errors: ValidationError[] = [];
  if (
    !Number.isFinite(winProbabilityPct) ||
    winProbabilityPct < 0 ||
    winProbabilityPct > 100
  ) {
    errors.push({
      code: "INVALID_WIN_PROBABILITY",
      message: `Win probability must be between 0 and 100% (got ${winProbabilityPct}%)`,
    });
  }
  if (!Number.isFinite(rewardToRiskRatio) || rewardToRiskRatio <= 0) {
    errors.push({
      code: "INVALID_REWARD_RATIO",
      message: `Reward to risk ratio must be greater than 0 (got ${rewardToRiskRatio})`,
    });
  }
  return errors;
}

/**
 * Average return per trade in R: win% × reward − loss% × 1, rounded to 2 decimals.
 * Positive = profitable on average, negative = losing.
 */
export function calculateExpectancy(
  winProbabilityPct: number,
  rewardToRiskRatio: number
): number {
  const errors = checkStatInputs(winProbabilityPct, rewardToRiskRatio);
  if (errors.length > 0) throw new ConfigurationError(errors);
  const winDecimal = winProbabilityPct / 100;
  return roundHalfEven(
    winDecimal * rewardToRiskRatio - (1 - winDecimal),
    EXPECTANCY_DECIMALS
  );
}

/**
 * Kelly fraction of bankroll: win% − loss% / reward, rounded to 4 decimals.
 * May be negative; display callers clamp at 0. A zero ratio is a caller bug,
 * validation rejects it before this runs.
 */
export function calculateKellyFraction(
  winProbabilityPct: number,
  rewardToRiskRatio: number
): number {
  if (rewardToRiskRatio === 0) {
    throw new RangeError("Kelly fraction is undefined for a reward to risk ratio of 0");
  }
  const winDecimal = winProbabilityPct / 100;
  const lossDecimal = 1 - winDecimal;
  return roundHalfEven(
    winDecimal - lossDecimal / rewardToRiskRatio,
    KELLY_DECIMALS
  );
}

/** Kelly as a display percentage: fraction × 100, never below 0. */
export function kellyToDisplayPct(kellyFraction: number): number {
  return Math.max(0, kellyFraction * 100);
}

/** Summary statistics fed to the projector and the metrics display. */
export function computeDerivedStats(
  winProbabilityPct: number,
  rewardToRiskRatio: number,
  opportunitiesPerPeriod: number = 1
): DerivedStats {
  const errors = checkStatInputs(winProbabilityPct, rewardToRiskRatio);
  if (errors.length > 0) throw new ConfigurationError(errors);

  const expectancy = calculateExpectancy(winProbabilityPct, rewardToRiskRatio);
  const kellyFraction = calculateKellyFraction(
    winProbabilityPct,
    rewardToRiskRatio
  );
  const kellyFractionPct = kellyToDisplayPct(kellyFraction);
  return {
    expectancy,
    periodReturnR: roundHalfEven(
      expectancy * opportunitiesPerPeriod,
      PERIOD_RETURN_DECIMALS
    ),
    kellyFraction,
    kellyFractionPct,
    halfKellyPct: kellyFractionPct / 2,
  };
}

export type RiskComparison = "BELOW_KELLY" | "ABOVE_KELLY";

/** Chosen risk vs Kelly; equal counts as above. */
export function compareRiskToKelly(
  riskPct: number,
  kellyFractionPct: number
): RiskComparison {
  return riskPct < kellyFractionPct ? "BELOW_KELLY" : "ABOVE_KELLY";
}
