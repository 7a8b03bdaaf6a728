/**
 * Compounding projection engine.
 * Cycles contain periods; each period risks a fixed slice of the bankroll on
 * the strategy's expected return, then settles cash flows and tax by cadence.
 */

import type {
  DerivedStats,
  PeriodRecord,
  StrategyParameters,
} from "@/lib/types/zod";
import { assertValidParameters, type ValidationWarning } from "@/lib/model/validation";
import { computeDerivedStats } from "@/lib/model/stats";
import { gatedAmount, shouldResizeRisk } from "@/lib/model/cadence";
import { roundHalfEven } from "@/lib/model/rounding";

/**
 * PER_STEP rounds risk, per-period tax and ending balance to whole units as it
 * goes (matches the reference calculator's table). NONE keeps full precision
 * and leaves rounding to display.
 */
export type RoundingMode = "PER_STEP" | "NONE";

export interface ProjectionOptions {
  rounding?: RoundingMode;
}

/** Why the projection stopped emitting periods. */
export type ProjectionOutcome = "TARGET_REACHED" | "DEPLETED" | "HORIZON_REACHED";

export interface PeriodPosition {
  cycleIndex: number;
  periodIndex: number;
}

export interface ProjectionResult {
  records: PeriodRecord[];
  stats: DerivedStats;
  outcome: ProjectionOutcome;
  /** First period whose ending balance met the target; null when never reached. */
  targetReachedAt: PeriodPosition | null;
  /** Ending balance of the last record, or the starting balance when no period ran. */
  finalBalance: number;
  totalReturn: number;
  totalContributions: number;
  totalWithdrawals: number;
  totalTax: number;
  /** Soft warnings from validation; hard errors never reach here. */
  warnings: ValidationWarning[];
}

function roundWhole(mode: RoundingMode): (value: number) => number {
  return mode === "NONE" ? (value) => value : (value) => roundHalfEven(value);
}

/**
 * Run the projection.
 * Throws ConfigurationError before simulating when parameters are invalid.
 */
export function runProjection(
  params: StrategyParameters,
  options: ProjectionOptions = {}
): ProjectionResult {
  const warnings = assertValidParameters(params);
  const round = roundWhole(options.rounding ?? "PER_STEP");

  const stats = computeDerivedStats(
    params.winProbabilityPct,
    params.rewardToRiskRatio,
    params.opportunitiesPerPeriod
  );
  const { periodsPerCycle, numberOfCycles, targetBalance, riskPct } = params;

  const records: PeriodRecord[] = [];
  let balance = params.startingBalance;
  let risk = round((balance * riskPct) / 100);
  let halted = false;

  for (let cycle = 1; cycle <= numberOfCycles && !halted; cycle++) {
    // Sum of this cycle's returns; only Cycle-cadence tax reads it
    let cycleReturn = 0;

    for (let period = 1; period <= periodsPerCycle; period++) {
      if (balance >= targetBalance || balance <= 0) {
        halted = true;
        break;
      }

      if (shouldResizeRisk(params.riskAdjustCadence, period, periodsPerCycle)) {
        risk = round((balance * riskPct) / 100);
      }

      const returnAmount = stats.periodReturnR * risk;
      cycleReturn += returnAmount;

      const contribution = gatedAmount(
        params.contributionAmount,
        params.contributionCadence,
        period,
        periodsPerCycle
      );
      const withdrawal = gatedAmount(
        params.withdrawalAmount,
        params.withdrawalCadence,
        period,
        periodsPerCycle
      );

      let tax = 0;
      if (params.taxCadence === "Period") {
        tax = round((returnAmount * params.taxRatePct) / 100);
      } else if (params.taxCadence === "Cycle" && period === periodsPerCycle) {
        tax = (cycleReturn * params.taxRatePct) / 100;
      }

      const endingBalance = round(
        balance + returnAmount + contribution - withdrawal - tax
      );

      records.push({
        cycleIndex: cycle,
        periodIndex: period,
        startingBalance: balance,
        riskAmount: risk,
        returnAmount,
        contributionApplied: contribution,
        withdrawalApplied: withdrawal,
        taxWithheld: tax,
        endingBalance,
      });
      balance = endingBalance;
    }
  }

  const reached = records.find((r) => r.endingBalance >= targetBalance);
  const outcome: ProjectionOutcome =
    balance >= targetBalance
      ? "TARGET_REACHED"
      : balance <= 0
        ? "DEPLETED"
        : "HORIZON_REACHED";

  return {
    records,
    stats,
    outcome,
    targetReachedAt: reached
      ? { cycleIndex: reached.cycleIndex, periodIndex: reached.periodIndex }
      : null,
    finalBalance: balance,
    totalReturn: records.reduce((s, r) => s + r.returnAmount, 0),
    totalContributions: records.reduce((s, r) => s + r.contributionApplied, 0),
    totalWithdrawals: records.reduce((s, r) => s + r.withdrawalApplied, 0),
    totalTax: records.reduce((s, r) => s + r.taxWithheld, 0),
    warnings,
  };
}

/** Period records only; same validation and semantics as runProjection. */
export function project(params: StrategyParameters): PeriodRecord[] {
  return runProjection(params).records;
}
