/**
 * Golden parameter sets for projection tests.
 * Base growth, cycle-cadence cash flows and tax, and a losing strategy.
 */

import {
  StrategyParametersSchema,
  type StrategyParameters,
} from "@/lib/types/zod";

function createBaseParameters(
  overrides?: Partial<StrategyParameters>
): StrategyParameters {
  return StrategyParametersSchema.parse({
    winProbabilityPct: 40,
    rewardToRiskRatio: 2,
    opportunitiesPerPeriod: 10,
    periodsPerCycle: 12,
    numberOfCycles: 30,
    startingBalance: 1_000,
    targetBalance: 1_000_000,
    riskPct: 2,
    ...overrides,
  });
}

/** 40% win, 2:1 reward, 10 trades/period, risk never re-sized. */
export function getBaseScenario(): StrategyParameters {
  return createBaseParameters();
}

/** Base strategy with risk re-sized every period; compounds until the target is hit. */
export function getCompoundingScenario(): StrategyParameters {
  return createBaseParameters({ riskAdjustCadence: "Period" });
}

/**
 * Quarterly-style cycle: 4 periods, risk re-sized per cycle, contributions per
 * period, withdrawals and tax settled at cycle end.
 */
export function getCycleCadenceScenario(): StrategyParameters {
  return createBaseParameters({
    periodsPerCycle: 4,
    numberOfCycles: 3,
    startingBalance: 10_000,
    targetBalance: 100_000,
    contributionAmount: 100,
    contributionCadence: "Period",
    withdrawalAmount: 500,
    withdrawalCadence: "Cycle",
    taxRatePct: 25,
    taxCadence: "Cycle",
    riskAdjustCadence: "Cycle",
  });
}

/** 30% win at 1:1: expectancy -0.4R with a fixed risk amount drains the account. */
export function getLosingScenario(): StrategyParameters {
  return createBaseParameters({
    winProbabilityPct: 30,
    rewardToRiskRatio: 1,
  });
}
