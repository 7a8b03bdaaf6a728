/**
 * "How to interpret these results" content, filled from the current parameters and projection.
 */

import type { StrategyParameters } from "@/lib/types/zod";
import type { ProjectionResult } from "@/lib/model/engine";
import { compareRiskToKelly } from "@/lib/model/stats";
import { formatKellyPercent } from "@/lib/utils/format";

export const COMPOUNDING_FORMULA = "A = P × (1 + r/n)^(n×t)";

export interface FormulaTerm {
  symbol: string;
  label: string;
  value: string;
}

export interface Interpretation {
  formula: string;
  terms: FormulaTerm[];
  insights: string[];
}

const INTEGER_FORMAT = new Intl.NumberFormat("en-US", { maximumFractionDigits: 0 });

const OUTCOME_TEXT: Record<ProjectionResult["outcome"], string> = {
  TARGET_REACHED: "Target reached",
  DEPLETED: "Account depleted",
  HORIZON_REACHED: "Target not reached within the simulated cycles",
};

export function buildInterpretation(
  params: StrategyParameters,
  projection: ProjectionResult
): Interpretation {
  const { stats } = projection;
  const riskCadence =
    params.riskAdjustCadence === "None"
      ? "Risk stays at the starting amount (never adjusted)."
      : `Adjust risk per ${params.riskAdjustCadence.toLowerCase()} for balance.`;
  const belowKelly =
    compareRiskToKelly(params.riskPct, stats.kellyFractionPct) === "BELOW_KELLY";
  const reached = projection.targetReachedAt;

  return {
    formula: COMPOUNDING_FORMULA,
    terms: [
      { symbol: "A", label: "Ending balance", value: INTEGER_FORMAT.format(projection.finalBalance) },
      { symbol: "P", label: "Starting balance", value: INTEGER_FORMAT.format(params.startingBalance) },
      { symbol: "r", label: "Expected return per period", value: `${stats.periodReturnR.toFixed(1)}R` },
      { symbol: "n", label: "Opportunities per period", value: String(params.opportunitiesPerPeriod) },
      { symbol: "t", label: "Total periods", value: String(params.periodsPerCycle * params.numberOfCycles) },
    ],
    insights: [
      `Expectancy: ${stats.expectancy.toFixed(2)}R per trade`,
      `Kelly Criterion: Risk ${formatKellyPercent(stats.kellyFractionPct)} per trade (half-Kelly: ${formatKellyPercent(stats.halfKellyPct)})`,
      `Your risk of ${params.riskPct}% is ${belowKelly ? "below" : "at or above"} Kelly`,
      `Ending Balance: ${INTEGER_FORMAT.format(projection.finalBalance)}`,
      reached
        ? `${OUTCOME_TEXT.TARGET_REACHED} in cycle ${reached.cycleIndex}, period ${reached.periodIndex}`
        : OUTCOME_TEXT[projection.outcome],
      `Risk Management: ${riskCadence}`,
    ],
  };
}
