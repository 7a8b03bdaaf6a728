/**
 * Compare two parameter sets and produce human-readable changes for a "What changed" panel.
 */

import type { StrategyParameters } from "@/lib/types/zod";
import { formatCurrency } from "@/lib/utils/format";

export interface ParameterChange {
  key: keyof StrategyParameters;
  label: string;
  from: string;
  to: string;
}

function formatValue(key: keyof StrategyParameters, value: StrategyParameters[keyof StrategyParameters]): string {
  if (typeof value === "string") {
    return value === "None" ? "Never" : `Every ${value.toLowerCase()}`;
  }
  switch (key) {
    case "winProbabilityPct":
    case "taxRatePct":
    case "riskPct":
      return `${value}%`;
    case "rewardToRiskRatio":
      return `${value}:1`;
    case "startingBalance":
    case "targetBalance":
    case "contributionAmount":
    case "withdrawalAmount":
      return formatCurrency(value);
    default:
      return String(value);
  }
}

const PARAMETER_LABELS: Record<keyof StrategyParameters, string> = {
  winProbabilityPct: "Win probability",
  rewardToRiskRatio: "Reward to risk ratio",
  opportunitiesPerPeriod: "Opportunities per period",
  periodsPerCycle: "Periods per cycle",
  numberOfCycles: "Number of cycles",
  startingBalance: "Starting balance",
  targetBalance: "Target balance",
  contributionAmount: "Contribution",
  contributionCadence: "Contribution frequency",
  withdrawalAmount: "Withdrawal",
  withdrawalCadence: "Withdrawal frequency",
  taxRatePct: "Capital gains tax",
  taxCadence: "Tax payment frequency",
  riskPct: "Risk per trade",
  riskAdjustCadence: "Risk adjustment frequency",
};

/** Keys in display order: strategy, horizon, capital, cash flows, tax and risk. */
const PARAMETER_KEYS: (keyof StrategyParameters)[] = [
  "winProbabilityPct",
  "rewardToRiskRatio",
  "opportunitiesPerPeriod",
  "periodsPerCycle",
  "numberOfCycles",
  "startingBalance",
  "targetBalance",
  "contributionAmount",
  "contributionCadence",
  "withdrawalAmount",
  "withdrawalCadence",
  "taxRatePct",
  "taxCadence",
  "riskPct",
  "riskAdjustCadence",
];

/**
 * Diff two parameter sets and return the changed fields with labels.
 */
export function diffParameters(
  prev: StrategyParameters,
  next: StrategyParameters
): ParameterChange[] {
  const changes: ParameterChange[] = [];
  for (const key of PARAMETER_KEYS) {
    if (prev[key] !== next[key]) {
      changes.push({
        key,
        label: PARAMETER_LABELS[key],
        from: formatValue(key, prev[key]),
        to: formatValue(key, next[key]),
      });
    }
  }
  return changes;
}
