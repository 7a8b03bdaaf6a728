/**
 * Centralized help content for parameter controls and summary metrics.
 * Plain-language descriptions for non-experts.
 * Format: { title, description, example? }
 */

import type { StrategyParameters } from "@/lib/types/zod";

export type HelpEntry = {
  title: string;
  description: string;
  example?: string;
};

/** Format HelpEntry for tooltip/help display */
export function formatHelpContent(entry: HelpEntry): string {
  return entry.example
    ? `${entry.description} Example: ${entry.example}`
    : entry.description;
}

/** Parameter control help, one entry per field. */
export const HELP_PARAMETERS: Record<keyof StrategyParameters, HelpEntry> = {
  winProbabilityPct: {
    title: "Win probability (%)",
    description: "Percentage of trades that are winners.",
  },
  rewardToRiskRatio: {
    title: "Reward to risk ratio",
    description: "Profit potential relative to your risk.",
    example: "2.0 = 2:1 ratio",
  },
  opportunitiesPerPeriod: {
    title: "Opportunities per period",
    description: "Number of trading opportunities in a given time period.",
  },
  periodsPerCycle: {
    title: "Periods per cycle",
    description: "Number of periods in each cycle.",
    example: "12 months in a year, or 20 trading days in a month",
  },
  numberOfCycles: {
    title: "Number of cycles",
    description: "Total cycles to simulate.",
    example: "30 years",
  },
  startingBalance: {
    title: "Starting account balance",
    description: "Initial trading capital.",
  },
  targetBalance: {
    title: "Target account balance",
    description: "Financial target. The projection stops once the account reaches it.",
  },
  contributionAmount: {
    title: "Regular contributions",
    description: "Amount added to the account regularly.",
  },
  contributionCadence: {
    title: "Contribution frequency",
    description: "When contributions are made: every period, or once at the end of each cycle.",
  },
  withdrawalAmount: {
    title: "Regular withdrawals",
    description: "Amount withdrawn from the account regularly.",
  },
  withdrawalCadence: {
    title: "Withdrawal frequency",
    description: "When withdrawals are taken: every period, or once at the end of each cycle.",
  },
  taxRatePct: {
    title: "Capital gains tax",
    description: "Tax rate on profits.",
  },
  taxCadence: {
    title: "Pay tax every",
    description:
      "Per period: tax on each period's return. Per cycle: tax on the whole cycle's return, paid in its last period.",
  },
  riskPct: {
    title: "Risk per trade (% of bankroll)",
    description: "Percentage of capital risked per trade.",
  },
  riskAdjustCadence: {
    title: "Adjust risk every",
    description:
      "When the risk amount is recalculated from the current balance. Never = risk stays at the starting amount.",
  },
};

/** Strategy summary metrics */
export const HELP_METRICS: Record<string, HelpEntry> = {
  expectancy: {
    title: "Expectancy per trade",
    description: "Average return per $1 risked, in multiples of risk (R).",
    example: "0.2R means you make 20 cents per $1 risked on average",
  },
  periodReturn: {
    title: "Period return",
    description: "Expectancy × opportunities per period: the total expected return per period in R.",
  },
  kelly: {
    title: "Kelly criterion",
    description:
      "Risk percentage that maximizes long-run growth given your win rate and reward ratio. Shown as 0% when the edge is negative.",
  },
  riskLevel: {
    title: "Your risk level",
    description: "Your risk per trade compared with the Kelly criterion.",
  },
};

/** Cadence labels for segmented controls. */
export const CADENCE_LABELS = {
  Period: "Period",
  Cycle: "Cycle",
  None: "Never",
} as const;
