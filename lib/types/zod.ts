/**
 * Zod schemas for the strategy compounding projector.
 * Parameter shape plus the derived statistics and period records the engine emits.
 */

import { z } from "zod";
import {
  DEFAULT_WIN_PROBABILITY_PCT,
  DEFAULT_REWARD_TO_RISK_RATIO,
  DEFAULT_OPPORTUNITIES_PER_PERIOD,
  DEFAULT_PERIODS_PER_CYCLE,
  DEFAULT_NUMBER_OF_CYCLES,
  DEFAULT_STARTING_BALANCE,
  DEFAULT_TARGET_BALANCE,
  DEFAULT_RISK_PCT,
} from "@/lib/model/constants";

/** When a recurring event applies: every period, once at the end of each cycle, or never. */
export const CadenceSchema = z.enum(["Period", "Cycle", "None"]);
export type Cadence = z.infer<typeof CadenceSchema>;

/**
 * Structural shape only. Range checks live in validateParameters so every
 * problem is reported with a code instead of failing on the first one.
 */
export const StrategyParametersSchema = z.object({
  /** Percentage of trades that are winners (1–100). */
  winProbabilityPct: z.number().default(DEFAULT_WIN_PROBABILITY_PCT),
  /** Profit relative to the amount risked, e.g. 2 means 2:1. */
  rewardToRiskRatio: z.number().default(DEFAULT_REWARD_TO_RISK_RATIO),
  opportunitiesPerPeriod: z.number().default(DEFAULT_OPPORTUNITIES_PER_PERIOD),
  periodsPerCycle: z.number().default(DEFAULT_PERIODS_PER_CYCLE),
  numberOfCycles: z.number().default(DEFAULT_NUMBER_OF_CYCLES),
  startingBalance: z.number().default(DEFAULT_STARTING_BALANCE),
  /** Financial target; the projection stops once a period starts at or above it. */
  targetBalance: z.number().default(DEFAULT_TARGET_BALANCE),
  contributionAmount: z.number().default(0),
  contributionCadence: CadenceSchema.default("None"),
  withdrawalAmount: z.number().default(0),
  withdrawalCadence: CadenceSchema.default("None"),
  /** Capital gains tax on period returns (0–100). */
  taxRatePct: z.number().default(0),
  taxCadence: CadenceSchema.default("None"),
  /** Risk per trade as a % of bankroll. */
  riskPct: z.number().default(DEFAULT_RISK_PCT),
  riskAdjustCadence: CadenceSchema.default("None"),
});
export type StrategyParameters = z.infer<typeof StrategyParametersSchema>;
export type StrategyParametersInput = z.input<typeof StrategyParametersSchema>;

export const DerivedStatsSchema = z.object({
  /** Expected profit per trade in R (multiples of the amount risked). */
  expectancy: z.number(),
  /** Expectancy × opportunities per period. */
  periodReturnR: z.number(),
  /** Raw Kelly fraction of bankroll; negative when the edge is unfavorable. */
  kellyFraction: z.number(),
  /** Kelly as a percentage, clamped at 0 for display. */
  kellyFractionPct: z.number().min(0),
  halfKellyPct: z.number().min(0),
});
export type DerivedStats = z.infer<typeof DerivedStatsSchema>;

export const PeriodRecordSchema = z.object({
  cycleIndex: z.number().int().min(1),
  periodIndex: z.number().int().min(1),
  startingBalance: z.number(),
  riskAmount: z.number(),
  returnAmount: z.number(),
  contributionApplied: z.number(),
  withdrawalApplied: z.number(),
  taxWithheld: z.number(),
  endingBalance: z.number(),
});
export type PeriodRecord = z.infer<typeof PeriodRecordSchema>;
