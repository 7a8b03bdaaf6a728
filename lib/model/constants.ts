/**
 * Default constants and input ranges for the compounding projector.
 * Defaults match the values the parameter controls start at.
 */

/** Win probability, percent. Default 40%. */
export const DEFAULT_WIN_PROBABILITY_PCT = 40;

/** Reward-to-risk ratio. Default 2:1. */
export const DEFAULT_REWARD_TO_RISK_RATIO = 2;

export const DEFAULT_OPPORTUNITIES_PER_PERIOD = 10;

/** Periods per cycle, e.g. 12 months in a year. */
export const DEFAULT_PERIODS_PER_CYCLE = 12;

/** Cycles to simulate, e.g. 30 years. */
export const DEFAULT_NUMBER_OF_CYCLES = 30;

export const DEFAULT_STARTING_BALANCE = 1_000;

export const DEFAULT_TARGET_BALANCE = 1_000_000;

/** Risk per trade as a % of bankroll. Default 2%. */
export const DEFAULT_RISK_PCT = 2;

export const MIN_WIN_PROBABILITY_PCT = 1;
export const MAX_WIN_PROBABILITY_PCT = 100;

/** Slider range for the reward ratio; values outside it are allowed with a warning. */
export const MIN_REWARD_TO_RISK_RATIO_UI = 0.1;
export const MAX_REWARD_TO_RISK_RATIO_UI = 20;

/** Hard bounds on the loop: at most 50 × 200 = 10,000 period records. */
export const MAX_PERIODS_PER_CYCLE = 200;
export const MAX_NUMBER_OF_CYCLES = 50;

export const MAX_RISK_PCT = 100;
export const MAX_TAX_RATE_PCT = 100;

/** Decimal places kept by the summary statistics. */
export const EXPECTANCY_DECIMALS = 2;
export const PERIOD_RETURN_DECIMALS = 1;
export const KELLY_DECIMALS = 4;
