export {
  CadenceSchema,
  StrategyParametersSchema,
  DerivedStatsSchema,
  PeriodRecordSchema,
  type Cadence,
  type StrategyParameters,
  type StrategyParametersInput,
  type DerivedStats,
  type PeriodRecord,
} from "./types/zod";
export {
  runProjection,
  project,
  type ProjectionResult,
  type ProjectionOptions,
  type ProjectionOutcome,
  type RoundingMode,
  type PeriodPosition,
} from "./model/engine";
export {
  calculateExpectancy,
  calculateKellyFraction,
  computeDerivedStats,
  compareRiskToKelly,
  kellyToDisplayPct,
  type RiskComparison,
} from "./model/stats";
export { resolveCadence, gatedAmount, shouldResizeRisk, type CycleBoundary } from "./model/cadence";
export {
  validateParameters,
  parseStrategyParameters,
  assertValidParameters,
  type ValidationResult,
  type ValidationWarning,
} from "./model/validation";
export { ConfigurationError, type ValidationError } from "./model/errors";
export { projectionToCsv, projectionCsvFilename, CSV_HEADERS } from "./export/projectionToCsv";
export { buildBalanceSeries, formatPointLabel, type BalancePoint, type BalanceSeries } from "./utils/chart-series";
export { formatCurrency, formatCompactCurrency, formatR, formatKellyPercent } from "./utils/format";
export { diffParameters, type ParameterChange } from "./utils/parameter-diff";
export { HELP_PARAMETERS, HELP_METRICS, CADENCE_LABELS, formatHelpContent, type HelpEntry } from "./copy/help";
export { buildInterpretation, COMPOUNDING_FORMULA, type Interpretation, type FormulaTerm } from "./copy/interpretation";
