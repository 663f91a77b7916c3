// ── Analysis Engine ──────────────────────────────────────────────────
// Barrel export for all analysis modules.
// Pure functions only — no MCP or storage dependencies.

export {
  aggregateMonthly,
  seriesByCategory,
  type Transaction,
  type MonthlyTotal,
  type MonthlySeries,
  type AggregationOptions,
} from "./aggregation.js";

export {
  forecastExpenses,
  forecastCategory,
  FORECAST_LOOKBACK_MONTHS,
  MIN_FORECAST_MONTHS,
  type CategoryForecast,
  type ExpenseForecast,
  type ForecastResult,
  type ForecastOptions,
  type TrendDirection,
} from "./forecasting.js";

export {
  detectAnomalies,
  ANOMALY_LOOKBACK_MONTHS,
  DEFAULT_Z_THRESHOLD,
  type Anomaly,
  type AnomalyReport,
  type AnomalyResult,
  type AnomalyOptions,
} from "./anomalies.js";

export {
  compareBudget,
  summarizeBudget,
  summarizeByCategory,
  type BudgetEntry,
  type BudgetStatus,
  type BudgetSummary,
  type ComparisonRow,
  type CategoryComparisonRow,
} from "./budget.js";

export { computeBalance, type Balance } from "./balance.js";

export {
  generateRecommendations,
  DEFAULT_ESSENTIAL_CATEGORIES,
  SAVINGS_RATE_TARGET,
  type Recommendation,
  type RecommendationKind,
  type RecommendationReport,
  type RecommendationResult,
  type RecommendationOptions,
  type Priority,
} from "./recommendations.js";

export {
  monthRange,
  nextMonth,
  trailingWindow,
  type DateRange,
  type MonthRef,
} from "./periods.js";

export { failure, type Failure, type FailureReason } from "./results.js";
