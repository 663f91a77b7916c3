// ── Expense Forecasting ─────────────────────────────────────────────
// Predicts next month's spending per category from a short monthly
// history: a moving average of the latest months plus the OLS trend.

import { seriesByCategory, type MonthlyTotal } from "./aggregation.js";
import { failure, type Failure } from "./results.js";
import {
  clamp,
  linearRegressionSlope,
  mean,
  populationVariance,
  safeDivide,
  sum,
} from "./stats.js";

/** Months of history required for the requested scope */
export const MIN_FORECAST_MONTHS = 3;
/** Per-category minimum in a multi-category forecast */
export const MIN_CATEGORY_POINTS = 2;
/** Size of the moving-average window */
export const MOVING_AVERAGE_MONTHS = 3;
/** Lookback the caller is expected to aggregate over */
export const FORECAST_LOOKBACK_MONTHS = 6;

const CONFIDENCE_VARIANCE_WEIGHT = 20;

export type TrendDirection = "increasing" | "decreasing";

export interface CategoryForecast {
  predictedAmount: number;
  /** 0-100 */
  confidence: number;
  historicalAverage: number;
  trend: TrendDirection;
  monthsAnalyzed: number;
}

export interface ExpenseForecast {
  success: true;
  predictions: Record<string, CategoryForecast>;
  totalPredicted: number;
  analysisPeriod: { start: string; end: string }; // "YYYY-MM"
}

export type ForecastResult = ExpenseForecast | Failure<"insufficient_history">;

export interface ForecastOptions {
  /** Forecast a single category. All categories in the series if omitted. */
  category?: string;
}

/**
 * Forecast next month's expenses from a monthly series.
 *
 * A single-category forecast is the same computation over a one-element
 * category set. Without a category, categories with fewer than
 * {@link MIN_CATEGORY_POINTS} months are left out and the remaining
 * predictions are summed into `totalPredicted`.
 */
export function forecastExpenses(
  series: readonly MonthlyTotal[],
  options: ForecastOptions = {},
): ForecastResult {
  const scoped =
    options.category === undefined
      ? series
      : series.filter((row) => row.category === options.category);

  const periods = [...new Set(scoped.map((row) => row.period))].sort();
  if (periods.length < MIN_FORECAST_MONTHS) {
    const scope = options.category ? `"${options.category}"` : "your expenses";
    return failure(
      "insufficient_history",
      `Need at least ${MIN_FORECAST_MONTHS} months of data for ${scope} to forecast ` +
        `(found ${periods.length}).`,
    );
  }

  const predictions: Record<string, CategoryForecast> = {};

  for (const [category, rows] of seriesByCategory(scoped)) {
    const amounts = monthlyAmounts(rows);
    if (amounts.length < MIN_CATEGORY_POINTS) continue;
    predictions[category] = forecastCategory(amounts);
  }

  const forecasts = Object.values(predictions);
  if (forecasts.length === 0) {
    return failure(
      "insufficient_history",
      `No category has at least ${MIN_CATEGORY_POINTS} months of data to forecast.`,
    );
  }

  return {
    success: true,
    predictions,
    totalPredicted: sum(forecasts.map((f) => f.predictedAmount)),
    analysisPeriod: {
      start: periods[0] ?? "",
      end: periods[periods.length - 1] ?? "",
    },
  };
}

/**
 * Forecast from one category's monthly amounts, oldest first.
 */
export function forecastCategory(amounts: readonly number[]): CategoryForecast {
  const movingAverage = mean(amounts.slice(-MOVING_AVERAGE_MONTHS));
  const slope = linearRegressionSlope(amounts);

  return {
    predictedAmount: movingAverage + slope,
    confidence: confidenceScore(amounts, movingAverage),
    historicalAverage: mean(amounts),
    // A flat series is reported as decreasing.
    trend: slope > 0 ? "increasing" : "decreasing",
    monthsAnalyzed: amounts.length,
  };
}

function confidenceScore(amounts: readonly number[], movingAverage: number): number {
  if (movingAverage === 0) return 0;
  const dispersion = safeDivide(populationVariance(amounts), movingAverage);
  return clamp(100 - dispersion * CONFIDENCE_VARIANCE_WEIGHT, 0, 100);
}

/** Rows may carry subcategories; fold them into one amount per period. */
function monthlyAmounts(rows: readonly MonthlyTotal[]): number[] {
  const byPeriod = new Map<string, number>();
  for (const row of rows) {
    byPeriod.set(row.period, (byPeriod.get(row.period) ?? 0) + row.totalAmount);
  }
  return [...byPeriod.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([, amount]) => amount);
}
