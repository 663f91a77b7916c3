// ── Insights Service ────────────────────────────────────────────────
// Owner-level entry points. Each call reads a snapshot from the ledger
// and runs the pure analysis pipeline over it; nothing is written back.

import {
  aggregateMonthly,
  ANOMALY_LOOKBACK_MONTHS,
  compareBudget,
  computeBalance,
  DEFAULT_Z_THRESHOLD,
  detectAnomalies,
  FORECAST_LOOKBACK_MONTHS,
  forecastExpenses,
  generateRecommendations,
  monthRange,
  summarizeBudget,
  trailingWindow,
  type AnomalyResult,
  type Balance,
  type BudgetSummary,
  type ComparisonRow,
  type ForecastResult,
  type MonthlySeries,
  type MonthRef,
  type RecommendationResult,
} from "../analysis/index.js";
import { sum } from "../analysis/stats.js";
import type { LedgerReader } from "../ledger/store.js";
import { logger } from "../logger.js";

export interface InsightsOptions {
  /** Categories never proposed for spending cuts */
  essentialCategories: ReadonlySet<string>;
  /** Default z-score threshold for anomaly scans */
  anomalyThreshold?: number;
  /** Clock used to anchor rolling windows (default: system time) */
  now?: () => Date;
}

export interface InsightsService {
  forecast(ownerId: string, category?: string): ForecastResult;
  detectAnomalies(ownerId: string, threshold?: number): AnomalyResult;
  compareBudget(ownerId: string, period: MonthRef): ComparisonRow[];
  budgetSummary(ownerId: string, period: MonthRef): BudgetSummary;
  monthlyBalance(ownerId: string, period: MonthRef): Balance;
  monthlyTrend(ownerId: string, months?: number): MonthlySeries;
  recommend(ownerId: string, period: MonthRef): RecommendationResult;
}

export function createInsightsService(
  ledger: LedgerReader,
  options: InsightsOptions,
): InsightsService {
  const now = options.now ?? (() => new Date());
  const defaultThreshold = options.anomalyThreshold ?? DEFAULT_Z_THRESHOLD;

  function compare(ownerId: string, period: MonthRef): ComparisonRow[] {
    const entries = ledger.budgetEntries(ownerId, period);
    if (entries.length === 0) return [];
    return compareBudget(entries, ledger.expenses(ownerId, monthRange(period)), period);
  }

  function balance(ownerId: string, period: MonthRef): Balance {
    const range = monthRange(period);
    const expenseTotal = sum(ledger.expenses(ownerId, range).map((tx) => tx.amount));
    return computeBalance(ledger.incomeTotal(ownerId, range), expenseTotal);
  }

  function trend(ownerId: string, months: number, category?: string): MonthlySeries {
    const asOf = now();
    const expenses = ledger.expenses(ownerId, trailingWindow(months, asOf));
    return aggregateMonthly(expenses, { category, lookbackMonths: months, asOf });
  }

  return {
    forecast(ownerId, category) {
      const result = forecastExpenses(trend(ownerId, FORECAST_LOOKBACK_MONTHS, category), {
        category,
      });
      if (!result.success) {
        logger.debug({ ownerId, category, reason: result.reason }, "Forecast unavailable");
      }
      return result;
    },

    detectAnomalies(ownerId, threshold = defaultThreshold) {
      const window = trailingWindow(ANOMALY_LOOKBACK_MONTHS, now());
      return detectAnomalies(ledger.expenses(ownerId, window), { threshold });
    },

    compareBudget: compare,

    budgetSummary(ownerId, period) {
      return summarizeBudget(compare(ownerId, period));
    },

    monthlyBalance: balance,

    monthlyTrend(ownerId, months = FORECAST_LOOKBACK_MONTHS) {
      return trend(ownerId, months);
    },

    recommend(ownerId, period) {
      return generateRecommendations(compare(ownerId, period), balance(ownerId, period), {
        essentialCategories: options.essentialCategories,
      });
    },
  };
}
