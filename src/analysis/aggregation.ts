// ── Monthly Aggregation ─────────────────────────────────────────────
// Groups raw transactions into per-month, per-category totals. Every
// other analysis module builds on the series produced here.

import {
  inRange,
  monthRange,
  periodOf,
  trailingWindow,
  type DateRange,
  type MonthRef,
} from "./periods.js";

export interface Transaction {
  id: string;
  ownerId: string;
  kind: "expense" | "income";
  category: string;
  /** Always null for income */
  subcategory: string | null;
  /** Strictly positive; the direction comes from `kind` */
  amount: number;
  date: string; // "YYYY-MM-DD"
  description: string;
  tags: string[];
}

export interface MonthlyTotal {
  period: string; // "YYYY-MM"
  category: string;
  /** Null unless the series was grouped by subcategory */
  subcategory: string | null;
  totalAmount: number;
  transactionCount: number;
}

export type MonthlySeries = MonthlyTotal[];

export interface AggregationOptions {
  /** Restrict to a single category. All categories if omitted. */
  category?: string;
  /** Explicit calendar month. Takes precedence over `lookbackMonths`. */
  period?: MonthRef;
  /** Rolling window of trailing months anchored at `asOf`. */
  lookbackMonths?: number;
  /** Anchor for the rolling window (default: now) */
  asOf?: Date;
  /** Key rows by (period, category, subcategory) instead of (period, category) */
  bySubcategory?: boolean;
}

/**
 * Aggregate transactions into a monthly series.
 *
 * Returns an empty series when nothing matches. Rows are ordered by
 * period ascending, then category, then subcategory.
 */
export function aggregateMonthly(
  transactions: readonly Transaction[],
  options: AggregationOptions = {},
): MonthlySeries {
  const range = resolveRange(options);

  const buckets = new Map<string, MonthlyTotal>();

  for (const tx of transactions) {
    if (options.category !== undefined && tx.category !== options.category) {
      continue;
    }
    if (range && !inRange(tx.date, range)) continue;

    const period = periodOf(tx.date);
    const subcategory = options.bySubcategory ? tx.subcategory : null;
    const key = `${period}\u0000${tx.category}\u0000${subcategory ?? ""}`;

    const existing = buckets.get(key);
    if (existing) {
      existing.totalAmount += tx.amount;
      existing.transactionCount += 1;
    } else {
      buckets.set(key, {
        period,
        category: tx.category,
        subcategory,
        totalAmount: tx.amount,
        transactionCount: 1,
      });
    }
  }

  return [...buckets.values()].sort(compareMonthlyTotals);
}

/**
 * Split a series into one ascending run of totals per category, in
 * category order.
 */
export function seriesByCategory(
  series: readonly MonthlyTotal[],
): Map<string, MonthlyTotal[]> {
  const grouped = new Map<string, MonthlyTotal[]>();
  for (const row of [...series].sort(compareMonthlyTotals)) {
    let rows = grouped.get(row.category);
    if (!rows) {
      rows = [];
      grouped.set(row.category, rows);
    }
    rows.push(row);
  }
  return new Map(
    [...grouped.entries()].sort(([a], [b]) => a.localeCompare(b)),
  );
}

function resolveRange(options: AggregationOptions): DateRange | null {
  if (options.period) return monthRange(options.period);
  if (options.lookbackMonths !== undefined) {
    return trailingWindow(options.lookbackMonths, options.asOf ?? new Date());
  }
  return null;
}

function compareMonthlyTotals(a: MonthlyTotal, b: MonthlyTotal): number {
  return (
    a.period.localeCompare(b.period) ||
    a.category.localeCompare(b.category) ||
    (a.subcategory ?? "").localeCompare(b.subcategory ?? "")
  );
}
