// ── Anomaly Detection ───────────────────────────────────────────────
// Flags individual expenses whose amount is a z-score outlier within
// its own category.

import type { Transaction } from "./aggregation.js";
import { failure, type Failure } from "./results.js";
import { mean, populationStdDev } from "./stats.js";

export const ANOMALY_LOOKBACK_MONTHS = 3;
export const DEFAULT_Z_THRESHOLD = 2;
/** Categories with fewer transactions are not scanned */
export const MIN_CATEGORY_SAMPLE = 5;

const HIGH_SEVERITY_Z = 3;
const EXPECTED_RANGE_WIDTH = 2;

export interface Anomaly {
  transactionId: string;
  category: string;
  subcategory: string | null;
  amount: number;
  date: string;
  description: string;
  expectedRange: { low: number; high: number };
  /** z-score of the amount within its category */
  deviation: number;
  severity: "High" | "Medium";
}

export interface AnomalyReport {
  success: true;
  anomaliesFound: number;
  anomalies: Anomaly[];
  message: string;
}

export type AnomalyResult = AnomalyReport | Failure<"no_transactions">;

export interface AnomalyOptions {
  /** z-score a transaction must exceed to be flagged (default: 2) */
  threshold?: number;
}

/**
 * Scan expenses for unusually large or small amounts.
 *
 * Each category is judged against its own mean and population standard
 * deviation. Categories with too few transactions or no variance are
 * skipped. Anomalies are returned largest amount first.
 */
export function detectAnomalies(
  transactions: readonly Transaction[],
  options: AnomalyOptions = {},
): AnomalyResult {
  const threshold = options.threshold ?? DEFAULT_Z_THRESHOLD;

  if (transactions.length === 0) {
    return failure(
      "no_transactions",
      `No expenses recorded in the last ${ANOMALY_LOOKBACK_MONTHS} months to analyze.`,
    );
  }

  const byCategory = new Map<string, Transaction[]>();
  for (const tx of transactions) {
    let bucket = byCategory.get(tx.category);
    if (!bucket) {
      bucket = [];
      byCategory.set(tx.category, bucket);
    }
    bucket.push(tx);
  }

  const flagged: { anomaly: Anomaly; order: number }[] = [];
  const order = new Map(transactions.map((tx, i) => [tx, i]));

  for (const [category, txs] of byCategory) {
    if (txs.length < MIN_CATEGORY_SAMPLE) continue;

    const amounts = txs.map((tx) => tx.amount);
    const avg = mean(amounts);
    const stdDev = populationStdDev(amounts);
    if (stdDev === 0) continue;

    for (const tx of txs) {
      const z = Math.abs(tx.amount - avg) / stdDev;
      if (z <= threshold) continue;

      flagged.push({
        order: order.get(tx) ?? 0,
        anomaly: {
          transactionId: tx.id,
          category,
          subcategory: tx.subcategory,
          amount: tx.amount,
          date: tx.date,
          description: tx.description,
          expectedRange: {
            low: avg - EXPECTED_RANGE_WIDTH * stdDev,
            high: avg + EXPECTED_RANGE_WIDTH * stdDev,
          },
          deviation: z,
          severity: z > HIGH_SEVERITY_Z ? "High" : "Medium",
        },
      });
    }
  }

  // Largest first; equal amounts keep their input order.
  flagged.sort(
    (a, b) => b.anomaly.amount - a.anomaly.amount || a.order - b.order,
  );
  const anomalies = flagged.map((f) => f.anomaly);

  return {
    success: true,
    anomaliesFound: anomalies.length,
    anomalies,
    message:
      anomalies.length > 0
        ? `Found ${anomalies.length} unusual transaction${anomalies.length === 1 ? "" : "s"}.`
        : "No unusual spending detected.",
  };
}
