// ── Statistics Helpers ──────────────────────────────────────────────
// Small numeric primitives shared by the analysis modules. Every
// division goes through `safeDivide` so a zero denominator resolves to a
// defined fallback instead of NaN or Infinity.

export function sum(values: readonly number[]): number {
  return values.reduce((s, v) => s + v, 0);
}

/** Arithmetic mean; 0 for an empty list. */
export function mean(values: readonly number[]): number {
  return safeDivide(sum(values), values.length);
}

/** Population variance (divides by n, not n - 1). */
export function populationVariance(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const m = mean(values);
  let acc = 0;
  for (const v of values) {
    acc += (v - m) ** 2;
  }
  return acc / values.length;
}

export function populationStdDev(values: readonly number[]): number {
  return Math.sqrt(populationVariance(values));
}

/**
 * Ordinary least-squares slope of `ys` against their 0-based index.
 * Returns 0 when there are fewer than two points.
 */
export function linearRegressionSlope(ys: readonly number[]): number {
  const n = ys.length;
  if (n < 2) return 0;

  let sumX = 0;
  let sumY = 0;
  let sumXY = 0;
  let sumXX = 0;

  ys.forEach((y, x) => {
    sumX += x;
    sumY += y;
    sumXY += x * y;
    sumXX += x * x;
  });

  const denominator = n * sumXX - sumX * sumX;
  return safeDivide(n * sumXY - sumX * sumY, denominator);
}

export function safeDivide(
  numerator: number,
  denominator: number,
  fallback = 0,
): number {
  if (denominator === 0 || !Number.isFinite(denominator)) return fallback;
  const result = numerator / denominator;
  return Number.isFinite(result) ? result : fallback;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/** Round to cents. */
export function round(n: number): number {
  return Math.round(n * 100) / 100;
}
