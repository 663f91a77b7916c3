// ── Tagged Results ──────────────────────────────────────────────────
// Analysis operations never throw for well-formed input. Expected
// shortfalls are returned as a tagged failure the caller can display.

export type FailureReason =
  | "insufficient_history"
  | "no_budget_configured"
  | "no_transactions";

export interface Failure<R extends FailureReason = FailureReason> {
  success: false;
  reason: R;
  message: string;
}

export function failure<R extends FailureReason>(
  reason: R,
  message: string,
): Failure<R> {
  return { success: false, reason, message };
}
