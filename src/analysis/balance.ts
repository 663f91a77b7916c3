// ── Monthly Balance ─────────────────────────────────────────────────

import { safeDivide } from "./stats.js";

export interface Balance {
  incomeTotal: number;
  expenseTotal: number;
  balance: number;
  /** Percentage of income left after expenses; 0 without income */
  savingsRate: number;
}

export function computeBalance(incomeTotal: number, expenseTotal: number): Balance {
  const balance = incomeTotal - expenseTotal;
  return {
    incomeTotal,
    expenseTotal,
    balance,
    savingsRate: safeDivide(balance * 100, incomeTotal),
  };
}
