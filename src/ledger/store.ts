import Database from "better-sqlite3";
import { z } from "zod";
import type { Transaction } from "../analysis/aggregation.js";
import type { BudgetEntry } from "../analysis/budget.js";
import { nextMonth, type DateRange, type MonthRef } from "../analysis/periods.js";
import { ValidationError } from "../errors.js";
import { logger } from "../logger.js";

// ── Types ───────────────────────────────────────────────────────────────────

/** Read side consumed by the insights service */
export interface LedgerReader {
  expenses(ownerId: string, range: DateRange): Transaction[];
  budgetEntries(ownerId: string, period: MonthRef): BudgetEntry[];
  incomeTotal(ownerId: string, range: DateRange): number;
}

interface ExpenseRow {
  id: number;
  owner_id: string;
  category: string;
  subcategory: string;
  amount: number;
  description: string;
  expense_date: string;
  tags: string;
}

interface IncomeRow {
  id: number;
  owner_id: string;
  source: string;
  amount: number;
  description: string;
  income_date: string;
}

interface BudgetRow {
  owner_id: string;
  category: string;
  subcategory: string;
  planned_amount: number;
  month: number;
  year: number;
}

export type CopyBudgetResult =
  | { success: true; copied: number; skipped: number; target: MonthRef }
  | { success: false; message: string };

// ── Input schemas ───────────────────────────────────────────────────────────

const isoDate = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD")
  .refine((s) => {
    const d = new Date(`${s}T00:00:00Z`);
    return !Number.isNaN(d.getTime()) && d.toISOString().startsWith(s);
  }, "not a calendar date");

const ownerId = z.string().trim().min(1);
const amount = z.number().finite().positive("amount must be greater than 0");

export const expenseInputSchema = z.object({
  ownerId,
  category: z.string().trim().min(1),
  subcategory: z.string().trim().min(1),
  amount,
  date: isoDate,
  description: z.string().max(200).default(""),
  tags: z.array(z.string().trim().min(1).regex(/^[^,]+$/, "tags cannot contain commas")).default([]),
});

export const incomeInputSchema = z.object({
  ownerId,
  source: z.string().trim().min(1),
  amount,
  date: isoDate,
  description: z.string().max(200).default(""),
});

const monthRef = {
  month: z.number().int().min(1).max(12),
  year: z.number().int().min(1970).max(9999),
};

export const budgetInputSchema = z.object({
  ownerId,
  category: z.string().trim().min(1),
  subcategory: z.string().trim().min(1),
  plannedAmount: z.number().finite().nonnegative("planned amount cannot be negative"),
  ...monthRef,
});

export type ExpenseInput = z.input<typeof expenseInputSchema>;
export type IncomeInput = z.input<typeof incomeInputSchema>;
export type BudgetInput = z.input<typeof budgetInputSchema>;

// ── Database singleton ──────────────────────────────────────────────────────

let db: Database.Database | null = null;

export function initLedger(dbPath = "budget-insights.db"): void {
  db?.close();
  db = new Database(dbPath);
  db.pragma("journal_mode = WAL");
  db.pragma("busy_timeout = 5000");

  db.exec(`
    CREATE TABLE IF NOT EXISTS expenses (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      owner_id TEXT NOT NULL,
      category TEXT NOT NULL,
      subcategory TEXT NOT NULL,
      amount REAL NOT NULL CHECK(amount > 0),
      description TEXT NOT NULL DEFAULT '',
      expense_date TEXT NOT NULL,
      tags TEXT NOT NULL DEFAULT '',
      created_at INTEGER NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_expenses_owner_date ON expenses(owner_id, expense_date);

    CREATE TABLE IF NOT EXISTS income (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      owner_id TEXT NOT NULL,
      source TEXT NOT NULL,
      amount REAL NOT NULL CHECK(amount > 0),
      description TEXT NOT NULL DEFAULT '',
      income_date TEXT NOT NULL,
      created_at INTEGER NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_income_owner_date ON income(owner_id, income_date);

    CREATE TABLE IF NOT EXISTS budget_plans (
      owner_id TEXT NOT NULL,
      category TEXT NOT NULL,
      subcategory TEXT NOT NULL,
      planned_amount REAL NOT NULL CHECK(planned_amount >= 0),
      month INTEGER NOT NULL CHECK(month BETWEEN 1 AND 12),
      year INTEGER NOT NULL,
      updated_at INTEGER NOT NULL,
      UNIQUE(owner_id, category, subcategory, month, year)
    );
  `);

  logger.debug({ dbPath }, "Ledger initialized");
}

export function closeLedger(): void {
  db?.close();
  db = null;
}

function getDb(): Database.Database {
  if (!db) {
    throw new Error("Ledger not initialized. Call initLedger() first.");
  }
  return db;
}

function parse<S extends z.ZodTypeAny>(schema: S, input: unknown, what: string): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw ValidationError.fromZod(`Invalid ${what}`, result.error);
  }
  return result.data;
}

// ── Writes ──────────────────────────────────────────────────────────────────

export function addExpense(input: ExpenseInput): Transaction {
  const expense = parse(expenseInputSchema, input, "expense");
  const result = getDb()
    .prepare(
      `INSERT INTO expenses (owner_id, category, subcategory, amount, description, expense_date, tags, created_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
    )
    .run(
      expense.ownerId,
      expense.category,
      expense.subcategory,
      expense.amount,
      expense.description,
      expense.date,
      expense.tags.join(","),
      Date.now(),
    );

  return {
    id: String(result.lastInsertRowid),
    ownerId: expense.ownerId,
    kind: "expense",
    category: expense.category,
    subcategory: expense.subcategory,
    amount: expense.amount,
    date: expense.date,
    description: expense.description,
    tags: expense.tags,
  };
}

export function addIncome(input: IncomeInput): Transaction {
  const income = parse(incomeInputSchema, input, "income");
  const result = getDb()
    .prepare(
      `INSERT INTO income (owner_id, source, amount, description, income_date, created_at)
       VALUES (?, ?, ?, ?, ?, ?)`,
    )
    .run(income.ownerId, income.source, income.amount, income.description, income.date, Date.now());

  return {
    id: String(result.lastInsertRowid),
    ownerId: income.ownerId,
    kind: "income",
    category: income.source,
    subcategory: null,
    amount: income.amount,
    date: income.date,
    description: income.description,
    tags: [],
  };
}

/** Insert or replace the planned amount for one budget line. */
export function setBudget(input: BudgetInput): BudgetEntry {
  const entry = parse(budgetInputSchema, input, "budget entry");
  getDb()
    .prepare(
      `INSERT INTO budget_plans (owner_id, category, subcategory, planned_amount, month, year, updated_at)
       VALUES (?, ?, ?, ?, ?, ?, ?)
       ON CONFLICT(owner_id, category, subcategory, month, year)
       DO UPDATE SET planned_amount = excluded.planned_amount, updated_at = excluded.updated_at`,
    )
    .run(
      entry.ownerId,
      entry.category,
      entry.subcategory,
      entry.plannedAmount,
      entry.month,
      entry.year,
      Date.now(),
    );
  return entry;
}

/**
 * Copy every budget line of a month into the following month. Lines the
 * target month already has are left as they are.
 */
export function copyBudgetToNextMonth(owner: string, period: MonthRef): CopyBudgetResult {
  const source = parse(z.object({ ownerId, ...monthRef }), { ownerId: owner, ...period }, "budget period");
  const entries = getBudgetEntries(source.ownerId, source);
  if (entries.length === 0) {
    return {
      success: false,
      message: `No budget set for ${source.year}-${String(source.month).padStart(2, "0")} to copy.`,
    };
  }

  const target = nextMonth(source);
  const store = getDb();
  const insert = store.prepare(
    `INSERT INTO budget_plans (owner_id, category, subcategory, planned_amount, month, year, updated_at)
     VALUES (?, ?, ?, ?, ?, ?, ?)
     ON CONFLICT(owner_id, category, subcategory, month, year) DO NOTHING`,
  );

  const copied = store.transaction((rows: BudgetEntry[]) => {
    let count = 0;
    const now = Date.now();
    for (const e of rows) {
      count += insert.run(
        e.ownerId,
        e.category,
        e.subcategory,
        e.plannedAmount,
        target.month,
        target.year,
        now,
      ).changes;
    }
    return count;
  })(entries);

  logger.info({ ownerId: source.ownerId, copied, target }, "Budget copied");
  return { success: true, copied, skipped: entries.length - copied, target };
}

// ── Reads ───────────────────────────────────────────────────────────────────

export function listExpenses(owner: string, range: DateRange): Transaction[] {
  return getDb()
    .prepare<[string, string, string], ExpenseRow>(
      `SELECT id, owner_id, category, subcategory, amount, description, expense_date, tags
       FROM expenses
       WHERE owner_id = ? AND expense_date BETWEEN ? AND ?
       ORDER BY expense_date, id`,
    )
    .all(owner, range.start, range.end)
    .map((row) => ({
      id: String(row.id),
      ownerId: row.owner_id,
      kind: "expense" as const,
      category: row.category,
      subcategory: row.subcategory,
      amount: row.amount,
      date: row.expense_date,
      description: row.description,
      tags: row.tags ? row.tags.split(",") : [],
    }));
}

export function listIncome(owner: string, range: DateRange): Transaction[] {
  return getDb()
    .prepare<[string, string, string], IncomeRow>(
      `SELECT id, owner_id, source, amount, description, income_date
       FROM income
       WHERE owner_id = ? AND income_date BETWEEN ? AND ?
       ORDER BY income_date, id`,
    )
    .all(owner, range.start, range.end)
    .map((row) => ({
      id: String(row.id),
      ownerId: row.owner_id,
      kind: "income" as const,
      category: row.source,
      subcategory: null,
      amount: row.amount,
      date: row.income_date,
      description: row.description,
      tags: [],
    }));
}

export function getIncomeTotal(owner: string, range: DateRange): number {
  const row = getDb()
    .prepare<[string, string, string], { total: number }>(
      `SELECT COALESCE(SUM(amount), 0) AS total
       FROM income
       WHERE owner_id = ? AND income_date BETWEEN ? AND ?`,
    )
    .get(owner, range.start, range.end);
  return row?.total ?? 0;
}

export function getBudgetEntries(owner: string, period: MonthRef): BudgetEntry[] {
  return getDb()
    .prepare<[string, number, number], BudgetRow>(
      `SELECT owner_id, category, subcategory, planned_amount, month, year
       FROM budget_plans
       WHERE owner_id = ? AND month = ? AND year = ?
       ORDER BY category, subcategory`,
    )
    .all(owner, period.month, period.year)
    .map((row) => ({
      ownerId: row.owner_id,
      category: row.category,
      subcategory: row.subcategory,
      plannedAmount: row.planned_amount,
      month: row.month,
      year: row.year,
    }));
}

export const sqliteLedger: LedgerReader = {
  expenses: listExpenses,
  budgetEntries: getBudgetEntries,
  incomeTotal: getIncomeTotal,
};
