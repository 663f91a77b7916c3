import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { isKnownExpenseCategory, isKnownIncomeSource } from "../categories.js";
import { ValidationError } from "../errors.js";
import { addExpense, addIncome, copyBudgetToNextMonth, setBudget } from "../ledger/store.js";
import {
  monthArg,
  ownerArg,
  resolveOwner,
  resolvePeriod,
  yearArg,
  type ToolContext,
} from "./context.js";
import { runTool } from "./result.js";

const categoryArgs = {
  category: z.string().describe("Expense category, e.g. 'Food'. See the finance://categories resource."),
  subcategory: z.string().describe("Subcategory within the category, e.g. 'Groceries'."),
};

function requireKnownCategory(category: string, subcategory: string): void {
  if (!isKnownExpenseCategory(category, subcategory)) {
    throw new ValidationError(`Unknown category "${category}" / "${subcategory}"`);
  }
}

export function registerLedgerTools(server: McpServer, ctx: ToolContext) {
  server.registerTool(
    "record_expense",
    {
      description:
        "Record a single expense in the ledger. The amount must be positive; the category and subcategory must come from the category list.",
      inputSchema: {
        owner: ownerArg,
        ...categoryArgs,
        amount: z.number().describe("Amount spent, greater than 0."),
        date: z.string().describe("Date of the expense in YYYY-MM-DD format."),
        description: z.string().optional().describe("Optional note, up to 200 characters."),
        tags: z.array(z.string()).optional().describe("Optional tags for filtering."),
      },
    },
    async ({ owner, category, subcategory, amount, date, description, tags }) =>
      runTool("record_expense", () => {
        requireKnownCategory(category, subcategory);
        return addExpense({
          ownerId: resolveOwner(ctx, owner),
          category,
          subcategory,
          amount,
          date,
          description,
          tags,
        });
      }),
  );

  server.registerTool(
    "record_income",
    {
      description:
        "Record an income payment (salary, bonus, rental income, ...) in the ledger. The amount must be positive.",
      inputSchema: {
        owner: ownerArg,
        source: z.string().describe("Income source from the category list, e.g. 'Salary'."),
        amount: z.number().describe("Amount received, greater than 0."),
        date: z.string().describe("Date received in YYYY-MM-DD format."),
        description: z.string().optional().describe("Optional note, up to 200 characters."),
      },
    },
    async ({ owner, source, amount, date, description }) =>
      runTool("record_income", () => {
        if (!isKnownIncomeSource(source)) {
          throw new ValidationError(`Unknown income source "${source}"`);
        }
        return addIncome({ ownerId: resolveOwner(ctx, owner), source, amount, date, description });
      }),
  );

  server.registerTool(
    "set_budget",
    {
      description:
        "Set the planned amount for one budget line (category + subcategory) in a month. Replaces any existing amount for that line.",
      inputSchema: {
        owner: ownerArg,
        ...categoryArgs,
        plannedAmount: z.number().describe("Planned amount, 0 or more."),
        month: monthArg,
        year: yearArg,
      },
    },
    async ({ owner, category, subcategory, plannedAmount, month, year }) =>
      runTool("set_budget", () => {
        requireKnownCategory(category, subcategory);
        return setBudget({
          ownerId: resolveOwner(ctx, owner),
          category,
          subcategory,
          plannedAmount,
          ...resolvePeriod(ctx, month, year),
        });
      }),
  );

  server.registerTool(
    "copy_budget",
    {
      description:
        "Copy every budget line of a month into the following month. Lines already set in the following month are kept.",
      inputSchema: { owner: ownerArg, month: monthArg, year: yearArg },
    },
    async ({ owner, month, year }) =>
      runTool("copy_budget", () =>
        copyBudgetToNextMonth(resolveOwner(ctx, owner), resolvePeriod(ctx, month, year)),
      ),
  );
}
