import { z } from "zod";
import type { MonthRef } from "../analysis/periods.js";
import type { InsightsService } from "../insights/service.js";

export interface ToolContext {
  insights: InsightsService;
  defaultOwner: string;
  /** Clock for "current month" defaults */
  now?: () => Date;
}

export const ownerArg = z
  .string()
  .optional()
  .describe("Owner whose ledger to use. Defaults to the server's configured owner.");

export const monthArg = z
  .number()
  .int()
  .min(1)
  .max(12)
  .optional()
  .describe("Month number 1-12. Defaults to the current month.");

export const yearArg = z
  .number()
  .int()
  .min(1970)
  .max(9999)
  .optional()
  .describe("Four-digit year. Defaults to the current year.");

export function resolveOwner(ctx: ToolContext, owner: string | undefined): string {
  return owner?.trim() || ctx.defaultOwner;
}

export function resolvePeriod(
  ctx: ToolContext,
  month: number | undefined,
  year: number | undefined,
): MonthRef {
  const today = ctx.now?.() ?? new Date();
  return {
    month: month ?? today.getMonth() + 1,
    year: year ?? today.getFullYear(),
  };
}
