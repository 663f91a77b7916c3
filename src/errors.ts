import type { ZodError } from "zod";

/**
 * Rejected input at the ledger boundary: non-positive amounts, negative
 * budgets, malformed dates or months, unknown categories.
 */
export class ValidationError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "ValidationError";
    this.issues = issues;
  }

  static fromZod(message: string, error: ZodError): ValidationError {
    return new ValidationError(
      message,
      error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
      ),
    );
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
