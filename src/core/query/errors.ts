// src/core/query/errors.ts

import { describeValue, makeDiagnostic } from "../../outcome/codes";
import { failure, type Failure } from "../../outcome/failure";

export type ArgumentErrorCode = "Q0100" | "Q0101" | "Q0102" | "Q0103" | "Q0104" | "Q0105";

export class QueryError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly failure: Failure
  ) {
    super(message);
    this.name = "QueryError";
  }
}

/**
 * Thrown synchronously by the call that received a malformed argument.
 */
export class QueryArgumentError extends QueryError {
  constructor(
    code: ArgumentErrorCode,
    public readonly received: unknown
  ) {
    const diag = makeDiagnostic(code, { actual: describeValue(received) });
    super(diag.message, code, failure("type-error", diag.message, { diagnostics: [diag] }));
    this.name = "QueryArgumentError";
  }
}

/**
 * Thrown when a draining traversal pulls more than `maxItems` items.
 */
export class QueryBudgetError extends QueryError {
  constructor(
    public readonly limit: number,
    public readonly queryId: string
  ) {
    const diag = makeDiagnostic("Q0300", { limit });
    super(
      diag.message,
      "Q0300",
      failure("budget-exceeded", diag.message, {
        diagnostics: [diag],
        context: { queryId },
      })
    );
    this.name = "QueryBudgetError";
  }
}

export function assertCallable(value: unknown, code: "Q0102" | "Q0103" | "Q0104"): void {
  if (typeof value !== "function") {
    throw new QueryArgumentError(code, value);
  }
}
