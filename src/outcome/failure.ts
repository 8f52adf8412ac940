import type { Diagnostic } from "./diagnostic";

export type FailureReason =
  | "budget-exceeded"
  | "validation-failed"
  | "type-error"
  | "not-found"
  | "internal-error";

export interface Failure {
  reason: FailureReason;
  message: string;
  context?: Record<string, unknown>;
  diagnostics: Diagnostic[];
}

export function failure(
  reason: FailureReason,
  message: string,
  opts?: Partial<Omit<Failure, "reason" | "message">>
): Failure {
  return {
    reason,
    message,
    diagnostics: opts?.diagnostics ?? [],
    context: opts?.context,
  };
}

/**
 * An error that carries a structured Failure (every error class this library throws).
 */
export interface FailureCarrier extends Error {
  readonly code: string;
  readonly failure: Failure;
}

export function isFailure(value: unknown): value is Failure {
  if (typeof value !== "object" || value === null) return false;
  return (
    "reason" in value &&
    typeof value.reason === "string" &&
    "message" in value &&
    typeof value.message === "string" &&
    "diagnostics" in value &&
    Array.isArray(value.diagnostics)
  );
}

export function isFailureCarrier(value: unknown): value is FailureCarrier {
  return (
    value instanceof Error &&
    "code" in value &&
    typeof value.code === "string" &&
    "failure" in value &&
    isFailure(value.failure)
  );
}
