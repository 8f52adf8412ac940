// src/core/object/types.ts
// Minimal object system: shared types and errors

import { describeValue, makeDiagnostic } from "../../outcome/codes";
import { failure, type Failure } from "../../outcome/failure";

/**
 * Member: anything stored in a class's member table (a method or plain data).
 */
export type Member = unknown;

/**
 * Members: a class's member table as supplied at creation.
 */
export type Members = Readonly<Record<string, Member>>;

/**
 * Method: a member invoked with the receiving instance as its first argument.
 */
export type Method = (...args: unknown[]) => unknown;

export function isMethod(value: unknown): value is Method {
  return typeof value === "function";
}

/**
 * Symbol under which an instance records its class.
 */
export const CLASS = Symbol("class");

export type ObjectErrorCode = "O0100" | "O0101" | "O0102";

export class ObjectSystemError extends Error {
  readonly failure: Failure;

  constructor(readonly code: ObjectErrorCode, params: Record<string, string>) {
    const diag = makeDiagnostic(code, params);
    super(diag.message);
    this.name = "ObjectSystemError";
    this.failure = failure("type-error", diag.message, { diagnostics: [diag] });
  }
}

export function notAClass(code: "O0100" | "O0101", value: unknown): ObjectSystemError {
  return new ObjectSystemError(code, { actual: describeValue(value) });
}
