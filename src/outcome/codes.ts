import type { Diagnostic, DiagnosticSeverity } from "./diagnostic";

interface DiagCodeDef {
  code: string;
  severity: DiagnosticSeverity;
  category: string;
  template: string;
}

export const DIAGNOSTIC_CODES = {
  O0100: { code: "O0100", severity: "error", category: "Object", template: "Expected class, got {actual}" },
  O0101: { code: "O0101", severity: "error", category: "Object", template: "Parent class must be a class, got {actual}" },
  O0102: { code: "O0102", severity: "error", category: "Object", template: "Class {class} has no callable member: {member}" },

  Q0100: { code: "Q0100", severity: "error", category: "Source", template: "Expected sequence, got {actual}" },
  Q0101: { code: "Q0101", severity: "error", category: "Source", template: "Expected mapping, got {actual}" },
  Q0102: { code: "Q0102", severity: "error", category: "Source", template: "Expected producer function, got {actual}" },
  Q0103: { code: "Q0103", severity: "error", category: "Operator", template: "Expected predicate function, got {actual}" },
  Q0104: { code: "Q0104", severity: "error", category: "Operator", template: "Expected selector function, got {actual}" },
  Q0105: { code: "Q0105", severity: "error", category: "Source", template: "Producer factory returned {actual}, expected an iterator, iterable or pull function" },

  Q0300: { code: "Q0300", severity: "error", category: "Budget", template: "Item limit exceeded: {limit}" },

  C0100: { code: "C0100", severity: "error", category: "Config", template: "Config file not found: {path}" },
  C0101: { code: "C0101", severity: "error", category: "Config", template: "Unsupported config file format: {ext}" },
  C0102: { code: "C0102", severity: "error", category: "Config", template: "Invalid configuration: {errors}" },

  W0001: { code: "W0001", severity: "warning", category: "Materialize", template: "Skipped item that is not a key/value pair" },
  W0002: { code: "W0002", severity: "warning", category: "Materialize", template: "Skipped key that cannot index a record: {type}" },
} as const satisfies Record<string, DiagCodeDef>;

export type DiagnosticCode = keyof typeof DIAGNOSTIC_CODES;

export function makeDiagnostic(
  code: DiagnosticCode,
  params?: Record<string, string | number>
): Diagnostic {
  const def: DiagCodeDef = DIAGNOSTIC_CODES[code];

  let message = def.template;
  if (params) {
    for (const [key, value] of Object.entries(params)) {
      message = message.replace(`{${key}}`, String(value));
    }
  }

  return {
    code: def.code,
    severity: def.severity,
    message,
    data: params,
  };
}

/**
 * Short description of a runtime value for diagnostics ("array", "null", "number", ...).
 */
export function describeValue(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  if (value instanceof Map) return "map";
  return typeof value;
}
