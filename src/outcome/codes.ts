import type { Span } from "../core/text/span";
import type { Diagnostic, DiagnosticSeverity } from "./diagnostic";

interface DiagCodeDef {
  code: string;
  severity: DiagnosticSeverity;
  category: string;
  template: string;
}

export const DIAGNOSTIC_CODES = {
  M0001: { code: "M0001", severity: "error", category: "Directive", template: "%{macro}: {detail}" },
  M0002: { code: "M0002", severity: "error", category: "Lookup", template: "Macro not found: %{name}" },
  M0003: { code: "M0003", severity: "error", category: "Cursor", template: "Cannot take range {start}..{stop} of view {origin}..{end}" },
  M0004: { code: "M0004", severity: "error", category: "Environment", template: "Environment variable {name} is not valid text" },
  M0005: { code: "M0005", severity: "error", category: "IO", template: "Cannot read {path}: {detail}" },
  M0006: { code: "M0006", severity: "error", category: "Script", template: "Script failed: {detail}" },
  M0007: { code: "M0007", severity: "error", category: "Builtin", template: "%{macro} is not implemented" },
  M0008: { code: "M0008", severity: "error", category: "Recursion", template: "Recursion limit of {limit} exceeded expanding %{name}" },
  M0009: { code: "M0009", severity: "error", category: "Expression", template: "Bad expression: {detail}" },
  M0010: { code: "M0010", severity: "error", category: "Cursor", template: "Cursor misuse: {detail}" },

  W0001: { code: "W0001", severity: "warning", category: "Arguments", template: "Unexpected arguments to %{macro}: {args}" },
} satisfies Record<string, DiagCodeDef>;

export type DiagnosticCode = keyof typeof DIAGNOSTIC_CODES;

export function makeDiagnostic(
  code: DiagnosticCode,
  params?: Record<string, string | number>,
  span?: Span
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
    span,
    data: params,
  };
}
