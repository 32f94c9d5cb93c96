import type { Span } from "../core/text/span";

export type DiagnosticSeverity = "error" | "warning" | "info";

export interface Diagnostic {
  code: string;
  severity: DiagnosticSeverity;
  message: string;
  span?: Span;
  data?: Record<string, unknown>;
}

type DiagnosticOpts = Partial<Omit<Diagnostic, "code" | "message" | "severity">>;

export function errorDiag(code: string, message: string, opts?: DiagnosticOpts): Diagnostic {
  return { code, message, severity: "error", ...opts };
}

export function warnDiag(code: string, message: string, opts?: DiagnosticOpts): Diagnostic {
  return { code, message, severity: "warning", ...opts };
}
