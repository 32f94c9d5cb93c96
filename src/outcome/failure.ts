import type { Diagnostic } from "./diagnostic";
import type { Span } from "../core/text/span";

/** The macro invocation a failure surfaced from. */
export interface Invocation {
  macro: string;
  span: Span;
}

export type FailureReason =
  | "malformed-directive"
  | "macro-not-found"
  | "unbounded-range"
  | "non-text-environment-value"
  | "io-failure"
  | "script-failure"
  | "not-implemented"
  | "recursion-limit"
  | "expression-error"
  | "precondition-failed"
  | "internal-error";

export interface Failure {
  reason: FailureReason;
  message: string;
  context?: Record<string, unknown>;
  diagnostics: Diagnostic[];
  cause?: Failure;
  recoverable: boolean;
  invocation?: Invocation;
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
    recoverable: opts?.recoverable ?? false,
    context: opts?.context,
    cause: opts?.cause,
    invocation: opts?.invocation,
  };
}

export function wrapFailure(
  inner: Failure,
  message: string,
  context?: Record<string, unknown>
): Failure {
  return {
    ...inner,
    message,
    context: { ...inner.context, ...context },
    cause: inner,
  };
}

export function isFailureReason(f: Failure, reason: FailureReason): boolean {
  return f.reason === reason;
}

export function allDiagnostics(f: Failure, seen = new Set<Diagnostic>()): Diagnostic[] {
  const collected: Diagnostic[] = [];
  for (const diag of f.diagnostics) {
    if (!seen.has(diag)) {
      seen.add(diag);
      collected.push(diag);
    }
  }
  if (f.cause) {
    collected.push(...allDiagnostics(f.cause, seen));
  }
  return collected;
}
