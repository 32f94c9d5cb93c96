import type { Done, Fail, OutcomeMeta } from "./outcome";
import type { Failure, FailureReason } from "./failure";
import type { Span } from "../core/text/span";
import { failure } from "./failure";
import { makeDiagnostic } from "./codes";
import { warnDiag, type Diagnostic } from "./diagnostic";

export function done<A>(value: A, meta: OutcomeMeta = {}): Done<A> {
  return { tag: "Done", value, meta };
}

export const ok = done;

export function fail(f: Failure, meta: OutcomeMeta = {}): Fail {
  return { tag: "Fail", failure: f, meta };
}

export function err(reason: FailureReason, message: string, meta: OutcomeMeta = {}): Fail {
  return fail(failure(reason, message), meta);
}

// ─────────────────────────────────────────────────────────────────
// Macro failures
// ─────────────────────────────────────────────────────────────────

export function malformedDirective(macro: string, detail: string, span?: Span): Failure {
  return failure("malformed-directive", `%${macro}: ${detail}`, {
    diagnostics: [makeDiagnostic("M0001", { macro, detail }, span)],
    context: { macro },
    recoverable: true,
  });
}

export function macroNotFound(name: string, span?: Span): Failure {
  return failure("macro-not-found", `Macro not found: %${name}`, {
    diagnostics: [makeDiagnostic("M0002", { name }, span)],
    context: { macro: name },
    recoverable: true,
  });
}

export function unboundedRange(start: number, stop: number, origin: number, end: number): Failure {
  return failure("unbounded-range", `Cannot take range ${start}..${stop} of view ${origin}..${end}`, {
    diagnostics: [makeDiagnostic("M0003", { start, stop, origin, end })],
    context: { start, stop, origin, end },
  });
}

export function nonTextEnvironmentValue(macro: string, name: string): Failure {
  return failure("non-text-environment-value", `%{${macro}} failed: environment variable ${name} is not valid text`, {
    diagnostics: [makeDiagnostic("M0004", { name })],
    context: { macro, variable: name },
  });
}

export function ioFailure(path: string, detail: string): Failure {
  return failure("io-failure", `Cannot read ${path}: ${detail}`, {
    diagnostics: [makeDiagnostic("M0005", { path, detail })],
    context: { path },
  });
}

export function scriptFailure(detail: string, cause?: Failure): Failure {
  return failure("script-failure", `Script failed: ${detail}`, {
    diagnostics: [makeDiagnostic("M0006", { detail })],
    cause,
  });
}

export function notImplemented(macro: string): Failure {
  return failure("not-implemented", `%${macro} is not implemented`, {
    diagnostics: [makeDiagnostic("M0007", { macro })],
    context: { macro },
  });
}

export function recursionLimit(name: string, limit: number, span?: Span): Failure {
  return failure("recursion-limit", `Recursion limit of ${limit} exceeded expanding %${name}`, {
    diagnostics: [makeDiagnostic("M0008", { name, limit }, span)],
    context: { macro: name, limit },
  });
}

export function expressionError(detail: string): Failure {
  return failure("expression-error", `Bad expression: ${detail}`, {
    diagnostics: [makeDiagnostic("M0009", { detail })],
    recoverable: true,
  });
}

export function cursorMisuse(detail: string): Failure {
  return failure("precondition-failed", `Cursor misuse: ${detail}`, {
    diagnostics: [makeDiagnostic("M0010", { detail })],
  });
}

export function unexpectedArguments(macro: string, args: string): Diagnostic {
  return warnDiag("W0001", `Unexpected arguments to %${macro}: ${args}`, { data: { macro, args } });
}
