import type { Failure } from "./failure";
import type { Fail, OutcomeMeta } from "./outcome";
import { failure } from "./failure";
import { fail } from "./constructors";
import { formatSpan } from "../core/text/span";

/**
 * Thrown inside the engine; `expandText` turns it back into a `Fail`.
 */
export class MacroError extends Error {
  readonly failure: Failure;

  constructor(f: Failure) {
    super(f.message);
    this.name = "MacroError";
    this.failure = f;
  }

  get reason(): Failure["reason"] {
    return this.failure.reason;
  }
}

export function isMacroError(e: unknown): e is MacroError {
  return e instanceof MacroError;
}

/**
 * Convert anything thrown during expansion into a `Fail`.
 */
export function toFail(e: unknown, meta: OutcomeMeta = {}): Fail {
  if (e instanceof MacroError) {
    return fail(e.failure, meta);
  }
  const message = e instanceof Error ? e.message : String(e);
  return fail(failure("internal-error", message), meta);
}

/**
 * `file:line:col: %name: message` when the invocation is known.
 */
export function formatFailure(f: Failure): string {
  if (!f.invocation) return f.message;
  return `${formatSpan(f.invocation.span)}: %${f.invocation.macro}: ${f.message}`;
}
