import { describe, it, expect } from "vitest";
import type { Span } from "../../src/core/text/span";
import { isDone, isFail, type Outcome } from "../../src/outcome/outcome";
import { allDiagnostics, failure, isFailureReason, wrapFailure } from "../../src/outcome/failure";
import { errorDiag, warnDiag } from "../../src/outcome/diagnostic";
import { DIAGNOSTIC_CODES, makeDiagnostic } from "../../src/outcome/codes";
import {
  done,
  err,
  expressionError,
  fail,
  ioFailure,
  macroNotFound,
  malformedDirective,
  nonTextEnvironmentValue,
  notImplemented,
  ok,
  recursionLimit,
  unexpectedArguments,
} from "../../src/outcome/constructors";
import { mapOutcome, match, unwrap, unwrapOr } from "../../src/outcome/matchers";
import { MacroError, formatFailure, isMacroError, toFail } from "../../src/outcome/errors";

const sampleSpan: Span = {
  file: "test.spec",
  startLine: 3,
  startCol: 5,
  endLine: 3,
  endCol: 12,
};

describe("Outcome ADT", () => {
  it("constructs Done outcomes with metadata", () => {
    const meta = { span: sampleSpan, durationMs: 12 };
    const outcome = done("value", meta);
    expect(outcome.tag).toBe("Done");
    expect(outcome.value).toBe("value");
    expect(outcome.meta).toEqual(meta);
    expect(ok(1)).toEqual({ tag: "Done", value: 1, meta: {} });
  });

  it("constructs Fail outcomes with failures", () => {
    const diag = errorDiag("M0001", "err");
    const failureObj = failure("malformed-directive", "bad", {
      diagnostics: [diag],
      recoverable: true,
    });
    const outcome = fail(failureObj, { durationMs: 5 });
    expect(outcome.tag).toBe("Fail");
    expect(outcome.failure).toBe(failureObj);
    expect(outcome.failure.diagnostics).toEqual([diag]);
    expect(outcome.meta.durationMs).toBe(5);
  });

  it("err builds a bare failure", () => {
    const outcome = err("io-failure", "disk gone");
    expect(outcome.failure).toMatchObject({ reason: "io-failure", message: "disk gone", recoverable: false, diagnostics: [] });
  });

  it("distinguishes outcomes with guards", () => {
    expect(isDone(done(1))).toBe(true);
    expect(isFail(done(1))).toBe(false);
    expect(isFail(err("internal-error", "x"))).toBe(true);
  });
});

describe("matchers", () => {
  it("match dispatches on the tag", () => {
    const render = (o: Outcome<number>) =>
      match(o, { done: (d) => `ok ${d.value}`, fail: (f) => `fail ${f.failure.reason}` });
    expect(render(done(2))).toBe("ok 2");
    expect(render(err("not-implemented", "x"))).toBe("fail not-implemented");
  });

  it("mapOutcome maps values and keeps failures", () => {
    expect(mapOutcome(done(2), (n) => n * 3)).toEqual(done(6));
    const failed = err("internal-error", "x");
    expect(mapOutcome<number, number>(failed, (n) => n * 3)).toBe(failed);
  });

  it("unwrap returns the value or throws the message", () => {
    expect(unwrap(done("v"))).toBe("v");
    expect(() => unwrap(err("internal-error", "nope"))).toThrow("nope");
    expect(unwrapOr(err("internal-error", "nope"), "fallback")).toBe("fallback");
  });
});

describe("failures", () => {
  it("wrapFailure keeps the inner failure as cause", () => {
    const inner = failure("io-failure", "inner", { diagnostics: [errorDiag("M0005", "inner")], context: { path: "a" } });
    const outer = wrapFailure(inner, "outer", { step: 2 });
    expect(outer.message).toBe("outer");
    expect(outer.cause).toBe(inner);
    expect(outer.context).toEqual({ path: "a", step: 2 });
    expect(isFailureReason(outer, "io-failure")).toBe(true);
  });

  it("allDiagnostics collects through causes without duplicates", () => {
    const shared = errorDiag("M0005", "shared");
    const extra = warnDiag("W0001", "extra");
    const inner = failure("io-failure", "inner", { diagnostics: [shared] });
    const outer = failure("script-failure", "outer", { diagnostics: [shared, extra], cause: inner });
    expect(allDiagnostics(outer)).toEqual([shared, extra]);
  });
});

describe("diagnostic codes", () => {
  it("fills templates from params", () => {
    const diag = makeDiagnostic("M0002", { name: "foo" }, sampleSpan);
    expect(diag).toEqual({
      code: "M0002",
      severity: "error",
      message: "Macro not found: %foo",
      span: sampleSpan,
      data: { name: "foo" },
    });
  });

  it("keys every entry by its own code", () => {
    for (const [key, def] of Object.entries(DIAGNOSTIC_CODES)) {
      expect(def.code).toBe(key);
    }
  });
});

describe("macro failure constructors", () => {
  it.each([
    [malformedDirective("define", "Expected 2 arguments"), "malformed-directive", "%define: Expected 2 arguments", "M0001"],
    [macroNotFound("foo"), "macro-not-found", "Macro not found: %foo", "M0002"],
    [nonTextEnvironmentValue("getenv:X", "X"), "non-text-environment-value", "%{getenv:X} failed: environment variable X is not valid text", "M0004"],
    [ioFailure("/a", "ENOENT"), "io-failure", "Cannot read /a: ENOENT", "M0005"],
    [notImplemented("gsub"), "not-implemented", "%gsub is not implemented", "M0007"],
    [recursionLimit("loop", 8), "recursion-limit", "Recursion limit of 8 exceeded expanding %loop", "M0008"],
    [expressionError("trailing tokens"), "expression-error", "Bad expression: trailing tokens", "M0009"],
  ])("%# builds %s", (f, reason, message, code) => {
    expect(f.reason).toBe(reason);
    expect(f.message).toBe(message);
    expect(f.diagnostics.map((d) => d.code)).toEqual([code]);
  });

  it("unexpectedArguments is a warning", () => {
    expect(unexpectedArguments("dump", "x")).toEqual({
      code: "W0001",
      severity: "warning",
      message: "Unexpected arguments to %dump: x",
      data: { macro: "dump", args: "x" },
    });
  });
});

describe("MacroError", () => {
  it("carries its failure", () => {
    const e = new MacroError(macroNotFound("foo"));
    expect(e).toBeInstanceOf(Error);
    expect(e.name).toBe("MacroError");
    expect(e.message).toBe("Macro not found: %foo");
    expect(e.reason).toBe("macro-not-found");
    expect(isMacroError(e)).toBe(true);
    expect(isMacroError(new Error("x"))).toBe(false);
  });

  it("toFail keeps macro failures and wraps everything else", () => {
    const f = macroNotFound("foo");
    expect(toFail(new MacroError(f)).failure).toBe(f);
    expect(toFail(new TypeError("bad")).failure).toMatchObject({ reason: "internal-error", message: "bad" });
    expect(toFail("plain").failure.message).toBe("plain");
  });

  it("formatFailure prefixes the invocation location", () => {
    const f = macroNotFound("PATCH");
    expect(formatFailure(f)).toBe("Macro not found: %PATCH");
    expect(formatFailure({ ...f, invocation: { macro: "P", span: sampleSpan } })).toBe(
      "test.spec:3:5: %P: Macro not found: %PATCH"
    );
  });
});
