// test/core/expand/expander.spec.ts
// Expansion driver: invocation forms, conditionals, errors, limits

import { describe, it, expect } from "vitest";
import { makeHarness } from "../../helpers/harness";
import { MacroExpander, expandText } from "../../../src/core/expand/expander";
import { OutputBuffer } from "../../../src/core/expand/output";
import { StreamingCursor } from "../../../src/core/text/cursor";
import { stringSource } from "../../../src/core/text/source";
import { mergeConfigs } from "../../../src/core/config/config";
import { isDone, isFail, type Outcome } from "../../../src/outcome/outcome";
import type { Failure } from "../../../src/outcome/failure";
import { formatFailure } from "../../../src/outcome/errors";
import { memoryLogPort } from "../../../src/ports/log";

function failureOf(o: Outcome<string>): Failure {
  if (!isFail(o)) throw new Error(`expected a failure, got ${JSON.stringify(o.value)}`);
  return o.failure;
}

describe("plain text", () => {
  const { expander } = makeHarness();

  it("passes through unchanged", () => {
    expect(expander.expandString("no macros here\n")).toBe("no macros here\n");
  });

  it("turns %% into %", () => {
    expect(expander.expandString("100%%")).toBe("100%");
  });

  it("keeps a % that starts no name", () => {
    expect(expander.expandString("50%")).toBe("50%");
    expect(expander.expandString("% x")).toBe("% x");
  });

  it("leaves backslash-newline alone outside macro bodies", () => {
    expect(expander.expandString("a\\\nb")).toBe("a\\\nb");
  });
});

describe("invocation forms", () => {
  it("expands bare and braced names", () => {
    const { expander } = makeHarness();
    expect(expander.expandString("%define v 1\n%v-%{v}")).toBe("1-1");
  });

  it("passes braced arguments to builtins", () => {
    const { expander } = makeHarness();
    expect(expander.expandString("%{upper:abc}")).toBe("ABC");
    expect(expander.expandString("%{quote:a b}")).toBe('"a b"');
  });

  it("takes a colon argument on a bare builtin up to the next whitespace", () => {
    const { expander } = makeHarness();
    expect(expander.tryExpand("%getenv:UNSET_VAR")).toMatchObject({ tag: "Done", value: "" });
    expect(expander.expandString("%upper:abc def")).toBe("ABC def");
    expect(expander.expandString("%basename:/a/b.c\nnext")).toBe("b.c\nnext");
  });

  it("matches nested braces", () => {
    const { expander } = makeHarness();
    expect(expander.expandString("%define a x\n%{expand:{%{a}}}")).toBe("{x}");
  });

  it("rejects an unterminated brace", () => {
    const { expander } = makeHarness();
    const f = failureOf(expander.tryExpand("%{upper:abc"));
    expect(f.reason).toBe("malformed-directive");
    expect(f.message).toBe("%{: unterminated %{");
  });

  it("rejects junk after a braced name", () => {
    const { expander } = makeHarness();
    const f = failureOf(expander.tryExpand("%{upper abc}"));
    expect(f.message).toBe("%upper: unexpected ' ' after macro name");
  });
});

describe("conditionals", () => {
  const { expander } = makeHarness();
  expander.expandString("%define x 1\n");

  it("%{?name} expands only defined names", () => {
    expect(expander.expandString("[%{?x}][%{?y}]")).toBe("[1][]");
  });

  it("%{?name:text} and %{!?name:text} pick the text", () => {
    expect(expander.expandString("%{?x:yes}|%{?y:yes}|%{!?x:no}|%{!?y:no}")).toBe("yes|||no");
  });

  it("expands the chosen text", () => {
    expect(expander.expandString("%{?x:<%x>}")).toBe("<1>");
  });

  it("%{!?name} without text expands to nothing", () => {
    expect(expander.expandString("[%{!?y}]")).toBe("[]");
  });

  it("'!' needs '?'", () => {
    expect(failureOf(expander.tryExpand("%{!x}")).message).toBe("%x: '!' needs '?'");
  });
});

describe("expressions", () => {
  it("evaluates %[...] after expanding it", () => {
    const { expander } = makeHarness();
    expect(expander.expandString("%define n 4\n%[%n * 2 + 7 % 3]")).toBe("9");
  });

  it("evaluates %{expr:...}", () => {
    const { expander } = makeHarness();
    expect(expander.expandString('%{expr:"a" + "b"}')).toBe("ab");
  });

  it("reports bad expressions", () => {
    const { expander } = makeHarness();
    expect(failureOf(expander.tryExpand("%[1 +]")).reason).toBe("expression-error");
    expect(failureOf(expander.tryExpand("%[1")).message).toBe("%[: unterminated %[");
  });
});

describe("undefined macros", () => {
  it("fail by default with the invocation's span", () => {
    const { expander } = makeHarness();
    const f = failureOf(expander.tryExpand("ok\n  %nothing", "pkg.spec"));
    expect(f.reason).toBe("macro-not-found");
    expect(f.diagnostics[0]?.span).toMatchObject({ file: "pkg.spec", startLine: 2, startCol: 3 });
  });

  it("stay verbatim under the keep policy", () => {
    const { expander } = makeHarness({ config: mergeConfigs({ expansion: { undefinedMacros: "keep" } }) });
    expect(expander.expandString("a %nothing %{nothing} b")).toBe("a %nothing %{nothing} b");
  });
});

describe("macro bodies", () => {
  it("turn backslash-newline into a newline", () => {
    const { expander } = makeHarness();
    expect(expander.expandString("%{expand:%%}")).toBe("%");
    expander.defineLiteral("two", "one\\\ntwo");
    expect(expander.expandString("%two")).toBe("one\ntwo");
  });

  it("are expanded lazily at each call", () => {
    const { expander } = makeHarness();
    expander.defineLiteral("greet", "hi %who");
    expander.defineLiteral("who", "ann");
    expect(expander.expandString("%greet")).toBe("hi ann");
    expander.defineLiteral("who", "bob");
    expect(expander.expandString("%greet")).toBe("hi bob");
  });
});

describe("recursion limit", () => {
  it("stops runaway self-reference", () => {
    const { expander } = makeHarness({ config: mergeConfigs({ expansion: { maxDepth: 8 } }) });
    const f = failureOf(expander.tryExpand("%define loop %loop\n%loop"));
    expect(f.reason).toBe("recursion-limit");
    expect(f.message).toBe("Recursion limit of 8 exceeded expanding %loop");
    expect(f.invocation?.macro).toBe("loop");
    expect(expander.currentDepth).toBe(0);
  });

  it("allows nesting up to the limit", () => {
    const { expander } = makeHarness({ config: mergeConfigs({ expansion: { maxDepth: 3 } }) });
    expander.defineLiteral("a", "%b");
    expander.defineLiteral("b", "%c");
    expander.defineLiteral("c", "deep");
    expect(expander.expandString("%a")).toBe("deep");
    expander.defineLiteral("c", "%d");
    expander.defineLiteral("d", "deeper");
    expect(failureOf(expander.tryExpand("%a")).reason).toBe("recursion-limit");
  });
});

describe("failure reporting", () => {
  it("names the innermost invocation", () => {
    const { expander } = makeHarness();
    const f = failureOf(expander.tryExpand("%define outer x%{P:1}\nx %outer"));
    expect(f.invocation?.macro).toBe("P");
    expect(formatFailure(f)).toBe("<string>:1:16: %P: Macro not found: %PATCH");
  });

  it("puts the invocation span on the Fail", () => {
    const { expander } = makeHarness();
    const outcome = expander.tryExpand("%{getenv:X}%{sub:abc x}");
    expect(isFail(outcome)).toBe(true);
    expect(outcome.meta.span).toMatchObject({ startLine: 1, startCol: 12 });
    expect(outcome.meta.durationMs).toBeGreaterThanOrEqual(0);
  });
});

describe("streaming input", () => {
  it("expands text that arrives in chunks", () => {
    const { expander } = makeHarness();
    const out = new OutputBuffer();
    const cursor = new StreamingCursor(stringSource(["%def", "ine x y\n%", "x"]), "stream");
    expander.parseMacro(out, cursor);
    expect(out.toString()).toBe("y");
  });

  it("leaves an unfinished stream closable after a failure", () => {
    const { expander } = makeHarness();
    let closes = 0;
    const inner = stringSource(["ok %nope", " tail", " more"]);
    const cursor = new StreamingCursor({ pull: () => inner.pull(), close: () => closes++ }, "stream");
    try {
      expect(() => expander.expandCursor(cursor)).toThrow("Macro not found: %nope");
    } finally {
      cursor.close();
    }
    expect(cursor.exhausted).toBe(true);
    expect(closes).toBe(1);
  });
});

describe("expandText", () => {
  it("returns Done for clean input", () => {
    const log = memoryLogPort();
    const outcome = expandText("%{lower:ABC}", { ports: { log } });
    expect(isDone(outcome) && outcome.value).toBe("abc");
  });

  it("returns Fail instead of throwing", () => {
    const outcome = expandText("%missing", { file: "x.spec", ports: { log: memoryLogPort() } });
    expect(failureOf(outcome).diagnostics[0]?.span?.file).toBe("x.spec");
  });

  it("uses a fresh registry each time", () => {
    const first = new MacroExpander({ ports: { log: memoryLogPort() } });
    first.expandString("%define only_here 1\n");
    const second = new MacroExpander({ ports: { log: memoryLogPort() } });
    expect(second.registry.has("only_here")).toBe(false);
  });
});
