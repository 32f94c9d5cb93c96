// src/core/expand/expander.ts
// Expansion driver: scans text, resolves %-invocations and re-enters itself
// for macro bodies and for builtins that expand their arguments.

import { BoundedCursor, StreamingCursor, type TextCursor } from "../text/cursor";
import type { TextBuffer } from "../text/buffer";
import { spanOf, type Span } from "../text/span";
import { MacroRegistry } from "../../registry/registry";
import { literalDefinition, userDefinition } from "../../registry/definition";
import type { MacroDefinition, UserDefinition } from "../../registry/types";
import { DEFAULT_CONFIG, type MacroConfig } from "../config/config";
import { createPortSet, type PortSet } from "../../ports/composite";
import type { LogLevel } from "../../ports/log";
import type { Diagnostic } from "../../outcome/diagnostic";
import type { Outcome } from "../../outcome/outcome";
import { done, ioFailure, macroNotFound, malformedDirective, recursionLimit } from "../../outcome/constructors";
import { MacroError, toFail } from "../../outcome/errors";
import { evaluateExpression } from "../expr";
import { OutputBuffer } from "./output";
import { isWhitespace, readMacroName } from "./names";
import { loadMacros } from "./loader";

/** Where an invocation sits; turned into a Span only when something fails. */
type Site = { buffer: TextBuffer; file: string; start: number; end: number };

function siteSpan(site: Site): Span {
  return spanOf(site.buffer, site.file, site.start, site.end);
}

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

export type MacroExpanderOptions = {
  registry?: MacroRegistry;
  config?: MacroConfig;
  ports?: Partial<PortSet>;
};

const SEVERITY_LEVEL: Record<Diagnostic["severity"], LogLevel> = {
  error: "error",
  warning: "warn",
  info: "info",
};

/**
 * One expansion session: a registry, the ports it talks to, and the
 * recursion depth of the invocation currently running.
 */
export class MacroExpander {
  readonly registry: MacroRegistry;
  readonly config: MacroConfig;
  readonly ports: PortSet;
  /** Toggled by %trace; logs every invocation at debug level */
  tracing = false;
  private depth = 0;

  constructor(options: MacroExpanderOptions = {}) {
    this.registry = options.registry ?? new MacroRegistry();
    this.config = options.config ?? DEFAULT_CONFIG;
    this.ports = createPortSet(options.ports);
  }

  get currentDepth(): number {
    return this.depth;
  }

  // ─────────────────────────────────────────────────────────────────
  // Entry points
  // ─────────────────────────────────────────────────────────────────

  /**
   * Expand everything `cursor` has left into `out`.
   */
  parseMacro(out: OutputBuffer, cursor: TextCursor): void {
    this.scan(out, cursor, false);
  }

  expandCursor(cursor: TextCursor): string {
    const out = new OutputBuffer();
    this.parseMacro(out, cursor);
    return out.toString();
  }

  expandString(text: string, file = "<string>"): string {
    return this.expandCursor(BoundedCursor.fromString(text, file));
  }

  /**
   * Like `expandString`, but failures come back as a `Fail`.
   */
  tryExpand(text: string, file = "<string>"): Outcome<string> {
    const started = Date.now();
    try {
      const value = this.expandString(text, file);
      return done(value, { durationMs: Date.now() - started });
    } catch (e) {
      return toFail(e, { durationMs: Date.now() - started, span: failureSpan(e) });
    }
  }

  // ─────────────────────────────────────────────────────────────────
  // Definitions
  // ─────────────────────────────────────────────────────────────────

  /**
   * Define `name` over the span `body` covers. Nothing is copied.
   */
  defineMacro(name: string, body: BoundedCursor, takesParameter: boolean): void {
    this.registry.define(name, userDefinition(body, takesParameter));
  }

  /**
   * Define `name` over text that lives nowhere else (script hosts, embedders).
   */
  defineLiteral(name: string, text: string, takesParameter = false): void {
    this.registry.define(name, literalDefinition(text, takesParameter));
  }

  undefineMacro(name: string): void {
    this.registry.undefine(name);
  }

  /**
   * Read macro definitions from a macros file. Returns how many were defined.
   */
  loadMacroFromFile(filePath: string): number {
    let cursor: StreamingCursor;
    try {
      cursor = new StreamingCursor(this.ports.fs.openSource(filePath), filePath);
    } catch (e) {
      throw new MacroError(ioFailure(filePath, errorMessage(e)));
    }
    try {
      return loadMacros(this, cursor);
    } catch (e) {
      if (e instanceof MacroError) throw e;
      throw new MacroError(ioFailure(filePath, errorMessage(e)));
    } finally {
      cursor.close();
    }
  }

  // ─────────────────────────────────────────────────────────────────
  // Diagnostics
  // ─────────────────────────────────────────────────────────────────

  log(level: LogLevel, message: string, fields?: Record<string, unknown>): void {
    this.ports.log.log(level, message, fields);
  }

  report(diag: Diagnostic): void {
    this.log(SEVERITY_LEVEL[diag.severity], diag.message, { code: diag.code, ...diag.data });
  }

  // ─────────────────────────────────────────────────────────────────
  // Scanner
  // ─────────────────────────────────────────────────────────────────

  private scan(out: OutputBuffer, cursor: TextCursor, inBody: boolean): void {
    for (let ch = cursor.next(); ch !== undefined; ch = cursor.next()) {
      if (ch === "\\" && inBody && cursor.peek() === "\n") {
        // continuation line inside a stored body
        cursor.next();
        out.push("\n");
        continue;
      }
      if (ch !== "%") {
        out.push(ch);
        continue;
      }

      const start = cursor.pos - 1;
      const next = cursor.peek();
      if (next === "%") {
        cursor.next();
        out.push("%");
      } else if (next === "{") {
        cursor.next();
        this.expandBraced(out, cursor, start);
      } else if (next === "[") {
        cursor.next();
        this.expandBracketed(out, cursor, start);
      } else {
        const name = readMacroName(cursor);
        if (name) {
          this.expandBare(out, cursor, name, start);
        } else {
          out.push("%");
        }
      }
    }
  }

  /**
   * `%name`. Line-taking builtins get the rest of the line (newline
   * consumed); other builtins written `%name:arg` get the text up to the
   * next whitespace; parameterized user macros get the rest of the line as
   * arguments (newline kept); anything else gets no argument.
   */
  private expandBare(out: OutputBuffer, cursor: TextCursor, name: string, start: number): void {
    const site: Site = { buffer: cursor.buffer, file: cursor.file, start, end: cursor.pos };
    const def = this.registry.lookup(name);
    if (!def) {
      this.undefinedMacro(out, name, site);
      return;
    }

    const argStart = cursor.pos;
    let args: BoundedCursor;
    if (def.tag === "Builtin" && def.takesLine) {
      const line = cursor.readUntilEndOfLine() ?? "";
      args = cursor.range(argStart, argStart + line.length);
    } else if (def.tag === "Builtin" && cursor.peek() === ":") {
      cursor.next();
      for (let ch = cursor.peek(); ch !== undefined && !isWhitespace(ch); ch = cursor.peek()) {
        cursor.next();
      }
      args = cursor.range(argStart + 1, cursor.pos);
    } else if (def.tag === "UserDefined" && def.takesParameter) {
      for (let ch = cursor.peek(); ch !== undefined && ch !== "\n"; ch = cursor.peek()) {
        cursor.next();
      }
      args = cursor.range(argStart, cursor.pos);
    } else {
      args = cursor.range(argStart, argStart);
    }

    this.invoke(out, name, def, args, site);
  }

  /**
   * `%{name}`, `%{name:arg}`, `%{?name}`, `%{!?name}`, `%{?name:text}`,
   * `%{!?name:text}`.
   */
  private expandBraced(out: OutputBuffer, cursor: TextCursor, start: number): void {
    const contentStart = cursor.pos;
    const close = findClose(cursor, "{", "}");
    const site: Site = { buffer: cursor.buffer, file: cursor.file, start, end: cursor.pos };
    if (close === undefined) {
      throw new MacroError(malformedDirective("{", "unterminated %{", siteSpan(site)));
    }

    const body = cursor.range(contentStart, close);
    let negate = false;
    let conditional = false;
    for (let ch = body.peek(); ch === "!" || ch === "?"; ch = body.peek()) {
      if (ch === "!") negate = true;
      else conditional = true;
      body.next();
    }

    const name = readMacroName(body);
    if (!name) {
      throw new MacroError(malformedDirective("{", `bad macro name in %{${body.buffer.slice(contentStart, close)}}`, siteSpan(site)));
    }

    const sep = body.next();
    if (sep !== undefined && sep !== ":") {
      throw new MacroError(malformedDirective(name, `unexpected '${sep}' after macro name`, siteSpan(site)));
    }
    const hasArg = sep === ":";
    const args = body.rest();

    const def = this.registry.lookup(name);
    if (conditional) {
      if ((def !== undefined) === negate) return;
      if (hasArg) {
        this.scan(out, args, false);
      } else if (def) {
        this.invoke(out, name, def, args, site);
      }
      return;
    }
    if (negate) {
      throw new MacroError(malformedDirective(name, "'!' needs '?'", siteSpan(site)));
    }
    if (!def) {
      this.undefinedMacro(out, name, site);
      return;
    }
    this.invoke(out, name, def, args, site);
  }

  /** `%[expr]` */
  private expandBracketed(out: OutputBuffer, cursor: TextCursor, start: number): void {
    const contentStart = cursor.pos;
    const close = findClose(cursor, "[", "]");
    if (close === undefined) {
      const site: Site = { buffer: cursor.buffer, file: cursor.file, start, end: cursor.pos };
      throw new MacroError(malformedDirective("[", "unterminated %[", siteSpan(site)));
    }
    const text = this.expandCursor(cursor.range(contentStart, close));
    out.push(evaluateExpression(text));
  }

  private undefinedMacro(out: OutputBuffer, name: string, site: Site): void {
    if (this.config.expansion.undefinedMacros === "keep") {
      out.push(site.buffer.slice(site.start, site.end));
      return;
    }
    throw new MacroError(macroNotFound(name, siteSpan(site)));
  }

  // ─────────────────────────────────────────────────────────────────
  // Invocation
  // ─────────────────────────────────────────────────────────────────

  private invoke(out: OutputBuffer, name: string, def: MacroDefinition, args: BoundedCursor, site: Site): void {
    const limit = this.config.expansion.maxDepth;
    if (this.depth >= limit) {
      throw withInvocation(new MacroError(recursionLimit(name, limit, siteSpan(site))), name, site);
    }

    this.depth++;
    if (this.tracing) {
      this.log("debug", `%${name}`, { depth: this.depth, file: site.file });
    }
    try {
      if (def.tag === "Builtin") {
        def.fn(this, out, args);
      } else {
        this.expandUser(out, name, def, args);
      }
    } catch (e) {
      throw withInvocation(e, name, site);
    } finally {
      this.depth--;
    }
  }

  private expandUser(out: OutputBuffer, name: string, def: UserDefinition, args: BoundedCursor): void {
    const bound = def.takesParameter ? this.bindParameters(name, args) : [];
    try {
      const body = new BoundedCursor(def.buffer, def.offset, def.offset + def.length, def.sourceFile);
      this.scan(out, body, true);
    } finally {
      for (const param of bound) this.registry.pop(param);
    }
  }

  /**
   * Push %0, %1..%n, %* and %# for one call. Arguments are expanded in the
   * caller's scope first. Returns the names to pop.
   */
  private bindParameters(name: string, args: BoundedCursor): string[] {
    const words = this.expandCursor(args).split(/\s+/).filter((w) => w.length > 0);
    const values: Array<[string, string]> = [
      ["0", name],
      ["*", words.join(" ")],
      ["#", String(words.length)],
      ...words.map((w, i): [string, string] => [String(i + 1), w]),
    ];
    for (const [param, value] of values) {
      this.registry.define(param, literalDefinition(value));
    }
    return values.map(([param]) => param);
  }
}

/**
 * Consume through the delimiter closing an already-consumed `open`.
 * Returns the offset of the closing delimiter.
 */
function findClose(cursor: TextCursor, open: string, close: string): number | undefined {
  let depth = 1;
  for (let ch = cursor.next(); ch !== undefined; ch = cursor.next()) {
    if (ch === open) depth++;
    else if (ch === close && --depth === 0) return cursor.pos - 1;
  }
  return undefined;
}

/**
 * Record the innermost invocation a failure came from; outer frames leave it.
 */
function withInvocation(e: unknown, name: string, site: Site): unknown {
  if (!(e instanceof MacroError) || e.failure.invocation) return e;
  const span = siteSpan(site);
  return new MacroError({
    ...e.failure,
    invocation: { macro: name, span },
    diagnostics: e.failure.diagnostics.map((d) => (d.span ? d : { ...d, span })),
  });
}

function failureSpan(e: unknown): Span | undefined {
  return e instanceof MacroError ? e.failure.invocation?.span : undefined;
}

/**
 * Expand `text` in a fresh session.
 */
export function expandText(
  text: string,
  options: MacroExpanderOptions & { file?: string } = {}
): Outcome<string> {
  return new MacroExpander(options).tryExpand(text, options.file);
}
