// src/core/builtins/definitions.ts
// Definition management and re-expansion builtins

import type { BuiltinMacro } from "../../registry/types";
import { macroBody } from "../../registry/definition";
import { generateDump } from "../../registry/dump";
import { MacroError } from "../../outcome/errors";
import { macroNotFound, malformedDirective, unexpectedArguments } from "../../outcome/constructors";
import { BoundedCursor } from "../text/cursor";
import { isMacroName, isWhitespace } from "../expand/names";

const PARAMETER_SUFFIX = /^([^(]+)\((.*)\)$/;

/**
 * `%define name body` / `%define name() body`. The body is stored as a span
 * of the argument's buffer.
 */
export const define: BuiltinMacro = (expander, _out, args) => {
  for (let ch = args.next(); ch !== undefined; ch = args.next()) {
    if (!isWhitespace(ch)) {
      args.back();
      break;
    }
  }

  const lineStart = args.pos;
  const line = args.readUntilEndOfLine();
  if (line === undefined) {
    throw new MacroError(malformedDirective("define", "Expected 2 arguments"));
  }

  const split = line.search(/\s/);
  const rest = split < 0 ? "" : line.slice(split);
  const body = rest.trim();
  if (body.length === 0) {
    throw new MacroError(malformedDirective("define", "Expected 2 arguments"));
  }

  let name = line.slice(0, split);
  let takesParameter = false;
  const param = PARAMETER_SUFFIX.exec(name);
  if (param) {
    name = param[1];
    takesParameter = true;
  }
  if (!isMacroName(name)) {
    throw new MacroError(malformedDirective("define", `bad macro name '${name}'`));
  }

  const bodyStart = lineStart + split + (rest.length - rest.trimStart().length);
  expander.defineMacro(name, args.range(bodyStart, bodyStart + body.length), takesParameter);
};

export const global: BuiltinMacro = (expander, out, args) => define(expander, out, args);

/**
 * Removes every definition of the name, shadowed ones and builtins included.
 */
export const undefine: BuiltinMacro = (expander, _out, args) => {
  const name = (args.readUntilEndOfLine() ?? "").trim();
  if (!name) {
    throw new MacroError(malformedDirective("undefine", "expected a macro name"));
  }
  expander.undefineMacro(name);
};

export const load: BuiltinMacro = (expander, _out, args) => {
  const filePath = args.collect().trim();
  if (!filePath) {
    throw new MacroError(malformedDirective("load", "expected a file path"));
  }
  expander.loadMacroFromFile(filePath);
};

export const expand: BuiltinMacro = (expander, out, args) => {
  expander.parseMacro(out, args.rest());
};

export const macrobody: BuiltinMacro = (expander, out, args) => {
  const name = args.collect().trim();
  const def = expander.registry.lookup(name);
  if (!def) {
    throw new MacroError(macroNotFound(name));
  }
  out.push(def.tag === "Builtin" ? "<builtin>" : macroBody(def));
};

/**
 * `%{S:n}` -> value of %SOURCE followed by the raw argument.
 */
export const S: BuiltinMacro = (expander, out, args) => {
  expander.parseMacro(out, BoundedCursor.fromString("%SOURCE", args.file));
  out.push(args.collect());
};

export const P: BuiltinMacro = (expander, out, args) => {
  expander.parseMacro(out, BoundedCursor.fromString("%PATCH", args.file));
  out.push(args.collect());
};

export const dump: BuiltinMacro = (expander, _out, args) => {
  const extra = args.collect();
  if (extra.trim().length > 0) {
    expander.report(unexpectedArguments("dump", extra));
  }
  for (const line of generateDump(expander.registry)) {
    expander.ports.stdout.write(line + "\n");
  }
};
