// src/core/builtins/strings.ts
// Text transforms over the collected argument

import type { BuiltinMacro } from "../../registry/types";
import { MacroError } from "../../outcome/errors";
import { malformedDirective } from "../../outcome/constructors";
import { isWhitespace } from "../expand/names";

export const quote: BuiltinMacro = (_e, out, args) => {
  out.push(`"${args.collect()}"`);
};

/** Counts code points, not UTF-16 units. */
export const len: BuiltinMacro = (_e, out, args) => {
  out.push(String(args.collectChars().length));
};

// ASCII only: other letters pass through unchanged
export const lower: BuiltinMacro = (_e, out, args) => {
  out.push(args.collect().replace(/[A-Z]/g, (c) => c.toLowerCase()));
};

export const upper: BuiltinMacro = (_e, out, args) => {
  out.push(args.collect().replace(/[a-z]/g, (c) => c.toUpperCase()));
};

export const reverse: BuiltinMacro = (_e, out, args) => {
  out.push(args.collectChars().reverse().join(""));
};

export const shescape: BuiltinMacro = (_e, out, args) => {
  let quoted = "'";
  for (const ch of args) {
    quoted += ch === "'" ? "'\\''" : ch;
  }
  out.push(quoted + "'");
};

export const shrink: BuiltinMacro = (_e, out, args) => {
  let text = "";
  let space = false;
  for (const ch of args) {
    if (isWhitespace(ch)) {
      space = text.length > 0;
      continue;
    }
    if (space) {
      text += " ";
      space = false;
    }
    text += ch;
  }
  out.push(text);
};

function parseIndex(macro: string, word: string | undefined, fallback: number): number {
  if (word === undefined) return fallback;
  if (!/^-?\d+$/.test(word)) {
    throw new MacroError(malformedDirective(macro, `expected an integer, got '${word}'`));
  }
  return parseInt(word, 10);
}

function words(text: string): string[] {
  return text.split(/\s+/).filter((w) => w.length > 0);
}

/**
 * `%{sub:str i j}`: 1-based inclusive substring by code point; negative
 * indices count from the end.
 */
export const sub: BuiltinMacro = (_e, out, args) => {
  const [str, i, j] = words(args.collect());
  if (str === undefined) {
    throw new MacroError(malformedDirective("sub", "expected a string"));
  }
  const chars = Array.from(str);
  const n = chars.length;
  let from = parseIndex("sub", i, 1);
  let to = parseIndex("sub", j, -1);
  if (from < 0) from = Math.max(n + from + 1, 1);
  else if (from === 0) from = 1;
  if (to < 0) to = n + to + 1;
  else if (to > n) to = n;
  if (from > to) return;
  out.push(chars.slice(from - 1, to).join(""));
};

const MAX_REP_LENGTH = 1 << 24;

/**
 * `%{rep:str n sep}`: `str` repeated `n` times, joined by `sep`.
 */
export const rep: BuiltinMacro = (_e, out, args) => {
  const [str, count, sep] = words(args.collect());
  if (str === undefined) {
    throw new MacroError(malformedDirective("rep", "expected a string"));
  }
  const n = parseIndex("rep", count, 1);
  if (n <= 0) return;
  const joiner = sep ?? "";
  if (n * (str.length + joiner.length) > MAX_REP_LENGTH) {
    throw new MacroError(malformedDirective("rep", `result of ${n} repetitions is too long`));
  }
  out.push(Array.from({ length: n }, () => str).join(joiner));
};
