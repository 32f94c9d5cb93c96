// src/core/expr/parse.ts

import type { Op, Tok } from "./tokenize";
import { MacroError } from "../../outcome/errors";
import { expressionError } from "../../outcome/constructors";

export type BinaryOp = "+" | "-" | "*" | "/" | "%" | "==" | "!=" | "<" | ">" | "<=" | ">=" | "&&" | "||";

export type Expr =
  | { tag: "Num"; n: number }
  | { tag: "Str"; s: string }
  | { tag: "Neg"; e: Expr }
  | { tag: "Not"; e: Expr }
  | { tag: "Bin"; op: BinaryOp; l: Expr; r: Expr }
  | { tag: "Cond"; test: Expr; then: Expr; else: Expr };

// loosest first
const LEVELS: readonly (readonly BinaryOp[])[] = [
  ["||"],
  ["&&"],
  ["==", "!="],
  ["<", ">", "<=", ">="],
  ["+", "-"],
  ["*", "/", "%"],
];

export function parseExpr(toks: Tok[]): Expr {
  let i = 0;

  const fail = (msg: string): never => {
    throw new MacroError(expressionError(msg));
  };

  const peekOp = (): Op | undefined => {
    const t = toks[i];
    return t && t.tag === "Op" ? t.op : undefined;
  };

  const expect = (op: Op) => {
    if (peekOp() !== op) fail(`expected '${op}'`);
    i++;
  };

  function parseCond(): Expr {
    const test = parseLevel(0);
    if (peekOp() !== "?") return test;
    i++;
    const then = parseCond();
    expect(":");
    const otherwise = parseCond();
    return { tag: "Cond", test, then, else: otherwise };
  }

  function parseLevel(level: number): Expr {
    const ops = LEVELS[level];
    if (!ops) return parseUnary();
    let l = parseLevel(level + 1);
    for (;;) {
      const op = peekOp();
      const binary = ops.find((o) => o === op);
      if (!binary) return l;
      i++;
      const r = parseLevel(level + 1);
      l = { tag: "Bin", op: binary, l, r };
    }
  }

  function parseUnary(): Expr {
    const op = peekOp();
    if (op === "-") { i++; return { tag: "Neg", e: parseUnary() }; }
    if (op === "!") { i++; return { tag: "Not", e: parseUnary() }; }
    return parsePrimary();
  }

  function parsePrimary(): Expr {
    const t = toks[i];
    if (!t) return fail("unexpected end of expression");
    if (t.tag === "Num") { i++; return { tag: "Num", n: t.n }; }
    if (t.tag === "Str") { i++; return { tag: "Str", s: t.s }; }
    if (t.op === "(") {
      i++;
      const e = parseCond();
      expect(")");
      return e;
    }
    return fail(`unexpected '${t.op}'`);
  }

  if (toks.length === 0) fail("empty expression");
  const e = parseCond();
  if (i < toks.length) fail("trailing tokens");
  return e;
}
