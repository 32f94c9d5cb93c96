// src/core/expr/evaluate.ts

import type { Expr } from "./parse";
import { parseExpr } from "./parse";
import { tokenize } from "./tokenize";
import { MacroError } from "../../outcome/errors";
import { expressionError } from "../../outcome/constructors";

export type ExprValue = number | string;

function truthy(v: ExprValue): boolean {
  return typeof v === "number" ? v !== 0 : v.length > 0;
}

function fail(msg: string): never {
  throw new MacroError(expressionError(msg));
}

function num(v: ExprValue, op: string): number {
  if (typeof v !== "number") fail(`'${op}' needs numbers`);
  return v;
}

/** Arithmetic results must stay exact integers. */
function exact(n: number, op: string): number {
  if (!Number.isSafeInteger(n)) fail(`'${op}' result is out of range`);
  return n;
}

function sameType(l: ExprValue, r: ExprValue, op: string): void {
  if (typeof l !== typeof r) fail(`'${op}' mixes numbers and strings`);
}

/** Numeric order for numbers, code-unit order for strings. */
function compare(l: ExprValue, r: ExprValue): number {
  if (typeof l === "number" && typeof r === "number") return Math.sign(l - r);
  const a = String(l);
  const b = String(r);
  return a === b ? 0 : a < b ? -1 : 1;
}

export function evaluate(e: Expr): ExprValue {
  switch (e.tag) {
    case "Num":
      return e.n;
    case "Str":
      return e.s;
    case "Neg":
      return -num(evaluate(e.e), "-");
    case "Not":
      return truthy(evaluate(e.e)) ? 0 : 1;
    case "Cond":
      return truthy(evaluate(e.test)) ? evaluate(e.then) : evaluate(e.else);
    case "Bin": {
      if (e.op === "&&") {
        const l = evaluate(e.l);
        return truthy(l) ? evaluate(e.r) : l;
      }
      if (e.op === "||") {
        const l = evaluate(e.l);
        return truthy(l) ? l : evaluate(e.r);
      }

      const l = evaluate(e.l);
      const r = evaluate(e.r);
      sameType(l, r, e.op);
      switch (e.op) {
        case "+":
          return typeof l === "string" ? l + String(r) : exact(l + num(r, "+"), "+");
        case "-":
          return exact(num(l, "-") - num(r, "-"), "-");
        case "*":
          return exact(num(l, "*") * num(r, "*"), "*");
        case "/":
        case "%": {
          const d = num(r, e.op);
          if (d === 0) fail("division by zero");
          const n = num(l, e.op);
          return e.op === "/" ? Math.trunc(n / d) : n % d;
        }
        case "==":
          return l === r ? 1 : 0;
        case "!=":
          return l !== r ? 1 : 0;
        case "<":
          return compare(l, r) < 0 ? 1 : 0;
        case ">":
          return compare(l, r) > 0 ? 1 : 0;
        case "<=":
          return compare(l, r) <= 0 ? 1 : 0;
        case ">=":
          return compare(l, r) >= 0 ? 1 : 0;
        default:
          return fail(`unknown operator '${e.op}'`);
      }
    }
  }
}

/**
 * Evaluate expression text and render the result as macro output.
 */
export function evaluateExpression(text: string): string {
  return String(evaluate(parseExpr(tokenize(text))));
}
