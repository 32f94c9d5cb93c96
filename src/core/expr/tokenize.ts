// src/core/expr/tokenize.ts
// Tokens of %[...] / %{expr:...} expressions

import { MacroError } from "../../outcome/errors";
import { expressionError } from "../../outcome/constructors";

export type Op =
  | "+" | "-" | "*" | "/" | "%"
  | "==" | "!=" | "<" | ">" | "<=" | ">="
  | "&&" | "||" | "!"
  | "?" | ":" | "(" | ")";

export type Tok =
  | { tag: "Num"; n: number }
  | { tag: "Str"; s: string }
  | { tag: "Op"; op: Op };

const TWO_CHAR_OPS: readonly Op[] = ["==", "!=", "<=", ">=", "&&", "||"];
const ONE_CHAR_OPS: readonly Op[] = ["+", "-", "*", "/", "%", "<", ">", "!", "?", ":", "(", ")"];

export function tokenize(src: string): Tok[] {
  const toks: Tok[] = [];
  let i = 0;

  const isWS = (c: string) => c === " " || c === "\t" || c === "\n" || c === "\r";
  const isDigit = (c: string) => c >= "0" && c <= "9";

  while (i < src.length) {
    const c = src[i];

    if (isWS(c)) { i++; continue; }

    if (isDigit(c)) {
      let j = i;
      while (j < src.length && isDigit(src[j])) j++;
      const n = parseInt(src.slice(i, j), 10);
      if (!Number.isSafeInteger(n)) {
        throw new MacroError(expressionError(`integer ${src.slice(i, j)} is out of range`));
      }
      toks.push({ tag: "Num", n });
      i = j;
      continue;
    }

    if (c === "\"") {
      i++;
      let s = "";
      let closed = false;
      while (i < src.length) {
        const d = src[i];
        if (d === "\"") { i++; closed = true; break; }
        if (d === "\\" && i + 1 < src.length) {
          s += src[i + 1];
          i += 2;
          continue;
        }
        s += d;
        i++;
      }
      if (!closed) throw new MacroError(expressionError("unterminated string"));
      toks.push({ tag: "Str", s });
      continue;
    }

    const two = TWO_CHAR_OPS.find((op) => src.startsWith(op, i));
    if (two) { toks.push({ tag: "Op", op: two }); i += 2; continue; }

    const one = ONE_CHAR_OPS.find((op) => op === c);
    if (one) { toks.push({ tag: "Op", op: one }); i++; continue; }

    throw new MacroError(expressionError(`unexpected '${c}' at ${i}`));
  }

  return toks;
}
