// src/core/expand/names.ts
// Macro name grammar shared by the driver and the file loader

import type { TextCursor } from "../text/cursor";

const NAME_START = /[A-Za-z_]/;
const NAME_PART = /[A-Za-z0-9_]/;
const DIGIT = /[0-9]/;

export const WHITESPACE = /\s/;

export function isWhitespace(ch: string): boolean {
  return WHITESPACE.test(ch);
}

/**
 * Read a macro name at the cursor: an identifier, a run of digits, `*` or
 * `#`. Returns "" and consumes nothing when no name starts here.
 */
export function readMacroName(cursor: TextCursor): string {
  const first = cursor.peek();
  if (first === undefined) return "";

  if (first === "*" || first === "#") {
    cursor.next();
    return first;
  }

  const part = DIGIT.test(first) ? DIGIT : NAME_START.test(first) ? NAME_PART : undefined;
  if (!part) return "";

  let name = "";
  for (let ch = cursor.peek(); ch !== undefined && part.test(ch); ch = cursor.peek()) {
    cursor.next();
    name += ch;
  }
  return name;
}

export function isMacroName(text: string): boolean {
  return /^(?:[A-Za-z_][A-Za-z0-9_]*|[0-9]+|\*|#)$/.test(text);
}

/**
 * Skip spaces and tabs, stopping at a newline.
 */
export function skipInlineSpace(cursor: TextCursor): void {
  for (let ch = cursor.peek(); ch === " " || ch === "\t"; ch = cursor.peek()) {
    cursor.next();
  }
}
