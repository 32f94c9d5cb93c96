// src/core/expand/loader.ts
// Macro files: one `%name body` per line, `%name(opts) body` for
// parameterized macros, `#` comments, and `\` at end of line to continue
// the body on the next line.

import type { TextCursor } from "../text/cursor";
import type { MacroExpander } from "./expander";
import { isWhitespace, readMacroName, skipInlineSpace } from "./names";

/**
 * Define every macro in `cursor`. Bodies stay in the cursor's buffer.
 * Lines that are not definitions are logged and skipped.
 */
export function loadMacros(expander: MacroExpander, cursor: TextCursor): number {
  let count = 0;

  for (let ch = cursor.next(); ch !== undefined; ch = cursor.next()) {
    if (isWhitespace(ch)) continue;

    if (ch === "#") {
      cursor.readUntilEndOfLine();
      continue;
    }

    const lineStart = cursor.pos - ch.length;
    const name = ch === "%" ? readMacroName(cursor) : "";
    if (!name) {
      const rest = cursor.readUntilEndOfLine() ?? "";
      expander.log("warn", `Ignoring line in ${cursor.file}`, { line: ch + rest, offset: lineStart });
      continue;
    }

    let takesParameter = false;
    if (cursor.peek() === "(") {
      takesParameter = true;
      for (let c = cursor.next(); c !== undefined && c !== ")" && c !== "\n"; c = cursor.next());
    }
    skipInlineSpace(cursor);

    const bodyStart = cursor.pos;
    let bodyEnd = bodyStart;
    for (let c = cursor.next(); ; c = cursor.next()) {
      if (c === undefined) {
        bodyEnd = cursor.pos;
        break;
      }
      if (c === "\\" && cursor.peek() === "\n") {
        cursor.next();
        continue;
      }
      if (c === "\n") {
        bodyEnd = cursor.pos - 1;
        break;
      }
    }

    const body = cursor.buffer.slice(bodyStart, bodyEnd).trimEnd();
    expander.defineMacro(name, cursor.range(bodyStart, bodyStart + body.length), takesParameter);
    count++;
  }

  return count;
}
