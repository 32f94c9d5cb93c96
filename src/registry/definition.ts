import { TextBuffer } from "../core/text/buffer";
import type { BoundedCursor } from "../core/text/cursor";
import { lineColAt } from "../core/text/span";
import type { BuiltinDefinition, BuiltinMacro, MacroDefinition, UserDefinition } from "./types";

export function builtinDefinition(name: string, fn: BuiltinMacro, takesLine = false): BuiltinDefinition {
  return { tag: "Builtin", name, fn, takesLine };
}

/**
 * Capture a body without copying it: the definition keeps the span that
 * `body` covers in its buffer.
 */
export function userDefinition(body: BoundedCursor, takesParameter: boolean): UserDefinition {
  return {
    tag: "UserDefined",
    sourceFile: body.file,
    offset: body.pos,
    length: body.end - body.pos,
    buffer: body.buffer,
    takesParameter,
  };
}

/**
 * Definition over text that has no other home, such as positional
 * parameters or values set from a script host.
 */
export function literalDefinition(text: string, takesParameter = false, buffer = new TextBuffer()): UserDefinition {
  const offset = buffer.length;
  buffer.append(text);
  return { tag: "UserDefined", sourceFile: "<internal>", offset, length: text.length, buffer, takesParameter };
}

export function isBuiltin(def: MacroDefinition): def is BuiltinDefinition {
  return def.tag === "Builtin";
}

export function macroBody(def: UserDefinition): string {
  return def.buffer.slice(def.offset, def.offset + def.length);
}

export type DefinitionLocation = { file: string; line: number; col: number };

export function definitionLocation(def: UserDefinition): DefinitionLocation {
  const { line, col } = lineColAt(def.buffer, def.offset);
  return { file: def.sourceFile, line, col };
}
