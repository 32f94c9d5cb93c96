import type { TextBuffer } from "../core/text/buffer";
import type { TextCursor } from "../core/text/cursor";
import type { MacroExpander } from "../core/expand/expander";
import type { OutputBuffer } from "../core/expand/output";

/**
 * A catalog function. Consumes its argument cursor, appends to `out`, and
 * reports failure by throwing `MacroError`.
 */
export type BuiltinMacro = (expander: MacroExpander, out: OutputBuffer, args: TextCursor) => void;

export type BuiltinDefinition = {
  readonly tag: "Builtin";
  readonly name: string;
  readonly fn: BuiltinMacro;
  /** Bare `%name` invocations hand the rest of the line to the builtin */
  readonly takesLine: boolean;
};

/**
 * A macro whose body is an (offset, length) span of `buffer`.
 * `offset + length <= buffer.length` holds for as long as the definition
 * exists; TextBuffer is append-only.
 */
export type UserDefinition = {
  readonly tag: "UserDefined";
  readonly sourceFile: string;
  readonly offset: number;
  readonly length: number;
  readonly buffer: TextBuffer;
  readonly takesParameter: boolean;
};

export type MacroDefinition = BuiltinDefinition | UserDefinition;

/** Name -> definitions, most recent last. Never empty. */
export type DefinitionStack = readonly MacroDefinition[];
