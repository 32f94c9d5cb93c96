import type { MacroExpander } from "../core/expand/expander";

/**
 * Script host interface for `%lua`.
 *
 * `run` gets the live expander for the duration of the call and may define,
 * undefine or expand macros through it. The returned text is what the
 * script printed; it is appended to the macro output. Throwing aborts the
 * macro.
 */
export interface ScriptHost {
  readonly language: string;
  run(expander: MacroExpander, script: string): string;
}
