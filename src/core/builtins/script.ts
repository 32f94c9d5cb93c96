// src/core/builtins/script.ts

import type { BuiltinMacro } from "../../registry/types";
import { MacroError } from "../../outcome/errors";
import { scriptFailure } from "../../outcome/constructors";

/**
 * Hands the script and the live expander to the configured host; whatever
 * the script printed becomes the macro output.
 */
export const lua: BuiltinMacro = (expander, out, args) => {
  const host = expander.ports.script;
  if (!host) {
    throw new MacroError(scriptFailure("no script host configured"));
  }
  const script = args.collect();
  let printed: string;
  try {
    printed = host.run(expander, script);
  } catch (e) {
    if (e instanceof MacroError) throw e;
    throw new MacroError(scriptFailure(`${host.language}: ${e instanceof Error ? e.message : String(e)}`));
  }
  out.push(printed);
};
