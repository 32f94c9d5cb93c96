// src/core/builtins/unimplemented.ts

import type { BuiltinMacro } from "../../registry/types";
import { MacroError } from "../../outcome/errors";
import { notImplemented } from "../../outcome/constructors";

function unimplemented(name: string): BuiltinMacro {
  return () => {
    throw new MacroError(notImplemented(name));
  };
}

// needs Lua pattern matching
export const gsub = unimplemented("gsub");
// needs compression format detection
export const uncompress = unimplemented("uncompress");
