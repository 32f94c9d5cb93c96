// src/core/builtins/index.ts

export { BUILTIN_MACROS, isBuiltinName } from "./table";
export * as stringBuiltins from "./strings";
export * as pathBuiltins from "./paths";
export * as environmentBuiltins from "./environment";
export * as diagnosticBuiltins from "./diagnostics";
export * as definitionBuiltins from "./definitions";
