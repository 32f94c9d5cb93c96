// src/core/builtins/diagnostics.ts

import type { BuiltinMacro } from "../../registry/types";

export const echo: BuiltinMacro = (expander, _out, args) => {
  expander.log("info", args.collect());
};

export const warn: BuiltinMacro = (expander, _out, args) => {
  expander.log("warn", args.collect());
};

export const error: BuiltinMacro = (expander, _out, args) => {
  expander.log("error", args.collect());
};

/**
 * Toggles invocation tracing for the rest of the session.
 */
export const trace: BuiltinMacro = (expander) => {
  expander.tracing = !expander.tracing;
  expander.log("debug", `tracing ${expander.tracing ? "on" : "off"}`);
};
