// src/core/builtins/expression.ts

import type { BuiltinMacro } from "../../registry/types";
import { evaluateExpression } from "../expr";

/** The argument is expanded first, then evaluated. */
export const expr: BuiltinMacro = (expander, out, args) => {
  out.push(evaluateExpression(expander.expandCursor(args.rest())));
};
