// src/index.ts
// specmacro - Public API
//
// Macro registry, text cursors and builtin catalog for RPM spec-file macros.

// ═══════════════════════════════════════════════════════════════════════════════
// EXPANSION
// ═══════════════════════════════════════════════════════════════════════════════

export {
  MacroExpander,
  expandText,
  type MacroExpanderOptions,
  OutputBuffer,
  loadMacros,
  isMacroName,
} from "./core/expand";

// ═══════════════════════════════════════════════════════════════════════════════
// TEXT
// ═══════════════════════════════════════════════════════════════════════════════

export {
  TextBuffer,
  BoundedCursor,
  StreamingCursor,
  type TextCursor,
  type CursorKind,
  stringSource,
  fileSource,
  type TextSource,
  spanOf,
  lineColAt,
  formatSpan,
  type Span,
  type LineCol,
} from "./core/text";

// ═══════════════════════════════════════════════════════════════════════════════
// REGISTRY
// ═══════════════════════════════════════════════════════════════════════════════

export {
  MacroRegistry,
  type BuiltinMacro,
  type BuiltinDefinition,
  type UserDefinition,
  type MacroDefinition,
  type DefinitionStack,
  builtinDefinition,
  userDefinition,
  literalDefinition,
  isBuiltin,
  macroBody,
  definitionLocation,
  type DefinitionLocation,
  formatDumpLine,
  generateDump,
} from "./registry";

export {
  BUILTIN_MACROS,
  isBuiltinName,
  stringBuiltins,
  pathBuiltins,
  environmentBuiltins,
  diagnosticBuiltins,
  definitionBuiltins,
} from "./core/builtins";

// ═══════════════════════════════════════════════════════════════════════════════
// EXPRESSIONS
// ═══════════════════════════════════════════════════════════════════════════════

export { evaluateExpression, type ExprValue } from "./core/expr";

// ═══════════════════════════════════════════════════════════════════════════════
// PORTS
// ═══════════════════════════════════════════════════════════════════════════════

export {
  type PortSet,
  createPortSet,
  consoleLogPort,
  memoryLogPort,
  type LogPort,
  type LogLevel,
  type LogRecord,
  processEnvironment,
  staticEnvironment,
  type EnvironmentPort,
  type EnvValue,
  nodeFileSystem,
  type FileSystemPort,
  stdoutPort,
  memoryOutputPort,
  type OutputPort,
  type ScriptHost,
} from "./ports";

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/config";

// ═══════════════════════════════════════════════════════════════════════════════
// OUTCOMES & ERRORS
// ═══════════════════════════════════════════════════════════════════════════════

export type { Outcome, Done, Fail, OutcomeMeta } from "./outcome/outcome";
export { isDone, isFail } from "./outcome/outcome";
export { match, mapOutcome, unwrap, unwrapOr } from "./outcome/matchers";
export type { Failure, FailureReason, Invocation } from "./outcome/failure";
export { failure, wrapFailure, isFailureReason, allDiagnostics } from "./outcome/failure";
export type { Diagnostic, DiagnosticSeverity } from "./outcome/diagnostic";
export { DIAGNOSTIC_CODES, makeDiagnostic, type DiagnosticCode } from "./outcome/codes";
export { MacroError, isMacroError, toFail, formatFailure } from "./outcome/errors";
