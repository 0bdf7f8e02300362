/**
 * Query analyzer - soft type and scope checking of query programs
 */

export {
  type DiagnosticSeverity,
  type DiagnosticCode,
  type SourcePosition,
  type SourceLocation,
  type Diagnostic,
  createDiagnostic,
  formatDiagnostic,
  formatLocation,
  isError as isDiagnosticError,
} from "./types/diagnostic.js";
export * from "./types/result.js";
export * from "./types/type-tag.js";

export * from "./ast/expressions.js";
export * from "./ast/relalg.js";
export * from "./ast/statements.js";
export { renderExpr } from "./ast/render.js";
export { parseProgram, loadProgramFile } from "./ast/loader.js";

export * from "./functions/signature.js";
export * from "./functions/environment.js";
export {
  builtinEnvironment,
  loadSignatureFile,
  parseSignatureFile,
} from "./functions/builtins.js";

export * from "./checker/errors.js";
export { checkExpr, checkTypeTag } from "./checker/expressions.js";
export { checkProhibited } from "./checker/prohibited.js";
export { checkRelAlg } from "./checker/relalg.js";
export { checkTopLevel, checkProgram } from "./checker/statements.js";
export { buildEnvironment } from "./checker/environment-builder.js";
export { toDiagnostic } from "./diagnostics/render.js";

export * from "./analyzer.js";
