/**
 * Analyzer entry points
 */

import type { Program } from "./ast/statements.js";
import type { Diagnostic } from "./types/diagnostic.js";
import type { Result } from "./types/result.js";
import type { FunctionEnvironment } from "./functions/environment.js";
import { builtinEnvironment } from "./functions/builtins.js";
import type { AnalysisError } from "./checker/errors.js";
import { buildEnvironment } from "./checker/environment-builder.js";
import { checkProgram } from "./checker/statements.js";
import { toDiagnostic } from "./diagnostics/render.js";

export type AnalyzeOptions = {
  /** Built-ins to start from; defaults to the bundled registry */
  readonly environment?: FunctionEnvironment;
  /** Attached to diagnostic locations */
  readonly file?: string;
};

/**
 * Soft type check of a whole program. An empty list means nothing was
 * statically wrong, not that the program is type-correct at runtime.
 */
export const typeCheck = (
  program: Program,
  base: FunctionEnvironment = builtinEnvironment()
): readonly AnalysisError[] =>
  checkProgram(program, buildEnvironment(program, base));

/**
 * Main entry point: the program comes back unchanged when it passes, and
 * code generation should only proceed on `ok`.
 */
export const analyzeProgram = (
  program: Program,
  options: AnalyzeOptions = {}
): Result<Program, Diagnostic[]> => {
  const errors = typeCheck(program, options.environment);

  if (errors.length > 0) {
    return {
      ok: false,
      error: errors.map((e) => toDiagnostic(e, options.file)),
    };
  }

  return { ok: true, value: program };
};
