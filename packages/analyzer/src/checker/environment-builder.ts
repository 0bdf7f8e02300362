/**
 * Pre-scan of a program for user-defined functions.
 *
 * Every declaration gets an arity-only signature before any statement is
 * checked, so functions can call each other regardless of order. A later
 * declaration of the same name replaces an earlier one, built-ins included.
 */

import type { Program, UdfDeclaration } from "../ast/statements.js";
import {
  type FunctionEnvironment,
  createEnvironment,
} from "../functions/environment.js";
import { udfSignature } from "../functions/signature.js";

export const collectUdfs = (program: Program): readonly UdfDeclaration[] =>
  program.filter((c): c is UdfDeclaration => c.kind === "udf");

export const buildEnvironment = (
  program: Program,
  base: FunctionEnvironment
): FunctionEnvironment =>
  createEnvironment(
    collectUdfs(program).map((udf) => udfSignature(udf.name, udf.params.length)),
    base
  );
