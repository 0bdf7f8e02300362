/**
 * Expression type checker.
 *
 * Infers a tag for each expression and collects the errors found inside it.
 * An ill-typed operand does not stop the walk; its parent still gets the
 * operator's result type, so one mistake is reported once.
 */

import type {
  BinaryExpr,
  CallExpr,
  CaseExpr,
  Expr,
  LiteralExpr,
  UnaryExpr,
} from "../ast/expressions.js";
import {
  type TypeTag,
  type TypeTagSet,
  BOOL,
  NUM,
  NUM_AND_BOOL,
  primaryTag,
  tagMatches,
  tagSet,
} from "../types/type-tag.js";
import {
  type FunctionEnvironment,
  lookupSignature,
} from "../functions/environment.js";
import { applySignature } from "../functions/signature.js";
import { type AnalysisError, badCall, typeMismatch } from "./errors.js";

export type Checked = {
  readonly type: TypeTag;
  readonly errors: readonly AnalysisError[];
};

const checked = (
  type: TypeTag,
  errors: readonly AnalysisError[] = []
): Checked => ({ type, errors });

/**
 * Check `expr` and require its type to satisfy `expected`.
 * Returns the expression's own errors followed by any mismatch.
 */
export const checkTypeTag = (
  expected: TypeTagSet,
  expr: Expr,
  env: FunctionEnvironment
): readonly AnalysisError[] => {
  const { type, errors } = checkExpr(expr, env);
  return tagMatches(expected, type)
    ? errors
    : [...errors, typeMismatch(primaryTag(expected), type, expr.pos)];
};

/**
 * Errors inside an expression, ignoring its type
 */
export const exprErrors = (
  expr: Expr,
  env: FunctionEnvironment
): readonly AnalysisError[] => checkExpr(expr, env).errors;

const checkBinary = (expr: BinaryExpr, env: FunctionEnvironment): Checked => {
  switch (expr.op) {
    // and/or are boolean only; min/max cover the numeric case
    case "and":
    case "or":
      return checked("boolean", [
        ...checkTypeTag(BOOL, expr.left, env),
        ...checkTypeTag(BOOL, expr.right, env),
      ]);

    case "<":
    case "<=":
    case ">":
    case ">=":
      return checked("boolean", [
        ...checkTypeTag(NUM, expr.left, env),
        ...checkTypeTag(NUM, expr.right, env),
      ]);

    // The left side decides what the right side must be
    case "=":
    case "!=": {
      const left = checkExpr(expr.left, env);
      return checked("boolean", [
        ...left.errors,
        ...checkTypeTag(tagSet(left.type), expr.right, env),
      ]);
    }

    case "+":
    case "-":
    case "*":
    case "/":
    case "^":
      return checked("numeric", [
        ...checkTypeTag(NUM_AND_BOOL, expr.left, env),
        ...checkTypeTag(NUM_AND_BOOL, expr.right, env),
      ]);
  }
};

const checkUnary = (expr: UnaryExpr, env: FunctionEnvironment): Checked => {
  switch (expr.op) {
    case "not":
      return checked("boolean", checkTypeTag(BOOL, expr.operand, env));
    case "neg":
      return checked("numeric", checkTypeTag(NUM, expr.operand, env));
  }
};

/**
 * Built-ins are matched on argument types, user-defined functions on
 * argument count only. A name with no signature is not an error: the
 * call is simply untyped.
 */
const checkCall = (expr: CallExpr, env: FunctionEnvironment): Checked => {
  const args = expr.args.map((a) => checkExpr(a, env));
  const argErrors = args.flatMap((a) => a.errors);
  const signature = lookupSignature(env, expr.callee);

  if (!signature) {
    return checked("unknown", argErrors);
  }

  const returns = applySignature(
    signature,
    args.map((a) => a.type)
  );
  return returns === undefined
    ? checked("unknown", [...argErrors, badCall(expr.callee, expr.pos)])
    : checked(returns, argErrors);
};

/**
 * With a discriminant, each `when` must match its type; without one, each
 * `when` must be boolean. The first branch result fixes the type of every
 * other result, `else` included.
 */
const checkCase = (expr: CaseExpr, env: FunctionEnvironment): Checked => {
  const discriminant = expr.discriminant
    ? checkExpr(expr.discriminant, env)
    : checked("boolean");
  const conditionErrors = expr.branches.flatMap((branch) =>
    checkTypeTag(tagSet(discriminant.type), branch.condition, env)
  );

  const [first, ...rest] = expr.branches;
  if (!first) {
    // no branch to fix a result type; `else` is still checked on its own
    return checked("unknown", [
      ...discriminant.errors,
      ...conditionErrors,
      typeMismatch("boolean", "unit", expr.pos),
      ...(expr.otherwise ? exprErrors(expr.otherwise, env) : []),
    ]);
  }

  const result = checkExpr(first.result, env);
  const expected = tagSet(result.type);
  const resultErrors = rest.flatMap((branch) =>
    checkTypeTag(expected, branch.result, env)
  );
  const otherwiseErrors = expr.otherwise
    ? checkTypeTag(expected, expr.otherwise, env)
    : [];

  return checked(result.type, [
    ...discriminant.errors,
    ...conditionErrors,
    ...result.errors,
    ...resultErrors,
    ...otherwiseErrors,
  ]);
};

// dates and timestamps compare as numbers at runtime
const literalType = (lit: LiteralExpr): TypeTag => {
  switch (lit.type) {
    case "int":
    case "float":
    case "date":
    case "timestamp":
      return "numeric";
    case "string":
      return "string";
    case "boolean":
      return "boolean";
  }
};

/**
 * Infer the type of an expression and collect the errors inside it
 */
export const checkExpr = (expr: Expr, env: FunctionEnvironment): Checked => {
  switch (expr.kind) {
    case "binary":
      return checkBinary(expr, env);
    case "unary":
      return checkUnary(expr, env);
    case "call":
      return checkCall(expr, env);
    case "index":
      // the index itself is not validated
      return checked("unknown", exprErrors(expr.target, env));
    case "case":
      return checkCase(expr, env);
    case "literal":
      return checked(literalType(expr));
    case "rowId":
      return checked("numeric");
    case "identifier":
    case "columnAccess":
    case "wildcard":
      return checked("unknown");
    case "each":
      return checkExpr(expr.expr, env);
  }
};
