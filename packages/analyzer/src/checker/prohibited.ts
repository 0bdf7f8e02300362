/**
 * Query-only constructs: `*`, `t.c` and `rowid` only mean something while a
 * query is evaluating rows of a table. Outside one (function bodies, literal
 * inserts) each occurrence is an error.
 */

import { type Expr, childExpressions } from "../ast/expressions.js";
import { renderExpr } from "../ast/render.js";
import { type AnalysisError, illegalExpression } from "./errors.js";

const isQueryOnly = (expr: Expr): boolean =>
  expr.kind === "wildcard" ||
  expr.kind === "columnAccess" ||
  expr.kind === "rowId";

export const checkProhibited = (expr: Expr): readonly AnalysisError[] => [
  ...(isQueryOnly(expr)
    ? [illegalExpression(renderExpr(expr), expr.pos, "queryOnly")]
    : []),
  ...childExpressions(expr).flatMap(checkProhibited),
];
