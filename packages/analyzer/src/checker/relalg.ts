/**
 * Relational-algebra checker
 */

import type { Expr } from "../ast/expressions.js";
import { renderExpr } from "../ast/render.js";
import { type RelAlg, childNodes, nodeExpressions } from "../ast/relalg.js";
import { BOOL } from "../types/type-tag.js";
import type { FunctionEnvironment } from "../functions/environment.js";
import { type AnalysisError, illegalExpression } from "./errors.js";
import { checkTypeTag, exprErrors } from "./expressions.js";
import {
  bindingName,
  checkColumnAccesses,
  checkDuplicateTables,
  collectTables,
  distinctAccesses,
  treeExpressions,
} from "./scope.js";

/**
 * Sort keys must be a plain column (`c`) or a qualified one (`t.c`)
 */
export const checkSortExprs = (
  exprs: readonly Expr[]
): readonly AnalysisError[] =>
  exprs
    .filter((e) => e.kind !== "identifier" && e.kind !== "columnAccess")
    .map((e) => illegalExpression(renderExpr(e), e.pos, "sortKey"));

const checkNode = (
  node: RelAlg,
  env: FunctionEnvironment
): readonly AnalysisError[] => {
  const exprs = nodeExpressions(node);

  switch (node.kind) {
    case "filter":
    case "join":
      return exprs.flatMap((e) => checkTypeTag(BOOL, e, env));
    case "groupBy":
      // having is checked twice: once as a predicate, once with the groups
      return [
        ...node.having.flatMap((e) => checkTypeTag(BOOL, e, env)),
        ...exprs.flatMap((e) => exprErrors(e, env)),
      ];
    case "sortBy":
      return checkSortExprs(exprs);
    case "table":
    case "project":
      return exprs.flatMap((e) => exprErrors(e, env));
  }
};

/**
 * Expression errors of every node, parent before children
 */
export const checkExprsInRelAlg = (
  node: RelAlg,
  env: FunctionEnvironment
): readonly AnalysisError[] => [
  ...checkNode(node, env),
  ...childNodes(node).flatMap((child) => checkExprsInRelAlg(child, env)),
];

/**
 * Check a whole query tree: expressions, duplicate table bindings, then
 * resolution of every `t.c` against the bound names.
 */
export const checkRelAlg = (
  node: RelAlg,
  env: FunctionEnvironment
): readonly AnalysisError[] => {
  const tables = collectTables(node);
  return [
    ...checkExprsInRelAlg(node, env),
    ...checkDuplicateTables(tables),
    ...checkColumnAccesses(
      tables.map(bindingName),
      distinctAccesses(treeExpressions(node))
    ),
  ];
};
