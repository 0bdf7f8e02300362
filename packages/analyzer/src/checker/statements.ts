/**
 * Top-level statement checks
 */

import type {
  CreateStatement,
  DeleteStatement,
  InsertStatement,
  Program,
  QueryStatement,
  TopLevel,
  UdfDeclaration,
  UpdateStatement,
} from "../ast/statements.js";
import { modificationExpressions } from "../ast/statements.js";
import { BOOL } from "../types/type-tag.js";
import type { FunctionEnvironment } from "../functions/environment.js";
import type { AnalysisError } from "./errors.js";
import { checkTypeTag, exprErrors } from "./expressions.js";
import { checkProhibited } from "./prohibited.js";
import { checkRelAlg, checkSortExprs } from "./relalg.js";
import { checkColumnAccesses, distinctAccesses } from "./scope.js";

/**
 * Local sub-queries first, then the main query
 */
export const checkQuery = (
  q: QueryStatement,
  env: FunctionEnvironment
): readonly AnalysisError[] => [
  ...q.locals.flatMap((local) => checkRelAlg(local.body, env)),
  ...checkRelAlg(q.main, env),
];

/**
 * Update and delete touch exactly one table, so a `t.c` can only be
 * unresolved, never ambiguous.
 */
const checkModification = (
  stmt: UpdateStatement | DeleteStatement,
  env: FunctionEnvironment
): readonly AnalysisError[] => {
  const leading =
    stmt.kind === "update"
      ? [
          ...stmt.assignments.flatMap((a) => exprErrors(a.value, env)),
          ...checkSortExprs(stmt.orderBy.map((k) => k.expr)),
          ...stmt.where.flatMap((e) => checkTypeTag(BOOL, e, env)),
        ]
      : [
          ...(stmt.target.kind === "where"
            ? stmt.target.predicates.flatMap((e) => checkTypeTag(BOOL, e, env))
            : []),
          ...checkSortExprs(stmt.orderBy.map((k) => k.expr)),
        ];

  return [
    ...leading,
    ...stmt.groupBy.flatMap((e) => exprErrors(e, env)),
    ...stmt.having.flatMap((e) => checkTypeTag(BOOL, e, env)),
    ...checkColumnAccesses(
      [stmt.table],
      distinctAccesses(modificationExpressions(stmt))
    ),
  ];
};

const checkCreate = (
  stmt: CreateStatement,
  env: FunctionEnvironment
): readonly AnalysisError[] =>
  stmt.source.kind === "query" ? checkQuery(stmt.source.query, env) : [];

/**
 * Inserted values are not matched against column types; most of those are
 * only known at runtime.
 */
const checkInsert = (
  stmt: InsertStatement,
  env: FunctionEnvironment
): readonly AnalysisError[] => {
  const sortErrors = checkSortExprs(stmt.orderBy.map((k) => k.expr));

  switch (stmt.source.kind) {
    case "values": {
      const { values } = stmt.source;
      return [
        ...values.flatMap((e) => exprErrors(e, env)),
        ...sortErrors,
        ...values.flatMap(checkProhibited),
      ];
    }
    case "query":
      return [...checkQuery(stmt.source.query, env), ...sortErrors];
  }
};

const checkUdf = (
  udf: UdfDeclaration,
  env: FunctionEnvironment
): readonly AnalysisError[] =>
  udf.body.flatMap((stmt) => {
    const expr = stmt.kind === "assign" ? stmt.value : stmt.expr;
    return [...exprErrors(expr, env), ...checkProhibited(expr)];
  });

export const checkTopLevel = (
  construct: TopLevel,
  env: FunctionEnvironment
): readonly AnalysisError[] => {
  switch (construct.kind) {
    case "query":
      return checkQuery(construct, env);
    case "update":
    case "delete":
      return checkModification(construct, env);
    case "create":
      return checkCreate(construct, env);
    case "insert":
      return checkInsert(construct, env);
    case "udf":
      return checkUdf(construct, env);
    case "verbatim":
      return [];
  }
};

/**
 * Check every construct independently; errors keep program order
 */
export const checkProgram = (
  program: Program,
  env: FunctionEnvironment
): readonly AnalysisError[] =>
  program.flatMap((construct) => checkTopLevel(construct, env));
