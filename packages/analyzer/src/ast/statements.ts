/**
 * Top-level program constructs
 */

import type { SourcePosition } from "../types/diagnostic.js";
import type { Expr } from "./expressions.js";
import type { RelAlg, SortKey } from "./relalg.js";

export type TopLevel =
  | QueryStatement
  | UpdateStatement
  | DeleteStatement
  | CreateStatement
  | InsertStatement
  | UdfDeclaration
  | VerbatimBlock;

export type Program = readonly TopLevel[];

/**
 * A named sub-query (`WITH name(cols) AS (...)`), evaluated before the main query.
 */
export type LocalQuery = {
  readonly name: string;
  readonly columns: readonly string[];
  readonly body: RelAlg;
  readonly pos: SourcePosition;
};

export type QueryStatement = {
  readonly kind: "query";
  readonly locals: readonly LocalQuery[];
  readonly main: RelAlg;
  readonly pos: SourcePosition;
};

export type Assignment = {
  readonly column: string;
  readonly value: Expr;
};

export type UpdateStatement = {
  readonly kind: "update";
  readonly table: string;
  readonly assignments: readonly Assignment[];
  readonly orderBy: readonly SortKey[];
  readonly where: readonly Expr[];
  readonly groupBy: readonly Expr[];
  readonly having: readonly Expr[];
  readonly pos: SourcePosition;
};

/**
 * Either delete the rows matching `where`, or drop whole columns.
 */
export type DeleteTarget =
  | { readonly kind: "where"; readonly predicates: readonly Expr[] }
  | { readonly kind: "columns"; readonly columns: readonly string[] };

export type DeleteStatement = {
  readonly kind: "delete";
  readonly table: string;
  readonly target: DeleteTarget;
  readonly orderBy: readonly SortKey[];
  readonly groupBy: readonly Expr[];
  readonly having: readonly Expr[];
  readonly pos: SourcePosition;
};

export type ColumnDefinition = {
  readonly name: string;
  readonly type: string;
};

export type CreateSource =
  | { readonly kind: "schema"; readonly columns: readonly ColumnDefinition[] }
  | { readonly kind: "query"; readonly query: QueryStatement };

export type CreateStatement = {
  readonly kind: "create";
  readonly table: string;
  readonly source: CreateSource;
  readonly pos: SourcePosition;
};

export type InsertSource =
  | { readonly kind: "values"; readonly values: readonly Expr[] }
  | { readonly kind: "query"; readonly query: QueryStatement };

export type InsertStatement = {
  readonly kind: "insert";
  readonly table: string;
  readonly orderBy: readonly SortKey[];
  readonly columns: readonly string[];
  readonly source: InsertSource;
  readonly pos: SourcePosition;
};

export type UdfStatement =
  | { readonly kind: "assign"; readonly name: string; readonly value: Expr }
  | { readonly kind: "expression"; readonly expr: Expr };

export type UdfDeclaration = {
  readonly kind: "udf";
  readonly name: string;
  readonly params: readonly string[];
  readonly body: readonly UdfStatement[];
  readonly pos: SourcePosition;
};

/** Target-language code passed through verbatim. */
export type VerbatimBlock = {
  readonly kind: "verbatim";
  readonly code: string;
  readonly pos: SourcePosition;
};

/**
 * All expressions of an update or delete, in clause order
 */
export const modificationExpressions = (
  stmt: UpdateStatement | DeleteStatement
): readonly Expr[] => {
  switch (stmt.kind) {
    case "update":
      return [
        ...stmt.assignments.map((a) => a.value),
        ...stmt.orderBy.map((k) => k.expr),
        ...stmt.where,
        ...stmt.groupBy,
        ...stmt.having,
      ];
    case "delete":
      return [
        ...(stmt.target.kind === "where" ? stmt.target.predicates : []),
        ...stmt.orderBy.map((k) => k.expr),
        ...stmt.groupBy,
        ...stmt.having,
      ];
  }
};
