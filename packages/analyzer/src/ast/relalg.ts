/**
 * Relational-algebra operator tree of a query
 */

import type { SourcePosition } from "../types/diagnostic.js";
import type { Expr } from "./expressions.js";

export type RelAlg =
  | TableNode
  | ProjectNode
  | FilterNode
  | GroupByNode
  | JoinNode
  | SortByNode;

/**
 * Table scan. When aliased, the table can only be referenced by its alias.
 */
export type TableNode = {
  readonly kind: "table";
  readonly name: string;
  readonly alias?: string;
  readonly pos: SourcePosition;
};

export type Projection = {
  readonly expr: Expr;
  readonly alias?: string;
};

export type ProjectNode = {
  readonly kind: "project";
  readonly projections: readonly Projection[];
  readonly source: RelAlg;
  readonly pos: SourcePosition;
};

export type FilterNode = {
  readonly kind: "filter";
  readonly predicates: readonly Expr[];
  readonly source: RelAlg;
  readonly pos: SourcePosition;
};

export type GroupByNode = {
  readonly kind: "groupBy";
  readonly groups: readonly Expr[];
  readonly having: readonly Expr[];
  readonly source: RelAlg;
  readonly pos: SourcePosition;
};

export type JoinType = "inner" | "fullOuter" | "cross";

export type JoinNode = {
  readonly kind: "join";
  readonly joinType: JoinType;
  readonly left: RelAlg;
  readonly right: RelAlg;
  readonly condition: readonly Expr[];
  readonly pos: SourcePosition;
};

export type SortDirection = "asc" | "desc";

export type SortKey = {
  readonly direction: SortDirection;
  readonly expr: Expr;
};

export type SortByNode = {
  readonly kind: "sortBy";
  readonly keys: readonly SortKey[];
  readonly source: RelAlg;
  readonly pos: SourcePosition;
};

/**
 * Every expression carried directly by a node (not its children)
 */
export const nodeExpressions = (node: RelAlg): readonly Expr[] => {
  switch (node.kind) {
    case "table":
      return [];
    case "project":
      return node.projections.map((p) => p.expr);
    case "filter":
      return node.predicates;
    case "groupBy":
      return [...node.groups, ...node.having];
    case "join":
      return node.condition;
    case "sortBy":
      return node.keys.map((k) => k.expr);
  }
};

/**
 * Child operator nodes, left to right
 */
export const childNodes = (node: RelAlg): readonly RelAlg[] => {
  switch (node.kind) {
    case "table":
      return [];
    case "join":
      return [node.left, node.right];
    case "project":
    case "filter":
    case "groupBy":
    case "sortBy":
      return [node.source];
  }
};
