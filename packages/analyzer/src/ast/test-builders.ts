/**
 * Terse AST constructors for tests.
 * Every node defaults to position 1:1; use `at` to place one elsewhere.
 */

import type { SourcePosition } from "../types/diagnostic.js";
import type {
  BinaryOperator,
  CaseBranch,
  CaseExpr,
  ColumnAccessExpr,
  Expr,
  IdentifierExpr,
  LiteralExpr,
} from "./expressions.js";
import type { JoinType, RelAlg, TableNode } from "./relalg.js";
import type { LocalQuery, QueryStatement } from "./statements.js";

export const P: SourcePosition = { line: 1, column: 1 };

export const at = <T extends { readonly pos: SourcePosition }>(
  node: T,
  line: number,
  column: number
): T => ({ ...node, pos: { line, column } });

// Expressions

export const id = (name: string): IdentifierExpr => ({
  kind: "identifier",
  name,
  pos: P,
});

export const col = (table: string, column: string): ColumnAccessExpr => ({
  kind: "columnAccess",
  table,
  column,
  pos: P,
});

export const int = (value: number): LiteralExpr => ({
  kind: "literal",
  type: "int",
  value,
  pos: P,
});

export const float = (value: number): LiteralExpr => ({
  kind: "literal",
  type: "float",
  value,
  pos: P,
});

export const str = (value: string): LiteralExpr => ({
  kind: "literal",
  type: "string",
  value,
  pos: P,
});

export const bool = (value: boolean): LiteralExpr => ({
  kind: "literal",
  type: "boolean",
  value,
  pos: P,
});

export const date = (value: string): LiteralExpr => ({
  kind: "literal",
  type: "date",
  value,
  pos: P,
});

export const rowId = (): Expr => ({ kind: "rowId", pos: P });

export const wildcard = (): Expr => ({ kind: "wildcard", pos: P });

export const b = (op: BinaryOperator, left: Expr, right: Expr): Expr => ({
  kind: "binary",
  op,
  left,
  right,
  pos: P,
});

export const not = (operand: Expr): Expr => ({
  kind: "unary",
  op: "not",
  operand,
  pos: P,
});

export const neg = (operand: Expr): Expr => ({
  kind: "unary",
  op: "neg",
  operand,
  pos: P,
});

export const call = (callee: string, ...args: Expr[]): Expr => ({
  kind: "call",
  callee,
  args,
  pos: P,
});

export const index = (target: Expr, idx: Expr): Expr => ({
  kind: "index",
  target,
  index: idx,
  pos: P,
});

export const when = (condition: Expr, result: Expr): CaseBranch => ({
  condition,
  result,
});

export const caseOf = (
  discriminant: Expr | undefined,
  branches: readonly CaseBranch[],
  otherwise?: Expr
): CaseExpr => ({
  kind: "case",
  discriminant,
  branches,
  otherwise,
  pos: P,
});

export const each = (expr: Expr): Expr => ({ kind: "each", expr, pos: P });

// Relational algebra

export const table = (name: string, alias?: string): TableNode => ({
  kind: "table",
  name,
  alias,
  pos: P,
});

export const project = (source: RelAlg, ...exprs: Expr[]): RelAlg => ({
  kind: "project",
  projections: exprs.map((expr) => ({ expr })),
  source,
  pos: P,
});

export const filter = (source: RelAlg, ...predicates: Expr[]): RelAlg => ({
  kind: "filter",
  predicates,
  source,
  pos: P,
});

export const groupBy = (
  source: RelAlg,
  groups: readonly Expr[],
  having: readonly Expr[] = []
): RelAlg => ({
  kind: "groupBy",
  groups,
  having,
  source,
  pos: P,
});

export const join = (
  left: RelAlg,
  right: RelAlg,
  condition: readonly Expr[] = [],
  joinType: JoinType = "inner"
): RelAlg => ({
  kind: "join",
  joinType,
  left,
  right,
  condition,
  pos: P,
});

export const sortBy = (source: RelAlg, ...exprs: Expr[]): RelAlg => ({
  kind: "sortBy",
  keys: exprs.map((expr) => ({ direction: "asc" as const, expr })),
  source,
  pos: P,
});

export const query = (
  main: RelAlg,
  locals: readonly LocalQuery[] = []
): QueryStatement => ({
  kind: "query",
  locals,
  main,
  pos: P,
});

export const local = (name: string, body: RelAlg): LocalQuery => ({
  name,
  columns: [],
  body,
  pos: P,
});
