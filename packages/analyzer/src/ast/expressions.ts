/**
 * Expression nodes
 */

import type { SourcePosition } from "../types/diagnostic.js";

export type BinaryOperator =
  | "and"
  | "or"
  | "<"
  | "<="
  | ">"
  | ">="
  | "="
  | "!="
  | "+"
  | "-"
  | "*"
  | "/"
  | "^";

export type UnaryOperator = "not" | "neg";

export type Expr =
  | BinaryExpr
  | UnaryExpr
  | CallExpr
  | IndexExpr
  | CaseExpr
  | LiteralExpr
  | IdentifierExpr
  | RowIdExpr
  | ColumnAccessExpr
  | WildcardExpr
  | EachExpr;

export type BinaryExpr = {
  readonly kind: "binary";
  readonly op: BinaryOperator;
  readonly left: Expr;
  readonly right: Expr;
  readonly pos: SourcePosition;
};

export type UnaryExpr = {
  readonly kind: "unary";
  readonly op: UnaryOperator;
  readonly operand: Expr;
  readonly pos: SourcePosition;
};

export type CallExpr = {
  readonly kind: "call";
  readonly callee: string;
  readonly args: readonly Expr[];
  readonly pos: SourcePosition;
};

/**
 * `target[index]`. The runtime treats indexing as a call on the target.
 */
export type IndexExpr = {
  readonly kind: "index";
  readonly target: Expr;
  readonly index: Expr;
  readonly pos: SourcePosition;
};

export type CaseBranch = {
  readonly condition: Expr;
  readonly result: Expr;
};

export type CaseExpr = {
  readonly kind: "case";
  readonly discriminant?: Expr;
  readonly branches: readonly CaseBranch[];
  readonly otherwise?: Expr;
  readonly pos: SourcePosition;
};

export type LiteralExpr =
  | {
      readonly kind: "literal";
      readonly type: "int" | "float";
      readonly value: number;
      readonly pos: SourcePosition;
    }
  | {
      readonly kind: "literal";
      readonly type: "string" | "date" | "timestamp";
      readonly value: string;
      readonly pos: SourcePosition;
    }
  | {
      readonly kind: "literal";
      readonly type: "boolean";
      readonly value: boolean;
      readonly pos: SourcePosition;
    };

export type LiteralType = LiteralExpr["type"];

export type IdentifierExpr = {
  readonly kind: "identifier";
  readonly name: string;
  readonly pos: SourcePosition;
};

/** The `rowid` pseudo-variable: position of the current row. */
export type RowIdExpr = {
  readonly kind: "rowId";
  readonly pos: SourcePosition;
};

export type ColumnAccessExpr = {
  readonly kind: "columnAccess";
  readonly table: string;
  readonly column: string;
  readonly pos: SourcePosition;
};

export type WildcardExpr = {
  readonly kind: "wildcard";
  readonly pos: SourcePosition;
};

/** Apply the inner expression to each element. */
export type EachExpr = {
  readonly kind: "each";
  readonly expr: Expr;
  readonly pos: SourcePosition;
};

/**
 * Immediate sub-expressions, in source order
 */
export const childExpressions = (expr: Expr): readonly Expr[] => {
  switch (expr.kind) {
    case "binary":
      return [expr.left, expr.right];
    case "unary":
      return [expr.operand];
    case "call":
      return expr.args;
    case "index":
      return [expr.target, expr.index];
    case "case":
      return [
        ...(expr.discriminant ? [expr.discriminant] : []),
        ...expr.branches.flatMap((b) => [b.condition, b.result]),
        ...(expr.otherwise ? [expr.otherwise] : []),
      ];
    case "each":
      return [expr.expr];
    case "literal":
    case "identifier":
    case "rowId":
    case "columnAccess":
    case "wildcard":
      return [];
  }
};
