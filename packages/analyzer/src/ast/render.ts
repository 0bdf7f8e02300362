/**
 * Source-like rendering of expressions for diagnostics
 */

import type { Expr, LiteralExpr } from "./expressions.js";

const ELIDED = "...";

const renderLiteral = (lit: LiteralExpr): string => {
  switch (lit.type) {
    case "int":
    case "float":
      return String(lit.value);
    case "string":
      return JSON.stringify(lit.value);
    case "date":
    case "timestamp":
      return lit.value;
    case "boolean":
      return lit.value ? "TRUE" : "FALSE";
  }
};

/**
 * Render an expression, keeping `depth` levels of nested operators.
 * Leaves (literals, names, column accesses) are always shown in full.
 */
export const renderExpr = (expr: Expr, depth = 1): string => {
  switch (expr.kind) {
    case "literal":
      return renderLiteral(expr);
    case "identifier":
      return expr.name;
    case "rowId":
      return "rowid";
    case "columnAccess":
      return `${expr.table}.${expr.column}`;
    case "wildcard":
      return "*";
    default:
      break;
  }

  if (depth <= 0) {
    return ELIDED;
  }

  const sub = (e: Expr): string => {
    const text = renderExpr(e, depth - 1);
    return e.kind === "binary" && text !== ELIDED ? `(${text})` : text;
  };

  switch (expr.kind) {
    case "binary":
      return `${sub(expr.left)} ${expr.op} ${sub(expr.right)}`;
    case "unary":
      return expr.op === "not"
        ? `not ${sub(expr.operand)}`
        : `-${sub(expr.operand)}`;
    case "call":
      return `${expr.callee}(${expr.args.map(sub).join(", ")})`;
    case "index":
      return `${sub(expr.target)}[${sub(expr.index)}]`;
    case "case": {
      const parts = ["case"];
      if (expr.discriminant) parts.push(sub(expr.discriminant));
      for (const branch of expr.branches) {
        parts.push(`when ${sub(branch.condition)} then ${sub(branch.result)}`);
      }
      if (expr.otherwise) parts.push(`else ${sub(expr.otherwise)}`);
      parts.push("end");
      return parts.join(" ");
    }
    case "each":
      return `each(${sub(expr.expr)})`;
  }
};
