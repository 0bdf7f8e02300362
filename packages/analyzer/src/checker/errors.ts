/**
 * Structured analysis errors.
 *
 * A semantic violation is data, never an exception: every checker returns
 * the list of errors it found, in traversal order.
 */

import type { SourcePosition } from "../types/diagnostic.js";
import type { TypeTag } from "../types/type-tag.js";

export type TypeMismatchError = {
  readonly kind: "typeMismatch";
  readonly expected: TypeTag;
  readonly found: TypeTag;
  readonly pos: SourcePosition;
};

export type BadCallError = {
  readonly kind: "badCall";
  readonly callee: string;
  readonly pos: SourcePosition;
};

/** Why an expression is not allowed where it appears */
export type IllegalExpressionReason =
  | "sortKey" // a sort key that is not a plain or qualified column
  | "queryOnly"; // `*`, `t.c` or `rowid` outside a query

export type IllegalExpressionError = {
  readonly kind: "illegalExpression";
  readonly text: string;
  readonly reason: IllegalExpressionReason;
  readonly pos: SourcePosition;
};

export type AmbiguousColumnAccessError = {
  readonly kind: "ambiguousColumnAccess";
  readonly name: string;
  readonly pos: SourcePosition;
};

export type UnresolvedCorrelationNameError = {
  readonly kind: "unresolvedCorrelationName";
  readonly name: string;
  readonly pos: SourcePosition;
};

export type DuplicateTableNameError = {
  readonly kind: "duplicateTableName";
  readonly first: string;
  readonly second: string;
  readonly firstPos: SourcePosition;
  readonly secondPos: SourcePosition;
};

export type AnalysisError =
  | TypeMismatchError
  | BadCallError
  | IllegalExpressionError
  | AmbiguousColumnAccessError
  | UnresolvedCorrelationNameError
  | DuplicateTableNameError;

export const typeMismatch = (
  expected: TypeTag,
  found: TypeTag,
  pos: SourcePosition
): TypeMismatchError => ({ kind: "typeMismatch", expected, found, pos });

export const badCall = (callee: string, pos: SourcePosition): BadCallError => ({
  kind: "badCall",
  callee,
  pos,
});

export const illegalExpression = (
  text: string,
  pos: SourcePosition,
  reason: IllegalExpressionReason
): IllegalExpressionError => ({ kind: "illegalExpression", text, reason, pos });

export const ambiguousColumnAccess = (
  name: string,
  pos: SourcePosition
): AmbiguousColumnAccessError => ({ kind: "ambiguousColumnAccess", name, pos });

export const unresolvedCorrelationName = (
  name: string,
  pos: SourcePosition
): UnresolvedCorrelationNameError => ({
  kind: "unresolvedCorrelationName",
  name,
  pos,
});

export const duplicateTableName = (
  first: string,
  second: string,
  firstPos: SourcePosition,
  secondPos: SourcePosition
): DuplicateTableNameError => ({
  kind: "duplicateTableName",
  first,
  second,
  firstPos,
  secondPos,
});
