/**
 * Analysis errors -> user-facing diagnostics
 */

import {
  type Diagnostic,
  type SourceLocation,
  type SourcePosition,
  createDiagnostic,
} from "../types/diagnostic.js";
import { tagName } from "../types/type-tag.js";
import type {
  AnalysisError,
  IllegalExpressionReason,
} from "../checker/errors.js";

const locate = (pos: SourcePosition, file?: string): SourceLocation =>
  file !== undefined ? { ...pos, file } : pos;

const ILLEGAL_EXPRESSION_HINTS: Readonly<Record<IllegalExpressionReason, string>> = {
  sortKey: "Sort keys must be a column name or a qualified column.",
  queryOnly: "'*', 't.c' and 'rowid' are only valid inside a query.",
};

/**
 * Render one error. `file` is attached to every location when given.
 */
export const toDiagnostic = (
  err: AnalysisError,
  file?: string
): Diagnostic => {
  switch (err.kind) {
    case "typeMismatch":
      return createDiagnostic(
        "QCK1001",
        "error",
        `Type mismatch: expected ${tagName(err.expected)}, found ${tagName(err.found)}`,
        locate(err.pos, file)
      );

    case "badCall":
      return createDiagnostic(
        "QCK1002",
        "error",
        `No signature of '${err.callee}' accepts these arguments`,
        locate(err.pos, file),
        "Check the number and types of the arguments."
      );

    case "illegalExpression":
      return createDiagnostic(
        "QCK1003",
        "error",
        `Expression not allowed here: ${err.text}`,
        locate(err.pos, file),
        ILLEGAL_EXPRESSION_HINTS[err.reason]
      );

    case "ambiguousColumnAccess":
      return createDiagnostic(
        "QCK2001",
        "error",
        `Ambiguous column access '${err.name}'`,
        locate(err.pos, file),
        "Give each table a distinct correlation name."
      );

    case "unresolvedCorrelationName":
      return createDiagnostic(
        "QCK2002",
        "error",
        `Unknown correlation name in '${err.name}'`,
        locate(err.pos, file),
        "An aliased table can only be referenced by its alias."
      );

    case "duplicateTableName":
      return createDiagnostic(
        "QCK2003",
        "error",
        `Duplicate table name: '${err.first}' and '${err.second}'`,
        locate(err.firstPos, file),
        undefined,
        [locate(err.secondPos, file)]
      );
  }
};
