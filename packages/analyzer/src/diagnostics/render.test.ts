import { describe, it } from "mocha";
import { expect } from "chai";
import { toDiagnostic } from "./render.js";
import {
  ambiguousColumnAccess,
  badCall,
  duplicateTableName,
  illegalExpression,
  typeMismatch,
  unresolvedCorrelationName,
} from "../checker/errors.js";
import { formatDiagnostic } from "../types/diagnostic.js";

describe("Diagnostic rendering", () => {
  it("should render a type mismatch with tag names", () => {
    const d = toDiagnostic(typeMismatch("boolean", "numeric", { line: 3, column: 7 }), "q.json");
    expect(formatDiagnostic(d)).to.equal(
      "q.json:3:7 error QCK1001: Type mismatch: expected Boolean, found Numeric"
    );
  });

  it("should assign a code to every error kind", () => {
    const p = { line: 1, column: 1 };
    const codes = [
      typeMismatch("numeric", "string", p),
      badCall("sqrt", p),
      illegalExpression("*", p, "queryOnly"),
      ambiguousColumnAccess("A.c", p),
      unresolvedCorrelationName("B.c", p),
      duplicateTableName("T", "T", p, p),
    ].map((e) => toDiagnostic(e).code);

    expect(codes).to.deep.equal([
      "QCK1001",
      "QCK1002",
      "QCK1003",
      "QCK2001",
      "QCK2002",
      "QCK2003",
    ]);
  });

  it("should point a duplicate at the first binding and relate the second", () => {
    const d = toDiagnostic(
      duplicateTableName("T as A", "U as A", { line: 1, column: 6 }, { line: 1, column: 20 }),
      "q.json"
    );
    expect(d.message).to.equal("Duplicate table name: 'T as A' and 'U as A'");
    expect(d.location).to.deep.equal({ file: "q.json", line: 1, column: 6 });
    expect(d.relatedLocations).to.deep.equal([{ file: "q.json", line: 1, column: 20 }]);
  });

  it("should give each illegal expression the hint for its cause", () => {
    const p = { line: 4, column: 2 };
    expect(toDiagnostic(illegalExpression("a + b", p, "sortKey")).hint).to.equal(
      "Sort keys must be a column name or a qualified column."
    );
    expect(toDiagnostic(illegalExpression("rowid", p, "queryOnly")).hint).to.equal(
      "'*', 't.c' and 'rowid' are only valid inside a query."
    );
  });

  it("should leave the file out when none is given", () => {
    const d = toDiagnostic(unresolvedCorrelationName("x.c", { line: 2, column: 2 }));
    expect(formatDiagnostic(d)).to.equal(
      "2:2 error QCK2002: Unknown correlation name in 'x.c' Hint: An aliased table can only be referenced by its alias."
    );
  });
});
