/**
 * Tests for the relational-algebra checker
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { checkRelAlg, checkSortExprs } from "./relalg.js";
import {
  ambiguousColumnAccess,
  duplicateTableName,
  illegalExpression,
  typeMismatch,
  unresolvedCorrelationName,
} from "./errors.js";
import { EMPTY_ENVIRONMENT } from "../functions/environment.js";
import type { RelAlg } from "../ast/relalg.js";
import {
  at,
  b,
  col,
  filter,
  groupBy,
  id,
  int,
  join,
  project,
  sortBy,
  str,
  table,
} from "../ast/test-builders.js";

const check = (node: RelAlg) => checkRelAlg(node, EMPTY_ENVIRONMENT);

describe("Relational-algebra checker", () => {
  describe("per-operator constraints", () => {
    it("should require boolean filter predicates", () => {
      const tree = filter(table("t"), b(">", id("a"), int(1)), at(int(1), 2, 7));
      expect(check(tree)).to.deep.equal([
        typeMismatch("boolean", "numeric", { line: 2, column: 7 }),
      ]);
    });

    it("should require boolean join conditions", () => {
      const tree = join(table("t"), table("u"), [at(str("x"), 3, 1)]);
      expect(check(tree)).to.deep.equal([
        typeMismatch("boolean", "string", { line: 3, column: 1 }),
      ]);
    });

    it("should check having as a predicate and again with the groups", () => {
      const having = b("+", at(str("x"), 4, 2), int(1));
      const tree = groupBy(table("t"), [id("g")], [at(having, 4, 1)]);
      expect(check(tree)).to.deep.equal([
        typeMismatch("numeric", "string", { line: 4, column: 2 }),
        typeMismatch("boolean", "numeric", { line: 4, column: 1 }),
        typeMismatch("numeric", "string", { line: 4, column: 2 }),
      ]);
    });

    it("should propagate errors from projections", () => {
      const tree = project(table("t"), b("-", at(str("a"), 1, 8), int(1)));
      expect(check(tree)).to.deep.equal([
        typeMismatch("numeric", "string", { line: 1, column: 8 }),
      ]);
    });

    it("should report parent errors before child errors", () => {
      const tree = project(
        filter(table("t"), at(int(0), 2, 2)),
        b("+", at(str("p"), 1, 1), int(1))
      );
      expect(check(tree)).to.deep.equal([
        typeMismatch("numeric", "string", { line: 1, column: 1 }),
        typeMismatch("boolean", "numeric", { line: 2, column: 2 }),
      ]);
    });
  });

  describe("sort keys", () => {
    it("should allow bare and qualified columns", () => {
      expect(checkSortExprs([id("col1"), col("t", "col1")])).to.deep.equal([]);
    });

    it("should reject computed keys once each", () => {
      const key = at(b("+", id("col1"), id("col2")), 5, 10);
      expect(check(sortBy(table("t"), id("c"), key))).to.deep.equal([
        illegalExpression("col1 + col2", { line: 5, column: 10 }, "sortKey"),
      ]);
    });
  });

  describe("duplicate tables", () => {
    it("should report one error for the same table and alias twice", () => {
      const tree = join(at(table("T", "A"), 1, 6), at(table("T", "A"), 1, 15));
      expect(check(tree)).to.deep.equal([
        duplicateTableName(
          "T as A",
          "T as A",
          { line: 1, column: 6 },
          { line: 1, column: 15 }
        ),
      ]);
    });

    it("should allow one table under two aliases", () => {
      expect(check(join(table("T", "A"), table("T", "B")))).to.deep.equal([]);
    });

    it("should report two different tables sharing an alias", () => {
      const tree = join(at(table("T", "A"), 1, 1), at(table("U", "A"), 1, 9));
      expect(check(tree)).to.deep.equal([
        duplicateTableName("T as A", "U as A", { line: 1, column: 1 }, { line: 1, column: 9 }),
      ]);
    });

    it("should report an unaliased table used twice, citing the first two", () => {
      const tree = join(
        join(at(table("T"), 1, 1), at(table("T"), 1, 4)),
        at(table("T"), 1, 7)
      );
      expect(check(tree)).to.deep.equal([
        duplicateTableName("T", "T", { line: 1, column: 1 }, { line: 1, column: 4 }),
      ]);
    });
  });

  describe("column access resolution", () => {
    it("should resolve through the single binding of a name", () => {
      const tree = project(filter(table("t"), b(">", col("t", "a"), int(0))), col("t", "b"));
      expect(check(tree)).to.deep.equal([]);
    });

    it("should report an unresolved correlation name", () => {
      const tree = project(table("t"), at(col("A", "c"), 2, 8));
      expect(check(tree)).to.deep.equal([
        unresolvedCorrelationName("A.c", { line: 2, column: 8 }),
      ]);
    });

    it("should only resolve an aliased table through its alias", () => {
      const tree = project(table("T", "A"), at(col("T", "c"), 1, 8), col("A", "c"));
      expect(check(tree)).to.deep.equal([
        unresolvedCorrelationName("T.c", { line: 1, column: 8 }),
      ]);
    });

    it("should report an access whose name is bound twice as ambiguous", () => {
      const tree = project(
        join(table("A"), table("B", "A")),
        at(col("A", "c"), 3, 3)
      );
      expect(check(tree)).to.deep.equal([
        ambiguousColumnAccess("A.c", { line: 3, column: 3 }),
      ]);
    });

    it("should report each distinct access once, at its first occurrence", () => {
      const tree = project(
        filter(table("t"), b("=", at(col("x", "c"), 2, 1), int(1))),
        at(col("x", "c"), 1, 1),
        at(col("x", "d"), 1, 5)
      );
      expect(check(tree)).to.deep.equal([
        unresolvedCorrelationName("x.c", { line: 1, column: 1 }),
        unresolvedCorrelationName("x.d", { line: 1, column: 5 }),
      ]);
    });

    it("should look into every level of the tree", () => {
      const tree = project(
        sortBy(filter(table("t", "u"), b(">", at(col("t", "a"), 4, 4), int(1))), id("a")),
        id("a")
      );
      expect(check(tree)).to.deep.equal([
        unresolvedCorrelationName("t.a", { line: 4, column: 4 }),
      ]);
    });
  });
});
