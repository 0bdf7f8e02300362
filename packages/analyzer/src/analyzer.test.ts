/**
 * Tests for the analyzer entry points
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { analyzeProgram, typeCheck } from "./analyzer.js";
import { badCall, typeMismatch } from "./checker/errors.js";
import { EMPTY_ENVIRONMENT } from "./functions/environment.js";
import type { Program, UdfDeclaration } from "./ast/statements.js";
import {
  P,
  at,
  b,
  call,
  filter,
  id,
  int,
  project,
  query,
  str,
  table,
} from "./ast/test-builders.js";

const udf = (name: string, params: readonly string[]): UdfDeclaration => ({
  kind: "udf",
  name,
  params,
  body: [],
  pos: P,
});

describe("Analyzer", () => {
  describe("analyzeProgram", () => {
    it("should return the program unchanged when it passes", () => {
      const program: Program = [
        query(project(table("t"), call("sqrt", id("x")))),
      ];

      const result = analyzeProgram(program);

      expect(result.ok).to.equal(true);
      if (result.ok) {
        expect(result.value).to.equal(program);
      }
    });

    it("should attach the file to every diagnostic", () => {
      const program: Program = [
        query(filter(table("t"), at(call("sqrt", str("a")), 2, 5))),
      ];

      const result = analyzeProgram(program, { file: "q.json" });

      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error).to.have.length(1);
        expect(result.error[0]?.code).to.equal("QCK1002");
        expect(result.error[0]?.location).to.deep.equal({
          file: "q.json",
          line: 2,
          column: 5,
        });
      }
    });

    it("should use the given environment in place of the built-ins", () => {
      const program: Program = [
        query(project(table("t"), call("sqrt", str("a")))),
      ];

      expect(analyzeProgram(program).ok).to.equal(false);
      expect(
        analyzeProgram(program, { environment: EMPTY_ENVIRONMENT }).ok
      ).to.equal(true);
    });
  });

  describe("typeCheck", () => {
    it("should resolve functions declared after their use", () => {
      const program: Program = [
        query(project(table("t"), at(call("f", int(1)), 1, 9))),
        udf("f", ["a", "b"]),
      ];

      expect(typeCheck(program)).to.deep.equal([
        badCall("f", { line: 1, column: 9 }),
      ]);
    });

    it("should let a declared function shadow a built-in", () => {
      const program: Program = [
        udf("sqrt", ["s"]),
        query(project(table("t"), call("sqrt", str("a")))),
      ];

      expect(typeCheck(program)).to.deep.equal([]);
    });

    it("should report a bad predicate against the built-ins", () => {
      const program: Program = [
        query(filter(table("t"), b("+", int(1), int(2)))),
      ];

      expect(typeCheck(program)).to.deep.equal([
        typeMismatch("boolean", "numeric", P),
      ]);
    });

    it("should give the same errors on every run", () => {
      const program: Program = [
        query(filter(table("t"), b("and", str("a"), call("avg", str("b"))))),
      ];

      expect(typeCheck(program)).to.deep.equal(typeCheck(program));
      expect(typeCheck(program)).to.have.length(2);
    });
  });
});
