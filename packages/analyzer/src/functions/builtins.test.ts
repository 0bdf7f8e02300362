/**
 * Tests for the built-in signature registry and its loader
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import {
  builtinEnvironment,
  loadSignatureFile,
  parseSignatureFile,
} from "./builtins.js";
import { lookupSignature } from "./environment.js";
import { applySignature } from "./signature.js";

describe("Built-in signatures", () => {
  describe("bundled registry", () => {
    it("should type common aggregates", () => {
      const env = builtinEnvironment();
      const sum = lookupSignature(env, "sum");
      const like = lookupSignature(env, "like");

      expect(sum?.kind).to.equal("builtin");
      if (sum && like) {
        expect(applySignature(sum, ["boolean"])).to.equal("numeric");
        expect(applySignature(sum, ["string"])).to.equal(undefined);
        expect(applySignature(like, ["unknown", "string"])).to.equal("boolean");
      }
    });

    it("should return the same environment on every call", () => {
      expect(builtinEnvironment()).to.equal(builtinEnvironment());
    });
  });

  describe("parseSignatureFile", () => {
    it("should build signatures from valid data", () => {
      const result = parseSignatureFile(
        {
          functions: [
            {
              name: "clamp",
              overloads: [
                { params: [["numeric"], ["numeric"], ["numeric"]], returns: "numeric" },
              ],
            },
            {
              name: "concat",
              overloads: [{ params: [], rest: ["string"], returns: "string" }],
            },
          ],
        },
        "extra.json"
      );

      expect(result.ok).to.equal(true);
      if (result.ok) {
        expect(result.value.map((s) => s.name)).to.deep.equal(["clamp", "concat"]);
        const [clamp, concat] = result.value;
        if (clamp && concat) {
          expect(applySignature(clamp, ["numeric", "numeric", "numeric"])).to.equal("numeric");
          expect(applySignature(concat, ["string", "string"])).to.equal("string");
        }
      }
    });

    it("should reject a document without a functions array", () => {
      const result = parseSignatureFile({ fns: [] }, "extra.json");
      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.map((d) => d.code)).to.deep.equal(["QCK9008"]);
        expect(result.error[0]?.message).to.equal(
          "extra.json: expected an object with a 'functions' array"
        );
      }
    });

    it("should report every malformed entry", () => {
      const result = parseSignatureFile(
        {
          functions: [
            { overloads: [] },
            { name: "f", overloads: [{ params: [["numeric"]], returns: "number" }] },
            { name: "g", overloads: [{ params: [["unit"]], returns: "unknown" }] },
          ],
        },
        "bad.json"
      );
      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.map((d) => d.message)).to.deep.equal([
          "function 0 in bad.json: missing or invalid 'name'",
          "f overload 0 in bad.json: 'returns' must be a type tag",
          "g overload 0 in bad.json param 0: type tags must be one of numeric, boolean, string, unknown",
        ]);
      }
    });
  });

  describe("loadSignatureFile", () => {
    it("should load a file from disk", () => {
      const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "querycheck-test-"));
      const filePath = path.join(tmpDir, "extra.json");
      fs.writeFileSync(
        filePath,
        JSON.stringify({
          functions: [{ name: "half", overloads: [{ params: [["numeric"]], returns: "numeric" }] }],
        })
      );

      const result = loadSignatureFile(filePath);
      fs.rmSync(tmpDir, { recursive: true });

      expect(result.ok).to.equal(true);
      if (result.ok) {
        expect(result.value[0]?.name).to.equal("half");
      }
    });

    it("should report a missing file", () => {
      const result = loadSignatureFile("/nonexistent/extra.json");
      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error[0]?.code).to.equal("QCK9005");
      }
    });

    it("should report invalid JSON", () => {
      const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "querycheck-test-"));
      const filePath = path.join(tmpDir, "broken.json");
      fs.writeFileSync(filePath, "{ not json");

      const result = loadSignatureFile(filePath);
      fs.rmSync(tmpDir, { recursive: true });

      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error[0]?.code).to.equal("QCK9007");
      }
    });
  });
});
