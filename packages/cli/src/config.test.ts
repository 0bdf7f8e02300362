/**
 * Tests for configuration loading and resolution
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { findConfig, loadConfig, parseConfig, resolveConfig } from "./config.js";

describe("Config", () => {
  describe("parseConfig", () => {
    it("should accept every field", () => {
      const result = parseConfig(
        { sources: ["a.json"], builtins: ["extra.json"], maxErrors: 10 },
        "querycheck.json"
      );

      expect(result.ok).to.equal(true);
      if (!result.ok) return;
      expect(result.value.sources).to.deep.equal(["a.json"]);
      expect(result.value.builtins).to.deep.equal(["extra.json"]);
      expect(result.value.maxErrors).to.equal(10);
    });

    it("should accept an empty object", () => {
      const result = parseConfig({}, "querycheck.json");
      expect(result.ok).to.equal(true);
    });

    it("should reject sources that are not strings", () => {
      const result = parseConfig({ sources: ["a.json", 3] }, "querycheck.json");

      expect(result.ok).to.equal(false);
      if (result.ok) return;
      expect(result.error.code).to.equal("QCK9011");
      expect(result.error.message).to.equal(
        "querycheck.json: 'sources' must be an array of strings"
      );
    });

    it("should reject a negative maxErrors", () => {
      const result = parseConfig({ maxErrors: -1 }, "qc.json");

      expect(result.ok).to.equal(false);
      if (result.ok) return;
      expect(result.error.message).to.equal(
        "qc.json: 'maxErrors' must be a non-negative integer"
      );
    });

    it("should reject a document that is not an object", () => {
      const result = parseConfig(["a.json"], "qc.json");

      expect(result.ok).to.equal(false);
      if (result.ok) return;
      expect(result.error.message).to.equal("qc.json: expected an object");
    });
  });

  describe("loadConfig", () => {
    it("should report a missing file", () => {
      const result = loadConfig("/nonexistent/querycheck.json");

      expect(result.ok).to.equal(false);
      if (result.ok) return;
      expect(result.error.code).to.equal("QCK9009");
    });

    it("should report invalid JSON", () => {
      const dir = mkdtempSync(join(tmpdir(), "querycheck-config-json-"));

      try {
        const configPath = join(dir, "querycheck.json");
        writeFileSync(configPath, "{ sources: ", "utf-8");

        const result = loadConfig(configPath);
        expect(result.ok).to.equal(false);
        if (result.ok) return;
        expect(result.error.code).to.equal("QCK9010");
      } finally {
        rmSync(dir, { recursive: true, force: true });
      }
    });
  });

  describe("findConfig", () => {
    it("should find querycheck.json in a parent directory", () => {
      const root = mkdtempSync(join(tmpdir(), "querycheck-find-"));

      try {
        const nested = join(root, "queries", "daily");
        mkdirSync(nested, { recursive: true });
        writeFileSync(join(root, "querycheck.json"), "{}\n", "utf-8");

        expect(findConfig(nested)).to.equal(join(root, "querycheck.json"));
      } finally {
        rmSync(root, { recursive: true, force: true });
      }
    });
  });

  describe("resolveConfig", () => {
    it("should resolve sources and builtins against the project root", () => {
      const result = resolveConfig(
        { sources: ["q/a.json"], builtins: ["sig.json"], maxErrors: 3 },
        {},
        "/project",
        "/project/q"
      );

      expect(result.sources).to.deep.equal(["/project/q/a.json"]);
      expect(result.builtins).to.deep.equal(["/project/sig.json"]);
      expect(result.maxErrors).to.equal(3);
      expect(result.json).to.equal(false);
      expect(result.verbose).to.equal(false);
      expect(result.quiet).to.equal(false);
    });

    it("should replace sources with files from the command line", () => {
      const result = resolveConfig(
        { sources: ["q/a.json"] },
        {},
        "/project",
        "/work",
        ["b.json"]
      );

      expect(result.sources).to.deep.equal(["/work/b.json"]);
    });

    it("should override config with CLI options", () => {
      const result = resolveConfig(
        { maxErrors: 3 },
        { maxErrors: 0, json: true, quiet: true },
        "/project",
        "/project"
      );

      expect(result.maxErrors).to.equal(0);
      expect(result.json).to.equal(true);
      expect(result.quiet).to.equal(true);
    });
  });
});
