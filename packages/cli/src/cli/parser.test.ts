/**
 * Tests for CLI argument parser
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { parseArgs } from "./parser.js";

describe("CLI Parser", () => {
  describe("parseArgs", () => {
    describe("Commands", () => {
      it("should parse check command", () => {
        const result = parseArgs(["check"]);
        expect(result.command).to.equal("check");
        expect(result.files).to.deep.equal([]);
      });

      it("should parse help command from --help", () => {
        const result = parseArgs(["--help"]);
        expect(result.command).to.equal("help");
      });

      it("should parse help command from -h after other args", () => {
        const result = parseArgs(["check", "a.json", "-h"]);
        expect(result.command).to.equal("help");
        expect(result.files).to.deep.equal([]);
      });

      it("should parse version command from -v", () => {
        const result = parseArgs(["-v"]);
        expect(result.command).to.equal("version");
      });

      it("should leave command empty when none is given", () => {
        const result = parseArgs([]);
        expect(result.command).to.equal("");
      });
    });

    describe("Files", () => {
      it("should collect every positional arg after the command", () => {
        const result = parseArgs(["check", "a.json", "queries/b.json"]);
        expect(result.files).to.deep.equal(["a.json", "queries/b.json"]);
      });

      it("should treat args after -- as files", () => {
        const result = parseArgs(["check", "--", "-odd.json"]);
        expect(result.files).to.deep.equal(["-odd.json"]);
      });
    });

    describe("Options", () => {
      it("should parse verbose and quiet flags", () => {
        expect(parseArgs(["check", "-V"]).options.verbose).to.equal(true);
        expect(parseArgs(["check", "--quiet"]).options.quiet).to.equal(true);
      });

      it("should parse config with its value", () => {
        const result = parseArgs(["check", "--config", "conf/qc.json", "a.json"]);
        expect(result.options.config).to.equal("conf/qc.json");
        expect(result.files).to.deep.equal(["a.json"]);
      });

      it("should reject --config without a path", () => {
        const result = parseArgs(["check", "-c"]);
        expect(result.options.config).to.equal(undefined);
        expect(result.error).to.equal("'-c' expects a file path");
      });

      it("should parse --json", () => {
        expect(parseArgs(["check", "--json"]).options.json).to.equal(true);
      });

      it("should parse --max-errors as a number", () => {
        const result = parseArgs(["check", "-m", "5"]);
        expect(result.options.maxErrors).to.equal(5);
        expect(result.error).to.equal(undefined);
      });

      it("should reject a --max-errors value that is not a count", () => {
        const result = parseArgs(["check", "--max-errors", "many"]);
        expect(result.error).to.equal(
          "'--max-errors' expects a non-negative integer, got 'many'"
        );
      });

      it("should reject unknown options", () => {
        const result = parseArgs(["check", "--fast"]);
        expect(result.error).to.equal("Unknown option '--fast'");
      });

      it("should accept options before the command", () => {
        const result = parseArgs(["-q", "check", "a.json"]);
        expect(result.command).to.equal("check");
        expect(result.options.quiet).to.equal(true);
        expect(result.files).to.deep.equal(["a.json"]);
      });
    });
  });
});
