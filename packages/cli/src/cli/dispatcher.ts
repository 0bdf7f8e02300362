/**
 * CLI command dispatcher
 */

import { dirname, resolve } from "node:path";
import {
  type Diagnostic,
  formatDiagnostic,
} from "@querycheck/analyzer";
import { loadConfig, findConfig, resolveConfig } from "../config.js";
import { checkCommand, loadEnvironment, summarize } from "../commands/check.js";
import { initProject } from "../commands/init.js";
import { listSignatures } from "../commands/builtins.js";
import type { Result, ResolvedConfig } from "../types.js";
import { VERSION } from "./constants.js";
import { showHelp } from "./help.js";
import { parseArgs, type ParsedArgs } from "./parser.js";

const EXIT_OK = 0;
const EXIT_ERRORS = 1;
const EXIT_LOAD_FAILURE = 2;

const printDiagnostics = (
  diagnostics: readonly Diagnostic[],
  json: boolean
): void => {
  if (json) {
    console.log(JSON.stringify({ diagnostics }, null, 2));
    return;
  }
  for (const diagnostic of diagnostics) {
    console.error(formatDiagnostic(diagnostic));
  }
};

/**
 * Config file is optional: without one, the working directory is the
 * project root and only command-line files are checked.
 */
const loadResolvedConfig = (
  parsed: ParsedArgs,
  cwd: string
): Result<ResolvedConfig, Diagnostic> => {
  const configPath =
    parsed.options.config !== undefined
      ? resolve(cwd, parsed.options.config)
      : findConfig(cwd);

  if (!configPath) {
    return {
      ok: true,
      value: resolveConfig({}, parsed.options, cwd, cwd, parsed.files),
    };
  }

  const configResult = loadConfig(configPath);
  if (!configResult.ok) {
    return configResult;
  }

  if (parsed.options.verbose) {
    console.log(`Using ${configPath}`);
  }

  return {
    ok: true,
    value: resolveConfig(
      configResult.value,
      parsed.options,
      dirname(configPath),
      cwd,
      parsed.files
    ),
  };
};

const runCheck = (config: ResolvedConfig): number => {
  const result = checkCommand(config);
  if (!result.ok) {
    printDiagnostics(result.error, config.json);
    return EXIT_LOAD_FAILURE;
  }

  const summary = summarize(result.value, config.maxErrors);

  if (config.json) {
    console.log(
      JSON.stringify(
        {
          files: summary.files,
          errors: summary.errors,
          diagnostics: summary.shown,
        },
        null,
        2
      )
    );
    return summary.errors > 0 ? EXIT_ERRORS : EXIT_OK;
  }

  printDiagnostics(summary.shown, false);
  if (summary.hidden > 0) {
    console.error(`... ${summary.hidden} more not shown (max-errors ${config.maxErrors})`);
  }

  if (!config.quiet) {
    if (summary.errors > 0) {
      console.log(`✗ ${summary.errors} error(s) in ${summary.files} file(s)`);
    } else {
      console.log(`✓ Checked ${summary.files} file(s), no errors`);
    }
  }

  return summary.errors > 0 ? EXIT_ERRORS : EXIT_OK;
};

const runBuiltins = (config: ResolvedConfig): number => {
  const environment = loadEnvironment(config.builtins);
  if (!environment.ok) {
    printDiagnostics(environment.error, config.json);
    return EXIT_LOAD_FAILURE;
  }

  const lines = listSignatures(environment.value);
  if (config.json) {
    console.log(JSON.stringify({ signatures: lines }, null, 2));
  } else {
    for (const line of lines) {
      console.log(line);
    }
  }
  return EXIT_OK;
};

/**
 * Main CLI entry point
 */
export const runCli = async (
  args: string[],
  cwd: string = process.cwd()
): Promise<number> => {
  const parsed = parseArgs(args);

  if (parsed.error) {
    console.error(`Error: ${parsed.error}`);
    console.error("Run 'querycheck --help' for usage information");
    return EXIT_LOAD_FAILURE;
  }

  // Handle version and help
  if (parsed.command === "version") {
    console.log(`querycheck v${VERSION}`);
    return EXIT_OK;
  }

  if (parsed.command === "help" || !parsed.command) {
    showHelp();
    return EXIT_OK;
  }

  // Handle init (doesn't need config)
  if (parsed.command === "init") {
    const result = initProject(cwd);
    if (!result.ok) {
      console.error(`Error: ${result.error}`);
      return EXIT_ERRORS;
    }
    if (!parsed.options.quiet) {
      console.log(`✓ Created ${result.value}`);
      console.log("\nNext steps:");
      console.log("  1. List your program files under 'sources'");
      console.log("  2. Run: querycheck check");
    }
    return EXIT_OK;
  }

  if (parsed.command !== "check" && parsed.command !== "builtins") {
    console.error(`Error: Unknown command '${parsed.command}'`);
    console.error("Run 'querycheck --help' for usage information");
    return EXIT_LOAD_FAILURE;
  }

  const config = loadResolvedConfig(parsed, cwd);
  if (!config.ok) {
    printDiagnostics([config.error], parsed.options.json ?? false);
    return EXIT_LOAD_FAILURE;
  }

  return parsed.command === "check"
    ? runCheck(config.value)
    : runBuiltins(config.value);
};
