/**
 * querycheck check command
 */

import { relative } from "node:path";
import {
  type Diagnostic,
  type FunctionEnvironment,
  type Program,
  type Result,
  analyzeProgram,
  builtinEnvironment,
  collect,
  createDiagnostic,
  createEnvironment,
  isDiagnosticError,
  loadProgramFile,
  loadSignatureFile,
} from "@querycheck/analyzer";
import { CONFIG_FILE_NAME } from "../config.js";
import type { ResolvedConfig } from "../types.js";

export type FileReport = {
  readonly file: string;
  readonly diagnostics: readonly Diagnostic[];
};

export type CheckReport = {
  readonly files: readonly FileReport[];
};

export type CheckSummary = {
  readonly files: number;
  readonly errors: number;
  /** Diagnostics to print, after the `maxErrors` cap */
  readonly shown: readonly Diagnostic[];
  readonly hidden: number;
};

/**
 * Bundled built-ins with every configured signature file registered on top
 */
export const loadEnvironment = (
  signatureFiles: readonly string[]
): Result<FunctionEnvironment, readonly Diagnostic[]> => {
  const loaded = collect(
    signatureFiles.map((file) => loadSignatureFile(file))
  );
  if (!loaded.ok) {
    return loaded;
  }

  return {
    ok: true,
    value: createEnvironment(loaded.value.flat(), builtinEnvironment()),
  };
};

const displayName = (config: ResolvedConfig, file: string): string =>
  relative(config.workingDirectory, file) || file;

const checkFile = (
  config: ResolvedConfig,
  environment: FunctionEnvironment,
  file: string,
  program: Program
): FileReport => {
  const display = displayName(config, file);

  if (config.verbose) {
    console.log(`Checking ${display} (${program.length} constructs)`);
  }

  const result = analyzeProgram(program, { environment, file: display });
  return { file: display, diagnostics: result.ok ? [] : result.error };
};

/**
 * Load and check every configured program file.
 * Fails only when something could not be loaded; analysis errors are
 * part of the report.
 */
export const checkCommand = (
  config: ResolvedConfig
): Result<CheckReport, readonly Diagnostic[]> => {
  if (config.sources.length === 0) {
    return {
      ok: false,
      error: [
        createDiagnostic(
          "QCK9012",
          "error",
          "No program files to check",
          undefined,
          `Name files on the command line or list them under 'sources' in ${CONFIG_FILE_NAME}.`
        ),
      ],
    };
  }

  const environment = loadEnvironment(config.builtins);
  if (!environment.ok) {
    return environment;
  }
  if (config.verbose && config.builtins.length > 0) {
    console.log(`Registered ${config.builtins.length} signature file(s)`);
  }

  const loaded = config.sources.map((file) => ({
    file,
    result: loadProgramFile(file),
  }));
  const failures = loaded.flatMap(({ result }) =>
    result.ok ? [] : result.error
  );
  if (failures.length > 0) {
    return { ok: false, error: failures };
  }

  return {
    ok: true,
    value: {
      files: loaded.flatMap(({ file, result }) =>
        result.ok ? [checkFile(config, environment.value, file, result.value)] : []
      ),
    },
  };
};

/**
 * Count errors and apply the print cap (0 = no cap)
 */
export const summarize = (
  report: CheckReport,
  maxErrors: number
): CheckSummary => {
  const diagnostics = report.files.flatMap((f) => f.diagnostics);
  const shown = maxErrors > 0 ? diagnostics.slice(0, maxErrors) : diagnostics;

  return {
    files: report.files.length,
    errors: diagnostics.filter(isDiagnosticError).length,
    shown,
    hidden: diagnostics.length - shown.length,
  };
};
