/**
 * Configuration loading and validation
 */

import { readFileSync, existsSync } from "node:fs";
import { basename, join, resolve, dirname } from "node:path";
import { type Diagnostic, createDiagnostic } from "@querycheck/analyzer";
import type {
  QuerycheckConfig,
  CliOptions,
  ResolvedConfig,
  Result,
} from "./types.js";

export const CONFIG_FILE_NAME = "querycheck.json";

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isStringList = (value: unknown): value is readonly string[] =>
  Array.isArray(value) && value.every((item) => typeof item === "string");

const isCount = (value: unknown): value is number =>
  typeof value === "number" && Number.isInteger(value) && value >= 0;

const invalidField = (
  file: string,
  message: string
): Result<QuerycheckConfig, Diagnostic> => ({
  ok: false,
  error: createDiagnostic("QCK9011", "error", `${file}: ${message}`),
});

/**
 * Validate parsed JSON as a configuration
 *
 * @param file - Shown in diagnostics
 */
export const parseConfig = (
  data: unknown,
  file: string
): Result<QuerycheckConfig, Diagnostic> => {
  if (!isRecord(data)) {
    return invalidField(file, "expected an object");
  }

  const { sources, builtins, maxErrors } = data;

  if (sources !== undefined && !isStringList(sources)) {
    return invalidField(file, "'sources' must be an array of strings");
  }
  if (builtins !== undefined && !isStringList(builtins)) {
    return invalidField(file, "'builtins' must be an array of strings");
  }
  if (maxErrors !== undefined && !isCount(maxErrors)) {
    return invalidField(file, "'maxErrors' must be a non-negative integer");
  }

  return { ok: true, value: { sources, builtins, maxErrors } };
};

/**
 * Load querycheck.json
 */
export const loadConfig = (
  configPath: string
): Result<QuerycheckConfig, Diagnostic> => {
  if (!existsSync(configPath)) {
    return {
      ok: false,
      error: createDiagnostic(
        "QCK9009",
        "error",
        `Config file not found: ${configPath}`
      ),
    };
  }

  let data: unknown;
  try {
    data = JSON.parse(readFileSync(configPath, "utf-8"));
  } catch (error) {
    return {
      ok: false,
      error: createDiagnostic(
        "QCK9010",
        "error",
        `Failed to parse ${basename(configPath)}: ${error instanceof Error ? error.message : String(error)}`
      ),
    };
  }

  return parseConfig(data, basename(configPath));
};

/**
 * Find querycheck.json by walking up the directory tree
 */
export const findConfig = (startDir: string): string | null => {
  let currentDir = resolve(startDir);

  // Walk up until we find querycheck.json or hit root
  while (true) {
    const configPath = join(currentDir, CONFIG_FILE_NAME);
    if (existsSync(configPath)) {
      return configPath;
    }

    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }
};

/**
 * Resolve final configuration from file + CLI args.
 * Files named on the command line replace `sources` and are taken
 * relative to the working directory; paths from the file are taken
 * relative to the directory holding it.
 *
 * @param projectRoot - Directory containing querycheck.json
 */
export const resolveConfig = (
  config: QuerycheckConfig,
  cliOptions: CliOptions,
  projectRoot: string,
  workingDirectory: string,
  files: readonly string[] = []
): ResolvedConfig => ({
  projectRoot,
  workingDirectory,
  sources:
    files.length > 0
      ? files.map((file) => resolve(workingDirectory, file))
      : (config.sources ?? []).map((file) => resolve(projectRoot, file)),
  builtins: (config.builtins ?? []).map((file) => resolve(projectRoot, file)),
  maxErrors: cliOptions.maxErrors ?? config.maxErrors ?? 0,
  json: cliOptions.json ?? false,
  verbose: cliOptions.verbose ?? false,
  quiet: cliOptions.quiet ?? false,
});
