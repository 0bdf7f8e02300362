/**
 * CLI argument parser
 */

import type { CliOptions } from "../types.js";

export type ParsedArgs = {
  command: string;
  files: string[];
  options: CliOptions;
  /** Set when an option value could not be read */
  error?: string;
};

const parseCount = (value: string | undefined): number | undefined => {
  if (value === undefined || !/^\d+$/.test(value)) {
    return undefined;
  }
  return Number(value);
};

/**
 * Parse CLI arguments
 */
export const parseArgs = (args: string[]): ParsedArgs => {
  const options: CliOptions = {};
  let command = "";
  const files: string[] = [];
  let onlyFiles = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg) continue; // Skip if undefined

    // Everything after -- is a file, even if it starts with a dash
    if (arg === "--") {
      onlyFiles = true;
      continue;
    }

    // Commands
    if (!command && (onlyFiles || !arg.startsWith("-"))) {
      command = arg;
      continue;
    }

    // Positional args after the command are program files
    if (command && (onlyFiles || !arg.startsWith("-"))) {
      files.push(arg);
      continue;
    }

    // Options
    switch (arg) {
      case "-h":
      case "--help":
        return { command: "help", files: [], options: {} };
      case "-v":
      case "--version":
        return { command: "version", files: [], options: {} };
      case "-V":
      case "--verbose":
        options.verbose = true;
        break;
      case "-q":
      case "--quiet":
        options.quiet = true;
        break;
      case "-c":
      case "--config": {
        const value = args[++i];
        if (!value) {
          return {
            command,
            files,
            options,
            error: `'${arg}' expects a file path`,
          };
        }
        options.config = value;
        break;
      }
      case "--json":
        options.json = true;
        break;
      case "-m":
      case "--max-errors": {
        const value = args[++i];
        const count = parseCount(value);
        if (count === undefined) {
          return {
            command,
            files,
            options,
            error: `'${arg}' expects a non-negative integer, got '${value ?? ""}'`,
          };
        }
        options.maxErrors = count;
        break;
      }
      default:
        return { command, files, options, error: `Unknown option '${arg}'` };
    }
  }

  return { command, files, options };
};
