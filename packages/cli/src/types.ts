/**
 * Type definitions for CLI
 */

export type { Result } from "@querycheck/analyzer";

/**
 * Configuration file (querycheck.json)
 */
export type QuerycheckConfig = {
  /** Program files checked when none are given on the command line */
  readonly sources?: readonly string[];
  /** Extra signature files, registered over the bundled built-ins */
  readonly builtins?: readonly string[];
  /** Cap on printed diagnostics; 0 prints all */
  readonly maxErrors?: number;
};

/**
 * CLI options (from command line)
 */
export type CliOptions = {
  verbose?: boolean;
  quiet?: boolean;
  config?: string;
  json?: boolean;
  maxErrors?: number;
};

/**
 * Resolved configuration (after merging config file + CLI args).
 * All paths are absolute.
 */
export type ResolvedConfig = {
  readonly projectRoot: string;
  readonly workingDirectory: string;
  readonly sources: readonly string[];
  readonly builtins: readonly string[];
  readonly maxErrors: number;
  readonly json: boolean;
  readonly verbose: boolean;
  readonly quiet: boolean;
};
