/**
 * CLI help message
 */

import { VERSION } from "./constants.js";

/**
 * Show help message
 */
export const showHelp = (): void => {
  console.log(`
querycheck - static type and scope checker for query programs v${VERSION}

USAGE:
  querycheck <command> [options]

COMMANDS:
  check [files...]          Check program files (default: 'sources' from config)
  init                      Create a starter querycheck.json
  builtins                  List registered built-in signatures

GLOBAL OPTIONS:
  -h, --help                Show help
  -v, --version             Show version
  -V, --verbose             Verbose output
  -q, --quiet               Suppress output
  -c, --config <file>       Config file path (default: querycheck.json)

CHECK OPTIONS:
  --json                    Print diagnostics as JSON
  -m, --max-errors <n>      Print at most n diagnostics (0: no limit)

EXIT CODES:
  0                         No errors
  1                         Analysis reported errors
  2                         A program, signature or config file could not be loaded

EXAMPLES:
  querycheck init
  querycheck check queries/report.json
  querycheck check --json -m 20
  querycheck builtins -c ci/querycheck.json
`);
};
