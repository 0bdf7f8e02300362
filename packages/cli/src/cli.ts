/**
 * CLI argument parsing and command dispatch
 * Main dispatcher - re-exports from cli/ subdirectory
 */

export { VERSION, showHelp, parseArgs, runCli } from "./cli/index.js";
export {
  CONFIG_FILE_NAME,
  findConfig,
  loadConfig,
  parseConfig,
  resolveConfig,
} from "./config.js";
export type { QuerycheckConfig, CliOptions, ResolvedConfig } from "./types.js";
