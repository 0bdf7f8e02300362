#!/usr/bin/env -S node --import tsx
/**
 * querycheck CLI - static checks for serialized query programs
 */

import { runCli } from "./cli.js";

// Run CLI with arguments (skip node and script name)
const args = process.argv.slice(2);

runCli(args)
  .then((exitCode) => {
    process.exit(exitCode);
  })
  .catch((error: unknown) => {
    console.error("Fatal error:", error);
    process.exit(2);
  });

// Export for testing
export { runCli } from "./cli.js";
export * from "./types.js";
export * from "./config.js";
