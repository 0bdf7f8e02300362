/**
 * querycheck init command
 */

import { writeFileSync, existsSync } from "node:fs";
import { join } from "node:path";
import { CONFIG_FILE_NAME } from "../config.js";
import type { QuerycheckConfig, Result } from "../types.js";

export const DEFAULT_CONFIG: QuerycheckConfig = {
  sources: [],
  builtins: [],
  maxErrors: 0,
};

/**
 * Write a starter querycheck.json into `cwd`, returning its path
 */
export const initProject = (cwd: string): Result<string, string> => {
  const configPath = join(cwd, CONFIG_FILE_NAME);

  if (existsSync(configPath)) {
    return {
      ok: false,
      error: `${CONFIG_FILE_NAME} already exists. Project is already initialized.`,
    };
  }

  try {
    writeFileSync(
      configPath,
      JSON.stringify(DEFAULT_CONFIG, null, 2) + "\n",
      "utf-8"
    );
    return { ok: true, value: configPath };
  } catch (error) {
    return {
      ok: false,
      error: `Failed to write ${CONFIG_FILE_NAME}: ${error instanceof Error ? error.message : String(error)}`,
    };
  }
};
