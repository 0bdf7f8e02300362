/**
 * Built-in signature registry.
 *
 * Signatures are data (builtins.json beside this module). User-supplied
 * files use the same shape and are validated the same way:
 *
 *   { "functions": [ { "name": "abs", "overloads": [
 *       { "params": [["numeric"]], "returns": "numeric" } ] } ] }
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import type { Result } from "../types/result.js";
import type { Diagnostic } from "../types/diagnostic.js";
import {
  type TypeTag,
  type TypeTagSet,
  isTypeTag,
  tagSet,
} from "../types/type-tag.js";
import type { BuiltinOverload, BuiltinSignature } from "./signature.js";
import {
  type FunctionEnvironment,
  createEnvironment,
} from "./environment.js";

const BUNDLED_SIGNATURES = fileURLToPath(
  new URL("./builtins.json", import.meta.url)
);

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

// "unit" is internal to the checker
const isDeclarableTag = (value: unknown): value is TypeTag =>
  isTypeTag(value) && value !== "unit";

const malformed = (message: string): Diagnostic => ({
  code: "QCK9008",
  severity: "error",
  message,
});

const parseTagSet = (
  value: unknown,
  context: string
): Result<TypeTagSet, Diagnostic[]> => {
  if (!Array.isArray(value) || value.length === 0) {
    return {
      ok: false,
      error: [malformed(`${context}: expected a non-empty array of type tags`)],
    };
  }

  const tags = value.filter(isDeclarableTag);
  if (tags.length !== value.length) {
    return {
      ok: false,
      error: [
        malformed(
          `${context}: type tags must be one of numeric, boolean, string, unknown`
        ),
      ],
    };
  }

  return { ok: true, value: tagSet(...tags) };
};

const parseOverload = (
  data: unknown,
  context: string
): Result<BuiltinOverload, Diagnostic[]> => {
  if (!isRecord(data)) {
    return { ok: false, error: [malformed(`${context}: must be an object`)] };
  }

  const diagnostics: Diagnostic[] = [];
  const params: TypeTagSet[] = [];

  if (!Array.isArray(data.params)) {
    diagnostics.push(malformed(`${context}: 'params' must be an array`));
  } else {
    data.params.forEach((p, i) => {
      const parsed = parseTagSet(p, `${context} param ${i}`);
      if (parsed.ok) {
        params.push(parsed.value);
      } else {
        diagnostics.push(...parsed.error);
      }
    });
  }

  let rest: TypeTagSet | undefined;
  if (data.rest !== undefined) {
    const parsed = parseTagSet(data.rest, `${context} rest`);
    if (parsed.ok) {
      rest = parsed.value;
    } else {
      diagnostics.push(...parsed.error);
    }
  }

  const returns = data.returns;
  if (!isDeclarableTag(returns)) {
    diagnostics.push(malformed(`${context}: 'returns' must be a type tag`));
    return { ok: false, error: diagnostics };
  }

  if (diagnostics.length > 0) {
    return { ok: false, error: diagnostics };
  }

  return {
    ok: true,
    value: rest ? { params, rest, returns } : { params, returns },
  };
};

/**
 * Validate parsed JSON against the signature file shape.
 *
 * @param source - Shown in diagnostics
 */
export const parseSignatureFile = (
  data: unknown,
  source: string
): Result<readonly BuiltinSignature[], Diagnostic[]> => {
  if (!isRecord(data) || !Array.isArray(data.functions)) {
    return {
      ok: false,
      error: [malformed(`${source}: expected an object with a 'functions' array`)],
    };
  }

  const diagnostics: Diagnostic[] = [];
  const signatures: BuiltinSignature[] = [];

  data.functions.forEach((entry: unknown, i) => {
    const context = `function ${i} in ${source}`;
    if (!isRecord(entry) || typeof entry.name !== "string" || entry.name === "") {
      diagnostics.push(malformed(`${context}: missing or invalid 'name'`));
      return;
    }
    if (!Array.isArray(entry.overloads) || entry.overloads.length === 0) {
      diagnostics.push(
        malformed(`${context} (${entry.name}): 'overloads' must be a non-empty array`)
      );
      return;
    }

    const name = entry.name;
    const overloads: BuiltinOverload[] = [];
    entry.overloads.forEach((o: unknown, j) => {
      const parsed = parseOverload(o, `${name} overload ${j} in ${source}`);
      if (parsed.ok) {
        overloads.push(parsed.value);
      } else {
        diagnostics.push(...parsed.error);
      }
    });

    signatures.push({ kind: "builtin", name, overloads });
  });

  if (diagnostics.length > 0) {
    return { ok: false, error: diagnostics };
  }

  return { ok: true, value: signatures };
};

/**
 * Load and validate a signature file from disk
 */
export const loadSignatureFile = (
  filePath: string
): Result<readonly BuiltinSignature[], Diagnostic[]> => {
  if (!fs.existsSync(filePath)) {
    return {
      ok: false,
      error: [
        {
          code: "QCK9005",
          severity: "error",
          message: `Signature file not found: ${filePath}`,
        },
      ],
    };
  }

  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf-8");
  } catch (error) {
    return {
      ok: false,
      error: [
        {
          code: "QCK9006",
          severity: "error",
          message: `Failed to read signature file: ${error instanceof Error ? error.message : String(error)}`,
        },
      ],
    };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    return {
      ok: false,
      error: [
        {
          code: "QCK9007",
          severity: "error",
          message: `Invalid JSON in signature file ${path.basename(filePath)}: ${error instanceof Error ? error.message : String(error)}`,
        },
      ],
    };
  }

  return parseSignatureFile(parsed, path.basename(filePath));
};

let bundled: FunctionEnvironment | undefined;

/**
 * Environment holding the bundled built-ins. Throws if the bundled file
 * itself is broken, which is a packaging fault rather than a user error.
 */
export const builtinEnvironment = (): FunctionEnvironment => {
  if (!bundled) {
    const result = loadSignatureFile(BUNDLED_SIGNATURES);
    if (!result.ok) {
      throw new Error(
        `Bundled builtin signatures are invalid: ${result.error.map((d) => d.message).join("; ")}`
      );
    }
    bundled = createEnvironment(result.value);
  }
  return bundled;
};
