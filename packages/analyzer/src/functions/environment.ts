/**
 * Function environment: function name -> call signature.
 *
 * Built once before analysis and only read afterwards. Registering returns
 * a new environment; an existing one never changes.
 */

import type { CallSignature } from "./signature.js";

export type FunctionEnvironment = {
  readonly signatures: ReadonlyMap<string, CallSignature>;
};

export const EMPTY_ENVIRONMENT: FunctionEnvironment = { signatures: new Map() };

export const createEnvironment = (
  signatures: readonly CallSignature[] = [],
  base: FunctionEnvironment = EMPTY_ENVIRONMENT
): FunctionEnvironment =>
  signatures.reduce<FunctionEnvironment>(
    (env, signature) => registerSignature(env, signature),
    base
  );

export const lookupSignature = (
  env: FunctionEnvironment,
  name: string
): CallSignature | undefined => env.signatures.get(name);

/**
 * Register a signature under its name, replacing any earlier one
 */
export const registerSignature = (
  env: FunctionEnvironment,
  signature: CallSignature
): FunctionEnvironment => ({
  signatures: new Map(env.signatures).set(signature.name, signature),
});
