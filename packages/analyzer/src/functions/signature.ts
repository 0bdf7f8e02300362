/**
 * Call signatures
 */

import {
  type TypeTag,
  type TypeTagSet,
  tagMatches,
} from "../types/type-tag.js";

/**
 * One accepted shape of a built-in: a tag set per positional parameter,
 * plus an optional tag set every further argument must satisfy.
 */
export type BuiltinOverload = {
  readonly params: readonly TypeTagSet[];
  readonly rest?: TypeTagSet;
  readonly returns: TypeTag;
};

export type BuiltinSignature = {
  readonly kind: "builtin";
  readonly name: string;
  readonly overloads: readonly BuiltinOverload[];
};

/**
 * User-defined functions are only checked for argument count and always
 * return `unknown`.
 */
export type UdfSignature = {
  readonly kind: "udf";
  readonly name: string;
  readonly arity: number;
};

export type CallSignature = BuiltinSignature | UdfSignature;

const overloadAccepts = (
  overload: BuiltinOverload,
  argTypes: readonly TypeTag[]
): boolean => {
  const { params, rest } = overload;
  if (argTypes.length < params.length) return false;
  if (argTypes.length > params.length && !rest) return false;

  return argTypes.every((arg, i) => {
    const expected = params[i] ?? rest;
    return expected !== undefined && tagMatches(expected, arg);
  });
};

/**
 * Return type for a call with the given argument types, or undefined when
 * no overload accepts them. Unknown arguments can satisfy several overloads;
 * if those disagree on the return type the result is `unknown`.
 */
export const applySignature = (
  signature: CallSignature,
  argTypes: readonly TypeTag[]
): TypeTag | undefined => {
  switch (signature.kind) {
    case "udf":
      return argTypes.length === signature.arity ? "unknown" : undefined;

    case "builtin": {
      const returns = signature.overloads
        .filter((o) => overloadAccepts(o, argTypes))
        .map((o) => o.returns);
      const [first, ...others] = returns;
      if (first === undefined) return undefined;
      return others.every((r) => r === first) ? first : "unknown";
    }
  }
};

export const udfSignature = (name: string, arity: number): UdfSignature => ({
  kind: "udf",
  name,
  arity,
});
