/**
 * querycheck builtins command
 */

import type {
  BuiltinOverload,
  CallSignature,
  FunctionEnvironment,
  TypeTagSet,
} from "@querycheck/analyzer";

const formatTags = (tags: TypeTagSet): string => [...tags].join("|");

const formatOverload = (name: string, overload: BuiltinOverload): string => {
  const params = overload.params.map(formatTags);
  const rest = overload.rest ? [`...${formatTags(overload.rest)}`] : [];
  return `${name}(${[...params, ...rest].join(", ")}) -> ${overload.returns}`;
};

const formatSignature = (signature: CallSignature): readonly string[] => {
  switch (signature.kind) {
    case "builtin":
      return signature.overloads.map((o) => formatOverload(signature.name, o));
    case "udf":
      return [`${signature.name}/${signature.arity} -> unknown`];
  }
};

/**
 * One line per overload, sorted by function name
 */
export const listSignatures = (env: FunctionEnvironment): readonly string[] =>
  [...env.signatures.values()]
    .sort((a, b) => a.name.localeCompare(b.name))
    .flatMap(formatSignature);
