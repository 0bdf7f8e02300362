/**
 * The soft type lattice.
 *
 * Most values only get a concrete type at runtime, so `unknown` is accepted
 * wherever a tag is expected and an expectation that includes `unknown`
 * accepts anything. `unit` only stands in for a missing type when a list
 * the parser guarantees to be non-empty turns out empty.
 */

export type TypeTag = "numeric" | "boolean" | "string" | "unknown" | "unit";

export type TypeTagSet = ReadonlySet<TypeTag>;

export const BOOL: TypeTagSet = new Set<TypeTag>(["boolean"]);
export const NUM: TypeTagSet = new Set<TypeTag>(["numeric"]);
// Booleans allowed so `c1 * c2 > 2` style 0/1 arithmetic checks
export const NUM_AND_BOOL: TypeTagSet = new Set<TypeTag>(["numeric", "boolean"]);

export const tagSet = (...tags: readonly TypeTag[]): TypeTagSet =>
  new Set(tags);

export const tagMatches = (expected: TypeTagSet, actual: TypeTag): boolean =>
  expected.has(actual) || actual === "unknown" || expected.has("unknown");

/**
 * Tag reported as "expected" in a mismatch: the first of the set
 */
export const primaryTag = (expected: TypeTagSet): TypeTag => {
  for (const tag of expected) {
    return tag;
  }
  return "unit";
};

const TAG_NAMES: Readonly<Record<TypeTag, string>> = {
  numeric: "Numeric",
  boolean: "Boolean",
  string: "String",
  unknown: "Unknown",
  unit: "Unit",
};

export const tagName = (tag: TypeTag): string => TAG_NAMES[tag];

export const isTypeTag = (value: unknown): value is TypeTag =>
  typeof value === "string" && Object.hasOwn(TAG_NAMES, value);
