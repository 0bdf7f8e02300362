/**
 * Table scope of a query: which tables are bound, under which names, and
 * whether `t.c` references resolve against them.
 */

import {
  type ColumnAccessExpr,
  type Expr,
  childExpressions,
} from "../ast/expressions.js";
import {
  type RelAlg,
  type TableNode,
  childNodes,
  nodeExpressions,
} from "../ast/relalg.js";
import {
  type AnalysisError,
  ambiguousColumnAccess,
  duplicateTableName,
  unresolvedCorrelationName,
} from "./errors.js";

/**
 * Table scans reachable from `node`, left to right
 */
export const collectTables = (node: RelAlg): readonly TableNode[] =>
  node.kind === "table" ? [node] : childNodes(node).flatMap(collectTables);

/**
 * Name a table can be referenced by: its alias if it has one
 */
export const bindingName = (t: TableNode): string => t.alias ?? t.name;

export const describeTable = (t: TableNode): string =>
  t.alias !== undefined ? `${t.name} as ${t.alias}` : t.name;

/**
 * Group by key, keeping first-appearance order of groups and members
 */
const groupInOrder = <T, K>(
  items: readonly T[],
  key: (item: T) => K
): readonly (readonly T[])[] => {
  const groups = new Map<K, T[]>();
  for (const item of items) {
    const k = key(item);
    const group = groups.get(k);
    if (group) {
      group.push(item);
    } else {
      groups.set(k, [item]);
    }
  }
  return [...groups.values()];
};

const reportDuplicates = (
  groups: readonly (readonly TableNode[])[]
): readonly AnalysisError[] =>
  groups.flatMap(([first, second]) =>
    first && second
      ? [
          duplicateTableName(
            describeTable(first),
            describeTable(second),
            first.pos,
            second.pos
          ),
        ]
      : []
  );

/**
 * Two tables sharing an alias, or the same table bound twice without an
 * alias. The same table under two different aliases is fine. For each
 * colliding group only the first two bindings are reported.
 */
export const checkDuplicateTables = (
  tables: readonly TableNode[]
): readonly AnalysisError[] => {
  const byAlias = groupInOrder(
    tables.filter((t) => t.alias !== undefined),
    (t) => t.alias
  );
  // aliased repeats already collide on their alias
  const byName = groupInOrder(
    tables.filter((t) => t.alias === undefined),
    (t) => t.name
  );
  return [...reportDuplicates(byAlias), ...reportDuplicates(byName)];
};

const accessKey = (ca: ColumnAccessExpr): string =>
  `${ca.table}.${ca.column}`;

const collectExprAccesses = (expr: Expr): readonly ColumnAccessExpr[] =>
  expr.kind === "columnAccess"
    ? [expr]
    : childExpressions(expr).flatMap(collectExprAccesses);

/**
 * Distinct `t.c` references, first occurrence kept
 */
export const distinctAccesses = (
  exprs: readonly Expr[]
): readonly ColumnAccessExpr[] => {
  const seen = new Map<string, ColumnAccessExpr>();
  for (const ca of exprs.flatMap(collectExprAccesses)) {
    if (!seen.has(accessKey(ca))) {
      seen.set(accessKey(ca), ca);
    }
  }
  return [...seen.values()];
};

/**
 * Every expression in the tree, parent before children
 */
export const treeExpressions = (node: RelAlg): readonly Expr[] => [
  ...nodeExpressions(node),
  ...childNodes(node).flatMap(treeExpressions),
];

/**
 * Resolve each access against the names in scope. A name bound more than
 * once is ambiguous; a name not bound at all is unresolved.
 */
export const checkColumnAccesses = (
  names: readonly string[],
  accesses: readonly ColumnAccessExpr[]
): readonly AnalysisError[] =>
  accesses.flatMap((ca): readonly AnalysisError[] => {
    const bound = names.filter((n) => n === ca.table).length;
    if (bound > 1) return [ambiguousColumnAccess(accessKey(ca), ca.pos)];
    if (bound === 0) return [unresolvedCorrelationName(accessKey(ca), ca.pos)];
    return [];
  });
