/**
 * Program loader - reads a serialized AST (JSON) and validates it into the
 * typed node model. Every malformed node is reported with its JSON path.
 *
 * Accepted shapes: a top-level array of constructs, or `{ "program": [...] }`.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import type { Result } from "../types/result.js";
import type { Diagnostic, SourcePosition } from "../types/diagnostic.js";
import type {
  BinaryOperator,
  CaseBranch,
  Expr,
  UnaryOperator,
} from "./expressions.js";
import type {
  JoinType,
  Projection,
  RelAlg,
  SortDirection,
  SortKey,
} from "./relalg.js";
import type {
  Assignment,
  ColumnDefinition,
  CreateSource,
  DeleteTarget,
  InsertSource,
  LocalQuery,
  Program,
  QueryStatement,
  TopLevel,
  UdfStatement,
} from "./statements.js";

/**
 * Diagnostics sink shared by every decoder of one file
 */
type DecodeContext = {
  readonly file: string;
  readonly diagnostics: Diagnostic[];
};

type Obj = Readonly<Record<string, unknown>>;

const BINARY_OPERATORS: ReadonlySet<string> = new Set<BinaryOperator>([
  "and", "or", "<", "<=", ">", ">=", "=", "!=", "+", "-", "*", "/", "^",
]);
const JOIN_TYPES: ReadonlySet<string> = new Set<JoinType>([
  "inner",
  "fullOuter",
  "cross",
]);

const isBinaryOperator = (v: unknown): v is BinaryOperator =>
  typeof v === "string" && BINARY_OPERATORS.has(v);
const isUnaryOperator = (v: unknown): v is UnaryOperator =>
  v === "not" || v === "neg";
const isJoinType = (v: unknown): v is JoinType =>
  typeof v === "string" && JOIN_TYPES.has(v);
const isSortDirection = (v: unknown): v is SortDirection =>
  v === "asc" || v === "desc";

const isObj = (value: unknown): value is Obj =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const report = (ctx: DecodeContext, at: string, message: string): undefined => {
  ctx.diagnostics.push({
    code: "QCK9004",
    severity: "error",
    message: `${at}: ${message} (in ${ctx.file})`,
  });
  return undefined;
};

const objectAt = (ctx: DecodeContext, data: unknown, at: string): Obj | undefined =>
  isObj(data) ? data : report(ctx, at, "must be an object");

const stringAt = (ctx: DecodeContext, data: unknown, at: string): string | undefined =>
  typeof data === "string" ? data : report(ctx, at, "must be a string");

const optionalString = (
  ctx: DecodeContext,
  data: unknown,
  at: string
): string | undefined =>
  data === undefined || data === null ? undefined : stringAt(ctx, data, at);

/**
 * Decode every element, reporting each bad one. Undefined if any failed.
 * A missing list decodes as empty when `optional` is set.
 */
const listAt = <T>(
  ctx: DecodeContext,
  data: unknown,
  at: string,
  decode: (item: unknown, at: string) => T | undefined,
  optional = false
): readonly T[] | undefined => {
  if (data === undefined && optional) return [];
  if (!Array.isArray(data)) return report(ctx, at, "must be an array");

  const items = data.map((item: unknown, i) => decode(item, `${at}[${i}]`));
  const decoded = items.filter((item): item is T => item !== undefined);
  return decoded.length === items.length ? decoded : undefined;
};

const strings = (ctx: DecodeContext) => (item: unknown, at: string) =>
  stringAt(ctx, item, at);

const decodePos = (
  ctx: DecodeContext,
  data: unknown,
  at: string
): SourcePosition | undefined => {
  if (
    isObj(data) &&
    typeof data.line === "number" &&
    typeof data.column === "number"
  ) {
    return { line: data.line, column: data.column };
  }
  return report(ctx, `${at}.pos`, "must be { line, column }");
};

// Expressions

const decodeLiteral = (
  ctx: DecodeContext,
  obj: Obj,
  pos: SourcePosition,
  at: string
): Expr | undefined => {
  const { type, value } = obj;
  if (type === "int" || type === "float") {
    return typeof value === "number"
      ? { kind: "literal", type, value, pos }
      : report(ctx, `${at}.value`, `must be a number for a ${type} literal`);
  }
  if (type === "string" || type === "date" || type === "timestamp") {
    return typeof value === "string"
      ? { kind: "literal", type, value, pos }
      : report(ctx, `${at}.value`, `must be a string for a ${type} literal`);
  }
  if (type === "boolean") {
    return typeof value === "boolean"
      ? { kind: "literal", type, value, pos }
      : report(ctx, `${at}.value`, "must be a boolean for a boolean literal");
  }
  return report(ctx, `${at}.type`, `unknown literal type '${String(type)}'`);
};

const decodeBranch = (
  ctx: DecodeContext,
  data: unknown,
  at: string
): CaseBranch | undefined => {
  const obj = objectAt(ctx, data, at);
  if (!obj) return undefined;
  const condition = decodeExpr(ctx, obj.condition, `${at}.condition`);
  const result = decodeExpr(ctx, obj.result, `${at}.result`);
  return condition && result ? { condition, result } : undefined;
};

const optionalExpr = (
  ctx: DecodeContext,
  data: unknown,
  at: string
): { readonly ok: boolean; readonly expr?: Expr } => {
  if (data === undefined || data === null) return { ok: true };
  const expr = decodeExpr(ctx, data, at);
  return { ok: expr !== undefined, expr };
};

const decodeExpr = (
  ctx: DecodeContext,
  data: unknown,
  at: string
): Expr | undefined => {
  const obj = objectAt(ctx, data, at);
  if (!obj) return undefined;
  const pos = decodePos(ctx, obj.pos, at);
  if (!pos) return undefined;

  const exprs = (item: unknown, itemAt: string) => decodeExpr(ctx, item, itemAt);

  switch (obj.kind) {
    case "binary": {
      const { op } = obj;
      const left = decodeExpr(ctx, obj.left, `${at}.left`);
      const right = decodeExpr(ctx, obj.right, `${at}.right`);
      if (!isBinaryOperator(op)) {
        return report(ctx, `${at}.op`, `unknown binary operator '${String(op)}'`);
      }
      return left && right ? { kind: "binary", op, left, right, pos } : undefined;
    }
    case "unary": {
      const { op } = obj;
      const operand = decodeExpr(ctx, obj.operand, `${at}.operand`);
      if (!isUnaryOperator(op)) {
        return report(ctx, `${at}.op`, `unknown unary operator '${String(op)}'`);
      }
      return operand ? { kind: "unary", op, operand, pos } : undefined;
    }
    case "call": {
      const callee = stringAt(ctx, obj.callee, `${at}.callee`);
      const args = listAt(ctx, obj.args, `${at}.args`, exprs, true);
      return callee !== undefined && args
        ? { kind: "call", callee, args, pos }
        : undefined;
    }
    case "index": {
      const target = decodeExpr(ctx, obj.target, `${at}.target`);
      const index = decodeExpr(ctx, obj.index, `${at}.index`);
      return target && index ? { kind: "index", target, index, pos } : undefined;
    }
    case "case": {
      const discriminant = optionalExpr(ctx, obj.discriminant, `${at}.discriminant`);
      const branches = listAt(ctx, obj.branches, `${at}.branches`, (item, itemAt) =>
        decodeBranch(ctx, item, itemAt)
      );
      const otherwise = optionalExpr(ctx, obj.otherwise, `${at}.otherwise`);
      return discriminant.ok && branches && otherwise.ok
        ? {
            kind: "case",
            discriminant: discriminant.expr,
            branches,
            otherwise: otherwise.expr,
            pos,
          }
        : undefined;
    }
    case "literal":
      return decodeLiteral(ctx, obj, pos, at);
    case "identifier": {
      const name = stringAt(ctx, obj.name, `${at}.name`);
      return name !== undefined ? { kind: "identifier", name, pos } : undefined;
    }
    case "columnAccess": {
      const table = stringAt(ctx, obj.table, `${at}.table`);
      const column = stringAt(ctx, obj.column, `${at}.column`);
      return table !== undefined && column !== undefined
        ? { kind: "columnAccess", table, column, pos }
        : undefined;
    }
    case "rowId":
      return { kind: "rowId", pos };
    case "wildcard":
      return { kind: "wildcard", pos };
    case "each": {
      const expr = decodeExpr(ctx, obj.expr, `${at}.expr`);
      return expr ? { kind: "each", expr, pos } : undefined;
    }
    default:
      return report(ctx, `${at}.kind`, `unknown expression kind '${String(obj.kind)}'`);
  }
};

// Relational algebra

const decodeSortKey = (
  ctx: DecodeContext,
  data: unknown,
  at: string
): SortKey | undefined => {
  const obj = objectAt(ctx, data, at);
  if (!obj) return undefined;
  const direction = obj.direction ?? "asc";
  const expr = decodeExpr(ctx, obj.expr, `${at}.expr`);
  if (!isSortDirection(direction)) {
    return report(ctx, `${at}.direction`, "must be 'asc' or 'desc'");
  }
  return expr ? { direction, expr } : undefined;
};

const sortKeys = (ctx: DecodeContext) => (item: unknown, at: string) =>
  decodeSortKey(ctx, item, at);

const decodeProjection = (
  ctx: DecodeContext,
  data: unknown,
  at: string
): Projection | undefined => {
  const obj = objectAt(ctx, data, at);
  if (!obj) return undefined;
  const expr = decodeExpr(ctx, obj.expr, `${at}.expr`);
  const alias = optionalString(ctx, obj.alias, `${at}.alias`);
  if (!expr) return undefined;
  return alias !== undefined ? { expr, alias } : { expr };
};

const decodeRelAlg = (
  ctx: DecodeContext,
  data: unknown,
  at: string
): RelAlg | undefined => {
  const obj = objectAt(ctx, data, at);
  if (!obj) return undefined;
  const pos = decodePos(ctx, obj.pos, at);
  if (!pos) return undefined;

  const exprs = (item: unknown, itemAt: string) => decodeExpr(ctx, item, itemAt);

  switch (obj.kind) {
    case "table": {
      const name = stringAt(ctx, obj.name, `${at}.name`);
      const alias = optionalString(ctx, obj.alias, `${at}.alias`);
      if (name === undefined) return undefined;
      return alias !== undefined
        ? { kind: "table", name, alias, pos }
        : { kind: "table", name, pos };
    }
    case "project": {
      const projections = listAt(ctx, obj.projections, `${at}.projections`, (item, itemAt) =>
        decodeProjection(ctx, item, itemAt)
      );
      const source = decodeRelAlg(ctx, obj.source, `${at}.source`);
      return projections && source
        ? { kind: "project", projections, source, pos }
        : undefined;
    }
    case "filter": {
      const predicates = listAt(ctx, obj.predicates, `${at}.predicates`, exprs);
      const source = decodeRelAlg(ctx, obj.source, `${at}.source`);
      return predicates && source
        ? { kind: "filter", predicates, source, pos }
        : undefined;
    }
    case "groupBy": {
      const groups = listAt(ctx, obj.groups, `${at}.groups`, exprs);
      const having = listAt(ctx, obj.having, `${at}.having`, exprs, true);
      const source = decodeRelAlg(ctx, obj.source, `${at}.source`);
      return groups && having && source
        ? { kind: "groupBy", groups, having, source, pos }
        : undefined;
    }
    case "join": {
      const joinType = obj.joinType ?? "inner";
      const left = decodeRelAlg(ctx, obj.left, `${at}.left`);
      const right = decodeRelAlg(ctx, obj.right, `${at}.right`);
      const condition = listAt(ctx, obj.condition, `${at}.condition`, exprs, true);
      if (!isJoinType(joinType)) {
        return report(ctx, `${at}.joinType`, "must be 'inner', 'fullOuter' or 'cross'");
      }
      return left && right && condition
        ? { kind: "join", joinType, left, right, condition, pos }
        : undefined;
    }
    case "sortBy": {
      const keys = listAt(ctx, obj.keys, `${at}.keys`, sortKeys(ctx));
      const source = decodeRelAlg(ctx, obj.source, `${at}.source`);
      return keys && source ? { kind: "sortBy", keys, source, pos } : undefined;
    }
    default:
      return report(ctx, `${at}.kind`, `unknown operator kind '${String(obj.kind)}'`);
  }
};

// Statements

const decodeLocal = (
  ctx: DecodeContext,
  data: unknown,
  at: string
): LocalQuery | undefined => {
  const obj = objectAt(ctx, data, at);
  if (!obj) return undefined;
  const pos = decodePos(ctx, obj.pos, at);
  const name = stringAt(ctx, obj.name, `${at}.name`);
  const columns = listAt(ctx, obj.columns, `${at}.columns`, strings(ctx), true);
  const body = decodeRelAlg(ctx, obj.body, `${at}.body`);
  return pos && name !== undefined && columns && body
    ? { name, columns, body, pos }
    : undefined;
};

const decodeQuery = (
  ctx: DecodeContext,
  data: unknown,
  at: string
): QueryStatement | undefined => {
  const obj = objectAt(ctx, data, at);
  if (!obj) return undefined;
  if (obj.kind !== "query") {
    return report(ctx, `${at}.kind`, "must be 'query'");
  }
  const pos = decodePos(ctx, obj.pos, at);
  const locals = listAt(ctx, obj.locals, `${at}.locals`, (item, itemAt) =>
    decodeLocal(ctx, item, itemAt), true
  );
  const main = decodeRelAlg(ctx, obj.main, `${at}.main`);
  return pos && locals && main ? { kind: "query", locals, main, pos } : undefined;
};

const decodeAssignment = (
  ctx: DecodeContext,
  data: unknown,
  at: string
): Assignment | undefined => {
  const obj = objectAt(ctx, data, at);
  if (!obj) return undefined;
  const column = stringAt(ctx, obj.column, `${at}.column`);
  const value = decodeExpr(ctx, obj.value, `${at}.value`);
  return column !== undefined && value ? { column, value } : undefined;
};

const decodeDeleteTarget = (
  ctx: DecodeContext,
  data: unknown,
  at: string
): DeleteTarget | undefined => {
  const obj = objectAt(ctx, data, at);
  if (!obj) return undefined;
  switch (obj.kind) {
    case "where": {
      const predicates = listAt(ctx, obj.predicates, `${at}.predicates`, (item, itemAt) =>
        decodeExpr(ctx, item, itemAt)
      );
      return predicates ? { kind: "where", predicates } : undefined;
    }
    case "columns": {
      const columns = listAt(ctx, obj.columns, `${at}.columns`, strings(ctx));
      return columns ? { kind: "columns", columns } : undefined;
    }
    default:
      return report(ctx, `${at}.kind`, "must be 'where' or 'columns'");
  }
};

const decodeColumnDefinition = (
  ctx: DecodeContext,
  data: unknown,
  at: string
): ColumnDefinition | undefined => {
  const obj = objectAt(ctx, data, at);
  if (!obj) return undefined;
  const name = stringAt(ctx, obj.name, `${at}.name`);
  const type = stringAt(ctx, obj.type, `${at}.type`);
  return name !== undefined && type !== undefined ? { name, type } : undefined;
};

const decodeCreateSource = (
  ctx: DecodeContext,
  data: unknown,
  at: string
): CreateSource | undefined => {
  const obj = objectAt(ctx, data, at);
  if (!obj) return undefined;
  switch (obj.kind) {
    case "schema": {
      const columns = listAt(ctx, obj.columns, `${at}.columns`, (item, itemAt) =>
        decodeColumnDefinition(ctx, item, itemAt)
      );
      return columns ? { kind: "schema", columns } : undefined;
    }
    case "query": {
      const query = decodeQuery(ctx, obj.query, `${at}.query`);
      return query ? { kind: "query", query } : undefined;
    }
    default:
      return report(ctx, `${at}.kind`, "must be 'schema' or 'query'");
  }
};

const decodeInsertSource = (
  ctx: DecodeContext,
  data: unknown,
  at: string
): InsertSource | undefined => {
  const obj = objectAt(ctx, data, at);
  if (!obj) return undefined;
  switch (obj.kind) {
    case "values": {
      const values = listAt(ctx, obj.values, `${at}.values`, (item, itemAt) =>
        decodeExpr(ctx, item, itemAt)
      );
      return values ? { kind: "values", values } : undefined;
    }
    case "query": {
      const query = decodeQuery(ctx, obj.query, `${at}.query`);
      return query ? { kind: "query", query } : undefined;
    }
    default:
      return report(ctx, `${at}.kind`, "must be 'values' or 'query'");
  }
};

const decodeUdfStatement = (
  ctx: DecodeContext,
  data: unknown,
  at: string
): UdfStatement | undefined => {
  const obj = objectAt(ctx, data, at);
  if (!obj) return undefined;
  switch (obj.kind) {
    case "assign": {
      const name = stringAt(ctx, obj.name, `${at}.name`);
      const value = decodeExpr(ctx, obj.value, `${at}.value`);
      return name !== undefined && value ? { kind: "assign", name, value } : undefined;
    }
    case "expression": {
      const expr = decodeExpr(ctx, obj.expr, `${at}.expr`);
      return expr ? { kind: "expression", expr } : undefined;
    }
    default:
      return report(ctx, `${at}.kind`, "must be 'assign' or 'expression'");
  }
};

const decodeTopLevel = (
  ctx: DecodeContext,
  data: unknown,
  at: string
): TopLevel | undefined => {
  const obj = objectAt(ctx, data, at);
  if (!obj) return undefined;
  const pos = decodePos(ctx, obj.pos, at);
  if (!pos) return undefined;

  const exprs = (item: unknown, itemAt: string) => decodeExpr(ctx, item, itemAt);

  switch (obj.kind) {
    case "query":
      return decodeQuery(ctx, obj, at);

    case "update": {
      const table = stringAt(ctx, obj.table, `${at}.table`);
      const assignments = listAt(ctx, obj.assignments, `${at}.assignments`, (item, itemAt) =>
        decodeAssignment(ctx, item, itemAt)
      );
      const orderBy = listAt(ctx, obj.orderBy, `${at}.orderBy`, sortKeys(ctx), true);
      const where = listAt(ctx, obj.where, `${at}.where`, exprs, true);
      const groupBy = listAt(ctx, obj.groupBy, `${at}.groupBy`, exprs, true);
      const having = listAt(ctx, obj.having, `${at}.having`, exprs, true);
      return table !== undefined && assignments && orderBy && where && groupBy && having
        ? { kind: "update", table, assignments, orderBy, where, groupBy, having, pos }
        : undefined;
    }

    case "delete": {
      const table = stringAt(ctx, obj.table, `${at}.table`);
      const target = decodeDeleteTarget(ctx, obj.target, `${at}.target`);
      const orderBy = listAt(ctx, obj.orderBy, `${at}.orderBy`, sortKeys(ctx), true);
      const groupBy = listAt(ctx, obj.groupBy, `${at}.groupBy`, exprs, true);
      const having = listAt(ctx, obj.having, `${at}.having`, exprs, true);
      return table !== undefined && target && orderBy && groupBy && having
        ? { kind: "delete", table, target, orderBy, groupBy, having, pos }
        : undefined;
    }

    case "create": {
      const table = stringAt(ctx, obj.table, `${at}.table`);
      const source = decodeCreateSource(ctx, obj.source, `${at}.source`);
      return table !== undefined && source
        ? { kind: "create", table, source, pos }
        : undefined;
    }

    case "insert": {
      const table = stringAt(ctx, obj.table, `${at}.table`);
      const orderBy = listAt(ctx, obj.orderBy, `${at}.orderBy`, sortKeys(ctx), true);
      const columns = listAt(ctx, obj.columns, `${at}.columns`, strings(ctx), true);
      const source = decodeInsertSource(ctx, obj.source, `${at}.source`);
      return table !== undefined && orderBy && columns && source
        ? { kind: "insert", table, orderBy, columns, source, pos }
        : undefined;
    }

    case "udf": {
      const name = stringAt(ctx, obj.name, `${at}.name`);
      const params = listAt(ctx, obj.params, `${at}.params`, strings(ctx), true);
      const body = listAt(ctx, obj.body, `${at}.body`, (item, itemAt) =>
        decodeUdfStatement(ctx, item, itemAt)
      );
      return name !== undefined && params && body
        ? { kind: "udf", name, params, body, pos }
        : undefined;
    }

    case "verbatim": {
      const code = stringAt(ctx, obj.code, `${at}.code`);
      return code !== undefined ? { kind: "verbatim", code, pos } : undefined;
    }

    default:
      return report(ctx, `${at}.kind`, `unknown construct kind '${String(obj.kind)}'`);
  }
};

/**
 * Validate already-parsed JSON as a program
 *
 * @param file - Shown in diagnostics
 */
export const parseProgram = (
  data: unknown,
  file: string
): Result<Program, Diagnostic[]> => {
  const ctx: DecodeContext = { file, diagnostics: [] };
  const constructs = isObj(data) ? data.program : data;
  const program = listAt(ctx, constructs, "program", (item, at) =>
    decodeTopLevel(ctx, item, at)
  );

  if (!program || ctx.diagnostics.length > 0) {
    return { ok: false, error: ctx.diagnostics };
  }
  return { ok: true, value: program };
};

/**
 * Load and validate a program file
 */
export const loadProgramFile = (
  filePath: string
): Result<Program, Diagnostic[]> => {
  if (!fs.existsSync(filePath)) {
    return {
      ok: false,
      error: [
        {
          code: "QCK9001",
          severity: "error",
          message: `Program file not found: ${filePath}`,
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
          code: "QCK9002",
          severity: "error",
          message: `Failed to read program file: ${error instanceof Error ? error.message : String(error)}`,
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
          code: "QCK9003",
          severity: "error",
          message: `Invalid JSON in program file: ${error instanceof Error ? error.message : String(error)}`,
        },
      ],
    };
  }

  return parseProgram(parsed, path.basename(filePath));
};
