/**
 * Shape validation for ASTs that arrive as JSON.
 *
 * The parser lives outside this package and hands programs over as plain
 * data. `validateProgram` checks that data against the node definitions in
 * `nodes/` and returns it as a typed `Program`, or throws an
 * `AstValidationError` naming the JSON path of the first bad value
 * (`$.statements[0].body.args[1]`).
 */

import type {
  BinaryOperatorKind,
  Block,
  Expression,
  ExpressionStatement,
  Param,
  Program,
  Span,
  Statement,
  TypeDeclaration,
} from "./nodes.ts";

export class AstValidationError extends Error {
  readonly path: string;

  constructor(path: string, message: string) {
    super(`${path}: ${message}`);
    this.name = "AstValidationError";
    this.path = path;
  }
}

const OPERATORS: ReadonlySet<string> = new Set<BinaryOperatorKind>([
  "add",
  "sub",
  "mul",
  "div",
  "idiv",
  "rem",
  "eq",
  "neq",
  "lt",
  "gt",
  "lte",
  "gte",
]);

function isOperator(value: string): value is BinaryOperatorKind {
  return OPERATORS.has(value);
}

type Json = Record<string, unknown>;

function isRecord(value: unknown): value is Json {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// ─── Field readers ───────────────────────────────────────────────────────

function record(value: unknown, path: string): Json {
  if (!isRecord(value)) throw new AstValidationError(path, "expected an object");
  return value;
}

function str(node: Json, key: string, path: string): string {
  const value = node[key];
  if (typeof value !== "string") throw new AstValidationError(`${path}.${key}`, "expected a string");
  return value;
}

function nullableStr(node: Json, key: string, path: string): string | null {
  const value = node[key];
  if (value === null || value === undefined) return null;
  if (typeof value !== "string") {
    throw new AstValidationError(`${path}.${key}`, "expected a string or null");
  }
  return value;
}

function num(node: Json, key: string, path: string): number {
  const value = node[key];
  if (typeof value !== "number") throw new AstValidationError(`${path}.${key}`, "expected a number");
  return value;
}

function list<T>(node: Json, key: string, path: string, item: (v: unknown, p: string) => T): T[] {
  const value = node[key];
  const at = `${path}.${key}`;
  if (!Array.isArray(value)) throw new AstValidationError(at, "expected an array");
  return value.map((v: unknown, i) => item(v, `${at}[${i}]`));
}

function span(node: Json, path: string): { span?: Span } {
  const value = node.span;
  if (value === undefined) return {};
  const s = record(value, `${path}.span`);
  return { span: { start: num(s, "start", `${path}.span`), end: num(s, "end", `${path}.span`) } };
}

function kindOf(node: Json, path: string): string {
  return str(node, "kind", path);
}

// ─── Nodes ───────────────────────────────────────────────────────────────

export function validateProgram(value: unknown, path = "$"): Program {
  const node = record(value, path);
  const kind = kindOf(node, path);
  if (kind !== "Program") throw new AstValidationError(`${path}.kind`, `expected 'Program', got '${kind}'`);
  return { kind, statements: list(node, "statements", path, validateStatement), ...span(node, path) };
}

function validateParam(value: unknown, path: string): Param {
  const node = record(value, path);
  return {
    kind: "Param",
    typeName: str(node, "typeName", path),
    name: str(node, "name", path),
    ...span(node, path),
  };
}

function validateBlock(node: Json, path: string): Block {
  return { kind: "Block", statements: list(node, "statements", path, validateStatement), ...span(node, path) };
}

function validateTypeDefinition(value: unknown, path: string): TypeDeclaration["definition"] {
  const node = record(value, path);
  const kind = kindOf(node, path);
  switch (kind) {
    case "struct":
      return { kind, fields: list(node, "fields", path, validateParam) };
    case "list":
      return { kind, element: str(node, "element", path) };
    default:
      throw new AstValidationError(`${path}.kind`, `unknown type definition '${kind}'`);
  }
}

export function validateStatement(value: unknown, path: string): Statement {
  const node = record(value, path);
  const kind = kindOf(node, path);
  switch (kind) {
    case "FunctionDeclaration":
      return {
        kind,
        name: str(node, "name", path),
        params: list(node, "params", path, validateParam),
        returnType: nullableStr(node, "returnType", path),
        body: validateExpressionStatement(node.body, `${path}.body`),
        ...span(node, path),
      };
    case "ExternFunctionDeclaration":
      return {
        kind,
        name: str(node, "name", path),
        params: list(node, "params", path, validateParam),
        returnType: nullableStr(node, "returnType", path),
        ...span(node, path),
      };
    case "TypeDeclaration":
      return {
        kind,
        name: str(node, "name", path),
        definition: validateTypeDefinition(node.definition, `${path}.definition`),
        ...span(node, path),
      };
    default:
      return validateExpressionStatement(node, path);
  }
}

function validateExpressionStatement(value: unknown, path: string): ExpressionStatement {
  const node = record(value, path);
  if (node.kind === "Block") return validateBlock(node, path);
  return validateExpression(node, path);
}

export function validateExpression(value: unknown, path: string): Expression {
  const node = record(value, path);
  const kind = kindOf(node, path);
  const at = span(node, path);
  switch (kind) {
    case "NumberLiteral":
      return { kind, value: num(node, "value", path), ...at };
    case "StringLiteral":
      return { kind, value: str(node, "value", path), ...at };
    case "VariableReference":
      return { kind, name: str(node, "name", path), ...at };
    case "VariableDeclaration":
      return {
        kind,
        typeName: nullableStr(node, "typeName", path),
        name: str(node, "name", path),
        init: validateExpression(node.init, `${path}.init`),
        ...at,
      };
    case "FunctionCall":
      return {
        kind,
        name: str(node, "name", path),
        args: list(node, "args", path, validateExpression),
        ...at,
      };
    case "BinaryOperator": {
      const operator = str(node, "operator", path);
      if (!isOperator(operator)) {
        throw new AstValidationError(`${path}.operator`, `unknown operator '${operator}'`);
      }
      return {
        kind,
        operator,
        left: validateExpression(node.left, `${path}.left`),
        right: validateExpression(node.right, `${path}.right`),
        ...at,
      };
    }
    case "IfExpression":
      return {
        kind,
        condition: validateExpression(node.condition, `${path}.condition`),
        thenBranch: validateExpressionStatement(node.thenBranch, `${path}.thenBranch`),
        elseBranch: validateExpressionStatement(node.elseBranch, `${path}.elseBranch`),
        ...at,
      };
    case "WhileExpression":
      return {
        kind,
        condition: validateExpression(node.condition, `${path}.condition`),
        body: validateExpressionStatement(node.body, `${path}.body`),
        ...at,
      };
    case "ForExpression":
      return {
        kind,
        binding: str(node, "binding", path),
        source: str(node, "source", path),
        body: validateExpressionStatement(node.body, `${path}.body`),
        ...at,
      };
    case "Block":
      throw new AstValidationError(`${path}.kind`, "a block cannot be used as an expression");
    default:
      throw new AstValidationError(`${path}.kind`, `unknown node kind '${kind}'`);
  }
}
