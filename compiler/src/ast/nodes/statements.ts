import type { BaseNode } from "./base.ts";
import type { Expression } from "./expressions.ts";

export enum StmtKind {
  Block = "Block",
  Function = "FunctionDeclaration",
  ExternFunction = "ExternFunctionDeclaration",
  Type = "TypeDeclaration",
}

/**
 * Sequence of statements. Legal only in statement position or as a branch,
 * loop or function body; it never appears as a bare expression.
 */
export interface Block extends BaseNode {
  kind: "Block";
  statements: Statement[];
}

/** An expression used as a statement, or a block. */
export type ExpressionStatement = Expression | Block;

/** Function parameter, or struct field: `(typeName name)`. */
export interface Param extends BaseNode {
  kind: "Param";
  typeName: string;
  name: string;
}

/** Named function with a body. A `null` return type means Void. */
export interface FunctionDeclaration extends BaseNode {
  kind: "FunctionDeclaration";
  name: string;
  params: Param[];
  returnType: string | null;
  body: ExpressionStatement;
}

/** Declare-only function: callable, but its body lives elsewhere. */
export interface ExternFunctionDeclaration extends BaseNode {
  kind: "ExternFunctionDeclaration";
  name: string;
  params: Param[];
  returnType: string | null;
}

export interface StructDefinition {
  kind: "struct";
  fields: Param[];
}

export interface ListDefinition {
  kind: "list";
  element: string;
}

/** Named type, visible from its declaration to the end of the enclosing scope. */
export interface TypeDeclaration extends BaseNode {
  kind: "TypeDeclaration";
  name: string;
  definition: StructDefinition | ListDefinition;
}

/** Union of all statement node types. */
export type Statement =
  | ExpressionStatement
  | FunctionDeclaration
  | ExternFunctionDeclaration
  | TypeDeclaration;
