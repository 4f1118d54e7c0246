import type { BaseNode } from "./base.ts";
import type { ExpressionStatement } from "./statements.ts";

export enum ExprKind {
  FunctionCall = "FunctionCall",
  VariableDeclaration = "VariableDeclaration",
  If = "IfExpression",
  For = "ForExpression",
  While = "WhileExpression",
  StringLiteral = "StringLiteral",
  NumberLiteral = "NumberLiteral",
  Binary = "BinaryOperator",
  VariableReference = "VariableReference",
}

/** Arithmetic operators. `idiv` is integer division, `rem` the remainder. */
export type ArithmeticOperator = "add" | "sub" | "mul" | "div" | "idiv" | "rem";

/** Comparison operators; these always produce a Bool. */
export type ComparisonOperator = "eq" | "neq" | "lt" | "gt" | "lte" | "gte";

export type BinaryOperatorKind = ArithmeticOperator | ComparisonOperator;

/** Call of a named function (`gcd(a, b)`). */
export interface FunctionCall extends BaseNode {
  kind: "FunctionCall";
  name: string;
  args: Expression[];
}

/**
 * Local variable binding (`Number x = 1`).
 * A `null` type name takes the type of the initializer.
 */
export interface VariableDeclaration extends BaseNode {
  kind: "VariableDeclaration";
  typeName: string | null;
  name: string;
  init: Expression;
}

/** `if cond then a else b`: both branches are mandatory. */
export interface IfExpression extends BaseNode {
  kind: "IfExpression";
  condition: Expression;
  thenBranch: ExpressionStatement;
  elseBranch: ExpressionStatement;
}

/** `for binding in source body` over the List held by variable `source`. */
export interface ForExpression extends BaseNode {
  kind: "ForExpression";
  binding: string;
  source: string;
  body: ExpressionStatement;
}

export interface WhileExpression extends BaseNode {
  kind: "WhileExpression";
  condition: Expression;
  body: ExpressionStatement;
}

export interface StringLiteral extends BaseNode {
  kind: "StringLiteral";
  value: string;
}

export interface NumberLiteral extends BaseNode {
  kind: "NumberLiteral";
  value: number;
}

export interface BinaryOperator extends BaseNode {
  kind: "BinaryOperator";
  operator: BinaryOperatorKind;
  left: Expression;
  right: Expression;
}

export interface VariableReference extends BaseNode {
  kind: "VariableReference";
  name: string;
}

/** Union of all expression node types. */
export type Expression =
  | FunctionCall
  | VariableDeclaration
  | IfExpression
  | ForExpression
  | WhileExpression
  | StringLiteral
  | NumberLiteral
  | BinaryOperator
  | VariableReference;
