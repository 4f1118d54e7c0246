/**
 * Node constructors for building KSC programs in code.
 * Parsers and tests use these instead of spelling out object literals.
 */

import type {
  BinaryOperator,
  BinaryOperatorKind,
  Block,
  Expression,
  ExpressionStatement,
  ExternFunctionDeclaration,
  ForExpression,
  FunctionCall,
  FunctionDeclaration,
  IfExpression,
  NumberLiteral,
  Param,
  Program,
  Statement,
  StringLiteral,
  TypeDeclaration,
  VariableDeclaration,
  VariableReference,
  WhileExpression,
} from "./nodes.ts";

export function program(...statements: Statement[]): Program {
  return { kind: "Program", statements };
}

export function block(...statements: Statement[]): Block {
  return { kind: "Block", statements };
}

export function param(typeName: string, name: string): Param {
  return { kind: "Param", typeName, name };
}

export function fn(
  name: string,
  params: Param[],
  returnType: string | null,
  body: ExpressionStatement
): FunctionDeclaration {
  return { kind: "FunctionDeclaration", name, params, returnType, body };
}

export function externFn(
  name: string,
  params: Param[],
  returnType: string | null
): ExternFunctionDeclaration {
  return { kind: "ExternFunctionDeclaration", name, params, returnType };
}

export function structType(name: string, fields: Param[]): TypeDeclaration {
  return { kind: "TypeDeclaration", name, definition: { kind: "struct", fields } };
}

export function listType(name: string, element: string): TypeDeclaration {
  return { kind: "TypeDeclaration", name, definition: { kind: "list", element } };
}

export function num(value: number): NumberLiteral {
  return { kind: "NumberLiteral", value };
}

export function str(value: string): StringLiteral {
  return { kind: "StringLiteral", value };
}

export function ref(name: string): VariableReference {
  return { kind: "VariableReference", name };
}

export function call(name: string, ...args: Expression[]): FunctionCall {
  return { kind: "FunctionCall", name, args };
}

export function decl(typeName: string | null, name: string, init: Expression): VariableDeclaration {
  return { kind: "VariableDeclaration", typeName, name, init };
}

export function binary(
  operator: BinaryOperatorKind,
  left: Expression,
  right: Expression
): BinaryOperator {
  return { kind: "BinaryOperator", operator, left, right };
}

export function ifExpr(
  condition: Expression,
  thenBranch: ExpressionStatement,
  elseBranch: ExpressionStatement
): IfExpression {
  return { kind: "IfExpression", condition, thenBranch, elseBranch };
}

export function whileExpr(condition: Expression, body: ExpressionStatement): WhileExpression {
  return { kind: "WhileExpression", condition, body };
}

export function forExpr(binding: string, source: string, body: ExpressionStatement): ForExpression {
  return { kind: "ForExpression", binding, source, body };
}
