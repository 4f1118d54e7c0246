export type { BaseNode, Span } from "./base.ts";

export { ExprKind } from "./expressions.ts";
export type {
  ArithmeticOperator,
  BinaryOperator,
  BinaryOperatorKind,
  ComparisonOperator,
  Expression,
  ForExpression,
  FunctionCall,
  IfExpression,
  NumberLiteral,
  StringLiteral,
  VariableDeclaration,
  VariableReference,
  WhileExpression,
} from "./expressions.ts";

export { StmtKind } from "./statements.ts";
export type {
  Block,
  ExpressionStatement,
  ExternFunctionDeclaration,
  FunctionDeclaration,
  ListDefinition,
  Param,
  Statement,
  StructDefinition,
  TypeDeclaration,
} from "./statements.ts";

export type { Program } from "./program.ts";
