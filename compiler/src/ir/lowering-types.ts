/**
 * Type resolution and static type queries for Lowerer.
 *
 * `peekType` answers "what type will this expression have?" without
 * emitting anything, so that operand and argument mismatches are rejected
 * before the first instruction of the failing operation is emitted. It
 * returns `null` when the type is not known up front: literals take their
 * type from context, and anything that would fail to resolve is left for
 * the lowering itself to report.
 */

import type { Expression, ExpressionStatement } from "../ast/nodes.ts";
import { BOOL_TYPE, type Type, TypeKind, typesEqual, VOID_TYPE } from "../types/index.ts";
import type { Lowerer } from "./lowering.ts";

const COMPARISONS = new Set(["eq", "neq", "lt", "gt", "lte", "gte"]);

export function isComparison(op: string): boolean {
  return COMPARISONS.has(op);
}

/** A `null` return type name means Void. */
export function resolveReturnType(this: Lowerer, name: string | null): Type {
  return name === null ? VOID_TYPE : this.ctx.types.resolve(name);
}

export function peekType(this: Lowerer, expr: Expression): Type | null {
  switch (expr.kind) {
    case "NumberLiteral":
    case "StringLiteral":
      return null;
    case "VariableReference": {
      const binding = this.ctx.symbols.tryLookup(expr.name);
      if (binding) return binding.type;
      return this.ctx.module.tryLookupFunction(expr.name)?.type ?? null;
    }
    case "VariableDeclaration":
      if (expr.typeName === null) return this.peekType(expr.init);
      return this.ctx.types.isDefined(expr.typeName) ? this.ctx.types.resolve(expr.typeName) : null;
    case "FunctionCall": {
      const local = this.ctx.symbols.tryLookup(expr.name);
      if (local) return local.type.kind === TypeKind.Function ? local.type.returnType : null;
      return this.ctx.module.tryLookupFunction(expr.name)?.type.returnType ?? null;
    }
    case "BinaryOperator":
      if (isComparison(expr.operator)) return BOOL_TYPE;
      return this.peekType(expr.left) ?? this.peekType(expr.right);
    case "IfExpression": {
      const thenType = this.peekStatementType(expr.thenBranch);
      const elseType = this.peekStatementType(expr.elseBranch);
      if (thenType?.kind === TypeKind.Void || elseType?.kind === TypeKind.Void) return VOID_TYPE;
      if (thenType && elseType) return typesEqual(thenType, elseType) ? thenType : null;
      return thenType ?? elseType;
    }
    case "WhileExpression":
    case "ForExpression":
      return VOID_TYPE;
    default:
      return null;
  }
}

/** Blocks yield no value; anything else is an expression. */
export function peekStatementType(this: Lowerer, stmt: ExpressionStatement): Type | null {
  return stmt.kind === "Block" ? VOID_TYPE : this.peekType(stmt);
}
