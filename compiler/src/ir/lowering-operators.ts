/**
 * Binary operator lowering for Lowerer.
 */

import type { BinaryOperator, BinaryOperatorKind } from "../ast/nodes.ts";
import { typeMismatch, unsupportedOperation } from "../errors/index.ts";
import { BOOL_TYPE, isNumeric, type Type, TypeKind, typesEqual } from "../types/index.ts";
import { toIrType } from "./ir-type-mapping.ts";
import type { Lowerer } from "./lowering.ts";
import { isComparison } from "./lowering-types.ts";
import { type TypedValue, valueOf } from "./typed-value.ts";

/**
 * Lowers `left op right`. Both operands must have the same type; there is
 * no implicit conversion. Operand types that are known up front are
 * checked before any instruction is emitted, so a rejected operation
 * leaves the current block untouched.
 *
 * Literal operands take their type from the other operand, or, for
 * arithmetic, from the type the context expects.
 */
export function lowerBinaryOperator(
  this: Lowerer,
  expr: BinaryOperator,
  expected?: Type
): TypedValue {
  const op = expr.operator;
  const leftPeek = this.peekType(expr.left);
  const rightPeek = this.peekType(expr.right);
  const hint = leftPeek ?? rightPeek ?? (isComparison(op) ? undefined : expected);

  if (leftPeek && rightPeek) {
    this.checkBinaryOperands(op, leftPeek, rightPeek);
  } else if (hint) {
    this.checkBinaryOperands(op, hint, hint);
  }

  const left = this.lowerExpr(expr.left, hint);
  const right = this.lowerExpr(expr.right, hint ?? left.type);
  this.checkBinaryOperands(op, left.type, right.type);

  const lhs = valueOf(left, right.type);
  const rhs = valueOf(right, left.type);
  const dest = this.ctx.emitter.freshVar();
  this.ctx.emitter.emit({ kind: "bin_op", op, dest, lhs, rhs, type: toIrType(left.type) });
  return { type: isComparison(op) ? BOOL_TYPE : left.type, value: dest };
}

/**
 * Arithmetic is defined on Number and Int32; equality also on Bool;
 * ordering only on Number and Int32.
 */
export function checkBinaryOperands(
  this: Lowerer,
  op: BinaryOperatorKind,
  left: Type,
  right: Type
): void {
  if (!typesEqual(left, right)) throw typeMismatch(left.name, right.name);
  if (isNumeric(left)) return;
  if ((op === "eq" || op === "neq") && left.kind === TypeKind.Bool) return;
  throw unsupportedOperation(left.name, op);
}
