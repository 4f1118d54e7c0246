/**
 * Control-flow lowering methods for Lowerer: if, while and for.
 *
 * Each construct creates its blocks up front, so block numbers follow the
 * source order of the constructs, and leaves the cursor on the block where
 * control continues.
 */

import type { Expression, ForExpression, IfExpression, WhileExpression } from "../ast/nodes.ts";
import { typeMismatch, unsupportedOperation } from "../errors/index.ts";
import { BOOL_TYPE, isNumeric, type Type, TypeKind, typesEqual } from "../types/index.ts";
import { I32, toIrType } from "./ir-type-mapping.ts";
import type { Lowerer } from "./lowering.ts";
import { type TypedValue, VOID_VALUE } from "./typed-value.ts";

function valueType(t: Type | null | undefined): Type | undefined {
  return t && t.kind !== TypeKind.Void ? t : undefined;
}

/** Rejects a condition whose type is known and cannot be tested. */
export function checkCondition(this: Lowerer, condition: Expression): void {
  const type = this.peekType(condition);
  if (type && type.kind !== TypeKind.Bool && !isNumeric(type)) {
    throw typeMismatch(BOOL_TYPE.name, type.name);
  }
}

// ─── If ──────────────────────────────────────────────────────────────────

/**
 * `if c then a else b`:
 *
 *   <current>:  br %c, if.then.N, if.else.M
 *   if.then.N:  ...a... jump if.merge.K
 *   if.else.M:  ...b... jump if.merge.K
 *   if.merge.K: %r = φ [a from <end of then>, b from <end of else>]
 *
 * Incoming edges name the blocks each branch ended in, which differ from
 * the branch entry blocks when a branch holds control flow of its own.
 */
export function lowerIfExpr(this: Lowerer, expr: IfExpression, expected?: Type): TypedValue {
  const emitter = this.ctx.emitter;

  this.checkCondition(expr.condition);
  const thenPeek = valueType(this.peekStatementType(expr.thenBranch));
  const elsePeek = valueType(this.peekStatementType(expr.elseBranch));
  if (thenPeek && elsePeek && !typesEqual(thenPeek, elsePeek)) {
    throw typeMismatch(thenPeek.name, elsePeek.name);
  }

  const cond = emitter.toCondition(this.lowerExpr(expr.condition));
  const thenBlock = emitter.newBlock("if.then");
  const elseBlock = emitter.newBlock("if.else");
  const mergeBlock = emitter.newBlock("if.merge");
  emitter.branchConditional(cond, thenBlock, elseBlock);

  const hint = valueType(expected) ?? thenPeek ?? elsePeek;

  emitter.position(thenBlock);
  const thenValue = this.lowerBranch(expr.thenBranch, hint);
  const thenEnd = emitter.currentBlock;
  emitter.branchUnconditional(mergeBlock);

  emitter.position(elseBlock);
  const elseValue = this.lowerBranch(expr.elseBranch, hint ?? valueType(thenValue.type));
  const elseEnd = emitter.currentBlock;
  emitter.branchUnconditional(mergeBlock);

  emitter.position(mergeBlock);
  if (thenValue.value !== null && elseValue.value !== null) {
    return emitter.mergePhi(thenValue, thenEnd, elseValue, elseEnd);
  }
  if ((thenValue.value === null) !== (elseValue.value === null)) {
    this.ctx.warn(
      "VoidIfBranch",
      `if-expression branches yield '${thenValue.type.name}' and '${elseValue.type.name}'; the result is Void`
    );
  }
  return VOID_VALUE;
}

// ─── Loops ───────────────────────────────────────────────────────────────

export function lowerWhileExpr(this: Lowerer, expr: WhileExpression): TypedValue {
  const emitter = this.ctx.emitter;
  this.checkCondition(expr.condition);

  const header = emitter.newBlock("while.header");
  const body = emitter.newBlock("while.body");
  const exit = emitter.newBlock("while.exit");
  emitter.branchUnconditional(header);

  emitter.position(header);
  const cond = emitter.toCondition(this.lowerExpr(expr.condition));
  emitter.branchConditional(cond, body, exit);

  emitter.position(body);
  this.lowerBranch(expr.body);
  emitter.branchUnconditional(header);

  emitter.position(exit);
  return VOID_VALUE;
}

/**
 * `for x in xs body` walks the list with an Int32 index slot:
 *
 *   <current>:   %xs = load; %n = list_len %xs; index = 0; jump for.header
 *   for.header:  %i = load index; br %i < %n, for.body, for.exit
 *   for.body:    x = list_get %xs, %i; ...body...; index = %i + 1; jump for.header
 */
export function lowerForExpr(this: Lowerer, expr: ForExpression): TypedValue {
  const emitter = this.ctx.emitter;
  const source = this.ctx.symbols.lookup(expr.source);
  const listType = source.type;
  if (listType.kind !== TypeKind.List) {
    throw unsupportedOperation(listType.name, "iterate");
  }

  const list = this.emitLoad(source.slot, listType);
  const listId = list.value;
  if (listId === null) throw typeMismatch(listType.name, list.type.name);
  const length = emitter.freshVar();
  emitter.emit({ kind: "list_len", dest: length, list: listId });
  const indexSlot = emitter.freshVar();
  emitter.emit({ kind: "stack_alloc", dest: indexSlot, type: I32 });
  const zero = emitter.freshVar();
  emitter.emit({ kind: "const_int", dest: zero, type: I32, value: 0 });
  emitter.emit({ kind: "store", ptr: indexSlot, value: zero });

  const header = emitter.newBlock("for.header");
  const body = emitter.newBlock("for.body");
  const exit = emitter.newBlock("for.exit");
  emitter.branchUnconditional(header);

  emitter.position(header);
  const index = emitter.freshVar();
  emitter.emit({ kind: "load", dest: index, ptr: indexSlot, type: I32 });
  const inBounds = emitter.freshVar();
  emitter.emit({ kind: "bin_op", op: "lt", dest: inBounds, lhs: index, rhs: length, type: I32 });
  emitter.branchConditional({ type: BOOL_TYPE, value: inBounds }, body, exit);

  emitter.position(body);
  const element = emitter.freshVar();
  const elementType = listType.element;
  emitter.emit({
    kind: "list_get",
    dest: element,
    list: listId,
    index,
    type: toIrType(elementType),
  });
  this.ctx.symbols.pushScope();
  const elementSlot = emitter.freshVar();
  emitter.emit({ kind: "stack_alloc", dest: elementSlot, type: toIrType(elementType) });
  emitter.emit({ kind: "store", ptr: elementSlot, value: element });
  this.ctx.symbols.bind(expr.binding, { type: elementType, slot: elementSlot });
  this.lowerBranch(expr.body);
  this.ctx.symbols.popScope();

  const one = emitter.freshVar();
  emitter.emit({ kind: "const_int", dest: one, type: I32, value: 1 });
  const next = emitter.freshVar();
  emitter.emit({ kind: "bin_op", op: "add", dest: next, lhs: index, rhs: one, type: I32 });
  emitter.emit({ kind: "store", ptr: indexSlot, value: next });
  emitter.branchUnconditional(header);

  emitter.position(exit);
  return VOID_VALUE;
}
