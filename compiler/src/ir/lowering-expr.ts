/**
 * Expression lowering methods for Lowerer.
 *
 * Additional expression categories are split into:
 *   - lowering-literals.ts   (number and string literals)
 *   - lowering-operators.ts  (binary operators)
 *   - lowering-control.ts    (if, while and for expressions)
 */

import type {
  Expression,
  FunctionCall,
  VariableDeclaration,
  VariableReference,
} from "../ast/nodes.ts";
import {
  CompileError,
  parameterCountMismatch,
  typeMismatch,
  undefinedVariable,
  unsupportedConstruct,
  unsupportedOperation,
} from "../errors/index.ts";
import { type FunctionType, type Type, TypeKind, typesEqual } from "../types/index.ts";
import { toIrType } from "./ir-type-mapping.ts";
import type { VarId } from "./ir-types.ts";
import type { Lowerer } from "./lowering.ts";
import { type TypedValue, VOID_VALUE, valueOf } from "./typed-value.ts";

// ─── Expressions ─────────────────────────────────────────────────────────

/**
 * Lowers `expr` at the cursor. `expected` is the type the context wants;
 * literals take it as their type, everything else is checked against it
 * by the caller.
 */
export function lowerExpr(this: Lowerer, expr: Expression, expected?: Type): TypedValue {
  try {
    switch (expr.kind) {
      case "NumberLiteral":
        return this.lowerNumberLiteral(expr, expected);
      case "StringLiteral":
        return this.lowerStringLiteral(expr, expected);
      case "VariableReference":
        return this.lowerVariableReference(expr);
      case "VariableDeclaration":
        return this.lowerVariableDeclaration(expr);
      case "BinaryOperator":
        return this.lowerBinaryOperator(expr, expected);
      case "FunctionCall":
        return this.lowerFunctionCall(expr);
      case "IfExpression":
        return this.lowerIfExpr(expr, expected);
      case "WhileExpression":
        return this.lowerWhileExpr(expr);
      case "ForExpression":
        return this.lowerForExpr(expr);
      default:
        throw unsupportedConstruct(nodeKind(expr));
    }
  } catch (e) {
    // The innermost node that failed owns the span.
    if (e instanceof CompileError && !e.span) e.span = expr.span;
    throw e;
  }
}

function nodeKind(node: unknown): string {
  if (typeof node === "object" && node !== null && "kind" in node && typeof node.kind === "string") {
    return node.kind;
  }
  return typeof node;
}

export function emitLoad(this: Lowerer, slot: VarId, type: Type): TypedValue {
  const dest = this.ctx.emitter.freshVar();
  this.ctx.emitter.emit({ kind: "load", dest, ptr: slot, type: toIrType(type) });
  return { type, value: dest };
}

export function lowerVariableReference(this: Lowerer, expr: VariableReference): TypedValue {
  const binding = this.ctx.symbols.tryLookup(expr.name);
  if (binding) return this.emitLoad(binding.slot, binding.type);

  // A bare function name is a reference to that function.
  const fn = this.ctx.module.tryLookupFunction(expr.name);
  if (fn) {
    const dest = this.ctx.emitter.freshVar();
    const irType = toIrType(fn.type);
    if (irType.kind !== "function") throw typeMismatch("function", fn.type.name);
    this.ctx.emitter.emit({ kind: "func_ref", dest, func: fn.name, type: irType });
    return { type: fn.type, value: dest };
  }

  throw undefinedVariable(expr.name);
}

export function lowerVariableDeclaration(this: Lowerer, expr: VariableDeclaration): TypedValue {
  const declared = expr.typeName === null ? null : this.ctx.types.resolve(expr.typeName);
  const peeked = this.peekType(expr.init);
  const target = declared ?? peeked;
  if (target?.kind === TypeKind.Void) {
    throw unsupportedOperation(target.name, "variable declaration");
  }
  if (declared && peeked && !typesEqual(declared, peeked)) {
    throw typeMismatch(declared.name, peeked.name);
  }

  const init = this.lowerExpr(expr.init, declared ?? undefined);
  const type = declared ?? init.type;
  if (type.kind === TypeKind.Void) throw unsupportedOperation(type.name, "variable declaration");
  if (!typesEqual(type, init.type)) throw typeMismatch(type.name, init.type.name);
  const value = valueOf(init, type);

  const emitter = this.ctx.emitter;
  const slot = emitter.freshVar();
  emitter.emit({ kind: "stack_alloc", dest: slot, type: toIrType(type) });
  emitter.emit({ kind: "store", ptr: slot, value });
  this.ctx.symbols.bind(expr.name, { type, slot });
  return { type, value };
}

/**
 * Calls through a local of Function type when one is in scope, otherwise
 * the module function of that name. Arity and statically known argument
 * types are checked before anything is emitted.
 */
export function lowerFunctionCall(this: Lowerer, expr: FunctionCall): TypedValue {
  const emitter = this.ctx.emitter;
  const local = this.ctx.symbols.tryLookup(expr.name);

  if (local && local.type.kind === TypeKind.Function) {
    const signature = local.type;
    this.checkCallShape(expr, signature);
    const callee = this.emitLoad(local.slot, signature);
    const args = this.lowerArgs(expr, signature);
    const calleeId = valueOf(callee);
    if (signature.returnType.kind === TypeKind.Void) {
      emitter.emit({ kind: "call_indirect_void", callee: calleeId, args });
      return VOID_VALUE;
    }
    const dest = emitter.freshVar();
    emitter.emit({
      kind: "call_indirect",
      dest,
      callee: calleeId,
      args,
      type: toIrType(signature.returnType),
    });
    return { type: signature.returnType, value: dest };
  }

  const handle = this.ctx.module.lookupFunction(expr.name);
  const signature = handle.type;
  this.checkCallShape(expr, signature);
  const args = this.lowerArgs(expr, signature);
  if (signature.returnType.kind === TypeKind.Void) {
    emitter.emit({ kind: "call_void", func: handle.name, args });
    return VOID_VALUE;
  }
  const dest = emitter.freshVar();
  emitter.emit({
    kind: "call",
    dest,
    func: handle.name,
    args,
    type: toIrType(signature.returnType),
  });
  return { type: signature.returnType, value: dest };
}

export function checkCallShape(this: Lowerer, expr: FunctionCall, signature: FunctionType): void {
  if (expr.args.length !== signature.params.length) {
    throw parameterCountMismatch(expr.name, signature.params.length, expr.args.length);
  }
  expr.args.forEach((arg, i) => {
    const param = signature.params[i];
    const peeked = this.peekType(arg);
    if (param && peeked && !typesEqual(param, peeked)) throw typeMismatch(param.name, peeked.name);
  });
}

/** Lowers arguments left to right, each against its parameter type. */
export function lowerArgs(this: Lowerer, expr: FunctionCall, signature: FunctionType): VarId[] {
  return expr.args.map((arg, i) => {
    const param = signature.params[i];
    if (!param) throw parameterCountMismatch(expr.name, signature.params.length, expr.args.length);
    const value = this.lowerExpr(arg, param);
    if (!typesEqual(param, value.type)) throw typeMismatch(param.name, value.type.name);
    return valueOf(value, param);
  });
}
