/**
 * Statement lowering methods for Lowerer.
 */

import type { Block, ExpressionStatement, Statement } from "../ast/nodes.ts";
import { type Type, TypeKind } from "../types/index.ts";
import type { Lowerer } from "./lowering.ts";
import { type TypedValue, VOID_VALUE } from "./typed-value.ts";

// ─── Statements ──────────────────────────────────────────────────────────

export function lowerStatement(this: Lowerer, stmt: Statement, expected?: Type): TypedValue {
  switch (stmt.kind) {
    case "Block":
      return this.lowerBlock(stmt);
    case "FunctionDeclaration":
      this.lowerFunctionDecl(stmt);
      return VOID_VALUE;
    case "ExternFunctionDeclaration":
      this.lowerExternDecl(stmt);
      return VOID_VALUE;
    case "TypeDeclaration":
      this.lowerTypeDecl(stmt);
      return VOID_VALUE;
    default:
      return this.lowerExpr(stmt, expected);
  }
}

/** A block opens a scope and yields Void. */
export function lowerBlock(this: Lowerer, block: Block): TypedValue {
  this.ctx.symbols.pushScope();
  for (const stmt of block.statements) {
    this.lowerStatement(stmt);
  }
  this.ctx.symbols.popScope();
  return VOID_VALUE;
}

/** An if-branch or loop body, lowered in a scope of its own. */
export function lowerBranch(this: Lowerer, stmt: ExpressionStatement, expected?: Type): TypedValue {
  if (stmt.kind === "Block") return this.lowerBlock(stmt);
  this.ctx.symbols.pushScope();
  const result = this.lowerExpr(stmt, expected);
  this.ctx.symbols.popScope();
  return result;
}

/**
 * A function body. Unlike a plain block, a block body yields the value of
 * its final statement, which becomes the return value.
 */
export function lowerBody(this: Lowerer, body: ExpressionStatement, returnType: Type): TypedValue {
  const expected = returnType.kind === TypeKind.Void ? undefined : returnType;
  if (body.kind !== "Block") return this.lowerExpr(body, expected);

  this.ctx.symbols.pushScope();
  let result = VOID_VALUE;
  body.statements.forEach((stmt, i) => {
    const isTail = i === body.statements.length - 1;
    result = this.lowerStatement(stmt, isTail ? expected : undefined);
  });
  this.ctx.symbols.popScope();
  return result;
}
