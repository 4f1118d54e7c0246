/**
 * Declaration lowering methods for Lowerer.
 */

import type {
  ExternFunctionDeclaration,
  FunctionDeclaration,
  TypeDeclaration,
} from "../ast/nodes.ts";
import type { StructField } from "../types/index.ts";
import { listType, structType } from "../types/index.ts";
import type { Lowerer } from "./lowering.ts";
import type { FunctionHandle } from "./module-builder.ts";

// ─── Types ───────────────────────────────────────────────────────────────

/** Registers a struct or list type in the innermost scope. */
export function lowerTypeDecl(this: Lowerer, decl: TypeDeclaration): void {
  const { definition } = decl;
  if (definition.kind === "struct") {
    const fields: StructField[] = definition.fields.map((f) => ({
      name: f.name,
      type: this.ctx.types.resolve(f.typeName),
    }));
    this.ctx.types.define(decl.name, structType(decl.name, fields));
  } else {
    const element = this.ctx.types.resolve(definition.element);
    this.ctx.types.define(decl.name, listType(element, decl.name));
  }
}

// ─── Functions ───────────────────────────────────────────────────────────

export function lowerExternDecl(this: Lowerer, decl: ExternFunctionDeclaration): FunctionHandle {
  return this.ctx.module.registerFunction(
    decl.name,
    decl.returnType ?? "Void",
    decl.params.map((p) => ({ typeName: p.typeName, name: p.name }))
  );
}

/** Puts the signature in the function table without opening the body. */
export function registerFunctionDecl(this: Lowerer, decl: FunctionDeclaration): FunctionHandle {
  return this.ctx.module.registerFunction(
    decl.name,
    decl.returnType ?? "Void",
    decl.params.map((p) => ({ typeName: p.typeName, name: p.name }))
  );
}

/**
 * A function declared inside another body. Its signature is only known
 * from here on, so it is registered and lowered in one go; the outer
 * cursor is restored once its body is finished.
 */
export function lowerFunctionDecl(this: Lowerer, decl: FunctionDeclaration): FunctionHandle {
  const handle = this.registerFunctionDecl(decl);
  this.lowerFunctionBody(decl, handle);
  return handle;
}

export function lowerFunctionBody(
  this: Lowerer,
  decl: FunctionDeclaration,
  handle: FunctionHandle
): FunctionHandle {
  const module = this.ctx.module;
  module.beginDefinition(handle);
  const result = this.lowerBody(decl.body, handle.type.returnType);
  return module.finishFunction(result);
}
