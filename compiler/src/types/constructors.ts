// ─── Type Constructors ──────────────────────────────────────────────────────

import type {
  BoolType,
  FunctionType,
  Int32Type,
  ListType,
  NumberType,
  StructField,
  StructType,
  Type,
  VoidType,
} from "./definitions.ts";
import { TypeKind } from "./kinds.ts";

export const NUMBER_TYPE: NumberType = { kind: TypeKind.Number, name: "Number" };
export const INT32_TYPE: Int32Type = { kind: TypeKind.Int32, name: "Int32" };
export const BOOL_TYPE: BoolType = { kind: TypeKind.Bool, name: "Bool" };
export const VOID_TYPE: VoidType = { kind: TypeKind.Void, name: "Void" };

/** The builtin catalog seeded into the outermost scope of every session. */
export const BUILTIN_TYPES: readonly Type[] = [NUMBER_TYPE, INT32_TYPE, BOOL_TYPE, VOID_TYPE];

export function functionType(params: Type[], returnType: Type, name?: string): FunctionType {
  return {
    kind: TypeKind.Function,
    name: name ?? `fn(${params.map((p) => p.name).join(", ")}) -> ${returnType.name}`,
    params,
    returnType,
  };
}

export function structType(name: string, fields: StructField[]): StructType {
  return { kind: TypeKind.Struct, name, fields };
}

export function listType(element: Type, name?: string): ListType {
  return { kind: TypeKind.List, name: name ?? `[${element.name}]`, element };
}
