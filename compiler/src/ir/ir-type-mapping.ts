/**
 * Semantic type → IR type conversion.
 */

import { type Type, TypeKind } from "../types/index.ts";
import type { IrFloatType, IrIntType, IrType } from "./ir-types.ts";

export const I32: IrIntType = { kind: "int", bits: 32, signed: true };
export const F64: IrFloatType = { kind: "float", bits: 64 };

export function toIrType(t: Type): IrType {
  switch (t.kind) {
    case TypeKind.Number:
      return F64;
    case TypeKind.Int32:
      return I32;
    case TypeKind.Bool:
      return { kind: "bool" };
    case TypeKind.Void:
      return { kind: "void" };
    case TypeKind.Struct:
      return {
        kind: "struct",
        name: t.name,
        fields: t.fields.map((f) => ({ name: f.name, type: toIrType(f.type) })),
      };
    case TypeKind.List:
      return { kind: "list", element: toIrType(t.element) };
    case TypeKind.Function:
      return {
        kind: "function",
        params: t.params.map(toIrType),
        returnType: toIrType(t.returnType),
      };
  }
}
