// ─── Type Utilities ─────────────────────────────────────────────────────────

import type { NumericType, Type } from "./definitions.ts";
import { TypeKind } from "./kinds.ts";

/**
 * Exact type equality. Scalars compare by variant, structs by identity
 * (each declaration is its own type, even under a shadowed name), lists
 * by element and functions by signature. There is no implicit
 * conversion anywhere in KSC, so this is the only compatibility check.
 */
export function typesEqual(a: Type, b: Type): boolean {
  switch (a.kind) {
    case TypeKind.Number:
    case TypeKind.Int32:
    case TypeKind.Bool:
    case TypeKind.Void:
      return a.kind === b.kind;
    case TypeKind.Struct:
      return a === b;
    case TypeKind.List:
      return b.kind === TypeKind.List && typesEqual(a.element, b.element);
    case TypeKind.Function: {
      if (b.kind !== TypeKind.Function) return false;
      if (a.params.length !== b.params.length) return false;
      if (!typesEqual(a.returnType, b.returnType)) return false;
      return a.params.every((p, i) => {
        const other = b.params[i];
        return other !== undefined && typesEqual(p, other);
      });
    }
  }
}

export function isNumeric(t: Type): t is NumericType {
  return t.kind === TypeKind.Number || t.kind === TypeKind.Int32;
}

export function isVoid(t: Type): boolean {
  return t.kind === TypeKind.Void;
}
