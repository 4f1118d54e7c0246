import { typeMismatch } from "../errors/index.ts";
import { type Type, VOID_TYPE } from "../types/index.ts";
import type { VarId } from "./ir-types.ts";

/** A lowered expression: its type and, unless it is Void, its SSA value. */
export interface TypedValue {
  type: Type;
  value: VarId | null;
}

export const VOID_VALUE: TypedValue = { type: VOID_TYPE, value: null };

/**
 * The SSA value of `v`. A Void value used where a value is required is a
 * type mismatch against `expected` (or against "a value" when unknown).
 */
export function valueOf(v: TypedValue, expected?: Type): VarId {
  if (v.value === null) throw typeMismatch(expected?.name ?? "a value", v.type.name);
  return v.value;
}
