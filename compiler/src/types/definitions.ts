/**
 * Semantic types of KSC values. Every type carries the name it is
 * registered and printed under; equality is structural (see `typesEqual`).
 */

import type { TypeKind } from "./kinds.ts";

// ─── Type Definitions ───────────────────────────────────────────────────────

/** 64-bit IEEE 754 float. */
export interface NumberType {
  kind: typeof TypeKind.Number;
  name: string;
}

/** 32-bit signed integer. */
export interface Int32Type {
  kind: typeof TypeKind.Int32;
  name: string;
}

/** 1-bit integer. */
export interface BoolType {
  kind: typeof TypeKind.Bool;
  name: string;
}

/** No value. A Void `TypedValue` has no underlying SSA value. */
export interface VoidType {
  kind: typeof TypeKind.Void;
  name: string;
}

export interface FunctionType {
  kind: typeof TypeKind.Function;
  name: string;
  params: Type[];
  returnType: Type;
}

export interface StructField {
  name: string;
  type: Type;
}

/** Nominal: two struct types are equal only when their names are. */
export interface StructType {
  kind: typeof TypeKind.Struct;
  name: string;
  fields: StructField[];
}

export interface ListType {
  kind: typeof TypeKind.List;
  name: string;
  element: Type;
}

/** Union of all semantic types. */
export type Type =
  | NumberType
  | Int32Type
  | BoolType
  | VoidType
  | FunctionType
  | StructType
  | ListType;

/** Types that support arithmetic and ordering comparisons. */
export type NumericType = NumberType | Int32Type;
