// ─── Type Kind Constants ────────────────────────────────────────────────────

export const TypeKind = {
  Number: "number",
  Int32: "int32",
  Bool: "bool",
  Void: "void",
  Function: "function",
  Struct: "struct",
  List: "list",
} as const;

export type TypeKindValue = (typeof TypeKind)[keyof typeof TypeKind];
