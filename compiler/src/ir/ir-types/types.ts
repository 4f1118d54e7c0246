// ─── IR Types ────────────────────────────────────────────────────────────────

/** Union of all IR-level type representations. */
export type IrType =
  | IrIntType
  | IrFloatType
  | IrBoolType
  | IrVoidType
  | IrStructType
  | IrListType
  | IrFunctionType;

/** Signed 32-bit integer. */
export interface IrIntType {
  kind: "int";
  bits: 32;
  signed: true;
}

/** IEEE 754 double. */
export interface IrFloatType {
  kind: "float";
  bits: 64;
}

/** 1-bit integer. */
export interface IrBoolType {
  kind: "bool";
}

export interface IrVoidType {
  kind: "void";
}

export interface IrField {
  name: string;
  type: IrType;
}

export interface IrStructType {
  kind: "struct";
  name: string;
  fields: IrField[];
}

/** Length-prefixed sequence; string literals are lists of Int32 code points. */
export interface IrListType {
  kind: "list";
  element: IrType;
}

export interface IrFunctionType {
  kind: "function";
  params: IrType[];
  returnType: IrType;
}
