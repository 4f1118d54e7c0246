import type { VarId } from "./identifiers.ts";
import type {
  IrFloatType,
  IrFunctionType,
  IrIntType,
  IrListType,
  IrType,
} from "./types.ts";

// ─── Instructions ────────────────────────────────────────────────────────────

/** Union of all IR instructions (everything except phis and terminators). */
export type IrInst =
  // Memory
  | IrStackAlloc
  | IrLoad
  | IrStore
  // Arithmetic & Comparison
  | IrBinOp
  // Constants
  | IrConstInt
  | IrConstFloat
  | IrConstBool
  | IrConstString
  | IrFuncRef
  // Functions
  | IrCall
  | IrCallVoid
  | IrCallIndirect
  | IrCallIndirectVoid
  // Lists
  | IrListLen
  | IrListGet;

// ── Memory ───────────────────────────────────────────────────────────────────

/** Allocate an addressable slot; `dest` is a pointer to it. */
export interface IrStackAlloc {
  kind: "stack_alloc";
  dest: VarId;
  type: IrType;
}

export interface IrLoad {
  kind: "load";
  dest: VarId;
  ptr: VarId;
  type: IrType;
}

export interface IrStore {
  kind: "store";
  ptr: VarId;
  value: VarId;
}

// ── Arithmetic & Comparison ──────────────────────────────────────────────────

/**
 * All supported binary operations. Integer forms are signed; float forms
 * follow IEEE 754. `idiv` on floats truncates the quotient toward zero.
 */
export type BinOp =
  | "add"
  | "sub"
  | "mul"
  | "div"
  | "idiv"
  | "rem"
  | "eq"
  | "neq"
  | "lt"
  | "gt"
  | "lte"
  | "gte";

/**
 * Binary operation on two SSA values of `type`. Comparisons produce a
 * bool; every other operation produces a value of `type`.
 */
export interface IrBinOp {
  kind: "bin_op";
  op: BinOp;
  dest: VarId;
  lhs: VarId;
  rhs: VarId;
  type: IrType;
}

// ── Constants ────────────────────────────────────────────────────────────────

export interface IrConstInt {
  kind: "const_int";
  dest: VarId;
  type: IrIntType;
  value: number;
}

export interface IrConstFloat {
  kind: "const_float";
  dest: VarId;
  type: IrFloatType;
  value: number;
}

export interface IrConstBool {
  kind: "const_bool";
  dest: VarId;
  value: boolean;
}

export interface IrConstString {
  kind: "const_string";
  dest: VarId;
  type: IrListType;
  value: string;
}

/** Address of a module function, for storing in a Function-typed slot. */
export interface IrFuncRef {
  kind: "func_ref";
  dest: VarId;
  func: string;
  type: IrFunctionType;
}

// ── Function calls ───────────────────────────────────────────────────────────

/** Call a function that returns a value. */
export interface IrCall {
  kind: "call";
  dest: VarId;
  func: string;
  args: VarId[];
  type: IrType;
}

/** Call a void-returning function. */
export interface IrCallVoid {
  kind: "call_void";
  func: string;
  args: VarId[];
}

/** Call through a function value. */
export interface IrCallIndirect {
  kind: "call_indirect";
  dest: VarId;
  callee: VarId;
  args: VarId[];
  type: IrType;
}

export interface IrCallIndirectVoid {
  kind: "call_indirect_void";
  callee: VarId;
  args: VarId[];
}

// ── Lists ────────────────────────────────────────────────────────────────────

/** Element count of a list, as an i32. */
export interface IrListLen {
  kind: "list_len";
  dest: VarId;
  list: VarId;
}

/** Element at an i32 index. */
export interface IrListGet {
  kind: "list_get";
  dest: VarId;
  list: VarId;
  index: VarId;
  type: IrType;
}
