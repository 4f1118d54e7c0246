/**
 * IR node types.
 * Uses discriminated unions with a `kind` field, matching AST conventions.
 *
 * The IR is a low-level SSA form: functions made of basic blocks with
 * explicit terminators, addressable slots for variables, and phi nodes for
 * value merging at control-flow join points.
 */

export * from "./ir-types/index.ts";
