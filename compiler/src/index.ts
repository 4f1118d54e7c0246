/**
 * Public API of the KSC lowering engine.
 */

export * from "./ast/nodes.ts";
export * as build from "./ast/builders.ts";
export { AstValidationError, validateProgram } from "./ast/validate.ts";
export * from "./errors/index.ts";
export * from "./types/index.ts";
export type * from "./ir/ir-types.ts";
export { FlowGraph, terminatorTargets } from "./ir/cfg.ts";
export { CompilationContext } from "./ir/context.ts";
export { ControlFlowEmitter } from "./ir/emitter.ts";
export {
  type CompileOptions,
  type CompileResult,
  compileProgram,
  Lowerer,
  lowerProgram,
} from "./ir/lowering.ts";
export { type FunctionHandle, ModuleBuilder, type ParamSpec } from "./ir/module-builder.ts";
export { printIr, printType } from "./ir/printer.ts";
export type { TypedValue } from "./ir/typed-value.ts";
export { verifyFunction, verifyModule } from "./ir/verify.ts";
