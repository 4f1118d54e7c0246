/**
 * Test utilities for IR lowering.
 */

import { binary, block, call, fn, ifExpr, num, param, program, ref } from "../../src/ast/builders.ts";
import type { Program } from "../../src/ast/nodes.ts";
import { CompileError } from "../../src/errors/index.ts";
import { CompilationContext } from "../../src/ir/context.ts";
import type { IrBlock, IrFunction, IrInst, IrModule, IrTerminator } from "../../src/ir/ir-types.ts";
import { compileProgram, type CompileOptions, Lowerer, lowerProgram } from "../../src/ir/lowering.ts";
import { printIr } from "../../src/ir/printer.ts";

/** Lower a program, throwing on the first compile error. */
export function lower(prog: Program, options?: CompileOptions): IrModule {
  return lowerProgram(prog, options);
}

/** Lower and return the printed IR text. */
export function lowerAndPrint(prog: Program): string {
  return printIr(lower(prog));
}

/** Lower and return a specific function by name. */
export function lowerFunction(prog: Program, name: string): IrFunction {
  const mod = lower(prog);
  const found = mod.functions.find((f) => f.name === name);
  if (!found) {
    const available = mod.functions.map((f) => f.name).join(", ");
    throw new Error(`Function '${name}' not found. Available: ${available}`);
  }
  return found;
}

/** The error a failing compilation reports. */
export function compileError(prog: Program): CompileError {
  const result = compileProgram(prog);
  if (result.ok) throw new Error("expected compilation to fail");
  return result.error;
}

/** The `CompileError` thrown by `run`. */
export function catchCompileError(run: () => unknown): CompileError {
  try {
    run();
  } catch (e) {
    if (e instanceof CompileError) return e;
    throw e;
  }
  throw new Error("expected a CompileError");
}

/**
 * A lowerer whose module `m` already has function `f` open with the given
 * parameters, for driving single expressions.
 */
export function openFunction(
  returnType: string,
  params: { typeName: string; name: string }[] = []
): { ctx: CompilationContext; lowerer: Lowerer } {
  const ctx = new CompilationContext();
  const lowerer = new Lowerer(ctx);
  ctx.module.createModule("m");
  ctx.module.defineFunction("f", returnType, params);
  return { ctx, lowerer };
}

/** Get all instructions of a given kind from a function. */
export function getInstructions<K extends IrInst["kind"]>(
  fn: IrFunction,
  kind: K
): Extract<IrInst, { kind: K }>[] {
  const result: Extract<IrInst, { kind: K }>[] = [];
  for (const b of fn.blocks) {
    for (const inst of b.instructions) {
      if (isKind(inst, kind)) result.push(inst);
    }
  }
  return result;
}

function isKind<K extends IrInst["kind"]>(inst: IrInst, kind: K): inst is Extract<IrInst, { kind: K }> {
  return inst.kind === kind;
}

/** Get all terminators of a given kind from a function. */
export function getTerminators(fn: IrFunction, kind: IrTerminator["kind"]): IrTerminator[] {
  return fn.blocks.map((b) => b.terminator).filter((t) => t.kind === kind);
}

/** Get a block by its id, failing the test when it does not exist. */
export function getBlock(fn: IrFunction, id: string): IrBlock {
  const found = fn.blocks.find((b) => b.id === id);
  if (!found) throw new Error(`Block '${id}' not found in '${fn.name}'`);
  return found;
}

/** Count instructions of a given kind. */
export function countInstructions(fn: IrFunction, kind: IrInst["kind"]): number {
  return getInstructions(fn, kind).length;
}

/**
 * `gcd(a, b) = if b == 0 then a else gcd(b, a rem b)` and
 * `main() -> Int32 { gcd(12, 18); 0 }`.
 */
export function gcdProgram(): Program {
  return program(
    fn(
      "gcd",
      [param("Number", "a"), param("Number", "b")],
      "Number",
      ifExpr(
        binary("eq", ref("b"), num(0)),
        ref("a"),
        call("gcd", ref("b"), binary("rem", ref("a"), ref("b")))
      )
    ),
    fn("main", [], "Int32", block(call("gcd", num(12), num(18)), num(0)))
  );
}
