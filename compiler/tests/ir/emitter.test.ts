import { describe, expect, test } from "vitest";
import { EmitterDefect } from "../../src/errors/index.ts";
import { CompilationContext } from "../../src/ir/context.ts";
import { BOOL_TYPE, INT32_TYPE, NUMBER_TYPE, VOID_TYPE } from "../../src/types/index.ts";
import { catchCompileError } from "./helpers.ts";

/** A context with module `m` and function `f` open at its entry block. */
function open(returnType = "Void") {
  const ctx = new CompilationContext();
  ctx.module.createModule("m");
  const handle = ctx.module.defineFunction("f", returnType, []);
  return { ctx, emitter: ctx.emitter, handle };
}

describe("Emitter: blocks and cursor", () => {
  test("blocks are numbered per function", () => {
    const { ctx, emitter } = open();
    expect(emitter.newBlock("if.then")).toBe("if.then.0");
    expect(emitter.newBlock("while.header")).toBe("while.header.1");

    ctx.module.defineFunction("g", "Void", []);
    expect(emitter.newBlock("if.then")).toBe("if.then.0");
  });

  test("position moves the cursor without terminating", () => {
    const { emitter } = open();
    const next = emitter.newBlock("next");
    emitter.position(next);
    expect(emitter.currentBlock).toBe("next.0");
    emitter.position("entry");
    expect(emitter.isTerminated()).toBe(false);
  });

  test("positioning on an unknown block is a defect", () => {
    const { emitter } = open();
    expect(() => emitter.position("nowhere")).toThrow(EmitterDefect);
  });

  test("blocks need an open function", () => {
    const ctx = new CompilationContext();
    ctx.module.createModule("m");
    const error = catchCompileError(() => ctx.emitter.newBlock("if.then"));
    expect(error.detail).toEqual({ code: "NoEnclosingFunction" });
  });
});

describe("Emitter: terminators", () => {
  test("terminating a block twice is a defect", () => {
    const { emitter } = open();
    emitter.retVoid();
    expect(() => emitter.retVoid()).toThrow(EmitterDefect);
  });

  test("emitting into a terminated block is a defect", () => {
    const { emitter } = open();
    emitter.retVoid();
    expect(() => emitter.emit({ kind: "const_bool", dest: "%9", value: true })).toThrow(
      "emitting 'const_bool' into terminated block 'entry'"
    );
  });

  test("finishing with an unterminated block is a defect", () => {
    const { ctx, emitter } = open();
    emitter.newBlock("orphan");
    expect(() => ctx.module.finishFunction({ type: VOID_TYPE, value: null })).toThrow(
      "block 'orphan.0' in 'f' has no terminator"
    );
  });

  test("a conditional branch needs a Bool", () => {
    const { emitter } = open();
    const a = emitter.newBlock("a");
    const b = emitter.newBlock("b");
    const error = catchCompileError(() =>
      emitter.branchConditional({ type: NUMBER_TYPE, value: "%0" }, a, b)
    );
    expect(error.detail).toEqual({ code: "TypeMismatch", expected: "Bool", actual: "Number" });
    expect(emitter.isTerminated()).toBe(false);
  });

  test("branches record both targets", () => {
    const { emitter, handle } = open();
    const a = emitter.newBlock("a");
    const b = emitter.newBlock("b");
    emitter.branchConditional({ type: BOOL_TYPE, value: "%7" }, a, b);
    for (const id of [a, b]) {
      emitter.position(id);
      emitter.retVoid();
    }
    emitter.endFunction();
    expect(handle.ir.blocks[0]?.terminator).toEqual({
      kind: "br",
      cond: "%7",
      thenBlock: "a.0",
      elseBlock: "b.1",
    });
  });
});

describe("Emitter: conditions", () => {
  test("a Bool is already a condition", () => {
    const { emitter } = open();
    const cond = { type: BOOL_TYPE, value: "%3" };
    expect(emitter.toCondition(cond)).toBe(cond);
    expect(emitter.instructionCount).toBe(0);
  });

  test("a Number is compared against 0.0", () => {
    const { emitter } = open();
    expect(emitter.toCondition({ type: NUMBER_TYPE, value: "%x" })).toEqual({
      type: BOOL_TYPE,
      value: "%1",
    });
    expect(emitter.instructionCount).toBe(2);
  });

  test("an Int32 is compared against 0", () => {
    const { ctx, emitter, handle } = open();
    emitter.toCondition({ type: INT32_TYPE, value: "%x" });
    ctx.module.finishFunction({ type: VOID_TYPE, value: null });
    expect(handle.ir.blocks[0]?.instructions).toEqual([
      { kind: "const_int", dest: "%0", type: { kind: "int", bits: 32, signed: true }, value: 0 },
      {
        kind: "bin_op",
        op: "neq",
        dest: "%1",
        lhs: "%x",
        rhs: "%0",
        type: { kind: "int", bits: 32, signed: true },
      },
    ]);
  });

  test("Void is not a condition", () => {
    const { emitter } = open();
    const error = catchCompileError(() => emitter.toCondition({ type: VOID_TYPE, value: null }));
    expect(error.detail).toEqual({ code: "TypeMismatch", expected: "Bool", actual: "Void" });
  });
});

describe("Emitter: phi merges", () => {
  test("values of different types cannot merge", () => {
    const { emitter } = open();
    const a = emitter.newBlock("a");
    const b = emitter.newBlock("b");
    const error = catchCompileError(() =>
      emitter.mergePhi({ type: INT32_TYPE, value: "%1" }, a, { type: NUMBER_TYPE, value: "%2" }, b)
    );
    expect(error.detail).toEqual({ code: "TypeMismatch", expected: "Int32", actual: "Number" });
  });

  test("the phi lands in the block under the cursor", () => {
    const { emitter, handle } = open();
    const a = emitter.newBlock("a");
    const b = emitter.newBlock("b");
    const merge = emitter.newBlock("merge");
    emitter.branchConditional({ type: BOOL_TYPE, value: "%c" }, a, b);
    for (const id of [a, b]) {
      emitter.position(id);
      emitter.branchUnconditional(merge);
    }
    emitter.position(merge);
    const merged = emitter.mergePhi(
      { type: NUMBER_TYPE, value: "%1" },
      a,
      { type: NUMBER_TYPE, value: "%2" },
      b
    );
    expect(merged).toEqual({ type: NUMBER_TYPE, value: "%0" });
    emitter.retVoid();
    emitter.endFunction();
    expect(handle.ir.blocks[3]?.phis).toEqual([
      {
        dest: "%0",
        type: { kind: "float", bits: 64 },
        incoming: [
          { value: "%1", from: "a.0" },
          { value: "%2", from: "b.1" },
        ],
      },
    ]);
  });
});
