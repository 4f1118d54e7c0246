import { describe, expect, test } from "vitest";
import type { BinaryOperatorKind } from "../../src/ast/nodes.ts";
import { binary, call, externFn, fn, num, param, program, ref } from "../../src/ast/builders.ts";
import {
  catchCompileError,
  compileError,
  getBlock,
  getInstructions,
  lowerFunction,
  openFunction,
} from "./helpers.ts";

const F64 = { kind: "float", bits: 64 };
const I32 = { kind: "int", bits: 32, signed: true };

const ARITHMETIC: BinaryOperatorKind[] = ["add", "sub", "mul", "div", "idiv", "rem"];
const COMPARISON: BinaryOperatorKind[] = ["eq", "neq", "lt", "gt", "lte", "gte"];

function binaryFunction(type: string, op: BinaryOperatorKind, returnType: string) {
  return program(
    fn("f", [param(type, "a"), param(type, "b")], returnType, binary(op, ref("a"), ref("b")))
  );
}

describe("IR: arithmetic", () => {
  test.each(ARITHMETIC)("%s on Number", (op) => {
    const f = lowerFunction(binaryFunction("Number", op, "Number"), "f");
    expect(getInstructions(f, "bin_op")).toEqual([
      { kind: "bin_op", op, dest: "%4", lhs: "%2", rhs: "%3", type: F64 },
    ]);
    expect(getBlock(f, "entry").terminator).toEqual({ kind: "ret", value: "%4" });
  });

  test.each(ARITHMETIC)("%s on Int32", (op) => {
    const f = lowerFunction(binaryFunction("Int32", op, "Int32"), "f");
    expect(getInstructions(f, "bin_op")).toEqual([
      { kind: "bin_op", op, dest: "%4", lhs: "%2", rhs: "%3", type: I32 },
    ]);
  });

  test("a literal operand takes the other operand's type", () => {
    const f = lowerFunction(
      program(fn("f", [param("Int32", "n")], "Int32", binary("add", num(1), ref("n")))),
      "f"
    );
    expect(getBlock(f, "entry").instructions.slice(2)).toEqual([
      { kind: "const_int", dest: "%1", type: I32, value: 1 },
      { kind: "load", dest: "%2", ptr: "%0", type: I32 },
      { kind: "bin_op", op: "add", dest: "%3", lhs: "%1", rhs: "%2", type: I32 },
    ]);
  });

  test("literal operands take the expected type", () => {
    const f = lowerFunction(program(fn("f", [], "Int32", binary("mul", num(2), num(3)))), "f");
    expect(getBlock(f, "entry").instructions).toEqual([
      { kind: "const_int", dest: "%0", type: I32, value: 2 },
      { kind: "const_int", dest: "%1", type: I32, value: 3 },
      { kind: "bin_op", op: "mul", dest: "%2", lhs: "%0", rhs: "%1", type: I32 },
    ]);
  });

  test("operand types flow through nested operators", () => {
    const f = lowerFunction(
      program(
        fn(
          "f",
          [param("Int32", "a")],
          "Int32",
          binary("add", binary("mul", ref("a"), num(2)), num(1))
        )
      ),
      "f"
    );
    expect(getInstructions(f, "const_int").map((c) => c.value)).toEqual([2, 1]);
    expect(getInstructions(f, "const_float")).toEqual([]);
  });
});

describe("IR: comparisons", () => {
  test.each(COMPARISON)("%s on Int32 yields Bool", (op) => {
    const f = lowerFunction(binaryFunction("Int32", op, "Bool"), "f");
    expect(f.returnType).toEqual({ kind: "bool" });
    expect(getInstructions(f, "bin_op")).toEqual([
      { kind: "bin_op", op, dest: "%4", lhs: "%2", rhs: "%3", type: I32 },
    ]);
  });

  test("literal comparisons default to Number", () => {
    const f = lowerFunction(program(fn("f", [], "Bool", binary("lt", num(1), num(2)))), "f");
    expect(getBlock(f, "entry").instructions).toEqual([
      { kind: "const_float", dest: "%0", type: F64, value: 1 },
      { kind: "const_float", dest: "%1", type: F64, value: 2 },
      { kind: "bin_op", op: "lt", dest: "%2", lhs: "%0", rhs: "%1", type: F64 },
    ]);
  });

  test("Bool supports equality", () => {
    const f = lowerFunction(binaryFunction("Bool", "neq", "Bool"), "f");
    expect(getInstructions(f, "bin_op")[0]?.type).toEqual({ kind: "bool" });
  });

  test("Bool does not support ordering", () => {
    const error = compileError(binaryFunction("Bool", "lt", "Bool"));
    expect(error.detail).toEqual({ code: "UnsupportedOperation", type: "Bool", operation: "lt" });
  });

  test("Bool does not support arithmetic", () => {
    const error = compileError(binaryFunction("Bool", "add", "Bool"));
    expect(error.detail).toEqual({ code: "UnsupportedOperation", type: "Bool", operation: "add" });
  });
});

describe("IR: operand type errors", () => {
  test("Int32 and Number operands are rejected with nothing emitted", () => {
    const { ctx, lowerer } = openFunction("Number", [
      { typeName: "Int32", name: "x" },
      { typeName: "Number", name: "y" },
    ]);
    const before = ctx.emitter.instructionCount;
    const error = catchCompileError(() => lowerer.lowerExpr(binary("add", ref("x"), ref("y"))));
    expect(error.code).toBe("TypeMismatch");
    expect(error.detail).toEqual({ code: "TypeMismatch", expected: "Int32", actual: "Number" });
    expect(ctx.emitter.instructionCount).toBe(before);
  });

  test("Void operands are unsupported", () => {
    const error = compileError(
      program(
        externFn("tick", [], null),
        fn("f", [], null, binary("add", call("tick"), call("tick")))
      )
    );
    expect(error.detail).toEqual({ code: "UnsupportedOperation", type: "Void", operation: "add" });
  });
});
