import { describe, expect, test } from "vitest";
import { decl, fn, listType, num, param, program, str, structType } from "../../src/ast/builders.ts";
import { compileError, getInstructions, lowerFunction } from "./helpers.ts";

const LIST_I32 = { kind: "list", element: { kind: "int", bits: 32, signed: true } };

describe("IR: number literals", () => {
  test("Number by default", () => {
    const f = lowerFunction(program(fn("f", [], null, num(1.5))), "f");
    expect(getInstructions(f, "const_float")).toEqual([
      { kind: "const_float", dest: "%0", type: { kind: "float", bits: 64 }, value: 1.5 },
    ]);
  });

  test.each([
    [2.5, 3],
    [-2.5, -2],
    [7.2, 7],
    [-2147483648, -2147483648],
  ])("Int32 %d rounds to %d", (value, rounded) => {
    const f = lowerFunction(program(fn("f", [], "Int32", num(value))), "f");
    expect(getInstructions(f, "const_int")[0]?.value).toBe(rounded);
  });

  test("Int32 out of range", () => {
    const error = compileError(program(fn("f", [], "Int32", num(2 ** 31))));
    expect(error.detail).toEqual({ code: "InvalidConstantForType", type: "Int32" });
  });

  test("Bool is true for any non-zero value", () => {
    const yes = lowerFunction(program(fn("f", [], "Bool", num(3))), "f");
    const no = lowerFunction(program(fn("f", [], "Bool", num(0))), "f");
    expect(getInstructions(yes, "const_bool")).toEqual([{ kind: "const_bool", dest: "%0", value: true }]);
    expect(getInstructions(no, "const_bool")).toEqual([{ kind: "const_bool", dest: "%0", value: false }]);
  });

  test("no literal has a struct type", () => {
    const error = compileError(
      program(structType("Point", [param("Number", "x")]), fn("f", [], "Point", num(1)))
    );
    expect(error.detail).toEqual({ code: "InvalidConstantForType", type: "Point" });
  });
});

describe("IR: string literals", () => {
  test("a list of Int32 by default", () => {
    const f = lowerFunction(program(fn("f", [], null, decl(null, "s", str("hi")))), "f");
    expect(getInstructions(f, "const_string")).toEqual([
      { kind: "const_string", dest: "%0", type: LIST_I32, value: "hi" },
    ]);
    expect(getInstructions(f, "stack_alloc")[0]?.type).toEqual(LIST_I32);
  });

  test("takes a named list of Int32", () => {
    const f = lowerFunction(program(listType("Text", "Int32"), fn("f", [], "Text", str("hi"))), "f");
    expect(f.returnType).toEqual(LIST_I32);
    expect(getInstructions(f, "const_string")).toHaveLength(1);
  });

  test("cannot be a Number", () => {
    const error = compileError(program(fn("f", [], "Number", str("x"))));
    expect(error.detail).toEqual({ code: "InvalidConstantForType", type: "Number" });
  });

  test("cannot be a list of Number", () => {
    const error = compileError(program(listType("Nums", "Number"), fn("f", [], "Nums", str("x"))));
    expect(error.detail).toEqual({ code: "InvalidConstantForType", type: "Nums" });
  });
});
