import { describe, expect, test } from "vitest";
import { CompileError, EmitterDefect } from "../../src/errors/index.ts";
import { ScopeStack } from "../../src/scope/scope.ts";
import { SymbolStack } from "../../src/scope/symbol-stack.ts";
import { TypeRegistry } from "../../src/scope/type-registry.ts";
import { BUILTIN_TYPES, INT32_TYPE, NUMBER_TYPE, listType } from "../../src/types/index.ts";

function fresh() {
  const scopes = new ScopeStack(BUILTIN_TYPES);
  return { scopes, types: new TypeRegistry(scopes), symbols: new SymbolStack(scopes) };
}

function codeOf(run: () => unknown): string {
  try {
    run();
  } catch (e) {
    if (e instanceof CompileError) return e.code;
    throw e;
  }
  return "no error";
}

describe("ScopeStack", () => {
  test("starts with the builtin scope only", () => {
    const { scopes } = fresh();
    expect(scopes.depth).toBe(1);
    expect([...scopes.innermost.types.keys()]).toEqual(["Number", "Int32", "Bool", "Void"]);
  });

  test("the builtin scope cannot be popped", () => {
    const { scopes } = fresh();
    scopes.push();
    scopes.pop();
    expect(() => scopes.pop()).toThrow(EmitterDefect);
  });
});

describe("TypeRegistry", () => {
  test("resolves builtins by name", () => {
    const { types } = fresh();
    expect(types.resolve("Int32")).toBe(INT32_TYPE);
    expect(types.isDefined("Number")).toBe(true);
  });

  test("unknown names are UndefinedType", () => {
    const { types } = fresh();
    expect(types.isDefined("Point")).toBe(false);
    expect(codeOf(() => types.resolve("Point"))).toBe("UndefinedType");
  });

  test("redefining in the same scope is DuplicateType", () => {
    const { types } = fresh();
    types.define("Numbers", listType(NUMBER_TYPE, "Numbers"));
    expect(codeOf(() => types.define("Numbers", listType(INT32_TYPE, "Numbers")))).toBe("DuplicateType");
    expect(codeOf(() => types.define("Int32", NUMBER_TYPE))).toBe("DuplicateType");
  });

  test("an inner definition shadows until its scope is popped", () => {
    const { scopes, types } = fresh();
    scopes.push();
    const inner = listType(INT32_TYPE, "Number");
    types.define("Number", inner);
    expect(types.resolve("Number")).toBe(inner);
    scopes.pop();
    expect(types.resolve("Number")).toBe(NUMBER_TYPE);
  });
});

describe("SymbolStack", () => {
  test("lookup finds the innermost binding", () => {
    const { symbols } = fresh();
    symbols.bind("x", { type: NUMBER_TYPE, slot: "%0" });
    symbols.pushScope();
    symbols.bind("x", { type: INT32_TYPE, slot: "%1" });
    expect(symbols.lookup("x")).toEqual({ type: INT32_TYPE, slot: "%1" });
    symbols.popScope();
    expect(symbols.lookup("x")).toEqual({ type: NUMBER_TYPE, slot: "%0" });
  });

  test("rebinding in the same scope replaces the binding", () => {
    const { symbols } = fresh();
    symbols.bind("x", { type: NUMBER_TYPE, slot: "%0" });
    symbols.bind("x", { type: NUMBER_TYPE, slot: "%3" });
    expect(symbols.lookup("x").slot).toBe("%3");
  });

  test("lookup stops at a function boundary", () => {
    const { symbols } = fresh();
    symbols.pushScope({ isFunctionBoundary: true });
    symbols.bind("outer", { type: NUMBER_TYPE, slot: "%0" });
    symbols.pushScope({ isFunctionBoundary: true });
    symbols.bind("inner", { type: NUMBER_TYPE, slot: "%1" });
    expect(symbols.tryLookup("outer")).toBeUndefined();
    expect(symbols.tryLookup("inner")?.slot).toBe("%1");
    expect(codeOf(() => symbols.lookup("outer"))).toBe("UndefinedVariable");
  });

  test("types and values share the stack", () => {
    const { scopes, types, symbols } = fresh();
    symbols.pushScope();
    types.define("Row", listType(NUMBER_TYPE, "Row"));
    expect(scopes.depth).toBe(2);
    symbols.popScope();
    expect(types.isDefined("Row")).toBe(false);
  });
});
