import { describe, expect, test } from "vitest";
import { block, fn, forExpr, listType, param, program, ref, str } from "../../src/ast/builders.ts";
import { AstValidationError, validateProgram } from "../../src/ast/validate.ts";

function failurePath(value: unknown): string {
  try {
    validateProgram(value);
  } catch (e) {
    if (e instanceof AstValidationError) return e.message;
    throw e;
  }
  return "valid";
}

function mainWithBody(body: unknown): unknown {
  return {
    kind: "Program",
    statements: [{ kind: "FunctionDeclaration", name: "main", params: [], returnType: null, body }],
  };
}

describe("validateProgram: accepted shapes", () => {
  test("a program survives a JSON round trip unchanged", () => {
    const prog = program(
      listType("Text", "Int32"),
      fn("count", [param("Text", "t")], null, block(forExpr("c", "t", block()), str("done")))
    );
    expect(validateProgram(JSON.parse(JSON.stringify(prog)))).toEqual(prog);
  });

  test("a missing returnType reads as null", () => {
    const prog = validateProgram({
      kind: "Program",
      statements: [{ kind: "ExternFunctionDeclaration", name: "tick", params: [] }],
    });
    expect(prog.statements[0]).toEqual({
      kind: "ExternFunctionDeclaration",
      name: "tick",
      params: [],
      returnType: null,
    });
  });

  test("spans are kept", () => {
    const prog = validateProgram(mainWithBody({ kind: "VariableReference", name: "x", span: { start: 4, end: 5 } }));
    const decl = prog.statements[0];
    expect(decl?.kind === "FunctionDeclaration" ? decl.body : undefined).toEqual({
      ...ref("x"),
      span: { start: 4, end: 5 },
    });
  });
});

describe("validateProgram: errors name the JSON path", () => {
  test("not an object", () => {
    expect(failurePath([])).toBe("$: expected an object");
  });

  test("wrong root kind", () => {
    expect(failurePath({ kind: "Block", statements: [] })).toBe("$.kind: expected 'Program', got 'Block'");
  });

  test("statements is not an array", () => {
    expect(failurePath({ kind: "Program", statements: {} })).toBe("$.statements: expected an array");
  });

  test("unknown node kind", () => {
    expect(failurePath(mainWithBody({ kind: "Lambda" }))).toBe(
      "$.statements[0].body.kind: unknown node kind 'Lambda'"
    );
  });

  test("unknown operator", () => {
    const body = {
      kind: "BinaryOperator",
      operator: "pow",
      left: { kind: "NumberLiteral", value: 2 },
      right: { kind: "NumberLiteral", value: 3 },
    };
    expect(failurePath(mainWithBody(body))).toBe("$.statements[0].body.operator: unknown operator 'pow'");
  });

  test("a block in expression position", () => {
    const body = {
      kind: "FunctionCall",
      name: "f",
      args: [{ kind: "Block", statements: [] }],
    };
    expect(failurePath(mainWithBody(body))).toBe(
      "$.statements[0].body.args[0].kind: a block cannot be used as an expression"
    );
  });

  test("a bad field deep in a branch", () => {
    const body = {
      kind: "IfExpression",
      condition: { kind: "VariableReference", name: "c" },
      thenBranch: { kind: "Block", statements: [{ kind: "VariableReference", name: 7 }] },
      elseBranch: { kind: "NumberLiteral", value: 0 },
    };
    expect(failurePath(mainWithBody(body))).toBe(
      "$.statements[0].body.thenBranch.statements[0].name: expected a string"
    );
  });

  test("unknown type definition", () => {
    const decl = { kind: "TypeDeclaration", name: "T", definition: { kind: "enum" } };
    expect(failurePath({ kind: "Program", statements: [decl] })).toBe(
      "$.statements[0].definition.kind: unknown type definition 'enum'"
    );
  });

  test("a malformed span", () => {
    const body = { kind: "NumberLiteral", value: 1, span: { start: 0 } };
    expect(failurePath(mainWithBody(body))).toBe("$.statements[0].body.span.end: expected a number");
  });
});
