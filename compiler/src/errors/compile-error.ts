/**
 * Compile-time error taxonomy.
 *
 * Every error is fatal to the compilation unit: lowering throws a
 * `CompileError` at the first problem and `compileProgram` turns it into a
 * failed result. Validation runs before emission at every step, so no
 * instructions are emitted for the operation that failed.
 *
 * `EmitterDefect` is not part of the taxonomy. It signals a malformed
 * control-flow graph, which is a bug in the lowering code rather than in the
 * program being compiled, and is never converted into a diagnostic.
 */

import type { Span } from "../ast/nodes.ts";
import { type Diagnostic, Severity } from "./diagnostic.ts";

export type CompileErrorDetail =
  | { code: "UndefinedType"; name: string }
  | { code: "DuplicateType"; name: string }
  | { code: "UndefinedVariable"; name: string }
  | { code: "UndefinedFunction"; name: string }
  | { code: "DuplicateFunction"; name: string }
  | { code: "DuplicateParameter"; name: string }
  | { code: "InvalidParameterName"; name: string }
  | { code: "ParameterCountMismatch"; name: string; expected: number; actual: number }
  | { code: "TypeMismatch"; expected: string; actual: string }
  | { code: "InvalidConstantForType"; type: string }
  | { code: "UnsupportedOperation"; type: string; operation: string }
  | { code: "UnsupportedConstruct"; construct: string }
  | { code: "NoModule" }
  | { code: "ModuleAlreadyCreated" }
  | { code: "NoEnclosingFunction" };

export type CompileErrorCode = CompileErrorDetail["code"];

function describe(detail: CompileErrorDetail): string {
  switch (detail.code) {
    case "UndefinedType":
      return `undefined type '${detail.name}'`;
    case "DuplicateType":
      return `type '${detail.name}' is already defined in this scope`;
    case "UndefinedVariable":
      return `undefined variable '${detail.name}'`;
    case "UndefinedFunction":
      return `undefined function '${detail.name}'`;
    case "DuplicateFunction":
      return `function '${detail.name}' is already defined`;
    case "DuplicateParameter":
      return `duplicate parameter '${detail.name}'`;
    case "InvalidParameterName":
      return `'${detail.name}' is not a valid parameter name`;
    case "ParameterCountMismatch":
      return `'${detail.name}' expects ${detail.expected} argument(s), got ${detail.actual}`;
    case "TypeMismatch":
      return `type mismatch: expected '${detail.expected}', got '${detail.actual}'`;
    case "InvalidConstantForType":
      return `a literal cannot have type '${detail.type}'`;
    case "UnsupportedOperation":
      return `operation '${detail.operation}' is not supported on '${detail.type}'`;
    case "UnsupportedConstruct":
      return `no lowering for '${detail.construct}'`;
    case "NoModule":
      return "no module has been created";
    case "ModuleAlreadyCreated":
      return "a module has already been created for this session";
    case "NoEnclosingFunction":
      return "expression used outside of any function body";
  }
}

export class CompileError extends Error {
  readonly detail: CompileErrorDetail;
  /** Span of the node being lowered when the error was raised. */
  span?: Span;

  constructor(detail: CompileErrorDetail, span?: Span) {
    super(describe(detail));
    this.name = "CompileError";
    this.detail = detail;
    this.span = span;
  }

  get code(): CompileErrorCode {
    return this.detail.code;
  }

  toDiagnostic(): Diagnostic {
    return { severity: Severity.Error, code: this.code, message: this.message, span: this.span };
  }
}

export class EmitterDefect extends Error {
  constructor(message: string) {
    super(message);
    this.name = "EmitterDefect";
  }
}

// ─── Constructors ───────────────────────────────────────────────────────────

export const undefinedType = (name: string) => new CompileError({ code: "UndefinedType", name });
export const duplicateType = (name: string) => new CompileError({ code: "DuplicateType", name });
export const undefinedVariable = (name: string) =>
  new CompileError({ code: "UndefinedVariable", name });
export const undefinedFunction = (name: string) =>
  new CompileError({ code: "UndefinedFunction", name });
export const duplicateFunction = (name: string) =>
  new CompileError({ code: "DuplicateFunction", name });
export const duplicateParameter = (name: string) =>
  new CompileError({ code: "DuplicateParameter", name });
export const invalidParameterName = (name: string) =>
  new CompileError({ code: "InvalidParameterName", name });
export const parameterCountMismatch = (name: string, expected: number, actual: number) =>
  new CompileError({ code: "ParameterCountMismatch", name, expected, actual });
export const typeMismatch = (expected: string, actual: string) =>
  new CompileError({ code: "TypeMismatch", expected, actual });
export const invalidConstantForType = (type: string) =>
  new CompileError({ code: "InvalidConstantForType", type });
export const unsupportedOperation = (type: string, operation: string) =>
  new CompileError({ code: "UnsupportedOperation", type, operation });
export const unsupportedConstruct = (construct: string) =>
  new CompileError({ code: "UnsupportedConstruct", construct });
export const noModule = () => new CompileError({ code: "NoModule" });
export const moduleAlreadyCreated = () => new CompileError({ code: "ModuleAlreadyCreated" });
export const noEnclosingFunction = () => new CompileError({ code: "NoEnclosingFunction" });
