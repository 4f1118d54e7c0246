/**
 * AST → IR lowering pass.
 *
 * Takes a `Program` and produces an `IrModule` in SSA form. Variables live
 * in addressable slots (`stack_alloc` / `load` / `store`); values that meet
 * at an if-expression's merge block are joined with a phi.
 *
 * Method implementations are split across:
 *   - lowering-decl.ts       (function and type declarations)
 *   - lowering-stmt.ts       (statements, blocks and branch bodies)
 *   - lowering-expr.ts       (expression dispatch, variables, calls)
 *   - lowering-literals.ts   (number and string literals)
 *   - lowering-operators.ts  (binary operators)
 *   - lowering-control.ts    (if, while and for expressions)
 *   - lowering-types.ts      (type resolution and static type queries)
 */

import type { FunctionDeclaration, Program } from "../ast/nodes.ts";
import { CompileError, type Diagnostic } from "../errors/index.ts";
import type { Type } from "../types/index.ts";
import { CompilationContext } from "./context.ts";
import type { IrModule } from "./ir-types.ts";
import type { FunctionHandle } from "./module-builder.ts";
import { verifyModule } from "./verify.ts";

import * as controlMethods from "./lowering-control.ts";
import * as declMethods from "./lowering-decl.ts";
import * as exprMethods from "./lowering-expr.ts";
import * as literalMethods from "./lowering-literals.ts";
import * as operatorMethods from "./lowering-operators.ts";
import * as stmtMethods from "./lowering-stmt.ts";
import * as typeMethods from "./lowering-types.ts";

// ─── Lowerer ─────────────────────────────────────────────────────────────────

export class Lowerer {
  readonly ctx: CompilationContext;

  constructor(ctx: CompilationContext = new CompilationContext()) {
    this.ctx = ctx;
  }

  /**
   * Lowers a whole program. Top-level type declarations and function
   * signatures are registered in source order first; function bodies are
   * lowered afterwards, so calls may refer to functions declared later.
   */
  lower(program: Program, moduleName: string): IrModule {
    const module = this.ctx.module.createModule(moduleName);

    const bodies: { decl: FunctionDeclaration; handle: FunctionHandle }[] = [];
    for (const stmt of program.statements) {
      switch (stmt.kind) {
        case "TypeDeclaration":
          this.lowerTypeDecl(stmt);
          break;
        case "ExternFunctionDeclaration":
          this.lowerExternDecl(stmt);
          break;
        case "FunctionDeclaration":
          bodies.push({ decl: stmt, handle: this.registerFunctionDecl(stmt) });
          break;
        default:
          // Lowering any expression emits instructions, which need a function.
          this.ctx.emitter.requireFunction();
      }
    }

    for (const { decl, handle } of bodies) {
      this.lowerFunctionBody(decl, handle);
    }

    return module;
  }

  // ─── Declaration methods (from lowering-decl.ts) ────────────────────────
  declare lowerTypeDecl: typeof declMethods.lowerTypeDecl;
  declare lowerExternDecl: typeof declMethods.lowerExternDecl;
  declare registerFunctionDecl: typeof declMethods.registerFunctionDecl;
  declare lowerFunctionDecl: typeof declMethods.lowerFunctionDecl;
  declare lowerFunctionBody: typeof declMethods.lowerFunctionBody;

  // ─── Statement methods (from lowering-stmt.ts) ─────────────────────────
  declare lowerStatement: typeof stmtMethods.lowerStatement;
  declare lowerBlock: typeof stmtMethods.lowerBlock;
  declare lowerBranch: typeof stmtMethods.lowerBranch;
  declare lowerBody: typeof stmtMethods.lowerBody;

  // ─── Expression methods (from lowering-expr.ts) ────────────────────────
  declare lowerExpr: typeof exprMethods.lowerExpr;
  declare lowerVariableReference: typeof exprMethods.lowerVariableReference;
  declare lowerVariableDeclaration: typeof exprMethods.lowerVariableDeclaration;
  declare lowerFunctionCall: typeof exprMethods.lowerFunctionCall;
  declare lowerArgs: typeof exprMethods.lowerArgs;
  declare checkCallShape: typeof exprMethods.checkCallShape;
  declare emitLoad: typeof exprMethods.emitLoad;

  // ─── Literal methods (from lowering-literals.ts) ────────────────────────
  declare lowerNumberLiteral: typeof literalMethods.lowerNumberLiteral;
  declare lowerStringLiteral: typeof literalMethods.lowerStringLiteral;

  // ─── Operator methods (from lowering-operators.ts) ──────────────────────
  declare lowerBinaryOperator: typeof operatorMethods.lowerBinaryOperator;
  declare checkBinaryOperands: typeof operatorMethods.checkBinaryOperands;

  // ─── Control-flow methods (from lowering-control.ts) ────────────────────
  declare lowerIfExpr: typeof controlMethods.lowerIfExpr;
  declare lowerWhileExpr: typeof controlMethods.lowerWhileExpr;
  declare lowerForExpr: typeof controlMethods.lowerForExpr;
  declare checkCondition: typeof controlMethods.checkCondition;

  // ─── Type methods (from lowering-types.ts) ──────────────────────────────
  declare resolveReturnType: typeof typeMethods.resolveReturnType;
  declare peekType: typeof typeMethods.peekType;
  declare peekStatementType: typeof typeMethods.peekStatementType;
}

// ─── Attach extracted methods to Lowerer prototype ───────────────────────────

// Declaration methods
Lowerer.prototype.lowerTypeDecl = declMethods.lowerTypeDecl;
Lowerer.prototype.lowerExternDecl = declMethods.lowerExternDecl;
Lowerer.prototype.registerFunctionDecl = declMethods.registerFunctionDecl;
Lowerer.prototype.lowerFunctionDecl = declMethods.lowerFunctionDecl;
Lowerer.prototype.lowerFunctionBody = declMethods.lowerFunctionBody;

// Statement methods
Lowerer.prototype.lowerStatement = stmtMethods.lowerStatement;
Lowerer.prototype.lowerBlock = stmtMethods.lowerBlock;
Lowerer.prototype.lowerBranch = stmtMethods.lowerBranch;
Lowerer.prototype.lowerBody = stmtMethods.lowerBody;

// Expression methods
Lowerer.prototype.lowerExpr = exprMethods.lowerExpr;
Lowerer.prototype.lowerVariableReference = exprMethods.lowerVariableReference;
Lowerer.prototype.lowerVariableDeclaration = exprMethods.lowerVariableDeclaration;
Lowerer.prototype.lowerFunctionCall = exprMethods.lowerFunctionCall;
Lowerer.prototype.lowerArgs = exprMethods.lowerArgs;
Lowerer.prototype.checkCallShape = exprMethods.checkCallShape;
Lowerer.prototype.emitLoad = exprMethods.emitLoad;

// Literal methods
Lowerer.prototype.lowerNumberLiteral = literalMethods.lowerNumberLiteral;
Lowerer.prototype.lowerStringLiteral = literalMethods.lowerStringLiteral;

// Operator methods
Lowerer.prototype.lowerBinaryOperator = operatorMethods.lowerBinaryOperator;
Lowerer.prototype.checkBinaryOperands = operatorMethods.checkBinaryOperands;

// Control-flow methods
Lowerer.prototype.lowerIfExpr = controlMethods.lowerIfExpr;
Lowerer.prototype.lowerWhileExpr = controlMethods.lowerWhileExpr;
Lowerer.prototype.lowerForExpr = controlMethods.lowerForExpr;
Lowerer.prototype.checkCondition = controlMethods.checkCondition;

// Type methods
Lowerer.prototype.resolveReturnType = typeMethods.resolveReturnType;
Lowerer.prototype.peekType = typeMethods.peekType;
Lowerer.prototype.peekStatementType = typeMethods.peekStatementType;

// ─── Public API ──────────────────────────────────────────────────────────────

export interface CompileOptions {
  /** Name of the produced module. Defaults to `"main"`. */
  moduleName?: string;
  /** Check the produced control-flow graphs. Defaults to `true`. */
  verify?: boolean;
  /** Types seeded into the outermost scope. Defaults to the builtin catalog. */
  builtins?: readonly Type[];
}

export type CompileResult =
  | { ok: true; module: IrModule; diagnostics: Diagnostic[] }
  | { ok: false; error: CompileError; diagnostics: Diagnostic[] };

/** Lowers `program`, throwing the first `CompileError` encountered. */
export function lowerProgram(program: Program, options: CompileOptions = {}): IrModule {
  return runLowering(program, new CompilationContext(options.builtins), options);
}

/**
 * Lowers `program` and reports the outcome as a result. Only compile
 * errors are captured; an `EmitterDefect` still propagates.
 */
export function compileProgram(program: Program, options: CompileOptions = {}): CompileResult {
  const ctx = new CompilationContext(options.builtins);
  try {
    const module = runLowering(program, ctx, options);
    return { ok: true, module, diagnostics: ctx.diagnostics };
  } catch (e) {
    if (!(e instanceof CompileError)) throw e;
    return { ok: false, error: e, diagnostics: [...ctx.diagnostics, e.toDiagnostic()] };
  }
}

function runLowering(program: Program, ctx: CompilationContext, options: CompileOptions): IrModule {
  const module = new Lowerer(ctx).lower(program, options.moduleName ?? "main");
  if (options.verify ?? true) verifyModule(module);
  return module;
}
