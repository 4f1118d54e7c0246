import { type Diagnostic, Severity } from "../errors/index.ts";
import { ScopeStack } from "../scope/scope.ts";
import { SymbolStack } from "../scope/symbol-stack.ts";
import { TypeRegistry } from "../scope/type-registry.ts";
import { BUILTIN_TYPES, type Type } from "../types/index.ts";
import type { ControlFlowEmitter } from "./emitter.ts";
import { ModuleBuilder } from "./module-builder.ts";

/**
 * Everything one compilation session mutates: the scope stack with its
 * type and value views, the module builder and, through it, the emitter
 * holding the insertion cursor. A context drives exactly one module and is
 * never shared.
 */
export class CompilationContext {
  readonly scopes: ScopeStack;
  readonly types: TypeRegistry;
  readonly symbols: SymbolStack;
  readonly module: ModuleBuilder;
  /** Non-fatal findings. Errors are thrown, never collected here. */
  readonly diagnostics: Diagnostic[] = [];

  constructor(builtins: readonly Type[] = BUILTIN_TYPES) {
    this.scopes = new ScopeStack(builtins);
    this.types = new TypeRegistry(this.scopes);
    this.symbols = new SymbolStack(this.scopes);
    this.module = new ModuleBuilder(this.types, this.symbols);
  }

  get emitter(): ControlFlowEmitter {
    return this.module.emitter;
  }

  warn(code: string, message: string): void {
    this.diagnostics.push({ severity: Severity.Warning, code, message });
  }
}
