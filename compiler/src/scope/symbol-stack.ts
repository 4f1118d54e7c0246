import { undefinedVariable } from "../errors/index.ts";
import type { Binding, ScopeStack } from "./scope.ts";

/** Value bindings with lexical visibility and shadowing. */
export class SymbolStack {
  constructor(private readonly scopes: ScopeStack) {}

  /** Binds in the innermost scope; a rebinding there wins from now on. */
  bind(name: string, binding: Binding): void {
    this.scopes.innermost.values.set(name, binding);
  }

  lookup(name: string): Binding {
    const found = this.tryLookup(name);
    if (!found) throw undefinedVariable(name);
    return found;
  }

  /** Like `lookup`, but `undefined` instead of `UndefinedVariable`. */
  tryLookup(name: string): Binding | undefined {
    for (const scope of this.scopes.innermostFirst()) {
      const found = scope.values.get(name);
      if (found) return found;
      if (scope.isFunctionBoundary) return undefined;
    }
    return undefined;
  }

  pushScope(options: { isFunctionBoundary?: boolean } = {}): void {
    this.scopes.push(options);
  }

  popScope(): void {
    this.scopes.pop();
  }
}
