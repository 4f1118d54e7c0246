import { duplicateType, undefinedType } from "../errors/index.ts";
import type { Type } from "../types/index.ts";
import type { ScopeStack } from "./scope.ts";

/** Named-type catalog with lexical visibility. */
export class TypeRegistry {
  constructor(private readonly scopes: ScopeStack) {}

  /** Binds `name` in the innermost scope. Outer bindings may be shadowed. */
  define(name: string, type: Type): void {
    const scope = this.scopes.innermost;
    if (scope.types.has(name)) throw duplicateType(name);
    scope.types.set(name, type);
  }

  resolve(name: string): Type {
    for (const scope of this.scopes.innermostFirst()) {
      const found = scope.types.get(name);
      if (found) return found;
    }
    throw undefinedType(name);
  }

  isDefined(name: string): boolean {
    for (const scope of this.scopes.innermostFirst()) {
      if (scope.types.has(name)) return true;
    }
    return false;
  }
}
