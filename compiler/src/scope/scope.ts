/**
 * Scopes for the KSC compiler.
 *
 * A `Scope` holds the type and value bindings introduced by one lexical
 * region. `ScopeStack` keeps them innermost-last; the Type Registry and the
 * Symbol Stack are both views over the same stack, so pushing or popping a
 * scope affects types and values together.
 */

import { EmitterDefect } from "../errors/index.ts";
import type { VarId } from "../ir/ir-types.ts";
import type { Type } from "../types/index.ts";

/** A named value: its type and the slot holding its current value. */
export interface Binding {
  type: Type;
  slot: VarId;
}

export class Scope {
  readonly types = new Map<string, Type>();
  readonly values = new Map<string, Binding>();

  /**
   * Set for the scope pushed on function entry. Value lookup stops here:
   * the slots of an enclosing function belong to a different frame.
   */
  readonly isFunctionBoundary: boolean;

  constructor(options: { isFunctionBoundary?: boolean } = {}) {
    this.isFunctionBoundary = options.isFunctionBoundary ?? false;
  }
}

export class ScopeStack {
  private readonly scopes: Scope[];

  /** Creates the stack with its outermost scope holding `builtins`. */
  constructor(builtins: readonly Type[]) {
    const root = new Scope();
    for (const t of builtins) root.types.set(t.name, t);
    this.scopes = [root];
  }

  get depth(): number {
    return this.scopes.length;
  }

  get innermost(): Scope {
    const scope = this.scopes[this.scopes.length - 1];
    if (!scope) throw new EmitterDefect("scope stack is empty");
    return scope;
  }

  push(options: { isFunctionBoundary?: boolean } = {}): Scope {
    const scope = new Scope(options);
    this.scopes.push(scope);
    return scope;
  }

  /** Drops the innermost scope and every binding made in it. */
  pop(): void {
    if (this.scopes.length === 1) {
      throw new EmitterDefect("cannot pop the builtin scope");
    }
    this.scopes.pop();
  }

  /** Scopes from innermost to outermost. */
  *innermostFirst(): IterableIterator<Scope> {
    for (let i = this.scopes.length - 1; i >= 0; i--) {
      const scope = this.scopes[i];
      if (scope) yield scope;
    }
  }
}
