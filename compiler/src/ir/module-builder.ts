/**
 * Module builder: owns the IR module, its function table and the
 * module-wide counter that numbers unnamed values.
 *
 * Function definition is two-phase: `registerFunction` puts the signature
 * into the table, `beginDefinition` opens the body. Lowering registers
 * every top-level function before lowering any body, so recursive and
 * mutually recursive calls resolve.
 */

import {
  duplicateFunction,
  duplicateParameter,
  EmitterDefect,
  invalidParameterName,
  moduleAlreadyCreated,
  noModule,
  typeMismatch,
  undefinedFunction,
} from "../errors/index.ts";
import type { SymbolStack } from "../scope/symbol-stack.ts";
import type { TypeRegistry } from "../scope/type-registry.ts";
import { type FunctionType, functionType, TypeKind, typesEqual } from "../types/index.ts";
import { ControlFlowEmitter, type ValueNumbering } from "./emitter.ts";
import { toIrType } from "./ir-type-mapping.ts";
import type { IrFunction, IrModule, VarId } from "./ir-types.ts";
import type { TypedValue } from "./typed-value.ts";

/**
 * Parameter names double as the names of their incoming values (`%name`),
 * so they must not look like the numbered values `freshVar` hands out.
 */
function isIdentifier(name: string): boolean {
  return /^[A-Za-z_][A-Za-z0-9_]*$/.test(name);
}

/** `(typeName name)` pair naming a parameter. */
export interface ParamSpec {
  typeName: string;
  name: string;
}

export interface FunctionHandle {
  name: string;
  type: FunctionType;
  /** Parameter names, in order. */
  paramNames: string[];
  ir: IrFunction;
  /** `declared` until a body is opened; `defined` once it is finished. */
  state: "declared" | "defining" | "defined";
}

export class ModuleBuilder implements ValueNumbering {
  readonly emitter: ControlFlowEmitter;

  private module: IrModule | null = null;
  private readonly functions = new Map<string, FunctionHandle>();
  /** Handles whose body is open, innermost last. */
  private readonly defining: FunctionHandle[] = [];
  private varCounter = 0;

  constructor(
    private readonly types: TypeRegistry,
    private readonly symbols: SymbolStack
  ) {
    this.emitter = new ControlFlowEmitter(this);
  }

  // ─── Module ───────────────────────────────────────────────────────────────

  createModule(name: string): IrModule {
    if (this.module) throw moduleAlreadyCreated();
    this.module = { name, functions: [] };
    return this.module;
  }

  get current(): IrModule {
    if (!this.module) throw noModule();
    return this.module;
  }

  freshVar(): VarId {
    if (!this.module) throw noModule();
    return `%${this.varCounter++}`;
  }

  // ─── Function table ───────────────────────────────────────────────────────

  /** Declares a body-less function; its parameters are named `arg0`, `arg1`, … */
  declareFunction(name: string, returnTypeName: string, paramTypeNames: string[]): FunctionHandle {
    return this.registerFunction(
      name,
      returnTypeName,
      paramTypeNames.map((typeName, i) => ({ typeName, name: `arg${i}` }))
    );
  }

  /**
   * Adds a signature to the function table. All names are resolved before
   * anything is recorded, so a failure leaves the module untouched.
   */
  registerFunction(name: string, returnTypeName: string, params: ParamSpec[]): FunctionHandle {
    const module = this.current;
    const returnType = this.types.resolve(returnTypeName);
    const paramTypes = params.map((p) => this.types.resolve(p.typeName));
    if (this.functions.has(name)) throw duplicateFunction(name);
    const seen = new Set<string>();
    for (const p of params) {
      if (!isIdentifier(p.name)) throw invalidParameterName(p.name);
      if (seen.has(p.name)) throw duplicateParameter(p.name);
      seen.add(p.name);
    }

    const ir: IrFunction = {
      name,
      params: params.map((p, i) => {
        const type = paramTypes[i];
        if (!type) throw new EmitterDefect(`missing type for parameter '${p.name}'`);
        return { name: p.name, type: toIrType(type) };
      }),
      returnType: toIrType(returnType),
      blocks: [],
    };
    const handle: FunctionHandle = {
      name,
      type: functionType(paramTypes, returnType),
      paramNames: params.map((p) => p.name),
      ir,
      state: "declared",
    };
    this.functions.set(name, handle);
    module.functions.push(ir);
    return handle;
  }

  /**
   * Opens the body of a registered function: creates the entry block,
   * positions the cursor there, pushes the function scope and gives every
   * parameter an addressable slot holding its incoming value.
   */
  beginDefinition(handle: FunctionHandle): void {
    if (handle.state !== "declared") {
      throw new EmitterDefect(`function '${handle.name}' is already ${handle.state}`);
    }
    handle.state = "defining";
    this.defining.push(handle);
    this.emitter.beginFunction(handle.ir);
    this.symbols.pushScope({ isFunctionBoundary: true });

    handle.type.params.forEach((type, i) => {
      const name = handle.paramNames[i];
      if (name === undefined) throw new EmitterDefect(`missing name for parameter ${i}`);
      const slot = this.emitter.freshVar();
      this.emitter.emit({ kind: "stack_alloc", dest: slot, type: toIrType(type) });
      this.emitter.emit({ kind: "store", ptr: slot, value: `%${name}` });
      this.symbols.bind(name, { type, slot });
    });
  }

  defineFunction(name: string, returnTypeName: string, params: ParamSpec[]): FunctionHandle {
    const handle = this.registerFunction(name, returnTypeName, params);
    this.beginDefinition(handle);
    return handle;
  }

  /**
   * Returns `result` from the innermost open function and closes it. A Void
   * function discards `result`; any other must receive its return type.
   */
  finishFunction(result: TypedValue): FunctionHandle {
    const handle = this.defining[this.defining.length - 1];
    if (!handle) throw new EmitterDefect("finishFunction without an open definition");
    const returnType = handle.type.returnType;

    if (returnType.kind === TypeKind.Void) {
      this.emitter.retVoid();
    } else {
      if (result.value === null || !typesEqual(result.type, returnType)) {
        throw typeMismatch(returnType.name, result.type.name);
      }
      this.emitter.ret(result.value);
    }

    this.emitter.endFunction();
    this.symbols.popScope();
    this.defining.pop();
    handle.state = "defined";
    return handle;
  }

  lookupFunction(name: string): FunctionHandle {
    const found = this.tryLookupFunction(name);
    if (!found) throw undefinedFunction(name);
    return found;
  }

  tryLookupFunction(name: string): FunctionHandle | undefined {
    if (!this.module) throw noModule();
    return this.functions.get(name);
  }
}
