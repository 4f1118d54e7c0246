/**
 * Control-flow emitter: basic blocks and the insertion cursor.
 *
 * While a function body is being lowered, exactly one block is open for
 * writing: the block under the cursor. Every lowering routine must leave
 * the cursor on the single block where control continues. Breaking that
 * rule (emitting into a terminated block, terminating a block twice,
 * leaving a block without a terminator) is an `EmitterDefect`.
 *
 * Function definitions nest: starting a function while another is open
 * saves the outer cursor, and finishing it restores the cursor.
 */

import { EmitterDefect, noEnclosingFunction, typeMismatch } from "../errors/index.ts";
import { BOOL_TYPE, TypeKind, typesEqual } from "../types/index.ts";
import { F64, I32, toIrType } from "./ir-type-mapping.ts";
import type {
  BlockId,
  IrBlock,
  IrFunction,
  IrInst,
  IrPhi,
  IrTerminator,
  VarId,
} from "./ir-types.ts";
import type { TypedValue } from "./typed-value.ts";

/** Source of fresh, module-unique SSA value names. */
export interface ValueNumbering {
  freshVar(): VarId;
}

interface OpenBlock {
  id: BlockId;
  phis: IrPhi[];
  instructions: IrInst[];
  terminator: IrTerminator | null;
}

interface FunctionFrame {
  fn: IrFunction;
  /** In creation order; `entry` is always first. */
  blocks: OpenBlock[];
  cursor: OpenBlock;
  blockCounter: number;
}

export class ControlFlowEmitter {
  private readonly frames: FunctionFrame[] = [];

  constructor(private readonly numbering: ValueNumbering) {}

  // ─── Function frames ──────────────────────────────────────────────────────

  get inFunction(): boolean {
    return this.frames.length > 0;
  }

  /** Throws `NoEnclosingFunction` unless a function body is being lowered. */
  requireFunction(): void {
    if (!this.inFunction) throw noEnclosingFunction();
  }

  /** Opens `fn`'s entry block and puts the cursor there. */
  beginFunction(fn: IrFunction): BlockId {
    const entry: OpenBlock = { id: "entry", phis: [], instructions: [], terminator: null };
    this.frames.push({ fn, blocks: [entry], cursor: entry, blockCounter: 0 });
    return entry.id;
  }

  /** Closes the innermost function, storing its blocks on the IR function. */
  endFunction(): IrFunction {
    const frame = this.frames.pop();
    if (!frame) throw new EmitterDefect("endFunction without beginFunction");
    const blocks: IrBlock[] = frame.blocks.map((b) => {
      if (!b.terminator) {
        throw new EmitterDefect(`block '${b.id}' in '${frame.fn.name}' has no terminator`);
      }
      return { id: b.id, phis: b.phis, instructions: b.instructions, terminator: b.terminator };
    });
    frame.fn.blocks = blocks;
    return frame.fn;
  }

  private get frame(): FunctionFrame {
    const frame = this.frames[this.frames.length - 1];
    if (!frame) throw noEnclosingFunction();
    return frame;
  }

  // ─── Blocks and cursor ────────────────────────────────────────────────────

  get currentBlock(): BlockId {
    return this.frame.cursor.id;
  }

  /** Instructions emitted so far into the block under the cursor. */
  get instructionCount(): number {
    return this.frame.cursor.instructions.length;
  }

  isTerminated(): boolean {
    return this.frame.cursor.terminator !== null;
  }

  /** Creates an empty block named `<purpose>.<n>`; the cursor does not move. */
  newBlock(purpose: string): BlockId {
    const frame = this.frame;
    const block: OpenBlock = {
      id: `${purpose}.${frame.blockCounter++}`,
      phis: [],
      instructions: [],
      terminator: null,
    };
    frame.blocks.push(block);
    return block.id;
  }

  /** Moves the cursor to `block` without terminating the current one. */
  position(block: BlockId): void {
    this.frame.cursor = this.findBlock(block);
  }

  private findBlock(id: BlockId): OpenBlock {
    const found = this.frame.blocks.find((b) => b.id === id);
    if (!found) throw new EmitterDefect(`unknown block '${id}'`);
    return found;
  }

  // ─── Instructions ─────────────────────────────────────────────────────────

  freshVar(): VarId {
    return this.numbering.freshVar();
  }

  emit(inst: IrInst): void {
    const cursor = this.frame.cursor;
    if (cursor.terminator) {
      throw new EmitterDefect(`emitting '${inst.kind}' into terminated block '${cursor.id}'`);
    }
    cursor.instructions.push(inst);
  }

  // ─── Terminators ──────────────────────────────────────────────────────────

  private terminate(term: IrTerminator): void {
    const cursor = this.frame.cursor;
    if (cursor.terminator) {
      throw new EmitterDefect(`block '${cursor.id}' is already terminated`);
    }
    cursor.terminator = term;
  }

  branchConditional(cond: TypedValue, thenBlock: BlockId, elseBlock: BlockId): void {
    if (cond.type.kind !== TypeKind.Bool || cond.value === null) {
      throw typeMismatch(BOOL_TYPE.name, cond.type.name);
    }
    this.findBlock(thenBlock);
    this.findBlock(elseBlock);
    this.terminate({ kind: "br", cond: cond.value, thenBlock, elseBlock });
  }

  branchUnconditional(target: BlockId): void {
    this.findBlock(target);
    this.terminate({ kind: "jump", target });
  }

  ret(value: VarId): void {
    this.terminate({ kind: "ret", value });
  }

  retVoid(): void {
    this.terminate({ kind: "ret_void" });
  }

  // ─── Conditions and merges ────────────────────────────────────────────────

  /**
   * Turns `value` into a Bool by comparing it against the zero constant of
   * its own representation. Bool values are already conditions.
   */
  toCondition(value: TypedValue): TypedValue {
    const { type } = value;
    if (type.kind === TypeKind.Bool && value.value !== null) return value;
    if ((type.kind !== TypeKind.Number && type.kind !== TypeKind.Int32) || value.value === null) {
      throw typeMismatch(BOOL_TYPE.name, type.name);
    }

    const zero = this.freshVar();
    if (type.kind === TypeKind.Number) {
      this.emit({ kind: "const_float", dest: zero, type: F64, value: 0 });
    } else {
      this.emit({ kind: "const_int", dest: zero, type: I32, value: 0 });
    }
    const dest = this.freshVar();
    this.emit({ kind: "bin_op", op: "neq", dest, lhs: value.value, rhs: zero, type: toIrType(type) });
    return { type: BOOL_TYPE, value: dest };
  }

  /**
   * Adds a phi to the block under the cursor selecting `thenValue` when
   * control came from `thenBlock` and `elseValue` when it came from
   * `elseBlock`.
   */
  mergePhi(
    thenValue: TypedValue,
    thenBlock: BlockId,
    elseValue: TypedValue,
    elseBlock: BlockId
  ): TypedValue {
    if (!typesEqual(thenValue.type, elseValue.type)) {
      throw typeMismatch(thenValue.type.name, elseValue.type.name);
    }
    if (thenValue.value === null || elseValue.value === null) {
      throw new EmitterDefect("cannot merge Void values");
    }
    this.findBlock(thenBlock);
    this.findBlock(elseBlock);

    const dest = this.freshVar();
    this.frame.cursor.phis.push({
      dest,
      type: toIrType(thenValue.type),
      incoming: [
        { value: thenValue.value, from: thenBlock },
        { value: elseValue.value, from: elseBlock },
      ],
    });
    return { type: thenValue.type, value: dest };
  }
}
