import type { BlockId, VarId } from "./identifiers.ts";
import type { IrInst } from "./instructions.ts";
import type { IrTerminator } from "./terminators.ts";
import type { IrType } from "./types.ts";

// ─── Function ────────────────────────────────────────────────────────────────

/**
 * An IR function. A declared function has an empty `blocks` list; a defined
 * one starts with its `entry` block.
 */
export interface IrFunction {
  name: string;
  params: IrParam[];
  returnType: IrType;
  blocks: IrBlock[];
}

/** Function parameter; its incoming value is `%<name>`. */
export interface IrParam {
  name: string;
  type: IrType;
}

// ─── Basic Block ─────────────────────────────────────────────────────────────

/**
 * A basic block: phi nodes first, then a straight-line sequence of
 * instructions, ending with exactly one terminator.
 */
export interface IrBlock {
  id: BlockId;
  phis: IrPhi[];
  instructions: IrInst[];
  terminator: IrTerminator;
}

// ─── Phi Node ────────────────────────────────────────────────────────────────

/** SSA phi node: selects a value based on which predecessor block executed. */
export interface IrPhi {
  dest: VarId;
  type: IrType;
  incoming: { value: VarId; from: BlockId }[];
}
