import type { BlockId, VarId } from "./identifiers.ts";

// ─── Terminators ─────────────────────────────────────────────────────────────

/** Union of all block terminators: exactly one per basic block. */
export type IrTerminator = IrRet | IrRetVoid | IrJump | IrBranch;

/** Return a value from the function. */
export interface IrRet {
  kind: "ret";
  value: VarId;
}

/** Return void from the function. */
export interface IrRetVoid {
  kind: "ret_void";
}

/** Unconditional jump to a target block. */
export interface IrJump {
  kind: "jump";
  target: BlockId;
}

/** Conditional branch: jumps to `thenBlock` if `cond` is true, else `elseBlock`. */
export interface IrBranch {
  kind: "br";
  cond: VarId;
  thenBlock: BlockId;
  elseBlock: BlockId;
}
