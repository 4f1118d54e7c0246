import type { IrFunction } from "./function.ts";

// ─── Module ──────────────────────────────────────────────────────────────────

/** Top-level IR module: the unit of compilation. */
export interface IrModule {
  name: string;
  /** In declaration order. Declared-only functions have no blocks. */
  functions: IrFunction[];
}
