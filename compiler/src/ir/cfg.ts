/**
 * Edges between the blocks of one function, as the verifier reads them.
 */

import type { BlockId, IrBlock, IrTerminator } from "./ir-types.ts";

/** Branch targets of a terminator, in operand order. */
export function terminatorTargets(term: IrTerminator): BlockId[] {
  if (term.kind === "jump") return [term.target];
  if (term.kind === "br") return [term.thenBlock, term.elseBlock];
  return [];
}

export class FlowGraph {
  /** Targets per block, unknown ones included. */
  readonly successors = new Map<BlockId, BlockId[]>();
  /** Distinct existing predecessors per block, in block order. */
  readonly predecessors = new Map<BlockId, BlockId[]>();
  private readonly entry: BlockId | undefined;

  constructor(blocks: readonly IrBlock[]) {
    this.entry = blocks[0]?.id;
    for (const block of blocks) this.predecessors.set(block.id, []);
    for (const block of blocks) {
      const targets = terminatorTargets(block.terminator);
      this.successors.set(block.id, targets);
      for (const target of new Set(targets)) this.predecessors.get(target)?.push(block.id);
    }
  }

  has(id: BlockId): boolean {
    return this.predecessors.has(id);
  }

  /** Blocks reachable from the first block, itself included. */
  reachable(): Set<BlockId> {
    const seen = new Set<BlockId>();
    const work = this.entry === undefined ? [] : [this.entry];
    for (let id = work.pop(); id !== undefined; id = work.pop()) {
      if (seen.has(id) || !this.has(id)) continue;
      seen.add(id);
      work.push(...(this.successors.get(id) ?? []));
    }
    return seen;
  }
}
