/**
 * Structural checks on finished IR functions.
 *
 * A failure here means the lowering produced a malformed graph, which is
 * an `EmitterDefect` rather than a problem in the program being compiled.
 */

import { EmitterDefect } from "../errors/index.ts";
import { FlowGraph } from "./cfg.ts";
import type { IrFunction, IrModule } from "./ir-types.ts";

export function verifyFunction(fn: IrFunction): void {
  // Declared only.
  if (fn.blocks.length === 0) return;

  const fail = (message: string): never => {
    throw new EmitterDefect(`in '${fn.name}': ${message}`);
  };

  if (fn.blocks[0]?.id !== "entry") fail("first block is not 'entry'");

  const seen = new Set<string>();
  for (const block of fn.blocks) {
    if (!block.terminator) fail(`block '${block.id}' has no terminator`);
    if (seen.has(block.id)) fail(`duplicate block '${block.id}'`);
    seen.add(block.id);
  }

  // Parameters are defined on entry; everything else exactly once.
  const defined = new Set(fn.params.map((p) => `%${p.name}`));
  const define = (dest: string): void => {
    if (defined.has(dest)) fail(`value ${dest} is defined more than once`);
    defined.add(dest);
  };
  for (const block of fn.blocks) {
    for (const phi of block.phis) define(phi.dest);
    for (const inst of block.instructions) {
      if ("dest" in inst) define(inst.dest);
    }
  }

  const graph = new FlowGraph(fn.blocks);

  for (const block of fn.blocks) {
    for (const target of graph.successors.get(block.id) ?? []) {
      if (!graph.has(target)) fail(`block '${block.id}' branches to unknown block '${target}'`);
    }
  }

  for (const block of fn.blocks) {
    const preds = graph.predecessors.get(block.id) ?? [];
    for (const phi of block.phis) {
      const sources = phi.incoming.map((e) => e.from);
      for (const from of sources) {
        if (!preds.includes(from)) {
          fail(`phi ${phi.dest} in '${block.id}' names '${from}', which is not a predecessor`);
        }
      }
      for (const pred of preds) {
        if (!sources.includes(pred)) {
          fail(`phi ${phi.dest} in '${block.id}' has no value for predecessor '${pred}'`);
        }
      }
    }
  }

  const reachable = graph.reachable();
  for (const block of fn.blocks) {
    if (!reachable.has(block.id)) fail(`block '${block.id}' is unreachable`);
  }
}

export function verifyModule(module: IrModule): void {
  for (const fn of module.functions) {
    verifyFunction(fn);
  }
}
