/**
 * IR text format printer.
 * Identical modules always print to identical text.
 */

import type {
  IrBlock,
  IrFunction,
  IrInst,
  IrModule,
  IrPhi,
  IrTerminator,
  IrType,
} from "./ir-types.ts";

export function printIr(module: IrModule): string {
  const lines: string[] = [];

  lines.push(`module ${module.name}`);

  for (const fn of module.functions) {
    lines.push("");
    lines.push(printFunction(fn));
  }

  return `${lines.join("\n")}\n`;
}

function printSignature(fn: IrFunction): string {
  const params = fn.params.map((p) => `${p.name}: ${printType(p.type)}`).join(", ");
  return `fn ${fn.name}(${params}): ${printType(fn.returnType)}`;
}

export function printFunction(fn: IrFunction): string {
  // Declared only: no body.
  if (fn.blocks.length === 0) return `declare ${printSignature(fn)}`;

  const lines: string[] = [];
  lines.push(`${printSignature(fn)} {`);

  for (const block of fn.blocks) {
    lines.push(printBlock(block));
  }

  lines.push("}");
  return lines.join("\n");
}

function printBlock(block: IrBlock): string {
  const lines: string[] = [];
  lines.push(`${block.id}:`);

  for (const phi of block.phis) {
    lines.push(`  ${printPhi(phi)}`);
  }

  for (const inst of block.instructions) {
    lines.push(`  ${printInst(inst)}`);
  }

  lines.push(`  ${printTerminator(block.terminator)}`);

  return lines.join("\n");
}

function printPhi(phi: IrPhi): string {
  const incoming = phi.incoming.map((e) => `${e.value} from ${e.from}`).join(", ");
  return `${phi.dest} = φ ${printType(phi.type)} [${incoming}]`;
}

/** `-0` keeps its sign; every other number prints as JavaScript does. */
function printNumber(n: number): string {
  return Object.is(n, -0) ? "-0" : String(n);
}

export function printInst(inst: IrInst): string {
  switch (inst.kind) {
    case "stack_alloc":
      return `${inst.dest} = stack_alloc ${printType(inst.type)}`;
    case "load":
      return `${inst.dest} = load ${printType(inst.type)} ${inst.ptr}`;
    case "store":
      return `store ${inst.ptr}, ${inst.value}`;
    case "bin_op":
      return `${inst.dest} = ${inst.op} ${printType(inst.type)} ${inst.lhs}, ${inst.rhs}`;
    case "const_int":
      return `${inst.dest} = const_int ${printType(inst.type)} ${inst.value}`;
    case "const_float":
      return `${inst.dest} = const_float ${printType(inst.type)} ${printNumber(inst.value)}`;
    case "const_bool":
      return `${inst.dest} = const_bool ${inst.value}`;
    case "const_string":
      return `${inst.dest} = const_string ${printType(inst.type)} ${JSON.stringify(inst.value)}`;
    case "func_ref":
      return `${inst.dest} = func_ref ${printType(inst.type)} ${inst.func}`;
    case "call":
      return `${inst.dest} = call ${printType(inst.type)} ${inst.func}(${inst.args.join(", ")})`;
    case "call_void":
      return `call_void ${inst.func}(${inst.args.join(", ")})`;
    case "call_indirect":
      return `${inst.dest} = call_indirect ${printType(inst.type)} ${inst.callee}(${inst.args.join(", ")})`;
    case "call_indirect_void":
      return `call_indirect_void ${inst.callee}(${inst.args.join(", ")})`;
    case "list_len":
      return `${inst.dest} = list_len ${inst.list}`;
    case "list_get":
      return `${inst.dest} = list_get ${printType(inst.type)} ${inst.list}, ${inst.index}`;
  }
}

export function printTerminator(term: IrTerminator): string {
  switch (term.kind) {
    case "ret":
      return `ret ${term.value}`;
    case "ret_void":
      return "ret_void";
    case "jump":
      return `jump ${term.target}`;
    case "br":
      return `br ${term.cond}, ${term.thenBlock}, ${term.elseBlock}`;
  }
}

export function printType(t: IrType): string {
  switch (t.kind) {
    case "int":
      return `i${t.bits}`;
    case "float":
      return `f${t.bits}`;
    case "bool":
      return "bool";
    case "void":
      return "void";
    case "struct":
      return t.name;
    case "list":
      return `[${printType(t.element)}]`;
    case "function": {
      const params = t.params.map(printType).join(", ");
      return `fn(${params}): ${printType(t.returnType)}`;
    }
  }
}
