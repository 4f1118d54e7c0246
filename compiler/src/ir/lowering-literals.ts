/**
 * Literal lowering methods for Lowerer.
 */

import type { NumberLiteral, StringLiteral } from "../ast/nodes.ts";
import { invalidConstantForType } from "../errors/index.ts";
import { INT32_TYPE, listType, NUMBER_TYPE, type Type, TypeKind } from "../types/index.ts";
import { F64, I32 } from "./ir-type-mapping.ts";
import type { Lowerer } from "./lowering.ts";
import type { TypedValue } from "./typed-value.ts";

const INT32_MIN = -(2 ** 31);
const INT32_MAX = 2 ** 31 - 1;

/** String literals default to a list of Int32 code units. */
const STRING_TYPE = listType(INT32_TYPE);

// ─── Literals ────────────────────────────────────────────────────────────

/**
 * A number literal takes the expected type (Number when there is none).
 * Int32 constants are rounded to the nearest integer; a Bool constant is
 * true for any non-zero value.
 */
export function lowerNumberLiteral(this: Lowerer, expr: NumberLiteral, expected?: Type): TypedValue {
  const type = expected ?? NUMBER_TYPE;
  const emitter = this.ctx.emitter;
  emitter.requireFunction();

  switch (type.kind) {
    case TypeKind.Number: {
      const dest = emitter.freshVar();
      emitter.emit({ kind: "const_float", dest, type: F64, value: expr.value });
      return { type, value: dest };
    }
    case TypeKind.Int32: {
      const value = Math.round(expr.value);
      if (!Number.isFinite(value) || value < INT32_MIN || value > INT32_MAX) {
        throw invalidConstantForType(type.name);
      }
      const dest = emitter.freshVar();
      emitter.emit({ kind: "const_int", dest, type: I32, value });
      return { type, value: dest };
    }
    case TypeKind.Bool: {
      const dest = emitter.freshVar();
      emitter.emit({ kind: "const_bool", dest, value: expr.value !== 0 });
      return { type, value: dest };
    }
    default:
      throw invalidConstantForType(type.name);
  }
}

export function lowerStringLiteral(this: Lowerer, expr: StringLiteral, expected?: Type): TypedValue {
  const type = expected ?? STRING_TYPE;
  if (type.kind !== TypeKind.List || type.element.kind !== TypeKind.Int32) {
    throw invalidConstantForType(type.name);
  }
  const emitter = this.ctx.emitter;
  emitter.requireFunction();
  const dest = emitter.freshVar();
  emitter.emit({
    kind: "const_string",
    dest,
    type: { kind: "list", element: I32 },
    value: expr.value,
  });
  return { type, value: dest };
}
