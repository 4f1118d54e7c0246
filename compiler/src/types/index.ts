export { TypeKind } from "./kinds.ts";
export type { TypeKindValue } from "./kinds.ts";
export type {
  BoolType,
  FunctionType,
  Int32Type,
  ListType,
  NumberType,
  NumericType,
  StructField,
  StructType,
  Type,
  VoidType,
} from "./definitions.ts";
export {
  BOOL_TYPE,
  BUILTIN_TYPES,
  functionType,
  INT32_TYPE,
  listType,
  NUMBER_TYPE,
  structType,
  VOID_TYPE,
} from "./constructors.ts";
export { isNumeric, isVoid, typesEqual } from "./utilities.ts";
