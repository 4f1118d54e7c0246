/**
 * AST node types for the KSC language.
 * Uses discriminated unions with a `kind` field.
 *
 * The AST is produced by an external parser and is read-only for the
 * compiler: no lowering step mutates a node.
 */

export * from "./nodes/index.ts";
