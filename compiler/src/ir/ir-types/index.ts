export * from "./identifiers.ts";
export * from "./types.ts";
export * from "./module.ts";
export * from "./function.ts";
export * from "./instructions.ts";
export * from "./terminators.ts";
