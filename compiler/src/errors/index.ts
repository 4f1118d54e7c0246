export { type Diagnostic, formatDiagnostic, Severity } from "./diagnostic.ts";
export * from "./compile-error.ts";
