import type { Span } from "../ast/nodes.ts";

export enum Severity {
  Error = "error",
  Warning = "warning",
  Info = "info",
}

export interface Diagnostic {
  severity: Severity;
  /** Stable identifier, e.g. `"TypeMismatch"`. */
  code: string;
  message: string;
  /** Source span of the offending node, when the parser supplied one. */
  span?: Span;
}

/** `<file>: <severity>[<code>]: <message>`, with the offset when known. */
export function formatDiagnostic(diag: Diagnostic, file = "<input>"): string {
  const where = diag.span ? `${file}@${diag.span.start}` : file;
  return `${where}: ${diag.severity}[${diag.code}]: ${diag.message}`;
}
