import type { BaseNode } from "./base.ts";
import type { Statement } from "./statements.ts";

/** Root of every parsed KSC program. */
export interface Program extends BaseNode {
  kind: "Program";
  statements: Statement[];
}
