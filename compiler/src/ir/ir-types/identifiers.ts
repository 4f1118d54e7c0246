// ─── Identifiers ─────────────────────────────────────────────────────────────

/** SSA value identifier: `"%0"` for numbered values, `"%a"` for parameters. */
export type VarId = string;

/** Basic block label, e.g. `"entry"`, `"if.then.0"`, `"while.header.3"`. */
export type BlockId = string;
