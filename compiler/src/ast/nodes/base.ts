/** Byte offsets into the source text the external parser read. */
export interface Span {
  start: number;
  end: number;
}

/** Common fields shared by all AST nodes. */
export interface BaseNode {
  kind: string;
  /** Absent when the node was built programmatically. */
  span?: Span;
}
