/**
 * origin.ts
 * Provenance pointer from a scanned declaration back to its source text.
 */

export interface Origin {
  /** Absolute or project-relative path to the source file. */
  file: string;
  /** 1-based start line. */
  startLine?: number;
  /** 1-based start column. */
  startCol?: number;
  /** 1-based end line. */
  endLine?: number;
  /** Class/member symbol the decorator is attached to, if available. */
  symbol?: string;
}
