import type { Token } from "antlr4ng";

/**
 * Offsets count Unicode code points, the unit of antlr4ng's `CharStream`
 * indices. A character outside the Basic Multilingual Plane is one position,
 * not the two UTF-16 units `String.prototype.length` reports.
 */
export interface SourceLocation {
  /** Inclusive zero-based start offset within the source text. */
  readonly start: number;
  /** Exclusive zero-based end offset within the source text. */
  readonly end: number;
}

/**
 * A leaf token: raw text plus the location it was read from.
 */
export interface Slice {
  readonly text: string;
  readonly loc: SourceLocation;
}

export function slice(text: string, start: number, end = start + codePointLength(text)): Slice {
  return { text, loc: { start, end } };
}

export function codePointLength(text: string): number {
  return [...text].length;
}

/**
 * Adapts a token produced by an antlr4ng lexer. Its indices are already code
 * points; `stop` is inclusive, so the exclusive end is `stop + 1`.
 */
export function sliceFromToken(token: Token): Slice {
  const start = token.start;
  const end = Math.max(start, token.stop + 1);
  return {
    text: token.text ?? "",
    loc: { start, end },
  };
}

export function spanning(first: SourceLocation, last: SourceLocation): SourceLocation {
  return { start: first.start, end: last.end };
}

export function isWellFormed(location: SourceLocation): boolean {
  return location.start >= 0 && location.start <= location.end;
}
