import { CharStream, CommonToken } from "antlr4ng";
import { describe, expect, it } from "vitest";

import {
  codePointLength,
  isWellFormed,
  loc,
  slice,
  sliceFromToken,
  spanning,
} from "../../src/index.js";
import type { BinaryExpr } from "../../src/spanned/expr.js";
import { SourceCursor } from "../fixtures/source.js";

function lexerToken(text: string, start: number, stop: number): CommonToken {
  const token = CommonToken.fromSource([null, null], 1, 0, start, stop);
  token.text = text;
  return token;
}

describe("sliceFromToken", () => {
  it("turns the inclusive stop index into an exclusive end", () => {
    expect(sliceFromToken(lexerToken("return", 4, 9))).toEqual({
      text: "return",
      loc: { start: 4, end: 10 },
    });
  });

  it("maps a zero-width token to an empty location", () => {
    const eof = sliceFromToken(lexerToken("<EOF>", 12, 11));
    expect(eof.loc).toEqual({ start: 12, end: 12 });
    expect(isWellFormed(eof.loc)).toBe(true);
  });
});

describe("slice", () => {
  it("derives the end from the text length", () => {
    expect(slice("while", 3)).toEqual({ text: "while", loc: { start: 3, end: 8 } });
  });

  it("accepts an explicit end", () => {
    expect(slice("x", 0, 4).loc).toEqual({ start: 0, end: 4 });
  });
});

describe("spanning", () => {
  it("takes the start of the first location and the end of the last", () => {
    expect(spanning({ start: 2, end: 5 }, { start: 9, end: 11 })).toEqual({ start: 2, end: 11 });
  });
});

describe("isWellFormed", () => {
  it("rejects inverted and negative locations", () => {
    expect(isWellFormed({ start: 4, end: 3 })).toBe(false);
    expect(isWellFormed({ start: -1, end: 0 })).toBe(false);
    expect(isWellFormed({ start: 3, end: 3 })).toBe(true);
  });
});

describe("code point offsets", () => {
  it("counts a character outside the BMP as one position", () => {
    expect(codePointLength("a😀b")).toBe(3);
    expect(slice("😀", 0).loc).toEqual({ start: 0, end: 1 });
  });

  it("lines up hand-made slices with antlr4ng stream indices", () => {
    const stream = CharStream.fromString("😀x");
    const x = sliceFromToken(CommonToken.fromSource([null, stream], 1, 0, 1, 1));
    expect(x).toEqual({ text: "x", loc: { start: 1, end: 2 } });
    expect(spanning(slice("😀", 0).loc, x.loc)).toEqual({ start: 0, end: 2 });
  });

  it("places nodes after astral text by code point", () => {
    const c = new SourceCursor('"😀" + y');
    const expr: BinaryExpr = {
      kind: "binary",
      left: c.literal('"😀"', "string"),
      operator: c.token("+"),
      right: c.ident("y"),
    };
    expect(loc(expr.left)).toEqual({ start: 0, end: 3 });
    expect(loc(expr.right)).toEqual({ start: 6, end: 7 });
    expect(loc(expr)).toEqual({ start: 0, end: 7 });
  });
});
