import { describe, expect, it } from "vitest";

import {
  childrenOf,
  isWellFormed,
  loc,
  startOf,
  walk,
  type SpannedNode,
  type SpannedNodeKind,
} from "../../src/index.js";
import {
  countingLoop,
  forAwaitOf,
  kitchenSink,
  labeledLoop,
  namedRole,
  nestedWhile,
} from "../fixtures/programs.js";

function kindsOf(root: SpannedNode): SpannedNodeKind[] {
  const kinds: SpannedNodeKind[] = [];
  walk(root, (node) => {
    kinds.push(node.kind);
  });
  return kinds;
}

describe("walk", () => {
  it("visits nodes depth-first in source order", () => {
    expect(kindsOf(labeledLoop())).toEqual([
      "labeled",
      "ident",
      "while",
      "literal",
      "block",
      "break",
      "ident",
    ]);
  });

  it("passes the parent of each node", () => {
    const root = labeledLoop();
    const parents = new Map<SpannedNodeKind, SpannedNodeKind | undefined>();
    walk(root, (node, parent) => {
      parents.set(node.kind, parent?.kind);
    });
    expect(parents.get("labeled")).toBeUndefined();
    expect(parents.get("while")).toBe("labeled");
    expect(parents.get("break")).toBe("block");
  });

  it("skips the children of a node when the visitor returns false", () => {
    const kinds: SpannedNodeKind[] = [];
    walk(labeledLoop(), (node) => {
      kinds.push(node.kind);
      return node.kind !== "while";
    });
    expect(kinds).toEqual(["labeled", "ident", "while"]);
  });

  it("reaches every kind present in a mixed block", () => {
    const kinds = [...new Set(kindsOf(kitchenSink()))].sort();
    expect(kinds).toEqual(
      [
        "array",
        "assign",
        "assignPat",
        "binary",
        "block",
        "break",
        "call",
        "catchArg",
        "catchClause",
        "conditional",
        "continue",
        "debugger",
        "doWhile",
        "elseClause",
        "empty",
        "exprInit",
        "exprLeft",
        "expression",
        "finallyClause",
        "for",
        "forIn",
        "forOf",
        "functionDecl",
        "functionExpr",
        "ident",
        "if",
        "listEntry",
        "literal",
        "logical",
        "member",
        "object",
        "objectPat",
        "paren",
        "patProp",
        "prop",
        "return",
        "switch",
        "switchCase",
        "this",
        "throw",
        "try",
        "unary",
        "update",
        "var",
        "varDecl",
        "varDecls",
        "varKind",
        "variableDecl",
        "variableLeft",
        "with",
      ].sort()
    );
  });

  it("does not use the call stack for depth", () => {
    const depth = 50_000;
    let count = 0;
    walk(nestedWhile(depth), () => {
      count += 1;
    });
    expect(count).toBe(2 * depth + 2);
  });
});

describe("childrenOf", () => {
  it("leaves out absent optional slots", () => {
    const [, loop] = childrenOf(labeledLoop());
    const body = childrenOf(loop)[1];
    const [breakStmt] = childrenOf(body);
    expect(childrenOf(breakStmt).map((node) => node.kind)).toEqual(["ident"]);
    expect(childrenOf(childrenOf(breakStmt)[0])).toEqual([]);
  });
});

const invariantRoots: [string, () => SpannedNode][] = [
  ["a mixed block", kitchenSink],
  ["a labeled loop", labeledLoop],
  ["a counting loop", countingLoop],
  ["a for-await loop", forAwaitOf],
  ["a role", namedRole],
];

for (const [name, build] of invariantRoots) {
  describe(`location invariants over ${name}`, () => {
    const root = build();

    it("gives every node a well-formed location whose start matches startOf", () => {
      walk(root, (node) => {
        const range = loc(node);
        expect(isWellFormed(range), node.kind).toBe(true);
        expect(startOf(node), node.kind).toBe(range.start);
      });
    });

    it("nests children inside their parents except switch cases", () => {
      walk(root, (node, parent) => {
        if (parent === undefined) {
          return;
        }
        const inner = loc(node);
        const outer = loc(parent);
        if (parent.kind === "switch" && node.kind === "switchCase") {
          expect(inner.start).toBeGreaterThanOrEqual(outer.end);
          return;
        }
        expect(inner.start, node.kind).toBeGreaterThanOrEqual(outer.start);
        expect(inner.end, node.kind).toBeLessThanOrEqual(outer.end);
      });
    });
  });
}

describe("invariant roots", () => {
  it("cover the kinds the mixed block lacks", () => {
    const kinds = new Set(invariantRoots.flatMap(([, build]) => kindsOf(build())));
    for (const kind of [
      "labeled",
      "while",
      "variableInit",
      "patLeft",
      "arrayPat",
      "role",
      "roleBody",
    ] as const) {
      expect(kinds.has(kind), kind).toBe(true);
    }
  });
});
