import type { Slice } from "./location.js";
import type { Expr, Ident, ListEntry, Pat } from "./expr.js";
import type { BlockStmt, Stmt } from "./stmt.js";

export type VarKindValue = "var" | "let" | "const";

export interface VarKind {
  readonly kind: "varKind";
  readonly value: VarKindValue;
  readonly keyword: Slice;
}

/** A single declarator: `x`, `x = 1`, `[a, b] = pair`. */
export interface VarDecl {
  readonly kind: "varDecl";
  readonly id: Pat;
  readonly eq?: Slice;
  readonly init?: Expr;
}

/** The keyword and declarator list shared by `var` statements and lexical declarations. */
export interface VarDecls {
  readonly kind: "varDecls";
  readonly keyword: VarKind;
  readonly decls: readonly ListEntry<VarDecl>[];
}

export type Decl = VariableDecl | FunctionDecl;

/** `let` / `const` declarations. `var` statements are modeled as `VarStmt`. */
export interface VariableDecl {
  readonly kind: "variableDecl";
  readonly decls: VarDecls;
  readonly semiColon?: Slice;
}

export interface FunctionDecl {
  readonly kind: "functionDecl";
  readonly keyword: Slice;
  readonly id: Ident;
  readonly openParen: Slice;
  readonly params: readonly ListEntry<Pat>[];
  readonly closeParen: Slice;
  readonly body: BlockStmt;
}

/** Anything allowed in a statement list: block bodies, case consequents. */
export type ProgramPart = Decl | Stmt;
