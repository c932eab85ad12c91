import type { VarKindValue } from "../spanned/decl.js";
import type { Expr, Ident, Pat } from "./expr.js";
import type { BlockStmt, Stmt } from "./stmt.js";

export type VarKind = VarKindValue;

export interface VarDecl {
  readonly kind: "varDecl";
  readonly id: Pat;
  readonly init: Expr | null;
}

export type Decl = VariableDecl | FunctionDecl;

export interface VariableDecl {
  readonly kind: "variableDecl";
  readonly varKind: VarKind;
  readonly decls: VarDecl[];
}

export interface FunctionDecl {
  readonly kind: "functionDecl";
  readonly id: Ident;
  readonly params: Pat[];
  readonly body: BlockStmt;
}

export type ProgramPart = Decl | Stmt;
