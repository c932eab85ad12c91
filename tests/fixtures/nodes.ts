import type { ProgramPart, VarDecl } from "../../src/spanned/decl.js";
import type { Expr } from "../../src/spanned/expr.js";
import type { BlockStmt, ExprStmt } from "../../src/spanned/stmt.js";
import type { SourceCursor } from "./source.js";

export function exprStmt(c: SourceCursor, expr: Expr, semi = true): ExprStmt {
  return { kind: "expression", expr, semiColon: c.semi(semi) };
}

export function block(c: SourceCursor, build: () => ProgramPart[] = () => []): BlockStmt {
  const openBrace = c.token("{");
  const stmts = build();
  const closeBrace = c.token("}");
  return { kind: "block", openBrace, stmts, closeBrace };
}

/** `name` or `name = <number literal>` */
export function declarator(c: SourceCursor, name: string, init?: string): VarDecl {
  const id = c.ident(name);
  if (init === undefined) {
    return { kind: "varDecl", id };
  }
  return { kind: "varDecl", id, eq: c.token("="), init: c.literal(init) };
}
