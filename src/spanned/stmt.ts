import type { Slice } from "./location.js";
import type { Expr, Ident, ListEntry, Pat } from "./expr.js";
import type { ProgramPart, VarDecl, VarDecls, VarKind } from "./decl.js";

export type Stmt =
  | ExprStmt
  | BlockStmt
  | EmptyStmt
  | DebuggerStmt
  | WithStmt
  | ReturnStmt
  | LabeledStmt
  | BreakStmt
  | ContinueStmt
  | IfStmt
  | SwitchStmt
  | ThrowStmt
  | TryStmt
  | WhileStmt
  | DoWhileStmt
  | ForStmt
  | ForInStmt
  | ForOfStmt
  | VarStmt;

export type StmtKind = Stmt["kind"];

export interface ExprStmt {
  readonly kind: "expression";
  readonly expr: Expr;
  readonly semiColon?: Slice;
}

/** A list of program parts wrapped in curly braces. */
export interface BlockStmt {
  readonly kind: "block";
  readonly openBrace: Slice;
  readonly stmts: readonly ProgramPart[];
  readonly closeBrace: Slice;
}

/** A lone `;`. */
export interface EmptyStmt {
  readonly kind: "empty";
  readonly semiColon: Slice;
}

export interface DebuggerStmt {
  readonly kind: "debugger";
  readonly keyword: Slice;
  readonly semiColon?: Slice;
}

/**
 * `with (object) body`. Puts `object` at the front of the identifier lookup
 * chain for `body`; not allowed in strict code.
 */
export interface WithStmt {
  readonly kind: "with";
  readonly keyword: Slice;
  readonly openParen: Slice;
  readonly object: Expr;
  readonly closeParen: Slice;
  readonly body: Stmt;
}

export interface ReturnStmt {
  readonly kind: "return";
  readonly keyword: Slice;
  readonly value?: Expr;
  readonly semiColon?: Slice;
}

/** `label: body` */
export interface LabeledStmt {
  readonly kind: "labeled";
  readonly label: Ident;
  readonly colon: Slice;
  readonly body: Stmt;
}

export interface BreakStmt {
  readonly kind: "break";
  readonly keyword: Slice;
  readonly label?: Ident;
  readonly semiColon?: Slice;
}

export interface ContinueStmt {
  readonly kind: "continue";
  readonly keyword: Slice;
  readonly label?: Ident;
  readonly semiColon?: Slice;
}

export interface IfStmt {
  readonly kind: "if";
  readonly keyword: Slice;
  readonly openParen: Slice;
  readonly test: Expr;
  readonly closeParen: Slice;
  readonly consequent: Stmt;
  readonly alternate?: ElseClause;
}

export interface ElseClause {
  readonly kind: "elseClause";
  readonly keyword: Slice;
  readonly body: Stmt;
}

/**
 * ```js
 * switch (value) {
 *   case 1:
 *   case 2:
 *     return false;
 *   default:
 *     return true;
 * }
 * ```
 * The braces and cases are kept here but are not part of the statement's
 * reported location, which stops at the discriminant's closing parenthesis.
 */
export interface SwitchStmt {
  readonly kind: "switch";
  readonly keyword: Slice;
  readonly openParen: Slice;
  readonly discriminant: Expr;
  readonly closeParen: Slice;
  readonly openBrace: Slice;
  readonly cases: readonly SwitchCase[];
  readonly closeBrace: Slice;
}

/** `case test:` or `default:` followed by its consequent parts. */
export interface SwitchCase {
  readonly kind: "switchCase";
  readonly keyword: Slice;
  readonly test?: Expr;
  readonly colon: Slice;
  readonly consequent: readonly ProgramPart[];
}

export interface ThrowStmt {
  readonly kind: "throw";
  readonly keyword: Slice;
  readonly expr: Expr;
  readonly semiColon?: Slice;
}

export interface TryStmt {
  readonly kind: "try";
  readonly keyword: Slice;
  readonly block: BlockStmt;
  readonly handler?: CatchClause;
  readonly finalizer?: FinallyClause;
}

export interface CatchClause {
  readonly kind: "catchClause";
  readonly keyword: Slice;
  /** Absent for optional catch binding: `catch { ... }`. */
  readonly param?: CatchArg;
  readonly body: BlockStmt;
}

/** The parenthesized binding of a catch clause. */
export interface CatchArg {
  readonly kind: "catchArg";
  readonly openParen: Slice;
  readonly param: Pat;
  readonly closeParen: Slice;
}

export interface FinallyClause {
  readonly kind: "finallyClause";
  readonly keyword: Slice;
  readonly body: BlockStmt;
}

export interface WhileStmt {
  readonly kind: "while";
  readonly keyword: Slice;
  readonly openParen: Slice;
  readonly test: Expr;
  readonly closeParen: Slice;
  readonly body: Stmt;
}

/**
 * ```js
 * do {
 *   step();
 * } while (pending())
 * ```
 */
export interface DoWhileStmt {
  readonly kind: "doWhile";
  readonly keywordDo: Slice;
  readonly body: Stmt;
  readonly keywordWhile: Slice;
  readonly openParen: Slice;
  readonly test: Expr;
  readonly closeParen: Slice;
  readonly semiColon?: Slice;
}

/** `for (init; test; update) body`, each header slot optional. */
export interface ForStmt {
  readonly kind: "for";
  readonly keyword: Slice;
  readonly openParen: Slice;
  readonly init?: LoopInit;
  readonly semi1: Slice;
  readonly test?: Expr;
  readonly semi2: Slice;
  readonly update?: Expr;
  readonly closeParen: Slice;
  readonly body: Stmt;
}

/** The first slot of a c-style for header. */
export type LoopInit = VariableLoopInit | ExprLoopInit;

export interface VariableLoopInit {
  readonly kind: "variableInit";
  readonly varKind: VarKind;
  readonly decls: readonly ListEntry<VarDecl>[];
}

export interface ExprLoopInit {
  readonly kind: "exprInit";
  readonly expr: Expr;
}

export interface ForInStmt {
  readonly kind: "forIn";
  readonly keywordFor: Slice;
  readonly openParen: Slice;
  readonly left: LoopLeft;
  readonly keywordIn: Slice;
  readonly right: Expr;
  readonly closeParen: Slice;
  readonly body: Stmt;
}

export interface ForOfStmt {
  readonly kind: "forOf";
  readonly keywordFor: Slice;
  /** Present exactly for `for await (...)`, which makes the loop asynchronous. */
  readonly keywordAwait?: Slice;
  readonly openParen: Slice;
  readonly left: LoopLeft;
  readonly keywordOf: Slice;
  readonly right: Expr;
  readonly closeParen: Slice;
  readonly body: Stmt;
}

/** What sits left of `in` / `of` in a for-in or for-of header. */
export type LoopLeft = VariableLoopLeft | ExprLoopLeft | PatLoopLeft;

export interface VariableLoopLeft {
  readonly kind: "variableLeft";
  readonly varKind: VarKind;
  readonly decl: VarDecl;
}

export interface ExprLoopLeft {
  readonly kind: "exprLeft";
  readonly expr: Expr;
}

export interface PatLoopLeft {
  readonly kind: "patLeft";
  readonly pat: Pat;
}

export interface VarStmt {
  readonly kind: "var";
  readonly decls: VarDecls;
  readonly semiColon?: Slice;
}
