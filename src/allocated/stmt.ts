import type { Expr, Ident, Pat } from "./expr.js";
import type { ProgramPart, VarDecl, VarKind } from "./decl.js";

/**
 * Statements after parsing: same variants as the spanned tree, without
 * keywords, delimiters or terminators. Whether a statement ended in `;` is
 * not recorded.
 */
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

export interface ExprStmt {
  readonly kind: "expression";
  readonly expr: Expr;
}

export interface BlockStmt {
  readonly kind: "block";
  readonly stmts: ProgramPart[];
}

export interface EmptyStmt {
  readonly kind: "empty";
}

export interface DebuggerStmt {
  readonly kind: "debugger";
}

export interface WithStmt {
  readonly kind: "with";
  readonly object: Expr;
  readonly body: Stmt;
}

export interface ReturnStmt {
  readonly kind: "return";
  readonly value: Expr | null;
}

export interface LabeledStmt {
  readonly kind: "labeled";
  readonly label: Ident;
  readonly body: Stmt;
}

export interface BreakStmt {
  readonly kind: "break";
  readonly label: Ident | null;
}

export interface ContinueStmt {
  readonly kind: "continue";
  readonly label: Ident | null;
}

export interface IfStmt {
  readonly kind: "if";
  readonly test: Expr;
  readonly consequent: Stmt;
  readonly alternate: Stmt | null;
}

export interface SwitchStmt {
  readonly kind: "switch";
  readonly discriminant: Expr;
  readonly cases: SwitchCase[];
}

export interface SwitchCase {
  readonly kind: "switchCase";
  /** `null` for `default:`. */
  readonly test: Expr | null;
  readonly consequent: ProgramPart[];
}

export interface ThrowStmt {
  readonly kind: "throw";
  readonly expr: Expr;
}

export interface TryStmt {
  readonly kind: "try";
  readonly block: BlockStmt;
  readonly handler: CatchClause | null;
  readonly finalizer: BlockStmt | null;
}

export interface CatchClause {
  readonly kind: "catchClause";
  readonly param: Pat | null;
  readonly body: BlockStmt;
}

export interface WhileStmt {
  readonly kind: "while";
  readonly test: Expr;
  readonly body: Stmt;
}

export interface DoWhileStmt {
  readonly kind: "doWhile";
  readonly body: Stmt;
  readonly test: Expr;
}

export interface ForStmt {
  readonly kind: "for";
  readonly init: LoopInit | null;
  readonly test: Expr | null;
  readonly update: Expr | null;
  readonly body: Stmt;
}

export type LoopInit = VariableLoopInit | ExprLoopInit;

export interface VariableLoopInit {
  readonly kind: "variableInit";
  readonly varKind: VarKind;
  readonly decls: VarDecl[];
}

export interface ExprLoopInit {
  readonly kind: "exprInit";
  readonly expr: Expr;
}

export interface ForInStmt {
  readonly kind: "forIn";
  readonly left: LoopLeft;
  readonly right: Expr;
  readonly body: Stmt;
}

export interface ForOfStmt {
  readonly kind: "forOf";
  readonly left: LoopLeft;
  readonly right: Expr;
  readonly body: Stmt;
  readonly isAwait: boolean;
}

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
  readonly decls: VarDecl[];
}
