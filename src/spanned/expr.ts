import type { Slice } from "./location.js";
import type { VarDecl } from "./decl.js";
import type { BlockStmt } from "./stmt.js";

export interface Ident {
  readonly kind: "ident";
  readonly slice: Slice;
}

export type LiteralType = "string" | "number" | "boolean" | "null" | "regex";

export interface Literal {
  readonly kind: "literal";
  readonly literalType: LiteralType;
  /** Raw source text, quotes and escapes included. */
  readonly slice: Slice;
}

/**
 * One element of a comma separated list. The comma is kept so the entry can
 * report where the separator sits.
 */
export interface ListEntry<T extends ListItem> {
  readonly kind: "listEntry";
  readonly item: T;
  readonly comma?: Slice;
}

export type ListItem = Expr | Pat | Prop | PatProp | VarDecl;

export type Expr =
  | Ident
  | Literal
  | ThisExpr
  | ArrayExpr
  | ObjectExpr
  | ParenExpr
  | UnaryExpr
  | UpdateExpr
  | BinaryExpr
  | LogicalExpr
  | AssignExpr
  | CallExpr
  | MemberExpr
  | ConditionalExpr
  | FunctionExpr;

export interface ThisExpr {
  readonly kind: "this";
  readonly keyword: Slice;
}

export interface ArrayExpr {
  readonly kind: "array";
  readonly openBracket: Slice;
  readonly elements: readonly ListEntry<Expr>[];
  readonly closeBracket: Slice;
}

export interface ObjectExpr {
  readonly kind: "object";
  readonly openBrace: Slice;
  readonly props: readonly ListEntry<Prop>[];
  readonly closeBrace: Slice;
}

/** `key: value` inside an object literal or a role body. */
export interface Prop {
  readonly kind: "prop";
  readonly key: Ident | Literal;
  readonly colon: Slice;
  readonly value: Expr;
}

export interface ParenExpr {
  readonly kind: "paren";
  readonly openParen: Slice;
  readonly expr: Expr;
  readonly closeParen: Slice;
}

export interface UnaryExpr {
  readonly kind: "unary";
  readonly operator: Slice;
  readonly argument: Expr;
}

export interface UpdateExpr {
  readonly kind: "update";
  readonly operator: Slice;
  readonly prefix: boolean;
  readonly argument: Expr;
}

export interface BinaryExpr {
  readonly kind: "binary";
  readonly left: Expr;
  readonly operator: Slice;
  readonly right: Expr;
}

export interface LogicalExpr {
  readonly kind: "logical";
  readonly left: Expr;
  readonly operator: Slice;
  readonly right: Expr;
}

export interface AssignExpr {
  readonly kind: "assign";
  readonly left: Pat | Expr;
  readonly operator: Slice;
  readonly right: Expr;
}

export interface CallExpr {
  readonly kind: "call";
  readonly callee: Expr;
  readonly openParen: Slice;
  readonly args: readonly ListEntry<Expr>[];
  readonly closeParen: Slice;
}

export interface MemberExpr {
  readonly kind: "member";
  readonly object: Expr;
  readonly dot: Slice;
  readonly property: Ident;
}

export interface ConditionalExpr {
  readonly kind: "conditional";
  readonly test: Expr;
  readonly questionMark: Slice;
  readonly consequent: Expr;
  readonly colon: Slice;
  readonly alternate: Expr;
}

export interface FunctionExpr {
  readonly kind: "functionExpr";
  readonly keyword: Slice;
  readonly id?: Ident;
  readonly openParen: Slice;
  readonly params: readonly ListEntry<Pat>[];
  readonly closeParen: Slice;
  readonly body: BlockStmt;
}

export type Pat = Ident | ArrayPat | ObjectPat | AssignPat;

export interface ArrayPat {
  readonly kind: "arrayPat";
  readonly openBracket: Slice;
  readonly elements: readonly ListEntry<Pat>[];
  readonly closeBracket: Slice;
}

export interface ObjectPat {
  readonly kind: "objectPat";
  readonly openBrace: Slice;
  readonly props: readonly ListEntry<PatProp>[];
  readonly closeBrace: Slice;
}

export interface PatProp {
  readonly kind: "patProp";
  readonly key: Ident;
  readonly colon: Slice;
  readonly value: Pat;
}

/** A pattern with a default: `x = 1` in a parameter list or destructuring. */
export interface AssignPat {
  readonly kind: "assignPat";
  readonly left: Pat;
  readonly eq: Slice;
  readonly right: Expr;
}
