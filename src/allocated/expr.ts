import type { LiteralType } from "../spanned/expr.js";
import type { BlockStmt } from "./stmt.js";

export type { LiteralType } from "../spanned/expr.js";

export interface Ident {
  readonly kind: "ident";
  readonly name: string;
}

export interface Literal {
  readonly kind: "literal";
  readonly literalType: LiteralType;
  readonly raw: string;
}

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
}

export interface ArrayExpr {
  readonly kind: "array";
  readonly elements: Expr[];
}

export interface ObjectExpr {
  readonly kind: "object";
  readonly props: Prop[];
}

export interface Prop {
  readonly kind: "prop";
  readonly key: Ident | Literal;
  readonly value: Expr;
}

export interface ParenExpr {
  readonly kind: "paren";
  readonly expr: Expr;
}

export interface UnaryExpr {
  readonly kind: "unary";
  readonly operator: string;
  readonly argument: Expr;
}

export interface UpdateExpr {
  readonly kind: "update";
  readonly operator: string;
  readonly prefix: boolean;
  readonly argument: Expr;
}

export interface BinaryExpr {
  readonly kind: "binary";
  readonly operator: string;
  readonly left: Expr;
  readonly right: Expr;
}

export interface LogicalExpr {
  readonly kind: "logical";
  readonly operator: string;
  readonly left: Expr;
  readonly right: Expr;
}

export interface AssignExpr {
  readonly kind: "assign";
  readonly operator: string;
  readonly left: Pat | Expr;
  readonly right: Expr;
}

export interface CallExpr {
  readonly kind: "call";
  readonly callee: Expr;
  readonly args: Expr[];
}

export interface MemberExpr {
  readonly kind: "member";
  readonly object: Expr;
  readonly property: Ident;
}

export interface ConditionalExpr {
  readonly kind: "conditional";
  readonly test: Expr;
  readonly consequent: Expr;
  readonly alternate: Expr;
}

export interface FunctionExpr {
  readonly kind: "functionExpr";
  readonly id: Ident | null;
  readonly params: Pat[];
  readonly body: BlockStmt;
}

export type Pat = Ident | ArrayPat | ObjectPat | AssignPat;

export interface ArrayPat {
  readonly kind: "arrayPat";
  readonly elements: Pat[];
}

export interface ObjectPat {
  readonly kind: "objectPat";
  readonly props: PatProp[];
}

export interface PatProp {
  readonly kind: "patProp";
  readonly key: Ident;
  readonly value: Pat;
}

export interface AssignPat {
  readonly kind: "assignPat";
  readonly left: Pat;
  readonly right: Expr;
}
