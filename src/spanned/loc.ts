import { spanning, type Slice, type SourceLocation } from "./location.js";
import type { Expr, ListEntry, ListItem, Pat, PatProp, Prop } from "./expr.js";
import type { Decl, VarDecl, VarDecls, VarKind } from "./decl.js";
import type {
  CatchArg,
  CatchClause,
  ElseClause,
  FinallyClause,
  LoopInit,
  LoopLeft,
  Stmt,
  SwitchCase,
} from "./stmt.js";
import type { Role, RoleBody } from "./role.js";

export type SpannedNode =
  | Expr
  | Pat
  | Prop
  | PatProp
  | ListEntry<ListItem>
  | VarKind
  | VarDecl
  | VarDecls
  | Decl
  | Stmt
  | ElseClause
  | SwitchCase
  | CatchClause
  | CatchArg
  | FinallyClause
  | LoopInit
  | LoopLeft
  | Role
  | RoleBody;

export type SpannedNodeKind = SpannedNode["kind"];

/**
 * Computes the source extent of a spanned node from its tokens and children.
 *
 * Composite locations are never stored. Each kind designates which token or
 * child opens and closes it; optional terminators win over the value they
 * follow, and a switch statement ends at the closing parenthesis of its
 * discriminant rather than at its closing brace.
 *
 * Recursion depth follows the nesting depth of trailing bodies (labels, loops,
 * `if` chains), so a pathologically nested tree can exhaust the call stack.
 */
export function loc(node: SpannedNode): SourceLocation {
  switch (node.kind) {
    case "ident":
    case "literal":
      return node.slice.loc;
    case "this":
      return node.keyword.loc;
    case "array":
    case "arrayPat":
      return between(node.openBracket, node.closeBracket);
    case "object":
    case "objectPat":
      return between(node.openBrace, node.closeBrace);
    case "paren":
      return between(node.openParen, node.closeParen);
    case "unary":
      return spanning(node.operator.loc, loc(node.argument));
    case "update":
      return node.prefix
        ? spanning(node.operator.loc, loc(node.argument))
        : spanning(loc(node.argument), node.operator.loc);
    case "binary":
    case "logical":
    case "assign":
    case "assignPat":
      return spanning(loc(node.left), loc(node.right));
    case "call":
      return spanning(loc(node.callee), node.closeParen.loc);
    case "member":
      return spanning(loc(node.object), loc(node.property));
    case "conditional":
      return spanning(loc(node.test), loc(node.alternate));
    case "functionExpr":
    case "functionDecl":
      return spanning(node.keyword.loc, loc(node.body));
    case "prop":
    case "patProp":
      return spanning(loc(node.key), loc(node.value));
    case "listEntry":
      return node.comma
        ? spanning(loc(node.item), node.comma.loc)
        : loc(node.item);
    case "varKind":
      return node.keyword.loc;
    case "varDecl":
      return node.init
        ? spanning(loc(node.id), loc(node.init))
        : loc(node.id);
    case "varDecls":
      return declListLoc(node.keyword, node.decls);
    case "variableDecl":
    case "var":
      return withTerminator(loc(node.decls), node.semiColon);
    case "expression":
      return withTerminator(loc(node.expr), node.semiColon);
    case "block":
      return between(node.openBrace, node.closeBrace);
    case "empty":
      return node.semiColon.loc;
    case "debugger":
      return withTerminator(node.keyword.loc, node.semiColon);
    case "with":
      return spanning(node.keyword.loc, loc(node.body));
    case "return":
      return withTerminator(
        node.value ? spanning(node.keyword.loc, loc(node.value)) : node.keyword.loc,
        node.semiColon
      );
    case "throw":
      return withTerminator(spanning(node.keyword.loc, loc(node.expr)), node.semiColon);
    case "break":
    case "continue":
      return withTerminator(
        node.label ? spanning(node.keyword.loc, loc(node.label)) : node.keyword.loc,
        node.semiColon
      );
    case "labeled":
      return spanning(loc(node.label), loc(node.body));
    case "if":
      return spanning(
        node.keyword.loc,
        node.alternate ? loc(node.alternate) : loc(node.consequent)
      );
    case "elseClause":
      return spanning(node.keyword.loc, loc(node.body));
    case "switch":
      return between(node.keyword, node.closeParen);
    case "switchCase": {
      const last = node.consequent[node.consequent.length - 1];
      return spanning(node.keyword.loc, last ? loc(last) : node.colon.loc);
    }
    case "try": {
      const tail = node.finalizer ?? node.handler ?? node.block;
      return spanning(node.keyword.loc, loc(tail));
    }
    case "catchClause":
    case "finallyClause":
      return spanning(node.keyword.loc, loc(node.body));
    case "catchArg":
      return between(node.openParen, node.closeParen);
    case "while":
    case "for":
      return spanning(node.keyword.loc, loc(node.body));
    case "forIn":
    case "forOf":
      return spanning(node.keywordFor.loc, loc(node.body));
    case "doWhile":
      return between(node.keywordDo, node.closeParen);
    case "variableInit":
      return declListLoc(node.varKind, node.decls);
    case "exprInit":
    case "exprLeft":
      return loc(node.expr);
    case "variableLeft":
      return spanning(loc(node.varKind), loc(node.decl));
    case "patLeft":
      return loc(node.pat);
    case "role":
      return between(node.keyword, node.body.closeBrace);
    case "roleBody":
      return between(node.openBrace, node.closeBrace);
  }
}

function between(first: Slice, last: Slice): SourceLocation {
  return spanning(first.loc, last.loc);
}

function withTerminator(base: SourceLocation, semiColon: Slice | undefined): SourceLocation {
  return semiColon ? spanning(base, semiColon.loc) : base;
}

function declListLoc(
  keyword: VarKind,
  decls: readonly ListEntry<VarDecl>[]
): SourceLocation {
  const last = decls[decls.length - 1];
  return last ? spanning(keyword.keyword.loc, loc(last)) : keyword.keyword.loc;
}

/**
 * Start offset of a node, equal to `loc(node).start`, found without
 * recursion so it stays usable on trees too deep for `loc`.
 */
export function startOf(node: SpannedNode): number {
  let current: SpannedNode = node;
  for (;;) {
    switch (current.kind) {
      case "ident":
      case "literal":
        return current.slice.loc.start;
      case "this":
      case "functionExpr":
      case "functionDecl":
      case "varKind":
      case "debugger":
      case "with":
      case "return":
      case "throw":
      case "break":
      case "continue":
      case "if":
      case "elseClause":
      case "switch":
      case "switchCase":
      case "try":
      case "catchClause":
      case "finallyClause":
      case "while":
      case "for":
      case "role":
        return current.keyword.loc.start;
      case "array":
      case "arrayPat":
        return current.openBracket.loc.start;
      case "object":
      case "objectPat":
      case "block":
      case "roleBody":
        return current.openBrace.loc.start;
      case "paren":
      case "catchArg":
        return current.openParen.loc.start;
      case "unary":
        return current.operator.loc.start;
      case "empty":
        return current.semiColon.loc.start;
      case "forIn":
      case "forOf":
        return current.keywordFor.loc.start;
      case "doWhile":
        return current.keywordDo.loc.start;
      case "update":
        if (current.prefix) {
          return current.operator.loc.start;
        }
        current = current.argument;
        break;
      case "binary":
      case "logical":
      case "assign":
      case "assignPat":
        current = current.left;
        break;
      case "call":
        current = current.callee;
        break;
      case "member":
        current = current.object;
        break;
      case "conditional":
        current = current.test;
        break;
      case "prop":
      case "patProp":
        current = current.key;
        break;
      case "listEntry":
        current = current.item;
        break;
      case "varDecl":
        current = current.id;
        break;
      case "varDecls":
        current = current.keyword;
        break;
      case "variableDecl":
      case "var":
        current = current.decls;
        break;
      case "expression":
      case "exprInit":
      case "exprLeft":
        current = current.expr;
        break;
      case "patLeft":
        current = current.pat;
        break;
      case "labeled":
        current = current.label;
        break;
      case "variableInit":
      case "variableLeft":
        current = current.varKind;
        break;
    }
  }
}
