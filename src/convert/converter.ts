import type * as A from "../allocated/index.js";
import { ConversionDepthError } from "../errors.js";
import type * as S from "../spanned/index.js";
import { startOf, type SpannedNode } from "../spanned/loc.js";

export interface ConversionOptions {
  /**
   * Deepest statement/expression nesting accepted before giving up with a
   * `ConversionDepthError`. Unlimited when omitted; fractions are rounded
   * down and `NaN` or negative values are rejected with a `RangeError`.
   */
  readonly maxDepth?: number;
}

/**
 * Maps spanned nodes onto their allocated counterparts. Keywords, delimiters,
 * terminators and list separators are dropped; everything else keeps its
 * variant and order. Input nodes are only read.
 *
 * Conversion recurses once per nesting level. Without `maxDepth` a deep enough
 * tree exhausts the call stack with a `RangeError`; set `maxDepth` for input
 * that is not trusted.
 */
export class AllocatingConverter {
  private readonly maxDepth: number;

  private depth = 0;

  constructor(options: ConversionOptions = {}) {
    this.maxDepth = normalizeMaxDepth(options.maxDepth);
  }

  programPart(part: S.ProgramPart): A.ProgramPart {
    switch (part.kind) {
      case "variableDecl":
      case "functionDecl":
        return this.decl(part);
      default:
        return this.stmt(part);
    }
  }

  programParts(parts: readonly S.ProgramPart[]): A.ProgramPart[] {
    return parts.map((part) => this.programPart(part));
  }

  decl(node: S.Decl): A.Decl {
    switch (node.kind) {
      case "variableDecl":
        return {
          kind: "variableDecl",
          varKind: node.decls.keyword.value,
          decls: this.varDecls(node.decls.decls),
        };
      case "functionDecl":
        return this.nested(node, (): A.FunctionDecl => ({
          kind: "functionDecl",
          id: this.ident(node.id),
          params: node.params.map((entry) => this.pat(entry.item)),
          body: this.block(node.body),
        }));
    }
  }

  stmt(node: S.Stmt): A.Stmt {
    return this.nested(node, () => this.buildStmt(node));
  }

  private buildStmt(node: S.Stmt): A.Stmt {
    switch (node.kind) {
      case "expression":
        return { kind: "expression", expr: this.expr(node.expr) };
      case "block":
        return this.block(node);
      case "empty":
        return { kind: "empty" };
      case "debugger":
        return { kind: "debugger" };
      case "with":
        return {
          kind: "with",
          object: this.expr(node.object),
          body: this.stmt(node.body),
        };
      case "return":
        return {
          kind: "return",
          value: node.value ? this.expr(node.value) : null,
        };
      case "labeled":
        return {
          kind: "labeled",
          label: this.ident(node.label),
          body: this.stmt(node.body),
        };
      case "break":
      case "continue":
        return {
          kind: node.kind,
          label: node.label ? this.ident(node.label) : null,
        };
      case "if":
        return {
          kind: "if",
          test: this.expr(node.test),
          consequent: this.stmt(node.consequent),
          alternate: node.alternate ? this.stmt(node.alternate.body) : null,
        };
      case "switch":
        return {
          kind: "switch",
          discriminant: this.expr(node.discriminant),
          cases: node.cases.map((switchCase) => this.switchCase(switchCase)),
        };
      case "throw":
        return { kind: "throw", expr: this.expr(node.expr) };
      case "try":
        return {
          kind: "try",
          block: this.block(node.block),
          handler: node.handler ? this.catchClause(node.handler) : null,
          finalizer: node.finalizer ? this.block(node.finalizer.body) : null,
        };
      case "while":
        return {
          kind: "while",
          test: this.expr(node.test),
          body: this.stmt(node.body),
        };
      case "doWhile":
        return {
          kind: "doWhile",
          body: this.stmt(node.body),
          test: this.expr(node.test),
        };
      case "for":
        return {
          kind: "for",
          init: node.init ? this.loopInit(node.init) : null,
          test: node.test ? this.expr(node.test) : null,
          update: node.update ? this.expr(node.update) : null,
          body: this.stmt(node.body),
        };
      case "forIn":
        return {
          kind: "forIn",
          left: this.loopLeft(node.left),
          right: this.expr(node.right),
          body: this.stmt(node.body),
        };
      case "forOf":
        return {
          kind: "forOf",
          left: this.loopLeft(node.left),
          right: this.expr(node.right),
          body: this.stmt(node.body),
          isAwait: node.keywordAwait !== undefined,
        };
      case "var":
        return { kind: "var", decls: this.varDecls(node.decls.decls) };
    }
  }

  block(node: S.BlockStmt): A.BlockStmt {
    return { kind: "block", stmts: this.programParts(node.stmts) };
  }

  switchCase(node: S.SwitchCase): A.SwitchCase {
    return {
      kind: "switchCase",
      test: node.test ? this.expr(node.test) : null,
      consequent: this.programParts(node.consequent),
    };
  }

  catchClause(node: S.CatchClause): A.CatchClause {
    return {
      kind: "catchClause",
      param: node.param ? this.pat(node.param.param) : null,
      body: this.block(node.body),
    };
  }

  loopInit(node: S.LoopInit): A.LoopInit {
    switch (node.kind) {
      case "variableInit":
        return {
          kind: "variableInit",
          varKind: node.varKind.value,
          decls: this.varDecls(node.decls),
        };
      case "exprInit":
        return { kind: "exprInit", expr: this.expr(node.expr) };
    }
  }

  loopLeft(node: S.LoopLeft): A.LoopLeft {
    switch (node.kind) {
      case "variableLeft":
        return {
          kind: "variableLeft",
          varKind: node.varKind.value,
          decl: this.varDecl(node.decl),
        };
      case "exprLeft":
        return { kind: "exprLeft", expr: this.expr(node.expr) };
      case "patLeft":
        return { kind: "patLeft", pat: this.pat(node.pat) };
    }
  }

  varDecl(node: S.VarDecl): A.VarDecl {
    return {
      kind: "varDecl",
      id: this.pat(node.id),
      init: node.init ? this.expr(node.init) : null,
    };
  }

  private varDecls(entries: readonly S.ListEntry<S.VarDecl>[]): A.VarDecl[] {
    return entries.map((entry) => this.varDecl(entry.item));
  }

  expr(node: S.Expr): A.Expr {
    return this.nested(node, () => this.buildExpr(node));
  }

  private buildExpr(node: S.Expr): A.Expr {
    switch (node.kind) {
      case "ident":
        return this.ident(node);
      case "literal":
        return this.literal(node);
      case "this":
        return { kind: "this" };
      case "array":
        return {
          kind: "array",
          elements: node.elements.map((entry) => this.expr(entry.item)),
        };
      case "object":
        return {
          kind: "object",
          props: node.props.map((entry) => this.prop(entry.item)),
        };
      case "paren":
        return { kind: "paren", expr: this.expr(node.expr) };
      case "unary":
        return {
          kind: "unary",
          operator: node.operator.text,
          argument: this.expr(node.argument),
        };
      case "update":
        return {
          kind: "update",
          operator: node.operator.text,
          prefix: node.prefix,
          argument: this.expr(node.argument),
        };
      case "binary":
      case "logical":
        return {
          kind: node.kind,
          operator: node.operator.text,
          left: this.expr(node.left),
          right: this.expr(node.right),
        };
      case "assign":
        return {
          kind: "assign",
          operator: node.operator.text,
          left: this.assignTarget(node.left),
          right: this.expr(node.right),
        };
      case "call":
        return {
          kind: "call",
          callee: this.expr(node.callee),
          args: node.args.map((entry) => this.expr(entry.item)),
        };
      case "member":
        return {
          kind: "member",
          object: this.expr(node.object),
          property: this.ident(node.property),
        };
      case "conditional":
        return {
          kind: "conditional",
          test: this.expr(node.test),
          consequent: this.expr(node.consequent),
          alternate: this.expr(node.alternate),
        };
      case "functionExpr":
        return {
          kind: "functionExpr",
          id: node.id ? this.ident(node.id) : null,
          params: node.params.map((entry) => this.pat(entry.item)),
          body: this.block(node.body),
        };
    }
  }

  private assignTarget(node: S.Pat | S.Expr): A.Pat | A.Expr {
    switch (node.kind) {
      case "arrayPat":
      case "objectPat":
      case "assignPat":
        return this.pat(node);
      default:
        return this.expr(node);
    }
  }

  prop(node: S.Prop): A.Prop {
    return {
      kind: "prop",
      key: node.key.kind === "ident" ? this.ident(node.key) : this.literal(node.key),
      value: this.expr(node.value),
    };
  }

  pat(node: S.Pat): A.Pat {
    return this.nested(node, () => this.buildPat(node));
  }

  private buildPat(node: S.Pat): A.Pat {
    switch (node.kind) {
      case "ident":
        return this.ident(node);
      case "arrayPat":
        return {
          kind: "arrayPat",
          elements: node.elements.map((entry) => this.pat(entry.item)),
        };
      case "objectPat":
        return {
          kind: "objectPat",
          props: node.props.map((entry): A.PatProp => ({
            kind: "patProp",
            key: this.ident(entry.item.key),
            value: this.pat(entry.item.value),
          })),
        };
      case "assignPat":
        return {
          kind: "assignPat",
          left: this.pat(node.left),
          right: this.expr(node.right),
        };
    }
  }

  ident(node: S.Ident): A.Ident {
    return { kind: "ident", name: node.slice.text };
  }

  literal(node: S.Literal): A.Literal {
    return {
      kind: "literal",
      literalType: node.literalType,
      raw: node.slice.text,
    };
  }

  role(node: S.Role): A.Role {
    return {
      kind: "role",
      id: node.id ? this.ident(node.id) : null,
      props: node.body.props.map((entry) => this.prop(entry.item)),
    };
  }

  private nested<T>(node: SpannedNode, build: () => T): T {
    this.depth += 1;
    try {
      if (this.depth > this.maxDepth) {
        const offset = startOf(node);
        throw new ConversionDepthError(this.maxDepth, { start: offset, end: offset });
      }
      return build();
    } finally {
      this.depth -= 1;
    }
  }
}

function normalizeMaxDepth(maxDepth: number | undefined): number {
  if (maxDepth === undefined) {
    return Number.POSITIVE_INFINITY;
  }
  if (Number.isNaN(maxDepth) || maxDepth < 0) {
    throw new RangeError(`maxDepth must be a non-negative number, got ${maxDepth}`);
  }
  return Math.floor(maxDepth);
}
