import type { SpannedNode } from "./loc.js";

/** Return `false` to skip the children of `node`. */
export type SpannedVisitor = (
  node: SpannedNode,
  parent: SpannedNode | undefined
) => boolean | void;

interface WalkFrame {
  readonly node: SpannedNode;
  readonly parent: SpannedNode | undefined;
}

/**
 * Depth-first, pre-order walk over every node below and including `root`,
 * children in source order. Leaf tokens are not visited. Uses an explicit
 * stack, so nesting depth is bounded by memory rather than the call stack.
 */
export function walk(root: SpannedNode, visit: SpannedVisitor): void {
  const stack: WalkFrame[] = [{ node: root, parent: undefined }];
  let frame: WalkFrame | undefined;
  while ((frame = stack.pop()) !== undefined) {
    if (visit(frame.node, frame.parent) === false) {
      continue;
    }
    const children = childrenOf(frame.node);
    for (let index = children.length - 1; index >= 0; index -= 1) {
      stack.push({ node: children[index], parent: frame.node });
    }
  }
}

export function childrenOf(node: SpannedNode): SpannedNode[] {
  switch (node.kind) {
    case "ident":
    case "literal":
    case "this":
    case "varKind":
    case "empty":
    case "debugger":
      return [];
    case "array":
    case "arrayPat":
      return [...node.elements];
    case "object":
    case "objectPat":
    case "roleBody":
      return [...node.props];
    case "paren":
    case "expression":
    case "throw":
    case "exprInit":
    case "exprLeft":
      return [node.expr];
    case "unary":
    case "update":
      return [node.argument];
    case "binary":
    case "logical":
    case "assign":
    case "assignPat":
      return [node.left, node.right];
    case "call":
      return [node.callee, ...node.args];
    case "member":
      return [node.object, node.property];
    case "conditional":
      return [node.test, node.consequent, node.alternate];
    case "functionExpr":
    case "functionDecl":
      return present(node.id, ...node.params, node.body);
    case "prop":
    case "patProp":
      return [node.key, node.value];
    case "listEntry":
      return [node.item];
    case "varDecl":
      return present(node.id, node.init);
    case "varDecls":
      return [node.keyword, ...node.decls];
    case "variableDecl":
    case "var":
      return [node.decls];
    case "block":
      return [...node.stmts];
    case "with":
      return [node.object, node.body];
    case "return":
      return present(node.value);
    case "break":
    case "continue":
      return present(node.label);
    case "labeled":
      return [node.label, node.body];
    case "if":
      return present(node.test, node.consequent, node.alternate);
    case "elseClause":
    case "finallyClause":
      return [node.body];
    case "switch":
      return [node.discriminant, ...node.cases];
    case "switchCase":
      return present(node.test, ...node.consequent);
    case "try":
      return present(node.block, node.handler, node.finalizer);
    case "catchClause":
      return present(node.param, node.body);
    case "catchArg":
      return [node.param];
    case "while":
      return [node.test, node.body];
    case "doWhile":
      return [node.body, node.test];
    case "for":
      return present(node.init, node.test, node.update, node.body);
    case "forIn":
    case "forOf":
      return [node.left, node.right, node.body];
    case "variableInit":
      return [node.varKind, ...node.decls];
    case "variableLeft":
      return [node.varKind, node.decl];
    case "patLeft":
      return [node.pat];
    case "role":
      return present(node.id, node.body);
  }
}

function present(...nodes: (SpannedNode | undefined)[]): SpannedNode[] {
  return nodes.filter((node): node is SpannedNode => node !== undefined);
}
