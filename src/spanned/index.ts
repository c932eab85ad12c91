export type * from "./expr.js";
export type * from "./decl.js";
export type * from "./stmt.js";
export type * from "./role.js";
export type { Slice, SourceLocation } from "./location.js";
export { codePointLength, slice, sliceFromToken, spanning, isWellFormed } from "./location.js";
export type { SpannedNode, SpannedNodeKind } from "./loc.js";
export { loc, startOf } from "./loc.js";
export type { SpannedVisitor } from "./walk.js";
export { walk, childrenOf } from "./walk.js";
