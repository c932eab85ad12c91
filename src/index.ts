export * as spanned from "./spanned/index.js";
export type * as allocated from "./allocated/index.js";
export type { Slice, SourceLocation } from "./spanned/location.js";
export { codePointLength, slice, sliceFromToken, spanning, isWellFormed } from "./spanned/location.js";
export type { SpannedNode, SpannedNodeKind } from "./spanned/loc.js";
export { loc, startOf } from "./spanned/loc.js";
export type { SpannedVisitor } from "./spanned/walk.js";
export { walk, childrenOf } from "./spanned/walk.js";
export {
  AllocatingConverter,
  toAllocatedDecl,
  toAllocatedExpr,
  toAllocatedPat,
  toAllocatedProgram,
  toAllocatedProgramPart,
  toAllocatedRole,
  toAllocatedStmt,
} from "./convert/index.js";
export type { ConversionOptions } from "./convert/index.js";
export { ScriptAstError, ConversionDepthError } from "./errors.js";
