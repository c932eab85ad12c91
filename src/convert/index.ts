import type * as A from "../allocated/index.js";
import type * as S from "../spanned/index.js";
import { AllocatingConverter, type ConversionOptions } from "./converter.js";

export { AllocatingConverter } from "./converter.js";
export type { ConversionOptions } from "./converter.js";

export function toAllocatedStmt(stmt: S.Stmt, options?: ConversionOptions): A.Stmt {
  return new AllocatingConverter(options).stmt(stmt);
}

export function toAllocatedProgramPart(
  part: S.ProgramPart,
  options?: ConversionOptions
): A.ProgramPart {
  return new AllocatingConverter(options).programPart(part);
}

export function toAllocatedProgram(
  parts: readonly S.ProgramPart[],
  options?: ConversionOptions
): A.ProgramPart[] {
  return new AllocatingConverter(options).programParts(parts);
}

export function toAllocatedDecl(decl: S.Decl, options?: ConversionOptions): A.Decl {
  return new AllocatingConverter(options).decl(decl);
}

export function toAllocatedExpr(expr: S.Expr, options?: ConversionOptions): A.Expr {
  return new AllocatingConverter(options).expr(expr);
}

export function toAllocatedPat(pat: S.Pat, options?: ConversionOptions): A.Pat {
  return new AllocatingConverter(options).pat(pat);
}

export function toAllocatedRole(role: S.Role, options?: ConversionOptions): A.Role {
  return new AllocatingConverter(options).role(role);
}
