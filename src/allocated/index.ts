export type * from "./expr.js";
export type * from "./decl.js";
export type * from "./stmt.js";
export type * from "./role.js";
