import type { Slice } from "./location.js";
import type { Ident, ListEntry, Prop } from "./expr.js";

/** `role name { key: value, ... }` */
export interface Role {
  readonly kind: "role";
  readonly keyword: Slice;
  readonly id?: Ident;
  readonly body: RoleBody;
}

export interface RoleBody {
  readonly kind: "roleBody";
  readonly openBrace: Slice;
  readonly props: readonly ListEntry<Prop>[];
  readonly closeBrace: Slice;
}
