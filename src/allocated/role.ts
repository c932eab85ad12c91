import type { Ident, Prop } from "./expr.js";

export interface Role {
  readonly kind: "role";
  readonly id: Ident | null;
  readonly props: Prop[];
}
