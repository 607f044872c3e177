import type { Ast } from "../../xdr/ast.js";

export type EmitContext = {
  readonly ast: Ast;
  /** Attribute lines put above every emitted struct and enum. */
  readonly attrs: readonly string[];
};
