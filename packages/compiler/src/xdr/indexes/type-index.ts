import { fail } from "../../diagnostics.js";
import { asReadonlyMap, freezeReadonlyArray } from "../../contracts.js";
import { isSelfTypedef, type Declaration, type TypeDeclaration, type Typedef } from "../ast.js";
import { compareText } from "../primitives.js";

export type TypeIndex = {
  get(name: string): TypeDeclaration | undefined;
  /** The typedef named `name`, if and only if `name` names a typedef. */
  typedefTarget(name: string): Typedef | undefined;
  /** Declarations in name order. */
  readonly ordered: readonly TypeDeclaration[];
};

export function buildTypeIndex(declarations: readonly Declaration[]): TypeIndex {
  const byName = new Map<string, TypeDeclaration>();
  for (const decl of declarations) {
    if (decl.kind === "constant") continue;
    if (decl.kind === "typedef" && isSelfTypedef(decl)) continue;
    if (byName.has(decl.name)) {
      fail("XDR2002", `Type '${decl.name}' is declared more than once.`, decl.span);
    }
    byName.set(decl.name, decl);
  }

  const frozen = asReadonlyMap(byName);
  const ordered = freezeReadonlyArray(
    [...frozen.entries()].sort((a, b) => compareText(a[0], b[0])).map(([, decl]) => decl)
  );

  return {
    get: (name) => frozen.get(name),
    typedefTarget: (name) => {
      const decl = frozen.get(name);
      return decl?.kind === "typedef" ? decl : undefined;
    },
    ordered,
  };
}
