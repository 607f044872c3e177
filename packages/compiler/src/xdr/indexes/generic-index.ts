import { freezeReadonlyArray } from "../../contracts.js";
import { innerTypes, isSelfTypedef, type Declaration } from "../ast.js";
import { compareText } from "../primitives.js";

export type GenericIndex = {
  has(name: string): boolean;
  /** Members in name order. */
  readonly names: readonly string[];
  /** Whole-AST walks taken to reach the fixed point, the last one adding nothing. */
  readonly passes: number;
};

/**
 * Names of the structs, unions and typedefs that embed opaque data, directly
 * or through other named types. Declarations may reference types declared
 * later, or each other, so the walk repeats until a pass adds nothing.
 */
export function buildGenericIndex(declarations: readonly Declaration[]): GenericIndex {
  const members = new Set<string>();
  let passes = 0;

  for (;;) {
    const before = members.size;
    passes++;
    for (const decl of declarations) {
      if (decl.kind === "constant" || decl.kind === "enum") continue;
      if (decl.kind === "typedef" && isSelfTypedef(decl)) continue;
      if (members.has(decl.name)) continue;
      const needsBuffer = innerTypes(decl).some(
        (t) => t.kind === "opaque" || (t.kind === "ident" && members.has(t.name))
      );
      if (needsBuffer) members.add(decl.name);
    }
    if (members.size === before) break;
  }

  const names = freezeReadonlyArray([...members].sort(compareText));
  return {
    has: (name) => members.has(name),
    names,
    passes,
  };
}
