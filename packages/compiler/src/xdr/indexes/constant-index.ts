import { fail, type Span } from "../../diagnostics.js";
import { asReadonlyMap } from "../../contracts.js";
import type { Declaration } from "../ast.js";
import { parseIntegerLiteral } from "../primitives.js";

export type ConstantEntry =
  | { readonly kind: "constant"; readonly name: string; readonly value: string; readonly span: Span }
  | {
      readonly kind: "enum_variant";
      readonly name: string;
      readonly enumName: string;
      /** `Enum::VARIANT`, the fully qualified match value. */
      readonly qualified: string;
      readonly span: Span;
    };

export type ConstantIndex = {
  readonly entries: ReadonlyMap<string, ConstantEntry>;
  /** `undefined` for names the table lacks, e.g. numeric case labels. */
  lookup(name: string): ConstantEntry | undefined;
  /** Follows constant-to-constant references down to an integer. */
  resolveInteger(name: string, span: Span): bigint;
};

/**
 * Constants and enum variants share one flat namespace; a union case label
 * may name either.
 */
export function buildConstantIndex(declarations: readonly Declaration[]): ConstantIndex {
  const entries = new Map<string, ConstantEntry>();

  const insert = (entry: ConstantEntry): void => {
    const existing = entries.get(entry.name);
    if (existing) {
      fail(
        "XDR2001",
        `Duplicate symbol '${entry.name}': constants and enum variants share one namespace.`,
        entry.span
      );
    }
    entries.set(entry.name, entry);
  };

  for (const decl of declarations) {
    if (decl.kind === "constant") {
      insert({ kind: "constant", name: decl.name, value: decl.value, span: decl.span });
      continue;
    }
    if (decl.kind === "enum") {
      for (const variant of decl.variants) {
        insert({
          kind: "enum_variant",
          name: variant.name,
          enumName: decl.name,
          qualified: `${decl.name}::${variant.name}`,
          span: variant.span,
        });
      }
    }
  }

  const frozen = asReadonlyMap(entries);

  const resolveInteger = (name: string, span: Span): bigint => {
    const seen = new Set<string>();
    let current = name;
    for (;;) {
      const literal = parseIntegerLiteral(current);
      if (literal !== undefined) return literal;
      if (seen.has(current)) {
        fail("XDR4003", `Constant '${name}' is defined in terms of itself.`, span);
      }
      seen.add(current);
      const entry = frozen.get(current);
      if (!entry) fail("XDR2003", `Unknown constant '${current}'.`, span);
      if (entry.kind === "enum_variant") {
        fail("XDR4001", `'${current}' is an enum variant (${entry.qualified}), not a numeric constant.`, span);
      }
      current = entry.value;
    }
  };

  return {
    entries: frozen,
    lookup: (name) => frozen.get(name),
    resolveInteger,
  };
}
