import type { Span } from "../diagnostics.js";
import type { ConstantIndex } from "./indexes/constant-index.js";
import type { GenericIndex } from "./indexes/generic-index.js";
import type { TypeIndex } from "./indexes/type-index.js";

export type PrimitiveKind = "u32" | "u64" | "i32" | "i64" | "f32" | "f64" | "bool" | "string" | "opaque";

export type BasicType = { readonly kind: PrimitiveKind } | { readonly kind: "ident"; readonly name: string };

export type ArraySize =
  | { readonly kind: "known"; readonly value: number }
  | { readonly kind: "constant"; readonly name: string };

export type ArrayType<T = BasicType> =
  | { readonly kind: "none"; readonly element: T }
  | { readonly kind: "fixed"; readonly element: T; readonly size: ArraySize }
  | { readonly kind: "variable"; readonly element: T; readonly max?: ArraySize };

export type StructField = {
  readonly name: string;
  readonly value: ArrayType;
  readonly isOptional: boolean;
  readonly span: Span;
};

export type Struct = {
  readonly kind: "struct";
  readonly name: string;
  readonly fields: readonly StructField[];
  readonly span: Span;
};

export type UnionSwitch = {
  readonly varName: string;
  readonly varType: BasicType;
};

export type UnionArm = {
  readonly fieldName: string;
  readonly fieldValue: ArrayType;
  readonly isOptional: boolean;
  readonly span: Span;
};

/** One payload shared by every value in `caseValues` (fallthrough). */
export type UnionCase = UnionArm & {
  readonly caseValues: readonly string[];
};

export type Union = {
  readonly kind: "union";
  readonly name: string;
  readonly switch: UnionSwitch;
  readonly cases: readonly UnionCase[];
  readonly default?: UnionArm;
  /** Case values without payload; `"default"` marks `default: void`. */
  readonly voidCases: readonly string[];
  readonly span: Span;
};

export type EnumVariant = {
  readonly name: string;
  /** Integer literal as written, or the name of a constant. */
  readonly value: string;
  readonly span: Span;
};

export type Enum = {
  readonly kind: "enum";
  readonly name: string;
  readonly variants: readonly EnumVariant[];
  readonly span: Span;
};

export type Typedef = {
  readonly kind: "typedef";
  readonly name: string;
  readonly target: BasicType;
  readonly alias: ArrayType;
  readonly span: Span;
};

export type Constant = {
  readonly kind: "constant";
  readonly name: string;
  readonly value: string;
  readonly span: Span;
};

export type TypeDeclaration = Struct | Union | Enum | Typedef;

export type Declaration = TypeDeclaration | Constant;

export type Ast = {
  readonly declarations: readonly Declaration[];
  readonly constants: ConstantIndex;
  readonly generics: GenericIndex;
  readonly types: TypeIndex;
};

export const DEFAULT_CASE = "default";

export function sameBasicType(a: BasicType, b: BasicType): boolean {
  if (a.kind === "ident" && b.kind === "ident") return a.name === b.name;
  return a.kind === b.kind;
}

/** `typedef unsigned int uint32_t;` and friends: the alias names its own target. */
export function isSelfTypedef(t: Typedef): boolean {
  return sameBasicType(t.alias.element, t.target);
}

export function withElement<A, B>(array: ArrayType<A>, element: B): ArrayType<B> {
  switch (array.kind) {
    case "none":
      return { kind: "none", element };
    case "fixed":
      return { kind: "fixed", element, size: array.size };
    case "variable":
      return array.max === undefined ? { kind: "variable", element } : { kind: "variable", element, max: array.max };
  }
}

/** Element types a declaration's payload refers to, in declaration order. */
export function innerTypes(decl: TypeDeclaration): readonly BasicType[] {
  switch (decl.kind) {
    case "struct":
      return decl.fields.map((f) => f.value.element);
    case "union": {
      const out = decl.cases.map((c) => c.fieldValue.element);
      if (decl.default) out.push(decl.default.fieldValue.element);
      return out;
    }
    case "typedef":
      return [decl.target];
    case "enum":
      return [];
  }
}
