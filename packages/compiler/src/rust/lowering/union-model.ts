import { fail, type Span } from "../../diagnostics.js";
import { freezeReadonlyArray } from "../../contracts.js";
import { DEFAULT_CASE, type Ast, type Union, type UnionArm } from "../../xdr/ast.js";
import { parseIntegerLiteral } from "../../xdr/primitives.js";
import type { RustExpr, RustMatchPattern, RustType } from "../ir.js";
import { pathExpr } from "../ir.js";
import { rustIntegerLiteral, rustSafeName, rustVariantName } from "./common.js";
import {
  classifyOccurrence,
  integerValueText,
  resolveElement,
  rustElementType,
  type ElementType,
  type Occurrence,
} from "./type-lowering.js";

/** A case label after lookup: what the discriminant is matched against. */
export type CaseLabel =
  | { readonly kind: "literal"; readonly text: string }
  | { readonly kind: "bool"; readonly value: boolean }
  | { readonly kind: "variant"; readonly segments: readonly string[] };

export type UnionPayload = {
  readonly occurrence: Occurrence;
  readonly isOptional: boolean;
  readonly span: Span;
};

export type UnionVariantModel =
  | { readonly kind: "case"; readonly name: string; readonly label: CaseLabel; readonly payload?: UnionPayload }
  | { readonly kind: "default"; readonly payload?: UnionPayload };

export type UnionModel = {
  readonly union: Union;
  /** The switch type after one typedef hop. */
  readonly discriminant: ElementType;
  readonly discriminantType: RustType;
  /** Cases (fallthrough values expanded), then void cases, then the default arm. */
  readonly variants: readonly UnionVariantModel[];
};

export const DEFAULT_VARIANT = "default";

export function resolveCaseLabel(ast: Ast, value: string, span: Span): CaseLabel {
  if (parseIntegerLiteral(value) !== undefined) return { kind: "literal", text: rustIntegerLiteral(value) };
  const entry = ast.constants.lookup(value);
  if (entry?.kind === "constant") return { kind: "literal", text: integerValueText(ast, entry.value, span) };
  if (entry?.kind === "enum_variant") {
    return { kind: "variant", segments: [rustSafeName(entry.enumName), rustSafeName(entry.name)] };
  }
  if (value === "TRUE" || value === "FALSE") return { kind: "bool", value: value === "TRUE" };
  fail("XDR2003", `Unknown case label '${value}'.`, span);
}

export function caseLabelPattern(label: CaseLabel): RustMatchPattern {
  switch (label.kind) {
    case "literal":
      return { kind: "literal", text: label.text };
    case "bool":
      return { kind: "literal", text: label.value ? "true" : "false" };
    case "variant":
      return { kind: "path", path: { segments: label.segments } };
  }
}

export function caseLabelExpr(label: CaseLabel): RustExpr {
  switch (label.kind) {
    case "literal":
      return { kind: "number", text: label.text };
    case "bool":
      return { kind: "bool", value: label.value };
    case "variant":
      return pathExpr(label.segments);
  }
}

function payloadOf(arm: UnionArm): UnionPayload {
  return { occurrence: classifyOccurrence(arm.fieldValue), isOptional: arm.isOptional, span: arm.span };
}

// Two labels collide when they select the same discriminant, however spelled.
function caseValueKey(ast: Ast, value: string, label: CaseLabel, span: Span): string {
  switch (label.kind) {
    case "literal":
      return `int:${parseIntegerLiteral(value) ?? ast.constants.resolveInteger(value, span)}`;
    case "bool":
      return `bool:${label.value}`;
    case "variant":
      return `variant:${label.segments.join("::")}`;
  }
}

export function buildUnionModel(ast: Ast, union: Union): UnionModel {
  const switchType = resolveElement(ast, union.switch.varType, "target");
  if (switchType.kind === "string" || switchType.kind === "opaque") {
    fail("XDR3006", `Union '${union.name}' cannot switch on ${switchType.kind}.`, union.span);
  }
  const discriminant: ElementType = switchType.kind === "ident" ? switchType : { kind: switchType.kind };
  const variants: UnionVariantModel[] = [];
  const seenValues = new Set<string>();
  const seenNames = new Set<string>();

  const caseVariant = (value: string, span: Span, payload?: UnionPayload): UnionVariantModel => {
    const label = resolveCaseLabel(ast, value, span);
    const key = caseValueKey(ast, value, label, span);
    if (seenValues.has(key)) {
      fail("XDR2005", `Union '${union.name}' case '${value}' repeats an earlier case value.`, span);
    }
    seenValues.add(key);
    const name = rustVariantName(value);
    if (seenNames.has(name)) {
      fail("XDR2005", `Union '${union.name}' case '${value}' reuses variant name '${name}'.`, span);
    }
    seenNames.add(name);
    return payload ? { kind: "case", name, label, payload } : { kind: "case", name, label };
  };

  for (const c of union.cases) {
    const payload = payloadOf(c);
    for (const value of c.caseValues) variants.push(caseVariant(value, c.span, payload));
  }
  for (const value of union.voidCases) {
    if (value === DEFAULT_CASE) continue;
    variants.push(caseVariant(value, union.span));
  }
  if (union.default) {
    variants.push({ kind: "default", payload: payloadOf(union.default) });
  } else if (union.voidCases.includes(DEFAULT_CASE)) {
    variants.push({ kind: "default" });
  }

  return {
    union,
    discriminant,
    discriminantType: rustElementType(ast, discriminant, union.span),
    variants: freezeReadonlyArray(variants),
  };
}
