import { fail, type Span } from "../../diagnostics.js";
import {
  withElement,
  type ArraySize,
  type ArrayType,
  type Ast,
  type BasicType,
  type PrimitiveKind,
  type Typedef,
} from "../../xdr/ast.js";
import { parseIntegerLiteral } from "../../xdr/primitives.js";
import type { RustExpr, RustGenericParam, RustType } from "../ir.js";
import { identExpr, numberExpr, pathType } from "../ir.js";
import { rustIntegerLiteral, rustSafeName } from "./common.js";

/**
 * How a named element is read at a call site: `"alias"` uses the named
 * type's own codec, `"target"` looks through one typedef hop.
 */
export type TypedefMode = "alias" | "target";

/** An element that can be read on its own; opaque and string data always take a length. */
export type ElementType =
  | { readonly kind: Exclude<PrimitiveKind, "string" | "opaque"> }
  | { readonly kind: "ident"; readonly name: string };

/** What one field, arm or typedef body holds, classified once for every emitter. */
export type Occurrence =
  | { readonly kind: "opaque_fixed"; readonly size: ArraySize }
  | { readonly kind: "opaque_variable"; readonly max?: ArraySize }
  | { readonly kind: "string"; readonly max?: ArraySize }
  | { readonly kind: "scalar"; readonly element: ElementType }
  | { readonly kind: "fixed_array"; readonly element: ElementType; readonly size: ArraySize }
  | { readonly kind: "variable_array"; readonly element: ElementType; readonly max?: ArraySize };

export const BUFFER_PARAM = "T";

const BUFFER_BOUNDS: readonly RustType[] = [
  pathType(["AsRef"], [{ kind: "slice", inner: pathType(["u8"]) }]),
  pathType(["Debug"]),
];

export function bufferTypeParams(): readonly RustGenericParam[] {
  return [{ name: BUFFER_PARAM, bounds: BUFFER_BOUNDS }];
}

export function typeParamsFor(ast: Ast, name: string): readonly RustGenericParam[] {
  return ast.generics.has(name) ? bufferTypeParams() : [];
}

/** `Name`, or `Name<arg>` when the type carries the buffer parameter. */
export function namedType(ast: Ast, name: string, arg: RustType = pathType([BUFFER_PARAM])): RustType {
  return pathType([rustSafeName(name)], ast.generics.has(name) ? [arg] : []);
}

export function resolveElement(ast: Ast, element: BasicType, mode: TypedefMode): BasicType {
  if (mode === "alias" || element.kind !== "ident") return element;
  return ast.types.typedefTarget(element.name)?.target ?? element;
}

/** A typedef's payload: its declared shape, holding the target one hop down. */
export function typedefBody(ast: Ast, decl: Typedef): ArrayType {
  return withElement(decl.alias, resolveElement(ast, decl.alias.element, "target"));
}

export function classifyOccurrence(value: ArrayType): Occurrence {
  const { element } = value;
  if (element.kind === "opaque") {
    if (value.kind === "fixed") return { kind: "opaque_fixed", size: value.size };
    if (value.kind === "variable" && value.max !== undefined) return { kind: "opaque_variable", max: value.max };
    return { kind: "opaque_variable" };
  }
  if (element.kind === "string") {
    if (value.kind === "variable" && value.max !== undefined) return { kind: "string", max: value.max };
    return { kind: "string" };
  }
  const item: ElementType = element.kind === "ident" ? element : { kind: element.kind };
  switch (value.kind) {
    case "none":
      return { kind: "scalar", element: item };
    case "fixed":
      return { kind: "fixed_array", element: item, size: value.size };
    case "variable":
      return value.max === undefined
        ? { kind: "variable_array", element: item }
        : { kind: "variable_array", element: item, max: value.max };
  }
}

export function assertTypeExists(ast: Ast, name: string, span: Span): void {
  if (!ast.types.get(name)) fail("XDR2004", `Unknown type '${name}'.`, span);
}

export function rustElementType(ast: Ast, element: BasicType, span: Span): RustType {
  switch (element.kind) {
    case "opaque":
      return pathType([BUFFER_PARAM]);
    case "string":
      return pathType(["String"]);
    case "ident":
      assertTypeExists(ast, element.name, span);
      return namedType(ast, element.name);
    default:
      return pathType([element.kind]);
  }
}

/** Array lengths in types and fixed reads: a literal, or `NAME as usize`. */
export function arraySizeExpr(ast: Ast, size: ArraySize, span: Span): RustExpr {
  if (size.kind === "known") return numberExpr(String(size.value));
  ast.constants.resolveInteger(size.name, span);
  return { kind: "cast", expr: identExpr(rustSafeName(size.name)), type: pathType(["usize"]) };
}

export function arraySizeValue(ast: Ast, size: ArraySize, span: Span): number {
  if (size.kind === "known") return size.value;
  const value = ast.constants.resolveInteger(size.name, span);
  if (value < 0n || value > 0xffffffffn) {
    fail("XDR4002", `Array size '${size.name}' resolves to ${value}, outside 0..=4294967295.`, span);
  }
  return Number(value);
}

export function rustOccurrenceType(ast: Ast, occurrence: Occurrence, isOptional: boolean, span: Span): RustType {
  const base = ((): RustType => {
    switch (occurrence.kind) {
      case "opaque_fixed":
      case "opaque_variable":
        return pathType([BUFFER_PARAM]);
      case "string":
        return pathType(["String"]);
      case "scalar":
        return rustElementType(ast, occurrence.element, span);
      case "fixed_array":
        return {
          kind: "array",
          inner: rustElementType(ast, occurrence.element, span),
          len: arraySizeExpr(ast, occurrence.size, span),
        };
      case "variable_array":
        return pathType(["Vec"], [rustElementType(ast, occurrence.element, span)]);
    }
  })();
  return isOptional ? pathType(["Option"], [pathType(["Box"], [base])]) : base;
}

/**
 * A constant or enum value as Rust source: literals keep their spelling
 * (octal gains `0o`), names resolve through the constant index.
 */
export function integerValueText(ast: Ast, value: string, span: Span): string {
  if (parseIntegerLiteral(value) !== undefined) return rustIntegerLiteral(value);
  return String(ast.constants.resolveInteger(value, span));
}
