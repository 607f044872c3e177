import { fail } from "../diagnostics.js";
import { freezeReadonlyArray } from "../contracts.js";
import {
  DEFAULT_CASE,
  type ArraySize,
  type ArrayType,
  type Ast,
  type BasicType,
  type Declaration,
  type Enum,
  type Struct,
  type Typedef,
  type Union,
  type UnionArm,
  type UnionCase,
  withElement,
} from "./ast.js";
import { buildConstantIndex } from "./indexes/constant-index.js";
import { buildGenericIndex } from "./indexes/generic-index.js";
import { buildTypeIndex } from "./indexes/type-index.js";
import type { IdlDeclaration, IdlDefinition, IdlSpecification, IdlValue } from "./parse-tree.js";
import { canonicalBasicType, parseIntegerLiteral } from "./primitives.js";

const MAX_ARRAY_SIZE = 0xffffffffn;
const I32_MIN = -0x80000000n;
const I32_MAX = 0x7fffffffn;

type LoweredDeclaration = {
  readonly name: string;
  readonly value: ArrayType;
  readonly isOptional: boolean;
};

function valueText(value: IdlValue): string {
  return value.kind === "number" ? value.text : value.name;
}

function lowerArraySize(value: IdlValue): ArraySize {
  if (value.kind === "ident") return { kind: "constant", name: value.name };
  const parsed = parseIntegerLiteral(value.text);
  if (parsed === undefined || parsed < 0n || parsed > MAX_ARRAY_SIZE) {
    fail("XDR4002", `Array size ${value.text} is outside 0..=${MAX_ARRAY_SIZE}.`, value.span);
  }
  return { kind: "known", value: Number(parsed) };
}

function lowerDeclaration(decl: IdlDeclaration, where: string): LoweredDeclaration {
  if (decl.kind === "void") {
    fail("XDR3001", `'void' is only allowed as a union arm, not in ${where}.`, decl.span);
  }
  const element = canonicalBasicType(decl.type.spelling);
  switch (decl.kind) {
    case "scalar":
      return { name: decl.name.name, value: { kind: "none", element }, isOptional: false };
    case "fixed_array":
      if (element.kind === "string") {
        fail("XDR3002", `String '${decl.name.name}' must be variable-length ('<>'), not fixed ('[]').`, decl.span);
      }
      return {
        name: decl.name.name,
        value: { kind: "fixed", element, size: lowerArraySize(decl.size) },
        isOptional: false,
      };
    case "variable_array": {
      const value: ArrayType =
        decl.max === undefined
          ? { kind: "variable", element }
          : { kind: "variable", element, max: lowerArraySize(decl.max) };
      return { name: decl.name.name, value, isOptional: false };
    }
    case "optional":
      if (element.kind === "opaque" || element.kind === "string") {
        fail("XDR3003", `Optional declaration '${decl.name.name}' must name a type, not ${element.kind}.`, decl.span);
      }
      return { name: decl.name.name, value: { kind: "none", element }, isOptional: true };
  }
}

function lowerStruct(def: Extract<IdlDefinition, { kind: "struct" }>): Struct {
  const fields = def.fields.map((field) => {
    const lowered = lowerDeclaration(field, `struct '${def.name.name}'`);
    return { ...lowered, span: field.span };
  });
  return { kind: "struct", name: def.name.name, fields: freezeReadonlyArray(fields), span: def.span };
}

function lowerUnionSwitch(def: Extract<IdlDefinition, { kind: "union" }>): Union["switch"] {
  const d = def.discriminant;
  if (d.kind !== "scalar") {
    fail("XDR3006", `Union '${def.name.name}' must switch on a plain scalar declaration.`, d.span);
  }
  const varType = canonicalBasicType(d.type.spelling);
  if (varType.kind === "string" || varType.kind === "opaque") {
    fail("XDR3006", `Union '${def.name.name}' cannot switch on ${varType.kind}.`, d.span);
  }
  return { varName: d.name.name, varType };
}

function lowerUnion(def: Extract<IdlDefinition, { kind: "union" }>): Union {
  const unionSwitch = lowerUnionSwitch(def);
  const cases: UnionCase[] = [];
  const voidCases: string[] = [];
  const seen = new Set<string>();
  let defaultArm: UnionArm | undefined;

  const claim = (value: string, span: IdlValue["span"]): void => {
    if (seen.has(value)) {
      fail("XDR2005", `Union '${def.name.name}' lists case '${value}' more than once.`, span);
    }
    seen.add(value);
  };

  for (const arm of def.arms) {
    if (arm.kind === "default") {
      claim(DEFAULT_CASE, arm.span);
      if (arm.declaration.kind === "void") {
        voidCases.push(DEFAULT_CASE);
        continue;
      }
      const lowered = lowerDeclaration(arm.declaration, `union '${def.name.name}'`);
      defaultArm = {
        fieldName: lowered.name,
        fieldValue: lowered.value,
        isOptional: lowered.isOptional,
        span: arm.declaration.span,
      };
      continue;
    }

    const values = arm.values.map((v) => {
      const text = valueText(v);
      claim(text, v.span);
      return text;
    });
    if (arm.declaration.kind === "void") {
      voidCases.push(...values);
      continue;
    }
    const lowered = lowerDeclaration(arm.declaration, `union '${def.name.name}'`);
    cases.push({
      caseValues: freezeReadonlyArray(values),
      fieldName: lowered.name,
      fieldValue: lowered.value,
      isOptional: lowered.isOptional,
      span: arm.declaration.span,
    });
  }

  return {
    kind: "union",
    name: def.name.name,
    switch: unionSwitch,
    cases: freezeReadonlyArray(cases),
    ...(defaultArm ? { default: defaultArm } : {}),
    voidCases: freezeReadonlyArray(voidCases),
    span: def.span,
  };
}

function lowerEnum(def: Extract<IdlDefinition, { kind: "enum" }>): Enum {
  const variants = def.variants.map((v) => {
    if (v.value.kind === "number") {
      const parsed = parseIntegerLiteral(v.value.text);
      if (parsed === undefined || parsed < I32_MIN || parsed > I32_MAX) {
        fail(
          "XDR3005",
          `Enum value ${v.value.text} of '${v.name.name}' does not fit in a signed 32-bit integer.`,
          v.value.span
        );
      }
    }
    return { name: v.name.name, value: valueText(v.value), span: v.name.span };
  });
  return { kind: "enum", name: def.name.name, variants: freezeReadonlyArray(variants), span: def.span };
}

function lowerTypedef(def: Extract<IdlDefinition, { kind: "typedef" }>): Typedef {
  const decl = def.declaration;
  if (decl.kind === "optional") {
    fail("XDR3003", "Optional typedefs are not supported; wrap the pointer in a struct field.", decl.span);
  }
  const lowered = lowerDeclaration(decl, "a typedef");
  const target: BasicType = lowered.value.element;
  const aliasElement = canonicalBasicType(lowered.name);
  if (aliasElement.kind !== "ident" && aliasElement.kind !== target.kind) {
    fail("XDR3004", `Typedef '${lowered.name}' would redefine the primitive ${aliasElement.kind}.`, decl.span);
  }
  const alias = withElement(lowered.value, aliasElement);
  return { kind: "typedef", name: lowered.name, target, alias, span: def.span };
}

function lowerDefinition(def: IdlDefinition): Declaration {
  switch (def.kind) {
    case "const":
      return { kind: "constant", name: def.name.name, value: valueText(def.value), span: def.span };
    case "typedef":
      return lowerTypedef(def);
    case "enum":
      return lowerEnum(def);
    case "struct":
      return lowerStruct(def);
    case "union":
      return lowerUnion(def);
  }
}

/**
 * Lowers the parse tree in one top-to-bottom walk, then builds the three
 * indices over the finished declaration list.
 */
export function buildAst(spec: IdlSpecification): Ast {
  const declarations = freezeReadonlyArray(spec.definitions.map(lowerDefinition));
  return {
    declarations,
    constants: buildConstantIndex(declarations),
    generics: buildGenericIndex(declarations),
    types: buildTypeIndex(declarations),
  };
}
