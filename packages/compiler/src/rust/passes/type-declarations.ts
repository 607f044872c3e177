import { isSelfTypedef, type Constant, type Enum, type Struct, type Typedef, type Union } from "../../xdr/ast.js";
import type { RustEnumVariant, RustItem, RustType } from "../ir.js";
import { numberExpr, pathType } from "../ir.js";
import { rustSafeName } from "../lowering/common.js";
import {
  classifyOccurrence,
  integerValueText,
  rustOccurrenceType,
  typedefBody,
  typeParamsFor,
} from "../lowering/type-lowering.js";
import { buildUnionModel, DEFAULT_VARIANT } from "../lowering/union-model.js";
import type { EmitContext } from "./context.js";

const I32_MIN = -0x80000000n;
const U32_MAX = 0xffffffffn;

function constantType(value: bigint): RustType {
  if (value < 0n) return pathType([value < I32_MIN ? "i64" : "i32"]);
  return pathType([value > U32_MAX ? "u64" : "u32"]);
}

function constantItem(ctx: EmitContext, decl: Constant): RustItem {
  const resolved = ctx.ast.constants.resolveInteger(decl.name, decl.span);
  return {
    kind: "const",
    vis: "pub",
    name: rustSafeName(decl.name),
    type: constantType(resolved),
    value: numberExpr(integerValueText(ctx.ast, decl.value, decl.span)),
  };
}

function structItem(ctx: EmitContext, decl: Struct): RustItem {
  return {
    kind: "struct",
    vis: "pub",
    name: rustSafeName(decl.name),
    attrs: ctx.attrs,
    typeParams: typeParamsFor(ctx.ast, decl.name),
    fields: decl.fields.map((f) => ({
      vis: "pub",
      name: rustSafeName(f.name),
      type: rustOccurrenceType(ctx.ast, classifyOccurrence(f.value), f.isOptional, f.span),
    })),
  };
}

function unionItem(ctx: EmitContext, decl: Union): RustItem {
  const model = buildUnionModel(ctx.ast, decl);
  const variants = model.variants.map((v): RustEnumVariant => {
    const payload = v.payload
      ? [rustOccurrenceType(ctx.ast, v.payload.occurrence, v.payload.isOptional, v.payload.span)]
      : [];
    if (v.kind === "default") {
      return { name: DEFAULT_VARIANT, fields: [model.discriminantType, ...payload] };
    }
    return { name: v.name, fields: payload };
  });
  return {
    kind: "enum",
    vis: "pub",
    name: rustSafeName(decl.name),
    attrs: ctx.attrs,
    typeParams: typeParamsFor(ctx.ast, decl.name),
    variants,
  };
}

function enumItem(ctx: EmitContext, decl: Enum): RustItem {
  return {
    kind: "enum",
    vis: "pub",
    name: rustSafeName(decl.name),
    attrs: ctx.attrs,
    typeParams: [],
    variants: decl.variants.map((v) => ({
      name: rustSafeName(v.name),
      fields: [],
      discriminant: integerValueText(ctx.ast, v.value, v.span),
    })),
  };
}

function typedefItem(ctx: EmitContext, decl: Typedef): RustItem {
  const body = classifyOccurrence(typedefBody(ctx.ast, decl));
  return {
    kind: "tuple_struct",
    vis: "pub",
    name: rustSafeName(decl.name),
    attrs: ctx.attrs,
    typeParams: typeParamsFor(ctx.ast, decl.name),
    fields: [{ vis: "pub", type: rustOccurrenceType(ctx.ast, body, false, decl.span) }],
  };
}

/** Rust declarations for every constant and type, in source order. */
export function emitTypeDeclarationsPass(ctx: EmitContext): readonly RustItem[] {
  const items: RustItem[] = [];
  for (const decl of ctx.ast.declarations) {
    switch (decl.kind) {
      case "constant":
        items.push(constantItem(ctx, decl));
        break;
      case "struct":
        items.push(structItem(ctx, decl));
        break;
      case "union":
        items.push(unionItem(ctx, decl));
        break;
      case "enum":
        items.push(enumItem(ctx, decl));
        break;
      case "typedef":
        if (!isSelfTypedef(decl)) items.push(typedefItem(ctx, decl));
        break;
    }
  }
  return items;
}
