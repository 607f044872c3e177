import type { Span } from "../../diagnostics.js";
import type { ArraySize, Ast, Enum, Struct, TypeDeclaration, Typedef, Union } from "../../xdr/ast.js";
import type { RustExpr, RustItem, RustMatchExprArm, RustStmt, RustType } from "../ir.js";
import { callExpr, identExpr, methodCall, pathExpr, pathType, tryExpr } from "../ir.js";
import { rustSafeName } from "../lowering/common.js";
import {
  arraySizeExpr,
  arraySizeValue,
  assertTypeExists,
  classifyOccurrence,
  integerValueText,
  namedType,
  typedefBody,
  type ElementType,
  type Occurrence,
} from "../lowering/type-lowering.js";
import { buildUnionModel, caseLabelPattern, DEFAULT_VARIANT, type UnionPayload } from "../lowering/union-model.js";
import type { EmitContext } from "./context.js";

/**
 * `owned` bodies read from `mut v: Bytes`, `borrowed` ones (and every
 * closure) from `v: &mut Bytes`.
 */
type ReadSite = "owned" | "borrowed";

const READER = identExpr("v");
const DISCRIMINANT = "discriminant";

function nestedReader(site: ReadSite): RustExpr {
  const target: RustExpr = site === "owned" ? READER : { kind: "deref", expr: READER };
  return { kind: "borrow", mut: true, expr: target };
}

function maxExpr(ast: Ast, max: ArraySize | undefined, span: Span): RustExpr {
  if (max === undefined) return pathExpr(["None"]);
  return callExpr("Some", [arraySizeExpr(ast, max, span)]);
}

/** A read of one element, still a `Result`. */
function readElement(ast: Ast, element: ElementType, site: ReadSite, span: Span): RustExpr {
  switch (element.kind) {
    case "ident":
      assertTypeExists(ast, element.name, span);
      return {
        kind: "assoc_call",
        typePath: { segments: [rustSafeName(element.name)] },
        member: "try_from",
        args: [nestedReader(site)],
      };
    default:
      return methodCall(READER, `try_${element.kind}`);
  }
}

function readOccurrence(ast: Ast, occurrence: Occurrence, site: ReadSite, span: Span): RustExpr {
  switch (occurrence.kind) {
    case "opaque_fixed":
      return tryExpr(methodCall(READER, "try_bytes", [arraySizeExpr(ast, occurrence.size, span)]));
    case "opaque_variable":
      return tryExpr(methodCall(READER, "try_variable_bytes", [maxExpr(ast, occurrence.max, span)]));
    case "string":
      return tryExpr(methodCall(READER, "try_string", [maxExpr(ast, occurrence.max, span)]));
    case "scalar":
      return tryExpr(readElement(ast, occurrence.element, site, span));
    case "fixed_array": {
      const count = arraySizeValue(ast, occurrence.size, span);
      const elements: RustExpr[] = [];
      for (let i = 0; i < count; i++) elements.push(tryExpr(readElement(ast, occurrence.element, site, span)));
      return { kind: "array_lit", elements };
    }
    case "variable_array":
      return tryExpr(
        methodCall(READER, "try_variable_array", [
          maxExpr(ast, occurrence.max, span),
          { kind: "closure", params: ["v"], body: readElement(ast, occurrence.element, "borrowed", span) },
        ])
      );
  }
}

function readValue(ast: Ast, occurrence: Occurrence, isOptional: boolean, site: ReadSite, span: Span): RustExpr {
  if (!isOptional) return readOccurrence(ast, occurrence, site, span);
  const body =
    occurrence.kind === "scalar"
      ? readElement(ast, occurrence.element, "borrowed", span)
      : callExpr("Ok", [readOccurrence(ast, occurrence, "borrowed", span)]);
  return tryExpr(methodCall(READER, "try_option", [{ kind: "closure", params: ["v"], body }]));
}

function readPayload(ast: Ast, payload: UnionPayload, site: ReadSite): RustExpr {
  return readValue(ast, payload.occurrence, payload.isOptional, site, payload.span);
}

function okSelf(variant: string | undefined, args: readonly RustExpr[]): RustExpr {
  const path = variant === undefined ? ["Self"] : ["Self", variant];
  const built: RustExpr = args.length === 0 ? pathExpr(path) : { kind: "call", callee: pathExpr(path), args };
  return callExpr("Ok", [built]);
}

function unknownVariant(value: RustExpr): RustExpr {
  return callExpr("Err", [{ kind: "call", callee: pathExpr(["Error", "UnknownVariant"]), args: [value] }]);
}

function structBody(ctx: EmitContext, decl: Struct, site: ReadSite): readonly RustStmt[] {
  const fields = decl.fields.map((f) => ({
    name: rustSafeName(f.name),
    expr: readValue(ctx.ast, classifyOccurrence(f.value), f.isOptional, site, f.span),
  }));
  return [{ kind: "tail", expr: callExpr("Ok", [{ kind: "struct_lit", typePath: { segments: ["Self"] }, fields }]) }];
}

function unionBody(ctx: EmitContext, decl: Union, site: ReadSite): readonly RustStmt[] {
  const model = buildUnionModel(ctx.ast, decl);
  const arms: RustMatchExprArm[] = [];
  let hasDefault = false;
  for (const v of model.variants) {
    const payload = v.payload ? [readPayload(ctx.ast, v.payload, site)] : [];
    if (v.kind === "default") {
      hasDefault = true;
      arms.push({
        pattern: { kind: "binding", name: "d" },
        expr: okSelf(DEFAULT_VARIANT, [identExpr("d"), ...payload]),
      });
      continue;
    }
    arms.push({ pattern: caseLabelPattern(v.label), expr: okSelf(v.name, payload) });
  }
  if (!hasDefault) {
    arms.push({
      pattern: { kind: "binding", name: "d" },
      expr: unknownVariant({ kind: "cast", expr: identExpr("d"), type: pathType(["i32"]) }),
    });
  }
  return [
    {
      kind: "let",
      pattern: { kind: "ident", name: DISCRIMINANT },
      mut: false,
      init: readOccurrence(ctx.ast, { kind: "scalar", element: model.discriminant }, site, decl.span),
    },
    { kind: "tail", expr: { kind: "match", expr: identExpr(DISCRIMINANT), arms } },
  ];
}

function enumBody(ctx: EmitContext, decl: Enum): readonly RustStmt[] {
  const arms: RustMatchExprArm[] = decl.variants.map((v) => ({
    pattern: { kind: "literal", text: integerValueText(ctx.ast, v.value, v.span) },
    expr: okSelf(rustSafeName(v.name), []),
  }));
  arms.push({ pattern: { kind: "binding", name: "d" }, expr: unknownVariant(identExpr("d")) });
  return [
    {
      kind: "let",
      pattern: { kind: "ident", name: DISCRIMINANT },
      mut: false,
      init: tryExpr(methodCall(READER, "try_i32")),
    },
    { kind: "tail", expr: { kind: "match", expr: identExpr(DISCRIMINANT), arms } },
  ];
}

function typedefBodyStmts(ctx: EmitContext, decl: Typedef, site: ReadSite): readonly RustStmt[] {
  const body = classifyOccurrence(typedefBody(ctx.ast, decl));
  return [{ kind: "tail", expr: okSelf(undefined, [readOccurrence(ctx.ast, body, site, decl.span)]) }];
}

function decodeBody(ctx: EmitContext, decl: TypeDeclaration, site: ReadSite): readonly RustStmt[] {
  switch (decl.kind) {
    case "struct":
      return structBody(ctx, decl, site);
    case "union":
      return unionBody(ctx, decl, site);
    case "enum":
      return enumBody(ctx, decl);
    case "typedef":
      return typedefBodyStmts(ctx, decl, site);
  }
}

function decodeImpl(ctx: EmitContext, decl: TypeDeclaration, site: ReadSite): RustItem {
  const bytes = pathType(["Bytes"]);
  const source: RustType = site === "owned" ? bytes : { kind: "ref", mut: true, inner: bytes };
  return {
    kind: "impl",
    typeParams: [],
    traitType: pathType(["TryFrom"], [source]),
    selfType: namedType(ctx.ast, decl.name, bytes),
    items: [
      { kind: "type_alias", name: "Error", type: pathType(["Error"]) },
      {
        kind: "fn",
        vis: "private",
        receiver: { kind: "none" },
        name: "try_from",
        typeParams: [],
        params: [{ name: "v", mut: site === "owned", type: source }],
        ret: pathType(["Result"], [pathType(["Self"]), pathType(["Self", "Error"])]),
        body: decodeBody(ctx, decl, site),
      },
    ],
  };
}

/** `TryFrom<Bytes>` and `TryFrom<&mut Bytes>` for one type; generic types decode into `Bytes`. */
export function emitDecodePass(ctx: EmitContext, decl: TypeDeclaration): readonly RustItem[] {
  return [decodeImpl(ctx, decl, "owned"), decodeImpl(ctx, decl, "borrowed")];
}
