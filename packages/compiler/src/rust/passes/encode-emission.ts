import type { Enum, TypeDeclaration, Union } from "../../xdr/ast.js";
import type { RustExpr, RustItem, RustMatchArm, RustMatchExprArm, RustPattern, RustStmt } from "../ir.js";
import { callExpr, identExpr, methodCall, numberExpr, pathType } from "../ir.js";
import { rustSafeName } from "../lowering/common.js";
import {
  classifyOccurrence,
  integerValueText,
  namedType,
  typedefBody,
  typeParamsFor,
  type Occurrence,
} from "../lowering/type-lowering.js";
import { buildUnionModel, caseLabelExpr, DEFAULT_VARIANT } from "../lowering/union-model.js";
import type { EmitContext } from "./context.js";

const SELF = identExpr("self");
const BUF = identExpr("buf");
const INNER = "inner";

function exprStmt(expr: RustExpr): RustStmt {
  return { kind: "expr", expr };
}

export function encodeStmt(occurrence: Occurrence, value: RustExpr): RustStmt {
  switch (occurrence.kind) {
    case "opaque_fixed":
      return exprStmt(callExpr("put_fixed_opaque", [BUF, methodCall(value, "as_ref")]));
    case "opaque_variable":
      return exprStmt(callExpr("put_variable_opaque", [BUF, methodCall(value, "as_ref")]));
    default:
      return exprStmt(methodCall(value, "encode", [BUF]));
  }
}

// The discriminant goes first: a typed `let` for case labels, the stored
// value for the default arm.
function unionBody(ctx: EmitContext, decl: Union): readonly RustStmt[] {
  const model = buildUnionModel(ctx.ast, decl);
  const writeD = exprStmt(methodCall(identExpr("d"), "encode", [BUF]));
  const arms = model.variants.map((v): RustMatchArm => {
    const path = { segments: ["Self", v.kind === "default" ? DEFAULT_VARIANT : v.name] };
    const lead: readonly RustPattern[] = v.kind === "default" ? [{ kind: "ident", name: "d" }] : [];
    const fields: readonly RustPattern[] = v.payload ? [...lead, { kind: "ident", name: INNER }] : lead;
    const body: RustStmt[] = [];
    if (v.kind === "case") {
      body.push({
        kind: "let",
        pattern: { kind: "ident", name: "d" },
        mut: false,
        type: model.discriminantType,
        init: caseLabelExpr(v.label),
      });
    }
    body.push(writeD);
    if (v.payload) body.push(encodeStmt(v.payload.occurrence, identExpr(INNER)));
    return {
      pattern: fields.length === 0 ? { kind: "path", path } : { kind: "tuple_struct", path, fields },
      body,
    };
  });
  return [{ kind: "match", expr: SELF, arms }];
}

function enumBody(ctx: EmitContext, decl: Enum): readonly RustStmt[] {
  const arms = decl.variants.map(
    (v): RustMatchExprArm => ({
      pattern: { kind: "path", path: { segments: ["Self", rustSafeName(v.name)] } },
      expr: numberExpr(integerValueText(ctx.ast, v.value, v.span)),
    })
  );
  return [
    {
      kind: "let",
      pattern: { kind: "ident", name: "d" },
      mut: false,
      type: pathType(["i32"]),
      init: { kind: "match", expr: SELF, arms },
    },
    exprStmt(methodCall(BUF, "put_i32", [identExpr("d")])),
  ];
}

function encodeBody(ctx: EmitContext, decl: TypeDeclaration): readonly RustStmt[] {
  switch (decl.kind) {
    case "struct":
      return decl.fields.map((f) =>
        encodeStmt(classifyOccurrence(f.value), { kind: "field", expr: SELF, name: rustSafeName(f.name) })
      );
    case "union":
      return unionBody(ctx, decl);
    case "enum":
      return enumBody(ctx, decl);
    case "typedef":
      return [encodeStmt(classifyOccurrence(typedefBody(ctx.ast, decl)), { kind: "field", expr: SELF, name: "0" })];
  }
}

/** `XdrEncode` for one type, writing the bytes its decode impls read. */
export function emitEncodePass(ctx: EmitContext, decl: TypeDeclaration): RustItem {
  return {
    kind: "impl",
    typeParams: typeParamsFor(ctx.ast, decl.name),
    traitType: pathType(["XdrEncode"]),
    selfType: namedType(ctx.ast, decl.name),
    items: [
      {
        kind: "fn",
        vis: "private",
        receiver: { kind: "ref_self", mut: false },
        name: "encode",
        typeParams: [{ name: "B", bounds: [pathType(["BufMut"])] }],
        params: [{ name: "buf", mut: false, type: { kind: "ref", mut: true, inner: pathType(["B"]) } }],
        ret: { kind: "unit" },
        body: encodeBody(ctx, decl),
      },
    ],
  };
}
