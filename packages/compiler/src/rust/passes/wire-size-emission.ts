import type { TypeDeclaration } from "../../xdr/ast.js";
import type { RustExpr, RustItem, RustMatchExprArm, RustPattern } from "../ir.js";
import { callExpr, identExpr, methodCall, numberExpr, pathType } from "../ir.js";
import { rustSafeName } from "../lowering/common.js";
import {
  classifyOccurrence,
  namedType,
  typedefBody,
  typeParamsFor,
  type Occurrence,
} from "../lowering/type-lowering.js";
import { buildUnionModel, DEFAULT_VARIANT } from "../lowering/union-model.js";
import type { EmitContext } from "./context.js";

const SELF = identExpr("self");
const INNER = "inner";

export function wireSizeTerm(occurrence: Occurrence, value: RustExpr): RustExpr {
  switch (occurrence.kind) {
    case "opaque_fixed":
      return callExpr("fixed_opaque_size", [methodCall(value, "as_ref")]);
    case "opaque_variable":
      return callExpr("variable_opaque_size", [methodCall(value, "as_ref")]);
    default:
      return methodCall(value, "wire_size");
  }
}

function sum(terms: readonly RustExpr[]): RustExpr {
  if (terms.length === 0) return numberExpr("0");
  return { kind: "sum", terms };
}

function wireSizeExpr(ctx: EmitContext, decl: TypeDeclaration): RustExpr {
  switch (decl.kind) {
    case "struct":
      return sum(
        decl.fields.map((f) =>
          wireSizeTerm(classifyOccurrence(f.value), { kind: "field", expr: SELF, name: rustSafeName(f.name) })
        )
      );
    case "union": {
      const model = buildUnionModel(ctx.ast, decl);
      const arms = model.variants.map((v): RustMatchExprArm => {
        const path = { segments: ["Self", v.kind === "default" ? DEFAULT_VARIANT : v.name] };
        const lead: readonly RustPattern[] = v.kind === "default" ? [{ kind: "wild" }] : [];
        if (!v.payload) {
          return {
            pattern: lead.length === 0 ? { kind: "path", path } : { kind: "tuple_struct", path, fields: lead },
            expr: numberExpr("0"),
          };
        }
        return {
          pattern: { kind: "tuple_struct", path, fields: [...lead, { kind: "ident", name: INNER }] },
          expr: wireSizeTerm(v.payload.occurrence, identExpr(INNER)),
        };
      });
      return sum([numberExpr("4"), { kind: "match", expr: SELF, arms }]);
    }
    case "enum":
      return numberExpr("4");
    case "typedef":
      return wireSizeTerm(classifyOccurrence(typedefBody(ctx.ast, decl)), { kind: "field", expr: SELF, name: "0" });
  }
}

/** `WireSize` for one type: the exact number of bytes its encoding takes. */
export function emitWireSizePass(ctx: EmitContext, decl: TypeDeclaration): RustItem {
  return {
    kind: "impl",
    typeParams: typeParamsFor(ctx.ast, decl.name),
    traitType: pathType(["WireSize"]),
    selfType: namedType(ctx.ast, decl.name),
    items: [
      {
        kind: "fn",
        vis: "private",
        receiver: { kind: "ref_self", mut: false },
        name: "wire_size",
        typeParams: [],
        params: [],
        ret: pathType(["usize"]),
        body: [{ kind: "tail", expr: wireSizeExpr(ctx, decl) }],
      },
    ],
  };
}
