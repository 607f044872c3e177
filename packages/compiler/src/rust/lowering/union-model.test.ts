import { expect } from "chai";

import { CompileError } from "../../diagnostics.js";
import type { Ast, Union } from "../../xdr/ast.js";
import { buildAst } from "../../xdr/ast-builder.js";
import { parseIdl } from "../../xdr/parser.js";
import { writeRustType } from "../write.js";
import { buildUnionModel, caseLabelExpr, caseLabelPattern, type UnionModel } from "./union-model.js";

function modelOf(text: string, name: string): UnionModel {
  const ast: Ast = buildAst(parseIdl(text, "union.x"));
  const decl = ast.types.get(name);
  if (decl?.kind !== "union") throw new Error(`missing union ${name}`);
  const union: Union = decl;
  return buildUnionModel(ast, union);
}

describe("@xdrust/compiler lowering/union-model", () => {
  it("expands fallthrough labels and appends void cases", () => {
    const model = modelOf(
      "const TWO = 2;\nunion n switch (int d) { case 1: case TWO: opaque data<>; case -1: void; };",
      "n"
    );
    const summary = model.variants.map((v) =>
      v.kind === "case" ? [v.name, v.label, v.payload !== undefined] : ["default"]
    );
    expect(summary).to.deep.equal([
      ["v_1", { kind: "literal", text: "1" }, true],
      ["TWO", { kind: "literal", text: "2" }, true],
      ["v_neg_1", { kind: "literal", text: "-1" }, false],
    ]);
    expect(writeRustType(model.discriminantType)).to.equal("i32");
  });

  it("matches enum discriminants through a typedef", () => {
    const model = modelOf(
      [
        "enum kind { A = 0, B = 1 };",
        "typedef kind kind_t;",
        "union u switch (kind_t k) { case A: int x; case B: void; default: void; };",
      ].join("\n"),
      "u"
    );
    expect(model.discriminant).to.deep.equal({ kind: "ident", name: "kind" });
    expect(writeRustType(model.discriminantType)).to.equal("kind");
    const [a, b, fallback] = model.variants;
    expect(a?.kind === "case" && a.label).to.deep.equal({ kind: "variant", segments: ["kind", "A"] });
    expect(a?.payload?.occurrence).to.deep.equal({ kind: "scalar", element: { kind: "i32" } });
    expect(b?.payload).to.equal(undefined);
    expect(fallback).to.deep.equal({ kind: "default" });
  });

  it("keeps the payload of a default arm", () => {
    const model = modelOf("union u switch (unsigned int d) { case 0: void; default: string msg<>; };", "u");
    const last = model.variants[model.variants.length - 1];
    expect(last?.kind).to.equal("default");
    expect(last?.payload?.occurrence).to.deep.equal({ kind: "string" });
  });

  it("turns TRUE and FALSE into boolean patterns", () => {
    const model = modelOf("union b switch (bool f) { case TRUE: int x; case FALSE: void; };", "b");
    const labels = model.variants.flatMap((v) => (v.kind === "case" ? [v.label] : []));
    expect(labels.map(caseLabelPattern)).to.deep.equal([
      { kind: "literal", text: "true" },
      { kind: "literal", text: "false" },
    ]);
    expect(labels.map(caseLabelExpr)).to.deep.equal([
      { kind: "bool", value: true },
      { kind: "bool", value: false },
    ]);
  });

  it("writes variant labels as paths", () => {
    expect(caseLabelPattern({ kind: "variant", segments: ["kind", "A"] })).to.deep.equal({
      kind: "path",
      path: { segments: ["kind", "A"] },
    });
    expect(caseLabelExpr({ kind: "literal", text: "0o7" })).to.deep.equal({ kind: "number", text: "0o7" });
  });

  function expectCompileError(run: () => void, code: string, message: string): void {
    try {
      run();
      expect.fail("expected a CompileError");
    } catch (err) {
      if (!(err instanceof CompileError)) throw err;
      expect(err.code).to.equal(code);
      expect(err.message).to.equal(message);
    }
  }

  it("rejects case labels that spell the same value differently", () => {
    expectCompileError(
      () => modelOf("union d switch (int k) { case 4: int a; case 0x4: void; };", "d"),
      "XDR2005",
      "Union 'd' case '0x4' repeats an earlier case value."
    );
    expectCompileError(
      () => modelOf("const FOUR = 4;\nunion d switch (int k) { case 4: int a; case FOUR: int b; };", "d"),
      "XDR2005",
      "Union 'd' case 'FOUR' repeats an earlier case value."
    );
  });

  it("rejects case labels that produce the same variant name", () => {
    expectCompileError(
      () => modelOf("const v_1 = 2;\nunion d switch (int k) { case 1: int a; case v_1: void; };", "d"),
      "XDR2005",
      "Union 'd' case 'v_1' reuses variant name 'v_1'."
    );
  });

  it("rejects a switch that resolves to string data", () => {
    expectCompileError(
      () => modelOf("typedef string name<>;\nunion u switch (name k) { case 0: void; };", "u"),
      "XDR3006",
      "Union 'u' cannot switch on string."
    );
  });

  it("rejects labels that name nothing", () => {
    try {
      modelOf("union u switch (int d) { case NOPE: void; };", "u");
      expect.fail("expected a CompileError");
    } catch (err) {
      if (!(err instanceof CompileError)) throw err;
      expect(err.code).to.equal("XDR2003");
      expect(err.message).to.equal("Unknown case label 'NOPE'.");
    }
  });
});
