import { expect } from "chai";

import { CompileError } from "../diagnostics.js";
import type { Ast, Declaration } from "./ast.js";
import { buildAst } from "./ast-builder.js";
import { parseIdl } from "./parser.js";

function astOf(text: string): Ast {
  return buildAst(parseIdl(text, "ast.x"));
}

function declaration(ast: Ast, name: string): Declaration {
  const decl = ast.declarations.find((d) => d.name === name);
  if (!decl) throw new Error(`missing declaration ${name}`);
  return decl;
}

function codeOf(text: string): string | undefined {
  try {
    astOf(text);
  } catch (err) {
    if (err instanceof CompileError) return err.code;
    throw err;
  }
  return undefined;
}

describe("@xdrust/compiler xdr/ast-builder", () => {
  it("lowers struct fields to array shapes", () => {
    const ast = astOf(
      [
        "const LEN = 8;",
        "struct node { int id; };",
        "struct s {",
        "  unsigned int a;",
        "  opaque b[4];",
        "  string c<LEN>;",
        "  node d<>;",
        "  node *e;",
        "};",
      ].join("\n")
    );
    const s = declaration(ast, "s");
    if (s.kind !== "struct") throw new Error("expected struct");
    expect(s.fields.map(({ name, value, isOptional }) => ({ name, value, isOptional }))).to.deep.equal([
      { name: "a", value: { kind: "none", element: { kind: "u32" } }, isOptional: false },
      {
        name: "b",
        value: { kind: "fixed", element: { kind: "opaque" }, size: { kind: "known", value: 4 } },
        isOptional: false,
      },
      {
        name: "c",
        value: { kind: "variable", element: { kind: "string" }, max: { kind: "constant", name: "LEN" } },
        isOptional: false,
      },
      { name: "d", value: { kind: "variable", element: { kind: "ident", name: "node" } }, isOptional: false },
      { name: "e", value: { kind: "none", element: { kind: "ident", name: "node" } }, isOptional: true },
    ]);
  });

  it("keeps constant and enum values as written", () => {
    const ast = astOf("const A = 0x10;\nenum e { X = A, Y = -1 };");
    expect(declaration(ast, "A")).to.deep.include({ kind: "constant", value: "0x10" });
    const e = declaration(ast, "e");
    if (e.kind !== "enum") throw new Error("expected enum");
    expect(e.variants.map((v) => [v.name, v.value])).to.deep.equal([
      ["X", "A"],
      ["Y", "-1"],
    ]);
  });

  it("splits union arms into cases, void cases and default", () => {
    const ast = astOf(
      [
        "union u switch (unsigned int kind) {",
        "  case 1:",
        "  case 2:",
        "    int small;",
        "  case 3:",
        "    void;",
        "  default:",
        "    void;",
        "};",
      ].join("\n")
    );
    const u = declaration(ast, "u");
    if (u.kind !== "union") throw new Error("expected union");
    expect(u.switch).to.deep.equal({ varName: "kind", varType: { kind: "u32" } });
    expect(u.cases.map((c) => [c.caseValues, c.fieldName])).to.deep.equal([[["1", "2"], "small"]]);
    expect(u.voidCases).to.deep.equal(["3", "default"]);
    expect(u.default).to.equal(undefined);
  });

  it("records a default arm with data", () => {
    const u = declaration(astOf("union u switch (int d) { case 0: void; default: opaque rest<>; };"), "u");
    if (u.kind !== "union") throw new Error("expected union");
    expect(u.default?.fieldName).to.equal("rest");
    expect(u.default?.fieldValue).to.deep.equal({ kind: "variable", element: { kind: "opaque" } });
  });

  it("gives typedefs a target and an alias of the same shape", () => {
    const t = declaration(astOf("typedef opaque blob<32>;"), "blob");
    expect(t).to.deep.include({
      kind: "typedef",
      target: { kind: "opaque" },
      alias: { kind: "variable", element: { kind: "ident", name: "blob" }, max: { kind: "known", value: 32 } },
    });
  });

  it("leaves self typedefs out of the type index", () => {
    const ast = astOf("typedef unsigned int uint32_t;");
    expect(ast.declarations).to.have.length(1);
    expect(ast.types.get("uint32_t")).to.equal(undefined);
  });

  it("reports declaration shape errors", () => {
    expect(codeOf("struct s { void; };")).to.equal("XDR3001");
    expect(codeOf("struct s { string name[4]; };")).to.equal("XDR3002");
    expect(codeOf("struct s { opaque *p; };")).to.equal("XDR3003");
    expect(codeOf("typedef node *ptr;")).to.equal("XDR3003");
    expect(codeOf("typedef int uint32_t;")).to.equal("XDR3004");
    expect(codeOf("enum e { BIG = 0x80000000 };")).to.equal("XDR3005");
    expect(codeOf("union u switch (string s) { case 0: void; };")).to.equal("XDR3006");
    expect(codeOf("union u switch (int *p) { case 0: void; };")).to.equal("XDR3006");
  });

  it("rejects repeated case labels", () => {
    expect(codeOf("union u switch (int d) { case 1: void; case 1: int x; };")).to.equal("XDR2005");
    expect(codeOf("union u switch (int d) { default: void; default: int x; };")).to.equal("XDR2005");
  });

  it("rejects array sizes beyond 32 bits", () => {
    expect(codeOf("struct s { int a[0x100000000]; };")).to.equal("XDR4002");
    expect(codeOf("struct s { int a<-1>; };")).to.equal("XDR4002");
  });

  it("accepts the smallest signed enum value", () => {
    expect(codeOf("enum e { LOW = -2147483648 };")).to.equal(undefined);
  });
});
