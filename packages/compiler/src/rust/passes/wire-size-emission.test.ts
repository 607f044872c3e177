import { expect } from "chai";

import type { TypeDeclaration } from "../../xdr/ast.js";
import { buildAst } from "../../xdr/ast-builder.js";
import { parseIdl } from "../../xdr/parser.js";
import { identExpr } from "../ir.js";
import { writeRustExpr, writeRustProgram } from "../write.js";
import type { EmitContext } from "./context.js";
import { emitWireSizePass, wireSizeTerm } from "./wire-size-emission.js";

function wireSizeOf(text: string, name: string): string {
  const ctx: EmitContext = { ast: buildAst(parseIdl(text, "size.x")), attrs: [] };
  const decl: TypeDeclaration | undefined = ctx.ast.types.get(name);
  if (!decl) throw new Error(`missing type ${name}`);
  return writeRustProgram({ kind: "program", items: [emitWireSizePass(ctx, decl)] });
}

describe("@xdrust/compiler passes/wire-size-emission", () => {
  it("pads opaque data through the runtime helpers", () => {
    const value = identExpr("x");
    expect(writeRustExpr(wireSizeTerm({ kind: "opaque_fixed", size: { kind: "known", value: 3 } }, value))).to.equal(
      "fixed_opaque_size(x.as_ref())"
    );
    expect(writeRustExpr(wireSizeTerm({ kind: "opaque_variable" }, value))).to.equal(
      "variable_opaque_size(x.as_ref())"
    );
    expect(writeRustExpr(wireSizeTerm({ kind: "string" }, value))).to.equal("x.wire_size()");
  });

  it("sums struct fields", () => {
    const rust = wireSizeOf(
      "struct inner { int a; };\nstruct rec { opaque id[4]; inner head; opaque blob<>; };",
      "rec"
    );
    expect(rust).to.equal(
      [
        "impl<T: AsRef<[u8]> + Debug> WireSize for rec<T> {",
        "  fn wire_size(&self) -> usize {",
        "    fixed_opaque_size(self.id.as_ref()) + self.head.wire_size() + variable_opaque_size(self.blob.as_ref())",
        "  }",
        "}",
        "",
      ].join("\n")
    );
  });

  it("sizes an empty struct as zero and an enum as one word", () => {
    expect(wireSizeOf("struct nothing { };", "nothing").split("\n")[2]).to.equal("    0");
    expect(wireSizeOf("enum e { A = 0 };", "e").split("\n")[2]).to.equal("    4");
  });

  it("adds the discriminant word to the arm payload", () => {
    const rust = wireSizeOf(
      "union r switch (int code) { case 0: void; case 1: int n; default: opaque detail<>; };",
      "r"
    );
    expect(rust).to.equal(
      [
        "impl<T: AsRef<[u8]> + Debug> WireSize for r<T> {",
        "  fn wire_size(&self) -> usize {",
        "    4 + match self {",
        "      Self::v_1(inner) => inner.wire_size(),",
        "      Self::v_0 => 0,",
        "      Self::default(_, inner) => variable_opaque_size(inner.as_ref()),",
        "    }",
        "  }",
        "}",
        "",
      ].join("\n")
    );
  });

  it("ignores the value of a void default", () => {
    const rust = wireSizeOf("union u switch (unsigned int d) { case 1: void; default: void; };", "u");
    expect(rust.split("\n").slice(2, 7)).to.deep.equal([
      "    4 + match self {",
      "      Self::v_1 => 0,",
      "      Self::default(_) => 0,",
      "    }",
      "  }",
    ]);
  });

  it("sizes a typedef through its single field", () => {
    expect(wireSizeOf("typedef opaque hash[32];", "hash").split("\n")[2]).to.equal(
      "    fixed_opaque_size(self.0.as_ref())"
    );
  });
});
