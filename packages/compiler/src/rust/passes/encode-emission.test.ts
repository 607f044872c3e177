import { expect } from "chai";

import type { TypeDeclaration } from "../../xdr/ast.js";
import { buildAst } from "../../xdr/ast-builder.js";
import { parseIdl } from "../../xdr/parser.js";
import { writeRustProgram } from "../write.js";
import type { EmitContext } from "./context.js";
import { emitEncodePass } from "./encode-emission.js";

function encodeOf(text: string, name: string): string {
  const ctx: EmitContext = { ast: buildAst(parseIdl(text, "encode.x")), attrs: [] };
  const decl: TypeDeclaration | undefined = ctx.ast.types.get(name);
  if (!decl) throw new Error(`missing type ${name}`);
  return writeRustProgram({ kind: "program", items: [emitEncodePass(ctx, decl)] });
}

describe("@xdrust/compiler passes/encode-emission", () => {
  it("writes struct fields in declaration order", () => {
    const rust = encodeOf("struct inner { int a; };\nstruct rec { opaque id[4]; inner head; opaque blob<>; };", "rec");
    expect(rust).to.equal(
      [
        "impl<T: AsRef<[u8]> + Debug> XdrEncode for rec<T> {",
        "  fn encode<B: BufMut>(&self, buf: &mut B) {",
        "    put_fixed_opaque(buf, self.id.as_ref());",
        "    self.head.encode(buf);",
        "    put_variable_opaque(buf, self.blob.as_ref());",
        "  }",
        "}",
        "",
      ].join("\n")
    );
  });

  it("writes the case label before the union payload", () => {
    const rust = encodeOf(
      "union r switch (int code) { case 0: void; case 1: int n; default: opaque detail<>; };",
      "r"
    );
    expect(rust).to.equal(
      [
        "impl<T: AsRef<[u8]> + Debug> XdrEncode for r<T> {",
        "  fn encode<B: BufMut>(&self, buf: &mut B) {",
        "    match self {",
        "      Self::v_1(inner) => {",
        "        let d: i32 = 1;",
        "        d.encode(buf);",
        "        inner.encode(buf);",
        "      },",
        "      Self::v_0 => {",
        "        let d: i32 = 0;",
        "        d.encode(buf);",
        "      },",
        "      Self::default(d, inner) => {",
        "        d.encode(buf);",
        "        put_variable_opaque(buf, inner.as_ref());",
        "      },",
        "    }",
        "  }",
        "}",
        "",
      ].join("\n")
    );
  });

  it("writes enum-typed labels as paths", () => {
    const rust = encodeOf(
      "enum color { RED = 0, GREEN = 1 };\nunion shade switch (color c) { case RED: int level; case GREEN: void; };",
      "shade"
    );
    expect(rust.split("\n").slice(3, 7)).to.deep.equal([
      "      Self::RED(inner) => {",
      "        let d: color = color::RED;",
      "        d.encode(buf);",
      "        inner.encode(buf);",
    ]);
  });

  it("writes enum values as a signed word", () => {
    const rust = encodeOf("const BASE = 7;\nenum e { A = 010, B = BASE };", "e");
    expect(rust).to.equal(
      [
        "impl XdrEncode for e {",
        "  fn encode<B: BufMut>(&self, buf: &mut B) {",
        "    let d: i32 = match self {",
        "      Self::A => 0o10,",
        "      Self::B => 7,",
        "    };",
        "    buf.put_i32(d);",
        "  }",
        "}",
        "",
      ].join("\n")
    );
  });

  it("encodes a typedef through its single field", () => {
    expect(encodeOf("typedef string label<16>;", "label").split("\n")[2]).to.equal("    self.0.encode(buf);");
  });
});
