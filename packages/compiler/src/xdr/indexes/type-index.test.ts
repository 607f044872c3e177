import { expect } from "chai";

import { CompileError } from "../../diagnostics.js";
import { buildAst } from "../ast-builder.js";
import { parseIdl } from "../parser.js";
import type { TypeIndex } from "./type-index.js";

function typesOf(text: string): TypeIndex {
  return buildAst(parseIdl(text, "types.x")).types;
}

describe("@xdrust/compiler xdr/indexes/type-index", () => {
  it("orders declarations by name", () => {
    const types = typesOf("struct zeta { int x; };\nenum alpha { A = 0 };\ntypedef int Mid;\nconst K = 1;");
    expect(types.ordered.map((d) => d.name)).to.deep.equal(["Mid", "alpha", "zeta"]);
  });

  it("answers typedef lookups only for typedefs", () => {
    const types = typesOf("typedef hyper stamp;\nstruct s { int x; };");
    expect(types.typedefTarget("stamp")?.target).to.deep.equal({ kind: "i64" });
    expect(types.typedefTarget("s")).to.equal(undefined);
    expect(types.get("s")?.kind).to.equal("struct");
  });

  it("rejects a name declared twice", () => {
    try {
      typesOf("struct a { int x; };\nenum a { X = 0 };");
      expect.fail("expected a CompileError");
    } catch (err) {
      if (!(err instanceof CompileError)) throw err;
      expect(err.code).to.equal("XDR2002");
      expect(err.message).to.equal("Type 'a' is declared more than once.");
    }
  });
});
