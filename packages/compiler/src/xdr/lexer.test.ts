import { expect } from "chai";

import { CompileError } from "../diagnostics.js";
import { tokenizeIdl } from "./lexer.js";

function kinds(text: string): readonly string[] {
  return tokenizeIdl(text, "lex.x").map((t) => `${t.kind}:${t.text}`);
}

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof CompileError) return err.code;
    throw err;
  }
  return undefined;
}

describe("@xdrust/compiler xdr/lexer", () => {
  it("splits identifiers, numbers and punctuation", () => {
    expect(kinds("const MAX = 0x10;")).to.deep.equal([
      "ident:const",
      "ident:MAX",
      "punct:=",
      "number:0x10",
      "punct:;",
      "eof:",
    ]);
  });

  it("reads negative literals as one token", () => {
    expect(kinds("A = -5,")).to.deep.equal(["ident:A", "punct:=", "number:-5", "punct:,", "eof:"]);
  });

  it("records spans as offsets into the input", () => {
    const [first, second] = tokenizeIdl("int  count", "span.x");
    expect(first?.span).to.deep.equal({ fileName: "span.x", start: 0, end: 3 });
    expect(second?.span).to.deep.equal({ fileName: "span.x", start: 5, end: 10 });
  });

  it("drops block comments, line comments and passthrough lines", () => {
    const text = ["%#include <rpc/rpc.h>", "/* header", " spans lines */", "int a; // trailing", "  %more", ""].join(
      "\n"
    );
    expect(kinds(text)).to.deep.equal(["ident:int", "ident:a", "punct:;", "eof:"]);
  });

  it("treats % away from the start of a line as an error", () => {
    expect(codeOf(() => tokenizeIdl("int a; %x", "bad.x"))).to.equal("XDR1001");
  });

  it("rejects an unterminated block comment", () => {
    expect(codeOf(() => tokenizeIdl("int a; /* open", "bad.x"))).to.equal("XDR1002");
  });

  it("rejects malformed integer literals", () => {
    expect(codeOf(() => tokenizeIdl("const X = 12ab;", "bad.x"))).to.equal("XDR1005");
    expect(codeOf(() => tokenizeIdl("const X = 09;", "bad.x"))).to.equal("XDR1005");
  });

  it("rejects characters outside the IDL alphabet", () => {
    expect(codeOf(() => tokenizeIdl("struct a { int b; } @", "bad.x"))).to.equal("XDR1001");
  });
});
