import { expect } from "chai";

import { canonicalBasicType, compareText, isIntegerLiteral, parseIntegerLiteral } from "./primitives.js";

describe("@xdrust/compiler xdr/primitives", () => {
  it("maps every primitive spelling to one Rust kind", () => {
    expect(canonicalBasicType("unsigned   hyper")).to.deep.equal({ kind: "u64" });
    expect(canonicalBasicType("unsigned")).to.deep.equal({ kind: "u32" });
    expect(canonicalBasicType("int32_t")).to.deep.equal({ kind: "i32" });
    expect(canonicalBasicType("double")).to.deep.equal({ kind: "f64" });
    expect(canonicalBasicType("opaque")).to.deep.equal({ kind: "opaque" });
  });

  it("treats everything else as a named type", () => {
    expect(canonicalBasicType("account_id")).to.deep.equal({ kind: "ident", name: "account_id" });
  });

  it("parses decimal, hex and octal literals", () => {
    expect(parseIntegerLiteral("0")).to.equal(0n);
    expect(parseIntegerLiteral("42")).to.equal(42n);
    expect(parseIntegerLiteral("0x1F")).to.equal(31n);
    expect(parseIntegerLiteral("-0X10")).to.equal(-16n);
    expect(parseIntegerLiteral("010")).to.equal(8n);
    expect(parseIntegerLiteral("-010")).to.equal(-8n);
    expect(parseIntegerLiteral("0xffffffffffffffff")).to.equal(18446744073709551615n);
  });

  it("rejects malformed literals", () => {
    for (const text of ["08", "0x", "1_000", "--1", "MAX", ""]) {
      expect(isIntegerLiteral(text), text).to.equal(false);
      expect(parseIntegerLiteral(text), text).to.equal(undefined);
    }
  });

  it("orders names by code unit", () => {
    expect(["b", "B", "a"].sort(compareText)).to.deep.equal(["B", "a", "b"]);
    expect(compareText("x", "x")).to.equal(0);
  });
});
