import { expect } from "chai";
import { mkdtempSync, readFileSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { CompileError } from "@xdrust/compiler";

import { runGenerate } from "./generate.js";

describe("@xdrust/cli generate", () => {
  it("writes the generated Rust file, creating its directory", async () => {
    const dir = mkdtempSync(join(tmpdir(), "xdrust-generate-"));
    writeFileSync(join(dir, "in.x"), "const N = 1;\n", "utf-8");

    const res = await runGenerate({ dir, argv: ["--input", "in.x", "--out", "gen/out.rs", "--no-preamble"] });

    expect(res).to.deep.equal({ inputPath: join(dir, "in.x"), outputPath: join(dir, "gen", "out.rs"), bytes: 22 });
    expect(readFileSync(res.outputPath, "utf-8")).to.equal("pub const N: u32 = 1;\n");
  });

  it("reports compile errors against the input path", async () => {
    const dir = mkdtempSync(join(tmpdir(), "xdrust-generate-error-"));
    writeFileSync(join(dir, "bad.x"), "struct s { int x }\n", "utf-8");

    try {
      await runGenerate({ dir, argv: ["--input", "bad.x", "--out", "bad.rs"] });
      expect.fail("expected a CompileError");
    } catch (err) {
      if (!(err instanceof CompileError)) throw err;
      expect(err.code).to.equal("XDR1003");
      expect(err.span).to.deep.equal({ fileName: join(dir, "bad.x"), start: 17, end: 18 });
    }
  });
});
