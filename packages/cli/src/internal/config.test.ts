import { expect } from "chai";
import { mkdirSync, mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { CONFIG_FILE_NAME, findConfigFile, loadProjectContext, parseProjectConfig } from "./config.js";

function rejection(value: unknown): string {
  try {
    parseProjectConfig(value);
  } catch (err) {
    if (err instanceof Error) return err.message;
    throw err;
  }
  throw new Error("expected parseProjectConfig to throw");
}

describe("@xdrust/cli config", () => {
  it("findConfigFile picks the nearest config file", () => {
    const root = mkdtempSync(join(tmpdir(), "xdrust-config-find-"));
    const nestedRoot = join(root, "packages", "demo");
    const deep = join(nestedRoot, "idl", "v1");
    mkdirSync(deep, { recursive: true });
    writeFileSync(join(root, CONFIG_FILE_NAME), "{}\n", "utf-8");
    writeFileSync(join(nestedRoot, CONFIG_FILE_NAME), "{}\n", "utf-8");

    expect(findConfigFile(deep)).to.equal(join(nestedRoot, CONFIG_FILE_NAME));
    expect(findConfigFile(root)).to.equal(join(root, CONFIG_FILE_NAME));
  });

  it("loads a project context relative to the config file", () => {
    const root = mkdtempSync(join(tmpdir(), "xdrust-config-load-"));
    const configPath = join(root, CONFIG_FILE_NAME);
    writeFileSync(
      configPath,
      JSON.stringify(
        { schema: 1, input: "idl/types.x", output: "src/types.rs", emit: { encode: false }, preamble: false },
        null,
        2
      ) + "\n",
      "utf-8"
    );

    const ctx = loadProjectContext(configPath);
    expect(ctx.projectRoot).to.equal(root);
    expect(ctx.configPath).to.equal(configPath);
    expect(ctx.project).to.deep.equal({
      schema: 1,
      input: "idl/types.x",
      output: "src/types.rs",
      emit: { encode: false },
      preamble: false,
    });
  });

  it("rejects unknown keys at every level", () => {
    expect(rejection({ schema: 1, input: "a.x", output: "a.rs", extra: true })).to.equal(
      "xdrust.json: unknown key 'extra'."
    );
    expect(rejection({ schema: 1, input: "a.x", output: "a.rs", emit: { docs: true } })).to.equal(
      "xdrust.json: 'emit': unknown key 'docs'."
    );
  });

  it("rejects values of the wrong shape", () => {
    expect(rejection([])).to.equal("xdrust.json must be a JSON object.");
    expect(rejection({ schema: 2, input: "a.x", output: "a.rs" })).to.equal("Unsupported xdrust.json schema.");
    expect(rejection({ schema: 1, input: "", output: "a.rs" })).to.equal(
      "xdrust.json: 'input' must be a non-empty string."
    );
    expect(rejection({ schema: 1, input: "a.x", output: "a.rs", preamble: "no" })).to.equal(
      "xdrust.json: 'preamble' must be a boolean."
    );
    expect(rejection({ schema: 1, input: "a.x", output: "a.rs", emit: { decode: 0 } })).to.equal(
      "xdrust.json: 'emit.decode' must be a boolean."
    );
  });
});
