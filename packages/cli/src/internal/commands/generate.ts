import { mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";

import { generate } from "@xdrust/compiler";

import { resolveCommandOptions, type CommandArgs } from "./options.js";

export type GenerateResult = {
  readonly inputPath: string;
  readonly outputPath: string;
  readonly bytes: number;
};

export async function runGenerate(args: CommandArgs): Promise<GenerateResult> {
  const opts = resolveCommandOptions("generate", args);
  const outputPath = opts.outputPath;
  if (outputPath === undefined) throw new Error("generate: missing --out <file.rs>.");

  const idl = readFileSync(opts.inputPath, "utf-8");
  const rust = generate(idl, opts.config);

  mkdirSync(dirname(outputPath), { recursive: true });
  writeFileSync(outputPath, rust, "utf-8");
  return { inputPath: opts.inputPath, outputPath, bytes: Buffer.byteLength(rust, "utf-8") };
}
