import { readFileSync } from "node:fs";

import { analyzeIdl, generate } from "@xdrust/compiler";

import { resolveCommandOptions, type CommandArgs } from "./options.js";

export type CheckResult = {
  readonly inputPath: string;
  readonly declarations: number;
  readonly types: number;
  readonly generics: readonly string[];
  readonly genericPasses: number;
};

// Emission runs too, so unresolved names and bad case labels are reported;
// its output is dropped.
export async function runCheck(args: CommandArgs): Promise<CheckResult> {
  const opts = resolveCommandOptions("check", args);
  const idl = readFileSync(opts.inputPath, "utf-8");
  const ast = analyzeIdl(idl, opts.inputPath);
  generate(idl, opts.config);
  return {
    inputPath: opts.inputPath,
    declarations: ast.declarations.length,
    types: ast.types.ordered.length,
    generics: ast.generics.names,
    genericPasses: ast.generics.passes,
  };
}
