#!/usr/bin/env -S node --import tsx
import { existsSync, readFileSync } from "node:fs";
import { pathToFileURL } from "node:url";
import { argv, cwd, exit } from "node:process";

import { CompileError } from "@xdrust/compiler";

import { runCheck } from "./internal/commands/check.js";
import { runGenerate } from "./internal/commands/generate.js";

export type Cmd = "generate" | "check" | "help";

function usage(): void {
  console.log(
    [
      "xdrust: XDR interface definitions to Rust",
      "",
      "Usage:",
      "  xdrust generate [--input <file.x>] [--out <file.rs>] [--config <xdrust.json>]",
      "                  [--derive <attr>] [--no-decode] [--no-encode] [--no-wire-size] [--no-preamble]",
      "  xdrust check [--input <file.x>] [--config <xdrust.json>]",
      "",
      "Without --input/--out, paths come from the nearest xdrust.json.",
      "",
    ].join("\n")
  );
}

export function parseCommand(args: readonly string[]): Cmd {
  const [cmd] = args;
  if (!cmd) return "help";
  if (cmd === "generate" || cmd === "check" || cmd === "help") return cmd;
  return "help";
}

export function posToLineCol(text: string, pos: number): { readonly line: number; readonly col: number } {
  // 1-based, like most compilers.
  let line = 1;
  let col = 1;
  for (let i = 0; i < pos && i < text.length; i++) {
    const ch = text.charCodeAt(i);
    if (ch === 10 /* \n */) {
      line++;
      col = 1;
    } else {
      col++;
    }
  }
  return { line, col };
}

export function formatCompileError(err: CompileError, source: string | undefined): string {
  if (!err.span) return `${err.code}: ${err.message}`;
  if (source === undefined) return `${err.span.fileName}: ${err.code}: ${err.message}`;
  const pos = posToLineCol(source, err.span.start);
  return `${err.span.fileName}:${pos.line}:${pos.col}: ${err.code}: ${err.message}`;
}

function readSpanSource(err: CompileError): string | undefined {
  if (!err.span || !existsSync(err.span.fileName)) return undefined;
  return readFileSync(err.span.fileName, "utf-8");
}

async function main(): Promise<void> {
  try {
    const cmd = parseCommand(argv.slice(2));
    switch (cmd) {
      case "generate": {
        const res = await runGenerate({ dir: cwd(), argv: argv.slice(3) });
        console.log(`Wrote ${res.outputPath} (${res.bytes} bytes)`);
        return;
      }
      case "check": {
        const res = await runCheck({ dir: cwd(), argv: argv.slice(3) });
        const generic = res.generics.length === 0 ? "none" : res.generics.join(", ");
        console.log(`${res.inputPath}: ${res.declarations} declarations, ${res.types} types`);
        console.log(`generic over the buffer type: ${generic} (${res.genericPasses} passes)`);
        return;
      }
      default:
        usage();
        exit(1);
    }
  } catch (err: unknown) {
    if (err instanceof CompileError) {
      console.error(formatCompileError(err, readSpanSource(err)));
      exit(1);
    }
    console.error(err instanceof Error ? err.message : String(err));
    exit(1);
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  void main();
}
