import { resolve } from "node:path";

import type { GenerateConfig } from "@xdrust/compiler";

import { findConfigFile, loadProjectContext, type ProjectContext } from "../config.js";

export type CommandArgs = {
  readonly dir: string;
  readonly argv: readonly string[];
};

export type CommandName = "generate" | "check";

type ParsedFlags = {
  input?: string;
  out?: string;
  derive?: string;
  config?: string;
  noDecode: boolean;
  noEncode: boolean;
  noWireSize: boolean;
  noPreamble: boolean;
};

export type ResolvedOptions = {
  readonly inputPath: string;
  readonly outputPath?: string;
  readonly config: GenerateConfig;
};

const CHECK_FLAGS: ReadonlySet<string> = new Set(["--input", "--config"]);

export function usageFor(command: CommandName): string {
  if (command === "check") return "Usage: xdrust check [--input <file.x>] [--config <xdrust.json>]";
  return [
    "Usage: xdrust generate [--input <file.x>] [--out <file.rs>] [--config <xdrust.json>]",
    "                       [--derive <attr>] [--no-decode] [--no-encode] [--no-wire-size] [--no-preamble]",
  ].join("\n");
}

export function parseCommandFlags(command: CommandName, argv: readonly string[]): ParsedFlags {
  const out: ParsedFlags = { noDecode: false, noEncode: false, noWireSize: false, noPreamble: false };
  const it = argv[Symbol.iterator]();
  for (const a of it) {
    if (a === "--help" || a === "-h") throw new Error(usageFor(command));
    if (command === "check" && a.startsWith("--") && !CHECK_FLAGS.has(a)) {
      throw new Error(`check: unknown arg: ${a}`);
    }
    const value = (): string => {
      const v = it.next();
      if (v.done || v.value.length === 0) throw new Error(`${command}: ${a} requires a value`);
      return v.value;
    };
    switch (a) {
      case "--input":
        out.input = value();
        break;
      case "--out":
        out.out = value();
        break;
      case "--derive":
        out.derive = value();
        break;
      case "--config":
        out.config = value();
        break;
      case "--no-decode":
        out.noDecode = true;
        break;
      case "--no-encode":
        out.noEncode = true;
        break;
      case "--no-wire-size":
        out.noWireSize = true;
        break;
      case "--no-preamble":
        out.noPreamble = true;
        break;
      default:
        throw new Error(`${command}: unknown arg: ${a}`);
    }
  }
  return out;
}

function loadContext(dir: string, flags: ParsedFlags): ProjectContext | undefined {
  if (flags.config !== undefined) return loadProjectContext(resolve(dir, flags.config));
  const found = findConfigFile(dir);
  return found === undefined ? undefined : loadProjectContext(found);
}

/**
 * Flags win over `xdrust.json`. Flag paths resolve against the working
 * directory, config paths against the config file's directory.
 */
export function resolveCommandOptions(command: CommandName, args: CommandArgs): ResolvedOptions {
  const flags = parseCommandFlags(command, args.argv);
  const ctx = loadContext(args.dir, flags);
  const project = ctx?.project;

  const inputPath =
    flags.input !== undefined
      ? resolve(args.dir, flags.input)
      : ctx
        ? resolve(ctx.projectRoot, ctx.project.input)
        : undefined;
  if (inputPath === undefined) {
    throw new Error(`${command}: missing --input <file.x> and no xdrust.json was found.`);
  }

  const outputPath =
    flags.out !== undefined
      ? resolve(args.dir, flags.out)
      : ctx
        ? resolve(ctx.projectRoot, ctx.project.output)
        : undefined;
  if (command === "generate" && outputPath === undefined) {
    throw new Error("generate: missing --out <file.rs> and no xdrust.json was found.");
  }

  const emit = project?.emit ?? {};
  const derive = flags.derive ?? project?.derive;
  const config: GenerateConfig = {
    fileName: inputPath,
    ...(derive === undefined ? {} : { derive }),
    emit: {
      decode: !flags.noDecode && (emit.decode ?? true),
      encode: !flags.noEncode && (emit.encode ?? true),
      wireSize: !flags.noWireSize && (emit.wireSize ?? true),
    },
    preamble: !flags.noPreamble && (project?.preamble ?? true),
  };

  return { inputPath, ...(outputPath === undefined ? {} : { outputPath }), config };
}
