import { existsSync, readFileSync } from "node:fs";
import { dirname, join, resolve } from "node:path";

export const CONFIG_FILE_NAME = "xdrust.json";

export type EmitConfig = {
  readonly decode?: boolean;
  readonly encode?: boolean;
  readonly wireSize?: boolean;
};

export type ProjectConfig = {
  readonly schema: 1;
  readonly input: string;
  readonly output: string;
  readonly derive?: string;
  readonly emit?: EmitConfig;
  readonly preamble?: boolean;
};

export type ProjectContext = {
  /** Directory holding the config file; `input` and `output` are relative to it. */
  readonly projectRoot: string;
  readonly configPath: string;
  readonly project: ProjectConfig;
};

function asRecord(value: unknown, label: string): Record<string, unknown> {
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    throw new Error(`${label} must be a JSON object.`);
  }
  return value as Record<string, unknown>;
}

function assertKnownKeys(value: Record<string, unknown>, allowed: readonly string[], label: string): void {
  for (const key of Object.keys(value)) {
    if (!allowed.includes(key)) {
      throw new Error(`${label}: unknown key '${key}'.`);
    }
  }
}

function asString(value: unknown, label: string): string {
  if (typeof value !== "string" || value.length === 0) {
    throw new Error(`${label} must be a non-empty string.`);
  }
  return value;
}

function asBoolean(value: unknown, label: string): boolean {
  if (typeof value !== "boolean") {
    throw new Error(`${label} must be a boolean.`);
  }
  return value;
}

function parseEmitConfig(value: unknown): EmitConfig {
  const emit = asRecord(value, "xdrust.json: 'emit'");
  assertKnownKeys(emit, ["decode", "encode", "wireSize"], "xdrust.json: 'emit'");
  return {
    ...(emit.decode === undefined ? {} : { decode: asBoolean(emit.decode, "xdrust.json: 'emit.decode'") }),
    ...(emit.encode === undefined ? {} : { encode: asBoolean(emit.encode, "xdrust.json: 'emit.encode'") }),
    ...(emit.wireSize === undefined ? {} : { wireSize: asBoolean(emit.wireSize, "xdrust.json: 'emit.wireSize'") }),
  };
}

export function parseProjectConfig(value: unknown): ProjectConfig {
  const root = asRecord(value, "xdrust.json");
  assertKnownKeys(root, ["schema", "input", "output", "derive", "emit", "preamble"], "xdrust.json");

  if (root.schema !== 1) {
    throw new Error("Unsupported xdrust.json schema.");
  }

  const input = asString(root.input, "xdrust.json: 'input'");
  const output = asString(root.output, "xdrust.json: 'output'");

  return {
    schema: 1,
    input,
    output,
    ...(root.derive === undefined ? {} : { derive: asString(root.derive, "xdrust.json: 'derive'") }),
    ...(root.emit === undefined ? {} : { emit: parseEmitConfig(root.emit) }),
    ...(root.preamble === undefined ? {} : { preamble: asBoolean(root.preamble, "xdrust.json: 'preamble'") }),
  };
}

function readJson(path: string): unknown {
  const raw = readFileSync(path, "utf-8");
  return JSON.parse(raw) as unknown;
}

/** The nearest `xdrust.json` at or above `fromDir`, if any. */
export function findConfigFile(fromDir: string): string | undefined {
  let cur = resolve(fromDir);
  while (true) {
    const candidate = join(cur, CONFIG_FILE_NAME);
    if (existsSync(candidate)) return candidate;
    const parent = dirname(cur);
    if (parent === cur) return undefined;
    cur = parent;
  }
}

export function loadProjectConfig(path: string): ProjectConfig {
  return parseProjectConfig(readJson(path));
}

export function loadProjectContext(configPath: string): ProjectContext {
  const resolved = resolve(configPath);
  return { projectRoot: dirname(resolved), configPath: resolved, project: loadProjectConfig(resolved) };
}
