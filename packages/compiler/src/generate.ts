import type { Ast } from "./xdr/ast.js";
import { buildAst } from "./xdr/ast-builder.js";
import { parseIdl } from "./xdr/parser.js";
import type { RustItem } from "./rust/ir.js";
import type { EmitContext } from "./rust/passes/context.js";
import { emitDecodePass } from "./rust/passes/decode-emission.js";
import { emitEncodePass } from "./rust/passes/encode-emission.js";
import { emitTypeDeclarationsPass } from "./rust/passes/type-declarations.js";
import { emitWireSizePass } from "./rust/passes/wire-size-emission.js";
import { writeRustProgram } from "./rust/write.js";
import { renderXdrRuntime } from "./rust/xdr-runtime.js";

export const DEFAULT_DERIVE = "#[derive(Debug, PartialEq)]";
export const DEFAULT_FILE_NAME = "<input>";

export type EmitOptions = {
  readonly decode?: boolean;
  readonly encode?: boolean;
  readonly wireSize?: boolean;
};

export type GenerateConfig = {
  /** Attribute line(s) put above every struct and enum; one attribute per line. */
  readonly derive?: string;
  /** Name reported in diagnostic spans. */
  readonly fileName?: string;
  readonly emit?: EmitOptions;
  readonly preamble?: boolean;
};

function deriveAttrs(derive: string): readonly string[] {
  return derive
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

/** Parses IDL text and builds the AST with its indices, emitting nothing. */
export function analyzeIdl(idl: string, fileName: string = DEFAULT_FILE_NAME): Ast {
  return buildAst(parseIdl(idl, fileName));
}

export function generate(idl: string, config: GenerateConfig = {}): string {
  // Phase 1: parse, lower and index.
  const ast = analyzeIdl(idl, config.fileName ?? DEFAULT_FILE_NAME);
  const ctx: EmitContext = { ast, attrs: deriveAttrs(config.derive ?? DEFAULT_DERIVE) };

  // Phase 2: declarations in source order.
  const items: RustItem[] = [...emitTypeDeclarationsPass(ctx)];

  // Phase 3: impls in name order, decode before wire size before encode.
  const emit = config.emit ?? {};
  for (const decl of ast.types.ordered) {
    if (emit.decode ?? true) items.push(...emitDecodePass(ctx, decl));
    if (emit.wireSize ?? true) items.push(emitWireSizePass(ctx, decl));
    if (emit.encode ?? true) items.push(emitEncodePass(ctx, decl));
  }

  const header = (config.preamble ?? true) ? renderXdrRuntime() : [];
  return writeRustProgram({ kind: "program", items }, { header });
}
