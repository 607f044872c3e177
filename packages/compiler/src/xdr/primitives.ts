import type { BasicType, PrimitiveKind } from "./ast.js";

const PRIMITIVE_SPELLINGS: ReadonlyMap<string, PrimitiveKind> = new Map<string, PrimitiveKind>([
  ["unsigned int", "u32"],
  ["unsigned", "u32"],
  ["uint32_t", "u32"],
  ["u32", "u32"],
  ["int", "i32"],
  ["int32_t", "i32"],
  ["i32", "i32"],
  ["unsigned hyper", "u64"],
  ["uint64_t", "u64"],
  ["u64", "u64"],
  ["hyper", "i64"],
  ["int64_t", "i64"],
  ["i64", "i64"],
  ["float", "f32"],
  ["double", "f64"],
  ["bool", "bool"],
  ["string", "string"],
  ["opaque", "opaque"],
]);

export function canonicalBasicType(spelling: string): BasicType {
  const normalized = spelling.trim().replaceAll(/\s+/g, " ");
  const kind = PRIMITIVE_SPELLINGS.get(normalized);
  if (kind) return { kind };
  return { kind: "ident", name: normalized };
}

export function compareText(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

const DECIMAL = /^-?(0|[1-9][0-9]*)$/;
const HEX = /^-?0[xX][0-9a-fA-F]+$/;
const OCTAL = /^-?0[0-7]+$/;

export function isIntegerLiteral(text: string): boolean {
  return DECIMAL.test(text) || HEX.test(text) || OCTAL.test(text);
}

/** Decimal, `0x` hex and leading-zero octal, each optionally negative. */
export function parseIntegerLiteral(text: string): bigint | undefined {
  const negative = text.startsWith("-");
  const digits = negative ? text.slice(1) : text;
  let magnitude: bigint;
  if (DECIMAL.test(text) || HEX.test(text)) {
    magnitude = BigInt(digits);
  } else if (OCTAL.test(text)) {
    magnitude = BigInt(`0o${digits.slice(1)}`);
  } else {
    return undefined;
  }
  return negative ? -magnitude : magnitude;
}
